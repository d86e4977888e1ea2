/**
 * Input decoding for stock registration and restocking.
 *
 * Each field is decoded on its own so that every problem with an input is
 * reported at once, not just the first.
 */

import {
  Codec,
  Either,
  GetType,
  Left,
  Maybe,
  NonEmptyList,
  Right,
  number,
  optional,
  record,
  string,
  unknown,
} from 'purify-ts';
import {Money} from '../domain';
import {StockAdjustment, StockRegistration} from './types';
import {formatMoney, parseMoney} from './money';

type Decoder = {
  readonly decode: (input: unknown) => Either<string, unknown>;
};

const refine = <T>(
  base: Codec<T>,
  accept: (value: T) => boolean,
  message: string
): Codec<T> =>
  Codec.custom<T>({
    decode: input => base.decode(input)
      .chain((value): Either<string, T> => (accept(value) ? Right(value) : Left(message))),
    encode: value => base.encode(value),
  });

export const ProductName = refine(string, name => name.trim().length > 0, 'must not be blank');

export const PositiveInteger = refine(
  number,
  value => Number.isSafeInteger(value) && value > 0,
  'must be a positive integer'
);

export const NonNegativeInteger = refine(
  number,
  value => Number.isSafeInteger(value) && value >= 0,
  'must be a whole number of at least 0'
);

/** A price given as a decimal string or a number, strictly above zero. */
export const Price = Codec.custom<Money>({
  decode: input => {
    if (typeof input !== 'string' && typeof input !== 'number') {
      return Left(`expected a decimal amount, received ${JSON.stringify(input)}`);
    }
    return parseMoney(String(input))
      .chain((amount): Either<string, Money> => (amount > 0n ? Right(amount) : Left('must be greater than 0')));
  },
  encode: amount => formatMoney(amount),
});

// Per-field decoders; a field listed as optional may also be absent.
type FieldSpec = {
  readonly decoders: Record<string, Decoder>;
  readonly optional: readonly string[];
};

const registrationFields: FieldSpec = {
  decoders: {
    productName: ProductName,
    quantityOnHand: PositiveInteger,
    unitSize: PositiveInteger,
    purchaseUnitPrice: Price,
    profitMarginPercent: NonNegativeInteger,
  },
  optional: ['unitSize'],
};

const adjustmentFields: FieldSpec = {
  decoders: {
    addQuantity: PositiveInteger,
    purchaseUnitPrice: Price,
    profitMarginPercent: NonNegativeInteger,
  },
  optional: ['addQuantity', 'purchaseUnitPrice', 'profitMarginPercent'],
};

export const StockRegistrationInput = Codec.interface({
  productName: ProductName,
  quantityOnHand: PositiveInteger,
  unitSize: optional(PositiveInteger),
  purchaseUnitPrice: Price,
  profitMarginPercent: NonNegativeInteger,
});
export type StockRegistrationInput = GetType<typeof StockRegistrationInput>;

export const StockAdjustmentInput = Codec.interface({
  addQuantity: optional(PositiveInteger),
  purchaseUnitPrice: optional(Price),
  profitMarginPercent: optional(NonNegativeInteger),
});
export type StockAdjustmentInput = GetType<typeof StockAdjustmentInput>;

const InputObject = record(string, unknown);

function decodeFields<T>(
  codec: Codec<T>,
  fields: FieldSpec,
  input: unknown
): Either<NonEmptyList<string>, T> {
  return InputObject.decode(input)
    .mapLeft(error => NonEmptyList([error]))
    .chain(values => {
      const present = Object.entries(fields.decoders)
        .filter(([name]) => values[name] !== undefined || !fields.optional.includes(name));
      const errors = present.flatMap(([name, decoder]) =>
        decoder.decode(values[name]).caseOf<string[]>({
          Left: error => [`${name}: ${error}`],
          Right: () => [],
        })
      );
      return NonEmptyList.fromArray(errors).caseOf<Either<NonEmptyList<string>, T>>({
        Just: list => Left(list),
        Nothing: () => codec.decode(input).mapLeft(error => NonEmptyList([error])),
      });
    });
}

export function decodeStockRegistration(input: unknown): Either<NonEmptyList<string>, StockRegistration> {
  return decodeFields(StockRegistrationInput, registrationFields, input)
    .map(fields => ({
      productName: fields.productName.trim(),
      quantityOnHand: fields.quantityOnHand,
      unitSize: fields.unitSize ?? 1,
      purchaseUnitPrice: fields.purchaseUnitPrice,
      profitMarginPercent: fields.profitMarginPercent,
    }));
}

export function decodeStockAdjustment(input: unknown): Either<NonEmptyList<string>, StockAdjustment> {
  return decodeFields(StockAdjustmentInput, adjustmentFields, input)
    .chain((fields): Either<NonEmptyList<string>, StockAdjustment> => {
      const adjustment: StockAdjustment = {
        addQuantity: Maybe.fromNullable(fields.addQuantity),
        purchaseUnitPrice: Maybe.fromNullable(fields.purchaseUnitPrice),
        profitMarginPercent: Maybe.fromNullable(fields.profitMarginPercent),
      };
      const changesSomething = adjustment.addQuantity.isJust()
        || adjustment.purchaseUnitPrice.isJust()
        || adjustment.profitMarginPercent.isJust();
      return changesSomething
        ? Right(adjustment)
        : Left(NonEmptyList(['nothing to change: give addQuantity, purchaseUnitPrice or profitMarginPercent']));
    });
}
