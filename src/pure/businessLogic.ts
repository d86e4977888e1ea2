/**
 * PURE BUSINESS LOGIC
 *
 * Pricing, sale planning and aggregate updates. These functions take values
 * and return values; the coordinators decide what to read and what to write.
 */

import {
  LineItemFields,
  MerchantScope,
  NewStockItem,
  StockItem,
  StockItemInputs,
  StockPricing,
  Transaction,
  TransactionLineItem,
} from '../domain';
import {
  CheckoutLine,
  CheckoutLineFailure,
  SalePlan,
  SellFailure,
  StockAdjustment,
  StockRegistration,
} from './types';
import {addMoney, applyMarkup, multiplyMoney, percentOf} from './money';
import {Either, Left, Right} from 'purify-ts';

// ============================================================================
// Pricing
// ============================================================================

export function recompute(inputs: StockItemInputs): StockPricing {
  const purchaseTotal = multiplyMoney(inputs.purchaseUnitPrice, inputs.quantityOnHand);
  return {
    purchaseTotal,
    saleUnitPrice: applyMarkup(inputs.purchaseUnitPrice, inputs.profitMarginPercent),
    saleTotal: addMoney(purchaseTotal, percentOf(purchaseTotal, inputs.profitMarginPercent)),
  };
}

export function withPricing<T extends StockItemInputs>(item: T): T & StockPricing {
  return {...item, ...recompute(item)};
}

export function hasConsistentPricing(item: StockItem): boolean {
  const expected = recompute(item);
  return item.purchaseTotal === expected.purchaseTotal
    && item.saleUnitPrice === expected.saleUnitPrice
    && item.saleTotal === expected.saleTotal;
}

export function isOwnedBy(scope: MerchantScope, record: { readonly merchantId: string }): boolean {
  return record.merchantId === scope.merchantId;
}

// ============================================================================
// Failures
// ============================================================================

export const invalidQuantity = (quantity: number): SellFailure =>
  ({kind: 'InvalidQuantity', quantity});

export const transactionNotFound = (transactionId: string): SellFailure =>
  ({kind: 'TransactionNotFound', transactionId});

export const transactionClosed = (transactionId: string): SellFailure =>
  ({kind: 'TransactionClosed', transactionId});

export const itemNotFound = (stockItemId: string): SellFailure =>
  ({kind: 'ItemNotFound', stockItemId});

export const insufficientStock = (stockItemId: string, requested: number, available: number): SellFailure =>
  ({kind: 'InsufficientStock', stockItemId, requested, available});

export const concurrencyConflict = (resourceId: string): SellFailure =>
  ({kind: 'ConcurrencyConflict', resourceId});

// ============================================================================
// Selling
// ============================================================================

export function validateQuantity(quantity: number): Either<SellFailure, number> {
  return Number.isSafeInteger(quantity) && quantity > 0
    ? Right(quantity)
    : Left(invalidQuantity(quantity));
}

export function checkTransactionOpen(transaction: Transaction): Either<SellFailure, Transaction> {
  return transaction.status === 'open'
    ? Right(transaction)
    : Left(transactionClosed(transaction.id));
}

/**
 * Decide what selling `quantity` units of `item` does to it. The sale unit
 * price is taken from the item as it is now, before any change.
 */
export function planSale(item: StockItem, quantity: number, at: Date): Either<SellFailure, SalePlan> {
  return validateQuantity(quantity).chain((requested): Either<SellFailure, SalePlan> => {
    if (requested > item.quantityOnHand) {
      return Left(insufficientStock(item.id, requested, item.quantityOnHand));
    }

    const subtotal = multiplyMoney(item.saleUnitPrice, requested);
    const remaining = item.quantityOnHand - requested;

    const plan: SalePlan = remaining === 0
      ? {
          kind: 'depleted',
          stockItemId: item.id,
          productName: item.productName,
          quantity: requested,
          subtotal,
        }
      : {
          kind: 'decremented',
          stockItemId: item.id,
          productName: item.productName,
          quantity: requested,
          subtotal,
          updatedItem: withPricing({...item, quantityOnHand: remaining, updatedAt: at}),
        };
    return Right(plan);
  });
}

export function toLineItemFields(plan: SalePlan): LineItemFields {
  return {
    productName: plan.productName,
    quantity: plan.quantity,
    subtotal: plan.subtotal,
  };
}

export function applyLineItem(
  transaction: Transaction,
  lineItem: TransactionLineItem,
  at: Date
): Transaction {
  return {
    ...transaction,
    total: addMoney(transaction.total, lineItem.subtotal),
    lineItemCount: (transaction.lineItemCount ?? 0) + 1,
    updatedAt: at,
  };
}

export function markCompleted(transaction: Transaction, at: Date): Transaction {
  return {...transaction, status: 'completed', updatedAt: at};
}

/**
 * Give `quantity` units back to a stock item after a sale is undone. A
 * depleted item is brought back from its pre-sale snapshot.
 */
export function creditStock(
  current: StockItem | null,
  soldFrom: StockItem,
  quantity: number,
  at: Date
): StockItem {
  const base = current ?? {...soldFrom, quantityOnHand: 0};
  return withPricing({...base, quantityOnHand: base.quantityOnHand + quantity, updatedAt: at});
}

// ============================================================================
// Checkout pre-validation
// ============================================================================

export function summarizeDemand(lines: readonly CheckoutLine[]): Map<string, number> {
  return lines.reduce(
    (demand, line) => demand.set(line.stockItemId, (demand.get(line.stockItemId) ?? 0) + line.quantity),
    new Map<string, number>()
  );
}

/**
 * Everything that would stop `lines` from being sold in full against the
 * given stock. Shortfalls are reported once per stock item, on its first line,
 * with the item's combined demand.
 */
export function findShortfalls(
  lines: readonly CheckoutLine[],
  stock: ReadonlyMap<string, StockItem | null>
): CheckoutLineFailure[] {
  const invalid = lines.flatMap(line =>
    validateQuantity(line.quantity).caseOf<CheckoutLineFailure[]>({
      Left: failure => [{line, failure}],
      Right: () => [],
    })
  );
  if (invalid.length > 0) return invalid;

  const demand = summarizeDemand(lines);
  const reported = new Set<string>();

  return lines.flatMap((line): CheckoutLineFailure[] => {
    if (reported.has(line.stockItemId)) return [];
    reported.add(line.stockItemId);

    const item = stock.get(line.stockItemId) ?? null;
    if (!item) {
      return [{line, failure: itemNotFound(line.stockItemId)}];
    }
    const requested = demand.get(line.stockItemId) ?? line.quantity;
    return requested > item.quantityOnHand
      ? [{line, failure: insufficientStock(item.id, requested, item.quantityOnHand)}]
      : [];
  });
}

// ============================================================================
// Stock management
// ============================================================================

export function newStockItem(scope: MerchantScope, registration: StockRegistration, at: Date): NewStockItem {
  return withPricing({
    merchantId: scope.merchantId,
    productName: registration.productName,
    quantityOnHand: registration.quantityOnHand,
    unitSize: registration.unitSize,
    purchaseUnitPrice: registration.purchaseUnitPrice,
    profitMarginPercent: registration.profitMarginPercent,
    createdAt: at,
    updatedAt: at,
  });
}

export function applyStockAdjustment(item: StockItem, adjustment: StockAdjustment, at: Date): StockItem {
  return withPricing({
    ...item,
    quantityOnHand: item.quantityOnHand + adjustment.addQuantity.orDefault(0),
    purchaseUnitPrice: adjustment.purchaseUnitPrice.orDefault(item.purchaseUnitPrice),
    profitMarginPercent: adjustment.profitMarginPercent.orDefault(item.profitMarginPercent),
    updatedAt: at,
  });
}
