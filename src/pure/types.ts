// Module product types

import {Either, Maybe, NonEmptyList} from 'purify-ts';
import {Money, StockItem, Transaction, TransactionLineItem} from '../domain';

export type SellRequest = {
  readonly transactionId: string;
  readonly stockItemId: string;
  readonly quantity: number;
};

export type InvalidQuantity = {
  readonly kind: 'InvalidQuantity';
  readonly quantity: number;
};

export type TransactionNotFound = {
  readonly kind: 'TransactionNotFound';
  readonly transactionId: string;
};

export type TransactionClosed = {
  readonly kind: 'TransactionClosed';
  readonly transactionId: string;
};

export type ItemNotFound = {
  readonly kind: 'ItemNotFound';
  readonly stockItemId: string;
};

export type InsufficientStock = {
  readonly kind: 'InsufficientStock';
  readonly stockItemId: string;
  readonly requested: number;
  readonly available: number;
};

/** Storage refused the lock or serialization; nothing was committed. */
export type ConcurrencyConflict = {
  readonly kind: 'ConcurrencyConflict';
  /** The stock item or transaction whose lock could not be held. */
  readonly resourceId: string;
};

export type SellFailure =
  | InvalidQuantity
  | TransactionNotFound
  | TransactionClosed
  | ItemNotFound
  | InsufficientStock
  | ConcurrencyConflict;

export type SaleReceipt = {
  readonly lineItem: TransactionLineItem;
  readonly transaction: Transaction;
  /** Nothing when the sale depleted the item. */
  readonly remainingStock: Maybe<StockItem>;
  /** The item as it was before the sale. */
  readonly soldFrom: StockItem;
};

export type SellOutcome = Either<SellFailure, SaleReceipt>;

export type SalePlan =
  | {
      readonly kind: 'depleted';
      readonly stockItemId: string;
      readonly productName: string;
      readonly quantity: number;
      readonly subtotal: Money;
    }
  | {
      readonly kind: 'decremented';
      readonly stockItemId: string;
      readonly productName: string;
      readonly quantity: number;
      readonly subtotal: Money;
      readonly updatedItem: StockItem;
    };

// ============================================================================
// Checkout
// ============================================================================

export type CheckoutLine = {
  readonly stockItemId: string;
  readonly quantity: number;
};

export type CheckoutPolicy = 'partial' | 'all-or-nothing';

export type CheckoutLineResult = {
  readonly line: CheckoutLine;
  readonly outcome: SellOutcome;
};

export type CheckoutSummary = {
  readonly transaction: Transaction;
  readonly lines: CheckoutLineResult[];
};

export type CheckoutLineFailure = {
  readonly line: CheckoutLine;
  readonly failure: SellFailure;
};

export type CheckoutRejection = {
  readonly failures: NonEmptyList<CheckoutLineFailure>;
};

export type Receipt = {
  readonly transaction: Transaction;
  readonly lineItems: TransactionLineItem[];
};

// ============================================================================
// Stock management
// ============================================================================

export type StockRegistration = {
  readonly productName: string;
  readonly quantityOnHand: number;
  readonly unitSize: number;
  readonly purchaseUnitPrice: Money;
  readonly profitMarginPercent: number;
};

export type StockAdjustment = {
  readonly addQuantity: Maybe<number>;
  readonly purchaseUnitPrice: Maybe<Money>;
  readonly profitMarginPercent: Maybe<number>;
};
