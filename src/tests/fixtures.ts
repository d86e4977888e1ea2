// Shared test data

import {Either} from 'purify-ts';
import {MerchantScope, Money, StockItem, Transaction} from '../domain';
import {withPricing} from '../pure/businessLogic';

export const MERCHANT: MerchantScope = {merchantId: 'merchant-1'};
export const OTHER_MERCHANT: MerchantScope = {merchantId: 'merchant-2'};

export const T0 = new Date('2024-01-15T10:00:00.000Z');
export const T1 = new Date('2024-01-15T10:05:00.000Z');

type StockItemOptions = {
  id?: string;
  merchantId?: string;
  productName?: string;
  purchaseUnitPrice?: Money;
  profitMarginPercent?: number;
};

/** Defaults to a 3000.00 purchase price and a 20% margin. */
export function stockItem(quantityOnHand: number, options: StockItemOptions = {}): StockItem {
  return withPricing({
    id: options.id ?? 'item-1',
    merchantId: options.merchantId ?? MERCHANT.merchantId,
    productName: options.productName ?? 'Cement',
    quantityOnHand,
    unitSize: 1,
    purchaseUnitPrice: options.purchaseUnitPrice ?? 300000n,
    profitMarginPercent: options.profitMarginPercent ?? 20,
    createdAt: T0,
    updatedAt: T0,
  });
}

export function openTransaction(id = 'tx-1'): Transaction {
  return {
    id,
    merchantId: MERCHANT.merchantId,
    lineItemCount: null,
    total: 0n,
    status: 'open',
    createdAt: T0,
    updatedAt: T0,
  };
}

export function rightOf<L, R>(either: Either<L, R>): R {
  return either.caseOf<R>({
    Left: value => {
      throw new Error(`Expected Right, got Left ${String(value)}`);
    },
    Right: value => value,
  });
}

export function leftOf<L, R>(either: Either<L, R>): L {
  return either.caseOf<L>({
    Left: value => value,
    Right: () => {
      throw new Error('Expected Left, got Right');
    },
  });
}
