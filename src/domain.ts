// Domain types shared across the application

/**
 * Fixed-point currency amount, held as a count of hundredths.
 * See `pure/money.ts` for the arithmetic.
 */
export type Money = bigint;

export type MerchantScope = {
  readonly merchantId: string;
};

/** The purchase data a merchant enters for a stock item. */
export type StockItemInputs = {
  readonly quantityOnHand: number;
  readonly unitSize: number;
  readonly purchaseUnitPrice: Money;
  readonly profitMarginPercent: number;
};

/** Derived from {@link StockItemInputs}, never edited on its own. */
export type StockPricing = {
  readonly purchaseTotal: Money;
  readonly saleUnitPrice: Money;
  readonly saleTotal: Money;
};

export type StockItem = StockItemInputs & StockPricing & {
  readonly id: string;
  readonly merchantId: string;
  readonly productName: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
};

export type NewStockItem = Omit<StockItem, 'id'>;

export type TransactionStatus = 'open' | 'completed';

export type Transaction = {
  readonly id: string;
  readonly merchantId: string;
  readonly lineItemCount: number | null;
  readonly total: Money;
  readonly status: TransactionStatus;
  readonly createdAt: Date;
  readonly updatedAt: Date;
};

export type TransactionLineItem = {
  readonly id: string;
  readonly transactionId: string;
  readonly productName: string;
  readonly quantity: number;
  readonly subtotal: Money;
};

export type LineItemFields = Omit<TransactionLineItem, 'id' | 'transactionId'>;
