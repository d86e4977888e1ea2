/**
 * EFFECTS LAYER
 *
 * Storage access the engine needs, expressed at the level the coordinators
 * think in ("get this stock item", "append this line item") rather than as
 * queries. Every call carries the merchant scope explicitly; implementations
 * must never return or touch a record outside it.
 */

import {
  LineItemFields,
  MerchantScope,
  NewStockItem,
  StockItem,
  Transaction,
  TransactionLineItem,
} from '../domain';
import {Clock} from '../types';

// ============================================================================
// Repositories
// ============================================================================

export interface StockItemRepository {
  getById(scope: MerchantScope, id: string): Promise<StockItem | null>;
  listByMerchant(scope: MerchantScope): Promise<StockItem[]>;
  insert(scope: MerchantScope, item: NewStockItem): Promise<StockItem>;
  /** Insert or replace by id. */
  save(scope: MerchantScope, item: StockItem): Promise<void>;
  delete(scope: MerchantScope, id: string): Promise<void>;
}

export interface TransactionRepository {
  create(scope: MerchantScope, createdAt: Date): Promise<Transaction>;
  getById(scope: MerchantScope, id: string): Promise<Transaction | null>;
  /** Oldest first. */
  listByMerchant(scope: MerchantScope): Promise<Transaction[]>;
  save(scope: MerchantScope, transaction: Transaction): Promise<void>;
  /** Removes the transaction together with its line items. */
  delete(scope: MerchantScope, id: string): Promise<void>;
  createLineItem(
    scope: MerchantScope,
    transactionId: string,
    fields: LineItemFields
  ): Promise<TransactionLineItem>;
  listLineItems(scope: MerchantScope, transactionId: string): Promise<TransactionLineItem[]>;
}

export type StoreEffects = {
  readonly stockItems: StockItemRepository;
  readonly transactions: TransactionRepository;
};

// ============================================================================
// Unit of work
// ============================================================================

export type LockKeys = {
  readonly stockItemIds?: readonly string[];
  readonly transactionId?: string;
};

export interface UnitOfWork {
  /**
   * Runs `work` while holding exclusive access to the named stock items and
   * transaction. Writes made through the supplied repositories become visible
   * together when `work` resolves and are discarded when it throws.
   *
   * Implementations throw `ConcurrencyConflictError` when a lock cannot be
   * obtained (naming the record in `resourceId`) or the storage aborts the
   * unit because of contention.
   */
  withLocks<T>(
    scope: MerchantScope,
    keys: LockKeys,
    work: (store: StoreEffects) => Promise<T>
  ): Promise<T>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = StoreEffects & {
  readonly units: UnitOfWork;
  readonly clock: Clock;
};
