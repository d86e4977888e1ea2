/**
 * IN-MEMORY EFFECTS
 *
 * A complete implementation of the effect interfaces held in process memory.
 * Used by the tests and usable by any single-process caller that does not need
 * durable storage.
 *
 * Units of work take a KeyedLock on the stock item and transaction they name
 * and stage their writes; the staged writes are applied in one synchronous
 * step when the work resolves, so other readers never see half a sale.
 */

import {randomUUID} from 'node:crypto';
import {
    LineItemFields,
    MerchantScope,
    NewStockItem,
    StockItem,
    Transaction,
    TransactionLineItem,
} from '../domain';
import {
    AppEffects,
    LockKeys,
    StockItemRepository,
    StoreEffects,
    TransactionRepository,
    UnitOfWork,
} from '../pure/effects';
import {Clock} from '../types';
import {ZERO} from '../pure/money';
import {ConcurrencyConflictError} from './ConcurrencyConflictError';
import {KeyedLock} from './KeyedLock';

export type InMemoryEffectsOptions = {
    readonly clock?: Clock;
    readonly lockTimeoutMs?: number;
    readonly generateId?: () => string;
};

// ============================================================================
// Tables
// ============================================================================

interface Tables {
    stockItem(id: string): StockItem | undefined;
    allStockItems(): StockItem[];
    putStockItem(item: StockItem): void;
    removeStockItem(id: string): void;
    transaction(id: string): Transaction | undefined;
    allTransactions(): Transaction[];
    putTransaction(transaction: Transaction): void;
    removeTransaction(id: string): void;
    lineItems(transactionId: string): TransactionLineItem[];
    addLineItem(lineItem: TransactionLineItem): void;
}

class MemoryTables implements Tables {
    private readonly stockItems = new Map<string, StockItem>();
    private readonly transactions = new Map<string, Transaction>();
    private readonly lineItemsByTransaction = new Map<string, TransactionLineItem[]>();

    stockItem(id: string): StockItem | undefined {
        return this.stockItems.get(id);
    }

    allStockItems(): StockItem[] {
        return [...this.stockItems.values()];
    }

    putStockItem(item: StockItem): void {
        this.stockItems.set(item.id, item);
    }

    removeStockItem(id: string): void {
        this.stockItems.delete(id);
    }

    transaction(id: string): Transaction | undefined {
        return this.transactions.get(id);
    }

    allTransactions(): Transaction[] {
        return [...this.transactions.values()];
    }

    putTransaction(transaction: Transaction): void {
        this.transactions.set(transaction.id, transaction);
    }

    removeTransaction(id: string): void {
        this.transactions.delete(id);
        this.lineItemsByTransaction.delete(id);
    }

    lineItems(transactionId: string): TransactionLineItem[] {
        return [...(this.lineItemsByTransaction.get(transactionId) ?? [])];
    }

    addLineItem(lineItem: TransactionLineItem): void {
        const existing = this.lineItemsByTransaction.get(lineItem.transactionId) ?? [];
        this.lineItemsByTransaction.set(lineItem.transactionId, [...existing, lineItem]);
    }
}

/**
 * Reads through to the base tables; writes are held back until commit().
 */
class StagedTables implements Tables {
    private readonly stockWrites = new Map<string, StockItem | null>();
    private readonly transactionWrites = new Map<string, Transaction | null>();
    private readonly newLineItems: TransactionLineItem[] = [];

    constructor(private readonly base: Tables) {}

    stockItem(id: string): StockItem | undefined {
        const staged = this.stockWrites.get(id);
        if (staged === null) return undefined;
        return staged ?? this.base.stockItem(id);
    }

    allStockItems(): StockItem[] {
        const untouched = this.base.allStockItems().filter(item => !this.stockWrites.has(item.id));
        const written = [...this.stockWrites.values()].flatMap(item => (item ? [item] : []));
        return [...untouched, ...written];
    }

    putStockItem(item: StockItem): void {
        this.stockWrites.set(item.id, item);
    }

    removeStockItem(id: string): void {
        this.stockWrites.set(id, null);
    }

    transaction(id: string): Transaction | undefined {
        const staged = this.transactionWrites.get(id);
        if (staged === null) return undefined;
        return staged ?? this.base.transaction(id);
    }

    allTransactions(): Transaction[] {
        const untouched = this.base.allTransactions().filter(transaction => !this.transactionWrites.has(transaction.id));
        const written = [...this.transactionWrites.values()].flatMap(transaction => (transaction ? [transaction] : []));
        return [...untouched, ...written];
    }

    putTransaction(transaction: Transaction): void {
        this.transactionWrites.set(transaction.id, transaction);
    }

    removeTransaction(id: string): void {
        this.transactionWrites.set(id, null);
    }

    lineItems(transactionId: string): TransactionLineItem[] {
        if (this.transactionWrites.get(transactionId) === null) return [];
        return [
            ...this.base.lineItems(transactionId),
            ...this.newLineItems.filter(lineItem => lineItem.transactionId === transactionId),
        ];
    }

    addLineItem(lineItem: TransactionLineItem): void {
        this.newLineItems.push(lineItem);
    }

    commit(): void {
        this.stockWrites.forEach((item, id) =>
            item ? this.base.putStockItem(item) : this.base.removeStockItem(id)
        );
        this.transactionWrites.forEach((transaction, id) =>
            transaction ? this.base.putTransaction(transaction) : this.base.removeTransaction(id)
        );
        this.newLineItems
            .filter(lineItem => this.transactionWrites.get(lineItem.transactionId) !== null)
            .forEach(lineItem => this.base.addLineItem(lineItem));
    }
}

// ============================================================================
// Repositories
// ============================================================================

function assertInScope(scope: MerchantScope, record: { readonly merchantId: string }, what: string): void {
    if (record.merchantId !== scope.merchantId) {
        throw new Error(`${what} belongs to another merchant`);
    }
}

class InMemoryStockItemRepository implements StockItemRepository {
    constructor(private readonly tables: Tables, private readonly generateId: () => string) {}

    async getById(scope: MerchantScope, id: string): Promise<StockItem | null> {
        const item = this.tables.stockItem(id);
        return item && item.merchantId === scope.merchantId ? item : null;
    }

    async listByMerchant(scope: MerchantScope): Promise<StockItem[]> {
        return this.tables.allStockItems().filter(item => item.merchantId === scope.merchantId);
    }

    async insert(scope: MerchantScope, item: NewStockItem): Promise<StockItem> {
        assertInScope(scope, item, 'Stock item');
        const stored: StockItem = {...item, id: this.generateId()};
        this.tables.putStockItem(stored);
        return stored;
    }

    async save(scope: MerchantScope, item: StockItem): Promise<void> {
        assertInScope(scope, item, `Stock item ${item.id}`);
        const existing = this.tables.stockItem(item.id);
        if (existing) {
            assertInScope(scope, existing, `Stock item ${item.id}`);
        }
        this.tables.putStockItem(item);
    }

    async delete(scope: MerchantScope, id: string): Promise<void> {
        const existing = this.tables.stockItem(id);
        if (existing && existing.merchantId === scope.merchantId) {
            this.tables.removeStockItem(id);
        }
    }
}

class InMemoryTransactionRepository implements TransactionRepository {
    constructor(private readonly tables: Tables, private readonly generateId: () => string) {}

    async create(scope: MerchantScope, createdAt: Date): Promise<Transaction> {
        const transaction: Transaction = {
            id: this.generateId(),
            merchantId: scope.merchantId,
            lineItemCount: null,
            total: ZERO,
            status: 'open',
            createdAt,
            updatedAt: createdAt,
        };
        this.tables.putTransaction(transaction);
        return transaction;
    }

    async getById(scope: MerchantScope, id: string): Promise<Transaction | null> {
        const transaction = this.tables.transaction(id);
        return transaction && transaction.merchantId === scope.merchantId ? transaction : null;
    }

    async listByMerchant(scope: MerchantScope): Promise<Transaction[]> {
        return this.tables.allTransactions()
            .filter(transaction => transaction.merchantId === scope.merchantId)
            .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    }

    async save(scope: MerchantScope, transaction: Transaction): Promise<void> {
        assertInScope(scope, transaction, `Transaction ${transaction.id}`);
        this.tables.putTransaction(transaction);
    }

    async delete(scope: MerchantScope, id: string): Promise<void> {
        const existing = this.tables.transaction(id);
        if (existing && existing.merchantId === scope.merchantId) {
            this.tables.removeTransaction(id);
        }
    }

    async createLineItem(
        scope: MerchantScope,
        transactionId: string,
        fields: LineItemFields
    ): Promise<TransactionLineItem> {
        const transaction = this.tables.transaction(transactionId);
        if (!transaction) {
            throw new Error(`Transaction ${transactionId} does not exist`);
        }
        assertInScope(scope, transaction, `Transaction ${transactionId}`);
        const lineItem: TransactionLineItem = {...fields, id: this.generateId(), transactionId};
        this.tables.addLineItem(lineItem);
        return lineItem;
    }

    async listLineItems(scope: MerchantScope, transactionId: string): Promise<TransactionLineItem[]> {
        const transaction = this.tables.transaction(transactionId);
        return transaction && transaction.merchantId === scope.merchantId
            ? this.tables.lineItems(transactionId)
            : [];
    }
}

function repositories(tables: Tables, generateId: () => string): StoreEffects {
    return {
        stockItems: new InMemoryStockItemRepository(tables, generateId),
        transactions: new InMemoryTransactionRepository(tables, generateId),
    };
}

// ============================================================================
// Unit of work
// ============================================================================

class InMemoryUnitOfWork implements UnitOfWork {
    constructor(
        private readonly tables: MemoryTables,
        private readonly lock: KeyedLock,
        private readonly generateId: () => string
    ) {}

    async withLocks<T>(
        scope: MerchantScope,
        keys: LockKeys,
        work: (store: StoreEffects) => Promise<T>
    ): Promise<T> {
        const names = lockNames(scope, keys);
        const release = await this.lock.acquire([...names.keys()]).catch((error: unknown) => {
            throw error instanceof ConcurrencyConflictError && error.resourceId !== undefined
                ? new ConcurrencyConflictError(error.message, {resourceId: names.get(error.resourceId)})
                : error;
        });
        try {
            const staged = new StagedTables(this.tables);
            const result = await work(repositories(staged, this.generateId));
            staged.commit();
            return result;
        } finally {
            release();
        }
    }
}

/** Lock name to the id of the record it guards. */
function lockNames(scope: MerchantScope, keys: LockKeys): Map<string, string> {
    const names = new Map<string, string>();
    (keys.stockItemIds ?? []).forEach(id => names.set(`${scope.merchantId}:stock:${id}`, id));
    if (keys.transactionId !== undefined) {
        names.set(`${scope.merchantId}:transaction:${keys.transactionId}`, keys.transactionId);
    }
    return names;
}

// ============================================================================
// Combined
// ============================================================================

export class InMemoryEffects implements AppEffects {
    readonly stockItems: StockItemRepository;
    readonly transactions: TransactionRepository;
    readonly units: UnitOfWork;
    readonly clock: Clock;

    constructor(options: InMemoryEffectsOptions = {}) {
        const tables = new MemoryTables();
        const generateId = options.generateId ?? randomUUID;
        const store = repositories(tables, generateId);
        this.stockItems = store.stockItems;
        this.transactions = store.transactions;
        this.units = new InMemoryUnitOfWork(tables, new KeyedLock(options.lockTimeoutMs), generateId);
        this.clock = options.clock ?? {now: () => new Date()};
    }
}
