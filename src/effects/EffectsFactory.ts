/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * PostgreSQL-backed repositories and unit of work. The tables are described
 * in sql/schema.sql.
 *
 * A unit of work is one database transaction that first takes
 * `SELECT ... FOR UPDATE` row locks on the stock items it names, in id order,
 * and then on its transaction. Serialization failures, deadlocks and lock
 * timeouts surface as ConcurrencyConflictError; a lock timeout names the row.
 */
import {
  LineItemFields,
  MerchantScope,
  Money,
  NewStockItem,
  StockItem,
  Transaction,
  TransactionLineItem,
  TransactionStatus,
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
import {ProductionConfig} from './types';
import {formatMoney, parseMoney} from '../pure/money';
import {ConcurrencyConflictError} from './ConcurrencyConflictError';
import {toError} from './EffectsError';
import {DatabaseError, Pool, PoolClient} from 'pg';

// ============================================================================
// Configuration
// ============================================================================

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ProductionConfig {
  return {
    database: {
      host: env.DATABASE_HOST || 'localhost',
      port: parseInt(env.DATABASE_PORT || '5432', 10),
      user: env.DATABASE_USER || 'appuser',
      password: env.DATABASE_PASSWORD || 'apppassword',
      database: env.DATABASE_NAME || 'posdb',
      poolSize: parseInt(env.DATABASE_POOL_SIZE || '20', 10),
    },
    locking: {
      timeoutMs: parseInt(env.STOCK_LOCK_TIMEOUT_MS || '5000', 10),
    },
  };
}

// ============================================================================
// Row mapping
// ============================================================================

export type StockItemRow = {
  id: string;
  merchant_id: string;
  product_name: string;
  quantity_on_hand: number;
  unit_size: number;
  purchase_unit_price: string;
  profit_margin_percent: number;
  purchase_total: string;
  sale_unit_price: string;
  sale_total: string;
  created_at: Date;
  updated_at: Date;
};

export type TransactionRow = {
  id: string;
  merchant_id: string;
  line_item_count: number | null;
  total: string;
  status: string;
  created_at: Date;
  updated_at: Date;
};

export type LineItemRow = {
  id: string;
  transaction_id: string;
  product_name: string;
  quantity: number;
  subtotal: string;
};

function moneyColumn(value: string, column: string): Money {
  return parseMoney(value).caseOf({
    Left: error => {
      throw new Error(`Column ${column}: ${error}`);
    },
    Right: amount => amount,
  });
}

function statusColumn(value: string): TransactionStatus {
  if (value === 'open' || value === 'completed') {
    return value;
  }
  throw new Error(`Column status: unknown transaction status "${value}"`);
}

export function rowToStockItem(row: StockItemRow): StockItem {
  return {
    id: row.id,
    merchantId: row.merchant_id,
    productName: row.product_name,
    quantityOnHand: row.quantity_on_hand,
    unitSize: row.unit_size,
    purchaseUnitPrice: moneyColumn(row.purchase_unit_price, 'purchase_unit_price'),
    profitMarginPercent: row.profit_margin_percent,
    purchaseTotal: moneyColumn(row.purchase_total, 'purchase_total'),
    saleUnitPrice: moneyColumn(row.sale_unit_price, 'sale_unit_price'),
    saleTotal: moneyColumn(row.sale_total, 'sale_total'),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function rowToTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    merchantId: row.merchant_id,
    lineItemCount: row.line_item_count,
    total: moneyColumn(row.total, 'total'),
    status: statusColumn(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function rowToLineItem(row: LineItemRow): TransactionLineItem {
  return {
    id: row.id,
    transactionId: row.transaction_id,
    productName: row.product_name,
    quantity: row.quantity,
    subtotal: moneyColumn(row.subtotal, 'subtotal'),
  };
}

// serialization_failure, deadlock_detected, lock_not_available
const CONFLICT_CODES = new Set(['40001', '40P01', '55P03']);

/**
 * @param resourceId the record being locked when the error was raised, if known
 */
export function translateDatabaseError(error: unknown, resourceId?: string): Error {
  if (error instanceof DatabaseError && error.code !== undefined && CONFLICT_CODES.has(error.code)) {
    return new ConcurrencyConflictError(error.message, {code: error.code, resourceId});
  }
  return toError(error);
}

// ============================================================================
// Sessions
// ============================================================================

type Session = <T>(run: (client: PoolClient) => Promise<T>) => Promise<T>;

function pooledSession(pool: Pool): Session {
  return async run => {
    const client = await pool.connect();
    try {
      return await run(client);
    } finally {
      client.release();
    }
  };
}

function boundSession(client: PoolClient): Session {
  return run => run(client);
}

// ============================================================================
// PostgreSQL Stock Item Repository
// ============================================================================

const STOCK_COLUMNS = `id, merchant_id, product_name, quantity_on_hand, unit_size, purchase_unit_price,
  profit_margin_percent, purchase_total, sale_unit_price, sale_total, created_at, updated_at`;

function stockValues(item: NewStockItem): unknown[] {
  return [
    item.merchantId,
    item.productName,
    item.quantityOnHand,
    item.unitSize,
    formatMoney(item.purchaseUnitPrice),
    item.profitMarginPercent,
    formatMoney(item.purchaseTotal),
    formatMoney(item.saleUnitPrice),
    formatMoney(item.saleTotal),
    item.createdAt,
    item.updatedAt,
  ];
}

class PostgresStockItemRepository implements StockItemRepository {
  constructor(private session: Session) {}

  async getById(scope: MerchantScope, id: string): Promise<StockItem | null> {
    return this.session(async client => {
      const result = await client.query<StockItemRow>(
        `SELECT ${STOCK_COLUMNS} FROM stock_items WHERE id = $1 AND merchant_id = $2`,
        [id, scope.merchantId]
      );
      const row = result.rows[0];
      return row ? rowToStockItem(row) : null;
    });
  }

  async listByMerchant(scope: MerchantScope): Promise<StockItem[]> {
    return this.session(async client => {
      const result = await client.query<StockItemRow>(
        `SELECT ${STOCK_COLUMNS} FROM stock_items WHERE merchant_id = $1 ORDER BY created_at, id`,
        [scope.merchantId]
      );
      return result.rows.map(rowToStockItem);
    });
  }

  async insert(scope: MerchantScope, item: NewStockItem): Promise<StockItem> {
    if (item.merchantId !== scope.merchantId) {
      throw new Error('Stock item belongs to another merchant');
    }
    return this.session(async client => {
      const result = await client.query<StockItemRow>(
        `INSERT INTO stock_items (merchant_id, product_name, quantity_on_hand, unit_size, purchase_unit_price,
           profit_margin_percent, purchase_total, sale_unit_price, sale_total, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         RETURNING ${STOCK_COLUMNS}`,
        stockValues(item)
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('Insert into stock_items returned no row');
      }
      return rowToStockItem(row);
    });
  }

  async save(scope: MerchantScope, item: StockItem): Promise<void> {
    if (item.merchantId !== scope.merchantId) {
      throw new Error(`Stock item ${item.id} belongs to another merchant`);
    }
    await this.session(async client => {
      const result = await client.query(
        `INSERT INTO stock_items (merchant_id, product_name, quantity_on_hand, unit_size, purchase_unit_price,
           profit_margin_percent, purchase_total, sale_unit_price, sale_total, created_at, updated_at, id)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         ON CONFLICT (id) DO UPDATE SET
           product_name = EXCLUDED.product_name,
           quantity_on_hand = EXCLUDED.quantity_on_hand,
           unit_size = EXCLUDED.unit_size,
           purchase_unit_price = EXCLUDED.purchase_unit_price,
           profit_margin_percent = EXCLUDED.profit_margin_percent,
           purchase_total = EXCLUDED.purchase_total,
           sale_unit_price = EXCLUDED.sale_unit_price,
           sale_total = EXCLUDED.sale_total,
           updated_at = EXCLUDED.updated_at
         WHERE stock_items.merchant_id = EXCLUDED.merchant_id`,
        [...stockValues(item), item.id]
      );
      if (result.rowCount === 0) {
        throw new Error(`Stock item ${item.id} belongs to another merchant`);
      }
    });
  }

  async delete(scope: MerchantScope, id: string): Promise<void> {
    await this.session(client =>
      client.query('DELETE FROM stock_items WHERE id = $1 AND merchant_id = $2', [id, scope.merchantId])
    );
  }
}

// ============================================================================
// PostgreSQL Transaction Repository
// ============================================================================

const TRANSACTION_COLUMNS = 'id, merchant_id, line_item_count, total, status, created_at, updated_at';

class PostgresTransactionRepository implements TransactionRepository {
  constructor(private session: Session) {}

  async create(scope: MerchantScope, createdAt: Date): Promise<Transaction> {
    return this.session(async client => {
      const result = await client.query<TransactionRow>(
        `INSERT INTO transactions (merchant_id, created_at, updated_at) VALUES ($1, $2, $2)
         RETURNING ${TRANSACTION_COLUMNS}`,
        [scope.merchantId, createdAt]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error('Insert into transactions returned no row');
      }
      return rowToTransaction(row);
    });
  }

  async getById(scope: MerchantScope, id: string): Promise<Transaction | null> {
    return this.session(async client => {
      const result = await client.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = $1 AND merchant_id = $2`,
        [id, scope.merchantId]
      );
      const row = result.rows[0];
      return row ? rowToTransaction(row) : null;
    });
  }

  async listByMerchant(scope: MerchantScope): Promise<Transaction[]> {
    return this.session(async client => {
      const result = await client.query<TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE merchant_id = $1 ORDER BY created_at, id`,
        [scope.merchantId]
      );
      return result.rows.map(rowToTransaction);
    });
  }

  async save(scope: MerchantScope, transaction: Transaction): Promise<void> {
    await this.session(async client => {
      const result = await client.query(
        `UPDATE transactions
            SET line_item_count = $1, total = $2, status = $3, updated_at = $4
          WHERE id = $5 AND merchant_id = $6`,
        [
          transaction.lineItemCount,
          formatMoney(transaction.total),
          transaction.status,
          transaction.updatedAt,
          transaction.id,
          scope.merchantId,
        ]
      );
      if (result.rowCount === 0) {
        throw new Error(`Transaction ${transaction.id} does not exist for merchant ${scope.merchantId}`);
      }
    });
  }

  async delete(scope: MerchantScope, id: string): Promise<void> {
    // transaction_line_items rows go with it (ON DELETE CASCADE)
    await this.session(client =>
      client.query('DELETE FROM transactions WHERE id = $1 AND merchant_id = $2', [id, scope.merchantId])
    );
  }

  async createLineItem(
    scope: MerchantScope,
    transactionId: string,
    fields: LineItemFields
  ): Promise<TransactionLineItem> {
    return this.session(async client => {
      const result = await client.query<LineItemRow>(
        `INSERT INTO transaction_line_items (transaction_id, product_name, quantity, subtotal)
         SELECT id, $2, $3, $4 FROM transactions WHERE id = $1 AND merchant_id = $5
         RETURNING id, transaction_id, product_name, quantity, subtotal`,
        [transactionId, fields.productName, fields.quantity, formatMoney(fields.subtotal), scope.merchantId]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error(`Transaction ${transactionId} does not exist for merchant ${scope.merchantId}`);
      }
      return rowToLineItem(row);
    });
  }

  async listLineItems(scope: MerchantScope, transactionId: string): Promise<TransactionLineItem[]> {
    return this.session(async client => {
      const result = await client.query<LineItemRow>(
        `SELECT li.id, li.transaction_id, li.product_name, li.quantity, li.subtotal
           FROM transaction_line_items li
           JOIN transactions t ON t.id = li.transaction_id
          WHERE li.transaction_id = $1 AND t.merchant_id = $2
          ORDER BY li.seq`,
        [transactionId, scope.merchantId]
      );
      return result.rows.map(rowToLineItem);
    });
  }
}

function repositories(session: Session): StoreEffects {
  return {
    stockItems: new PostgresStockItemRepository(session),
    transactions: new PostgresTransactionRepository(session),
  };
}

// ============================================================================
// PostgreSQL Unit of Work
// ============================================================================

class PostgresUnitOfWork implements UnitOfWork {
  constructor(private pool: Pool, private lockTimeoutMs: number) {}

  async withLocks<T>(
    scope: MerchantScope,
    keys: LockKeys,
    work: (store: StoreEffects) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(`SELECT set_config('lock_timeout', $1, true)`, [`${this.lockTimeoutMs}ms`]);

      for (const id of [...new Set(keys.stockItemIds ?? [])].sort()) {
        await lockRow(client, 'SELECT id FROM stock_items WHERE id = $1 AND merchant_id = $2 FOR UPDATE', id, scope);
      }
      if (keys.transactionId !== undefined) {
        await lockRow(
          client,
          'SELECT id FROM transactions WHERE id = $1 AND merchant_id = $2 FOR UPDATE',
          keys.transactionId,
          scope
        );
      }

      const result = await work(repositories(boundSession(client)));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await rollback(client);
      throw translateDatabaseError(error);
    } finally {
      client.release();
    }
  }
}

async function lockRow(client: PoolClient, sql: string, id: string, scope: MerchantScope): Promise<void> {
  try {
    await client.query(sql, [id, scope.merchantId]);
  } catch (error) {
    throw translateDatabaseError(error, id);
  }
}

async function rollback(client: PoolClient): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (error) {
    console.error('[UnitOfWork] Rollback failed:', error);
  }
}

// ============================================================================
// Effects Factory
// ============================================================================

const systemClock: Clock = {now: () => new Date()};

export type ProductionEffects = AppEffects & {
  close(): Promise<void>;
};

class EffectsFactory implements ProductionEffects {
  private _pool?: Pool;
  private _stockItemRepository?: StockItemRepository;
  private _transactionRepository?: TransactionRepository;
  private _unitOfWork?: UnitOfWork;

  readonly clock: Clock = systemClock;

  constructor(private config: ProductionConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: this.config.database.poolSize,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      this._pool.on('error', (err) => console.error('[Postgres] Idle client error:', err));

      // Test database connection
      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private requirePool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get stockItems(): StockItemRepository {
    if (!this._stockItemRepository) {
      this._stockItemRepository = new PostgresStockItemRepository(pooledSession(this.requirePool()));
    }
    return this._stockItemRepository;
  }

  get transactions(): TransactionRepository {
    if (!this._transactionRepository) {
      this._transactionRepository = new PostgresTransactionRepository(pooledSession(this.requirePool()));
    }
    return this._transactionRepository;
  }

  get units(): UnitOfWork {
    if (!this._unitOfWork) {
      this._unitOfWork = new PostgresUnitOfWork(this.requirePool(), this.config.locking.timeoutMs);
    }
    return this._unitOfWork;
  }

  /**
   * Open the connection pool. Must be called before using the effects.
   */
  async initialize(): Promise<void> {
    await this.getPool();
    console.log('✅ Production effects initialized');
  }

  async close(): Promise<void> {
    if (this._pool) {
      await this._pool.end();
      this._pool = undefined;
    }
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(config?: ProductionConfig): Promise<ProductionEffects> {
    const cfg = config || loadConfigFromEnv();
    const effects = new EffectsFactory(cfg);
    await effects.initialize();
    return effects;
  }
}

// Export a factory function
export async function makeAppEffects(config?: ProductionConfig): Promise<ProductionEffects> {
  return EffectsFactory.make(config);
}
