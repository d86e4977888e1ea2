/**
 * END-TO-END TESTS ON THE IN-MEMORY EFFECTS
 *
 * The coordinators run against real repositories and real locking, held in
 * process memory.
 */

import {Left, Nothing} from 'purify-ts';
import {MerchantScope, StockItem} from '../domain';
import {AppEffects, TransactionRepository} from '../pure/effects';
import {
  checkout,
  completeTransaction,
  deleteTransaction,
  getReceipt,
  listTransactions,
  openTransaction,
  sell,
} from '../pure/transactionProcessing';
import {listStockItems, registerStockItem, restockItem} from '../pure/stockManagement';
import {hasConsistentPricing} from '../pure/businessLogic';
import {InMemoryEffects} from '../effects/InMemoryEffects';
import {EffectsError} from '../effects/EffectsError';
import {ConcurrencyConflictError} from '../effects/ConcurrencyConflictError';
import {MERCHANT, OTHER_MERCHANT, T1, leftOf, rightOf} from './fixtures';

function sequentialIds(): () => string {
  let next = 0;
  return () => `id-${++next}`;
}

function createEffects(lockTimeoutMs?: number): InMemoryEffects {
  return new InMemoryEffects({clock: {now: () => T1}, lockTimeoutMs, generateId: sequentialIds()});
}

async function register(
  effects: AppEffects,
  quantityOnHand: number,
  productName = 'Cement',
  scope: MerchantScope = MERCHANT
): Promise<StockItem> {
  const result = await registerStockItem(scope, {
    productName,
    quantityOnHand,
    purchaseUnitPrice: '3000.00',
    profitMarginPercent: 20,
  })(effects);
  return rightOf(result);
}

async function quantityOf(effects: AppEffects, id: string): Promise<number | undefined> {
  const item = await effects.stockItems.getById(MERCHANT, id);
  return item?.quantityOnHand;
}

describe('selling', () => {
  it('decrements stock and totals the transaction', async () => {
    const effects = createEffects();
    const item = await register(effects, 100);
    const transaction = await openTransaction(MERCHANT)(effects);

    const receipt = rightOf(await sell(MERCHANT, {
      transactionId: transaction.id,
      stockItemId: item.id,
      quantity: 10,
    })(effects));

    expect(receipt.lineItem.subtotal).toBe(3600000n);
    expect(receipt.transaction.total).toBe(3600000n);
    expect(await quantityOf(effects, item.id)).toBe(90);

    const stored = await effects.stockItems.getById(MERCHANT, item.id);
    expect(stored?.purchaseTotal).toBe(27000000n);
    expect(stored?.saleTotal).toBe(32400000n);

    const saved = await effects.transactions.getById(MERCHANT, transaction.id);
    expect(saved?.total).toBe(3600000n);
    expect(saved?.lineItemCount).toBe(1);
  });

  it('leaves stock and transaction alone when stock is short', async () => {
    const effects = createEffects();
    const item = await register(effects, 5);
    const transaction = await openTransaction(MERCHANT)(effects);

    for (let attempt = 0; attempt < 3; attempt++) {
      const result = await sell(MERCHANT, {transactionId: transaction.id, stockItemId: item.id, quantity: 10})(effects);

      expect(result).toEqual(Left({kind: 'InsufficientStock', stockItemId: item.id, requested: 10, available: 5}));
      expect(await quantityOf(effects, item.id)).toBe(5);
      const receipt = await getReceipt(MERCHANT, transaction.id)(effects);
      expect(receipt.map(r => [r.transaction.total, r.transaction.lineItemCount, r.lineItems.length]).extract())
        .toEqual([0n, null, 0]);
    }
  });

  it('deletes an item once it is sold out', async () => {
    const effects = createEffects();
    const item = await register(effects, 10);
    const transaction = await openTransaction(MERCHANT)(effects);

    const receipt = rightOf(await sell(MERCHANT, {
      transactionId: transaction.id,
      stockItemId: item.id,
      quantity: 10,
    })(effects));

    expect(receipt.remainingStock).toEqual(Nothing);
    expect(await effects.stockItems.getById(MERCHANT, item.id)).toBeNull();
    expect(receipt.transaction.total).toBe(3600000n);
  });

  it('refuses the second of two sales that together exceed stock', async () => {
    const effects = createEffects();
    const item = await register(effects, 15);
    const first = await openTransaction(MERCHANT)(effects);
    const second = await openTransaction(MERCHANT)(effects);

    const firstResult = await sell(MERCHANT, {transactionId: first.id, stockItemId: item.id, quantity: 10})(effects);
    const secondResult = await sell(MERCHANT, {transactionId: second.id, stockItemId: item.id, quantity: 10})(effects);

    expect(firstResult.isRight()).toBe(true);
    expect(secondResult).toEqual(Left({kind: 'InsufficientStock', stockItemId: item.id, requested: 10, available: 5}));
    expect(await quantityOf(effects, item.id)).toBe(5);
  });

  it('lets only one of two concurrent sales of the last units through', async () => {
    const effects = createEffects();
    const item = await register(effects, 15);
    const first = await openTransaction(MERCHANT)(effects);
    const second = await openTransaction(MERCHANT)(effects);

    const results = await Promise.all([
      sell(MERCHANT, {transactionId: first.id, stockItemId: item.id, quantity: 10})(effects),
      sell(MERCHANT, {transactionId: second.id, stockItemId: item.id, quantity: 10})(effects),
    ]);

    expect(results.filter(result => result.isRight())).toHaveLength(1);
    expect(results.filter(result => result.isLeft())).toHaveLength(1);
    expect(await quantityOf(effects, item.id)).toBe(5);
  });

  it('never oversells under many concurrent single-unit sales', async () => {
    const effects = createEffects();
    const item = await register(effects, 10);
    const transaction = await openTransaction(MERCHANT)(effects);

    const results = await Promise.all(
      Array.from({length: 12}, () =>
        sell(MERCHANT, {transactionId: transaction.id, stockItemId: item.id, quantity: 1})(effects))
    );

    expect(results.filter(result => result.isRight())).toHaveLength(10);
    expect(results.filter(result => result.isLeft()).map(result => leftOf(result).kind))
      .toEqual(['ItemNotFound', 'ItemNotFound']);
    expect(await effects.stockItems.getById(MERCHANT, item.id)).toBeNull();

    const saved = await effects.transactions.getById(MERCHANT, transaction.id);
    expect(saved?.total).toBe(3600000n);
    expect(saved?.lineItemCount).toBe(10);
  });

  it('refuses to sell into a completed transaction', async () => {
    const effects = createEffects();
    const item = await register(effects, 10);
    const transaction = await openTransaction(MERCHANT)(effects);
    await completeTransaction(MERCHANT, transaction.id)(effects);

    const result = await sell(MERCHANT, {transactionId: transaction.id, stockItemId: item.id, quantity: 1})(effects);

    expect(result).toEqual(Left({kind: 'TransactionClosed', transactionId: transaction.id}));
    expect(await completeTransaction(MERCHANT, transaction.id)(effects))
      .toEqual(Left({kind: 'TransactionClosed', transactionId: transaction.id}));
    expect(await quantityOf(effects, item.id)).toBe(10);
  });
});

describe('merchant isolation', () => {
  it('hides one merchant\'s stock from another', async () => {
    const effects = createEffects();
    const item = await register(effects, 10);
    const foreignTransaction = await openTransaction(OTHER_MERCHANT)(effects);

    const result = await sell(OTHER_MERCHANT, {
      transactionId: foreignTransaction.id,
      stockItemId: item.id,
      quantity: 1,
    })(effects);

    expect(result).toEqual(Left({kind: 'ItemNotFound', stockItemId: item.id}));
    expect(await listStockItems(OTHER_MERCHANT)(effects)).toEqual([]);
    expect(await quantityOf(effects, item.id)).toBe(10);
  });

  it('hides one merchant\'s transactions from another', async () => {
    const effects = createEffects();
    const item = await register(effects, 10);
    const foreignTransaction = await openTransaction(OTHER_MERCHANT)(effects);

    const result = await sell(MERCHANT, {
      transactionId: foreignTransaction.id,
      stockItemId: item.id,
      quantity: 1,
    })(effects);

    expect(result).toEqual(Left({kind: 'TransactionNotFound', transactionId: foreignTransaction.id}));
    expect(await getReceipt(MERCHANT, foreignTransaction.id)(effects)).toEqual(Nothing);
  });

  it('lists one merchant\'s transactions oldest first', async () => {
    const effects = createEffects();
    const first = await openTransaction(MERCHANT)(effects);
    await openTransaction(OTHER_MERCHANT)(effects);
    const second = await openTransaction(MERCHANT)(effects);

    expect((await listTransactions(MERCHANT)(effects)).map(transaction => transaction.id))
      .toEqual([first.id, second.id]);
    expect(await listTransactions({merchantId: 'merchant-3'})(effects)).toEqual([]);
  });

  it('refuses to write a record into another merchant\'s scope', async () => {
    const effects = createEffects();
    const item = await register(effects, 10);

    await expect(effects.stockItems.save(OTHER_MERCHANT, item)).rejects.toThrow('belongs to another merchant');
  });
});

describe('units of work', () => {
  it('reports a ConcurrencyConflict when the item stays locked past the timeout', async () => {
    const effects = createEffects(20);
    const item = await register(effects, 10);
    const transaction = await openTransaction(MERCHANT)(effects);

    let releaseHolder: () => void = () => undefined;
    const holding = effects.units.withLocks(MERCHANT, {stockItemIds: [item.id]}, () =>
      new Promise<void>(resolve => {
        releaseHolder = resolve;
      })
    );

    const blocked = await sell(MERCHANT, {transactionId: transaction.id, stockItemId: item.id, quantity: 1})(effects);
    releaseHolder();
    await holding;

    expect(blocked).toEqual(Left({kind: 'ConcurrencyConflict', resourceId: item.id}));
    expect(await quantityOf(effects, item.id)).toBe(10);

    const retried = await sell(MERCHANT, {transactionId: transaction.id, stockItemId: item.id, quantity: 1})(effects);
    expect(retried.isRight()).toBe(true);
    expect(await quantityOf(effects, item.id)).toBe(9);
  });

  it('names the transaction when its lock is the one held', async () => {
    const effects = createEffects(20);
    const item = await register(effects, 10);
    const transaction = await openTransaction(MERCHANT)(effects);

    let releaseHolder: () => void = () => undefined;
    const holding = effects.units.withLocks(MERCHANT, {transactionId: transaction.id}, () =>
      new Promise<void>(resolve => {
        releaseHolder = resolve;
      })
    );

    const blocked = await sell(MERCHANT, {transactionId: transaction.id, stockItemId: item.id, quantity: 1})(effects);
    releaseHolder();
    await holding;

    expect(blocked).toEqual(Left({kind: 'ConcurrencyConflict', resourceId: transaction.id}));
    expect(await quantityOf(effects, item.id)).toBe(10);
  });

  it('reports a restock blocked by a held item lock as a failure', async () => {
    const effects = createEffects(20);
    const item = await register(effects, 10);

    let releaseHolder: () => void = () => undefined;
    const holding = effects.units.withLocks(MERCHANT, {stockItemIds: [item.id]}, () =>
      new Promise<void>(resolve => {
        releaseHolder = resolve;
      })
    );

    const blocked = await restockItem(MERCHANT, item.id, {addQuantity: 5})(effects);
    releaseHolder();
    await holding;

    expect(blocked).toEqual(Left(['Stock item id-1 is being changed by another operation, try again']));
    expect(await quantityOf(effects, item.id)).toBe(10);
  });

  it('discards the writes of a unit that throws', async () => {
    const effects = createEffects();
    const item = await register(effects, 100);

    await expect(effects.units.withLocks(MERCHANT, {stockItemIds: [item.id]}, async store => {
      await store.stockItems.save(MERCHANT, {...item, quantityOnHand: 1});
      throw new Error('write failed');
    })).rejects.toThrow('write failed');

    expect(await quantityOf(effects, item.id)).toBe(100);
  });

  it('removes line items with their transaction', async () => {
    const effects = createEffects();
    const item = await register(effects, 10);
    const transaction = await openTransaction(MERCHANT)(effects);
    await sell(MERCHANT, {transactionId: transaction.id, stockItemId: item.id, quantity: 2})(effects);

    const deleted = await deleteTransaction(MERCHANT, transaction.id)(effects);

    expect(deleted.map(t => t.total).extract()).toBe(720000n);
    expect(await effects.transactions.listLineItems(MERCHANT, transaction.id)).toEqual([]);
    expect(await getReceipt(MERCHANT, transaction.id)(effects)).toEqual(Nothing);
    expect(await quantityOf(effects, item.id)).toBe(8);
  });
});

describe('checkout', () => {
  it('sells every line it can under the partial policy', async () => {
    const effects = createEffects();
    const cement = await register(effects, 5, 'Cement');
    const sand = await register(effects, 2, 'Sand');

    const summary = rightOf(await checkout(MERCHANT, [
      {stockItemId: cement.id, quantity: 3},
      {stockItemId: sand.id, quantity: 5},
      {stockItemId: cement.id, quantity: 2},
    ])(effects));

    expect(summary.lines.map(line => line.outcome.isRight())).toEqual([true, false, true]);
    expect(summary.lines[1]?.outcome).toEqual(
      Left({kind: 'InsufficientStock', stockItemId: sand.id, requested: 5, available: 2})
    );
    expect(summary.transaction.status).toBe('completed');
    expect(summary.transaction.total).toBe(1800000n);
    expect(summary.transaction.lineItemCount).toBe(2);
    expect(await effects.stockItems.getById(MERCHANT, cement.id)).toBeNull();
    expect(await quantityOf(effects, sand.id)).toBe(2);
  });

  it('completes an all-or-nothing checkout that fits the stock', async () => {
    const effects = createEffects();
    const cement = await register(effects, 5, 'Cement');
    const sand = await register(effects, 2, 'Sand');

    const summary = rightOf(await checkout(MERCHANT, [
      {stockItemId: cement.id, quantity: 3},
      {stockItemId: sand.id, quantity: 2},
    ], 'all-or-nothing')(effects));

    expect(summary.transaction.status).toBe('completed');
    expect(summary.transaction.total).toBe(1800000n);
    expect(await quantityOf(effects, cement.id)).toBe(2);
    expect(await effects.stockItems.getById(MERCHANT, sand.id)).toBeNull();
  });

  it('rejects an all-or-nothing checkout before selling anything', async () => {
    const effects = createEffects();
    const cement = await register(effects, 5, 'Cement');
    const sand = await register(effects, 2, 'Sand');

    const rejection = leftOf(await checkout(MERCHANT, [
      {stockItemId: cement.id, quantity: 3},
      {stockItemId: sand.id, quantity: 5},
    ], 'all-or-nothing')(effects));

    expect(rejection.failures).toEqual([{
      line: {stockItemId: sand.id, quantity: 5},
      failure: {kind: 'InsufficientStock', stockItemId: sand.id, requested: 5, available: 2},
    }]);
    expect(await quantityOf(effects, cement.id)).toBe(5);
    // ids 1 and 2 went to the stock items; no transaction was opened
    expect(await effects.transactions.getById(MERCHANT, 'id-3')).toBeNull();
  });

  describe('when stock changes after the pre-check', () => {
    /** Effects whose plain reads report `staleId` with plenty of stock; units see the truth. */
    function withStaleRead(memory: InMemoryEffects, staleId: string): AppEffects {
      return {
        stockItems: {
          getById: async (scope, id) => {
            const item = await memory.stockItems.getById(scope, id);
            return item && id === staleId ? {...item, quantityOnHand: 50} : item;
          },
          listByMerchant: scope => memory.stockItems.listByMerchant(scope),
          insert: (scope, item) => memory.stockItems.insert(scope, item),
          save: (scope, item) => memory.stockItems.save(scope, item),
          delete: (scope, id) => memory.stockItems.delete(scope, id),
        },
        transactions: memory.transactions,
        units: memory.units,
        clock: memory.clock,
      };
    }

    it('gives back the stock already sold and deletes the transaction', async () => {
      const memory = createEffects();
      const cement = await register(memory, 5, 'Cement');
      const sand = await register(memory, 2, 'Sand');

      const rejection = leftOf(await checkout(MERCHANT, [
        {stockItemId: cement.id, quantity: 3},
        {stockItemId: sand.id, quantity: 5},
      ], 'all-or-nothing')(withStaleRead(memory, sand.id)));

      expect(rejection.failures).toEqual([{
        line: {stockItemId: sand.id, quantity: 5},
        failure: {kind: 'InsufficientStock', stockItemId: sand.id, requested: 5, available: 2},
      }]);
      const restored = await memory.stockItems.getById(MERCHANT, cement.id);
      expect(restored?.quantityOnHand).toBe(5);
      expect(restored && hasConsistentPricing(restored)).toBe(true);
      expect(await quantityOf(memory, sand.id)).toBe(2);
      // id-3 is the checkout's transaction, id-4 its only line item
      expect(await memory.transactions.getById(MERCHANT, 'id-3')).toBeNull();
    });

    /** Repositories that fail on deleting a transaction and otherwise delegate. */
    function failingDelete(repository: TransactionRepository): TransactionRepository {
      return {
        create: (scope, createdAt) => repository.create(scope, createdAt),
        getById: (scope, id) => repository.getById(scope, id),
        listByMerchant: scope => repository.listByMerchant(scope),
        save: (scope, transaction) => repository.save(scope, transaction),
        delete: () => Promise.reject(new Error('disk full')),
        createLineItem: (scope, transactionId, fields) => repository.createLineItem(scope, transactionId, fields),
        listLineItems: (scope, transactionId) => repository.listLineItems(scope, transactionId),
      };
    }

    // units 1 and 2 sell the two lines, unit 3 undoes the checkout
    it('throws and keeps the recorded sale when the undo cannot take its locks', async () => {
      const memory = createEffects();
      const cement = await register(memory, 5, 'Cement');
      const sand = await register(memory, 2, 'Sand');
      let units = 0;
      const effects: AppEffects = {
        ...withStaleRead(memory, sand.id),
        units: {
          withLocks: (scope, keys, work) => ++units === 3
            ? Promise.reject(new ConcurrencyConflictError('lock timeout', {resourceId: cement.id}))
            : memory.units.withLocks(scope, keys, work),
        },
      };

      const result = checkout(MERCHANT, [
        {stockItemId: cement.id, quantity: 3},
        {stockItemId: sand.id, quantity: 5},
      ], 'all-or-nothing')(effects);

      await expect(result).rejects.toThrow(EffectsError);
      await expect(result).rejects.toThrow('Checkout transaction id-3 could not be undone; lock timeout');
      expect(await quantityOf(memory, cement.id)).toBe(2);
      const kept = await memory.transactions.getById(MERCHANT, 'id-3');
      expect(kept?.total).toBe(1080000n);
      expect(kept?.lineItemCount).toBe(1);
      expect(await memory.transactions.listLineItems(MERCHANT, 'id-3')).toHaveLength(1);
    });

    it('discards the credited stock when the transaction cannot be deleted', async () => {
      const memory = createEffects();
      const cement = await register(memory, 5, 'Cement');
      const sand = await register(memory, 2, 'Sand');
      let units = 0;
      const effects: AppEffects = {
        ...withStaleRead(memory, sand.id),
        units: {
          withLocks: (scope, keys, work) => ++units === 3
            ? memory.units.withLocks(scope, keys, store =>
              work({stockItems: store.stockItems, transactions: failingDelete(store.transactions)}))
            : memory.units.withLocks(scope, keys, work),
        },
      };

      await expect(checkout(MERCHANT, [
        {stockItemId: cement.id, quantity: 3},
        {stockItemId: sand.id, quantity: 5},
      ], 'all-or-nothing')(effects)).rejects.toThrow('Checkout transaction id-3 could not be undone; disk full');

      expect(await quantityOf(memory, cement.id)).toBe(2);
      expect((await memory.transactions.getById(MERCHANT, 'id-3'))?.total).toBe(1080000n);
    });

    it('brings back an item the checkout sold out', async () => {
      const memory = createEffects();
      const cement = await register(memory, 5, 'Cement');
      const sand = await register(memory, 2, 'Sand');

      const result = await checkout(MERCHANT, [
        {stockItemId: sand.id, quantity: 2},
        {stockItemId: cement.id, quantity: 9},
      ], 'all-or-nothing')(withStaleRead(memory, cement.id));

      expect(result.isLeft()).toBe(true);
      const restored = await memory.stockItems.getById(MERCHANT, sand.id);
      expect(restored?.id).toBe(sand.id);
      expect(restored?.quantityOnHand).toBe(2);
      expect(restored?.saleTotal).toBe(sand.saleTotal);
      expect(await quantityOf(memory, cement.id)).toBe(5);
    });
  });
});

describe('stock management', () => {
  it('restocks and reprices an item', async () => {
    const effects = createEffects();
    const item = await register(effects, 100);

    const restocked = rightOf(await restockItem(MERCHANT, item.id, {addQuantity: 10, profitMarginPercent: 10})(effects));

    expect(restocked.quantityOnHand).toBe(110);
    expect(restocked.saleUnitPrice).toBe(330000n);
    expect(restocked.saleTotal).toBe(36300000n);
    expect(await quantityOf(effects, item.id)).toBe(110);
  });

  it('lists only the merchant\'s own items', async () => {
    const effects = createEffects();
    const own = await register(effects, 1, 'Cement');
    await register(effects, 1, 'Sand', OTHER_MERCHANT);

    expect((await listStockItems(MERCHANT)(effects)).map(item => item.id)).toEqual([own.id]);
  });
});
