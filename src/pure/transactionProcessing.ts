/**
 * TRANSACTION PROCESSOR - The Coordinator
 *
 * Turns requested quantities of stock into transaction line items. Each
 * operation reads through the effects, hands the values to the pure logic in
 * businessLogic.ts and writes the result back.
 *
 * A sale reads, checks and writes a stock item while holding its lock (and the
 * transaction's), so two cashiers selling the last units of one item can never
 * both succeed. Business failures come back as Left values; storage failures
 * are thrown as EffectsError.
 */

import {MerchantScope, StockItem, Transaction} from '../domain';
import {AppEffects, StoreEffects} from './effects';
import {
  CheckoutLine,
  CheckoutLineFailure,
  CheckoutLineResult,
  CheckoutPolicy,
  CheckoutRejection,
  CheckoutSummary,
  Receipt,
  SalePlan,
  SaleReceipt,
  SellFailure,
  SellOutcome,
  SellRequest,
} from './types';
import {
  applyLineItem,
  checkTransactionOpen,
  creditStock,
  findShortfalls,
  isOwnedBy,
  itemNotFound,
  markCompleted,
  planSale,
  toLineItemFields,
  transactionNotFound,
  validateQuantity,
} from './businessLogic';
import {assertConsistentPricing, attempt, attemptLocked, conflictOn} from './guards';
import {EffectsError, toError} from '../effects/EffectsError';
import {Either, Just, Left, Maybe, NonEmptyList, Nothing, Right} from 'purify-ts';

// ============================================================================
// Selling
// ============================================================================

/**
 * Sell `request.quantity` units of a stock item into an open transaction.
 *
 * Checks, first failure wins: the quantity is a positive integer, the stock
 * item exists in the merchant's scope, the transaction exists there and is
 * still open, and enough stock is on hand. A failed sale changes nothing.
 *
 * @return a function running the sale against the given effects
 * @throws EffectsError when storage fails
 * @throws CorruptStockItemError when the stored item's pricing is inconsistent
 */
export function sell(
  scope: MerchantScope,
  request: SellRequest
): (effects: AppEffects) => Promise<SellOutcome> {
  return async (effects: AppEffects) =>
    validateQuantity(request.quantity).caseOf<Promise<SellOutcome>>({
      Left: failure => Promise.resolve(Left(failure)),
      Right: quantity => attemptLocked(conflictOn(request.stockItemId), () =>
        effects.units.withLocks(
          scope,
          {stockItemIds: [request.stockItemId], transactionId: request.transactionId},
          store => sellWithinLock(scope, request, quantity, store, effects.clock.now())
        )
      ),
    });
}

async function sellWithinLock(
  scope: MerchantScope,
  request: SellRequest,
  quantity: number,
  store: StoreEffects,
  at: Date
): Promise<SellOutcome> {
  const item = await store.stockItems.getById(scope, request.stockItemId);
  if (!item || !isOwnedBy(scope, item)) {
    return Left(itemNotFound(request.stockItemId));
  }

  const transaction = await store.transactions.getById(scope, request.transactionId);
  if (!transaction || !isOwnedBy(scope, transaction)) {
    return Left(transactionNotFound(request.transactionId));
  }

  return checkTransactionOpen(transaction)
    .chain(() => planSale(assertConsistentPricing(item), quantity, at))
    .caseOf<Promise<SellOutcome>>({
      Left: failure => Promise.resolve(Left(failure)),
      Right: plan => commitSale(scope, store, transaction, item, plan, at).then(receipt => Right(receipt)),
    });
}

async function commitSale(
  scope: MerchantScope,
  store: StoreEffects,
  transaction: Transaction,
  soldFrom: StockItem,
  plan: SalePlan,
  at: Date
): Promise<SaleReceipt> {
  if (plan.kind === 'depleted') {
    await store.stockItems.delete(scope, plan.stockItemId);
  } else {
    await store.stockItems.save(scope, plan.updatedItem);
  }

  const lineItem = await store.transactions.createLineItem(scope, transaction.id, toLineItemFields(plan));
  const updated = applyLineItem(transaction, lineItem, at);
  await store.transactions.save(scope, updated);

  return {
    lineItem,
    transaction: updated,
    remainingStock: plan.kind === 'depleted' ? Nothing : Just(plan.updatedItem),
    soldFrom,
  };
}

// ============================================================================
// Transaction lifecycle
// ============================================================================

export function openTransaction(
  scope: MerchantScope
): (effects: AppEffects) => Promise<Transaction> {
  return (effects: AppEffects) =>
    attempt(() => effects.transactions.create(scope, effects.clock.now()));
}

/**
 * Close a transaction to further sales.
 */
export function completeTransaction(
  scope: MerchantScope,
  transactionId: string
): (effects: AppEffects) => Promise<Either<SellFailure, Transaction>> {
  return (effects: AppEffects) =>
    attemptLocked(conflictOn(transactionId), () =>
      effects.units.withLocks(scope, {transactionId}, async (store): Promise<Either<SellFailure, Transaction>> => {
        const transaction = await store.transactions.getById(scope, transactionId);
        if (!transaction || !isOwnedBy(scope, transaction)) {
          return Left(transactionNotFound(transactionId));
        }
        return checkTransactionOpen(transaction).caseOf<Promise<Either<SellFailure, Transaction>>>({
          Left: failure => Promise.resolve(Left(failure)),
          Right: open => {
            const completed = markCompleted(open, effects.clock.now());
            return store.transactions.save(scope, completed).then(() => Right(completed));
          },
        });
      })
    );
}

/**
 * Remove a transaction and, with it, all of its line items. Stock is not
 * given back; use checkout's all-or-nothing policy for that.
 */
export function deleteTransaction(
  scope: MerchantScope,
  transactionId: string
): (effects: AppEffects) => Promise<Either<SellFailure, Transaction>> {
  return (effects: AppEffects) =>
    attemptLocked(conflictOn(transactionId), () =>
      effects.units.withLocks(scope, {transactionId}, async (store): Promise<Either<SellFailure, Transaction>> => {
        const transaction = await store.transactions.getById(scope, transactionId);
        if (!transaction || !isOwnedBy(scope, transaction)) {
          return Left(transactionNotFound(transactionId));
        }
        await store.transactions.delete(scope, transactionId);
        return Right(transaction);
      })
    );
}

/**
 * The merchant's transactions, oldest first.
 */
export function listTransactions(
  scope: MerchantScope
): (effects: AppEffects) => Promise<Transaction[]> {
  return (effects: AppEffects) =>
    attempt(async () => {
      const transactions = await effects.transactions.listByMerchant(scope);
      return transactions.filter(transaction => isOwnedBy(scope, transaction));
    });
}

export function getReceipt(
  scope: MerchantScope,
  transactionId: string
): (effects: AppEffects) => Promise<Maybe<Receipt>> {
  return (effects: AppEffects) =>
    attempt(async (): Promise<Maybe<Receipt>> => {
      const transaction = await effects.transactions.getById(scope, transactionId);
      if (!transaction || !isOwnedBy(scope, transaction)) {
        return Nothing;
      }
      const lineItems = await effects.transactions.listLineItems(scope, transactionId);
      return Just({transaction, lineItems});
    });
}

// ============================================================================
// Checkout
// ============================================================================

/**
 * Sell several lines into a new transaction and complete it.
 *
 * With the `partial` policy every line stands on its own: a failing line is
 * reported and the lines before it stay sold. With `all-or-nothing` the
 * combined demand is checked first, and if a line still fails the lines
 * already sold are given back and the transaction is deleted, in one unit of
 * work.
 *
 * @throws EffectsError when an all-or-nothing checkout could not be undone;
 *   the transaction and its sales are then left as they were
 */
export function checkout(
  scope: MerchantScope,
  lines: readonly CheckoutLine[],
  policy: CheckoutPolicy = 'partial'
): (effects: AppEffects) => Promise<Either<CheckoutRejection, CheckoutSummary>> {
  return async (effects: AppEffects) => {
    if (policy === 'all-or-nothing') {
      return checkoutAllOrNothing(scope, lines)(effects);
    }

    const transaction = await openTransaction(scope)(effects);
    const results: CheckoutLineResult[] = [];
    for (const line of lines) {
      const outcome = await sell(scope, {transactionId: transaction.id, ...line})(effects);
      results.push({line, outcome});
    }

    const completed = await finish(scope, transaction.id)(effects);
    return Right({transaction: completed, lines: results});
  };
}

function checkoutAllOrNothing(
  scope: MerchantScope,
  lines: readonly CheckoutLine[]
): (effects: AppEffects) => Promise<Either<CheckoutRejection, CheckoutSummary>> {
  return async (effects: AppEffects) => {
    const stock = await readStock(scope, lines)(effects);
    const rejection = NonEmptyList.fromArray(findShortfalls(lines, stock))
      .map((failures): CheckoutRejection => ({failures}))
      .extractNullable();
    if (rejection) {
      return Left(rejection);
    }

    const transaction = await openTransaction(scope)(effects);
    const sold: SaleReceipt[] = [];
    const results: CheckoutLineResult[] = [];

    for (const line of lines) {
      const outcome = await sell(scope, {transactionId: transaction.id, ...line})(effects);
      const failure = outcome.swap().toMaybe().extractNullable();
      if (failure) {
        await undoCheckout(scope, transaction.id, sold)(effects);
        const lineFailure: CheckoutLineFailure = {line, failure};
        return Left({failures: NonEmptyList([lineFailure])});
      }
      outcome.ifRight(receipt => sold.push(receipt));
      results.push({line, outcome});
    }

    const completed = await finish(scope, transaction.id)(effects);
    return Right({transaction: completed, lines: results});
  };
}

function readStock(
  scope: MerchantScope,
  lines: readonly CheckoutLine[]
): (effects: AppEffects) => Promise<Map<string, StockItem | null>> {
  return (effects: AppEffects) =>
    attempt(async () => {
      const ids = [...new Set(lines.map(line => line.stockItemId))];
      const items = await Promise.all(ids.map(id => effects.stockItems.getById(scope, id)));
      return new Map(ids.map((id, index) => {
        const item = items[index] ?? null;
        return [id, item && isOwnedBy(scope, item) ? item : null];
      }));
    });
}

/**
 * Give back the stock taken by `receipts`, newest first, and delete the
 * transaction, all under one set of locks.
 */
function undoCheckout(
  scope: MerchantScope,
  transactionId: string,
  receipts: readonly SaleReceipt[]
): (effects: AppEffects) => Promise<void> {
  return async (effects: AppEffects) => {
    const stockItemIds = receipts.map(receipt => receipt.soldFrom.id);
    try {
      await effects.units.withLocks(scope, {stockItemIds, transactionId}, async store => {
        for (const receipt of [...receipts].reverse()) {
          const current = await store.stockItems.getById(scope, receipt.soldFrom.id);
          await store.stockItems.save(
            scope,
            creditStock(current, receipt.soldFrom, receipt.lineItem.quantity, effects.clock.now())
          );
        }
        await store.transactions.delete(scope, transactionId);
      });
    } catch (error) {
      throw new EffectsError([
        new Error(`Checkout transaction ${transactionId} could not be undone`),
        ...(error instanceof EffectsError ? error.causes : [toError(error)]),
      ]);
    }
  };
}

function finish(
  scope: MerchantScope,
  transactionId: string
): (effects: AppEffects) => Promise<Transaction> {
  return async (effects: AppEffects) => {
    const completed = await completeTransaction(scope, transactionId)(effects);
    return completed.caseOf<Promise<Transaction>>({
      Left: failure => Promise.reject(
        new Error(`Transaction ${transactionId} could not be completed: ${failure.kind}`)
      ),
      Right: transaction => Promise.resolve(transaction),
    });
  };
}
