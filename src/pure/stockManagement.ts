/**
 * Stock registration and restocking. Raw inputs are decoded, the derived
 * pricing is computed by `recompute` and the result is stored.
 */

import {MerchantScope, StockItem} from '../domain';
import {AppEffects} from './effects';
import {StockAdjustment} from './types';
import {applyStockAdjustment, isOwnedBy, newStockItem} from './businessLogic';
import {decodeStockAdjustment, decodeStockRegistration} from './codecs';
import {assertConsistentPricing, attempt, attemptLocked} from './guards';
import {Either, Left, NonEmptyList, Right} from 'purify-ts';

type StockResult = Either<NonEmptyList<string>, StockItem>;

/**
 * Register a new stock item for the merchant.
 * @param input untrusted registration fields, see `StockRegistrationInput`
 * @return either the validation errors or the stored item
 */
export function registerStockItem(
  scope: MerchantScope,
  input: unknown
): (effects: AppEffects) => Promise<StockResult> {
  return (effects: AppEffects) =>
    decodeStockRegistration(input).caseOf<Promise<StockResult>>({
      Left: errors => Promise.resolve(Left(errors)),
      Right: registration =>
        attempt(() => effects.stockItems.insert(scope, newStockItem(scope, registration, effects.clock.now())))
          .then(item => Right(item)),
    });
}

/**
 * Add units to a stock item and/or change its purchase price or margin.
 * Runs under the item's lock so it cannot interleave with a sale; if the lock
 * cannot be had in time the result is a Left asking the caller to retry.
 */
export function restockItem(
  scope: MerchantScope,
  stockItemId: string,
  input: unknown
): (effects: AppEffects) => Promise<StockResult> {
  return (effects: AppEffects) =>
    decodeStockAdjustment(input).caseOf<Promise<StockResult>>({
      Left: errors => Promise.resolve(Left(errors)),
      Right: adjustment => adjustStock(scope, stockItemId, adjustment)(effects),
    });
}

function adjustStock(
  scope: MerchantScope,
  stockItemId: string,
  adjustment: StockAdjustment
): (effects: AppEffects) => Promise<StockResult> {
  return (effects: AppEffects) =>
    attemptLocked(busy(stockItemId), () =>
      effects.units.withLocks(scope, {stockItemIds: [stockItemId]}, async (store): Promise<StockResult> => {
        const item = await store.stockItems.getById(scope, stockItemId);
        if (!item || !isOwnedBy(scope, item)) {
          return Left(NonEmptyList([`Stock item ${stockItemId} not found`]));
        }
        const updated = applyStockAdjustment(assertConsistentPricing(item), adjustment, effects.clock.now());
        await store.stockItems.save(scope, updated);
        return Right(updated);
      })
    );
}

const busy = (stockItemId: string) => (): NonEmptyList<string> =>
  NonEmptyList([`Stock item ${stockItemId} is being changed by another operation, try again`]);

export function listStockItems(
  scope: MerchantScope
): (effects: AppEffects) => Promise<StockItem[]> {
  return (effects: AppEffects) =>
    attempt(async () => {
      const items = await effects.stockItems.listByMerchant(scope);
      return items.filter(item => isOwnedBy(scope, item));
    });
}
