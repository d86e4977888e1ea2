import {Either, Left} from 'purify-ts';
import {StockItem} from '../domain';
import {SellFailure} from './types';
import {concurrencyConflict, hasConsistentPricing} from './businessLogic';
import {ConcurrencyConflictError} from '../effects/ConcurrencyConflictError';
import {CorruptStockItemError} from '../effects/CorruptStockItemError';
import {EffectsError, toError} from '../effects/EffectsError';

/**
 * Run an effectful step, rethrowing anything unexpected as an EffectsError.
 * Errors this library defines itself pass through unchanged.
 */
export async function attempt<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (
      error instanceof EffectsError
      || error instanceof ConcurrencyConflictError
      || error instanceof CorruptStockItemError
    ) {
      throw error;
    }
    throw new EffectsError([toError(error)]);
  }
}

/**
 * Like {@link attempt}, but a lock conflict becomes a Left built by
 * `onConflict`, so the caller can retry.
 */
export async function attemptLocked<L, T>(
  onConflict: (error: ConcurrencyConflictError) => L,
  run: () => Promise<Either<L, T>>
): Promise<Either<L, T>> {
  try {
    return await attempt(run);
  } catch (error) {
    if (error instanceof ConcurrencyConflictError) {
      return Left(onConflict(error));
    }
    throw error;
  }
}

/**
 * Reports a conflict on the record the storage named, or on `fallbackId`
 * when it could not say which.
 */
export const conflictOn = (fallbackId: string) =>
  (error: ConcurrencyConflictError): SellFailure =>
    concurrencyConflict(error.resourceId ?? fallbackId);

export function assertConsistentPricing(item: StockItem): StockItem {
  if (!hasConsistentPricing(item)) {
    throw new CorruptStockItemError(item);
  }
  return item;
}
