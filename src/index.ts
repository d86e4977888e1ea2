export * from './domain';
export * from './types';
export * from './pure/types';
export * from './pure/effects';
export * from './pure/money';
export {recompute, hasConsistentPricing} from './pure/businessLogic';
export {decodeStockAdjustment, decodeStockRegistration} from './pure/codecs';
export {
  checkout,
  completeTransaction,
  deleteTransaction,
  getReceipt,
  listTransactions,
  openTransaction,
  sell,
} from './pure/transactionProcessing';
export {listStockItems, registerStockItem, restockItem} from './pure/stockManagement';
export {EffectsError} from './effects/EffectsError';
export {ConcurrencyConflictError} from './effects/ConcurrencyConflictError';
export {CorruptStockItemError} from './effects/CorruptStockItemError';
export {InMemoryEffects} from './effects/InMemoryEffects';
export type {InMemoryEffectsOptions} from './effects/InMemoryEffects';
export {loadConfigFromEnv, makeAppEffects} from './effects/EffectsFactory';
export type {ProductionEffects} from './effects/EffectsFactory';
export * from './effects/types';
