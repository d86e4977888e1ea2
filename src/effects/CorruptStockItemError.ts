import {StockItem} from '../domain';

/**
 * A stored stock item whose derived pricing does not match its purchase data.
 */
export class CorruptStockItemError extends Error {
    constructor(readonly item: StockItem) {
        super(`Stock item ${item.id} has pricing fields inconsistent with its purchase data`);
        this.name = 'CorruptStockItemError';
    }
}
