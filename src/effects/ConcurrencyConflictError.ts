export type ConcurrencyConflictDetails = {
    /** SQLSTATE reported by the database, if any. */
    readonly code?: string;
    /** The stock item or transaction whose lock could not be taken, when known. */
    readonly resourceId?: string;
};

/**
 * The storage layer gave up on a unit of work because another one held or
 * contended for the same rows. Nothing from the unit was committed.
 */
export class ConcurrencyConflictError extends Error {
    readonly code?: string;
    readonly resourceId?: string;

    constructor(message: string, details: ConcurrencyConflictDetails = {}) {
        super(message);
        this.name = 'ConcurrencyConflictError';
        this.code = details.code;
        this.resourceId = details.resourceId;
    }
}
