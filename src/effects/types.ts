// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly poolSize: number;
}

export type LockingConfig = {
    /** How long a sale waits for a stock item's row lock before giving up. */
    readonly timeoutMs: number;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly locking: LockingConfig;
}
