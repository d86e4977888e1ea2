import {ConcurrencyConflictError} from './ConcurrencyConflictError';

export type Release = () => void;

/**
 * In-process mutual exclusion per key. Waiters queue in arrival order; several
 * keys are always taken in sorted order so two holders cannot deadlock.
 * A timed-out wait throws ConcurrencyConflictError naming the key.
 *
 * Only covers a single process. Deployments with several instances need the
 * database row locks in EffectsFactory.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    constructor(private readonly timeoutMs?: number) {}

    async acquire(keys: readonly string[]): Promise<Release> {
        const ordered = [...new Set(keys)].sort();
        const held: Release[] = [];
        try {
            for (const key of ordered) {
                held.push(await this.acquireOne(key));
            }
        } catch (error) {
            releaseAll(held);
            throw error;
        }
        return () => releaseAll(held);
    }

    private async acquireOne(key: string): Promise<Release> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let release: Release = () => undefined;
        const held = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => held);
        this.tails.set(key, tail);

        if (await this.waitFor(previous)) {
            return () => {
                release();
                if (this.tails.get(key) === tail) {
                    this.tails.delete(key);
                }
            };
        }

        // Give up our place; whoever queued behind us still waits for `previous`.
        release();
        throw new ConcurrencyConflictError(
            `Timed out after ${this.timeoutMs}ms waiting for lock ${key}`,
            {resourceId: key}
        );
    }

    private async waitFor(previous: Promise<void>): Promise<boolean> {
        if (this.timeoutMs === undefined) {
            await previous;
            return true;
        }

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<boolean>(resolve => {
            timer = setTimeout(() => resolve(false), this.timeoutMs);
        });
        try {
            return await Promise.race([previous.then(() => true), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }
}

function releaseAll(held: Release[]): void {
    [...held].reverse().forEach(release => release());
}
