interface LockEntry {
    waiters: (() => void)[];
}

export type ReleaseFn = () => void;

/**
 * Lazily created exclusive lock per key (one per source channel).
 *
 * The registry is consulted and updated in a single synchronous step, so
 * registering a new key cannot race. An entry exists only while its key is
 * held, which keeps locks of removed mappings from piling up.
 */
export class KeyedMutex {
    readonly #locks: Map<string, LockEntry> = new Map();

    get size(): number {
        return this.#locks.size;
    }

    isLocked(key: string): boolean {
        return this.#locks.has(key);
    }

    acquire(key: string): Promise<ReleaseFn> {
        const existing = this.#locks.get(key);
        if (!existing) {
            const entry: LockEntry = { waiters: [] };
            this.#locks.set(key, entry);
            return Promise.resolve(this.#releaser(key, entry));
        }

        return new Promise((resolve) => {
            existing.waiters.push(() => resolve(this.#releaser(key, existing)));
        });
    }

    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const release = await this.acquire(key);
        try {
            return await fn();
        } finally {
            release();
        }
    }

    #releaser(key: string, entry: LockEntry): ReleaseFn {
        let released = false;
        return () => {
            if (released) return;
            released = true;

            const next = entry.waiters.shift();
            if (next) {
                next();
            } else {
                this.#locks.delete(key);
            }
        };
    }
}
