import { abortReason, sleep } from '../utils/async.js';

export interface RateLimiterOptions {
    now?: () => number;
}

/**
 * Paces a stream of calls to at most `ratePerSecond` permits per second.
 *
 * Callers queue in FIFO order behind a promise chain, so only one of them
 * moves the next-permit marker at a time. A cancelled waiter rejects without
 * holding up the ones behind it.
 */
export class RateLimiter {
    #intervalMs = 0;
    #nextPermitAt = 0;
    #tail: Promise<void> = Promise.resolve();
    readonly #now: () => number;

    constructor(ratePerSecond: number, options: RateLimiterOptions = {}) {
        this.#now = options.now ?? (() => Date.now());
        this.setRate(ratePerSecond);
    }

    get intervalMs(): number {
        return this.#intervalMs;
    }

    /** Applies from the next {@link wait}; the previous permit time is kept. */
    setRate(ratePerSecond: number): void {
        this.#intervalMs = Number.isFinite(ratePerSecond) && ratePerSecond > 0 ? 1000 / ratePerSecond : 0;
    }

    wait(signal?: AbortSignal): Promise<void> {
        const turn = this.#tail.then(() => this.#acquire(signal));
        this.#tail = turn.catch(() => undefined);
        return turn;
    }

    async #acquire(signal: AbortSignal | undefined): Promise<void> {
        if (signal?.aborted) {
            throw abortReason(signal);
        }
        if (this.#intervalMs <= 0) {
            return;
        }

        const now = this.#now();
        if (now < this.#nextPermitAt) {
            await sleep(this.#nextPermitAt - now, signal);
        }
        this.#nextPermitAt = this.#now() + this.#intervalMs;
    }
}
