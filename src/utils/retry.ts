import { isAbortError, sleep } from './async.js';
import { describeError, logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions<T> {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 1 (fixed delay) */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /**
     * Decides whether a resolved value counts as success. Rejected values are
     * retried like thrown errors. Defaults to accepting every value.
     */
    accept?: (value: T) => boolean;
    /** Aborts pending delays; cancellation is re-thrown, never retried. */
    signal?: AbortSignal;
}

/**
 * Result of a retried operation. On failure `value`/`error` describe the
 * final attempt only.
 */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 1,
    maxDelayMs: 15_000,
};

/**
 * Execute an async operation with a bounded number of attempts.
 *
 * - Stops at the first accepted value.
 * - Waits `baseDelayMs` (times `backoffFactor` per attempt, capped) between attempts.
 * - Reports the final attempt's outcome when every attempt failed.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => source.checkProxy(network),
 *   { accept: (check) => check.ok, label: 'health:proxy' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions<T> = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const accept = options.accept ?? (() => true);
    const label = options.label ?? 'unnamed';
    const signal = options.signal;

    const start = Date.now();
    let lastValue: T | undefined;
    let lastError: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        lastValue = undefined;
        lastError = undefined;

        try {
            const value = await fn();
            if (accept(value)) {
                const totalDurationMs = Date.now() - start;
                if (attempt > 1) {
                    void logThought(
                        `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                    );
                }
                return { ok: true, value, attempts: attempt, totalDurationMs };
            }
            lastValue = value;
        } catch (err) {
            if (isAbortError(err, signal)) throw err;
            lastError = describeError(err);
        }

        if (attempt < maxAttempts) {
            const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
            void logThought(
                `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed${lastError ? `: ${lastError}` : ''}. Retrying in ${delay}ms.`,
                'debug',
            );
            await sleep(delay, signal);
        } else {
            void logThought(
                `[Retry] ${label} exhausted all ${maxAttempts} attempts${lastError ? `. Last error: ${lastError}` : ''}.`,
                'debug',
            );
        }
    }

    return {
        ok: false,
        value: lastValue,
        error: lastError,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}
