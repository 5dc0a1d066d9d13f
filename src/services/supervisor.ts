import { abortReason, isAbortError, sleep } from '../utils/async.js';
import { describeError, logThought } from '../utils/logger.js';

export const DEFAULT_SUPERVISOR_RETRY_MS = 5000;

export interface SuperviseOptions {
    signal: AbortSignal;
    retryDelayMs?: number;
}

export type SupervisedLoop = (signal: AbortSignal) => Promise<void>;

/**
 * Keeps a long-running loop alive.
 *
 * Failures and unexpected returns are logged and the loop is restarted after
 * a fixed delay. Cancellation is re-thrown as-is and ends supervision.
 */
export async function supervise(
    name: string,
    loop: SupervisedLoop,
    options: SuperviseOptions,
): Promise<never> {
    const { signal } = options;
    const retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_SUPERVISOR_RETRY_MS);

    for (;;) {
        if (signal.aborted) {
            void logThought(`[Supervisor] Task '${name}' stopped.`);
            throw abortReason(signal);
        }

        try {
            await loop(signal);
            void logThought(
                `[Supervisor] Task '${name}' returned unexpectedly; restarting in ${retryDelayMs}ms.`,
                'warn',
            );
        } catch (err) {
            if (isAbortError(err, signal)) {
                void logThought(`[Supervisor] Task '${name}' stopped.`);
                throw err;
            }
            void logThought(
                `[Supervisor] Task '${name}' failed: ${describeError(err)}. Restarting in ${retryDelayMs}ms.`,
                'error',
            );
        }

        await sleep(retryDelayMs, signal);
    }
}
