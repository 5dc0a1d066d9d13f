/** Raised when a wait is cut short by an {@link AbortSignal} without a reason of its own. */
export class AbortError extends Error {
    constructor(message = 'The operation was aborted.') {
        super(message);
        this.name = 'AbortError';
    }
}

export function abortReason(signal: AbortSignal | undefined): Error {
    const reason: unknown = signal?.reason;
    return reason instanceof Error ? reason : new AbortError();
}

/** True when `err` is a cancellation rather than an ordinary failure. */
export function isAbortError(err: unknown, signal?: AbortSignal): boolean {
    if (signal?.aborted) return true;
    return err instanceof Error && err.name === 'AbortError';
}

/**
 * Cancellable sleep.
 *
 * @example
 * await sleep(1000, controller.signal);
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(abortReason(signal));
    }

    return new Promise((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(abortReason(signal));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Level-triggered, resettable flag that tasks can wait on.
 *
 * Once set, every current and future waiter is released until {@link clear}
 * is called.
 */
export class AsyncSignal {
    #set = false;
    readonly #listeners: Set<() => void> = new Set();

    get isSet(): boolean {
        return this.#set;
    }

    set(): void {
        if (this.#set) return;
        this.#set = true;
        const listeners = [...this.#listeners];
        this.#listeners.clear();
        for (const listener of listeners) {
            listener();
        }
    }

    clear(): void {
        this.#set = false;
    }

    /** Invoke `listener` once the flag is set. Returns an unsubscribe function. */
    onceSet(listener: () => void): () => void {
        if (this.#set) {
            listener();
            return () => undefined;
        }
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    /** Wait until set. Resolves `false` when `timeoutMs` elapses first. */
    waitFor(timeoutMs: number | null, signal?: AbortSignal): Promise<boolean> {
        return waitForAny([this], timeoutMs, signal);
    }
}

/**
 * Wait until any of `signals` is set (`true`) or the timeout elapses (`false`).
 * A `null` timeout waits indefinitely. Rejects when `abort` fires.
 */
export function waitForAny(
    signals: readonly AsyncSignal[],
    timeoutMs: number | null,
    abort?: AbortSignal,
): Promise<boolean> {
    if (abort?.aborted) {
        return Promise.reject(abortReason(abort));
    }
    if (signals.some((entry) => entry.isSet)) {
        return Promise.resolve(true);
    }

    return new Promise((resolve, reject) => {
        const unsubscribers: (() => void)[] = [];
        let timer: NodeJS.Timeout | null = null;
        let settled = false;

        const settle = (outcome: () => void): void => {
            if (settled) return;
            settled = true;
            for (const unsubscribe of unsubscribers) {
                unsubscribe();
            }
            if (timer) clearTimeout(timer);
            abort?.removeEventListener('abort', onAbort);
            outcome();
        };

        const onAbort = (): void => settle(() => reject(abortReason(abort)));

        for (const entry of signals) {
            unsubscribers.push(entry.onceSet(() => settle(() => resolve(true))));
        }
        if (timeoutMs !== null) {
            timer = setTimeout(() => settle(() => resolve(false)), Math.max(0, timeoutMs));
        }
        abort?.addEventListener('abort', onAbort, { once: true });
    });
}
