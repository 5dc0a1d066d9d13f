import type {
    ConfigRepository,
    FilterEngine,
    FilterEngineFactory,
    RenderFn,
    SinkFeed,
    SourceFeed,
} from '../types/ports.js';
import type {
    MappingConfig,
    MessageKind,
    MonitoringMode,
    RenderContext,
    RuntimeOptions,
    SourceMessage,
} from '../types/relay.js';
import { isAbortError, sleep } from '../utils/async.js';
import { describeError, logThought } from '../utils/logger.js';
import { compareIds, isAtOrBefore, snowflakeFromDate } from '../utils/snowflake.js';
import { buildMessageSignature } from './dedup-cache.js';
import type { DedupCache } from './dedup-cache.js';
import type { KeyedMutex } from './keyed-mutex.js';
import type { RateLimiter } from './rate-limiter.js';

/** Message types relayed even without attachments or embeds. */
export const FORWARDABLE_MESSAGE_TYPES: ReadonlySet<number> = new Set([0, 19, 20, 21, 23]);

export const DEFAULT_BATCH_SIZE = 50;
export const FETCH_ERROR_BACKOFF_MS = 1000;

export interface SyncEngineOptions {
    source: SourceFeed;
    sink: SinkFeed;
    repository: ConfigRepository;
    render: RenderFn;
    createFilter: FilterEngineFactory;
    dedup: DedupCache;
    guard: KeyedMutex;
    /** Paces sends to the destination. */
    sinkLimiter: RateLimiter;
    /** Checked between items; a pending refresh ends the pass early. */
    isRefreshPending: () => boolean;
    /** Process start; nothing created at or before it is ever forwarded. */
    startedAt: Date;
    batchSize?: number;
    fetchErrorBackoffMs?: number;
    random?: () => number;
}

export interface SyncReport {
    sourceId: string;
    mode: MonitoringMode;
    forwarded: number;
    skipped: number;
    failed: number;
    interrupted: boolean;
    cursorChanged: boolean;
}

type Outcome = 'forwarded' | 'skipped' | 'failed' | 'interrupted';

/** Whether a message may be relayed at all, regardless of the mapping's filters. */
export function isForwardableType(message: SourceMessage): boolean {
    return (
        FORWARDABLE_MESSAGE_TYPES.has(message.messageType) ||
        message.attachments.length > 0 ||
        message.embeds.length > 0
    );
}

/** Effective dedup flag of a mapping: its override, else the runtime default. */
export function dedupEnabled(mapping: MappingConfig, runtime: RuntimeOptions): boolean {
    return mapping.deduplicate ?? runtime.deduplicateMessages;
}

function sameSet(left: ReadonlySet<string>, right: ReadonlySet<string>): boolean {
    if (left.size !== right.size) return false;
    for (const value of left) {
        if (!right.has(value)) return false;
    }
    return true;
}

/**
 * Known-set rule of the set-based modes: a completed pass adopts `current`;
 * an interrupted one keeps what is still present and adds what was handled.
 */
export function mergeKnownIds(
    known: ReadonlySet<string>,
    current: ReadonlySet<string>,
    processed: ReadonlySet<string>,
    interrupted: boolean,
): Set<string> {
    if (!interrupted) return new Set(current);
    const merged = new Set<string>();
    for (const id of known) {
        if (current.has(id)) merged.add(id);
    }
    for (const id of processed) merged.add(id);
    return merged;
}

/**
 * Per-mapping cursor state machine. Every pass runs under the mapping's key
 * in the shared {@link KeyedMutex}, so the monitor loop and manual actions
 * never work on the same source channel at once.
 */
export class SyncEngine {
    readonly #source: SourceFeed;
    readonly #sink: SinkFeed;
    readonly #repository: ConfigRepository;
    readonly #render: RenderFn;
    readonly #createFilter: FilterEngineFactory;
    readonly #dedup: DedupCache;
    readonly #guard: KeyedMutex;
    readonly #sinkLimiter: RateLimiter;
    readonly #isRefreshPending: () => boolean;
    readonly #startedAt: Date;
    readonly #batchSize: number;
    readonly #fetchErrorBackoffMs: number;
    readonly #random: () => number;

    constructor(options: SyncEngineOptions) {
        this.#source = options.source;
        this.#sink = options.sink;
        this.#repository = options.repository;
        this.#render = options.render;
        this.#createFilter = options.createFilter;
        this.#dedup = options.dedup;
        this.#guard = options.guard;
        this.#sinkLimiter = options.sinkLimiter;
        this.#isRefreshPending = options.isRefreshPending;
        this.#startedAt = options.startedAt;
        this.#batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
        this.#fetchErrorBackoffMs = options.fetchErrorBackoffMs ?? FETCH_ERROR_BACKOFF_MS;
        this.#random = options.random ?? Math.random;
    }

    get startedAt(): Date {
        return this.#startedAt;
    }

    process(mapping: MappingConfig, runtime: RuntimeOptions, signal?: AbortSignal): Promise<SyncReport> {
        return this.#guard.runExclusive(mapping.sourceId, async () => {
            const report: SyncReport = {
                sourceId: mapping.sourceId,
                mode: mapping.mode,
                forwarded: 0,
                skipped: 0,
                failed: 0,
                interrupted: false,
                cursorChanged: false,
            };
            if (!mapping.active || mapping.blockedByHealth) {
                return report;
            }
            // The snapshot may predate a pass that finished while this one waited for the guard.
            const stored = this.#repository.loadCursor(mapping.storageId);
            if (!stored) {
                return report;
            }
            mapping.cursor = stored;

            switch (mapping.mode) {
                case 'pinned':
                    await this.#processPinned(mapping, runtime, report, signal);
                    break;
                case 'forum':
                    await this.#processForum(mapping, runtime, report, signal);
                    break;
                default:
                    await this.#processStream(mapping, runtime, report, signal);
                    break;
            }
            return report;
        });
    }

    // ── stream ────────────────────────────────────────────────────────────

    async #processStream(
        mapping: MappingConfig,
        runtime: RuntimeOptions,
        report: SyncReport,
        signal: AbortSignal | undefined,
    ): Promise<void> {
        const previous = mapping.cursor.lastSeenId;
        let bootstrap = previous === null;
        const baseline = this.#cutoffFor(mapping);
        const startMarker = snowflakeFromDate(this.#startedAt);
        const baselineMarker = snowflakeFromDate(baseline);

        const batch = await this.#fetch(
            mapping,
            () => this.#source.fetchSince(mapping.sourceId, previous, this.#batchSize),
            'messages',
            signal,
        );
        if (!batch || batch.length === 0) return;

        const unique = new Map<string, SourceMessage>();
        for (const message of batch) {
            if (!unique.has(message.id)) unique.set(message.id, message);
        }
        const ordered = [...unique.values()]
            .filter((message) => previous === null || compareIds(message.id, previous) > 0)
            .sort((a, b) => compareIds(a.id, b.id));

        const filter = this.#createFilter(mapping.filters);
        const dedup = dedupEnabled(mapping, runtime);
        let lastSeen = previous;

        try {
            for (const message of ordered) {
                if (this.#isRefreshPending()) {
                    report.interrupted = true;
                    break;
                }

                let skip = isAtOrBefore(message, this.#startedAt, startMarker) || !isForwardableType(message);
                if (!skip && bootstrap) {
                    if (isAtOrBefore(message, baseline, baselineMarker)) {
                        skip = true;
                    } else {
                        bootstrap = false;
                    }
                }

                const outcome = skip
                    ? 'skipped'
                    : await this.#deliver(mapping, message, 'message', filter, dedup, runtime, signal);
                if (outcome === 'interrupted') {
                    report.interrupted = true;
                    break;
                }
                report[outcome] += 1;
                lastSeen = message.id;
            }
        } finally {
            if (lastSeen !== null && lastSeen !== previous) {
                this.#repository.setLastSeenId(mapping.storageId, lastSeen);
                mapping.cursor = { ...mapping.cursor, lastSeenId: lastSeen };
                report.cursorChanged = true;
            }
        }
    }

    // ── pinned set ────────────────────────────────────────────────────────

    async #processPinned(
        mapping: MappingConfig,
        runtime: RuntimeOptions,
        report: SyncReport,
        signal: AbortSignal | undefined,
    ): Promise<void> {
        const messages = await this.#fetch(
            mapping,
            () => this.#source.fetchPinned(mapping.sourceId),
            'pinned messages',
            signal,
        );
        if (!messages) return;

        const current = new Set(messages.map((message) => message.id));
        const known = mapping.cursor.knownPinnedIds;

        if (!mapping.cursor.pinnedSynced) {
            this.#savePinned(mapping, current, report);
            return;
        }
        if (messages.length === 0) {
            if (known.size > 0) this.#savePinned(mapping, new Set(), report);
            return;
        }

        const fresh = [...new Map(messages.map((message) => [message.id, message])).values()]
            .filter((message) => !known.has(message.id))
            .sort((a, b) => compareIds(a.id, b.id));
        if (fresh.length === 0 && sameSet(known, current)) return;

        const cutoff = this.#cutoffFor(mapping);
        const cutoffMarker = snowflakeFromDate(cutoff);
        const filter = this.#createFilter(mapping.filters);
        const dedup = dedupEnabled(mapping, runtime);
        const processed = new Set<string>();
        let completed = false;

        try {
            for (const message of fresh) {
                if (this.#isRefreshPending()) {
                    report.interrupted = true;
                    break;
                }
                const skip = isAtOrBefore(message, cutoff, cutoffMarker) || !isForwardableType(message);
                const outcome = skip
                    ? 'skipped'
                    : await this.#deliver(mapping, message, 'pinned', filter, dedup, runtime, signal);
                if (outcome === 'interrupted') {
                    report.interrupted = true;
                    break;
                }
                report[outcome] += 1;
                if (outcome !== 'failed') processed.add(message.id);
            }
            completed = true;
        } finally {
            const interrupted = report.interrupted || !completed;
            const updated = mergeKnownIds(known, current, processed, interrupted);
            if (!sameSet(updated, known)) {
                this.#savePinned(mapping, updated, report);
            }
        }
    }

    #savePinned(mapping: MappingConfig, ids: Set<string>, report: SyncReport): void {
        this.#repository.setPinnedState(mapping.storageId, ids, true);
        mapping.cursor = { ...mapping.cursor, knownPinnedIds: ids, pinnedSynced: true };
        report.cursorChanged = true;
    }

    // ── forum thread set ──────────────────────────────────────────────────

    async #processForum(
        mapping: MappingConfig,
        runtime: RuntimeOptions,
        report: SyncReport,
        signal: AbortSignal | undefined,
    ): Promise<void> {
        const threads = await this.#fetch(
            mapping,
            () => this.#source.fetchThreads(mapping.sourceId),
            'forum threads',
            signal,
        );
        if (!threads) return;

        const current = new Set(threads.map((thread) => thread.id));
        const known = mapping.cursor.knownThreadIds;

        if (!mapping.cursor.forumSynced) {
            this.#saveForum(mapping, current, report);
            return;
        }

        const fresh = [...new Map(threads.map((thread) => [thread.id, thread])).values()]
            .filter((thread) => !known.has(thread.id))
            .sort((a, b) => compareIds(a.id, b.id));
        if (fresh.length === 0) {
            if (!sameSet(known, current)) this.#saveForum(mapping, current, report);
            return;
        }

        const filter = this.#createFilter(mapping.filters);
        const dedup = dedupEnabled(mapping, runtime);
        const processed = new Set<string>();
        let completed = false;

        try {
            for (const thread of fresh) {
                if (this.#isRefreshPending()) {
                    report.interrupted = true;
                    break;
                }

                let first: SourceMessage | undefined;
                try {
                    const messages = await this.#source.fetchSince(thread.id, '0', 1);
                    first = [...messages].sort((a, b) => compareIds(a.id, b.id))[0];
                } catch (err) {
                    if (isAbortError(err, signal)) throw err;
                    void logThought(
                        `[SyncEngine] Could not fetch the first message of thread ${thread.id}: ${describeError(err)}`,
                        'warn',
                    );
                    report.failed += 1;
                    continue;
                }

                if (!first) {
                    report.skipped += 1;
                    processed.add(thread.id);
                    continue;
                }

                const outcome = await this.#deliver(mapping, first, 'forum_thread', filter, dedup, runtime, signal, {
                    threadTitle: thread.name,
                });
                if (outcome === 'interrupted') {
                    report.interrupted = true;
                    break;
                }
                report[outcome] += 1;
                if (outcome !== 'failed') processed.add(thread.id);
            }
            completed = true;
        } finally {
            const interrupted = report.interrupted || !completed;
            const updated = mergeKnownIds(known, current, processed, interrupted);
            if (!sameSet(updated, known)) {
                this.#saveForum(mapping, updated, report);
            }
        }
    }

    #saveForum(mapping: MappingConfig, ids: Set<string>, report: SyncReport): void {
        this.#repository.setForumState(mapping.storageId, ids, true);
        mapping.cursor = { ...mapping.cursor, knownThreadIds: ids, forumSynced: true };
        report.cursorChanged = true;
    }

    // ── shared pipeline ───────────────────────────────────────────────────

    #cutoffFor(mapping: MappingConfig): Date {
        return mapping.createdAt.getTime() > this.#startedAt.getTime() ? mapping.createdAt : this.#startedAt;
    }

    async #fetch<T>(
        mapping: MappingConfig,
        request: () => Promise<T[]>,
        what: string,
        signal: AbortSignal | undefined,
    ): Promise<T[] | null> {
        try {
            return await request();
        } catch (err) {
            if (isAbortError(err, signal)) throw err;
            void logThought(
                `[SyncEngine] Failed to fetch ${what} for ${mapping.sourceId}: ${describeError(err)}`,
                'warn',
            );
            await sleep(this.#fetchErrorBackoffMs, signal);
            return null;
        }
    }

    /** Filter, dedup, render and send one message. Sink errors are logged, never thrown. */
    async #deliver(
        mapping: MappingConfig,
        message: SourceMessage,
        kind: MessageKind,
        filter: FilterEngine,
        dedup: boolean,
        runtime: RuntimeOptions,
        signal: AbortSignal | undefined,
        context?: RenderContext,
    ): Promise<Outcome> {
        const decision = filter.evaluate(message);
        if (!decision.allowed) {
            void logThought(
                `[SyncEngine] ${mapping.sourceId}: message ${message.id} filtered (${decision.reason ?? 'denied'}).`,
                'debug',
            );
            return 'skipped';
        }
        const signature = dedup ? buildMessageSignature(message) : null;
        if (this.#dedup.has(signature)) {
            return 'skipped';
        }

        const payload = this.#render(message, mapping, kind, context);
        await this.#sinkLimiter.wait(signal);
        if (this.#isRefreshPending()) {
            return 'interrupted';
        }
        // Recorded only once the send is committed; an interrupted item is retried.
        if (signature && !this.#dedup.remember(signature)) {
            return 'skipped';
        }

        try {
            await this.#sink.send(mapping.destinationId, payload, mapping.destinationThreadId);
        } catch (err) {
            if (isAbortError(err, signal)) throw err;
            void logThought(
                `[SyncEngine] Failed to deliver ${kind} ${message.id} from ${mapping.sourceId} to ${mapping.destinationId}: ${describeError(err)}`,
                'error',
            );
            return 'failed';
        }

        await this.#pause(runtime, signal);
        return 'forwarded';
    }

    async #pause(runtime: RuntimeOptions, signal: AbortSignal | undefined): Promise<void> {
        if (runtime.maxDelayMs <= 0) return;
        const span = Math.max(0, runtime.maxDelayMs - runtime.minDelayMs);
        const delay = runtime.minDelayMs + this.#random() * span;
        if (delay > 0) {
            await sleep(delay, signal);
        }
    }
}
