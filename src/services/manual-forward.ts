import type {
    ConfigRepository,
    FilterEngine,
    FilterEngineFactory,
    RenderFn,
    SinkFeed,
    SourceFeed,
} from '../types/ports.js';
import type {
    ManualForwardActivity,
    ManualForwardEntry,
    MappingConfig,
    MessageKind,
    RuntimeOptions,
    SourceMessage,
} from '../types/relay.js';
import { isAbortError } from '../utils/async.js';
import { describeError, logThought } from '../utils/logger.js';
import { compareIds, parseTimestamp } from '../utils/snowflake.js';
import { buildMessageSignature } from './dedup-cache.js';
import type { DedupCache } from './dedup-cache.js';
import type { KeyedMutex } from './keyed-mutex.js';
import { RateLimiter } from './rate-limiter.js';
import { dedupEnabled, isForwardableType, mergeKnownIds } from './sync-engine.js';

export const MANUAL_FORWARD_MAX = 100;
const MIN_MANUAL_RATE = 0.1;

/** Rejected invocation; nothing was sent and nothing was recorded. */
export class ManualForwardError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ManualForwardError';
    }
}

export interface ManualForwardRequest {
    requested: number;
    /** A source id, or `all` / `*` for every mapping. */
    target: string;
}

export interface ManualForwardServiceOptions {
    source: SourceFeed;
    sink: SinkFeed;
    repository: ConfigRepository;
    render: RenderFn;
    createFilter: FilterEngineFactory;
    dedup: DedupCache;
    guard: KeyedMutex;
    /** Called once when any cursor was changed by the invocation. */
    onConfigChanged: () => void;
    now?: () => Date;
}

interface MappingOutcome {
    forwarded: number;
    note: string;
    changed: boolean;
}

type SendOutcome = 'forwarded' | 'skipped' | 'failed';

function timestampKey(message: SourceMessage): number {
    return parseTimestamp(message.timestamp)?.getTime() ?? 0;
}

/**
 * Newest-last list of the messages a manual forward may consider: unique by
 * id, nothing reported as created after `invokedAt`, ordered by timestamp,
 * then id, then fetch position.
 */
export function prepareRecentMessages(messages: readonly SourceMessage[], invokedAt: Date): SourceMessage[] {
    const seen = new Set<string>();
    const eligible: { message: SourceMessage; index: number }[] = [];
    messages.forEach((message, index) => {
        if (seen.has(message.id)) return;
        seen.add(message.id);
        const created = parseTimestamp(message.timestamp);
        if (created && created.getTime() > invokedAt.getTime()) return;
        eligible.push({ message, index });
    });

    return eligible
        .sort(
            (a, b) =>
                timestampKey(a.message) - timestampKey(b.message) ||
                compareIds(a.message.id, b.message.id) ||
                a.index - b.index,
        )
        .map((entry) => entry.message);
}

function withRemaining(note: string, remaining: number): string {
    return remaining > 0 ? `${note}, ${remaining} more remaining` : note;
}

/**
 * Administrator-triggered "forward the N most recent messages" action.
 *
 * Runs each mapping under the same per-channel guard as the monitor loop and
 * records an audit entry of the invocation.
 */
export class ManualForwardService {
    readonly #source: SourceFeed;
    readonly #sink: SinkFeed;
    readonly #repository: ConfigRepository;
    readonly #render: RenderFn;
    readonly #createFilter: FilterEngineFactory;
    readonly #dedup: DedupCache;
    readonly #guard: KeyedMutex;
    readonly #onConfigChanged: () => void;
    readonly #now: () => Date;

    constructor(options: ManualForwardServiceOptions) {
        this.#source = options.source;
        this.#sink = options.sink;
        this.#repository = options.repository;
        this.#render = options.render;
        this.#createFilter = options.createFilter;
        this.#dedup = options.dedup;
        this.#guard = options.guard;
        this.#onConfigChanged = options.onConfigChanged;
        this.#now = options.now ?? (() => new Date());
    }

    async forwardRecent(request: ManualForwardRequest, signal?: AbortSignal): Promise<ManualForwardActivity> {
        const { requested } = request;
        if (!Number.isInteger(requested) || requested <= 0) {
            throw new ManualForwardError('The message count must be a positive integer.');
        }
        const limit = Math.min(requested, MANUAL_FORWARD_MAX);

        const credential = this.#repository.getCredential();
        if (!credential) {
            throw new ManualForwardError('Set the source credential before forwarding messages.');
        }

        const mappings = this.#repository.loadMappings();
        const target = request.target.trim();
        let selected: MappingConfig[];
        if (target.toLowerCase() === 'all' || target === '*') {
            selected = mappings;
        } else {
            selected = mappings.filter((mapping) => mapping.sourceId === target);
            if (selected.length === 0) {
                throw new ManualForwardError(`No mapping is configured for source '${target}'.`);
            }
        }
        if (selected.length === 0) {
            throw new ManualForwardError('No mappings are configured.');
        }

        const runtime = this.#repository.loadRuntimeOptions();
        this.#source.setCredential(credential);
        this.#source.setNetworkOptions(this.#repository.loadNetworkOptions());
        const limiter = new RateLimiter(Math.max(runtime.ratePerSecond, MIN_MANUAL_RATE));
        const invokedAt = this.#now();

        void logThought(`[ManualForward] Forwarding up to ${limit} message(s) from ${selected.length} mapping(s).`);

        const entries: ManualForwardEntry[] = [];
        let totalForwarded = 0;
        let stateChanged = false;

        for (const mapping of selected) {
            const outcome = await this.#guard.runExclusive(mapping.sourceId, () =>
                this.#forwardMapping(mapping, runtime, limit, limiter, invokedAt, signal),
            );
            totalForwarded += outcome.forwarded;
            stateChanged ||= outcome.changed;
            entries.push({
                sourceId: mapping.sourceId,
                label: mapping.label || mapping.sourceId,
                forwarded: outcome.forwarded,
                mode: mapping.mode,
                note: outcome.note,
            });
        }

        const activity: ManualForwardActivity = {
            timestamp: invokedAt.toISOString(),
            requested,
            limit,
            totalForwarded,
            entries,
        };
        this.#repository.recordManualForward(activity);
        if (stateChanged) {
            this.#onConfigChanged();
        }

        void logThought(`[ManualForward] Done: ${totalForwarded} message(s) forwarded.`);
        return activity;
    }

    /** Runs under the mapping's guard; the cursor is re-read from the store first. */
    #forwardMapping(
        mapping: MappingConfig,
        runtime: RuntimeOptions,
        limit: number,
        limiter: RateLimiter,
        invokedAt: Date,
        signal: AbortSignal | undefined,
    ): Promise<MappingOutcome> {
        if (!mapping.active) {
            return Promise.resolve({ forwarded: 0, note: 'mapping is disabled, skipped', changed: false });
        }
        if (mapping.blockedByHealth) {
            return Promise.resolve({
                forwarded: 0,
                note: 'mapping failed its health check, skipped',
                changed: false,
            });
        }
        const stored = this.#repository.loadCursor(mapping.storageId);
        if (!stored) {
            return Promise.resolve({ forwarded: 0, note: 'mapping no longer exists, skipped', changed: false });
        }
        mapping.cursor = stored;

        switch (mapping.mode) {
            case 'forum':
                return Promise.resolve({
                    forwarded: 0,
                    note: 'forum mappings are not forwarded manually',
                    changed: false,
                });
            case 'pinned':
                return this.#forwardPinned(mapping, runtime, limit, limiter, signal);
            default:
                return this.#forwardStream(mapping, runtime, limit, limiter, invokedAt, signal);
        }
    }

    async #forwardStream(
        mapping: MappingConfig,
        runtime: RuntimeOptions,
        limit: number,
        limiter: RateLimiter,
        invokedAt: Date,
        signal: AbortSignal | undefined,
    ): Promise<MappingOutcome> {
        const fetchLimit = Math.min(MANUAL_FORWARD_MAX, Math.max(limit + 5, 2 * limit));
        let messages: SourceMessage[];
        try {
            messages = await this.#source.fetchSince(mapping.sourceId, null, fetchLimit);
        } catch (err) {
            if (isAbortError(err, signal)) throw err;
            void logThought(
                `[ManualForward] Failed to fetch messages of ${mapping.sourceId}: ${describeError(err)}`,
                'error',
            );
            return { forwarded: 0, note: 'failed to fetch messages', changed: false };
        }
        if (messages.length === 0) {
            return { forwarded: 0, note: 'no messages found', changed: false };
        }

        const eligible = prepareRecentMessages(messages, invokedAt);
        if (eligible.length === 0) {
            return { forwarded: 0, note: 'no matching messages found', changed: false };
        }
        const subset = eligible.slice(-limit);

        const filter = this.#createFilter(mapping.filters);
        const dedup = dedupEnabled(mapping, runtime);
        const previous = mapping.cursor.lastSeenId;
        let lastSeen = previous;
        let forwarded = 0;

        for (const message of subset) {
            const outcome = isForwardableType(message)
                ? await this.#send(mapping, message, 'message', filter, dedup, limiter, signal)
                : 'skipped';
            if (outcome === 'forwarded') forwarded += 1;
            if (lastSeen === null || compareIds(message.id, lastSeen) > 0) {
                lastSeen = message.id;
            }
        }

        let changed = false;
        if (lastSeen !== null && lastSeen !== previous) {
            this.#repository.setLastSeenId(mapping.storageId, lastSeen);
            mapping.cursor = { ...mapping.cursor, lastSeenId: lastSeen };
            changed = true;
        }

        const note = forwarded > 0 ? `forwarded ${forwarded} of ${subset.length} messages` : 'no matching messages found';
        return { forwarded, note: withRemaining(note, eligible.length - subset.length), changed };
    }

    async #forwardPinned(
        mapping: MappingConfig,
        runtime: RuntimeOptions,
        limit: number,
        limiter: RateLimiter,
        signal: AbortSignal | undefined,
    ): Promise<MappingOutcome> {
        let messages: SourceMessage[];
        try {
            messages = await this.#source.fetchPinned(mapping.sourceId);
        } catch (err) {
            if (isAbortError(err, signal)) throw err;
            void logThought(
                `[ManualForward] Failed to fetch pinned messages of ${mapping.sourceId}: ${describeError(err)}`,
                'error',
            );
            return { forwarded: 0, note: 'failed to fetch pinned messages', changed: false };
        }

        const known = mapping.cursor.knownPinnedIds;
        const current = new Set(messages.map((message) => message.id));

        if (messages.length === 0) {
            let changed = false;
            if (known.size > 0) {
                this.#savePinned(mapping, new Set());
                changed = true;
            }
            return { forwarded: 0, note: 'no pinned messages', changed };
        }
        if (!mapping.cursor.pinnedSynced) {
            this.#savePinned(mapping, current);
            return { forwarded: 0, note: 'pinned messages synced, nothing new', changed: true };
        }

        const ordered = [...new Map(messages.map((message) => [message.id, message])).values()].sort(
            (a, b) => timestampKey(a) - timestampKey(b) || compareIds(a.id, b.id),
        );
        const subset = ordered.slice(-limit);

        const filter = this.#createFilter(mapping.filters);
        const dedup = dedupEnabled(mapping, runtime);
        const handled = new Set<string>();
        let forwarded = 0;

        for (const message of subset) {
            if (known.has(message.id)) {
                handled.add(message.id);
                continue;
            }
            const outcome = await this.#send(mapping, message, 'pinned', filter, dedup, limiter, signal);
            if (outcome === 'forwarded') forwarded += 1;
            if (outcome !== 'failed') handled.add(message.id);
        }

        const updated = mergeKnownIds(known, current, handled, true);
        let changed = false;
        if (updated.size !== known.size || [...updated].some((id) => !known.has(id))) {
            this.#savePinned(mapping, updated);
            changed = true;
        }

        const note =
            forwarded > 0
                ? `forwarded ${forwarded} pinned of ${subset.length} messages`
                : 'no matching pinned messages found';
        return { forwarded, note, changed };
    }

    #savePinned(mapping: MappingConfig, ids: Set<string>): void {
        this.#repository.setPinnedState(mapping.storageId, ids, true);
        mapping.cursor = { ...mapping.cursor, knownPinnedIds: ids, pinnedSynced: true };
    }

    async #send(
        mapping: MappingConfig,
        message: SourceMessage,
        kind: MessageKind,
        filter: FilterEngine,
        dedup: boolean,
        limiter: RateLimiter,
        signal: AbortSignal | undefined,
    ): Promise<SendOutcome> {
        if (!filter.evaluate(message).allowed) return 'skipped';
        const signature = dedup ? buildMessageSignature(message) : null;
        if (this.#dedup.has(signature)) return 'skipped';

        const payload = this.#render(message, mapping, kind);
        await limiter.wait(signal);
        if (signature && !this.#dedup.remember(signature)) return 'skipped';
        try {
            await this.#sink.send(mapping.destinationId, payload, mapping.destinationThreadId);
            return 'forwarded';
        } catch (err) {
            if (isAbortError(err, signal)) throw err;
            void logThought(
                `[ManualForward] Failed to deliver ${kind} ${message.id} to ${mapping.destinationId}: ${describeError(err)}`,
                'error',
            );
            return 'failed';
        }
    }
}
