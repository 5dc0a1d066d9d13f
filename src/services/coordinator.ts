import { MIN_HEALTH_INTERVAL_MS } from '../config/runtime-options.js';
import { CREDENTIAL_SUBJECT } from '../types/health.js';
import type {
    AdminLoop,
    ConfigRepository,
    FilterEngineFactory,
    RenderFn,
    SinkFeed,
    SourceFeed,
} from '../types/ports.js';
import type { MappingConfig, NetworkOptions, OutboundPayload, RuntimeOptions } from '../types/relay.js';
import { AsyncSignal, isAbortError, sleep, waitForAny } from '../utils/async.js';
import { describeError, logThought } from '../utils/logger.js';
import { DedupCache } from './dedup-cache.js';
import { createFilterEngine } from './filter-engine.js';
import { renderMessage } from './formatting.js';
import { HealthChecker } from './health-checker.js';
import { formatHealthSummary, hasTransitions, HealthRegistry } from './health-registry.js';
import { KeyedMutex } from './keyed-mutex.js';
import { RateLimiter } from './rate-limiter.js';
import { DEFAULT_SUPERVISOR_RETRY_MS, supervise } from './supervisor.js';
import { SyncEngine } from './sync-engine.js';

export const NO_CREDENTIAL_IDLE_MS = 3000;
export const MAPPING_ERROR_BACKOFF_MS = 1000;

export interface CoordinatorOptions {
    source: SourceFeed;
    sink: SinkFeed;
    repository: ConfigRepository;
    render?: RenderFn;
    createFilter?: FilterEngineFactory;
    /** Shared with manual actions so both see the same recent signatures. */
    dedup?: DedupCache;
    /** Shared with manual actions so a mapping is never processed twice at once. */
    guard?: KeyedMutex;
    /** Optional third supervised loop, e.g. an admin chat controller. */
    admin?: AdminLoop;
    startedAt?: Date;
    supervisorRetryMs?: number;
    healthRetryDelayMs?: number;
    idleDelayMs?: number;
    mappingErrorBackoffMs?: number;
    random?: () => number;
}

interface MonitorState {
    mappings: MappingConfig[];
    runtime: RuntimeOptions;
    network: NetworkOptions;
    credential: string | null;
    credentialOk: boolean;
}

/**
 * Owns configuration versioning and runs the monitor, health and admin loops.
 *
 * `configVersion` grows on every {@link onConfigChanged}; `healthVersion` is
 * the config version the last completed health pass started from. The monitor
 * loop only processes mappings once `healthVersion` has caught up with the
 * version it is about to apply.
 */
export class Coordinator {
    readonly #source: SourceFeed;
    readonly #sink: SinkFeed;
    readonly #repository: ConfigRepository;
    readonly #admin: AdminLoop | undefined;
    readonly #engine: SyncEngine;
    readonly #checker: HealthChecker;
    readonly #registry: HealthRegistry;
    readonly #sourceLimiter = new RateLimiter(0);
    readonly #sinkLimiter = new RateLimiter(0);
    readonly #refresh = new AsyncSignal();
    readonly #healthWakeup = new AsyncSignal();
    readonly #healthReady = new AsyncSignal();
    readonly #supervisorRetryMs: number;
    readonly #idleDelayMs: number;
    readonly #mappingErrorBackoffMs: number;

    #configVersion = 0;
    #healthVersion = -1;

    constructor(options: CoordinatorOptions) {
        this.#source = options.source;
        this.#sink = options.sink;
        this.#repository = options.repository;
        this.#admin = options.admin;
        this.#supervisorRetryMs = options.supervisorRetryMs ?? DEFAULT_SUPERVISOR_RETRY_MS;
        this.#idleDelayMs = options.idleDelayMs ?? NO_CREDENTIAL_IDLE_MS;
        this.#mappingErrorBackoffMs = options.mappingErrorBackoffMs ?? MAPPING_ERROR_BACKOFF_MS;

        this.#engine = new SyncEngine({
            source: options.source,
            sink: options.sink,
            repository: options.repository,
            render: options.render ?? renderMessage,
            createFilter: options.createFilter ?? createFilterEngine,
            dedup: options.dedup ?? new DedupCache(),
            guard: options.guard ?? new KeyedMutex(),
            sinkLimiter: this.#sinkLimiter,
            isRefreshPending: () => this.#refresh.isSet,
            startedAt: options.startedAt ?? new Date(),
            random: options.random,
        });
        this.#checker = new HealthChecker({
            source: options.source,
            repository: options.repository,
            onConfigChanged: () => this.onConfigChanged(),
            retryDelayMs: options.healthRetryDelayMs,
        });
        this.#registry = new HealthRegistry(options.repository);

        this.#markConfigDirty();
        this.#refresh.set();
    }

    get configVersion(): number {
        return this.#configVersion;
    }

    get healthVersion(): number {
        return this.#healthVersion;
    }

    get refreshPending(): boolean {
        return this.#refresh.isSet;
    }

    /** Entry point for the admin collaborator after any mutation of the store. */
    onConfigChanged(): void {
        this.#markConfigDirty();
        this.#refresh.set();
        this.#healthWakeup.set();
    }

    /** Runs every loop under supervision until `signal` aborts; then rejects with the abort reason. */
    async run(signal: AbortSignal): Promise<void> {
        const tasks: Promise<never>[] = [
            supervise('monitor', (s) => this.runMonitorLoop(s), {
                signal,
                retryDelayMs: this.#supervisorRetryMs,
            }),
            supervise('health', (s) => this.runHealthLoop(s), {
                signal,
                retryDelayMs: this.#supervisorRetryMs,
            }),
        ];
        const admin = this.#admin;
        if (admin) {
            tasks.push(
                supervise('admin', (s) => admin.run(s), { signal, retryDelayMs: this.#supervisorRetryMs }),
            );
        }
        void logThought(`[Coordinator] Started ${tasks.length} supervised loops.`);
        await Promise.all(tasks);
    }

    // ── Monitor loop ───────────────────────────────────────────────────────

    /** Every (re)entry starts in ReloadPending, so a restarted loop re-applies the current configuration. */
    async runMonitorLoop(signal: AbortSignal): Promise<void> {
        let { state, version: stateVersion } = await this.#handshake(signal);

        for (;;) {
            if (this.#refresh.isSet) {
                ({ state, version: stateVersion } = await this.#handshake(signal));
            }

            if (!state.credential || !state.credentialOk) {
                await sleep(this.#idleDelayMs, signal);
                continue;
            }

            for (const mapping of state.mappings) {
                if (stateVersion < this.#configVersion || this.#refresh.isSet) break;
                await this.#sourceLimiter.wait(signal);
                try {
                    await this.#engine.process(mapping, state.runtime, signal);
                } catch (err) {
                    if (isAbortError(err, signal)) throw err;
                    void logThought(
                        `[Coordinator] Processing ${mapping.sourceId} failed: ${describeError(err)}`,
                        'error',
                    );
                    await sleep(this.#mappingErrorBackoffMs, signal);
                }
            }

            await this.#refresh.waitFor(state.runtime.pollIntervalMs, signal);
        }
    }

    /** ReloadPending → WaitingForHealth → Active. Restarts whenever a refresh fires while waiting. */
    async #handshake(signal: AbortSignal): Promise<{ state: MonitorState; version: number }> {
        for (;;) {
            this.#refresh.clear();
            const target = this.#configVersion;
            const verified = await this.#waitForHealth(target, signal);
            if (!verified || this.#refresh.isSet) continue;

            const state = this.#loadState();
            this.#source.setCredential(state.credential);
            this.#source.setNetworkOptions(state.network);
            this.#applyRates(state.runtime);
            void logThought(
                `[Coordinator] Configuration v${target} applied: ${state.mappings.length} mapping(s).`,
            );
            return { state, version: target };
        }
    }

    /** Resolves true once `healthVersion >= target`, false when a newer refresh arrives first. */
    async #waitForHealth(target: number, signal: AbortSignal): Promise<boolean> {
        while (this.#healthVersion < target) {
            if (this.#refresh.isSet) return false;
            await waitForAny([this.#healthReady, this.#refresh], null, signal);
            if (this.#healthVersion < target && !this.#refresh.isSet) {
                this.#healthReady.clear();
            }
        }
        return true;
    }

    // ── Health loop ────────────────────────────────────────────────────────

    async runHealthLoop(signal: AbortSignal): Promise<void> {
        let first = true;
        let intervalMs = Math.max(MIN_HEALTH_INTERVAL_MS, this.#repository.loadRuntimeOptions().healthCheckIntervalMs);

        for (;;) {
            if (first) {
                first = false;
                this.#healthWakeup.clear();
            } else if (await this.#healthWakeup.waitFor(intervalMs, signal)) {
                this.#healthWakeup.clear();
            }

            const target = this.#configVersion;
            const state = this.#loadState();
            await this.#runHealthPass(state, signal);
            this.#healthVersion = Math.max(this.#healthVersion, target);
            this.#healthReady.set();

            intervalMs = Math.max(MIN_HEALTH_INTERVAL_MS, state.runtime.healthCheckIntervalMs);
        }
    }

    async #runHealthPass(state: MonitorState, signal: AbortSignal): Promise<void> {
        const updates = await this.#checker.run(
            {
                mappings: state.mappings,
                runtime: state.runtime,
                network: state.network,
                credential: state.credential,
            },
            signal,
        );
        const transitions = this.#registry.commit(
            updates,
            state.mappings.map((mapping) => mapping.sourceId),
        );

        if (transitions.errors.length > 0) {
            await this.#notifyAdmins(formatHealthSummary(transitions.errors, false));
        }
        if (transitions.recoveries.length > 0) {
            await this.#notifyAdmins(formatHealthSummary(transitions.recoveries, true));
        }
        if (hasTransitions(transitions)) {
            this.#refresh.set();
        }
    }

    async #notifyAdmins(text: string): Promise<void> {
        const payload: OutboundPayload = {
            text,
            extraMessages: [],
            parseMode: 'HTML',
            disablePreview: true,
            imageUrls: [],
        };
        for (const chatId of this.#repository.listAdminChatIds()) {
            try {
                await this.#sink.send(chatId, payload, null);
            } catch (err) {
                void logThought(
                    `[Coordinator] Failed to notify admin ${chatId}: ${describeError(err)}`,
                    'error',
                );
            }
        }
    }

    // ── Helpers ────────────────────────────────────────────────────────────

    #markConfigDirty(): void {
        this.#configVersion += 1;
        this.#healthReady.clear();
    }

    #applyRates(runtime: RuntimeOptions): void {
        this.#sourceLimiter.setRate(runtime.ratePerSecond);
        this.#sinkLimiter.setRate(runtime.ratePerSecond);
    }

    #loadState(): MonitorState {
        const credentialRecord = this.#repository.getHealthRecord(CREDENTIAL_SUBJECT);
        return {
            mappings: this.#repository.loadMappings(),
            runtime: this.#repository.loadRuntimeOptions(),
            network: this.#repository.loadNetworkOptions(),
            credential: this.#repository.getCredential(),
            credentialOk: credentialRecord.status === 'ok',
        };
    }
}
