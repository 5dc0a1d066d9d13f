import type { HealthRecord, HealthStatus } from './health.js';
import type {
    FilterConfig,
    ManualForwardActivity,
    MappingConfig,
    MappingCursor,
    MessageKind,
    NetworkOptions,
    OutboundPayload,
    RenderContext,
    RuntimeOptions,
    SourceMessage,
    SourceThread,
} from './relay.js';

export interface CheckResult {
    ok: boolean;
    error?: string;
}

export interface CredentialCheckResult extends CheckResult {
    /** Form of the credential the source accepted, when it differs in shape. */
    normalizedValue?: string;
}

/** Read side of the relay: the channel API messages are taken from. */
export interface SourceFeed {
    /** Messages strictly after `cursor` (or the most recent ones when `cursor` is null). */
    fetchSince(sourceId: string, cursor: string | null, limit: number): Promise<SourceMessage[]>;
    fetchPinned(sourceId: string): Promise<SourceMessage[]>;
    fetchThreads(sourceId: string): Promise<SourceThread[]>;
    checkAccessible(sourceId: string): Promise<boolean>;
    verifyCredential(value: string): Promise<CredentialCheckResult>;
    checkProxy(network: NetworkOptions): Promise<CheckResult>;
    setCredential(value: string | null): void;
    setNetworkOptions(options: NetworkOptions): void;
}

/** Write side of the relay: the messaging API posts are delivered to. */
export interface SinkFeed {
    send(destinationId: string, payload: OutboundPayload, threadId: number | null): Promise<void>;
}

export type RenderFn = (
    message: SourceMessage,
    mapping: MappingConfig,
    kind: MessageKind,
    context?: RenderContext,
) => OutboundPayload;

export interface FilterDecision {
    allowed: boolean;
    reason?: string;
}

export interface FilterEngine {
    evaluate(message: SourceMessage): FilterDecision;
}

export type FilterEngineFactory = (config: FilterConfig) => FilterEngine;

/**
 * Persistent settings store shared with the admin collaborator.
 *
 * Methods are synchronous: the shipped implementation sits on an embedded
 * database and every call is a short local transaction.
 */
export interface ConfigRepository {
    loadMappings(): MappingConfig[];
    loadRuntimeOptions(): RuntimeOptions;
    loadNetworkOptions(): NetworkOptions;
    getCredential(): string | null;
    setCredential(value: string): void;

    /** Current persisted cursor of a mapping, or null when it no longer exists. */
    loadCursor(storageId: number): MappingCursor | null;
    setLastSeenId(storageId: number, messageId: string): void;
    setPinnedState(storageId: number, ids: Iterable<string>, synced: boolean): void;
    setForumState(storageId: number, ids: Iterable<string>, synced: boolean): void;
    resetCursor(storageId: number): void;

    loadHealthStatuses(): Map<string, HealthStatus>;
    getHealthRecord(key: string): HealthRecord;
    saveHealthRecord(key: string, status: HealthStatus, message: string | null): void;
    /** Drop per-mapping health records whose source id is not in `sourceIds`. */
    pruneMappingHealth(sourceIds: Iterable<string>): void;

    listAdminChatIds(): string[];
    recordManualForward(activity: ManualForwardActivity): void;
    loadManualForward(): ManualForwardActivity | null;
}

/** Long-running loop run under the supervisor next to the monitor and health loops. */
export interface AdminLoop {
    run(signal: AbortSignal): Promise<void>;
}
