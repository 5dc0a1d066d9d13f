import type { HealthStatus } from './health.js';

/** How a mapping watches its source channel. */
export type MonitoringMode = 'stream' | 'pinned' | 'forum';

/** Tag passed to the renderer so the destination can tell the origin of a post. */
export type MessageKind = 'message' | 'pinned' | 'forum_thread';

export interface SourceAttachment {
    url?: string;
    proxyUrl?: string;
    filename?: string;
    contentType?: string;
}

export interface SourceEmbed {
    title?: string;
    description?: string;
    url?: string;
}

/** Subset of a source message payload used by the relay. */
export interface SourceMessage {
    id: string;
    channelId: string;
    guildId: string | null;
    authorId: string;
    authorName: string;
    content: string;
    attachments: SourceAttachment[];
    embeds: SourceEmbed[];
    /** Sticker names; any sticker blocks forwarding. */
    stickers: string[];
    roleIds: string[];
    /** ISO-8601 creation time as reported by the source. */
    timestamp: string | null;
    messageType: number;
}

export interface SourceThread {
    id: string;
    name: string;
    parentId: string;
}

/** Allow/deny lists applied by the filter engine. */
export interface FilterConfig {
    whitelist: string[];
    blacklist: string[];
    allowedSenders: string[];
    blockedSenders: string[];
    allowedTypes: string[];
    blockedTypes: string[];
    allowedRoles: string[];
    blockedRoles: string[];
}

export type FilterType = keyof FilterConfig;

export type AttachmentsStyle = 'summary' | 'links';

/** Options affecting the destination rendering of one mapping. */
export interface FormattingProfile {
    disablePreview: boolean;
    maxLength: number;
    attachmentsStyle: AttachmentsStyle;
    showSourceLink: boolean;
}

/**
 * Durable progress of a mapping. Every mode keeps its own part so switching
 * modes does not lose progress of the other ones.
 */
export interface MappingCursor {
    lastSeenId: string | null;
    knownPinnedIds: Set<string>;
    pinnedSynced: boolean;
    knownThreadIds: Set<string>;
    forumSynced: boolean;
}

/** One configured source → destination binding, as loaded for a pass. */
export interface MappingConfig {
    readonly storageId: number;
    readonly sourceId: string;
    readonly destinationId: string;
    readonly destinationThreadId: number | null;
    readonly label: string;
    readonly active: boolean;
    readonly createdAt: Date;
    /** Per-mapping dedup override; `null` inherits the runtime default. */
    readonly deduplicate: boolean | null;
    readonly filters: FilterConfig;
    readonly formatting: FormattingProfile;
    readonly mode: MonitoringMode;
    readonly healthStatus: HealthStatus;
    readonly blockedByHealth: boolean;
    /** Advanced in place by the sync engine after each persisted step. */
    cursor: MappingCursor;
}

export interface RuntimeOptions {
    pollIntervalMs: number;
    minDelayMs: number;
    maxDelayMs: number;
    ratePerSecond: number;
    healthCheckIntervalMs: number;
    deduplicateMessages: boolean;
}

export interface NetworkOptions {
    proxyUrl: string | null;
    proxyLogin: string | null;
    proxyPassword: string | null;
    userAgent: string | null;
}

/** Destination-native payload produced by the renderer. */
export interface OutboundPayload {
    text: string;
    extraMessages: string[];
    parseMode: 'HTML' | null;
    disablePreview: boolean;
    imageUrls: string[];
}

export interface RenderContext {
    threadTitle?: string;
}

export interface ManualForwardEntry {
    sourceId: string;
    label: string;
    forwarded: number;
    mode: MonitoringMode;
    note: string;
}

/** Audit record of the latest manual "forward recent" invocation. */
export interface ManualForwardActivity {
    timestamp: string;
    requested: number;
    limit: number;
    totalForwarded: number;
    entries: ManualForwardEntry[];
}

export function emptyFilterConfig(): FilterConfig {
    return {
        whitelist: [],
        blacklist: [],
        allowedSenders: [],
        blockedSenders: [],
        allowedTypes: [],
        blockedTypes: [],
        allowedRoles: [],
        blockedRoles: [],
    };
}

export function emptyCursor(): MappingCursor {
    return {
        lastSeenId: null,
        knownPinnedIds: new Set(),
        pinnedSynced: false,
        knownThreadIds: new Set(),
        forumSynced: false,
    };
}

export const DEFAULT_FORMATTING: FormattingProfile = {
    disablePreview: true,
    maxLength: 3500,
    attachmentsStyle: 'summary',
    showSourceLink: false,
};

export const DEFAULT_RUNTIME_OPTIONS: RuntimeOptions = {
    pollIntervalMs: 2000,
    minDelayMs: 0,
    maxDelayMs: 0,
    ratePerSecond: 8,
    healthCheckIntervalMs: 180_000,
    deduplicateMessages: false,
};
