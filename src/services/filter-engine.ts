import type { FilterDecision, FilterEngine, FilterEngineFactory } from '../types/ports.js';
import type { FilterConfig, SourceMessage } from '../types/relay.js';

/** Content categories a message can be matched on by `allowedTypes` / `blockedTypes`. */
export type InferredType = 'text' | 'image' | 'video' | 'audio' | 'attachment' | 'embed' | 'sticker' | 'empty';

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.webp'];
const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.mkv', '.webm'];
const AUDIO_EXTENSIONS = ['.mp3', '.ogg', '.wav', '.flac'];

/** Lowercased username without a leading `@`, or null when blank. */
export function normalizeUsername(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    let normalized = value.trim();
    if (normalized.startsWith('@')) {
        normalized = normalized.slice(1);
    }
    normalized = normalized.trim().toLowerCase();
    return normalized || null;
}

function normalizeTokens(tokens: readonly string[]): string[] {
    const cleaned = new Set<string>();
    for (const token of tokens) {
        const text = token.trim().toLowerCase();
        if (text) cleaned.add(text);
    }
    return [...cleaned];
}

function normalizeTypes(types: readonly string[]): Set<string> {
    return new Set(normalizeTokens(types));
}

/** Split sender entries into numeric ids and normalized usernames. */
function splitSenders(values: readonly string[]): { ids: Set<string>; names: Set<string> } {
    const ids = new Set<string>();
    const names = new Set<string>();
    for (const entry of values) {
        const text = entry.trim();
        if (!text) continue;
        if (/^-?\d+$/.test(text)) {
            ids.add(BigInt(text).toString());
            continue;
        }
        names.add(normalizeUsername(text) ?? text.toLowerCase());
    }
    return { ids, names };
}

export function inferMessageTypes(message: SourceMessage): Set<InferredType> {
    const types = new Set<InferredType>();
    if (message.content) types.add('text');
    if (message.stickers.length > 0) types.add('sticker');

    for (const attachment of message.attachments) {
        const filename = (attachment.filename ?? '').toLowerCase();
        const contentType = (attachment.contentType ?? '').toLowerCase();
        if (IMAGE_EXTENSIONS.some((ext) => filename.endsWith(ext))) types.add('image');
        else if (VIDEO_EXTENSIONS.some((ext) => filename.endsWith(ext))) types.add('video');
        else if (AUDIO_EXTENSIONS.some((ext) => filename.endsWith(ext))) types.add('audio');
        else if (contentType.startsWith('image/')) types.add('image');
        else if (contentType.startsWith('video/')) types.add('video');
        else if (contentType.startsWith('audio/')) types.add('audio');
        else types.add('attachment');
    }

    if (message.embeds.length > 0) types.add('embed');
    if (!message.content && message.attachments.length === 0 && message.embeds.length === 0) {
        types.add('empty');
    }
    return types;
}

function intersects(left: Iterable<string>, right: ReadonlySet<string>): boolean {
    for (const value of left) {
        if (right.has(value)) return true;
    }
    return false;
}

/**
 * Allow/deny evaluation of one mapping's filter profile. Rules run in a fixed
 * order: stickers, senders, roles, whitelist, blacklist, content types.
 */
export class RuleFilterEngine implements FilterEngine {
    readonly #allowedSenders: { ids: Set<string>; names: Set<string> };
    readonly #blockedSenders: { ids: Set<string>; names: Set<string> };
    readonly #allowedRoles: Set<string>;
    readonly #blockedRoles: Set<string>;
    readonly #whitelist: string[];
    readonly #blacklist: string[];
    readonly #allowedTypes: Set<string>;
    readonly #blockedTypes: Set<string>;

    constructor(config: FilterConfig) {
        this.#allowedSenders = splitSenders(config.allowedSenders);
        this.#blockedSenders = splitSenders(config.blockedSenders);
        this.#allowedRoles = new Set(config.allowedRoles.map((role) => role.trim()).filter(Boolean));
        this.#blockedRoles = new Set(config.blockedRoles.map((role) => role.trim()).filter(Boolean));
        this.#whitelist = normalizeTokens(config.whitelist);
        this.#blacklist = normalizeTokens(config.blacklist);
        this.#allowedTypes = normalizeTypes(config.allowedTypes);
        this.#blockedTypes = normalizeTypes(config.blockedTypes);
    }

    evaluate(message: SourceMessage): FilterDecision {
        const lowered = message.content.toLowerCase();
        const authorId = message.authorId.trim();
        const authorName = normalizeUsername(message.authorName);

        if (message.stickers.length > 0) {
            return { allowed: false, reason: 'sticker_blocked' };
        }

        const allowed = this.#allowedSenders;
        if (allowed.ids.size > 0 || allowed.names.size > 0) {
            const matches = allowed.ids.has(authorId) || (authorName !== null && allowed.names.has(authorName));
            if (!matches) return { allowed: false, reason: 'sender_not_allowed' };
        }
        if (this.#blockedSenders.ids.has(authorId)) {
            return { allowed: false, reason: 'sender_blocked' };
        }
        if (authorName !== null && this.#blockedSenders.names.has(authorName)) {
            return { allowed: false, reason: 'sender_blocked' };
        }

        if (this.#allowedRoles.size > 0 && !intersects(message.roleIds, this.#allowedRoles)) {
            return { allowed: false, reason: 'role_not_allowed' };
        }
        if (intersects(message.roleIds, this.#blockedRoles)) {
            return { allowed: false, reason: 'role_blocked' };
        }

        if (this.#whitelist.length > 0 && !this.#whitelist.some((token) => lowered.includes(token))) {
            return { allowed: false, reason: 'whitelist_miss' };
        }
        if (this.#blacklist.some((token) => lowered.includes(token))) {
            return { allowed: false, reason: 'blacklist_hit' };
        }

        const types = inferMessageTypes(message);
        if (this.#allowedTypes.size > 0 && !intersects(types, this.#allowedTypes)) {
            return { allowed: false, reason: 'type_not_allowed' };
        }
        if (this.#blockedTypes.size > 0 && intersects(types, this.#blockedTypes)) {
            return { allowed: false, reason: 'type_blocked' };
        }

        return { allowed: true };
    }
}

export const createFilterEngine: FilterEngineFactory = (config) => new RuleFilterEngine(config);
