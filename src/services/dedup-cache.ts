import type { SourceAttachment, SourceEmbed, SourceMessage } from '../types/relay.js';

const DEFAULT_CAPACITY = 512;

/**
 * Bounded recency set of payload signatures shared by every mapping.
 * Entries are evicted in insertion order once the capacity is exceeded.
 */
export class DedupCache {
    readonly #capacity: number;
    readonly #known: Set<string> = new Set();

    constructor(capacity: number = DEFAULT_CAPACITY) {
        this.#capacity = Math.max(1, Math.floor(capacity));
    }

    get capacity(): number {
        return this.#capacity;
    }

    get size(): number {
        return this.#known.size;
    }

    /** Check-and-record in one step: true for a repeat, false (and recorded) otherwise. */
    isDuplicate(signature: string | null | undefined): boolean {
        if (!signature) return false;
        return !this.remember(signature);
    }

    /** Whether `signature` was already forwarded. Empty signatures never match. */
    has(signature: string | null | undefined): boolean {
        return signature ? this.#known.has(signature) : false;
    }

    /**
     * Records a forwarded signature. Returns false when it was already known,
     * and for empty signatures, which are never stored.
     */
    remember(signature: string | null | undefined): boolean {
        if (!signature || this.#known.has(signature)) {
            return false;
        }

        this.#known.add(signature);
        if (this.#known.size > this.#capacity) {
            const oldest = this.#known.values().next();
            if (!oldest.done) {
                this.#known.delete(oldest.value);
            }
        }
        return true;
    }
}

function attachmentToken(attachment: SourceAttachment): string | null {
    const url = (attachment.url || attachment.proxyUrl || '').trim();
    const filename = (attachment.filename ?? '').trim();
    if (!url && !filename) return null;
    return `${filename}|${url}`;
}

function embedToken(embed: SourceEmbed): string | null {
    const parts = [(embed.title ?? '').trim(), (embed.description ?? '').trim()].filter(Boolean);
    const combined = parts.join('\n').trim();
    return combined || null;
}

function sortedTokens<T>(items: readonly T[], toToken: (item: T) => string | null): string[] {
    const tokens: string[] = [];
    for (const item of items) {
        const token = toToken(item);
        if (token) tokens.push(token);
    }
    return tokens.sort();
}

/**
 * Normalized fingerprint of a message payload: trimmed text, then sorted
 * attachment and embed tokens. Returns null for a payload with nothing in it.
 */
export function buildMessageSignature(message: SourceMessage): string | null {
    const content = message.content.trim();
    const attachments = sortedTokens(message.attachments, attachmentToken);
    const embeds = sortedTokens(message.embeds, embedToken);

    const parts: string[] = [];
    if (content) parts.push(content);
    if (attachments.length > 0) parts.push(`attachments:${attachments.join('|')}`);
    if (embeds.length > 0) parts.push(`embeds:${embeds.join('|')}`);

    return parts.length > 0 ? parts.join('\n') : null;
}
