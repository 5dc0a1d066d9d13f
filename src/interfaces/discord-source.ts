import { fetch, ProxyAgent } from 'undici';
import type { Dispatcher, Response } from 'undici';
import { z } from 'zod';
import type { CheckResult, CredentialCheckResult, SourceFeed } from '../types/ports.js';
import type { NetworkOptions, SourceMessage, SourceThread } from '../types/relay.js';
import { KeyedMutex } from '../services/keyed-mutex.js';
import { describeError, logThought } from '../utils/logger.js';

export const SOURCE_API_BASE = 'https://discord.com/api/v10';
const DEFAULT_USER_AGENT = 'ChannelRelay (https://www.npmjs.com, 0.1)';
const REQUEST_TIMEOUT_MS = 15_000;
const PROXY_TIMEOUT_MS = 10_000;
const MAX_PAGE_SIZE = 100;

/** Non-success answer (or transport failure) of the source API. */
export class SourceRequestError extends Error {
    readonly status: number | null;
    readonly endpoint: string;

    constructor(endpoint: string, status: number | null, message: string) {
        super(message);
        this.name = 'SourceRequestError';
        this.endpoint = endpoint;
        this.status = status;
    }
}

const idSchema = z.union([z.string(), z.number()]).transform(String);
const optionalText = z.string().nullish();

const attachmentSchema = z.object({
    url: optionalText,
    proxy_url: optionalText,
    filename: optionalText,
    content_type: optionalText,
});

const embedSchema = z.object({
    title: optionalText,
    description: optionalText,
    url: optionalText,
});

const stickerSchema = z.object({ name: optionalText });

const messageSchema = z.object({
    id: idSchema,
    channel_id: idSchema.nullish(),
    guild_id: idSchema.nullish(),
    author: z
        .object({
            id: idSchema.nullish(),
            username: optionalText,
            global_name: optionalText,
        })
        .nullish(),
    member: z.object({ roles: z.array(idSchema).nullish() }).nullish(),
    content: optionalText,
    attachments: z.array(attachmentSchema).nullish(),
    embeds: z.array(embedSchema).nullish(),
    sticker_items: z.array(stickerSchema).nullish(),
    stickers: z.array(stickerSchema).nullish(),
    timestamp: optionalText,
    type: z.coerce.number().int().catch(0),
});

const threadSchema = z.object({
    id: idSchema,
    name: optionalText,
    parent_id: idSchema.nullish(),
});

const threadListSchema = z.object({ threads: z.array(threadSchema).catch([]) });
const channelSchema = z.object({ id: idSchema, guild_id: idSchema.nullish() });
const userSchema = z.object({ id: idSchema.nullish(), bot: z.boolean().nullish() });

type MessagePayload = z.infer<typeof messageSchema>;

function toText(value: string | null | undefined): string | undefined {
    return value ?? undefined;
}

export function parseSourceMessage(payload: MessagePayload, channelId: string): SourceMessage {
    const stickers = payload.sticker_items ?? payload.stickers ?? [];
    return {
        id: payload.id,
        channelId: payload.channel_id ?? channelId,
        guildId: payload.guild_id ?? null,
        authorId: payload.author?.id ?? '0',
        authorName: payload.author?.global_name || payload.author?.username || 'Unknown',
        content: payload.content ?? '',
        attachments: (payload.attachments ?? []).map((item) => ({
            url: toText(item.url),
            proxyUrl: toText(item.proxy_url),
            filename: toText(item.filename),
            contentType: toText(item.content_type),
        })),
        embeds: (payload.embeds ?? []).map((item) => ({
            title: toText(item.title),
            description: toText(item.description),
            url: toText(item.url),
        })),
        stickers: stickers.map((sticker) => sticker.name ?? 'sticker'),
        roleIds: payload.member?.roles ?? [],
        timestamp: payload.timestamp ?? null,
        messageType: payload.type,
    };
}

/** Entries of a JSON array that match `schema`; anything else is dropped. */
function parseArray<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T>[] {
    if (!Array.isArray(data)) return [];
    const parsed: z.infer<T>[] = [];
    for (const entry of data) {
        const result = schema.safeParse(entry);
        if (result.success) parsed.push(result.data);
    }
    return parsed;
}

/** Authorization header values tried, in order, for a raw credential. */
export function credentialCandidates(value: string): string[] {
    const candidate = value.trim();
    if (!candidate) return [];
    const lowered = candidate.toLowerCase();
    if (lowered.startsWith('bot ') || lowered.startsWith('bearer ')) return [candidate];
    return [candidate, `Bot ${candidate}`];
}

/**
 * REST client of the source platform. Requests are serialized, go through the
 * configured proxy and time out after 15 seconds.
 */
export class DiscordSource implements SourceFeed {
    #credential: string | null = null;
    #network: NetworkOptions = { proxyUrl: null, proxyLogin: null, proxyPassword: null, userAgent: null };
    #dispatcher: Dispatcher | undefined;
    readonly #serial = new KeyedMutex();
    readonly #guildByChannel: Map<string, string | null> = new Map();
    readonly #apiBase: string;

    constructor(options: { apiBase?: string } = {}) {
        this.#apiBase = options.apiBase ?? SOURCE_API_BASE;
    }

    setCredential(value: string | null): void {
        this.#credential = value?.trim() || null;
    }

    setNetworkOptions(options: NetworkOptions): void {
        this.#network = options;
        this.#dispatcher = buildDispatcher(options);
    }

    async fetchSince(sourceId: string, cursor: string | null, limit: number): Promise<SourceMessage[]> {
        const params = new URLSearchParams({ limit: String(Math.max(1, Math.min(limit, MAX_PAGE_SIZE))) });
        if (cursor !== null) params.set('after', cursor);
        const data = await this.#get(`/channels/${sourceId}/messages?${params.toString()}`);
        return parseArray(messageSchema, data).map((payload) => parseSourceMessage(payload, sourceId));
    }

    async fetchPinned(sourceId: string): Promise<SourceMessage[]> {
        const data = await this.#get(`/channels/${sourceId}/pins`);
        return parseArray(messageSchema, data).map((payload) => parseSourceMessage(payload, sourceId));
    }

    /** Active threads of the forum's guild plus its archived public threads. */
    async fetchThreads(sourceId: string): Promise<SourceThread[]> {
        const threads = new Map<string, SourceThread>();
        const guildId = await this.#resolveGuild(sourceId);

        if (guildId) {
            const active = threadListSchema.safeParse(await this.#get(`/guilds/${guildId}/threads/active`));
            for (const entry of active.success ? active.data.threads : []) {
                if (entry.parent_id !== sourceId) continue;
                threads.set(entry.id, { id: entry.id, name: entry.name ?? '', parentId: sourceId });
            }
        }

        const archived = threadListSchema.safeParse(await this.#get(`/channels/${sourceId}/threads/archived/public`));
        for (const entry of archived.success ? archived.data.threads : []) {
            if (threads.has(entry.id)) continue;
            threads.set(entry.id, { id: entry.id, name: entry.name ?? '', parentId: entry.parent_id ?? sourceId });
        }

        return [...threads.values()];
    }

    async checkAccessible(sourceId: string): Promise<boolean> {
        try {
            await this.#get(`/channels/${sourceId}`);
            return true;
        } catch (err) {
            if (err instanceof SourceRequestError && err.status !== null && [401, 403, 404].includes(err.status)) {
                void logThought(`[DiscordSource] Channel ${sourceId} is not accessible (${err.status}).`);
                return false;
            }
            throw err;
        }
    }

    async verifyCredential(value: string): Promise<CredentialCheckResult> {
        const candidates = credentialCandidates(value);
        if (candidates.length === 0) {
            return { ok: false, error: 'credential is empty' };
        }

        let lastError = 'the source rejected the credential';
        for (const candidate of candidates) {
            let response: Response;
            try {
                response = await this.#request('/users/@me', candidate, REQUEST_TIMEOUT_MS, this.#dispatcher);
            } catch (err) {
                void logThought(`[DiscordSource] Credential check failed: ${describeError(err)}`, 'warn');
                return { ok: false, error: 'could not reach the source API; check the network or proxy' };
            }

            if (response.status === 200) {
                const user = userSchema.safeParse(await response.json());
                const isBot = user.success && user.data.bot === true;
                const hasBotPrefix = candidate.toLowerCase().startsWith('bot ');
                let normalizedValue = candidate;
                if (isBot && !hasBotPrefix) normalizedValue = `Bot ${value.trim()}`;
                if (!isBot && hasBotPrefix) normalizedValue = candidate.slice('bot '.length).trim();
                return { ok: true, normalizedValue };
            }

            await response.arrayBuffer();
            lastError =
                response.status === 401
                    ? 'the source rejected the credential (401)'
                    : `the source answered with status ${response.status}`;
        }
        return { ok: false, error: lastError };
    }

    async checkProxy(network: NetworkOptions): Promise<CheckResult> {
        if (!network.proxyUrl) return { ok: true };

        let response: Response;
        try {
            response = await this.#request('/gateway', null, PROXY_TIMEOUT_MS, buildDispatcher(network), network);
        } catch (err) {
            void logThought(`[DiscordSource] Proxy check failed: ${describeError(err)}`, 'warn');
            return { ok: false, error: 'could not connect through the proxy; check its address' };
        }
        await response.arrayBuffer();

        if (response.status === 200) return { ok: true };
        if (response.status === 401 || response.status === 407) {
            return { ok: false, error: 'the proxy refused the connection; check its login and password' };
        }
        return { ok: false, error: `the proxy answered with status ${response.status}` };
    }

    async #resolveGuild(channelId: string): Promise<string | null> {
        const cached = this.#guildByChannel.get(channelId);
        if (cached !== undefined) return cached;

        const channel = channelSchema.safeParse(await this.#get(`/channels/${channelId}`));
        const guildId = channel.success ? (channel.data.guild_id ?? null) : null;
        this.#guildByChannel.set(channelId, guildId);
        return guildId;
    }

    async #get(endpoint: string): Promise<unknown> {
        const credential = this.#credential;
        if (!credential) {
            throw new SourceRequestError(endpoint, null, 'no source credential is configured');
        }

        return this.#serial.runExclusive('api', async () => {
            let response: Response;
            try {
                response = await this.#request(endpoint, credential, REQUEST_TIMEOUT_MS, this.#dispatcher);
            } catch (err) {
                throw new SourceRequestError(endpoint, null, `request to ${endpoint} failed: ${describeError(err)}`);
            }
            if (!response.ok) {
                await response.arrayBuffer();
                throw new SourceRequestError(
                    endpoint,
                    response.status,
                    `source answered ${response.status} for ${endpoint}`,
                );
            }
            return response.json();
        });
    }

    #request(
        endpoint: string,
        credential: string | null,
        timeoutMs: number,
        dispatcher: Dispatcher | undefined,
        network: NetworkOptions = this.#network,
    ): Promise<Response> {
        const headers: Record<string, string> = {
            Accept: 'application/json',
            'User-Agent': network.userAgent || DEFAULT_USER_AGENT,
        };
        if (credential) headers.Authorization = credential;

        return fetch(`${this.#apiBase}${endpoint}`, {
            headers,
            dispatcher,
            signal: AbortSignal.timeout(timeoutMs),
        });
    }
}

function buildDispatcher(network: NetworkOptions): Dispatcher | undefined {
    if (!network.proxyUrl) return undefined;
    if (!network.proxyLogin) return new ProxyAgent(network.proxyUrl);

    const basic = Buffer.from(`${network.proxyLogin}:${network.proxyPassword ?? ''}`).toString('base64');
    return new ProxyAgent({ uri: network.proxyUrl, token: `Basic ${basic}` });
}
