import type { HealthStatus, HealthUpdate } from '../types/health.js';
import { CREDENTIAL_SUBJECT, mappingSubject, PROXY_SUBJECT } from '../types/health.js';
import type { ConfigRepository, SourceFeed } from '../types/ports.js';
import type { MappingConfig, NetworkOptions, RuntimeOptions } from '../types/relay.js';
import { logThought } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { RateLimiter } from './rate-limiter.js';

export const PROXY_DOWN_MESSAGE = 'check unavailable: dependency down';
export const CREDENTIAL_DOWN_MESSAGE = 'check unavailable: no valid source credential';
export const CREDENTIAL_MISSING_MESSAGE = 'source credential is not set';
export const CHANNEL_UNAVAILABLE_MESSAGE = 'source channel is unavailable or access is denied';

/** Snapshot a health pass runs against. */
export interface HealthPassInput {
    mappings: readonly MappingConfig[];
    runtime: RuntimeOptions;
    network: NetworkOptions;
    credential: string | null;
}

export interface HealthCheckerOptions {
    source: SourceFeed;
    repository: ConfigRepository;
    /** Called after a normalized credential was stored. */
    onConfigChanged: () => void;
    attempts?: number;
    retryDelayMs?: number;
}

export function mappingLabel(mapping: MappingConfig): string {
    return `Mapping ${mapping.label || mapping.sourceId}`;
}

/**
 * Runs one proxy → credential → per-mapping check cycle. A dependency that
 * is down marks everything downstream `unknown` without probing it.
 */
export class HealthChecker {
    readonly #source: SourceFeed;
    readonly #repository: ConfigRepository;
    readonly #onConfigChanged: () => void;
    readonly #attempts: number;
    readonly #retryDelayMs: number;

    constructor(options: HealthCheckerOptions) {
        this.#source = options.source;
        this.#repository = options.repository;
        this.#onConfigChanged = options.onConfigChanged;
        this.#attempts = options.attempts ?? 3;
        this.#retryDelayMs = options.retryDelayMs ?? 1000;
    }

    async run(input: HealthPassInput, signal?: AbortSignal): Promise<HealthUpdate[]> {
        const updates: HealthUpdate[] = [];
        this.#source.setCredential(input.credential);
        this.#source.setNetworkOptions(input.network);

        // Proxy
        const proxyConfigured = Boolean(input.network.proxyUrl);
        let proxyOk = true;
        if (proxyConfigured) {
            const result = await withRetry(() => this.#source.checkProxy(input.network), {
                maxAttempts: this.#attempts,
                baseDelayMs: this.#retryDelayMs,
                accept: (check) => check.ok,
                label: 'health:proxy',
                signal,
            });
            proxyOk = result.ok;
            updates.push({
                key: PROXY_SUBJECT,
                status: result.ok ? 'ok' : 'error',
                message: result.ok ? null : (result.value?.error ?? result.error ?? null),
                label: 'Source proxy',
            });
        } else {
            updates.push({ key: PROXY_SUBJECT, status: 'disabled', message: null, label: 'Source proxy' });
        }

        // Credential
        const credential = (input.credential ?? '').trim();
        let credentialStatus: HealthStatus;
        let credentialMessage: string | null = null;
        if (!proxyOk) {
            credentialStatus = 'unknown';
            credentialMessage = PROXY_DOWN_MESSAGE;
        } else if (!credential) {
            credentialStatus = 'error';
            credentialMessage = CREDENTIAL_MISSING_MESSAGE;
        } else {
            const result = await withRetry(() => this.#source.verifyCredential(credential), {
                maxAttempts: this.#attempts,
                baseDelayMs: this.#retryDelayMs,
                accept: (check) => check.ok,
                label: 'health:credential',
                signal,
            });
            credentialStatus = result.ok ? 'ok' : 'error';
            credentialMessage = result.ok ? null : (result.value?.error ?? result.error ?? null);

            const normalized = result.value?.normalizedValue;
            if (result.ok && normalized && normalized !== credential) {
                this.#repository.setCredential(normalized);
                this.#source.setCredential(normalized);
                void logThought('[Health] Stored the normalized form of the source credential.');
                this.#onConfigChanged();
            }
        }
        updates.push({
            key: CREDENTIAL_SUBJECT,
            status: credentialStatus,
            message: credentialMessage,
            label: 'Source credential',
        });

        // Mappings
        const limiter = new RateLimiter(Math.max(1, input.runtime.ratePerSecond));
        for (const mapping of input.mappings) {
            const key = mappingSubject(mapping.sourceId);
            const label = mappingLabel(mapping);

            if (!mapping.active) {
                updates.push({ key, status: 'disabled', message: null, label });
                continue;
            }
            if (!proxyOk) {
                updates.push({ key, status: 'unknown', message: PROXY_DOWN_MESSAGE, label });
                continue;
            }
            if (credentialStatus !== 'ok') {
                updates.push({ key, status: 'unknown', message: CREDENTIAL_DOWN_MESSAGE, label });
                continue;
            }

            const result = await withRetry(
                async () => {
                    await limiter.wait(signal);
                    return this.#source.checkAccessible(mapping.sourceId);
                },
                {
                    maxAttempts: this.#attempts,
                    baseDelayMs: this.#retryDelayMs,
                    accept: (accessible) => accessible,
                    label: `health:${key}`,
                    signal,
                },
            );
            updates.push({
                key,
                status: result.ok ? 'ok' : 'error',
                message: result.ok ? null : (result.error ?? CHANNEL_UNAVAILABLE_MESSAGE),
                label,
            });
        }

        return updates;
    }
}
