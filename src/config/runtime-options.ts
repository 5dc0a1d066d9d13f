import type { RuntimeOptions } from '../types/relay.js';
import { DEFAULT_RUNTIME_OPTIONS } from '../types/relay.js';

/** Setting keys read by {@link buildRuntimeOptions}. */
export const RUNTIME_SETTING_KEYS = {
    poll: 'runtime.poll',
    rate: 'runtime.rate',
    legacySourceRate: 'runtime.discord_rate',
    legacySinkRate: 'runtime.telegram_rate',
    delayMin: 'runtime.delay_min',
    delayMax: 'runtime.delay_max',
    healthInterval: 'runtime.health_interval',
    deduplicate: 'runtime.deduplicate_messages',
} as const;

export const MIN_HEALTH_INTERVAL_MS = 10_000;

const TRUTHY = new Set(['on', 'true', 'yes', '1']);
const FALSY = new Set(['off', 'false', 'no', '0']);

export type SettingReader = (key: string) => string | null;

function parseNumber(value: string | null): number | null {
    if (value === null) return null;
    const trimmed = value.trim();
    if (!trimmed) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a jitter bound in milliseconds. A plain integer is taken as
 * milliseconds, a decimal (or exponent) form as seconds. Negative values
 * clamp to 0, garbage yields `fallbackMs`.
 *
 * @example
 * parseDelaySetting('250');  // 250
 * parseDelaySetting('1.5');  // 1500
 */
export function parseDelaySetting(value: string | null, fallbackMs = 0): number {
    if (value === null) return fallbackMs;
    const trimmed = value.trim();
    if (!trimmed) return fallbackMs;

    if (/[.eE]/.test(trimmed)) {
        const seconds = Number(trimmed);
        return Number.isFinite(seconds) ? Math.max(0, Math.round(seconds * 1000)) : fallbackMs;
    }
    if (!/^[+-]?\d+$/.test(trimmed)) {
        return fallbackMs;
    }
    return Math.max(0, Number(trimmed));
}

/** on/true/yes/1 and off/false/no/0, case-insensitive; anything else is `fallback`. */
export function parseBool(value: string | null, fallback = false): boolean {
    if (value === null) return fallback;
    const normalized = value.trim().toLowerCase();
    if (TRUTHY.has(normalized)) return true;
    if (FALSY.has(normalized)) return false;
    return fallback;
}

/** Build the runtime options from stored string settings. Called on every reload. */
export function buildRuntimeOptions(read: SettingReader): RuntimeOptions {
    const defaults = DEFAULT_RUNTIME_OPTIONS;

    const storedRate = read(RUNTIME_SETTING_KEYS.rate);
    let ratePerSecond: number;
    if (storedRate !== null) {
        ratePerSecond = parseNumber(storedRate) ?? defaults.ratePerSecond;
    } else {
        const sourceRate = parseNumber(read(RUNTIME_SETTING_KEYS.legacySourceRate)) ?? defaults.ratePerSecond;
        const sinkRate = parseNumber(read(RUNTIME_SETTING_KEYS.legacySinkRate)) ?? sourceRate;
        ratePerSecond = Math.max(sourceRate, sinkRate);
    }

    const minDelayMs = parseDelaySetting(read(RUNTIME_SETTING_KEYS.delayMin), defaults.minDelayMs);
    const maxDelayMs = Math.max(
        minDelayMs,
        parseDelaySetting(read(RUNTIME_SETTING_KEYS.delayMax), defaults.maxDelayMs),
    );

    const pollSeconds = parseNumber(read(RUNTIME_SETTING_KEYS.poll));
    const healthSeconds = parseNumber(read(RUNTIME_SETTING_KEYS.healthInterval));

    return {
        pollIntervalMs: pollSeconds === null ? defaults.pollIntervalMs : Math.max(0, pollSeconds * 1000),
        minDelayMs,
        maxDelayMs,
        ratePerSecond,
        healthCheckIntervalMs: Math.max(
            MIN_HEALTH_INTERVAL_MS,
            healthSeconds === null ? defaults.healthCheckIntervalMs : healthSeconds * 1000,
        ),
        deduplicateMessages: parseBool(read(RUNTIME_SETTING_KEYS.deduplicate), defaults.deduplicateMessages),
    };
}
