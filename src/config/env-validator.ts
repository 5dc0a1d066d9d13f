/**
 * Unified runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for:
 *   - Missing required config keys.
 *   - Missing recommended config keys (reported, never fatal).
 *   - Format/type violations on plain env vars.
 *
 * No secret values are ever included in the output.
 */

import { z } from 'zod';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { logThought } from '../utils/logger.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'missing_recommended' | 'format_error';

export interface ConfigIssue {
  /** Affected config key. */
  key: string;
  /** Semantic category for automation. */
  class: ConfigIssueClass;
  /** Human-readable description of the problem. */
  message: string;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when the runtime is configured well enough to operate. */
  ok: boolean;
  /** Keys in a healthy state. */
  presentKeys: string[];
  /** Structured issues — guaranteed not to contain secret values. */
  issues: ConfigIssue[];
  /** Subset of issues that prevent startup. */
  fatalIssues: ConfigIssue[];
  /** ISO-8601 timestamp of validation run. */
  validatedAt: string;
}

/** Settings the process is started with, resolved from the environment. */
export interface RelayEnvironment {
  telegramToken: string;
  sourceToken: string | null;
  dbPath: string;
  adminChatIds: string[];
  supervisorRetryMs: number;
}

export class ConfigValidationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(`Runtime config validation failed: ${issues.map((i) => i.message).join(' | ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

const DEFAULT_DB_PATH = 'data/relay.db';
const DEFAULT_SUPERVISOR_RETRY_MS = 5000;

const CHAT_ID = /^-?\d+$/;

const FORMAT_RULES: Readonly<Record<string, z.ZodType<string>>> = {
  RELAY_ADMIN_CHAT_IDS: z
    .string()
    .refine(
      (value) => splitList(value).every((entry) => CHAT_ID.test(entry)),
      'must be a comma-separated list of numeric chat ids',
    ),
  LOG_LEVEL: z
    .string()
    .refine(
      (value) => ['debug', 'info', 'warn', 'error'].includes(value.toLowerCase()),
      "must be one of 'debug', 'info', 'warn', 'error'",
    ),
  SUPERVISOR_RETRY_MS: z
    .string()
    .refine((value) => /^\d+$/.test(value) && Number(value) > 0, 'must be a positive integer'),
};

// ── Internal helpers ─────────────────────────────────────────────────────────

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function readEnv(key: string): string | null {
  const raw = process.env[key];
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Validate additional format constraints for known env vars.
 * Returns an issue string if invalid, null if ok. Secrets are never echoed.
 */
function formatError(spec: ConfigKeySpec): string | null {
  if (spec.type !== 'env') {
    return null;
  }

  const raw = readEnv(spec.key);
  const rule = FORMAT_RULES[spec.key];
  if (raw === null || !rule) {
    return null;
  }

  const parsed = rule.safeParse(raw);
  if (parsed.success) {
    return null;
  }
  const reason = parsed.error.issues[0]?.message ?? 'is invalid';
  return `${spec.key} ${reason}, got '${raw}'.`;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate the runtime configuration against the schema.
 *
 * @param now - Injectable clock (ISO-8601 source). Defaults to `new Date()`.
 */
export function validateRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const present = readEnv(spec.key) !== null;

    if (present) {
      presentKeys.push(spec.key);
    }

    const formatErr = formatError(spec);
    if (formatErr) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: formatErr,
        remediation: spec.remediation,
      });
      continue;
    }

    if (!present && spec.class === 'required') {
      issues.push({
        key: spec.key,
        class: 'missing_required',
        message: `Required config key '${spec.key}' is missing. ${spec.description}`,
        remediation: spec.remediation,
      });
    } else if (!present && spec.class === 'recommended') {
      issues.push({
        key: spec.key,
        class: 'missing_recommended',
        message: `Recommended config key '${spec.key}' is not set. ${spec.description}`,
        remediation: spec.remediation,
      });
    }
  }

  const fatalIssues = issues.filter((i) => i.class !== 'missing_recommended');

  return {
    ok: fatalIssues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    fatalIssues,
    validatedAt: now().toISOString(),
  };
}

/**
 * Run the runtime config validation and throw when fatal issues exist.
 *
 * Safe to call during startup. Never exposes secret values in the thrown error.
 *
 * @throws ConfigValidationError with actionable, redaction-safe message when fatal issues are found.
 */
export function assertRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const result = validateRuntimeConfig(now);

  if (result.fatalIssues.length > 0) {
    throw new ConfigValidationError(result.fatalIssues);
  }

  return result;
}

/** Validate and resolve the process settings, applying defaults. */
export function resolveRelayEnvironment(): RelayEnvironment {
  const validation = assertRuntimeConfig();
  for (const issue of validation.issues) {
    if (issue.class === 'missing_recommended') {
      void logThought(`[Config] ${issue.message} ${issue.remediation}`, 'warn');
    }
  }

  const telegramToken = readEnv('TELEGRAM_BOT_TOKEN');
  if (telegramToken === null) {
    throw new ConfigValidationError([
      {
        key: 'TELEGRAM_BOT_TOKEN',
        class: 'missing_required',
        message: "Required config key 'TELEGRAM_BOT_TOKEN' is missing.",
        remediation: 'Set TELEGRAM_BOT_TOKEN in your .env file.',
      },
    ]);
  }

  const retry = readEnv('SUPERVISOR_RETRY_MS');
  const admins = readEnv('RELAY_ADMIN_CHAT_IDS');

  return {
    telegramToken,
    sourceToken: readEnv('SOURCE_TOKEN'),
    dbPath: readEnv('RELAY_DB_PATH') ?? DEFAULT_DB_PATH,
    adminChatIds: admins === null ? [] : splitList(admins),
    supervisorRetryMs: retry === null ? DEFAULT_SUPERVISOR_RETRY_MS : Number(retry),
  };
}
