/**
 * Centralized registry of all environment and secret keys consumed by the relay.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'recommended' | 'optional'. A missing
 *                   recommended key is reported but does not block startup.
 *   - `scope`       Subsystem that owns the key.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'recommended' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'source' | 'messaging' | 'storage';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  description: string;
  remediation: string;
}

/**
 * Complete inventory of environment and secret keys.
 * Consumed by `validateRuntimeConfig` at startup.
 */
export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Messaging: destination bot ──────────────────────────────────────────────
  {
    key: 'TELEGRAM_BOT_TOKEN',
    type: 'secret',
    class: 'required',
    scope: 'messaging',
    description: 'Bot API token used to deliver relayed posts and admin notifications.',
    remediation:
      'Set TELEGRAM_BOT_TOKEN in your .env file. Create a bot at https://t.me/BotFather.',
  },
  {
    key: 'RELAY_ADMIN_CHAT_IDS',
    type: 'env',
    class: 'recommended',
    scope: 'messaging',
    description:
      'Comma-separated chat ids that receive health notifications. Seeded into the admins table on startup.',
    remediation: 'Set RELAY_ADMIN_CHAT_IDS to numeric chat ids, e.g. RELAY_ADMIN_CHAT_IDS=12345,-100200300.',
  },

  // ── Source ──────────────────────────────────────────────────────────────────
  {
    key: 'SOURCE_TOKEN',
    type: 'secret',
    class: 'optional',
    scope: 'source',
    description:
      'Source API credential. Only used to seed the stored credential when none is stored yet.',
    remediation: 'Set SOURCE_TOKEN once, or store the credential in the settings table.',
  },

  // ── Storage ─────────────────────────────────────────────────────────────────
  {
    key: 'RELAY_DB_PATH',
    type: 'env',
    class: 'optional',
    scope: 'storage',
    description: 'Path of the SQLite database holding mappings, cursors and health (default: data/relay.db).',
    remediation: 'Set RELAY_DB_PATH to a writable file path.',
  },

  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'LOG_LEVEL',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Minimum log level: debug, info, warn or error (default: info).',
    remediation: 'Set LOG_LEVEL to one of debug, info, warn, error.',
  },
  {
    key: 'RELAY_JOURNAL_DIR',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Directory receiving a daily markdown journal of log entries. Disabled when unset.',
    remediation: 'Set RELAY_JOURNAL_DIR to a writable directory, e.g. RELAY_JOURNAL_DIR=memory.',
  },
  {
    key: 'SUPERVISOR_RETRY_MS',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Delay before a failed background loop is restarted, in milliseconds (default: 5000).',
    remediation: 'Set SUPERVISOR_RETRY_MS to a positive integer, e.g. SUPERVISOR_RETRY_MS=5000.',
  },
] as const;

/** Quick lookup map by key name for O(1) resolution. */
export const CONFIG_SCHEMA_MAP: ReadonlyMap<string, ConfigKeySpec> = new Map(
  CONFIG_SCHEMA.map((spec) => [spec.key, spec]),
);
