import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { pino } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface SensitivePattern {
  name: string;
  expression: RegExp;
  replacement: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Environment keys whose raw values must never reach a log line. */
const SECRET_ENV_KEYS = ['TELEGRAM_BOT_TOKEN', 'SOURCE_TOKEN'];

const SENSITIVE_PATTERNS: readonly SensitivePattern[] = [
  {
    name: 'Telegram bot token',
    expression: /\b\d{6,12}:[A-Za-z0-9_-]{30,}\b/g,
    replacement: '[REDACTED]',
  },
  {
    name: 'Source user/bot token',
    expression: /\b[A-Za-z0-9_-]{23,28}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27,}\b/g,
    replacement: '[REDACTED]',
  },
  {
    name: 'Authorization scheme',
    expression: /\b(Bot|Bearer)\s+[A-Za-z0-9._-]{16,}/g,
    replacement: '$1 [REDACTED]',
  },
  {
    name: 'key=value secret',
    expression: /\b((?:token|password|secret|authorization)\s*[=:]\s*)([^\s,;]+)/gi,
    replacement: '$1[REDACTED]',
  },
  {
    name: 'URL credentials',
    expression: /(\/\/[^:/\s@]+:)[^@/\s]+@/g,
    replacement: '$1[REDACTED]@',
  },
];

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

export const logger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  base: { service: 'channel-relay' },
});

/**
 * Redact credentials from free-form text: known token shapes, `key=value`
 * secrets, proxy credentials embedded in URLs, and the raw values of the
 * secret environment keys.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text;

  for (const key of SECRET_ENV_KEYS) {
    const value = process.env[key]?.trim();
    if (value && value.length >= 8) {
      scrubbed = scrubbed.split(value).join('[REDACTED]');
    }
  }

  for (const pattern of SENSITIVE_PATTERNS) {
    scrubbed = scrubbed.replace(pattern.expression, pattern.replacement);
  }

  return scrubbed;
}

function currentDateIso(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Record an operational event.
 *
 * Entries go to the structured pino stream; when `RELAY_JOURNAL_DIR` is set
 * they are also appended to a daily markdown journal. Never rejects.
 */
export async function logThought(thought: string, level: LogLevel = 'info'): Promise<void> {
  const scrubbed = scrubSensitiveText(thought);
  logger[level](scrubbed);

  const journalDir = process.env.RELAY_JOURNAL_DIR?.trim();
  if (!journalDir) return;

  const now = new Date();
  const journalPath = path.resolve(journalDir, `${currentDateIso(now)}.md`);
  try {
    await mkdir(path.dirname(journalPath), { recursive: true });
    await appendFile(journalPath, `## Thought @ ${now.toISOString()}\n${scrubbed}\n\n`, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`[Logger] Failed to append journal entry: ${message}`);
  }
}

/** Message of an unknown thrown value, scrubbed for logging. */
export function describeError(err: unknown): string {
  return scrubSensitiveText(err instanceof Error ? err.message : String(err));
}
