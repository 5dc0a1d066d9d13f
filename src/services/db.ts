import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { buildRuntimeOptions, parseBool } from '../config/runtime-options.js';
import type { HealthRecord, HealthStatus } from '../types/health.js';
import { isHealthStatus, MAPPING_SUBJECT_PREFIX, mappingSubject } from '../types/health.js';
import type { ConfigRepository } from '../types/ports.js';
import type {
  AttachmentsStyle,
  FilterConfig,
  FilterType,
  FormattingProfile,
  ManualForwardActivity,
  MappingConfig,
  MappingCursor,
  MonitoringMode,
  NetworkOptions,
  RuntimeOptions,
} from '../types/relay.js';
import { DEFAULT_FORMATTING, emptyFilterConfig } from '../types/relay.js';

export const SETTING_KEYS = {
  credential: 'source.token',
  proxyUrl: 'network.proxy_url',
  proxyLogin: 'network.proxy_login',
  proxyPassword: 'network.proxy_password',
  userAgent: 'network.user_agent',
  manualForward: 'manual.last_forward',
} as const;

/** Per-mapping option keys; the same names under `formatting.` act as global defaults. */
export type MappingOptionKey =
  | 'deduplicate'
  | 'disable_preview'
  | 'max_length'
  | 'attachments_style'
  | 'show_source_link';

export const FILTER_TYPES: readonly FilterType[] = [
  'whitelist',
  'blacklist',
  'allowedSenders',
  'blockedSenders',
  'allowedTypes',
  'blockedTypes',
  'allowedRoles',
  'blockedRoles',
];

const MONITORING_MODES: readonly MonitoringMode[] = ['stream', 'pinned', 'forum'];

export interface NewMapping {
  sourceId: string;
  destinationId: string;
  destinationThreadId?: number | null;
  label?: string;
  mode?: MonitoringMode;
  createdAt?: Date;
}

type MappingRow = {
  id: number;
  source_id: string;
  destination_id: string;
  destination_thread_id: number | null;
  label: string;
  active: number;
  mode: string;
  last_seen_id: string | null;
  known_pinned_ids: string;
  pinned_synced: number;
  known_thread_ids: string;
  forum_synced: number;
  created_at: string;
};

type CursorRow = Pick<
  MappingRow,
  'last_seen_id' | 'known_pinned_ids' | 'pinned_synced' | 'known_thread_ids' | 'forum_synced'
>;
type OptionRow = { mapping_id: number; option_key: string; value: string };
type FilterRow = { mapping_id: number; filter_type: string; value: string };
type HealthRow = { subject: string; status: string; message: string | null; updated_at: string };

const idListSchema = z.array(z.string());

const manualForwardSchema = z.object({
  timestamp: z.string(),
  requested: z.number().int(),
  limit: z.number().int(),
  totalForwarded: z.number().int(),
  entries: z.array(
    z.object({
      sourceId: z.string(),
      label: z.string(),
      forwarded: z.number().int(),
      mode: z.enum(['stream', 'pinned', 'forum']),
      note: z.string(),
    }),
  ),
});

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS admins (
    chat_id TEXT PRIMARY KEY,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS mappings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_id TEXT NOT NULL UNIQUE,
    destination_id TEXT NOT NULL,
    destination_thread_id INTEGER,
    label TEXT NOT NULL DEFAULT '',
    active INTEGER NOT NULL DEFAULT 1,
    mode TEXT NOT NULL DEFAULT 'stream',
    last_seen_id TEXT,
    known_pinned_ids TEXT NOT NULL DEFAULT '[]',
    pinned_synced INTEGER NOT NULL DEFAULT 0,
    known_thread_ids TEXT NOT NULL DEFAULT '[]',
    forum_synced INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS mapping_options (
    mapping_id INTEGER NOT NULL,
    option_key TEXT NOT NULL,
    value TEXT NOT NULL,
    PRIMARY KEY(mapping_id, option_key),
    FOREIGN KEY(mapping_id) REFERENCES mappings(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS filters (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    mapping_id INTEGER NOT NULL,
    filter_type TEXT NOT NULL,
    value TEXT NOT NULL,
    UNIQUE(mapping_id, filter_type, value),
    FOREIGN KEY(mapping_id) REFERENCES mappings(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS health_records (
    subject TEXT PRIMARY KEY,
    status TEXT NOT NULL,
    message TEXT,
    updated_at TEXT NOT NULL
  );
`;

function parseIdList(raw: string): Set<string> {
  try {
    const parsed = idListSchema.safeParse(JSON.parse(raw));
    return new Set(parsed.success ? parsed.data : []);
  } catch {
    return new Set();
  }
}

function cursorFromRow(row: CursorRow): MappingCursor {
  return {
    lastSeenId: row.last_seen_id,
    knownPinnedIds: parseIdList(row.known_pinned_ids),
    pinnedSynced: row.pinned_synced === 1,
    knownThreadIds: parseIdList(row.known_thread_ids),
    forumSynced: row.forum_synced === 1,
  };
}

function serializeIdList(ids: Iterable<string>): string {
  return JSON.stringify([...new Set(ids)].sort());
}

function isFilterType(value: string): value is FilterType {
  return FILTER_TYPES.some((type) => type === value);
}

function toMode(value: string): MonitoringMode {
  return MONITORING_MODES.find((mode) => mode === value) ?? 'stream';
}

function toAttachmentsStyle(value: string | undefined, fallback: AttachmentsStyle): AttachmentsStyle {
  return value === 'summary' || value === 'links' ? value : fallback;
}

function blankToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * SQLite-backed settings store shared by the relay core and the admin
 * collaborator. Pass `':memory:'` for an ephemeral database.
 */
export class SqliteConfigRepository implements ConfigRepository {
  readonly db: Database.Database;
  readonly #now: () => Date;

  constructor(dbPath: string, options: { now?: () => Date } = {}) {
    if (dbPath !== ':memory:') {
      const resolved = path.resolve(dbPath);
      if (!fs.existsSync(path.dirname(resolved))) {
        fs.mkdirSync(path.dirname(resolved), { recursive: true });
      }
      this.db = new Database(resolved);
      this.db.pragma('journal_mode = WAL');
    } else {
      this.db = new Database(':memory:');
    }
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA_SQL);
    this.#now = options.now ?? (() => new Date());
  }

  close(): void {
    this.db.close();
  }

  // ── Settings ──────────────────────────────────────────────────────────────

  getSetting(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?')
      .get(key);
    return row?.value ?? null;
  }

  setSetting(key: string, value: string): void {
    this.db
      .prepare(`
        INSERT INTO settings (key, value, updated_at) VALUES (?, ?, CURRENT_TIMESTAMP)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = CURRENT_TIMESTAMP
      `)
      .run(key, value);
  }

  deleteSetting(key: string): void {
    this.db.prepare('DELETE FROM settings WHERE key = ?').run(key);
  }

  getCredential(): string | null {
    return blankToNull(this.getSetting(SETTING_KEYS.credential));
  }

  setCredential(value: string): void {
    this.setSetting(SETTING_KEYS.credential, value.trim());
  }

  loadRuntimeOptions(): RuntimeOptions {
    return buildRuntimeOptions((key) => this.getSetting(key));
  }

  loadNetworkOptions(): NetworkOptions {
    return {
      proxyUrl: blankToNull(this.getSetting(SETTING_KEYS.proxyUrl)),
      proxyLogin: blankToNull(this.getSetting(SETTING_KEYS.proxyLogin)),
      proxyPassword: blankToNull(this.getSetting(SETTING_KEYS.proxyPassword)),
      userAgent: blankToNull(this.getSetting(SETTING_KEYS.userAgent)),
    };
  }

  // ── Admins ────────────────────────────────────────────────────────────────

  addAdmin(chatId: string): void {
    this.db.prepare('INSERT OR IGNORE INTO admins (chat_id) VALUES (?)').run(chatId.trim());
  }

  removeAdmin(chatId: string): void {
    this.db.prepare('DELETE FROM admins WHERE chat_id = ?').run(chatId.trim());
  }

  listAdminChatIds(): string[] {
    return this.db
      .prepare<[], { chat_id: string }>('SELECT chat_id FROM admins ORDER BY created_at ASC, chat_id ASC')
      .all()
      .map((row) => row.chat_id);
  }

  // ── Mappings ──────────────────────────────────────────────────────────────

  addMapping(input: NewMapping): MappingConfig {
    const createdAt = (input.createdAt ?? this.#now()).toISOString();
    const result = this.db
      .prepare(`
        INSERT INTO mappings (source_id, destination_id, destination_thread_id, label, mode, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(
        input.sourceId,
        input.destinationId,
        input.destinationThreadId ?? null,
        input.label?.trim() ?? '',
        input.mode ?? 'stream',
        createdAt,
      );

    const storageId = Number(result.lastInsertRowid);
    const created = this.loadMappings().find((mapping) => mapping.storageId === storageId);
    if (!created) {
      throw new Error(`Mapping ${input.sourceId} was not persisted.`);
    }
    return created;
  }

  /** Removes a mapping with its options, filters and health record. Returns false when unknown. */
  removeMapping(sourceId: string): boolean {
    const remove = this.db.transaction((id: string) => {
      const result = this.db.prepare('DELETE FROM mappings WHERE source_id = ?').run(id);
      this.db.prepare('DELETE FROM health_records WHERE subject = ?').run(mappingSubject(id));
      return result.changes > 0;
    });
    return remove(sourceId);
  }

  setMappingActive(sourceId: string, active: boolean): void {
    this.db.prepare('UPDATE mappings SET active = ? WHERE source_id = ?').run(active ? 1 : 0, sourceId);
  }

  setMappingMode(sourceId: string, mode: MonitoringMode): void {
    this.db.prepare('UPDATE mappings SET mode = ? WHERE source_id = ?').run(mode, sourceId);
  }

  setMappingOption(sourceId: string, key: MappingOptionKey, value: string | null): void {
    const storageId = this.#storageIdOf(sourceId);
    if (value === null) {
      this.db
        .prepare('DELETE FROM mapping_options WHERE mapping_id = ? AND option_key = ?')
        .run(storageId, key);
      return;
    }
    this.db
      .prepare(`
        INSERT INTO mapping_options (mapping_id, option_key, value) VALUES (?, ?, ?)
        ON CONFLICT(mapping_id, option_key) DO UPDATE SET value = excluded.value
      `)
      .run(storageId, key, value);
  }

  addFilter(sourceId: string, type: FilterType, value: string): boolean {
    const trimmed = value.trim();
    if (!trimmed) return false;
    const result = this.db
      .prepare('INSERT OR IGNORE INTO filters (mapping_id, filter_type, value) VALUES (?, ?, ?)')
      .run(this.#storageIdOf(sourceId), type, trimmed);
    return result.changes > 0;
  }

  removeFilter(sourceId: string, type: FilterType, value: string): boolean {
    const result = this.db
      .prepare('DELETE FROM filters WHERE mapping_id = ? AND filter_type = ? AND value = ?')
      .run(this.#storageIdOf(sourceId), type, value.trim());
    return result.changes > 0;
  }

  loadMappings(): MappingConfig[] {
    const rows = this.db
      .prepare<[], MappingRow>('SELECT * FROM mappings ORDER BY id ASC')
      .all();

    const options = new Map<number, Map<string, string>>();
    for (const row of this.db.prepare<[], OptionRow>('SELECT * FROM mapping_options').all()) {
      const entry = options.get(row.mapping_id) ?? new Map<string, string>();
      entry.set(row.option_key, row.value);
      options.set(row.mapping_id, entry);
    }

    const filters = new Map<number, FilterConfig>();
    for (const row of this.db.prepare<[], FilterRow>('SELECT * FROM filters ORDER BY id ASC').all()) {
      if (!isFilterType(row.filter_type)) continue;
      const entry = filters.get(row.mapping_id) ?? emptyFilterConfig();
      entry[row.filter_type].push(row.value);
      filters.set(row.mapping_id, entry);
    }

    const globalFormatting = this.#formattingFrom(
      (key) => this.getSetting(`formatting.${key}`) ?? undefined,
      DEFAULT_FORMATTING,
    );

    return rows.map((row) => {
      const mappingOptions = options.get(row.id) ?? new Map<string, string>();
      const health = this.getHealthRecord(mappingSubject(row.source_id));
      const active = row.active === 1;
      const dedupRaw = mappingOptions.get('deduplicate');
      return {
        storageId: row.id,
        sourceId: row.source_id,
        destinationId: row.destination_id,
        destinationThreadId: row.destination_thread_id,
        label: row.label,
        active,
        createdAt: new Date(row.created_at),
        deduplicate: dedupRaw === undefined ? null : parseBool(dedupRaw, false),
        filters: filters.get(row.id) ?? emptyFilterConfig(),
        formatting: this.#formattingFrom((key) => mappingOptions.get(key), globalFormatting),
        mode: toMode(row.mode),
        healthStatus: health.status,
        blockedByHealth: active && health.status === 'error',
        cursor: cursorFromRow(row),
      };
    });
  }

  // ── Cursors ───────────────────────────────────────────────────────────────

  loadCursor(storageId: number): MappingCursor | null {
    const row = this.db
      .prepare<[number], CursorRow>(
        'SELECT last_seen_id, known_pinned_ids, pinned_synced, known_thread_ids, forum_synced FROM mappings WHERE id = ?',
      )
      .get(storageId);
    return row ? cursorFromRow(row) : null;
  }

  setLastSeenId(storageId: number, messageId: string): void {
    this.db.prepare('UPDATE mappings SET last_seen_id = ? WHERE id = ?').run(messageId, storageId);
  }

  setPinnedState(storageId: number, ids: Iterable<string>, synced: boolean): void {
    this.db
      .prepare('UPDATE mappings SET known_pinned_ids = ?, pinned_synced = ? WHERE id = ?')
      .run(serializeIdList(ids), synced ? 1 : 0, storageId);
  }

  setForumState(storageId: number, ids: Iterable<string>, synced: boolean): void {
    this.db
      .prepare('UPDATE mappings SET known_thread_ids = ?, forum_synced = ? WHERE id = ?')
      .run(serializeIdList(ids), synced ? 1 : 0, storageId);
  }

  resetCursor(storageId: number): void {
    this.db
      .prepare(`
        UPDATE mappings
        SET last_seen_id = NULL, known_pinned_ids = '[]', pinned_synced = 0,
            known_thread_ids = '[]', forum_synced = 0
        WHERE id = ?
      `)
      .run(storageId);
  }

  // ── Health ────────────────────────────────────────────────────────────────

  loadHealthStatuses(): Map<string, HealthStatus> {
    const statuses = new Map<string, HealthStatus>();
    for (const row of this.db.prepare<[], HealthRow>('SELECT * FROM health_records').all()) {
      if (isHealthStatus(row.status)) {
        statuses.set(row.subject, row.status);
      }
    }
    return statuses;
  }

  getHealthRecord(key: string): HealthRecord {
    const row = this.db
      .prepare<[string], HealthRow>('SELECT * FROM health_records WHERE subject = ?')
      .get(key);
    if (!row || !isHealthStatus(row.status)) {
      return { key, status: 'unknown', message: null, updatedAt: null };
    }
    return { key, status: row.status, message: row.message, updatedAt: row.updated_at };
  }

  saveHealthRecord(key: string, status: HealthStatus, message: string | null): void {
    this.db
      .prepare(`
        INSERT INTO health_records (subject, status, message, updated_at) VALUES (?, ?, ?, ?)
        ON CONFLICT(subject) DO UPDATE SET
          status = excluded.status, message = excluded.message, updated_at = excluded.updated_at
      `)
      .run(key, status, message, this.#now().toISOString());
  }

  pruneMappingHealth(sourceIds: Iterable<string>): void {
    const keep = new Set([...sourceIds].map((id) => mappingSubject(id)));
    const subjects = this.db
      .prepare<[string], { subject: string }>('SELECT subject FROM health_records WHERE subject LIKE ?')
      .all(`${MAPPING_SUBJECT_PREFIX}%`);
    const remove = this.db.prepare('DELETE FROM health_records WHERE subject = ?');
    const prune = this.db.transaction(() => {
      for (const { subject } of subjects) {
        if (!keep.has(subject)) remove.run(subject);
      }
    });
    prune();
  }

  // ── Manual forward audit ──────────────────────────────────────────────────

  recordManualForward(activity: ManualForwardActivity): void {
    this.setSetting(SETTING_KEYS.manualForward, JSON.stringify(activity));
  }

  loadManualForward(): ManualForwardActivity | null {
    const raw = this.getSetting(SETTING_KEYS.manualForward);
    if (raw === null) return null;
    try {
      const parsed = manualForwardSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  #storageIdOf(sourceId: string): number {
    const row = this.db
      .prepare<[string], { id: number }>('SELECT id FROM mappings WHERE source_id = ?')
      .get(sourceId);
    if (!row) {
      throw new Error(`Unknown mapping '${sourceId}'.`);
    }
    return row.id;
  }

  #formattingFrom(
    read: (key: MappingOptionKey) => string | undefined,
    fallback: FormattingProfile,
  ): FormattingProfile {
    const maxLength = Number(read('max_length'));
    const previewRaw = read('disable_preview');
    const linkRaw = read('show_source_link');
    return {
      disablePreview: previewRaw === undefined ? fallback.disablePreview : parseBool(previewRaw, fallback.disablePreview),
      maxLength: Number.isInteger(maxLength) && maxLength > 0 ? maxLength : fallback.maxLength,
      attachmentsStyle: toAttachmentsStyle(read('attachments_style'), fallback.attachmentsStyle),
      showSourceLink: linkRaw === undefined ? fallback.showSourceLink : parseBool(linkRaw, fallback.showSourceLink),
    };
  }
}
