import type { RelayEnvironment } from './config/env-validator.js';
import { DiscordSource } from './interfaces/discord-source.js';
import { TelegramSink } from './interfaces/telegram-sink.js';
import { Coordinator } from './services/coordinator.js';
import { SqliteConfigRepository } from './services/db.js';
import { DedupCache } from './services/dedup-cache.js';
import { createFilterEngine } from './services/filter-engine.js';
import { renderMessage } from './services/formatting.js';
import { KeyedMutex } from './services/keyed-mutex.js';
import { ManualForwardService } from './services/manual-forward.js';
import type { AdminLoop, SinkFeed, SourceFeed } from './types/ports.js';
import { logThought } from './utils/logger.js';

export interface RelayOverrides {
  source?: SourceFeed;
  sink?: SinkFeed;
  admin?: AdminLoop;
}

/** Fully wired relay. `manualForward` and `coordinator.onConfigChanged` are the admin entry points. */
export interface Relay {
  repository: SqliteConfigRepository;
  coordinator: Coordinator;
  manualForward: ManualForwardService;
}

/**
 * Open the store, seed it from the environment and wire every component
 * around one shared dedup cache and per-channel guard.
 */
export function createRelay(env: RelayEnvironment, overrides: RelayOverrides = {}): Relay {
  const repository = new SqliteConfigRepository(env.dbPath);

  for (const chatId of env.adminChatIds) {
    repository.addAdmin(chatId);
  }
  if (env.sourceToken && !repository.getCredential()) {
    repository.setCredential(env.sourceToken);
    void logThought('[Relay] Seeded the source credential from SOURCE_TOKEN.');
  }

  const source = overrides.source ?? new DiscordSource();
  const sink = overrides.sink ?? new TelegramSink(env.telegramToken);
  const dedup = new DedupCache();
  const guard = new KeyedMutex();

  const coordinator = new Coordinator({
    source,
    sink,
    repository,
    dedup,
    guard,
    admin: overrides.admin,
    supervisorRetryMs: env.supervisorRetryMs,
  });
  const manualForward = new ManualForwardService({
    source,
    sink,
    repository,
    render: renderMessage,
    createFilter: createFilterEngine,
    dedup,
    guard,
    onConfigChanged: () => coordinator.onConfigChanged(),
  });

  return { repository, coordinator, manualForward };
}
