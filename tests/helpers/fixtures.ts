import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { SinkFeed, SourceFeed } from '../../src/types/ports.js';
import type { MappingConfig, RuntimeOptions, SourceMessage } from '../../src/types/relay.js';
import {
  DEFAULT_FORMATTING,
  DEFAULT_RUNTIME_OPTIONS,
  emptyCursor,
  emptyFilterConfig,
} from '../../src/types/relay.js';
import { snowflakeFromDate } from '../../src/utils/snowflake.js';

/** Snowflake-style id of a message created at `iso`, plus `offset` to keep ids distinct. */
export function idAt(iso: string, offset = 0): string {
  return (snowflakeFromDate(new Date(iso)) + BigInt(offset)).toString();
}

export function makeMessage(overrides: Partial<SourceMessage> = {}): SourceMessage {
  return {
    id: '1',
    channelId: 'chan-1',
    guildId: 'guild-1',
    authorId: 'author-1',
    authorName: 'Alice',
    content: 'hello',
    attachments: [],
    embeds: [],
    stickers: [],
    roleIds: [],
    timestamp: null,
    messageType: 0,
    ...overrides,
  };
}

export function makeMapping(overrides: Partial<MappingConfig> = {}): MappingConfig {
  return {
    storageId: 1,
    sourceId: 'chan-1',
    destinationId: '-100500',
    destinationThreadId: null,
    label: '',
    active: true,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    deduplicate: null,
    filters: emptyFilterConfig(),
    formatting: { ...DEFAULT_FORMATTING },
    mode: 'stream',
    healthStatus: 'ok',
    blockedByHealth: false,
    cursor: emptyCursor(),
    ...overrides,
  };
}

export function makeRuntime(overrides: Partial<RuntimeOptions> = {}): RuntimeOptions {
  return { ...DEFAULT_RUNTIME_OPTIONS, ratePerSecond: 0, ...overrides };
}

export type FakeSource = { [K in keyof SourceFeed]: Mock<SourceFeed[K]> };

export function makeSource(): FakeSource {
  return {
    fetchSince: vi.fn<SourceFeed['fetchSince']>(async () => []),
    fetchPinned: vi.fn<SourceFeed['fetchPinned']>(async () => []),
    fetchThreads: vi.fn<SourceFeed['fetchThreads']>(async () => []),
    checkAccessible: vi.fn<SourceFeed['checkAccessible']>(async () => true),
    verifyCredential: vi.fn<SourceFeed['verifyCredential']>(async () => ({ ok: true })),
    checkProxy: vi.fn<SourceFeed['checkProxy']>(async () => ({ ok: true })),
    setCredential: vi.fn<SourceFeed['setCredential']>(),
    setNetworkOptions: vi.fn<SourceFeed['setNetworkOptions']>(),
  };
}

export type FakeSink = { send: Mock<SinkFeed['send']> };

export function makeSink(): FakeSink {
  return { send: vi.fn<SinkFeed['send']>(async () => undefined) };
}

/** Main text of every payload handed to the sink, in order. */
export function sentTexts(sink: FakeSink): string[] {
  return sink.send.mock.calls.map(([, payload]) => payload.text);
}
