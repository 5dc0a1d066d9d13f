import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { SqliteConfigRepository } from '../../src/services/db.js';
import { DedupCache } from '../../src/services/dedup-cache.js';
import { createFilterEngine } from '../../src/services/filter-engine.js';
import { KeyedMutex } from '../../src/services/keyed-mutex.js';
import {
    MANUAL_FORWARD_MAX,
    ManualForwardService,
    prepareRecentMessages,
} from '../../src/services/manual-forward.js';
import { RateLimiter } from '../../src/services/rate-limiter.js';
import type { RenderFn } from '../../src/types/ports.js';
import type { FakeSink, FakeSource } from '../helpers/fixtures.js';
import { makeMessage, makeSink, makeSource, sentTexts } from '../helpers/fixtures.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');

const render: RenderFn = (message, _mapping, kind) => ({
    text: `${kind}:${message.id}`,
    extraMessages: [],
    parseMode: 'HTML',
    disablePreview: true,
    imageUrls: [],
});

function at(minute: number): string {
    return `2024-03-01T10:${String(minute).padStart(2, '0')}:00.000Z`;
}

describe('prepareRecentMessages', () => {
    it('drops repeats and future posts, then orders by time and id', () => {
        const ordered = prepareRecentMessages(
            [
                makeMessage({ id: '30', timestamp: at(2) }),
                makeMessage({ id: '20', timestamp: at(1) }),
                makeMessage({ id: '10', timestamp: at(2) }),
                makeMessage({ id: '20', timestamp: at(5) }),
                makeMessage({ id: '40', timestamp: '2024-03-01T13:00:00.000Z' }),
                makeMessage({ id: '50', timestamp: null }),
            ],
            NOW,
        );

        expect(ordered.map((message) => message.id)).toEqual(['50', '20', '10', '30']);
    });
});

describe('ManualForwardService', () => {
    let repository: SqliteConfigRepository;
    let source: FakeSource;
    let sink: FakeSink;
    let onConfigChanged: Mock<() => void>;
    let guard: KeyedMutex;
    let service: ManualForwardService;

    beforeEach(() => {
        repository = new SqliteConfigRepository(':memory:', { now: () => NOW });
        repository.setSetting('runtime.rate', '1000');
        repository.setCredential('test-token');
        source = makeSource();
        sink = makeSink();
        onConfigChanged = vi.fn<() => void>();
        guard = new KeyedMutex();
        service = new ManualForwardService({
            source,
            sink,
            repository,
            render,
            createFilter: createFilterEngine,
            dedup: new DedupCache(),
            guard,
            onConfigChanged,
            now: () => NOW,
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        repository.close();
    });

    describe('validation', () => {
        beforeEach(() => {
            repository.addMapping({ sourceId: 'chan-1', destinationId: '-100500' });
        });

        it.each([0, -3, 2.5])('rejects a count of %s', async (requested) => {
            await expect(service.forwardRecent({ requested, target: 'all' })).rejects.toThrow(
                'The message count must be a positive integer.',
            );
        });

        it('requires a source credential', async () => {
            repository.setSetting('source.token', '');

            await expect(service.forwardRecent({ requested: 1, target: 'all' })).rejects.toThrow(
                'Set the source credential before forwarding messages.',
            );
        });

        it('rejects an unknown source', async () => {
            await expect(service.forwardRecent({ requested: 1, target: 'chan-9' })).rejects.toThrow(
                "No mapping is configured for source 'chan-9'.",
            );
            expect(repository.loadManualForward()).toBeNull();
        });

        it('rejects a wildcard when nothing is mapped', async () => {
            repository.removeMapping('chan-1');

            await expect(service.forwardRecent({ requested: 1, target: '*' })).rejects.toThrow(
                'No mappings are configured.',
            );
        });
    });

    describe('stream mappings', () => {
        beforeEach(() => {
            repository.addMapping({ sourceId: 'chan-1', destinationId: '-100500', label: 'News' });
        });

        it('forwards the most recent messages oldest first and records the run', async () => {
            source.fetchSince.mockResolvedValue([
                makeMessage({ id: '104', timestamp: at(3) }),
                makeMessage({ id: '103', timestamp: at(2) }),
                makeMessage({ id: '102', timestamp: at(1) }),
                makeMessage({ id: '101', timestamp: at(0) }),
                makeMessage({ id: '105', timestamp: '2024-03-01T13:00:00.000Z' }),
            ]);

            const activity = await service.forwardRecent({ requested: 2, target: 'chan-1' });

            expect(source.fetchSince).toHaveBeenCalledWith('chan-1', null, 7);
            expect(source.setCredential).toHaveBeenCalledWith('test-token');
            expect(sentTexts(sink)).toEqual(['message:103', 'message:104']);
            expect(activity).toEqual({
                timestamp: '2024-03-01T12:00:00.000Z',
                requested: 2,
                limit: 2,
                totalForwarded: 2,
                entries: [
                    {
                        sourceId: 'chan-1',
                        label: 'News',
                        forwarded: 2,
                        mode: 'stream',
                        note: 'forwarded 2 of 2 messages, 2 more remaining',
                    },
                ],
            });
            expect(repository.loadManualForward()).toEqual(activity);
            expect(repository.loadMappings()[0]?.cursor.lastSeenId).toBe('104');
            expect(onConfigChanged).toHaveBeenCalledTimes(1);
        });

        it('caps the count and never moves the cursor backwards', async () => {
            repository.setLastSeenId(1, '900');
            source.fetchSince.mockResolvedValue([makeMessage({ id: '101', timestamp: at(0) })]);

            const activity = await service.forwardRecent({ requested: 500, target: 'ALL' });

            expect(activity.limit).toBe(MANUAL_FORWARD_MAX);
            expect(source.fetchSince).toHaveBeenCalledWith('chan-1', null, MANUAL_FORWARD_MAX);
            expect(activity.entries[0]?.note).toBe('forwarded 1 of 1 messages');
            expect(repository.loadMappings()[0]?.cursor.lastSeenId).toBe('900');
            expect(onConfigChanged).not.toHaveBeenCalled();
        });

        it('skips repeated content when deduplication is on', async () => {
            repository.setMappingOption('chan-1', 'deduplicate', 'on');
            source.fetchSince.mockResolvedValue([
                makeMessage({ id: '101', timestamp: at(0), content: 'same' }),
                makeMessage({ id: '102', timestamp: at(1), content: 'same' }),
            ]);

            const activity = await service.forwardRecent({ requested: 5, target: 'chan-1' });

            expect(sentTexts(sink)).toEqual(['message:101']);
            expect(activity.entries[0]?.note).toBe('forwarded 1 of 2 messages');
        });

        it('leaves a post unrecorded when pacing is cut short', async () => {
            repository.setMappingOption('chan-1', 'deduplicate', 'on');
            source.fetchSince.mockResolvedValue([makeMessage({ id: '101', timestamp: at(0), content: 'same' })]);
            vi.spyOn(RateLimiter.prototype, 'wait').mockRejectedValueOnce(new Error('stop'));

            await expect(service.forwardRecent({ requested: 1, target: 'chan-1' })).rejects.toThrow('stop');
            const activity = await service.forwardRecent({ requested: 1, target: 'chan-1' });

            expect(sentTexts(sink)).toEqual(['message:101']);
            expect(activity.totalForwarded).toBe(1);
        });

        it('uses the cursor stored by a pass that held the guard first', async () => {
            source.fetchSince.mockResolvedValue([makeMessage({ id: '101', timestamp: at(0) })]);
            const release = await guard.acquire('chan-1');

            const pending = service.forwardRecent({ requested: 1, target: 'chan-1' });
            repository.setLastSeenId(1, '900');
            release();
            await pending;

            expect(sentTexts(sink)).toEqual(['message:101']);
            expect(repository.loadMappings()[0]?.cursor.lastSeenId).toBe('900');
            expect(onConfigChanged).not.toHaveBeenCalled();
        });

        it('counts only delivered messages when the destination fails', async () => {
            source.fetchSince.mockResolvedValue([
                makeMessage({ id: '101', timestamp: at(0), content: 'one' }),
                makeMessage({ id: '102', timestamp: at(1), content: 'two' }),
            ]);
            sink.send.mockRejectedValueOnce(new Error('chat not found'));

            const activity = await service.forwardRecent({ requested: 2, target: 'chan-1' });

            expect(activity.totalForwarded).toBe(1);
            expect(repository.loadMappings()[0]?.cursor.lastSeenId).toBe('102');
        });

        it('notes an empty channel and a failed fetch', async () => {
            const empty = await service.forwardRecent({ requested: 1, target: 'chan-1' });
            source.fetchSince.mockRejectedValue(new Error('502'));
            const failed = await service.forwardRecent({ requested: 1, target: 'chan-1' });

            expect(empty.entries[0]?.note).toBe('no messages found');
            expect(failed.entries[0]?.note).toBe('failed to fetch messages');
            expect(sink.send).not.toHaveBeenCalled();
        });
    });

    describe('pinned mappings', () => {
        beforeEach(() => {
            repository.addMapping({ sourceId: 'chan-1', destinationId: '-100500', mode: 'pinned' });
        });

        it('only records the pins on an unsynced mapping', async () => {
            source.fetchPinned.mockResolvedValue([makeMessage({ id: '101' }), makeMessage({ id: '102' })]);

            const activity = await service.forwardRecent({ requested: 5, target: 'chan-1' });

            expect(sink.send).not.toHaveBeenCalled();
            expect(activity.entries[0]).toEqual({
                sourceId: 'chan-1',
                label: 'chan-1',
                forwarded: 0,
                mode: 'pinned',
                note: 'pinned messages synced, nothing new',
            });
            expect([...(repository.loadMappings()[0]?.cursor.knownPinnedIds ?? [])]).toEqual(['101', '102']);
            expect(onConfigChanged).toHaveBeenCalledTimes(1);
        });

        it('forwards pins that are not known yet', async () => {
            repository.setPinnedState(1, ['101'], true);
            source.fetchPinned.mockResolvedValue([
                makeMessage({ id: '103', timestamp: at(2), content: 'third' }),
                makeMessage({ id: '101', timestamp: at(0), content: 'first' }),
                makeMessage({ id: '102', timestamp: at(1), content: 'second' }),
            ]);

            const activity = await service.forwardRecent({ requested: 10, target: 'chan-1' });

            expect(sentTexts(sink)).toEqual(['pinned:102', 'pinned:103']);
            expect(activity.entries[0]?.note).toBe('forwarded 2 pinned of 3 messages');
            expect([...(repository.loadMappings()[0]?.cursor.knownPinnedIds ?? [])]).toEqual(['101', '102', '103']);
        });

        it('does not resend pins another pass recorded while it waited', async () => {
            repository.setPinnedState(1, ['101'], true);
            source.fetchPinned.mockResolvedValue([
                makeMessage({ id: '101', timestamp: at(0) }),
                makeMessage({ id: '102', timestamp: at(1) }),
            ]);
            const release = await guard.acquire('chan-1');

            const pending = service.forwardRecent({ requested: 10, target: 'chan-1' });
            repository.setPinnedState(1, ['101', '102'], true);
            release();
            const activity = await pending;

            expect(sink.send).not.toHaveBeenCalled();
            expect(activity.entries[0]?.note).toBe('no matching pinned messages found');
            expect(onConfigChanged).not.toHaveBeenCalled();
        });

        it('keeps a pin whose delivery failed out of the known set', async () => {
            repository.setPinnedState(1, ['101'], true);
            source.fetchPinned.mockResolvedValue([
                makeMessage({ id: '101', timestamp: at(0) }),
                makeMessage({ id: '102', timestamp: at(1) }),
            ]);
            sink.send.mockRejectedValue(new Error('chat not found'));

            const activity = await service.forwardRecent({ requested: 10, target: 'chan-1' });

            expect(activity.entries[0]?.note).toBe('no matching pinned messages found');
            expect([...(repository.loadMappings()[0]?.cursor.knownPinnedIds ?? [])]).toEqual(['101']);
            expect(onConfigChanged).not.toHaveBeenCalled();
        });
    });

    it('explains why mappings were skipped', async () => {
        repository.addMapping({ sourceId: 'chan-1', destinationId: '-1', label: 'Off' });
        repository.addMapping({ sourceId: 'chan-2', destinationId: '-2', label: 'Broken' });
        repository.addMapping({ sourceId: 'forum-1', destinationId: '-3', mode: 'forum' });
        repository.setMappingActive('chan-1', false);
        repository.saveHealthRecord('mapping:chan-2', 'error', 'gone');

        const activity = await service.forwardRecent({ requested: 3, target: 'all' });

        expect(activity.entries.map((entry) => [entry.label, entry.note])).toEqual([
            ['Off', 'mapping is disabled, skipped'],
            ['Broken', 'mapping failed its health check, skipped'],
            ['forum-1', 'forum mappings are not forwarded manually'],
        ]);
        expect(source.fetchSince).not.toHaveBeenCalled();
        expect(source.fetchPinned).not.toHaveBeenCalled();
    });
});
