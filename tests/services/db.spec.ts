import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SETTING_KEYS, SqliteConfigRepository } from '../../src/services/db.js';
import type { ManualForwardActivity } from '../../src/types/relay.js';
import { DEFAULT_FORMATTING, emptyCursor } from '../../src/types/relay.js';

const NOW = new Date('2024-05-01T10:00:00.000Z');

describe('SqliteConfigRepository', () => {
  let repo: SqliteConfigRepository;

  beforeEach(() => {
    repo = new SqliteConfigRepository(':memory:', { now: () => NOW });
  });

  afterEach(() => {
    repo.close();
  });

  function count(table: string): number {
    return repo.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? -1;
  }

  describe('mappings', () => {
    it('creates a mapping with empty progress and default formatting', () => {
      const mapping = repo.addMapping({ sourceId: 'chan-1', destinationId: '-100', label: ' News ' });

      expect(mapping).toEqual({
        storageId: 1,
        sourceId: 'chan-1',
        destinationId: '-100',
        destinationThreadId: null,
        label: 'News',
        active: true,
        createdAt: NOW,
        deduplicate: null,
        filters: {
          whitelist: [],
          blacklist: [],
          allowedSenders: [],
          blockedSenders: [],
          allowedTypes: [],
          blockedTypes: [],
          allowedRoles: [],
          blockedRoles: [],
        },
        formatting: DEFAULT_FORMATTING,
        mode: 'stream',
        healthStatus: 'unknown',
        blockedByHealth: false,
        cursor: emptyCursor(),
      });
    });

    it('layers mapping options over global formatting settings', () => {
      repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.setSetting('formatting.max_length', '1000');
      repo.setSetting('formatting.show_source_link', 'on');
      repo.setMappingOption('chan-1', 'attachments_style', 'links');
      repo.setMappingOption('chan-1', 'show_source_link', 'off');
      repo.setMappingOption('chan-1', 'deduplicate', 'yes');

      const [mapping] = repo.loadMappings();

      expect(mapping?.formatting).toEqual({
        disablePreview: true,
        maxLength: 1000,
        attachmentsStyle: 'links',
        showSourceLink: false,
      });
      expect(mapping?.deduplicate).toBe(true);
    });

    it('deletes an option when set to null', () => {
      repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.setMappingOption('chan-1', 'deduplicate', 'off');
      repo.setMappingOption('chan-1', 'deduplicate', null);

      expect(repo.loadMappings()[0]?.deduplicate).toBeNull();
    });

    it('rejects options for unknown mappings', () => {
      expect(() => repo.setMappingOption('missing', 'max_length', '10')).toThrow("Unknown mapping 'missing'.");
    });

    it('stores filters once and removes them', () => {
      repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });

      expect(repo.addFilter('chan-1', 'blacklist', ' spam ')).toBe(true);
      expect(repo.addFilter('chan-1', 'blacklist', 'spam')).toBe(false);
      expect(repo.addFilter('chan-1', 'blacklist', '   ')).toBe(false);
      expect(repo.loadMappings()[0]?.filters.blacklist).toEqual(['spam']);
      expect(repo.removeFilter('chan-1', 'blacklist', 'spam')).toBe(true);
      expect(repo.loadMappings()[0]?.filters.blacklist).toEqual([]);
    });

    it('switches mode and activity', () => {
      repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.setMappingMode('chan-1', 'pinned');
      repo.setMappingActive('chan-1', false);

      const [mapping] = repo.loadMappings();
      expect(mapping?.mode).toBe('pinned');
      expect(mapping?.active).toBe(false);
    });

    it('removes a mapping together with its options, filters and health record', () => {
      repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.setMappingOption('chan-1', 'max_length', '900');
      repo.addFilter('chan-1', 'whitelist', 'news');
      repo.saveHealthRecord('mapping:chan-1', 'ok', null);

      expect(repo.removeMapping('chan-1')).toBe(true);
      expect(repo.removeMapping('chan-1')).toBe(false);
      expect(count('mappings')).toBe(0);
      expect(count('mapping_options')).toBe(0);
      expect(count('filters')).toBe(0);
      expect(count('health_records')).toBe(0);
    });
  });

  describe('cursors', () => {
    it('persists every part of the cursor and resets it', () => {
      const { storageId } = repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.setLastSeenId(storageId, '500');
      repo.setPinnedState(storageId, ['3', '1', '3'], true);
      repo.setForumState(storageId, ['t2'], true);

      const cursor = repo.loadMappings()[0]?.cursor;
      expect(cursor?.lastSeenId).toBe('500');
      expect([...(cursor?.knownPinnedIds ?? [])]).toEqual(['1', '3']);
      expect(cursor?.pinnedSynced).toBe(true);
      expect([...(cursor?.knownThreadIds ?? [])]).toEqual(['t2']);
      expect(cursor?.forumSynced).toBe(true);

      repo.resetCursor(storageId);
      expect(repo.loadMappings()[0]?.cursor).toEqual(emptyCursor());
    });

    it('loads the cursor of one mapping and null once it is gone', () => {
      const { storageId } = repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.setLastSeenId(storageId, '700');
      repo.setForumState(storageId, ['t1'], true);

      expect(repo.loadCursor(storageId)).toEqual({
        ...emptyCursor(),
        lastSeenId: '700',
        knownThreadIds: new Set(['t1']),
        forumSynced: true,
      });

      repo.removeMapping('chan-1');
      expect(repo.loadCursor(storageId)).toBeNull();
    });

    it('treats a corrupt id list as empty', () => {
      const { storageId } = repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.db.prepare('UPDATE mappings SET known_pinned_ids = ? WHERE id = ?').run('{not json', storageId);

      expect(repo.loadMappings()[0]?.cursor.knownPinnedIds.size).toBe(0);
    });
  });

  describe('health', () => {
    it('round-trips records and reports unknown for missing subjects', () => {
      repo.saveHealthRecord('proxy', 'error', 'proxy down');

      expect(repo.getHealthRecord('proxy')).toEqual({
        key: 'proxy',
        status: 'error',
        message: 'proxy down',
        updatedAt: '2024-05-01T10:00:00.000Z',
      });
      expect(repo.getHealthRecord('credential')).toEqual({
        key: 'credential',
        status: 'unknown',
        message: null,
        updatedAt: null,
      });
      expect(repo.loadHealthStatuses()).toEqual(new Map([['proxy', 'error']]));
    });

    it('blocks active mappings whose last check failed', () => {
      repo.addMapping({ sourceId: 'chan-1', destinationId: '-100' });
      repo.saveHealthRecord('mapping:chan-1', 'error', 'gone');

      expect(repo.loadMappings()[0]?.blockedByHealth).toBe(true);
      expect(repo.loadMappings()[0]?.healthStatus).toBe('error');

      repo.setMappingActive('chan-1', false);
      expect(repo.loadMappings()[0]?.blockedByHealth).toBe(false);
    });

    it('prunes only records of mappings that no longer exist', () => {
      repo.saveHealthRecord('proxy', 'ok', null);
      repo.saveHealthRecord('mapping:chan-1', 'ok', null);
      repo.saveHealthRecord('mapping:old', 'error', 'gone');

      repo.pruneMappingHealth(['chan-1']);

      expect([...repo.loadHealthStatuses().keys()].sort()).toEqual(['mapping:chan-1', 'proxy']);
    });
  });

  describe('settings', () => {
    it('trims the credential and treats blanks as missing', () => {
      repo.setCredential('  test-token  ');
      expect(repo.getCredential()).toBe('test-token');

      repo.setSetting(SETTING_KEYS.credential, '   ');
      expect(repo.getCredential()).toBeNull();
    });

    it('loads network and runtime options from settings', () => {
      repo.setSetting(SETTING_KEYS.proxyUrl, 'http://proxy.local:8080');
      repo.setSetting(SETTING_KEYS.proxyLogin, 'relay');
      repo.setSetting('runtime.poll', '5');

      expect(repo.loadNetworkOptions()).toEqual({
        proxyUrl: 'http://proxy.local:8080',
        proxyLogin: 'relay',
        proxyPassword: null,
        userAgent: null,
      });
      expect(repo.loadRuntimeOptions().pollIntervalMs).toBe(5000);
    });

    it('keeps admin chat ids unique', () => {
      repo.addAdmin('12');
      repo.addAdmin(' 12 ');
      repo.addAdmin('-100200');

      expect(repo.listAdminChatIds().sort()).toEqual(['-100200', '12']);
      repo.removeAdmin('12');
      expect(repo.listAdminChatIds()).toEqual(['-100200']);
    });

    it('round-trips the manual forward audit record', () => {
      const activity: ManualForwardActivity = {
        timestamp: NOW.toISOString(),
        requested: 5,
        limit: 5,
        totalForwarded: 2,
        entries: [{ sourceId: 'chan-1', label: 'News', forwarded: 2, mode: 'stream', note: 'forwarded 2 of 5 messages' }],
      };

      expect(repo.loadManualForward()).toBeNull();
      repo.recordManualForward(activity);
      expect(repo.loadManualForward()).toEqual(activity);

      repo.setSetting(SETTING_KEYS.manualForward, '{"timestamp": 1}');
      expect(repo.loadManualForward()).toBeNull();
    });
  });
});
