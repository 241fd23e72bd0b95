import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StoreUnavailableError } from '../domain/error-handler.js';
import { HarvestStore } from './db.js';
import type { AddressInput } from './types.js';

vi.mock('../domain/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

function address(overrides: Partial<AddressInput> = {}): AddressInput {
  return {
    osmId: 'W42',
    country: 'Gambia',
    city: 'Banjul',
    street: 'Liberation Avenue',
    score: 0.9,
    address: '12, Liberation Avenue, Banjul, Gambia',
    placeRank: 30,
    confidenceMode: 'bbox',
    ...overrides,
  };
}

describe('HarvestStore', () => {
  let now: number;
  let store: HarvestStore;

  beforeEach(() => {
    now = 1_000_000;
    store = new HarvestStore(':memory:', () => now);
  });

  afterEach(() => {
    store.close();
  });

  describe('batches', () => {
    beforeEach(() => {
      store.insertBatches([
        { countryCode: 'gm', countryName: 'Gambia', ids: ['N1', 'W2'] },
        { countryCode: 'gm', countryName: 'Gambia', ids: ['R3'] },
        { countryCode: 'eh', countryName: 'Western Sahara', ids: ['N9'] },
      ]);
    });

    it('should claim the oldest origin batch of a country', () => {
      const batch = store.claimNextBatch('Gambia', 'worker-a');

      expect(batch).toEqual({
        id: 1,
        countryCode: 'gm',
        countryName: 'Gambia',
        ids: ['N1', 'W2'],
        status: 'checking',
        claimedAt: 1_000_000,
        claimedBy: 'worker-a',
        createdAt: 1_000_000,
        updatedAt: 1_000_000,
      });
    });

    it('should never hand the same batch to two claimants', () => {
      const first = store.claimNextBatch('Gambia', 'worker-a');
      const second = store.claimNextBatch('Gambia', 'worker-b');
      const third = store.claimNextBatch('Gambia', 'worker-c');

      expect(first?.id).toBe(1);
      expect(second?.id).toBe(2);
      expect(third).toBeNull();
    });

    it('should claim across countries when none is given', () => {
      store.claimNextBatch('Gambia', 'worker-a');
      store.claimNextBatch('Gambia', 'worker-a');

      expect(store.claimNextBatch(undefined, 'worker-a')?.countryName).toBe('Western Sahara');
    });

    it('should refuse a targeted claim on a batch already checking', () => {
      expect(store.claimBatch(2, 'worker-a')?.status).toBe('checking');
      expect(store.claimBatch(2, 'worker-b')).toBeNull();
      expect(store.getBatch(2)?.claimedBy).toBe('worker-a');
    });

    it('should only transition from the expected status', () => {
      store.claimBatch(1, 'worker-a');

      expect(store.transitionBatch(1, 'origin', 'checked')).toBe(false);
      expect(store.transitionBatch(1, 'checking', 'checked')).toBe(true);
      expect(store.getBatch(1)?.status).toBe('checked');
    });

    it('should only transition a batch its owner still holds', () => {
      store.claimBatch(1, 'worker-a');

      expect(store.transitionBatch(1, 'checking', 'checked', 'worker-b')).toBe(false);
      expect(store.transitionBatch(1, 'checking', 'checked', 'worker-a')).toBe(true);
    });

    it('should renew a claim only for its holder', () => {
      store.claimBatch(1, 'worker-a');
      now += 10_000;

      expect(store.renewClaim(1, 'worker-b')).toBe(false);
      expect(store.renewClaim(1, 'worker-a')).toBe(true);
      expect(store.getBatch(1)?.claimedAt).toBe(now);
      expect(store.resetStaleBatches(now - 5_000)).toBe(0);
      expect(store.renewClaim(2, 'worker-a')).toBe(false);
    });

    it('should reset only stale claims', () => {
      store.claimBatch(1, 'worker-a');
      now += 10_000;
      store.claimBatch(2, 'worker-b');

      expect(store.resetStaleBatches(now - 5_000)).toBe(1);
      expect(store.getBatch(1)).toMatchObject({ status: 'origin', claimedAt: null, claimedBy: null });
      expect(store.getBatch(2)?.status).toBe('checking');
    });

    it('should count batches by status', () => {
      store.claimBatch(1, 'worker-a');

      expect(store.countBatches('Gambia', ['origin', 'checking'])).toBe(2);
      expect(store.batchCounts('Gambia')).toEqual({
        total: 2,
        byStatus: { origin: 1, checking: 1, checked: 0 },
      });
      expect(store.batchCounts().total).toBe(3);
      expect(store.countriesWithBatches()).toEqual(new Set(['Gambia', 'Western Sahara']));
    });

    it('should wrap driver failures', () => {
      expect(() => store.insertBatches([{ countryCode: 'gm', countryName: 'Gambia', ids: [] }])).toThrow(
        StoreUnavailableError
      );
      expect(store.batchCounts('Gambia').total).toBe(2);
    });
  });

  describe('countries', () => {
    it('should seed countries once', () => {
      const countries = [
        { name: 'Gambia', code: 'gm' },
        { name: 'Crimea', code: null },
      ];

      expect(store.seedCountries(countries)).toBe(2);
      expect(store.seedCountries(countries)).toBe(0);
      expect(store.getCountry('Crimea')).toEqual({
        countryName: 'Crimea',
        countryCode: null,
        status: 'origin',
        updatedAt: 1_000_000,
      });
    });

    it('should honour the allowed source states', () => {
      store.seedCountries([{ name: 'Gambia', code: 'gm' }]);

      expect(store.setCountryStatus('Gambia', 'gm', 'processing', ['origin'])).toBe(true);
      expect(store.setCountryStatus('Gambia', 'gm', 'processing', ['origin'])).toBe(false);
      expect(store.setCountryStatus('Gambia', 'gm', 'completed')).toBe(true);
      expect(store.getCountry('Gambia')?.status).toBe('completed');
    });

    it('should create a missing country row', () => {
      expect(store.setCountryStatus('Aruba', 'aw', 'failed', ['origin'])).toBe(true);
      expect(store.getCountry('Aruba')?.status).toBe('failed');
    });

    it('should list and count countries', () => {
      store.seedCountries([
        { name: 'Gambia', code: 'gm' },
        { name: 'Aruba', code: 'aw' },
      ]);
      store.setCountryStatus('Gambia', 'gm', 'processing');

      expect(store.listCountries(['origin']).map((country) => country.countryName)).toEqual(['Aruba']);
      expect(store.listCountries().map((country) => country.countryName)).toEqual(['Aruba', 'Gambia']);
      expect(store.countryCounts()).toEqual({
        total: 2,
        byStatus: { origin: 1, processing: 1, completed: 0, failed: 0 },
      });
    });
  });

  describe('addresses', () => {
    it('should derive keys from the address text', () => {
      expect(store.upsertAddress(address())).toBe(true);

      expect(store.addressesByScore('Gambia')).toEqual([
        { address: '12, Liberation Avenue, Banjul, Gambia', firstSection: 'liberation avenue', score: 0.9 },
      ]);
    });

    it('should update instead of inserting the same text twice', () => {
      store.upsertAddress(address());
      now += 1;

      expect(store.upsertAddress(address({ osmId: 'N7', score: 1 }))).toBe(false);
      expect(store.countAddresses()).toBe(1);
      expect(store.validatedIds('Gambia')).toEqual(new Set(['N7']));
      expect(store.addressesByScore('Gambia')[0]?.score).toBe(1);
    });

    it('should order addresses by score then text', () => {
      store.upsertAddress(address({ address: 'B, Road One, Banjul, Gambia', score: 0.9 }));
      store.upsertAddress(address({ address: 'A, Road Two, Banjul, Gambia', score: 0.9 }));
      store.upsertAddress(address({ address: 'C, Road Six, Banjul, Gambia', score: 1 }));
      store.upsertAddress(address({ address: 'D, Rue, Dakhla, Western Sahara', country: 'Western Sahara' }));

      expect(store.addressesByScore('Gambia').map((row) => row.address)).toEqual([
        'C, Road Six, Banjul, Gambia',
        'A, Road Two, Banjul, Gambia',
        'B, Road One, Banjul, Gambia',
      ]);
      expect(store.addressCountries()).toEqual(['Gambia', 'Western Sahara']);
      expect(store.countAddresses('Western Sahara')).toBe(1);
    });

    it('should report nothing to backfill for fresh rows', () => {
      store.upsertAddress(address());

      expect(store.backfillKeys()).toEqual({ scanned: 1, updated: 0 });
    });
  });

  it('should backfill keys that are missing or stale', () => {
    const dir = mkdtempSync(join(tmpdir(), 'harvester-store-'));
    const path = join(dir, 'addresses.db');
    try {
      const fileStore = new HarvestStore(path, () => now);
      fileStore.upsertAddress(address());
      fileStore.upsertAddress(address({ address: '7, Kairaba Avenue, Serrekunda, Gambia', osmId: 'N8' }));
      fileStore.close();

      const raw = new Database(path);
      raw.prepare('UPDATE validated_addresses SET normalization = NULL WHERE osm_id = ?').run('W42');
      raw.prepare('UPDATE validated_addresses SET first_section = ? WHERE osm_id = ?').run('kairaba', 'N8');
      raw.close();

      const reopened = new HarvestStore(path, () => now);
      expect(reopened.backfillKeys()).toEqual({ scanned: 2, updated: 2 });
      expect(reopened.backfillKeys()).toEqual({ scanned: 2, updated: 0 });
      expect(reopened.addressesByScore('Gambia').map((row) => row.firstSection)).toEqual([
        'liberation avenue',
        'kairaba avenue',
      ]);
      reopened.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should fail to open a path it cannot create', () => {
    expect(() => new HarvestStore('/nonexistent-dir/sub/addresses.db')).toThrow(StoreUnavailableError);
  });
});
