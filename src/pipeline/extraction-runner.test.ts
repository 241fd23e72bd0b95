import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { BoundingRegion, StaticData } from '../config/static-data.js';
import type { BatchDraft, BatchLog, CandidateFeature } from '../extraction/types.js';
import { HarvestStore } from '../store/db.js';
import { ExtractionRunner, resolvePbfPath, type ExtractionRunnerOptions } from './extraction-runner.js';
import { BatchScheduler } from './scheduler.js';

vi.mock('../domain/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const staticData: StaticData = {
  countries: [
    { name: 'Gambia', code: 'gm' },
    { name: 'Aruba', code: 'aw' },
    { name: 'Crimea', code: null },
    { name: 'Palestinian Territory', code: 'ps' },
  ],
  territories: { replacements: [], appendTerritories: [], claimedRegionCountries: [] },
  regions: {
    ps: {
      sourceFile: 'israel-and-palestine-latest.osm.pbf',
      include: [{ minLon: 35, maxLon: 35.5, minLat: 31.5, maxLat: 32.5 }],
      exclude: [],
    },
  },
};

const street = { 'addr:street': 'Harbour Road' };

const features: CandidateFeature[] = [
  { ref: 'N1', tags: { building: 'yes', ...street }, points: [{ lon: 35.2, lat: 31.9 }] },
  { ref: 'W2', tags: { highway: 'residential' }, points: [{ lon: 35.2, lat: 31.9 }] },
  { ref: 'N3', tags: { shop: 'bakery', ...street }, points: [{ lon: 34.8, lat: 32.1 }] },
];

class MemoryFallback implements BatchLog {
  readonly path = 'memory://fallback';
  readonly batches: BatchDraft[] = [];

  append(batches: readonly BatchDraft[]): void {
    this.batches.push(...batches);
  }
}

describe('resolvePbfPath', () => {
  it('should prefer the configured source file', () => {
    const [gambia, , crimea, palestine] = staticData.countries;

    expect(gambia && resolvePbfPath(gambia, staticData, '/osm')).toBe(join('/osm', 'gm-latest.osm.pbf'));
    expect(palestine && resolvePbfPath(palestine, staticData, '/osm')).toBe(
      join('/osm', 'israel-and-palestine-latest.osm.pbf')
    );
    expect(crimea && resolvePbfPath(crimea, staticData, '/osm')).toBeNull();
  });
});

describe('ExtractionRunner', () => {
  let dir: string;
  let store: HarvestStore;
  let fallback: MemoryFallback;
  let requests: Array<{ path: string; envelope: BoundingRegion | undefined }>;

  function runner(overrides: Partial<ExtractionRunnerOptions> = {}): ExtractionRunner {
    return new ExtractionRunner({
      staticData,
      store,
      scheduler: new BatchScheduler(store),
      fallback,
      osmDataDir: dir,
      batchSize: 100,
      source: async function* (path, envelope) {
        requests.push({ path, envelope });
        yield* features;
      },
      ...overrides,
    });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'harvester-osm-'));
    writeFileSync(join(dir, 'gm-latest.osm.pbf'), '');
    writeFileSync(join(dir, 'israel-and-palestine-latest.osm.pbf'), '');
    store = new HarvestStore(':memory:');
    fallback = new MemoryFallback();
    requests = [];
  });

  afterEach(() => {
    store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should extract a whole country into batches', async () => {
    const result = await runner().extractCountry('gambia');

    expect(result).toEqual({
      countryName: 'Gambia',
      status: 'extracted',
      path: join(dir, 'gm-latest.osm.pbf'),
      stats: { scanned: 3, selected: 2, skipped: 0, batches: 1, fallbackBatches: 0 },
    });
    expect(requests).toEqual([{ path: join(dir, 'gm-latest.osm.pbf'), envelope: undefined }]);
    expect(store.claimNextBatch('Gambia', 'worker-test')?.ids).toEqual(['N1', 'N3']);
  });

  it('should limit a shared extract to the include boxes', async () => {
    const result = await runner().extractCountry('Palestinian Territory');

    expect(requests[0]?.envelope).toEqual({ minLon: 35, maxLon: 35.5, minLat: 31.5, maxLat: 32.5 });
    expect(result.status === 'extracted' && result.stats.selected).toBe(1);
    expect(store.claimNextBatch('Palestinian Territory', 'worker-test')?.ids).toEqual(['N1']);
  });

  it('should skip ids that were already validated', async () => {
    store.upsertAddress({
      osmId: 'N1',
      country: 'Gambia',
      city: null,
      street: 'Harbour Road',
      score: 1,
      address: '1, Harbour Road, Banjul, Gambia',
      placeRank: 30,
      confidenceMode: 'bbox',
    });

    const result = await runner().extractCountry('Gambia');

    expect(result.status === 'extracted' && result.stats.skipped).toBe(1);
    expect(store.claimNextBatch('Gambia', 'worker-test')?.ids).toEqual(['N3']);
  });

  it('should write to the fallback log without a store', async () => {
    const result = await runner({ store: null, scheduler: null }).extractCountry('Gambia');

    expect(result.status === 'extracted' && result.stats.fallbackBatches).toBe(1);
    expect(fallback.batches).toEqual([{ countryCode: 'gm', countryName: 'Gambia', ids: ['N1', 'N3'] }]);
  });

  it('should fall back when the store cannot answer', async () => {
    const broken = new HarvestStore(':memory:');
    broken.close();

    const result = await runner({ store: broken, scheduler: null }).extractCountry('Gambia');

    expect(result.status === 'extracted' && result.stats.fallbackBatches).toBe(1);
    expect(fallback.batches).toHaveLength(1);
  });

  it('should mark a country without an extract as failed', async () => {
    store.seedCountries(staticData.countries);

    expect(await runner().extractCountry('Aruba')).toEqual({
      countryName: 'Aruba',
      status: 'failed',
      reason: `No extract at ${join(dir, 'aw-latest.osm.pbf')}`,
    });
    expect(await runner().extractCountry('Crimea')).toEqual({
      countryName: 'Crimea',
      status: 'failed',
      reason: 'Country has no extract code',
    });
    expect(store.getCountry('Aruba')?.status).toBe('failed');
    expect(store.getCountry('Crimea')?.status).toBe('failed');
    expect(requests).toEqual([]);
  });

  it('should report a missing extract again without touching a finished country', async () => {
    store.seedCountries(staticData.countries);
    store.setCountryStatus('Crimea', null, 'completed');

    const first = await runner().extractCountry('Aruba');
    const again = await runner().extractCountry('Aruba');
    const finished = await runner().extractCountry('Crimea');

    expect(again).toEqual(first);
    expect(again.status).toBe('failed');
    expect(finished).toEqual({ countryName: 'Crimea', status: 'failed', reason: 'Country has no extract code' });
    expect(store.getCountry('Aruba')?.status).toBe('failed');
    expect(store.getCountry('Crimea')?.status).toBe('completed');
  });

  it('should refuse an unknown country', async () => {
    await expect(runner().extractCountry('Atlantis')).rejects.toThrow('Unknown country: Atlantis');
  });

  it('should extract every pending country once', async () => {
    store.seedCountries([
      { name: 'Gambia', code: 'gm' },
      { name: 'Aruba', code: 'aw' },
    ]);

    const first = await runner().extractAll();
    const second = await runner().extractAll();

    expect(first.map((result) => [result.countryName, result.status])).toEqual([
      ['Aruba', 'failed'],
      ['Gambia', 'extracted'],
    ]);
    expect(second).toEqual([]);
  });
});
