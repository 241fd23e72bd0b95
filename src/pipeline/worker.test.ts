import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HarvestStore } from '../store/db.js';
import type { Batch } from '../store/types.js';
import { BatchScheduler } from './scheduler.js';
import { emptyOutcomeCounts, type BatchOutcome } from './types.js';
import { ValidationWorker } from './worker.js';

vi.mock('../domain/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('ValidationWorker', () => {
  let now: number;
  let store: HarvestStore;
  let scheduler: BatchScheduler;
  let validated: number[];
  let onValidate: (batch: Batch) => void;

  const validator = {
    async validateBatch(batch: Batch): Promise<BatchOutcome> {
      validated.push(batch.id);
      onValidate(batch);
      const completed = scheduler.completeBatch(batch.id, 'worker-test');
      const counts = emptyOutcomeCounts();
      counts.accepted = batch.ids.length;
      return { batchId: batch.id, countryName: batch.countryName, attempted: batch.ids.length, completed, counts };
    },
  };

  function worker(): ValidationWorker {
    return new ValidationWorker({
      scheduler,
      validator,
      workerId: 'worker-test',
      staleTimeoutMs: 60_000,
      sweepIntervalMs: 50_000,
      now: () => now,
    });
  }

  beforeEach(() => {
    now = 1_000_000;
    validated = [];
    onValidate = () => undefined;
    store = new HarvestStore(':memory:', () => now);
    scheduler = new BatchScheduler(store, () => now);
    store.insertBatches([
      { countryCode: 'gm', countryName: 'Gambia', ids: ['N1', 'N2'] },
      { countryCode: 'gm', countryName: 'Gambia', ids: ['N3'] },
      { countryCode: 'aw', countryName: 'Aruba', ids: ['N4'] },
    ]);
  });

  afterEach(() => {
    store.close();
  });

  it('should drain the requested countries', async () => {
    const summary = await worker().run({ countries: ['Gambia'] });

    expect(validated).toEqual([1, 2]);
    expect(summary).toEqual({
      batches: 2,
      abandoned: 0,
      attempted: 3,
      counts: { ...emptyOutcomeCounts(), accepted: 3 },
      staleReset: 0,
    });
    expect(store.getBatch(3)?.status).toBe('origin');
  });

  it('should take work from any country when none is given', async () => {
    await worker().run();

    expect(validated).toEqual([1, 2, 3]);
  });

  it('should stop at the batch limit', async () => {
    const summary = await worker().run({ countries: ['Gambia', 'Aruba'], limit: 1 });

    expect(validated).toEqual([1]);
    expect(summary.batches).toBe(1);
  });

  it('should recover stale claims before starting', async () => {
    scheduler.claimBatch(1, 'crashed-worker');
    now += 120_000;

    const summary = await worker().run({ countries: ['Gambia'] });

    expect(summary.staleReset).toBe(1);
    expect(validated).toEqual([1, 2]);
  });

  it('should count a batch whose claim was swept away as abandoned', async () => {
    onValidate = (batch) => {
      if (batch.id === 1) {
        now += 120_000;
        scheduler.sweepStaleClaims(60_000);
        scheduler.claimBatch(1, 'other-worker');
      }
    };

    const summary = await worker().run({ countries: ['Gambia'] });

    expect(summary).toMatchObject({ batches: 2, abandoned: 1, attempted: 3 });
    expect(validated).toEqual([1, 2]);
    expect(store.getBatch(1)).toMatchObject({ status: 'checking', claimedBy: 'other-worker' });
    expect(store.getBatch(2)?.status).toBe('checked');
  });

  it('should sweep again once the interval has passed', async () => {
    onValidate = (batch) => {
      if (batch.id === 1) {
        scheduler.claimBatch(3, 'crashed-worker');
        now += 100_000;
      }
    };

    const summary = await worker().run();

    expect(summary.staleReset).toBe(1);
    expect(validated).toEqual([1, 2, 3]);
  });
});
