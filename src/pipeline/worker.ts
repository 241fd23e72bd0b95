/**
 * Validation worker loop: sweep stale claims, claim, validate, repeat
 *
 * The sweep runs at start and again whenever STALE_SWEEP_INTERVAL_MS has
 * passed between batches.
 */

import { logger } from '../domain/logger.js';
import type { BatchScheduler } from './scheduler.js';
import { VALIDATION_OUTCOMES, emptyOutcomeCounts, type WorkerSummary } from './types.js';
import type { GeocodeValidator } from './validator.js';

export interface WorkerOptions {
  scheduler: BatchScheduler;
  validator: Pick<GeocodeValidator, 'validateBatch'>;
  workerId: string;
  staleTimeoutMs: number;
  sweepIntervalMs: number;
  now?: () => number;
}

export interface WorkerRunOptions {
  /** Countries to drain, in order; any country when omitted */
  countries?: readonly string[];
  /** Stop after this many batches */
  limit?: number;
}

export class ValidationWorker {
  private readonly options: WorkerOptions;
  private readonly now: () => number;
  private lastSweep = 0;

  constructor(options: WorkerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  async run(runOptions: WorkerRunOptions = {}): Promise<WorkerSummary> {
    const summary: WorkerSummary = {
      batches: 0,
      abandoned: 0,
      attempted: 0,
      counts: emptyOutcomeCounts(),
      staleReset: this.sweep(),
    };
    const limit = runOptions.limit ?? Number.POSITIVE_INFINITY;
    const targets: ReadonlyArray<string | undefined> = runOptions.countries ?? [undefined];

    logger.info('Worker started', {
      workerId: this.options.workerId,
      countries: runOptions.countries?.length ?? 'any',
      limit: runOptions.limit,
    });

    for (const country of targets) {
      while (summary.batches < limit) {
        if (this.now() - this.lastSweep >= this.options.sweepIntervalMs) {
          summary.staleReset += this.sweep();
        }

        const batch = this.options.scheduler.claimNextBatch(country, this.options.workerId);
        if (!batch) {
          break;
        }

        const outcome = await this.options.validator.validateBatch(batch);
        summary.batches++;
        if (!outcome.completed) {
          summary.abandoned++;
        }
        summary.attempted += outcome.attempted;
        for (const key of VALIDATION_OUTCOMES) {
          summary.counts[key] += outcome.counts[key];
        }
      }
    }

    logger.info('Worker finished', { workerId: this.options.workerId, ...summary });
    return summary;
  }

  private sweep(): number {
    const now = this.now();
    this.lastSweep = now;
    return this.options.scheduler.sweepStaleClaims(this.options.staleTimeoutMs, now);
  }
}
