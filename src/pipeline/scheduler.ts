/**
 * BatchScheduler - the batch and country state machine
 *
 * Batch:   origin -> checking -> checked   (checking -> origin only via the stale sweep)
 * Country: origin -> processing -> completed | failed
 *
 * Claims are single compare-and-set statements in the store, so concurrent
 * workers never hold the same batch. A worker renews its claim while it
 * works; a batch the stale sweep took back can only be completed by whoever
 * claims it next.
 */

import { IllegalTransitionError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import type { HarvestStore } from '../store/db.js';
import type { Batch, CountryState } from '../store/types.js';

export type SchedulerStore = Pick<
  HarvestStore,
  | 'claimNextBatch'
  | 'claimBatch'
  | 'transitionBatch'
  | 'renewClaim'
  | 'getBatch'
  | 'resetStaleBatches'
  | 'countBatches'
  | 'getCountry'
  | 'setCountryStatus'
>;

export class BatchScheduler {
  private readonly store: SchedulerStore;
  private readonly now: () => number;

  constructor(store: SchedulerStore, now: () => number = Date.now) {
    this.store = store;
    this.now = now;
  }

  /**
   * Claim the oldest open batch, of one country or of any. The country moves
   * to `processing` on its first claim.
   */
  claimNextBatch(countryName: string | undefined, workerId: string): Batch | null {
    const batch = this.store.claimNextBatch(countryName, workerId);
    if (batch) {
      this.onClaimed(batch, workerId);
    }
    return batch;
  }

  claimBatch(batchId: number, workerId: string): Batch | null {
    const batch = this.store.claimBatch(batchId, workerId);
    if (batch) {
      this.onClaimed(batch, workerId);
    }
    return batch;
  }

  /** Keep a claim out of the stale sweep. False once the claim is lost. */
  renewClaim(batchId: number, workerId: string): boolean {
    const renewed = this.store.renewClaim(batchId, workerId);
    if (!renewed) {
      logger.warn('Batch claim lost', { batchId, workerId });
    }
    return renewed;
  }

  /**
   * Mark a batch checked on behalf of the worker holding it. Returns false,
   * leaving the batch untouched, when the claim was lost to the stale sweep.
   */
  completeBatch(batchId: number, workerId: string): boolean {
    if (this.store.transitionBatch(batchId, 'checking', 'checked', workerId)) {
      logger.debug('Batch checked', { batchId, workerId });
      return true;
    }

    const current = this.store.getBatch(batchId);
    if (!current || current.claimedBy === workerId) {
      throw new IllegalTransitionError('batch', batchId, current?.status ?? null, 'checked');
    }
    logger.warn('Batch claim lost, not completing', {
      batchId,
      workerId,
      status: current.status,
      claimedBy: current.claimedBy,
    });
    return false;
  }

  /**
   * Mark the country completed once it has batches and none of them is open
   */
  refreshCountry(countryName: string, countryCode: string | null): CountryState | null {
    const total = this.store.countBatches(countryName);
    if (total > 0 && this.store.countBatches(countryName, ['origin', 'checking']) === 0) {
      if (this.store.setCountryStatus(countryName, countryCode, 'completed', ['origin', 'processing'])) {
        logger.info('Country completed', { countryName, batches: total });
      }
    }
    return this.store.getCountry(countryName)?.status ?? null;
  }

  /**
   * No extract exists for the country. A country that already finished,
   * completed or failed, keeps its status; returns whether it changed.
   */
  markCountryFailed(countryName: string, countryCode: string | null): boolean {
    if (!this.store.setCountryStatus(countryName, countryCode, 'failed', ['origin', 'processing'])) {
      logger.debug('Country already finished, status kept', {
        countryName,
        status: this.store.getCountry(countryName)?.status,
      });
      return false;
    }
    logger.warn('Country marked failed', { countryName, countryCode });
    return true;
  }

  /**
   * Return claims older than `timeoutMs` to `origin`
   */
  sweepStaleClaims(timeoutMs: number, now: number = this.now()): number {
    const reset = this.store.resetStaleBatches(now - timeoutMs);
    if (reset > 0) {
      logger.warn('Reset stale batch claims', { reset, timeoutMs });
    }
    return reset;
  }

  private onClaimed(batch: Batch, workerId: string): void {
    this.store.setCountryStatus(batch.countryName, batch.countryCode, 'processing', ['origin']);
    logger.info('Batch claimed', {
      batchId: batch.id,
      countryName: batch.countryName,
      ids: batch.ids.length,
      workerId,
    });
  }
}
