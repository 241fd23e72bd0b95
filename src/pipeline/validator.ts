/**
 * GeocodeValidator
 *
 * Resolves every element of a claimed batch through the geocoder, one id at a
 * time, and keeps the matches that pass every gate:
 *
 *   lookup -> cleanup -> shape -> region -> place rank -> confidence -> upsert
 *
 * A lookup that exhausts its retries skips that id only. The batch is marked
 * checked once every id has been attempted, whatever was accepted. The claim
 * is renewed after every id; once it is lost the rest of the batch is left to
 * the worker that holds it now.
 */

import { cleanDisplayName, resolveRegionCountry } from '../addresses/cleanup.js';
import { defaultHeuristics, type AddressHeuristics } from '../addresses/heuristics.js';
import type { ConfidenceMode } from '../config/env.js';
import type { TerritoryRules } from '../config/static-data.js';
import { GeocoderError, IllegalTransitionError } from '../domain/error-handler.js';
import type { Geocoder } from '../domain/geocoder-client.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import { generateRequestId, runWithContext } from '../domain/request-context.js';
import { RetryExhaustedError } from '../domain/retry.js';
import type { ElementRef, GeocoderPlace } from '../domain/types.js';
import type { HarvestStore } from '../store/db.js';
import type { Batch } from '../store/types.js';
import { boundingBoxScore, corroborationScore } from './confidence.js';
import type { BatchScheduler } from './scheduler.js';
import { emptyOutcomeCounts, type BatchOutcome, type ValidationOutcome } from './types.js';

const CITY_FIELDS = ['city', 'town', 'village', 'municipality', 'suburb', 'district'] as const;
const STREET_FIELDS = ['road', 'street', 'pedestrian', 'path', 'footway'] as const;

export interface ValidatorOptions {
  geocoder: Geocoder;
  store: Pick<HarvestStore, 'upsertAddress'>;
  scheduler: BatchScheduler;
  territories: TerritoryRules;
  confidenceMode: ConfidenceMode;
  minScore: number;
  /** Matches at or below this place rank are too generic */
  placeRankThreshold: number;
  heuristics?: AddressHeuristics;
}

function firstField(address: Record<string, string>, fields: readonly string[]): string | null {
  for (const field of fields) {
    const value = address[field]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

function isGeocoderFailure(error: unknown): boolean {
  return error instanceof RetryExhaustedError || error instanceof GeocoderError;
}

export class GeocodeValidator {
  private readonly options: ValidatorOptions;
  private readonly heuristics: AddressHeuristics;

  constructor(options: ValidatorOptions) {
    this.options = options;
    this.heuristics = options.heuristics ?? defaultHeuristics;
  }

  async validateBatch(batch: Batch): Promise<BatchOutcome> {
    const context = {
      requestId: generateRequestId(),
      batchId: batch.id,
      countryName: batch.countryName,
      startTime: Date.now(),
    };

    const workerId = batch.claimedBy;
    if (batch.status !== 'checking' || !workerId) {
      throw new IllegalTransitionError('batch', batch.id, batch.status, 'checked');
    }

    return runWithContext(context, async () => {
      const { scheduler } = this.options;
      const counts = emptyOutcomeCounts();
      let attempted = 0;
      let claimHeld = true;

      for (const ref of batch.ids) {
        const outcome = await this.validateId(ref, batch.countryName);
        counts[outcome]++;
        attempted++;
        metrics.incrementValidationOutcome(outcome);

        if (!scheduler.renewClaim(batch.id, workerId)) {
          claimHeld = false;
          break;
        }
      }

      const completed = claimHeld && scheduler.completeBatch(batch.id, workerId);
      if (completed) {
        scheduler.refreshCountry(batch.countryName, batch.countryCode);
      }

      logger.info(completed ? 'Batch validated' : 'Batch abandoned', {
        batchId: batch.id,
        countryName: batch.countryName,
        durationMs: Date.now() - context.startTime,
        attempted,
        ...counts,
      });

      return { batchId: batch.id, countryName: batch.countryName, attempted, completed, counts };
    });
  }

  /**
   * Resolve and judge one element. Store failures propagate; geocoder
   * failures become `lookupFailed`.
   */
  async validateId(ref: ElementRef, countryName: string): Promise<ValidationOutcome> {
    const { geocoder, territories } = this.options;

    let place: GeocoderPlace | null;
    try {
      place = await geocoder.lookup(ref);
    } catch (error) {
      if (!isGeocoderFailure(error)) {
        throw error;
      }
      logger.warn('Lookup failed, skipping element', {
        ref,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'lookupFailed';
    }

    if (!place) {
      return 'notFound';
    }

    const geocoderCountry = place.address.country;
    const text = cleanDisplayName(place.displayName, countryName, geocoderCountry, territories);

    if (!this.heuristics.looksLikeAddress(text)) {
      logger.debug('Rejected: not address shaped', { ref, text });
      return 'rejectedShape';
    }

    const regionCountry = resolveRegionCountry(countryName, geocoderCountry, territories);
    if (!this.heuristics.matchesRegion(text, regionCountry)) {
      logger.debug('Rejected: outside region', { ref, text, regionCountry });
      return 'rejectedRegion';
    }

    if (place.placeRank <= this.options.placeRankThreshold) {
      logger.debug('Rejected: place rank too low', { ref, placeRank: place.placeRank });
      return 'rejectedRank';
    }

    let score: number;
    try {
      score = await this.score(place, text);
    } catch (error) {
      if (!isGeocoderFailure(error)) {
        throw error;
      }
      logger.warn('Corroborating search failed, skipping element', {
        ref,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'lookupFailed';
    }

    if (score < this.options.minScore) {
      logger.debug('Rejected: score below threshold', { ref, score });
      return 'rejectedScore';
    }

    this.options.store.upsertAddress({
      osmId: ref,
      country: countryName,
      city: firstField(place.address, CITY_FIELDS),
      street: firstField(place.address, STREET_FIELDS),
      score,
      address: text,
      placeRank: place.placeRank,
      confidenceMode: this.options.confidenceMode,
    });
    return 'accepted';
  }

  private async score(place: GeocoderPlace, text: string): Promise<number> {
    if (this.options.confidenceMode === 'corroborate') {
      const match = await this.options.geocoder.search(text);
      return corroborationScore(place, match);
    }
    return boundingBoxScore(place);
  }
}
