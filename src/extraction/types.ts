/**
 * Types for the extraction stage
 */

import type { ElementRef } from '../domain/types.js';

export interface LonLat {
  lon: number;
  lat: number;
}

/** One tagged OSM element with the coordinates known for it */
export interface CandidateFeature {
  ref: ElementRef;
  tags: Record<string, string>;
  points: LonLat[];
}

/** A batch before the store assigns it an id */
export interface BatchDraft {
  countryCode: string;
  countryName: string;
  ids: ElementRef[];
}

export interface ExtractionStats {
  /** Elements offered by the source */
  scanned: number;
  /** Elements that passed every rule */
  selected: number;
  /** Elements already validated for this country */
  skipped: number;
  batches: number;
  /** Batches written to the fallback log instead of the store */
  fallbackBatches: number;
}

/**
 * Where extracted batches go. The store implements it; the fallback log
 * takes over when it throws.
 */
export interface BatchSink {
  insertBatches(batches: readonly BatchDraft[]): void;
}

/** Append-only destination used when the sink is unavailable */
export interface BatchLog {
  readonly path: string;
  append(batches: readonly BatchDraft[]): void;
}
