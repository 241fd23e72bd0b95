/**
 * GeoExtractor
 *
 * One sequential pass over a feature source: skip already validated ids, apply
 * the tag rule and the region rule, group selections into fixed-size batches
 * and hand them to the store in bulk. If the store throws, the pending batches
 * and every later one go to the fallback log instead.
 */

import type { RegionConfig } from '../config/static-data.js';
import type { ElementRef } from '../domain/types.js';
import { logger } from '../domain/logger.js';
import { featureInRegion, isWholeCountry } from './regions.js';
import { defaultTagRule, matchesTagRule, type TagRule } from './tag-rules.js';
import type { BatchDraft, BatchLog, BatchSink, CandidateFeature, ExtractionStats } from './types.js';

export interface ExtractorOptions {
  countryCode: string;
  countryName: string;
  region?: RegionConfig;
  tagRule?: TagRule;
  batchSize: number;
  /** Element ids already in the validated set for this country */
  validatedIds: ReadonlySet<string>;
  /** null writes straight to the fallback log */
  sink: BatchSink | null;
  fallback: BatchLog;
  /** Pending batches per bulk insert; adaptive when unset */
  flushEvery?: number;
}

const PROGRESS_EVERY = 100_000;

/**
 * Larger bulk inserts early on, smaller ones once the run has produced a lot
 */
export function adaptiveFlushSize(selected: number): number {
  if (selected < 10_000) {
    return 1000;
  }
  if (selected < 50_000) {
    return 500;
  }
  return 250;
}

export class GeoExtractor {
  private readonly options: ExtractorOptions;
  private readonly tagRule: TagRule;
  private current: ElementRef[] = [];
  private pending: BatchDraft[] = [];
  private useFallback: boolean;
  private stats: ExtractionStats = {
    scanned: 0,
    selected: 0,
    skipped: 0,
    batches: 0,
    fallbackBatches: 0,
  };

  constructor(options: ExtractorOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error(`Invalid batch size: ${options.batchSize}`);
    }
    this.options = options;
    this.tagRule = options.tagRule ?? defaultTagRule;
    this.useFallback = options.sink === null;
  }

  async run(source: AsyncIterable<CandidateFeature>): Promise<ExtractionStats> {
    const { countryCode, countryName, region } = this.options;

    logger.info('Extraction started', {
      countryCode,
      countryName,
      wholeCountry: isWholeCountry(region),
      validatedIds: this.options.validatedIds.size,
      fallbackOnly: this.useFallback,
    });

    for await (const feature of source) {
      this.offer(feature);
    }
    this.finish();

    logger.info('Extraction finished', { countryCode, countryName, ...this.stats });
    return { ...this.stats };
  }

  private offer(feature: CandidateFeature): void {
    this.stats.scanned++;
    if (this.stats.scanned % PROGRESS_EVERY === 0) {
      logger.info('Extraction progress', { countryName: this.options.countryName, ...this.stats });
    }

    if (this.options.validatedIds.has(feature.ref)) {
      this.stats.skipped++;
      return;
    }
    if (!matchesTagRule(feature.tags, this.tagRule)) {
      return;
    }
    if (!featureInRegion(feature.points, this.options.region)) {
      return;
    }

    this.stats.selected++;
    this.current.push(feature.ref);
    if (this.current.length >= this.options.batchSize) {
      this.closeBatch();
    }
  }

  private closeBatch(): void {
    if (this.current.length === 0) {
      return;
    }
    this.pending.push({
      countryCode: this.options.countryCode,
      countryName: this.options.countryName,
      ids: this.current,
    });
    this.current = [];
    this.stats.batches++;

    const flushSize = this.options.flushEvery ?? adaptiveFlushSize(this.stats.selected);
    if (this.pending.length >= flushSize) {
      this.flush();
    }
  }

  private finish(): void {
    this.closeBatch();
    this.flush();
  }

  private flush(): void {
    if (this.pending.length === 0) {
      return;
    }
    const batches = this.pending;
    this.pending = [];

    const sink = this.options.sink;
    if (!this.useFallback && sink) {
      try {
        sink.insertBatches(batches);
        return;
      } catch (error) {
        logger.error('Batch insert failed, switching to fallback log', {
          countryName: this.options.countryName,
          batches: batches.length,
          fallbackPath: this.options.fallback.path,
          error: error instanceof Error ? error.message : String(error),
        });
        this.useFallback = true;
      }
    }

    this.options.fallback.append(batches);
    this.stats.fallbackBatches += batches.length;
  }
}
