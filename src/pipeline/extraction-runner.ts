/**
 * Runs the GeoExtractor for configured countries
 *
 * Picks each country's PBF file (`regions.json` sourceFile, else
 * `<code>-latest.osm.pbf`) under OSM_DATA_DIR. A country with no code or no
 * file has nothing to extract and is marked failed, unless it already finished.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { findCountry, type BoundingRegion, type Country, type StaticData } from '../config/static-data.js';
import { StoreUnavailableError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { GeoExtractor } from '../extraction/extractor.js';
import { readPbfFeatures } from '../extraction/pbf-source.js';
import { includeEnvelope } from '../extraction/regions.js';
import type { TagRule } from '../extraction/tag-rules.js';
import type { BatchLog, CandidateFeature, ExtractionStats } from '../extraction/types.js';
import type { HarvestStore } from '../store/db.js';
import type { BatchScheduler } from './scheduler.js';

export type FeatureSource = (path: string, envelope: BoundingRegion | undefined) => AsyncIterable<CandidateFeature>;

export type ExtractionResult =
  | { countryName: string; status: 'extracted'; path: string; stats: ExtractionStats }
  | { countryName: string; status: 'failed'; reason: string };

export interface ExtractionRunnerOptions {
  staticData: StaticData;
  /** null writes every batch to the fallback log */
  store: Pick<HarvestStore, 'insertBatches' | 'validatedIds' | 'countriesWithBatches' | 'listCountries'> | null;
  scheduler: BatchScheduler | null;
  fallback: BatchLog;
  osmDataDir: string;
  batchSize: number;
  tagRule?: TagRule;
  source?: FeatureSource;
}

export function resolvePbfPath(country: Country, data: StaticData, osmDataDir: string): string | null {
  if (!country.code) {
    return null;
  }
  const sourceFile = data.regions[country.code]?.sourceFile ?? `${country.code}-latest.osm.pbf`;
  return join(osmDataDir, sourceFile);
}

const defaultSource: FeatureSource = (path, envelope) => readPbfFeatures(path, { envelope });

export class ExtractionRunner {
  private readonly options: ExtractionRunnerOptions;
  private readonly source: FeatureSource;

  constructor(options: ExtractionRunnerOptions) {
    this.options = options;
    this.source = options.source ?? defaultSource;
  }

  async extractCountry(countryName: string): Promise<ExtractionResult> {
    const { staticData, store, osmDataDir } = this.options;
    const country = findCountry(staticData, countryName);
    if (!country) {
      throw new Error(`Unknown country: ${countryName}`);
    }

    const path = resolvePbfPath(country, staticData, osmDataDir);
    if (!country.code || !path || !existsSync(path)) {
      const reason = path ? `No extract at ${path}` : 'Country has no extract code';
      this.options.scheduler?.markCountryFailed(country.name, country.code);
      logger.warn('Nothing to extract', { countryName: country.name, reason });
      return { countryName: country.name, status: 'failed', reason };
    }

    const region = staticData.regions[country.code];
    const known = this.knownIds(country.name);
    const extractor = new GeoExtractor({
      countryCode: country.code,
      countryName: country.name,
      region,
      tagRule: this.options.tagRule,
      batchSize: this.options.batchSize,
      validatedIds: known.ids,
      sink: known.storeUsable ? store : null,
      fallback: this.options.fallback,
    });

    const stats = await extractor.run(this.source(path, includeEnvelope(region)));
    return { countryName: country.name, status: 'extracted', path, stats };
  }

  /**
   * Already validated ids. A store that cannot answer will not take batches
   * either, so extraction goes straight to the fallback log.
   */
  private knownIds(countryName: string): { ids: ReadonlySet<string>; storeUsable: boolean } {
    const { store } = this.options;
    if (!store) {
      return { ids: new Set(), storeUsable: false };
    }
    try {
      return { ids: store.validatedIds(countryName), storeUsable: true };
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) {
        throw error;
      }
      logger.error('Store unavailable, extracting to the fallback log', {
        countryName,
        fallbackPath: this.options.fallback.path,
        error: error.message,
      });
      return { ids: new Set(), storeUsable: false };
    }
  }

  /**
   * Extract every country still in `origin` that has no batches yet
   */
  async extractAll(): Promise<ExtractionResult[]> {
    const { store } = this.options;
    if (!store) {
      throw new Error('extract-all needs the store to find pending countries');
    }

    const done = store.countriesWithBatches();
    const pending = store.listCountries(['origin']).filter((country) => !done.has(country.countryName));
    logger.info('Extracting pending countries', { pending: pending.length, skipped: done.size });

    const results: ExtractionResult[] = [];
    for (const country of pending) {
      results.push(await this.extractCountry(country.countryName));
    }
    return results;
  }
}
