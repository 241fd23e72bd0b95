/**
 * CLI command implementations
 *
 * Each command takes its collaborators explicitly and returns a plain object;
 * `program.ts` opens the store, prints the result as JSON and closes up.
 */

import { existsSync, mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { HarvesterConfig } from '../config/env.js';
import type { StaticData } from '../config/static-data.js';
import type { Geocoder } from '../domain/geocoder-client.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import { FallbackLog } from '../extraction/fallback-log.js';
import { ExtractionRunner, type ExtractionResult, type FeatureSource } from '../pipeline/extraction-runner.js';
import { BatchScheduler } from '../pipeline/scheduler.js';
import type { WorkerSummary } from '../pipeline/types.js';
import { GeocodeValidator } from '../pipeline/validator.js';
import { ValidationWorker } from '../pipeline/worker.js';
import { buildDictionary, type DictionaryResult } from '../reporting/dictionary.js';
import { buildPenaltyReport, readDictionaryFile, type PenaltyReportEntry } from '../reporting/penalty-report.js';
import type { HarvestStore } from '../store/db.js';
import type { CountryState, StatusCounts, BatchStatus } from '../store/types.js';

export function writeJsonFile(path: string, value: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}

export function seedCountries(store: HarvestStore, staticData: StaticData): { seeded: number; total: number } {
  const seeded = store.seedCountries(staticData.countries);
  logger.info('Countries seeded', { seeded, total: staticData.countries.length });
  return { seeded, total: staticData.countries.length };
}

export interface ExtractDeps {
  config: HarvesterConfig;
  staticData: StaticData;
  /** null sends every batch to the fallback log */
  store: HarvestStore | null;
  source?: FeatureSource;
}

function createRunner(deps: ExtractDeps): ExtractionRunner {
  return new ExtractionRunner({
    staticData: deps.staticData,
    store: deps.store,
    scheduler: deps.store ? new BatchScheduler(deps.store) : null,
    fallback: new FallbackLog(deps.config.fallbackLogPath),
    osmDataDir: deps.config.osmDataDir,
    batchSize: deps.config.batchSize,
    source: deps.source,
  });
}

export async function extractCountry(deps: ExtractDeps, countryName: string): Promise<ExtractionResult> {
  return createRunner(deps).extractCountry(countryName);
}

export async function extractAll(deps: ExtractDeps): Promise<ExtractionResult[]> {
  return createRunner(deps).extractAll();
}

export interface ValidateDeps {
  config: HarvesterConfig;
  staticData: StaticData;
  store: HarvestStore;
  geocoder: Geocoder;
  workerId: string;
  now?: () => number;
}

export interface ValidateOptions {
  country?: string;
  limit?: number;
}

/**
 * Drain open batches of one country, or of every country still in
 * origin or processing
 */
export async function validate(deps: ValidateDeps, options: ValidateOptions = {}): Promise<WorkerSummary> {
  const { config, store } = deps;
  const scheduler = new BatchScheduler(store, deps.now);
  const validator = new GeocodeValidator({
    geocoder: deps.geocoder,
    store,
    scheduler,
    territories: deps.staticData.territories,
    confidenceMode: config.confidenceMode,
    minScore: config.minScore,
    placeRankThreshold: config.placeRankThreshold,
  });
  const worker = new ValidationWorker({
    scheduler,
    validator,
    workerId: deps.workerId,
    staleTimeoutMs: config.staleBatchTimeoutMs,
    sweepIntervalMs: config.staleSweepIntervalMs,
    now: deps.now,
  });

  const countries = options.country
    ? [options.country]
    : store.listCountries(['origin', 'processing']).map((country) => country.countryName);

  const summary = await worker.run({ countries, limit: options.limit });
  logger.info('Validation run finished', { ...summary, geocoder: metrics.getMetrics().geocoderRequests });
  return summary;
}

export function sweep(store: HarvestStore, config: HarvesterConfig, now: number = Date.now()): { reset: number } {
  return { reset: new BatchScheduler(store).sweepStaleClaims(config.staleBatchTimeoutMs, now) };
}

export interface StatusReport {
  batches: StatusCounts<BatchStatus>;
  countries: StatusCounts<CountryState>;
  addresses: number;
  failedCountries: string[];
}

export function status(store: HarvestStore): StatusReport {
  return {
    batches: store.batchCounts(),
    countries: store.countryCounts(),
    addresses: store.countAddresses(),
    failedCountries: store.listCountries(['failed']).map((country) => country.countryName),
  };
}

export function backfillKeys(store: HarvestStore): { scanned: number; updated: number } {
  const result = store.backfillKeys();
  logger.info('Address keys backfilled', result);
  return result;
}

/**
 * Build the dictionary from every country with accepted addresses and write
 * it to `outPath`; the per-country report is returned
 */
export function writeDictionary(store: HarvestStore, target: number, outPath: string): DictionaryResult['report'] {
  const { dictionary, report } = buildDictionary(store, store.addressCountries(), target);
  writeJsonFile(outPath, dictionary);
  logger.info('Dictionary written', {
    path: outPath,
    successfulCountries: report.successfulCountries,
    skippedCountries: report.skippedCountries,
  });
  return report;
}

export function writePenaltyReport(inPath: string, outPath: string): Record<string, PenaltyReportEntry> {
  const report = buildPenaltyReport(readDictionaryFile(inPath));
  writeJsonFile(outPath, report);
  logger.info('Penalty report written', { path: outPath, countries: Object.keys(report).length });
  return report;
}

/**
 * Replay the fallback log into the store. The log is renamed to
 * `<path>.imported` afterwards so a second run does not insert it twice.
 */
export function importFallback(store: HarvestStore, fallbackPath: string): { imported: number; archivedTo: string | null } {
  if (!existsSync(fallbackPath)) {
    logger.info('No fallback log to import', { path: fallbackPath });
    return { imported: 0, archivedTo: null };
  }

  const drafts = new FallbackLog(fallbackPath).read();
  if (drafts.length > 0) {
    store.insertBatches(drafts);
  }

  const archivedTo = `${fallbackPath}.imported`;
  renameSync(fallbackPath, archivedTo);
  logger.info('Fallback log imported', { imported: drafts.length, archivedTo });
  return { imported: drafts.length, archivedTo };
}
