/**
 * Configuration management for the address harvester
 * Loads and validates environment variables
 */

import type { LogLevel } from '../domain/logger.js';

export type ConfidenceMode = 'bbox' | 'corroborate';

export interface HarvesterConfig {
  // Geocoder
  geocoderBaseUrl: string;
  geocoderUserAgent: string;
  geocoderTimeoutMs: number;
  geocoderMinIntervalMs: number;
  geocoderMaxAttempts: number;
  geocoderRetryDelayMs: number;

  // Validation
  confidenceMode: ConfidenceMode;
  minScore: number;
  placeRankThreshold: number;

  // Storage and files
  storePath: string;
  osmDataDir: string;
  fallbackLogPath: string;
  staticDataDir: string;

  // Scheduling
  batchSize: number;
  staleBatchTimeoutMs: number;
  staleSweepIntervalMs: number;

  // Server
  harvesterPort?: number;
  logLevel: LogLevel;

  // Server metadata
  serverName: string;
  serverVersion: string;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const CONFIDENCE_MODES: readonly ConfidenceMode[] = ['bbox', 'corroborate'];

/** Nominatim's usage policy: at most one request per second */
export const MIN_GEOCODER_INTERVAL_MS = 1000;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: ${raw} (expected an integer >= ${min})`);
  }
  return value;
}

function readScore(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Invalid ${name}: ${raw} (expected a number between 0 and 1)`);
  }
  return value;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name] || fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return match;
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): HarvesterConfig {
  const geocoderBaseUrl = env.GEOCODER_BASE_URL || 'https://nominatim.openstreetmap.org';
  try {
    new URL(geocoderBaseUrl);
  } catch {
    throw new Error(`Invalid GEOCODER_BASE_URL: ${geocoderBaseUrl}`);
  }

  const geocoderMinIntervalMs = readInt(env, 'GEOCODER_MIN_INTERVAL_MS', MIN_GEOCODER_INTERVAL_MS, 0);
  if (geocoderMinIntervalMs < MIN_GEOCODER_INTERVAL_MS) {
    throw new Error(
      `GEOCODER_MIN_INTERVAL_MS must be at least ${MIN_GEOCODER_INTERVAL_MS}, got ${geocoderMinIntervalMs}`
    );
  }

  const harvesterPort = env.HARVESTER_PORT ? readInt(env, 'HARVESTER_PORT', 0, 1) : undefined;

  return {
    geocoderBaseUrl,
    geocoderUserAgent: env.GEOCODER_USER_AGENT || 'osm-address-harvester/0.1.0',
    geocoderTimeoutMs: readInt(env, 'GEOCODER_TIMEOUT_MS', 10000, 1),
    geocoderMinIntervalMs,
    geocoderMaxAttempts: readInt(env, 'GEOCODER_MAX_ATTEMPTS', 3, 1),
    geocoderRetryDelayMs: readInt(env, 'GEOCODER_RETRY_DELAY_MS', 2000, 0),
    confidenceMode: readChoice(env, 'CONFIDENCE_MODE', CONFIDENCE_MODES, 'bbox'),
    minScore: readScore(env, 'MIN_SCORE', 0.9),
    placeRankThreshold: readInt(env, 'PLACE_RANK_THRESHOLD', 20, 0),
    storePath: env.STORE_PATH || './data/addresses.db',
    osmDataDir: env.OSM_DATA_DIR || './osm_data',
    fallbackLogPath: env.FALLBACK_LOG_PATH || './output/batches.jsonl',
    staticDataDir: env.STATIC_DATA_DIR || './data',
    batchSize: readInt(env, 'BATCH_SIZE', 100, 1),
    staleBatchTimeoutMs: readInt(env, 'STALE_BATCH_TIMEOUT_MS', 30 * 60 * 1000, 1),
    staleSweepIntervalMs: readInt(env, 'STALE_SWEEP_INTERVAL_MS', 5 * 60 * 1000, 1),
    harvesterPort,
    logLevel: readChoice(env, 'HARVESTER_LOG_LEVEL', LOG_LEVELS, 'info'),
    serverName: 'osm-address-harvester',
    serverVersion: '0.1.0',
  };
}

// Singleton config instance
let configInstance: HarvesterConfig | null = null;

/**
 * Get the current configuration (loads on first call)
 */
export function getConfig(): HarvesterConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
