/**
 * Commander program for the harvester CLI
 *
 * Command results go to stdout as JSON; logs go to stderr.
 */

import { hostname } from 'node:os';
import { Command, InvalidArgumentError } from 'commander';
import { getConfig, type HarvesterConfig } from '../config/env.js';
import { loadStaticData, type StaticData } from '../config/static-data.js';
import { GeocoderClient, type Geocoder } from '../domain/geocoder-client.js';
import { logger } from '../domain/logger.js';
import { RateLimiter } from '../domain/rate-limiter.js';
import { RetryExecutor } from '../domain/retry.js';
import { DEFAULT_DICTIONARY_TARGET } from '../reporting/dictionary.js';
import { HarvestStore } from '../store/db.js';
import { openStatusStore } from '../server.js';
import { startHttpServer } from '../transport/http.js';
import { startStdioServer } from '../transport/stdio.js';
import {
  backfillKeys,
  extractAll,
  extractCountry,
  importFallback,
  seedCountries,
  status,
  sweep,
  validate,
  writeDictionary,
  writePenaltyReport,
} from './commands.js';

export interface CliRuntime {
  loadConfig(): HarvesterConfig;
  loadStaticData(config: HarvesterConfig): StaticData;
  openStore(config: HarvesterConfig): HarvestStore;
  createGeocoder(config: HarvesterConfig): Geocoder;
  print(text: string): void;
}

export function createGeocoder(config: HarvesterConfig): Geocoder {
  return new GeocoderClient({
    baseUrl: config.geocoderBaseUrl,
    userAgent: config.geocoderUserAgent,
    timeoutMs: config.geocoderTimeoutMs,
    rateLimiter: new RateLimiter(config.geocoderMinIntervalMs),
    retry: new RetryExecutor({
      maxAttempts: config.geocoderMaxAttempts,
      delayMs: config.geocoderRetryDelayMs,
    }),
  });
}

export const defaultRuntime: CliRuntime = {
  loadConfig: getConfig,
  loadStaticData: (config) => loadStaticData(config.staticDataDir),
  openStore: (config) => new HarvestStore(config.storePath),
  createGeocoder,
  print: (text) => {
    process.stdout.write(`${text}\n`);
  },
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function buildProgram(runtime: CliRuntime = defaultRuntime): Command {
  const program = new Command();

  const print = (value: unknown) => runtime.print(JSON.stringify(value, null, 2));

  const setup = () => {
    const config = runtime.loadConfig();
    logger.setLevel(config.logLevel);
    return config;
  };

  async function withStore<T>(config: HarvesterConfig, fn: (store: HarvestStore) => T | Promise<T>): Promise<T> {
    const store = runtime.openStore(config);
    try {
      return await fn(store);
    } finally {
      store.close();
    }
  }

  program
    .name('osm-address-harvester')
    .description('Harvest, validate and score postal addresses from OpenStreetMap extracts')
    .version('0.1.0');

  program
    .command('seed-countries')
    .description('Create an origin status row for every configured country')
    .action(async () => {
      const config = setup();
      const staticData = runtime.loadStaticData(config);
      print(await withStore(config, (store) => seedCountries(store, staticData)));
    });

  program
    .command('extract')
    .description('Extract candidate element ids for one country into batches')
    .argument('<country>', 'country name as in countries.json')
    .option('--json', 'write batches to the fallback log instead of the store')
    .action(async (country: string, options: { json?: boolean }) => {
      const config = setup();
      const staticData = runtime.loadStaticData(config);
      if (options.json) {
        print(await extractCountry({ config, staticData, store: null }, country));
        return;
      }
      print(await withStore(config, (store) => extractCountry({ config, staticData, store }, country)));
    });

  program
    .command('extract-all')
    .description('Extract every country still in origin that has no batches')
    .action(async () => {
      const config = setup();
      const staticData = runtime.loadStaticData(config);
      print(await withStore(config, (store) => extractAll({ config, staticData, store })));
    });

  program
    .command('validate')
    .description('Claim open batches and validate their ids through the geocoder')
    .argument('[country]', 'only this country; every origin or processing country otherwise')
    .option('--limit <n>', 'stop after this many batches', parsePositiveInt)
    .action(async (country: string | undefined, options: { limit?: number }) => {
      const config = setup();
      const staticData = runtime.loadStaticData(config);
      const geocoder = runtime.createGeocoder(config);
      const workerId = `${hostname()}-${process.pid}`;
      print(
        await withStore(config, (store) =>
          validate({ config, staticData, store, geocoder, workerId }, { country, limit: options.limit })
        )
      );
    });

  program
    .command('sweep')
    .description('Return stale checking batches to origin')
    .action(async () => {
      const config = setup();
      print(await withStore(config, (store) => sweep(store, config)));
    });

  program
    .command('status')
    .description('Show batch, country and address counts')
    .action(async () => {
      const config = setup();
      print(await withStore(config, (store) => status(store)));
    });

  program
    .command('backfill-keys')
    .description('Recompute normalization and first_section for stored addresses')
    .action(async () => {
      const config = setup();
      print(await withStore(config, (store) => backfillKeys(store)));
    });

  program
    .command('dictionary')
    .description('Write the top-scoring addresses with unique first sections per country')
    .option('--target <n>', 'addresses per country', parsePositiveInt, DEFAULT_DICTIONARY_TARGET)
    .requiredOption('--out <file>', 'dictionary JSON output path')
    .action(async (options: { target: number; out: string }) => {
      const config = setup();
      print(await withStore(config, (store) => writeDictionary(store, options.target, options.out)));
    });

  program
    .command('penalty-report')
    .description('Score every country of a dictionary file for duplication')
    .requiredOption('--in <file>', 'dictionary JSON input path')
    .requiredOption('--out <file>', 'report JSON output path')
    .action((options: { in: string; out: string }) => {
      setup();
      print(writePenaltyReport(options.in, options.out));
    });

  program
    .command('import-fallback')
    .description('Insert the batches of the fallback log into the store')
    .action(async () => {
      const config = setup();
      print(await withStore(config, (store) => importFallback(store, config.fallbackLogPath)));
    });

  program
    .command('serve')
    .description('Run the MCP server (stdio, or HTTP when HARVESTER_PORT is set)')
    .action(async () => {
      const config = setup();
      const deps = { store: openStatusStore(config) };

      if (config.harvesterPort) {
        logger.info('Using HTTP transport', { port: config.harvesterPort });
        const server = startHttpServer(config, deps);
        const shutdown = () => {
          logger.info('Shutdown signal received');
          server.close();
          process.exit(0);
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
        return;
      }

      logger.info('Using stdio transport');
      const server = await startStdioServer(config, deps);
      const shutdown = async () => {
        logger.info('Shutdown signal received, closing server...');
        try {
          await server.close();
          logger.info('Server closed successfully');
          process.exit(0);
        } catch (error) {
          logger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        }
      };
      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());
    });

  return program;
}
