#!/usr/bin/env node
/**
 * OSM address harvester
 * CLI entry point
 */

import { buildProgram } from './cli/program.js';
import { StoreUnavailableError } from './domain/error-handler.js';
import { logger } from './domain/logger.js';

async function main() {
  process.on('uncaughtException', (error: Error) => {
    logger.logError(error, { context: 'uncaughtException' });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
    process.exit(1);
  });

  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      logger.error('Store unavailable, stopping', { code: error.code, error: error.message });
    } else if (error instanceof Error) {
      logger.logError(error, { context: 'cli' });
    } else {
      logger.error('Unknown error', { error: String(error) });
    }
    process.exitCode = 1;
  }
}

main();
