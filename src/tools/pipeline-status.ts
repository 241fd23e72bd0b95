/**
 * pipeline_status tool handler
 * Batch and country counts straight from the store
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { PipelineStatusInput } from '../addresses/schemas.js';
import { toErrorShape } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { buildErrorResponse, buildToolResponse } from '../domain/response-builder.js';
import type { HarvestStore } from '../store/db.js';

export type StatusStore = Pick<HarvestStore, 'batchCounts' | 'countryCounts' | 'countAddresses' | 'getCountry'>;

export async function handlePipelineStatus(input: PipelineStatusInput, store: StatusStore): Promise<CallToolResult> {
  logger.debug('Handling pipeline_status', { country: input.country });

  try {
    const batches = store.batchCounts(input.country);
    const countries = store.countryCounts();
    const addresses = store.countAddresses(input.country);
    const country = input.country ? store.getCountry(input.country) : null;

    const scope = input.country ? `${input.country} (${country?.status ?? 'not seeded'})` : 'all countries';
    const { origin, checking, checked } = batches.byStatus;
    let summary = `Batches for ${scope}: ${batches.total} total, ${origin} waiting, ${checking} in progress, ${checked} checked.\n`;
    summary += `Validated addresses: ${addresses}.\n`;
    summary += `Countries: ${countries.byStatus.completed}/${countries.total} completed, ${countries.byStatus.processing} processing, ${countries.byStatus.failed} failed.`;

    return buildToolResponse(
      {
        country: input.country ?? null,
        countryStatus: country?.status ?? null,
        batches,
        countries,
        addresses,
      },
      summary
    );
  } catch (error) {
    logger.error('Error in pipeline_status', {
      country: input.country,
      error: error instanceof Error ? error.message : String(error),
    });
    return buildErrorResponse(toErrorShape(error));
  }
}
