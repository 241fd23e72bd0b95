/**
 * address_penalty tool handler
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { scoreDuplicates } from '../addresses/penalty.js';
import type { AddressPenaltyInput } from '../addresses/schemas.js';
import { logger } from '../domain/logger.js';
import { buildToolResponse } from '../domain/response-builder.js';
import { penaltyLevel } from '../reporting/penalty-report.js';

export async function handleAddressPenalty(input: AddressPenaltyInput): Promise<CallToolResult> {
  logger.debug('Handling address_penalty', { variants: input.variants.length });

  const breakdown = scoreDuplicates(input.variants);
  const level = penaltyLevel(breakdown.penalty);

  let summary = `Penalty ${breakdown.penalty} (${level}) over ${input.variants.length} variants: `;
  summary += `${breakdown.fullTextDuplicates} full-text duplicates, `;
  summary += `${breakdown.firstSectionDuplicates} repeated first sections.`;

  const repeated = Object.entries(breakdown.repeatedFirstSections);
  if (repeated.length > 0) {
    summary += '\n' + repeated.map(([section, count]) => `- "${section}" x${count}`).join('\n');
  }

  return buildToolResponse({ ...breakdown, level, variantCount: input.variants.length }, summary);
}
