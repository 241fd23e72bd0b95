/**
 * Response builder for MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { HarvesterErrorShape } from './types.js';

/**
 * Build a successful tool response carrying both structured content and a
 * human-readable summary
 */
export function buildToolResponse(
  structuredContent: Record<string, unknown>,
  textSummary: string
): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: textSummary,
      },
    ],
    structuredContent,
  };
}

/**
 * Build an error tool response from a structured harvester error
 */
export function buildErrorResponse(error: HarvesterErrorShape): CallToolResult {
  const textSummary = error.details?.retryAfterSeconds
    ? `${error.message} Retry after ${error.details.retryAfterSeconds} seconds.`
    : error.message;

  return {
    content: [
      {
        type: 'text',
        text: textSummary,
      },
    ],
    structuredContent: {
      error,
    },
    isError: true,
  };
}
