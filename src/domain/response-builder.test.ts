/**
 * Unit tests for response-builder
 * Tests MCP tool response formatting
 */

import { describe, it, expect } from 'vitest';
import { buildToolResponse, buildErrorResponse } from './response-builder.js';
import type { HarvesterErrorShape } from './types.js';

describe('buildToolResponse', () => {
  it('should build response with text and structured content', () => {
    const structuredContent = {
      normalization: 'aeimnst',
      firstSection: '12 main street',
    };

    const result = buildToolResponse(structuredContent, 'Fingerprint: aeimnst');

    expect(result).toEqual({
      content: [
        {
          type: 'text',
          text: 'Fingerprint: aeimnst',
        },
      ],
      structuredContent,
    });
  });

  it('should handle empty structured content', () => {
    const result = buildToolResponse({}, 'Empty response');

    expect(result.structuredContent).toEqual({});
    expect(result.content).toEqual([{ type: 'text', text: 'Empty response' }]);
  });
});

describe('buildErrorResponse', () => {
  it('should build error response with basic error', () => {
    const error: HarvesterErrorShape = {
      code: 'INVALID_INPUT',
      message: 'At least one variant is required',
      retryable: false,
    };

    const result = buildErrorResponse(error);

    expect(result).toEqual({
      content: [
        {
          type: 'text',
          text: 'At least one variant is required',
        },
      ],
      structuredContent: {
        error,
      },
      isError: true,
    });
  });

  it('should include retry-after in text summary when present', () => {
    const error: HarvesterErrorShape = {
      code: 'RATE_LIMITED',
      message: 'Geocoder rate limit exceeded.',
      retryable: true,
      details: {
        retryAfterSeconds: 60,
      },
    };

    const result = buildErrorResponse(error);

    expect(result.content).toEqual([
      { type: 'text', text: 'Geocoder rate limit exceeded. Retry after 60 seconds.' },
    ]);
    expect(result.isError).toBe(true);
  });

  it('should handle error without retry-after', () => {
    const error: HarvesterErrorShape = {
      code: 'STORE_UNAVAILABLE',
      message: 'Store unavailable during status: disk I/O error',
      retryable: false,
      details: {
        upstreamStatus: 503,
      },
    };

    const result = buildErrorResponse(error);

    expect(result.content).toEqual([
      { type: 'text', text: 'Store unavailable during status: disk I/O error' },
    ]);
    expect(result.structuredContent).toEqual({ error });
  });
});
