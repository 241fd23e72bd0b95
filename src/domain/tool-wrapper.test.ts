/**
 * Unit tests for wrapTool
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { wrapTool } from './tool-wrapper.js';
import { buildErrorResponse, buildToolResponse } from './response-builder.js';
import { getContext } from './request-context.js';
import { metrics } from './metrics.js';

vi.mock('./logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    logError: vi.fn(),
    logToolStart: vi.fn(),
    logToolEnd: vi.fn(),
  },
}));

import { logger } from './logger.js';

describe('wrapTool', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    metrics.reset();
  });

  it('should run the handler inside a request context', async () => {
    const wrapped = wrapTool('address_normalize', async () => {
      const context = getContext();
      return buildToolResponse({ toolName: context?.toolName, hasId: Boolean(context?.requestId) }, 'ok');
    });

    const result = await wrapped({ text: 'x' });

    expect(result.structuredContent).toEqual({ toolName: 'address_normalize', hasId: true });
    expect(metrics.getMetrics().toolCalls).toEqual({ address_normalize: { success: 1 } });
    expect(logger.logToolStart).toHaveBeenCalledWith('address_normalize', { text: 'x' }, expect.any(String));
  });

  it('should record the error code of an error result', async () => {
    const wrapped = wrapTool('address_penalty', async () =>
      buildErrorResponse({ code: 'INVALID_INPUT', message: 'bad', retryable: false })
    );

    await wrapped({});

    expect(logger.logToolEnd).toHaveBeenCalledWith(
      'address_penalty',
      expect.any(Number),
      'error',
      expect.any(String),
      'INVALID_INPUT'
    );
    expect(metrics.getMetrics().toolCalls).toEqual({ address_penalty: { error: 1 } });
  });

  it('should rethrow unexpected errors after recording them', async () => {
    const wrapped = wrapTool('pipeline_status', async () => {
      throw new Error('boom');
    });

    await expect(wrapped({})).rejects.toThrow('boom');
    expect(logger.logError).toHaveBeenCalledTimes(1);
    expect(metrics.getMetrics().toolCalls).toEqual({ pipeline_status: { error: 1 } });
  });
});
