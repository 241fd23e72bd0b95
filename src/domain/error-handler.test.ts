/**
 * Unit tests for error-handler
 * Tests status mapping and structured error creation
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  mapHttpStatusToErrorCode,
  handleHttpError,
  handleNetworkError,
  GeocoderError,
  StoreUnavailableError,
  IllegalTransitionError,
  toErrorShape,
} from './error-handler.js';

vi.mock('./logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from './logger.js';

describe('mapHttpStatusToErrorCode', () => {
  it('should map 400 and 404 to INVALID_INPUT', () => {
    expect(mapHttpStatusToErrorCode(400)).toBe('INVALID_INPUT');
    expect(mapHttpStatusToErrorCode(404)).toBe('INVALID_INPUT');
  });

  it('should map 429 and 503 to RATE_LIMITED', () => {
    expect(mapHttpStatusToErrorCode(429)).toBe('RATE_LIMITED');
    expect(mapHttpStatusToErrorCode(503)).toBe('RATE_LIMITED');
  });

  it('should map other 5xx to GEOCODER_UNAVAILABLE', () => {
    expect(mapHttpStatusToErrorCode(500)).toBe('GEOCODER_UNAVAILABLE');
    expect(mapHttpStatusToErrorCode(502)).toBe('GEOCODER_UNAVAILABLE');
    expect(mapHttpStatusToErrorCode(504)).toBe('GEOCODER_UNAVAILABLE');
  });

  it('should map unknown status to INTERNAL_ERROR', () => {
    expect(mapHttpStatusToErrorCode(403)).toBe('INTERNAL_ERROR');
    expect(mapHttpStatusToErrorCode(418)).toBe('INTERNAL_ERROR');
  });
});

describe('GeocoderError', () => {
  it('should derive retryable from the code', () => {
    expect(new GeocoderError('RATE_LIMITED', 'slow down').retryable).toBe(true);
    expect(new GeocoderError('GEOCODER_UNAVAILABLE', 'down').retryable).toBe(true);
    expect(new GeocoderError('INVALID_INPUT', 'bad').retryable).toBe(false);
    expect(new GeocoderError('INTERNAL_ERROR', 'bug').retryable).toBe(false);
  });

  it('should serialize to the structured shape', () => {
    const error = new GeocoderError('RATE_LIMITED', 'Rate limited', {
      upstreamStatus: 429,
      retryAfterSeconds: 60,
    });

    expect(error.toJSON()).toEqual({
      code: 'RATE_LIMITED',
      message: 'Rate limited',
      retryable: true,
      details: { upstreamStatus: 429, retryAfterSeconds: 60 },
    });
    expect(error).toBeInstanceOf(Error);
  });
});

describe('handleHttpError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should handle 400 error', () => {
    const error = handleHttpError(400, 'Bad Request', new Headers(), 'req-123');

    expect(error.code).toBe('INVALID_INPUT');
    expect(error.message).toBe('Geocoder rejected the request: Bad Request');
    expect(error.details?.upstreamStatus).toBe(400);
    expect(error.details?.requestId).toBe('req-123');
  });

  it('should extract Retry-After header for rate limit', () => {
    const headers = new Headers({ 'Retry-After': '120' });
    const error = handleHttpError(429, 'Too Many Requests', headers);

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.retryable).toBe(true);
    expect(error.details?.retryAfterSeconds).toBe(120);
  });

  it('should ignore an invalid Retry-After header', () => {
    const headers = new Headers({ 'Retry-After': 'invalid' });
    const error = handleHttpError(429, 'Too Many Requests', headers);

    expect(error.details?.retryAfterSeconds).toBeUndefined();
  });

  it('should explain 403 as a usage policy problem', () => {
    const error = handleHttpError(403, 'Forbidden', new Headers());

    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.message).toBe('Geocoder refused the request: check the User-Agent and usage policy.');
    expect(error.retryable).toBe(false);
  });

  it('should log HTTP error', () => {
    handleHttpError(500, 'Internal Server Error', new Headers(), 'req-123');

    expect(logger.warn).toHaveBeenCalledWith(
      'HTTP error from geocoder',
      expect.objectContaining({
        status: 500,
        statusText: 'Internal Server Error',
        code: 'GEOCODER_UNAVAILABLE',
        requestId: 'req-123',
      })
    );
  });
});

describe('handleNetworkError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should wrap connection errors as retryable', () => {
    const error = handleNetworkError(new Error('Connection refused'), 'req-123');

    expect(error.code).toBe('GEOCODER_UNAVAILABLE');
    expect(error.retryable).toBe(true);
    expect(error.details?.requestId).toBe('req-123');
    expect(error.details?.networkError).toBe('Connection refused');
    expect(logger.error).toHaveBeenCalledWith(
      'Network error calling geocoder',
      expect.objectContaining({ error: 'Connection refused', requestId: 'req-123' })
    );
  });
});

describe('store and transition errors', () => {
  it('should describe the failed store operation', () => {
    const error = new StoreUnavailableError('claimNextBatch', new Error('database is locked'));

    expect(error.message).toBe('Store unavailable during claimNextBatch: database is locked');
    expect(error.code).toBe('STORE_UNAVAILABLE');
  });

  it('should describe an illegal transition', () => {
    const error = new IllegalTransitionError('batch', 7, 'origin', 'checked');

    expect(error.message).toBe('Illegal batch transition for 7: origin -> checked');
  });
});

describe('toErrorShape', () => {
  it('should keep geocoder error details', () => {
    const shape = toErrorShape(new GeocoderError('INVALID_INPUT', 'bad id'));
    expect(shape).toEqual({ code: 'INVALID_INPUT', message: 'bad id', retryable: false, details: undefined });
  });

  it('should map unknown values to INTERNAL_ERROR', () => {
    expect(toErrorShape('boom')).toEqual({ code: 'INTERNAL_ERROR', message: 'boom', retryable: false });
  });
});
