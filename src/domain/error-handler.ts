/**
 * Error types and mapping for the address harvester
 */

import type { ErrorCode, HarvesterErrorShape } from './types.js';
import { logger } from './logger.js';

/**
 * Failure talking to the geocoder. `retryable` drives the retry executor.
 */
export class GeocoderError extends Error implements HarvesterErrorShape {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: HarvesterErrorShape['details'];

  constructor(code: ErrorCode, message: string, details?: HarvesterErrorShape['details']) {
    super(message);
    this.name = 'GeocoderError';
    this.code = code;
    this.retryable = isRetryableCode(code);
    this.details = details;
  }

  toJSON(): HarvesterErrorShape {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/**
 * The store could not be reached or rejected a write. Fatal for the scheduler.
 */
export class StoreUnavailableError extends Error {
  readonly code: ErrorCode = 'STORE_UNAVAILABLE';
  readonly cause: unknown;

  constructor(operation: string, cause: unknown) {
    super(`Store unavailable during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }
}

/**
 * A batch or country status change that the state machine does not allow
 */
export class IllegalTransitionError extends Error {
  readonly entity: 'batch' | 'country';
  readonly from: string | null;
  readonly to: string;

  constructor(entity: 'batch' | 'country', key: string | number, from: string | null, to: string) {
    super(`Illegal ${entity} transition for ${key}: ${from ?? 'missing'} -> ${to}`);
    this.name = 'IllegalTransitionError';
    this.entity = entity;
    this.from = from;
    this.to = to;
  }
}

export function isRetryableCode(code: ErrorCode): boolean {
  return code === 'RATE_LIMITED' || code === 'GEOCODER_UNAVAILABLE';
}

/**
 * Map HTTP status codes from the geocoder to error codes
 */
export function mapHttpStatusToErrorCode(status: number): ErrorCode {
  if (status === 400 || status === 404) {
    return 'INVALID_INPUT';
  }
  if (status === 429 || status === 503) {
    return 'RATE_LIMITED';
  }
  if (status >= 500) {
    return 'GEOCODER_UNAVAILABLE';
  }
  return 'INTERNAL_ERROR';
}

/**
 * Build a GeocoderError from a non-2xx geocoder response
 *
 * @param headers - Response headers, read for Retry-After on throttling
 */
export function handleHttpError(
  status: number,
  statusText: string,
  headers?: Headers,
  requestId?: string
): GeocoderError {
  const code = mapHttpStatusToErrorCode(status);

  let message: string;
  switch (code) {
    case 'INVALID_INPUT':
      message = `Geocoder rejected the request: ${statusText}`;
      break;
    case 'RATE_LIMITED':
      message = 'Geocoder rate limit exceeded.';
      break;
    case 'GEOCODER_UNAVAILABLE':
      message = 'Geocoder is currently unavailable.';
      break;
    default:
      message = status === 403
        ? 'Geocoder refused the request: check the User-Agent and usage policy.'
        : `Unexpected geocoder response: ${status} ${statusText}`;
  }

  const details: HarvesterErrorShape['details'] = {
    upstreamStatus: status,
  };

  if (requestId) {
    details.requestId = requestId;
  }

  if (code === 'RATE_LIMITED' && headers) {
    const retryAfter = headers.get('Retry-After');
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        details.retryAfterSeconds = seconds;
      }
    }
  }

  logger.warn('HTTP error from geocoder', {
    status,
    statusText,
    code,
    requestId,
  });

  return new GeocoderError(code, message, details);
}

/**
 * Wrap a network failure (connection refused, timeout, DNS) as a retryable error
 */
export function handleNetworkError(error: Error, requestId?: string): GeocoderError {
  logger.error('Network error calling geocoder', {
    error: error.message,
    requestId,
  });

  return new GeocoderError(
    'GEOCODER_UNAVAILABLE',
    'Unable to reach the geocoder.',
    {
      requestId,
      networkError: error.message,
    }
  );
}

/**
 * Normalize any thrown value into the structured error payload used by tool responses
 */
export function toErrorShape(error: unknown): HarvesterErrorShape {
  if (error instanceof GeocoderError) {
    return error.toJSON();
  }
  if (error instanceof StoreUnavailableError) {
    return { code: error.code, message: error.message, retryable: false };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}
