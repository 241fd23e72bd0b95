/**
 * Request Context Module
 * Propagates requestId (and the batch being validated) through async calls
 * using AsyncLocalStorage, so the geocoder client can tag its logs without
 * threading ids through every signature
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  toolName?: string;
  batchId?: number;
  countryName?: string;
  startTime?: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Run a function with request context
 */
export function runWithContext<T>(
  context: RequestContext,
  fn: () => T | Promise<T>
): T | Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Get the current request context, undefined outside of one
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

export function getRequestId(): string | undefined {
  return getContext()?.requestId;
}

export function getBatchId(): number | undefined {
  return getContext()?.batchId;
}

export function generateRequestId(): string {
  return randomUUID();
}
