/**
 * HTTP client for a Nominatim-compatible geocoder
 *
 * Every request goes through the injected RateLimiter (one slot at a time) and
 * the RetryExecutor (throttling, 5xx and network failures are retried).
 */

import { z } from 'zod';
import type { ElementRef, GeocoderPlace, GeocoderResponse, OsmElementType } from './types.js';
import { GeocoderError, handleHttpError, handleNetworkError } from './error-handler.js';
import { logger } from './logger.js';
import { metrics, type GeocoderEndpoint } from './metrics.js';
import { getBatchId, getRequestId } from './request-context.js';
import type { RateLimiter } from './rate-limiter.js';
import type { RetryExecutor } from './retry.js';

/**
 * What the validator needs from a geocoder. Tests substitute fakes.
 */
export interface Geocoder {
  /** Resolve one OSM element; null when the geocoder knows nothing about it */
  lookup(ref: ElementRef): Promise<GeocoderPlace | null>;
  /** Best free-text match, or null */
  search(query: string): Promise<GeocoderPlace | null>;
}

export interface GeocoderClientOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  rateLimiter: RateLimiter;
  retry: RetryExecutor;
}

const rawPlaceSchema = z.object({
  osm_type: z.enum(['node', 'way', 'relation']),
  osm_id: z.coerce.number().int(),
  display_name: z.string().default(''),
  place_rank: z.coerce.number().default(0),
  boundingbox: z.array(z.union([z.string(), z.number()])).optional(),
  address: z.record(z.string()).default({}),
});

const rawResultSchema = z.array(z.unknown());

type RawPlace = z.infer<typeof rawPlaceSchema>;

export class GeocoderClient implements Geocoder {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly retry: RetryExecutor;

  constructor(options: GeocoderClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.rateLimiter = options.rateLimiter;
    this.retry = options.retry;

    logger.info('GeocoderClient initialized', {
      baseUrl: this.baseUrl,
      timeoutMs: this.timeoutMs,
      minIntervalMs: this.rateLimiter.minIntervalMs,
    });
  }

  async lookup(ref: ElementRef): Promise<GeocoderPlace | null> {
    const params = new URLSearchParams({
      osm_ids: ref,
      format: 'json',
      addressdetails: '1',
      extratags: '1',
      'accept-language': 'en',
    });
    return this.first('lookup', params, ref);
  }

  async search(query: string): Promise<GeocoderPlace | null> {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      addressdetails: '1',
      limit: '1',
    });
    return this.first('search', params, query);
  }

  private async first(
    endpoint: GeocoderEndpoint,
    params: URLSearchParams,
    label: string
  ): Promise<GeocoderPlace | null> {
    const response = await this.retry.execute(
      () => this.rateLimiter.schedule(() => this.request(endpoint, params)),
      label
    );
    return response.data[0] ?? null;
  }

  /**
   * One HTTP round trip. Throws GeocoderError on HTTP and network failures.
   */
  private async request(
    endpoint: GeocoderEndpoint,
    params: URLSearchParams
  ): Promise<GeocoderResponse<GeocoderPlace[]>> {
    const url = `${this.baseUrl}/${endpoint}?${params.toString()}`;
    const requestId = getRequestId();
    const startTime = Date.now();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    // The timeout covers the body as well as the headers
    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            'Accept-Language': 'en',
          },
          signal: controller.signal,
        });
      } catch (error) {
        metrics.incrementGeocoderRequest(endpoint, 'error');
        throw this.networkFailure(error, requestId);
      }

      const latencyMs = Date.now() - startTime;
      logger.logGeocoderCall(url, response.status, latencyMs, requestId, getBatchId());

      if (!response.ok) {
        metrics.incrementGeocoderRequest(endpoint, 'error');
        throw handleHttpError(response.status, response.statusText, response.headers, requestId);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        metrics.incrementGeocoderRequest(endpoint, 'error');
        if (error instanceof SyntaxError) {
          throw new GeocoderError('INTERNAL_ERROR', 'Geocoder returned a body that is not JSON.', { requestId });
        }
        throw this.networkFailure(error, requestId);
      }

      const data = parsePlaces(body, requestId);
      metrics.incrementGeocoderRequest(endpoint, data.length > 0 ? 'ok' : 'empty');

      return { data, status: response.status, latencyMs };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private networkFailure(error: unknown, requestId: string | undefined): GeocoderError {
    if (error instanceof Error && error.name === 'AbortError') {
      return handleNetworkError(new Error(`Request timeout after ${this.timeoutMs}ms`), requestId);
    }
    return handleNetworkError(error instanceof Error ? error : new Error(String(error)), requestId);
  }
}

/**
 * Parse a geocoder JSON array. Entries that do not look like places are dropped.
 */
export function parsePlaces(body: unknown, requestId?: string): GeocoderPlace[] {
  const list = rawResultSchema.safeParse(body);
  if (!list.success) {
    throw new GeocoderError('INTERNAL_ERROR', 'Geocoder returned a non-array body.', { requestId });
  }

  const places: GeocoderPlace[] = [];
  for (const entry of list.data) {
    const parsed = rawPlaceSchema.safeParse(entry);
    if (parsed.success) {
      places.push(toPlace(parsed.data));
    } else {
      logger.debug('Skipping malformed geocoder entry', {
        requestId,
        issues: parsed.error.issues.length,
      });
    }
  }
  return places;
}

function toPlace(raw: RawPlace): GeocoderPlace {
  const osmType: OsmElementType = raw.osm_type;
  const place: GeocoderPlace = {
    osmType,
    osmId: raw.osm_id,
    displayName: raw.display_name,
    placeRank: raw.place_rank,
    address: raw.address,
  };

  const box = parseBoundingBox(raw.boundingbox);
  if (box) {
    place.boundingBox = box;
  }
  return place;
}

/**
 * Nominatim sends [south, north, west, east] as strings
 */
export function parseBoundingBox(
  values: ReadonlyArray<string | number> | undefined
): [number, number, number, number] | undefined {
  if (!values || values.length !== 4) {
    return undefined;
  }
  const [south, north, west, east] = values.map((value) => Number(value));
  if (![south, north, west, east].every((value) => Number.isFinite(value))) {
    return undefined;
  }
  return [south, north, west, east];
}
