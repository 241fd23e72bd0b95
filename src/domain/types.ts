/**
 * Common types for the address harvester
 */

/**
 * Standard error codes for geocoder and tool failures
 */
export type ErrorCode =
  | 'INVALID_INPUT'
  | 'RATE_LIMITED'
  | 'GEOCODER_UNAVAILABLE'
  | 'STORE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

/**
 * Structured error payload, returned in tool responses and carried by GeocoderError
 */
export interface HarvesterErrorShape {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: {
    upstreamStatus?: number;
    requestId?: string;
    retryAfterSeconds?: number;
    [key: string]: unknown;
  };
}

/** Typed OSM element id: `N123`, `W123` or `R123` */
export type ElementRef = `${'N' | 'W' | 'R'}${number}`;

export type OsmElementType = 'node' | 'way' | 'relation';

/**
 * One match returned by the geocoder's lookup or search endpoints
 */
export interface GeocoderPlace {
  osmType: OsmElementType;
  osmId: number;
  displayName: string;
  placeRank: number;
  /** [south, north, west, east] in degrees, absent when the geocoder sent none */
  boundingBox?: [number, number, number, number];
  address: Record<string, string>;
}

/**
 * Response wrapper from the geocoder client
 */
export interface GeocoderResponse<T = unknown> {
  data: T;
  status: number;
  latencyMs: number;
}
