/**
 * Confidence scoring for geocoder matches
 *
 * A deployment uses exactly one mode (CONFIDENCE_MODE):
 * - bbox: the smaller the match's bounding box, the more specific the match
 * - corroborate: a free-text search on the cleaned address must find the same element
 */

import type { GeocoderPlace } from '../domain/types.js';

const METERS_PER_DEGREE = 111_000;

/** Score for a match without a usable bounding box */
export const MISSING_BOX_SCORE = 0.3;

const AREA_LADDER: ReadonlyArray<[maxArea: number, score: number]> = [
  [100, 1.0],
  [1_000, 0.9],
  [10_000, 0.8],
  [100_000, 0.7],
];

/**
 * Approximate area in square meters of a `[south, north, west, east]` box
 */
export function boundingBoxArea(box: readonly [number, number, number, number]): number {
  const [south, north, west, east] = box;
  const centerLat = ((south + north) / 2) * (Math.PI / 180);
  const height = Math.abs(north - south) * METERS_PER_DEGREE;
  const width = Math.abs(east - west) * METERS_PER_DEGREE * Math.cos(centerLat);
  return height * width;
}

export function scoreFromArea(area: number): number {
  for (const [maxArea, score] of AREA_LADDER) {
    if (area < maxArea) {
      return score;
    }
  }
  return MISSING_BOX_SCORE;
}

export function boundingBoxScore(place: GeocoderPlace): number {
  return place.boundingBox ? scoreFromArea(boundingBoxArea(place.boundingBox)) : MISSING_BOX_SCORE;
}

/** 1 when the search found the very element that was looked up */
export function corroborationScore(place: GeocoderPlace, match: GeocoderPlace | null): number {
  return match !== null && match.osmType === place.osmType && match.osmId === place.osmId ? 1 : 0;
}
