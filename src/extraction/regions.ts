/**
 * Include/exclude box containment for territories that share a source extract
 */

import type { BoundingRegion, RegionConfig } from '../config/static-data.js';
import type { LonLat } from './types.js';

/** Bounds are inclusive on every side */
export function pointInBox(point: LonLat, box: BoundingRegion): boolean {
  return point.lon >= box.minLon && point.lon <= box.maxLon && point.lat >= box.minLat && point.lat <= box.maxLat;
}

/**
 * No include boxes means the whole extract belongs to the country
 */
export function isWholeCountry(region: RegionConfig | undefined): boolean {
  return !region || region.include.length === 0;
}

export function pointInRegion(point: LonLat, region: RegionConfig): boolean {
  return (
    region.include.some((box) => pointInBox(point, box)) &&
    !region.exclude.some((box) => pointInBox(point, box))
  );
}

/**
 * True when at least one point lies inside an include box and outside every
 * exclude box. Always true in whole-country mode.
 */
export function featureInRegion(points: readonly LonLat[], region: RegionConfig | undefined): boolean {
  if (!region || isWholeCountry(region)) {
    return true;
  }
  return points.some((point) => pointInRegion(point, region));
}

/**
 * Smallest box covering every include box, used to decide which node
 * coordinates are worth keeping while streaming
 */
export function includeEnvelope(region: RegionConfig | undefined): BoundingRegion | undefined {
  if (!region || isWholeCountry(region)) {
    return undefined;
  }
  return region.include.reduce<BoundingRegion>(
    (envelope, box) => ({
      minLon: Math.min(envelope.minLon, box.minLon),
      maxLon: Math.max(envelope.maxLon, box.maxLon),
      minLat: Math.min(envelope.minLat, box.minLat),
      maxLat: Math.max(envelope.maxLat, box.maxLat),
    }),
    { minLon: 180, maxLon: -180, minLat: 90, maxLat: -90 }
  );
}
