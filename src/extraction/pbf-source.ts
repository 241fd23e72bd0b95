/**
 * Streaming CandidateFeature source over an OSM PBF extract
 *
 * Nodes arrive before ways and ways before relations, so node coordinates and
 * way geometries are cached as they stream past and resolved when a tagged way
 * or relation shows up. Only coordinates inside the include-region envelope are
 * cached; in whole-country mode nothing is, since no region test needs them.
 */

import { createReadStream } from 'node:fs';
import { pipeline } from 'node:stream';
import createParser from 'osm-pbf-parser';
import type { BoundingRegion } from '../config/static-data.js';
import type { ElementRef } from '../domain/types.js';
import { logger } from '../domain/logger.js';
import { pointInBox } from './regions.js';
import type { CandidateFeature, LonLat } from './types.js';

type PbfItem = createParser.PbfItem;

export interface PbfSourceOptions {
  /** Cache coordinates inside this box only; undefined disables caching */
  envelope?: BoundingRegion;
}

export class PbfFeatureAssembler {
  private readonly envelope?: BoundingRegion;
  private readonly nodes = new Map<number, LonLat>();
  private readonly ways = new Map<number, LonLat[]>();

  constructor(options: PbfSourceOptions = {}) {
    this.envelope = options.envelope;
  }

  /**
   * Feed one parsed item; returns a candidate for tagged elements
   */
  accept(item: PbfItem): CandidateFeature | null {
    switch (item.type) {
      case 'node':
        return this.acceptNode(item);
      case 'way':
        return this.acceptWay(item);
      case 'relation':
        return this.acceptRelation(item);
    }
  }

  get cachedNodes(): number {
    return this.nodes.size;
  }

  private acceptNode(node: createParser.PbfNode): CandidateFeature | null {
    const point: LonLat = { lon: node.lon, lat: node.lat };
    const id = Number(node.id);

    if (this.envelope && pointInBox(point, this.envelope)) {
      this.nodes.set(id, point);
    }

    return hasTags(node.tags) ? { ref: toRef('N', id), tags: node.tags, points: [point] } : null;
  }

  private acceptWay(way: createParser.PbfWay): CandidateFeature | null {
    const id = Number(way.id);
    const points = this.envelope ? this.resolveNodes(way.refs) : [];

    if (points.length > 0) {
      this.ways.set(id, points);
    }

    return hasTags(way.tags) ? { ref: toRef('W', id), tags: way.tags, points } : null;
  }

  private acceptRelation(relation: createParser.PbfRelation): CandidateFeature | null {
    if (!hasTags(relation.tags)) {
      return null;
    }

    const points: LonLat[] = [];
    if (this.envelope) {
      for (const member of relation.members) {
        const ref = Number(member.ref);
        if (member.type === 'node') {
          const point = this.nodes.get(ref);
          if (point) {
            points.push(point);
          }
        } else if (member.type === 'way') {
          points.push(...(this.ways.get(ref) ?? []));
        }
      }
    }

    return { ref: toRef('R', Number(relation.id)), tags: relation.tags, points };
  }

  private resolveNodes(refs: ReadonlyArray<number | string>): LonLat[] {
    const points: LonLat[] = [];
    for (const ref of refs) {
      const point = this.nodes.get(Number(ref));
      if (point) {
        points.push(point);
      }
    }
    return points;
  }
}

function hasTags(tags: Record<string, string> | undefined): tags is Record<string, string> {
  return tags !== undefined && Object.keys(tags).length > 0;
}

function toRef(prefix: 'N' | 'W' | 'R', id: number): ElementRef {
  return `${prefix}${id}`;
}

function isPbfItem(value: unknown): value is PbfItem {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    (value.type === 'node' || value.type === 'way' || value.type === 'relation')
  );
}

/**
 * Stream candidate features out of a PBF file
 */
export async function* readPbfFeatures(path: string, options: PbfSourceOptions = {}): AsyncGenerator<CandidateFeature> {
  const assembler = new PbfFeatureAssembler(options);
  const parser = createParser();

  pipeline(createReadStream(path), parser, (error) => {
    if (error) {
      // The same error rejects the iteration below
      logger.debug('PBF pipeline closed with error', { path, error: error.message });
    }
  });

  for await (const chunk of parser) {
    const items: unknown[] = Array.isArray(chunk) ? chunk : [chunk];
    for (const item of items) {
      if (!isPbfItem(item)) {
        continue;
      }
      const feature = assembler.accept(item);
      if (feature) {
        yield feature;
      }
    }
  }

  logger.debug('PBF stream finished', { path, cachedNodes: assembler.cachedNodes });
}
