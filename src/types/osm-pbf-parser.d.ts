// osm-pbf-parser ships no type declarations and has no @types package.
declare module 'osm-pbf-parser' {
  import type { Transform } from 'node:stream';

  namespace createParser {
    export interface PbfNode {
      type: 'node';
      id: number | string;
      lat: number;
      lon: number;
      tags: Record<string, string>;
    }

    export interface PbfWay {
      type: 'way';
      id: number | string;
      tags: Record<string, string>;
      refs: Array<number | string>;
    }

    export interface PbfRelationMember {
      type: 'node' | 'way' | 'relation';
      ref: number | string;
      role: string;
    }

    export interface PbfRelation {
      type: 'relation';
      id: number | string;
      tags: Record<string, string>;
      members: PbfRelationMember[];
    }

    export type PbfItem = PbfNode | PbfWay | PbfRelation;
  }

  /** Object-mode transform: PBF bytes in, arrays of PbfItem out */
  function createParser(): Transform;

  export = createParser;
}
