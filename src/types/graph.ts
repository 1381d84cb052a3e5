/**
 * JSON-friendly graph values returned by read queries. Nodes, relationships
 * and paths carry a `_type` discriminator; everything else passes through.
 */

export interface SerializedNode {
  _type: 'node';
  labels: string[];
  id: string;
  [property: string]: unknown;
}

export interface SerializedRel {
  _type: 'rel';
  type: string;
  id: string;
  start: string;
  end: string;
  [property: string]: unknown;
}

export interface SerializedPath {
  _type: 'path';
  nodes: SerializedNode[];
  rels: SerializedRel[];
}

export type GraphValue =
  | SerializedNode
  | SerializedRel
  | SerializedPath
  | string
  | number
  | boolean
  | null
  | GraphValue[]
  | { [key: string]: GraphValue };

/** One result row, keyed by the names in the RETURN clause */
export type GraphRecord = Record<string, GraphValue>;

export type AccessMode = 'read' | 'write';
