/**
 * Flatten driver values (nodes, relationships, paths, integers, temporals)
 * into plain JSON. Node and relationship properties are spread last, so an
 * entity's own `id` property wins over the store's element id.
 */
import { Node, Path, Relationship, isInt, isNode, isPath, isRelationship } from 'neo4j-driver';
import { GraphRecord, GraphValue, SerializedNode, SerializedPath, SerializedRel } from '../types/graph';

function serializeProperties(properties: Record<string, unknown>): Record<string, GraphValue> {
  const out: Record<string, GraphValue> = {};
  for (const [key, value] of Object.entries(properties)) {
    out[key] = serializeValue(value);
  }
  return out;
}

function serializeNode(node: Node): SerializedNode {
  return {
    _type: 'node',
    labels: [...node.labels],
    id: node.elementId,
    ...serializeProperties(node.properties),
  };
}

function serializeRel(rel: Relationship): SerializedRel {
  return {
    _type: 'rel',
    type: rel.type,
    id: rel.elementId,
    start: rel.startNodeElementId,
    end: rel.endNodeElementId,
    ...serializeProperties(rel.properties),
  };
}

function serializePath(path: Path): SerializedPath {
  return {
    _type: 'path',
    nodes: [path.start, ...path.segments.map((segment) => segment.end)].map(serializeNode),
    rels: path.segments.map((segment) => serializeRel(segment.relationship)),
  };
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function serializeValue(value: unknown): GraphValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(serializeValue);
  }
  if (typeof value === 'object') {
    if (isInt(value)) {
      return value.inSafeRange() ? value.toNumber() : value.toString();
    }
    if (isNode(value)) return serializeNode(value);
    if (isRelationship(value)) return serializeRel(value);
    if (isPath(value)) return serializePath(value);
    if (isPlainObject(value)) return serializeProperties(value);
  }
  // Temporal and spatial values render through their own toString()
  return String(value);
}

/**
 * Serialize every column of a result row
 */
export function serializeRecord(row: Record<string, unknown>): GraphRecord {
  return serializeProperties(row);
}
