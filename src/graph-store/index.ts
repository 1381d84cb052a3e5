/**
 * Graph Store - structural half of the claim ledger
 *
 * Holds entities, claims, evidence nodes and the materialized edges between
 * entities. The Neo4j implementation is used in production; tests substitute
 * an in-memory one behind the same interface.
 */
import { ClaimStatus, StoredClaim, StoredEvidence } from '../types/claim';
import { AccessMode, GraphRecord } from '../types/graph';

/**
 * Everything written by a single claim transaction
 */
export interface ClaimWrite {
  claim: StoredClaim;
  evidence: StoredEvidence[];
  /** Create the subject->object edge in the same transaction */
  materialize: boolean;
}

export interface GraphStore {
  /** Connect and create constraints */
  init(): Promise<void>;
  close(): Promise<void>;
  /** Reachability check for /health; never throws */
  ping(): Promise<boolean>;

  /**
   * Upsert the subject (and entity object), create the claim, its evidence
   * nodes with SUPPORTS edges and, when asked, the materialized edge. All of
   * it commits or none of it does.
   */
  writeClaim(write: ClaimWrite): Promise<StoredClaim>;
  /**
   * Mark a claim approved, merging its edge when the object is an entity.
   * Resolves to null when no such claim exists.
   */
  approveClaim(claimId: string): Promise<StoredClaim | null>;
  /** Resolves to false when no such claim exists */
  setClaimStatus(claimId: string, status: ClaimStatus): Promise<boolean>;

  /** Distinct ids of the objects reachable from subject over `predicate` edges */
  outgoingObjects(subjectId: string, predicate: string): Promise<string[]>;
  neighbors(entityId: string, depth: 1 | 2, limit: number): Promise<GraphRecord[]>;
  /** Entities with no relationships at all, returned under key `e` */
  gaps(limit: number): Promise<GraphRecord[]>;
  run(query: string, params: Record<string, unknown>, mode: AccessMode): Promise<GraphRecord[]>;
}

export { Neo4jGraphStore } from './neo4j-graph-store';
export type { Neo4jOptions } from './neo4j-graph-store';
export { serializeRecord, serializeValue } from './serialize';
export { RELATION_TYPE_PATTERN, assertRelationType } from './relation-type';
