/**
 * Claim, evidence and provenance shapes as they travel over the wire.
 * Field names stay snake_case so request bodies, graph properties and
 * relational columns line up one to one.
 */

export const CLAIM_STATUSES = ['scratchpad', 'pending', 'approved', 'rejected'] as const;
export type ClaimStatus = (typeof CLAIM_STATUSES)[number];

export const OBJECT_KINDS = ['entity', 'literal'] as const;
export type ObjectKind = (typeof OBJECT_KINDS)[number];

export const SOURCE_TYPES = [
  'first_party_log',
  'config',
  'run_artifact',
  'internal_doc',
  'web',
  'llm_self',
] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export interface Evidence {
  uri_or_blob_ref: string;
  snippet?: string | null;
  hash?: string | null;
  source_type: SourceType;
  quality_score?: number | null;
  /** Epoch seconds */
  timestamp?: number | null;
}

export type ProvenanceValue = string | number | boolean | null;

/**
 * Free-form attribution. Only `who` and `when` are read, for auditing.
 */
export interface Provenance {
  who?: string | null;
  /** Epoch seconds */
  when?: number | null;
  prompt_hash?: string | null;
  model_version?: string | null;
  git_sha?: string | null;
  image_digest?: string | null;
  run_id?: string | null;
  dataset_uri?: string | null;
  sensor_id?: string | null;
  frame_ts?: number | null;
  [field: string]: ProvenanceValue | undefined;
}

export interface ClaimProposal {
  subject_id: string;
  predicate: string;
  object_kind: ObjectKind;
  object_value: string;
  model_conf?: number | null;
  human_conf?: number | null;
  context_hash?: string | null;
  status?: ClaimStatus;
  evidence: Evidence[];
  provenance?: Provenance | null;
}

/**
 * A claim as recorded in the graph store
 */
export interface StoredClaim {
  id: string;
  subject_id: string;
  predicate: string;
  object_kind: ObjectKind;
  object_value: string;
  status: ClaimStatus;
  model_conf: number | null;
  human_conf: number | null;
  context_hash: string | null;
  provenance: Provenance;
  /** Epoch milliseconds */
  created_at: number;
}

/**
 * Evidence with the identifiers assigned by the ledger
 */
export interface StoredEvidence extends Evidence {
  id: string;
  claim_id: string;
  /** Epoch milliseconds */
  created_at: number;
}

export function isClaimStatus(value: unknown): value is ClaimStatus {
  return typeof value === 'string' && (CLAIM_STATUSES as readonly string[]).includes(value);
}

export function isObjectKind(value: unknown): value is ObjectKind {
  return typeof value === 'string' && (OBJECT_KINDS as readonly string[]).includes(value);
}
