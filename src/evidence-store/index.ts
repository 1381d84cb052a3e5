/**
 * Evidence Store - relational mirror of claim evidence
 *
 * Every evidence item written to the graph is also written as a row here so
 * it can be audited with plain SQL. The graph remains authoritative.
 */
import { StoredEvidence } from '../types/claim';

export interface EvidenceStore {
  /** Connect and create the table if missing */
  init(): Promise<void>;
  close(): Promise<void>;
  /** Reachability check for /health; never throws */
  ping(): Promise<boolean>;
  insert(evidence: StoredEvidence): Promise<void>;
}

export { PgEvidenceStore } from './pg-evidence-store';
export type { PgEvidenceOptions } from './pg-evidence-store';
