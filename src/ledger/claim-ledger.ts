/**
 * Claim Ledger - the single writer of durable state
 *
 * Claims, their evidence and any materialized edge are committed to the graph
 * store in one transaction. Evidence is additionally mirrored row by row into
 * the relational store; mirror failures are logged and counted but never fail
 * the proposal.
 */
import { v4 as uuidv4 } from 'uuid';
import { ClaimProposal, Provenance, StoredClaim, StoredEvidence } from '../types/claim';
import { AccessMode, GraphRecord } from '../types/graph';
import { GraphStore, assertRelationType } from '../graph-store';
import { EvidenceStore } from '../evidence-store';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { NotFoundError, ValidationError } from '../utils/errors';

export type NeighborDepth = 1 | 2;

export function isNeighborDepth(depth: number): depth is NeighborDepth {
  return depth === 1 || depth === 2;
}

function copyProvenance(provenance: Provenance | null | undefined): Provenance {
  const out: Provenance = {};
  if (!provenance) return out;
  for (const [key, value] of Object.entries(provenance)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export class ClaimLedger {
  constructor(
    private readonly graph: GraphStore,
    private readonly evidenceStore: EvidenceStore,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Record a claim with its evidence. An approved entity claim gets its edge
   * in the same graph transaction.
   */
  async propose(proposal: ClaimProposal): Promise<StoredClaim> {
    const predicate = assertRelationType(proposal.predicate);
    const createdAt = this.now();

    const claim: StoredClaim = {
      id: uuidv4(),
      subject_id: proposal.subject_id,
      predicate,
      object_kind: proposal.object_kind,
      object_value: proposal.object_value,
      status: proposal.status ?? 'pending',
      model_conf: proposal.model_conf ?? null,
      human_conf: proposal.human_conf ?? null,
      context_hash: proposal.context_hash ?? null,
      provenance: copyProvenance(proposal.provenance),
      created_at: createdAt,
    };

    const evidence: StoredEvidence[] = proposal.evidence.map((item) => ({
      ...item,
      id: uuidv4(),
      claim_id: claim.id,
      created_at: createdAt,
    }));

    // Rows land before the graph commit; a failed commit leaves them orphaned
    // but traceable through claim_id.
    await this.mirrorEvidence(evidence);

    const materialize = claim.status === 'approved' && claim.object_kind === 'entity';
    const stored = await this.graph.writeClaim({ claim, evidence, materialize });

    logger.info(
      {
        claimId: stored.id,
        subject: stored.subject_id,
        predicate: stored.predicate,
        status: stored.status,
        evidence: evidence.length,
        materialized: materialize,
      },
      'Claim recorded',
    );
    return stored;
  }

  async approve(claimId: string): Promise<StoredClaim> {
    const claim = await this.graph.approveClaim(claimId);
    if (!claim) {
      throw new NotFoundError('claim', claimId);
    }
    metrics.claimsApproved.inc();
    logger.info({ claimId, predicate: claim.predicate, objectKind: claim.object_kind }, 'Claim approved');
    return claim;
  }

  /**
   * Mark a claim rejected. Unknown ids succeed silently and materialized
   * edges stay in place.
   */
  async reject(claimId: string): Promise<void> {
    const matched = await this.graph.setClaimStatus(claimId, 'rejected');
    if (!matched) {
      logger.warn({ claimId }, 'Reject for unknown claim ignored');
      return;
    }
    metrics.claimsRejected.inc();
    logger.info({ claimId }, 'Claim rejected');
  }

  async neighbors(entityId: string, depth: number, limit: number): Promise<GraphRecord[]> {
    if (!isNeighborDepth(depth)) {
      throw new ValidationError(`depth must be 1 or 2, got ${depth}`, [{ path: '/depth', message: 'must be 1 or 2' }]);
    }
    return this.graph.neighbors(entityId, depth, limit);
  }

  async gaps(limit: number): Promise<GraphRecord[]> {
    return this.graph.gaps(limit);
  }

  /**
   * Raw query passthrough. Callers that cannot vouch for the query pass
   * `read` so the store refuses writes.
   */
  async cypher(query: string, params: Record<string, unknown> = {}, mode: AccessMode = 'write'): Promise<GraphRecord[]> {
    return this.graph.run(query, params, mode);
  }

  private async mirrorEvidence(evidence: StoredEvidence[]): Promise<void> {
    for (const item of evidence) {
      try {
        await this.evidenceStore.insert(item);
      } catch (error) {
        metrics.evidenceMirrorFailures.inc();
        logger.warn({ error, evidenceId: item.id, claimId: item.claim_id }, 'Evidence mirror write failed');
      }
    }
  }
}
