/**
 * Policy Gate - decides between auto-merge and human review
 *
 * A proposal merges at once only when its predicate is in the auto-merge set,
 * its object is an entity, trust clears the threshold, every evidence item
 * meets the quality floor and nothing in the graph contradicts it. Everything
 * else is stored pending.
 */
import { PolicyConfig } from '../config';
import { ClaimProposal, StoredClaim } from '../types/claim';
import { ClaimLedger } from '../ledger/claim-ledger';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { ConflictDetector } from './conflict';
import { meetsMinimumQuality, trustScore } from './trust';

export type GateDecisionKind = 'auto-merge' | 'review';

export interface GateDecision {
  decision: GateDecisionKind;
  trust: number;
  min_quality_ok: boolean;
  no_conflict: boolean;
  claim: StoredClaim;
}

export class PolicyGate {
  constructor(
    private readonly policy: PolicyConfig,
    private readonly ledger: ClaimLedger,
    private readonly conflicts: ConflictDetector,
  ) {}

  async propose(proposal: ClaimProposal): Promise<GateDecision> {
    const trust = trustScore(proposal, this.policy.firstPartySources);
    const minQualityOk = meetsMinimumQuality(proposal, this.policy.minEvidenceQuality);
    const noConflict = !(await this.conflicts.hasConflict(proposal));

    const autoMerge =
      this.policy.autoMergePredicates.has(proposal.predicate) &&
      proposal.object_kind === 'entity' &&
      trust >= this.policy.autoTrustThreshold &&
      minQualityOk &&
      noConflict;

    const decision: GateDecisionKind = autoMerge ? 'auto-merge' : 'review';

    let claim = await this.ledger.propose({ ...proposal, status: autoMerge ? 'approved' : 'pending' });

    if (autoMerge && claim.status !== 'approved') {
      claim = await this.reconcile(claim);
    }

    metrics.claimsProposed.inc({ decision });
    logger.info(
      {
        claimId: claim.id,
        predicate: claim.predicate,
        decision,
        trust,
        minQualityOk,
        noConflict,
      },
      'Policy decision',
    );

    return { decision, trust, min_quality_ok: minQualityOk, no_conflict: noConflict, claim };
  }

  /**
   * One follow-up approve for an auto-merge that came back unapproved.
   * Failures are logged; the stored claim is returned as-is.
   */
  private async reconcile(claim: StoredClaim): Promise<StoredClaim> {
    try {
      const approved = await this.ledger.approve(claim.id);
      metrics.reconciliationApprovals.inc({ status: 'success' });
      logger.info({ claimId: claim.id }, 'Reconciliation approve applied');
      return approved;
    } catch (error) {
      metrics.reconciliationApprovals.inc({ status: 'failure' });
      logger.warn({ error, claimId: claim.id }, 'Reconciliation approve failed');
      return claim;
    }
  }
}
