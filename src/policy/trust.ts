import { ClaimProposal } from '../types/claim';

export const FIRST_PARTY_BONUS = 0.15;
const QUALITY_WEIGHT = 0.5;
const MODEL_CONF_WEIGHT = 0.4;

/**
 * Deterministic trust in [0, 1] from the best evidence quality, the model's
 * own confidence and whether every piece of evidence is first-party.
 */
export function trustScore(proposal: ClaimProposal, firstPartySources: ReadonlySet<string>): number {
  const evidence = proposal.evidence;
  const quality = evidence.reduce((best, item) => Math.max(best, item.quality_score ?? 0), 0);

  const allFirstParty = evidence.length > 0 && evidence.every((item) => firstPartySources.has(item.source_type));
  const bonus = allFirstParty ? FIRST_PARTY_BONUS : 0;

  const raw = QUALITY_WEIGHT * quality + MODEL_CONF_WEIGHT * (proposal.model_conf ?? 0) + bonus;
  return Math.min(1, Math.max(0, raw));
}

/**
 * True when there is evidence and every item meets the minimum quality.
 * A missing quality score counts as zero.
 */
export function meetsMinimumQuality(proposal: ClaimProposal, minQuality: number): boolean {
  return (
    proposal.evidence.length > 0 && proposal.evidence.every((item) => (item.quality_score ?? 0) >= minQuality)
  );
}
