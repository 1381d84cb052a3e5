import { PolicyConfig } from '../../src/config';
import { ClaimProposal } from '../../src/types/claim';

export const TEST_POLICY: PolicyConfig = {
  autoTrustThreshold: 0.85,
  minEvidenceQuality: 0.7,
  autoMergePredicates: new Set(['USES', 'INGESTS', 'PRODUCES']),
  firstPartySources: new Set(['first_party_log', 'config', 'run_artifact']),
  allowedReadRelations: new Set(['USES', 'INGESTS', 'PRODUCES', 'VERSION_OF', 'MENTIONS', 'FIXED_BY', 'ORIGINATES_AT']),
};

/**
 * Entity claim that clears every auto-merge condition:
 * trust = 0.5*0.95 + 0.4*0.9 + 0.15 = 0.985
 */
export function strongProposal(overrides: Partial<ClaimProposal> = {}): ClaimProposal {
  return {
    subject_id: 'Run:demo',
    predicate: 'USES',
    object_kind: 'entity',
    object_value: 'Model:v2',
    model_conf: 0.9,
    evidence: [{ uri_or_blob_ref: 'log://run/demo', source_type: 'first_party_log', quality_score: 0.95 }],
    provenance: { who: 'test-agent', when: 1700000000 },
    ...overrides,
  };
}
