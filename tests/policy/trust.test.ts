/**
 * Tests for trust scoring and the evidence quality floor
 */
import { meetsMinimumQuality, trustScore } from '../../src/policy/trust';
import { TEST_POLICY, strongProposal } from '../helpers/fixtures';

const firstParty = TEST_POLICY.firstPartySources;

describe('trustScore', () => {
  it('weights quality, model confidence and the first-party bonus', () => {
    expect(trustScore(strongProposal(), firstParty)).toBeCloseTo(0.985, 10);
  });

  it('uses the best quality score across evidence', () => {
    const proposal = strongProposal({
      model_conf: 0,
      evidence: [
        { uri_or_blob_ref: 'doc://a', source_type: 'web', quality_score: 0.2 },
        { uri_or_blob_ref: 'doc://b', source_type: 'web', quality_score: 0.6 },
      ],
    });
    expect(trustScore(proposal, firstParty)).toBeCloseTo(0.3, 10);
  });

  it('gives the bonus only when every source is first-party', () => {
    const mixed = strongProposal({
      model_conf: 0,
      evidence: [
        { uri_or_blob_ref: 'log://a', source_type: 'first_party_log', quality_score: 0.8 },
        { uri_or_blob_ref: 'https://example.test', source_type: 'web', quality_score: 0.8 },
      ],
    });
    const allFirstParty = strongProposal({
      model_conf: 0,
      evidence: [
        { uri_or_blob_ref: 'log://a', source_type: 'first_party_log', quality_score: 0.8 },
        { uri_or_blob_ref: 'cfg://b', source_type: 'config', quality_score: 0.8 },
      ],
    });

    expect(trustScore(mixed, firstParty)).toBeCloseTo(0.4, 10);
    expect(trustScore(allFirstParty, firstParty)).toBeCloseTo(0.55, 10);
  });

  it('scores no evidence and no confidence as zero', () => {
    expect(trustScore(strongProposal({ evidence: [], model_conf: null }), firstParty)).toBe(0);
  });

  it('treats missing quality and confidence as zero', () => {
    const proposal = strongProposal({
      model_conf: undefined,
      evidence: [{ uri_or_blob_ref: 'log://a', source_type: 'first_party_log' }],
    });
    expect(trustScore(proposal, firstParty)).toBeCloseTo(0.15, 10);
  });

  it('clamps to 1', () => {
    const proposal = strongProposal({
      model_conf: 1,
      evidence: [{ uri_or_blob_ref: 'log://a', source_type: 'run_artifact', quality_score: 1 }],
    });
    expect(trustScore(proposal, firstParty)).toBe(1);
  });

  it('is deterministic', () => {
    const proposal = strongProposal();
    expect(trustScore(proposal, firstParty)).toBe(trustScore(proposal, firstParty));
  });
});

describe('meetsMinimumQuality', () => {
  it('fails with no evidence', () => {
    expect(meetsMinimumQuality(strongProposal({ evidence: [] }), 0.7)).toBe(false);
  });

  it('requires every item to meet the floor', () => {
    const proposal = strongProposal({
      evidence: [
        { uri_or_blob_ref: 'log://a', source_type: 'first_party_log', quality_score: 0.95 },
        { uri_or_blob_ref: 'log://b', source_type: 'first_party_log', quality_score: 0.5 },
      ],
    });
    expect(meetsMinimumQuality(proposal, 0.7)).toBe(false);
  });

  it('accepts a score exactly at the floor', () => {
    const proposal = strongProposal({
      evidence: [{ uri_or_blob_ref: 'log://a', source_type: 'first_party_log', quality_score: 0.7 }],
    });
    expect(meetsMinimumQuality(proposal, 0.7)).toBe(true);
  });

  it('counts a missing score as zero', () => {
    const proposal = strongProposal({
      evidence: [{ uri_or_blob_ref: 'log://a', source_type: 'first_party_log' }],
    });
    expect(meetsMinimumQuality(proposal, 0.7)).toBe(false);
  });
});
