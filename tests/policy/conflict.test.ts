/**
 * Tests for the conflict detector
 */
import { ConflictDetector } from '../../src/policy/conflict';
import { metrics } from '../../src/metrics/metrics';
import { InMemoryGraphStore, FakeEvidenceStore } from '../helpers/in-memory-stores';
import { ClaimLedger } from '../../src/ledger/claim-ledger';
import { strongProposal } from '../helpers/fixtures';

describe('ConflictDetector', () => {
  let graph: InMemoryGraphStore;
  let detector: ConflictDetector;

  beforeEach(async () => {
    graph = new InMemoryGraphStore();
    detector = new ConflictDetector(graph);
    // Existing edge Run:demo -USES-> Model:v1
    await new ClaimLedger(graph, new FakeEvidenceStore()).propose(
      strongProposal({ object_value: 'Model:v1', status: 'approved' }),
    );
  });

  it('reports no conflict when the subject has no edge of that type', async () => {
    await expect(detector.hasConflict(strongProposal({ predicate: 'PRODUCES' }))).resolves.toBe(false);
  });

  it('reports no conflict when the existing object is the proposed one', async () => {
    await expect(detector.hasConflict(strongProposal({ object_value: 'Model:v1' }))).resolves.toBe(false);
  });

  it('reports a conflict when the subject already points elsewhere', async () => {
    await expect(detector.hasConflict(strongProposal({ object_value: 'Model:v2' }))).resolves.toBe(true);
  });

  it('never flags literal objects', async () => {
    await expect(
      detector.hasConflict(strongProposal({ object_kind: 'literal', object_value: 'something else' })),
    ).resolves.toBe(false);
  });

  it('fails closed when the read fails', async () => {
    graph.failReads = true;
    const before = (await metrics.conflictCheckFailures.get()).values[0]?.value ?? 0;

    await expect(detector.hasConflict(strongProposal({ object_value: 'Model:v1' }))).resolves.toBe(true);

    const after = (await metrics.conflictCheckFailures.get()).values[0]?.value ?? 0;
    expect(after).toBe(before + 1);
  });

  it('fails closed for literal claims when the read fails', async () => {
    graph.failReads = true;
    await expect(detector.hasConflict(strongProposal({ object_kind: 'literal' }))).resolves.toBe(true);
  });
});
