import { ClaimProposal } from '../types/claim';
import { GraphStore } from '../graph-store';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';

/**
 * Detects single-valued contradictions: an entity claim conflicts when the
 * subject already points somewhere else over the same predicate. Literal
 * objects never contradict an edge, but a failed read is treated as a
 * conflict whatever the object kind.
 */
export class ConflictDetector {
  constructor(private readonly graph: GraphStore) {}

  async hasConflict(proposal: Pick<ClaimProposal, 'subject_id' | 'predicate' | 'object_kind' | 'object_value'>): Promise<boolean> {
    let existing: string[];
    try {
      existing = await this.graph.outgoingObjects(proposal.subject_id, proposal.predicate);
    } catch (error) {
      metrics.conflictCheckFailures.inc();
      logger.warn(
        { error, subject: proposal.subject_id, predicate: proposal.predicate },
        'Conflict check failed, treating as conflict',
      );
      return true;
    }

    if (proposal.object_kind !== 'entity') {
      return false;
    }

    const conflicting = existing.filter((objectId) => objectId !== proposal.object_value);
    if (conflicting.length > 0) {
      logger.info(
        { subject: proposal.subject_id, predicate: proposal.predicate, proposed: proposal.object_value, conflicting },
        'Conflicting edge found',
      );
      return true;
    }
    return false;
  }
}
