import { GraphRecord } from '../types/graph';
import { ClaimLedger } from '../ledger/claim-ledger';
import { GateDecision, PolicyGate } from '../policy/gate';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';
import { ToolAction } from './actions';
import { CypherGuard } from './cypher-guard';

export type ToolResult = { records: GraphRecord[] } | ({ ok: true } & GateDecision);

/**
 * Runs a validated action against the pipeline. Model-written queries pass
 * the guard and then run in a read session; claims go through the gate.
 */
export class ToolDispatcher {
  constructor(
    private readonly ledger: ClaimLedger,
    private readonly gate: PolicyGate,
    private readonly guard: CypherGuard,
  ) {}

  async dispatch(action: ToolAction): Promise<ToolResult> {
    metrics.toolCalls.inc({ tool: action.kind });
    logger.debug({ tool: action.kind }, 'Dispatching tool');

    switch (action.kind) {
      case 'neighbors':
        return { records: await this.ledger.neighbors(action.id, action.depth, action.limit) };
      case 'cypher':
        this.guard.check(action.query);
        return { records: await this.ledger.cypher(action.query, action.params, 'read') };
      case 'propose_claim':
        return { ok: true, ...(await this.gate.propose(action.claim)) };
    }
  }
}
