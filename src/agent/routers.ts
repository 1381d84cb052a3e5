/**
 * Fast-path intent routers
 *
 * Phrasings common enough that a small local model fumbles them are mapped to
 * a tool call without asking the model. Routers are tried in order and the
 * first match wins.
 */
import { ToolCall } from './actions';

/**
 * `return` hands the tool result straight back; `summarize` gives the model
 * one turn to phrase an answer from it
 */
export type RouteFollowUp = 'return' | 'summarize';

export interface IntentRouter {
  readonly name: string;
  readonly followUp: RouteFollowUp;
  match(question: string): ToolCall | null;
}

const ADD_CLAIM_RE = /Add a claim:\s*`?([^`\s]+)`?\s+([A-Z_]+)\s+`?([^`\s]+)`?.*?quality\s+([0-9.]+)/i;
const NEIGHBORS_RE = /neighbors.*`([^`]+)`.*depth\s+(\d+)/i;

const ROUTED_MODEL_CONF = 0.9;

/**
 * "Add a claim: `A` USES `B` ... quality 0.9" becomes a first-party
 * entity claim attributed to the gateway
 */
export class AddClaimRouter implements IntentRouter {
  readonly name = 'add-claim';
  readonly followUp = 'return';

  constructor(private readonly now: () => number = Date.now) {}

  match(question: string): ToolCall | null {
    const m = ADD_CLAIM_RE.exec(question);
    if (!m) return null;

    const [, subject = '', predicate = '', object = '', rawQuality = ''] = m;
    const quality = parseFloat(rawQuality);
    if (!Number.isFinite(quality)) return null;

    return {
      tool: 'propose_claim',
      args: {
        subject_id: subject,
        predicate: predicate.toUpperCase(),
        object_kind: 'entity',
        object_value: object,
        model_conf: ROUTED_MODEL_CONF,
        evidence: [
          {
            uri_or_blob_ref: `log://${subject}`,
            source_type: 'first_party_log',
            quality_score: quality,
          },
        ],
        provenance: { who: 'gateway', when: this.now() / 1000 },
      },
    };
  }
}

/**
 * "neighbors of `X` depth N", depth clamped to 1..2
 */
export class NeighborsRouter implements IntentRouter {
  readonly name = 'neighbors';
  readonly followUp = 'summarize';

  constructor(private readonly limit: number) {}

  match(question: string): ToolCall | null {
    const m = NEIGHBORS_RE.exec(question);
    if (!m) return null;

    const [, id = '', rawDepth = '1'] = m;
    const depth = Math.max(1, Math.min(2, parseInt(rawDepth, 10)));
    return { tool: 'neighbors', args: { id, depth, limit: this.limit } };
  }
}

/**
 * Default router order: writes first, then reads
 */
export function defaultRouters(neighborsLimit: number, now: () => number = Date.now): IntentRouter[] {
  return [new AddClaimRouter(now), new NeighborsRouter(neighborsLimit)];
}
