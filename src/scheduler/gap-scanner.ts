/**
 * Gap Scanner - surfaces isolated entities for review
 *
 * Every cycle reads a batch of entities with no relationships and files one
 * placeholder literal claim per entity through the policy gate. The claims
 * carry no evidence, so they always land pending and show up in review.
 */
import { ClaimProposal } from '../types/claim';
import { GraphRecord } from '../types/graph';
import { GateDecision } from '../policy/gate';
import { metrics } from '../metrics/metrics';
import { logger } from '../utils/logger';

export interface GapSource {
  gaps(limit: number): Promise<GraphRecord[]>;
}

export interface ClaimSink {
  propose(proposal: ClaimProposal): Promise<GateDecision>;
}

export interface GapScannerOptions {
  intervalSeconds: number;
  batchSize: number;
}

export const GAP_PREDICATE = 'MENTIONS';

function entityIdOf(record: GraphRecord): string | null {
  const node = record.e;
  if (node === null || typeof node !== 'object' || Array.isArray(node)) return null;
  const id: unknown = 'id' in node ? node.id : undefined;
  return typeof id === 'string' && id.length > 0 ? id : null;
}

export function placeholderClaim(entityId: string, nowMs: number): ClaimProposal {
  return {
    subject_id: entityId,
    predicate: GAP_PREDICATE,
    object_kind: 'literal',
    object_value: `gap-noted-${Math.floor(nowMs / 1000)}`,
    model_conf: 0,
    human_conf: null,
    context_hash: null,
    evidence: [],
    provenance: { who: 'scheduler', when: nowMs / 1000, model_version: 'n/a' },
  };
}

export class GapScanner {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  // Bumped on every start and stop; a cycle from an older run never reschedules
  private generation = 0;

  constructor(
    private readonly source: GapSource,
    private readonly sink: ClaimSink,
    private readonly options: GapScannerOptions,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * One scan cycle. Resolves to the number of placeholder claims filed;
   * failures are logged and counted, never thrown.
   */
  async scanOnce(): Promise<number> {
    let filed = 0;
    try {
      const records = await this.source.gaps(this.options.batchSize);
      for (const record of records) {
        const entityId = entityIdOf(record);
        if (!entityId) continue;
        await this.sink.propose(placeholderClaim(entityId, this.now()));
        filed++;
      }
      metrics.gapScans.inc({ status: 'success' });
      logger.info({ gaps: records.length, filed }, 'Gap scan complete');
    } catch (error) {
      metrics.gapScans.inc({ status: 'failure' });
      logger.warn({ error, filed }, 'Gap scan failed');
    }
    return filed;
  }

  /**
   * Scan now and then every interval until stop()
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation++;
    logger.info({ intervalSeconds: this.options.intervalSeconds }, 'Gap scanner started');
    void this.cycle(this.generation);
  }

  stop(): void {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    logger.info('Gap scanner stopped');
  }

  private async cycle(generation: number): Promise<void> {
    await this.scanOnce();
    if (!this.running || generation !== this.generation) return;
    this.timer = setTimeout(() => {
      void this.cycle(generation);
    }, this.options.intervalSeconds * 1000);
    this.timer.unref();
  }
}
