/**
 * Metrics module for the claim gate using Prometheus client
 */
import client from 'prom-client';
import { logger } from '../utils/logger';

// Initialize Prometheus registry
const register = new client.Registry();

// Add default metrics (CPU, memory, event loop, etc.)
client.collectDefaultMetrics({ register });

// Application-specific metrics
export const metrics = {
  // Claims through the policy gate, by decision
  claimsProposed: new client.Counter({
    name: 'claimgate_claims_proposed_total',
    help: 'Total number of claims evaluated by the policy gate',
    labelNames: ['decision'] as const,
    registers: [register],
  }),

  claimsApproved: new client.Counter({
    name: 'claimgate_claims_approved_total',
    help: 'Total number of explicit claim approvals',
    registers: [register],
  }),

  claimsRejected: new client.Counter({
    name: 'claimgate_claims_rejected_total',
    help: 'Total number of claim rejections',
    registers: [register],
  }),

  // Conflict reads that failed and were treated as conflicts
  conflictCheckFailures: new client.Counter({
    name: 'claimgate_conflict_check_failures_total',
    help: 'Conflict checks that failed closed',
    registers: [register],
  }),

  evidenceMirrorFailures: new client.Counter({
    name: 'claimgate_evidence_mirror_failures_total',
    help: 'Evidence rows that could not be written to the relational store',
    registers: [register],
  }),

  reconciliationApprovals: new client.Counter({
    name: 'claimgate_reconciliation_approvals_total',
    help: 'Follow-up approvals issued after an auto-merge was stored as not approved',
    labelNames: ['status'] as const,
    registers: [register],
  }),

  // --- Agent loop ---

  agentRuns: new client.Counter({
    name: 'claimgate_agent_runs_total',
    help: 'Agent loop runs, by how they ended',
    labelNames: ['outcome'] as const,
    registers: [register],
  }),

  toolCalls: new client.Counter({
    name: 'claimgate_tool_calls_total',
    help: 'Tool invocations dispatched by the agent loop',
    labelNames: ['tool'] as const,
    registers: [register],
  }),

  unsafeQueriesRejected: new client.Counter({
    name: 'claimgate_unsafe_queries_rejected_total',
    help: 'Model-issued queries refused by the safety filter',
    registers: [register],
  }),

  modelCallTime: new client.Histogram({
    name: 'claimgate_model_call_seconds',
    help: 'Time taken by a single language model call',
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
    registers: [register],
  }),

  // Gap scans run by the background scanner
  gapScans: new client.Counter({
    name: 'claimgate_gap_scans_total',
    help: 'Gap scan cycles, by status',
    labelNames: ['status'] as const,
    registers: [register],
  }),
};

/**
 * Get all metrics for Prometheus scraping
 * @returns Promise resolving to metrics string
 */
export async function getMetrics(): Promise<string> {
  try {
    return await register.metrics();
  } catch (err) {
    logger.error({ error: err }, 'Error collecting metrics');
    throw err;
  }
}

export default {
  metrics,
  getMetrics,
  register
};
