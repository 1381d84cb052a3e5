/**
 * Configuration settings for the claim gate service
 */
import { config } from 'dotenv';

// Load environment variables from .env file if present
config();

// Environment mapping for log levels
const LOG_LEVELS = {
  development: 'debug',
  test: 'debug',
  production: 'info',
} as const;

// Get the current node environment or default to development
const nodeEnv = (process.env.NODE_ENV || 'development') as keyof typeof LOG_LEVELS;

/**
 * Parse a comma separated list, dropping blanks
 */
export function parseList(raw: string | undefined, fallback: string): string[] {
  return (raw || fallback)
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseNumber(raw: string | undefined, fallback: number): number {
  const value = raw === undefined || raw === '' ? NaN : Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Parse a base-10 integer setting, falling back when it is unset or not a number
 */
export function parseInteger(raw: string | undefined, fallback: number): number {
  const value = raw === undefined ? NaN : parseInt(raw, 10);
  return Number.isFinite(value) ? value : fallback;
}

const pgDsn =
  process.env.PG_DSN ||
  `postgresql://${process.env.PG_USER || 'kg_user'}:${process.env.PG_PASSWORD || 'kg_password'}` +
    `@${process.env.PG_HOST || 'postgres'}:${process.env.PG_PORT || '5432'}/${process.env.PG_DB || 'kg_db'}`;

/**
 * Thresholds and vocabularies consulted by the policy gate and the agent loop
 */
export interface PolicyConfig {
  autoTrustThreshold: number;
  minEvidenceQuality: number;
  autoMergePredicates: ReadonlySet<string>;
  firstPartySources: ReadonlySet<string>;
  allowedReadRelations: ReadonlySet<string>;
}

/**
 * Configuration object for the claim gate service
 */
export const Config = {
  // Service info
  service: {
    name: 'claim-gate',
    version: process.env.npm_package_version || '0.1.0',
  },

  // Logging configuration
  logging: {
    level: process.env.LOG_LEVEL || LOG_LEVELS[nodeEnv] || 'info',
    prettyPrint: nodeEnv !== 'production',
  },

  // HTTP server configuration
  http: {
    port: parseInteger(process.env.HTTP_PORT, 7000),
    host: process.env.HTTP_HOST || '0.0.0.0',
  },

  // Shared secret; empty means open access
  auth: {
    apiKey: process.env.GATEWAY_API_KEY || '',
  },

  // Graph store
  neo4j: {
    uri: process.env.NEO4J_URI || 'bolt://neo4j:7687',
    user: process.env.NEO4J_USER || 'neo4j',
    password: process.env.NEO4J_PASSWORD || 'neo4j_password',
    timeoutMs: parseInteger(process.env.NEO4J_TIMEOUT_MS, 30000),
  },

  // Relational evidence store
  postgres: {
    connectionString: pgDsn,
    timeoutMs: parseInteger(process.env.PG_TIMEOUT_MS, 30000),
  },

  // OpenAI-compatible chat endpoint
  llm: {
    baseUrl: process.env.LLM_BASE_URL || 'http://host.docker.internal:1234/v1',
    apiKey: process.env.LLM_API_KEY || 'lm-studio',
    model: process.env.LLM_MODEL || 'llama-3.2-1b-instruct',
    temperature: parseNumber(process.env.LLM_TEMPERATURE, 0.1),
    timeoutMs: parseInteger(process.env.LLM_TIMEOUT_MS, 60000),
  },

  policy: {
    autoTrustThreshold: parseNumber(process.env.TIER_AUTO_TRUST_THRESHOLD, 0.85),
    minEvidenceQuality: parseNumber(process.env.TIER_MIN_EVIDENCE_QUALITY, 0.7),
    autoMergePredicates: new Set(parseList(process.env.AUTO_MERGE_PREDICATES, 'USES,INGESTS,PRODUCES')),
    firstPartySources: new Set(parseList(process.env.FIRST_PARTY_SOURCES, 'first_party_log,config,run_artifact')),
    allowedReadRelations: new Set(
      parseList(process.env.ALLOWED_READ_RELS, 'USES,INGESTS,PRODUCES,VERSION_OF,MENTIONS,FIXED_BY,ORIGINATES_AT'),
    ),
  } satisfies PolicyConfig,

  agent: {
    maxSteps: parseInteger(process.env.AGENT_MAX_STEPS, 4),
    neighborsLimit: parseInteger(process.env.AGENT_NEIGHBORS_LIMIT, 50),
  },

  // Background gap scan
  scheduler: {
    enabled: process.env.GAP_SCAN_ENABLED === 'true',
    intervalSeconds: parseInteger(process.env.SCAN_INTERVAL_SECONDS, 600),
    batchSize: parseInteger(process.env.GAP_SCAN_BATCH, 20),
  },
};

export type AppConfig = typeof Config;

// Export configuration as default
export default Config;
