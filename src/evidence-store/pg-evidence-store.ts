import { Pool } from 'pg';
import { StoredEvidence } from '../types/claim';
import { logger } from '../utils/logger';
import { UpstreamUnavailableError, errorMessage } from '../utils/errors';
import type { EvidenceStore } from './index';

export interface PgEvidenceOptions {
  connectionString: string;
  timeoutMs: number;
}

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS evidence (
    evidence_id     TEXT PRIMARY KEY,
    claim_id        TEXT NOT NULL,
    uri_or_blob_ref TEXT NOT NULL,
    snippet         TEXT,
    hash            TEXT,
    source_type     TEXT NOT NULL,
    quality_score   DOUBLE PRECISION,
    ts_epoch        DOUBLE PRECISION,
    created_at      TIMESTAMPTZ NOT NULL DEFAULT now()
  )
`;

const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS evidence_claim_id_idx ON evidence (claim_id)',
  'CREATE INDEX IF NOT EXISTS evidence_source_type_idx ON evidence (source_type)',
  'CREATE INDEX IF NOT EXISTS evidence_created_at_idx ON evidence (created_at)',
];

const INSERT = `
  INSERT INTO evidence
    (evidence_id, claim_id, uri_or_blob_ref, snippet, hash, source_type, quality_score, ts_epoch, created_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, to_timestamp($9 / 1000.0))
  ON CONFLICT (evidence_id) DO NOTHING
`;

export class PgEvidenceStore implements EvidenceStore {
  private readonly pool: Pool;

  constructor(options: PgEvidenceOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      connectionTimeoutMillis: options.timeoutMs,
      query_timeout: options.timeoutMs,
      max: 10,
    });

    // Idle clients can fail after a server restart; the next query reconnects
    this.pool.on('error', (error) => {
      logger.warn({ error }, 'Idle evidence store connection failed');
    });
  }

  async init(): Promise<void> {
    logger.info('Initializing evidence store');
    try {
      await this.pool.query(CREATE_TABLE);
      for (const statement of CREATE_INDEXES) {
        await this.pool.query(statement);
      }
    } catch (error) {
      throw new UpstreamUnavailableError('postgres', errorMessage(error), error);
    }
    logger.info('Evidence store ready');
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Evidence store connection closed');
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn({ error }, 'Evidence store ping failed');
      return false;
    }
  }

  async insert(evidence: StoredEvidence): Promise<void> {
    try {
      await this.pool.query(INSERT, [
        evidence.id,
        evidence.claim_id,
        evidence.uri_or_blob_ref,
        evidence.snippet ?? null,
        evidence.hash ?? null,
        evidence.source_type,
        evidence.quality_score ?? null,
        evidence.timestamp ?? null,
        evidence.created_at,
      ]);
    } catch (error) {
      throw new UpstreamUnavailableError('postgres', errorMessage(error), error);
    }
  }
}
