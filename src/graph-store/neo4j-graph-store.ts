/**
 * Neo4j-backed graph store
 *
 * Every public call opens its own session and closes it before returning.
 * Writes run as a single managed transaction with a bounded timeout and no
 * driver-side retry.
 */
import neo4j, { Driver, ManagedTransaction, Neo4jError, Session, isNode } from 'neo4j-driver';
import { ClaimStatus, StoredClaim } from '../types/claim';
import { AccessMode, GraphRecord } from '../types/graph';
import { logger } from '../utils/logger';
import { NotFoundError, UpstreamUnavailableError, ValidationError, errorMessage } from '../utils/errors';
import type { ClaimWrite, GraphStore } from './index';
import { claimFromProperties, claimToProperties, evidenceToProperties } from './claim-properties';
import { assertRelationType } from './relation-type';
import { serializeRecord } from './serialize';

export interface Neo4jOptions {
  uri: string;
  user: string;
  password: string;
  timeoutMs: number;
}

const CONSTRAINTS = [
  'CREATE CONSTRAINT IF NOT EXISTS FOR (e:Entity) REQUIRE e.id IS UNIQUE',
  'CREATE CONSTRAINT IF NOT EXISTS FOR (c:Claim) REQUIRE c.id IS UNIQUE',
  'CREATE CONSTRAINT IF NOT EXISTS FOR (v:Evidence) REQUIRE v.id IS UNIQUE',
];

const ENSURE_ENTITY = 'MERGE (e:Entity {id:$id}) ON CREATE SET e.created_at = timestamp()';

const CREATE_CLAIM = 'CREATE (c:Claim) SET c = $props RETURN c';

const CREATE_EVIDENCE = `
  MATCH (c:Claim {id:$cid})
  CREATE (ev:Evidence)
  SET ev = $props
  CREATE (c)-[:SUPPORTS]->(ev)
`;

const FIND_CLAIM = 'MATCH (c:Claim {id:$id}) RETURN c';

const SET_STATUS = 'MATCH (c:Claim {id:$id}) SET c.status = $status RETURN count(c) AS matched';

const OUTGOING_OBJECTS = `
  MATCH (s:Entity {id:$sid})-[r]->(o)
  WHERE type(r) = $pred
  RETURN collect(DISTINCT o.id) AS objs
`;

const GAPS = `
  MATCH (e:Entity)
  WHERE NOT (e)--()
  RETURN e LIMIT $limit
`;

/**
 * MERGE keeps re-approval from duplicating the edge. The relationship type
 * cannot be a parameter, hence the guarded interpolation.
 */
function materializeQuery(predicate: string): string {
  const relType = assertRelationType(predicate);
  return `
    MATCH (c:Claim {id:$cid})
    MATCH (s:Entity {id:c.subject_id})
    MATCH (o:Entity {id:c.object_value})
    MERGE (s)-[r:${relType}]->(o)
    ON CREATE SET r.claim_id = c.id, r.created_at = timestamp()
    SET c.status = 'approved'
    RETURN c
  `;
}

function neighborsQuery(depth: 1 | 2): string {
  return `
    MATCH (n:Entity {id:$id})
    CALL {
      WITH n
      MATCH p=(n)-[r*1..${depth}]-(m)
      RETURN p LIMIT $limit
    }
    RETURN p
  `;
}

/**
 * Whole-number parameters become Cypher integers so they can feed LIMIT/SKIP
 */
function toCypherParams(value: unknown): unknown {
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return neo4j.int(value);
  }
  if (Array.isArray(value)) {
    return value.map(toCypherParams);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toCypherParams(inner);
    }
    return out;
  }
  return value;
}

function claimFromNode(value: unknown): StoredClaim {
  if (value === null || typeof value !== 'object' || !isNode(value)) {
    throw new Error('Expected a Claim node in the result');
  }
  return claimFromProperties(value.properties);
}

export class Neo4jGraphStore implements GraphStore {
  private driver: Driver | null = null;

  constructor(private readonly options: Neo4jOptions) {}

  async init(): Promise<void> {
    logger.info({ uri: this.options.uri }, 'Connecting to graph store');

    this.driver = neo4j.driver(this.options.uri, neo4j.auth.basic(this.options.user, this.options.password), {
      connectionTimeout: this.options.timeoutMs,
      connectionAcquisitionTimeout: this.options.timeoutMs,
      maxTransactionRetryTime: 0,
      disableLosslessIntegers: true,
    });

    const session = this.session('write');
    try {
      for (const statement of CONSTRAINTS) {
        await session.run(statement);
      }
      await session.run('RETURN 1');
    } catch (error) {
      throw this.translate(error);
    } finally {
      await session.close();
    }

    logger.info('Graph store ready');
  }

  async close(): Promise<void> {
    if (!this.driver) return;
    const driver = this.driver;
    this.driver = null;
    await driver.close();
    logger.info('Graph store connection closed');
  }

  async ping(): Promise<boolean> {
    if (!this.driver) return false;
    try {
      await this.driver.verifyConnectivity();
      return true;
    } catch (error) {
      logger.warn({ error }, 'Graph store ping failed');
      return false;
    }
  }

  async writeClaim({ claim, evidence, materialize }: ClaimWrite): Promise<StoredClaim> {
    return this.write(async (tx) => {
      await tx.run(ENSURE_ENTITY, { id: claim.subject_id });
      if (claim.object_kind === 'entity') {
        await tx.run(ENSURE_ENTITY, { id: claim.object_value });
      }

      const created = await tx.run(CREATE_CLAIM, { props: claimToProperties(claim) });
      let stored = claimFromNode(created.records[0]?.get('c'));

      for (const item of evidence) {
        await tx.run(CREATE_EVIDENCE, { cid: claim.id, props: evidenceToProperties(item) });
      }

      if (materialize && claim.object_kind === 'entity') {
        const approved = await tx.run(materializeQuery(claim.predicate), { cid: claim.id });
        stored = claimFromNode(approved.records[0]?.get('c'));
      }

      return stored;
    });
  }

  async approveClaim(claimId: string): Promise<StoredClaim | null> {
    return this.write(async (tx) => {
      const found = await tx.run(FIND_CLAIM, { id: claimId });
      const record = found.records[0];
      if (!record) return null;

      const claim = claimFromNode(record.get('c'));
      const query =
        claim.object_kind === 'entity'
          ? materializeQuery(claim.predicate)
          : "MATCH (c:Claim {id:$cid}) SET c.status = 'approved' RETURN c";

      const updated = await tx.run(query, { cid: claimId });
      const row = updated.records[0];
      if (!row) {
        // Subject or object entity vanished between the two reads
        throw new NotFoundError('entity', `${claim.subject_id} or ${claim.object_value}`);
      }
      return claimFromNode(row.get('c'));
    });
  }

  async setClaimStatus(claimId: string, status: ClaimStatus): Promise<boolean> {
    return this.write(async (tx) => {
      const result = await tx.run(SET_STATUS, { id: claimId, status });
      const matched: unknown = result.records[0]?.get('matched');
      return typeof matched === 'number' && matched > 0;
    });
  }

  async outgoingObjects(subjectId: string, predicate: string): Promise<string[]> {
    return this.read(async (tx) => {
      const result = await tx.run(OUTGOING_OBJECTS, { sid: subjectId, pred: predicate });
      const objs: unknown = result.records[0]?.get('objs');
      return Array.isArray(objs) ? objs.filter((o): o is string => typeof o === 'string') : [];
    });
  }

  async neighbors(entityId: string, depth: 1 | 2, limit: number): Promise<GraphRecord[]> {
    return this.run(neighborsQuery(depth), { id: entityId, limit }, 'read');
  }

  async gaps(limit: number): Promise<GraphRecord[]> {
    return this.run(GAPS, { limit }, 'read');
  }

  async run(query: string, params: Record<string, unknown>, mode: AccessMode): Promise<GraphRecord[]> {
    const work = async (tx: ManagedTransaction): Promise<GraphRecord[]> => {
      const result = await tx.run(query, toCypherParams(params));
      return result.records.map((record) => serializeRecord(record.toObject()));
    };
    return mode === 'read' ? this.read(work) : this.write(work);
  }

  private session(mode: AccessMode): Session {
    if (!this.driver) {
      throw new UpstreamUnavailableError('neo4j', 'driver not initialized');
    }
    return this.driver.session({
      defaultAccessMode: mode === 'read' ? neo4j.session.READ : neo4j.session.WRITE,
    });
  }

  private async read<T>(work: (tx: ManagedTransaction) => Promise<T>): Promise<T> {
    const session = this.session('read');
    try {
      return await session.executeRead(work, { timeout: this.options.timeoutMs });
    } catch (error) {
      throw this.translate(error);
    } finally {
      await session.close();
    }
  }

  private async write<T>(work: (tx: ManagedTransaction) => Promise<T>): Promise<T> {
    const session = this.session('write');
    try {
      return await session.executeWrite(work, { timeout: this.options.timeoutMs });
    } catch (error) {
      throw this.translate(error);
    } finally {
      await session.close();
    }
  }

  /**
   * Statement errors are the caller's fault; everything else means the
   * store could not serve the request.
   */
  private translate(error: unknown): Error {
    if (error instanceof ValidationError || error instanceof NotFoundError || error instanceof UpstreamUnavailableError) {
      return error;
    }
    if (error instanceof Neo4jError && error.code.startsWith('Neo.ClientError.Statement')) {
      return new ValidationError(error.message, [{ path: '/query', message: error.code }]);
    }
    logger.error({ error }, 'Graph store call failed');
    return new UpstreamUnavailableError('neo4j', errorMessage(error), error);
  }
}
