/**
 * Graph read routes. /cypher is an operator passthrough and is not filtered.
 */
import { RequestHandler, Router } from 'express';
import { ClaimLedger } from '../../ledger/claim-ledger';
import { ValidationError } from '../../utils/errors';
import { validateCypherRequest, validateNeighborsRequest } from '../../utils/schema-validator';
import { asyncHandler } from '../async-handler';

const DEFAULT_GAPS_LIMIT = 50;
const MAX_GAPS_LIMIT = 1000;

function parseLimit(raw: unknown): number {
  if (raw === undefined) return DEFAULT_GAPS_LIMIT;
  const limit = typeof raw === 'string' && /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_GAPS_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_GAPS_LIMIT}`, [
      { path: '/limit', message: `must be an integer between 1 and ${MAX_GAPS_LIMIT}` },
    ]);
  }
  return limit;
}

export function graphRoutes(ledger: ClaimLedger, auth: RequestHandler): Router {
  const router = Router();

  router.post(
    '/cypher',
    auth,
    asyncHandler(async (req, res) => {
      const { query, params } = validateCypherRequest(req.body);
      res.json({ records: await ledger.cypher(query, params) });
    }),
  );

  router.post(
    '/neighbors',
    auth,
    asyncHandler(async (req, res) => {
      const { id, depth, limit } = validateNeighborsRequest(req.body);
      res.json({ records: await ledger.neighbors(id, depth, limit) });
    }),
  );

  router.get(
    '/gaps',
    auth,
    asyncHandler(async (req, res) => {
      res.json({ records: await ledger.gaps(parseLimit(req.query.limit)) });
    }),
  );

  return router;
}
