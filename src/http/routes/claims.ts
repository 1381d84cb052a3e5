/**
 * Claim write routes: propose, approve, reject
 */
import { RequestHandler, Router } from 'express';
import { ClaimLedger } from '../../ledger/claim-ledger';
import { PolicyGate } from '../../policy/gate';
import { validateClaimIdRequest, validateClaimProposal } from '../../utils/schema-validator';
import { asyncHandler } from '../async-handler';

export function claimRoutes(gate: PolicyGate, ledger: ClaimLedger, auth: RequestHandler): Router {
  const router = Router();

  router.post(
    '/propose_claim',
    auth,
    asyncHandler(async (req, res) => {
      const proposal = validateClaimProposal(req.body);
      const decision = await gate.propose(proposal);
      res.json({ ok: true, ...decision });
    }),
  );

  router.post(
    '/approve',
    auth,
    asyncHandler(async (req, res) => {
      const { claim_id } = validateClaimIdRequest(req.body);
      await ledger.approve(claim_id);
      res.json({ ok: true });
    }),
  );

  router.post(
    '/reject',
    auth,
    asyncHandler(async (req, res) => {
      const { claim_id } = validateClaimIdRequest(req.body);
      await ledger.reject(claim_id);
      res.json({ ok: true });
    }),
  );

  return router;
}
