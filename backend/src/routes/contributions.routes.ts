import { Router } from 'express';
import type { CrowdfundEngine } from '../services/CrowdfundEngine';
import { assetKey } from '../ledger/types';
import { callerOf, parseCampaignId, sendError } from './http';
import { parseAmount, parseOptionalAsset } from './payload';

export function createContributionsRouter(engine: CrowdfundEngine): Router {
  const router = Router();

  router.post('/campaigns/:id/contributions', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const caller = callerOf(req);
      const amount = parseAmount(req.body);
      const result = await engine.contribute(caller, id, amount);
      return res.status(201).json({
        campaignId: id,
        contributor: caller,
        amount: result.contributed.toString(),
        totalContributed: engine.getContribution(id, caller).toString(),
        raised: result.raised.toString(),
        funded: result.funded,
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  // Amounts whose return to the contributor failed after a rolled-back contribution.
  router.get('/unreturned', (req, res) => {
    try {
      const caller = callerOf(req);
      return res.json({
        account: caller,
        balances: engine.getUnreturned(caller).map((entry) => ({
          asset: assetKey(entry.asset),
          amount: entry.amount.toString(),
        })),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/unreturned/claim', async (req, res) => {
    try {
      const caller = callerOf(req);
      const asset = parseOptionalAsset(req.body);
      const amount = await engine.claimUnreturned(caller, asset);
      return res.json({ account: caller, asset: assetKey(asset), amount: amount.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
