import { Router } from 'express';
import type { CrowdfundEngine } from '../services/CrowdfundEngine';
import { callerOf, parseCampaignId, sendError } from './http';
import { parseOptionalInteger } from './payload';
import { serializeSweep } from './serialize';

export function createRefundRouter(engine: CrowdfundEngine): Router {
  const router = Router();

  router.post('/campaigns/:id/refunds/enable', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      await engine.enableRefunds(callerOf(req), id);
      return res.json({ campaignId: id, refundable: true });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/refund', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const caller = callerOf(req);
      const amount = await engine.requestRefund(caller, id);
      return res.json({ campaignId: id, contributor: caller, amount: amount.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/cancel', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const sweep = await engine.cancelCampaign(callerOf(req), id);
      return res.json({ campaignId: id, cancelled: true, sweep: serializeSweep(sweep) });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/refunds/sweep', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const limit = parseOptionalInteger(req.body, 'limit');
      const sweep = await engine.sweepRefunds(callerOf(req), id, limit);
      return res.json({ campaignId: id, sweep: serializeSweep(sweep) });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
