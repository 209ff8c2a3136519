import { Router } from 'express';
import type { CrowdfundEngine } from '../services/CrowdfundEngine';
import { callerOf, parseCampaignId, sendError, RequestError } from './http';
import { parseAmount, parseString } from './payload';
import { serializeWithdrawal } from './serialize';

export function createWithdrawalRouter(engine: CrowdfundEngine): Router {
  const router = Router();

  router.post('/campaigns/:id/surplus', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const result = await engine.withdrawSurplus(callerOf(req), id);
      return res.json({ campaignId: id, ...serializeWithdrawal(result) });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/withdrawals', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const caller = callerOf(req);
      const result = await engine.withdrawPartialFunds(caller, id, parseAmount(req.body));
      return res.json({ campaignId: id, ...serializeWithdrawal(result) });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/milestones', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const caller = callerOf(req);
      const index = await engine.addMilestone(caller, id, parseAmount(req.body), parseString(req.body, 'description'));
      return res.status(201).json({ campaignId: id, index });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/milestones/:index/complete', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      if (!/^\d+$/.test(req.params.index)) {
        throw new RequestError('index-invalid');
      }
      const index = Number(req.params.index);
      const result = await engine.completeMilestone(callerOf(req), id, index);
      return res.json({ campaignId: id, index, ...serializeWithdrawal(result) });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
