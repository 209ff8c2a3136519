import { Router } from 'express';
import type { CampaignSummary } from '../ledger/types';
import type { CrowdfundEngine } from '../services/CrowdfundEngine';
import { callerOf, parseCampaignId, sendError, RequestError } from './http';
import { parseAmount, parseAsset, parseCreateCampaign, parseInteger, parseMetadata, parseString, parseWithdrawalConfig } from './payload';
import { serializeCampaign } from './serialize';

const LIST_FILTERS = ['all', 'active', 'successful', 'verified', 'promoted'] as const;
type ListFilter = (typeof LIST_FILTERS)[number];

function isListFilter(value: string): value is ListFilter {
  return LIST_FILTERS.some((filter) => filter === value);
}

export function createCampaignsRouter(engine: CrowdfundEngine): Router {
  const router = Router();

  function listByFilter(filter: ListFilter): CampaignSummary[] {
    switch (filter) {
      case 'active':
        return engine.listActiveCampaigns();
      case 'successful':
        return engine.listSuccessfulCampaigns();
      case 'verified':
        return engine.listVerifiedCampaigns();
      case 'promoted':
        return engine.listPromotedCampaigns();
      default:
        return engine.listCampaigns();
    }
  }

  router.get('/campaigns', (req, res) => {
    try {
      const raw = typeof req.query.filter === 'string' ? req.query.filter.trim() : 'all';
      const filter = raw || 'all';
      if (!isListFilter(filter)) {
        throw new RequestError('filter-invalid');
      }
      return res.json(listByFilter(filter).map(serializeCampaign));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns', async (req, res) => {
    try {
      const caller = callerOf(req);
      const input = parseCreateCampaign(req.body);
      const id = await engine.createCampaign(caller, input);
      return res.status(201).json(serializeCampaign(engine.getCampaign(id)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id', (req, res) => {
    try {
      return res.json(serializeCampaign(engine.getCampaign(parseCampaignId(req.params.id))));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/contributors', (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const contributors = engine.getContributors(id).map((account) => ({
        account,
        amount: engine.getContribution(id, account).toString(),
      }));
      return res.json({ campaignId: id, contributors });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/contributions/:account', (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const account = req.params.account.trim();
      return res.json({ campaignId: id, account, amount: engine.getContribution(id, account).toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.patch('/campaigns/:id', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      await engine.updateMetadata(callerOf(req), id, parseMetadata(req.body));
      return res.json(serializeCampaign(engine.getCampaign(id)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/goal', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      await engine.modifyGoal(callerOf(req), id, parseAmount(req.body, 'goal'));
      return res.json(serializeCampaign(engine.getCampaign(id)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/deadline', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const deadline = await engine.extendDeadline(callerOf(req), id, parseInteger(req.body, 'extraDays'));
      return res.json({ campaignId: id, deadline: new Date(deadline).toISOString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/ownership', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      await engine.transferOwnership(callerOf(req), id, parseString(req.body, 'newCreator'));
      return res.json(serializeCampaign(engine.getCampaign(id)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/asset', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      await engine.setFundingAsset(callerOf(req), id, parseAsset(req.body));
      return res.json(serializeCampaign(engine.getCampaign(id)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/withdrawal-config', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      await engine.configureWithdrawals(callerOf(req), id, parseWithdrawalConfig(req.body));
      return res.json(serializeCampaign(engine.getCampaign(id)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/owners/:account/campaigns', (req, res) => {
    const account = req.params.account.trim();
    return res.json({ account, campaignIds: engine.getCampaignsByOwner(account) });
  });

  return router;
}
