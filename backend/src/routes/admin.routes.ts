import { Router } from 'express';
import type { CrowdfundEngine } from '../services/CrowdfundEngine';
import { callerOf, parseCampaignId, sendError } from './http';
import { parseBoolean, parseInteger, parseString } from './payload';

export function createAdminRouter(engine: CrowdfundEngine): Router {
  const router = Router();

  router.get('/platform', (_req, res) => {
    return res.json(engine.getPlatformSettings());
  });

  router.post('/platform/pause', async (req, res) => {
    try {
      await engine.setPaused(callerOf(req), parseBoolean(req.body, 'paused'));
      return res.json(engine.getPlatformSettings());
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/platform/fee', async (req, res) => {
    try {
      await engine.setPlatformFee(callerOf(req), parseInteger(req.body, 'feeBps'));
      return res.json(engine.getPlatformSettings());
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/platform/tokens', async (req, res) => {
    try {
      await engine.allowToken(callerOf(req), parseString(req.body, 'tokenId'));
      return res.json(engine.getPlatformSettings());
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.delete('/platform/tokens/:tokenId', async (req, res) => {
    try {
      await engine.disallowToken(callerOf(req), req.params.tokenId);
      return res.json(engine.getPlatformSettings());
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/verified', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const verified = parseBoolean(req.body, 'verified');
      await engine.setVerified(callerOf(req), id, verified);
      return res.json({ campaignId: id, verified });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/promoted', async (req, res) => {
    try {
      const id = parseCampaignId(req.params.id);
      const promoted = parseBoolean(req.body, 'promoted');
      await engine.setPromoted(callerOf(req), id, promoted);
      return res.json({ campaignId: id, promoted });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
