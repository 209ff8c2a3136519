import { Router } from 'express';
import { CrowdfundError } from '../ledger/errors';
import { assetKey } from '../ledger/types';
import type { CrowdfundEngine } from '../services/CrowdfundEngine';
import type { CustodyLedger } from '../transfer/CustodyLedger';
import { RequestError, callerOf, sendError } from './http';
import { parseAmount, parseOptionalAsset, parseString } from './payload';

/** Account balances in the custody book. Deposits record value received outside the service and are owner-only. */
export function createWalletRouter(engine: CrowdfundEngine, wallet: CustodyLedger): Router {
  const router = Router();

  router.get('/wallet/balance', (req, res) => {
    try {
      const caller = callerOf(req);
      const asset = parseOptionalAsset(req.query);
      return res.json({
        account: caller,
        asset: assetKey(asset),
        balance: wallet.balanceOf(asset, caller).toString(),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/wallet/deposit', async (req, res) => {
    try {
      const caller = callerOf(req);
      if (caller !== engine.getPlatformSettings().owner) {
        throw new CrowdfundError('Unauthorized', 'owner-only');
      }
      const account = parseString(req.body, 'account');
      const asset = parseOptionalAsset(req.body);
      const amount = parseAmount(req.body);
      if (amount === 0n) {
        throw new RequestError('amount-invalid');
      }
      const balance = await wallet.deposit(asset, account, amount);
      return res.status(201).json({ account, asset: assetKey(asset), balance: balance.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
