import express from 'express';
import cors from 'cors';
import type { CrowdfundEngine } from './services/CrowdfundEngine';
import type { CustodyLedger } from './transfer/CustodyLedger';
import { createAdminRouter } from './routes/admin.routes';
import { createCampaignsRouter } from './routes/campaigns.routes';
import { createContributionsRouter } from './routes/contributions.routes';
import { CALLER_HEADER, sendError, RequestError } from './routes/http';
import { createRefundRouter } from './routes/refund.routes';
import { createWalletRouter } from './routes/wallet.routes';
import { createWithdrawalRouter } from './routes/withdrawal.routes';

export type AppOptions = {
  engine: CrowdfundEngine;
  /** Mounts the wallet routes when the engine pays through this custody book. */
  wallet?: CustodyLedger;
};

export function createApp({ engine, wallet }: AppOptions) {
  const app = express();

  const isProduction = process.env.NODE_ENV === 'production';
  const allowDevLocalhost = !isProduction;
  const allowedOrigins = (process.env.CORS_ORIGINS || '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  const devLocalhostRegex = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      if (!origin) {
        callback(null, true);
        return;
      }
      const isAllowed =
        allowedOrigins.includes(origin) || (allowDevLocalhost && devLocalhostRegex.test(origin));
      if (!isProduction) {
        console.log(`[cors] origin ${isAllowed ? 'allowed' : 'blocked'}: ${origin}`);
      }
      callback(null, isAllowed);
    },
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', CALLER_HEADER],
    optionsSuccessStatus: 204,
  };

  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/health', (_req, res) => {
    const platform = engine.getPlatformSettings();
    res.json({
      status: 'ok',
      paused: platform.paused,
      campaigns: engine.listCampaigns().length,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createCampaignsRouter(engine));
  app.use('/api', createContributionsRouter(engine));
  app.use('/api', createRefundRouter(engine));
  app.use('/api', createWithdrawalRouter(engine));
  app.use('/api', createAdminRouter(engine));
  if (wallet) {
    app.use('/api', createWalletRouter(engine, wallet));
  }

  // Body parser failures arrive here.
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      return sendError(res, new RequestError('body-invalid'));
    }
    return sendError(res, err);
  });

  return app;
}
