import express from 'express';
import cors from 'cors';
import { readAllowedOrigins, debugRoutesEnabled } from './config/runtime';
import { CampaignService } from './services/CampaignService';
import { createCampaignsRouter } from './routes/campaigns.routes';
import { createContributionRouter } from './routes/contribution.routes';
import { createSettlementRouter } from './routes/settlement.routes';
import { createWithdrawalRouter } from './routes/withdrawal.routes';
import { createYieldRouter } from './routes/yield.routes';
import { createSharesRouter } from './routes/shares.routes';
import { createDebugRouter } from './routes/debug.routes';

export interface AppOptions {
  service?: CampaignService;
  debugRoutes?: boolean;
}

export function createApp(options: AppOptions = {}) {
  const app = express();
  const service = options.service ?? new CampaignService();

  const isProduction = process.env.NODE_ENV === 'production';
  const allowDevLocalhost = !isProduction;
  const allowedOrigins = readAllowedOrigins();
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
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    optionsSuccessStatus: 204,
  };

  app.use(cors(corsOptions));
  app.options('*', cors(corsOptions));

  app.use(express.json());

  // Healthchecks
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      campaigns: service.listCampaigns().length,
      now: service.clock.now(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', createCampaignsRouter(service));
  app.use('/api', createContributionRouter(service));
  app.use('/api', createSettlementRouter(service));
  app.use('/api', createWithdrawalRouter(service));
  app.use('/api', createYieldRouter(service));
  app.use('/api', createSharesRouter(service));
  if (options.debugRoutes ?? debugRoutesEnabled()) {
    app.use('/api', createDebugRouter(service));
  }

  return app;
}
