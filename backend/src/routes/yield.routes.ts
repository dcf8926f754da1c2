import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { parseAccount, parseAmount, sendError } from './requestParsing';

export function createYieldRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns/:id/yield', async (req, res) => {
    try {
      const from = parseAccount(req.body?.from, 'from');
      const amount = parseAmount(req.body?.amount, 'amount');
      const credited = await service.depositYield(req.params.id, from, amount);
      return res.status(201).json({ credited: credited.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/yield/sync', async (req, res) => {
    try {
      const credited = await service.syncYield(req.params.id);
      return res.json({ credited: credited.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
