import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { sendError } from './requestParsing';
import { serializeStatus } from './serialize';

export function createSettlementRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns/:id/settle', async (req, res) => {
    try {
      const recipientAmount = await service.settle(req.params.id);
      const summary = service.getCampaign(req.params.id);
      return res.json({
        recipientAmount: recipientAmount.toString(),
        status: summary ? serializeStatus(summary.status) : undefined,
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/fail', async (req, res) => {
    try {
      await service.releaseFailed(req.params.id);
      const summary = service.getCampaign(req.params.id);
      return res.json({ status: summary ? serializeStatus(summary.status) : undefined });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
