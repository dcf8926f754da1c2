import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { parseAccount, parseAmount, sendError } from './requestParsing';

export function createContributionRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns/:id/contributions', async (req, res) => {
    try {
      const account = parseAccount(req.body?.account, 'account');
      const amount = parseAmount(req.body?.amount, 'amount');
      const credited = await service.contribute(req.params.id, account, amount);
      return res.status(201).json({
        account,
        requested: amount.toString(),
        credited: credited.toString(),
        shares: service.getAccount(req.params.id, account).shares.toString(),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
