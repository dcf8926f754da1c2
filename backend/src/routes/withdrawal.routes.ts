import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { parseAccount, sendError } from './requestParsing';

export function createWithdrawalRouter(service: CampaignService): Router {
  const router = Router();

  // pull payment: anyone may trigger it, funds always go to `account`
  router.post('/campaigns/:id/withdrawals', async (req, res) => {
    try {
      const account = parseAccount(req.body?.account, 'account');
      const paid = await service.withdraw(req.params.id, account);
      return res.json({ account, amount: paid.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
