import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { parseAccount, parseAmount, sendError } from './requestParsing';

export function createSharesRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns/:id/transfers', async (req, res) => {
    try {
      const from = parseAccount(req.body?.from, 'from');
      const to = parseAccount(req.body?.to, 'to');
      const amount = parseAmount(req.body?.amount, 'amount');
      if (req.body?.spender !== undefined) {
        const spender = parseAccount(req.body.spender, 'spender');
        await service.transferFrom(req.params.id, spender, from, to, amount);
      } else {
        await service.transfer(req.params.id, from, to, amount);
      }
      return res.json({
        from,
        to,
        amount: amount.toString(),
        fromShares: service.getAccount(req.params.id, from).shares.toString(),
        toShares: service.getAccount(req.params.id, to).shares.toString(),
      });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/approvals', async (req, res) => {
    try {
      const owner = parseAccount(req.body?.owner, 'owner');
      const spender = parseAccount(req.body?.spender, 'spender');
      const amount = parseAmount(req.body?.amount, 'amount');
      await service.approve(req.params.id, owner, spender, amount);
      return res.json({ owner, spender, amount: amount.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/allowances/:owner/:spender', (req, res) => {
    try {
      const owner = parseAccount(req.params.owner, 'owner');
      const spender = parseAccount(req.params.spender, 'spender');
      return res.json({ owner, spender, amount: service.allowance(req.params.id, owner, spender).toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
