import { Router } from 'express';
import { ManualClock } from '../campaign/clock';
import { StateError } from '../campaign/errors';
import type { CampaignService } from '../services/CampaignService';
import { parseAccount, parseAmount, sendError } from './requestParsing';

/**
 * Dev-only controls over the in-process value book and, when the service
 * runs on a manual clock, over time.
 */
export function createDebugRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/debug/credit', async (req, res) => {
    try {
      const asset = parseAccount(req.body?.asset ?? 'native', 'asset');
      const holder = parseAccount(req.body?.holder, 'holder');
      const amount = parseAmount(req.body?.amount, 'amount');
      const balance = await service.creditBalance(asset, holder, amount);
      return res.json({ asset, holder, balance: balance.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/debug/balances/:holder', (req, res) => {
    const asset = typeof req.query.asset === 'string' ? req.query.asset : 'native';
    const balance = service.book.balanceOf(asset, req.params.holder);
    return res.json({ asset, holder: req.params.holder, balance: balance.toString() });
  });

  router.post('/debug/token-fee', async (req, res) => {
    try {
      const asset = parseAccount(req.body?.asset, 'asset');
      const bips = Number(req.body?.bips);
      await service.setTokenTransferFee(asset, bips);
      return res.json({ asset, bips });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/campaigns/:id/debug/vault-allowance', async (req, res) => {
    try {
      const asset = parseAccount(req.body?.asset, 'asset');
      const owner = parseAccount(req.body?.owner, 'owner');
      const amount = parseAmount(req.body?.amount, 'amount');
      await service.approveVault(req.params.id, asset, owner, amount);
      return res.json({ asset, owner, amount: amount.toString() });
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.post('/debug/clock/advance', (req, res) => {
    try {
      const clock = service.clock;
      if (!(clock instanceof ManualClock)) throw new StateError('clock-not-manual');
      const seconds = Number(req.body?.seconds);
      if (!Number.isSafeInteger(seconds) || seconds < 0) {
        return res.status(400).json({ error: 'seconds-invalid' });
      }
      return res.json({ now: clock.advance(seconds) });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
