import { Router } from 'express';
import type { CampaignService } from '../services/CampaignService';
import { parseAccount, sendError } from './requestParsing';
import { serializeAccountView, serializeCampaignSummary, serializeRange } from './serialize';

export function createCampaignsRouter(service: CampaignService): Router {
  const router = Router();

  router.post('/campaigns', async (req, res) => {
    try {
      const summary = await service.createCampaign(req.body);
      return res.status(201).json(serializeCampaignSummary(summary));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns', (_req, res) => {
    try {
      return res.json(service.listCampaigns().map(serializeCampaignSummary));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id', (req, res) => {
    const summary = service.getCampaign(req.params.id);
    if (!summary) return res.status(404).json({ error: 'campaign-not-found' });
    return res.json(serializeCampaignSummary(summary));
  });

  router.get('/campaigns/:id/events', (req, res) => {
    try {
      return res.json(service.listEvents(req.params.id));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/accounts/:account', (req, res) => {
    try {
      const account = parseAccount(req.params.account, 'account');
      return res.json(serializeAccountView(service.getAccount(req.params.id, account)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  router.get('/campaigns/:id/accounts/:account/range', (req, res) => {
    try {
      const account = parseAccount(req.params.account, 'account');
      return res.json(serializeRange(service.contributionRange(req.params.id, account)));
    } catch (err) {
      return sendError(res, err);
    }
  });

  // read-only predicate for the proof-of-contribution registry
  router.get('/campaigns/:id/accounts/:account/contributed', (req, res) => {
    try {
      const account = parseAccount(req.params.account, 'account');
      return res.json({ account, contributed: service.hasContribution(req.params.id, account) });
    } catch (err) {
      return sendError(res, err);
    }
  });

  return router;
}
