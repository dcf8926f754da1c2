import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { serializeCampaignConfig } from '../campaign/campaignConfig';
import { ManualClock } from '../campaign/clock';
import { CampaignService } from '../services/CampaignService';
import { DAY, START, makeConfig } from './helpers/campaignFixtures';

const ONE = '1000000000000000000';

function buildApp() {
  const service = new CampaignService({ clock: new ManualClock(START) });
  return { service, app: createApp({ service, debugRoutes: true }) };
}

async function createCampaign(app: ReturnType<typeof createApp>) {
  const res = await request(app).post('/api/campaigns').send(serializeCampaignConfig(makeConfig()));
  expect(res.status).toBe(201);
  return String(res.body.id);
}

async function credit(app: ReturnType<typeof createApp>, holder: string, amount: string) {
  const res = await request(app).post('/api/debug/credit').send({ holder, amount });
  expect(res.status).toBe(200);
}

describe('campaign routes', () => {
  it('reports health with the service clock', async () => {
    const { app } = buildApp();
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', campaigns: 0, now: START });
  });

  it('creates and reads a campaign', async () => {
    const { app } = buildApp();
    const id = await createCampaign(app);

    const res = await request(app).get(`/api/campaigns/${id}`);
    expect(res.status).toBe(200);
    expect(res.body.config).toMatchObject({ goalMin: '2000000000000000000', goalMax: '5000000000000000000' });
    expect(res.body.status).toMatchObject({ state: 'funding', depositTotal: '0', isContributionAllowed: true });

    const list = await request(app).get('/api/campaigns');
    expect(list.body).toHaveLength(1);
  });

  it('rejects an invalid config with 400', async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post('/api/campaigns')
      .send({ ...serializeCampaignConfig(makeConfig()), upfrontFeeBips: 100 });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'fee-collector-required' });
  });

  it('answers 404 for unknown campaigns', async () => {
    const { app } = buildApp();
    expect((await request(app).get('/api/campaigns/missing')).body).toEqual({ error: 'campaign-not-found' });
    const res = await request(app).post('/api/campaigns/missing/contributions').send({ account: 'alice', amount: ONE });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'campaign-not-found' });
  });

  it('runs a raise from contribution to yield withdrawal', async () => {
    const { app } = buildApp();
    const id = await createCampaign(app);
    for (const backer of ['alice', 'bob']) {
      await credit(app, backer, ONE);
      const res = await request(app)
        .post(`/api/campaigns/${id}/contributions`)
        .send({ account: backer, amount: ONE });
      expect(res.status).toBe(201);
      expect(res.body).toEqual({ account: backer, requested: ONE, credited: ONE, shares: ONE });
    }

    const early = await request(app).post(`/api/campaigns/${id}/settle`);
    expect(early.status).toBe(409);
    expect(early.body).toEqual({ error: 'settlement-not-allowed' });

    const advanced = await request(app).post('/api/debug/clock/advance').send({ seconds: 30 * DAY });
    expect(advanced.body).toEqual({ now: START + 30 * DAY });

    const settled = await request(app).post(`/api/campaigns/${id}/settle`);
    expect(settled.status).toBe(200);
    expect(settled.body.recipientAmount).toBe('2000000000000000000');
    expect(settled.body.status).toMatchObject({ state: 'funded', processed: true });

    await credit(app, 'sponsor', ONE);
    const deposited = await request(app).post(`/api/campaigns/${id}/yield`).send({ from: 'sponsor', amount: ONE });
    expect(deposited.status).toBe(201);
    expect(deposited.body).toEqual({ credited: ONE });

    const account = await request(app).get(`/api/campaigns/${id}/accounts/alice`);
    expect(account.body).toMatchObject({
      account: 'alice',
      shares: ONE,
      withdrawn: '0',
      yieldBalance: '500000000000000000',
      hasContribution: true,
      range: { min: '0', max: '0' },
    });

    const withdrawn = await request(app).post(`/api/campaigns/${id}/withdrawals`).send({ account: 'alice' });
    expect(withdrawn.body).toEqual({ account: 'alice', amount: '500000000000000000' });

    const balance = await request(app).get('/api/debug/balances/alice');
    expect(balance.body).toEqual({ asset: 'native', holder: 'alice', balance: '500000000000000000' });

    const events = await request(app).get(`/api/campaigns/${id}/events`);
    expect(events.body.map((entry: { event: string }) => entry.event)).toEqual([
      'ContributionAccepted',
      'ContributionAccepted',
      'Settled',
      'YieldDeposited',
      'Withdrawn',
    ]);
  });

  it('maps contribution failures to status codes', async () => {
    const { app } = buildApp();
    const id = await createCampaign(app);

    const unfunded = await request(app).post(`/api/campaigns/${id}/contributions`).send({ account: 'alice', amount: ONE });
    expect(unfunded.status).toBe(502);
    expect(unfunded.body).toEqual({ error: 'insufficient-funds' });

    await credit(app, 'alice', ONE);
    const small = await request(app)
      .post(`/api/campaigns/${id}/contributions`)
      .send({ account: 'alice', amount: '100000000000000000' });
    expect(small.status).toBe(400);
    expect(small.body).toEqual({ error: 'below-contribution-min' });

    const malformed = await request(app).post(`/api/campaigns/${id}/contributions`).send({ account: 'alice', amount: '1.5' });
    expect(malformed.body).toEqual({ error: 'amount-invalid' });

    const range = await request(app).get(`/api/campaigns/${id}/accounts/alice/range`);
    expect(range.body).toEqual({ min: '200000000000000000', max: ONE });
  });

  it('releases a failed raise and refunds through withdrawals', async () => {
    const { app } = buildApp();
    const id = await createCampaign(app);
    await credit(app, 'alice', '300000000000000000');
    await request(app)
      .post(`/api/campaigns/${id}/contributions`)
      .send({ account: 'alice', amount: '300000000000000000' });

    const early = await request(app).post(`/api/campaigns/${id}/fail`);
    expect(early.status).toBe(409);
    expect(early.body).toEqual({ error: 'campaign-not-ended' });

    await request(app).post('/api/debug/clock/advance').send({ seconds: 30 * DAY });
    const failed = await request(app).post(`/api/campaigns/${id}/fail`);
    expect(failed.body.status).toMatchObject({ state: 'failed', processed: true });

    const refund = await request(app).post(`/api/campaigns/${id}/withdrawals`).send({ account: 'alice' });
    expect(refund.body).toEqual({ account: 'alice', amount: '300000000000000000' });

    const contributed = await request(app).get(`/api/campaigns/${id}/accounts/alice/contributed`);
    expect(contributed.body).toEqual({ account: 'alice', contributed: false });
  });

  it('moves shares directly and through an approval', async () => {
    const { app } = buildApp();
    const id = await createCampaign(app);
    for (const backer of ['alice', 'bob']) {
      await credit(app, backer, ONE);
      await request(app).post(`/api/campaigns/${id}/contributions`).send({ account: backer, amount: ONE });
    }

    const whileOpen = await request(app)
      .post(`/api/campaigns/${id}/transfers`)
      .send({ from: 'alice', to: 'dave', amount: '1' });
    expect(whileOpen.status).toBe(409);
    expect(whileOpen.body).toEqual({ error: 'transfers-not-allowed' });

    await request(app).post('/api/debug/clock/advance').send({ seconds: 30 * DAY });
    await request(app).post(`/api/campaigns/${id}/settle`);

    const direct = await request(app)
      .post(`/api/campaigns/${id}/transfers`)
      .send({ from: 'alice', to: 'dave', amount: '400000000000000000' });
    expect(direct.body).toEqual({
      from: 'alice',
      to: 'dave',
      amount: '400000000000000000',
      fromShares: '600000000000000000',
      toShares: '400000000000000000',
    });

    const approval = await request(app)
      .post(`/api/campaigns/${id}/approvals`)
      .send({ owner: 'bob', spender: 'broker', amount: '300000000000000000' });
    expect(approval.body).toEqual({ owner: 'bob', spender: 'broker', amount: '300000000000000000' });

    const delegated = await request(app)
      .post(`/api/campaigns/${id}/transfers`)
      .send({ spender: 'broker', from: 'bob', to: 'dave', amount: '200000000000000000' });
    expect(delegated.body.toShares).toBe('600000000000000000');

    const allowance = await request(app).get(`/api/campaigns/${id}/allowances/bob/broker`);
    expect(allowance.body).toEqual({ owner: 'bob', spender: 'broker', amount: '100000000000000000' });

    const overdrawn = await request(app)
      .post(`/api/campaigns/${id}/transfers`)
      .send({ spender: 'broker', from: 'bob', to: 'dave', amount: '200000000000000000' });
    expect(overdrawn.status).toBe(400);
    expect(overdrawn.body).toEqual({ error: 'insufficient-allowance' });
  });

  it('hides debug routes unless enabled', async () => {
    const service = new CampaignService({ clock: new ManualClock(START) });
    const app = createApp({ service, debugRoutes: false });
    const res = await request(app).post('/api/debug/credit').send({ holder: 'alice', amount: ONE });
    expect(res.status).toBe(404);
  });

  it('refuses to move a system clock', async () => {
    const app = createApp({ service: new CampaignService(), debugRoutes: true });
    const res = await request(app).post('/api/debug/clock/advance').send({ seconds: 10 });
    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: 'clock-not-manual' });
  });
});
