import { describe, expect, it } from 'vitest';
import { BalanceError, BoundsError, StateError } from '../campaign/errors';
import { E17, E18, END, VAULT, setupCampaign, setupFundedCampaign } from './helpers/campaignFixtures';

const THIRD = 333_333_333_333_333_333n;

describe('yield distribution', () => {
  it('splits a deposit pro rata across shareholders', async () => {
    const { campaign, fund, balanceOf, events } = await setupFundedCampaign();
    fund('sponsor', E18);
    await expect(campaign.depositYield('sponsor', E18)).resolves.toBe(E18);

    for (const backer of ['alice', 'bob', 'carol']) {
      expect(campaign.yieldBalanceOf(backer)).toBe(THIRD);
    }

    await expect(campaign.withdraw('alice')).resolves.toBe(THIRD);
    expect(balanceOf('alice')).toBe(THIRD);
    expect(balanceOf(VAULT)).toBe(666_666_666_666_666_667n);
    expect(campaign.yieldBalanceOf('alice')).toBe(0n);
    expect(campaign.withdrawnOf('alice')).toBe(THIRD);
    expect(campaign.totalWithdrawn).toBe(THIRD);
    await expect(campaign.withdraw('alice')).rejects.toThrow(new BalanceError('no-balance'));

    expect(events).toEqual([
      { type: 'YieldDeposited', amount: E18 },
      { type: 'Withdrawn', account: 'alice', amount: THIRD },
    ]);
  });

  it('leaves only rounding dust once everyone has withdrawn', async () => {
    const { campaign, fund, balanceOf } = await setupFundedCampaign();
    fund('sponsor', E18);
    await campaign.depositYield('sponsor', E18);
    for (const backer of ['alice', 'bob', 'carol']) {
      await campaign.withdraw(backer);
    }
    expect(balanceOf(VAULT)).toBe(1n);
    expect(campaign.totalWithdrawn).toBe(3n * THIRD);
  });

  it('carries withdrawal history with transferred shares', async () => {
    const { campaign, fund } = await setupFundedCampaign();
    fund('sponsor', 6n * E18);
    await campaign.depositYield('sponsor', 3n * E18);
    await expect(campaign.withdraw('alice')).resolves.toBe(E18);
    await campaign.depositYield('sponsor', 3n * E18);

    campaign.transfer('alice', 'dave', 5n * E17);

    expect(campaign.sharesOf('alice')).toBe(5n * E17);
    expect(campaign.sharesOf('dave')).toBe(5n * E17);
    expect(campaign.withdrawnOf('alice')).toBe(5n * E17);
    expect(campaign.withdrawnOf('dave')).toBe(5n * E17);
    expect(campaign.yieldBalanceOf('alice')).toBe(5n * E17);
    expect(campaign.yieldBalanceOf('dave')).toBe(5n * E17);
    expect(campaign.yieldBalanceOf('bob')).toBe(2n * E18);
    expect(campaign.depositTotal).toBe(3n * E18);
  });

  it('splits an unwithdrawn claim with the shares when half of them move', async () => {
    const { campaign, fund } = await setupFundedCampaign();
    fund('sponsor', E18);
    await campaign.depositYield('sponsor', E18);

    campaign.transfer('alice', 'dave', 5n * E17);

    const half = 166_666_666_666_666_666n;
    expect(campaign.yieldBalanceOf('alice')).toBe(half);
    expect(campaign.yieldBalanceOf('dave')).toBe(half);
    expect(THIRD - 2n * half).toBe(1n);

    const accounts = campaign.accounts();
    const owed = accounts.reduce((sum, account) => sum + campaign.yieldBalanceOf(account), 0n);
    const outstanding = campaign.yieldTotal - campaign.totalWithdrawn;
    expect(owed).toBe(999_999_999_999_999_998n);
    expect(outstanding - owed).toBeLessThanOrEqual(BigInt(accounts.length - 1));
  });

  it('never reports a negative yield balance after rounding on transfer', async () => {
    const { campaign, clock, fund } = setupCampaign({
      goalMin: 6n,
      goalMax: 10n,
      contributionMin: 1n,
      contributionMax: 5n,
    });
    fund('alice', 3n);
    fund('bob', 3n);
    await campaign.contribute('alice', 3n);
    await campaign.contribute('bob', 3n);
    clock.set(END);
    await campaign.settle();

    fund('sponsor', 5n);
    await campaign.depositYield('sponsor', 5n);
    await expect(campaign.withdraw('alice')).resolves.toBe(2n);

    campaign.transfer('alice', 'carol', 1n);
    expect(campaign.withdrawnOf('alice')).toBe(1n);
    expect(campaign.withdrawnOf('carol')).toBe(1n);
    expect(campaign.yieldBalanceOf('alice')).toBe(0n);
    expect(campaign.yieldBalanceOf('carol')).toBe(0n);
    expect(campaign.yieldBalanceOf('bob')).toBe(2n);
    await expect(campaign.withdraw('carol')).rejects.toThrow(new BalanceError('no-balance'));
  });

  it('credits value sent straight to the vault on sync', async () => {
    const { campaign, book, asset, events } = await setupFundedCampaign();
    book.credit(asset, VAULT, 6n * E17);

    await expect(campaign.syncYield()).resolves.toBe(6n * E17);
    await expect(campaign.syncYield()).resolves.toBe(0n);
    expect(campaign.yieldTotal).toBe(6n * E17);
    expect(campaign.yieldBalanceOf('bob')).toBe(2n * E17);

    await campaign.withdraw('bob');
    await expect(campaign.syncYield()).resolves.toBe(0n);
    expect(events).toEqual([
      { type: 'YieldDeposited', amount: 6n * E17 },
      { type: 'Withdrawn', account: 'bob', amount: 2n * E17 },
    ]);
  });

  it('accepts yield only once funded', async () => {
    const { campaign, fund } = setupCampaign();
    fund('sponsor', E18);
    await expect(campaign.depositYield('sponsor', E18)).rejects.toThrow(new StateError('yield-not-allowed'));
    await expect(campaign.syncYield()).rejects.toThrow(new StateError('yield-not-allowed'));

    const funded = await setupFundedCampaign();
    await expect(funded.campaign.depositYield('sponsor', 0n)).rejects.toThrow(
      new BoundsError('amount-must-be-positive'),
    );
  });
});

describe('fees', () => {
  const feeSchedule = { feeCollector: 'collector', upfrontFeeBips: 100, payoutFeeBips: 250 };

  it('takes the upfront fee from the settled pool', async () => {
    const { campaign, balanceOf } = await setupFundedCampaign(feeSchedule);
    expect(balanceOf('recipient')).toBe(297n * 10n ** 16n);
    expect(balanceOf('collector')).toBe(3n * 10n ** 16n);
    expect(campaign.feesCollected).toEqual({ upfront: 3n * 10n ** 16n, payout: 0n });
  });

  it('takes the payout fee from each yield withdrawal', async () => {
    const { campaign, fund, balanceOf, events } = await setupFundedCampaign(feeSchedule);
    fund('sponsor', 3n * E18);
    await campaign.depositYield('sponsor', 3n * E18);
    events.length = 0;

    await expect(campaign.withdraw('alice')).resolves.toBe(975n * 10n ** 15n);
    expect(balanceOf('alice')).toBe(975n * 10n ** 15n);
    expect(balanceOf('collector')).toBe(55n * 10n ** 15n);
    expect(campaign.withdrawnOf('alice')).toBe(E18);
    expect(campaign.feesCollected).toEqual({ upfront: 3n * 10n ** 16n, payout: 25n * 10n ** 15n });
    expect(events).toEqual([
      { type: 'Withdrawn', account: 'alice', amount: 975n * 10n ** 15n },
      { type: 'FeeTransferred', collector: 'collector', amount: 25n * 10n ** 15n, kind: 'payout' },
    ]);
  });

  it('announces the fee schedule at initialization', () => {
    const { events } = setupCampaign(feeSchedule);
    expect(events).toEqual([
      { type: 'FeeScheduleApplied', collector: 'collector', upfrontBips: 100, payoutBips: 250 },
    ]);
  });
});

describe('share transfers', () => {
  it('are refused while the raise is open', async () => {
    const { campaign, fund } = setupCampaign();
    fund('alice', E18);
    await campaign.contribute('alice', E18);
    expect(() => campaign.transfer('alice', 'dave', E17)).toThrow(new StateError('transfers-not-allowed'));
  });

  it('reject negative amounts and overdrafts', async () => {
    const { campaign } = await setupFundedCampaign();
    expect(() => campaign.transfer('alice', 'dave', -1n)).toThrow(new BalanceError('amount-invalid'));
    expect(() => campaign.transfer('alice', 'dave', E18 + 1n)).toThrow(new BalanceError('insufficient-balance'));
  });

  it('move refund claims after a failure', async () => {
    const { campaign, clock, fund, balanceOf } = setupCampaign();
    fund('alice', 3n * E17);
    await campaign.contribute('alice', 3n * E17);
    clock.set(END);
    campaign.releaseFailed();

    campaign.transfer('alice', 'dave', E17);
    await expect(campaign.withdraw('dave')).resolves.toBe(E17);
    await expect(campaign.withdraw('alice')).resolves.toBe(2n * E17);
    expect(balanceOf('dave')).toBe(E17);
    expect(balanceOf(VAULT)).toBe(0n);
  });

  it('spend an allowance through transferFrom', async () => {
    const { campaign, events } = await setupFundedCampaign();
    campaign.approve('alice', 'broker', 4n * E17);
    expect(campaign.allowance('alice', 'broker')).toBe(4n * E17);

    campaign.transferFrom('broker', 'alice', 'dave', 3n * E17);
    expect(campaign.allowance('alice', 'broker')).toBe(E17);
    expect(campaign.sharesOf('alice')).toBe(7n * E17);
    expect(campaign.sharesOf('dave')).toBe(3n * E17);

    expect(() => campaign.transferFrom('broker', 'alice', 'dave', 2n * E17)).toThrow(
      new BalanceError('insufficient-allowance'),
    );
    expect(events).toEqual([
      { type: 'Approval', owner: 'alice', spender: 'broker', amount: 4n * E17 },
      { type: 'ShareTransfer', from: 'alice', to: 'dave', amount: 3n * E17 },
    ]);
  });
});
