import { ShareLedger, type ShareLedgerSnapshot } from '../ledger/ShareLedger';
import { YieldLedger, type YieldLedgerSnapshot } from '../ledger/YieldLedger';
import type { Transport } from '../transport/types';
import {
  parseCampaignConfig,
  serializeCampaignConfig,
  validateCampaignConfig,
  type SerializedCampaignConfig,
} from './campaignConfig';
import type { Clock } from './clock';
import { contributionRangeFor, isTopOff } from './contributionRange';
import { BalanceError, BoundsError, ConfigError, StateError, TransportError, WindowError } from './errors';
import { splitPayout, splitSettlement } from './fees';
import {
  hasEnded,
  isContributionAllowed,
  isFailureAllowed,
  isGoalMaxMet,
  isGoalMinMet,
  isSettlementAllowed,
  type LifecycleView,
} from './lifecycle';
import type {
  AccountId,
  AccountView,
  CampaignConfig,
  CampaignEvent,
  CampaignState,
  CampaignStatus,
  ContributionRange,
  FeesCollected,
} from './types';

export interface CampaignSnapshot {
  config: SerializedCampaignConfig;
  state: CampaignState;
  processed: boolean;
  shares: ShareLedgerSnapshot;
  yield: YieldLedgerSnapshot;
  feesCollected: { upfront: string; payout: string };
}

export type CampaignListener = (event: CampaignEvent) => void;

/**
 * One fundraising campaign: pledges become shares, the pool settles to the
 * recipient or is released back to depositors, and yield received after
 * settlement is paid out pro rata to current shareholders.
 *
 * Every operation runs its checks and ledger effects before calling the
 * transport, and undoes those effects if the transport fails. Events are
 * only published once an operation has fully succeeded.
 */
export class Campaign {
  private configValue: CampaignConfig | null = null;
  private stateValue: CampaignState = 'funding';
  private processedFlag = false;
  private shares = new ShareLedger();
  private yields = new YieldLedger();
  private fees: FeesCollected = { upfront: 0n, payout: 0n };
  private listeners = new Set<CampaignListener>();

  constructor(
    private readonly transport: Transport,
    private readonly clock: Clock,
  ) {}

  /** Called once by whoever deploys the campaign. */
  initialize(config: CampaignConfig): void {
    if (this.configValue) throw new StateError('already-initialized');
    validateCampaignConfig(config);
    if (!sameDenomination(config, this.transport)) throw new ConfigError('denomination-mismatch');

    this.configValue = config;
    if (config.feeCollector !== null) {
      this.publish([
        {
          type: 'FeeScheduleApplied',
          collector: config.feeCollector,
          upfrontBips: config.upfrontFeeBips,
          payoutBips: config.payoutFeeBips,
        },
      ]);
    }
  }

  get config(): CampaignConfig {
    if (!this.configValue) throw new StateError('not-initialized');
    return this.configValue;
  }

  get state(): CampaignState {
    return this.stateValue;
  }

  get processed(): boolean {
    return this.processedFlag;
  }

  get depositTotal(): bigint {
    return this.shares.totalSupply;
  }

  get yieldTotal(): bigint {
    return this.yields.yieldTotal;
  }

  get totalWithdrawn(): bigint {
    return this.yields.totalWithdrawn;
  }

  get feesCollected(): FeesCollected {
    return { ...this.fees };
  }

  onEvent(listener: CampaignListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- contributions ---

  async contribute(account: AccountId, amount: bigint): Promise<bigint> {
    const config = this.config;
    assertAccount(account);
    if (amount <= 0n) throw new BoundsError('amount-must-be-positive');
    this.assertContributionAllowed();
    if (this.depositTotal + amount > config.goalMax) throw new BoundsError('goal-max-exceeded');

    const topOff = isTopOff(this.view());
    if (!topOff && this.shares.balanceOf(account) + amount < config.contributionMin) {
      throw new BoundsError('below-contribution-min');
    }

    const before = await this.callTransport(() => this.transport.holdings());
    const reported = await this.callTransport(() => this.transport.transferIn(account, amount));
    const received = (await this.callTransport(() => this.transport.holdings())) - before;

    if (received <= 0n || received > amount || received !== reported) {
      if (received > 0n) await this.returnContribution(account, received);
      throw new TransportError('transport-short-amount');
    }

    try {
      this.assertContributionAllowed();
      if (this.depositTotal + received > config.goalMax) throw new BoundsError('goal-max-exceeded');
      const newBalance = this.shares.balanceOf(account) + received;
      if (newBalance > config.contributionMax) throw new BoundsError('above-contribution-max');
      if (newBalance < config.contributionMin && !topOff) throw new BoundsError('below-contribution-min');
    } catch (err) {
      await this.returnContribution(account, received);
      throw err;
    }

    this.shares.mint(account, received);
    this.publish([{ type: 'ContributionAccepted', account, amount: received }]);
    return received;
  }

  contributionRangeFor(account: AccountId): ContributionRange {
    return contributionRangeFor(this.view(), this.shares.balanceOf(account));
  }

  // --- resolution ---

  /** Pays the pool, less the upfront fee, to the recipient. Returns the recipient's amount. */
  async settle(): Promise<bigint> {
    const config = this.config;
    this.assertFunding();
    const view = this.view();
    if (!isSettlementAllowed(view)) {
      if (hasEnded(view)) throw new StateError('goal-min-not-met');
      throw new WindowError('settlement-not-allowed');
    }

    const pool = this.depositTotal;
    const { fee, legs } = splitSettlement(config, pool);

    this.stateValue = 'funded';
    this.processedFlag = true;
    this.fees.upfront += fee;
    try {
      await this.callTransport(() => this.transport.payout(legs));
    } catch (err) {
      this.stateValue = 'funding';
      this.processedFlag = false;
      this.fees.upfront -= fee;
      throw err;
    }

    const events: CampaignEvent[] = [{ type: 'Settled', target: config.recipient, amount: pool - fee }];
    if (fee > 0n && config.feeCollector !== null) {
      events.push({ type: 'FeeTransferred', collector: config.feeCollector, amount: fee, kind: 'upfront' });
    }
    this.publish(events);
    return pool - fee;
  }

  /** Marks the campaign failed; funds stay in the vault for depositors to withdraw. */
  releaseFailed(): void {
    this.assertInitialized();
    this.assertFunding();
    const view = this.view();
    if (!hasEnded(view)) throw new WindowError('campaign-not-ended');
    if (!isFailureAllowed(view)) throw new StateError('goal-min-met');

    this.stateValue = 'failed';
    this.processedFlag = true;
    this.publish([{ type: 'Failed' }]);
  }

  // --- yield ---

  async depositYield(from: AccountId, amount: bigint): Promise<bigint> {
    this.assertInitialized();
    assertAccount(from);
    this.assertFunded();
    if (amount <= 0n) throw new BoundsError('amount-must-be-positive');

    const before = await this.callTransport(() => this.transport.holdings());
    await this.callTransport(() => this.transport.transferIn(from, amount));
    const received = (await this.callTransport(() => this.transport.holdings())) - before;
    if (received <= 0n) throw new TransportError('transport-short-amount');

    this.yields.recordDeposit(received);
    this.publish([{ type: 'YieldDeposited', amount: received }]);
    return received;
  }

  /** Credits value that reached the vault without going through {@link depositYield}. */
  async syncYield(): Promise<bigint> {
    this.assertInitialized();
    this.assertFunded();
    const held = await this.callTransport(() => this.transport.holdings());
    const surplus = held - this.yields.outstanding();
    if (surplus <= 0n) return 0n;

    this.yields.recordDeposit(surplus);
    this.publish([{ type: 'YieldDeposited', amount: surplus }]);
    return surplus;
  }

  yieldBalanceOf(account: AccountId): bigint {
    return this.yields.balanceOf(account, this.shares.balanceOf(account), this.depositTotal);
  }

  /**
   * Refunds the whole stake after a failure, or pays the accrued yield (less
   * the payout fee) once funded. Returns what the account received.
   */
  async withdraw(account: AccountId): Promise<bigint> {
    this.assertInitialized();
    assertAccount(account);
    if (this.stateValue === 'failed') return this.refund(account);
    if (this.stateValue === 'funded') return this.payYield(account);
    throw new StateError('withdrawals-not-allowed');
  }

  private async refund(account: AccountId): Promise<bigint> {
    const amount = this.shares.balanceOf(account);
    if (amount === 0n) throw new BalanceError('no-balance');

    this.shares.burn(account, amount);
    try {
      await this.callTransport(() => this.transport.transferOut(account, amount));
    } catch (err) {
      this.shares.mint(account, amount);
      throw err;
    }

    this.publish([{ type: 'Withdrawn', account, amount }]);
    return amount;
  }

  private async payYield(account: AccountId): Promise<bigint> {
    const config = this.config;
    const due = this.yieldBalanceOf(account);
    if (due === 0n) throw new BalanceError('no-balance');

    const { fee, legs } = splitPayout(config, account, due);
    this.yields.recordWithdrawal(account, due);
    this.fees.payout += fee;
    try {
      await this.callTransport(() => this.transport.payout(legs));
    } catch (err) {
      this.yields.revertWithdrawal(account, due);
      this.fees.payout -= fee;
      throw err;
    }

    const events: CampaignEvent[] = [{ type: 'Withdrawn', account, amount: due - fee }];
    if (fee > 0n && config.feeCollector !== null) {
      events.push({ type: 'FeeTransferred', collector: config.feeCollector, amount: fee, kind: 'payout' });
    }
    this.publish(events);
    return due - fee;
  }

  // --- shares ---

  transfer(from: AccountId, to: AccountId, amount: bigint): void {
    this.assertInitialized();
    assertAccount(from);
    assertAccount(to);
    if (this.stateValue === 'funding') throw new StateError('transfers-not-allowed');
    if (amount < 0n) throw new BalanceError('amount-invalid');

    const fromBalanceBefore = this.shares.balanceOf(from);
    if (fromBalanceBefore < amount) throw new BalanceError('insufficient-balance');

    this.shares.move(from, to, amount);
    this.yields.rebalanceOnTransfer(from, to, amount, fromBalanceBefore);
    this.publish([{ type: 'ShareTransfer', from, to, amount }]);
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): void {
    this.assertInitialized();
    assertAccount(owner);
    assertAccount(spender);
    if (amount < 0n) throw new BalanceError('amount-invalid');
    this.shares.approve(owner, spender, amount);
    this.publish([{ type: 'Approval', owner, spender, amount }]);
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.shares.allowance(owner, spender);
  }

  transferFrom(spender: AccountId, from: AccountId, to: AccountId, amount: bigint): void {
    assertAccount(spender);
    if (this.shares.allowance(from, spender) < amount) throw new BalanceError('insufficient-allowance');
    this.transfer(from, to, amount);
    this.shares.spendAllowance(from, spender, amount);
  }

  // --- reads ---

  sharesOf(account: AccountId): bigint {
    return this.shares.balanceOf(account);
  }

  withdrawnOf(account: AccountId): bigint {
    return this.yields.withdrawnOf(account);
  }

  /** Whether `account` still holds a non-zero claim on this campaign. */
  hasContribution(account: AccountId): boolean {
    return this.shares.balanceOf(account) > 0n;
  }

  accounts(): AccountId[] {
    return Array.from(new Set([...this.shares.accounts(), ...this.yields.accounts()]));
  }

  accountView(account: AccountId): AccountView {
    return {
      account,
      shares: this.sharesOf(account),
      withdrawn: this.withdrawnOf(account),
      yieldBalance: this.yieldBalanceOf(account),
      hasContribution: this.hasContribution(account),
      range: this.contributionRangeFor(account),
    };
  }

  status(): CampaignStatus {
    const view = this.view();
    return {
      state: this.stateValue,
      processed: this.processedFlag,
      depositTotal: this.depositTotal,
      yieldTotal: this.yieldTotal,
      totalWithdrawn: this.totalWithdrawn,
      feesCollected: this.feesCollected,
      isContributionAllowed: isContributionAllowed(view),
      isGoalMinMet: isGoalMinMet(view),
      isGoalMaxMet: isGoalMaxMet(view),
      isSettlementAllowed: isSettlementAllowed(view),
      isFailureAllowed: isFailureAllowed(view),
    };
  }

  toSnapshot(): CampaignSnapshot {
    return {
      config: serializeCampaignConfig(this.config),
      state: this.stateValue,
      processed: this.processedFlag,
      shares: this.shares.snapshot(),
      yield: this.yields.snapshot(),
      feesCollected: {
        upfront: this.fees.upfront.toString(),
        payout: this.fees.payout.toString(),
      },
    };
  }

  static restore(snapshot: CampaignSnapshot, transport: Transport, clock: Clock): Campaign {
    const campaign = new Campaign(transport, clock);
    const config = parseCampaignConfig(snapshot.config);
    if (!sameDenomination(config, transport)) throw new ConfigError('denomination-mismatch');
    campaign.configValue = config;
    campaign.resetTo(snapshot);
    return campaign;
  }

  /**
   * Puts the ledger back to an earlier snapshot of this same campaign. The
   * config is not touched; nothing is published.
   */
  resetTo(snapshot: CampaignSnapshot): void {
    this.stateValue = snapshot.state;
    this.processedFlag = snapshot.processed;
    this.shares = ShareLedger.restore(snapshot.shares);
    this.yields = YieldLedger.restore(snapshot.yield);
    this.fees = {
      upfront: BigInt(snapshot.feesCollected.upfront),
      payout: BigInt(snapshot.feesCollected.payout),
    };
  }

  // --- internals ---

  private view(): LifecycleView {
    return {
      config: this.config,
      state: this.stateValue,
      depositTotal: this.depositTotal,
      now: this.clock.now(),
    };
  }

  private assertInitialized(): void {
    if (!this.configValue) throw new StateError('not-initialized');
  }

  private assertFunding(): void {
    if (this.stateValue !== 'funding') throw new StateError('already-processed');
  }

  private assertFunded(): void {
    if (this.stateValue !== 'funded') throw new StateError('yield-not-allowed');
  }

  private assertContributionAllowed(): void {
    if (!isContributionAllowed(this.view())) throw new WindowError('contribution-window-closed');
  }

  private async returnContribution(account: AccountId, amount: bigint): Promise<void> {
    try {
      await this.transport.transferOut(account, amount);
    } catch (err) {
      throw new TransportError('contribution-return-failed', { cause: err });
    }
  }

  /** Anything the transport throws surfaces as a TransportError. */
  private async callTransport<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError('transport-failed', { cause: err });
    }
  }

  private publish(events: CampaignEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) listener(event);
    }
  }
}

function assertAccount(account: AccountId): void {
  if (typeof account !== 'string' || !account.trim()) throw new BalanceError('invalid-account');
}

function sameDenomination(config: CampaignConfig, transport: Transport): boolean {
  const expected = config.denomination;
  const actual = transport.denomination;
  if (expected.kind === 'native') return actual.kind === 'native';
  return actual.kind === 'token' && actual.token === expected.token;
}
