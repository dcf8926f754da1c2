export type AccountId = string;

export type Denomination =
  | { kind: 'native' }
  | { kind: 'token'; token: string };

export type CampaignState = 'funding' | 'funded' | 'failed';

export interface CampaignConfig {
  recipient: AccountId;
  feeCollector: AccountId | null;
  upfrontFeeBips: number;
  payoutFeeBips: number;
  goalMin: bigint;
  goalMax: bigint;
  contributionMin: bigint;
  contributionMax: bigint;
  /** Unix seconds, inclusive. */
  startsAt: number;
  /** Unix seconds, exclusive. */
  endsAt: number;
  denomination: Denomination;
}

export interface ContributionRange {
  min: bigint;
  max: bigint;
}

export interface FeesCollected {
  upfront: bigint;
  payout: bigint;
}

export type FeeKind = 'upfront' | 'payout';

export type CampaignEvent =
  | { type: 'ContributionAccepted'; account: AccountId; amount: bigint }
  | { type: 'Settled'; target: AccountId; amount: bigint }
  | { type: 'Failed' }
  | { type: 'Withdrawn'; account: AccountId; amount: bigint }
  | { type: 'ShareTransfer'; from: AccountId; to: AccountId; amount: bigint }
  | { type: 'Approval'; owner: AccountId; spender: AccountId; amount: bigint }
  | { type: 'YieldDeposited'; amount: bigint }
  | { type: 'FeeTransferred'; collector: AccountId; amount: bigint; kind: FeeKind }
  | { type: 'FeeScheduleApplied'; collector: AccountId; upfrontBips: number; payoutBips: number };

export type CampaignEventType = CampaignEvent['type'];

export interface AccountView {
  account: AccountId;
  shares: bigint;
  withdrawn: bigint;
  yieldBalance: bigint;
  hasContribution: boolean;
  range: ContributionRange;
}

export interface CampaignStatus {
  state: CampaignState;
  processed: boolean;
  depositTotal: bigint;
  yieldTotal: bigint;
  totalWithdrawn: bigint;
  feesCollected: FeesCollected;
  isContributionAllowed: boolean;
  isGoalMinMet: boolean;
  isGoalMaxMet: boolean;
  isSettlementAllowed: boolean;
  isFailureAllowed: boolean;
}
