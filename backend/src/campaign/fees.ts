import { BIPS_DENOMINATOR } from '../config/constants';
import type { PayoutLeg } from '../transport/types';
import type { AccountId, CampaignConfig } from './types';

export function feeFor(amount: bigint, bips: number): bigint {
  return (amount * BigInt(bips)) / BIPS_DENOMINATOR;
}

export interface FeeSplit {
  fee: bigint;
  legs: PayoutLeg[];
}

/** Splits `amount` between `to` and the collector; the fee leg is dropped when zero. */
function split(config: CampaignConfig, to: AccountId, amount: bigint, bips: number): FeeSplit {
  const fee = config.feeCollector === null ? 0n : feeFor(amount, bips);
  const legs: PayoutLeg[] = [{ to, amount: amount - fee }];
  if (fee > 0n && config.feeCollector !== null) {
    legs.push({ to: config.feeCollector, amount: fee });
  }
  return { fee, legs };
}

export function splitSettlement(config: CampaignConfig, pool: bigint): FeeSplit {
  return split(config, config.recipient, pool, config.upfrontFeeBips);
}

export function splitPayout(config: CampaignConfig, account: AccountId, due: bigint): FeeSplit {
  return split(config, account, due, config.payoutFeeBips);
}
