import type { AccountId, Denomination } from '../campaign/types';

export interface PayoutLeg {
  to: AccountId;
  amount: bigint;
}

/**
 * Moves the campaign's unit in and out of its vault. A campaign is the only
 * caller; implementations may hand control to untrusted code while a call is
 * in flight.
 */
export interface Transport {
  readonly denomination: Denomination;
  /** Units currently held by the campaign vault. */
  holdings(): Promise<bigint>;
  /** Pulls `amount` from `from`; resolves with the units the vault actually received. */
  transferIn(from: AccountId, amount: bigint): Promise<bigint>;
  transferOut(to: AccountId, amount: bigint): Promise<void>;
  /** Pays every leg or none of them. */
  payout(legs: PayoutLeg[]): Promise<void>;
}
