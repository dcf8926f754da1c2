import { BIPS_DENOMINATOR, MAX_FEE_BIPS } from '../config/constants';
import { TransportError } from '../campaign/errors';
import type { AccountId, Denomination } from '../campaign/types';
import type { PayoutLeg } from './types';

export const NATIVE_ASSET = 'native';

export function assetKeyFor(denomination: Denomination): string {
  return denomination.kind === 'native' ? NATIVE_ASSET : `token:${denomination.token}`;
}

export interface ValueBookSnapshot {
  balances: Array<{ asset: string; holder: AccountId; amount: string }>;
  allowances: Array<{ asset: string; owner: AccountId; spender: AccountId; amount: string }>;
  transferFees: Array<{ asset: string; bips: number }>;
}

/**
 * In-process balances for every asset a campaign can be denominated in.
 * Token assets may charge a fee on transfer (burned from the moved amount)
 * and require an allowance for pulls; the native asset does neither.
 */
export class ValueBook {
  private balances = new Map<string, Map<AccountId, bigint>>();
  private allowances = new Map<string, bigint>();
  private transferFees = new Map<string, number>();

  balanceOf(asset: string, holder: AccountId): bigint {
    return this.balances.get(asset)?.get(holder) ?? 0n;
  }

  /** Creates units out of nothing; the dev faucet and tests use it. */
  credit(asset: string, holder: AccountId, amount: bigint): void {
    if (amount <= 0n) throw new TransportError('amount-must-be-positive');
    this.setBalance(asset, holder, this.balanceOf(asset, holder) + amount);
  }

  setTransferFee(asset: string, bips: number): void {
    if (asset === NATIVE_ASSET) throw new TransportError('native-asset-has-no-fee');
    if (!Number.isInteger(bips) || bips < 0 || bips > MAX_FEE_BIPS) {
      throw new TransportError('transfer-fee-invalid');
    }
    this.transferFees.set(asset, bips);
  }

  transferFeeOf(asset: string): number {
    return this.transferFees.get(asset) ?? 0;
  }

  allowance(asset: string, owner: AccountId, spender: AccountId): bigint {
    return this.allowances.get(allowanceKey(asset, owner, spender)) ?? 0n;
  }

  approve(asset: string, owner: AccountId, spender: AccountId, amount: bigint): void {
    if (asset === NATIVE_ASSET) throw new TransportError('native-asset-has-no-allowance');
    this.allowances.set(allowanceKey(asset, owner, spender), amount);
  }

  /** Returns the amount delivered to `to`, after any transfer fee. */
  transfer(asset: string, from: AccountId, to: AccountId, amount: bigint): bigint {
    if (amount <= 0n) throw new TransportError('amount-must-be-positive');
    const balance = this.balanceOf(asset, from);
    if (balance < amount) throw new TransportError('insufficient-funds');

    const delivered = amount - (amount * BigInt(this.transferFeeOf(asset))) / BIPS_DENOMINATOR;
    this.setBalance(asset, from, balance - amount);
    this.setBalance(asset, to, this.balanceOf(asset, to) + delivered);
    return delivered;
  }

  transferFrom(asset: string, spender: AccountId, from: AccountId, to: AccountId, amount: bigint): bigint {
    const allowed = this.allowance(asset, from, spender);
    if (allowed < amount) throw new TransportError('insufficient-allowance');
    const delivered = this.transfer(asset, from, to, amount);
    this.allowances.set(allowanceKey(asset, from, spender), allowed - amount);
    return delivered;
  }

  /** Either every leg is paid from `from` or nothing moves. */
  transferBatch(asset: string, from: AccountId, legs: PayoutLeg[]): bigint[] {
    const total = legs.reduce((sum, leg) => sum + leg.amount, 0n);
    if (legs.some((leg) => leg.amount <= 0n)) throw new TransportError('amount-must-be-positive');
    if (this.balanceOf(asset, from) < total) throw new TransportError('insufficient-funds');
    return legs.map((leg) => this.transfer(asset, from, leg.to, leg.amount));
  }

  snapshot(): ValueBookSnapshot {
    const balances: ValueBookSnapshot['balances'] = [];
    for (const [asset, holders] of this.balances) {
      for (const [holder, amount] of holders) {
        balances.push({ asset, holder, amount: amount.toString() });
      }
    }
    const allowances: ValueBookSnapshot['allowances'] = [];
    for (const [key, amount] of this.allowances) {
      const [asset, owner, spender] = JSON.parse(key) as [string, string, string];
      allowances.push({ asset, owner, spender, amount: amount.toString() });
    }
    return {
      balances,
      allowances,
      transferFees: Array.from(this.transferFees, ([asset, bips]) => ({ asset, bips })),
    };
  }

  static restore(snapshot: ValueBookSnapshot): ValueBook {
    const book = new ValueBook();
    book.load(snapshot);
    return book;
  }

  /** Replaces every balance, allowance and fee in place; transports keep their reference. */
  load(snapshot: ValueBookSnapshot): void {
    this.balances.clear();
    this.allowances.clear();
    this.transferFees.clear();
    for (const entry of snapshot.balances) {
      this.setBalance(entry.asset, entry.holder, BigInt(entry.amount));
    }
    for (const entry of snapshot.allowances) {
      this.allowances.set(allowanceKey(entry.asset, entry.owner, entry.spender), BigInt(entry.amount));
    }
    for (const entry of snapshot.transferFees) {
      this.transferFees.set(entry.asset, entry.bips);
    }
  }

  private setBalance(asset: string, holder: AccountId, amount: bigint): void {
    const holders = this.balances.get(asset) ?? new Map<AccountId, bigint>();
    holders.set(holder, amount);
    this.balances.set(asset, holders);
  }
}

function allowanceKey(asset: string, owner: AccountId, spender: AccountId): string {
  return JSON.stringify([asset, owner, spender]);
}
