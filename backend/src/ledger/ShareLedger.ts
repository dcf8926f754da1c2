import { BalanceError } from '../campaign/errors';
import type { AccountId } from '../campaign/types';

export interface ShareLedgerSnapshot {
  balances: Record<AccountId, string>;
  allowances: Record<AccountId, Record<AccountId, string>>;
}

/**
 * Share balances and their total supply. Shares are minted 1:1 with net
 * contributed units, so the supply is also the campaign's deposit total.
 */
export class ShareLedger {
  private balances = new Map<AccountId, bigint>();
  private allowances = new Map<AccountId, Map<AccountId, bigint>>();
  private supply = 0n;

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? 0n;
  }

  accounts(): AccountId[] {
    return Array.from(this.balances.keys());
  }

  mint(account: AccountId, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
    this.supply += amount;
  }

  burn(account: AccountId, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) throw new BalanceError('insufficient-balance');
    this.balances.set(account, balance - amount);
    this.supply -= amount;
  }

  move(from: AccountId, to: AccountId, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) throw new BalanceError('insufficient-balance');
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): void {
    const bySpender = this.allowances.get(owner) ?? new Map<AccountId, bigint>();
    bySpender.set(spender, amount);
    this.allowances.set(owner, bySpender);
  }

  spendAllowance(owner: AccountId, spender: AccountId, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current < amount) throw new BalanceError('insufficient-allowance');
    this.approve(owner, spender, current - amount);
  }

  snapshot(): ShareLedgerSnapshot {
    return {
      balances: Object.fromEntries(
        Array.from(this.balances, ([account, amount]) => [account, amount.toString()]),
      ),
      // fromEntries defines own keys, so an account named `__proto__` survives
      allowances: Object.fromEntries(
        Array.from(this.allowances, ([owner, bySpender]) => [
          owner,
          Object.fromEntries(Array.from(bySpender, ([spender, amount]) => [spender, amount.toString()])),
        ]),
      ),
    };
  }

  static restore(snapshot: ShareLedgerSnapshot): ShareLedger {
    const ledger = new ShareLedger();
    for (const [account, amount] of Object.entries(snapshot.balances)) {
      ledger.mint(account, BigInt(amount));
    }
    for (const [owner, bySpender] of Object.entries(snapshot.allowances)) {
      for (const [spender, amount] of Object.entries(bySpender)) {
        ledger.approve(owner, spender, BigInt(amount));
      }
    }
    return ledger;
  }
}
