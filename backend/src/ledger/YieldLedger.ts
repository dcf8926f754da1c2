import type { AccountId } from '../campaign/types';

export interface YieldLedgerSnapshot {
  yieldTotal: string;
  withdrawn: Record<AccountId, string>;
}

/**
 * Lazy pro-rata yield accounting. Nothing is credited per account when yield
 * arrives; an account's entitlement is always derived from its current share
 * balance, and `withdrawn` records how much of that entitlement it has
 * already drawn.
 *
 * Because entitlement follows the current balance while `withdrawn` is an
 * absolute counter, every share transfer must carry a matching slice of the
 * sender's withdrawal history to the receiver (see {@link rebalanceOnTransfer}).
 */
export class YieldLedger {
  private withdrawnBy = new Map<AccountId, bigint>();
  private total = 0n;
  private withdrawnTotal = 0n;

  get yieldTotal(): bigint {
    return this.total;
  }

  get totalWithdrawn(): bigint {
    return this.withdrawnTotal;
  }

  withdrawnOf(account: AccountId): bigint {
    return this.withdrawnBy.get(account) ?? 0n;
  }

  accounts(): AccountId[] {
    return Array.from(this.withdrawnBy.keys());
  }

  recordDeposit(amount: bigint): void {
    this.total += amount;
  }

  /** Yield still owed to all accounts together. */
  outstanding(): bigint {
    return this.total - this.withdrawnTotal;
  }

  entitlementOf(shares: bigint, supply: bigint): bigint {
    if (supply === 0n) return 0n;
    return (shares * this.total) / supply;
  }

  /**
   * Floor rounding during transfers can leave an account up to one unit
   * ahead of its entitlement; that shows as zero, not as a negative claim.
   */
  balanceOf(account: AccountId, shares: bigint, supply: bigint): bigint {
    const due = this.entitlementOf(shares, supply) - this.withdrawnOf(account);
    return due > 0n ? due : 0n;
  }

  recordWithdrawal(account: AccountId, amount: bigint): void {
    this.withdrawnBy.set(account, this.withdrawnOf(account) + amount);
    this.withdrawnTotal += amount;
  }

  revertWithdrawal(account: AccountId, amount: bigint): void {
    this.withdrawnBy.set(account, this.withdrawnOf(account) - amount);
    this.withdrawnTotal -= amount;
  }

  /**
   * Rescales the sender's withdrawal credit to the shares it keeps and hands
   * the remainder to the receiver, so that a transfer with no yield event in
   * between leaves both claims proportional to the shares they hold.
   * `fromBalanceBefore` is the sender's balance before the move.
   */
  rebalanceOnTransfer(from: AccountId, to: AccountId, amount: bigint, fromBalanceBefore: bigint): bigint {
    const previous = this.withdrawnOf(from);
    if (previous === 0n || amount === 0n || fromBalanceBefore === 0n) return 0n;

    const retained = (previous * (fromBalanceBefore - amount)) / fromBalanceBefore;
    const moved = previous - retained;
    this.withdrawnBy.set(from, retained);
    this.withdrawnBy.set(to, this.withdrawnOf(to) + moved);
    return moved;
  }

  snapshot(): YieldLedgerSnapshot {
    return {
      yieldTotal: this.total.toString(),
      withdrawn: Object.fromEntries(
        Array.from(this.withdrawnBy, ([account, amount]) => [account, amount.toString()]),
      ),
    };
  }

  static restore(snapshot: YieldLedgerSnapshot): YieldLedger {
    const ledger = new YieldLedger();
    ledger.recordDeposit(BigInt(snapshot.yieldTotal));
    for (const [account, amount] of Object.entries(snapshot.withdrawn)) {
      ledger.recordWithdrawal(account, BigInt(amount));
    }
    return ledger;
  }
}
