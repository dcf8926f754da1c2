import type { AccountId, Denomination } from '../campaign/types';
import { assetKeyFor, type ValueBook } from './ValueBook';
import type { PayoutLeg, Transport } from './types';

abstract class BookTransport implements Transport {
  abstract readonly denomination: Denomination;

  constructor(
    protected readonly book: ValueBook,
    /** Holder id of the campaign's own vault in the book. */
    readonly vault: AccountId,
  ) {}

  protected get asset(): string {
    return assetKeyFor(this.denomination);
  }

  async holdings(): Promise<bigint> {
    return this.book.balanceOf(this.asset, this.vault);
  }

  abstract transferIn(from: AccountId, amount: bigint): Promise<bigint>;

  async transferOut(to: AccountId, amount: bigint): Promise<void> {
    this.book.transfer(this.asset, this.vault, to, amount);
  }

  async payout(legs: PayoutLeg[]): Promise<void> {
    this.book.transferBatch(this.asset, this.vault, legs);
  }
}

/** Value attached to the call itself; no allowance involved. */
export class NativeTransport extends BookTransport {
  readonly denomination: Denomination = { kind: 'native' };

  async transferIn(from: AccountId, amount: bigint): Promise<bigint> {
    return this.book.transfer(this.asset, from, this.vault, amount);
  }
}

/** External fungible token pulled through an allowance granted to the vault. */
export class TokenTransport extends BookTransport {
  readonly denomination: Denomination;

  constructor(book: ValueBook, vault: AccountId, token: string) {
    super(book, vault);
    this.denomination = { kind: 'token', token };
  }

  async transferIn(from: AccountId, amount: bigint): Promise<bigint> {
    return this.book.transferFrom(this.asset, this.vault, from, this.vault, amount);
  }
}

export function createTransport(denomination: Denomination, book: ValueBook, vault: AccountId): Transport {
  switch (denomination.kind) {
    case 'native':
      return new NativeTransport(book, vault);
    case 'token':
      return new TokenTransport(book, vault, denomination.token);
  }
}
