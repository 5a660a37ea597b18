/**
 * Rebase-safe share wrapper.
 *
 * Holds an underlying asset in `account` and books wrapper shares per
 * holder. Shares are minted and burned at the current balance ratio, so a
 * rebase of the underlying moves every holder's claim proportionally.
 *
 *   deposit:  shares = amount × totalShares / balance   (1:1 when empty)
 *   withdraw: amount = shares × balance / totalShares
 */

import { LedgerError, type AssetLedger } from "./types.js";

export class ShareWrapper {
  private readonly shares = new Map<string, bigint>();
  private _totalShares = 0n;

  constructor(
    private readonly ledger: AssetLedger,
    readonly underlying: string,
    readonly account: string,
  ) {}

  get totalShares(): bigint {
    return this._totalShares;
  }

  sharesOf(holder: string): bigint {
    return this.shares.get(holder) ?? 0n;
  }

  /** Wrap `amount` of the underlying. Returns shares minted. */
  async deposit(holder: string, amount: bigint): Promise<bigint> {
    if (amount <= 0n) throw new LedgerError("invalid_amount", `deposit of ${amount}`);

    const balance = await this.ledger.balanceOf(this.underlying, this.account);
    const minted =
      this._totalShares === 0n || balance === 0n
        ? amount
        : (amount * this._totalShares) / balance;
    if (minted === 0n) {
      throw new LedgerError("invalid_amount", `deposit of ${amount} mints no shares`);
    }

    await this.ledger.transfer(this.underlying, holder, this.account, amount);
    this.shares.set(holder, this.sharesOf(holder) + minted);
    this._totalShares += minted;
    return minted;
  }

  /** Burn `shares` and return the underlying they are worth. */
  async withdraw(holder: string, shares: bigint): Promise<bigint> {
    if (shares <= 0n) throw new LedgerError("invalid_amount", `withdraw of ${shares} shares`);
    const held = this.sharesOf(holder);
    if (held < shares) {
      throw new LedgerError("insufficient_balance", `${holder} holds ${held} shares, burns ${shares}`);
    }

    const balance = await this.ledger.balanceOf(this.underlying, this.account);
    const amount = (shares * balance) / this._totalShares;

    await this.ledger.transfer(this.underlying, this.account, holder, amount);
    if (held === shares) this.shares.delete(holder);
    else this.shares.set(holder, held - shares);
    this._totalShares -= shares;
    return amount;
  }
}
