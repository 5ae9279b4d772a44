/**
 * @stakeflow/ledger — Account book.
 *
 * Holds every account record and the two aggregate totals. Accounts are
 * created implicitly on first write and never removed; balances may
 * return to zero.
 *
 * Rules:
 * - totalManagedAssets == Σ assetBalance, totalShares == Σ shareBalance
 * - No balance ever goes negative
 * - Callers validate first; the book only asserts
 */

import type { Address, Amount, Rollback, Transactional } from "@stakeflow/types";
import type {
  AccountState,
  LedgerSnapshot,
  LedgerTotals,
  ReconciliationResult,
} from "./types.js";
import { LedgerError } from "./types.js";

type MutableAccount = { -readonly [K in keyof AccountState]: AccountState[K] };

function emptyAccount(address: Address): AccountState {
  return {
    address,
    assetBalance: 0n,
    shareBalance: 0n,
    rewardAccrued: 0n,
    rewardPerShareCheckpoint: 0n,
  };
}

/**
 * Mutable store of account records.
 */
export class AccountBook implements Transactional {
  private _accounts: Map<Address, MutableAccount> = new Map();
  private _totalManagedAssets: Amount = 0n;
  private _totalShares: Amount = 0n;

  // ─── Reads ───────────────────────────────────────────────────────────

  /**
   * Get an account's state. Unknown accounts read as all-zero.
   */
  get(address: Address): AccountState {
    const account = this._accounts.get(address);
    return account !== undefined ? { ...account } : emptyAccount(address);
  }

  has(address: Address): boolean {
    return this._accounts.has(address);
  }

  getAll(): readonly AccountState[] {
    return [...this._accounts.values()].map((a) => ({ ...a }));
  }

  get count(): number {
    return this._accounts.size;
  }

  get totals(): LedgerTotals {
    return {
      totalManagedAssets: this._totalManagedAssets,
      totalShares: this._totalShares,
    };
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Add principal and shares to an account and to the totals.
   */
  credit(address: Address, assets: Amount, shares: Amount): void {
    const account = this.touch(address);
    account.assetBalance += assets;
    account.shareBalance += shares;
    this._totalManagedAssets += assets;
    this._totalShares += shares;
  }

  /**
   * Remove principal and shares from an account and from the totals.
   */
  debit(address: Address, assets: Amount, shares: Amount): void {
    const account = this.touch(address);
    if (account.assetBalance < assets || account.shareBalance < shares) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${address}" holds ${account.assetBalance.toString()} assets / ${account.shareBalance.toString()} shares, cannot remove ${assets.toString()} / ${shares.toString()}`,
      );
    }
    account.assetBalance -= assets;
    account.shareBalance -= shares;
    this._totalManagedAssets -= assets;
    this._totalShares -= shares;
  }

  /**
   * Store an account's reward checkpoint.
   */
  setRewardState(address: Address, rewardAccrued: Amount, checkpoint: bigint): void {
    const account = this.touch(address);
    account.rewardAccrued = rewardAccrued;
    account.rewardPerShareCheckpoint = checkpoint;
  }

  // ─── Integrity ───────────────────────────────────────────────────────

  /**
   * Recompute both totals from the account records.
   */
  reconcile(): ReconciliationResult {
    let assets = 0n;
    let shares = 0n;
    for (const account of this._accounts.values()) {
      assets += account.assetBalance;
      shares += account.shareBalance;
    }

    const computed: LedgerTotals = { totalManagedAssets: assets, totalShares: shares };
    const recorded = this.totals;

    return {
      balanced:
        computed.totalManagedAssets === recorded.totalManagedAssets &&
        computed.totalShares === recorded.totalShares,
      recorded,
      computed,
      accountCount: this._accounts.size,
    };
  }

  // ─── Snapshot & Rollback ─────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      accounts: this.getAll(),
      totals: this.totals,
    };
  }

  /**
   * Replace the book's contents with a snapshot.
   */
  restore(snapshot: LedgerSnapshot): void {
    this._accounts = new Map(snapshot.accounts.map((a) => [a.address, { ...a }]));
    this._totalManagedAssets = snapshot.totals.totalManagedAssets;
    this._totalShares = snapshot.totals.totalShares;
  }

  static fromSnapshot(snapshot: LedgerSnapshot): AccountBook {
    const book = new AccountBook();
    book.restore(snapshot);
    return book;
  }

  begin(): Rollback {
    const saved = this.snapshot();
    return { rollback: () => this.restore(saved) };
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private touch(address: Address): MutableAccount {
    let account = this._accounts.get(address);
    if (account === undefined) {
      account = { ...emptyAccount(address) };
      this._accounts.set(address, account);
    }
    return account;
  }
}
