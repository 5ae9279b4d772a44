/**
 * @stakeflow/ledger — Types for the vault ledger.
 *
 * Rules:
 * - Every view handed out is readonly; the book mutates its own records only
 * - Fail-closed: invalid requests throw before any balance changes
 */

import type { Address, Amount } from "@stakeflow/types";

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Per-account accounting state.
 *
 * `rewardAccrued` and `rewardPerShareCheckpoint` are owned by the reward
 * accumulator; the ledger stores them beside the balances so that an
 * account is one record.
 */
export interface AccountState {
  readonly address: Address;
  /** Principal units deposited */
  readonly assetBalance: Amount;
  /** Shares issued against the principal */
  readonly shareBalance: Amount;
  /** Pending, claimable reward units */
  readonly rewardAccrued: Amount;
  /** Accumulator value last observed by this account */
  readonly rewardPerShareCheckpoint: bigint;
}

/**
 * Aggregate totals. Both are strict sums over all accounts.
 */
export interface LedgerTotals {
  readonly totalManagedAssets: Amount;
  readonly totalShares: Amount;
}

/**
 * Result of recomputing the totals from the per-account records.
 */
export interface ReconciliationResult {
  readonly balanced: boolean;
  readonly recorded: LedgerTotals;
  readonly computed: LedgerTotals;
  readonly accountCount: number;
}

// ─── Records ─────────────────────────────────────────────────────────────

export interface DepositRecord {
  readonly caller: Address;
  readonly receiver: Address;
  readonly assets: Amount;
  readonly shares: Amount;
  readonly totals: LedgerTotals;
}

export interface WithdrawalRecord {
  readonly caller: Address;
  readonly receiver: Address;
  readonly owner: Address;
  readonly assets: Amount;
  readonly shares: Amount;
  readonly totals: LedgerTotals;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable copy of the book, used for rollback and persistence.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly AccountState[];
  readonly totals: LedgerTotals;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ZERO_AMOUNT"
  | "RECEIVER_MISMATCH"
  | "NOT_OWNER"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "SHARES_NON_TRANSFERABLE";

/**
 * Structured error from the ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
