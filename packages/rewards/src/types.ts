/**
 * @stakeflow/rewards domain types.
 *
 * Rewards stream at a constant rate over a funded window (the epoch).
 * A global reward-per-share accumulator attributes the stream to
 * shareholders without iterating accounts:
 * - Epochs: idle or streaming, re-funded by notifyReward
 * - Accumulator: rewardPerShareStored, advanced at each checkpoint
 * - Accounts: rewardAccrued frozen at each checkpoint, zeroed by a claim
 */

import type { Address, Amount, Timestamp } from "@stakeflow/types";

// =============================================================================
// Epoch
// =============================================================================

/** Seven days in seconds. */
export const DEFAULT_REWARDS_DURATION = 604_800n;

export type EpochPhase = "idle" | "streaming";

export interface EpochState {
  /** Reward units streamed per second */
  readonly rewardRate: bigint;
  /** End of the funded window */
  readonly periodFinish: Timestamp;
  /** Length of every new window */
  readonly rewardsDuration: bigint;
  /** Time of the last accumulator checkpoint */
  readonly lastUpdateTime: Timestamp;
}

/**
 * Outcome of funding a new window.
 */
export interface NotifyResult {
  readonly amount: Amount;
  /** Undistributed reward carried over from the window that was cut short */
  readonly leftover: Amount;
  readonly rewardRate: bigint;
  readonly periodFinish: Timestamp;
  /** Phase the epoch was in when the top-up arrived */
  readonly previousPhase: EpochPhase;
}

// =============================================================================
// Accumulator
// =============================================================================

export interface AccumulatorState {
  readonly rewardPerShareStored: bigint;
  readonly totalRewardsDistributed: Amount;
}

export interface ClaimRecord {
  readonly account: Address;
  readonly reward: Amount;
  readonly totalRewardsDistributed: Amount;
}

// =============================================================================
// Error
// =============================================================================

export type RewardErrorCode =
  | "NOTHING_TO_CLAIM"
  | "REWARD_RATE_TOO_HIGH"
  | "EPOCH_ACTIVE"
  | "INVALID_DURATION";

export class RewardError extends Error {
  public readonly code: RewardErrorCode;
  constructor(code: RewardErrorCode, message: string) {
    super(message);
    this.name = "RewardError";
    this.code = code;
  }
}
