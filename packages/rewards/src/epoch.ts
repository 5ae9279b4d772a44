/**
 * Epoch Controller — reward rate and its funded window.
 *
 * Two phases:
 * - idle: now >= periodFinish, nothing streams
 * - streaming: now < periodFinish, rewardRate applies
 *
 * Every top-up opens a fresh window of `rewardsDuration` seconds from now.
 * A top-up during streaming folds the unspent remainder of the current
 * window into the new rate. Rates are floor-divided; the truncated
 * remainder is never distributed.
 *
 * Authorization is the caller's concern; this class only does the maths.
 */

import { assertAmount, minOf } from "@stakeflow/ledger";
import type { Amount, Clock, Rollback, Timestamp, Transactional } from "@stakeflow/types";
import type { EpochPhase, EpochState, NotifyResult } from "./types.js";
import { DEFAULT_REWARDS_DURATION, RewardError } from "./types.js";

// =============================================================================
// Epoch Controller
// =============================================================================

export class EpochController implements Transactional {
  private readonly clock: Clock;
  private rewardRate = 0n;
  private periodFinish: Timestamp = 0n;
  private rewardsDuration: bigint;
  private lastUpdateTime: Timestamp = 0n;

  constructor(clock: Clock, rewardsDuration: bigint = DEFAULT_REWARDS_DURATION) {
    assertDuration(rewardsDuration);
    this.clock = clock;
    this.rewardsDuration = rewardsDuration;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  now(): Timestamp {
    return this.clock.now();
  }

  phase(): EpochPhase {
    return this.now() < this.periodFinish ? "streaming" : "idle";
  }

  /**
   * min(now, periodFinish): accrual never runs past the funded window.
   */
  currentApplicableTime(): Timestamp {
    return minOf(this.now(), this.periodFinish);
  }

  /**
   * Total reward a full window at the current rate distributes.
   */
  rewardForDuration(): Amount {
    return this.rewardRate * this.rewardsDuration;
  }

  state(): EpochState {
    return {
      rewardRate: this.rewardRate,
      periodFinish: this.periodFinish,
      rewardsDuration: this.rewardsDuration,
      lastUpdateTime: this.lastUpdateTime,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record the time of an accumulator checkpoint.
   */
  markUpdated(time: Timestamp): void {
    this.lastUpdateTime = time;
  }

  /**
   * Fund a new window with `amount` reward units.
   *
   * @param custodyBalance - Reward asset the vault holds right now
   * @throws RewardError REWARD_RATE_TOO_HIGH when a full window at the new
   *   rate would pay out more than `custodyBalance`
   */
  notifyReward(amount: Amount, custodyBalance: Amount): NotifyResult {
    assertAmount(amount, "amount");

    const now = this.now();
    const previousPhase: EpochPhase = now < this.periodFinish ? "streaming" : "idle";

    let leftover = 0n;
    let rate: bigint;
    if (previousPhase === "idle") {
      rate = amount / this.rewardsDuration;
    } else {
      leftover = (this.periodFinish - now) * this.rewardRate;
      rate = (amount + leftover) / this.rewardsDuration;
    }

    if (rate * this.rewardsDuration > custodyBalance) {
      throw new RewardError(
        "REWARD_RATE_TOO_HIGH",
        `Reward rate ${rate.toString()} over ${this.rewardsDuration.toString()}s exceeds the ${custodyBalance.toString()} reward units held`,
      );
    }

    this.rewardRate = rate;
    this.lastUpdateTime = now;
    this.periodFinish = now + this.rewardsDuration;

    return {
      amount,
      leftover,
      rewardRate: rate,
      periodFinish: this.periodFinish,
      previousPhase,
    };
  }

  /**
   * Change the length of future windows. Only allowed once the current
   * window is over.
   */
  setRewardsDuration(rewardsDuration: bigint): void {
    assertDuration(rewardsDuration);

    const now = this.now();
    if (now <= this.periodFinish) {
      throw new RewardError(
        "EPOCH_ACTIVE",
        `Reward window runs until ${this.periodFinish.toString()}, now is ${now.toString()}`,
      );
    }

    this.rewardsDuration = rewardsDuration;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rollback
  // ───────────────────────────────────────────────────────────────────────

  restore(state: EpochState): void {
    this.rewardRate = state.rewardRate;
    this.periodFinish = state.periodFinish;
    this.rewardsDuration = state.rewardsDuration;
    this.lastUpdateTime = state.lastUpdateTime;
  }

  begin(): Rollback {
    const saved = this.state();
    return { rollback: () => this.restore(saved) };
  }
}

function assertDuration(rewardsDuration: bigint): void {
  if (rewardsDuration <= 0n) {
    throw new RewardError(
      "INVALID_DURATION",
      `Rewards duration must be positive, got ${rewardsDuration.toString()}`,
    );
  }
}
