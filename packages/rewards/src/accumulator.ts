/**
 * Reward Accumulator — continuous reward-per-share accrual.
 *
 *   rewardPerShare = stored + (applicableTime - lastUpdateTime) * rate * SCALE / totalShares
 *   earned(a)      = a.rewardAccrued + a.shareBalance * (rewardPerShare - a.checkpoint) / SCALE
 *
 * `checkpoint()` is the only write to the accumulator. It must run before
 * any change to an account's shares, otherwise past accrual is attributed
 * to the new balance.
 *
 * Rules:
 * - rewardPerShareStored never decreases
 * - Nothing accrues while totalShares is zero
 * - rewardAccrued only grows until a claim zeroes it
 */

import { SCALE } from "@stakeflow/ledger";
import type { AccountBook } from "@stakeflow/ledger";
import type {
  Address,
  Amount,
  FungibleAsset,
  Rollback,
  Transactional,
} from "@stakeflow/types";
import type { EpochController } from "./epoch.js";
import type { AccumulatorState, ClaimRecord } from "./types.js";
import { RewardError } from "./types.js";

export interface RewardAccumulatorOptions {
  readonly epoch: EpochController;
  readonly book: AccountBook;
  readonly rewardAsset: FungibleAsset;
  /** Address that holds the reward asset in custody */
  readonly custodian: Address;
}

export class RewardAccumulator implements Transactional {
  readonly rewardAsset: FungibleAsset;
  private readonly epoch: EpochController;
  private readonly book: AccountBook;
  private readonly custodian: Address;
  private rewardPerShareStored = 0n;
  private totalRewardsDistributed: Amount = 0n;

  constructor(options: RewardAccumulatorOptions) {
    this.epoch = options.epoch;
    this.book = options.book;
    this.rewardAsset = options.rewardAsset;
    this.custodian = options.custodian;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  rewardPerShare(): bigint {
    const { totalShares } = this.book.totals;
    if (totalShares === 0n) {
      return this.rewardPerShareStored;
    }

    const { rewardRate, lastUpdateTime } = this.epoch.state();
    const elapsed = this.epoch.currentApplicableTime() - lastUpdateTime;
    if (elapsed <= 0n) {
      return this.rewardPerShareStored;
    }

    return this.rewardPerShareStored + (elapsed * rewardRate * SCALE) / totalShares;
  }

  /**
   * Claimable reward for an account, including accrual since its last
   * checkpoint. Pure read.
   */
  earned(account: Address): Amount {
    const state = this.book.get(account);
    const delta = this.rewardPerShare() - state.rewardPerShareCheckpoint;
    return state.rewardAccrued + (state.shareBalance * delta) / SCALE;
  }

  state(): AccumulatorState {
    return {
      rewardPerShareStored: this.rewardPerShareStored,
      totalRewardsDistributed: this.totalRewardsDistributed,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Writes
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Advance the accumulator to now and, for a real account, freeze its
   * pending reward. Pass `null` to advance the accumulator only.
   *
   * @returns The stored reward-per-share after the checkpoint
   */
  checkpoint(account: Address | null): bigint {
    this.rewardPerShareStored = this.rewardPerShare();
    this.epoch.markUpdated(this.epoch.currentApplicableTime());

    if (account !== null) {
      this.book.setRewardState(account, this.earned(account), this.rewardPerShareStored);
    }

    return this.rewardPerShareStored;
  }

  /**
   * Pay out an account's checkpointed reward from custody.
   *
   * @throws RewardError NOTHING_TO_CLAIM when nothing is accrued
   */
  claim(account: Address): ClaimRecord {
    const state = this.book.get(account);
    const reward = state.rewardAccrued;
    if (reward === 0n) {
      throw new RewardError("NOTHING_TO_CLAIM", `Account "${account}" has no reward to claim`);
    }

    this.book.setRewardState(account, 0n, state.rewardPerShareCheckpoint);
    this.totalRewardsDistributed += reward;
    this.rewardAsset.transfer(this.custodian, account, reward);

    return {
      account,
      reward,
      totalRewardsDistributed: this.totalRewardsDistributed,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rollback
  // ───────────────────────────────────────────────────────────────────────

  restore(state: AccumulatorState): void {
    this.rewardPerShareStored = state.rewardPerShareStored;
    this.totalRewardsDistributed = state.totalRewardsDistributed;
  }

  begin(): Rollback {
    const saved = this.state();
    return { rollback: () => this.restore(saved) };
  }
}
