/**
 * @stakeflow/rewards — Streamed rewards for the staking vault.
 *
 * - EpochController: reward rate and funded window, re-funded by top-ups
 * - RewardAccumulator: reward-per-share accrual and per-account checkpoints
 *
 * All arithmetic is bigint with floor division, scaled by SCALE (1e18).
 */

export { EpochController } from "./epoch.js";
export { RewardAccumulator } from "./accumulator.js";
export type { RewardAccumulatorOptions } from "./accumulator.js";

export { RewardError, DEFAULT_REWARDS_DURATION } from "./types.js";
export type {
  RewardErrorCode,
  EpochPhase,
  EpochState,
  NotifyResult,
  AccumulatorState,
  ClaimRecord,
} from "./types.js";
