/**
 * @stakeflow/vault — Facade types.
 */

import type { EventStore } from "@stakeflow/event-store";
import type { AccountState } from "@stakeflow/ledger";
import type { EpochState } from "@stakeflow/rewards";
import type {
  Address,
  Amount,
  Clock,
  FungibleAsset,
  MultiplierOracle,
  ReserveReport,
  Timestamp,
} from "@stakeflow/types";

// =============================================================================
// Configuration
// =============================================================================

export interface StakingVaultOptions {
  /** The vault's own address; holds custody of both assets */
  readonly address: Address;
  readonly owner: Address;
  readonly rewardsDistributor: Address;
  readonly depositAsset: FungibleAsset;
  readonly rewardAsset: FungibleAsset;
  readonly reserves: ReserveReport;
  readonly oracle: MultiplierOracle;
  readonly clock: Clock;
  /** Seconds per reward window. Default: seven days */
  readonly rewardsDuration?: bigint;
  /** Sink for emitted events. Omit to drop them. */
  readonly eventStore?: EventStore;
  /** Event id source. Default: random UUIDs */
  readonly generateId?: () => string;
}

export type VaultRole = "owner" | "rewardsDistributor";

export type VaultOperation =
  | "deposit"
  | "mint"
  | "withdraw"
  | "redeem"
  | "exit"
  | "claimReward"
  | "notifyReward"
  | "setRewardsDuration"
  | "recoverForeignAsset"
  | "setPaused"
  | "setRewardsDistributor";

// =============================================================================
// Views
// =============================================================================

export interface AccountView extends AccountState {
  readonly earned: Amount;
  readonly maxWithdraw: Amount;
  readonly maxRedeem: Amount;
}

export interface VaultView {
  readonly address: Address;
  readonly owner: Address;
  readonly rewardsDistributor: Address;
  readonly depositAsset: string;
  readonly rewardAsset: string;
  readonly paused: boolean;
  readonly totalAssets: Amount;
  readonly totalShares: Amount;
  readonly rewardPerShare: bigint;
  readonly totalRewardsDistributed: Amount;
  readonly lastTimeRewardApplicable: Timestamp;
  readonly rewardForDuration: Amount;
  readonly epoch: EpochState;
}

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "REENTRANCY_BLOCKED"
  | "PAUSED"
  | "FORBIDDEN_ASSET_RECOVERY"
  | "SHARED_REWARD_ASSET";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
