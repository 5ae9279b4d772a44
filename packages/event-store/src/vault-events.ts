/**
 * @stakeflow/event-store — Vault domain event definitions.
 *
 * Naming convention: `vault.<action>`. Every payload carries amounts as
 * decimal strings so events survive JSON canonicalization unchanged.
 */

import type { DomainEvent } from "@stakeflow/types";

export const VAULT_EVENTS = {
  DEPOSITED: "vault.deposited",
  WITHDRAWN: "vault.withdrawn",
  REWARD_PAID: "vault.reward_paid",
  REWARD_ADDED: "vault.reward_added",
  REWARDS_DURATION_UPDATED: "vault.rewards_duration_updated",
  FOREIGN_ASSET_RECOVERED: "vault.foreign_asset_recovered",
  PAUSED: "vault.paused",
  UNPAUSED: "vault.unpaused",
  REWARDS_DISTRIBUTOR_UPDATED: "vault.rewards_distributor_updated",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

const EVENT_TYPES: ReadonlySet<string> = new Set(Object.values(VAULT_EVENTS));

export function isVaultEventType(type: string): type is VaultEventType {
  return EVENT_TYPES.has(type);
}

/** Stream that holds every event of the vault at `address`. */
export function vaultStreamId(address: string): string {
  return `vault:${address}`;
}

// =============================================================================
// Payloads
// =============================================================================

export type DepositedPayload = {
  readonly caller: string;
  readonly receiver: string;
  readonly assets: string;
  readonly shares: string;
  readonly totalAssets: string;
  readonly totalShares: string;
};

export type WithdrawnPayload = {
  readonly caller: string;
  readonly receiver: string;
  readonly owner: string;
  readonly assets: string;
  readonly shares: string;
  readonly totalAssets: string;
  readonly totalShares: string;
};

export type RewardPaidPayload = {
  readonly account: string;
  readonly reward: string;
  readonly totalRewardsDistributed: string;
};

export type RewardAddedPayload = {
  readonly amount: string;
  /** Unspent reward folded in from a window cut short */
  readonly leftover: string;
  readonly rewardRate: string;
  readonly periodFinish: string;
};

export type RewardsDurationUpdatedPayload = {
  readonly rewardsDuration: string;
};

export type ForeignAssetRecoveredPayload = {
  readonly token: string;
  readonly amount: string;
  readonly recipient: string;
};

export type PauseChangedPayload = {
  readonly account: string;
};

export type RewardsDistributorUpdatedPayload = {
  readonly previous: string;
  readonly distributor: string;
};

export interface VaultEventPayloads {
  "vault.deposited": DepositedPayload;
  "vault.withdrawn": WithdrawnPayload;
  "vault.reward_paid": RewardPaidPayload;
  "vault.reward_added": RewardAddedPayload;
  "vault.rewards_duration_updated": RewardsDurationUpdatedPayload;
  "vault.foreign_asset_recovered": ForeignAssetRecoveredPayload;
  "vault.paused": PauseChangedPayload;
  "vault.unpaused": PauseChangedPayload;
  "vault.rewards_distributor_updated": RewardsDistributorUpdatedPayload;
}

/**
 * A DomainEvent whose payload is typed by its event type.
 */
export type VaultEvent<T extends VaultEventType = VaultEventType> = DomainEvent & {
  readonly type: T;
  readonly payload: VaultEventPayloads[T];
};
