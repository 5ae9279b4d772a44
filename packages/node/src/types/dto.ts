/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts travel as base-unit integer strings in both directions:
 * request schemas parse them to bigint, response mappers format them back.
 */

import { z } from "zod";
import type { HashedStoredEvent } from "@stakeflow/event-store";
import type { EpochState } from "@stakeflow/rewards";
import type { AccountView, VaultView } from "@stakeflow/vault";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^(0|[1-9][0-9]*)$/, "Expected a base-unit integer string")
  .transform((value) => BigInt(value));

export const AddressSchema = z.string().min(1).max(128);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Staking DTOs
// =============================================================================

export const DepositSchema = z.object({
  assets: AmountSchema,
  receiver: AddressSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const MintSchema = z.object({
  shares: AmountSchema,
  receiver: AddressSchema.optional(),
});

export type MintDto = z.infer<typeof MintSchema>;

export const WithdrawSchema = z.object({
  assets: AmountSchema,
  receiver: AddressSchema.optional(),
  owner: AddressSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const RedeemSchema = z.object({
  shares: AmountSchema,
  receiver: AddressSchema.optional(),
  owner: AddressSchema.optional(),
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const NotifyRewardSchema = z.object({
  amount: AmountSchema,
});

export type NotifyRewardDto = z.infer<typeof NotifyRewardSchema>;

export const RewardsDurationSchema = z.object({
  rewardsDuration: AmountSchema,
});

export type RewardsDurationDto = z.infer<typeof RewardsDurationSchema>;

export const RecoverSchema = z.object({
  symbol: z.string().min(1),
  amount: AmountSchema,
});

export type RecoverDto = z.infer<typeof RecoverSchema>;

export const PauseSchema = z.object({
  paused: z.boolean(),
});

export type PauseDto = z.infer<typeof PauseSchema>;

export const RewardsDistributorSchema = z.object({
  distributor: AddressSchema,
});

export type RewardsDistributorDto = z.infer<typeof RewardsDistributorSchema>;

// =============================================================================
// Development Collaborator DTOs
// =============================================================================

export const RegisterAssetSchema = z.object({
  symbol: z.string().min(1).max(32),
  decimals: z.number().int().min(0).max(36).default(18),
});

export type RegisterAssetDto = z.infer<typeof RegisterAssetSchema>;

export const FaucetSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type FaucetDto = z.infer<typeof FaucetSchema>;

export const ApproveSchema = z.object({
  amount: AmountSchema,
  spender: AddressSchema.optional(),
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const BoostPositionSchema = z.object({
  multiplier: AmountSchema,
  lockedPrincipal: AmountSchema,
});

export type BoostPositionDto = z.infer<typeof BoostPositionSchema>;

export const ReservesSchema = z.object({
  principalReserve: AmountSchema,
  pairedReserve: AmountSchema,
  totalSupply: AmountSchema,
});

export type ReservesDto = z.infer<typeof ReservesSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const AccountQuerySchema = z.object({
  amount: AmountSchema.optional(),
});

export type AccountQuery = z.infer<typeof AccountQuerySchema>;

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  type: z.string().optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Response Mappers
// =============================================================================

export interface EpochResponse {
  readonly rewardRate: string;
  readonly periodFinish: string;
  readonly rewardsDuration: string;
  readonly lastUpdateTime: string;
}

export interface VaultResponse {
  readonly address: string;
  readonly owner: string;
  readonly rewardsDistributor: string;
  readonly depositAsset: string;
  readonly rewardAsset: string;
  readonly paused: boolean;
  readonly totalAssets: string;
  readonly totalShares: string;
  readonly rewardPerShare: string;
  readonly totalRewardsDistributed: string;
  readonly lastTimeRewardApplicable: string;
  readonly rewardForDuration: string;
  readonly epoch: EpochResponse;
}

export interface PreviewResponse {
  readonly amount: string;
  readonly deposit: string;
  readonly mint: string;
  readonly withdraw: string;
  readonly redeem: string;
}

export interface AccountPreview {
  readonly amount: bigint;
  readonly deposit: bigint;
  readonly mint: bigint;
  readonly withdraw: bigint;
  readonly redeem: bigint;
}

export interface AccountLimits {
  readonly maxDeposit: bigint;
  readonly maxMint: bigint;
}

export interface AccountResponse {
  readonly address: string;
  readonly assetBalance: string;
  readonly shareBalance: string;
  readonly rewardAccrued: string;
  readonly earned: string;
  readonly maxWithdraw: string;
  readonly maxRedeem: string;
  readonly maxDeposit: string;
  readonly maxMint: string;
  readonly preview?: PreviewResponse;
}

export interface EventResponse {
  readonly globalPosition: number;
  readonly version: number;
  readonly streamId: string;
  readonly type: string;
  readonly metadata: HashedStoredEvent["event"]["metadata"];
  readonly payload: Readonly<Record<string, unknown>>;
  readonly hash: string;
  readonly previousHash: string;
}

export function toEpochResponse(epoch: EpochState): EpochResponse {
  return {
    rewardRate: epoch.rewardRate.toString(),
    periodFinish: epoch.periodFinish.toString(),
    rewardsDuration: epoch.rewardsDuration.toString(),
    lastUpdateTime: epoch.lastUpdateTime.toString(),
  };
}

export function toVaultResponse(view: VaultView): VaultResponse {
  return {
    address: view.address,
    owner: view.owner,
    rewardsDistributor: view.rewardsDistributor,
    depositAsset: view.depositAsset,
    rewardAsset: view.rewardAsset,
    paused: view.paused,
    totalAssets: view.totalAssets.toString(),
    totalShares: view.totalShares.toString(),
    rewardPerShare: view.rewardPerShare.toString(),
    totalRewardsDistributed: view.totalRewardsDistributed.toString(),
    lastTimeRewardApplicable: view.lastTimeRewardApplicable.toString(),
    rewardForDuration: view.rewardForDuration.toString(),
    epoch: toEpochResponse(view.epoch),
  };
}

export function toAccountResponse(
  view: AccountView,
  limits: AccountLimits,
  preview?: AccountPreview,
): AccountResponse {
  const base: AccountResponse = {
    address: view.address,
    assetBalance: view.assetBalance.toString(),
    shareBalance: view.shareBalance.toString(),
    rewardAccrued: view.rewardAccrued.toString(),
    earned: view.earned.toString(),
    maxWithdraw: view.maxWithdraw.toString(),
    maxRedeem: view.maxRedeem.toString(),
    maxDeposit: limits.maxDeposit.toString(),
    maxMint: limits.maxMint.toString(),
  };
  if (preview === undefined) {
    return base;
  }
  return {
    ...base,
    preview: {
      amount: preview.amount.toString(),
      deposit: preview.deposit.toString(),
      mint: preview.mint.toString(),
      withdraw: preview.withdraw.toString(),
      redeem: preview.redeem.toString(),
    },
  };
}

export function toEventResponse(stored: HashedStoredEvent): EventResponse {
  return {
    globalPosition: stored.globalPosition,
    version: stored.version,
    streamId: stored.streamId,
    type: stored.event.type,
    metadata: stored.event.metadata,
    payload: stored.event.payload,
    hash: stored.hash,
    previousHash: stored.previousHash,
  };
}
