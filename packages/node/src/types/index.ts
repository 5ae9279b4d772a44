/**
 * Type barrel — re-exports all public types from @stakeflow/node.
 */

// DTOs
export {
  AmountSchema,
  AddressSchema,
  PaginationQuerySchema,
  DepositSchema,
  MintSchema,
  WithdrawSchema,
  RedeemSchema,
  NotifyRewardSchema,
  RewardsDurationSchema,
  RecoverSchema,
  PauseSchema,
  RewardsDistributorSchema,
  RegisterAssetSchema,
  FaucetSchema,
  ApproveSchema,
  BoostPositionSchema,
  ReservesSchema,
  AccountQuerySchema,
  ListEventsQuerySchema,
  toEpochResponse,
  toVaultResponse,
  toAccountResponse,
  toEventResponse,
} from "./dto.js";
export type {
  DepositDto,
  MintDto,
  WithdrawDto,
  RedeemDto,
  NotifyRewardDto,
  RewardsDurationDto,
  RecoverDto,
  PauseDto,
  RewardsDistributorDto,
  RegisterAssetDto,
  FaucetDto,
  ApproveDto,
  BoostPositionDto,
  ReservesDto,
  AccountQuery,
  ListEventsQuery,
  EpochResponse,
  VaultResponse,
  AccountPreview,
  AccountLimits,
  AccountResponse,
  PreviewResponse,
  EventResponse,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
