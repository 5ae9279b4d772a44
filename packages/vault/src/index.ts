/**
 * @stakeflow/vault — Staking vault facade.
 *
 * Provides:
 * - StakingVault: guarded deposit, mint, withdraw, redeem, exit and
 *   reward operations over the share ledger and reward accumulator
 * - The guard pipeline (exclusivity, role, pause, transaction)
 * - In-memory reference adapters for every port
 */

// Facade
export { StakingVault, UNBOUNDED } from "./vault.js";

// Guards
export { ExclusivityLock, requireRole, requireNotPaused, openTransaction } from "./guards.js";

// Events
export { EventRecorder } from "./events.js";
export type { OperationContext } from "./events.js";

// Adapters
export { InMemoryToken, TokenError } from "./token.js";
export type { InMemoryTokenOptions, TokenErrorCode, TransferHook, TransferRecord } from "./token.js";
export { StaticReserveReport, StaticMultiplierOracle, SystemClock, ManualClock } from "./oracles.js";
export type { BoostPosition } from "./oracles.js";

// Types
export type {
  StakingVaultOptions,
  VaultRole,
  VaultOperation,
  AccountView,
  VaultView,
  VaultErrorCode,
} from "./types.js";
export { VaultError } from "./types.js";
