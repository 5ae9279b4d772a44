/**
 * @stakeflow/ledger — Share ledger for the staking vault.
 *
 * Tracks principal and shares per account and converts between them:
 * - Deposits are boosted by an external multiplier when eligible
 * - Withdrawals use each account's own historical share/asset ratio
 * - All arithmetic is bigint with floor division
 *
 * Design rules:
 * - All views are readonly
 * - Fail-closed: invalid requests throw before any balance changes
 * - Shares never move between accounts
 */

// Ledger
export { VaultLedger } from "./vault-ledger.js";
export type { VaultLedgerOptions } from "./vault-ledger.js";

// Account book
export { AccountBook } from "./accounts.js";

// Conversion
export { ShareConverter } from "./share-converter.js";
export type { BoostDecision } from "./share-converter.js";

// Fixed-point arithmetic
export {
  SCALE,
  parseUnits,
  formatUnits,
  parseAmountString,
  toAmountString,
  assertAmount,
  mulDiv,
  divFloor,
  minOf,
} from "./fixed-point.js";

// Types
export type {
  AccountState,
  LedgerTotals,
  ReconciliationResult,
  DepositRecord,
  WithdrawalRecord,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
