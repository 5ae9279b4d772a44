/**
 * Accounting Primitives
 *
 * Core value types for deterministic vault accounting.
 *
 * Rules:
 * - All quantities are bigint base units (no floating point anywhere)
 * - Timestamps are unix seconds as bigint
 * - Amounts crossing a serialization boundary are decimal strings
 */

/**
 * Identity of an account, a vault or an asset holder.
 * Opaque to the accounting core: compared by string equality only.
 */
export type Address = string;

/**
 * A quantity of base units (wei-like). Never negative once validated.
 */
export type Amount = bigint;

/**
 * Unix time in whole seconds.
 */
export type Timestamp = bigint;

/**
 * An amount rendered for JSON: base units as a decimal string.
 * e.g. "1000000000000000000" for 1 token with 18 decimals.
 */
export type AmountString = string;

/**
 * Pool reserves as reported by the LP reserve oracle.
 */
export interface PoolReserves {
  /** Reserve of the asset that long-term locks are denominated in */
  readonly principalReserve: Amount;

  /** Reserve of the other side of the pair */
  readonly pairedReserve: Amount;
}
