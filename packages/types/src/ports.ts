/**
 * Collaborator Ports
 *
 * Narrow capability interfaces the accounting core consumes.
 * The core never reaches a live ledger or oracle directly; adapters
 * implementing these ports are injected at construction.
 *
 * Rules:
 * - Every port method is synchronous: it completes or throws
 * - A throwing port aborts the calling operation
 */

import type { Address, Amount, PoolReserves, Timestamp } from "./primitives.js";

/**
 * A fungible asset (deposit asset, reward asset, or any foreign token).
 */
export interface FungibleAsset {
  /** Stable identifier used to tell assets apart (e.g. contract address) */
  readonly id: string;
  readonly symbol: string;
  readonly decimals: number;

  balanceOf(holder: Address): Amount;

  /** Move `amount` out of `from`'s own balance. */
  transfer(from: Address, to: Address, amount: Amount): void;

  /** Move `amount` from `from` to `to` using `spender`'s allowance. */
  transferFrom(spender: Address, from: Address, to: Address, amount: Amount): void;
}

/**
 * Reserve report for the LP pool whose position token is deposited.
 */
export interface ReserveReport {
  getReserves(): PoolReserves;

  /** Total supply of the pool's LP token. */
  totalSupply(): Amount;
}

/**
 * Boost oracle backed by a long-term lock.
 */
export interface MultiplierOracle {
  /** Integer boost factor applied to fresh deposits. */
  boostMultiplier(account: Address): bigint;

  /** Principal the account has committed to the long-term lock. */
  lockedPrincipal(account: Address): Amount;
}

export interface Clock {
  now(): Timestamp;
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * Handle returned by {@link Transactional.begin}. Calling `rollback()`
 * restores the participant to the state it had when `begin()` ran.
 */
export interface Rollback {
  rollback(): void;
}

/**
 * A participant in an all-or-nothing operation.
 */
export interface Transactional {
  begin(): Rollback;
}
