/**
 * Settable reference adapters for the reserve and boost ports, and clocks.
 */

import { assertAmount } from "@stakeflow/ledger";
import type {
  Address,
  Amount,
  Clock,
  MultiplierOracle,
  PoolReserves,
  ReserveReport,
  Timestamp,
} from "@stakeflow/types";

// =============================================================================
// Reserves
// =============================================================================

export class StaticReserveReport implements ReserveReport {
  private reserves: PoolReserves;
  private supply: Amount;

  constructor(reserves: PoolReserves, totalSupply: Amount) {
    this.reserves = { ...reserves };
    this.supply = totalSupply;
  }

  getReserves(): PoolReserves {
    return { ...this.reserves };
  }

  totalSupply(): Amount {
    return this.supply;
  }

  update(reserves: PoolReserves, totalSupply: Amount): void {
    assertAmount(reserves.principalReserve, "principalReserve");
    assertAmount(reserves.pairedReserve, "pairedReserve");
    assertAmount(totalSupply, "totalSupply");
    this.reserves = { ...reserves };
    this.supply = totalSupply;
  }
}

// =============================================================================
// Boost oracle
// =============================================================================

export interface BoostPosition {
  readonly multiplier: bigint;
  readonly lockedPrincipal: Amount;
}

export class StaticMultiplierOracle implements MultiplierOracle {
  private readonly positions = new Map<Address, BoostPosition>();

  /**
   * @param defaultMultiplier - Multiplier for accounts with no position set
   */
  constructor(private readonly defaultMultiplier: bigint = 1n) {
    assertAmount(defaultMultiplier, "defaultMultiplier");
  }

  boostMultiplier(account: Address): bigint {
    return this.positions.get(account)?.multiplier ?? this.defaultMultiplier;
  }

  lockedPrincipal(account: Address): Amount {
    return this.positions.get(account)?.lockedPrincipal ?? 0n;
  }

  position(account: Address): BoostPosition {
    return {
      multiplier: this.boostMultiplier(account),
      lockedPrincipal: this.lockedPrincipal(account),
    };
  }

  setPosition(account: Address, position: BoostPosition): void {
    assertAmount(position.multiplier, "multiplier");
    assertAmount(position.lockedPrincipal, "lockedPrincipal");
    this.positions.set(account, { ...position });
  }
}

// =============================================================================
// Clocks
// =============================================================================

export class SystemClock implements Clock {
  now(): Timestamp {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

export class ManualClock implements Clock {
  constructor(private time: Timestamp = 0n) {}

  now(): Timestamp {
    return this.time;
  }

  set(time: Timestamp): void {
    this.time = time;
  }

  advance(seconds: bigint): Timestamp {
    this.time += seconds;
    return this.time;
  }
}
