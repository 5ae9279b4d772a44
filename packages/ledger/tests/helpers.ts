/**
 * Test doubles for @stakeflow/ledger.
 */

import type {
  Address,
  Amount,
  FungibleAsset,
  MultiplierOracle,
  PoolReserves,
  ReserveReport,
} from "@stakeflow/types";

export interface TransferCall {
  readonly kind: "transfer" | "transferFrom";
  readonly from: Address;
  readonly to: Address;
  readonly amount: Amount;
}

/**
 * Records every transfer; optionally fails the next one.
 */
export class RecordingAsset implements FungibleAsset {
  readonly id = "lp-token";
  readonly symbol = "LP";
  readonly decimals = 18;
  readonly calls: TransferCall[] = [];
  failNext = false;

  balanceOf(_holder: Address): Amount {
    return 0n;
  }

  transfer(from: Address, to: Address, amount: Amount): void {
    this.record({ kind: "transfer", from, to, amount });
  }

  transferFrom(_spender: Address, from: Address, to: Address, amount: Amount): void {
    this.record({ kind: "transferFrom", from, to, amount });
  }

  private record(call: TransferCall): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("transfer rejected");
    }
    this.calls.push(call);
  }
}

export class FixedReserves implements ReserveReport {
  constructor(
    public reserves: PoolReserves = { principalReserve: 1000n, pairedReserve: 1000n },
    public supply: Amount = 1000n,
  ) {}

  getReserves(): PoolReserves {
    return this.reserves;
  }

  totalSupply(): Amount {
    return this.supply;
  }
}

export class FixedOracle implements MultiplierOracle {
  readonly multipliers = new Map<Address, bigint>();
  readonly locked = new Map<Address, Amount>();
  queries = 0;

  constructor(public defaultMultiplier: bigint = 1n) {}

  boostMultiplier(account: Address): bigint {
    this.queries++;
    return this.multipliers.get(account) ?? this.defaultMultiplier;
  }

  lockedPrincipal(account: Address): Amount {
    return this.locked.get(account) ?? 0n;
  }
}

/**
 * Run `fn` and return what it threw. Fails the test if nothing was thrown.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
