/**
 * Test doubles for @stakeflow/rewards.
 */

import type { Address, Amount, Clock, FungibleAsset } from "@stakeflow/types";

export class ManualClock implements Clock {
  constructor(public time: bigint = 1_000n) {}

  now(): bigint {
    return this.time;
  }

  advance(seconds: bigint): void {
    this.time += seconds;
  }
}

/**
 * Minimal balance-tracking asset. Transfers fail on insufficient funds.
 */
export class TestAsset implements FungibleAsset {
  readonly id = "reward-token";
  readonly symbol = "RWD";
  readonly decimals = 18;
  readonly balances = new Map<Address, Amount>();

  balanceOf(holder: Address): Amount {
    return this.balances.get(holder) ?? 0n;
  }

  mint(to: Address, amount: Amount): void {
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  transfer(from: Address, to: Address, amount: Amount): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new Error(`insufficient funds: ${from}`);
    }
    this.balances.set(from, balance - amount);
    this.mint(to, amount);
  }

  transferFrom(_spender: Address, from: Address, to: Address, amount: Amount): void {
    this.transfer(from, to, amount);
  }
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
