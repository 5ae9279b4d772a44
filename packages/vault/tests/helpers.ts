/**
 * Vault test harness: a vault wired to in-memory adapters.
 */

import { InMemoryEventStore } from "@stakeflow/event-store";
import type { SubscriberErrorReporter } from "@stakeflow/event-store";
import { StakingVault } from "../src/vault.js";
import { InMemoryToken } from "../src/token.js";
import { ManualClock, StaticMultiplierOracle, StaticReserveReport } from "../src/oracles.js";

export const VAULT = "vault";
export const OWNER = "owner";
export const DISTRIBUTOR = "distributor";

export interface HarnessOptions {
  readonly rewardsDuration?: bigint;
  readonly start?: bigint;
  readonly onSubscriberError?: SubscriberErrorReporter;
}

export function createHarness(options: HarnessOptions = {}) {
  const clock = new ManualClock(options.start ?? 1_000n);
  const lp = new InMemoryToken({ id: "lp-token", symbol: "LP" });
  const reward = new InMemoryToken({ id: "reward-token", symbol: "RWD" });
  const reserves = new StaticReserveReport({ principalReserve: 1_000n, pairedReserve: 1_000n }, 1_000n);
  const oracle = new StaticMultiplierOracle(1n);
  const store = new InMemoryEventStore({ onSubscriberError: options.onSubscriberError });
  let counter = 0;

  const vault = new StakingVault({
    address: VAULT,
    owner: OWNER,
    rewardsDistributor: DISTRIBUTOR,
    depositAsset: lp,
    rewardAsset: reward,
    reserves,
    oracle,
    clock,
    rewardsDuration: options.rewardsDuration ?? 100n,
    eventStore: store,
    generateId: () => `id-${++counter}`,
  });

  /** Give `account` LP tokens and approve the vault to pull them. */
  function fund(account: string, amount: bigint): void {
    lp.mint(account, amount);
    lp.approve(account, VAULT, lp.allowance(account, VAULT) + amount);
  }

  function stake(account: string, amount: bigint): bigint {
    fund(account, amount);
    return vault.deposit(account, amount, account);
  }

  /** Move `amount` reward into custody and open a window with it. */
  function notify(amount: bigint): void {
    reward.mint(VAULT, amount);
    vault.notifyReward(DISTRIBUTOR, amount);
  }

  function eventTypes(): string[] {
    return store.readAll().map((e) => e.event.type);
  }

  return { clock, lp, reward, reserves, oracle, store, vault, fund, stake, notify, eventTypes };
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
