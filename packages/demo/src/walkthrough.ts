/**
 * Staking walkthrough.
 *
 * One week-long reward window on an in-memory vault:
 * stake -> boost -> fund -> accrue -> claim -> pause -> exit -> audit
 *
 * Uses the domain packages directly (no HTTP server) and a manual clock,
 * so every figure printed is reproducible.
 */

import { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { HashedStoredEvent } from "@stakeflow/event-store";
import { InMemoryEventStore } from "@stakeflow/event-store";
import { formatUnits, parseUnits } from "@stakeflow/ledger";
import {
  InMemoryToken,
  ManualClock,
  StakingVault,
  StaticMultiplierOracle,
  StaticReserveReport,
  VaultError,
} from "@stakeflow/vault";
import type { Amount } from "@stakeflow/types";

// =============================================================================
// Options
// =============================================================================

export interface WalkthroughOptions {
  /** Receives each output line. */
  readonly print: (line: string) => void;
  /** Awaited between steps. Default: no pause */
  readonly pause?: () => Promise<void>;
  /** Default: chalk with the terminal's detected color support */
  readonly colors?: ChalkInstance;
}

export interface WalkthroughSummary {
  readonly events: number;
  readonly chainValid: boolean;
  readonly ledgerBalanced: boolean;
  readonly totalRewardsDistributed: Amount;
  readonly rewardRate: bigint;
  readonly aliceUnclaimed: Amount;
}

// =============================================================================
// Fixture
// =============================================================================

const DECIMALS = 18;
const WEEK = 604_800n;
const DAY = 86_400n;
const START = 1_700_000_000n;
const TOTAL_STEPS = 8;

const OWNER = "treasury";
const DISTRIBUTOR = "emissions";
const VAULT = "vault";

function units(amount: string): Amount {
  return parseUnits(amount, DECIMALS);
}

/** Whole-token rendering with trailing zeros dropped. */
export function display(value: Amount): string {
  return formatUnits(value, DECIMALS).replace(/\.?0+$/, "");
}

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(options: WalkthroughOptions): Promise<WalkthroughSummary> {
  const c = options.colors ?? new Chalk();
  const print = options.print;
  const pause = options.pause ?? (() => Promise.resolve());

  const stepHeader = (step: number, title: string): void => {
    const prefix = c.cyan.bold(`  Step ${step}/${TOTAL_STEPS}`);
    const line = c.gray("─".repeat(Math.max(4, 50 - title.length)));
    print("");
    print(`${prefix}  ${c.white.bold(title)}  ${line}`);
  };
  const ok = (msg: string): void => print(c.green("    ✓ ") + c.white(msg));
  const info = (label: string, value: string): void =>
    print(c.gray("    → ") + c.gray(label.padEnd(18)) + c.white(value));
  const warn = (msg: string): void => print(c.yellow("    ! ") + c.yellow(msg));

  print("");
  print(c.cyan.bold("  STAKEFLOW") + c.gray("  boosted shares, streamed rewards"));

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, "Boot");

  const clock = new ManualClock(START);
  const lp = new InMemoryToken({ id: "LP", symbol: "LP", decimals: DECIMALS });
  const rwd = new InMemoryToken({ id: "RWD", symbol: "RWD", decimals: DECIMALS });
  const reserves = new StaticReserveReport(
    { principalReserve: units("1000000"), pairedReserve: units("1000000") },
    units("1000000"),
  );
  const oracle = new StaticMultiplierOracle(1n);
  const eventStore = new InMemoryEventStore({ now: () => new Date(Number(clock.now()) * 1000) });

  const vault = new StakingVault({
    address: VAULT,
    owner: OWNER,
    rewardsDistributor: DISTRIBUTOR,
    depositAsset: lp,
    rewardAsset: rwd,
    reserves,
    oracle,
    clock,
    rewardsDuration: WEEK,
    eventStore,
  });
  ok(`Vault "${VAULT}" staking LP for RWD (owner: ${OWNER})`);
  info("window", `${WEEK.toString()}s`);

  await pause();

  // ─── Step 2: Stake ──────────────────────────────────────────────────

  stepHeader(2, "Stake");

  const stake = (account: string, amount: string): Amount => {
    lp.mint(account, units(amount));
    lp.approve(account, VAULT, units(amount));
    return vault.deposit(account, units(amount), account);
  };

  const aliceShares = stake("alice", "1000");
  ok(`alice staked 1000 LP`);
  info("alice shares", display(aliceShares));

  oracle.setPosition("bob", { multiplier: 3n, lockedPrincipal: 0n });
  const bobShares = stake("bob", "500");
  ok(`bob staked 500 LP with a 3x boost`);
  info("bob shares", display(bobShares));
  info("total shares", display(vault.totalShares()));

  await pause();

  // ─── Step 3: Fund ───────────────────────────────────────────────────

  stepHeader(3, "Fund Reward Window");

  const funding = units("604800");
  rwd.mint(VAULT, funding);
  vault.notifyReward(DISTRIBUTOR, funding);
  const epoch = vault.epoch();
  ok(`${DISTRIBUTOR} funded ${display(funding)} RWD`);
  info("rate", `${display(epoch.rewardRate)} RWD/s`);
  info("period finish", epoch.periodFinish.toString());

  await pause();

  // ─── Step 4: Accrue ─────────────────────────────────────────────────

  stepHeader(4, "Accrue One Day");

  clock.advance(DAY);
  info("alice earned", `${display(vault.earned("alice"))} RWD`);
  info("bob earned", `${display(vault.earned("bob"))} RWD`);
  ok("Rewards split by shares, not by principal");

  await pause();

  // ─── Step 5: Claim ──────────────────────────────────────────────────

  stepHeader(5, "Claim");

  const claimed = vault.claimReward("alice");
  ok(`alice claimed ${display(claimed)} RWD`);

  await pause();

  // ─── Step 6: Pause ──────────────────────────────────────────────────

  stepHeader(6, "Pause");

  vault.setPaused(OWNER, true);
  ok(`${OWNER} paused the vault`);
  try {
    stake("alice", "1");
    warn("Deposit went through while paused");
  } catch (err) {
    if (!(err instanceof VaultError)) throw err;
    info("alice deposit", c.red(err.code));
  }
  vault.setPaused(OWNER, false);
  ok(`${OWNER} unpaused the vault`);

  await pause();

  // ─── Step 7: Exit ───────────────────────────────────────────────────

  stepHeader(7, "Exit After The Window");

  clock.set(START + WEEK);
  const bobReward = vault.exit("bob");
  ok(`bob exited with ${display(lp.balanceOf("bob"))} LP and ${display(bobReward)} RWD`);
  info("alice unclaimed", `${display(vault.earned("alice"))} RWD`);

  await pause();

  // ─── Step 8: Audit ──────────────────────────────────────────────────

  stepHeader(8, "Audit");

  const events = eventStore.readAll();
  for (const stored of events) {
    print(c.gray("    ") + c.dim(eventLine(stored)));
  }

  const integrity = eventStore.verifyIntegrity();
  const reconciliation = vault.reconcile();
  if (integrity.valid) {
    ok(`Hash chain verified through position ${integrity.lastVerifiedPosition}`);
  } else {
    warn(`Hash chain broken: ${integrity.errors.length} errors`);
  }
  if (reconciliation.balanced) {
    ok(`Ledger totals match ${reconciliation.accountCount} accounts`);
  } else {
    warn("Ledger totals do not match the accounts");
  }

  const summary: WalkthroughSummary = {
    events: events.length,
    chainValid: integrity.valid,
    ledgerBalanced: reconciliation.balanced,
    totalRewardsDistributed: vault.totalRewardsDistributed(),
    rewardRate: epoch.rewardRate,
    aliceUnclaimed: vault.earned("alice"),
  };

  print("");
  print(c.white("    Events recorded:     ") + c.cyan.bold(String(summary.events)));
  print(c.white("    Rewards paid:        ") + c.cyan.bold(`${display(summary.totalRewardsDistributed)} RWD`));
  print("");

  return summary;
}

function eventLine(stored: HashedStoredEvent): string {
  return JSON.stringify({
    position: stored.globalPosition,
    type: stored.event.type,
    hash: `${stored.hash.slice(0, 12)}...`,
  });
}
