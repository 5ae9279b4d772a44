/**
 * VaultService — Composition root for the staking vault.
 *
 * Route handlers delegate to this service; they never construct domain
 * objects themselves. The service owns the in-memory collaborators the
 * vault runs against: the token registry, the reserve report, the boost
 * oracle, the clock and the event store.
 */

import { InMemoryEventStore } from "@stakeflow/event-store";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  SubscriberErrorReporter,
  Subscription,
} from "@stakeflow/event-store";
import type { ReconciliationResult } from "@stakeflow/ledger";
import {
  InMemoryToken,
  StakingVault,
  StaticMultiplierOracle,
  StaticReserveReport,
  SystemClock,
} from "@stakeflow/vault";
import type { BoostPosition } from "@stakeflow/vault";
import type { Address, Amount, Clock, PoolReserves } from "@stakeflow/types";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly vaultAddress: Address;
  readonly owner: Address;
  readonly rewardsDistributor: Address;
  /** Symbol of the staked asset */
  readonly depositAsset: string;
  /** Symbol of the reward asset */
  readonly rewardAsset: string;
  readonly decimals: number;
  readonly rewardsDuration: bigint;
  readonly defaultBoostMultiplier: bigint;
  /** Default: wall-clock seconds */
  readonly clock?: Clock;
  readonly generateId?: () => string;
  /** Called for every event committed to the store */
  readonly onEvent?: (event: HashedStoredEvent) => void;
  /** Receives failures of `onEvent`; they never fail the operation */
  readonly onSubscriberError?: SubscriberErrorReporter;
}

export type ServiceErrorCode = "ASSET_NOT_FOUND" | "ASSET_EXISTS";

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;
  constructor(code: ServiceErrorCode, message: string) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
  }
}

export interface HealthReport {
  readonly integrity: EventStoreIntegrityResult;
  readonly reconciliation: ReconciliationResult;
}

export interface AssetBalance {
  readonly symbol: string;
  readonly holder: Address;
  readonly balance: Amount;
  /** What the vault may pull from the holder */
  readonly vaultAllowance: Amount;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: StakingVault;
  readonly eventStore: InMemoryEventStore;
  readonly oracle: StaticMultiplierOracle;
  readonly reserves: StaticReserveReport;
  readonly address: Address;

  private readonly assets = new Map<string, InMemoryToken>();
  private readonly subscription: Subscription | undefined;

  constructor(config: VaultServiceConfig) {
    this.address = config.vaultAddress;
    this.eventStore = new InMemoryEventStore({ onSubscriberError: config.onSubscriberError });
    this.oracle = new StaticMultiplierOracle(config.defaultBoostMultiplier);
    this.reserves = new StaticReserveReport(
      { principalReserve: 1n, pairedReserve: 1n },
      1n,
    );

    // One symbol for both assets hands the vault the same token, which it refuses.
    const depositAsset = this.registerAsset(config.depositAsset, config.decimals);
    const rewardAsset =
      config.rewardAsset === config.depositAsset
        ? depositAsset
        : this.registerAsset(config.rewardAsset, config.decimals);

    if (config.onEvent !== undefined) {
      this.subscription = this.eventStore.subscribeAll(config.onEvent);
    }

    this.vault = new StakingVault({
      address: config.vaultAddress,
      owner: config.owner,
      rewardsDistributor: config.rewardsDistributor,
      depositAsset,
      rewardAsset,
      reserves: this.reserves,
      oracle: this.oracle,
      clock: config.clock ?? new SystemClock(),
      rewardsDuration: config.rewardsDuration,
      eventStore: this.eventStore,
      ...(config.generateId !== undefined ? { generateId: config.generateId } : {}),
    });
  }

  // ─── Assets ──────────────────────────────────────────────────────────

  asset(symbol: string): InMemoryToken {
    const token = this.assets.get(symbol);
    if (token === undefined) {
      throw new ServiceError("ASSET_NOT_FOUND", `Unknown asset "${symbol}"`);
    }
    return token;
  }

  listAssets(): readonly InMemoryToken[] {
    return [...this.assets.values()];
  }

  registerAsset(symbol: string, decimals: number): InMemoryToken {
    if (this.assets.has(symbol)) {
      throw new ServiceError("ASSET_EXISTS", `Asset "${symbol}" is already registered`);
    }
    const token = new InMemoryToken({ id: symbol, symbol, decimals });
    this.assets.set(symbol, token);
    return token;
  }

  faucet(symbol: string, to: Address, amount: Amount): AssetBalance {
    this.asset(symbol).mint(to, amount);
    return this.balanceOf(symbol, to);
  }

  approve(symbol: string, owner: Address, spender: Address, amount: Amount): void {
    this.asset(symbol).approve(owner, spender, amount);
  }

  balanceOf(symbol: string, holder: Address): AssetBalance {
    const token = this.asset(symbol);
    return {
      symbol,
      holder,
      balance: token.balanceOf(holder),
      vaultAllowance: token.allowance(holder, this.address),
    };
  }

  // ─── Administration ──────────────────────────────────────────────────

  recover(caller: Address, symbol: string, amount: Amount): void {
    this.vault.recoverForeignAsset(caller, this.asset(symbol), amount);
  }

  // ─── Oracles ─────────────────────────────────────────────────────────

  setBoostPosition(account: Address, position: BoostPosition): BoostPosition {
    this.oracle.setPosition(account, position);
    return this.oracle.position(account);
  }

  setReserves(reserves: PoolReserves, totalSupply: Amount): void {
    this.reserves.update(reserves, totalSupply);
  }

  // ─── Events ──────────────────────────────────────────────────────────

  readEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  // ─── Health ──────────────────────────────────────────────────────────

  checkHealth(): HealthReport {
    return {
      integrity: this.eventStore.verifyIntegrity(),
      reconciliation: this.vault.reconcile(),
    };
  }

  /** Detach the event mirror. */
  close(): void {
    this.subscription?.unsubscribe();
  }
}
