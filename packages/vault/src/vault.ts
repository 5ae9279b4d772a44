/**
 * StakingVault — the public face of the staking vault.
 *
 * Composes:
 * - VaultLedger (principal and share accounting, custody transfers)
 * - EpochController (reward rate and funded window)
 * - RewardAccumulator (reward-per-share attribution and claims)
 *
 * Every mutating operation runs the same pipeline:
 *
 *   exclusivity → role → pause → transaction → checkpoint → mutate
 *     → transfer → commit events → release exclusivity
 *
 * A failure anywhere after the transaction opens rolls back the book,
 * the epoch, the accumulator, the vault's flags and every transactional
 * asset, and emits nothing.
 */

import { randomUUID } from "node:crypto";
import type { EventStore } from "@stakeflow/event-store";
import { vaultStreamId } from "@stakeflow/event-store";
import {
  AccountBook,
  ShareConverter,
  VaultLedger,
  toAmountString,
} from "@stakeflow/ledger";
import type {
  AccountState,
  LedgerTotals,
  ReconciliationResult,
  WithdrawalRecord,
} from "@stakeflow/ledger";
import { EpochController, RewardAccumulator } from "@stakeflow/rewards";
import type { EpochState } from "@stakeflow/rewards";
import { isTransactional } from "@stakeflow/types";
import type {
  Address,
  Amount,
  Clock,
  DomainEvent,
  FungibleAsset,
  Rollback,
  Timestamp,
  Transactional,
} from "@stakeflow/types";
import { EventRecorder } from "./events.js";
import {
  ExclusivityLock,
  openTransaction,
  requireNotPaused,
  requireRole,
} from "./guards.js";
import type {
  AccountView,
  StakingVaultOptions,
  VaultOperation,
  VaultRole,
  VaultView,
} from "./types.js";
import { VaultError } from "./types.js";

/** Returned by maxDeposit/maxMint while the vault is open. */
export const UNBOUNDED = 2n ** 256n - 1n;

interface OperationPolicy {
  readonly role?: VaultRole;
  readonly pausable?: boolean;
  /** Further assets the operation moves, beyond the deposit and reward assets */
  readonly touches?: readonly FungibleAsset[];
}

interface Flags {
  readonly paused: boolean;
  readonly rewardsDistributor: Address;
}

// =============================================================================
// Staking Vault
// =============================================================================

export class StakingVault {
  readonly address: Address;
  readonly owner: Address;
  readonly depositAsset: FungibleAsset;
  readonly rewardAsset: FungibleAsset;

  private readonly book: AccountBook;
  private readonly ledger: VaultLedger;
  private readonly epochs: EpochController;
  private readonly rewards: RewardAccumulator;
  private readonly clock: Clock;
  private readonly eventStore: EventStore | undefined;
  private readonly generateId: () => string;
  private readonly lock = new ExclusivityLock();
  private readonly participants: readonly Transactional[];
  private flags: Flags;

  /**
   * @throws VaultError SHARED_REWARD_ASSET when the reward asset is the
   *   deposit asset; staked principal would then count as reward custody
   */
  constructor(options: StakingVaultOptions) {
    if (options.rewardAsset.id === options.depositAsset.id) {
      throw new VaultError(
        "SHARED_REWARD_ASSET",
        `The reward asset must differ from the deposit asset ${options.depositAsset.symbol}`,
      );
    }
    this.address = options.address;
    this.owner = options.owner;
    this.depositAsset = options.depositAsset;
    this.rewardAsset = options.rewardAsset;
    this.clock = options.clock;
    this.eventStore = options.eventStore;
    this.generateId = options.generateId ?? (() => randomUUID());
    this.flags = { paused: false, rewardsDistributor: options.rewardsDistributor };

    this.book = new AccountBook();
    this.ledger = new VaultLedger({
      custodian: options.address,
      depositAsset: options.depositAsset,
      book: this.book,
      converter: new ShareConverter(this.book, options.reserves, options.oracle),
    });
    this.epochs = new EpochController(options.clock, options.rewardsDuration);
    this.rewards = new RewardAccumulator({
      epoch: this.epochs,
      book: this.book,
      rewardAsset: options.rewardAsset,
      custodian: options.address,
    });

    const flagParticipant: Transactional = {
      begin: (): Rollback => {
        const saved = this.flags;
        return { rollback: () => { this.flags = saved; } };
      },
    };
    this.participants = [
      this.book,
      this.epochs,
      this.rewards,
      flagParticipant,
      ...transactionalAssets([options.depositAsset, options.rewardAsset]),
    ];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Staking
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Deposit `assets` and receive shares, boosted when eligible.
   *
   * @returns Shares issued
   */
  deposit(caller: Address, assets: Amount, receiver: Address): Amount {
    return this.execute("deposit", caller, { pausable: true }, (events) => {
      this.rewards.checkpoint(receiver);
      const shares = this.ledger.convertDeposit(assets, receiver);
      const record = this.ledger.applyDeposit(caller, assets, shares, receiver);
      events.record("vault.deposited", {
        caller,
        receiver,
        assets: toAmountString(assets),
        shares: toAmountString(shares),
        ...totalsPayload(record.totals),
      });
      return shares;
    });
  }

  /**
   * Receive exactly `shares`, paying whatever principal they convert to.
   *
   * @returns Assets pulled from the caller
   */
  mint(caller: Address, shares: Amount, receiver: Address): Amount {
    return this.execute("mint", caller, { pausable: true }, (events) => {
      this.rewards.checkpoint(receiver);
      const assets = this.ledger.convertMint(shares, receiver);
      const record = this.ledger.applyDeposit(caller, assets, shares, receiver);
      events.record("vault.deposited", {
        caller,
        receiver,
        assets: toAmountString(assets),
        shares: toAmountString(shares),
        ...totalsPayload(record.totals),
      });
      return assets;
    });
  }

  /**
   * Withdraw `assets` of principal, burning shares at the owner's average
   * multiplier.
   *
   * @returns Shares burned
   */
  withdraw(caller: Address, assets: Amount, receiver: Address, owner: Address): Amount {
    return this.execute("withdraw", caller, { pausable: true }, (events) => {
      this.rewards.checkpoint(owner);
      const shares = this.ledger.convertWithdraw(assets, owner);
      this.recordWithdrawal(events, this.ledger.applyWithdraw(caller, assets, shares, receiver, owner));
      return shares;
    });
  }

  /**
   * Burn `shares` for the principal they convert to.
   *
   * @returns Assets sent to the receiver
   */
  redeem(caller: Address, shares: Amount, receiver: Address, owner: Address): Amount {
    return this.execute("redeem", caller, { pausable: true }, (events) => {
      this.rewards.checkpoint(owner);
      const assets = this.ledger.convertRedeem(shares, owner);
      this.recordWithdrawal(events, this.ledger.applyWithdraw(caller, assets, shares, receiver, owner));
      return assets;
    });
  }

  /**
   * Withdraw the caller's whole position and claim any accrued reward.
   *
   * @returns Reward claimed, `0n` when none had accrued
   */
  exit(caller: Address): Amount {
    return this.execute("exit", caller, { pausable: true }, (events) => {
      this.rewards.checkpoint(caller);
      const position = this.book.get(caller);
      this.recordWithdrawal(
        events,
        this.ledger.applyWithdraw(caller, position.assetBalance, position.shareBalance, caller, caller),
      );
      return position.rewardAccrued > 0n ? this.payReward(events, caller) : 0n;
    });
  }

  /**
   * Pay out the caller's accrued reward.
   *
   * @returns Reward claimed
   */
  claimReward(caller: Address): Amount {
    return this.execute("claimReward", caller, {}, (events) => {
      this.rewards.checkpoint(caller);
      return this.payReward(events, caller);
    });
  }

  /**
   * Shares are not transferable.
   */
  transferShares(caller: Address, to: Address, shares: Amount): never {
    return this.ledger.transferShares(caller, to, shares);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a new reward window funded with `amount`. The reward must
   * already be in the vault's custody.
   */
  notifyReward(caller: Address, amount: Amount): void {
    this.execute("notifyReward", caller, { role: "rewardsDistributor" }, (events) => {
      this.rewards.checkpoint(null);
      const result = this.epochs.notifyReward(amount, this.rewardAsset.balanceOf(this.address));
      events.record("vault.reward_added", {
        amount: toAmountString(result.amount),
        leftover: toAmountString(result.leftover),
        rewardRate: toAmountString(result.rewardRate),
        periodFinish: toAmountString(result.periodFinish),
      });
    });
  }

  setRewardsDuration(caller: Address, rewardsDuration: bigint): void {
    this.execute("setRewardsDuration", caller, { role: "owner" }, (events) => {
      this.epochs.setRewardsDuration(rewardsDuration);
      events.record("vault.rewards_duration_updated", {
        rewardsDuration: rewardsDuration.toString(),
      });
    });
  }

  /**
   * Send a token held by the vault to the owner. The deposit asset is
   * never recoverable.
   */
  recoverForeignAsset(caller: Address, token: FungibleAsset, amount: Amount): void {
    this.execute("recoverForeignAsset", caller, { role: "owner", touches: [token] }, (events) => {
      if (token.id === this.depositAsset.id) {
        throw new VaultError(
          "FORBIDDEN_ASSET_RECOVERY",
          `The deposit asset ${token.symbol} cannot be recovered`,
        );
      }
      token.transfer(this.address, this.owner, amount);
      events.record("vault.foreign_asset_recovered", {
        token: token.id,
        amount: toAmountString(amount),
        recipient: this.owner,
      });
    });
  }

  setPaused(caller: Address, paused: boolean): void {
    this.execute("setPaused", caller, { role: "owner" }, (events) => {
      this.flags = { ...this.flags, paused };
      events.record(paused ? "vault.paused" : "vault.unpaused", { account: caller });
    });
  }

  setRewardsDistributor(caller: Address, distributor: Address): void {
    this.execute("setRewardsDistributor", caller, { role: "owner" }, (events) => {
      const previous = this.flags.rewardsDistributor;
      this.flags = { ...this.flags, rewardsDistributor: distributor };
      events.record("vault.rewards_distributor_updated", { previous, distributor });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  get isPaused(): boolean {
    return this.flags.paused;
  }

  get rewardsDistributor(): Address {
    return this.flags.rewardsDistributor;
  }

  totalAssets(): Amount {
    return this.book.totals.totalManagedAssets;
  }

  totalShares(): Amount {
    return this.book.totals.totalShares;
  }

  assetBalanceOf(account: Address): Amount {
    return this.book.get(account).assetBalance;
  }

  shareBalanceOf(account: Address): Amount {
    return this.book.get(account).shareBalance;
  }

  earned(account: Address): Amount {
    return this.rewards.earned(account);
  }

  rewardPerShare(): bigint {
    return this.rewards.rewardPerShare();
  }

  lastTimeRewardApplicable(): Timestamp {
    return this.epochs.currentApplicableTime();
  }

  rewardForDuration(): Amount {
    return this.epochs.rewardForDuration();
  }

  totalRewardsDistributed(): Amount {
    return this.rewards.state().totalRewardsDistributed;
  }

  epoch(): EpochState {
    return this.epochs.state();
  }

  maxDeposit(_account: Address): Amount {
    return this.flags.paused ? 0n : UNBOUNDED;
  }

  maxMint(_account: Address): Amount {
    return this.flags.paused ? 0n : UNBOUNDED;
  }

  maxWithdraw(account: Address): Amount {
    return this.flags.paused ? 0n : this.book.get(account).assetBalance;
  }

  maxRedeem(account: Address): Amount {
    return this.flags.paused ? 0n : this.book.get(account).shareBalance;
  }

  previewDeposit(assets: Amount, account: Address): Amount {
    return this.ledger.convertDeposit(assets, account);
  }

  previewMint(shares: Amount, account: Address): Amount {
    return this.ledger.convertMint(shares, account);
  }

  previewWithdraw(assets: Amount, account: Address): Amount {
    return this.ledger.convertWithdraw(assets, account);
  }

  previewRedeem(shares: Amount, account: Address): Amount {
    return this.ledger.convertRedeem(shares, account);
  }

  account(address: Address): AccountView {
    return this.toView(this.book.get(address));
  }

  accounts(): readonly AccountView[] {
    return this.book.getAll().map((state) => this.toView(state));
  }

  reconcile(): ReconciliationResult {
    return this.book.reconcile();
  }

  summary(): VaultView {
    return {
      address: this.address,
      owner: this.owner,
      rewardsDistributor: this.flags.rewardsDistributor,
      depositAsset: this.depositAsset.id,
      rewardAsset: this.rewardAsset.id,
      paused: this.flags.paused,
      totalAssets: this.totalAssets(),
      totalShares: this.totalShares(),
      rewardPerShare: this.rewardPerShare(),
      totalRewardsDistributed: this.totalRewardsDistributed(),
      lastTimeRewardApplicable: this.lastTimeRewardApplicable(),
      rewardForDuration: this.rewardForDuration(),
      epoch: this.epoch(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pipeline
  // ───────────────────────────────────────────────────────────────────────

  private execute<T>(
    operation: VaultOperation,
    caller: Address,
    policy: OperationPolicy,
    body: (events: EventRecorder) => T,
  ): T {
    this.lock.acquire(operation);
    try {
      if (policy.role !== undefined) {
        requireRole(operation, caller, policy.role, this.roleHolder(policy.role));
      }
      if (policy.pausable === true) {
        requireNotPaused(operation, this.flags.paused);
      }

      const extra = transactionalAssets(policy.touches ?? []);
      const transaction = openTransaction([...this.participants, ...extra]);
      const events = new EventRecorder(
        { actor: caller, correlationId: this.generateId(), time: this.clock.now() },
        this.generateId,
      );

      let result: T;
      try {
        result = body(events);
      } catch (err) {
        transaction.rollback();
        throw err;
      }

      this.commit(events.events);
      return result;
    } finally {
      this.lock.release();
    }
  }

  private roleHolder(role: VaultRole): Address {
    return role === "owner" ? this.owner : this.flags.rewardsDistributor;
  }

  /** Runs under the lock; the store reports subscriber failures itself. */
  private commit(events: readonly DomainEvent[]): void {
    if (this.eventStore === undefined || events.length === 0) return;
    this.eventStore.append(vaultStreamId(this.address), events);
  }

  private payReward(events: EventRecorder, account: Address): Amount {
    const claim = this.rewards.claim(account);
    events.record("vault.reward_paid", {
      account,
      reward: toAmountString(claim.reward),
      totalRewardsDistributed: toAmountString(claim.totalRewardsDistributed),
    });
    return claim.reward;
  }

  private recordWithdrawal(events: EventRecorder, record: WithdrawalRecord): void {
    events.record("vault.withdrawn", {
      caller: record.caller,
      receiver: record.receiver,
      owner: record.owner,
      assets: toAmountString(record.assets),
      shares: toAmountString(record.shares),
      ...totalsPayload(record.totals),
    });
  }

  private toView(state: AccountState): AccountView {
    return {
      ...state,
      earned: this.rewards.earned(state.address),
      maxWithdraw: this.maxWithdraw(state.address),
      maxRedeem: this.maxRedeem(state.address),
    };
  }
}

function transactionalAssets(
  assets: readonly FungibleAsset[],
): (FungibleAsset & Transactional)[] {
  return assets.filter((asset): asset is FungibleAsset & Transactional => isTransactional(asset));
}

function totalsPayload(totals: LedgerTotals): { totalAssets: string; totalShares: string } {
  return {
    totalAssets: toAmountString(totals.totalManagedAssets),
    totalShares: toAmountString(totals.totalShares),
  };
}

