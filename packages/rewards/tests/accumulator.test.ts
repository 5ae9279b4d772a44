/**
 * Tests for RewardAccumulator — reward-per-share accrual,
 * checkpoints and claims.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccountBook, SCALE } from "@stakeflow/ledger";
import { EpochController } from "../src/epoch.js";
import { RewardAccumulator } from "../src/accumulator.js";
import { RewardError } from "../src/types.js";
import { ManualClock, TestAsset, thrown } from "./helpers.js";

describe("RewardAccumulator", () => {
  let clock: ManualClock;
  let book: AccountBook;
  let epoch: EpochController;
  let asset: TestAsset;
  let rewards: RewardAccumulator;

  function fund(amount: bigint): void {
    asset.mint("vault", amount);
    rewards.checkpoint(null);
    epoch.notifyReward(amount, asset.balanceOf("vault"));
  }

  beforeEach(() => {
    clock = new ManualClock(1_000n);
    book = new AccountBook();
    epoch = new EpochController(clock, 100n);
    asset = new TestAsset();
    rewards = new RewardAccumulator({ epoch, book, rewardAsset: asset, custodian: "vault" });
  });

  // ─── Accrual ────────────────────────────────────────────────────────

  describe("rewardPerShare", () => {
    it("does not accrue while the pool is empty", () => {
      fund(1_000n);
      clock.advance(50n);
      expect(rewards.rewardPerShare()).toBe(0n);
    });

    it("accrues rate * elapsed * SCALE / totalShares", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n); // rate 10/s
      clock.advance(10n);
      expect(rewards.rewardPerShare()).toBe(SCALE);
    });

    it("stops at periodFinish", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10_000n);
      // (1100 - 1000) * 10 * 1e18 / 100
      expect(rewards.rewardPerShare()).toBe(10n * SCALE);
    });

    it("ignores a clock that moved backwards", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.time = 900n;
      expect(rewards.rewardPerShare()).toBe(0n);
    });
  });

  describe("earned", () => {
    it("is a pure read", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10n);
      expect(rewards.earned("alice")).toBe(100n);
      expect(rewards.earned("alice")).toBe(100n);
      expect(rewards.state().rewardPerShareStored).toBe(0n);
      expect(book.get("alice").rewardAccrued).toBe(0n);
    });

    it("splits the stream by share of the pool", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10n);

      rewards.checkpoint("alice");
      rewards.checkpoint("bob");
      book.credit("bob", 300n, 300n);

      clock.advance(10n);
      expect(rewards.earned("alice")).toBe(125n);
      expect(rewards.earned("bob")).toBe(75n);

      clock.advance(1_000n);
      // the remaining 90s at 10/s split 1:3
      expect(rewards.earned("alice")).toBe(325n);
      expect(rewards.earned("bob")).toBe(675n);
    });

    it("streams the full top-up to a single staker over one window", () => {
      const weekly = new EpochController(clock);
      const stream = new RewardAccumulator({
        epoch: weekly,
        book,
        rewardAsset: asset,
        custodian: "vault",
      });
      const total = 604_800n * SCALE;
      asset.mint("vault", total);
      book.credit("staker", 1_000n * SCALE, 1_000n * SCALE);

      stream.checkpoint(null);
      weekly.notifyReward(total, asset.balanceOf("vault"));
      expect(weekly.state().rewardRate).toBe(SCALE);

      clock.advance(604_800n);
      expect(stream.earned("staker")).toBe(total);
    });
  });

  // ─── Checkpoint ─────────────────────────────────────────────────────

  describe("checkpoint", () => {
    it("freezes the account's reward at the current accumulator", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10n);

      const stored = rewards.checkpoint("alice");

      expect(stored).toBe(SCALE);
      expect(book.get("alice").rewardAccrued).toBe(100n);
      expect(book.get("alice").rewardPerShareCheckpoint).toBe(SCALE);
      expect(epoch.state().lastUpdateTime).toBe(1_010n);
    });

    it("with null advances the accumulator only", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10n);

      rewards.checkpoint(null);

      expect(rewards.state().rewardPerShareStored).toBe(SCALE);
      expect(book.get("alice").rewardAccrued).toBe(0n);
      expect(rewards.earned("alice")).toBe(100n);
    });

    it("moves lastUpdateTime while the pool is empty", () => {
      fund(1_000n);
      clock.advance(25n);
      rewards.checkpoint(null);
      expect(epoch.state().lastUpdateTime).toBe(1_025n);
      expect(rewards.state().rewardPerShareStored).toBe(0n);
    });
  });

  // ─── Claim ──────────────────────────────────────────────────────────

  describe("claim", () => {
    it("fails with nothing accrued", () => {
      const err = thrown(() => rewards.claim("alice"));
      expect(err).toBeInstanceOf(RewardError);
      expect(err).toMatchObject({ code: "NOTHING_TO_CLAIM" });
    });

    it("pays out and zeroes the accrued reward", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10n);
      rewards.checkpoint("alice");

      const record = rewards.claim("alice");

      expect(record).toEqual({ account: "alice", reward: 100n, totalRewardsDistributed: 100n });
      expect(asset.balanceOf("alice")).toBe(100n);
      expect(asset.balanceOf("vault")).toBe(900n);
      expect(book.get("alice").rewardAccrued).toBe(0n);
      expect(rewards.earned("alice")).toBe(0n);
    });

    it("propagates a failed transfer", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10n);
      rewards.checkpoint("alice");
      asset.balances.set("vault", 0n);

      expect(() => rewards.claim("alice")).toThrow("insufficient funds: vault");
    });
  });

  describe("begin / rollback", () => {
    it("restores the accumulator", () => {
      book.credit("alice", 100n, 100n);
      fund(1_000n);
      clock.advance(10n);
      const tx = rewards.begin();
      rewards.checkpoint(null);
      tx.rollback();
      expect(rewards.state()).toEqual({ rewardPerShareStored: 0n, totalRewardsDistributed: 0n });
    });
  });
});
