/**
 * Tests for the administrative routes.
 *
 * Verifies:
 * - The admin permission and the vault role are both required
 * - Reward funding, window length, recovery, pause and distributor changes
 */

import { describe, it, expect } from "vitest";
import { call, createTestApp } from "./setup.js";
import { fundRewards, stake } from "./helpers.js";
import type { ErrorBody } from "./helpers.js";
import type { AccountResponse, VaultResponse } from "../src/types/dto.js";

interface Data<T> {
  data: T;
}

describe("POST /api/v1/admin/notify-reward", () => {
  it("needs the distributor role, not just an admin key", async () => {
    const { app, service } = createTestApp();
    await call(app, "owner", "POST", "/api/v1/assets/RWD/faucet", { to: "vault", amount: "1000" });

    const res = await call<ErrorBody>(app, "owner", "POST", "/api/v1/admin/notify-reward", {
      amount: "1000",
    });

    expect(res.status).toBe(403);
    expect(res.body.error).toEqual({
      code: "UNAUTHORIZED",
      message: 'notifyReward requires the rewardsDistributor role; "owner" does not hold it',
    });
    expect(service.vault.epoch()).toEqual({
      rewardRate: 0n,
      periodFinish: 0n,
      rewardsDuration: 100n,
      lastUpdateTime: 0n,
    });
  });

  it("is closed to operators", async () => {
    const { app } = createTestApp();

    const res = await call<ErrorBody>(app, "alice", "POST", "/api/v1/admin/notify-reward", {
      amount: "1000",
    });

    expect(res.status).toBe(403);
    expect(res.body.error.code).toBe("FORBIDDEN");
  });

  it("refuses a rate the custody balance cannot cover", async () => {
    const { app } = createTestApp();

    const res = await call<ErrorBody>(app, "distributor", "POST", "/api/v1/admin/notify-reward", {
      amount: "1000",
    });

    expect(res.status).toBe(422);
    expect(res.body.error.code).toBe("REWARD_RATE_TOO_HIGH");
  });
});

describe("POST /api/v1/admin/rewards-duration", () => {
  it("changes the window length while idle", async () => {
    const { app } = createTestApp();

    const res = await call(app, "owner", "POST", "/api/v1/admin/rewards-duration", {
      rewardsDuration: "200",
    });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      data: { rewardRate: "0", periodFinish: "0", rewardsDuration: "200", lastUpdateTime: "0" },
    });
  });

  it("refuses while a window is running", async () => {
    const { app, clock } = createTestApp();
    await fundRewards(app, "1000");
    clock.advance(50n);

    const res = await call<ErrorBody>(app, "owner", "POST", "/api/v1/admin/rewards-duration", {
      rewardsDuration: "200",
    });

    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe("EPOCH_ACTIVE");
  });

  it("refuses a zero duration", async () => {
    const { app } = createTestApp();

    const res = await call<ErrorBody>(app, "owner", "POST", "/api/v1/admin/rewards-duration", {
      rewardsDuration: "0",
    });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("INVALID_DURATION");
  });
});

describe("POST /api/v1/admin/recover", () => {
  it("sweeps a foreign asset to the owner", async () => {
    const { app, service } = createTestApp();
    const registered = await call(app, "owner", "POST", "/api/v1/assets", { symbol: "DUST" });
    await call(app, "owner", "POST", "/api/v1/assets/DUST/faucet", { to: "vault", amount: "25" });

    const res = await call(app, "owner", "POST", "/api/v1/admin/recover", {
      symbol: "DUST",
      amount: "25",
    });

    expect(registered.status).toBe(201);
    expect(registered.body).toEqual({ data: { symbol: "DUST", decimals: 18, totalSupply: "0" } });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ data: { symbol: "DUST", amount: "25", recipient: "owner" } });
    expect(service.asset("DUST").balanceOf("owner")).toBe(25n);
    expect(service.asset("DUST").balanceOf("vault")).toBe(0n);
  });

  it("never releases the deposit asset", async () => {
    const { app, service } = createTestApp();
    await stake(app, "alice", "400");

    const res = await call<ErrorBody>(app, "owner", "POST", "/api/v1/admin/recover", {
      symbol: "LP",
      amount: "400",
    });

    expect(res.status).toBe(403);
    expect(res.body.error.code).toBe("FORBIDDEN_ASSET_RECOVERY");
    expect(service.asset("LP").balanceOf("vault")).toBe(400n);
  });

  it("answers 404 for an unknown asset", async () => {
    const { app } = createTestApp();

    const res = await call<ErrorBody>(app, "owner", "POST", "/api/v1/admin/recover", {
      symbol: "NOPE",
      amount: "1",
    });

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: "ASSET_NOT_FOUND", message: 'Unknown asset "NOPE"' });
  });
});

describe("POST /api/v1/admin/pause", () => {
  it("gates staking and zeroes the limits until unpaused", async () => {
    const { app } = createTestApp();
    await stake(app, "alice", "400");

    const paused = await call(app, "owner", "POST", "/api/v1/admin/pause", { paused: true });
    const deposit = await call<ErrorBody>(app, "alice", "POST", "/api/v1/vault/deposit", { assets: "1" });
    const account = await call<Data<AccountResponse>>(app, "alice", "GET", "/api/v1/accounts/alice");
    const claim = await call<ErrorBody>(app, "alice", "POST", "/api/v1/vault/claim");

    expect(paused.body).toEqual({ data: { paused: true } });
    expect(deposit.status).toBe(409);
    expect(deposit.body.error.code).toBe("PAUSED");
    expect(account.body.data).toMatchObject({
      maxDeposit: "0",
      maxMint: "0",
      maxWithdraw: "0",
      maxRedeem: "0",
    });
    // claiming is not gated; it fails for lack of reward
    expect(claim.body.error.code).toBe("NOTHING_TO_CLAIM");

    await call(app, "owner", "POST", "/api/v1/admin/pause", { paused: false });
    const withdraw = await call(app, "alice", "POST", "/api/v1/vault/withdraw", { assets: "400" });
    expect(withdraw.status).toBe(200);
  });

  it("validates the flag", async () => {
    const { app } = createTestApp();

    const res = await call<ErrorBody>(app, "owner", "POST", "/api/v1/admin/pause", { paused: "yes" });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /api/v1/admin/rewards-distributor", () => {
  it("hands the distributor role to a new account", async () => {
    const { app } = createTestApp();

    const res = await call(app, "owner", "POST", "/api/v1/admin/rewards-distributor", {
      distributor: "bob",
    });
    const stale = await call<ErrorBody>(app, "distributor", "POST", "/api/v1/admin/notify-reward", {
      amount: "0",
    });
    const vault = await call<Data<VaultResponse>>(app, "auditor", "GET", "/api/v1/vault");

    expect(res.body).toEqual({ data: { rewardsDistributor: "bob" } });
    expect(stale.status).toBe(403);
    expect(stale.body.error.code).toBe("UNAUTHORIZED");
    expect(vault.body.data.rewardsDistributor).toBe("bob");
  });
});
