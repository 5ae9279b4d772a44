/**
 * Staking routes.
 *
 * GET  /api/v1/vault           — Totals, epoch and pause state
 * POST /api/v1/vault/deposit   — Stake assets for shares
 * POST /api/v1/vault/mint      — Stake for an exact share amount
 * POST /api/v1/vault/withdraw  — Unstake an exact asset amount
 * POST /api/v1/vault/redeem    — Burn an exact share amount
 * POST /api/v1/vault/exit      — Withdraw everything and claim
 * POST /api/v1/vault/claim     — Claim accrued rewards
 *
 * Every operation runs as the authenticated account.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  MintSchema,
  RedeemSchema,
  WithdrawSchema,
  toVaultResponse,
} from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const { vault } = c.get("service");
    return c.json({ data: toVaultResponse(vault.summary()) });
  });

  routes.post(
    "/deposit",
    requirePermission("write"),
    validateBody(DepositSchema),
    (c) => {
      const { vault } = c.get("service");
      const caller = c.get("auth").account;
      const body = c.get("validatedBody");
      const receiver = body.receiver ?? caller;

      const shares = vault.deposit(caller, body.assets, receiver);
      return c.json(
        { data: { receiver, assets: body.assets.toString(), shares: shares.toString() } },
        201,
      );
    },
  );

  routes.post(
    "/mint",
    requirePermission("write"),
    validateBody(MintSchema),
    (c) => {
      const { vault } = c.get("service");
      const caller = c.get("auth").account;
      const body = c.get("validatedBody");
      const receiver = body.receiver ?? caller;

      const assets = vault.mint(caller, body.shares, receiver);
      return c.json(
        { data: { receiver, assets: assets.toString(), shares: body.shares.toString() } },
        201,
      );
    },
  );

  routes.post(
    "/withdraw",
    requirePermission("write"),
    validateBody(WithdrawSchema),
    (c) => {
      const { vault } = c.get("service");
      const caller = c.get("auth").account;
      const body = c.get("validatedBody");
      const receiver = body.receiver ?? caller;
      const owner = body.owner ?? caller;

      const shares = vault.withdraw(caller, body.assets, receiver, owner);
      return c.json({
        data: { owner, receiver, assets: body.assets.toString(), shares: shares.toString() },
      });
    },
  );

  routes.post(
    "/redeem",
    requirePermission("write"),
    validateBody(RedeemSchema),
    (c) => {
      const { vault } = c.get("service");
      const caller = c.get("auth").account;
      const body = c.get("validatedBody");
      const receiver = body.receiver ?? caller;
      const owner = body.owner ?? caller;

      const assets = vault.redeem(caller, body.shares, receiver, owner);
      return c.json({
        data: { owner, receiver, assets: assets.toString(), shares: body.shares.toString() },
      });
    },
  );

  routes.post("/exit", requirePermission("write"), (c) => {
    const { vault } = c.get("service");
    const caller = c.get("auth").account;
    const assets = vault.assetBalanceOf(caller);

    const reward = vault.exit(caller);
    return c.json({
      data: { account: caller, assets: assets.toString(), reward: reward.toString() },
    });
  });

  routes.post("/claim", requirePermission("write"), (c) => {
    const { vault } = c.get("service");
    const caller = c.get("auth").account;

    const reward = vault.claimReward(caller);
    return c.json({ data: { account: caller, reward: reward.toString() } });
  });

  return routes;
}
