/**
 * In-memory asset routes for development and tests.
 *
 * GET  /api/v1/assets                            — Registered assets
 * POST /api/v1/assets                            — Register an asset (admin)
 * GET  /api/v1/assets/:symbol/balances/:address  — Balance and vault allowance
 * POST /api/v1/assets/:symbol/faucet             — Mint to an address (admin)
 * POST /api/v1/assets/:symbol/approve            — Approve a spender; the vault by default
 */

import { Hono } from "hono";
import type { InMemoryToken } from "@stakeflow/vault";
import type { AppEnv } from "../types/api-contract.js";
import type { AssetBalance } from "../services/vault-service.js";
import { ApproveSchema, FaucetSchema, RegisterAssetSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

function toAssetResponse(token: InMemoryToken) {
  return {
    symbol: token.symbol,
    decimals: token.decimals,
    totalSupply: token.totalSupply.toString(),
  };
}

function toBalanceResponse(balance: AssetBalance) {
  return {
    symbol: balance.symbol,
    holder: balance.holder,
    balance: balance.balance.toString(),
    vaultAllowance: balance.vaultAllowance.toString(),
  };
}

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const service = c.get("service");
    return c.json({ data: service.listAssets().map(toAssetResponse) });
  });

  routes.post(
    "/",
    requirePermission("admin"),
    validateBody(RegisterAssetSchema),
    (c) => {
      const body = c.get("validatedBody");
      const token = c.get("service").registerAsset(body.symbol, body.decimals);
      return c.json({ data: toAssetResponse(token) }, 201);
    },
  );

  routes.get("/:symbol/balances/:address", requirePermission("read"), (c) => {
    const balance = c
      .get("service")
      .balanceOf(c.req.param("symbol"), c.req.param("address"));
    return c.json({ data: toBalanceResponse(balance) });
  });

  routes.post(
    "/:symbol/faucet",
    requirePermission("admin"),
    validateBody(FaucetSchema),
    (c) => {
      const body = c.get("validatedBody");
      const balance = c
        .get("service")
        .faucet(c.req.param("symbol"), body.to, body.amount);
      return c.json({ data: toBalanceResponse(balance) });
    },
  );

  routes.post(
    "/:symbol/approve",
    requirePermission("write"),
    validateBody(ApproveSchema),
    (c) => {
      const service = c.get("service");
      const owner = c.get("auth").account;
      const body = c.get("validatedBody");
      const spender = body.spender ?? service.address;

      service.approve(c.req.param("symbol"), owner, spender, body.amount);
      return c.json({
        data: { owner, spender, amount: body.amount.toString() },
      });
    },
  );

  return routes;
}
