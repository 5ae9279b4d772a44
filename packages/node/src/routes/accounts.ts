/**
 * Account routes.
 *
 * GET /api/v1/accounts           — Every account with a position
 * GET /api/v1/accounts/:address  — Balances, earned, limits; with
 *                                  `?amount=` also the four previews
 */

import { Hono } from "hono";
import type { StakingVault } from "@stakeflow/vault";
import type { AppEnv } from "../types/api-contract.js";
import { AccountQuerySchema, toAccountResponse } from "../types/dto.js";
import type { AccountResponse } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";

export function describeAccount(
  vault: StakingVault,
  address: string,
  amount?: bigint,
): AccountResponse {
  const limits = {
    maxDeposit: vault.maxDeposit(address),
    maxMint: vault.maxMint(address),
  };
  const preview =
    amount === undefined
      ? undefined
      : {
          amount,
          deposit: vault.previewDeposit(amount, address),
          mint: vault.previewMint(amount, address),
          withdraw: vault.previewWithdraw(amount, address),
          redeem: vault.previewRedeem(amount, address),
        };
  return toAccountResponse(vault.account(address), limits, preview);
}

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/", (c) => {
    const { vault } = c.get("service");
    const data = vault.accounts().map((view) => describeAccount(vault, view.address));
    return c.json({ data });
  });

  routes.get("/:address", (c) => {
    const { vault } = c.get("service");

    const queryResult = AccountQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    return c.json({
      data: describeAccount(vault, c.req.param("address"), queryResult.data.amount),
    });
  });

  return routes;
}
