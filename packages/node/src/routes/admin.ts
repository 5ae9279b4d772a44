/**
 * Administrative routes.
 *
 * POST /api/v1/admin/notify-reward        — Fund a reward window (distributor)
 * POST /api/v1/admin/rewards-duration     — Set the next window length (owner)
 * POST /api/v1/admin/recover              — Sweep a foreign asset (owner)
 * POST /api/v1/admin/pause                — Pause or unpause (owner)
 * POST /api/v1/admin/rewards-distributor  — Replace the distributor (owner)
 *
 * The key needs the admin permission; the vault then checks that the
 * key's account holds the operation's role.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  NotifyRewardSchema,
  PauseSchema,
  RecoverSchema,
  RewardsDistributorSchema,
  RewardsDurationSchema,
  toEpochResponse,
} from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/notify-reward", validateBody(NotifyRewardSchema), (c) => {
    const { vault } = c.get("service");
    const body = c.get("validatedBody");

    vault.notifyReward(c.get("auth").account, body.amount);
    return c.json({ data: toEpochResponse(vault.epoch()) });
  });

  routes.post("/rewards-duration", validateBody(RewardsDurationSchema), (c) => {
    const { vault } = c.get("service");
    const body = c.get("validatedBody");

    vault.setRewardsDuration(c.get("auth").account, body.rewardsDuration);
    return c.json({ data: toEpochResponse(vault.epoch()) });
  });

  routes.post("/recover", validateBody(RecoverSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("auth").account;
    const body = c.get("validatedBody");

    service.recover(caller, body.symbol, body.amount);
    return c.json({
      data: {
        symbol: body.symbol,
        amount: body.amount.toString(),
        recipient: service.vault.owner,
      },
    });
  });

  routes.post("/pause", validateBody(PauseSchema), (c) => {
    const { vault } = c.get("service");
    const body = c.get("validatedBody");

    vault.setPaused(c.get("auth").account, body.paused);
    return c.json({ data: { paused: vault.isPaused } });
  });

  routes.post("/rewards-distributor", validateBody(RewardsDistributorSchema), (c) => {
    const { vault } = c.get("service");
    const body = c.get("validatedBody");

    vault.setRewardsDistributor(c.get("auth").account, body.distributor);
    return c.json({ data: { rewardsDistributor: vault.rewardsDistributor } });
  });

  return routes;
}
