/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: event hash chain intact and the share
 *               ledger's totals equal the sums over its accounts
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string;
}

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { integrity, reconciliation } = c.get("service").checkHealth();

    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, errors=${integrity.errors.length}, lastVerifiedPosition=${integrity.lastVerifiedPosition}`,
        };

    const ledger: SubsystemStatus = reconciliation.balanced
      ? { status: "ok" }
      : {
          status: "down",
          detail: `recorded=${reconciliation.recorded.totalManagedAssets.toString()}/${reconciliation.recorded.totalShares.toString()}, computed=${reconciliation.computed.totalManagedAssets.toString()}/${reconciliation.computed.totalShares.toString()}`,
        };

    const ready = eventStore.status === "ok" && ledger.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { eventStore, ledger },
        accounts: reconciliation.accountCount,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
