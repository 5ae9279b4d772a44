/**
 * In-memory oracle routes for development and tests.
 *
 * GET /api/v1/oracle/accounts/:address  — Boost position
 * PUT /api/v1/oracle/accounts/:address  — Set multiplier and locked principal (admin)
 * GET /api/v1/oracle/reserves           — Pool reserves and LP supply
 * PUT /api/v1/oracle/reserves           — Replace reserves and LP supply (admin)
 */

import { Hono } from "hono";
import type { BoostPosition } from "@stakeflow/vault";
import type { AppEnv } from "../types/api-contract.js";
import { BoostPositionSchema, ReservesSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

function toPositionResponse(address: string, position: BoostPosition) {
  return {
    address,
    multiplier: position.multiplier.toString(),
    lockedPrincipal: position.lockedPrincipal.toString(),
  };
}

export function createOracleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/accounts/:address", requirePermission("read"), (c) => {
    const address = c.req.param("address");
    const position = c.get("service").oracle.position(address);
    return c.json({ data: toPositionResponse(address, position) });
  });

  routes.put(
    "/accounts/:address",
    requirePermission("admin"),
    validateBody(BoostPositionSchema),
    (c) => {
      const address = c.req.param("address");
      const position = c
        .get("service")
        .setBoostPosition(address, c.get("validatedBody"));
      return c.json({ data: toPositionResponse(address, position) });
    },
  );

  routes.get("/reserves", requirePermission("read"), (c) => {
    const { reserves } = c.get("service");
    const { principalReserve, pairedReserve } = reserves.getReserves();
    return c.json({
      data: {
        principalReserve: principalReserve.toString(),
        pairedReserve: pairedReserve.toString(),
        totalSupply: reserves.totalSupply().toString(),
      },
    });
  });

  routes.put(
    "/reserves",
    requirePermission("admin"),
    validateBody(ReservesSchema),
    (c) => {
      const body = c.get("validatedBody");
      c.get("service").setReserves(
        { principalReserve: body.principalReserve, pairedReserve: body.pairedReserve },
        body.totalSupply,
      );
      return c.json({
        data: {
          principalReserve: body.principalReserve.toString(),
          pairedReserve: body.pairedReserve.toString(),
          totalSupply: body.totalSupply.toString(),
        },
      });
    },
  );

  return routes;
}
