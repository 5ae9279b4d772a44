/**
 * Event query routes.
 *
 * GET /api/v1/events — Stored vault events in commit order (cursor
 *                      pagination, optional `?type=` filter)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, toEventResponse } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const events = service.readEvents(
      query.type !== undefined ? { types: [query.type] } : undefined,
    );

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json({
      data: result.data.map(toEventResponse),
      pagination: result.pagination,
    });
  });

  return routes;
}
