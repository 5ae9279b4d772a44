/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting the
 * HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { VaultService } from "./services/vault-service.js";
import type { VaultServiceConfig } from "./services/vault-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { ErrorReporter } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, openAccessMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createAssetRoutes } from "./routes/assets.js";
import { createOracleRoutes } from "./routes/oracle.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VaultServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Sees every error answered with a 500 */
  readonly onUnexpectedError?: ErrorReporter;
  /** Auth configuration. When omitted, the API runs in unsecured mode. */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VaultService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", openAccessMiddleware(options.serviceConfig.owner));
  }

  app.route("/api/v1/vault", createVaultRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/assets", createAssetRoutes());
  app.route("/api/v1/oracle", createOracleRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
