/**
 * Authentication middleware.
 *
 * Resolves the X-Api-Key header against the configured key registry.
 * On success, sets `c.set("auth", authContext)`; the context carries the
 * vault account the request acts as. On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_HEADER = "X-Account";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create authentication middleware.
 *
 * Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", {
      type: "api-key",
      identity: record.key,
      role: record.role,
      account: record.account,
    });
    return next();
  };
}

/**
 * Unsecured mode (tests, dev): every request is an admin acting as the
 * account named in X-Account, or `fallbackAccount` without one.
 */
export function openAccessMiddleware(
  fallbackAccount: string,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(ACCOUNT_HEADER) ?? fallbackAccount;
    c.set("auth", {
      type: "open",
      identity: account,
      role: "admin",
      account,
    });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
