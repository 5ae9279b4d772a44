/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { VaultService } from "../services/vault-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Stakeflow app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The vault service the app was created with */
    service: VaultService;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  };
}

/**
 * Environment of a handler that runs after `validateBody(schema)`.
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    validatedBody: T;
  };
}
