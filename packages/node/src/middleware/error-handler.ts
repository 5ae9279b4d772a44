/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain error codes (LedgerError, RewardError, VaultError,
 * TokenError, EventStoreError, ServiceError) to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Ledger errors
  ZERO_AMOUNT: 400,
  INVALID_AMOUNT: 400,
  RECEIVER_MISMATCH: 400,
  NOT_OWNER: 403,
  INSUFFICIENT_BALANCE: 422,
  SHARES_NON_TRANSFERABLE: 422,

  // Reward errors
  NOTHING_TO_CLAIM: 422,
  REWARD_RATE_TOO_HIGH: 422,
  EPOCH_ACTIVE: 409,
  INVALID_DURATION: 400,

  // Vault errors
  UNAUTHORIZED: 403,
  REENTRANCY_BLOCKED: 409,
  PAUSED: 409,
  FORBIDDEN_ASSET_RECOVERY: 403,

  // Token errors
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_ALLOWANCE: 422,

  // Service errors
  ASSET_NOT_FOUND: 404,
  ASSET_EXISTS: 409,
};

function getErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

export type ErrorReporter = (err: Error, c: Context) => void;

/**
 * Create the global error handler, registered as Hono's onError handler.
 *
 * `report` sees every error that maps to a 500.
 */
export function createErrorHandler(
  report?: ErrorReporter,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = getErrorCode(err);
    const status = code !== undefined ? STATUS_MAP[code] : undefined;

    if (code === undefined || status === undefined) {
      report?.(err, c);
      // Don't leak internal details
      return c.json(
        createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    return c.json(createErrorEnvelope(code, err.message), status);
  };
}

export const handleError = createErrorHandler();
