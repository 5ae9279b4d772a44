/**
 * @stakeflow/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ApiKeyRecord } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Vault wiring
  VAULT_ADDRESS: z.string().min(1).default("vault"),
  OWNER_ADDRESS: z.string().min(1).default("owner"),
  DISTRIBUTOR_ADDRESS: z.string().min(1).default("distributor"),
  DEPOSIT_ASSET: z.string().min(1).default("LP"),
  REWARD_ASSET: z.string().min(1).default("RWD"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  REWARDS_DURATION: z.coerce.bigint().positive().default(604800n),
  DEFAULT_BOOST_MULTIPLIER: z.coerce.bigint().nonnegative().default(1n),
}).refine((config) => config.REWARD_ASSET !== config.DEPOSIT_ASSET, {
  message: "REWARD_ASSET must differ from DEPOSIT_ASSET",
  path: ["REWARD_ASSET"],
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:account1,key2:role2:account2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, account] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || account === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:account`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (account === "") {
      throw new Error("Account cannot be empty in API_KEYS");
    }

    keys.push({ key, role, account });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
