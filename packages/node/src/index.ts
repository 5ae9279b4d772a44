/**
 * @stakeflow/node — HTTP service for the staking vault.
 */

export { VaultService, ServiceError } from "./services/vault-service.js";
export type {
  VaultServiceConfig,
  ServiceErrorCode,
  HealthReport,
  AssetBalance,
} from "./services/vault-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
