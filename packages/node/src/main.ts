/**
 * @stakeflow/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode");
  }

  const eventLog = logger.child({ component: "vault-events" });

  const { app, service } = createApp({
    serviceConfig: {
      vaultAddress: config.VAULT_ADDRESS,
      owner: config.OWNER_ADDRESS,
      rewardsDistributor: config.DISTRIBUTOR_ADDRESS,
      depositAsset: config.DEPOSIT_ASSET,
      rewardAsset: config.REWARD_ASSET,
      decimals: config.ASSET_DECIMALS,
      rewardsDuration: config.REWARDS_DURATION,
      defaultBoostMultiplier: config.DEFAULT_BOOST_MULTIPLIER,
      onEvent: (stored) => {
        eventLog.info(
          {
            globalPosition: stored.globalPosition,
            correlationId: stored.event.metadata.correlationId,
            actor: stored.event.metadata.actor,
            payload: stored.event.payload,
          },
          stored.event.type,
        );
      },
      onSubscriberError: (err, stored) => {
        eventLog.error({ err, globalPosition: stored.globalPosition }, "Event subscriber failed");
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
    auth: authConfig,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      vault: config.VAULT_ADDRESS,
      depositAsset: config.DEPOSIT_ASSET,
      rewardAsset: config.REWARD_ASSET,
    },
    "Stakeflow node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.close();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
