/**
 * @ubistream/node: Entry point.
 *
 * Loads config, builds the engine, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { InMemoryRegistry, formatUnits } from "@ubistream/accrual";
import { UbiEngine } from "@ubistream/delegation";
import { loadConfig, parseApiKeys, parseVerifiedAddresses, toEngineConfig } from "./config.js";
import { createApp } from "./app.js";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Bootstrap
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const registry = new InMemoryRegistry(parseVerifiedAddresses(config.VERIFIED_ADDRESSES));
  const engineConfig = toEngineConfig(config);
  const engine = new UbiEngine(engineConfig, {
    registry,
    onListenerError: (err, { sequence, event }) => {
      logger.error({ err, sequence, type: event.type }, "Event listener failed");
    },
  });

  const apiKeys = new Map<string, ApiKeyRecord>();
  for (const record of parseApiKeys(config.API_KEYS)) {
    apiKeys.set(record.key, record);
  }
  if (apiKeys.size === 0) {
    logger.warn("API_KEYS is empty: every /api request will be rejected");
  }

  engine.subscribe(({ sequence, event }) => {
    logger.info({ sequence, ...event }, `event ${event.type}`);
  });

  const { app } = createApp({
    engine,
    registry,
    auth: { apiKeys },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
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
      governor: config.GOVERNOR_ADDRESS,
      accruedPerSecond: formatUnits(engineConfig.accruedPerSecond, config.TOKEN_DECIMALS),
      verified: registry.verifiedAddresses().length,
      apiKeys: apiKeys.size,
    },
    "ubistream node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
