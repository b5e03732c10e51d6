/**
 * @stakecore/node — Entry point.
 *
 * Loads config, composes the service, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseOracles, parseVaults } from "./config.js";
import { createApp } from "./app.js";
import { StakingService } from "./services/staking-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const oracles = parseOracles(config.ORACLES);
  const vaults = parseVaults(config.VAULTS);
  if (oracles.length === 0) {
    logger.warn("No oracles configured; snapshot submissions will be rejected");
  }

  const service = new StakingService({
    domain: { chainId: config.CHAIN_ID, verifyingContract: config.VERIFYING_CONTRACT },
    rewardsUpdateDelay: config.REWARDS_UPDATE_DELAY,
    exitQueueUpdateDelay: config.EXIT_QUEUE_UPDATE_DELAY,
    minOracles: config.REWARDS_MIN_ORACLES,
    oracles,
    vaults,
    feeRecipient: config.FEE_RECIPIENT,
    sharedEscrow: config.SHARED_ESCROW,
    logger: logger.child({ component: "service" }),
  });

  const { app } = createApp({ service, logger: logger.child({ component: "http" }) });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      oracles: oracles.length,
      quorum: service.attestors.quorum,
      vaults: vaults.length,
    },
    "Staking node started",
  );

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

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
