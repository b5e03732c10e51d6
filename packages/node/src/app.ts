/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Tests create the
 * app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import type { StakingService } from "./services/staking-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createRewardsRoutes } from "./routes/rewards.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: StakingService;

  /** Request and internal-error logging. Omitted in most tests. */
  readonly logger?: Logger | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StakingService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service, logger } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (logger !== undefined) {
    app.use("*", loggerMiddleware(logger));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(
    createErrorHandler((err) => {
      logger?.error({ err }, "Unhandled error");
    }),
  );
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1/rewards", createRewardsRoutes());
  app.route("/api/v1/vaults", createVaultRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
