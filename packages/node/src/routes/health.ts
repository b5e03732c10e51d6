/**
 * Health check routes.
 *
 * GET /health — Liveness plus audit log integrity. 503 when the hash
 * chain no longer verifies.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const service = c.get("service");
    const integrity = service.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ok" : "degraded",
      rewardsNonce: service.consensus.nonce.toString(),
      vaults: service.listVaults().length,
      events: service.auditLog.size,
      timestamp: new Date().toISOString(),
    };

    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
