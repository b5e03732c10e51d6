/**
 * Audit log routes.
 *
 * GET /api/v1/events?type=&fromPosition=&limit= — Recorded protocol events
 * GET /api/v1/events/integrity                  — Hash chain verification
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const query = c.req.valid("query");
    const events = c.get("service").queryEvents({
      type: query.type,
      fromPosition: query.fromPosition,
      limit: query.limit,
    });

    return c.json({ data: events, count: events.length });
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyIntegrity() });
  });

  return routes;
}
