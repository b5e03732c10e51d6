/**
 * Rewards snapshot routes.
 *
 * GET  /api/v1/rewards — Consensus state and latest snapshot
 * POST /api/v1/rewards — Submit a signed snapshot
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SubmitSnapshotSchema } from "../types/dto.js";
import { snapshotView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createRewardsRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const { consensus, attestors } = service;
    const latest = consensus.latestSnapshot();

    return c.json({
      data: {
        rewardsRoot: consensus.rewardsRoot,
        previousRewardsRoot: consensus.previousRewardsRoot,
        nonce: consensus.nonce.toString(),
        lastAcceptedTimestamp: consensus.lastAcceptedTimestamp.toString(),
        canUpdate: consensus.canUpdate(),
        quorum: attestors.quorum,
        attestors: attestors.getAttestors(),
        latest: latest === undefined ? null : snapshotView(latest),
      },
    });
  });

  routes.post("/", validateBody(SubmitSnapshotSchema), async (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const snapshot = await service.submitSnapshot(body);
    return c.json({ data: snapshotView(snapshot) }, 201);
  });

  return routes;
}
