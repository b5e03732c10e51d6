/**
 * Vault routes.
 *
 * GET  /api/v1/vaults/:vault                      — Vault books and reward records
 * POST /api/v1/vaults/:vault/deposits             — Deposit assets
 * POST /api/v1/vaults/:vault/redemptions          — Redeem before collateralization
 * POST /api/v1/vaults/:vault/stake                — Send assets to validators
 * POST /api/v1/vaults/:vault/withdrawals          — Assets returning from validators
 * POST /api/v1/vaults/:vault/state                — Harvest and update state
 * POST /api/v1/vaults/:vault/exit-queue           — Enter the exit queue
 * GET  /api/v1/vaults/:vault/exit-queue/:ticket   — Checkpoint index and claim preview
 * POST /api/v1/vaults/:vault/claims               — Claim exited assets
 */

import { Hono } from "hono";
import type { Address } from "@stakecore/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  AmountSchema,
  ClaimSchema,
  DepositSchema,
  EnterExitQueueSchema,
  ExitQueueQuerySchema,
  RedeemSchema,
  UintSchema,
  UpdateStateSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { claimView, exitQueueEntryView, updateStateView, vaultView } from "../types/views.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

const INVALID_VAULT = createErrorEnvelope("VALIDATION_ERROR", "Invalid vault address");

function parseVault(raw: string): Address | null {
  const parsed = AddressSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:vault", (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);
    const service = c.get("service");

    const vault = service.getVault(address);
    return c.json({
      data: vaultView(
        vault,
        service.harvester.getReward(vault.address),
        service.harvester.getUnlockedReward(vault.address),
        service.harvester.isHarvestRequired(vault.address),
      ),
    });
  });

  routes.post("/:vault/deposits", validateBody(DepositSchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);
    const body = c.req.valid("json");

    const shares = c.get("service").deposit(address, body.caller, body.receiver, body.assets);
    return c.json({ data: { shares: shares.toString() } }, 201);
  });

  routes.post("/:vault/redemptions", validateBody(RedeemSchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);
    const body = c.req.valid("json");

    const assets = c.get("service").redeem(address, body.owner, body.receiver, body.shares);
    return c.json({ data: { assets: assets.toString() } });
  });

  routes.post("/:vault/stake", validateBody(AmountSchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);

    c.get("service").stake(address, c.req.valid("json").amount);
    return c.json({ data: { staked: true } });
  });

  routes.post("/:vault/withdrawals", validateBody(AmountSchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);

    c.get("service").returnStake(address, c.req.valid("json").amount);
    return c.json({ data: { received: true } });
  });

  routes.post("/:vault/state", validateBody(UpdateStateSchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);

    const result = c.get("service").updateState(address, c.req.valid("json"));
    return c.json({ data: updateStateView(result) });
  });

  routes.post("/:vault/exit-queue", validateBody(EnterExitQueueSchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);
    const body = c.req.valid("json");

    const ticket = c.get("service").enterExitQueue(address, body.owner, body.receiver, body.shares);
    return c.json({ data: { ticket: ticket.toString() } }, 201);
  });

  routes.get("/:vault/exit-queue/:ticket", validateQuery(ExitQueueQuerySchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);
    const ticket = UintSchema.safeParse(c.req.param("ticket"));
    if (!ticket.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid ticket"), 400);
    }

    const entry = c
      .get("service")
      .getExitQueueEntry(address, c.req.valid("query").receiver, ticket.data);
    return c.json({ data: exitQueueEntryView(entry) });
  });

  routes.post("/:vault/claims", validateBody(ClaimSchema), (c) => {
    const address = parseVault(c.req.param("vault"));
    if (address === null) return c.json(INVALID_VAULT, 400);
    const body = c.req.valid("json");

    const claim = c
      .get("service")
      .claimExitedAssets(address, body.receiver, body.ticket, body.checkpointIndex);
    return c.json({ data: claimView(claim) });
  });

  return routes;
}
