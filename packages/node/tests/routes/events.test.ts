/**
 * Tests for audit log routes.
 *
 * Verifies:
 * - Vault activity lands in the log under the vault's stream
 * - Type, position and limit filters
 * - Hash chain verification over recorded events
 */

import { describe, it, expect } from "vitest";
import type { IntegrityResult, LoggedEvent } from "@stakecore/audit-log";
import { ALICE, VAULT, createTestApp, jsonRequest, readJson } from "../setup.js";
import type { DataBody, TestApp } from "../setup.js";

interface EventsBody {
  readonly data: readonly LoggedEvent[];
  readonly count: number;
}

async function depositAndQueue(t: TestApp): Promise<void> {
  const base = `/api/v1/vaults/${VAULT}`;
  await t.app.request(jsonRequest(`${base}/deposits`, "POST", { caller: ALICE, receiver: ALICE, assets: "100" }));
  await t.app.request(jsonRequest(`${base}/stake`, "POST", { amount: "100" }));
  await t.app.request(
    jsonRequest(`${base}/exit-queue`, "POST", { owner: ALICE, receiver: ALICE, shares: "25" }),
  );
}

describe("GET /api/v1/events", () => {
  it("lists attestor wiring in order", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/events"));
    expect(res.status).toBe(200);

    const body = await readJson<EventsBody>(res);
    expect(body.count).toBe(4);
    expect(body.data.map((e) => e.type)).toEqual([
      "attestor_added",
      "attestor_added",
      "attestor_added",
      "quorum_changed",
    ]);
    expect(body.data.map((e) => e.position)).toEqual([1, 2, 3, 4]);
    expect(body.data[3]?.payload).toMatchObject({ previousQuorum: 1, newQuorum: 2 });
  });

  it("records deposits under the vault stream", async () => {
    const t = createTestApp();
    await depositAndQueue(t);

    const body = await readJson<EventsBody>(
      await t.app.request(jsonRequest("/api/v1/events?type=deposited")),
    );
    expect(body.count).toBe(1);
    expect(body.data[0]?.streamId).toBe(`vault:${VAULT}`);
    expect(body.data[0]?.payload).toMatchObject({ assets: "100", shares: "100" });
  });

  it("records exit queue entries with their ticket", async () => {
    const t = createTestApp();
    await depositAndQueue(t);

    const body = await readJson<EventsBody>(
      await t.app.request(jsonRequest("/api/v1/events?type=exit_queue_entered")),
    );
    expect(body.count).toBe(1);
    expect(body.data[0]?.payload).toMatchObject({ ticket: "0", shares: "25" });
  });

  it("pages with fromPosition and limit", async () => {
    const t = createTestApp();
    await depositAndQueue(t);

    const body = await readJson<EventsBody>(
      await t.app.request(jsonRequest("/api/v1/events?fromPosition=4&limit=2")),
    );
    expect(body.data.map((e) => e.position)).toEqual([4, 5]);
    expect(body.data.map((e) => e.type)).toEqual(["quorum_changed", "deposited"]);
  });

  it("rejects an unknown event type", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/events?type=minted"));
    expect(res.status).toBe(400);
  });

  it("rejects a limit above 500", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/events?limit=501"));
    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/events/integrity", () => {
  it("verifies the chain after vault activity", async () => {
    const t = createTestApp();
    await depositAndQueue(t);

    const res = await t.app.request(jsonRequest("/api/v1/events/integrity"));
    expect(res.status).toBe(200);

    const { data } = await readJson<DataBody<IntegrityResult>>(res);
    expect(data.valid).toBe(true);
    expect(data.lastVerifiedPosition).toBe(6);
    expect(data.errors).toEqual([]);
  });
});
