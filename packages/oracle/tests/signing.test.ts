/**
 * Signing Tests
 *
 * Verifies:
 * - Signatures recover to the signing attestor
 * - The digest commits to every message field and the domain
 * - Blob packing orders by signer address; splitting rejects partial signatures
 */

import { describe, it, expect } from "vitest";
import { concat } from "viem";
import type { Hex } from "@stakecore/types";
import {
  compareAddresses,
  hashRewardsUpdate,
  packSignatures,
  recoverSigners,
  signRewardsUpdate,
  splitSignatures,
} from "../src/signing.js";
import type { RewardsUpdateMessage } from "../src/types.js";
import { DOMAIN, root, testAccount } from "./fixtures.js";

const MESSAGE: RewardsUpdateMessage = {
  rewardsRoot: root(1),
  payloadHash: root(2),
  updateTimestamp: 1_700_000_000n,
  nonce: 1n,
};

describe("hashRewardsUpdate", () => {
  it("changes with every field", () => {
    const base = hashRewardsUpdate(DOMAIN, MESSAGE);
    expect(hashRewardsUpdate(DOMAIN, { ...MESSAGE, rewardsRoot: root(9) })).not.toBe(base);
    expect(hashRewardsUpdate(DOMAIN, { ...MESSAGE, payloadHash: root(9) })).not.toBe(base);
    expect(hashRewardsUpdate(DOMAIN, { ...MESSAGE, updateTimestamp: 1n })).not.toBe(base);
    expect(hashRewardsUpdate(DOMAIN, { ...MESSAGE, nonce: 2n })).not.toBe(base);
  });

  it("is bound to the domain", () => {
    expect(hashRewardsUpdate({ ...DOMAIN, chainId: 1 }, MESSAGE)).not.toBe(
      hashRewardsUpdate(DOMAIN, MESSAGE),
    );
  });
});

describe("signRewardsUpdate / recoverSigners", () => {
  it("recovers each signer in blob order", async () => {
    const first = testAccount(1);
    const second = testAccount(2);
    const digest = hashRewardsUpdate(DOMAIN, MESSAGE);

    const signatures = [
      await signRewardsUpdate(first, DOMAIN, MESSAGE),
      await signRewardsUpdate(second, DOMAIN, MESSAGE),
    ];

    expect(await recoverSigners(digest, signatures)).toEqual([first.address, second.address]);
  });

  it("yields null for unrecoverable signatures", async () => {
    const digest = hashRewardsUpdate(DOMAIN, MESSAGE);
    const garbage: Hex = `0x${"00".repeat(64)}05`;
    expect(await recoverSigners(digest, [garbage])).toEqual([null]);
  });
});

describe("packSignatures / splitSignatures", () => {
  it("orders signatures by signer address", () => {
    const low: Hex = `0x${"11".repeat(65)}`;
    const high: Hex = `0x${"22".repeat(65)}`;
    const packed = packSignatures([
      { signer: "0x00000000000000000000000000000000000000ff", signature: high },
      { signer: "0x0000000000000000000000000000000000000001", signature: low },
    ]);
    expect(packed).toBe(concat([low, high]));
    expect(splitSignatures(packed)).toEqual([low, high]);
  });

  it("rejects empty and partial blobs", () => {
    expect(splitSignatures("0x")).toBeNull();
    expect(splitSignatures(`0x${"11".repeat(64)}`)).toBeNull();
    expect(splitSignatures(`0x${"11".repeat(131)}`)).toBeNull();
    expect(splitSignatures("0xzz")).toBeNull();
  });
});

describe("compareAddresses", () => {
  it("orders numerically regardless of casing", () => {
    expect(
      compareAddresses(
        "0x00000000000000000000000000000000000000AA",
        "0x00000000000000000000000000000000000000ab",
      ),
    ).toBe(-1);
    expect(
      compareAddresses(
        "0x00000000000000000000000000000000000000aa",
        "0x00000000000000000000000000000000000000AA",
      ),
    ).toBe(0);
  });
});
