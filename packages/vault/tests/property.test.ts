/**
 * Vault Property Tests
 *
 * Verifies:
 * - Claims never pay out more than checkpoints unlocked
 * - Unclaimed assets always equal unlocked minus claimed, and stay covered
 * - Settlement is FIFO: a later ticket is paid only once earlier ones are whole
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address } from "@stakecore/types";
import { STAKING_SINK } from "../src/asset-book.js";
import { createHarness, depositAndStake } from "./harness.js";

function user(i: number): Address {
  return `0x${(0x1000 + i).toString(16).padStart(40, "0")}`;
}

const participants = fc.array(
  fc
    .tuple(fc.bigInt({ min: 1n, max: 1_000_000n }), fc.integer({ min: 1, max: 100 }))
    .map(([deposit, percent]) => ({
      deposit,
      queued: (deposit * BigInt(percent) + 99n) / 100n,
    })),
  { minLength: 1, maxLength: 5 },
);

describe("vault settlement properties", () => {
  it("conserves assets and settles FIFO", () => {
    fc.assert(
      fc.property(participants, fc.integer({ min: 0, max: 100 }), (users, returnedPercent) => {
        const h = createHarness();
        const tickets: bigint[] = [];

        users.forEach((u, i) => depositAndStake(h, user(i), u.deposit));
        users.forEach((u, i) => {
          tickets.push(h.vault.enterExitQueue(user(i), user(i), u.queued));
        });

        const staked = users.reduce((sum, u) => sum + u.deposit, 0n);
        const returned = (staked * BigInt(returnedPercent)) / 100n;
        if (returned > 0n) h.vault.receiveAssets(STAKING_SINK, returned);
        h.vault.updateState(h.publish(0n));

        const unlocked = h.vault.getCheckpoints().at(-1)?.cumulativeAssets ?? 0n;
        let claimed = 0n;
        let sawShortfall = false;

        users.forEach((u, i) => {
          const ticket = tickets[i] ?? 0n;
          const index = h.vault.getCheckpointIndex(ticket);
          const preview =
            index === null ? null : h.vault.calculateExitedAssets(user(i), ticket, index);

          if (preview === null || preview.exitedAssets === 0n) {
            sawShortfall = true;
            return;
          }
          // Once an earlier ticket went short, nothing later is paid.
          expect(sawShortfall).toBe(false);
          if (preview.exitedShares < u.queued) sawShortfall = true;

          claimed += h.vault.claimExitedAssets(user(i), ticket, index ?? 0).assets;
        });

        expect(claimed).toBeLessThanOrEqual(unlocked);
        expect(h.vault.unclaimedAssets).toBe(unlocked - claimed);
        expect(h.vault.liquidAssets).toBeGreaterThanOrEqual(h.vault.unclaimedAssets);
      }),
    );
  });
});
