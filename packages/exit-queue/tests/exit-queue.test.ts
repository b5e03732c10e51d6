/**
 * Tests for ExitQueue
 *
 * Verifies:
 * - push() accumulates and rejects invalid increments
 * - Binary-search checkpoint lookup
 * - Proportional, floor-rounded resolution
 * - Dust absorption
 * - Snapshot round trip
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MAX_UINT160 } from "@stakecore/types";
import { ExitQueue } from "../src/exit-queue.js";
import { ExitQueueError } from "../src/types.js";

function expectCode(fn: () => unknown, code: string): void {
  try {
    fn();
  } catch (e) {
    expect(e).toBeInstanceOf(ExitQueueError);
    if (e instanceof ExitQueueError) {
      expect(e.code).toBe(code);
    }
    return;
  }
  throw new Error(`Expected ExitQueueError ${code}`);
}

describe("ExitQueue", () => {
  let queue: ExitQueue;

  beforeEach(() => {
    queue = new ExitQueue();
  });

  // ─── push ──────────────────────────────────────────────────────────

  describe("push", () => {
    it("accumulates shares and assets", () => {
      expect(queue.push(100n, 100n)).toEqual({ cumulativeShares: 100n, cumulativeAssets: 100n });
      expect(queue.push(50n, 25n)).toEqual({ cumulativeShares: 150n, cumulativeAssets: 125n });
      expect(queue.length).toBe(2);
      expect(queue.totalResolvedShares).toBe(150n);
      expect(queue.totalUnlockedAssets).toBe(125n);
    });

    it("accepts zero assets", () => {
      expect(queue.push(10n, 0n)).toEqual({ cumulativeShares: 10n, cumulativeAssets: 0n });
    });

    it("rejects zero shares", () => {
      expectCode(() => queue.push(0n, 5n), "INVALID_AMOUNT");
      expect(queue.length).toBe(0);
    });

    it("rejects negative assets", () => {
      expectCode(() => queue.push(5n, -1n), "INVALID_AMOUNT");
    });

    it("rejects cumulative shares beyond uint160", () => {
      queue.push(MAX_UINT160, 0n);
      expectCode(() => queue.push(1n, 0n), "OVERFLOW");
      expect(queue.length).toBe(1);
    });
  });

  // ─── getCheckpointIndex ────────────────────────────────────────────

  describe("getCheckpointIndex", () => {
    it("returns null on an empty queue", () => {
      expect(queue.getCheckpointIndex(0n)).toBeNull();
    });

    it("finds the first checkpoint past the ticket", () => {
      queue.push(100n, 100n);
      queue.push(50n, 50n);
      queue.push(150n, 150n);

      expect(queue.getCheckpointIndex(0n)).toBe(0);
      expect(queue.getCheckpointIndex(99n)).toBe(0);
      expect(queue.getCheckpointIndex(100n)).toBe(1);
      expect(queue.getCheckpointIndex(149n)).toBe(1);
      expect(queue.getCheckpointIndex(150n)).toBe(2);
      expect(queue.getCheckpointIndex(299n)).toBe(2);
    });

    it("returns null for unresolved tickets", () => {
      queue.push(100n, 100n);
      expect(queue.getCheckpointIndex(100n)).toBeNull();
      expect(queue.getCheckpointIndex(5000n)).toBeNull();
    });
  });

  // ─── resolve ───────────────────────────────────────────────────────

  describe("resolve", () => {
    it("resolves a position inside a single checkpoint", () => {
      queue.push(100n, 100n);
      expect(queue.resolve(0n, 50n, 0)).toEqual({
        leftShares: 0n,
        exitedShares: 50n,
        exitedAssets: 50n,
      });
    });

    it("partially resolves a position spanning a checkpoint boundary", () => {
      queue.push(100n, 200n);
      expect(queue.resolve(80n, 50n, 0)).toEqual({
        leftShares: 30n,
        exitedShares: 20n,
        exitedAssets: 40n,
      });

      expect(queue.getCheckpointIndex(100n)).toBeNull();
      queue.push(30n, 30n);
      expect(queue.getCheckpointIndex(100n)).toBe(1);
      expect(queue.resolve(100n, 30n, 1)).toEqual({
        leftShares: 0n,
        exitedShares: 30n,
        exitedAssets: 30n,
      });
    });

    it("floors the asset amount", () => {
      queue.push(3n, 10n);
      expect(queue.resolve(0n, 2n, 0).exitedAssets).toBe(6n);
      expect(queue.resolve(2n, 1n, 0).exitedAssets).toBe(3n);
    });

    it("absorbs a single leftover share", () => {
      queue.push(10n, 10n);
      expect(queue.resolve(0n, 11n, 0)).toEqual({
        leftShares: 0n,
        exitedShares: 11n,
        exitedAssets: 10n,
      });
    });

    it("keeps remainders larger than one share", () => {
      queue.push(10n, 10n);
      expect(queue.resolve(0n, 12n, 0)).toEqual({
        leftShares: 2n,
        exitedShares: 10n,
        exitedAssets: 10n,
      });
    });

    it("returns zeros for an index past the end", () => {
      queue.push(100n, 100n);
      expect(queue.resolve(0n, 50n, 1)).toEqual({
        leftShares: 0n,
        exitedShares: 0n,
        exitedAssets: 0n,
      });
    });

    it("returns zeros when nothing is queued", () => {
      queue.push(100n, 100n);
      expect(queue.resolve(0n, 0n, 0).exitedAssets).toBe(0n);
    });

    it("rejects a ticket at or past the checkpoint's cumulative shares", () => {
      queue.push(100n, 100n);
      queue.push(50n, 50n);
      expectCode(() => queue.resolve(100n, 10n, 0), "INVALID_CHECKPOINT_INDEX");
    });

    it("rejects a ticket before the previous checkpoint", () => {
      queue.push(100n, 100n);
      queue.push(50n, 50n);
      expectCode(() => queue.resolve(50n, 10n, 1), "INVALID_CHECKPOINT_INDEX");
    });

    it("rejects malformed indices and tickets", () => {
      queue.push(100n, 100n);
      expectCode(() => queue.resolve(0n, 10n, -1), "INVALID_CHECKPOINT_INDEX");
      expectCode(() => queue.resolve(0n, 10n, 0.5), "INVALID_CHECKPOINT_INDEX");
      expectCode(() => queue.resolve(-1n, 10n, 0), "INVALID_TICKET");
      expectCode(() => queue.resolve(0n, -10n, 0), "INVALID_AMOUNT");
    });
  });

  // ─── accessors ─────────────────────────────────────────────────────

  describe("accessors", () => {
    it("exposes checkpoints read-only", () => {
      queue.push(10n, 20n);
      const copy = queue.getCheckpoints();
      expect(copy).toEqual([{ cumulativeShares: 10n, cumulativeAssets: 20n }]);
      expect(queue.at(0)).toEqual({ cumulativeShares: 10n, cumulativeAssets: 20n });
      expect(queue.at(1)).toBeUndefined();
      expect(queue.latest()).toEqual({ cumulativeShares: 10n, cumulativeAssets: 20n });
    });

    it("reports null latest on an empty queue", () => {
      expect(queue.latest()).toBeNull();
      expect(queue.totalResolvedShares).toBe(0n);
    });
  });

  // ─── snapshot ──────────────────────────────────────────────────────

  describe("snapshot", () => {
    it("round-trips through JSON", () => {
      queue.push(100n, 90n);
      queue.push(40n, 41n);

      const json = JSON.parse(JSON.stringify(queue));
      expect(json).toEqual({
        version: 1,
        checkpoints: [
          { cumulativeShares: "100", cumulativeAssets: "90" },
          { cumulativeShares: "140", cumulativeAssets: "131" },
        ],
      });

      const restored = ExitQueue.fromSnapshot(json);
      expect(restored.getCheckpoints()).toEqual(queue.getCheckpoints());
    });

    it("rejects decreasing checkpoints", () => {
      expectCode(
        () =>
          ExitQueue.fromSnapshot({
            version: 1,
            checkpoints: [
              { cumulativeShares: "100", cumulativeAssets: "90" },
              { cumulativeShares: "100", cumulativeAssets: "95" },
            ],
          }),
        "INVALID_SNAPSHOT",
      );
    });

    it("rejects non-numeric values", () => {
      expectCode(
        () =>
          ExitQueue.fromSnapshot({
            version: 1,
            checkpoints: [{ cumulativeShares: "1e3", cumulativeAssets: "0" }],
          }),
        "INVALID_SNAPSHOT",
      );
    });
  });
});
