/**
 * @stakecore/exit-queue — Checkpoint ledger.
 *
 * Append-only series of checkpoints recording how many queued shares have
 * been resolved into assets, and at what rate.
 *
 * Design:
 * - push() is the only mutator; past checkpoints never change
 * - Ticket lookup is a binary search over cumulative shares
 * - Proportional settlement floors, so rounding always favors the ledger
 * - A 1-share remainder is absorbed (dust rule) so no position is stranded
 */

import type { Checkpoint, ResolvedExit } from "@stakecore/types";
import { ExitQueueError } from "./types.js";
import type { ExitQueueSnapshot } from "./types.js";
import { checkedUint, min, mulDiv } from "./uint-math.js";

const ORIGIN: Checkpoint = { cumulativeShares: 0n, cumulativeAssets: 0n };

const NOTHING_RESOLVED: ResolvedExit = {
  leftShares: 0n,
  exitedShares: 0n,
  exitedAssets: 0n,
};

/**
 * Append-only exit queue.
 *
 * Usage:
 * ```ts
 * const queue = new ExitQueue();
 * queue.push(100n, 100n);
 * const index = queue.getCheckpointIndex(0n);   // 0
 * queue.resolve(0n, 50n, 0);                   // { leftShares: 0n, exitedShares: 50n, exitedAssets: 50n }
 * ```
 */
export class ExitQueue {
  private readonly checkpoints: Checkpoint[] = [];

  // ─── Mutation ───────────────────────────────────────────────────────

  /**
   * Append a checkpoint resolving `sharesResolved` shares into
   * `assetsUnlocked` assets.
   *
   * @throws ExitQueueError INVALID_AMOUNT if shares are not positive or assets negative
   * @throws ExitQueueError OVERFLOW if a cumulative value leaves its width
   */
  push(sharesResolved: bigint, assetsUnlocked: bigint): Checkpoint {
    if (sharesResolved <= 0n) {
      throw new ExitQueueError(
        "INVALID_AMOUNT",
        `Resolved shares must be positive, got ${sharesResolved}`,
      );
    }
    if (assetsUnlocked < 0n) {
      throw new ExitQueueError(
        "INVALID_AMOUNT",
        `Unlocked assets must be non-negative, got ${assetsUnlocked}`,
      );
    }

    const last = this.latest() ?? ORIGIN;
    const checkpoint: Checkpoint = {
      cumulativeShares: checkedUint(
        last.cumulativeShares + sharesResolved,
        160,
        "Cumulative shares",
      ),
      cumulativeAssets: checkedUint(
        last.cumulativeAssets + assetsUnlocked,
        256,
        "Cumulative assets",
      ),
    };

    this.checkpoints.push(checkpoint);
    return checkpoint;
  }

  // ─── Lookup ─────────────────────────────────────────────────────────

  /**
   * Index of the first checkpoint whose cumulative shares exceed `ticket`,
   * or null when the ticket is not resolved by any checkpoint yet.
   */
  getCheckpointIndex(ticket: bigint): number | null {
    let low = 0;
    let high = this.checkpoints.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      const shares = this.checkpoints[mid]?.cumulativeShares ?? 0n;
      if (shares > ticket) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }

    return high < this.checkpoints.length ? high : null;
  }

  /**
   * Resolve a queued position against the checkpoint at `checkpointIndex`.
   *
   * Returns zeros when the index is past the end of the series or
   * nothing is queued.
   *
   * @throws ExitQueueError INVALID_CHECKPOINT_INDEX if the ticket lies outside
   *   the checkpoint's window [previous.cumulativeShares, cumulativeShares)
   */
  resolve(ticket: bigint, amountQueued: bigint, checkpointIndex: number): ResolvedExit {
    if (ticket < 0n) {
      throw new ExitQueueError("INVALID_TICKET", `Ticket must be non-negative, got ${ticket}`);
    }
    if (amountQueued < 0n) {
      throw new ExitQueueError(
        "INVALID_AMOUNT",
        `Queued amount must be non-negative, got ${amountQueued}`,
      );
    }
    if (!Number.isSafeInteger(checkpointIndex) || checkpointIndex < 0) {
      throw new ExitQueueError(
        "INVALID_CHECKPOINT_INDEX",
        `Checkpoint index must be a non-negative integer, got ${checkpointIndex}`,
      );
    }

    const checkpoint = this.checkpoints[checkpointIndex];
    if (checkpoint === undefined || amountQueued === 0n) {
      return NOTHING_RESOLVED;
    }

    const previous =
      checkpointIndex === 0 ? ORIGIN : (this.checkpoints[checkpointIndex - 1] ?? ORIGIN);

    if (ticket < previous.cumulativeShares || ticket >= checkpoint.cumulativeShares) {
      throw new ExitQueueError(
        "INVALID_CHECKPOINT_INDEX",
        `Ticket ${ticket} is not resolved by checkpoint ${checkpointIndex} ` +
          `[${previous.cumulativeShares}, ${checkpoint.cumulativeShares})`,
      );
    }

    const exitedShares = min(amountQueued, checkpoint.cumulativeShares - ticket);
    const exitedAssets = mulDiv(
      exitedShares,
      checkpoint.cumulativeAssets - previous.cumulativeAssets,
      checkpoint.cumulativeShares - previous.cumulativeShares,
    );
    const leftShares = amountQueued - exitedShares;

    // A single leftover share cannot be worth a unit of assets; absorb it.
    if (leftShares === 1n) {
      return { leftShares: 0n, exitedShares: amountQueued, exitedAssets };
    }

    return { leftShares, exitedShares, exitedAssets };
  }

  // ─── Read-only accessors ────────────────────────────────────────────

  get length(): number {
    return this.checkpoints.length;
  }

  at(index: number): Checkpoint | undefined {
    return this.checkpoints[index];
  }

  latest(): Checkpoint | null {
    return this.checkpoints[this.checkpoints.length - 1] ?? null;
  }

  /** Cumulative shares resolved by the latest checkpoint. */
  get totalResolvedShares(): bigint {
    return this.latest()?.cumulativeShares ?? 0n;
  }

  /** Cumulative assets unlocked by the latest checkpoint. */
  get totalUnlockedAssets(): bigint {
    return this.latest()?.cumulativeAssets ?? 0n;
  }

  getCheckpoints(): readonly Checkpoint[] {
    return [...this.checkpoints];
  }

  // ─── Snapshot ───────────────────────────────────────────────────────

  toJSON(): ExitQueueSnapshot {
    return {
      version: 1,
      checkpoints: this.checkpoints.map((c) => ({
        cumulativeShares: c.cumulativeShares.toString(),
        cumulativeAssets: c.cumulativeAssets.toString(),
      })),
    };
  }

  /**
   * Rebuild a queue from a snapshot, replaying each checkpoint's increment
   * through push() so every invariant is re-checked.
   *
   * @throws ExitQueueError INVALID_SNAPSHOT on unknown versions or decreasing values
   */
  static fromSnapshot(snapshot: ExitQueueSnapshot): ExitQueue {
    const { version } = snapshot;
    if (version !== 1) {
      throw new ExitQueueError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(version)}`,
      );
    }

    const queue = new ExitQueue();
    let previous = ORIGIN;
    for (const entry of snapshot.checkpoints) {
      const shares = parseCumulative(entry.cumulativeShares);
      const assets = parseCumulative(entry.cumulativeAssets);
      if (shares <= previous.cumulativeShares || assets < previous.cumulativeAssets) {
        throw new ExitQueueError(
          "INVALID_SNAPSHOT",
          `Checkpoint values must increase: (${entry.cumulativeShares}, ${entry.cumulativeAssets})`,
        );
      }
      previous = queue.push(
        shares - previous.cumulativeShares,
        assets - previous.cumulativeAssets,
      );
    }
    return queue;
  }
}

function parseCumulative(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new ExitQueueError("INVALID_SNAPSHOT", `Invalid cumulative value: "${value}"`);
  }
  return BigInt(value);
}
