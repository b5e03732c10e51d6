/**
 * Exit Queue Types
 *
 * Checkpoints of the append-only withdrawal ledger and the positions
 * that claim against them.
 *
 * Rules:
 * - Checkpoint cumulative values never decrease
 * - Checkpoints never mutate once pushed; an index stays valid forever
 * - Tickets are positions on the cumulative-shares axis and are never reused
 */

import type { Address } from "./primitives.js";

/**
 * A checkpoint in the exit queue.
 */
export interface Checkpoint {
  /** Total shares resolved up to and including this checkpoint */
  readonly cumulativeShares: bigint;

  /** Total assets unlocked up to and including this checkpoint */
  readonly cumulativeAssets: bigint;
}

/**
 * How a position came to exist.
 * - "entered": created by entering the queue
 * - "successor": remainder created by a partial claim
 */
export type ExitPositionOrigin = "entered" | "successor";

/**
 * An outstanding withdrawal position.
 */
export interface ExitPosition {
  readonly receiver: Address;
  readonly ticket: bigint;
  readonly shares: bigint;
  readonly origin: ExitPositionOrigin;

  /** Unix seconds when the position was created */
  readonly createdAt: bigint;
}

/**
 * Lifecycle state derived from a position and the queue.
 */
export type ExitPositionStatus = "queued" | "partially_resolved" | "claimed";

/**
 * Result of resolving a ticket against a checkpoint.
 */
export interface ResolvedExit {
  /** Shares still queued after this resolution */
  readonly leftShares: bigint;

  /** Shares resolved by this checkpoint */
  readonly exitedShares: bigint;

  /** Assets payable for the resolved shares */
  readonly exitedAssets: bigint;
}
