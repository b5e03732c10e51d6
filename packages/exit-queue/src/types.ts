/**
 * @stakecore/exit-queue — Core types.
 *
 * Error codes and serializable shapes of the exit queue ledger.
 */

import type { Address } from "@stakecore/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for exit queue operations. */
export type ExitQueueErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_TICKET"
  | "INVALID_CHECKPOINT_INDEX"
  | "OVERFLOW"
  | "POSITION_EXISTS"
  | "POSITION_NOT_FOUND"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the exit queue.
 */
export class ExitQueueError extends Error {
  public readonly code: ExitQueueErrorCode;

  constructor(code: ExitQueueErrorCode, message: string) {
    super(message);
    this.name = "ExitQueueError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the checkpoint list.
 * Values are decimal strings so the snapshot survives JSON.
 */
export interface ExitQueueSnapshot {
  readonly version: 1;
  readonly checkpoints: readonly {
    readonly cumulativeShares: string;
    readonly cumulativeAssets: string;
  }[];
}

/**
 * Serializable snapshot of the outstanding positions.
 */
export interface PositionBookSnapshot {
  readonly version: 1;
  readonly positions: readonly {
    readonly receiver: Address;
    readonly ticket: string;
    readonly shares: string;
    readonly origin: "entered" | "successor";
    readonly createdAt: string;
  }[];
}
