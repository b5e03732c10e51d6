/**
 * @stakecore/exit-queue — Withdrawal position records.
 *
 * Outstanding positions keyed by (receiver, ticket). A position is created
 * on queue entry, replaced by a successor on a partial claim, and deleted
 * once fully claimed.
 */

import type {
  Address,
  ExitPosition,
  ExitPositionOrigin,
  ExitPositionStatus,
} from "@stakecore/types";
import { ExitQueueError } from "./types.js";
import type { PositionBookSnapshot } from "./types.js";

function positionKey(receiver: Address, ticket: bigint): string {
  return `${receiver.toLowerCase()}:${ticket.toString()}`;
}

export class PositionBook {
  private readonly positions = new Map<string, ExitPosition>();

  /**
   * Record a new position.
   *
   * @throws ExitQueueError POSITION_EXISTS if the (receiver, ticket) pair is taken
   * @throws ExitQueueError INVALID_AMOUNT if shares are not positive
   */
  open(
    receiver: Address,
    ticket: bigint,
    shares: bigint,
    origin: ExitPositionOrigin,
    createdAt: bigint,
  ): ExitPosition {
    if (shares <= 0n) {
      throw new ExitQueueError("INVALID_AMOUNT", `Position shares must be positive, got ${shares}`);
    }
    const key = positionKey(receiver, ticket);
    if (this.positions.has(key)) {
      throw new ExitQueueError(
        "POSITION_EXISTS",
        `Position already exists for ${receiver} at ticket ${ticket}`,
      );
    }

    const position: ExitPosition = { receiver, ticket, shares, origin, createdAt };
    this.positions.set(key, position);
    return position;
  }

  get(receiver: Address, ticket: bigint): ExitPosition | undefined {
    return this.positions.get(positionKey(receiver, ticket));
  }

  has(receiver: Address, ticket: bigint): boolean {
    return this.positions.has(positionKey(receiver, ticket));
  }

  /**
   * Remove and return a position.
   *
   * @throws ExitQueueError POSITION_NOT_FOUND
   */
  close(receiver: Address, ticket: bigint): ExitPosition {
    const key = positionKey(receiver, ticket);
    const position = this.positions.get(key);
    if (position === undefined) {
      throw new ExitQueueError(
        "POSITION_NOT_FOUND",
        `No position for ${receiver} at ticket ${ticket}`,
      );
    }
    this.positions.delete(key);
    return position;
  }

  /** Positions of one receiver, ordered by ticket. */
  listByReceiver(receiver: Address): readonly ExitPosition[] {
    const owner = receiver.toLowerCase();
    return [...this.positions.values()]
      .filter((p) => p.receiver.toLowerCase() === owner)
      .sort((a, b) => (a.ticket < b.ticket ? -1 : a.ticket > b.ticket ? 1 : 0));
  }

  get size(): number {
    return this.positions.size;
  }

  /** Total shares across all outstanding positions. */
  totalShares(): bigint {
    let total = 0n;
    for (const position of this.positions.values()) {
      total += position.shares;
    }
    return total;
  }

  toJSON(): PositionBookSnapshot {
    return {
      version: 1,
      positions: [...this.positions.values()].map((p) => ({
        receiver: p.receiver,
        ticket: p.ticket.toString(),
        shares: p.shares.toString(),
        origin: p.origin,
        createdAt: p.createdAt.toString(),
      })),
    };
  }

  static fromSnapshot(snapshot: PositionBookSnapshot): PositionBook {
    const { version } = snapshot;
    if (version !== 1) {
      throw new ExitQueueError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(version)}`,
      );
    }
    const book = new PositionBook();
    for (const p of snapshot.positions) {
      book.open(p.receiver, BigInt(p.ticket), BigInt(p.shares), p.origin, BigInt(p.createdAt));
    }
    return book;
  }
}

/**
 * Lifecycle state of a position. A missing record means it was claimed.
 */
export function positionStatus(position: ExitPosition | undefined): ExitPositionStatus {
  if (position === undefined) return "claimed";
  return position.origin === "entered" ? "queued" : "partially_resolved";
}
