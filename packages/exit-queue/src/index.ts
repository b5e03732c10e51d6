/**
 * @stakecore/exit-queue — FIFO withdrawal settlement.
 *
 * Append-only checkpoint ledger with binary-search ticket lookup,
 * proportional floor-rounded settlement, and the position records
 * that claim against it.
 *
 * @packageDocumentation
 */

// Types
export type { ExitQueueErrorCode, ExitQueueSnapshot, PositionBookSnapshot } from "./types.js";
export { ExitQueueError } from "./types.js";

// Math
export { mulDiv, checkedUint, min } from "./uint-math.js";

// Ledger
export { ExitQueue } from "./exit-queue.js";

// Positions
export { PositionBook, positionStatus } from "./position-book.js";
