/**
 * @stakecore/exit-queue — Fixed-width integer arithmetic.
 *
 * Rules:
 * - bigint only, no floating point
 * - Division floors (rounds toward zero for non-negative operands)
 * - Results leaving a declared width throw OVERFLOW
 */

import { fitsUint } from "@stakecore/types";
import { ExitQueueError } from "./types.js";

/**
 * floor(x * y / denominator) for non-negative operands.
 *
 * @throws ExitQueueError INVALID_AMOUNT on negative operands or zero denominator
 */
export function mulDiv(x: bigint, y: bigint, denominator: bigint): bigint {
  if (x < 0n || y < 0n || denominator <= 0n) {
    throw new ExitQueueError(
      "INVALID_AMOUNT",
      `mulDiv operands must be non-negative with a positive denominator (${x} * ${y} / ${denominator})`,
    );
  }
  return (x * y) / denominator;
}

/**
 * Assert `value` fits an unsigned width and return it.
 *
 * @throws ExitQueueError OVERFLOW
 */
export function checkedUint(
  value: bigint,
  bits: 64 | 128 | 160 | 256,
  label: string,
): bigint {
  if (!fitsUint(value, bits)) {
    throw new ExitQueueError("OVERFLOW", `${label} does not fit uint${bits}: ${value}`);
  }
  return value;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
