/**
 * Primitive value types shared by every @stakecore package.
 *
 * Rules:
 * - Hex strings are 0x-prefixed, lowercase or checksummed
 * - Addresses are 20 bytes, hashes 32 bytes
 * - All quantities are bigint; width limits mirror the settlement layer
 */

/** 0x-prefixed hex string. */
export type Hex = `0x${string}`;

/** 20-byte account or vault identifier. */
export type Address = `0x${string}`;

/** 32-byte value (Merkle roots, payload hashes). */
export type Bytes32 = `0x${string}`;

export const ZERO_BYTES32: Bytes32 =
  "0x0000000000000000000000000000000000000000000000000000000000000000";

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

// ─── Integer widths ──────────────────────────────────────────────────────

export const MAX_UINT64 = (1n << 64n) - 1n;
export const MAX_UINT128 = (1n << 128n) - 1n;
export const MAX_UINT160 = (1n << 160n) - 1n;
export const MAX_UINT256 = (1n << 256n) - 1n;
export const MAX_INT160 = (1n << 159n) - 1n;
export const MIN_INT160 = -(1n << 159n);

/** Whether `value` fits an unsigned integer of the given bit width. */
export function fitsUint(value: bigint, bits: 64 | 128 | 160 | 256): boolean {
  return value >= 0n && value < 1n << BigInt(bits);
}

/** Whether `value` fits a two's-complement signed integer of the given width. */
export function fitsInt(value: bigint, bits: 160 | 256): boolean {
  const half = 1n << BigInt(bits - 1);
  return value >= -half && value < half;
}

/** Lowercase a hex value, keeping its 0x prefix. */
export function lowerHex(value: Hex): Hex {
  return `0x${value.slice(2).toLowerCase()}`;
}
