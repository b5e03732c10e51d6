/**
 * Runtime Type Guards
 *
 * Narrowing functions for @stakecore primitive and event types.
 * Used at system boundaries (API inputs, deserialized data).
 */

import type { Address, Bytes32, Hex } from "./primitives.js";
import type { ProtocolEventType } from "./events.js";

const HEX_RE = /^0x[0-9a-fA-F]*$/;
const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const BYTES32_RE = /^0x[0-9a-fA-F]{64}$/;
const DECIMAL_RE = /^-?(0|[1-9]\d*)$/;

const EVENT_TYPES = new Set<string>([
  "snapshot_updated",
  "harvested",
  "exit_queue_entered",
  "checkpoint_created",
  "exited_assets_claimed",
  "deposited",
  "redeemed",
  "fee_shares_minted",
  "attestor_added",
  "attestor_removed",
  "quorum_changed",
] satisfies ProtocolEventType[]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_RE.test(value) && value.length % 2 === 0;
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_RE.test(value);
}

export function isBytes32(value: unknown): value is Bytes32 {
  return typeof value === "string" && BYTES32_RE.test(value);
}

/** Canonical base-10 integer string (no leading zeros, no plus sign). */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_RE.test(value) && value !== "-0";
}

export function isProtocolEventType(value: unknown): value is ProtocolEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

/** Case-insensitive address equality. */
export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
