/**
 * Runtime type guard tests for @stakecore/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isRecord,
  isHex,
  isAddress,
  isBytes32,
  isDecimalString,
  isProtocolEventType,
  sameAddress,
} from "../src/guards.js";
import type { Address } from "../src/primitives.js";
import { fitsInt, fitsUint, MAX_INT160, MIN_INT160, MAX_UINT160 } from "../src/primitives.js";

// =============================================================================
// Hex guards
// =============================================================================

describe("isHex", () => {
  it("accepts even-length 0x strings", () => {
    expect(isHex("0x")).toBe(true);
    expect(isHex("0xdeadBEEF")).toBe(true);
  });

  it("rejects odd length and missing prefix", () => {
    expect(isHex("0xabc")).toBe(false);
    expect(isHex("abcd")).toBe(false);
    expect(isHex(42)).toBe(false);
  });
});

describe("isAddress", () => {
  it("accepts 20-byte hex", () => {
    expect(isAddress("0x" + "ab".repeat(20))).toBe(true);
  });

  it("rejects wrong length", () => {
    expect(isAddress("0x" + "ab".repeat(19))).toBe(false);
    expect(isAddress("0x" + "ab".repeat(32))).toBe(false);
  });
});

describe("isBytes32", () => {
  it("accepts 32-byte hex", () => {
    expect(isBytes32("0x" + "00".repeat(32))).toBe(true);
  });

  it("rejects non-hex characters", () => {
    expect(isBytes32("0x" + "zz".repeat(32))).toBe(false);
  });
});

// =============================================================================
// Decimal strings
// =============================================================================

describe("isDecimalString", () => {
  it("accepts canonical integers", () => {
    expect(isDecimalString("0")).toBe(true);
    expect(isDecimalString("123")).toBe(true);
    expect(isDecimalString("-5")).toBe(true);
  });

  it("rejects leading zeros, fractions and negative zero", () => {
    expect(isDecimalString("007")).toBe(false);
    expect(isDecimalString("1.5")).toBe(false);
    expect(isDecimalString("-0")).toBe(false);
    expect(isDecimalString("")).toBe(false);
  });
});

// =============================================================================
// Misc
// =============================================================================

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});

describe("isProtocolEventType", () => {
  it("recognizes emitted event types", () => {
    expect(isProtocolEventType("snapshot_updated")).toBe(true);
    expect(isProtocolEventType("exited_assets_claimed")).toBe(true);
  });

  it("rejects unknown types", () => {
    expect(isProtocolEventType("vault.created")).toBe(false);
  });
});

describe("sameAddress", () => {
  it("ignores checksum casing", () => {
    const upper: Address = `0x${"AB".repeat(20)}`;
    const lower: Address = `0x${"ab".repeat(20)}`;
    expect(sameAddress(upper, lower)).toBe(true);
  });
});

// =============================================================================
// Width checks
// =============================================================================

describe("fitsUint / fitsInt", () => {
  it("bounds uint160", () => {
    expect(fitsUint(MAX_UINT160, 160)).toBe(true);
    expect(fitsUint(MAX_UINT160 + 1n, 160)).toBe(false);
    expect(fitsUint(-1n, 160)).toBe(false);
  });

  it("bounds int160", () => {
    expect(fitsInt(MAX_INT160, 160)).toBe(true);
    expect(fitsInt(MIN_INT160, 160)).toBe(true);
    expect(fitsInt(MAX_INT160 + 1n, 160)).toBe(false);
    expect(fitsInt(MIN_INT160 - 1n, 160)).toBe(false);
  });
});
