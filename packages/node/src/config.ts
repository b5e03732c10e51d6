/**
 * @stakecore/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress } from "@stakecore/types";
import type { Address } from "@stakecore/types";
import type { EscrowKind } from "@stakecore/vault";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value), { message: "Invalid address" });

const SecondsSchema = (fallback: bigint) =>
  z
    .string()
    .regex(/^\d+$/, "Expected a non-negative integer number of seconds")
    .transform((value) => BigInt(value))
    .optional()
    .transform((value) => value ?? fallback);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // EIP-712 domain of the rewards oracle
  CHAIN_ID: z.coerce.number().int().min(1).default(31337),
  VERIFYING_CONTRACT: AddressSchema.default("0x0000000000000000000000000000000000000001"),

  // Timing
  REWARDS_UPDATE_DELAY: SecondsSchema(43_200n),
  EXIT_QUEUE_UPDATE_DELAY: SecondsSchema(86_400n),

  // Attestors and vaults
  REWARDS_MIN_ORACLES: z.coerce.number().int().min(1).default(1),
  ORACLES: z.string().default(""),
  VAULTS: z.string().default(""),
  FEE_RECIPIENT: AddressSchema.default("0x0000000000000000000000000000000000000fee"),
  SHARED_ESCROW: AddressSchema.default("0x00000000000000000000000000000000000e5c40"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

export interface ParsedOracle {
  readonly address: Address;
  readonly label: string;
}

export interface ParsedVault {
  readonly address: Address;
  readonly feePercent: number;
  readonly escrow: EscrowKind;
}

function entries(raw: string): string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}

/**
 * Parse the ORACLES env var.
 *
 * Format: "0xaddr1:label1,0xaddr2:label2"
 */
export function parseOracles(raw: string): readonly ParsedOracle[] {
  return entries(raw).map((entry) => {
    const [address, label, ...rest] = entry.split(":");
    if (address === undefined || label === undefined || rest.length > 0) {
      throw new Error(`Invalid ORACLES entry: "${entry}". Expected format: address:label`);
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid oracle address "${address}" in ORACLES`);
    }
    if (label === "") {
      throw new Error("Oracle label cannot be empty in ORACLES");
    }
    return { address, label };
  });
}

/**
 * Parse the VAULTS env var.
 *
 * Format: "0xaddr:feePercent:escrow", escrow being "shared" or "own",
 * feePercent in basis points.
 */
export function parseVaults(raw: string): readonly ParsedVault[] {
  return entries(raw).map((entry) => {
    const [address, fee, escrow, ...rest] = entry.split(":");
    if (address === undefined || fee === undefined || escrow === undefined || rest.length > 0) {
      throw new Error(
        `Invalid VAULTS entry: "${entry}". Expected format: address:feePercent:escrow`,
      );
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid vault address "${address}" in VAULTS`);
    }
    if (!/^\d+$/.test(fee) || Number(fee) > 10_000) {
      throw new Error(`Invalid fee "${fee}" in VAULTS. Must be basis points in [0, 10000]`);
    }
    if (escrow !== "shared" && escrow !== "own") {
      throw new Error(`Invalid escrow "${escrow}" in VAULTS. Must be: shared or own`);
    }
    return { address, feePercent: Number(fee), escrow };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
