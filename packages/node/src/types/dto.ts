/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as decimal strings and are parsed into bigint; addresses
 * and hashes are 0x-prefixed hex.
 */

import { z } from "zod";
import {
  isAddress,
  isBytes32,
  isDecimalString,
  isHex,
  isProtocolEventType,
} from "@stakecore/types";
import type { Address, Bytes32, Hex, ProtocolEventType } from "@stakecore/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value), { message: "Invalid address" });

export const Bytes32Schema = z
  .string()
  .refine((value): value is Bytes32 => isBytes32(value), { message: "Invalid bytes32 hex" });

export const HexSchema = z
  .string()
  .refine((value): value is Hex => isHex(value), { message: "Invalid hex" });

/** Non-negative integer as a decimal string. */
export const UintSchema = z
  .string()
  .refine(isDecimalString, { message: "Expected a non-negative decimal integer string" })
  .transform((value) => BigInt(value));

/** Signed integer as a decimal string. */
export const IntSchema = z
  .string()
  .regex(/^-?(0|[1-9]\d*)$/, "Expected a decimal integer string")
  .transform((value) => BigInt(value));

// =============================================================================
// Rewards
// =============================================================================

export const SubmitSnapshotSchema = z.object({
  caller: AddressSchema,
  rewardsRoot: Bytes32Schema,
  updateTimestamp: UintSchema,
  payloadUri: z.string().min(1).max(2048),
  signatures: HexSchema,
});

export type SubmitSnapshotDto = z.infer<typeof SubmitSnapshotSchema>;

// =============================================================================
// Vaults
// =============================================================================

export const DepositSchema = z.object({
  caller: AddressSchema,
  receiver: AddressSchema,
  assets: UintSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const RedeemSchema = z.object({
  owner: AddressSchema,
  receiver: AddressSchema,
  shares: UintSchema,
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const AmountSchema = z.object({
  amount: UintSchema,
});

export type AmountDto = z.infer<typeof AmountSchema>;

export const UpdateStateSchema = z.object({
  rewardsRoot: Bytes32Schema,
  reward: IntSchema,
  unlockedReward: UintSchema,
  proof: z.array(Bytes32Schema).max(256),
});

export type UpdateStateDto = z.infer<typeof UpdateStateSchema>;

export const EnterExitQueueSchema = z.object({
  owner: AddressSchema,
  receiver: AddressSchema,
  shares: UintSchema,
});

export type EnterExitQueueDto = z.infer<typeof EnterExitQueueSchema>;

export const ClaimSchema = z.object({
  receiver: AddressSchema,
  ticket: UintSchema,
  checkpointIndex: z.number().int().min(0),
});

export type ClaimDto = z.infer<typeof ClaimSchema>;

export const ExitQueueQuerySchema = z.object({
  receiver: AddressSchema,
});

// =============================================================================
// Events
// =============================================================================

export const ListEventsQuerySchema = z.object({
  type: z
    .string()
    .refine((value): value is ProtocolEventType => isProtocolEventType(value), {
      message: "Unknown event type",
    })
    .optional(),
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
