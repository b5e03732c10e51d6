/**
 * @stakecore/oracle — Core types.
 *
 * Design:
 * - All types are readonly
 * - Time is unix seconds as bigint (uint64)
 * - Signatures arrive as one concatenated blob of 65-byte ECDSA signatures
 */

import type { Address, Bytes32, Hex } from "@stakecore/types";

// =============================================================================
// Registry
// =============================================================================

/**
 * A registered attestor.
 */
export interface AttestorEntry {
  readonly address: Address;

  /** Human-readable label for this attestor */
  readonly label: string;

  /** ISO 8601 timestamp when this attestor was added */
  readonly addedAt: string;
}

/**
 * What consensus needs to know about attestors.
 */
export interface AttestorDirectory {
  isAttestor(address: Address): boolean;
  readonly quorum: number;
}

// =============================================================================
// Signing
// =============================================================================

/**
 * EIP-712 domain parameters that bind signatures to one deployment.
 */
export interface OracleDomain {
  readonly chainId: number;
  readonly verifyingContract: Address;
}

/**
 * The message every attestor signs for a rewards update.
 */
export interface RewardsUpdateMessage {
  readonly rewardsRoot: Bytes32;

  /** keccak256 of the payload URI */
  readonly payloadHash: Bytes32;

  readonly updateTimestamp: bigint;
  readonly nonce: bigint;
}

// =============================================================================
// Consensus
// =============================================================================

/**
 * A proposed snapshot.
 */
export interface SnapshotSubmission {
  /** Attestor submitting the update */
  readonly caller: Address;
  readonly rewardsRoot: Bytes32;
  readonly updateTimestamp: bigint;
  readonly payloadUri: string;

  /** Concatenated 65-byte signatures, ordered by increasing signer address */
  readonly signatures: Hex;
}

// =============================================================================
// Errors
// =============================================================================

export type ConsensusErrorCode =
  | "ACCESS_DENIED"
  | "INVALID_ROOT"
  | "INVALID_TIMESTAMP"
  | "FUTURE_TIMESTAMP"
  | "TOO_EARLY_UPDATE"
  | "NOT_ENOUGH_SIGNATURES"
  | "INVALID_SIGNER";

/**
 * Structured error from snapshot consensus.
 * A rejected submission leaves consensus state untouched.
 */
export class ConsensusError extends Error {
  public readonly code: ConsensusErrorCode;

  constructor(code: ConsensusErrorCode, message: string) {
    super(message);
    this.name = "ConsensusError";
    this.code = code;
  }
}

export type RegistryErrorCode =
  | "INVALID_ADDRESS"
  | "ATTESTOR_EXISTS"
  | "ATTESTOR_NOT_FOUND"
  | "INVALID_QUORUM";

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}
