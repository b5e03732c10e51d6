/**
 * @stakecore/rewards-tree — Core types.
 *
 * Leaves commit to (vault, cumulative reward, cumulative unlocked reward).
 * All hashes are keccak-256, 0x-prefixed, lowercase.
 */

import type { Address, Bytes32 } from "@stakecore/types";

// =============================================================================
// Tree Types
// =============================================================================

/**
 * One vault's entry in a rewards snapshot.
 */
export interface RewardLeaf {
  readonly vault: Address;

  /** Cumulative reward (int160; negative after penalties) */
  readonly reward: bigint;

  /** Cumulative execution reward unlocked from the shared escrow (uint160) */
  readonly unlockedReward: bigint;
}

/**
 * Inclusion proof for one vault.
 */
export interface RewardProof {
  readonly leaf: RewardLeaf;
  readonly leafHash: Bytes32;
  readonly proof: readonly Bytes32[];
  readonly root: Bytes32;
}

// =============================================================================
// Payload Types
// =============================================================================

/**
 * Off-chain breakdown of a rewards snapshot, published alongside the root.
 * Amounts are decimal strings so the payload survives JSON.
 */
export interface RewardsPayload {
  readonly format: "stakecore-rewards-v1";
  readonly rewardsRoot: Bytes32;
  readonly updateTimestamp: string;
  readonly vaults: readonly {
    readonly vault: Address;
    readonly reward: string;
    readonly unlockedReward: string;
    readonly proof: readonly Bytes32[];
  }[];
}

// =============================================================================
// Errors
// =============================================================================

export type RewardsTreeErrorCode =
  | "EMPTY_TREE"
  | "DUPLICATE_VAULT"
  | "INVALID_LEAF"
  | "INVALID_PAYLOAD";

export class RewardsTreeError extends Error {
  public readonly code: RewardsTreeErrorCode;

  constructor(code: RewardsTreeErrorCode, message: string) {
    super(message);
    this.name = "RewardsTreeError";
    this.code = code;
  }
}
