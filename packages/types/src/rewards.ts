/**
 * Rewards Types
 *
 * Oracle-attested rewards snapshots and the per-vault harvest records
 * derived from them.
 *
 * Rules:
 * - A snapshot is immutable once accepted
 * - Snapshot nonces strictly increase by one per accepted update
 * - Reward records store CUMULATIVE amounts; deltas are derived on harvest
 */

import type { Address, Bytes32 } from "./primitives.js";

/**
 * An accepted rewards snapshot.
 */
export interface RewardsSnapshot {
  /** Merkle root committing to every vault's cumulative reward */
  readonly rewardsRoot: Bytes32;

  /** Root that was current before this snapshot was accepted */
  readonly previousRoot: Bytes32;

  /** Nonce the attestors signed over */
  readonly nonce: bigint;

  /** Attested update time (unix seconds) */
  readonly updateTimestamp: bigint;

  /** Off-chain pointer to the full rewards payload */
  readonly payloadUri: string;

  /** keccak256 of the UTF-8 encoded payload pointer */
  readonly payloadHash: Bytes32;

  /** Attestor that submitted the snapshot */
  readonly submittedBy: Address;

  /** Recovered signer addresses, strictly increasing */
  readonly signers: readonly Address[];
}

/**
 * Per-vault cumulative reward record (primary stream).
 */
export interface RewardRecord {
  /** Cumulative reward, may be negative after penalties (int160) */
  readonly cumulativeAssets: bigint;

  /** Nonce of the snapshot last applied */
  readonly syncedNonce: bigint;
}

/**
 * Per-vault cumulative record of execution rewards unlocked from the
 * shared escrow (secondary stream, uint160).
 */
export interface UnlockedRewardRecord {
  readonly cumulativeAssets: bigint;
  readonly syncedNonce: bigint;
}

/**
 * Proof-carrying harvest input for one vault.
 */
export interface HarvestParams {
  /** Root the caller built the proof against */
  readonly rewardsRoot: Bytes32;

  /** Attested cumulative reward (int160) */
  readonly reward: bigint;

  /** Attested cumulative unlocked execution reward (uint160) */
  readonly unlockedReward: bigint;

  /** Sibling hashes from leaf to root */
  readonly proof: readonly Bytes32[];
}

/**
 * Outcome of a harvest call.
 */
export interface HarvestResult {
  /** False when the vault was already synced to the matched snapshot */
  readonly harvested: boolean;

  /** Root the proof verified against */
  readonly rewardsRoot: Bytes32;

  /** Signed change of the primary cumulative reward */
  readonly delta: bigint;

  /** Change of the secondary stream (zero for vaults with their own escrow) */
  readonly unlockedDelta: bigint;
}
