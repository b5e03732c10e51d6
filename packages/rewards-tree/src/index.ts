/**
 * @stakecore/rewards-tree — Rewards snapshot commitments.
 *
 * Merkle trees over per-vault cumulative rewards, inclusion proofs,
 * and the off-chain payload published with each snapshot.
 *
 * @packageDocumentation
 */

// Types
export type {
  RewardLeaf,
  RewardProof,
  RewardsPayload,
  RewardsTreeErrorCode,
} from "./types.js";
export { RewardsTreeError } from "./types.js";

// Rewards tree
export { RewardsTree, hashRewardLeaf, verifyRewardProof } from "./rewards-tree.js";

// Payloads
export {
  hashPayloadUri,
  buildRewardsPayload,
  hashRewardsPayload,
  payloadContentUri,
  verifyRewardsPayload,
} from "./payload.js";
