/**
 * Payload Builder
 *
 * Off-chain breakdown of a rewards snapshot. Attestors sign over the
 * keccak-256 hash of the payload's URI; the payload itself is
 * content-addressed by the SHA-256 of its canonical JSON.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { keccak256, stringToBytes } from "viem";
import type { Bytes32 } from "@stakecore/types";
import { isAddress, isDecimalString } from "@stakecore/types";
import { RewardsTree } from "./rewards-tree.js";
import { RewardsTreeError } from "./types.js";
import type { RewardsPayload } from "./types.js";

/**
 * keccak256 of the UTF-8 bytes of a payload URI.
 * This is the value attestors sign as the payload hash.
 */
export function hashPayloadUri(payloadUri: string): Bytes32 {
  return keccak256(stringToBytes(payloadUri));
}

/**
 * Build the publishable payload for a tree.
 */
export function buildRewardsPayload(tree: RewardsTree, updateTimestamp: bigint): RewardsPayload {
  return {
    format: "stakecore-rewards-v1",
    rewardsRoot: tree.root,
    updateTimestamp: updateTimestamp.toString(),
    vaults: tree.entries().map((leaf) => ({
      vault: leaf.vault,
      reward: leaf.reward.toString(),
      unlockedReward: leaf.unlockedReward.toString(),
      proof: tree.getProof(leaf.vault)?.proof ?? [],
    })),
  };
}

/**
 * SHA-256 of the payload's RFC 8785 canonical JSON.
 */
export function hashRewardsPayload(payload: RewardsPayload): string {
  return createHash("sha256").update(canonicalize(payload)).digest("hex");
}

/**
 * Content-addressed URI for a payload.
 */
export function payloadContentUri(payload: RewardsPayload): string {
  return `sha256:${hashRewardsPayload(payload)}`;
}

/**
 * Rebuild the tree from a payload and check it reproduces the stated root.
 *
 * @throws RewardsTreeError INVALID_PAYLOAD on malformed entries or a root mismatch
 */
export function verifyRewardsPayload(payload: RewardsPayload): RewardsTree {
  const leaves = payload.vaults.map((entry) => {
    if (
      !isAddress(entry.vault) ||
      !isDecimalString(entry.reward) ||
      !isDecimalString(entry.unlockedReward)
    ) {
      throw new RewardsTreeError("INVALID_PAYLOAD", `Malformed payload entry for ${entry.vault}`);
    }
    return {
      vault: entry.vault,
      reward: BigInt(entry.reward),
      unlockedReward: BigInt(entry.unlockedReward),
    };
  });

  const tree = RewardsTree.build(leaves);
  if (tree.root !== payload.rewardsRoot.toLowerCase()) {
    throw new RewardsTreeError(
      "INVALID_PAYLOAD",
      `Payload root ${payload.rewardsRoot} does not match rebuilt root ${tree.root}`,
    );
  }
  return tree;
}
