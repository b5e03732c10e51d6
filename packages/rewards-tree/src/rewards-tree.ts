/**
 * @stakecore/rewards-tree — Rewards tree.
 *
 * Commits every vault's cumulative rewards to a single root.
 *
 * Design:
 * - Built on StandardMerkleTree with the (address, int160, uint160) encoding
 * - Leaf = keccak256(keccak256(abi.encode(vault, reward, unlockedReward)))
 * - Leaves are sorted by hash and pairs are hashed in sorted order
 * - One leaf per vault; widths are checked before encoding
 */

import { StandardMerkleTree } from "@openzeppelin/merkle-tree";
import { encodeAbiParameters, keccak256 } from "viem";
import type { Address, Bytes32 } from "@stakecore/types";
import { fitsInt, fitsUint, isAddress, isBytes32, lowerHex } from "@stakecore/types";
import { RewardsTreeError } from "./types.js";
import type { RewardLeaf, RewardProof } from "./types.js";

const LEAF_ENCODING = [
  { name: "vault", type: "address" },
  { name: "reward", type: "int160" },
  { name: "unlockedReward", type: "uint160" },
] as const;

const TREE_ENCODING = LEAF_ENCODING.map((param) => param.type);

/** Leaf values as the tree encodes them: lowercased address, decimal amounts. */
type LeafValues = [string, string, string];

// =============================================================================
// Leaf hashing
// =============================================================================

function leafProblem(leaf: RewardLeaf): string | null {
  if (!isAddress(leaf.vault)) return `invalid vault address "${leaf.vault}"`;
  if (!fitsInt(leaf.reward, 160)) return `reward ${leaf.reward} does not fit int160`;
  if (!fitsUint(leaf.unlockedReward, 160)) {
    return `unlocked reward ${leaf.unlockedReward} does not fit uint160`;
  }
  return null;
}

function leafValues(leaf: RewardLeaf): LeafValues {
  return [lowerHex(leaf.vault), leaf.reward.toString(), leaf.unlockedReward.toString()];
}

function toBytes32(value: string): Bytes32 {
  const lowered = value.toLowerCase();
  if (!isBytes32(lowered)) {
    throw new RewardsTreeError("INVALID_LEAF", `Tree produced a malformed hash "${value}"`);
  }
  return lowered;
}

/**
 * Hash a reward leaf.
 *
 * @throws RewardsTreeError INVALID_LEAF on a malformed address or out-of-range amount
 */
export function hashRewardLeaf(leaf: RewardLeaf): Bytes32 {
  const problem = leafProblem(leaf);
  if (problem !== null) {
    throw new RewardsTreeError("INVALID_LEAF", `Invalid reward leaf: ${problem}`);
  }
  const encoded = encodeAbiParameters(LEAF_ENCODING, [
    lowerHex(leaf.vault),
    leaf.reward,
    leaf.unlockedReward,
  ]);
  return keccak256(keccak256(encoded));
}

/**
 * Check that `leaf` is committed under `root` by `proof`.
 * Malformed leaves and proofs verify as false rather than throwing.
 */
export function verifyRewardProof(
  root: Bytes32,
  leaf: RewardLeaf,
  proof: readonly Bytes32[],
): boolean {
  if (leafProblem(leaf) !== null) return false;
  if (!isBytes32(root) || !proof.every((node) => isBytes32(node))) return false;
  return StandardMerkleTree.verify(root, TREE_ENCODING, leafValues(leaf), [...proof]);
}

// =============================================================================
// Tree
// =============================================================================

/**
 * Immutable rewards tree.
 *
 * Usage:
 * ```ts
 * const tree = RewardsTree.build([{ vault, reward: 5n, unlockedReward: 0n }]);
 * const found = tree.getProof(vault);
 * if (found) verifyRewardProof(tree.root, found.leaf, found.proof);   // true
 * ```
 */
export class RewardsTree {
  private readonly tree: StandardMerkleTree<LeafValues>;
  private readonly leaves: readonly RewardLeaf[];
  private readonly leafHashes: readonly Bytes32[];
  private readonly rootHash: Bytes32;
  private readonly indexByVault: ReadonlyMap<string, number>;

  private constructor(leaves: readonly RewardLeaf[]) {
    const indexByVault = new Map<string, number>();
    leaves.forEach((leaf, i) => {
      const key = leaf.vault.toLowerCase();
      if (indexByVault.has(key)) {
        throw new RewardsTreeError("DUPLICATE_VAULT", `Vault appears twice: ${leaf.vault}`);
      }
      indexByVault.set(key, i);
    });

    this.leaves = leaves.map((leaf) => ({ ...leaf }));
    this.leafHashes = leaves.map(hashRewardLeaf);
    this.indexByVault = indexByVault;
    this.tree = StandardMerkleTree.of(leaves.map(leafValues), TREE_ENCODING);
    this.rootHash = toBytes32(this.tree.root);
  }

  /**
   * @throws RewardsTreeError EMPTY_TREE, DUPLICATE_VAULT or INVALID_LEAF
   */
  static build(leaves: readonly RewardLeaf[]): RewardsTree {
    if (leaves.length === 0) {
      throw new RewardsTreeError("EMPTY_TREE", "A rewards tree needs at least one vault");
    }
    return new RewardsTree(leaves);
  }

  get root(): Bytes32 {
    return this.rootHash;
  }

  get size(): number {
    return this.leaves.length;
  }

  getLeaf(vault: Address): RewardLeaf | undefined {
    const index = this.indexByVault.get(vault.toLowerCase());
    return index === undefined ? undefined : this.leaves[index];
  }

  /**
   * Inclusion proof for a vault, or null when the vault has no leaf.
   */
  getProof(vault: Address): RewardProof | null {
    const index = this.indexByVault.get(vault.toLowerCase());
    if (index === undefined) return null;

    const leaf = this.leaves[index];
    const leafHash = this.leafHashes[index];
    if (leaf === undefined || leafHash === undefined) return null;

    const proof = this.tree.getProof(index).map(toBytes32);
    return { leaf, leafHash, proof, root: this.rootHash };
  }

  entries(): readonly RewardLeaf[] {
    return [...this.leaves];
  }
}
