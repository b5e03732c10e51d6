/**
 * Reward Harvester Tests
 *
 * Verifies:
 * - Harvest applies the delta between the attested and stored cumulative reward
 * - Proofs verify against the current or previous root only
 * - A snapshot is never applied twice
 * - The secondary stream is tracked only for shared-escrow vaults, and only
 *   when the primary stream is applied in the same harvest
 * - Failed harvests leave every record untouched
 */

import { describe, it, expect, beforeEach } from "vitest";
import { RewardsTree } from "@stakecore/rewards-tree";
import type { Address, Bytes32, HarvestParams, ProtocolEvent } from "@stakecore/types";
import { ZERO_BYTES32 } from "@stakecore/types";
import { RewardHarvester } from "../src/reward-harvester.js";
import { RewardStore } from "../src/reward-store.js";
import { VaultRegistry } from "../src/vault-registry.js";
import { KeeperError } from "../src/types.js";
import type { RewardsRootSource } from "../src/types.js";

const VAULT_A: Address = "0x00000000000000000000000000000000000000a1";
const VAULT_B: Address = "0x00000000000000000000000000000000000000b2";
const OUTSIDER: Address = "0x00000000000000000000000000000000000000c3";

const OWN = { sharedEscrow: false };
const SHARED = { sharedEscrow: true };

class MutableRoots implements RewardsRootSource {
  rewardsRoot: Bytes32 = ZERO_BYTES32;
  previousRewardsRoot: Bytes32 = ZERO_BYTES32;
  nonce = 1n;

  publish(tree: RewardsTree): void {
    this.previousRewardsRoot = this.rewardsRoot;
    this.rewardsRoot = tree.root;
    this.nonce += 1n;
  }
}

function treeOf(a: [bigint, bigint], b: [bigint, bigint]): RewardsTree {
  return RewardsTree.build([
    { vault: VAULT_A, reward: a[0], unlockedReward: a[1] },
    { vault: VAULT_B, reward: b[0], unlockedReward: b[1] },
  ]);
}

function paramsFor(tree: RewardsTree, vault: Address): HarvestParams {
  const found = tree.getProof(vault);
  if (found === null) throw new Error(`no leaf for ${vault}`);
  return {
    rewardsRoot: tree.root,
    reward: found.leaf.reward,
    unlockedReward: found.leaf.unlockedReward,
    proof: found.proof,
  };
}

function expectCode(fn: () => unknown, code: string): void {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(KeeperError);
    if (err instanceof KeeperError) expect(err.code).toBe(code);
    return;
  }
  throw new Error(`expected KeeperError ${code}`);
}

describe("RewardHarvester", () => {
  let roots: MutableRoots;
  let store: RewardStore;
  let events: ProtocolEvent[];
  let harvester: RewardHarvester;

  beforeEach(() => {
    roots = new MutableRoots();
    store = new RewardStore();
    events = [];
    harvester = new RewardHarvester({
      roots,
      vaults: new VaultRegistry([VAULT_A, VAULT_B]),
      store,
      onEvent: (event) => events.push(event),
    });
  });

  describe("harvest", () => {
    it("applies the full reward on the first harvest", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);

      const result = harvester.harvest(VAULT_A, paramsFor(tree, VAULT_A), OWN);

      expect(result).toEqual({
        harvested: true,
        rewardsRoot: tree.root,
        delta: 100n,
        unlockedDelta: 0n,
      });
      expect(harvester.getReward(VAULT_A)).toEqual({ cumulativeAssets: 100n, syncedNonce: 2n });
    });

    it("applies only the difference on later snapshots", () => {
      const first = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(first);
      harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), OWN);

      const second = treeOf([130n, 0n], [50n, 0n]);
      roots.publish(second);
      const result = harvester.harvest(VAULT_A, paramsFor(second, VAULT_A), OWN);

      expect(result.delta).toBe(30n);
      expect(harvester.getReward(VAULT_A)).toEqual({ cumulativeAssets: 130n, syncedNonce: 3n });
    });

    it("reports a negative delta when the cumulative reward drops", () => {
      const first = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(first);
      harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), OWN);

      const second = treeOf([-20n, 0n], [50n, 0n]);
      roots.publish(second);

      expect(harvester.harvest(VAULT_A, paramsFor(second, VAULT_A), OWN).delta).toBe(-120n);
    });

    it("does not apply the same snapshot twice", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);
      harvester.harvest(VAULT_A, paramsFor(tree, VAULT_A), OWN);
      events.length = 0;

      const again = harvester.harvest(VAULT_A, paramsFor(tree, VAULT_A), OWN);

      expect(again).toEqual({
        harvested: false,
        rewardsRoot: tree.root,
        delta: 0n,
        unlockedDelta: 0n,
      });
      expect(events).toEqual([]);
    });

    it("emits a harvested event", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);
      harvester.harvest(VAULT_B, paramsFor(tree, VAULT_B), OWN);

      expect(events).toEqual([
        { type: "harvested", vault: VAULT_B, rewardsRoot: tree.root, delta: 50n, unlockedDelta: 0n },
      ]);
    });
  });

  describe("previous root grace window", () => {
    it("accepts a proof against the previous root and syncs to the prior nonce", () => {
      const first = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(first);
      const second = treeOf([130n, 0n], [60n, 0n]);
      roots.publish(second);

      const result = harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), OWN);

      expect(result.delta).toBe(100n);
      expect(harvester.getReward(VAULT_A)).toEqual({ cumulativeAssets: 100n, syncedNonce: 2n });
      expect(harvester.isHarvestRequired(VAULT_A)).toBe(true);
    });

    it("lets the current snapshot be applied after a previous-root harvest", () => {
      const first = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(first);
      const second = treeOf([130n, 0n], [60n, 0n]);
      roots.publish(second);
      harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), OWN);

      const result = harvester.harvest(VAULT_A, paramsFor(second, VAULT_A), OWN);

      expect(result.delta).toBe(30n);
      expect(harvester.isHarvestRequired(VAULT_A)).toBe(false);
    });

    it("ignores the previous root once the current one has been applied", () => {
      const first = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(first);
      const second = treeOf([130n, 0n], [60n, 0n]);
      roots.publish(second);
      harvester.harvest(VAULT_A, paramsFor(second, VAULT_A), OWN);

      const result = harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), OWN);

      expect(result.harvested).toBe(false);
      expect(harvester.getReward(VAULT_A)).toEqual({ cumulativeAssets: 130n, syncedNonce: 3n });
    });

    it("rejects a root two generations old", () => {
      const first = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(first);
      roots.publish(treeOf([130n, 0n], [60n, 0n]));
      roots.publish(treeOf([160n, 0n], [70n, 0n]));

      expectCode(() => harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), OWN), "INVALID_PROOF");
      expect(harvester.getReward(VAULT_A)).toBeUndefined();
    });
  });

  describe("rejections", () => {
    it("rejects callers that are not registered vaults", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);

      expectCode(
        () => harvester.harvest(OUTSIDER, paramsFor(tree, VAULT_A), OWN),
        "ACCESS_DENIED",
      );
    });

    it("rejects another vault's proof", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);

      expectCode(() => harvester.harvest(VAULT_B, paramsFor(tree, VAULT_A), OWN), "INVALID_PROOF");
    });

    it("rejects an altered reward", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);
      const params = { ...paramsFor(tree, VAULT_A), reward: 101n };

      expectCode(() => harvester.harvest(VAULT_A, params, OWN), "INVALID_PROOF");
    });

    it("rejects the zero root even when it is the previous root", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);
      const params = { ...paramsFor(tree, VAULT_A), rewardsRoot: ZERO_BYTES32 };

      expectCode(() => harvester.harvest(VAULT_A, params, OWN), "INVALID_PROOF");
    });

    it("rejects amounts outside their ranges", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);
      const params = paramsFor(tree, VAULT_A);

      expectCode(
        () => harvester.harvest(VAULT_A, { ...params, reward: 2n ** 159n }, OWN),
        "INVALID_AMOUNT",
      );
      expectCode(
        () => harvester.harvest(VAULT_A, { ...params, unlockedReward: -1n }, OWN),
        "INVALID_AMOUNT",
      );
    });
  });

  describe("secondary stream", () => {
    it("tracks unlocked rewards for shared-escrow vaults", () => {
      const first = treeOf([100n, 40n], [50n, 0n]);
      roots.publish(first);
      const r1 = harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), SHARED);

      const second = treeOf([120n, 55n], [50n, 0n]);
      roots.publish(second);
      const r2 = harvester.harvest(VAULT_A, paramsFor(second, VAULT_A), SHARED);

      expect(r1.unlockedDelta).toBe(40n);
      expect(r2.unlockedDelta).toBe(15n);
      expect(harvester.getUnlockedReward(VAULT_A)).toEqual({
        cumulativeAssets: 55n,
        syncedNonce: 3n,
      });
    });

    it("ignores unlocked rewards for own-escrow vaults", () => {
      const tree = treeOf([100n, 40n], [50n, 0n]);
      roots.publish(tree);

      const result = harvester.harvest(VAULT_A, paramsFor(tree, VAULT_A), OWN);

      expect(result.unlockedDelta).toBe(0n);
      expect(harvester.getUnlockedReward(VAULT_A)).toBeUndefined();
    });

    it("pays no unlocked reward while the primary stream is already synced", () => {
      const tree = treeOf([100n, 40n], [50n, 0n]);
      roots.publish(tree);
      harvester.collateralize(VAULT_A);

      const result = harvester.harvest(VAULT_A, paramsFor(tree, VAULT_A), SHARED);

      expect(result).toEqual({
        harvested: false,
        rewardsRoot: tree.root,
        delta: 0n,
        unlockedDelta: 0n,
      });
      expect(harvester.getUnlockedReward(VAULT_A)).toBeUndefined();
      expect(events).toEqual([]);

      const next = treeOf([130n, 60n], [50n, 0n]);
      roots.publish(next);
      const later = harvester.harvest(VAULT_A, paramsFor(next, VAULT_A), SHARED);

      expect(later.delta).toBe(130n);
      expect(later.unlockedDelta).toBe(60n);
    });

    it("rejects a shrinking unlocked reward without touching either record", () => {
      const first = treeOf([100n, 40n], [50n, 0n]);
      roots.publish(first);
      harvester.harvest(VAULT_A, paramsFor(first, VAULT_A), SHARED);

      const second = treeOf([120n, 30n], [50n, 0n]);
      roots.publish(second);

      expectCode(
        () => harvester.harvest(VAULT_A, paramsFor(second, VAULT_A), SHARED),
        "INVALID_AMOUNT",
      );
      expect(harvester.getReward(VAULT_A)).toEqual({ cumulativeAssets: 100n, syncedNonce: 2n });
      expect(harvester.getUnlockedReward(VAULT_A)).toEqual({
        cumulativeAssets: 40n,
        syncedNonce: 2n,
      });
    });
  });

  describe("sync state", () => {
    it("does not require a harvest from a vault with no record", () => {
      roots.publish(treeOf([100n, 0n], [50n, 0n]));

      expect(harvester.isHarvestRequired(VAULT_A)).toBe(false);
      expect(harvester.isStale(VAULT_A)).toBe(false);
    });

    it("collateralizes at the current nonce without changing later calls", () => {
      roots.publish(treeOf([100n, 0n], [50n, 0n]));

      expect(harvester.collateralize(VAULT_A)).toEqual({ cumulativeAssets: 0n, syncedNonce: 2n });
      expect(harvester.isCollateralized(VAULT_A)).toBe(true);
      expect(harvester.isHarvestRequired(VAULT_A)).toBe(false);

      roots.publish(treeOf([130n, 0n], [60n, 0n]));
      expect(harvester.collateralize(VAULT_A)).toEqual({ cumulativeAssets: 0n, syncedNonce: 2n });
      expect(harvester.isHarvestRequired(VAULT_A)).toBe(true);
      expect(harvester.isStale(VAULT_A)).toBe(false);

      roots.publish(treeOf([160n, 0n], [70n, 0n]));
      expect(harvester.isStale(VAULT_A)).toBe(true);
    });

    it("refuses to collateralize an unregistered address", () => {
      expectCode(() => harvester.collateralize(OUTSIDER), "ACCESS_DENIED");
    });

    it("previewHarvest returns the harvest result without writing records", () => {
      const tree = treeOf([100n, 40n], [50n, 0n]);
      roots.publish(tree);

      const preview = harvester.previewHarvest(VAULT_A, paramsFor(tree, VAULT_A), SHARED);

      expect(preview).toEqual({
        harvested: true,
        rewardsRoot: tree.root,
        delta: 100n,
        unlockedDelta: 40n,
      });
      expect(store.size).toBe(0);
      expect(events).toEqual([]);
      expect(harvester.harvest(VAULT_A, paramsFor(tree, VAULT_A), SHARED)).toEqual(preview);
    });

    it("canHarvest reports verification without mutating", () => {
      const tree = treeOf([100n, 0n], [50n, 0n]);
      roots.publish(tree);

      expect(harvester.canHarvest(VAULT_A, paramsFor(tree, VAULT_A))).toBe(true);
      expect(harvester.canHarvest(VAULT_B, paramsFor(tree, VAULT_A))).toBe(false);
      expect(harvester.canHarvest(OUTSIDER, paramsFor(tree, VAULT_A))).toBe(false);
      expect(store.size).toBe(0);
    });
  });
});
