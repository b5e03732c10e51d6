/**
 * @stakecore/keeper — Reward harvester.
 *
 * Applies a vault's attested cumulative reward exactly once per snapshot.
 *
 * Design:
 * - A proof is accepted against the current root, or the previous one
 *   (one-generation grace window); a previous-root harvest syncs the vault
 *   to nonce - 1 so the current snapshot can still be applied afterwards
 * - Records store cumulative values; the harvest returns the signed delta
 * - Primary and secondary streams carry their own synced nonce
 * - Every check runs before the first record is written
 */

import type {
  Address,
  Bytes32,
  EventSink,
  HarvestedEvent,
  HarvestParams,
  HarvestResult,
  RewardRecord,
  UnlockedRewardRecord,
} from "@stakecore/types";
import { fitsInt, fitsUint, isBytes32, lowerHex, ZERO_BYTES32 } from "@stakecore/types";
import { verifyRewardProof } from "@stakecore/rewards-tree";
import type { RewardStore } from "./reward-store.js";
import { KeeperError } from "./types.js";
import type { HarvestOptions, RewardsRootSource, VaultDirectory } from "./types.js";

export interface RewardHarvesterOptions {
  readonly roots: RewardsRootSource;
  readonly vaults: VaultDirectory;
  readonly store: RewardStore;

  /** Receives a harvested event whenever a record changes */
  readonly onEvent?: EventSink | undefined;
}

const NO_REWARD: RewardRecord = { cumulativeAssets: 0n, syncedNonce: 0n };

/** Records a harvest would write; null where a stream is already synced. */
interface HarvestPlan {
  readonly result: HarvestResult;
  readonly reward: RewardRecord | null;
  readonly unlocked: UnlockedRewardRecord | null;
}

// =============================================================================
// Reward Harvester
// =============================================================================

export class RewardHarvester {
  private readonly roots: RewardsRootSource;
  private readonly vaults: VaultDirectory;
  private readonly store: RewardStore;
  private readonly onEvent: EventSink | undefined;

  constructor(options: RewardHarvesterOptions) {
    this.roots = options.roots;
    this.vaults = options.vaults;
    this.store = options.store;
    this.onEvent = options.onEvent;
  }

  // ─── Harvest ────────────────────────────────────────────────────────

  /**
   * Apply the attested rewards for `caller`.
   *
   * Returns zero deltas with `harvested: false` when the vault is already
   * synced to the matched snapshot.
   *
   * @throws KeeperError ACCESS_DENIED if the caller is not a registered vault
   * @throws KeeperError INVALID_AMOUNT on out-of-range amounts or a shrinking secondary stream
   * @throws KeeperError INVALID_PROOF if the proof verifies against neither root
   */
  harvest(caller: Address, params: HarvestParams, options: HarvestOptions): HarvestResult {
    const plan = this.plan(caller, params, options);

    if (plan.reward !== null) this.store.setReward(caller, plan.reward);
    if (plan.unlocked !== null) this.store.setUnlockedReward(caller, plan.unlocked);

    if (plan.reward !== null || plan.unlocked !== null) {
      const event: HarvestedEvent = {
        type: "harvested",
        vault: caller,
        rewardsRoot: plan.result.rewardsRoot,
        delta: plan.result.delta,
        unlockedDelta: plan.result.unlockedDelta,
      };
      this.onEvent?.(event);
    }

    return plan.result;
  }

  /**
   * Result `harvest` would return, without writing any record.
   * Throws exactly when `harvest` would.
   */
  previewHarvest(caller: Address, params: HarvestParams, options: HarvestOptions): HarvestResult {
    return this.plan(caller, params, options).result;
  }

  /**
   * Whether the proof would verify against the current or previous root.
   * Never mutates state.
   */
  canHarvest(vault: Address, params: HarvestParams): boolean {
    return this.vaults.isVault(vault) && this.matchRoot(vault, params) !== null;
  }

  // ─── Sync state ─────────────────────────────────────────────────────

  /**
   * Whether the vault has a record that is behind the latest snapshot.
   * Vaults that were never collateralized have nothing to harvest.
   */
  isHarvestRequired(vault: Address): boolean {
    const record = this.store.getReward(vault);
    return record !== undefined && record.syncedNonce !== this.roots.nonce;
  }

  /**
   * Whether the vault is more than one snapshot behind, so neither
   * accepted root can bring it up to date in a single harvest.
   */
  isStale(vault: Address): boolean {
    const record = this.store.getReward(vault);
    return record !== undefined && record.syncedNonce + 1n < this.roots.nonce;
  }

  /**
   * Start tracking rewards for a vault that has begun staking.
   * A vault that already has a record is left unchanged.
   *
   * @throws KeeperError ACCESS_DENIED if the vault is not registered
   */
  collateralize(vault: Address): RewardRecord {
    if (!this.vaults.isVault(vault)) {
      throw new KeeperError("ACCESS_DENIED", `Vault ${vault} is not registered`);
    }
    const existing = this.store.getReward(vault);
    if (existing !== undefined) return existing;

    const record: RewardRecord = { cumulativeAssets: 0n, syncedNonce: this.roots.nonce };
    this.store.setReward(vault, record);
    return record;
  }

  isCollateralized(vault: Address): boolean {
    return this.store.getReward(vault) !== undefined;
  }

  getReward(vault: Address): RewardRecord | undefined {
    return this.store.getReward(vault);
  }

  getUnlockedReward(vault: Address): UnlockedRewardRecord | undefined {
    return this.store.getUnlockedReward(vault);
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private plan(caller: Address, params: HarvestParams, options: HarvestOptions): HarvestPlan {
    if (!this.vaults.isVault(caller)) {
      throw new KeeperError("ACCESS_DENIED", `Caller ${caller} is not a registered vault`);
    }
    if (!fitsInt(params.reward, 160)) {
      throw new KeeperError("INVALID_AMOUNT", `Reward ${params.reward} does not fit int160`);
    }
    if (!fitsUint(params.unlockedReward, 160)) {
      throw new KeeperError(
        "INVALID_AMOUNT",
        `Unlocked reward ${params.unlockedReward} does not fit uint160`,
      );
    }

    const nonce = this.matchRoot(caller, params);
    if (nonce === null) {
      throw new KeeperError(
        "INVALID_PROOF",
        `Proof for ${caller} does not verify against the current or previous rewards root`,
      );
    }
    const rewardsRoot = lowerHex(params.rewardsRoot);

    const stored = this.store.getReward(caller) ?? NO_REWARD;
    const storedUnlocked = this.store.getUnlockedReward(caller) ?? NO_REWARD;

    const applyPrimary = stored.syncedNonce < nonce;
    // The unlocked stream only moves together with the primary one.
    const applySecondary =
      applyPrimary && options.sharedEscrow && storedUnlocked.syncedNonce < nonce;

    const delta = applyPrimary ? params.reward - stored.cumulativeAssets : 0n;
    const unlockedDelta = applySecondary
      ? params.unlockedReward - storedUnlocked.cumulativeAssets
      : 0n;

    if (unlockedDelta < 0n) {
      throw new KeeperError(
        "INVALID_AMOUNT",
        `Unlocked reward for ${caller} decreased from ` +
          `${storedUnlocked.cumulativeAssets} to ${params.unlockedReward}`,
      );
    }

    return {
      result: { harvested: applyPrimary, rewardsRoot, delta, unlockedDelta },
      reward: applyPrimary ? { cumulativeAssets: params.reward, syncedNonce: nonce } : null,
      unlocked: applySecondary
        ? { cumulativeAssets: params.unlockedReward, syncedNonce: nonce }
        : null,
    };
  }

  /**
   * Nonce a verified proof syncs to, or null when it verifies against
   * neither accepted root.
   */
  private matchRoot(vault: Address, params: HarvestParams): bigint | null {
    if (!isBytes32(params.rewardsRoot)) return null;
    const root: Bytes32 = lowerHex(params.rewardsRoot);

    let nonce: bigint;
    if (root !== ZERO_BYTES32 && root === lowerHex(this.roots.rewardsRoot)) {
      nonce = this.roots.nonce;
    } else if (root !== ZERO_BYTES32 && root === lowerHex(this.roots.previousRewardsRoot)) {
      nonce = this.roots.nonce - 1n;
    } else {
      return null;
    }

    const leaf = { vault, reward: params.reward, unlockedReward: params.unlockedReward };
    return verifyRewardProof(root, leaf, params.proof) ? nonce : null;
  }
}
