/**
 * @stakecore/keeper — Per-vault reward records.
 *
 * Owned state of the harvester, keyed by vault address. Two independent
 * records per vault: the primary cumulative reward, and the cumulative
 * execution reward unlocked from the shared escrow.
 */

import type { Address, RewardRecord, UnlockedRewardRecord } from "@stakecore/types";

export class RewardStore {
  private readonly rewards = new Map<string, RewardRecord>();
  private readonly unlocked = new Map<string, UnlockedRewardRecord>();

  getReward(vault: Address): RewardRecord | undefined {
    return this.rewards.get(vault.toLowerCase());
  }

  setReward(vault: Address, record: RewardRecord): void {
    this.rewards.set(vault.toLowerCase(), record);
  }

  getUnlockedReward(vault: Address): UnlockedRewardRecord | undefined {
    return this.unlocked.get(vault.toLowerCase());
  }

  setUnlockedReward(vault: Address, record: UnlockedRewardRecord): void {
    this.unlocked.set(vault.toLowerCase(), record);
  }

  get size(): number {
    return this.rewards.size;
  }
}
