/**
 * @stakecore/keeper — Per-vault reward harvesting.
 *
 * @packageDocumentation
 */

export type {
  RewardsRootSource,
  VaultDirectory,
  HarvestOptions,
  KeeperErrorCode,
} from "./types.js";
export { KeeperError } from "./types.js";

export { VaultRegistry } from "./vault-registry.js";
export { RewardStore } from "./reward-store.js";
export { RewardHarvester } from "./reward-harvester.js";
export type { RewardHarvesterOptions } from "./reward-harvester.js";
