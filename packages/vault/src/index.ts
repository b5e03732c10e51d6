/**
 * @stakecore/vault — Staking vault accounting.
 *
 * Deposits, reward accrual, the withdrawal exit queue and
 * execution-reward escrows.
 *
 * @packageDocumentation
 */

// Types
export type {
  EscrowKind,
  VaultConfig,
  AssetTransfer,
  UpdateStateResult,
  ClaimResult,
  VaultState,
  VaultErrorCode,
} from "./types.js";
export { VaultError } from "./types.js";

// Assets
export { AssetBook, STAKING_SINK } from "./asset-book.js";
export { SharedRewardsEscrow, OwnRewardsEscrow } from "./escrow.js";
export type { RewardsEscrow } from "./escrow.js";

// Vault
export { Vault, DEFAULT_EXIT_QUEUE_UPDATE_DELAY, MAX_FEE_PERCENT } from "./vault.js";
export type { VaultOptions } from "./vault.js";
