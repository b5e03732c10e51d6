/**
 * @stakecore/vault — Core types.
 *
 * Rules:
 * - All amounts are bigint in the smallest asset unit
 * - Fee percentages are basis points (10000 = 100%)
 * - Timestamps are unix seconds
 */

import type { Address, Checkpoint, ExitPosition } from "@stakecore/types";

// =============================================================================
// Configuration
// =============================================================================

export type EscrowKind = "shared" | "own";

export interface VaultConfig {
  readonly address: Address;

  /** Receives fee shares minted from positive reward deltas */
  readonly feeRecipient: Address;

  /** Fee on positive reward deltas, in basis points */
  readonly feePercent: number;

  /** Minimum seconds between exit queue checkpoints. Default 86400. */
  readonly exitQueueUpdateDelay?: bigint | undefined;
}

// =============================================================================
// Assets
// =============================================================================

/**
 * Custody of the underlying asset. Vaults, escrows and users all hold
 * balances here; the staking sink holds assets sent to validators.
 */
export interface AssetTransfer {
  balanceOf(holder: Address): bigint;

  /** @throws VaultError INSUFFICIENT_ASSETS when `from` cannot cover `amount` */
  transfer(from: Address, to: Address, amount: bigint): void;
}

// =============================================================================
// Results
// =============================================================================

export interface UpdateStateResult {
  /** Whether a new snapshot was applied to the primary stream */
  readonly harvested: boolean;

  /** Reward delta folded into total assets, own-escrow pull included */
  readonly totalAssetsDelta: bigint;

  /** Assets pulled from the execution-rewards escrow */
  readonly escrowAssets: bigint;

  readonly feeShares: bigint;

  /** Checkpoint pushed by this update, if any */
  readonly checkpoint: Checkpoint | null;
}

export interface ClaimResult {
  readonly receiver: Address;
  readonly previousTicket: bigint;
  readonly successor: ExitPosition | null;
  readonly exitedShares: bigint;
  readonly assets: bigint;
}

/** Point-in-time view of a vault's books. */
export interface VaultState {
  readonly address: Address;
  readonly totalAssets: bigint;
  readonly totalShares: bigint;
  readonly queuedShares: bigint;
  readonly unclaimedAssets: bigint;
  readonly liquidAssets: bigint;
  readonly withdrawableAssets: bigint;
  readonly checkpointCount: number;
  readonly lastExitQueueUpdate: bigint;
}

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_CONFIG"
  | "INSUFFICIENT_SHARES"
  | "INSUFFICIENT_ASSETS"
  | "NOT_COLLATERALIZED"
  | "COLLATERALIZED"
  | "NOT_HARVESTED"
  | "POSITION_NOT_FOUND"
  | "EXIT_REQUEST_NOT_PROCESSED"
  | "OVERFLOW";

/**
 * Structured error from vault operations.
 * A thrown operation leaves balances, totals and positions unchanged.
 */
export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
