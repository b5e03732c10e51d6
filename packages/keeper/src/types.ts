/**
 * @stakecore/keeper — Core types.
 *
 * Collaborator interfaces the harvester reads from, and its error type.
 */

import type { Address, Bytes32 } from "@stakecore/types";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Current and previous accepted rewards roots plus the snapshot nonce
 * counter. Satisfied by OracleConsensus.
 */
export interface RewardsRootSource {
  readonly rewardsRoot: Bytes32;
  readonly previousRewardsRoot: Bytes32;

  /** Nonce the next snapshot will be signed with */
  readonly nonce: bigint;
}

/**
 * Authorizes which callers may harvest.
 */
export interface VaultDirectory {
  isVault(address: Address): boolean;
}

export interface HarvestOptions {
  /**
   * Whether the vault draws execution rewards from the shared escrow;
   * only such vaults track the secondary (unlocked) stream.
   */
  readonly sharedEscrow: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type KeeperErrorCode =
  | "ACCESS_DENIED"
  | "INVALID_PROOF"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "VAULT_EXISTS"
  | "VAULT_NOT_FOUND";

/**
 * Structured error from the keeper.
 * A failed harvest leaves every reward record untouched.
 */
export class KeeperError extends Error {
  public readonly code: KeeperErrorCode;

  constructor(code: KeeperErrorCode, message: string) {
    super(message);
    this.name = "KeeperError";
    this.code = code;
  }
}
