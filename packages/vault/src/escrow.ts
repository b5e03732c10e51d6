/**
 * @stakecore/vault — Execution-rewards escrows.
 *
 * Execution-layer rewards accrue outside the vault and are pulled in on
 * state updates:
 * - SharedRewardsEscrow pools rewards for many vaults; each vault pulls
 *   exactly the unlocked delta its harvest reports
 * - OwnRewardsEscrow belongs to one vault, which pulls the whole balance
 */

import type { Address } from "@stakecore/types";
import { VaultError } from "./types.js";
import type { AssetTransfer } from "./types.js";

export class SharedRewardsEscrow {
  readonly kind = "shared" as const;

  constructor(
    readonly address: Address,
    private readonly assets: AssetTransfer,
  ) {}

  get balance(): bigint {
    return this.assets.balanceOf(this.address);
  }

  /**
   * Pay `amount` to `vault`.
   *
   * @throws VaultError INSUFFICIENT_ASSETS when the pool cannot cover it
   */
  harvest(vault: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new VaultError("INVALID_AMOUNT", `Escrow payout must not be negative, got ${amount}`);
    }
    this.assets.transfer(this.address, vault, amount);
  }
}

export class OwnRewardsEscrow {
  readonly kind = "own" as const;

  constructor(
    readonly address: Address,
    private readonly assets: AssetTransfer,
  ) {}

  get balance(): bigint {
    return this.assets.balanceOf(this.address);
  }

  /** Send the whole balance to `vault` and return the amount. */
  harvest(vault: Address): bigint {
    const amount = this.balance;
    this.assets.transfer(this.address, vault, amount);
    return amount;
  }
}

export type RewardsEscrow = SharedRewardsEscrow | OwnRewardsEscrow;
