/**
 * @stakecore/vault — In-memory asset custody.
 */

import type { Address } from "@stakecore/types";
import { ZERO_ADDRESS } from "@stakecore/types";
import { VaultError } from "./types.js";
import type { AssetTransfer } from "./types.js";

/** Holder that receives assets sent to validators. */
export const STAKING_SINK: Address = "0x00000000000000000000000000000000000000de";

export class AssetBook implements AssetTransfer {
  private readonly balances = new Map<string, bigint>();

  balanceOf(holder: Address): bigint {
    return this.balances.get(holder.toLowerCase()) ?? 0n;
  }

  /**
   * Credit new assets to `holder`: consensus-layer withdrawals, execution
   * rewards landing in an escrow, or test funding.
   */
  mint(holder: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Mint amount must be positive, got ${amount}`);
    }
    if (holder.toLowerCase() === ZERO_ADDRESS) {
      throw new VaultError("INVALID_ADDRESS", "Cannot mint to the zero address");
    }
    this.balances.set(holder.toLowerCase(), this.balanceOf(holder) + amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new VaultError("INVALID_AMOUNT", `Transfer amount must not be negative, got ${amount}`);
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new VaultError(
        "INSUFFICIENT_ASSETS",
        `${from} holds ${available}, cannot transfer ${amount}`,
      );
    }
    if (amount === 0n) return;
    this.balances.set(from.toLowerCase(), available - amount);
    this.balances.set(to.toLowerCase(), this.balanceOf(to) + amount);
  }
}
