/**
 * @stakecore/keeper — In-memory vault registry.
 */

import type { Address } from "@stakecore/types";
import { isAddress } from "@stakecore/types";
import { KeeperError } from "./types.js";
import type { VaultDirectory } from "./types.js";

export class VaultRegistry implements VaultDirectory {
  private readonly vaults = new Map<string, Address>();

  constructor(initial: readonly Address[] = []) {
    for (const vault of initial) {
      this.addVault(vault);
    }
  }

  /**
   * @throws KeeperError INVALID_ADDRESS or VAULT_EXISTS
   */
  addVault(vault: Address): void {
    if (!isAddress(vault)) {
      throw new KeeperError("INVALID_ADDRESS", `Invalid vault address: ${vault}`);
    }
    const key = vault.toLowerCase();
    if (this.vaults.has(key)) {
      throw new KeeperError("VAULT_EXISTS", `Vault already registered: ${vault}`);
    }
    this.vaults.set(key, vault);
  }

  /**
   * @throws KeeperError VAULT_NOT_FOUND
   */
  removeVault(vault: Address): void {
    if (!this.vaults.delete(vault.toLowerCase())) {
      throw new KeeperError("VAULT_NOT_FOUND", `Vault not registered: ${vault}`);
    }
  }

  isVault(address: Address): boolean {
    return this.vaults.has(address.toLowerCase());
  }

  getVaults(): readonly Address[] {
    return [...this.vaults.values()];
  }
}
