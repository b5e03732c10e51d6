/**
 * Typed-Data Signing and Signer Recovery
 *
 * Attestors sign an EIP-712 `RewardsUpdate` message. Consensus splits the
 * submitted blob into 65-byte signatures and recovers each signer.
 *
 * Design:
 * - Domain binds signatures to one chain and one verifying contract
 * - The nonce is part of the message, so a signature is single-use
 * - Signatures are ordered by increasing signer address, which lets
 *   duplicate detection be a single linear scan
 */

import { concat, hashTypedData, recoverAddress, size, slice } from "viem";
import type { LocalAccount } from "viem/accounts";
import type { Address, Bytes32, Hex } from "@stakecore/types";
import type { OracleDomain, RewardsUpdateMessage } from "./types.js";

// =============================================================================
// Typed Data
// =============================================================================

export const ORACLE_DOMAIN_NAME = "RewardsOracle";
export const ORACLE_DOMAIN_VERSION = "1";

export const SIGNATURE_LENGTH = 65;

export const REWARDS_UPDATE_TYPES = {
  RewardsUpdate: [
    { name: "rewardsRoot", type: "bytes32" },
    { name: "rewardsIpfsHash", type: "bytes32" },
    { name: "updateTimestamp", type: "uint64" },
    { name: "nonce", type: "uint64" },
  ],
} as const;

function typedData(domain: OracleDomain, message: RewardsUpdateMessage) {
  return {
    domain: {
      name: ORACLE_DOMAIN_NAME,
      version: ORACLE_DOMAIN_VERSION,
      chainId: domain.chainId,
      verifyingContract: domain.verifyingContract,
    },
    types: REWARDS_UPDATE_TYPES,
    primaryType: "RewardsUpdate",
    message: {
      rewardsRoot: message.rewardsRoot,
      rewardsIpfsHash: message.payloadHash,
      updateTimestamp: message.updateTimestamp,
      nonce: message.nonce,
    },
  } as const;
}

/**
 * EIP-712 digest of a rewards update.
 */
export function hashRewardsUpdate(domain: OracleDomain, message: RewardsUpdateMessage): Bytes32 {
  return hashTypedData(typedData(domain, message));
}

/**
 * Sign a rewards update with a local attestor key.
 */
export async function signRewardsUpdate(
  account: LocalAccount,
  domain: OracleDomain,
  message: RewardsUpdateMessage,
): Promise<Hex> {
  return account.signTypedData(typedData(domain, message));
}

// =============================================================================
// Blob handling
// =============================================================================

/**
 * Numeric ordering of addresses.
 */
export function compareAddresses(a: Address, b: Address): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Concatenate signatures in increasing signer-address order.
 */
export function packSignatures(
  signatures: readonly { readonly signer: Address; readonly signature: Hex }[],
): Hex {
  const ordered = [...signatures].sort((a, b) => compareAddresses(a.signer, b.signer));
  return concat(ordered.map((s) => s.signature));
}

/**
 * Split a blob into 65-byte signatures.
 * Returns null when the blob is empty or not a whole number of signatures.
 */
export function splitSignatures(blob: Hex): Hex[] | null {
  if (!/^0x([0-9a-fA-F]{2})*$/.test(blob)) return null;
  const length = size(blob);
  if (length === 0 || length % SIGNATURE_LENGTH !== 0) return null;

  const signatures: Hex[] = [];
  for (let offset = 0; offset < length; offset += SIGNATURE_LENGTH) {
    signatures.push(slice(blob, offset, offset + SIGNATURE_LENGTH));
  }
  return signatures;
}

/**
 * Recover the signer of each signature over `digest`.
 * Signatures that cannot be recovered yield null in their slot.
 */
export async function recoverSigners(
  digest: Bytes32,
  signatures: readonly Hex[],
): Promise<(Address | null)[]> {
  return Promise.all(
    signatures.map((signature) =>
      recoverAddress({ hash: digest, signature }).then(
        (address): Address | null => address,
        (): Address | null => null,
      ),
    ),
  );
}
