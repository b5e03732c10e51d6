/**
 * Shared fixtures for oracle tests.
 *
 * Attestor keys are fixed placeholder scalars (1, 2, 3, ...), never real keys.
 */

import { privateKeyToAccount } from "viem/accounts";
import type { PrivateKeyAccount } from "viem/accounts";
import type { Bytes32, Hex } from "@stakecore/types";
import { hashPayloadUri } from "@stakecore/rewards-tree";
import { packSignatures, signRewardsUpdate } from "../src/signing.js";
import type { OracleDomain } from "../src/types.js";

export const DOMAIN: OracleDomain = {
  chainId: 31337,
  verifyingContract: "0x00000000000000000000000000000000000c0ffe",
};

export const PAYLOAD_URI = "ipfs://rewards-payload-test";

export function testAccount(n: number): PrivateKeyAccount {
  return privateKeyToAccount(`0x${n.toString(16).padStart(64, "0")}`);
}

export function root(n: number): Bytes32 {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

/**
 * Sign a rewards update with each account and pack the signatures in
 * increasing signer order.
 */
export async function signAll(
  accounts: readonly PrivateKeyAccount[],
  message: { rewardsRoot: Bytes32; updateTimestamp: bigint; nonce: bigint; payloadUri?: string },
): Promise<Hex> {
  const payloadHash = hashPayloadUri(message.payloadUri ?? PAYLOAD_URI);
  const signatures = await Promise.all(
    accounts.map(async (account) => ({
      signer: account.address,
      signature: await signRewardsUpdate(account, DOMAIN, {
        rewardsRoot: message.rewardsRoot,
        payloadHash,
        updateTimestamp: message.updateTimestamp,
        nonce: message.nonce,
      }),
    })),
  );
  return packSignatures(signatures);
}

/** Accounts sorted by address, as consensus expects them. */
export function sortedByAddress(accounts: readonly PrivateKeyAccount[]): PrivateKeyAccount[] {
  return [...accounts].sort((a, b) => {
    const x = BigInt(a.address);
    const y = BigInt(b.address);
    return x < y ? -1 : x > y ? 1 : 0;
  });
}
