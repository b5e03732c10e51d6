/**
 * @stakecore/audit-log — Hash chain for tamper-evident event logs.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous record's hash, forming a chain:
 *
 *   record[1].hash = sha256(canonicalize(record[1]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Any modification to any record breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { IntegrityError, IntegrityResult, LoggedEvent } from "./types.js";

/**
 * The hash used as `previousHash` for the first record in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Compute the hash of a record given its predecessor's hash.
 */
export function computeRecordHash(
  record: Omit<LoggedEvent, "hash" | "previousHash">,
  previousHash: string,
): string {
  const content = canonicalize({
    position: record.position,
    streamId: record.streamId,
    type: record.type,
    payload: record.payload,
    recordedAt: record.recordedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain of a sequence of records in position order.
 */
export function verifyHashChain(records: readonly LoggedEvent[]): IntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const record of records) {
    if (record.previousHash !== previousHash) {
      errors.push({
        position: record.position,
        reason: `previousHash mismatch at position ${record.position}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expectedHash = computeRecordHash(record, record.previousHash);
    if (record.hash !== expectedHash) {
      errors.push({
        position: record.position,
        reason: `Hash mismatch at position ${record.position}: expected "${expectedHash}", got "${record.hash}"`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = record.position;
    }
    previousHash = record.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
