/**
 * @stakecore/audit-log — Event serialization.
 *
 * Flattens a ProtocolEvent into JSON-safe fields. bigint becomes its
 * decimal string; strings, numbers and null pass through.
 */

import type { ProtocolEvent } from "@stakecore/types";
import { AuditLogError } from "./types.js";
import type { LogValue, StreamId } from "./types.js";

export function serializeEvent(event: ProtocolEvent): Record<string, LogValue> {
  const payload: Record<string, LogValue> = {};

  for (const [key, raw] of Object.entries(event)) {
    if (key === "type") continue;
    const value: unknown = raw;

    if (typeof value === "bigint") {
      payload[key] = value.toString();
    } else if (typeof value === "string" || typeof value === "number" || value === null) {
      payload[key] = value;
    } else {
      throw new AuditLogError(
        "INVALID_EVENT",
        `Field "${key}" of ${event.type} is not serializable (${typeof value})`,
      );
    }
  }

  return payload;
}

/**
 * Stream an event is filed under.
 */
export function streamOf(event: ProtocolEvent): StreamId {
  switch (event.type) {
    case "snapshot_updated":
      return "rewards";
    case "attestor_added":
    case "attestor_removed":
    case "quorum_changed":
      return "attestors";
    default:
      return `vault:${event.vault.toLowerCase()}`;
  }
}
