/**
 * @stakecore/audit-log — Core types.
 *
 * Every protocol event is recorded once, in emission order, with its
 * bigint fields rendered as decimal strings and a hash linking it to
 * its predecessor.
 */

import type { ProtocolEventType } from "@stakecore/types";

// =============================================================================
// Records
// =============================================================================

/** Scalar field value after serialization. */
export type LogValue = string | number | null;

/**
 * Stream an event belongs to:
 * - "rewards": snapshot submissions
 * - "attestors": registry changes
 * - "vault:<address>": everything scoped to one vault
 */
export type StreamId = "rewards" | "attestors" | `vault:${string}`;

/**
 * A recorded event.
 */
export interface LoggedEvent {
  /** 1-based position in the log */
  readonly position: number;

  readonly streamId: StreamId;

  readonly type: ProtocolEventType;

  /** Event fields other than `type`, JSON-safe */
  readonly payload: Readonly<Record<string, LogValue>>;

  /** ISO 8601 timestamp when recorded */
  readonly recordedAt: string;

  /** Hash of the preceding record, or GENESIS_HASH */
  readonly previousHash: string;

  /** SHA-256 over the canonical record and previousHash */
  readonly hash: string;
}

// =============================================================================
// Queries
// =============================================================================

export interface LogQuery {
  readonly type?: ProtocolEventType | undefined;
  readonly streamId?: StreamId | undefined;

  /** First position to include (default: 1) */
  readonly fromPosition?: number | undefined;

  /** Maximum number of records to return */
  readonly limit?: number | undefined;
}

export type LogHandler = (event: LoggedEvent) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface IntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type AuditLogErrorCode = "INVALID_EVENT" | "INVALID_QUERY";

export class AuditLogError extends Error {
  constructor(
    public readonly code: AuditLogErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AuditLogError";
  }
}
