/**
 * @stakecore/audit-log — In-memory protocol event log.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Every record hash-chained to its predecessor
 * - Synchronous subscription dispatch, after the record is stored
 * - No durability guarantees (state lost on process exit)
 */

import type { EventSink, ProtocolEvent } from "@stakecore/types";
import { computeRecordHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import { serializeEvent, streamOf } from "./serialize.js";
import { AuditLogError } from "./types.js";
import type {
  IntegrityResult,
  LogHandler,
  LoggedEvent,
  LogQuery,
  Subscription,
} from "./types.js";

export interface ProtocolEventLogOptions {
  /** Wall clock for `recordedAt` (default: system time) */
  readonly now?: (() => Date) | undefined;
}

export class ProtocolEventLog {
  private readonly records: LoggedEvent[] = [];
  private readonly subscribers = new Set<LogHandler>();
  private readonly now: () => Date;
  private lastHash: string = GENESIS_HASH;

  constructor(options: ProtocolEventLogOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(event: ProtocolEvent): LoggedEvent {
    const base = {
      position: this.records.length + 1,
      streamId: streamOf(event),
      type: event.type,
      payload: serializeEvent(event),
      recordedAt: this.now().toISOString(),
    };

    const previousHash = this.lastHash;
    const record: LoggedEvent = {
      ...base,
      previousHash,
      hash: computeRecordHash(base, previousHash),
    };

    this.records.push(record);
    this.lastHash = record.hash;

    for (const handler of this.subscribers) {
      handler(record);
    }

    return record;
  }

  /**
   * An EventSink that appends to this log, for wiring into emitters.
   */
  sink(): EventSink {
    return (event) => {
      this.append(event);
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  query(query: LogQuery = {}): readonly LoggedEvent[] {
    const fromPosition = query.fromPosition ?? 1;
    if (!Number.isInteger(fromPosition) || fromPosition < 1) {
      throw new AuditLogError("INVALID_QUERY", `fromPosition must be >= 1, got ${fromPosition}`);
    }
    if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 0)) {
      throw new AuditLogError("INVALID_QUERY", `limit must be >= 0, got ${query.limit}`);
    }

    const matches = this.records.filter(
      (r) =>
        r.position >= fromPosition &&
        (query.type === undefined || r.type === query.type) &&
        (query.streamId === undefined || r.streamId === query.streamId),
    );

    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  get size(): number {
    return this.records.length;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: LogHandler): Subscription {
    this.subscribers.add(handler);
    return {
      unsubscribe: () => {
        this.subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): IntegrityResult {
    return verifyHashChain(this.records);
  }
}
