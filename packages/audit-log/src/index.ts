/**
 * @stakecore/audit-log — Tamper-evident protocol event log.
 *
 * @packageDocumentation
 */

export type {
  LogValue,
  StreamId,
  LoggedEvent,
  LogQuery,
  LogHandler,
  Subscription,
  IntegrityError,
  IntegrityResult,
  AuditLogErrorCode,
} from "./types.js";
export { AuditLogError } from "./types.js";

export { GENESIS_HASH, computeRecordHash, verifyHashChain } from "./hash-chain.js";
export { serializeEvent, streamOf } from "./serialize.js";
export { ProtocolEventLog } from "./audit-log.js";
export type { ProtocolEventLogOptions } from "./audit-log.js";
