/**
 * Type barrel — re-exports all public types from @stakecore/node.
 */

// DTOs
export {
  AddressSchema,
  Bytes32Schema,
  HexSchema,
  UintSchema,
  IntSchema,
  SubmitSnapshotSchema,
  DepositSchema,
  RedeemSchema,
  AmountSchema,
  UpdateStateSchema,
  EnterExitQueueSchema,
  ClaimSchema,
  ExitQueueQuerySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  SubmitSnapshotDto,
  DepositDto,
  RedeemDto,
  AmountDto,
  UpdateStateDto,
  EnterExitQueueDto,
  ClaimDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Views
export {
  snapshotView,
  vaultView,
  updateStateView,
  claimView,
  exitQueueEntryView,
} from "./views.js";
export type { SnapshotView } from "./views.js";

export type { AppEnv } from "./api-contract.js";
