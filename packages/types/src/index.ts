/**
 * @stakecore/types — Shared domain types.
 *
 * Zero runtime dependencies. Pure type definitions, width constants
 * and runtime guards used by every other @stakecore package.
 *
 * @packageDocumentation
 */

export type { Hex, Address, Bytes32 } from "./primitives.js";
export {
  ZERO_BYTES32,
  ZERO_ADDRESS,
  MAX_UINT64,
  MAX_UINT128,
  MAX_UINT160,
  MAX_UINT256,
  MAX_INT160,
  MIN_INT160,
  fitsUint,
  fitsInt,
  lowerHex,
} from "./primitives.js";

export type {
  RewardsSnapshot,
  RewardRecord,
  UnlockedRewardRecord,
  HarvestParams,
  HarvestResult,
} from "./rewards.js";

export type {
  Checkpoint,
  ExitPosition,
  ExitPositionOrigin,
  ExitPositionStatus,
  ResolvedExit,
} from "./exit-queue.js";

export type {
  SnapshotUpdatedEvent,
  HarvestedEvent,
  ExitQueueEnteredEvent,
  CheckpointCreatedEvent,
  ExitedAssetsClaimedEvent,
  DepositedEvent,
  RedeemedEvent,
  FeeSharesMintedEvent,
  AttestorAddedEvent,
  AttestorRemovedEvent,
  QuorumChangedEvent,
  RegistryChangeEvent,
  ProtocolEvent,
  ProtocolEventType,
  EventSink,
} from "./events.js";

export {
  isRecord,
  isHex,
  isAddress,
  isBytes32,
  isDecimalString,
  isProtocolEventType,
  sameAddress,
} from "./guards.js";
