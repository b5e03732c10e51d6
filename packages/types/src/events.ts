/**
 * Protocol Events
 *
 * Every externally observable state change emits exactly one of these.
 * Fields carry bigint values; serialization to decimal strings happens
 * at the log and HTTP boundaries.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are emitted only after the state change they describe is final
 */

import type { Address, Bytes32 } from "./primitives.js";

export interface SnapshotUpdatedEvent {
  readonly type: "snapshot_updated";
  readonly caller: Address;
  readonly rewardsRoot: Bytes32;
  readonly updateTimestamp: bigint;
  readonly nonce: bigint;
  readonly payloadUri: string;
  readonly payloadHash: Bytes32;
}

export interface HarvestedEvent {
  readonly type: "harvested";
  readonly vault: Address;
  readonly rewardsRoot: Bytes32;
  readonly delta: bigint;
  readonly unlockedDelta: bigint;
}

export interface ExitQueueEnteredEvent {
  readonly type: "exit_queue_entered";
  readonly vault: Address;
  readonly owner: Address;
  readonly receiver: Address;
  readonly ticket: bigint;
  readonly shares: bigint;
}

export interface CheckpointCreatedEvent {
  readonly type: "checkpoint_created";
  readonly vault: Address;
  readonly sharesResolved: bigint;
  readonly assetsUnlocked: bigint;
}

export interface ExitedAssetsClaimedEvent {
  readonly type: "exited_assets_claimed";
  readonly vault: Address;
  readonly receiver: Address;
  readonly previousTicket: bigint;
  /** Ticket of the remaining position, null when fully claimed */
  readonly successorTicket: bigint | null;
  readonly assets: bigint;
}

export interface DepositedEvent {
  readonly type: "deposited";
  readonly vault: Address;
  readonly caller: Address;
  readonly receiver: Address;
  readonly assets: bigint;
  readonly shares: bigint;
}

export interface RedeemedEvent {
  readonly type: "redeemed";
  readonly vault: Address;
  readonly owner: Address;
  readonly receiver: Address;
  readonly assets: bigint;
  readonly shares: bigint;
}

export interface FeeSharesMintedEvent {
  readonly type: "fee_shares_minted";
  readonly vault: Address;
  readonly receiver: Address;
  readonly shares: bigint;
  readonly assets: bigint;
}

export interface AttestorAddedEvent {
  readonly type: "attestor_added";
  readonly address: Address;
  readonly label: string;
  readonly timestamp: string;
}

export interface AttestorRemovedEvent {
  readonly type: "attestor_removed";
  readonly address: Address;
  readonly timestamp: string;
}

export interface QuorumChangedEvent {
  readonly type: "quorum_changed";
  readonly previousQuorum: number;
  readonly newQuorum: number;
  readonly timestamp: string;
}

/** Attestor registry mutations (event-sourced). */
export type RegistryChangeEvent =
  | AttestorAddedEvent
  | AttestorRemovedEvent
  | QuorumChangedEvent;

/** Every event the protocol emits. */
export type ProtocolEvent =
  | SnapshotUpdatedEvent
  | HarvestedEvent
  | ExitQueueEnteredEvent
  | CheckpointCreatedEvent
  | ExitedAssetsClaimedEvent
  | DepositedEvent
  | RedeemedEvent
  | FeeSharesMintedEvent
  | RegistryChangeEvent;

export type ProtocolEventType = ProtocolEvent["type"];

/** Callback invoked with each emitted event. */
export type EventSink = (event: ProtocolEvent) => void;
