/**
 * Response views.
 *
 * Domain objects carry bigint; responses carry decimal strings.
 */

import type {
  Address,
  Bytes32,
  Checkpoint,
  ExitPosition,
  ResolvedExit,
  RewardRecord,
  RewardsSnapshot,
} from "@stakecore/types";
import type { ClaimResult, UpdateStateResult, Vault } from "@stakecore/vault";
import type { ExitQueueEntryView } from "../services/staking-service.js";

export interface SnapshotView {
  readonly rewardsRoot: Bytes32;
  readonly previousRoot: Bytes32;
  readonly nonce: string;
  readonly updateTimestamp: string;
  readonly payloadUri: string;
  readonly payloadHash: Bytes32;
  readonly submittedBy: Address;
  readonly signers: readonly Address[];
}

export function snapshotView(snapshot: RewardsSnapshot): SnapshotView {
  return {
    rewardsRoot: snapshot.rewardsRoot,
    previousRoot: snapshot.previousRoot,
    nonce: snapshot.nonce.toString(),
    updateTimestamp: snapshot.updateTimestamp.toString(),
    payloadUri: snapshot.payloadUri,
    payloadHash: snapshot.payloadHash,
    submittedBy: snapshot.submittedBy,
    signers: snapshot.signers,
  };
}

function recordView(record: RewardRecord | undefined) {
  if (record === undefined) return null;
  return {
    cumulativeAssets: record.cumulativeAssets.toString(),
    syncedNonce: record.syncedNonce.toString(),
  };
}

function checkpointView(checkpoint: Checkpoint) {
  return {
    cumulativeShares: checkpoint.cumulativeShares.toString(),
    cumulativeAssets: checkpoint.cumulativeAssets.toString(),
  };
}

function positionView(position: ExitPosition) {
  return {
    receiver: position.receiver,
    ticket: position.ticket.toString(),
    shares: position.shares.toString(),
    origin: position.origin,
    createdAt: position.createdAt.toString(),
  };
}

function resolvedView(resolved: ResolvedExit) {
  return {
    leftShares: resolved.leftShares.toString(),
    exitedShares: resolved.exitedShares.toString(),
    exitedAssets: resolved.exitedAssets.toString(),
  };
}

export function vaultView(
  vault: Vault,
  reward: RewardRecord | undefined,
  unlockedReward: RewardRecord | undefined,
  harvestRequired: boolean,
) {
  const state = vault.getState();
  return {
    address: state.address,
    feePercent: vault.feePercent,
    sharedEscrow: vault.isSharedEscrow,
    totalAssets: state.totalAssets.toString(),
    totalShares: state.totalShares.toString(),
    queuedShares: state.queuedShares.toString(),
    unclaimedAssets: state.unclaimedAssets.toString(),
    liquidAssets: state.liquidAssets.toString(),
    withdrawableAssets: state.withdrawableAssets.toString(),
    checkpointCount: state.checkpointCount,
    lastExitQueueUpdate: state.lastExitQueueUpdate.toString(),
    harvestRequired,
    reward: recordView(reward),
    unlockedReward: recordView(unlockedReward),
  };
}

export function updateStateView(result: UpdateStateResult) {
  return {
    harvested: result.harvested,
    totalAssetsDelta: result.totalAssetsDelta.toString(),
    escrowAssets: result.escrowAssets.toString(),
    feeShares: result.feeShares.toString(),
    checkpoint: result.checkpoint === null ? null : checkpointView(result.checkpoint),
  };
}

export function claimView(claim: ClaimResult) {
  return {
    receiver: claim.receiver,
    previousTicket: claim.previousTicket.toString(),
    successor: claim.successor === null ? null : positionView(claim.successor),
    exitedShares: claim.exitedShares.toString(),
    assets: claim.assets.toString(),
  };
}

export function exitQueueEntryView(entry: ExitQueueEntryView) {
  return {
    receiver: entry.receiver,
    ticket: entry.ticket.toString(),
    status: entry.status,
    checkpointIndex: entry.checkpointIndex,
    preview: entry.preview === null ? null : resolvedView(entry.preview),
  };
}
