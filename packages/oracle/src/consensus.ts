/**
 * Oracle Consensus
 *
 * Accepts a new global rewards snapshot only when a quorum of registered
 * attestors signed it and enough time has passed since the last one.
 *
 * Design:
 * - Signer recovery is the only async step; it runs first, then every
 *   check and the commit happen in one synchronous section
 * - If another snapshot was accepted while signers were being recovered,
 *   recovery is repeated against the new nonce
 * - A rejected submission never changes state
 * - The nonce counter starts at 1; the accepted snapshot carries the
 *   nonce its signers signed, and the counter then advances
 */

import type {
  Address,
  Bytes32,
  EventSink,
  RewardsSnapshot,
  SnapshotUpdatedEvent,
} from "@stakecore/types";
import { size } from "viem";
import { fitsUint, isAddress, isBytes32, isHex, lowerHex, ZERO_BYTES32 } from "@stakecore/types";
import { hashPayloadUri } from "@stakecore/rewards-tree";
import {
  SIGNATURE_LENGTH,
  compareAddresses,
  hashRewardsUpdate,
  recoverSigners,
  splitSignatures,
} from "./signing.js";
import { ConsensusError } from "./types.js";
import type { AttestorDirectory, OracleDomain, SnapshotSubmission } from "./types.js";

/** Default minimum spacing between accepted snapshots: half a day. */
export const DEFAULT_UPDATE_DELAY = 43_200n;

export interface OracleConsensusOptions {
  readonly attestors: AttestorDirectory;
  readonly domain: OracleDomain;

  /** Minimum seconds between accepted update timestamps (default: 43200) */
  readonly updateDelay?: bigint | undefined;

  /** Current unix time in seconds (default: system time) */
  readonly clock?: (() => bigint) | undefined;

  /** Receives the snapshot-updated event after each accepted update */
  readonly onEvent?: EventSink | undefined;
}

/** Signer recovery outcome: addresses, or the reason recovery failed. */
type Recovery =
  | { readonly ok: true; readonly signers: readonly Address[] }
  | { readonly ok: false; readonly count: number | null; readonly reason: string };

// =============================================================================
// Oracle Consensus
// =============================================================================

export class OracleConsensus {
  private readonly attestors: AttestorDirectory;
  private readonly domain: OracleDomain;
  private readonly clock: () => bigint;
  private readonly onEvent: EventSink | undefined;
  readonly updateDelay: bigint;

  private _rewardsRoot: Bytes32 = ZERO_BYTES32;
  private _previousRewardsRoot: Bytes32 = ZERO_BYTES32;
  private _nonce = 1n;
  private _lastAcceptedTimestamp = 0n;
  private readonly history: RewardsSnapshot[] = [];

  constructor(options: OracleConsensusOptions) {
    this.attestors = options.attestors;
    this.domain = options.domain;
    this.updateDelay = options.updateDelay ?? DEFAULT_UPDATE_DELAY;
    this.clock = options.clock ?? (() => BigInt(Math.floor(Date.now() / 1000)));
    this.onEvent = options.onEvent;

    if (this.updateDelay < 0n) {
      throw new RangeError(`Update delay must be non-negative, got ${this.updateDelay}`);
    }
  }

  // ─── Submission ─────────────────────────────────────────────────────

  /**
   * Validate and accept a snapshot.
   *
   * @throws ConsensusError ACCESS_DENIED, INVALID_ROOT, INVALID_TIMESTAMP,
   *   FUTURE_TIMESTAMP, TOO_EARLY_UPDATE, NOT_ENOUGH_SIGNATURES or INVALID_SIGNER
   */
  async submitSnapshot(submission: SnapshotSubmission): Promise<RewardsSnapshot> {
    const payloadHash = hashPayloadUri(submission.payloadUri);

    for (;;) {
      const nonce = this._nonce;
      const recovery = await this.recover(submission, payloadHash, nonce);
      if (nonce === this._nonce) {
        return this.accept(submission, payloadHash, nonce, recovery);
      }
    }
  }

  /**
   * Whether enough time has passed for a new snapshot.
   */
  canUpdate(): boolean {
    return this.clock() >= this._lastAcceptedTimestamp + this.updateDelay;
  }

  // ─── Read-only state ────────────────────────────────────────────────

  get rewardsRoot(): Bytes32 {
    return this._rewardsRoot;
  }

  get previousRewardsRoot(): Bytes32 {
    return this._previousRewardsRoot;
  }

  /** Nonce the next snapshot must be signed with. */
  get nonce(): bigint {
    return this._nonce;
  }

  get lastAcceptedTimestamp(): bigint {
    return this._lastAcceptedTimestamp;
  }

  /** Accepted snapshot signed with `nonce`, if any. */
  getSnapshot(nonce: bigint): RewardsSnapshot | undefined {
    return this.history.find((s) => s.nonce === nonce);
  }

  latestSnapshot(): RewardsSnapshot | undefined {
    return this.history[this.history.length - 1];
  }

  getHistory(): readonly RewardsSnapshot[] {
    return [...this.history];
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async recover(
    submission: SnapshotSubmission,
    payloadHash: Bytes32,
    nonce: bigint,
  ): Promise<Recovery> {
    const signatures = splitSignatures(submission.signatures);
    if (signatures === null) {
      // An empty or short blob counts the whole signatures it holds, so it
      // fails the quorum check before the shape check.
      return {
        ok: false,
        count: isHex(submission.signatures)
          ? Math.floor(size(submission.signatures) / SIGNATURE_LENGTH)
          : null,
        reason: "Signature blob must be a non-empty sequence of 65-byte signatures",
      };
    }

    if (!isBytes32(submission.rewardsRoot) || !fitsUint(submission.updateTimestamp, 64)) {
      // Reported by the synchronous checks; no digest can be built.
      return { ok: false, count: signatures.length, reason: "Malformed message" };
    }

    const digest = hashRewardsUpdate(this.domain, {
      rewardsRoot: submission.rewardsRoot,
      payloadHash,
      updateTimestamp: submission.updateTimestamp,
      nonce,
    });
    const recovered = await recoverSigners(digest, signatures);

    const signers: Address[] = [];
    for (const [i, signer] of recovered.entries()) {
      if (signer === null) {
        return { ok: false, count: signatures.length, reason: `Signature ${i} is not recoverable` };
      }
      signers.push(signer);
    }
    return { ok: true, signers };
  }

  private accept(
    submission: SnapshotSubmission,
    payloadHash: Bytes32,
    nonce: bigint,
    recovery: Recovery,
  ): RewardsSnapshot {
    const { caller, updateTimestamp } = submission;

    if (!isAddress(caller) || !this.attestors.isAttestor(caller)) {
      throw new ConsensusError("ACCESS_DENIED", `Caller ${caller} is not a registered attestor`);
    }

    if (!isBytes32(submission.rewardsRoot)) {
      throw new ConsensusError("INVALID_ROOT", `Rewards root must be a 32-byte hash`);
    }
    const rewardsRoot = lowerHex(submission.rewardsRoot);
    if (rewardsRoot === ZERO_BYTES32) {
      throw new ConsensusError("INVALID_ROOT", "Rewards root must be non-zero");
    }
    if (rewardsRoot === this._rewardsRoot) {
      throw new ConsensusError("INVALID_ROOT", `Rewards root ${rewardsRoot} is already current`);
    }

    if (!fitsUint(updateTimestamp, 64)) {
      throw new ConsensusError("INVALID_TIMESTAMP", `Update timestamp out of range: ${updateTimestamp}`);
    }
    const now = this.clock();
    if (updateTimestamp > now) {
      throw new ConsensusError(
        "FUTURE_TIMESTAMP",
        `Update timestamp ${updateTimestamp} is ahead of current time ${now}`,
      );
    }
    const earliest = this._lastAcceptedTimestamp + this.updateDelay;
    if (updateTimestamp <= earliest) {
      throw new ConsensusError(
        "TOO_EARLY_UPDATE",
        `Update timestamp ${updateTimestamp} must be after ${earliest}`,
      );
    }

    const count = recovery.ok ? recovery.signers.length : recovery.count;
    if (count !== null && count < this.attestors.quorum) {
      throw new ConsensusError(
        "NOT_ENOUGH_SIGNATURES",
        `Got ${count} signatures, quorum is ${this.attestors.quorum}`,
      );
    }
    if (!recovery.ok) {
      throw new ConsensusError("INVALID_SIGNER", recovery.reason);
    }

    let previous: Address | null = null;
    for (const signer of recovery.signers) {
      if (previous !== null && compareAddresses(previous, signer) >= 0) {
        throw new ConsensusError(
          "INVALID_SIGNER",
          `Signers must be strictly increasing: ${signer} follows ${previous}`,
        );
      }
      if (!this.attestors.isAttestor(signer)) {
        throw new ConsensusError("INVALID_SIGNER", `Signer ${signer} is not a registered attestor`);
      }
      previous = signer;
    }

    // ─── Commit ─────────────────────────────────────────────────────────

    const snapshot: RewardsSnapshot = {
      rewardsRoot,
      previousRoot: this._rewardsRoot,
      nonce,
      updateTimestamp,
      payloadUri: submission.payloadUri,
      payloadHash,
      submittedBy: caller,
      signers: [...recovery.signers],
    };

    this._previousRewardsRoot = this._rewardsRoot;
    this._rewardsRoot = rewardsRoot;
    this._nonce = nonce + 1n;
    this._lastAcceptedTimestamp = updateTimestamp;
    this.history.push(snapshot);

    const event: SnapshotUpdatedEvent = {
      type: "snapshot_updated",
      caller,
      rewardsRoot,
      updateTimestamp,
      nonce,
      payloadUri: submission.payloadUri,
      payloadHash,
    };
    this.onEvent?.(event);

    return snapshot;
  }
}
