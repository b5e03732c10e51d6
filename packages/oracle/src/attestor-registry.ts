/**
 * Event-Sourced Attestor Registry
 *
 * Tracks which addresses may sign rewards snapshots and how many of
 * them must agree. All mutations (add/remove attestor, change quorum)
 * emit events, and the current state can be rebuilt by replaying them.
 *
 * Design:
 * - Event-sourced: state is derived from event history
 * - Deterministic replay: same events → same state
 * - Fail-closed: invalid operations throw
 * - Quorum never exceeds the attestor count once attestors exist
 */

import type {
  Address,
  AttestorAddedEvent,
  AttestorRemovedEvent,
  EventSink,
  QuorumChangedEvent,
  RegistryChangeEvent,
} from "@stakecore/types";
import { isAddress } from "@stakecore/types";
import { RegistryError } from "./types.js";
import type { AttestorDirectory, AttestorEntry } from "./types.js";

export interface AttestorRegistryOptions {
  /** Wall clock for event timestamps (default: system time) */
  readonly now?: (() => Date) | undefined;

  /** Receives every change event after it is applied */
  readonly onEvent?: EventSink | undefined;
}

// =============================================================================
// Attestor Registry
// =============================================================================

export class AttestorRegistry implements AttestorDirectory {
  private readonly attestors = new Map<string, AttestorEntry>();
  private _quorum = 1;
  private readonly events: RegistryChangeEvent[] = [];
  private readonly now: () => Date;
  private readonly onEvent: EventSink | undefined;

  constructor(options: AttestorRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.onEvent = options.onEvent;
  }

  /**
   * Register an attestor.
   *
   * @throws RegistryError INVALID_ADDRESS or ATTESTOR_EXISTS
   */
  addAttestor(address: Address, label: string): AttestorAddedEvent {
    if (!isAddress(address)) {
      throw new RegistryError("INVALID_ADDRESS", `Invalid attestor address: ${address}`);
    }
    if (this.attestors.has(address.toLowerCase())) {
      throw new RegistryError("ATTESTOR_EXISTS", `Attestor already exists: ${address}`);
    }

    const event: AttestorAddedEvent = {
      type: "attestor_added",
      address,
      label,
      timestamp: this.now().toISOString(),
    };

    this.record(event);
    return event;
  }

  /**
   * Deregister an attestor.
   *
   * @throws RegistryError ATTESTOR_NOT_FOUND
   * @throws RegistryError INVALID_QUORUM if removal would make quorum unreachable
   */
  removeAttestor(address: Address): AttestorRemovedEvent {
    if (!this.attestors.has(address.toLowerCase())) {
      throw new RegistryError("ATTESTOR_NOT_FOUND", `Attestor not found: ${address}`);
    }

    const remaining = this.attestors.size - 1;
    if (remaining < this._quorum) {
      throw new RegistryError(
        "INVALID_QUORUM",
        `Cannot remove attestor ${address}: ${remaining} remaining would be below quorum (${this._quorum})`,
      );
    }

    const event: AttestorRemovedEvent = {
      type: "attestor_removed",
      address,
      timestamp: this.now().toISOString(),
    };

    this.record(event);
    return event;
  }

  /**
   * Change the number of distinct attestor signatures required.
   *
   * @throws RegistryError INVALID_QUORUM if newQuorum < 1 or exceeds the attestor count
   */
  setQuorum(newQuorum: number): QuorumChangedEvent {
    if (!Number.isInteger(newQuorum) || newQuorum < 1) {
      throw new RegistryError("INVALID_QUORUM", `Quorum must be an integer >= 1, got ${newQuorum}`);
    }
    if (newQuorum > this.attestors.size) {
      throw new RegistryError(
        "INVALID_QUORUM",
        `Quorum (${newQuorum}) cannot exceed attestor count (${this.attestors.size})`,
      );
    }

    const event: QuorumChangedEvent = {
      type: "quorum_changed",
      previousQuorum: this._quorum,
      newQuorum,
      timestamp: this.now().toISOString(),
    };

    this.record(event);
    return event;
  }

  isAttestor(address: Address): boolean {
    return this.attestors.has(address.toLowerCase());
  }

  getAttestor(address: Address): AttestorEntry | undefined {
    return this.attestors.get(address.toLowerCase());
  }

  /** Attestors ordered by address. */
  getAttestors(): readonly AttestorEntry[] {
    return [...this.attestors.values()].sort((a, b) =>
      a.address.toLowerCase().localeCompare(b.address.toLowerCase()),
    );
  }

  get quorum(): number {
    return this._quorum;
  }

  get attestorCount(): number {
    return this.attestors.size;
  }

  /**
   * Replay registry history from a sequence of events.
   * Resets the registry to empty state first. Replayed events are not
   * re-emitted.
   */
  replayFrom(events: readonly RegistryChangeEvent[]): void {
    this.attestors.clear();
    this._quorum = 1;
    this.events.length = 0;

    for (const event of events) {
      this.applyEvent(event);
    }
  }

  getEventHistory(): readonly RegistryChangeEvent[] {
    return [...this.events];
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private record(event: RegistryChangeEvent): void {
    this.applyEvent(event);
    this.onEvent?.(event);
  }

  private applyEvent(event: RegistryChangeEvent): void {
    switch (event.type) {
      case "attestor_added":
        this.attestors.set(event.address.toLowerCase(), {
          address: event.address,
          label: event.label,
          addedAt: event.timestamp,
        });
        break;

      case "attestor_removed":
        this.attestors.delete(event.address.toLowerCase());
        break;

      case "quorum_changed":
        this._quorum = event.newQuorum;
        break;
    }

    this.events.push(event);
  }
}
