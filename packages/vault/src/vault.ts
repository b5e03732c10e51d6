/**
 * @stakecore/vault — Staking vault accounting.
 *
 * Tracks shares against total assets, folds harvested rewards into the
 * share price, and settles withdrawals through a FIFO exit queue.
 *
 * Composes:
 * - RewardHarvester (attested reward deltas)
 * - ExitQueue + PositionBook (withdrawal settlement)
 * - RewardsEscrow (execution-layer rewards)
 * - AssetTransfer (custody of the underlying asset)
 *
 * Rules:
 * - Every operation checks everything before its first write
 * - Outbound transfers run after all bookkeeping and events
 * - Queued shares stay in totalShares until a checkpoint burns them
 * - Penalties floor total assets at zero; rewards pay the fee in new shares
 */

import type {
  Address,
  Checkpoint,
  CheckpointCreatedEvent,
  DepositedEvent,
  EventSink,
  ExitPosition,
  ExitPositionStatus,
  ExitQueueEnteredEvent,
  ExitedAssetsClaimedEvent,
  FeeSharesMintedEvent,
  HarvestParams,
  RedeemedEvent,
  ResolvedExit,
} from "@stakecore/types";
import { fitsUint, isAddress, sameAddress, ZERO_ADDRESS } from "@stakecore/types";
import { ExitQueue, PositionBook, min, mulDiv, positionStatus } from "@stakecore/exit-queue";
import type { RewardHarvester } from "@stakecore/keeper";
import { STAKING_SINK } from "./asset-book.js";
import type { RewardsEscrow } from "./escrow.js";
import { VaultError } from "./types.js";
import type {
  AssetTransfer,
  ClaimResult,
  UpdateStateResult,
  VaultConfig,
  VaultState,
} from "./types.js";

export const DEFAULT_EXIT_QUEUE_UPDATE_DELAY = 86_400n;
export const MAX_FEE_PERCENT = 10_000;

export interface VaultOptions {
  readonly config: VaultConfig;
  readonly harvester: RewardHarvester;
  readonly assets: AssetTransfer;
  readonly escrow: RewardsEscrow;

  /** Unix seconds. Defaults to the system clock. */
  readonly clock?: (() => bigint) | undefined;
  readonly onEvent?: EventSink | undefined;
}

/** Totals after folding a reward delta in. */
interface Accrual {
  readonly totalAssets: bigint;
  readonly totalShares: bigint;
  readonly feeShares: bigint;
  readonly feeAssets: bigint;
}

interface ExitQueueUpdate {
  readonly burnedShares: bigint;
  readonly exitedAssets: bigint;
}

const NOTHING_RESOLVED: ResolvedExit = { leftShares: 0n, exitedShares: 0n, exitedAssets: 0n };

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly address: Address;
  readonly feeRecipient: Address;
  readonly feePercent: number;
  readonly exitQueueUpdateDelay: bigint;

  private readonly harvester: RewardHarvester;
  private readonly assets: AssetTransfer;
  private readonly escrow: RewardsEscrow;
  private readonly clock: () => bigint;
  private readonly onEvent: EventSink | undefined;

  private readonly exitQueue = new ExitQueue();
  private readonly positions = new PositionBook();
  private readonly balances = new Map<string, bigint>();

  private _totalAssets = 0n;
  private _totalShares = 0n;
  private _queuedShares = 0n;
  private _unclaimedAssets = 0n;
  private _lastExitQueueUpdate = 0n;

  constructor(options: VaultOptions) {
    const { config } = options;
    if (!isAddress(config.address) || !isAddress(config.feeRecipient)) {
      throw new VaultError("INVALID_ADDRESS", "Vault and fee recipient must be valid addresses");
    }
    if (
      !Number.isInteger(config.feePercent) ||
      config.feePercent < 0 ||
      config.feePercent > MAX_FEE_PERCENT
    ) {
      throw new VaultError(
        "INVALID_CONFIG",
        `Fee percent must be an integer in [0, ${MAX_FEE_PERCENT}], got ${config.feePercent}`,
      );
    }
    const delay = config.exitQueueUpdateDelay ?? DEFAULT_EXIT_QUEUE_UPDATE_DELAY;
    if (delay < 0n) {
      throw new VaultError("INVALID_CONFIG", `Exit queue update delay must not be negative`);
    }

    this.address = config.address;
    this.feeRecipient = config.feeRecipient;
    this.feePercent = config.feePercent;
    this.exitQueueUpdateDelay = delay;
    this.harvester = options.harvester;
    this.assets = options.assets;
    this.escrow = options.escrow;
    this.clock = options.clock ?? (() => BigInt(Math.floor(Date.now() / 1000)));
    this.onEvent = options.onEvent;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Conversions
  // ───────────────────────────────────────────────────────────────────────

  /** Shares minted for `assets` at the current rate, rounded down. */
  convertToShares(assets: bigint): bigint {
    return sharesFor(assets, this._totalAssets, this._totalShares);
  }

  /** Assets redeemable for `shares` at the current rate, rounded down. */
  convertToAssets(shares: bigint): bigint {
    return assetsFor(shares, this._totalAssets, this._totalShares);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Shares a deposit of `assets` would mint, after every check `deposit`
   * makes except the caller's balance. Nothing is changed.
   *
   * @throws VaultError INVALID_AMOUNT, INVALID_ADDRESS, NOT_HARVESTED or OVERFLOW
   */
  previewDeposit(receiver: Address, assets: bigint): bigint {
    return this.planDeposit(receiver, assets).shares;
  }

  /**
   * Move `assets` from `caller` into the vault and mint shares to `receiver`.
   *
   * @throws VaultError INVALID_AMOUNT, INVALID_ADDRESS, NOT_HARVESTED,
   *   INSUFFICIENT_ASSETS or OVERFLOW
   */
  deposit(caller: Address, receiver: Address, assets: bigint): bigint {
    const { shares, totalAssets, totalShares } = this.planDeposit(receiver, assets);
    const available = this.assets.balanceOf(caller);
    if (available < assets) {
      throw new VaultError(
        "INSUFFICIENT_ASSETS",
        `${caller} holds ${available}, cannot deposit ${assets}`,
      );
    }

    this.assets.transfer(caller, this.address, assets);
    this._totalAssets = totalAssets;
    this._totalShares = totalShares;
    this.credit(receiver, shares);

    const event: DepositedEvent = {
      type: "deposited",
      vault: this.address,
      caller,
      receiver,
      assets,
      shares,
    };
    this.onEvent?.(event);
    return shares;
  }

  /**
   * Burn shares for assets immediately. Only vaults that have not yet
   * staked (not collateralized) settle exits this way.
   *
   * @throws VaultError COLLATERALIZED, INVALID_AMOUNT, INSUFFICIENT_SHARES
   *   or INSUFFICIENT_ASSETS
   */
  redeem(owner: Address, receiver: Address, shares: bigint): bigint {
    if (this.harvester.isCollateralized(this.address)) {
      throw new VaultError("COLLATERALIZED", `Vault ${this.address} must use the exit queue`);
    }
    if (shares <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Redeemed shares must be positive, got ${shares}`);
    }
    this.requireRecipient(receiver);
    this.requireShares(owner, shares);

    const assets = this.convertToAssets(shares);
    if (assets > this.withdrawableAssets) {
      throw new VaultError(
        "INSUFFICIENT_ASSETS",
        `Vault can pay ${this.withdrawableAssets}, redemption needs ${assets}`,
      );
    }

    this.debit(owner, shares);
    this._totalShares -= shares;
    this._totalAssets -= assets;

    const event: RedeemedEvent = {
      type: "redeemed",
      vault: this.address,
      owner,
      receiver,
      assets,
      shares,
    };
    this.onEvent?.(event);

    this.assets.transfer(this.address, receiver, assets);
    return assets;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Staking
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Send withdrawable assets to validators. The first stake collateralizes
   * the vault, after which exits go through the queue.
   *
   * @throws VaultError INVALID_AMOUNT or INSUFFICIENT_ASSETS
   * @throws KeeperError ACCESS_DENIED if the vault is not registered
   */
  stakeAssets(amount: bigint): void {
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Staked amount must be positive, got ${amount}`);
    }
    if (amount > this.withdrawableAssets) {
      throw new VaultError(
        "INSUFFICIENT_ASSETS",
        `Vault can stake ${this.withdrawableAssets}, requested ${amount}`,
      );
    }

    this.harvester.collateralize(this.address);
    this.assets.transfer(this.address, STAKING_SINK, amount);
  }

  /**
   * Accept assets returning from validators. Principal coming back does
   * not change total assets; rewards arrive through harvests.
   *
   * @throws VaultError INVALID_AMOUNT or INSUFFICIENT_ASSETS
   */
  receiveAssets(from: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Received amount must be positive, got ${amount}`);
    }
    this.assets.transfer(from, this.address, amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // State update
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Harvest the latest attested rewards, pull escrowed execution rewards,
   * and settle queued exits against the assets on hand.
   *
   * The harvest step is a no-op when the vault is already synced; the exit
   * queue runs at most once per `exitQueueUpdateDelay`.
   *
   * @throws KeeperError from the harvest checks
   * @throws VaultError INSUFFICIENT_ASSETS if the shared escrow cannot pay, or OVERFLOW
   */
  updateState(params: HarvestParams): UpdateStateResult {
    const sharedEscrow = this.escrow.kind === "shared";
    const preview = this.harvester.previewHarvest(this.address, params, { sharedEscrow });
    const applies = preview.harvested || preview.unlockedDelta > 0n;

    const sharedPayout = this.escrow.kind === "shared" ? preview.unlockedDelta : 0n;
    if (sharedPayout > this.escrow.balance) {
      throw new VaultError(
        "INSUFFICIENT_ASSETS",
        `Shared escrow holds ${this.escrow.balance}, harvest unlocks ${sharedPayout}`,
      );
    }
    const ownPull = this.escrow.kind === "own" && preview.harvested ? this.escrow.balance : 0n;
    const escrowAssets = sharedPayout + ownPull;

    const totalAssetsDelta = preview.harvested ? preview.delta + ownPull : 0n;
    const accrual = this.accrue(totalAssetsDelta);
    fit(accrual.totalAssets, 128, "Total assets");
    fit(accrual.totalShares, 160, "Total shares");

    const exit = this.planExitQueueUpdate(
      accrual.totalAssets,
      accrual.totalShares,
      this.liquidAssets + escrowAssets,
    );
    if (exit !== null) {
      fit(this.exitQueue.totalResolvedShares + exit.burnedShares, 160, "Resolved shares");
      fit(this.exitQueue.totalUnlockedAssets + exit.exitedAssets, 256, "Unlocked assets");
    }

    // ─── Commit ──────────────────────────────────────────────────────────

    if (applies) {
      this.harvester.harvest(this.address, params, { sharedEscrow });
    }
    if (this.escrow.kind === "shared") {
      if (sharedPayout > 0n) this.escrow.harvest(this.address, sharedPayout);
    } else if (ownPull > 0n) {
      this.escrow.harvest(this.address);
    }

    this._totalAssets = accrual.totalAssets;
    this._totalShares = accrual.totalShares;
    if (accrual.feeShares > 0n) {
      this.credit(this.feeRecipient, accrual.feeShares);
      const event: FeeSharesMintedEvent = {
        type: "fee_shares_minted",
        vault: this.address,
        receiver: this.feeRecipient,
        shares: accrual.feeShares,
        assets: accrual.feeAssets,
      };
      this.onEvent?.(event);
    }

    let checkpoint: Checkpoint | null = null;
    if (exit !== null) {
      checkpoint = this.exitQueue.push(exit.burnedShares, exit.exitedAssets);
      this._queuedShares -= exit.burnedShares;
      this._unclaimedAssets += exit.exitedAssets;
      this._totalShares -= exit.burnedShares;
      this._totalAssets -= exit.exitedAssets;
      this._lastExitQueueUpdate = this.clock();

      const event: CheckpointCreatedEvent = {
        type: "checkpoint_created",
        vault: this.address,
        sharesResolved: exit.burnedShares,
        assetsUnlocked: exit.exitedAssets,
      };
      this.onEvent?.(event);
    }

    return {
      harvested: preview.harvested,
      totalAssetsDelta,
      escrowAssets,
      feeShares: accrual.feeShares,
      checkpoint,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Exit queue
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Queue `shares` of `owner` for withdrawal to `receiver`.
   *
   * @returns the position's ticket
   * @throws VaultError INVALID_AMOUNT, INVALID_ADDRESS, INSUFFICIENT_SHARES,
   *   NOT_COLLATERALIZED, NOT_HARVESTED or OVERFLOW
   */
  enterExitQueue(owner: Address, receiver: Address, shares: bigint): bigint {
    if (shares <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Queued shares must be positive, got ${shares}`);
    }
    this.requireRecipient(receiver);
    this.requireShares(owner, shares);
    if (!this.harvester.isCollateralized(this.address)) {
      throw new VaultError(
        "NOT_COLLATERALIZED",
        `Vault ${this.address} is not collateralized; redeem instead`,
      );
    }
    this.requireHarvested();

    const ticket = this.exitQueue.totalResolvedShares + this._queuedShares;
    const queuedShares = fit(this._queuedShares + shares, 160, "Queued shares");

    this.positions.open(receiver, ticket, shares, "entered", this.clock());
    this.debit(owner, shares);
    this._queuedShares = queuedShares;

    const event: ExitQueueEnteredEvent = {
      type: "exit_queue_entered",
      vault: this.address,
      owner,
      receiver,
      ticket,
      shares,
    };
    this.onEvent?.(event);
    return ticket;
  }

  /** Index of the checkpoint that resolves `ticket`, or null if none does yet. */
  getCheckpointIndex(ticket: bigint): number | null {
    return this.exitQueue.getCheckpointIndex(ticket);
  }

  /**
   * Preview what claiming would pay. Unknown positions resolve to zeros.
   *
   * @throws ExitQueueError INVALID_CHECKPOINT_INDEX if the index does not cover the ticket
   */
  calculateExitedAssets(receiver: Address, ticket: bigint, checkpointIndex: number): ResolvedExit {
    const position = this.positions.get(receiver, ticket);
    if (position === undefined) return NOTHING_RESOLVED;
    return this.exitQueue.resolve(ticket, position.shares, checkpointIndex);
  }

  /**
   * Pay out the resolved part of a position. A remainder becomes a
   * successor position at `ticket + exitedShares`.
   *
   * @throws VaultError POSITION_NOT_FOUND or EXIT_REQUEST_NOT_PROCESSED
   * @throws ExitQueueError INVALID_CHECKPOINT_INDEX
   */
  claimExitedAssets(receiver: Address, ticket: bigint, checkpointIndex: number): ClaimResult {
    const position = this.positions.get(receiver, ticket);
    if (position === undefined) {
      throw new VaultError("POSITION_NOT_FOUND", `No position for ${receiver} at ticket ${ticket}`);
    }
    const resolved = this.exitQueue.resolve(ticket, position.shares, checkpointIndex);
    if (resolved.exitedAssets === 0n) {
      throw new VaultError(
        "EXIT_REQUEST_NOT_PROCESSED",
        `Ticket ${ticket} has no assets resolved at checkpoint ${checkpointIndex}`,
      );
    }

    this.positions.close(receiver, ticket);
    const successor =
      resolved.leftShares > 0n
        ? this.positions.open(
            position.receiver,
            ticket + resolved.exitedShares,
            resolved.leftShares,
            "successor",
            this.clock(),
          )
        : null;
    this._unclaimedAssets -= resolved.exitedAssets;

    const event: ExitedAssetsClaimedEvent = {
      type: "exited_assets_claimed",
      vault: this.address,
      receiver: position.receiver,
      previousTicket: ticket,
      successorTicket: successor?.ticket ?? null,
      assets: resolved.exitedAssets,
    };
    this.onEvent?.(event);

    this.assets.transfer(this.address, position.receiver, resolved.exitedAssets);

    return {
      receiver: position.receiver,
      previousTicket: ticket,
      successor,
      exitedShares: resolved.exitedShares,
      assets: resolved.exitedAssets,
    };
  }

  getPosition(receiver: Address, ticket: bigint): ExitPosition | undefined {
    return this.positions.get(receiver, ticket);
  }

  getPositionStatus(receiver: Address, ticket: bigint): ExitPositionStatus {
    return positionStatus(this.positions.get(receiver, ticket));
  }

  getPositions(receiver: Address): readonly ExitPosition[] {
    return this.positions.listByReceiver(receiver);
  }

  getCheckpoints(): readonly Checkpoint[] {
    return this.exitQueue.getCheckpoints();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get totalAssets(): bigint {
    return this._totalAssets;
  }

  get totalShares(): bigint {
    return this._totalShares;
  }

  get queuedShares(): bigint {
    return this._queuedShares;
  }

  get unclaimedAssets(): bigint {
    return this._unclaimedAssets;
  }

  get lastExitQueueUpdate(): bigint {
    return this._lastExitQueueUpdate;
  }

  /** Underlying assets held by the vault itself. */
  get liquidAssets(): bigint {
    return this.assets.balanceOf(this.address);
  }

  /** Liquid assets not owed to claimants or reserved for queued shares. */
  get withdrawableAssets(): bigint {
    const reserved = this._unclaimedAssets + this.convertToAssets(this._queuedShares);
    const liquid = this.liquidAssets;
    return liquid > reserved ? liquid - reserved : 0n;
  }

  get isSharedEscrow(): boolean {
    return this.escrow.kind === "shared";
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(holder.toLowerCase()) ?? 0n;
  }

  getState(): VaultState {
    return {
      address: this.address,
      totalAssets: this._totalAssets,
      totalShares: this._totalShares,
      queuedShares: this._queuedShares,
      unclaimedAssets: this._unclaimedAssets,
      liquidAssets: this.liquidAssets,
      withdrawableAssets: this.withdrawableAssets,
      checkpointCount: this.exitQueue.length,
      lastExitQueueUpdate: this._lastExitQueueUpdate,
    };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private accrue(delta: bigint): Accrual {
    const totalShares = this._totalShares;
    if (delta <= 0n) {
      const totalAssets = this._totalAssets + delta;
      return {
        totalAssets: totalAssets > 0n ? totalAssets : 0n,
        totalShares,
        feeShares: 0n,
        feeAssets: 0n,
      };
    }

    const totalAssets = this._totalAssets + delta;
    const feeAssets = mulDiv(delta, BigInt(this.feePercent), BigInt(MAX_FEE_PERCENT));
    const priced = totalAssets - feeAssets;
    const feeShares =
      feeAssets === 0n || totalShares === 0n || priced === 0n
        ? 0n
        : mulDiv(feeAssets, totalShares, priced);

    return { totalAssets, totalShares: totalShares + feeShares, feeShares, feeAssets };
  }

  private planExitQueueUpdate(
    totalAssets: bigint,
    totalShares: bigint,
    liquidAssets: bigint,
  ): ExitQueueUpdate | null {
    if (this._queuedShares === 0n) return null;
    if (
      this._lastExitQueueUpdate > 0n &&
      this.clock() < this._lastExitQueueUpdate + this.exitQueueUpdateDelay
    ) {
      return null;
    }

    const available = liquidAssets > this._unclaimedAssets ? liquidAssets - this._unclaimedAssets : 0n;
    const exitedAssets = min(available, assetsFor(this._queuedShares, totalAssets, totalShares));
    if (exitedAssets === 0n) return null;

    const burnedShares = sharesFor(exitedAssets, totalAssets, totalShares);
    if (burnedShares === 0n) return null;

    return { burnedShares, exitedAssets };
  }

  private requireHarvested(): void {
    if (this.harvester.isStale(this.address)) {
      throw new VaultError(
        "NOT_HARVESTED",
        `Vault ${this.address} must harvest before accepting this operation`,
      );
    }
  }

  private planDeposit(
    receiver: Address,
    assets: bigint,
  ): { shares: bigint; totalAssets: bigint; totalShares: bigint } {
    if (assets <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Deposit must be positive, got ${assets}`);
    }
    this.requireRecipient(receiver);
    this.requireHarvested();

    const shares = this.convertToShares(assets);
    if (shares === 0n) {
      throw new VaultError("INVALID_AMOUNT", `Deposit of ${assets} mints no shares`);
    }
    return {
      shares,
      totalAssets: fit(this._totalAssets + assets, 128, "Total assets"),
      totalShares: fit(this._totalShares + shares, 160, "Total shares"),
    };
  }

  private requireRecipient(receiver: Address): void {
    if (!isAddress(receiver) || sameAddress(receiver, ZERO_ADDRESS)) {
      throw new VaultError("INVALID_ADDRESS", `Invalid receiver: ${receiver}`);
    }
  }

  private requireShares(owner: Address, shares: bigint): void {
    const balance = this.balanceOf(owner);
    if (balance < shares) {
      throw new VaultError("INSUFFICIENT_SHARES", `${owner} holds ${balance}, needs ${shares}`);
    }
  }

  private credit(holder: Address, shares: bigint): void {
    this.balances.set(holder.toLowerCase(), this.balanceOf(holder) + shares);
  }

  private debit(holder: Address, shares: bigint): void {
    const remaining = this.balanceOf(holder) - shares;
    if (remaining === 0n) {
      this.balances.delete(holder.toLowerCase());
    } else {
      this.balances.set(holder.toLowerCase(), remaining);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function sharesFor(assets: bigint, totalAssets: bigint, totalShares: bigint): bigint {
  if (totalShares === 0n || totalAssets === 0n) return assets;
  return mulDiv(assets, totalShares, totalAssets);
}

function assetsFor(shares: bigint, totalAssets: bigint, totalShares: bigint): bigint {
  if (totalShares === 0n) return shares;
  return mulDiv(shares, totalAssets, totalShares);
}

function fit(value: bigint, bits: 128 | 160 | 256, label: string): bigint {
  if (!fitsUint(value, bits)) {
    throw new VaultError("OVERFLOW", `${label} does not fit uint${bits}: ${value}`);
  }
  return value;
}
