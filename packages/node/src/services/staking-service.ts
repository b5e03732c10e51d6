/**
 * StakingService — Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Every component reports its events into one
 * hash-chained audit log.
 */

import type { Logger } from "pino";
import type {
  Address,
  HarvestParams,
  ResolvedExit,
  RewardsSnapshot,
} from "@stakecore/types";
import { ProtocolEventLog } from "@stakecore/audit-log";
import type { IntegrityResult, LogQuery, LoggedEvent } from "@stakecore/audit-log";
import { AttestorRegistry, OracleConsensus } from "@stakecore/oracle";
import type { OracleDomain, SnapshotSubmission } from "@stakecore/oracle";
import { KeeperError, RewardHarvester, RewardStore, VaultRegistry } from "@stakecore/keeper";
import {
  AssetBook,
  OwnRewardsEscrow,
  SharedRewardsEscrow,
  STAKING_SINK,
  Vault,
} from "@stakecore/vault";
import type { ClaimResult, EscrowKind, UpdateStateResult } from "@stakecore/vault";

// =============================================================================
// Configuration
// =============================================================================

export interface StakingServiceConfig {
  readonly domain: OracleDomain;
  readonly rewardsUpdateDelay: bigint;
  readonly exitQueueUpdateDelay: bigint;
  readonly minOracles: number;
  readonly oracles: readonly { readonly address: Address; readonly label: string }[];
  readonly vaults: readonly {
    readonly address: Address;
    readonly feePercent: number;
    readonly escrow: EscrowKind;
  }[];
  readonly feeRecipient: Address;
  readonly sharedEscrow: Address;
  readonly logger: Logger;

  /** Unix seconds (default: system time) */
  readonly clock?: (() => bigint) | undefined;
}

export interface ExitQueueEntryView {
  readonly receiver: Address;
  readonly ticket: bigint;
  readonly status: ReturnType<Vault["getPositionStatus"]>;
  readonly checkpointIndex: number | null;
  readonly preview: ResolvedExit | null;
}

// =============================================================================
// Service
// =============================================================================

export class StakingService {
  readonly auditLog: ProtocolEventLog;
  readonly attestors: AttestorRegistry;
  readonly consensus: OracleConsensus;
  readonly vaultRegistry: VaultRegistry;
  readonly harvester: RewardHarvester;
  readonly assets: AssetBook;
  readonly sharedEscrow: SharedRewardsEscrow;

  private readonly vaults = new Map<string, Vault>();
  private readonly logger: Logger;

  constructor(config: StakingServiceConfig) {
    this.logger = config.logger;
    this.auditLog = new ProtocolEventLog();
    const onEvent = this.auditLog.sink();

    this.attestors = new AttestorRegistry({ onEvent });
    for (const oracle of config.oracles) {
      this.attestors.addAttestor(oracle.address, oracle.label);
    }
    if (config.oracles.length > 0) {
      this.attestors.setQuorum(config.minOracles);
    }

    this.consensus = new OracleConsensus({
      attestors: this.attestors,
      domain: config.domain,
      updateDelay: config.rewardsUpdateDelay,
      clock: config.clock,
      onEvent,
    });

    this.vaultRegistry = new VaultRegistry(config.vaults.map((v) => v.address));
    this.harvester = new RewardHarvester({
      roots: this.consensus,
      vaults: this.vaultRegistry,
      store: new RewardStore(),
      onEvent,
    });

    this.assets = new AssetBook();
    this.sharedEscrow = new SharedRewardsEscrow(config.sharedEscrow, this.assets);

    for (const v of config.vaults) {
      const vault = new Vault({
        config: {
          address: v.address,
          feeRecipient: config.feeRecipient,
          feePercent: v.feePercent,
          exitQueueUpdateDelay: config.exitQueueUpdateDelay,
        },
        harvester: this.harvester,
        assets: this.assets,
        escrow:
          v.escrow === "shared"
            ? this.sharedEscrow
            : new OwnRewardsEscrow(ownEscrowAddress(v.address), this.assets),
        clock: config.clock,
        onEvent,
      });
      this.vaults.set(v.address.toLowerCase(), vault);
    }
  }

  // ─── Rewards ─────────────────────────────────────────────────────

  async submitSnapshot(submission: SnapshotSubmission): Promise<RewardsSnapshot> {
    try {
      const snapshot = await this.consensus.submitSnapshot(submission);
      this.logger.info(
        {
          nonce: snapshot.nonce.toString(),
          rewardsRoot: snapshot.rewardsRoot,
          signers: snapshot.signers.length,
        },
        "Rewards snapshot accepted",
      );
      return snapshot;
    } catch (err) {
      this.logger.warn(
        { caller: submission.caller, rewardsRoot: submission.rewardsRoot, err },
        "Rewards snapshot rejected",
      );
      throw err;
    }
  }

  // ─── Vaults ──────────────────────────────────────────────────────

  /**
   * @throws KeeperError VAULT_NOT_FOUND
   */
  getVault(address: Address): Vault {
    const vault = this.vaults.get(address.toLowerCase());
    if (vault === undefined) {
      throw new KeeperError("VAULT_NOT_FOUND", `Vault not registered: ${address}`);
    }
    return vault;
  }

  listVaults(): readonly Vault[] {
    return [...this.vaults.values()];
  }

  /**
   * Deposit assets that arrive with the call: they are credited to
   * `caller` and moved into the vault in one step. The vault's checks run
   * before the credit, so a rejected deposit leaves no balance behind.
   */
  deposit(vaultAddress: Address, caller: Address, receiver: Address, assets: bigint): bigint {
    const vault = this.getVault(vaultAddress);
    vault.previewDeposit(receiver, assets);
    this.assets.mint(caller, assets);
    const shares = vault.deposit(caller, receiver, assets);
    this.logger.info(
      { vault: vault.address, receiver, assets: assets.toString(), shares: shares.toString() },
      "Deposit accepted",
    );
    return shares;
  }

  redeem(vaultAddress: Address, owner: Address, receiver: Address, shares: bigint): bigint {
    return this.getVault(vaultAddress).redeem(owner, receiver, shares);
  }

  stake(vaultAddress: Address, amount: bigint): void {
    this.getVault(vaultAddress).stakeAssets(amount);
  }

  /** Assets withdrawn from validators arrive back in the vault. */
  returnStake(vaultAddress: Address, amount: bigint): void {
    this.getVault(vaultAddress).receiveAssets(STAKING_SINK, amount);
  }

  updateState(vaultAddress: Address, params: HarvestParams): UpdateStateResult {
    const vault = this.getVault(vaultAddress);
    const result = vault.updateState(params);

    if (result.harvested) {
      this.logger.info(
        {
          vault: vault.address,
          delta: result.totalAssetsDelta.toString(),
          feeShares: result.feeShares.toString(),
        },
        "Rewards harvested",
      );
    }
    if (result.checkpoint !== null) {
      this.logger.info(
        {
          vault: vault.address,
          cumulativeShares: result.checkpoint.cumulativeShares.toString(),
          cumulativeAssets: result.checkpoint.cumulativeAssets.toString(),
        },
        "Exit queue checkpoint created",
      );
    }
    return result;
  }

  enterExitQueue(vaultAddress: Address, owner: Address, receiver: Address, shares: bigint): bigint {
    return this.getVault(vaultAddress).enterExitQueue(owner, receiver, shares);
  }

  getExitQueueEntry(vaultAddress: Address, receiver: Address, ticket: bigint): ExitQueueEntryView {
    const vault = this.getVault(vaultAddress);
    const checkpointIndex = vault.getCheckpointIndex(ticket);
    const position = vault.getPosition(receiver, ticket);
    const preview =
      checkpointIndex === null || position === undefined
        ? null
        : vault.calculateExitedAssets(receiver, ticket, checkpointIndex);

    return {
      receiver,
      ticket,
      status: vault.getPositionStatus(receiver, ticket),
      checkpointIndex,
      preview,
    };
  }

  claimExitedAssets(
    vaultAddress: Address,
    receiver: Address,
    ticket: bigint,
    checkpointIndex: number,
  ): ClaimResult {
    const vault = this.getVault(vaultAddress);
    const claim = vault.claimExitedAssets(receiver, ticket, checkpointIndex);
    this.logger.info(
      {
        vault: vault.address,
        receiver,
        ticket: ticket.toString(),
        assets: claim.assets.toString(),
        successorTicket: claim.successor?.ticket.toString() ?? null,
      },
      "Exited assets claimed",
    );
    return claim;
  }

  // ─── Audit ───────────────────────────────────────────────────────

  queryEvents(query: LogQuery): readonly LoggedEvent[] {
    return this.auditLog.query(query);
  }

  verifyIntegrity(): IntegrityResult {
    return this.auditLog.verifyIntegrity();
  }
}

/**
 * Deterministic per-vault escrow address: the vault address with its
 * top byte replaced by 0xee.
 */
function ownEscrowAddress(vault: Address): Address {
  return `0xee${vault.slice(4).toLowerCase()}`;
}
