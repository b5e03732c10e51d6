/**
 * @stakecore/oracle — Rewards snapshot consensus.
 *
 * Attestor registry, EIP-712 signing and recovery, and the quorum-gated
 * acceptance of new rewards roots.
 *
 * @packageDocumentation
 */

// Types
export type {
  AttestorEntry,
  AttestorDirectory,
  OracleDomain,
  RewardsUpdateMessage,
  SnapshotSubmission,
  ConsensusErrorCode,
  RegistryErrorCode,
} from "./types.js";
export { ConsensusError, RegistryError } from "./types.js";

// Registry
export { AttestorRegistry } from "./attestor-registry.js";
export type { AttestorRegistryOptions } from "./attestor-registry.js";

// Signing
export {
  ORACLE_DOMAIN_NAME,
  ORACLE_DOMAIN_VERSION,
  SIGNATURE_LENGTH,
  REWARDS_UPDATE_TYPES,
  hashRewardsUpdate,
  signRewardsUpdate,
  compareAddresses,
  packSignatures,
  splitSignatures,
  recoverSigners,
} from "./signing.js";

// Consensus
export { OracleConsensus, DEFAULT_UPDATE_DELAY } from "./consensus.js";
export type { OracleConsensusOptions } from "./consensus.js";
