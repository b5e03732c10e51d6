/**
 * @stakecore/node — HTTP node for the staking accounting core.
 *
 * @packageDocumentation
 */

export { StakingService } from "./services/staking-service.js";
export type { StakingServiceConfig, ExitQueueEntryView } from "./services/staking-service.js";
export { loadConfig, parseOracles, parseVaults, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedOracle, ParsedVault } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
