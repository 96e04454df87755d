/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    readConfigFile,
    resolveSettings,
    type LoadConfigOptions,
    type ResolvedConfig,
    type ResolvedSource,
} from "./loadConfig.js";
export {
    ConfigSchema,
    type Config,
    type CosmosNetwork,
    type SkyUnit,
    type SnapshotSpace,
    type TallyGovernor,
    type XrplNetwork,
    type Tuning,
} from "./schema.js";
