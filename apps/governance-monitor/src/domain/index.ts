/**
 * @fileoverview Domain barrel exports
 *
 * Governance platforms: fetchers, formatters, policy tables and the wiring
 * that turns configuration into engine sources.
 *
 * @module domain
 */

export * from "./fetchers/index.js";
export * from "./formatters/index.js";
export { cosmosPolicy, skyPolicy, snapshotPolicy, tallyPolicy, xrplPolicy } from "./policies.js";
export { buildSources, type BuildSourcesOptions } from "./sources.js";
