/**
 * Fetcher Contract
 *
 * Fetchers are passive data sources. The orchestrator pulls one batch per
 * source unit (scope) during each pass.
 *
 * Design principles:
 * - Passive: Fetchers don't push; the orchestrator pulls
 * - Stateless fetch: Each call to fetchBatch() is independent
 * - Honest about absence: `null` means the scope itself does not exist
 */

import type { WatchedEntity } from "./Entity.js";

/**
 * Options for a single upstream call.
 */
export interface FetchOptions {
    /** Aborted when the call exceeds its timeout */
    readonly signal: AbortSignal;
}

/**
 * Fetcher interface.
 *
 * Fetchers are responsible for:
 * - Talking to the upstream API (HTTP, GraphQL, RPC)
 * - Converting raw records to the WatchedEntity shape
 * - Throwing RateLimitError on 429, FetchError on other failures
 *
 * @example
 * ```typescript
 * class SpaceFetcher implements Fetcher {
 *     readonly id = "snapshot";
 *     readonly name = "Snapshot";
 *
 *     async fetchBatch(scope: string, options: FetchOptions) {
 *         const space = await this.client.space(scope, options.signal);
 *         if (!space) {
 *             return null;
 *         }
 *         return space.proposals.map(toEntity);
 *     }
 * }
 * ```
 */
export interface Fetcher<T extends WatchedEntity = WatchedEntity> {
    /** Unique identifier for this fetcher */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /**
     * Initialize the fetcher.
     * Called once when the supervisor starts. Throw ConfigurationError
     * for missing credentials.
     */
    initialize?(): Promise<void>;

    /**
     * Fetch the current batch of entities for one scope.
     *
     * @param scope - Sub-source namespace (space id, chain id, governor id)
     * @returns Entities, an empty list when nothing is active, or null when
     *          the scope no longer resolves upstream
     */
    fetchBatch(scope: string, options: FetchOptions): Promise<readonly T[] | null>;

    /**
     * Look up one tracked entity that was missing from the latest batch.
     *
     * @returns The entity, or null when it no longer exists upstream
     */
    fetchEntity?(scope: string, entityId: string, options: FetchOptions): Promise<T | null>;

    /**
     * Shutdown the fetcher.
     * Called once when the supervisor stops.
     */
    shutdown?(): Promise<void>;
}
