/**
 * @fileoverview SourceOrchestrator
 *
 * Drives one source's poll / diff / dispatch cycle.
 *
 * Pass flow, per source unit:
 * 1. Fetch the batch through the rate limiter (429 ⇒ backoff and retry)
 * 2. `null` batch ⇒ one-shot admin alert for the scope
 * 3. Classify and dispatch every entity, sequentially
 * 4. Look up tracked entities that vanished from the batch
 *
 * A failing unit or entity is logged and skipped; the pass carries on.
 *
 * @module @govwatch/engine/engine/SourceOrchestrator
 */

import type { WatchedEntity } from "../contracts/Entity.js";
import { entityKey } from "../contracts/Entity.js";
import type { EventBus, EventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { Fetcher } from "../contracts/Fetcher.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { scopedLogger } from "../contracts/Logger.js";
import type { Formatter, Notifier, SourceUnit } from "../contracts/Notifier.js";
import {
    TransitionOutcome,
    type TransitionPolicyTable,
} from "../contracts/TransitionOutcome.js";
import {
    RateLimitError,
    classifyError,
    errorMessage,
    isRateLimitError,
} from "../errors.js";
import type { AdminAlertRegistry } from "../impl/AdminAlertRegistry.js";
import type { EntityStore } from "../impl/EntityStore.js";
import { DEFAULT_RATE_LIMIT, RateLimiter } from "../impl/RateLimiter.js";
import {
    classifyScope,
    classifyTransition,
    isTerminalStatus,
} from "../policy/classifyTransition.js";
import { withTimeout } from "../utils/withTimeout.js";
import { AlertDispatcher } from "./AlertDispatcher.js";

export type OrchestratorState = "idle" | "fetching" | "reconciling" | "sleeping" | "stopped";

export interface SourceSettings {
    /** Pause between passes in continuous mode, in ms */
    readonly pollIntervalMs: number;

    /** Timeout for each upstream fetch, in ms */
    readonly fetchTimeoutMs: number;

    /** Timeout for each notification send, in ms */
    readonly sendTimeoutMs: number;

    readonly rateLimit: {
        readonly minIntervalMs: number;
        readonly initialBackoffMs: number;
        readonly maxRetries: number;
    };

    /** Loop forever (true) or run a single pass (false) */
    readonly continuous: boolean;

    /** Pause after a pass fails unexpectedly, in ms */
    readonly errorBackoffMs: number;
}

export const DEFAULT_SOURCE_SETTINGS: SourceSettings = {
    pollIntervalMs: 60000,
    fetchTimeoutMs: 60000,
    sendTimeoutMs : 30000,
    rateLimit     : DEFAULT_RATE_LIMIT,
    continuous    : true,
    errorBackoffMs: 60000,
};

/**
 * Everything one governance source needs to run.
 */
export interface SourceDefinition {
    /** Unique identifier, also used as the log scope */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Scopes watched by this source (spaces, chains, governors) */
    readonly units: readonly SourceUnit[];

    readonly fetcher: Fetcher;
    readonly notifier: Notifier;
    readonly formatter: Formatter;
    readonly policy: TransitionPolicyTable;
    readonly store: EntityStore;
    readonly adminAlerts: AdminAlertRegistry;

    /** Overrides for DEFAULT_SOURCE_SETTINGS */
    readonly settings?: Partial<SourceSettings>;
}

export interface OrchestratorOptions {
    readonly eventBus: EventBus;
    readonly logger: EngineLogger;

    /** Timer used by the rate limiter, replaceable in tests */
    readonly sleep?: (ms: number) => Promise<void>;

    /** Clock used by the rate limiter and pass timing */
    readonly now?: () => number;
}

/**
 * Counts for one pass, emitted as `source:passCompleted`.
 */
export interface PassSummary {
    readonly sourceId: string;
    readonly unitsProcessed: number;
    readonly unitsSkipped: number;
    readonly invalidScopes: number;
    readonly entitiesSeen: number;
    readonly entitiesLookedUp: number;
    readonly sent: number;
    readonly failedSends: number;
    readonly tracked: number;
    readonly durationMs: number;
}

type MutableSummary = { -readonly [K in keyof PassSummary]: PassSummary[K] };

type UnitFetch =
    | { readonly skipped: true }
    | { readonly skipped: false; readonly batch: readonly WatchedEntity[] | null };

export class SourceOrchestrator {
    readonly definition: SourceDefinition;
    readonly settings: SourceSettings;

    private readonly eventBus: EventBus;
    private readonly logger: EngineLogger;
    private readonly now: () => number;
    private readonly limiter: RateLimiter;
    private readonly dispatcher: AlertDispatcher;

    private currentState: OrchestratorState = "idle";
    private stopRequested = false;
    private wake: (() => void) | null = null;

    constructor(definition: SourceDefinition, options: OrchestratorOptions) {
        this.definition = definition;
        this.settings = {
            ...DEFAULT_SOURCE_SETTINGS,
            ...definition.settings,
            rateLimit: {
                ...DEFAULT_SOURCE_SETTINGS.rateLimit,
                ...definition.settings?.rateLimit,
            },
        };
        this.eventBus = options.eventBus;
        this.logger = scopedLogger(options.logger, definition.id);
        this.now = options.now ?? Date.now;

        this.limiter = new RateLimiter({
            ...this.settings.rateLimit,
            logger: this.logger,
            now   : options.now,
            sleep : options.sleep,
        });

        this.dispatcher = new AlertDispatcher({
            sourceId     : definition.id,
            store        : definition.store,
            adminAlerts  : definition.adminAlerts,
            notifier     : definition.notifier,
            formatter    : definition.formatter,
            policy       : definition.policy,
            eventBus     : this.eventBus,
            logger       : this.logger,
            sendTimeoutMs: this.settings.sendTimeoutMs,
        });
    }

    get state(): OrchestratorState {
        return this.currentState;
    }

    /**
     * Run passes until stopped, or once in single-pass mode.
     *
     * @throws Permanent errors (e.g. ConfigurationError) raised by a pass
     */
    async run(): Promise<void> {
        this.stopRequested = false;

        while (!this.stopRequested) {
            try {
                await this.runPass();
            }
            catch (error) {
                if (classifyError(error) === "permanent") {
                    this.currentState = "stopped";
                    throw error;
                }

                this.logger.error("Pass failed unexpectedly", { error: errorMessage(error) });
                if (!this.settings.continuous || this.stopRequested) {
                    break;
                }
                await this.pause(this.settings.errorBackoffMs);
                continue;
            }

            if (!this.settings.continuous || this.stopRequested) {
                break;
            }
            this.logger.debug("Sleeping until next pass", { ms: this.settings.pollIntervalMs });
            await this.pause(this.settings.pollIntervalMs);
        }

        this.currentState = "stopped";
    }

    /**
     * Ask the loop to stop. The current pass finishes; a pending sleep ends
     * immediately.
     */
    stop(): void {
        this.stopRequested = true;
        this.wake?.();
    }

    /**
     * Run one pass over every unit of the source.
     */
    async runPass(): Promise<PassSummary> {
        const startedAt = this.now();
        const summary: MutableSummary = {
            sourceId      : this.definition.id,
            unitsProcessed: 0,
            unitsSkipped  : 0,
            invalidScopes : 0,
            entitiesSeen  : 0,
            entitiesLookedUp: 0,
            sent          : 0,
            failedSends   : 0,
            tracked       : 0,
            durationMs    : 0,
        };

        this.emit("source:passStarted", { units: this.definition.units.length });

        for (const unit of this.definition.units) {
            this.currentState = "fetching";
            const fetched = await this.fetchUnit(unit);
            if (fetched.skipped) {
                summary.unitsSkipped++;
                this.emit("source:unitSkipped", { scope: unit.scope });
                continue;
            }

            this.currentState = "reconciling";
            summary.unitsProcessed++;

            if (fetched.batch === null) {
                summary.invalidScopes++;
                await this.handleInvalidScope(unit, summary);
                continue;
            }

            const seen = new Set<string>();
            for (const entity of fetched.batch) {
                seen.add(entityKey(unit.scope, entity.id));
                summary.entitiesSeen++;
                await this.reconcile(unit, entity, summary);
            }

            await this.lookUpMissing(unit, seen, summary);
        }

        summary.tracked = this.definition.store.count();
        summary.durationMs = this.now() - startedAt;
        this.currentState = "idle";

        this.emit("source:passCompleted", { ...summary });
        return summary;
    }

    private async fetchUnit(unit: SourceUnit): Promise<UnitFetch> {
        const { fetcher } = this.definition;

        try {
            const batch = await this.limited(`Fetch ${unit.scope}`, (signal) =>
                fetcher.fetchBatch(unit.scope, { signal })
            );
            this.logger.debug("Fetched batch", {
                scope: unit.scope,
                count: batch === null ? null : batch.length,
            });
            return { skipped: false, batch };
        }
        catch (error) {
            if (classifyError(error) === "permanent") {
                throw error;
            }
            if (error instanceof RateLimitError) {
                this.logger.warn("Rate limit retries exhausted, skipping unit for this pass", {
                    scope: unit.scope,
                });
            }
            else {
                this.logger.error("Fetch failed, skipping unit for this pass", {
                    scope: unit.scope,
                    error: errorMessage(error),
                });
            }
            return { skipped: true };
        }
    }

    private async handleInvalidScope(unit: SourceUnit, summary: MutableSummary): Promise<void> {
        const { adminAlerts } = this.definition;

        this.logger.warn("Scope no longer resolves upstream", { scope: unit.scope });
        this.emit("scope:invalid", { scope: unit.scope });

        const outcome = classifyScope(null, adminAlerts.isWarned(unit.scope));
        if (outcome !== TransitionOutcome.NotifyAdmin) {
            return;
        }

        const result = await this.dispatcher.dispatchAdmin(unit);
        if (result.sent) {
            summary.sent++;
        }
        else {
            summary.failedSends++;
        }
    }

    /**
     * Classify and dispatch one entity. Errors stay inside this entity.
     */
    private async reconcile(unit: SourceUnit, entity: WatchedEntity, summary: MutableSummary): Promise<void> {
        const key = entityKey(unit.scope, entity.id);

        try {
            const record = this.definition.store.get(key);
            const outcome = classifyTransition(this.definition.policy, record, entity.status);

            this.emit("entity:classified", {
                key,
                from: record?.status ?? null,
                to  : entity.status,
                outcome,
            });

            const result = await this.dispatcher.dispatch(unit, entity, record, outcome);
            if (result.sent) {
                summary.sent++;
            }
            else if (outcome !== TransitionOutcome.NoOp) {
                summary.failedSends++;
            }
        }
        catch (error) {
            this.logger.error("Failed to reconcile entity", { key, error: errorMessage(error) });
        }
    }

    /**
     * Look up tracked entities of a scope that the latest batch no longer
     * lists. Terminal records are skipped unless a terminal send is still
     * owed for them.
     */
    private async lookUpMissing(unit: SourceUnit, seen: ReadonlySet<string>, summary: MutableSummary): Promise<void> {
        const { fetcher, policy, store } = this.definition;
        if (!fetcher.fetchEntity) {
            return;
        }
        const fetchEntity = fetcher.fetchEntity.bind(fetcher);
        const prefixLength = unit.scope.length + 1;

        for (const key of store.keysInScope(unit.scope)) {
            const record = store.get(key);
            if (seen.has(key) || !record || (isTerminalStatus(policy, record.status) && !record.notified)) {
                continue;
            }

            const entityId = key.slice(prefixLength);
            summary.entitiesLookedUp++;

            let found: WatchedEntity | null;
            try {
                found = await this.limited(`Lookup ${key}`, (signal) =>
                    fetchEntity(unit.scope, entityId, { signal })
                );
            }
            catch (error) {
                if (classifyError(error) === "permanent") {
                    throw error;
                }
                this.logger.warn("Lookup failed, will retry next pass", { key, error: errorMessage(error) });
                continue;
            }

            if (found !== null) {
                await this.reconcile(unit, found, summary);
                continue;
            }

            if (policy.missingStatus === undefined) {
                this.logger.debug("Tracked entity no longer resolves, leaving as is", { key });
                continue;
            }

            await this.reconcile(unit, {
                id    : entityId,
                status: policy.missingStatus,
                ...(record.title !== undefined && { title: record.title }),
            }, summary);
        }
    }

    /**
     * Run an upstream call under the rate limiter and the fetch timeout.
     * Rate-limit errors back off and retry until the limiter gives up.
     *
     * @throws RateLimitError once the retry budget is exhausted
     */
    private async limited<T>(label: string, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
        for (;;) {
            await this.limiter.acquire();
            try {
                const result = await withTimeout(call, this.settings.fetchTimeoutMs, label);
                this.limiter.onSuccess();
                return result;
            }
            catch (error) {
                if (!isRateLimitError(error)) {
                    throw error;
                }
            }
            finally {
                this.limiter.release();
            }

            if (!(await this.limiter.onRateLimitError())) {
                throw new RateLimitError(`${label}: rate limit retries exhausted`);
            }
        }
    }

    private pause(ms: number): Promise<void> {
        this.currentState = "sleeping";
        return new Promise((resolve) => {
            const done = (): void => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
            const timer = setTimeout(done, ms);
            this.wake = done;
        });
    }

    private emit(type: EventType, data: Record<string, unknown>): void {
        this.eventBus.emit(createEvent(type, data, this.definition.id));
    }
}
