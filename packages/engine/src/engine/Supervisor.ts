/**
 * @fileoverview Supervisor
 *
 * Runs every registered source as an independent orchestrator task.
 *
 * Design principles:
 * - Isolation: a source that fails to initialize (missing credentials) is
 *   marked failed and never restarted; the others keep running
 * - Cooperative stop: orchestrators finish their current pass, then exit
 * - Observable: emits lifecycle events on the shared EventBus
 *
 * @module @govwatch/engine/engine/Supervisor
 */

import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { consoleLogger } from "../contracts/Logger.js";
import { classifyError, errorMessage } from "../errors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import {
    SourceOrchestrator,
    type OrchestratorOptions,
    type SourceDefinition,
} from "./SourceOrchestrator.js";

/**
 * Supervisor configuration options.
 */
export interface SupervisorConfig {
    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for supervisor and orchestrator operations */
    readonly logger?: EngineLogger;

    /** Timer handed to each orchestrator's rate limiter */
    readonly sleep?: OrchestratorOptions["sleep"];
}

/**
 * Supervisor - starts, watches and stops source orchestrators.
 *
 * @example
 * ```typescript
 * const supervisor = new Supervisor({ logger });
 *
 * supervisor.registerSource({
 *     id         : "snapshot",
 *     name       : "Snapshot",
 *     units      : [{ scope: "aave.eth", label: "Aave" }],
 *     fetcher    : new SnapshotFetcher(),
 *     notifier   : slack,
 *     formatter  : snapshotFormatter,
 *     policy     : snapshotPolicy,
 *     store,
 *     adminAlerts,
 * });
 *
 * supervisor.eventBus.subscribe("source:passCompleted", (event) => {
 *     logger.info("Pass done", event.data);
 * });
 *
 * await supervisor.start();
 * ```
 */
export class Supervisor {
    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    private readonly logger: EngineLogger;
    private readonly sleep: SupervisorConfig["sleep"];

    private readonly sources: Map<string, SourceDefinition> = new Map();
    private readonly orchestrators: Map<string, SourceOrchestrator> = new Map();
    private readonly failed: Set<string> = new Set();
    private tasks: Promise<void>[] = [];
    private running = false;
    private stopping: Promise<void> | null = null;

    constructor(config: SupervisorConfig = {}) {
        this.logger = config.logger ?? consoleLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus({ logger: this.logger });
        this.sleep = config.sleep;
    }

    /**
     * Register a source.
     *
     * @throws Error if a source with the same id is already registered
     */
    registerSource(definition: SourceDefinition): void {
        if (this.sources.has(definition.id)) {
            throw new Error(`Source already registered: ${definition.id}`);
        }

        this.sources.set(definition.id, definition);
        this.logger.info("Source registered", {
            sourceId: definition.id,
            name    : definition.name,
            units   : definition.units.length,
        });
    }

    /**
     * Initialize every fetcher and launch one orchestrator per source.
     * Returns once all tasks are launched; use waitForCompletion() to await them.
     */
    async start(): Promise<void> {
        if (this.running) {
            this.logger.warn("Supervisor already running");
            return;
        }

        this.emit(createEvent("supervisor:starting"));
        this.logger.info("Supervisor starting...");
        this.running = true;

        for (const definition of this.sources.values()) {
            try {
                if (definition.fetcher.initialize) {
                    await definition.fetcher.initialize();
                }
            }
            catch (error) {
                this.markFailed(definition.id, "initialize", error);
                continue;
            }

            const orchestrator = new SourceOrchestrator(definition, {
                eventBus: this.eventBus,
                logger  : this.logger,
                sleep   : this.sleep,
            });
            this.orchestrators.set(definition.id, orchestrator);
            this.tasks.push(this.launch(orchestrator));
        }

        this.emit(createEvent("supervisor:started", {
            sources: Array.from(this.orchestrators.keys()),
            failed : Array.from(this.failed),
        }));
        this.logger.info("Supervisor started", {
            sources: this.orchestrators.size,
            failed : this.failed.size,
        });
    }

    /**
     * Wait until every orchestrator task has exited.
     * In single-pass mode this resolves after one pass per source.
     */
    async waitForCompletion(): Promise<void> {
        await Promise.all(this.tasks);
    }

    /**
     * Stop every orchestrator after its current pass and shut down fetchers.
     * Concurrent calls share one shutdown.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }
        if (!this.stopping) {
            this.stopping = this.shutdown().finally(() => {
                this.stopping = null;
            });
        }
        return this.stopping;
    }

    private async shutdown(): Promise<void> {
        this.emit(createEvent("supervisor:stopping"));
        this.logger.info("Supervisor stopping...");

        for (const orchestrator of this.orchestrators.values()) {
            orchestrator.stop();
        }
        await this.waitForCompletion();

        for (const definition of this.sources.values()) {
            try {
                if (definition.fetcher.shutdown) {
                    await definition.fetcher.shutdown();
                }
            }
            catch (error) {
                this.logger.error("Fetcher shutdown error", {
                    sourceId: definition.id,
                    error   : errorMessage(error),
                });
            }
        }

        this.running = false;
        this.orchestrators.clear();
        this.tasks = [];

        this.emit(createEvent("supervisor:stopped"));
        this.logger.info("Supervisor stopped");
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Ids of sources that stopped on a permanent error.
     */
    get failedSources(): string[] {
        return Array.from(this.failed);
    }

    /**
     * Orchestrator for a source, once started.
     */
    getOrchestrator(sourceId: string): SourceOrchestrator | undefined {
        return this.orchestrators.get(sourceId);
    }

    private async launch(orchestrator: SourceOrchestrator): Promise<void> {
        const sourceId = orchestrator.definition.id;
        try {
            await orchestrator.run();
        }
        catch (error) {
            this.markFailed(sourceId, "run", error);
        }
        this.emit(createEvent("source:stopped", { state: orchestrator.state }, sourceId));
    }

    private markFailed(sourceId: string, phase: "initialize" | "run", error: unknown): void {
        this.failed.add(sourceId);
        this.logger.error("Source failed and will not be restarted", {
            sourceId,
            phase,
            kind : classifyError(error),
            error: errorMessage(error),
        });
        this.emit(createEvent("source:failed", {
            phase,
            error: errorMessage(error),
        }, sourceId));
    }

    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
