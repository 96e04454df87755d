/**
 * @fileoverview Application composition
 *
 * Builds the supervisor, the shared Slack notifier and every configured
 * source, and routes engine events into the application log.
 *
 * @module governance-monitor/app
 */

import {
    InMemoryEventBus,
    Supervisor,
    type DocumentStorage,
    type EventBus,
    type Notifier,
} from "@govwatch/engine";
import { SlackNotifier } from "./adapters/slack/SlackNotifier.js";
import type { ResolvedConfig } from "./config/index.js";
import { buildSources } from "./domain/index.js";
import type { FetchLike } from "./http/jsonClient.js";
import { toEngineLogger, type Logger } from "./logging/createLogger.js";

export interface AppDependencies {
    readonly logger: Logger;

    /** Replaces the Slack notifier */
    readonly notifier?: Notifier;

    /** Used by the Slack notifier and every fetcher */
    readonly fetch?: FetchLike;

    readonly storage?: (location: string) => DocumentStorage;

    /** Timer for rate-limit spacing and backoff */
    readonly sleep?: (ms: number) => Promise<void>;
}

export interface App {
    readonly supervisor: Supervisor;
    readonly eventBus: EventBus;
}

/**
 * Log the events an operator cares about.
 */
function observe(eventBus: EventBus, logger: Logger): void {
    eventBus.subscribe("supervisor:started", (event) => {
        logger.info({ ...event.data }, "Governance monitor started");
    });

    eventBus.subscribe("supervisor:stopped", () => {
        logger.info("Governance monitor stopped");
    });

    eventBus.subscribe("source:passCompleted", (event) => {
        logger.info({ source: event.sourceId, ...event.data }, "Pass completed");
    });

    eventBus.subscribe("entity:notified", (event) => {
        logger.info({ source: event.sourceId, ...event.data }, "Notification sent");
    });

    eventBus.subscribe("admin:notified", (event) => {
        logger.warn({ source: event.sourceId, ...event.data }, "Admin alert sent");
    });

    eventBus.subscribe("source:failed", (event) => {
        logger.error({ source: event.sourceId, ...event.data }, "Source stopped after a fatal error");
    });
}

/**
 * Wire configuration into a ready-to-start supervisor.
 *
 * @example
 * ```typescript
 * const { supervisor } = createApp(config, { logger });
 * await supervisor.start();
 * await supervisor.waitForCompletion();
 * ```
 */
export function createApp(config: ResolvedConfig, deps: AppDependencies): App {
    const engineLogger = toEngineLogger(deps.logger);
    const eventBus = new InMemoryEventBus({ logger: engineLogger });

    const notifier = deps.notifier ?? new SlackNotifier({
        token     : config.slackBotToken,
        channel   : config.channel,
        routes    : config.channels,
        apiBaseUrl: config.slackApiBaseUrl,
        fetch     : deps.fetch,
        logger    : engineLogger,
    });

    const supervisor = new Supervisor({ eventBus, logger: engineLogger, sleep: deps.sleep });
    for (const source of buildSources(config, {
        notifier,
        logger : engineLogger,
        fetch  : deps.fetch,
        storage: deps.storage,
    })) {
        supervisor.registerSource(source);
    }

    observe(eventBus, deps.logger);

    return { supervisor, eventBus };
}
