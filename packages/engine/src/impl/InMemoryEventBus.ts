/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-memory event bus for a single watcher process.
 *
 * @module @govwatch/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { consoleLogger, type EngineLogger } from "../contracts/Logger.js";
import { errorMessage } from "../errors.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous dispatch; async handlers are not awaited
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A failing handler (sync throw or rejected promise) is logged and never
 *   reaches the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus({ logger });
 *
 * bus.subscribe("source:passCompleted", (event) => {
 *     logger.info("Pass done", event.data);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: EngineLogger;

    constructor(options: { logger?: EngineLogger } = {}) {
        this.logger = options.logger ?? consoleLogger;
    }

    /**
     * Emit an event to all subscribers of its type, then to wildcard subscribers.
     */
    emit(event: EventPayload): void {
        for (const key of [event.type, "*"]) {
            const handlers = this.handlers.get(key);
            if (!handlers) {
                continue;
            }
            // Copy so once() handlers can unsubscribe mid-dispatch
            for (const handler of [...handlers]) {
                this.invoke(handler, event);
            }
        }
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers registered for an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private invoke(handler: EventHandler, event: EventPayload): void {
        try {
            const result = handler(event);
            if (result instanceof Promise) {
                result.catch((error: unknown) => this.reportFailure(event, error));
            }
        }
        catch (error) {
            this.reportFailure(event, error);
        }
    }

    private reportFailure(event: EventPayload, error: unknown): void {
        this.logger.error("EventBus handler failed", {
            eventType: event.type,
            error    : errorMessage(error),
        });
    }
}
