/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for internal event flow within the engine.
 * Events carry pass summaries, send outcomes and lifecycle changes to
 * whoever wants to observe them (logging, metrics, tests).
 *
 * Design decisions:
 * - Synchronous by default (simpler for a local daemon)
 * - In-memory implementation (no external queue dependency)
 * - Ordering is preserved within a single event type
 *
 * @module @govwatch/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Source id the event belongs to, when any */
    readonly sourceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Lifecycle event types emitted by the supervisor.
 */
export type LifecycleEventType =
    | "supervisor:starting"
    | "supervisor:started"
    | "supervisor:stopping"
    | "supervisor:stopped"
    | "source:failed"
    | "source:stopped";

/**
 * Event types emitted while a source runs its passes.
 */
export type ProcessingEventType =
    | "source:passStarted"
    | "source:passCompleted"
    | "source:unitSkipped"
    | "scope:invalid"
    | "entity:classified"
    | "entity:tracked"
    | "entity:notified"
    | "entity:notifyFailed"
    | "entity:removed"
    | "admin:notified";

/**
 * All known event types.
 */
export type EventType = LifecycleEventType | ProcessingEventType;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("entity:notified", (event) => {
 *     console.log("Sent:", event.data);
 * });
 *
 * bus.emit(createEvent("entity:notified", { key: "aave.eth:0xabc" }, "snapshot"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" / undefined for all)
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param sourceId - Optional id of the source the event belongs to
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    sourceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        sourceId,
        data,
    };
}
