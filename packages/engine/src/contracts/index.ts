/**
 * @fileoverview Contract barrel exports
 *
 * All source-agnostic interfaces and types that define
 * the governance watch engine contract.
 *
 * @module @govwatch/engine/contracts
 */

// Entity contract
export type {
    EntityRecord,
    EntityRecordUpdate,
    ThreadAnchor,
    WatchedEntity,
} from "./Entity.js";
export { entityKey } from "./Entity.js";

// Transition outcome and policy tables
export type {
    LifecycleOutcome,
    NotificationKind,
    TransitionPolicyTable,
} from "./TransitionOutcome.js";
export {
    TransitionOutcome,
    notificationKindOf,
} from "./TransitionOutcome.js";

// Fetcher contract
export type { Fetcher, FetchOptions } from "./Fetcher.js";

// Notifier and formatter contracts
export type {
    ActionLink,
    FormatRequest,
    Formatter,
    Notification,
    Notifier,
    SendResult,
    SourceUnit,
} from "./Notifier.js";

// Logger contract
export type { EngineLogger } from "./Logger.js";
export {
    consoleLogger,
    scopedLogger,
    silentLogger,
} from "./Logger.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
