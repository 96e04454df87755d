/**
 * @fileoverview Governance Watch Engine
 *
 * Source-agnostic reconciliation and alerting core.
 *
 * The engine provides:
 * - Durable last-known state per watched entity
 * - Data-driven transition policies per source family
 * - Threaded notifications with failure-preserving state updates
 * - Rate-limited, isolated polling of many sources at once
 *
 * @module @govwatch/engine
 * @example
 * ```typescript
 * import {
 *     type Fetcher,
 *     type Notifier,
 *     EntityStore,
 *     JsonFileDocumentStorage,
 *     Supervisor,
 * } from "@govwatch/engine";
 *
 * // Define fetchers, a notifier, formatters and policy tables
 * // Register one source per governance platform
 * // The supervisor runs them all
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    EntityRecord,
    EntityRecordUpdate,
    ThreadAnchor,
    WatchedEntity,
    LifecycleOutcome,
    NotificationKind,
    TransitionPolicyTable,
    Fetcher,
    FetchOptions,
    ActionLink,
    FormatRequest,
    Formatter,
    Notification,
    Notifier,
    SendResult,
    SourceUnit,
    EngineLogger,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./contracts/index.js";
export {
    entityKey,
    TransitionOutcome,
    notificationKindOf,
    consoleLogger,
    scopedLogger,
    silentLogger,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Errors
// ============================================================================

export {
    ConfigurationError,
    FetchError,
    GovernanceWatchError,
    RateLimitError,
    TimeoutError,
    classifyError,
    errorForHttpStatus,
    errorMessage,
    isRateLimitError,
    type ErrorKind,
} from "./errors.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    InMemoryDocumentStorage,
    JsonFileDocumentStorage,
    EntityStore,
    AdminAlertRegistry,
    DEFAULT_RATE_LIMIT,
    RateLimiter,
    sleep,
    type DocumentStorage,
    type RateLimiterOptions,
} from "./impl/index.js";

// ============================================================================
// Policy
// ============================================================================

export {
    classifyScope,
    classifyTransition,
    isActiveStatus,
    isTerminalStatus,
    type PreviousState,
} from "./policy/classifyTransition.js";

export { withTimeout } from "./utils/withTimeout.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    AlertDispatcher,
    MISSING_CONTEXT_WARNING,
    DEFAULT_SOURCE_SETTINGS,
    SourceOrchestrator,
    Supervisor,
    type AlertDispatcherConfig,
    type DispatchResult,
    type OrchestratorOptions,
    type OrchestratorState,
    type PassSummary,
    type SourceDefinition,
    type SourceSettings,
    type SupervisorConfig,
} from "./engine/index.js";
