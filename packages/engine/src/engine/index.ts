/**
 * @fileoverview Engine barrel exports
 *
 * @module @govwatch/engine/engine
 */

export {
    AlertDispatcher,
    MISSING_CONTEXT_WARNING,
    type AlertDispatcherConfig,
    type DispatchResult,
} from "./AlertDispatcher.js";
export {
    DEFAULT_SOURCE_SETTINGS,
    SourceOrchestrator,
    type OrchestratorOptions,
    type OrchestratorState,
    type PassSummary,
    type SourceDefinition,
    type SourceSettings,
} from "./SourceOrchestrator.js";
export {
    Supervisor,
    type SupervisorConfig,
} from "./Supervisor.js";
