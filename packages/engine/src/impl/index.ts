/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @govwatch/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export {
    InMemoryDocumentStorage,
    JsonFileDocumentStorage,
    type DocumentStorage,
} from "./DocumentStorage.js";
export { EntityStore } from "./EntityStore.js";
export { AdminAlertRegistry } from "./AdminAlertRegistry.js";
export {
    DEFAULT_RATE_LIMIT,
    RateLimiter,
    sleep,
    type RateLimiterOptions,
} from "./RateLimiter.js";
