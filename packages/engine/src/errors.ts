/**
 * @fileoverview Engine error taxonomy
 *
 * Every error the engine reasons about carries a kind. Transient errors are
 * recovered within a pass (skip the unit, back off, retry next cycle);
 * permanent errors stop the source that raised them.
 *
 * @module @govwatch/engine/errors
 */

export type ErrorKind = "transient" | "permanent";

export class GovernanceWatchError extends Error {
    readonly kind: ErrorKind;

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options);
        this.name = "GovernanceWatchError";
        this.kind = kind;
    }
}

/**
 * Upstream network, HTTP or GraphQL failure.
 */
export class FetchError extends GovernanceWatchError {
    readonly status?: number;

    constructor(message: string, options?: ErrorOptions & { status?: number }) {
        super(message, "transient", options);
        this.name = "FetchError";
        this.status = options?.status;
    }
}

/**
 * Upstream answered 429 / "Too Many Requests".
 */
export class RateLimitError extends GovernanceWatchError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, "transient", options);
        this.name = "RateLimitError";
    }
}

export class TimeoutError extends GovernanceWatchError {
    readonly timeoutMs: number;

    constructor(message: string, timeoutMs: number, options?: ErrorOptions) {
        super(message, "transient", options);
        this.name = "TimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Missing credentials or required settings. Fatal for the source only.
 */
export class ConfigurationError extends GovernanceWatchError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, "permanent", options);
        this.name = "ConfigurationError";
    }
}

/**
 * Map an HTTP status to the engine error it represents.
 */
export function errorForHttpStatus(status: number, context: string): GovernanceWatchError {
    if (status === 429) {
        return new RateLimitError(`${context}: Too Many Requests`);
    }
    return new FetchError(`${context}: HTTP ${status}`, { status });
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

export function isRateLimitError(error: unknown): boolean {
    if (error instanceof RateLimitError) return true;
    return error instanceof Error && /too many requests/i.test(error.message);
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof GovernanceWatchError) return error.kind;
    return "transient";
}
