/**
 * @fileoverview RateLimiter
 *
 * Per-source request throttle. One request in flight at a time, a minimum
 * spacing between request starts, and exponential backoff after consecutive
 * rate-limit responses.
 *
 * @module @govwatch/engine/impl/RateLimiter
 */

import type { EngineLogger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";

export interface RateLimiterOptions {
    /** Minimum time between request starts, in ms (default: 1000) */
    readonly minIntervalMs?: number;

    /** Backoff after the first rate-limit error, in ms (default: 2000) */
    readonly initialBackoffMs?: number;

    /** Rate-limit errors tolerated before giving up (default: 3) */
    readonly maxRetries?: number;

    readonly logger?: EngineLogger;

    /** Clock, replaceable in tests */
    readonly now?: () => number;

    /** Timer, replaceable in tests */
    readonly sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RATE_LIMIT = {
    minIntervalMs   : 1000,
    initialBackoffMs: 2000,
    maxRetries      : 3,
} as const;

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Single-slot rate limiter.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ minIntervalMs: 1000 });
 *
 * await limiter.acquire();
 * try {
 *     return await fetcher.fetchBatch(scope, { signal });
 * }
 * finally {
 *     limiter.release();
 * }
 * ```
 */
export class RateLimiter {
    readonly minIntervalMs: number;
    readonly initialBackoffMs: number;
    readonly maxRetries: number;

    private readonly logger: EngineLogger;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    private busy = false;
    private readonly waiters: Array<() => void> = [];
    private lastStartedAt: number | null = null;
    private consecutiveFailures = 0;

    constructor(options: RateLimiterOptions = {}) {
        this.minIntervalMs    = options.minIntervalMs ?? DEFAULT_RATE_LIMIT.minIntervalMs;
        this.initialBackoffMs = options.initialBackoffMs ?? DEFAULT_RATE_LIMIT.initialBackoffMs;
        this.maxRetries       = options.maxRetries ?? DEFAULT_RATE_LIMIT.maxRetries;
        this.logger           = options.logger ?? silentLogger;
        this.now              = options.now ?? Date.now;
        this.sleep            = options.sleep ?? sleep;
    }

    /**
     * Wait until this caller holds the slot and the minimum spacing since
     * the previous request has elapsed.
     */
    async acquire(): Promise<void> {
        if (this.busy) {
            await new Promise<void>((resolve) => this.waiters.push(resolve));
        }
        this.busy = true;

        if (this.lastStartedAt !== null) {
            const wait = this.lastStartedAt + this.minIntervalMs - this.now();
            if (wait > 0) {
                this.logger.debug("Spacing request", { waitMs: wait });
                await this.sleep(wait);
            }
        }
        this.lastStartedAt = this.now();
    }

    /**
     * Return the slot. The next waiter, if any, takes it over directly.
     */
    release(): void {
        const next = this.waiters.shift();
        if (next) {
            next();
            return;
        }
        this.busy = false;
    }

    /**
     * Record a rate-limit response and back off.
     *
     * @returns true after sleeping the backoff window; false once the retry
     *          budget is exhausted (the counter is reset for the next cycle)
     */
    async onRateLimitError(): Promise<boolean> {
        this.consecutiveFailures++;

        if (this.consecutiveFailures > this.maxRetries) {
            this.logger.error("Max retries exceeded for rate limit errors", {
                failures: this.consecutiveFailures,
            });
            this.consecutiveFailures = 0;
            return false;
        }

        const backoff = this.initialBackoffMs * 2 ** (this.consecutiveFailures - 1);
        this.logger.warn("Rate limit error, backing off", {
            backoffMs: backoff,
            failures : this.consecutiveFailures,
        });
        await this.sleep(backoff);
        return true;
    }

    /**
     * Record a successful request; clears the failure streak.
     */
    onSuccess(): void {
        this.consecutiveFailures = 0;
    }

    get failures(): number {
        return this.consecutiveFailures;
    }

    get inFlight(): boolean {
        return this.busy;
    }
}
