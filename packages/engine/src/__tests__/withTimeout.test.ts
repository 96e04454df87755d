/**
 * @fileoverview Unit tests for withTimeout
 *
 * @module @govwatch/engine/__tests__/withTimeout
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { withTimeout } from "../utils/withTimeout.js";
import { TimeoutError } from "../errors.js";

describe("withTimeout", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    // Scenario: Fast operation resolves normally
    it("should resolve with the operation's result", async () => {
        await expect(withTimeout(async () => "ok", 1000, "Fetch aave.eth")).resolves.toBe("ok");
    });

    // Scenario: Operation errors pass through unchanged
    it("should propagate the operation's own error", async () => {
        await expect(
            withTimeout(async () => {
                throw new Error("connection refused");
            }, 1000, "Fetch aave.eth")
        ).rejects.toThrow("connection refused");
    });

    // Scenario: Slow operation is aborted and rejected
    it("should reject with TimeoutError and abort the signal", async () => {
        vi.useFakeTimers();
        let seen: AbortSignal | undefined;

        const pending = withTimeout((signal) => {
            seen = signal;
            return new Promise<string>(() => {});
        }, 30000, "Send for osmosis:12");
        const assertion = expect(pending).rejects.toThrow(
            new TimeoutError("Send for osmosis:12 timed out after 30000ms", 30000)
        );

        await vi.advanceTimersByTimeAsync(30000);
        await assertion;

        expect(seen?.aborted).toBe(true);
    });
});
