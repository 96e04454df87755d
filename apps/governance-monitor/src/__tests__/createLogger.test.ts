/**
 * @fileoverview Unit tests for the pino to EngineLogger adapter
 *
 * @module governance-monitor/__tests__/createLogger
 */

import pino from "pino";
import { beforeEach, describe, expect, it } from "vitest";
import { scopedLogger } from "@govwatch/engine";
import { createLogger, toEngineLogger } from "../logging/createLogger.js";

describe("toEngineLogger", () => {
    let lines: unknown[];
    let logger: pino.Logger;

    beforeEach(() => {
        lines = [];
        logger = pino({ level: "info", base: undefined }, {
            write: (line: string) => {
                const parsed: unknown = JSON.parse(line);
                lines.push(parsed);
            },
        });
    });

    // Scenario: Engine data becomes structured fields
    it("should log engine data as structured fields", () => {
        toEngineLogger(logger).warn("Scope no longer resolves upstream", { scope: "gone.eth" });

        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({ level: 40, msg: "Scope no longer resolves upstream", scope: "gone.eth" });
    });

    // Scenario: Scoped engine loggers keep their prefix
    it("should keep the source prefix of scoped loggers", () => {
        scopedLogger(toEngineLogger(logger), "snapshot").error("Fetch failed, skipping unit for this pass");

        expect(lines[0]).toMatchObject({ level: 50, msg: "[snapshot] Fetch failed, skipping unit for this pass" });
    });

    // Scenario: Levels below the threshold are dropped
    it("should respect the pino level", () => {
        toEngineLogger(logger).debug("Fetched batch", { count: 3 });

        expect(lines).toEqual([]);
    });
});

describe("createLogger", () => {
    // Scenario: Non-debug levels log JSON at the requested level
    it("should create a logger at the requested level", () => {
        expect(createLogger("warn").level).toBe("warn");
        expect(createLogger("silent").level).toBe("silent");
    });
});
