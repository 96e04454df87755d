/**
 * @fileoverview Application logger
 *
 * Builds the pino logger and adapts it to the engine's EngineLogger
 * contract, so engine messages land in the same structured stream.
 *
 * @module governance-monitor/logging/createLogger
 */

import pino from "pino";
import type { EngineLogger } from "@govwatch/engine";

export type Logger = pino.Logger;

export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Create the root pino logger. Debug level switches to pretty output.
 */
export function createLogger(level: LogLevel): Logger {
    return pino({
        name     : "governance-monitor",
        level,
        transport: level === "debug"
            ? { target: "pino-pretty", options: { colorize: true } }
            : undefined,
    });
}

/**
 * Adapt a pino logger to the engine's (message, data) call shape.
 *
 * @example
 * ```typescript
 * const engineLogger = toEngineLogger(createLogger("info"));
 * engineLogger.warn("Scope no longer resolves upstream", { scope: "gone.eth" });
 * // {"level":40,"scope":"gone.eth","msg":"Scope no longer resolves upstream",...}
 * ```
 */
export function toEngineLogger(logger: Logger): EngineLogger {
    return {
        debug: (msg, data) => logger.debug(data ?? {}, msg),
        info : (msg, data) => logger.info(data ?? {}, msg),
        warn : (msg, data) => logger.warn(data ?? {}, msg),
        error: (msg, data) => logger.error(data ?? {}, msg),
    };
}
