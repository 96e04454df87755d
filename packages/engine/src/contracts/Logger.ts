/**
 * Logger Contract
 *
 * The engine never picks a logging library. Callers inject an EngineLogger;
 * the engine derives scoped loggers from it for each source.
 */

export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that drops everything. Useful in tests.
 */
export const silentLogger: EngineLogger = {
    debug: () => {},
    info : () => {},
    warn : () => {},
    error: () => {},
};

/**
 * Derive a logger that prefixes every message with a scope tag.
 */
export function scopedLogger(logger: EngineLogger, scope: string): EngineLogger {
    return {
        debug: (msg, data) => logger.debug(`[${scope}] ${msg}`, data),
        info : (msg, data) => logger.info(`[${scope}] ${msg}`, data),
        warn : (msg, data) => logger.warn(`[${scope}] ${msg}`, data),
        error: (msg, data) => logger.error(`[${scope}] ${msg}`, data),
    };
}
