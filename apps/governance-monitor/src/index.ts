/**
 * @fileoverview Governance Monitor - Main Entry Point
 *
 * Watches Snapshot spaces, Cosmos networks and Tally governors and posts
 * threaded Slack alerts when proposals open, change and close.
 *
 * Usage:
 *   governance-monitor            poll forever
 *   governance-monitor --once     one pass per source, then exit
 *   governance-monitor --test     post to the test channel, use test state
 *
 * @module governance-monitor
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { errorMessage } from "@govwatch/engine";
import { createApp } from "./app.js";
import { loadConfig } from "./config/index.js";
import { createLogger } from "./logging/createLogger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const argv = process.argv.slice(2);
    const config = loadConfig({
        configPath: join(__dirname, "..", "config", "sources.yml"),
        argv,
    });

    const logger = createLogger(config.logLevel);
    logger.info({ mode: config.mode, channel: config.channel, stateDir: config.stateDir }, "Configuration loaded");

    if (config.mode === "test") {
        logger.warn("TEST MODE - alerts go to the test channel");
    }

    const { supervisor } = createApp(config, { logger });

    // Handle graceful shutdown
    const shutdown = async (signal: string) => {
        logger.info({ signal }, "Shutting down...");
        await supervisor.stop();
        process.exit(0);
    };

    process.on("SIGINT", () => {
        shutdown("SIGINT").catch((error: unknown) => {
            logger.error({ error: errorMessage(error) }, "Shutdown failed");
            process.exit(1);
        });
    });

    process.on("SIGTERM", () => {
        shutdown("SIGTERM").catch((error: unknown) => {
            logger.error({ error: errorMessage(error) }, "Shutdown failed");
            process.exit(1);
        });
    });

    await supervisor.start();
    await supervisor.waitForCompletion();
    await supervisor.stop();

    if (supervisor.failedSources.length > 0) {
        logger.error({ failed: supervisor.failedSources }, "Some sources failed");
        process.exitCode = 1;
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL] Failed to start governance monitor:", errorMessage(error));
    process.exit(1);
});
