/**
 * @fileoverview Configuration loader
 *
 * Reads the YAML watch list, validates it, layers environment variables and
 * command-line flags on top and resolves per-source engine settings.
 *
 * Priority: CLI flags > environment > YAML > engine defaults
 *
 * @module governance-monitor/config/loadConfig
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import {
    ConfigurationError,
    DEFAULT_SOURCE_SETTINGS,
    type SourceSettings,
} from "@govwatch/engine";
import {
    ConfigSchema,
    type Config,
    type CosmosNetwork,
    type SkyUnit,
    type SnapshotSpace,
    type TallyGovernor,
    type Tuning,
    type XrplNetwork,
} from "./schema.js";
import type { LogLevel } from "../logging/createLogger.js";

export interface ResolvedSource<U> {
    readonly settings: SourceSettings;
    readonly units: readonly U[];
}

export interface ResolvedConfig {
    readonly mode: "live" | "test";

    /** Channel for this mode (test channel in test mode) */
    readonly channel: string;

    /**
     * Channels by intel label. Empty in test mode, where every alert goes to
     * the test channel.
     */
    readonly channels: Readonly<Record<string, string>>;

    /** State directory for this mode, absolute */
    readonly stateDir: string;

    readonly logLevel: LogLevel;
    readonly slackBotToken: string;
    readonly slackApiBaseUrl: string;
    readonly tallyApiKey?: string;

    /** Only enabled sources are present */
    readonly sources: {
        readonly snapshot?: ResolvedSource<SnapshotSpace>;
        readonly cosmos?: ResolvedSource<CosmosNetwork>;
        readonly tally?: ResolvedSource<TallyGovernor>;
        readonly sky?: ResolvedSource<SkyUnit> & { readonly apiUrl: string };
        readonly xrpl?: ResolvedSource<XrplNetwork>;
    };
}

export interface LoadConfigOptions {
    /** YAML file; GOVWATCH_CONFIG overrides it */
    readonly configPath: string;

    /** Command-line arguments, without node and script */
    readonly argv?: readonly string[];

    readonly env?: NodeJS.ProcessEnv;

    /** Base for relative state directories (default: process.cwd()) */
    readonly cwd?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "fatal", "error", "warn", "info", "debug", "trace"];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse and validate the YAML document.
 *
 * @throws ConfigurationError for a missing file, bad YAML or schema violations
 */
export function readConfigFile(filePath: string): Config {
    if (!existsSync(filePath)) {
        throw new ConfigurationError(`Config file not found: ${filePath}`);
    }

    let document: unknown;
    try {
        document = parseYaml(readFileSync(filePath, "utf-8"));
    }
    catch (error) {
        throw new ConfigurationError(`Invalid YAML in ${filePath}`, { cause: error });
    }

    try {
        return ConfigSchema.parse(document ?? {});
    }
    catch (error) {
        if (error instanceof ZodError) {
            const issues = error.issues
                .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
                .join("; ");
            throw new ConfigurationError(`Invalid config in ${filePath}: ${issues}`, { cause: error });
        }
        throw error;
    }
}

/**
 * Merge global defaults with a source's overrides into engine settings.
 */
export function resolveSettings(defaults: Tuning, overrides: Tuning, continuous: boolean): SourceSettings {
    const seconds = (value: number | undefined, fallbackMs: number) =>
        value === undefined ? fallbackMs : value * 1000;

    return {
        pollIntervalMs: seconds(overrides.pollIntervalSeconds ?? defaults.pollIntervalSeconds, DEFAULT_SOURCE_SETTINGS.pollIntervalMs),
        fetchTimeoutMs: seconds(overrides.fetchTimeoutSeconds ?? defaults.fetchTimeoutSeconds, DEFAULT_SOURCE_SETTINGS.fetchTimeoutMs),
        sendTimeoutMs : seconds(overrides.sendTimeoutSeconds ?? defaults.sendTimeoutSeconds, DEFAULT_SOURCE_SETTINGS.sendTimeoutMs),
        errorBackoffMs: seconds(overrides.errorBackoffSeconds ?? defaults.errorBackoffSeconds, DEFAULT_SOURCE_SETTINGS.errorBackoffMs),
        rateLimit     : {
            minIntervalMs   : overrides.minRequestIntervalMs ?? defaults.minRequestIntervalMs ?? DEFAULT_SOURCE_SETTINGS.rateLimit.minIntervalMs,
            initialBackoffMs: overrides.initialBackoffMs ?? defaults.initialBackoffMs ?? DEFAULT_SOURCE_SETTINGS.rateLimit.initialBackoffMs,
            maxRetries      : overrides.maxRetries ?? defaults.maxRetries ?? DEFAULT_SOURCE_SETTINGS.rateLimit.maxRetries,
        },
        continuous,
    };
}

/**
 * Load and resolve the application configuration.
 *
 * Flags:
 * - `--once`: run a single pass per source and exit
 * - `--test`: test mode (test channel, separate state directory)
 *
 * Environment:
 * - `GOVWATCH_CONFIG`: path to the YAML file
 * - `GOVWATCH_MODE`: `live` or `test`
 * - `LOG_LEVEL`: pino level
 * - `SLACK_BOT_TOKEN` (required), `TALLY_API_KEY`
 *
 * @example
 * ```typescript
 * const config = loadConfig({ configPath: "config/sources.yml", argv: ["--once"] });
 * config.sources.snapshot?.settings.continuous;
 * // false
 * ```
 */
export function loadConfig(options: LoadConfigOptions): ResolvedConfig {
    const env = options.env ?? process.env;
    const argv = options.argv ?? [];
    const cwd = options.cwd ?? process.cwd();

    const file = readConfigFile(env.GOVWATCH_CONFIG || options.configPath);

    let mode = file.mode;
    const modeOverride = env.GOVWATCH_MODE;
    if (modeOverride === "live" || modeOverride === "test") {
        mode = modeOverride;
    }
    if (argv.includes("--test")) {
        mode = "test";
    }

    const slackBotToken = env.SLACK_BOT_TOKEN;
    if (!slackBotToken) {
        throw new ConfigurationError("SLACK_BOT_TOKEN is not set");
    }

    let channel = file.slack.channel;
    let channels: Readonly<Record<string, string>> = file.slack.channels;
    if (mode === "test") {
        if (!file.slack.testChannel) {
            throw new ConfigurationError("Test mode requires slack.testChannel");
        }
        channel = file.slack.testChannel;
        channels = {};
    }

    const levelOverride = env.LOG_LEVEL;
    const logLevel = levelOverride && isLogLevel(levelOverride) ? levelOverride : file.logLevel;
    const stateDir = mode === "test" ? file.testStateDir : file.stateDir;
    const continuous = !argv.includes("--once");

    const resolveSource = <U>(block: { enabled: boolean; settings: Tuning; units: U[] } | undefined) => {
        if (!block?.enabled) {
            return undefined;
        }
        return {
            settings: resolveSettings(file.defaults, block.settings, continuous),
            units   : block.units,
        };
    };
    const sky = resolveSource(file.sources.sky);

    return {
        mode,
        channel,
        channels,
        stateDir       : isAbsolute(stateDir) ? stateDir : resolve(cwd, stateDir),
        logLevel,
        slackBotToken,
        slackApiBaseUrl: file.slack.apiBaseUrl,
        tallyApiKey    : env.TALLY_API_KEY || undefined,
        sources        : {
            snapshot: resolveSource(file.sources.snapshot),
            cosmos  : resolveSource(file.sources.cosmos),
            tally   : resolveSource(file.sources.tally),
            sky     : sky && file.sources.sky ? { ...sky, apiUrl: file.sources.sky.apiUrl } : undefined,
            xrpl    : resolveSource(file.sources.xrpl),
        },
    };
}
