/**
 * @fileoverview Configuration schema
 *
 * Shape of `config/sources.yml`. Durations are written in the units an
 * operator thinks in (seconds for polling, milliseconds for request spacing)
 * and converted to engine settings by loadConfig().
 *
 * Every unit may carry an `intelLabel` naming one of `slack.channels`; its
 * alerts go to that channel instead of `slack.channel`.
 *
 * @module governance-monitor/config/schema
 */

import { z } from "zod";

export const TuningSchema = z.object({
    pollIntervalSeconds : z.number().positive().optional(),
    fetchTimeoutSeconds : z.number().positive().optional(),
    sendTimeoutSeconds  : z.number().positive().optional(),
    minRequestIntervalMs: z.number().nonnegative().optional(),
    initialBackoffMs    : z.number().nonnegative().optional(),
    maxRetries          : z.number().int().nonnegative().optional(),
    errorBackoffSeconds : z.number().nonnegative().optional(),
});

/** Scopes prefix store keys as `scope:id`, so they cannot hold a colon */
const scopeId = (field: string) =>
    z.string().min(1).refine((id) => !id.includes(":"), { message: `${field} must not contain ':'` });

const intelLabel = z.string().min(1).optional();

export const SnapshotSpaceSchema = z.object({
    id  : scopeId("id"),
    name: z.string().min(1),
    intelLabel,
});

export const CosmosNetworkSchema = z.object({
    chainId        : scopeId("chainId"),
    name           : z.string().min(1),
    restUrl        : z.string().url(),
    fallbackRestUrl: z.string().url().optional(),
    explorerUrl    : z.string().url().optional(),
    explorerType   : z.enum(["mintscan", "pingpub"]).default("mintscan"),
    intelLabel,
});

export const TallyGovernorSchema = z.object({
    id     : scopeId("id"),
    name   : z.string().min(1),
    chainId: z.string().min(1),
    address: z.string().min(1),
    intelLabel,
});

/** One unit per Sky proposal kind; the kind is the scope */
export const SkyUnitSchema = z.object({
    kind: z.enum(["poll", "executive"]),
    name: z.string().min(1),
    intelLabel,
});

export const XrplNetworkSchema = z.object({
    id          : scopeId("id"),
    name        : z.string().min(1),
    apiUrl      : z.string().url().default("https://api.xrpscan.com"),
    amendmentUrl: z.string().url().default("https://xrpscan.com/amendment"),
    intelLabel,
});

const sourceBlock = <T extends z.ZodTypeAny>(unit: T) =>
    z.object({
        enabled : z.boolean().default(true),
        settings: TuningSchema.default({}),
        units   : z.array(unit).default([]),
    });

export const ConfigSchema = z.object({
    mode : z.enum(["live", "test"]).default("live"),
    slack: z.object({
        channel    : z.string().min(1),
        channels   : z.record(z.string().min(1), z.string().min(1)).default({}),
        testChannel: z.string().min(1).optional(),
        apiBaseUrl : z.string().url().default("https://slack.com/api"),
    }),
    stateDir    : z.string().min(1).default("data"),
    testStateDir: z.string().min(1).default("data/test"),
    logLevel    : z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
    defaults    : TuningSchema.default({}),
    sources     : z.object({
        snapshot: sourceBlock(SnapshotSpaceSchema).optional(),
        cosmos  : sourceBlock(CosmosNetworkSchema).optional(),
        tally   : sourceBlock(TallyGovernorSchema).optional(),
        sky     : sourceBlock(SkyUnitSchema).extend({
            apiUrl: z.string().url().default("https://vote.sky.money"),
        }).optional(),
        xrpl: sourceBlock(XrplNetworkSchema).optional(),
    }).default({}),
}).superRefine((config, context) => {
    const { snapshot, cosmos, tally, sky, xrpl } = config.sources;
    const units: ReadonlyArray<readonly [string, ReadonlyArray<{ readonly intelLabel?: string }>]> = [
        ["snapshot", snapshot?.units ?? []],
        ["cosmos", cosmos?.units ?? []],
        ["tally", tally?.units ?? []],
        ["sky", sky?.units ?? []],
        ["xrpl", xrpl?.units ?? []],
    ];
    const labels = Object.keys(config.slack.channels);
    for (const [source, list] of units) {
        list.forEach((unit, index) => {
            if (unit.intelLabel !== undefined && !labels.includes(unit.intelLabel)) {
                context.addIssue({
                    code   : z.ZodIssueCode.custom,
                    path   : ["sources", source, "units", index, "intelLabel"],
                    message: `no slack.channels entry for "${unit.intelLabel}"`,
                });
            }
        });
    }
});

export type Tuning = z.infer<typeof TuningSchema>;
export type SnapshotSpace = z.infer<typeof SnapshotSpaceSchema>;
export type CosmosNetwork = z.infer<typeof CosmosNetworkSchema>;
export type TallyGovernor = z.infer<typeof TallyGovernorSchema>;
export type SkyUnit = z.infer<typeof SkyUnitSchema>;
export type XrplNetwork = z.infer<typeof XrplNetworkSchema>;
export type Config = z.infer<typeof ConfigSchema>;
