/**
 * @fileoverview Source wiring
 *
 * Turns the resolved configuration into engine SourceDefinitions: one per
 * enabled platform, each with its own state document and admin-alert
 * document under the state directory, all sharing one notifier. A unit's
 * `intelLabel` becomes its routing label.
 *
 * @module governance-monitor/domain/sources
 */

import { join } from "path";
import {
    AdminAlertRegistry,
    EntityStore,
    JsonFileDocumentStorage,
    scopedLogger,
    type DocumentStorage,
    type EngineLogger,
    type Fetcher,
    type Formatter,
    type Notifier,
    type SourceDefinition,
    type SourceUnit,
    type TransitionPolicyTable,
} from "@govwatch/engine";
import type { ResolvedConfig, ResolvedSource } from "../config/index.js";
import type { FetchLike } from "../http/jsonClient.js";
import { CosmosFetcher, SkyFetcher, SnapshotFetcher, TallyFetcher, XrplFetcher } from "./fetchers/index.js";
import {
    ScopedFormatter,
    TemplateFormatter,
    cosmosMessages,
    skyExecutiveMessages,
    skyPollMessages,
    snapshotMessages,
    tallyMessages,
    xrplMessages,
} from "./formatters/index.js";
import { cosmosPolicy, skyPolicy, snapshotPolicy, tallyPolicy, xrplPolicy } from "./policies.js";

export interface BuildSourcesOptions {
    readonly notifier: Notifier;
    readonly logger: EngineLogger;

    /** Injected into every fetcher; defaults to the global fetch */
    readonly fetch?: FetchLike;

    /**
     * Storage factory, keyed by file path. Defaults to JSON files.
     */
    readonly storage?: (location: string) => DocumentStorage;
}

interface SourceParts<U extends { readonly intelLabel?: string }> {
    readonly id: string;
    readonly name: string;
    readonly source: ResolvedSource<U>;
    readonly toUnit: (unit: U) => SourceUnit;
    readonly fetcher: Fetcher;
    readonly formatter: Formatter;
    readonly policy: TransitionPolicyTable;
}

/**
 * Build one SourceDefinition per enabled platform.
 *
 * @example
 * ```typescript
 * const sources = buildSources(config, { notifier, logger });
 * sources.map((source) => source.id);
 * // ["snapshot", "cosmos", "tally", "sky", "xrpl"]
 * ```
 */
export function buildSources(config: ResolvedConfig, options: BuildSourcesOptions): SourceDefinition[] {
    const storage = options.storage ?? ((location: string) => new JsonFileDocumentStorage(location));
    const definitions: SourceDefinition[] = [];

    const add = <U extends { readonly intelLabel?: string }>(parts: SourceParts<U>): void => {
        const logger = scopedLogger(options.logger, parts.id);
        const toUnit = (unit: U): SourceUnit => {
            const sourceUnit = parts.toUnit(unit);
            return unit.intelLabel === undefined ? sourceUnit : { ...sourceUnit, route: unit.intelLabel };
        };
        definitions.push({
            id         : parts.id,
            name       : parts.name,
            units      : parts.source.units.map(toUnit),
            fetcher    : parts.fetcher,
            notifier   : options.notifier,
            formatter  : parts.formatter,
            policy     : parts.policy,
            store      : new EntityStore(storage(join(config.stateDir, `${parts.id}.json`)), logger),
            adminAlerts: new AdminAlertRegistry(storage(join(config.stateDir, `${parts.id}.admin.json`)), logger),
            settings   : parts.source.settings,
        });
    };

    const { snapshot, cosmos, tally, sky, xrpl } = config.sources;

    if (snapshot) {
        add({
            id       : "snapshot",
            name     : "Snapshot",
            source   : snapshot,
            toUnit   : (space) => ({ scope: space.id, label: space.name }),
            fetcher  : new SnapshotFetcher({ fetch: options.fetch }),
            formatter: new TemplateFormatter(snapshotMessages),
            policy   : snapshotPolicy,
        });
    }

    if (cosmos) {
        add({
            id       : "cosmos",
            name     : "Cosmos",
            source   : cosmos,
            toUnit   : (network) => ({ scope: network.chainId, label: network.name }),
            fetcher  : new CosmosFetcher({ networks: cosmos.units, fetch: options.fetch }),
            formatter: new TemplateFormatter(cosmosMessages),
            policy   : cosmosPolicy,
        });
    }

    if (tally) {
        add({
            id       : "tally",
            name     : "Tally",
            source   : tally,
            toUnit   : (governor) => ({ scope: governor.id, label: governor.name }),
            fetcher  : new TallyFetcher({ apiKey: config.tallyApiKey, governors: tally.units, fetch: options.fetch }),
            formatter: new TemplateFormatter(tallyMessages),
            policy   : tallyPolicy,
        });
    }

    if (sky) {
        add({
            id       : "sky",
            name     : "Sky",
            source   : sky,
            toUnit   : (unit) => ({ scope: unit.kind, label: unit.name }),
            fetcher  : new SkyFetcher({ apiUrl: sky.apiUrl, fetch: options.fetch }),
            formatter: new ScopedFormatter({
                poll     : new TemplateFormatter(skyPollMessages),
                executive: new TemplateFormatter(skyExecutiveMessages),
            }),
            policy: skyPolicy,
        });
    }

    if (xrpl) {
        add({
            id       : "xrpl",
            name     : "XRPL",
            source   : xrpl,
            toUnit   : (network) => ({ scope: network.id, label: network.name }),
            fetcher  : new XrplFetcher({ networks: xrpl.units, fetch: options.fetch }),
            formatter: new TemplateFormatter(xrplMessages),
            policy   : xrplPolicy,
        });
    }

    return definitions;
}
