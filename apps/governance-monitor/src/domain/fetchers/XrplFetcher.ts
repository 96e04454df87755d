/**
 * @fileoverview XRPL amendment fetcher
 *
 * Amendments from the XRPScan API. One unit is one network; the listing
 * holds every known amendment, so tracked ones are always in the batch.
 *
 * Statuses: `active` for a supported amendment still gathering validator
 * votes, `enabled` once it is enabled with an enactment time, `enabling`
 * while it is enabled without one, and `unsupported` otherwise.
 *
 * @module governance-monitor/domain/fetchers/XrplFetcher
 */

import { z } from "zod";
import {
    ConfigurationError,
    FetchError,
    type FetchOptions,
    type Fetcher,
    type WatchedEntity,
} from "@govwatch/engine";
import { parseResponse, requestJson, type FetchLike } from "../../http/jsonClient.js";
import type { XrplNetwork } from "../../config/index.js";

export interface XrplFetcherOptions {
    readonly networks: readonly XrplNetwork[];
    readonly fetch?: FetchLike;
}

const AmendmentSchema = z.object({
    amendment_id: z.string(),
    name        : z.string().nullish(),
    enabled     : z.boolean().nullish(),
    supported   : z.boolean().nullish(),
    enabled_on  : z.string().nullish(),
});

type XrplAmendment = z.infer<typeof AmendmentSchema>;

/**
 * `2024-09-03T14:12:31Z` → `2024-09-03 14:12 UTC`. Unparseable values are
 * returned unchanged.
 */
export function formatEnabledOn(value: string): string {
    const time = Date.parse(value);
    if (Number.isNaN(time)) {
        return value;
    }
    return `${new Date(time).toISOString().slice(0, 16).replace("T", " ")} UTC`;
}

export class XrplFetcher implements Fetcher {
    readonly id = "xrpl";
    readonly name = "XRPL";

    private readonly networks: ReadonlyMap<string, XrplNetwork>;
    private readonly fetchImpl: FetchLike;

    constructor(options: XrplFetcherOptions) {
        this.networks = new Map(options.networks.map((network) => [network.id, network]));
        this.fetchImpl = options.fetch ?? fetch;
    }

    async fetchBatch(scope: string, options: FetchOptions): Promise<readonly WatchedEntity[]> {
        const network = this.network(scope);
        const context = `${network.name} amendments`;

        const body = await requestJson(this.fetchImpl, `${this.baseUrl(network)}/api/v1/amendments`, { signal: options.signal }, context);
        return parseResponse(z.array(AmendmentSchema), body, context).map((amendment) => this.toEntity(network, amendment));
    }

    async fetchEntity(scope: string, entityId: string, options: FetchOptions): Promise<WatchedEntity | null> {
        const network = this.network(scope);
        const context = `${network.name} amendment ${entityId}`;

        try {
            const body = await requestJson(
                this.fetchImpl,
                `${this.baseUrl(network)}/api/v1/amendment/${encodeURIComponent(entityId)}`,
                { signal: options.signal },
                context
            );
            return this.toEntity(network, parseResponse(AmendmentSchema, body, context));
        }
        catch (error) {
            if (error instanceof FetchError && error.status === 404) {
                return null;
            }
            throw error;
        }
    }

    private network(scope: string): XrplNetwork {
        const network = this.networks.get(scope);
        if (!network) {
            throw new ConfigurationError(`Unknown XRPL network: ${scope}`);
        }
        return network;
    }

    private baseUrl(network: XrplNetwork): string {
        return network.apiUrl.replace(/\/+$/, "");
    }

    private toEntity(network: XrplNetwork, amendment: XrplAmendment): WatchedEntity {
        let status = "unsupported";
        if (amendment.enabled) {
            status = amendment.enabled_on ? "enabled" : "enabling";
        }
        else if (amendment.supported) {
            status = "active";
        }

        return {
            id        : amendment.amendment_id,
            status,
            title     : amendment.name || undefined,
            url       : `${network.amendmentUrl.replace(/\/+$/, "")}/${amendment.amendment_id}`,
            attributes: amendment.enabled_on ? { enabledOn: formatEnabledOn(amendment.enabled_on) } : {},
        };
    }
}
