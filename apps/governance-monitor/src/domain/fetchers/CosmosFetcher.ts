/**
 * @fileoverview Cosmos SDK fetcher
 *
 * On-chain proposals from a chain's REST (LCD) gateway. One unit is one
 * network, keyed by chain id. The batch lists proposals in their voting
 * period; proposals that leave it are picked up by fetchEntity() when the
 * orchestrator looks up tracked entities missing from the batch.
 *
 * Gov v1 endpoints are tried first; a 404 falls back to v1beta1. When the
 * primary gateway fails, the optional fallback gateway is tried. A listing
 * that neither version serves on any gateway means the chain no longer
 * resolves, and the batch is null.
 *
 * @module governance-monitor/domain/fetchers/CosmosFetcher
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
import type { CosmosNetwork } from "../../config/index.js";

export const COSMOS_STATUS = {
    VotingPeriod: "PROPOSAL_STATUS_VOTING_PERIOD",
    Passed      : "PROPOSAL_STATUS_PASSED",
    Rejected    : "PROPOSAL_STATUS_REJECTED",
    Failed      : "PROPOSAL_STATUS_FAILED",
} as const;

export interface CosmosFetcherOptions {
    readonly networks: readonly CosmosNetwork[];
    readonly fetch?: FetchLike;
}

/** v1 uses `id`, v1beta1 uses `proposal_id` and nests the title in `content` */
const ProposalSchema = z.object({
    id         : z.union([z.string(), z.number()]).optional(),
    proposal_id: z.union([z.string(), z.number()]).optional(),
    status     : z.string(),
    title      : z.string().nullish(),
    content    : z.object({ title: z.string().nullish() }).passthrough().nullish(),
});

const ListSchema = z.object({
    proposals: z.array(ProposalSchema).default([]),
});

const SingleSchema = z.object({
    proposal: ProposalSchema,
});

type CosmosProposal = z.infer<typeof ProposalSchema>;

type GovVersion = "v1" | "v1beta1";

export class CosmosFetcher implements Fetcher {
    readonly id = "cosmos";
    readonly name = "Cosmos";

    private readonly networks: ReadonlyMap<string, CosmosNetwork>;
    private readonly fetchImpl: FetchLike;

    constructor(options: CosmosFetcherOptions) {
        this.networks = new Map(options.networks.map((network) => [network.chainId, network]));
        this.fetchImpl = options.fetch ?? fetch;
    }

    async fetchBatch(scope: string, options: FetchOptions): Promise<readonly WatchedEntity[] | null> {
        const network = this.network(scope);

        try {
            return await this.withFallback(network, async (baseUrl) => {
                const body = await this.getWithVersionFallback(
                    baseUrl,
                    {
                        v1     : `/cosmos/gov/v1/proposals?proposal_status=${COSMOS_STATUS.VotingPeriod}`,
                        v1beta1: "/cosmos/gov/v1beta1/proposals?proposal_status=2",
                    },
                    `${network.name} proposals`,
                    options.signal
                );
                const { proposals } = parseResponse(ListSchema, body, `${network.name} proposals`);
                return proposals.map((proposal) => this.toEntity(network, proposal));
            });
        }
        catch (error) {
            if (error instanceof FetchError && error.status === 404) {
                return null;
            }
            throw error;
        }
    }

    /**
     * Look up one proposal by id. A proposal the chain no longer knows
     * (pruned, or never existed) resolves to null.
     */
    async fetchEntity(scope: string, entityId: string, options: FetchOptions): Promise<WatchedEntity | null> {
        const network = this.network(scope);
        const context = `${network.name} proposal ${entityId}`;

        return this.withFallback(network, async (baseUrl) => {
            try {
                const body = await this.getWithVersionFallback(
                    baseUrl,
                    {
                        v1     : `/cosmos/gov/v1/proposals/${encodeURIComponent(entityId)}`,
                        v1beta1: `/cosmos/gov/v1beta1/proposals/${encodeURIComponent(entityId)}`,
                    },
                    context,
                    options.signal
                );
                const { proposal } = parseResponse(SingleSchema, body, context);
                return this.toEntity(network, proposal);
            }
            catch (error) {
                if (error instanceof FetchError && error.status === 404) {
                    return null;
                }
                throw error;
            }
        });
    }

    proposalUrl(network: CosmosNetwork, proposalId: string): string | undefined {
        if (!network.explorerUrl) {
            return undefined;
        }
        const base = network.explorerUrl.replace(/\/+$/, "");
        return network.explorerType === "pingpub"
            ? `${base}/${proposalId}`
            : `${base}/proposals/${proposalId}`;
    }

    private network(scope: string): CosmosNetwork {
        const network = this.networks.get(scope);
        if (!network) {
            throw new ConfigurationError(`Unknown Cosmos network: ${scope}`);
        }
        return network;
    }

    /**
     * Run a call against the primary gateway, then the fallback gateway
     * if the primary one fails.
     */
    private async withFallback<T>(network: CosmosNetwork, call: (baseUrl: string) => Promise<T>): Promise<T> {
        try {
            return await call(network.restUrl);
        }
        catch (error) {
            if (!network.fallbackRestUrl) {
                throw error;
            }
            return call(network.fallbackRestUrl);
        }
    }

    private async getWithVersionFallback(
        baseUrl: string,
        paths: Record<GovVersion, string>,
        context: string,
        signal: AbortSignal
    ): Promise<unknown> {
        const base = baseUrl.replace(/\/+$/, "");
        try {
            return await requestJson(this.fetchImpl, `${base}${paths.v1}`, { signal }, context);
        }
        catch (error) {
            if (error instanceof FetchError && error.status === 404) {
                return requestJson(this.fetchImpl, `${base}${paths.v1beta1}`, { signal }, context);
            }
            throw error;
        }
    }

    private toEntity(network: CosmosNetwork, proposal: CosmosProposal): WatchedEntity {
        const id = String(proposal.id ?? proposal.proposal_id ?? "");
        const title = proposal.title || proposal.content?.title || undefined;

        return {
            id,
            status: proposal.status,
            title,
            url   : this.proposalUrl(network, id),
        };
    }
}
