/**
 * @fileoverview Tally fetcher
 *
 * On-chain governor proposals from the Tally GraphQL API. One unit is one
 * governor; the batch holds the governor's proposals in every state, so
 * vanished entities never need probing. A governor the API reports as not
 * found gives a null batch.
 *
 * Requires an API key. Without one the source fails at startup and the
 * other sources keep running.
 *
 * @module governance-monitor/domain/fetchers/TallyFetcher
 */

import { z } from "zod";
import {
    ConfigurationError,
    type FetchOptions,
    type Fetcher,
    type WatchedEntity,
} from "@govwatch/engine";
import { GraphqlError, parseResponse, queryGraphql, type FetchLike } from "../../http/jsonClient.js";
import type { TallyGovernor } from "../../config/index.js";

export interface TallyFetcherOptions {
    readonly apiKey?: string;
    readonly governors: readonly TallyGovernor[];

    /** Default: https://api.tally.xyz/query */
    readonly endpoint?: string;

    /** Web app base for proposal links. Default: https://www.tally.xyz */
    readonly appUrl?: string;

    readonly fetch?: FetchLike;
}

const PROPOSALS_QUERY = `
query GovernorProposals($input: ProposalsInput!) {
    proposals(input: $input) {
        nodes {
            ... on Proposal {
                id
                status
                governor {
                    slug
                }
                metadata {
                    title
                    discourseURL
                    snapshotURL
                }
                events {
                    type
                    createdAt
                }
            }
        }
    }
}`;

const ProposalSchema = z.object({
    id      : z.union([z.string(), z.number()]).transform(String),
    status  : z.string(),
    governor: z.object({ slug: z.string() }).nullish(),
    metadata: z.object({ title: z.string().nullish() }).passthrough().nullish(),
});

const ResponseSchema = z.object({
    proposals: z.object({
        nodes: z.array(ProposalSchema),
    }),
});

type TallyProposal = z.infer<typeof ProposalSchema>;

function isNotFound(error: unknown): boolean {
    return error instanceof GraphqlError &&
        (error.codes.includes("NOT_FOUND") || /not found/i.test(error.message));
}

export class TallyFetcher implements Fetcher {
    readonly id = "tally";
    readonly name = "Tally";

    private readonly apiKey: string | undefined;
    private readonly governors: ReadonlyMap<string, TallyGovernor>;
    private readonly endpoint: string;
    private readonly appUrl: string;
    private readonly fetchImpl: FetchLike;

    constructor(options: TallyFetcherOptions) {
        this.apiKey = options.apiKey;
        this.governors = new Map(options.governors.map((governor) => [governor.id, governor]));
        this.endpoint = options.endpoint ?? "https://api.tally.xyz/query";
        this.appUrl = (options.appUrl ?? "https://www.tally.xyz").replace(/\/+$/, "");
        this.fetchImpl = options.fetch ?? fetch;
    }

    async initialize(): Promise<void> {
        if (!this.apiKey) {
            throw new ConfigurationError("TALLY_API_KEY is not set");
        }
    }

    async fetchBatch(scope: string, options: FetchOptions): Promise<readonly WatchedEntity[] | null> {
        const governor = this.governors.get(scope);
        if (!governor) {
            throw new ConfigurationError(`Unknown Tally governor: ${scope}`);
        }
        if (!this.apiKey) {
            throw new ConfigurationError("TALLY_API_KEY is not set");
        }

        const context = `Tally ${governor.name}`;
        let data: unknown;
        try {
            data = await queryGraphql(
                this.fetchImpl,
                this.endpoint,
                PROPOSALS_QUERY,
                { input: { filters: { governorId: `${governor.chainId}:${governor.address}` } } },
                { context, headers: { "Api-Key": this.apiKey }, signal: options.signal }
            );
        }
        catch (error) {
            if (isNotFound(error)) {
                return null;
            }
            throw error;
        }
        const response = parseResponse(ResponseSchema, data, context);

        return response.proposals.nodes.map((proposal) => this.toEntity(governor, proposal));
    }

    proposalUrl(slug: string, proposalId: string): string {
        return `${this.appUrl}/gov/${slug}/proposal/${proposalId}`;
    }

    private toEntity(governor: TallyGovernor, proposal: TallyProposal): WatchedEntity {
        return {
            id    : proposal.id,
            status: proposal.status.toLowerCase(),
            title : proposal.metadata?.title ?? undefined,
            url   : this.proposalUrl(proposal.governor?.slug ?? governor.id, proposal.id),
        };
    }
}
