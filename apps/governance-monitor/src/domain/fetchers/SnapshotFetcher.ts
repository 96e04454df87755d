/**
 * @fileoverview Snapshot fetcher
 *
 * Off-chain proposals from the Snapshot hub GraphQL API. One unit is one
 * space (e.g. `aave.eth`); the batch holds the space's active proposals.
 * A space that no longer exists yields a `null` batch.
 *
 * @module governance-monitor/domain/fetchers/SnapshotFetcher
 */

import { z } from "zod";
import type { FetchOptions, Fetcher, WatchedEntity } from "@govwatch/engine";
import { parseResponse, queryGraphql, type FetchLike } from "../../http/jsonClient.js";

export interface SnapshotFetcherOptions {
    /** Default: https://hub.snapshot.org/graphql */
    readonly endpoint?: string;

    /** Web app base for proposal links. Default: https://snapshot.org */
    readonly appUrl?: string;

    readonly fetch?: FetchLike;
}

const ACTIVE_PROPOSALS_QUERY = `
query ActiveProposals($space: String!) {
    space(id: $space) {
        id
        name
    }
    proposals(
        first: 1000,
        where: { space_in: [$space], state: "active" },
        orderBy: "created",
        orderDirection: desc
    ) {
        id
        title
        state
        start
        end
        space {
            id
            name
        }
    }
}`;

const PROPOSAL_QUERY = `
query Proposal($id: String!) {
    proposal(id: $id) {
        id
        title
        state
        start
        end
        space {
            id
            name
        }
    }
}`;

const ProposalSchema = z.object({
    id   : z.string(),
    title: z.string().nullish(),
    state: z.string(),
    start: z.number().nullish(),
    end  : z.number().nullish(),
    space: z.object({ id: z.string(), name: z.string().nullish() }).nullish(),
});

const BatchSchema = z.object({
    space    : z.object({ id: z.string(), name: z.string().nullish() }).nullable(),
    proposals: z.array(ProposalSchema).nullish(),
});

const SingleSchema = z.object({
    proposal: ProposalSchema.nullable(),
});

type SnapshotProposal = z.infer<typeof ProposalSchema>;

export class SnapshotFetcher implements Fetcher {
    readonly id = "snapshot";
    readonly name = "Snapshot";

    private readonly endpoint: string;
    private readonly appUrl: string;
    private readonly fetchImpl: FetchLike;

    constructor(options: SnapshotFetcherOptions = {}) {
        this.endpoint = options.endpoint ?? "https://hub.snapshot.org/graphql";
        this.appUrl = (options.appUrl ?? "https://snapshot.org").replace(/\/+$/, "");
        this.fetchImpl = options.fetch ?? fetch;
    }

    async fetchBatch(scope: string, options: FetchOptions): Promise<readonly WatchedEntity[] | null> {
        const context = `Snapshot ${scope}`;
        const data = await queryGraphql(this.fetchImpl, this.endpoint, ACTIVE_PROPOSALS_QUERY, { space: scope }, {
            context,
            signal: options.signal,
        });
        const batch = parseResponse(BatchSchema, data, context);

        if (batch.space === null) {
            return null;
        }
        return (batch.proposals ?? []).map((proposal) => this.toEntity(scope, proposal));
    }

    /**
     * Look up one proposal by id. Deleted proposals resolve to null.
     */
    async fetchEntity(scope: string, entityId: string, options: FetchOptions): Promise<WatchedEntity | null> {
        const context = `Snapshot proposal ${entityId}`;
        const data = await queryGraphql(this.fetchImpl, this.endpoint, PROPOSAL_QUERY, { id: entityId }, {
            context,
            signal: options.signal,
        });
        const { proposal } = parseResponse(SingleSchema, data, context);

        return proposal ? this.toEntity(scope, proposal) : null;
    }

    proposalUrl(scope: string, proposalId: string): string {
        return `${this.appUrl}/#/${scope}/proposal/${proposalId}`;
    }

    private toEntity(scope: string, proposal: SnapshotProposal): WatchedEntity {
        const attributes: Record<string, number> = {};
        if (typeof proposal.start === "number") attributes.start = proposal.start;
        if (typeof proposal.end === "number") attributes.end = proposal.end;

        return {
            id    : proposal.id,
            status: proposal.state,
            title : proposal.title ?? undefined,
            url   : this.proposalUrl(scope, proposal.id),
            attributes,
        };
    }
}
