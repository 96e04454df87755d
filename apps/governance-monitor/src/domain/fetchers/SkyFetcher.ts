/**
 * @fileoverview Sky governance fetcher
 *
 * Polls and executive votes from the Sky voting portal API. There are two
 * units, keyed `poll` and `executive`, so entity keys read `poll:1107` and
 * `executive:spell-2024-06-13`.
 *
 * A poll is active until its end date passes. An executive vote is active
 * until it is no longer the hat (`passed`) and becomes `executed` once its
 * spell has been cast.
 *
 * @module governance-monitor/domain/fetchers/SkyFetcher
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

export type SkyScope = "poll" | "executive";

export interface SkyFetcherOptions {
    /** Default: https://vote.sky.money */
    readonly apiUrl?: string;

    /** Clock for poll end dates */
    readonly now?: () => number;

    readonly fetch?: FetchLike;
}

const PollIdsSchema = z.array(z.union([z.number(), z.string()]));

const PollSchema = z.object({
    pollId : z.union([z.number(), z.string()]).transform(String),
    title  : z.string().nullish(),
    slug   : z.string().nullish(),
    endDate: z.string().nullish(),
});

const ExecutiveSchema = z.object({
    key      : z.string(),
    title    : z.string().nullish(),
    active   : z.boolean().nullish(),
    spellData: z.object({
        hasBeenCast: z.boolean().nullish(),
        skySupport : z.union([z.string(), z.number()]).nullish(),
    }).passthrough().nullish(),
});

/** Either a bare list or `{ executive_votes: [...] }` */
const ExecutiveListSchema = z.union([
    z.array(ExecutiveSchema),
    z.object({ executive_votes: z.array(ExecutiveSchema).default([]) }).transform((body) => body.executive_votes),
]);

type SkyPoll = z.infer<typeof PollSchema>;
type SkyExecutive = z.infer<typeof ExecutiveSchema>;

export class SkyFetcher implements Fetcher {
    readonly id = "sky";
    readonly name = "Sky";

    private readonly apiUrl: string;
    private readonly now: () => number;
    private readonly fetchImpl: FetchLike;

    constructor(options: SkyFetcherOptions = {}) {
        this.apiUrl = (options.apiUrl ?? "https://vote.sky.money").replace(/\/+$/, "");
        this.now = options.now ?? Date.now;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async fetchBatch(scope: string, options: FetchOptions): Promise<readonly WatchedEntity[]> {
        return this.scope(scope) === "poll"
            ? this.fetchPolls(options.signal)
            : this.fetchExecutives(options.signal);
    }

    /**
     * Look up one poll or executive vote. One the portal no longer serves
     * resolves to null.
     */
    async fetchEntity(scope: string, entityId: string, options: FetchOptions): Promise<WatchedEntity | null> {
        if (this.scope(scope) === "poll") {
            const body = await this.getOrNull(`/api/polling/${encodeURIComponent(entityId)}`, `Sky poll ${entityId}`, options.signal);
            return body === null ? null : this.pollEntity(parseResponse(PollSchema, body, `Sky poll ${entityId}`));
        }

        const body = await this.getOrNull(`/api/executive/${encodeURIComponent(entityId)}`, `Sky executive ${entityId}`, options.signal);
        return body === null ? null : this.executiveEntity(parseResponse(ExecutiveSchema, body, `Sky executive ${entityId}`));
    }

    private scope(scope: string): SkyScope {
        if (scope !== "poll" && scope !== "executive") {
            throw new ConfigurationError(`Unknown Sky unit: ${scope}`);
        }
        return scope;
    }

    private async fetchPolls(signal: AbortSignal): Promise<readonly WatchedEntity[]> {
        const ids = await this.getOrNull("/api/polling/active-poll-ids", "Sky active polls", signal);
        if (ids === null) {
            return [];
        }

        const entities: WatchedEntity[] = [];
        for (const pollId of parseResponse(PollIdsSchema, ids, "Sky active polls")) {
            const context = `Sky poll ${pollId}`;
            const body = await this.getOrNull(`/api/polling/${encodeURIComponent(String(pollId))}`, context, signal);
            if (body !== null) {
                entities.push(this.pollEntity(parseResponse(PollSchema, body, context)));
            }
        }
        return entities;
    }

    private async fetchExecutives(signal: AbortSignal): Promise<readonly WatchedEntity[]> {
        const body = await this.getOrNull("/api/executive", "Sky executives", signal);
        if (body === null) {
            return [];
        }
        return parseResponse(ExecutiveListSchema, body, "Sky executives").map((executive) => this.executiveEntity(executive));
    }

    private async getOrNull(path: string, context: string, signal: AbortSignal): Promise<unknown> {
        try {
            return await requestJson(this.fetchImpl, `${this.apiUrl}${path}`, { signal }, context);
        }
        catch (error) {
            if (error instanceof FetchError && error.status === 404) {
                return null;
            }
            throw error;
        }
    }

    private pollEntity(poll: SkyPoll): WatchedEntity {
        const end = poll.endDate ? Date.parse(poll.endDate) : Number.NaN;

        return {
            id    : poll.pollId,
            status: end < this.now() ? "ended" : "active",
            title : poll.title ?? undefined,
            url   : poll.slug ? `${this.apiUrl}/polling/${poll.slug}` : undefined,
        };
    }

    private executiveEntity(executive: SkyExecutive): WatchedEntity {
        let status = "active";
        if (executive.spellData?.hasBeenCast) {
            status = "executed";
        }
        else if (executive.active === false) {
            status = "passed";
        }

        const support = Number(executive.spellData?.skySupport ?? Number.NaN);
        return {
            id        : executive.key,
            status,
            title     : executive.title ?? undefined,
            url       : `${this.apiUrl}/executive/${executive.key}`,
            attributes: Number.isFinite(support) ? { support } : {},
        };
    }
}
