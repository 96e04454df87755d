/**
 * @fileoverview In-process fetch stand-in for adapter tests
 *
 * Routes requests by predicate and records every request. Unmatched
 * requests get a 404.
 */

import type { FetchLike } from "../http/jsonClient.js";

export interface RecordedRequest {
    readonly url: string;
    readonly method: string;

    /** Lower-cased header names */
    readonly headers: Readonly<Record<string, string>>;
    readonly body: unknown;
}

/** A JSON reply, or an Error to reject the fetch with */
export type FakeReply = { readonly status?: number; readonly json: unknown } | Error;

type Matcher = (request: RecordedRequest) => boolean;

interface Route {
    readonly match: Matcher;
    readonly replies: FakeReply[];
}

function bodyOf(init?: RequestInit): unknown {
    if (typeof init?.body !== "string") {
        return undefined;
    }
    const body: unknown = JSON.parse(init.body);
    return body;
}

/**
 * The GraphQL query text of a recorded request, or "".
 */
export function graphqlQuery(request: RecordedRequest): string {
    const { body } = request;
    if (typeof body === "object" && body !== null && "query" in body && typeof body.query === "string") {
        return body.query;
    }
    return "";
}

export class FakeFetch {
    readonly requests: RecordedRequest[] = [];
    private readonly routes: Route[] = [];

    /**
     * Register a route. Replies are used in order; the last one repeats.
     *
     * @param match - URL substring or predicate
     */
    on(match: string | Matcher, ...replies: FakeReply[]): this {
        const matcher: Matcher = typeof match === "string"
            ? (request) => request.url.includes(match)
            : match;
        this.routes.push({ match: matcher, replies });
        return this;
    }

    readonly fetch: FetchLike = async (url, init) => {
        const headers: Record<string, string> = {};
        new Headers(init?.headers).forEach((value, name) => {
            headers[name] = value;
        });

        const request: RecordedRequest = {
            url,
            method: init?.method ?? "GET",
            headers,
            body  : bodyOf(init),
        };
        this.requests.push(request);

        const route = this.routes.find((candidate) => candidate.match(request));
        const reply = route && (route.replies.length > 1 ? route.replies.shift() : route.replies[0]);
        if (!reply) {
            return new Response("Not Found", { status: 404 });
        }
        if (reply instanceof Error) {
            throw reply;
        }
        return new Response(JSON.stringify(reply.json), {
            status : reply.status ?? 200,
            headers: { "Content-Type": "application/json" },
        });
    };

    /**
     * Requests whose URL contains the given text.
     */
    requestsTo(fragment: string): RecordedRequest[] {
        return this.requests.filter((request) => request.url.includes(fragment));
    }
}
