/**
 * @fileoverview JSON over HTTP
 *
 * Thin helpers over the global fetch used by every upstream adapter.
 * Status 429 and GraphQL "Too Many Requests" errors become RateLimitError;
 * everything else that goes wrong becomes FetchError.
 *
 * @module governance-monitor/http/jsonClient
 */

import { z } from "zod";
import {
    FetchError,
    RateLimitError,
    errorForHttpStatus,
    errorMessage,
} from "@govwatch/engine";

/**
 * The subset of `fetch` the adapters use. Tests inject a fake.
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface JsonRequest {
    readonly method?: "GET" | "POST";
    readonly headers?: Record<string, string>;
    readonly body?: unknown;
    readonly signal?: AbortSignal;
}

/**
 * Perform a request and return the decoded JSON body.
 *
 * @param context - Prefix for error messages, e.g. "Snapshot aave.eth"
 * @throws RateLimitError on 429, FetchError on any other failure
 */
export async function requestJson(
    fetchImpl: FetchLike,
    url: string,
    request: JsonRequest,
    context: string
): Promise<unknown> {
    let response: Response;
    try {
        response = await fetchImpl(url, {
            method : request.method ?? "GET",
            headers: {
                Accept: "application/json",
                ...(request.body === undefined ? {} : { "Content-Type": "application/json" }),
                ...request.headers,
            },
            body  : request.body === undefined ? undefined : JSON.stringify(request.body),
            signal: request.signal,
        });
    }
    catch (error) {
        throw new FetchError(`${context}: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
        throw errorForHttpStatus(response.status, context);
    }

    try {
        return await response.json();
    }
    catch (error) {
        throw new FetchError(`${context}: invalid JSON response`, { cause: error });
    }
}

/**
 * A GraphQL response that carried `errors`.
 */
export class GraphqlError extends FetchError {
    /** `extensions.code` of each error that had one */
    readonly codes: readonly string[];

    constructor(message: string, codes: readonly string[]) {
        super(message);
        this.name = "GraphqlError";
        this.codes = codes;
    }
}

const GraphqlEnvelopeSchema = z.object({
    data  : z.unknown().optional(),
    errors: z.array(z.object({
        message   : z.string(),
        extensions: z.object({ code: z.string().optional() }).passthrough().nullish(),
    })).optional(),
});

/**
 * POST a GraphQL query and return its `data` member.
 *
 * @throws RateLimitError when any GraphQL error says "Too Many Requests",
 *         GraphqlError for any other GraphQL error
 */
export async function queryGraphql(
    fetchImpl: FetchLike,
    endpoint: string,
    query: string,
    variables: Record<string, unknown>,
    options: { readonly context: string; readonly headers?: Record<string, string>; readonly signal?: AbortSignal }
): Promise<unknown> {
    const body = await requestJson(
        fetchImpl,
        endpoint,
        { method: "POST", headers: options.headers, body: { query, variables }, signal: options.signal },
        options.context
    );
    const envelope = parseResponse(GraphqlEnvelopeSchema, body, options.context);

    if (envelope.errors && envelope.errors.length > 0) {
        const messages = envelope.errors.map((error) => error.message).join("; ");
        if (/too many requests/i.test(messages)) {
            throw new RateLimitError(`${options.context}: ${messages}`);
        }
        const codes = envelope.errors.flatMap((error) => (error.extensions?.code ? [error.extensions.code] : []));
        throw new GraphqlError(`${options.context}: GraphQL error: ${messages}`, codes);
    }

    return envelope.data;
}

/**
 * Validate an upstream payload.
 *
 * @throws FetchError describing the first mismatch
 */
export function parseResponse<T extends z.ZodTypeAny>(schema: T, value: unknown, context: string): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown";
        throw new FetchError(`${context}: unexpected response shape (${where})`);
    }
    return result.data;
}
