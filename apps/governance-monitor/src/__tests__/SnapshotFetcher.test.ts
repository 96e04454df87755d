/**
 * @fileoverview Unit tests for SnapshotFetcher
 *
 * Tests cover:
 * - Active proposal batches and their mapping to entities
 * - Spaces that no longer exist
 * - Rate limiting (HTTP 429 and GraphQL "Too Many Requests")
 * - Single-proposal lookups
 *
 * @module governance-monitor/__tests__/SnapshotFetcher
 */

import { beforeEach, describe, expect, it } from "vitest";
import { FetchError, RateLimitError } from "@govwatch/engine";
import { SnapshotFetcher } from "../domain/fetchers/SnapshotFetcher.js";
import { FakeFetch, graphqlQuery } from "./fakeFetch.js";

const ENDPOINT = "https://hub.snapshot.org/graphql";

describe("SnapshotFetcher", () => {
    let fake: FakeFetch;
    let fetcher: SnapshotFetcher;
    const options = { signal: new AbortController().signal };

    beforeEach(() => {
        fake = new FakeFetch();
        fetcher = new SnapshotFetcher({ fetch: fake.fetch });
    });

    describe("fetchBatch", () => {
        // Scenario: Active proposals become entities with links
        it("should map active proposals to entities", async () => {
            fake.on(ENDPOINT, {
                json: {
                    data: {
                        space    : { id: "aave.eth", name: "Aave" },
                        proposals: [
                            {
                                id   : "0xabc",
                                title: "Raise reserve factor",
                                state: "active",
                                start: 1700000000,
                                end  : 1700600000,
                                space: { id: "aave.eth", name: "Aave" },
                            },
                        ],
                    },
                },
            });

            const batch = await fetcher.fetchBatch("aave.eth", options);

            expect(batch).toEqual([
                {
                    id        : "0xabc",
                    status    : "active",
                    title     : "Raise reserve factor",
                    url       : "https://snapshot.org/#/aave.eth/proposal/0xabc",
                    attributes: { start: 1700000000, end: 1700600000 },
                },
            ]);
        });

        // Scenario: The query asks for the space and its active proposals
        it("should post the space id as a GraphQL variable", async () => {
            fake.on(ENDPOINT, { json: { data: { space: { id: "aave.eth", name: "Aave" }, proposals: [] } } });

            await fetcher.fetchBatch("aave.eth", options);

            expect(fake.requests).toHaveLength(1);
            expect(fake.requests[0]?.method).toBe("POST");
            expect(fake.requests[0]?.body).toMatchObject({ variables: { space: "aave.eth" } });
            expect(fake.requests.map(graphqlQuery)[0]).toContain("state: \"active\"");
        });

        // Scenario: A deleted space yields a null batch
        it("should return null when the space does not exist", async () => {
            fake.on(ENDPOINT, { json: { data: { space: null, proposals: [] } } });

            await expect(fetcher.fetchBatch("gone.eth", options)).resolves.toBeNull();
        });

        // Scenario: An existing space without proposals yields an empty batch
        it("should return an empty batch when proposals is null", async () => {
            fake.on(ENDPOINT, { json: { data: { space: { id: "aave.eth", name: "Aave" }, proposals: null } } });

            await expect(fetcher.fetchBatch("aave.eth", options)).resolves.toEqual([]);
        });

        // Scenario: HTTP 429 is a rate-limit signal
        it("should throw RateLimitError on HTTP 429", async () => {
            fake.on(ENDPOINT, { status: 429, json: {} });

            await expect(fetcher.fetchBatch("aave.eth", options))
                .rejects.toThrow(new RateLimitError("Snapshot aave.eth: Too Many Requests"));
        });

        // Scenario: GraphQL "Too Many Requests" errors are a rate-limit signal
        it("should throw RateLimitError on a GraphQL Too Many Requests error", async () => {
            fake.on(ENDPOINT, { json: { errors: [{ message: "Too Many Requests" }] } });

            await expect(fetcher.fetchBatch("aave.eth", options)).rejects.toBeInstanceOf(RateLimitError);
        });

        // Scenario: Server errors are fetch errors carrying the status
        it("should throw FetchError with the HTTP status on a server error", async () => {
            fake.on(ENDPOINT, { status: 502, json: {} });

            await expect(fetcher.fetchBatch("aave.eth", options))
                .rejects.toMatchObject({ name: "FetchError", status: 502 });
        });

        // Scenario: Unexpected payloads are fetch errors
        it("should throw FetchError on an unexpected payload", async () => {
            fake.on(ENDPOINT, { json: { data: { proposals: [] } } });

            await expect(fetcher.fetchBatch("aave.eth", options)).rejects.toBeInstanceOf(FetchError);
            await expect(fetcher.fetchBatch("aave.eth", options)).rejects.toThrow("unexpected response shape (space: Required)");
        });
    });

    describe("fetchEntity", () => {
        // Scenario: A closed proposal is reported with its new state
        it("should return the proposal with its current state", async () => {
            fake.on(ENDPOINT, {
                json: {
                    data: {
                        proposal: {
                            id   : "0xabc",
                            title: "Raise reserve factor",
                            state: "closed",
                            space: { id: "aave.eth", name: "Aave" },
                        },
                    },
                },
            });

            const entity = await fetcher.fetchEntity("aave.eth", "0xabc", options);

            expect(entity).toEqual({
                id        : "0xabc",
                status    : "closed",
                title     : "Raise reserve factor",
                url       : "https://snapshot.org/#/aave.eth/proposal/0xabc",
                attributes: {},
            });
            expect(fake.requests[0]?.body).toMatchObject({ variables: { id: "0xabc" } });
        });

        // Scenario: A deleted proposal resolves to null
        it("should return null for a deleted proposal", async () => {
            fake.on(ENDPOINT, { json: { data: { proposal: null } } });

            await expect(fetcher.fetchEntity("aave.eth", "0xabc", options)).resolves.toBeNull();
        });
    });
});
