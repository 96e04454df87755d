/**
 * @fileoverview Unit tests for CosmosFetcher
 *
 * Tests cover:
 * - Gov v1 voting-period listing
 * - v1beta1 fallback on 404
 * - Fallback gateway when the primary one fails
 * - Null batch for a chain no gateway serves
 * - Explorer links
 * - Single-proposal lookups
 *
 * @module governance-monitor/__tests__/CosmosFetcher
 */

import { beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "@govwatch/engine";
import { COSMOS_STATUS, CosmosFetcher } from "../domain/fetchers/CosmosFetcher.js";
import type { CosmosNetwork } from "../config/index.js";
import { FakeFetch } from "./fakeFetch.js";

const hub: CosmosNetwork = {
    chainId        : "cosmoshub-4",
    name           : "Cosmos Hub",
    restUrl        : "https://rest.example/cosmoshub",
    fallbackRestUrl: "https://backup.example/cosmoshub",
    explorerUrl    : "https://explorer.example/cosmos",
    explorerType   : "mintscan",
};

const V1_LIST = "https://rest.example/cosmoshub/cosmos/gov/v1/proposals?proposal_status=PROPOSAL_STATUS_VOTING_PERIOD";
const V1BETA1_LIST = "https://rest.example/cosmoshub/cosmos/gov/v1beta1/proposals?proposal_status=2";

describe("CosmosFetcher", () => {
    let fake: FakeFetch;
    let fetcher: CosmosFetcher;
    const options = { signal: new AbortController().signal };

    beforeEach(() => {
        fake = new FakeFetch();
        fetcher = new CosmosFetcher({ networks: [hub], fetch: fake.fetch });
    });

    describe("fetchBatch", () => {
        // Scenario: v1 endpoint lists proposals in voting period
        it("should list voting-period proposals from the v1 endpoint", async () => {
            fake.on(V1_LIST, {
                json: { proposals: [{ id: "998", status: COSMOS_STATUS.VotingPeriod, title: "Signaling proposal" }] },
            });

            const batch = await fetcher.fetchBatch("cosmoshub-4", options);

            expect(batch).toEqual([
                {
                    id    : "998",
                    status: "PROPOSAL_STATUS_VOTING_PERIOD",
                    title : "Signaling proposal",
                    url   : "https://explorer.example/cosmos/proposals/998",
                },
            ]);
            expect(fake.requests.map((request) => request.url)).toEqual([V1_LIST]);
        });

        // Scenario: Chains without gov v1 are read through v1beta1
        it("should fall back to v1beta1 when v1 returns 404", async () => {
            fake.on(V1BETA1_LIST, {
                json: {
                    proposals: [
                        { proposal_id: 12, status: COSMOS_STATUS.VotingPeriod, content: { title: "Upgrade v15" } },
                    ],
                },
            });

            const batch = await fetcher.fetchBatch("cosmoshub-4", options);

            expect(batch).toEqual([
                {
                    id    : "12",
                    status: "PROPOSAL_STATUS_VOTING_PERIOD",
                    title : "Upgrade v15",
                    url   : "https://explorer.example/cosmos/proposals/12",
                },
            ]);
            expect(fake.requests.map((request) => request.url)).toEqual([V1_LIST, V1BETA1_LIST]);
        });

        // Scenario: Primary gateway down, fallback gateway answers
        it("should use the fallback gateway when the primary one fails", async () => {
            fake.on("https://rest.example/", { status: 503, json: {} });
            fake.on("https://backup.example/", { json: { proposals: [{ id: "5", status: COSMOS_STATUS.VotingPeriod }] } });

            const batch = await fetcher.fetchBatch("cosmoshub-4", options);

            expect(batch).toEqual([
                { id: "5", status: "PROPOSAL_STATUS_VOTING_PERIOD", url: "https://explorer.example/cosmos/proposals/5" },
            ]);
            expect(fake.requests.map((request) => request.url)).toEqual([
                V1_LIST,
                "https://backup.example/cosmoshub/cosmos/gov/v1/proposals?proposal_status=PROPOSAL_STATUS_VOTING_PERIOD",
            ]);
        });

        // Scenario: An empty answer from the primary gateway is final
        it("should not consult the fallback gateway for an empty list", async () => {
            fake.on(V1_LIST, { json: { proposals: [] } });

            await expect(fetcher.fetchBatch("cosmoshub-4", options)).resolves.toEqual([]);
            expect(fake.requests).toHaveLength(1);
        });

        // Scenario: Neither gateway serves the chain under either API version
        it("should return null when no gateway knows the chain", async () => {
            await expect(fetcher.fetchBatch("cosmoshub-4", options)).resolves.toBeNull();
            expect(fake.requests.map((request) => request.url)).toEqual([
                V1_LIST,
                V1BETA1_LIST,
                "https://backup.example/cosmoshub/cosmos/gov/v1/proposals?proposal_status=PROPOSAL_STATUS_VOTING_PERIOD",
                "https://backup.example/cosmoshub/cosmos/gov/v1beta1/proposals?proposal_status=2",
            ]);
        });

        // Scenario: A 404 from the primary gateway is not final while the fallback answers
        it("should read the fallback gateway when the primary one does not know the chain", async () => {
            fake.on("https://backup.example/", { json: { proposals: [] } });

            await expect(fetcher.fetchBatch("cosmoshub-4", options)).resolves.toEqual([]);
            expect(fake.requests).toHaveLength(3);
        });

        // Scenario: Rate limit from both gateways surfaces as a rate-limit error
        it("should throw RateLimitError when both gateways answer 429", async () => {
            fake.on(() => true, { status: 429, json: {} });

            await expect(fetcher.fetchBatch("cosmoshub-4", options))
                .rejects.toThrow("Cosmos Hub proposals: Too Many Requests");
        });

        // Scenario: Ping.pub explorers use a flat link layout
        it("should build ping.pub links without the proposals segment", async () => {
            const pingpub = new CosmosFetcher({
                networks: [{ ...hub, explorerType: "pingpub", explorerUrl: "https://ping.example/cosmos/gov" }],
                fetch   : fake.fetch,
            });
            fake.on(V1_LIST, { json: { proposals: [{ id: "7", status: COSMOS_STATUS.VotingPeriod }] } });

            const batch = await pingpub.fetchBatch("cosmoshub-4", options);

            expect(batch?.[0]?.url).toBe("https://ping.example/cosmos/gov/7");
        });

        // Scenario: Unknown chain ids are a configuration error
        it("should throw ConfigurationError for an unknown network", async () => {
            await expect(fetcher.fetchBatch("juno-1", options)).rejects.toBeInstanceOf(ConfigurationError);
        });
    });

    describe("fetchEntity", () => {
        // Scenario: A proposal that left the voting period reports its outcome
        it("should return the proposal with its final status", async () => {
            fake.on("https://rest.example/cosmoshub/cosmos/gov/v1/proposals/998", {
                json: { proposal: { id: "998", status: COSMOS_STATUS.Passed, title: "Signaling proposal" } },
            });

            const entity = await fetcher.fetchEntity("cosmoshub-4", "998", options);

            expect(entity).toEqual({
                id    : "998",
                status: "PROPOSAL_STATUS_PASSED",
                title : "Signaling proposal",
                url   : "https://explorer.example/cosmos/proposals/998",
            });
        });

        // Scenario: A proposal unknown to both API versions resolves to null
        it("should return null when the proposal is not found", async () => {
            await expect(fetcher.fetchEntity("cosmoshub-4", "404", options)).resolves.toBeNull();
            expect(fake.requests.map((request) => request.url)).toEqual([
                "https://rest.example/cosmoshub/cosmos/gov/v1/proposals/404",
                "https://rest.example/cosmoshub/cosmos/gov/v1beta1/proposals/404",
            ]);
        });
    });
});
