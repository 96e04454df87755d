/**
 * @fileoverview Unit tests for EntityStore and its document storages
 *
 * @module @govwatch/engine/__tests__/EntityStore
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EntityStore } from "../impl/EntityStore.js";
import {
    InMemoryDocumentStorage,
    JsonFileDocumentStorage,
    type DocumentStorage,
} from "../impl/DocumentStorage.js";
import { silentLogger } from "../contracts/Logger.js";
import { createMockLogger } from "./fakes.js";

describe("EntityStore", () => {
    let storage: InMemoryDocumentStorage;
    let store: EntityStore;

    beforeEach(() => {
        storage = new InMemoryDocumentStorage();
        store = new EntityStore(storage, silentLogger);
    });

    describe("upsert", () => {
        // Scenario: New record starts un-notified without anchor
        it("should create a record with defaults and persist it", () => {
            const record = store.upsert("aave.eth:0x1", { status: "pending" });

            expect(record).toEqual({ status: "pending", threadAnchor: null, notified: false });
            expect(storage.snapshot()).toEqual({
                "aave.eth:0x1": { status: "pending", thread_anchor: null, notified: false },
            });
        });

        // Scenario: Omitted fields keep their stored values
        it("should merge into the existing record", () => {
            store.upsert("aave.eth:0x1", {
                status      : "active",
                threadAnchor: "1700000000.000100",
                notified    : true,
                title       : "Raise reserve factor",
            });

            const merged = store.upsert("aave.eth:0x1", { status: "closed" });

            expect(merged).toEqual({
                status      : "closed",
                threadAnchor: "1700000000.000100",
                notified    : true,
                title       : "Raise reserve factor",
            });
        });

        // Scenario: An explicit null anchor clears the stored one
        it("should clear the anchor when null is given", () => {
            store.upsert("osmosis:7", { status: "active", threadAnchor: "T1", notified: true });

            const record = store.upsert("osmosis:7", { status: "active", threadAnchor: null, notified: false });

            expect(record.threadAnchor).toBeNull();
            expect(record.notified).toBe(false);
        });
    });

    describe("remove / count / all", () => {
        // Scenario: Removing an unknown key is a no-op
        it("should report whether a record was removed", () => {
            store.upsert("osmosis:7", { status: "active" });

            expect(store.remove("osmosis:8")).toBe(false);
            expect(store.remove("osmosis:7")).toBe(true);
            expect(store.count()).toBe(0);
            expect(storage.snapshot()).toEqual({});
        });

        // Scenario: all() is a snapshot, not a live view
        it("should return a snapshot that later writes do not change", () => {
            store.upsert("osmosis:7", { status: "active" });
            const snapshot = store.all();

            store.upsert("osmosis:8", { status: "active" });

            expect(Object.keys(snapshot)).toEqual(["osmosis:7"]);
            expect(store.count()).toBe(2);
        });

        // Scenario: keysInScope filters by scope prefix only
        it("should list keys for one scope", () => {
            store.upsert("osmosis:7", { status: "active" });
            store.upsert("osmosis-testnet:7", { status: "active" });
            store.upsert("osmosis:9", { status: "active" });

            expect(store.keysInScope("osmosis")).toEqual(["osmosis:7", "osmosis:9"]);
        });
    });

    describe("loading", () => {
        // Scenario: Stored document is read back on construction
        it("should load records from an existing document", () => {
            const logger = createMockLogger();
            const loaded = new EntityStore(new InMemoryDocumentStorage({
                "uniswap:42": { status: "active", thread_anchor: "T42", notified: true, title: "Fee switch" },
                "uniswap:43": { status: "pending" },
            }), logger);

            expect(loaded.get("uniswap:42")).toEqual({
                status      : "active",
                threadAnchor: "T42",
                notified    : true,
                title       : "Fee switch",
            });
            expect(loaded.get("uniswap:43")).toEqual({ status: "pending", threadAnchor: null, notified: false });
            expect(logger.info).toHaveBeenCalledWith("Loaded entity state", { location: "memory", count: 2 });
        });

        // Scenario: Invalid document starts empty and logs
        it("should start empty when the document does not match the schema", () => {
            const logger = createMockLogger();
            const loaded = new EntityStore(new InMemoryDocumentStorage({ "uniswap:42": { notified: true } }), logger);

            expect(loaded.count()).toBe(0);
            expect(logger.error).toHaveBeenCalledWith(
                "Entity state document is invalid, starting empty",
                expect.objectContaining({ location: "memory" })
            );
        });
    });

    describe("persistence failures", () => {
        // Scenario: Write failure is logged, memory stays authoritative
        it("should keep the in-memory record when the write fails", () => {
            const logger = createMockLogger();
            const failing: DocumentStorage = {
                location: "/read-only/state.json",
                load    : () => undefined,
                save    : () => {
                    throw new Error("EROFS: read-only file system");
                },
            };
            const failingStore = new EntityStore(failing, logger);

            const record = failingStore.upsert("aave.eth:0x1", { status: "active" });

            expect(record.status).toBe("active");
            expect(failingStore.get("aave.eth:0x1")).toEqual(record);
            expect(logger.error).toHaveBeenCalledWith("Failed to persist entity state", {
                location: "/read-only/state.json",
                error   : "EROFS: read-only file system",
            });
        });
    });
});

describe("JsonFileDocumentStorage", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "govwatch-store-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    // Scenario: Missing file loads as undefined
    it("should return undefined when the file does not exist", () => {
        const storage = new JsonFileDocumentStorage(join(dir, "snapshot.json"));

        expect(storage.load()).toBeUndefined();
    });

    // Scenario: Store survives a restart through the file
    it("should write the document and read it back in a new store", () => {
        const location = join(dir, "nested", "cosmos.json");
        const first = new EntityStore(new JsonFileDocumentStorage(location), silentLogger);
        first.upsert("osmosis:12", { status: "PROPOSAL_STATUS_VOTING_PERIOD", threadAnchor: "T12", notified: true });

        const second = new EntityStore(new JsonFileDocumentStorage(location), silentLogger);

        expect(second.get("osmosis:12")).toEqual({
            status      : "PROPOSAL_STATUS_VOTING_PERIOD",
            threadAnchor: "T12",
            notified    : true,
        });
        expect(JSON.parse(readFileSync(location, "utf-8"))).toEqual({
            "osmosis:12": { status: "PROPOSAL_STATUS_VOTING_PERIOD", thread_anchor: "T12", notified: true },
        });
    });

    // Scenario: Corrupt file starts empty
    it("should start an empty store when the file is not JSON", () => {
        const location = join(dir, "tally.json");
        writeFileSync(location, "{not json", "utf-8");
        const logger = createMockLogger();

        const store = new EntityStore(new JsonFileDocumentStorage(location), logger);

        expect(store.count()).toBe(0);
        expect(logger.error).toHaveBeenCalledWith(
            "Failed to read entity state, starting empty",
            expect.objectContaining({ location })
        );
    });
});
