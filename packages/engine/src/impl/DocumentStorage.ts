/**
 * @fileoverview Flat JSON document storage
 *
 * Backing storage for EntityStore and AdminAlertRegistry. The whole document
 * is rewritten on every save; volumes are tens of entries.
 *
 * @module @govwatch/engine/impl/DocumentStorage
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";

/**
 * Synchronous storage for one JSON document.
 */
export interface DocumentStorage {
    /** Where the document lives, for log messages */
    readonly location: string;

    /**
     * Read the document.
     *
     * @returns The parsed document, or undefined when none exists yet
     * @throws When the stored document cannot be read or parsed
     */
    load(): unknown;

    /**
     * Replace the stored document.
     *
     * @throws When the document cannot be written
     */
    save(document: unknown): void;
}

/**
 * Stores the document as pretty-printed JSON on disk.
 * Writes go to a sibling temp file first and are renamed into place.
 */
export class JsonFileDocumentStorage implements DocumentStorage {
    constructor(readonly location: string) {}

    load(): unknown {
        if (!existsSync(this.location)) {
            return undefined;
        }
        const document: unknown = JSON.parse(readFileSync(this.location, "utf-8"));
        return document;
    }

    save(document: unknown): void {
        mkdirSync(dirname(this.location), { recursive: true });
        const tempPath = `${this.location}.tmp`;
        writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
        renameSync(tempPath, this.location);
    }
}

/**
 * Keeps the document in memory. Used by tests and dry runs.
 */
export class InMemoryDocumentStorage implements DocumentStorage {
    readonly location: string;
    private serialized: string | undefined;

    constructor(initial?: unknown, location = "memory") {
        this.location = location;
        this.serialized = initial === undefined ? undefined : JSON.stringify(initial);
    }

    load(): unknown {
        if (this.serialized === undefined) {
            return undefined;
        }
        const document: unknown = JSON.parse(this.serialized);
        return document;
    }

    save(document: unknown): void {
        this.serialized = JSON.stringify(document);
    }

    /**
     * Current stored document, as a fresh parsed copy.
     */
    snapshot(): unknown {
        return this.load();
    }
}
