/**
 * @fileoverview EntityStore
 *
 * Last-known state per watched entity for one source, keyed by
 * `scope:entityId`. Every mutation rewrites the backing document before
 * returning. A failed write is logged; memory stays authoritative and the
 * next successful write catches the document up.
 *
 * @module @govwatch/engine/impl/EntityStore
 */

import { z } from "zod";
import type { EntityRecord, EntityRecordUpdate } from "../contracts/Entity.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { errorMessage } from "../errors.js";
import type { DocumentStorage } from "./DocumentStorage.js";

const StoredRecordSchema = z.object({
    status       : z.string(),
    thread_anchor: z.string().nullable().optional(),
    notified     : z.boolean().optional(),
    title        : z.string().optional(),
});

const StoredDocumentSchema = z.record(StoredRecordSchema);

type StoredRecord = z.infer<typeof StoredRecordSchema>;

function fromStored(stored: StoredRecord): EntityRecord {
    return {
        status      : stored.status,
        threadAnchor: stored.thread_anchor ?? null,
        notified    : stored.notified ?? false,
        ...(stored.title !== undefined && { title: stored.title }),
    };
}

function toStored(record: EntityRecord): StoredRecord {
    return {
        status       : record.status,
        thread_anchor: record.threadAnchor,
        notified     : record.notified,
        ...(record.title !== undefined && { title: record.title }),
    };
}

export class EntityStore {
    private readonly records: Map<string, EntityRecord> = new Map();

    constructor(
        private readonly storage: DocumentStorage,
        private readonly logger: EngineLogger
    ) {
        this.load();
    }

    get(key: string): EntityRecord | undefined {
        return this.records.get(key);
    }

    /**
     * Merge an update into the record for `key`, creating it when absent.
     * Omitted fields keep their stored value; a new record starts
     * un-notified and without an anchor.
     */
    upsert(key: string, update: EntityRecordUpdate): EntityRecord {
        const existing = this.records.get(key);
        const title = update.title ?? existing?.title;
        const record: EntityRecord = {
            status      : update.status,
            threadAnchor: update.threadAnchor !== undefined ? update.threadAnchor : (existing?.threadAnchor ?? null),
            notified    : update.notified ?? existing?.notified ?? false,
            ...(title !== undefined && { title }),
        };

        this.records.set(key, record);
        this.persist();
        return record;
    }

    remove(key: string): boolean {
        if (!this.records.delete(key)) {
            return false;
        }
        this.persist();
        return true;
    }

    count(): number {
        return this.records.size;
    }

    /**
     * Snapshot of every record at call time.
     */
    all(): Record<string, EntityRecord> {
        return Object.fromEntries(this.records);
    }

    /**
     * Keys tracked under one scope.
     */
    keysInScope(scope: string): string[] {
        const prefix = `${scope}:`;
        return [...this.records.keys()].filter((key) => key.startsWith(prefix));
    }

    private load(): void {
        let raw: unknown;
        try {
            raw = this.storage.load();
        }
        catch (error) {
            this.logger.error("Failed to read entity state, starting empty", {
                location: this.storage.location,
                error   : errorMessage(error),
            });
            return;
        }

        if (raw === undefined) {
            return;
        }

        const parsed = StoredDocumentSchema.safeParse(raw);
        if (!parsed.success) {
            this.logger.error("Entity state document is invalid, starting empty", {
                location: this.storage.location,
                error   : parsed.error.message,
            });
            return;
        }

        for (const [key, stored] of Object.entries(parsed.data)) {
            this.records.set(key, fromStored(stored));
        }
        this.logger.info("Loaded entity state", {
            location: this.storage.location,
            count   : this.records.size,
        });
    }

    private persist(): void {
        const document: Record<string, StoredRecord> = {};
        for (const [key, record] of this.records) {
            document[key] = toStored(record);
        }

        try {
            this.storage.save(document);
        }
        catch (error) {
            this.logger.error("Failed to persist entity state", {
                location: this.storage.location,
                error   : errorMessage(error),
            });
        }
    }
}
