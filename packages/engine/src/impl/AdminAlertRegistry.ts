/**
 * @fileoverview AdminAlertRegistry
 *
 * Remembers which misconfigured scopes have already produced an admin alert.
 * Entries never expire on their own; clear() is the only way back.
 *
 * @module @govwatch/engine/impl/AdminAlertRegistry
 */

import { z } from "zod";
import type { EngineLogger } from "../contracts/Logger.js";
import { errorMessage } from "../errors.js";
import type { DocumentStorage } from "./DocumentStorage.js";

const WarnedDocumentSchema = z.record(z.boolean());

export class AdminAlertRegistry {
    private readonly warned: Map<string, boolean> = new Map();

    constructor(
        private readonly storage: DocumentStorage,
        private readonly logger: EngineLogger
    ) {
        try {
            const parsed = WarnedDocumentSchema.safeParse(storage.load() ?? {});
            if (parsed.success) {
                for (const [identifier, value] of Object.entries(parsed.data)) {
                    this.warned.set(identifier, value);
                }
            }
            else {
                logger.error("Admin alert document is invalid, starting empty", {
                    location: storage.location,
                    error   : parsed.error.message,
                });
            }
        }
        catch (error) {
            logger.error("Failed to read admin alert state, starting empty", {
                location: storage.location,
                error   : errorMessage(error),
            });
        }
    }

    isWarned(identifier: string): boolean {
        return this.warned.get(identifier) === true;
    }

    markWarned(identifier: string): void {
        this.warned.set(identifier, true);
        this.persist();
    }

    clear(identifier: string): void {
        if (this.warned.delete(identifier)) {
            this.persist();
        }
    }

    private persist(): void {
        try {
            this.storage.save(Object.fromEntries(this.warned));
        }
        catch (error) {
            this.logger.error("Failed to persist admin alert state", {
                location: this.storage.location,
                error   : errorMessage(error),
            });
        }
    }
}
