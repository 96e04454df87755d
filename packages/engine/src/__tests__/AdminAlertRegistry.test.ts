/**
 * @fileoverview Unit tests for AdminAlertRegistry
 *
 * @module @govwatch/engine/__tests__/AdminAlertRegistry
 */

import { describe, it, expect, vi } from "vitest";
import { AdminAlertRegistry } from "../impl/AdminAlertRegistry.js";
import { InMemoryDocumentStorage } from "../impl/DocumentStorage.js";
import { silentLogger } from "../contracts/Logger.js";

describe("AdminAlertRegistry", () => {
    // Scenario: Marking persists identifier → true
    it("should remember warned identifiers and persist them", () => {
        const storage = new InMemoryDocumentStorage();
        const registry = new AdminAlertRegistry(storage, silentLogger);

        registry.markWarned("gone.eth");

        expect(registry.isWarned("gone.eth")).toBe(true);
        expect(registry.isWarned("aave.eth")).toBe(false);
        expect(storage.snapshot()).toEqual({ "gone.eth": true });
    });

    // Scenario: Warned set survives a restart
    it("should load previously warned identifiers", () => {
        const registry = new AdminAlertRegistry(
            new InMemoryDocumentStorage({ "gone.eth": true, "back.eth": false }),
            silentLogger
        );

        expect(registry.isWarned("gone.eth")).toBe(true);
        expect(registry.isWarned("back.eth")).toBe(false);
    });

    // Scenario: Only clear() removes a warning
    it("should forget an identifier once cleared", () => {
        const storage = new InMemoryDocumentStorage({ "gone.eth": true });
        const registry = new AdminAlertRegistry(storage, silentLogger);

        registry.clear("gone.eth");

        expect(registry.isWarned("gone.eth")).toBe(false);
        expect(storage.snapshot()).toEqual({});
    });

    // Scenario: Invalid document is logged and ignored
    it("should start empty when the document is invalid", () => {
        const error = vi.fn();
        const registry = new AdminAlertRegistry(
            new InMemoryDocumentStorage({ "gone.eth": "yes" }),
            { ...silentLogger, error }
        );

        expect(registry.isWarned("gone.eth")).toBe(false);
        expect(error).toHaveBeenCalledWith(
            "Admin alert document is invalid, starting empty",
            expect.objectContaining({ location: "memory" })
        );
    });
});
