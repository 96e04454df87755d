/**
 * @fileoverview Unit tests for TemplateFormatter and the platform tables
 *
 * @module governance-monitor/__tests__/TemplateFormatter
 */

import { describe, expect, it } from "vitest";
import type { SourceUnit, WatchedEntity } from "@govwatch/engine";
import {
    ScopedFormatter,
    TemplateFormatter,
    cosmosMessages,
    renderTemplate,
    skyExecutiveMessages,
    skyPollMessages,
    snapshotMessages,
    tallyMessages,
    xrplMessages,
} from "../domain/formatters/index.js";

const aave: SourceUnit = { scope: "aave.eth", label: "Aave" };
const proposal: WatchedEntity = {
    id    : "0xabc",
    status: "active",
    title : "Raise reserve factor",
    url   : "https://snapshot.org/#/aave.eth/proposal/0xabc",
};

describe("renderTemplate", () => {
    // Scenario: Known placeholders are replaced, unknown ones kept
    it("should substitute known placeholders only", () => {
        expect(renderTemplate("{label} #{id} {unknown}", { label: "Aave", id: "7" })).toBe("Aave #7 {unknown}");
    });
});

describe("TemplateFormatter", () => {
    describe("snapshot", () => {
        const formatter = new TemplateFormatter(snapshotMessages);

        // Scenario: Initial alert with a proposal button
        it("should format the initial alert", () => {
            expect(formatter.format({ kind: "initial", unit: aave, entity: proposal, anchor: null })).toEqual({
                title     : "Aave Offchain Proposal Active",
                body      : "Raise reserve factor",
                actionLink: { label: "View Proposal", url: "https://snapshot.org/#/aave.eth/proposal/0xabc" },
                anchorHint: null,
            });
        });

        // Scenario: Closed proposals link to results in the original thread
        it("should format the ended alert as a threaded follow-up", () => {
            const notification = formatter.format({
                kind  : "terminal",
                unit  : aave,
                entity: { ...proposal, status: "closed" },
                anchor: "1700000000.000100",
            });

            expect(notification.title).toBe("Aave Offchain Proposal Ended");
            expect(notification.actionLink?.label).toBe("View Results");
            expect(notification.anchorHint).toBe("1700000000.000100");
        });

        // Scenario: Deleted proposals get their own title and no button
        it("should format a deleted proposal without a button", () => {
            const notification = formatter.format({
                kind  : "terminal",
                unit  : aave,
                entity: { ...proposal, status: "deleted" },
                anchor: "1700000000.000100",
            });

            expect(notification.title).toBe("Aave Offchain Proposal Deleted");
            expect(notification.actionLink).toBeUndefined();
        });

        // Scenario: Admin alert names the missing space
        it("should format the admin alert", () => {
            expect(formatter.formatAdmin({ scope: "gone.eth", label: "Gone DAO" })).toEqual({
                title     : "⚠️ Snapshot Space Not Found: Gone DAO",
                body      : "The Snapshot space `gone.eth` no longer resolves. Check the watch list.",
                anchorHint: null,
            });
        });
    });

    // Scenario: Cosmos bodies carry the proposal number
    it("should use the proposal number as the Cosmos body", () => {
        const formatter = new TemplateFormatter(cosmosMessages);

        const notification = formatter.format({
            kind  : "initial",
            unit  : { scope: "cosmoshub-4", label: "Cosmos Hub" },
            entity: { id: "998", status: "PROPOSAL_STATUS_VOTING_PERIOD" },
            anchor: null,
        });

        expect(notification).toEqual({
            title     : "Cosmos Hub Onchain Proposal Active",
            body      : "Proposal 998",
            actionLink: undefined,
            anchorHint: null,
        });
    });

    // Scenario: Tally update alerts, untitled proposals fall back to the id
    it("should format a Tally update and fall back to the id for the body", () => {
        const formatter = new TemplateFormatter(tallyMessages);

        const notification = formatter.format({
            kind  : "update",
            unit  : { scope: "uniswap", label: "Uniswap" },
            entity: { id: "123", status: "extended", url: "https://www.tally.xyz/gov/uniswap/proposal/123" },
            anchor: "1.1",
        });

        expect(notification).toEqual({
            title     : "Uniswap Proposal Update",
            body      : "123",
            actionLink: { label: "View on Tally", url: "https://www.tally.xyz/gov/uniswap/proposal/123" },
            anchorHint: "1.1",
        });
    });

    // Scenario: Enabled amendments carry the enactment time, from an attribute
    it("should render attributes into the XRPL terminal body", () => {
        const formatter = new TemplateFormatter(xrplMessages);

        const notification = formatter.format({
            kind  : "terminal",
            unit  : { scope: "mainnet", label: "XRP Ledger" },
            entity: {
                id        : "BB22",
                status    : "enabled",
                title     : "Clawback",
                url       : "https://xrpscan.example/amendment/BB22",
                attributes: { enabledOn: "2024-02-08 11:02 UTC" },
            },
            anchor: "1.1",
        });

        expect(notification).toEqual({
            title     : "XRP Ledger Amendment Enabled",
            body      : "Clawback - Enabled on 2024-02-08 11:02 UTC",
            actionLink: { label: "View Amendment", url: "https://xrpscan.example/amendment/BB22" },
            anchorHint: "1.1",
        });
    });

    // Scenario: Tables without an admin template use the generic one
    it("should fall back to the generic admin alert", () => {
        const formatter = new TemplateFormatter(xrplMessages);

        expect(formatter.formatAdmin({ scope: "devnet", label: "XRPL Devnet" })).toEqual({
            title     : "⚠️ XRPL Devnet Not Found",
            body      : "`devnet` no longer resolves upstream. Check the watch list.",
            anchorHint: null,
        });
    });
});

describe("ScopedFormatter", () => {
    const formatter = new ScopedFormatter({
        poll     : new TemplateFormatter(skyPollMessages),
        executive: new TemplateFormatter(skyExecutiveMessages),
    });
    const executive: WatchedEntity = { id: "spell-a", status: "executed", title: "Executive A" };

    // Scenario: Each unit kind gets its own wording
    it("should format with the table for the unit's scope", () => {
        const poll = formatter.format({
            kind  : "initial",
            unit  : { scope: "poll", label: "Sky" },
            entity: { id: "1107", status: "active", title: "Onboard new collateral" },
            anchor: null,
        });
        const executed = formatter.format({ kind: "terminal", unit: { scope: "executive", label: "Sky" }, entity: executive, anchor: "1.1" });
        const ended = formatter.format({
            kind  : "terminal",
            unit  : { scope: "executive", label: "Sky" },
            entity: { ...executive, status: "ended" },
            anchor: "1.1",
        });

        expect(poll.title).toBe("Sky Poll Active");
        expect(executed.title).toBe("Sky Executive Vote Executed");
        expect(ended.title).toBe("Sky Executive Vote Ended");
    });

    // Scenario: A scope with no formatter is a wiring error
    it("should throw for an unknown scope", () => {
        expect(() => formatter.formatAdmin({ scope: "forum", label: "Sky" })).toThrow("No formatter for scope: forum");
    });
});
