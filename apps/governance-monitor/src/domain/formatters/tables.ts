/**
 * @fileoverview Formatter tables per platform
 *
 * @module governance-monitor/domain/formatters/tables
 */

import type { FormatterTable } from "./TemplateFormatter.js";

export const snapshotMessages: FormatterTable = {
    body    : "{title}",
    messages: {
        initial : { title: "{label} Offchain Proposal Active", actionLabel: "View Proposal" },
        update  : { title: "{label} Offchain Proposal Update", actionLabel: "View Proposal" },
        terminal: { title: "{label} Offchain Proposal Ended", actionLabel: "View Results" },
    },
    terminalByStatus: {
        deleted: { title: "{label} Offchain Proposal Deleted" },
    },
    admin: {
        title: "⚠️ Snapshot Space Not Found: {label}",
        body : "The Snapshot space `{scope}` no longer resolves. Check the watch list.",
    },
};

export const cosmosMessages: FormatterTable = {
    body    : "Proposal {id}",
    messages: {
        initial : { title: "{label} Onchain Proposal Active", actionLabel: "View Proposal" },
        update  : { title: "{label} Onchain Proposal Update", actionLabel: "View Proposal" },
        terminal: { title: "{label} Onchain Proposal Ended", actionLabel: "View Proposal" },
    },
    admin: {
        title: "⚠️ Cosmos Network Not Found: {label}",
        body : "The network `{scope}` no longer resolves. Check the watch list.",
    },
};

export const tallyMessages: FormatterTable = {
    body    : "{title}",
    messages: {
        initial : { title: "{label} Proposal Active", actionLabel: "View on Tally" },
        update  : { title: "{label} Proposal Update", actionLabel: "View on Tally" },
        terminal: { title: "{label} Proposal Ended", actionLabel: "View on Tally" },
    },
    admin: {
        title: "⚠️ Tally Governor Not Found: {label}",
        body : "The governor `{scope}` no longer resolves. Check the watch list.",
    },
};

export const skyPollMessages: FormatterTable = {
    body    : "{title}",
    messages: {
        initial : { title: "{label} Poll Active", actionLabel: "View Proposal" },
        update  : { title: "{label} Poll Update", actionLabel: "View Proposal" },
        terminal: { title: "{label} Poll Ended", actionLabel: "View Proposal" },
    },
};

export const skyExecutiveMessages: FormatterTable = {
    body    : "{title}",
    messages: {
        initial : { title: "{label} Executive Vote Active", actionLabel: "View Proposal" },
        update  : { title: "{label} Executive Vote Update", actionLabel: "View Proposal" },
        terminal: { title: "{label} Executive Vote Executed", actionLabel: "View Proposal" },
    },
    terminalByStatus: {
        ended: { title: "{label} Executive Vote Ended", actionLabel: "View Proposal" },
    },
};

export const xrplMessages: FormatterTable = {
    body    : "{title}",
    messages: {
        initial : { title: "{label} Amendment Active", actionLabel: "View Amendment" },
        update  : { title: "{label} Amendment Update", actionLabel: "View Amendment" },
        terminal: { title: "{label} Amendment Enabled", body: "{title} - Enabled on {enabledOn}", actionLabel: "View Amendment" },
    },
};
