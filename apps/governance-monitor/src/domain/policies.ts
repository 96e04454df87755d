/**
 * @fileoverview Transition policy tables
 *
 * One table per governance platform. Platform differences live here as
 * data; the engine's classifier is shared.
 *
 * @module governance-monitor/domain/policies
 */

import type { TransitionPolicyTable } from "@govwatch/engine";
import { COSMOS_STATUS } from "./fetchers/CosmosFetcher.js";

export const snapshotPolicy: TransitionPolicyTable = {
    family          : "snapshot",
    activeStatuses  : ["active"],
    updateStatuses  : [],
    terminalStatuses: ["closed", "deleted"],
    missingStatus   : "deleted",
};

export const cosmosPolicy: TransitionPolicyTable = {
    family          : "cosmos",
    activeStatuses  : [COSMOS_STATUS.VotingPeriod],
    updateStatuses  : [],
    terminalStatuses: [COSMOS_STATUS.Passed, COSMOS_STATUS.Rejected, COSMOS_STATUS.Failed],
};

export const tallyPolicy: TransitionPolicyTable = {
    family          : "tally",
    activeStatuses  : ["active"],
    updateStatuses  : ["extended"],
    terminalStatuses: [
        "succeeded",
        "archived",
        "canceled",
        "callexecuted",
        "defeated",
        "executed",
        "expired",
        "queued",
        "pendingexecution",
        "crosschainexecuted",
    ],
};

/** Polls and executive votes share one table; polls never report `passed` or `executed` */
export const skyPolicy: TransitionPolicyTable = {
    family          : "sky",
    activeStatuses  : ["active"],
    updateStatuses  : ["passed"],
    terminalStatuses: ["ended", "executed"],
    missingStatus   : "ended",
};

export const xrplPolicy: TransitionPolicyTable = {
    family          : "xrpl",
    activeStatuses  : ["active"],
    updateStatuses  : [],
    terminalStatuses: ["enabled"],
};
