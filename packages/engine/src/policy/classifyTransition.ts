/**
 * @fileoverview Transition policy
 *
 * Pure functions mapping (previous record, current status) to an outcome,
 * parameterized by a per-family TransitionPolicyTable.
 *
 * @module @govwatch/engine/policy/classifyTransition
 */

import type { EntityRecord } from "../contracts/Entity.js";
import {
    TransitionOutcome,
    type TransitionPolicyTable,
} from "../contracts/TransitionOutcome.js";

/**
 * The part of a stored record the policy looks at.
 */
export type PreviousState = Pick<EntityRecord, "status" | "notified">;

export function isActiveStatus(table: TransitionPolicyTable, status: string): boolean {
    return table.activeStatuses.includes(status);
}

export function isTerminalStatus(table: TransitionPolicyTable, status: string): boolean {
    return table.terminalStatuses.includes(status);
}

/**
 * Classify an entity's transition.
 *
 * Rules, first match wins:
 * 1. never notified (or never seen) and now active → NotifyInitial
 * 2. never seen → NoOp (tracked silently by the dispatcher, unless terminal)
 * 3. notified record in a terminal status → NotifyTerminal while the entity
 *    is still terminal, else NoOp (the last terminal send failed; a
 *    successful one removes the record)
 * 4. status unchanged → NoOp
 * 5. active → update status → NotifyUpdate
 * 6. non-terminal → terminal → NotifyTerminal
 * 7. anything else → NoOp (status still persisted); a move between two
 *    terminal statuses is never announced
 *
 * @example
 * ```typescript
 * classifyTransition(snapshotTable, undefined, "active");
 * // "notify-initial"
 *
 * classifyTransition(snapshotTable, { status: "active", notified: true }, "closed");
 * // "notify-terminal"
 * ```
 */
export function classifyTransition(
    table: TransitionPolicyTable,
    previous: PreviousState | undefined,
    currentStatus: string
): TransitionOutcome {
    if (!previous?.notified && isActiveStatus(table, currentStatus)) {
        return TransitionOutcome.NotifyInitial;
    }

    if (!previous) {
        return TransitionOutcome.NoOp;
    }

    if (previous.notified && isTerminalStatus(table, previous.status)) {
        return isTerminalStatus(table, currentStatus)
            ? TransitionOutcome.NotifyTerminal
            : TransitionOutcome.NoOp;
    }

    if (previous.status === currentStatus) {
        return TransitionOutcome.NoOp;
    }

    if (isActiveStatus(table, previous.status) && table.updateStatuses.includes(currentStatus)) {
        return TransitionOutcome.NotifyUpdate;
    }

    if (isTerminalStatus(table, currentStatus) && !isTerminalStatus(table, previous.status)) {
        return TransitionOutcome.NotifyTerminal;
    }

    return TransitionOutcome.NoOp;
}

/**
 * Classify the result of fetching a whole scope.
 *
 * A scope that no longer resolves (null batch) warrants exactly one admin
 * alert per identifier.
 */
export function classifyScope(
    batch: readonly unknown[] | null,
    alreadyWarned: boolean
): TransitionOutcome {
    if (batch === null && !alreadyWarned) {
        return TransitionOutcome.NotifyAdmin;
    }
    return TransitionOutcome.NoOp;
}
