/**
 * Transition Outcome
 *
 * The result of classifying a status transition. This is the contract
 * boundary between policy and dispatch.
 *
 * Design principles:
 * - Closed: a fixed set of outcomes, exhaustively handled by the dispatcher
 * - Data-driven: source differences live in TransitionPolicyTable, not code
 */

export const TransitionOutcome = {
    NoOp          : "noop",
    NotifyInitial : "notify-initial",
    NotifyUpdate  : "notify-update",
    NotifyTerminal: "notify-terminal",
    NotifyAdmin   : "notify-admin",
} as const;

export type TransitionOutcome = (typeof TransitionOutcome)[keyof typeof TransitionOutcome];

/**
 * Outcomes that describe an entity's lifecycle notification.
 */
export type NotificationKind = "initial" | "update" | "terminal";

/**
 * Outcomes that send a lifecycle notification for an entity.
 */
export type LifecycleOutcome =
    | typeof TransitionOutcome.NotifyInitial
    | typeof TransitionOutcome.NotifyUpdate
    | typeof TransitionOutcome.NotifyTerminal;

/**
 * Map a lifecycle outcome to the notification kind handed to formatters.
 */
export function notificationKindOf(outcome: LifecycleOutcome): NotificationKind;
export function notificationKindOf(outcome: TransitionOutcome): NotificationKind | null;
export function notificationKindOf(outcome: TransitionOutcome): NotificationKind | null {
    switch (outcome) {
        case TransitionOutcome.NotifyInitial:
            return "initial";
        case TransitionOutcome.NotifyUpdate:
            return "update";
        case TransitionOutcome.NotifyTerminal:
            return "terminal";
        default:
            return null;
    }
}

/**
 * Status tables for one source family.
 *
 * @example
 * ```typescript
 * const executiveVotes: TransitionPolicyTable = {
 *     family          : "sky-executive",
 *     activeStatuses  : ["active"],
 *     updateStatuses  : ["passed"],
 *     terminalStatuses: ["executed"],
 * };
 * ```
 */
export interface TransitionPolicyTable {
    /** Family name, used in logs */
    readonly family: string;

    /** Statuses that open a notification thread */
    readonly activeStatuses: readonly string[];

    /** Secondary active statuses announced as a follow-up (e.g. "extended") */
    readonly updateStatuses: readonly string[];

    /** Statuses after which the entity is no longer watched */
    readonly terminalStatuses: readonly string[];

    /**
     * Status assumed for a tracked entity that no longer resolves upstream.
     * When omitted, vanished entities are left untouched.
     */
    readonly missingStatus?: string;

    /** The source's notifier returns no anchors; threading is not expected */
    readonly anchorless?: boolean;
}
