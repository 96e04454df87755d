/**
 * Notifier and Formatter Contracts
 *
 * The notifier is the outbound transport (a chat-platform message API).
 * The formatter turns a transition into a transport-neutral notification.
 *
 * Design principles:
 * - Transport-neutral: title, body, optional action link, anchor hint
 * - Threaded: a non-null anchorHint makes the send a follow-up
 * - Honest results: failures are reported, not thrown, where possible
 */

import type { ThreadAnchor, WatchedEntity } from "./Entity.js";
import type { NotificationKind } from "./TransitionOutcome.js";

/**
 * Link rendered as a button or trailing link by the transport.
 */
export interface ActionLink {
    readonly label: string;
    readonly url: string;
}

/**
 * A composed notification, ready to send.
 */
export interface Notification {
    readonly title: string;
    readonly body: string;
    readonly actionLink?: ActionLink;

    /**
     * Anchor of the message to reply to. `null` sends a standalone message.
     */
    readonly anchorHint: ThreadAnchor | null;

    /** Routing label of the unit it is about; the notifier maps it to a destination */
    readonly route?: string;
}

/**
 * Result of a send.
 */
export interface SendResult {
    /** Whether the transport accepted the message */
    readonly ok: boolean;

    /** Anchor of the sent message, usable for later follow-ups */
    readonly anchor: ThreadAnchor | null;

    /** Error description when ok is false */
    readonly error?: string;
}

/**
 * Notifier interface.
 *
 * @example
 * ```typescript
 * const result = await notifier.send(
 *     { title: "Aave Proposal Active", body: "Raise the reserve factor", anchorHint: null },
 *     { signal },
 * );
 * if (result.ok) {
 *     store.upsert(key, { status: "active", threadAnchor: result.anchor, notified: true });
 * }
 * ```
 */
export interface Notifier {
    /** Unique identifier for this notifier */
    readonly id: string;

    /**
     * Send a notification.
     *
     * @param notification - Composed notification; a non-null anchorHint
     *        makes this a threaded follow-up
     * @param options - Abort signal tied to the send timeout
     */
    send(notification: Notification, options: { readonly signal: AbortSignal }): Promise<SendResult>;
}

/**
 * Display data for one source unit.
 */
export interface SourceUnit {
    /** Scope passed to the fetcher and used in store keys */
    readonly scope: string;

    /** Human-readable name (project, network) */
    readonly label: string;

    /** Routing label copied onto every notification about this unit */
    readonly route?: string;
}

/**
 * Input to Formatter.format().
 */
export interface FormatRequest {
    readonly kind: NotificationKind;
    readonly unit: SourceUnit;
    readonly entity: WatchedEntity;

    /** Stored anchor for update and terminal notifications, else null */
    readonly anchor: ThreadAnchor | null;
}

/**
 * Formatter interface, one per source family.
 */
export interface Formatter {
    format(request: FormatRequest): Notification;

    /**
     * Compose the one-shot alert for a scope that no longer resolves upstream.
     */
    formatAdmin(unit: SourceUnit): Notification;
}
