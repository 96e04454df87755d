/**
 * Entity Contracts
 *
 * A WatchedEntity is what a Fetcher reports about one proposal, poll or
 * amendment right now. An EntityRecord is what the engine remembers about it
 * between passes.
 *
 * The core never interprets entity fields beyond equality of `status`.
 */

/**
 * Opaque reference to a previously sent notification (e.g. a Slack `ts`).
 */
export type ThreadAnchor = string;

/**
 * One entity as observed upstream during a pass.
 *
 * @example
 * ```typescript
 * const entity: WatchedEntity = {
 *     id    : "0xabc",
 *     status: "active",
 *     title : "Raise the reserve factor",
 *     url   : "https://snapshot.org/#/aave.eth/proposal/0xabc",
 * };
 * ```
 */
export interface WatchedEntity {
    /** Identifier, unique within its scope */
    readonly id: string;

    /** Source-defined status label */
    readonly status: string;

    /** Display title */
    readonly title?: string;

    /** Canonical link to the entity */
    readonly url?: string;

    /** Extra values such as support percentage or an enactment date */
    readonly attributes?: Readonly<Record<string, number | string>>;
}

/**
 * Last-known state of an entity, owned by the EntityStore.
 */
export interface EntityRecord {
    /** Last-seen status label */
    readonly status: string;

    /** Anchor returned by the notifier on the initial send */
    readonly threadAnchor: ThreadAnchor | null;

    /** Whether an initial notification was ever sent successfully */
    readonly notified: boolean;

    /** Last-seen title, kept for follow-ups after the entity vanishes upstream */
    readonly title?: string;
}

/**
 * Fields accepted by EntityStore.upsert. Omitted fields keep their stored value.
 */
export interface EntityRecordUpdate {
    readonly status: string;
    readonly threadAnchor?: ThreadAnchor | null;
    readonly notified?: boolean;
    readonly title?: string;
}

/**
 * Build the composite store key for an entity.
 */
export function entityKey(scope: string, entityId: string): string {
    return `${scope}:${entityId}`;
}
