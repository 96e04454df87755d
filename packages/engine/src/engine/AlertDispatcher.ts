/**
 * @fileoverview AlertDispatcher
 *
 * Turns a classified transition into at most one notification and writes
 * the outcome back to the EntityStore.
 *
 * Store rules:
 * - initial sent      → notified, anchor = returned anchor
 * - initial failed    → un-notified, no anchor (retried next pass)
 * - update sent       → status, notified, existing anchor kept
 * - terminal sent     → record removed
 * - update/terminal failed → status only; anchor and notified untouched
 * - noop              → status only, and only when it changed; an entity
 *                       first seen in a terminal status is not stored
 *
 * @module @govwatch/engine/engine/AlertDispatcher
 */

import type { EntityRecord, WatchedEntity } from "../contracts/Entity.js";
import { entityKey } from "../contracts/Entity.js";
import type { EventBus, EventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import type {
    Formatter,
    Notification,
    Notifier,
    SendResult,
    SourceUnit,
} from "../contracts/Notifier.js";
import {
    TransitionOutcome,
    notificationKindOf,
    type TransitionPolicyTable,
} from "../contracts/TransitionOutcome.js";
import { errorMessage } from "../errors.js";
import type { AdminAlertRegistry } from "../impl/AdminAlertRegistry.js";
import type { EntityStore } from "../impl/EntityStore.js";
import { isTerminalStatus } from "../policy/classifyTransition.js";
import { withTimeout } from "../utils/withTimeout.js";

export const MISSING_CONTEXT_WARNING = "⚠️ Unable to find original message context.";

export interface AlertDispatcherConfig {
    /** Id of the source this dispatcher serves */
    readonly sourceId: string;
    readonly store: EntityStore;
    readonly adminAlerts: AdminAlertRegistry;
    readonly notifier: Notifier;
    readonly formatter: Formatter;
    readonly policy: TransitionPolicyTable;
    readonly eventBus: EventBus;
    readonly logger: EngineLogger;

    /** Timeout for each send, in ms (default: 30000) */
    readonly sendTimeoutMs?: number;
}

export interface DispatchResult {
    /** Whether a notification was delivered */
    readonly sent: boolean;

    /** Record after dispatch; undefined when removed or never created */
    readonly record: EntityRecord | undefined;
}

export class AlertDispatcher {
    private readonly config: AlertDispatcherConfig;
    private readonly sendTimeoutMs: number;

    constructor(config: AlertDispatcherConfig) {
        this.config = config;
        this.sendTimeoutMs = config.sendTimeoutMs ?? 30000;
    }

    /**
     * Act on one entity's classified transition.
     */
    async dispatch(
        unit: SourceUnit,
        entity: WatchedEntity,
        record: EntityRecord | undefined,
        outcome: TransitionOutcome
    ): Promise<DispatchResult> {
        const key = entityKey(unit.scope, entity.id);
        const { store } = this.config;

        switch (outcome) {
            case TransitionOutcome.NoOp:
                return this.track(key, entity, record);

            case TransitionOutcome.NotifyInitial: {
                const notification = this.routed(unit, this.config.formatter.format({
                    kind  : notificationKindOf(outcome),
                    unit,
                    entity,
                    anchor: null,
                }));
                const result = await this.send(key, notification);

                if (!result.ok) {
                    return {
                        sent  : false,
                        record: store.upsert(key, {
                            status      : entity.status,
                            threadAnchor: null,
                            notified    : false,
                            title       : entity.title,
                        }),
                    };
                }

                if (result.anchor === null && !this.config.policy.anchorless) {
                    this.config.logger.warn("Notifier returned no anchor; follow-ups will not be threaded", { key });
                }

                const updated = store.upsert(key, {
                    status      : entity.status,
                    threadAnchor: result.anchor,
                    notified    : true,
                    title       : entity.title,
                });
                this.emit("entity:notified", { key, kind: "initial", anchor: result.anchor });
                return { sent: true, record: updated };
            }

            case TransitionOutcome.NotifyUpdate:
            case TransitionOutcome.NotifyTerminal:
                return this.followUp(unit, key, entity, record, outcome);

            case TransitionOutcome.NotifyAdmin:
                throw new Error("Admin alerts are dispatched with dispatchAdmin()");
        }
    }

    /**
     * Send the one-shot alert for a scope that no longer resolves.
     * Does nothing when the scope was already reported.
     */
    async dispatchAdmin(unit: SourceUnit): Promise<DispatchResult> {
        const { adminAlerts, formatter } = this.config;

        if (adminAlerts.isWarned(unit.scope)) {
            return { sent: false, record: undefined };
        }

        const result = await this.send(unit.scope, this.routed(unit, formatter.formatAdmin(unit)));
        if (result.ok) {
            adminAlerts.markWarned(unit.scope);
            this.emit("admin:notified", { scope: unit.scope });
        }
        return { sent: result.ok, record: undefined };
    }

    private async followUp(
        unit: SourceUnit,
        key: string,
        entity: WatchedEntity,
        record: EntityRecord | undefined,
        outcome: typeof TransitionOutcome.NotifyUpdate | typeof TransitionOutcome.NotifyTerminal
    ): Promise<DispatchResult> {
        const { store, formatter, logger } = this.config;
        const kind = notificationKindOf(outcome);
        const anchor = record?.threadAnchor ?? null;

        let notification = this.routed(unit, formatter.format({ kind, unit, entity, anchor }));
        if (anchor === null) {
            logger.warn("No thread context found, sending standalone", { key, kind });
            notification = {
                ...notification,
                body      : `${MISSING_CONTEXT_WARNING} ${notification.body}`,
                anchorHint: null,
            };
        }

        const result = await this.send(key, notification);

        if (!result.ok) {
            logger.warn("Failed to send alert, updated status only", { key, status: entity.status });
            return {
                sent  : false,
                record: store.upsert(key, { status: entity.status, title: entity.title }),
            };
        }

        this.emit("entity:notified", { key, kind, anchor });

        if (outcome === TransitionOutcome.NotifyTerminal) {
            store.remove(key);
            this.emit("entity:removed", { key, status: entity.status });
            logger.info("Removed ended entity from tracking", { key, status: entity.status });
            return { sent: true, record: undefined };
        }

        return {
            sent  : true,
            record: store.upsert(key, {
                status  : entity.status,
                notified: true,
                title   : entity.title,
            }),
        };
    }

    /**
     * Persist a status change that does not warrant a notification.
     */
    private track(key: string, entity: WatchedEntity, record: EntityRecord | undefined): DispatchResult {
        if (record && record.status === entity.status) {
            return { sent: false, record };
        }
        if (!record && isTerminalStatus(this.config.policy, entity.status)) {
            this.config.logger.debug("Ignoring entity first seen in a terminal status", { key, status: entity.status });
            return { sent: false, record: undefined };
        }

        const updated = this.config.store.upsert(key, { status: entity.status, title: entity.title });
        this.emit("entity:tracked", { key, from: record?.status ?? null, to: entity.status });
        this.config.logger.debug("Updated status without alert", { key, status: entity.status });
        return { sent: false, record: updated };
    }

    private routed(unit: SourceUnit, notification: Notification): Notification {
        return unit.route === undefined ? notification : { ...notification, route: unit.route };
    }

    /**
     * Send through the notifier. Timeouts, thrown errors and rejected sends
     * all come back as `ok: false`.
     */
    private async send(key: string, notification: Notification): Promise<SendResult> {
        const { notifier, logger } = this.config;

        let result: SendResult;
        try {
            result = await withTimeout(
                (signal) => notifier.send(notification, { signal }),
                this.sendTimeoutMs,
                `Send for ${key}`
            );
        }
        catch (error) {
            result = { ok: false, anchor: null, error: errorMessage(error) };
        }

        if (!result.ok) {
            logger.error("Notification send failed", { key, title: notification.title, error: result.error });
            this.emit("entity:notifyFailed", { key, title: notification.title, error: result.error ?? null });
        }
        return result;
    }

    private emit(type: EventType, data: Record<string, unknown>): void {
        this.config.eventBus.emit(createEvent(type, data, this.config.sourceId));
    }
}
