/**
 * @fileoverview Template formatter
 *
 * A Formatter driven by a per-platform table of title templates and button
 * labels. Templates interpolate `{label}`, `{scope}`, `{id}`, `{title}`,
 * `{status}` and any entity attribute by name.
 *
 * @module governance-monitor/domain/formatters/TemplateFormatter
 */

import type {
    FormatRequest,
    Formatter,
    Notification,
    NotificationKind,
    SourceUnit,
    WatchedEntity,
} from "@govwatch/engine";

export interface MessageTemplate {
    readonly title: string;

    /** Overrides the table body for this message */
    readonly body?: string;

    /** Button label; omitted means no button */
    readonly actionLabel?: string;
}

export interface FormatterTable {
    /** Body template */
    readonly body: string;

    readonly messages: Readonly<Record<NotificationKind, MessageTemplate>>;

    /** Terminal messages for specific statuses, e.g. "deleted" */
    readonly terminalByStatus?: Readonly<Record<string, MessageTemplate>>;

    /** Admin alert; omitted uses a generic "not found" message */
    readonly admin?: {
        readonly title: string;
        readonly body: string;
    };
}

const DEFAULT_ADMIN = {
    title: "⚠️ {label} Not Found",
    body : "`{scope}` no longer resolves upstream. Check the watch list.",
};

type TemplateValues = Readonly<Record<string, string>>;

export function renderTemplate(template: string, values: TemplateValues): string {
    return template.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match);
}

function valuesFor(unit: SourceUnit, entity?: WatchedEntity): TemplateValues {
    const values: Record<string, string> = { label: unit.label, scope: unit.scope };
    if (entity) {
        for (const [name, value] of Object.entries(entity.attributes ?? {})) {
            values[name] = String(value);
        }
        values.id = entity.id;
        values.status = entity.status;
        values.title = entity.title ?? entity.id;
    }
    return values;
}

export class TemplateFormatter implements Formatter {
    constructor(private readonly table: FormatterTable) {}

    format(request: FormatRequest): Notification {
        const { kind, unit, entity, anchor } = request;
        const template = kind === "terminal"
            ? this.table.terminalByStatus?.[entity.status] ?? this.table.messages.terminal
            : this.table.messages[kind];
        const values = valuesFor(unit, entity);

        return {
            title     : renderTemplate(template.title, values),
            body      : renderTemplate(template.body ?? this.table.body, values),
            actionLink: template.actionLabel && entity.url
                ? { label: template.actionLabel, url: entity.url }
                : undefined,
            anchorHint: anchor,
        };
    }

    formatAdmin(unit: SourceUnit): Notification {
        const values = valuesFor(unit);
        const admin = this.table.admin ?? DEFAULT_ADMIN;
        return {
            title     : renderTemplate(admin.title, values),
            body      : renderTemplate(admin.body, values),
            anchorHint: null,
        };
    }
}
