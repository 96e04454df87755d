/**
 * @fileoverview Formatter chosen by unit scope
 *
 * For sources whose units are different kinds of entity, such as Sky polls
 * and executive votes.
 *
 * @module governance-monitor/domain/formatters/ScopedFormatter
 */

import type { FormatRequest, Formatter, Notification, SourceUnit } from "@govwatch/engine";

export class ScopedFormatter implements Formatter {
    constructor(private readonly byScope: Readonly<Record<string, Formatter>>) {}

    format(request: FormatRequest): Notification {
        return this.formatterFor(request.unit).format(request);
    }

    formatAdmin(unit: SourceUnit): Notification {
        return this.formatterFor(unit).formatAdmin(unit);
    }

    private formatterFor(unit: SourceUnit): Formatter {
        if (!Object.hasOwn(this.byScope, unit.scope)) {
            throw new Error(`No formatter for scope: ${unit.scope}`);
        }
        return this.byScope[unit.scope];
    }
}
