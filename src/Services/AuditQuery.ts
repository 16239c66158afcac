/**
 * Filter and ordering rules shared by every audit sink.
 */

import type { AuditLogEntry, AuditQueryFilter } from '../Domain/index.js';
import { ValidationError } from '../Common/Errors.js';

/** Conjunctive match. Bounds are inclusive. */
export function MatchesAuditFilter(entry: AuditLogEntry, filter: AuditQueryFilter): boolean {
    if (filter.entityType !== undefined && entry.entityType !== filter.entityType) {
        return false;
    }
    if (filter.entityId !== undefined && entry.entityId !== filter.entityId) {
        return false;
    }
    if (filter.action !== undefined && entry.action !== filter.action) {
        return false;
    }
    const timestamp = Date.parse(entry.timestampUtc);

    if (filter.sinceUtc && timestamp < filter.sinceUtc.getTime()) {
        return false;
    }
    if (filter.untilUtc && timestamp > filter.untilUtc.getTime()) {
        return false;
    }
    return true;
}

/** Sorted copy, newest timestamp first; ties keep input order. */
export function NewestFirst(entries: readonly AuditLogEntry[]): AuditLogEntry[] {
    return entries.slice().sort((a, b) => {
        return Date.parse(b.timestampUtc) - Date.parse(a.timestampUtc);
    });
}

/**
 * Rejects invalid dates and inverted ranges.
 * @throws ValidationError
 */
export function AssertValidAuditFilter(filter: AuditQueryFilter): void {
    for (const [name, value] of [
        [`sinceUtc`, filter.sinceUtc],
        [`untilUtc`, filter.untilUtc],
    ] as const) {
        if (value && Number.isNaN(value.getTime())) {
            throw new ValidationError(`Invalid date for ${name}`, { field: name });
        }
    }
    if (filter.sinceUtc && filter.untilUtc && filter.sinceUtc.getTime() > filter.untilUtc.getTime()) {
        throw new ValidationError(`Start date must not be after end date`, {
            sinceUtc: filter.sinceUtc.toISOString(),
            untilUtc: filter.untilUtc.toISOString(),
        });
    }
}

/** Copies and deep-freezes an entry, snapshots included */
export function FreezeEntry(entry: AuditLogEntry): AuditLogEntry {
    return Object.freeze({
        ...entry,
        ...(entry.oldSnapshot ? { oldSnapshot: Object.freeze({ ...entry.oldSnapshot }) } : {}),
        ...(entry.newSnapshot ? { newSnapshot: Object.freeze({ ...entry.newSnapshot }) } : {}),
    });
}
