/**
 * Audit trail interfaces.
 * Entries are append-only and immutable once written; nothing in this library updates or deletes them.
 */

import type { UID } from '../Repository/Common/Ids.js';

/** Kind of change an audit entry records. */
export type AuditAction = `Created` | `Updated` | `Deleted` | `BatchTagged` | `Synchronized`;

export const AUDIT_ACTIONS: readonly AuditAction[] = [`Created`, `Updated`, `Deleted`, `BatchTagged`, `Synchronized`];

/** Scalar values a snapshot may hold. */
export type SnapshotValue = string | number | boolean | null;

/**
 * Schema-agnostic before/after capture of an entity's relevant fields.
 * Different entity types carry different keys.
 */
export type AuditSnapshot = Readonly<Record<string, SnapshotValue>>;

/** One immutable change event. */
export interface AuditLogEntry {
    readonly id: UID;
    /** `Equipment`, `Line`, `Instrument`, ... */
    readonly entityType: string;
    /** Empty for project-wide operations such as batch tagging. */
    readonly entityId: UID;
    readonly action: AuditAction;
    readonly performedBy: string;
    readonly timestampUtc: string; // ISO-8601
    readonly changeSummary: string;
    readonly oldSnapshot?: AuditSnapshot;
    readonly newSnapshot?: AuditSnapshot;
    readonly projectId?: UID;
    /** Free-form origin tag such as a host name or subsystem. */
    readonly source?: string;
}

/** Entry content supplied by callers; the recorder stamps id and timestamp. */
export type AuditLogDraft = Omit<AuditLogEntry, `id` | `timestampUtc`>;

/** Conjunctive query filters. Absent `sinceUtc` means all time. */
export interface AuditQueryFilter {
    entityType?: string;
    entityId?: UID;
    action?: AuditAction;
    sinceUtc?: Date;
    untilUtc?: Date;
}

/**
 * Storage contract for audit entries. `Record` fails only on storage errors.
 * `Query` returns entries newest first; a null project id queries across projects.
 */
export interface AuditSink {
    Record(entry: AuditLogEntry): Promise<void>;
    Query(projectId: UID | null, filter?: AuditQueryFilter): Promise<AuditLogEntry[]>;
}
