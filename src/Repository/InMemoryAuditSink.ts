import type { AuditLogEntry, AuditQueryFilter, AuditSink } from '../Domain/index.js';
import type { UID } from './Common/Ids.js';
import { FreezeEntry, MatchesAuditFilter, NewestFirst } from '../Services/AuditQuery.js';

/**
 * In-memory append-only audit sink. Entries are frozen on write; there is no update or delete path.
 */
export class InMemoryAuditSink implements AuditSink {
    private _entries: AuditLogEntry[] = [];

    async Record(entry: AuditLogEntry): Promise<void> {
        this._entries.push(FreezeEntry(entry));
    }

    async Query(projectId: UID | null, filter: AuditQueryFilter = {}): Promise<AuditLogEntry[]> {
        const matches = this._entries.filter(entry => {
            return (projectId === null || entry.projectId === projectId) && MatchesAuditFilter(entry, filter);
        });
        // reverse first so equal timestamps come back newest-appended first
        return NewestFirst(matches.reverse());
    }

    /** Number of stored entries */
    Count(): number {
        return this._entries.length;
    }
}
