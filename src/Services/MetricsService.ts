/**
 * MetricsService provides in-memory counters for renumbering and audit activity.
 * Synchronous and process-local; a host that needs a collector exports `Snapshot()` periodically.
 */

export interface MetricsSnapshot {
    batchesCommitted: number; // renumbering transactions committed
    batchesRolledBack: number; // renumbering transactions rolled back
    tagsRenamed: number; // equipment tags changed by committed batches
    auditEntriesRecorded: number; // audit entries written through the recorder
    eventsPublished: Record<string, number>; // counts per event name
    collectedAt: number; // epoch ms when snapshot taken
}

/** Internal mutable state container */
type MutableMetricsState = Omit<MetricsSnapshot, `collectedAt`>;

/**
 * MetricsService – central mutable counter set.
 */
export class MetricsService {
    private _state: MutableMetricsState = {
        batchesCommitted: 0,
        batchesRolledBack: 0,
        tagsRenamed: 0,
        auditEntriesRecorded: 0,
        eventsPublished: {},
    };

    /** Record a committed batch and the number of tags it changed */
    public RecordCommit(renamed: number): void {
        this._state.batchesCommitted++;
        this._state.tagsRenamed += renamed;
    }
    /** Record a rolled back batch */
    public RecordRollback(): void {
        this._state.batchesRolledBack++;
    }
    /** Increment audit entry counter */
    public IncAuditEntry(): void {
        this._state.auditEntriesRecorded++;
    }
    /** Increment event publish counter */
    public IncEvent(eventName: string): void {
        this._state.eventsPublished[eventName] = (this._state.eventsPublished[eventName] ?? 0) + 1;
    }

    /** Obtain a point-in-time immutable snapshot */
    public Snapshot(): Readonly<MetricsSnapshot> {
        return Object.freeze({
            batchesCommitted: this._state.batchesCommitted,
            batchesRolledBack: this._state.batchesRolledBack,
            tagsRenamed: this._state.tagsRenamed,
            auditEntriesRecorded: this._state.auditEntriesRecorded,
            eventsPublished: { ...this._state.eventsPublished },
            collectedAt: Date.now(),
        });
    }

    /** Reset all counters (primarily for tests) */
    public Reset(): void {
        this._state = {
            batchesCommitted: 0,
            batchesRolledBack: 0,
            tagsRenamed: 0,
            auditEntriesRecorded: 0,
            eventsPublished: {},
        };
    }
}

/** Global singleton instance. */
export const metricsService = new MetricsService();
