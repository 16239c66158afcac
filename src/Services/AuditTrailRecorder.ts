import { randomUUID } from 'crypto';
import type {
    AuditLogDraft,
    AuditLogEntry,
    AuditQueryFilter,
    AuditSink,
    AuditSnapshot,
    Equipment,
} from '../Domain/index.js';
import { EVENT_NAMES } from '../Domain/index.js';
import type { UID } from '../Repository/Common/Ids.js';
import { DescribeError, IsAppError, StorageError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { metricsService } from './MetricsService.js';
import { AssertValidAuditFilter, FreezeEntry, NewestFirst } from './AuditQuery.js';

export const EQUIPMENT_ENTITY = `Equipment`;
export const PROJECT_ENTITY = `Project`;
export const DEFAULT_RECENT_COUNT = 100;

export interface AuditTrailRecorderOptions {
    sink: AuditSink;
    eventBus?: MainEventBus;
    /** Clock for entry timestamps */
    clock?: () => Date;
    idFactory?: () => UID;
}

export interface EquipmentUpdateOptions {
    source?: string;
    /** Operation name prefixed to the change summary, e.g. `Tag renumbering`. */
    operation?: string;
}

export interface SynchronizationCounts {
    addedToStore: number;
    updatedInStore: number;
    updatedInDrawing: number;
}

/** Fields captured before and after an equipment update. */
export function EquipmentSnapshot(equipment: Equipment): AuditSnapshot {
    return {
        tag: equipment.tag,
        equipmentType: equipment.equipmentType ?? null,
        description: equipment.description ?? null,
        status: equipment.status,
        service: equipment.service ?? null,
        manufacturer: equipment.manufacturer ?? null,
        model: equipment.model ?? null,
    };
}

/**
 * Lists what changed between two versions of a record, in a fixed field order.
 * @example
 * DescribeEquipmentChanges(before, { ...before, tag: 'P-010' }); // ['Tag: P-001 → P-010']
 */
export function DescribeEquipmentChanges(before: Equipment, after: Equipment): string[] {
    const changes: string[] = [];

    if (before.tag !== after.tag) {
        changes.push(`Tag: ${before.tag} → ${after.tag}`);
    }
    if ((before.equipmentType ?? ``) !== (after.equipmentType ?? ``)) {
        changes.push(`Type: ${before.equipmentType ?? ``} → ${after.equipmentType ?? ``}`);
    }
    if ((before.description ?? ``) !== (after.description ?? ``)) {
        changes.push(`Description changed`);
    }
    if (before.status !== after.status) {
        changes.push(`Status: ${before.status} → ${after.status}`);
    }
    if ((before.service ?? ``) !== (after.service ?? ``)) {
        changes.push(`Service: ${before.service ?? ``} → ${after.service ?? ``}`);
    }
    if ((before.manufacturer ?? ``) !== (after.manufacturer ?? ``)) {
        changes.push(`Manufacturer changed`);
    }
    if ((before.model ?? ``) !== (after.model ?? ``)) {
        changes.push(`Model changed`);
    }
    return changes;
}

/**
 * Builds the `Updated` entry for an equipment change without recording it.
 * @returns AuditLogDraft | null - Null when nothing tracked changed
 */
export function BuildEquipmentUpdateDraft(
    before: Equipment,
    after: Equipment,
    performedBy: string,
    options: EquipmentUpdateOptions = {},
): AuditLogDraft | null {
    const changes = DescribeEquipmentChanges(before, after);

    if (changes.length === 0) {
        return null;
    }
    const summary = changes.join(`, `);

    return {
        entityType: EQUIPMENT_ENTITY,
        entityId: after.id,
        action: `Updated`,
        performedBy,
        changeSummary: options.operation ? `${options.operation}: ${summary}` : summary,
        oldSnapshot: EquipmentSnapshot(before),
        newSnapshot: EquipmentSnapshot(after),
        projectId: after.projectId,
        source: options.source,
    };
}

/**
 * Records immutable audit entries and answers history queries.
 * The recorder never updates or deletes; entries it returns are frozen.
 */
export class AuditTrailRecorder {
    private readonly _sink: AuditSink;
    private readonly _eventBus: MainEventBus;
    private readonly _clock: () => Date;
    private readonly _idFactory: () => UID;

    constructor(options: AuditTrailRecorderOptions) {
        this._sink = options.sink;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
        this._clock =
            options.clock ??
            (() => {
                return new Date();
            });
        this._idFactory = options.idFactory ?? randomUUID;
    }

    /**
     * Stamps id and timestamp onto a draft and writes it.
     * @throws StorageError when the sink fails
     * @example
     * await recorder.Record({ entityType: 'Equipment', entityId: 'eq-1', action: 'Deleted', performedBy: 'alice', changeSummary: 'removed' });
     */
    async Record(draft: AuditLogDraft): Promise<AuditLogEntry> {
        const entry = FreezeEntry({
            ...draft,
            id: this._idFactory(),
            timestampUtc: this._clock().toISOString(),
        });

        try {
            await this._sink.Record(entry);
        } catch (err) {
            log.error(`Failed to record audit entry: ${DescribeError(err)}`, `AuditTrailRecorder`, entry.entityId);
            throw IsAppError(err) ? err : new StorageError(`Failed to record audit entry`, { entityId: entry.entityId }, err);
        }
        metricsService.IncAuditEntry();
        this._eventBus.Emit(EVENT_NAMES.auditRecorded, entry);
        log.debug(`${entry.action} ${entry.entityType} ${entry.entityId}`, `AuditTrailRecorder`);
        return entry;
    }

    /**
     * Entries matching all filters, newest first.
     * @param projectId UID | null - Project scope; null queries across projects
     * @throws ValidationError for invalid dates; StorageError when the sink fails
     */
    async Query(projectId: UID | null, filter: AuditQueryFilter = {}): Promise<AuditLogEntry[]> {
        AssertValidAuditFilter(filter);

        try {
            return NewestFirst(await this._sink.Query(projectId, filter));
        } catch (err) {
            throw IsAppError(err) ? err : new StorageError(`Failed to query audit entries`, { projectId }, err);
        }
    }

    /** Full history of one entity, newest first */
    async GetEntityHistory(entityType: string, entityId: UID): Promise<AuditLogEntry[]> {
        return this.Query(null, { entityType, entityId });
    }

    /** Most recent entries of a project */
    async GetRecent(projectId: UID, count: number = DEFAULT_RECENT_COUNT): Promise<AuditLogEntry[]> {
        if (!Number.isInteger(count) || count < 0) {
            throw new ValidationError(`Count must be a non-negative integer`, { count });
        }
        return (await this.Query(projectId)).slice(0, count);
    }

    /** Entries between two instants, bounds inclusive */
    async GetByDateRange(start: Date, end: Date, projectId: UID | null = null): Promise<AuditLogEntry[]> {
        return this.Query(projectId, { sinceUtc: start, untilUtc: end });
    }

    async LogEquipmentCreated(equipment: Equipment, performedBy: string, source?: string): Promise<AuditLogEntry> {
        return this.Record({
            entityType: EQUIPMENT_ENTITY,
            entityId: equipment.id,
            action: `Created`,
            performedBy,
            changeSummary: `Equipment '${equipment.tag}' created`,
            newSnapshot: {
                tag: equipment.tag,
                equipmentType: equipment.equipmentType ?? null,
                description: equipment.description ?? null,
                status: equipment.status,
            },
            projectId: equipment.projectId,
            source,
        });
    }

    /**
     * Records an update. Nothing is written when no tracked field changed.
     */
    async LogEquipmentUpdated(
        before: Equipment,
        after: Equipment,
        performedBy: string,
        options: EquipmentUpdateOptions = {},
    ): Promise<AuditLogEntry | null> {
        const draft = BuildEquipmentUpdateDraft(before, after, performedBy, options);
        return draft ? this.Record(draft) : null;
    }

    async LogEquipmentDeleted(equipment: Equipment, performedBy: string, source?: string): Promise<AuditLogEntry> {
        return this.Record({
            entityType: EQUIPMENT_ENTITY,
            entityId: equipment.id,
            action: `Deleted`,
            performedBy,
            changeSummary: `Equipment '${equipment.tag}' deleted`,
            oldSnapshot: {
                tag: equipment.tag,
                equipmentType: equipment.equipmentType ?? null,
                description: equipment.description ?? null,
            },
            projectId: equipment.projectId,
            source,
        });
    }

    /** Project-wide entry for a batch tagging run */
    async LogBatchTagging(count: number, performedBy: string, projectId: UID, source?: string): Promise<AuditLogEntry> {
        return this.Record({
            entityType: EQUIPMENT_ENTITY,
            entityId: ``,
            action: `BatchTagged`,
            performedBy,
            changeSummary: `Batch tagged ${count} equipment items`,
            newSnapshot: { count },
            projectId,
            source,
        });
    }

    /** Project-wide entry for a drawing/store synchronization run */
    async LogSynchronization(counts: SynchronizationCounts, performedBy: string, projectId: UID, source?: string): Promise<AuditLogEntry> {
        const parts: string[] = [];

        if (counts.addedToStore > 0) {
            parts.push(`${counts.addedToStore} added to registry`);
        }
        if (counts.updatedInStore > 0) {
            parts.push(`${counts.updatedInStore} updated in registry`);
        }
        if (counts.updatedInDrawing > 0) {
            parts.push(`${counts.updatedInDrawing} updated in drawing`);
        }
        return this.Record({
            entityType: PROJECT_ENTITY,
            entityId: projectId,
            action: `Synchronized`,
            performedBy,
            changeSummary: parts.length > 0 ? `Synchronization: ${parts.join(`, `)}` : `Synchronization: no changes`,
            newSnapshot: { ...counts },
            projectId,
            source,
        });
    }
}
