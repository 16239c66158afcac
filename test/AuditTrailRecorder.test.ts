import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { AuditLogEntry, AuditSink } from '../src/Domain/index.js';
import { InMemoryAuditSink } from '../src/Repository/InMemoryAuditSink.js';
import { AuditTrailRecorder } from '../src/Services/AuditTrailRecorder.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { metricsService } from '../src/Services/MetricsService.js';
import { StorageError, ValidationError } from '../src/Common/Errors.js';
import { MakeEquipment, PROJECT } from './helpers/Fixtures.js';

/** Clock advancing one minute per call from 2026-02-01T00:00Z. */
function SteppingClock(): () => Date {
    let minute = 0;
    return () => {
        const at = new Date(Date.UTC(2026, 1, 1, 0, minute));
        minute++;
        return at;
    };
}

describe('AuditTrailRecorder', () => {
    let sink: InMemoryAuditSink;
    let eventBus: MainEventBus;
    let recorder: AuditTrailRecorder;
    let nextId: number;

    beforeEach(() => {
        metricsService.Reset();
        sink = new InMemoryAuditSink();
        eventBus = new MainEventBus();
        nextId = 0;
        recorder = new AuditTrailRecorder({
            sink,
            eventBus,
            clock: SteppingClock(),
            idFactory: () => {
                nextId++;
                return `audit-${nextId}`;
            },
        });
    });

    it('should stamp, freeze and publish recorded entries', async () => {
        const recorded = vi.fn();
        eventBus.On('audit.recorded', recorded);

        const entry = await recorder.Record({
            entityType: 'Equipment',
            entityId: 'eq-1',
            action: 'Updated',
            performedBy: 'alice',
            changeSummary: 'Tag: P-1 → P-2',
            oldSnapshot: { tag: 'P-1' },
            projectId: PROJECT,
        });

        expect(entry.id).toBe('audit-1');
        expect(entry.timestampUtc).toBe('2026-02-01T00:00:00.000Z');
        expect(Object.isFrozen(entry)).toBe(true);
        expect(Reflect.set(entry, 'changeSummary', 'edited')).toBe(false);
        expect(entry.oldSnapshot && Reflect.set(entry.oldSnapshot, 'tag', 'X')).toBe(false);
        expect(recorded).toHaveBeenCalledWith(entry);
        expect(metricsService.Snapshot().auditEntriesRecorded).toBe(1);
    });

    it('should return entries newest first', async () => {
        for (const entityId of ['eq-1', 'eq-2', 'eq-3']) {
            await recorder.Record({ entityType: 'Equipment', entityId, action: 'Created', performedBy: 'alice', changeSummary: '', projectId: PROJECT });
        }
        const entries = await recorder.Query(PROJECT);
        expect(entries.map(entry => entry.entityId)).toEqual(['eq-3', 'eq-2', 'eq-1']);
    });

    it('should apply filters conjunctively and across projects for a null project', async () => {
        const pump = MakeEquipment({ id: 'eq-1', tag: 'P-1' });
        await recorder.LogEquipmentCreated(pump, 'alice');
        await recorder.LogEquipmentUpdated(pump, { ...pump, tag: 'P-2' }, 'bob');
        await recorder.LogEquipmentCreated(MakeEquipment({ id: 'eq-9', tag: 'Q-1', projectId: 'p-2' }), 'carol');

        expect((await recorder.Query(PROJECT, { action: 'Updated' })).map(entry => entry.performedBy)).toEqual(['bob']);
        expect((await recorder.Query(null, { action: 'Created' })).map(entry => entry.entityId)).toEqual(['eq-9', 'eq-1']);
        expect((await recorder.GetEntityHistory('Equipment', 'eq-1')).map(entry => entry.action)).toEqual(['Updated', 'Created']);
    });

    it('should limit recent entries', async () => {
        for (let index = 0; index < 5; index++) {
            await recorder.LogBatchTagging(index, 'alice', PROJECT);
        }
        const recent = await recorder.GetRecent(PROJECT, 2);
        expect(recent.map(entry => entry.changeSummary)).toEqual(['Batch tagged 4 equipment items', 'Batch tagged 3 equipment items']);
        expect(recent[0].entityId).toBe('');
    });

    it('should query an inclusive date range', async () => {
        for (let index = 0; index < 4; index++) {
            await recorder.LogBatchTagging(index, 'alice', PROJECT);
        }
        const entries = await recorder.GetByDateRange(new Date('2026-02-01T00:01:00.000Z'), new Date('2026-02-01T00:02:00.000Z'));
        expect(entries.map(entry => entry.timestampUtc)).toEqual(['2026-02-01T00:02:00.000Z', '2026-02-01T00:01:00.000Z']);
    });

    it('should reject inverted or invalid ranges', async () => {
        await expect(recorder.GetByDateRange(new Date('2026-03-01'), new Date('2026-02-01'))).rejects.toBeInstanceOf(ValidationError);
        await expect(recorder.Query(PROJECT, { sinceUtc: new Date('not a date') })).rejects.toBeInstanceOf(ValidationError);
    });

    it('should summarize equipment updates and skip no-op updates', async () => {
        const pump = MakeEquipment({ id: 'eq-1', tag: 'P-1', status: 'Planned' });

        expect(await recorder.LogEquipmentUpdated(pump, { ...pump }, 'alice')).toBeNull();
        expect(sink.Count()).toBe(0);

        const entry = await recorder.LogEquipmentUpdated(pump, { ...pump, tag: 'P-2', status: 'Installed', model: 'X100' }, 'alice', {
            source: 'editor',
        });
        expect(entry?.changeSummary).toBe('Tag: P-1 → P-2, Status: Planned → Installed, Model changed');
        expect(entry?.oldSnapshot).toEqual({
            tag: 'P-1',
            equipmentType: null,
            description: null,
            status: 'Planned',
            service: null,
            manufacturer: null,
            model: null,
        });
        expect(entry?.newSnapshot?.model).toBe('X100');
        expect(entry?.source).toBe('editor');
    });

    it('should describe created and deleted equipment', async () => {
        const tank = MakeEquipment({ id: 'eq-2', tag: 'T-1', equipmentType: 'Tank' });

        expect((await recorder.LogEquipmentCreated(tank, 'alice')).changeSummary).toBe(`Equipment 'T-1' created`);
        const deleted = await recorder.LogEquipmentDeleted(tank, 'alice');
        expect(deleted.changeSummary).toBe(`Equipment 'T-1' deleted`);
        expect(deleted.oldSnapshot).toEqual({ tag: 'T-1', equipmentType: 'Tank', description: null });
    });

    it('should summarize synchronization counts', async () => {
        const synced = await recorder.LogSynchronization({ addedToStore: 2, updatedInStore: 0, updatedInDrawing: 1 }, 'alice', PROJECT);
        expect(synced.changeSummary).toBe('Synchronization: 2 added to registry, 1 updated in drawing');
        expect(synced.action).toBe('Synchronized');

        const idle = await recorder.LogSynchronization({ addedToStore: 0, updatedInStore: 0, updatedInDrawing: 0 }, 'alice', PROJECT);
        expect(idle.changeSummary).toBe('Synchronization: no changes');
    });

    it('should wrap sink failures in StorageError', async () => {
        const failing: AuditSink = {
            Record: async () => {
                throw new Error('offline');
            },
            Query: async (): Promise<AuditLogEntry[]> => {
                throw new Error('offline');
            },
        };
        const broken = new AuditTrailRecorder({ sink: failing, eventBus });

        await expect(broken.LogBatchTagging(1, 'alice', PROJECT)).rejects.toBeInstanceOf(StorageError);
        await expect(broken.Query(PROJECT)).rejects.toBeInstanceOf(StorageError);
        expect(metricsService.Snapshot().auditEntriesRecorded).toBe(0);
    });
});
