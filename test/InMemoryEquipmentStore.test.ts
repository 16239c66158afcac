import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryEquipmentStore } from '../src/Repository/InMemoryEquipmentStore.js';
import { InMemoryAuditSink } from '../src/Repository/InMemoryAuditSink.js';
import { NotFoundError, StorageError } from '../src/Common/Errors.js';
import { MakeEquipment, PROJECT } from './helpers/Fixtures.js';

function Tick(ms = 10): Promise<void> {
    return new Promise(resolve => {
        setTimeout(resolve, ms);
    });
}

describe('InMemoryEquipmentStore', () => {
    let store: InMemoryEquipmentStore;

    beforeEach(() => {
        store = new InMemoryEquipmentStore([
            MakeEquipment({ id: 'eq-1', tag: 'P-1' }),
            MakeEquipment({ id: 'eq-2', tag: 'P-2', isActive: false }),
            MakeEquipment({ id: 'eq-3', tag: 'Q-1', projectId: 'p-2' }),
        ]);
    });

    it('should scope queries to a project and apply the predicate', async () => {
        expect((await store.FindByProject(PROJECT)).map(item => item.id)).toEqual(['eq-1', 'eq-2']);
        expect((await store.FindByProject(PROJECT, item => item.isActive)).map(item => item.id)).toEqual(['eq-1']);
    });

    it('should hand out copies', async () => {
        const copy = await store.GetById('eq-1');
        if (copy) {
            copy.tag = 'changed';
        }
        expect((await store.GetById('eq-1'))?.tag).toBe('P-1');
    });

    it('should reject updates to unknown equipment', async () => {
        await expect(store.Update(MakeEquipment({ id: 'nope', tag: 'N' }))).rejects.toBeInstanceOf(NotFoundError);
    });

    describe('transactions', () => {
        it('should keep writes staged until commit', async () => {
            const tx = await store.BeginTransaction(PROJECT);
            await tx.Update(MakeEquipment({ id: 'eq-1', tag: 'P-9' }));

            expect((await tx.GetById('eq-1'))?.tag).toBe('P-9');
            expect((await store.GetById('eq-1'))?.tag).toBe('P-1');

            await tx.Commit();
            expect((await store.GetById('eq-1'))?.tag).toBe('P-9');
            expect(tx.IsActive()).toBe(false);
        });

        it('should list the project with its own staged writes', async () => {
            const tx = await store.BeginTransaction(PROJECT);
            await tx.Update(MakeEquipment({ id: 'eq-1', tag: 'P-9' }));

            expect((await tx.FindByProject()).map(item => item.tag)).toEqual(['P-9', 'P-2']);
            expect((await tx.FindByProject(item => item.isActive)).map(item => item.id)).toEqual(['eq-1']);
            expect((await store.FindByProject(PROJECT)).map(item => item.tag)).toEqual(['P-1', 'P-2']);
            await tx.Rollback();
        });

        it('should discard writes on rollback', async () => {
            const tx = await store.BeginTransaction(PROJECT);
            await tx.Update(MakeEquipment({ id: 'eq-1', tag: 'P-9' }));
            await tx.Rollback();

            expect((await store.GetById('eq-1'))?.tag).toBe('P-1');
        });

        it('should refuse use after completion', async () => {
            const tx = await store.BeginTransaction(PROJECT);
            await tx.Commit();

            await expect(tx.GetById('eq-1')).rejects.toBeInstanceOf(StorageError);
            await expect(tx.Commit()).rejects.toBeInstanceOf(StorageError);
        });

        it('should refuse equipment of another project', async () => {
            const tx = await store.BeginTransaction(PROJECT);

            await expect(tx.Update(MakeEquipment({ id: 'eq-3', tag: 'Q-2', projectId: 'p-2' }))).rejects.toBeInstanceOf(StorageError);
            await tx.Rollback();
        });

        it('should serialize transactions per project only', async () => {
            const first = await store.BeginTransaction(PROJECT);
            let acquired = false;
            const second = store.BeginTransaction(PROJECT).then(tx => {
                acquired = true;
                return tx;
            });

            const other = await store.BeginTransaction('p-2');
            await other.Rollback();

            await Tick();
            expect(acquired).toBe(false);

            await first.Commit();
            const tx = await second;
            expect(acquired).toBe(true);
            await tx.Rollback();
        });
    });
});

describe('InMemoryAuditSink', () => {
    it('should store frozen entries and query newest first', async () => {
        const sink = new InMemoryAuditSink();
        const base = { entityType: 'Equipment', action: 'Created' as const, performedBy: 'alice', changeSummary: '', projectId: PROJECT };

        await sink.Record({ ...base, id: 'a', entityId: 'eq-1', timestampUtc: '2026-01-01T00:00:00.000Z' });
        await sink.Record({ ...base, id: 'b', entityId: 'eq-2', timestampUtc: '2026-01-02T00:00:00.000Z' });
        await sink.Record({ ...base, id: 'c', entityId: 'eq-3', timestampUtc: '2026-01-02T00:00:00.000Z', projectId: 'p-2' });

        const entries = await sink.Query(PROJECT);
        expect(entries.map(entry => entry.id)).toEqual(['b', 'a']);
        expect(Object.isFrozen(entries[0])).toBe(true);
        expect((await sink.Query(null)).map(entry => entry.id)).toEqual(['c', 'b', 'a']);
    });
});
