import type { Equipment, EquipmentPredicate, EquipmentStore, EquipmentTransaction } from '../Domain/index.js';
import type { UID } from './Common/Ids.js';
import { NotFoundError, StorageError } from '../Common/Errors.js';

/**
 * Per-project async mutex. A transaction holds its project's lock from begin until commit or rollback,
 * so overlapping batches against one project run one after the other.
 */
class ProjectLocks {
    private _tails: Map<UID, Promise<void>> = new Map();

    /** Wait for the project's lock; resolves with the release function */
    async Acquire(projectId: UID): Promise<() => void> {
        const previous = this._tails.get(projectId) ?? Promise.resolve();
        let release: () => void = () => {};
        const held = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => {
            return held;
        });
        this._tails.set(projectId, tail);
        await previous;

        return () => {
            release();
            if (this._tails.get(projectId) === tail) {
                this._tails.delete(projectId);
            }
        };
    }
}

/** Staged unit of work over the in-memory map. Reads see the transaction's own writes. */
class InMemoryEquipmentTransaction implements EquipmentTransaction {
    private _staged: Map<UID, Equipment> = new Map();
    private _active = true;

    constructor(
        private readonly _store: InMemoryEquipmentStore,
        private readonly _projectId: UID,
        private readonly _release: () => void,
    ) {}

    async FindByProject(predicate?: EquipmentPredicate): Promise<Equipment[]> {
        this._ensureActive();
        const committed = await this._store.FindByProject(this._projectId);

        return committed
            .map(item => {
                const staged = this._staged.get(item.id);
                return staged ? structuredClone(staged) : item;
            })
            .filter(item => {
                return !predicate || predicate(item);
            });
    }

    async GetById(id: UID): Promise<Equipment | null> {
        this._ensureActive();
        const staged = this._staged.get(id);

        if (staged) {
            return structuredClone(staged);
        }
        return this._store.GetById(id);
    }

    async Update(equipment: Equipment): Promise<void> {
        this._ensureActive();

        if (equipment.projectId !== this._projectId) {
            throw new StorageError(`Equipment belongs to another project`, {
                equipmentId: equipment.id,
                projectId: equipment.projectId,
                transactionProjectId: this._projectId,
            });
        }
        if (!this._store.Has(equipment.id)) {
            throw new NotFoundError(`Equipment not found`, { equipmentId: equipment.id });
        }
        this._staged.set(equipment.id, structuredClone(equipment));
    }

    async Commit(): Promise<void> {
        this._ensureActive();
        this._store.ApplyCommitted(Array.from(this._staged.values()));
        this._close();
    }

    async Rollback(): Promise<void> {
        this._ensureActive();
        this._close();
    }

    IsActive(): boolean {
        return this._active;
    }

    private _close(): void {
        this._staged.clear();
        this._active = false;
        this._release();
    }

    private _ensureActive(): void {
        if (!this._active) {
            throw new StorageError(`Transaction is no longer active`, { projectId: this._projectId });
        }
    }
}

/**
 * In-memory implementation of EquipmentStore for tests and embedded hosts.
 * Returned entities are copies; mutating them never touches stored state.
 */
export class InMemoryEquipmentStore implements EquipmentStore {
    private _equipment: Map<UID, Equipment> = new Map();
    private _locks = new ProjectLocks();

    constructor(seed: readonly Equipment[] = []) {
        this.Insert(...seed);
    }

    /** Add or replace records outside any transaction */
    Insert(...items: Equipment[]): void {
        for (const item of items) {
            this._equipment.set(item.id, structuredClone(item));
        }
    }

    async FindByProject(projectId: UID, predicate?: EquipmentPredicate): Promise<Equipment[]> {
        const matches: Equipment[] = [];

        for (const equipment of this._equipment.values()) {
            if (equipment.projectId !== projectId) {
                continue;
            }
            const copy = structuredClone(equipment);

            if (!predicate || predicate(copy)) {
                matches.push(copy);
            }
        }
        return matches;
    }

    async GetById(id: UID): Promise<Equipment | null> {
        const equipment = this._equipment.get(id);
        return equipment ? structuredClone(equipment) : null;
    }

    async Update(equipment: Equipment): Promise<void> {
        if (!this._equipment.has(equipment.id)) {
            throw new NotFoundError(`Equipment not found`, { equipmentId: equipment.id });
        }
        this._equipment.set(equipment.id, structuredClone(equipment));
    }

    async BeginTransaction(projectId: UID): Promise<EquipmentTransaction> {
        const release = await this._locks.Acquire(projectId);
        return new InMemoryEquipmentTransaction(this, projectId, release);
    }

    /** Whether a record with this id exists */
    Has(id: UID): boolean {
        return this._equipment.has(id);
    }

    /** Applies a committed transaction's writes. Called by transactions only. */
    ApplyCommitted(items: readonly Equipment[]): void {
        for (const item of items) {
            this._equipment.set(item.id, item);
        }
    }

    /** Clear all data (for testing purposes) */
    Clear(): void {
        this._equipment.clear();
    }
}
