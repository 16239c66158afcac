import type { Session, Transaction } from 'neo4j-driver';
import type { Equipment, EquipmentPredicate, EquipmentStore, EquipmentTransaction } from '../Domain/index.js';
import type { UID } from './Common/Ids.js';
import { BaseRepository, ToStorageError } from './BaseRepository.js';
import { Neo4jClient } from './Neo4jClient.js';
import { EquipmentFromProperties, EquipmentToProperties } from './Neo4jMapping.js';
import { NotFoundError, StorageError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';

const LABEL = `Equipment`;

// Write-locks the project's lock node for the rest of the transaction, serializing batches per project.
const LOCK_QUERY = `MERGE (l:EquipmentProjectLock {projectId: $projectId}) SET l.lockedAt = $lockedAt`;
const FIND_BY_PROJECT_QUERY = `MATCH (n:${LABEL} {projectId: $projectId}) RETURN n ORDER BY n.tag`;
const GET_BY_ID_QUERY = `MATCH (n:${LABEL} {id: $id}) RETURN n LIMIT 1`;
const UPDATE_QUERY = `MATCH (n:${LABEL} {id: $id}) SET n = $props RETURN n.id AS id`;

/** The part of a session or transaction the store needs to run one statement. */
interface QueryRunner {
    run(query: string, parameters?: Record<string, unknown>): PromiseLike<{ records: ReadonlyArray<{ get(key: string): unknown }> }>;
}

/**
 * Explicit driver transaction. The session stays open until commit or rollback.
 */
class Neo4jEquipmentTransaction implements EquipmentTransaction {
    private _active = true;

    constructor(
        private readonly _store: Neo4jEquipmentStore,
        private readonly _session: Session,
        private readonly _tx: Transaction,
        private readonly _projectId: UID,
    ) {}

    async FindByProject(predicate?: EquipmentPredicate): Promise<Equipment[]> {
        this._ensureActive();
        const equipment = await this._store.FetchByProject(this._tx, this._projectId);
        return predicate ? equipment.filter(predicate) : equipment;
    }

    async GetById(id: UID): Promise<Equipment | null> {
        this._ensureActive();
        return this._store.FetchById(this._tx, id);
    }

    async Update(equipment: Equipment): Promise<void> {
        this._ensureActive();

        if (equipment.projectId !== this._projectId) {
            throw new StorageError(`Equipment belongs to another project`, {
                equipmentId: equipment.id,
                transactionProjectId: this._projectId,
            });
        }
        await this._store.Overwrite(this._tx, equipment);
    }

    async Commit(): Promise<void> {
        this._ensureActive();

        try {
            await this._tx.commit();
        } catch (err) {
            throw ToStorageError(err, LABEL);
        } finally {
            await this._close();
        }
    }

    async Rollback(): Promise<void> {
        this._ensureActive();

        try {
            await this._tx.rollback();
        } catch (err) {
            throw ToStorageError(err, LABEL);
        } finally {
            await this._close();
        }
    }

    IsActive(): boolean {
        return this._active;
    }

    private async _close(): Promise<void> {
        this._active = false;
        await this._session.close();
    }

    private _ensureActive(): void {
        if (!this._active) {
            throw new StorageError(`Transaction is no longer active`, { projectId: this._projectId });
        }
    }
}

/**
 * Equipment persistence over Neo4j. One `:Equipment` node per record.
 */
export class Neo4jEquipmentStore extends BaseRepository implements EquipmentStore {
    constructor(client: Neo4jClient) {
        super(client, {
            primaryLabel: LABEL,
            indexes: [
                { name: `equipment_project`, properties: [`projectId`] },
                { name: `equipment_project_tag`, properties: [`projectId`, `tag`] },
            ],
            constraints: [{ name: `equipment_id_unique`, type: `UNIQUENESS`, properties: [`id`] }],
        });
    }

    async FindByProject(projectId: UID, predicate?: EquipmentPredicate): Promise<Equipment[]> {
        const equipment = await this.Read(session => {
            return this.FetchByProject(session, projectId);
        });
        return predicate ? equipment.filter(predicate) : equipment;
    }

    async GetById(id: UID): Promise<Equipment | null> {
        return this.Read(session => {
            return this.FetchById(session, id);
        });
    }

    async Update(equipment: Equipment): Promise<void> {
        await this.Write(session => {
            return this.Overwrite(session, equipment);
        });
    }

    async BeginTransaction(projectId: UID): Promise<EquipmentTransaction> {
        const session = await this.client.GetSession(`WRITE`);
        const tx = session.beginTransaction();

        try {
            await tx.run(LOCK_QUERY, { projectId, lockedAt: new Date().toISOString() });
        } catch (err) {
            log.error(`Failed to lock project ${projectId}`, `Neo4jEquipmentStore`);
            await tx.rollback();
            await session.close();
            throw ToStorageError(err, LABEL);
        }
        return new Neo4jEquipmentTransaction(this, session, tx, projectId);
    }

    /** Reads a project's records, ordered by tag, through the given runner. */
    async FetchByProject(runner: QueryRunner, projectId: UID): Promise<Equipment[]> {
        try {
            const result = await runner.run(FIND_BY_PROJECT_QUERY, { projectId });
            return this.NodesOf(result.records, `n`).map(node => {
                return EquipmentFromProperties(node.properties);
            });
        } catch (err) {
            throw ToStorageError(err, LABEL);
        }
    }

    /** Reads one record through the given runner. Used by transactions. */
    async FetchById(runner: QueryRunner, id: UID): Promise<Equipment | null> {
        try {
            const result = await runner.run(GET_BY_ID_QUERY, { id });
            const [node] = this.NodesOf(result.records, `n`);
            return node ? EquipmentFromProperties(node.properties) : null;
        } catch (err) {
            throw ToStorageError(err, LABEL);
        }
    }

    /**
     * Replaces all properties of an existing record through the given runner.
     * @throws NotFoundError when no node has the id
     */
    async Overwrite(runner: QueryRunner, equipment: Equipment): Promise<void> {
        let updated: number;

        try {
            const result = await runner.run(UPDATE_QUERY, {
                id: equipment.id,
                props: EquipmentToProperties(equipment),
            });
            updated = result.records.length;
        } catch (err) {
            throw ToStorageError(err, LABEL);
        }
        if (updated === 0) {
            throw new NotFoundError(`Equipment not found`, { equipmentId: equipment.id });
        }
    }
}
