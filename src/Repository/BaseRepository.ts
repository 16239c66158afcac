/**
 * Abstract base repository for Neo4j-backed stores: schema setup plus session helpers that map
 * driver failures onto StorageError.
 */

import type { Session } from 'neo4j-driver';
import { Neo4jClient } from './Neo4jClient.js';
import { IsAppError, StorageError } from '../Common/Errors.js';
import type {
    Neo4jConstraintDefinition,
    Neo4jIndexDefinition,
    Neo4jNode,
    Neo4jNodeSchema,
} from '../Types/Repository/index.js';
import { IsNeo4jNode } from '../Types/Repository/index.js';

/**
 * Abstract base repository providing common database operations.
 * Concrete implementations should extend this class and provide schema-specific logic.
 */
export abstract class BaseRepository {
    protected client: Neo4jClient;
    protected schema: Neo4jNodeSchema;

    /**
     * Initialize the repository with Neo4j client and schema.
     * @param client Neo4j client instance
     * @param schema Schema definition for the node type
     */
    constructor(client: Neo4jClient, schema: Neo4jNodeSchema) {
        this.client = client;
        this.schema = schema;
    }

    /**
     * Initialize the repository (connect, create indexes and constraints).
     */
    async Initialize(): Promise<void> {
        await this.client.Init();

        for (const index of this.schema.indexes ?? []) {
            await this.Write(session => {
                return session.run(BuildIndexQuery(this.GetLabels(), index));
            });
        }
        for (const constraint of this.schema.constraints ?? []) {
            await this.Write(session => {
                return session.run(BuildConstraintQuery(this.GetLabels(), constraint));
            });
        }
    }

    /**
     * Runs work in a READ session and closes it afterwards.
     */
    protected async Read<T>(work: (session: Session) => Promise<T>): Promise<T> {
        return this._withSession(`READ`, work);
    }

    /**
     * Runs work in a WRITE session and closes it afterwards.
     */
    protected async Write<T>(work: (session: Session) => Promise<T>): Promise<T> {
        return this._withSession(`WRITE`, work);
    }

    /**
     * Get the Neo4j labels for this entity type, joined for use in a pattern (`Equipment:Tagged`).
     */
    protected GetLabels(): string {
        return [this.schema.primaryLabel, ...(this.schema.additionalLabels ?? [])].join(`:`);
    }

    /**
     * Extracts the node stored under `key` in each record.
     * @throws StorageError when a record does not hold a node there
     */
    protected NodesOf(records: ReadonlyArray<{ get(key: string): unknown }>, key: string): Neo4jNode[] {
        return records.map(record => {
            const value = record.get(key);

            if (!IsNeo4jNode(value)) {
                throw new StorageError(`Unexpected record shape`, { key, label: this.schema.primaryLabel });
            }
            return value;
        });
    }

    private async _withSession<T>(mode: `READ` | `WRITE`, work: (session: Session) => Promise<T>): Promise<T> {
        const session = await this.client.GetSession(mode);

        try {
            return await work(session);
        } catch (err) {
            throw ToStorageError(err, this.schema.primaryLabel);
        } finally {
            await session.close();
        }
    }
}

/** Wraps driver failures; application errors pass through unchanged. */
export function ToStorageError(err: unknown, label: string): Error {
    if (IsAppError(err)) {
        return err;
    }
    const message = err instanceof Error ? err.message : `Unknown error occurred`;
    return new StorageError(`Neo4j operation failed: ${message}`, { label }, err);
}

function QuoteProperties(properties: readonly string[]): string {
    return properties
        .map(p => {
            return `n.\`${p}\``;
        })
        .join(`, `);
}

/**
 * Cypher for an index definition.
 * @example
 * BuildIndexQuery('Equipment', { name: 'equipment_project', properties: ['projectId'] });
 * // 'CREATE INDEX `equipment_project` IF NOT EXISTS FOR (n:Equipment) ON (n.`projectId`)'
 */
export function BuildIndexQuery(labels: string, index: Neo4jIndexDefinition): string {
    return `CREATE INDEX \`${index.name}\` IF NOT EXISTS FOR (n:${labels}) ON (${QuoteProperties(index.properties)})`;
}

/** Cypher for a constraint definition. */
export function BuildConstraintQuery(labels: string, constraint: Neo4jConstraintDefinition): string {
    const properties = QuoteProperties(constraint.properties);

    switch (constraint.type) {
        case `UNIQUENESS`:
            return `CREATE CONSTRAINT \`${constraint.name}\` IF NOT EXISTS FOR (n:${labels}) REQUIRE (${properties}) IS UNIQUE`;
        case `EXISTENCE`:
            return `CREATE CONSTRAINT \`${constraint.name}\` IF NOT EXISTS FOR (n:${labels}) REQUIRE n.\`${constraint.properties[0]}\` IS NOT NULL`;
        case `NODE_KEY`:
            return `CREATE CONSTRAINT \`${constraint.name}\` IF NOT EXISTS FOR (n:${labels}) REQUIRE (${properties}) IS NODE KEY`;
    }
}
