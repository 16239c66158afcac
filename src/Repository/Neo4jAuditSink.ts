import type { AuditLogEntry, AuditQueryFilter, AuditSink } from '../Domain/index.js';
import type { UID } from './Common/Ids.js';
import { BaseRepository } from './BaseRepository.js';
import { Neo4jClient } from './Neo4jClient.js';
import { AuditEntryFromProperties, AuditEntryToProperties } from './Neo4jMapping.js';

/** Cypher WHERE clause plus parameters for an audit query. */
export interface AuditCypherFilter {
    where: string;
    params: Record<string, string>;
}

/**
 * Builds the WHERE clause for an audit query. ISO-8601 UTC timestamps compare correctly as strings.
 * @example
 * BuildAuditWhere('p-1', { action: 'Updated' });
 * // { where: 'WHERE n.projectId = $projectId AND n.action = $action', params: { projectId: 'p-1', action: 'Updated' } }
 */
export function BuildAuditWhere(projectId: UID | null, filter: AuditQueryFilter): AuditCypherFilter {
    const conditions: string[] = [];
    const params: Record<string, string> = {};

    if (projectId !== null) {
        conditions.push(`n.projectId = $projectId`);
        params.projectId = projectId;
    }
    if (filter.entityType !== undefined) {
        conditions.push(`n.entityType = $entityType`);
        params.entityType = filter.entityType;
    }
    if (filter.entityId !== undefined) {
        conditions.push(`n.entityId = $entityId`);
        params.entityId = filter.entityId;
    }
    if (filter.action !== undefined) {
        conditions.push(`n.action = $action`);
        params.action = filter.action;
    }
    if (filter.sinceUtc) {
        conditions.push(`n.timestampUtc >= $sinceUtc`);
        params.sinceUtc = filter.sinceUtc.toISOString();
    }
    if (filter.untilUtc) {
        conditions.push(`n.timestampUtc <= $untilUtc`);
        params.untilUtc = filter.untilUtc.toISOString();
    }
    return { where: conditions.length > 0 ? `WHERE ${conditions.join(` AND `)}` : ``, params };
}

/**
 * Append-only audit storage over Neo4j. Only CREATE and MATCH queries are issued.
 */
export class Neo4jAuditSink extends BaseRepository implements AuditSink {
    constructor(client: Neo4jClient) {
        super(client, {
            primaryLabel: `AuditLogEntry`,
            indexes: [
                { name: `audit_project`, properties: [`projectId`] },
                { name: `audit_timestamp`, properties: [`timestampUtc`] },
                { name: `audit_entity`, properties: [`entityType`, `entityId`] },
            ],
            constraints: [{ name: `audit_id_unique`, type: `UNIQUENESS`, properties: [`id`] }],
        });
    }

    async Record(entry: AuditLogEntry): Promise<void> {
        await this.Write(session => {
            return session.run(`CREATE (n:${this.GetLabels()} $props)`, { props: AuditEntryToProperties(entry) });
        });
    }

    async Query(projectId: UID | null, filter: AuditQueryFilter = {}): Promise<AuditLogEntry[]> {
        const { where, params } = BuildAuditWhere(projectId, filter);
        const records = await this.Read(async session => {
            const result = await session.run(`MATCH (n:${this.GetLabels()}) ${where} RETURN n ORDER BY n.timestampUtc DESC`, params);
            return result.records;
        });
        return this.NodesOf(records, `n`).map(node => {
            return AuditEntryFromProperties(node.properties);
        });
    }
}
