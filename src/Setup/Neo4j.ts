import { Neo4jClient, type Neo4jConfig } from '../Repository/Neo4jClient.js';
import { Neo4jEquipmentStore } from '../Repository/Neo4jEquipmentStore.js';
import { Neo4jAuditSink } from '../Repository/Neo4jAuditSink.js';
import { log } from '../Common/Log.js';

/** Connected Neo4j-backed stores sharing one driver. */
export interface Neo4jStorage {
    client: Neo4jClient;
    store: Neo4jEquipmentStore;
    auditSink: Neo4jAuditSink;
}

/**
 * Connects to Neo4j and creates the indexes and constraints both stores rely on.
 * The caller owns the returned client and closes it on shutdown.
 */
export async function SetupNeo4j(config: Neo4jConfig): Promise<Neo4jStorage> {
    const client = new Neo4jClient(config);
    const store = new Neo4jEquipmentStore(client);
    const auditSink = new Neo4jAuditSink(client);

    try {
        await store.Initialize();
        await auditSink.Initialize();
    } catch (err) {
        await client.Close();
        throw err;
    }
    log.info(`Neo4j storage initialized`, `Setup`, config.database);
    return { client, store, auditSink };
}
