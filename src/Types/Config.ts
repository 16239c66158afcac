import type { ConfiguredLogLevel } from '../Common/Log.js';
import type { TaggingMode } from '../Domain/index.js';
import type { Neo4jConfig } from '../Repository/Neo4jClient.js';
import type { EquipmentTypeDefinition } from '../Tagging/TypeCodes.js';

/** Storage backend selection. */
export type StorageKind = `memory` | `neo4j`;

/** Project tagging defaults offered to the renumbering pipeline. */
export interface TaggingConfig {
    mode: TaggingMode;
    /** Falls back to the mode's default pattern when absent. */
    defaultPattern?: string;
    startNumber: number;
    increment: number;
}

/** Who and where audit entries are attributed to. Absent fields come from the host. */
export interface IdentityConfig {
    performedBy?: string;
    source?: string;
}

/**
 * Validated configuration shape used across services.
 */
export interface ValidatedConfig {
    logLevel: ConfiguredLogLevel;
    storage: StorageKind;
    /** Required when storage is `neo4j`. */
    neo4j?: Neo4jConfig;
    tagging: TaggingConfig;
    equipmentTypes: EquipmentTypeDefinition[];
    identity: IdentityConfig;
}
