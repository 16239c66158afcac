/**
 * Interfaces and types for Neo4j node translation and repository setup.
 */

/**
 * Represents a Neo4j node as returned by the driver: labels plus raw properties.
 */
export interface Neo4jNode {
    /** Node labels (e.g., ['Equipment']) */
    labels: string[];
    /** Node properties as key-value pairs, not yet validated */
    properties: Record<string, unknown>;
}

/** Property values the repositories write. Null removes the property under `SET n = $props`. */
export type Neo4jPropertyValue = string | number | boolean | null;

export type Neo4jProperties = Record<string, Neo4jPropertyValue>;

/**
 * Schema definition for a node type: labels plus the indexes and constraints created on initialize.
 */
export interface Neo4jNodeSchema {
    /** Primary label for the Neo4j node */
    primaryLabel: string;
    /** Additional labels to apply */
    additionalLabels?: string[];
    /** Indexes to create for this node type */
    indexes?: Neo4jIndexDefinition[];
    /** Constraints to apply */
    constraints?: Neo4jConstraintDefinition[];
}

/**
 * Index definition for Neo4j.
 */
export interface Neo4jIndexDefinition {
    /** Index name */
    name: string;
    /** Properties to index */
    properties: string[];
}

/**
 * Constraint definition for Neo4j.
 */
export interface Neo4jConstraintDefinition {
    /** Constraint name */
    name: string;
    /** Constraint type */
    type: 'UNIQUENESS' | 'EXISTENCE' | 'NODE_KEY';
    /** Properties involved in the constraint */
    properties: string[];
}

/** Narrows a driver record value to a node shape. */
export function IsNeo4jNode(value: unknown): value is Neo4jNode {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const properties: unknown = Reflect.get(value, 'properties');
    const labels: unknown = Reflect.get(value, 'labels');
    return typeof properties === 'object' && properties !== null && Array.isArray(labels);
}
