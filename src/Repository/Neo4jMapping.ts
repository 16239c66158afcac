/**
 * Translation between domain records and flat Neo4j node properties.
 * Nested values (process parameters, audit snapshots) are stored as JSON strings.
 */

import type {
    AuditAction,
    AuditLogEntry,
    AuditSnapshot,
    Equipment,
    EquipmentStatus,
    ProcessParameters,
    SnapshotValue,
} from '../Domain/index.js';
import { AUDIT_ACTIONS, PROCESS_PARAMETER_NAMES } from '../Domain/index.js';
import { StorageError } from '../Common/Errors.js';
import type { Neo4jProperties } from '../Types/Repository/index.js';

const EQUIPMENT_STATUSES: readonly EquipmentStatus[] = [`Planned`, `Installed`, `Commissioned`, `Decommissioned`];

function OptionalString(properties: Record<string, unknown>, key: string): string | undefined {
    const value = properties[key];
    return typeof value === `string` && value.length > 0 ? value : undefined;
}

function RequiredString(properties: Record<string, unknown>, key: string, label: string): string {
    const value = properties[key];

    if (typeof value !== `string`) {
        throw new StorageError(`${label} node is missing '${key}'`, { key, id: properties.id });
    }
    return value;
}

function IsEquipmentStatus(value: unknown): value is EquipmentStatus {
    return EQUIPMENT_STATUSES.some(status => {
        return status === value;
    });
}

function IsAuditAction(value: unknown): value is AuditAction {
    return AUDIT_ACTIONS.some(action => {
        return action === value;
    });
}

function IsSnapshotValue(value: unknown): value is SnapshotValue {
    return value === null || [`string`, `number`, `boolean`].includes(typeof value);
}

function ParseJsonObject(json: string, what: string): Record<string, unknown> {
    let parsed: unknown;

    try {
        parsed = JSON.parse(json);
    } catch (err) {
        throw new StorageError(`Stored ${what} is not valid JSON`, { what }, err);
    }
    if (typeof parsed !== `object` || parsed === null || Array.isArray(parsed)) {
        throw new StorageError(`Stored ${what} is not an object`, { what });
    }
    return Object.fromEntries(Object.entries(parsed));
}

/**
 * Parses stored process parameters, keeping only known names with numeric values.
 * @example
 * ParseProcessParameters('{"flowRate":{"value":12,"unit":"m3/h"}}'); // { flowRate: { value: 12, unit: 'm3/h' } }
 */
export function ParseProcessParameters(json: string): ProcessParameters {
    const raw = ParseJsonObject(json, `process parameters`);
    const parameters: ProcessParameters = {};

    for (const name of PROCESS_PARAMETER_NAMES) {
        const entry = raw[name];

        if (typeof entry !== `object` || entry === null) {
            continue;
        }
        const value: unknown = Reflect.get(entry, `value`);
        const unit: unknown = Reflect.get(entry, `unit`);

        if (typeof value === `number`) {
            parameters[name] = typeof unit === `string` ? { value, unit } : { value };
        }
    }
    return parameters;
}

/** Parses a stored audit snapshot; non-scalar values are rejected. */
export function ParseSnapshot(json: string): AuditSnapshot {
    const raw = ParseJsonObject(json, `audit snapshot`);
    const snapshot: Record<string, SnapshotValue> = {};

    for (const [key, value] of Object.entries(raw)) {
        if (!IsSnapshotValue(value)) {
            throw new StorageError(`Audit snapshot value is not a scalar`, { key });
        }
        snapshot[key] = value;
    }
    return snapshot;
}

/** Flattens equipment into node properties. Absent optionals become null so `SET n = $props` clears them. */
export function EquipmentToProperties(equipment: Equipment): Neo4jProperties {
    return {
        id: equipment.id,
        projectId: equipment.projectId,
        tag: equipment.tag,
        equipmentType: equipment.equipmentType ?? null,
        description: equipment.description ?? null,
        service: equipment.service ?? null,
        area: equipment.area ?? null,
        status: equipment.status,
        manufacturer: equipment.manufacturer ?? null,
        model: equipment.model ?? null,
        processJson: equipment.process ? JSON.stringify(equipment.process) : null,
        drawingId: equipment.drawingId ?? null,
        upstreamEquipmentId: equipment.upstreamEquipmentId ?? null,
        downstreamEquipmentId: equipment.downstreamEquipmentId ?? null,
        isActive: equipment.isActive,
        createdAt: equipment.createdAt,
        modifiedAt: equipment.modifiedAt ?? null,
        modifiedBy: equipment.modifiedBy ?? null,
    };
}

/**
 * Rebuilds equipment from node properties.
 * @throws StorageError when identifying fields are missing or malformed
 */
export function EquipmentFromProperties(properties: Record<string, unknown>): Equipment {
    const status = properties.status;
    const processJson = OptionalString(properties, `processJson`);
    const equipment: Equipment = {
        id: RequiredString(properties, `id`, `Equipment`),
        projectId: RequiredString(properties, `projectId`, `Equipment`),
        tag: RequiredString(properties, `tag`, `Equipment`),
        equipmentType: OptionalString(properties, `equipmentType`),
        description: OptionalString(properties, `description`),
        service: OptionalString(properties, `service`),
        area: OptionalString(properties, `area`),
        status: IsEquipmentStatus(status) ? status : `Planned`,
        manufacturer: OptionalString(properties, `manufacturer`),
        model: OptionalString(properties, `model`),
        drawingId: OptionalString(properties, `drawingId`),
        upstreamEquipmentId: OptionalString(properties, `upstreamEquipmentId`),
        downstreamEquipmentId: OptionalString(properties, `downstreamEquipmentId`),
        isActive: properties.isActive !== false,
        createdAt: RequiredString(properties, `createdAt`, `Equipment`),
        modifiedAt: OptionalString(properties, `modifiedAt`),
        modifiedBy: OptionalString(properties, `modifiedBy`),
    };

    if (processJson) {
        equipment.process = ParseProcessParameters(processJson);
    }
    return equipment;
}

/** Flattens an audit entry into node properties. */
export function AuditEntryToProperties(entry: AuditLogEntry): Neo4jProperties {
    return {
        id: entry.id,
        entityType: entry.entityType,
        entityId: entry.entityId,
        action: entry.action,
        performedBy: entry.performedBy,
        timestampUtc: entry.timestampUtc,
        changeSummary: entry.changeSummary,
        oldSnapshotJson: entry.oldSnapshot ? JSON.stringify(entry.oldSnapshot) : null,
        newSnapshotJson: entry.newSnapshot ? JSON.stringify(entry.newSnapshot) : null,
        projectId: entry.projectId ?? null,
        source: entry.source ?? null,
    };
}

/** Rebuilds an audit entry from node properties. */
export function AuditEntryFromProperties(properties: Record<string, unknown>): AuditLogEntry {
    const action = properties.action;

    if (!IsAuditAction(action)) {
        throw new StorageError(`Audit entry has an unknown action`, { action, id: properties.id });
    }
    const oldSnapshotJson = OptionalString(properties, `oldSnapshotJson`);
    const newSnapshotJson = OptionalString(properties, `newSnapshotJson`);
    const projectId = OptionalString(properties, `projectId`);
    const source = OptionalString(properties, `source`);

    return {
        id: RequiredString(properties, `id`, `AuditLogEntry`),
        entityType: RequiredString(properties, `entityType`, `AuditLogEntry`),
        entityId: typeof properties.entityId === `string` ? properties.entityId : ``,
        action,
        performedBy: RequiredString(properties, `performedBy`, `AuditLogEntry`),
        timestampUtc: RequiredString(properties, `timestampUtc`, `AuditLogEntry`),
        changeSummary: typeof properties.changeSummary === `string` ? properties.changeSummary : ``,
        ...(oldSnapshotJson ? { oldSnapshot: ParseSnapshot(oldSnapshotJson) } : {}),
        ...(newSnapshotJson ? { newSnapshot: ParseSnapshot(newSnapshotJson) } : {}),
        ...(projectId ? { projectId } : {}),
        ...(source ? { source } : {}),
    };
}
