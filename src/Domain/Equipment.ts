/**
 * Plant catalog entities: equipment, piping lines, drawings and instruments.
 * These interfaces define the shapes shared by the renumbering pipeline and the hierarchy builder.
 */

import type { UID } from '../Repository/Common/Ids.js';

/** Lifecycle status of a piece of equipment. */
export type EquipmentStatus = `Planned` | `Installed` | `Commissioned` | `Decommissioned`;

/** Tagging convention a project follows. Fixed once tags are assigned. */
export type TaggingMode = `Custom` | `KKS`;

/** Process parameter names tracked on equipment. */
export const PROCESS_PARAMETER_NAMES = [
    `operatingPressure`,
    `operatingTemperature`,
    `flowRate`,
    `designPressure`,
    `designTemperature`,
    `powerOrCapacity`,
] as const;

export type ProcessParameterName = (typeof PROCESS_PARAMETER_NAMES)[number];

/** One measured or design value with its unit (bar, C, m3/h, kW, ...). */
export interface ProcessParameter {
    value: number;
    unit?: string;
}

export type ProcessParameters = Partial<Record<ProcessParameterName, ProcessParameter>>;

/**
 * A tagged physical item tracked per project.
 * Tags are unique among active equipment of the same project; upstream/downstream links are single
 * optional references and may form cycles.
 */
export interface Equipment {
    id: UID;
    projectId: UID;
    /** Human readable identifier, e.g. `P-100-PMP-001` or `+LAA 10 CP001`. */
    tag: string;
    equipmentType?: string;
    description?: string;
    service?: string;
    area?: string;
    status: EquipmentStatus;
    manufacturer?: string;
    model?: string;
    process?: ProcessParameters;
    /** Source drawing the equipment was extracted from. */
    drawingId?: UID;
    upstreamEquipmentId?: UID;
    downstreamEquipmentId?: UID;
    /** Soft-delete flag. */
    isActive: boolean;
    createdAt: string; // ISO-8601
    modifiedAt?: string; // ISO-8601
    modifiedBy?: string;
}

/** A piping line connecting two pieces of equipment. */
export interface Line {
    id: UID;
    projectId: UID;
    lineNumber: string;
    service?: string;
    nominalSize?: string;
    fromEquipmentId?: UID;
    toEquipmentId?: UID;
    drawingId?: UID;
}

/** A P&ID drawing document. */
export interface Drawing {
    id: UID;
    projectId: UID;
    drawingNumber: string;
    title?: string;
    revision?: string;
}

/** A transmitter, indicator or controller attached to equipment. */
export interface Instrument {
    id: UID;
    projectId: UID;
    tag: string;
    instrumentType?: string;
    parentEquipmentId?: UID;
}
