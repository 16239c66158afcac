/**
 * Tree projections of the equipment catalog. Rebuilt from scratch on every mode or filter change.
 */

import type { Drawing, Equipment, Instrument, Line } from './Equipment.js';

export type HierarchyMode = `ByArea` | `ByType` | `ByDrawing` | `ProcessFlow`;

export const HIERARCHY_MODES: readonly HierarchyMode[] = [`ByArea`, `ByType`, `ByDrawing`, `ProcessFlow`];

export type HierarchyNodeKind = `group` | `equipment` | `circular`;

export interface HierarchyNode {
    readonly kind: HierarchyNodeKind;
    readonly label: string;
    /** Number of direct children. */
    readonly childCount: number;
    /** Equipment nodes in this subtree, the node itself included; circular markers count 0. */
    readonly itemCount: number;
    readonly children: readonly HierarchyNode[];
    /** Present on equipment and circular leaves only. */
    readonly equipmentRef?: Equipment;
}

/** Catalog sets a hierarchy is projected from. Inputs are never mutated. */
export interface HierarchySource {
    equipment: readonly Equipment[];
    lines: readonly Line[];
    drawings: readonly Drawing[];
    instruments?: readonly Instrument[];
}

export interface HierarchyOptions {
    /** Case-insensitive substring over tag or description. */
    search?: string;
}

export interface ConnectedLine {
    readonly lineNumber: string;
    readonly service?: string;
    readonly nominalSize?: string;
    readonly direction: `Outgoing` | `Incoming`;
}

export interface ConnectedEquipment {
    readonly equipment: Equipment;
    readonly relationship: `Upstream` | `Downstream`;
}

export interface ConnectionDetails {
    readonly equipment: Equipment;
    readonly drawingNumber?: string;
    readonly connectedEquipment: readonly ConnectedEquipment[];
    readonly lines: readonly ConnectedLine[];
    readonly instruments: readonly Instrument[];
}
