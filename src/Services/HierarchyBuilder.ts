/**
 * Projects the equipment catalog into navigable trees: by area, by type, by drawing, or along
 * upstream/downstream process links.
 */

import type {
    ConnectedEquipment,
    ConnectedLine,
    ConnectionDetails,
    Equipment,
    HierarchyMode,
    HierarchyNode,
    HierarchyOptions,
    HierarchySource,
} from '../Domain/index.js';
import { EVENT_NAMES } from '../Domain/index.js';
import type { UID } from '../Repository/Common/Ids.js';
import { InternalError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { CompareOrdinal, GroupSorted, SortByKey } from '../Common/Ordering.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';

export const UNASSIGNED_LABEL = `Unassigned`;
export const UNKNOWN_LABEL = `Unknown`;
export const PROCESS_FLOW_LABEL = `Process Flow`;
export const CIRCULAR_SUFFIX = ` (circular reference)`;

const ByTag = (item: Equipment): string => {
    return item.tag;
};

function Leaf(equipment: Equipment): HierarchyNode {
    return Object.freeze({
        kind: `equipment`,
        label: equipment.tag,
        childCount: 0,
        itemCount: 1,
        children: Object.freeze([]),
        equipmentRef: equipment,
    });
}

function CircularLeaf(equipment: Equipment): HierarchyNode {
    return Object.freeze({
        kind: `circular`,
        label: `${equipment.tag}${CIRCULAR_SUFFIX}`,
        childCount: 0,
        itemCount: 0,
        children: Object.freeze([]),
        equipmentRef: equipment,
    });
}

function CountItems(children: readonly HierarchyNode[]): number {
    return children.reduce((sum, child) => {
        return sum + child.itemCount;
    }, 0);
}

function Group(label: string, children: HierarchyNode[]): HierarchyNode {
    return Object.freeze({
        kind: `group`,
        label,
        childCount: children.length,
        itemCount: CountItems(children),
        children: Object.freeze(children),
    });
}

function Leaves(equipment: readonly Equipment[]): HierarchyNode[] {
    return SortByKey(equipment, ByTag).map(Leaf);
}

/**
 * Active equipment matching the search text (case-insensitive substring of tag or description).
 */
export function SelectVisible(equipment: readonly Equipment[], search?: string): Equipment[] {
    const needle = search?.trim().toLowerCase() ?? ``;

    return equipment.filter(item => {
        if (!item.isActive) {
            return false;
        }
        if (!needle) {
            return true;
        }
        return item.tag.toLowerCase().includes(needle) || (item.description ?? ``).toLowerCase().includes(needle);
    });
}

/** Area → Type → Equipment. Empty areas group under `Unassigned`, empty types under `Unknown`. */
export function BuildByArea(equipment: readonly Equipment[]): HierarchyNode[] {
    return GroupSorted(equipment, item => {
        return item.area || UNASSIGNED_LABEL;
    }).map(([area, inArea]) => {
        const types = GroupSorted(inArea, item => {
            return item.equipmentType || UNKNOWN_LABEL;
        }).map(([type, ofType]) => {
            return Group(type, Leaves(ofType));
        });
        return Group(area, types);
    });
}

/** Type → Equipment. */
export function BuildByType(equipment: readonly Equipment[]): HierarchyNode[] {
    return GroupSorted(equipment, item => {
        return item.equipmentType || UNKNOWN_LABEL;
    }).map(([type, ofType]) => {
        return Group(type, Leaves(ofType));
    });
}

/**
 * Drawing → Equipment, drawings ordered by number. Drawings without equipment are omitted;
 * equipment without a known drawing goes into a trailing `Unassigned` group.
 */
export function BuildByDrawing(equipment: readonly Equipment[], source: HierarchySource): HierarchyNode[] {
    const knownDrawings = new Set(
        source.drawings.map(drawing => {
            return drawing.id;
        }),
    );
    const byDrawing = new Map<UID, Equipment[]>();
    const unassigned: Equipment[] = [];

    for (const item of equipment) {
        if (item.drawingId && knownDrawings.has(item.drawingId)) {
            const bucket = byDrawing.get(item.drawingId);

            if (bucket) {
                bucket.push(item);
            } else {
                byDrawing.set(item.drawingId, [item]);
            }
        } else {
            unassigned.push(item);
        }
    }

    const nodes: HierarchyNode[] = [];
    const emitted = new Set<UID>();

    for (const drawing of SortByKey(source.drawings, drawing => {
        return drawing.drawingNumber;
    })) {
        const onDrawing = byDrawing.get(drawing.id);

        if (!onDrawing || emitted.has(drawing.id)) {
            continue;
        }
        emitted.add(drawing.id);
        nodes.push(Group(drawing.drawingNumber, Leaves(onDrawing)));
    }
    if (unassigned.length > 0) {
        nodes.push(Group(UNASSIGNED_LABEL, Leaves(unassigned)));
    }
    return nodes;
}

interface FlowFrame {
    equipment: Equipment;
    pending: readonly Equipment[];
    index: number;
    built: HierarchyNode[];
}

/**
 * Expands one flow tree depth-first without recursion. The visited set holds the current path only,
 * so an item reachable along two branches appears under both; revisiting an ancestor emits a circular leaf.
 */
function ExpandFlow(root: Equipment, childrenOf: ReadonlyMap<UID, readonly Equipment[]>, reached: Set<UID>): HierarchyNode {
    const path = new Set<UID>();
    const stack: FlowFrame[] = [];
    let result: HierarchyNode | undefined;

    const open = (equipment: Equipment): void => {
        path.add(equipment.id);
        reached.add(equipment.id);
        stack.push({ equipment, pending: childrenOf.get(equipment.id) ?? [], index: 0, built: [] });
    };

    open(root);

    while (stack.length > 0) {
        const frame = stack[stack.length - 1];

        if (frame.index < frame.pending.length) {
            const next = frame.pending[frame.index];
            frame.index++;

            if (path.has(next.id)) {
                frame.built.push(CircularLeaf(next));
            } else {
                open(next);
            }
            continue;
        }

        stack.pop();
        path.delete(frame.equipment.id);
        const node: HierarchyNode = Object.freeze({
            kind: `equipment`,
            label: frame.equipment.tag,
            childCount: frame.built.length,
            itemCount: 1 + CountItems(frame.built),
            children: Object.freeze(frame.built),
            equipmentRef: frame.equipment,
        });
        const parent = stack[stack.length - 1];

        if (parent) {
            parent.built.push(node);
        } else {
            result = node;
        }
    }
    if (!result) {
        throw new InternalError(`Process flow expansion produced no node`, { root: root.id });
    }
    return result;
}

/**
 * Single `Process Flow` root. Flow roots are items whose upstream link is empty or points outside the
 * visible set; children are items naming the parent as upstream, ordered by tag. Components with no
 * root (pure cycles) are entered from their lowest tag so every item appears.
 */
export function BuildProcessFlow(equipment: readonly Equipment[]): HierarchyNode[] {
    const ordered = SortByKey(equipment, ByTag);
    const visibleIds = new Set(
        ordered.map(item => {
            return item.id;
        }),
    );
    const childrenOf = new Map<UID, Equipment[]>();
    const roots: Equipment[] = [];

    for (const item of ordered) {
        const upstream = item.upstreamEquipmentId;

        if (upstream && visibleIds.has(upstream)) {
            const siblings = childrenOf.get(upstream);

            if (siblings) {
                siblings.push(item);
            } else {
                childrenOf.set(upstream, [item]);
            }
        } else {
            roots.push(item);
        }
    }

    const reached = new Set<UID>();
    const trees = roots.map(root => {
        return ExpandFlow(root, childrenOf, reached);
    });

    for (const item of ordered) {
        if (!reached.has(item.id)) {
            trees.push(ExpandFlow(item, childrenOf, reached));
        }
    }
    return [Group(PROCESS_FLOW_LABEL, trees)];
}

/**
 * Upstream/downstream equipment, connected lines, attached instruments and drawing of one item.
 * @returns ConnectionDetails | null - Null when the id is not in the source
 */
export function DescribeConnections(equipmentId: UID, source: HierarchySource): ConnectionDetails | null {
    const byId = new Map(
        source.equipment.map(item => {
            return [item.id, item] as const;
        }),
    );
    const equipment = byId.get(equipmentId);

    if (!equipment) {
        return null;
    }
    const connectedEquipment: ConnectedEquipment[] = [];
    const upstream = equipment.upstreamEquipmentId ? byId.get(equipment.upstreamEquipmentId) : undefined;
    const downstream = equipment.downstreamEquipmentId ? byId.get(equipment.downstreamEquipmentId) : undefined;

    if (upstream) {
        connectedEquipment.push({ equipment: upstream, relationship: `Upstream` });
    }
    if (downstream) {
        connectedEquipment.push({ equipment: downstream, relationship: `Downstream` });
    }

    const lines: ConnectedLine[] = source.lines
        .filter(line => {
            return line.fromEquipmentId === equipmentId || line.toEquipmentId === equipmentId;
        })
        .sort((a, b) => {
            return CompareOrdinal(a.lineNumber, b.lineNumber);
        })
        .map((line): ConnectedLine => {
            return {
                lineNumber: line.lineNumber,
                service: line.service,
                nominalSize: line.nominalSize,
                direction: line.fromEquipmentId === equipmentId ? `Outgoing` : `Incoming`,
            };
        });
    const instruments = SortByKey(
        (source.instruments ?? []).filter(instrument => {
            return instrument.parentEquipmentId === equipmentId;
        }),
        instrument => {
            return instrument.tag;
        },
    );
    const drawing = equipment.drawingId
        ? source.drawings.find(candidate => {
              return candidate.id === equipment.drawingId;
          })
        : undefined;

    return Object.freeze({
        equipment,
        drawingNumber: drawing?.drawingNumber,
        connectedEquipment: Object.freeze(connectedEquipment),
        lines: Object.freeze(lines),
        instruments: Object.freeze(instruments),
    });
}

/**
 * HierarchyBuilder rebuilds a projection from scratch on every call; inputs are never mutated.
 */
export class HierarchyBuilder {
    private readonly _eventBus: MainEventBus;

    constructor(eventBus: MainEventBus = MAIN_EVENT_BUS) {
        this._eventBus = eventBus;
    }

    /**
     * @example
     * const [root] = builder.Build(source, 'ProcessFlow');
     * root.label; // 'Process Flow'
     */
    Build(source: HierarchySource, mode: HierarchyMode, options: HierarchyOptions = {}): HierarchyNode[] {
        const visible = SelectVisible(source.equipment, options.search);
        let nodes: HierarchyNode[];

        switch (mode) {
            case `ByArea`:
                nodes = BuildByArea(visible);
                break;
            case `ByType`:
                nodes = BuildByType(visible);
                break;
            case `ByDrawing`:
                nodes = BuildByDrawing(visible, source);
                break;
            case `ProcessFlow`:
                nodes = BuildProcessFlow(visible);
                break;
            default:
                throw new ValidationError(`Unknown hierarchy mode`, { mode: String(mode) });
        }
        this._eventBus.Emit(EVENT_NAMES.hierarchyBuilt, { mode, itemCount: CountItems(nodes) });
        log.debug(`Built ${mode} hierarchy over ${visible.length} items`, `HierarchyBuilder`);
        return nodes;
    }

    DescribeConnections(equipmentId: UID, source: HierarchySource): ConnectionDetails | null {
        return DescribeConnections(equipmentId, source);
    }
}
