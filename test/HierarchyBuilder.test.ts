import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { HierarchyNode, HierarchySource } from '../src/Domain/index.js';
import { HierarchyBuilder } from '../src/Services/HierarchyBuilder.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { MakeEquipment } from './helpers/Fixtures.js';

function Labels(nodes: readonly HierarchyNode[]): string[] {
    return nodes.map(node => node.label);
}

function LeafIds(nodes: readonly HierarchyNode[]): string[] {
    return nodes.flatMap(node => (node.kind === 'equipment' && node.equipmentRef ? [node.equipmentRef.id] : LeafIds(node.children)));
}

function Source(): HierarchySource {
    return {
        equipment: [
            MakeEquipment({ id: 'a', tag: 'P-101', equipmentType: 'Pump', area: 'A1', drawingId: 'd2' }),
            MakeEquipment({
                id: 'b',
                tag: 'T-201',
                equipmentType: 'Tank',
                area: 'A1',
                drawingId: 'd1',
                description: 'Feed tank',
                upstreamEquipmentId: 'a',
                downstreamEquipmentId: 'd',
            }),
            MakeEquipment({ id: 'c', tag: 'P-102', equipmentType: 'Pump', area: '', drawingId: 'missing', upstreamEquipmentId: 'a' }),
            MakeEquipment({ id: 'd', tag: 'V-301', area: 'A2', upstreamEquipmentId: 'b' }),
            MakeEquipment({ id: 'x', tag: 'X-1', equipmentType: 'Pump', area: 'A1', isActive: false }),
        ],
        lines: [
            { id: 'l2', projectId: 'p-1', lineNumber: 'L-2', fromEquipmentId: 'b', toEquipmentId: 'd', nominalSize: 'DN50' },
            { id: 'l1', projectId: 'p-1', lineNumber: 'L-1', fromEquipmentId: 'a', toEquipmentId: 'b', service: 'Water' },
            { id: 'l3', projectId: 'p-1', lineNumber: 'L-3', fromEquipmentId: 'a', toEquipmentId: 'c' },
        ],
        drawings: [
            { id: 'd1', projectId: 'p-1', drawingNumber: 'PID-002' },
            { id: 'd2', projectId: 'p-1', drawingNumber: 'PID-001' },
            { id: 'd3', projectId: 'p-1', drawingNumber: 'PID-003' },
        ],
        instruments: [
            { id: 'i1', projectId: 'p-1', tag: 'TI-2', parentEquipmentId: 'b' },
            { id: 'i2', projectId: 'p-1', tag: 'LT-1', parentEquipmentId: 'b' },
            { id: 'i3', projectId: 'p-1', tag: 'PI-9', parentEquipmentId: 'a' },
        ],
    };
}

describe('HierarchyBuilder', () => {
    let eventBus: MainEventBus;
    let builder: HierarchyBuilder;

    beforeEach(() => {
        eventBus = new MainEventBus();
        builder = new HierarchyBuilder(eventBus);
    });

    it('should group by area then type with counts', () => {
        const nodes = builder.Build(Source(), 'ByArea');

        expect(Labels(nodes)).toEqual(['A1', 'A2', 'Unassigned']);
        const [a1, a2, unassigned] = nodes;
        expect(Labels(a1.children)).toEqual(['Pump', 'Tank']);
        expect(a1.childCount).toBe(2);
        expect(a1.itemCount).toBe(2);
        expect(Labels(a1.children[0].children)).toEqual(['P-101']);
        expect(Labels(a2.children)).toEqual(['Unknown']);
        expect(Labels(unassigned.children[0].children)).toEqual(['P-102']);
    });

    it('should group by type with leaves ordered by tag', () => {
        const nodes = builder.Build(Source(), 'ByType');

        expect(Labels(nodes)).toEqual(['Pump', 'Tank', 'Unknown']);
        expect(Labels(nodes[0].children)).toEqual(['P-101', 'P-102']);
        expect(nodes[0].itemCount).toBe(2);
        expect(nodes[0].children[0].kind).toBe('equipment');
        expect(nodes[0].children[0].equipmentRef?.id).toBe('a');
    });

    it('should group by drawing number and collect the rest as unassigned', () => {
        const nodes = builder.Build(Source(), 'ByDrawing');

        expect(Labels(nodes)).toEqual(['PID-001', 'PID-002', 'Unassigned']);
        expect(Labels(nodes[2].children)).toEqual(['P-102', 'V-301']);
    });

    it('should follow upstream links under a single process flow root', () => {
        const [root] = builder.Build(Source(), 'ProcessFlow');

        expect(root.label).toBe('Process Flow');
        expect(root.itemCount).toBe(4);
        expect(Labels(root.children)).toEqual(['P-101']);

        const [pump] = root.children;
        expect(Labels(pump.children)).toEqual(['P-102', 'T-201']);
        expect(pump.childCount).toBe(2);
        expect(pump.itemCount).toBe(4);
        expect(Labels(pump.children[1].children)).toEqual(['V-301']);
    });

    it('should mark cycles and still show every member', () => {
        const source: HierarchySource = {
            equipment: [
                MakeEquipment({ id: 'cb', tag: 'B-1', upstreamEquipmentId: 'ca' }),
                MakeEquipment({ id: 'ca', tag: 'A-1', upstreamEquipmentId: 'cb' }),
            ],
            lines: [],
            drawings: [],
        };
        const [root] = builder.Build(source, 'ProcessFlow');

        expect(Labels(root.children)).toEqual(['A-1']);
        const [a] = root.children;
        expect(Labels(a.children)).toEqual(['B-1']);
        const [circular] = a.children[0].children;
        expect(circular.label).toBe('A-1 (circular reference)');
        expect(circular.kind).toBe('circular');
        expect(circular.children).toEqual([]);
        expect(root.itemCount).toBe(2);
    });

    it('should mark self references as circular', () => {
        const source: HierarchySource = {
            equipment: [MakeEquipment({ id: 's', tag: 'S-1', upstreamEquipmentId: 's' })],
            lines: [],
            drawings: [],
        };
        const [root] = builder.Build(source, 'ProcessFlow');

        expect(Labels(root.children)).toEqual(['S-1']);
        expect(Labels(root.children[0].children)).toEqual(['S-1 (circular reference)']);
    });

    it('should handle long chains without recursion limits', () => {
        const equipment = Array.from({ length: 20000 }, (_, index) => {
            return MakeEquipment({
                id: `n${index}`,
                tag: `N-${String(index).padStart(5, '0')}`,
                upstreamEquipmentId: index === 0 ? undefined : `n${index - 1}`,
            });
        });
        const [root] = builder.Build({ equipment, lines: [], drawings: [] }, 'ProcessFlow');

        expect(root.itemCount).toBe(20000);
    });

    it('should filter by tag or description, case-insensitively', () => {
        expect(Labels(builder.Build(Source(), 'ByType', { search: 'p-10' })[0].children)).toEqual(['P-101', 'P-102']);
        expect(Labels(builder.Build(Source(), 'ByType', { search: 'FEED' }))).toEqual(['Tank']);
    });

    it('should treat links to hidden equipment as roots', () => {
        const [root] = builder.Build(Source(), 'ProcessFlow', { search: 'T-201' });
        expect(Labels(root.children)).toEqual(['T-201']);
    });

    it('should place every active equipment exactly once when grouping', () => {
        for (const mode of ['ByArea', 'ByType'] as const) {
            const nodes = builder.Build(Source(), mode);

            expect(LeafIds(nodes).sort()).toEqual(['a', 'b', 'c', 'd']);
            expect(nodes.reduce((total, node) => total + node.itemCount, 0)).toBe(4);
        }
    });

        it('should exclude inactive equipment', () => {
        const nodes = builder.Build(Source(), 'ByType');
        expect(nodes.flatMap(node => Labels(node.children))).not.toContain('X-1');
    });

    it('should leave its inputs untouched and publish the build', () => {
        const source = Source();
        const before = structuredClone(source);
        const built = vi.fn();
        eventBus.On('hierarchy.built', built);

        builder.Build(source, 'ProcessFlow');

        expect(source).toEqual(before);
        expect(built).toHaveBeenCalledWith({ mode: 'ProcessFlow', itemCount: 4 });
    });

    describe('DescribeConnections', () => {
        it('should list neighbours, lines, instruments and drawing', () => {
            const details = builder.DescribeConnections('b', Source());

            expect(details?.drawingNumber).toBe('PID-002');
            expect(details?.connectedEquipment.map(item => [item.relationship, item.equipment.tag])).toEqual([
                ['Upstream', 'P-101'],
                ['Downstream', 'V-301'],
            ]);
            expect(details?.lines).toEqual([
                { lineNumber: 'L-1', service: 'Water', nominalSize: undefined, direction: 'Incoming' },
                { lineNumber: 'L-2', service: undefined, nominalSize: 'DN50', direction: 'Outgoing' },
            ]);
            expect(details?.instruments.map(instrument => instrument.tag)).toEqual(['LT-1', 'TI-2']);
        });

        it('should return null for unknown equipment', () => {
            expect(builder.DescribeConnections('nope', Source())).toBeNull();
        });
    });
});
