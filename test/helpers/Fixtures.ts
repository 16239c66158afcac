import type { Equipment } from '../../src/Domain/index.js';

export const PROJECT = 'p-1';
export const CREATED_AT = '2026-01-01T00:00:00.000Z';

/** Active, installed equipment in PROJECT unless overridden. */
export function MakeEquipment(overrides: Partial<Equipment> & Pick<Equipment, 'id' | 'tag'>): Equipment {
    return {
        projectId: PROJECT,
        status: 'Installed',
        isActive: true,
        createdAt: CREATED_AT,
        ...overrides,
    };
}

/** Fixed clock returning the given instant. */
export function FixedClock(iso: string): () => Date {
    return () => {
        return new Date(iso);
    };
}
