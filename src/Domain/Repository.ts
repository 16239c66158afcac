/**
 * Store interfaces the renumbering pipeline consumes.
 * Implementations serialize transactions per project; the core never locks on its own.
 */

import type { Equipment } from './Equipment.js';
import type { UID } from '../Repository/Common/Ids.js';

/** Row filter applied after the project scope. */
export type EquipmentPredicate = (equipment: Equipment) => boolean;

/** A unit of work against one project's equipment. Writes become visible only on commit. */
export interface EquipmentTransaction {
    /** The transaction's project, as seen from inside the transaction (staged writes included). */
    FindByProject(predicate?: EquipmentPredicate): Promise<Equipment[]>;
    GetById(id: UID): Promise<Equipment | null>;
    Update(equipment: Equipment): Promise<void>;
    Commit(): Promise<void>;
    Rollback(): Promise<void>;
    /** False once committed or rolled back. */
    IsActive(): boolean;
}

/** Abstraction for equipment persistence. */
export interface EquipmentStore {
    FindByProject(projectId: UID, predicate?: EquipmentPredicate): Promise<Equipment[]>;
    GetById(id: UID): Promise<Equipment | null>;
    Update(equipment: Equipment): Promise<void>;
    BeginTransaction(projectId: UID): Promise<EquipmentTransaction>;
}
