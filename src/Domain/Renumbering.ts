/**
 * Value types for the renumbering pipeline: Filter -> Select -> Preview -> Conflicts -> Apply.
 * Every step returns new frozen snapshots; nothing is mutated in place.
 */

import type { UID } from '../Repository/Common/Ids.js';
import type { AppError } from '../Common/Errors.js';

/** Conjunctive narrowing of a project's active equipment. Empty fields do not filter. */
export interface RenumberFilter {
    /** Exact equipment type match. */
    equipmentType?: string;
    /** Exact area match. */
    area?: string;
    /** Wildcard over the current tag; `*` matches any run of characters, case-insensitive. */
    tagPattern?: string;
}

/** Transient session view of one equipment record. */
export interface RenumberingCandidate {
    readonly equipmentId: UID;
    readonly currentTag: string;
    readonly equipmentType: string;
    readonly description?: string;
    readonly area?: string;
    readonly selected: boolean;
    /** Empty until a preview is generated. */
    readonly proposedTag: string;
    /** Preview findings (unknown placeholders, format issues). Never block apply. */
    readonly warnings: readonly string[];
}

export type CandidateSet = readonly RenumberingCandidate[];

/** Numbering parameters as entered by an operator; strings are parsed as integers. */
export interface PreviewRequest {
    pattern: string;
    startNumber: number | string;
    increment: number | string;
}

/** Proposed tag already held by active equipment outside the batch. */
export interface StoreConflict {
    readonly proposedTag: string;
    readonly equipmentId: UID;
    readonly conflictingEquipmentId: UID;
}

export interface ConflictReport {
    /** Proposed tags occurring more than once among selected candidates. Hard stop. */
    readonly duplicates: readonly string[];
    /** Collisions with unrelated active equipment. Soft stop. */
    readonly storeConflicts: readonly StoreConflict[];
    /** True when there are no duplicates. */
    readonly canApply: boolean;
    /** True when apply needs an explicit override. */
    readonly requiresOverride: boolean;
}

export interface ApplyOptions {
    overrideSoftConflicts?: boolean;
}

export interface RenumberItemError {
    readonly equipmentId: UID;
    readonly currentTag: string;
    readonly proposedTag: string;
    readonly message: string;
}

export interface RenumberSkip {
    readonly equipmentId: UID;
    readonly currentTag: string;
    readonly reason: `not-found` | `unchanged`;
}

export interface RenamedItem {
    readonly equipmentId: UID;
    readonly oldTag: string;
    readonly newTag: string;
}

export interface RenumberResult {
    readonly committed: boolean;
    readonly successCount: number;
    readonly errorCount: number;
    readonly errors: readonly RenumberItemError[];
    readonly skipped: readonly RenumberSkip[];
    readonly renamed: readonly RenamedItem[];
    /** Set when the transaction rolled back. */
    readonly fatalError?: AppError;
}

/** Distinct filter values present in a project. */
export interface FilterOptions {
    readonly equipmentTypes: readonly string[];
    readonly areas: readonly string[];
}
