/**
 * Batch renumbering pipeline: load candidates, select, preview, check conflicts, apply.
 *
 * Candidate sets are immutable; every step returns a new set. Apply checks conflicts, renames and
 * records one audit entry per renamed item inside one store transaction; any failure rolls it back.
 */

import type {
    ApplyOptions,
    AuditLogDraft,
    CandidateSet,
    ConflictReport,
    Equipment,
    EquipmentStore,
    EquipmentTransaction,
    FilterOptions,
    IdentitySource,
    PreviewRequest,
    RenamedItem,
    RenumberFilter,
    RenumberingCandidate,
    RenumberItemError,
    RenumberResult,
    RenumberSkip,
    StoreConflict,
    TaggingMode,
} from '../Domain/index.js';
import { EVENT_NAMES } from '../Domain/index.js';
import type { UID } from '../Repository/Common/Ids.js';
import {
    type AppError,
    ConflictError,
    DescribeError,
    IsAppError,
    SoftConflictError,
    StorageError,
    ValidationError,
} from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { DistinctSorted, SortByKey } from '../Common/Ordering.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { Expand, FindUnknownPlaceholders } from '../Tagging/TagPatternEngine.js';
import { ValidateTagFormat } from '../Tagging/TagFormat.js';
import { CompileTagWildcard } from '../Tagging/TagWildcard.js';
import { NextSequenceNumber } from '../Tagging/SequenceNumbers.js';
import { CreateTypeCodeLookup, type TypeCodeLookup } from '../Tagging/TypeCodes.js';
import { AuditTrailRecorder, BuildEquipmentUpdateDraft } from './AuditTrailRecorder.js';
import { metricsService } from './MetricsService.js';

const FROM = `RenumberService`;
export const UNKNOWN_TYPE = `Unknown`;
export const RENUMBERING_OPERATION = `Tag renumbering`;

export interface RenumberServiceOptions {
    store: EquipmentStore;
    audit: AuditTrailRecorder;
    identity: IdentitySource;
    typeCodes?: TypeCodeLookup;
    /** When set, previews warn about tags that break the mode's format. */
    taggingMode?: TaggingMode;
    eventBus?: MainEventBus;
    clock?: () => Date;
}

/** Which candidates to select: all, none, or an explicit id set. */
export type CandidateSelection = `all` | `none` | Iterable<UID>;

/** Parameters after parsing. */
export interface NumberingParameters {
    pattern: string;
    startNumber: number;
    increment: number;
}

const INTEGER_TEXT = /^[+-]?\d+$/;

function ParseInteger(value: number | string): number | null {
    if (typeof value === `number`) {
        return Number.isSafeInteger(value) ? value : null;
    }
    const trimmed = value.trim();

    if (!INTEGER_TEXT.test(trimmed)) {
        return null;
    }
    const parsed = Number.parseInt(trimmed, 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Validates operator input for a preview.
 * @throws ValidationError for an empty pattern, a non-integer start or an increment below 1
 * @example
 * ParseNumberingParameters({ pattern: ' P-{SEQ:000} ', startNumber: '10', increment: 5 });
 * // { pattern: 'P-{SEQ:000}', startNumber: 10, increment: 5 }
 */
export function ParseNumberingParameters(request: PreviewRequest): NumberingParameters {
    const pattern = request.pattern.trim();

    if (!pattern) {
        throw new ValidationError(`Please enter a renumbering pattern`);
    }
    const startNumber = ParseInteger(request.startNumber);

    if (startNumber === null) {
        throw new ValidationError(`Invalid start number`, { startNumber: request.startNumber });
    }
    const increment = ParseInteger(request.increment);

    if (increment === null || increment < 1) {
        throw new ValidationError(`Increment must be a whole number of at least 1`, { increment: request.increment });
    }
    return { pattern, startNumber, increment };
}

/**
 * Applies a filter to equipment records. Empty filter fields match everything; the tag wildcard is
 * trimmed, and a blank one means no tag filter.
 */
export function FilterEquipment(equipment: readonly Equipment[], filter: RenumberFilter): Equipment[] {
    const tagPattern = filter.tagPattern?.trim();
    const wildcard = tagPattern ? CompileTagWildcard(tagPattern) : null;

    return equipment.filter(item => {
        if (filter.equipmentType && item.equipmentType !== filter.equipmentType) {
            return false;
        }
        if (filter.area && item.area !== filter.area) {
            return false;
        }
        return !wildcard || wildcard.test(item.tag);
    });
}

function ToCandidate(equipment: Equipment): RenumberingCandidate {
    return Object.freeze({
        equipmentId: equipment.id,
        currentTag: equipment.tag,
        equipmentType: equipment.equipmentType || UNKNOWN_TYPE,
        description: equipment.description,
        area: equipment.area,
        selected: false,
        proposedTag: ``,
        warnings: Object.freeze([]),
    });
}

function Freeze(candidates: RenumberingCandidate[]): CandidateSet {
    return Object.freeze(candidates);
}

/** Selected rows that carry a proposed tag, in candidate order. */
export function RowsToApply(candidates: CandidateSet): RenumberingCandidate[] {
    return candidates.filter(candidate => {
        return candidate.selected && candidate.proposedTag !== ``;
    });
}

/** Proposed tags occurring more than once, in order of first appearance. Comparison is exact. */
export function FindDuplicateTags(rows: readonly RenumberingCandidate[]): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();

    for (const row of rows) {
        if (seen.has(row.proposedTag)) {
            duplicates.add(row.proposedTag);
        }
        seen.add(row.proposedTag);
    }
    return Array.from(duplicates);
}

/**
 * Collisions between selected proposals and active equipment outside the batch.
 * @param active The project's active equipment
 */
export function FindStoreConflicts(rows: readonly RenumberingCandidate[], active: readonly Equipment[]): StoreConflict[] {
    const batchIds = new Set(
        rows.map(row => {
            return row.equipmentId;
        }),
    );
    const holders = new Map<string, UID[]>();

    for (const item of active) {
        if (batchIds.has(item.id)) {
            continue;
        }
        const existing = holders.get(item.tag);

        if (existing) {
            existing.push(item.id);
        } else {
            holders.set(item.tag, [item.id]);
        }
    }

    const conflicts: StoreConflict[] = [];

    for (const row of rows) {
        for (const conflictingEquipmentId of holders.get(row.proposedTag) ?? []) {
            conflicts.push(Object.freeze({ proposedTag: row.proposedTag, equipmentId: row.equipmentId, conflictingEquipmentId }));
        }
    }
    return conflicts;
}

function ConflictingTags(conflicts: readonly StoreConflict[]): string[] {
    return DistinctSorted(
        conflicts.map(conflict => {
            return conflict.proposedTag;
        }),
    );
}

/**
 * RenumberService drives the renumbering pipeline against an EquipmentStore.
 */
export class RenumberService {
    private readonly _store: EquipmentStore;
    private readonly _audit: AuditTrailRecorder;
    private readonly _identity: IdentitySource;
    private readonly _typeCodes: TypeCodeLookup;
    private readonly _taggingMode?: TaggingMode;
    private readonly _eventBus: MainEventBus;
    private readonly _clock: () => Date;

    constructor(options: RenumberServiceOptions) {
        this._store = options.store;
        this._audit = options.audit;
        this._identity = options.identity;
        this._typeCodes = options.typeCodes ?? CreateTypeCodeLookup();
        this._taggingMode = options.taggingMode;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
        this._clock =
            options.clock ??
            (() => {
                return new Date();
            });
    }

    /**
     * Active equipment of a project matching the filter, as unselected candidates ordered by tag.
     * @example
     * const candidates = await service.LoadCandidates('p-1', { equipmentType: 'Pump', tagPattern: 'P-1*' });
     */
    async LoadCandidates(projectId: UID, filter: RenumberFilter = {}): Promise<CandidateSet> {
        const active = await this._activeEquipment(projectId);
        const matching = SortByKey(FilterEquipment(active, filter), item => {
            return item.tag;
        });
        log.debug(`Loaded ${matching.length} of ${active.length} active items`, FROM, projectId);
        return Freeze(matching.map(ToCandidate));
    }

    /** Distinct types and areas among active equipment, for filter pickers */
    async ListFilterOptions(projectId: UID): Promise<FilterOptions> {
        const active = await this._activeEquipment(projectId);

        return Object.freeze({
            equipmentTypes: DistinctSorted(
                active.map(item => {
                    return item.equipmentType;
                }),
            ),
            areas: DistinctSorted(
                active.map(item => {
                    return item.area;
                }),
            ),
        });
    }

    /** Next free number after the highest existing tag with this prefix */
    async SuggestStartNumber(projectId: UID, prefix: string): Promise<number> {
        const active = await this._activeEquipment(projectId);
        return NextSequenceNumber(
            active.map(item => {
                return item.tag;
            }),
            prefix,
        );
    }

    /**
     * Sets the selection. Proposed tags are cleared; generate a new preview afterwards.
     * @example
     * service.SelectCandidates(candidates, 'all');
     * service.SelectCandidates(candidates, ['eq-1', 'eq-3']);
     */
    SelectCandidates(candidates: CandidateSet, selection: CandidateSelection): CandidateSet {
        const ids = selection === `all` || selection === `none` ? null : new Set(selection);

        return Freeze(
            candidates.map(candidate => {
                const selected = ids ? ids.has(candidate.equipmentId) : selection === `all`;
                return Object.freeze({ ...candidate, selected, proposedTag: ``, warnings: Object.freeze([]) });
            }),
        );
    }

    /**
     * Assigns proposed tags to selected candidates in order: start, start + increment, ...
     * Unselected candidates get an empty proposal and do not consume numbers.
     * @throws ValidationError for invalid parameters
     * @example
     * service.GeneratePreview(selected, { pattern: '{TYPE}-{SEQ:000}', startNumber: 10, increment: 10 });
     */
    GeneratePreview(candidates: CandidateSet, request: PreviewRequest): CandidateSet {
        const { pattern, startNumber, increment } = ParseNumberingParameters(request);
        const unknown = FindUnknownPlaceholders(pattern).map(token => {
            return `Unknown placeholder ${token} kept as text`;
        });
        let current = startNumber;

        const preview = candidates.map(candidate => {
            if (!candidate.selected) {
                return Object.freeze({ ...candidate, proposedTag: ``, warnings: Object.freeze([]) });
            }
            const proposedTag = Expand(
                pattern,
                { equipmentType: candidate.equipmentType, area: candidate.area, typeCodes: this._typeCodes },
                current,
            );
            current += increment;
            const formatErrors = this._taggingMode ? ValidateTagFormat(proposedTag, this._taggingMode).errors : [];

            return Object.freeze({ ...candidate, proposedTag, warnings: Object.freeze([...unknown, ...formatErrors]) });
        });
        const selectedCount = preview.filter(candidate => {
            return candidate.selected;
        }).length;

        this._eventBus.Emit(EVENT_NAMES.renumberPreviewed, { pattern, selectedCount });
        log.debug(`Preview generated for ${selectedCount} items`, FROM, pattern);
        return Freeze(preview);
    }

    /**
     * Checks selected proposals for intra-batch duplicates (hard) and collisions with unrelated
     * active equipment (soft).
     */
    async DetectConflicts(projectId: UID, candidates: CandidateSet): Promise<ConflictReport> {
        const rows = RowsToApply(candidates);
        const duplicates = FindDuplicateTags(rows);
        const storeConflicts = FindStoreConflicts(rows, await this._activeEquipment(projectId));

        if (duplicates.length > 0 || storeConflicts.length > 0) {
            log.warning(`Conflicts: ${duplicates.length} duplicate, ${storeConflicts.length} existing`, FROM, projectId);
        }
        return Object.freeze({
            duplicates: Object.freeze(duplicates),
            storeConflicts: Object.freeze(storeConflicts),
            canApply: duplicates.length === 0,
            requiresOverride: storeConflicts.length > 0,
        });
    }

    /**
     * Renames every selected candidate with a proposal in one transaction.
     * Store conflicts are checked inside the transaction, under the project's lock. Audit entries are
     * written before the commit; any item or audit failure rolls the whole batch back.
     * @throws ValidationError when nothing is selected; ConflictError on duplicates;
     * SoftConflictError on collisions without `overrideSoftConflicts`
     */
    async Apply(projectId: UID, candidates: CandidateSet, options: ApplyOptions = {}): Promise<RenumberResult> {
        const rows = RowsToApply(candidates);

        if (rows.length === 0) {
            throw new ValidationError(`No equipment selected for renumbering`);
        }
        const duplicates = FindDuplicateTags(rows);

        if (duplicates.length > 0) {
            log.warning(`Refusing batch with ${duplicates.length} duplicate tags`, FROM, projectId);
            throw new ConflictError(`Duplicate new tags detected: ${duplicates.join(`, `)}`, { duplicates });
        }

        let tx: EquipmentTransaction;

        try {
            tx = await this._store.BeginTransaction(projectId);
        } catch (err) {
            return this._rolledBack(projectId, [], ToStorageFailure(err, `Could not start renumbering transaction`, projectId));
        }

        let conflicts: StoreConflict[];

        try {
            const active = await tx.FindByProject(item => {
                return item.isActive;
            });
            conflicts = FindStoreConflicts(rows, active);
        } catch (err) {
            await this._rollbackQuietly(tx, projectId);
            return this._rolledBack(projectId, [], ToStorageFailure(err, `Failed to load equipment`, projectId));
        }
        if (conflicts.length > 0) {
            const tags = ConflictingTags(conflicts);

            if (!options.overrideSoftConflicts) {
                await this._rollbackQuietly(tx, projectId);
                throw new SoftConflictError(`The following new tags already exist: ${tags.join(`, `)}`, {
                    conflicts: Object.freeze(conflicts),
                });
            }
            log.warning(`Applying over existing tags: ${tags.join(`, `)}`, FROM, projectId);
        }

        const performedBy = this._identity.PerformedBy();
        const source = this._identity.Source();
        const modifiedAt = this._clock().toISOString();
        const staged: Array<{ row: RenumberingCandidate; draft: AuditLogDraft }> = [];
        const renamed: RenamedItem[] = [];
        const skipped: RenumberSkip[] = [];
        let current: RenumberingCandidate | undefined;

        try {
            for (const row of rows) {
                current = row;
                const before = await tx.GetById(row.equipmentId);

                if (!before) {
                    skipped.push({ equipmentId: row.equipmentId, currentTag: row.currentTag, reason: `not-found` });
                    continue;
                }
                if (before.tag === row.proposedTag) {
                    skipped.push({ equipmentId: row.equipmentId, currentTag: before.tag, reason: `unchanged` });
                    continue;
                }
                const after: Equipment = { ...before, tag: row.proposedTag, modifiedAt, modifiedBy: performedBy };
                await tx.Update(after);

                const draft = BuildEquipmentUpdateDraft(before, after, performedBy, { source, operation: RENUMBERING_OPERATION });

                if (draft) {
                    staged.push({ row, draft });
                }
                renamed.push({ equipmentId: after.id, oldTag: before.tag, newTag: after.tag });
            }
            for (const { row, draft } of staged) {
                current = row;
                await this._audit.Record(draft);
            }
            current = undefined;
            await tx.Commit();
        } catch (err) {
            await this._rollbackQuietly(tx, projectId);
            const itemErrors: RenumberItemError[] = current
                ? [
                      {
                          equipmentId: current.equipmentId,
                          currentTag: current.currentTag,
                          proposedTag: current.proposedTag,
                          message: DescribeError(err),
                      },
                  ]
                : [];
            return this._rolledBack(projectId, itemErrors, ToStorageFailure(err, `Renumbering rolled back`, projectId));
        }

        const result: RenumberResult = Object.freeze({
            committed: true,
            successCount: renamed.length,
            errorCount: 0,
            errors: Object.freeze([]),
            skipped: Object.freeze(skipped),
            renamed: Object.freeze(renamed),
        });

        metricsService.RecordCommit(renamed.length);
        this._eventBus.Emit(EVENT_NAMES.renumberCommitted, { projectId, result });
        log.info(`Renamed ${renamed.length} items (${skipped.length} skipped)`, FROM, projectId);
        return result;
    }

    private async _activeEquipment(projectId: UID): Promise<Equipment[]> {
        try {
            return await this._store.FindByProject(projectId, item => {
                return item.isActive;
            });
        } catch (err) {
            throw ToStorageFailure(err, `Failed to load equipment`, projectId);
        }
    }

    private async _rollbackQuietly(tx: EquipmentTransaction, projectId: UID): Promise<void> {
        if (!tx.IsActive()) {
            return;
        }
        try {
            await tx.Rollback();
        } catch (rollbackError) {
            log.critical(`Rollback failed: ${DescribeError(rollbackError)}`, FROM, projectId);
        }
    }

    private _rolledBack(projectId: UID, errors: RenumberItemError[], fatalError: AppError): RenumberResult {
        const result: RenumberResult = Object.freeze({
            committed: false,
            successCount: 0,
            errorCount: 1,
            errors: Object.freeze(errors),
            skipped: Object.freeze([]),
            renamed: Object.freeze([]),
            fatalError,
        });

        metricsService.RecordRollback();
        this._eventBus.Emit(EVENT_NAMES.renumberRolledBack, { projectId, result });
        log.error(fatalError.message, FROM, projectId);
        return result;
    }
}

/** Wraps a failure as StorageError, keeping the original as cause. */
function ToStorageFailure(err: unknown, message: string, projectId: UID): StorageError {
    if (err instanceof StorageError) {
        return err;
    }
    return new StorageError(`${message}: ${DescribeError(err)}`, { projectId, code: IsAppError(err) ? err.code : undefined }, err);
}
