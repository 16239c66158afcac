/**
 * Domain interfaces and types for the tag registry.
 */

// Catalog entities
export type {
    Equipment,
    EquipmentStatus,
    TaggingMode,
    ProcessParameter,
    ProcessParameterName,
    ProcessParameters,
    Line,
    Drawing,
    Instrument,
} from './Equipment.js';
export { PROCESS_PARAMETER_NAMES } from './Equipment.js';

// Audit trail
export type {
    AuditAction,
    AuditSnapshot,
    SnapshotValue,
    AuditLogEntry,
    AuditLogDraft,
    AuditQueryFilter,
    AuditSink,
} from './Audit.js';
export { AUDIT_ACTIONS } from './Audit.js';

// Store contracts
export type { EquipmentStore, EquipmentTransaction, EquipmentPredicate } from './Repository.js';
export type { IdentitySource } from './Identity.js';

// Renumbering pipeline
export type {
    RenumberFilter,
    RenumberingCandidate,
    CandidateSet,
    PreviewRequest,
    StoreConflict,
    ConflictReport,
    ApplyOptions,
    RenumberItemError,
    RenumberSkip,
    RenamedItem,
    RenumberResult,
    FilterOptions,
} from './Renumbering.js';

// Hierarchies
export type {
    HierarchyMode,
    HierarchyNode,
    HierarchyNodeKind,
    HierarchySource,
    HierarchyOptions,
    ConnectedLine,
    ConnectedEquipment,
    ConnectionDetails,
} from './Hierarchy.js';
export { HIERARCHY_MODES } from './Hierarchy.js';

// Utility
export type { EventName } from './Utility.js';
export { EVENT_NAMES } from './Utility.js';
