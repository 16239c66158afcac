/**
 * Central enumeration of well-known event names for typed event bus helpers.
 */
export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    configError: 'config.error',
    renumberPreviewed: 'renumber.previewed',
    renumberCommitted: 'renumber.committed',
    renumberRolledBack: 'renumber.rolledBack',
    auditRecorded: 'audit.recorded',
    hierarchyBuilt: 'hierarchy.built',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
