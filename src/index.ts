/**
 * Public API of the equipment tag registry.
 */

export * from './Domain/index.js';
export type { UID } from './Repository/Common/Ids.js';

export * from './Common/Errors.js';
export { log, LogLevel, SetLogLevel, GetLogLevel, type ConfiguredLogLevel } from './Common/Log.js';
export { MainEventBus, MAIN_EVENT_BUS } from './Events/MainEventBus.js';
export { MetricsService, metricsService, type MetricsSnapshot } from './Services/MetricsService.js';

export * from './Tagging/TagPatternEngine.js';
export * from './Tagging/TagFormat.js';
export * from './Tagging/TypeCodes.js';
export * from './Tagging/SequenceNumbers.js';
export { CompileTagWildcard } from './Tagging/TagWildcard.js';

export * from './Services/RenumberService.js';
export * from './Services/HierarchyBuilder.js';
export * from './Services/AuditTrailRecorder.js';
export { SystemIdentitySource, StaticIdentitySource } from './Services/IdentityService.js';
export { ConfigService } from './Services/ConfigService.js';
export type { ValidatedConfig, StorageKind, TaggingConfig, IdentityConfig } from './Types/Config.js';

export { InMemoryEquipmentStore } from './Repository/InMemoryEquipmentStore.js';
export { InMemoryAuditSink } from './Repository/InMemoryAuditSink.js';
export { Neo4jClient, type Neo4jConfig } from './Repository/Neo4jClient.js';
export { Neo4jEquipmentStore } from './Repository/Neo4jEquipmentStore.js';
export { Neo4jAuditSink } from './Repository/Neo4jAuditSink.js';
export { SetupNeo4j, type Neo4jStorage } from './Setup/Neo4j.js';

export { TagRegistryApp, type TagRegistryAppOptions, type TagRegistryServices } from './App.js';
