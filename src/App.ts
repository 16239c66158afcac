/**
 * Composition root. Loads configuration, wires storage and services, and owns their lifecycle.
 */
import { log, SetLogLevel } from './Common/Log.js';
import { InternalError } from './Common/Errors.js';
import type { AuditSink, EquipmentStore, IdentitySource } from './Domain/index.js';
import { MAIN_EVENT_BUS, type MainEventBus } from './Events/MainEventBus.js';
import { InMemoryAuditSink } from './Repository/InMemoryAuditSink.js';
import { InMemoryEquipmentStore } from './Repository/InMemoryEquipmentStore.js';
import type { Neo4jClient } from './Repository/Neo4jClient.js';
import { AuditTrailRecorder } from './Services/AuditTrailRecorder.js';
import { ConfigService } from './Services/ConfigService.js';
import { HierarchyBuilder } from './Services/HierarchyBuilder.js';
import { SystemIdentitySource } from './Services/IdentityService.js';
import { RenumberService, type NumberingParameters } from './Services/RenumberService.js';
import { SetupNeo4j } from './Setup/Neo4j.js';
import { DefaultPatternFor } from './Tagging/TagPatternEngine.js';
import { CreateTypeCodeLookup } from './Tagging/TypeCodes.js';
import type { ValidatedConfig } from './Types/Config.js';

export const DEFAULT_CONFIG_PATH = `./config/config.json`;

export interface TagRegistryAppOptions {
    /** Defaults to CONFIG_PATH, then ./config/config.json */
    configPath?: string;
    eventBus?: MainEventBus;
    /** Injected stores take precedence over the configured backend. */
    store?: EquipmentStore;
    auditSink?: AuditSink;
    identity?: IdentitySource;
}

/** Services available once the app has started. */
export interface TagRegistryServices {
    config: ValidatedConfig;
    store: EquipmentStore;
    audit: AuditTrailRecorder;
    renumbering: RenumberService;
    hierarchy: HierarchyBuilder;
    /** Pattern and numbering offered to operators when they open the renumbering dialog */
    defaultNumbering: NumberingParameters;
}

/**
 * Application entry point for the tag registry.
 * @example
 * const app = new TagRegistryApp({ configPath: './config/config.yaml' });
 * const { renumbering } = await app.Start();
 * ...
 * await app.Stop();
 */
export class TagRegistryApp {
    private _options: TagRegistryAppOptions;
    private _eventBus: MainEventBus;
    private _services: TagRegistryServices | null = null;
    private _neo4jClient: Neo4jClient | null = null;

    constructor(options: TagRegistryAppOptions = {}) {
        this._options = options;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
    }

    /** Loads configuration and builds the services. Calling it again returns the running services. */
    public async Start(): Promise<TagRegistryServices> {
        if (this._services) {
            return this._services;
        }
        const configPath = this._options.configPath ?? process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
        const config = await new ConfigService(this._eventBus).Load(configPath);
        SetLogLevel(config.logLevel);

        const { store, auditSink } = await this._setupStorage(config);
        const audit = new AuditTrailRecorder({ sink: auditSink, eventBus: this._eventBus });
        const renumbering = new RenumberService({
            store,
            audit,
            identity: this._options.identity ?? new SystemIdentitySource(config.identity),
            typeCodes: CreateTypeCodeLookup(config.equipmentTypes),
            taggingMode: config.tagging.mode,
            eventBus: this._eventBus,
        });

        this._services = {
            config,
            store,
            audit,
            renumbering,
            hierarchy: new HierarchyBuilder(this._eventBus),
            defaultNumbering: Object.freeze({
                pattern: config.tagging.defaultPattern ?? DefaultPatternFor(config.tagging.mode),
                startNumber: config.tagging.startNumber,
                increment: config.tagging.increment,
            }),
        };
        log.info(`Tag registry started (storage=${config.storage})`, `App`, configPath);
        return this._services;
    }

    /** Running services; throws before Start. */
    public get Services(): TagRegistryServices {
        if (!this._services) {
            throw new InternalError(`TagRegistryApp not started. Call Start() first.`);
        }
        return this._services;
    }

    /** Releases storage connections. */
    public async Stop(): Promise<void> {
        if (this._neo4jClient) {
            await this._neo4jClient.Close();
            this._neo4jClient = null;
        }
        this._services = null;
        log.info(`Tag registry stopped`, `App`);
    }

    private async _setupStorage(config: ValidatedConfig): Promise<{ store: EquipmentStore; auditSink: AuditSink }> {
        const injectedStore = this._options.store;
        const injectedSink = this._options.auditSink;

        if (injectedStore && injectedSink) {
            return { store: injectedStore, auditSink: injectedSink };
        }
        if (config.storage === `neo4j` && config.neo4j) {
            const storage = await SetupNeo4j(config.neo4j);
            this._neo4jClient = storage.client;
            return { store: injectedStore ?? storage.store, auditSink: injectedSink ?? storage.auditSink };
        }
        return {
            store: injectedStore ?? new InMemoryEquipmentStore(),
            auditSink: injectedSink ?? new InMemoryAuditSink(),
        };
    }
}
