/**
 * Loads the raw configuration document and applies environment overrides.
 * Validation happens in ConfigService; this layer only reads, merges and reports.
 */

import { IsRecord, ReadConfigFile } from './Common/ConfigReader.js';
import { MAIN_EVENT_BUS, type MainEventBus } from './Events/MainEventBus.js';
import { EVENT_NAMES } from './Domain/index.js';

/** Environment variables that take precedence over the file. */
export const CONFIG_ENV = {
    neo4jUri: 'NEO4J_URI',
    neo4jUser: 'NEO4J_USER',
    neo4jPassword: 'NEO4J_PASSWORD',
    neo4jDatabase: 'NEO4J_DATABASE',
    logLevel: 'TAG_REGISTRY_LOG_LEVEL',
    storage: 'TAG_REGISTRY_STORAGE',
} as const;

/**
 * Returns a copy of the document with environment overrides applied.
 * @param document Record<string, unknown> - Parsed config file
 * @param env NodeJS.ProcessEnv - Environment to read from
 * @example
 * ApplyEnvOverrides({ storage: 'memory' }, { TAG_REGISTRY_STORAGE: 'neo4j' }); // { storage: 'neo4j' }
 */
export function ApplyEnvOverrides(document: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...document };
    const neo4jOverrides: Record<string, string> = {};

    const uri = env[CONFIG_ENV.neo4jUri];
    const username = env[CONFIG_ENV.neo4jUser];
    const password = env[CONFIG_ENV.neo4jPassword];
    const database = env[CONFIG_ENV.neo4jDatabase];

    if (uri) {
        neo4jOverrides.uri = uri;
    }
    if (username) {
        neo4jOverrides.username = username;
    }
    if (password) {
        neo4jOverrides.password = password;
    }
    if (database) {
        neo4jOverrides.database = database;
    }
    if (Object.keys(neo4jOverrides).length > 0) {
        const current = IsRecord(merged.neo4j) ? merged.neo4j : {};
        merged.neo4j = { ...current, ...neo4jOverrides };
    }

    const logLevel = env[CONFIG_ENV.logLevel];
    const storage = env[CONFIG_ENV.storage];

    if (logLevel) {
        merged.logLevel = logLevel;
    }
    if (storage) {
        merged.storage = storage;
    }
    return merged;
}

/**
 * Loads and parses the configuration file, then applies environment overrides.
 * Emits `config.loaded` with the merged document or `config.error` with the failure.
 * @param configPath string - Path to configuration file (JSON or YAML format)
 * @param eventBus MainEventBus - Bus to report on (defaults to the global one)
 * @returns Promise<Record<string, unknown>> - Merged, not yet validated document
 * @example
 * const raw = await LoadConfig('./config/config.json');
 */
export async function LoadConfig(configPath: string, eventBus: MainEventBus = MAIN_EVENT_BUS): Promise<Record<string, unknown>> {
    try {
        const parsed = await ReadConfigFile(configPath);
        // an empty YAML file parses to undefined; validation fills in defaults
        const document = parsed === undefined || parsed === null ? {} : parsed;

        if (!IsRecord(document)) {
            throw new TypeError(`Config root must be an object`);
        }
        const merged = ApplyEnvOverrides(document, process.env);
        eventBus.Emit(EVENT_NAMES.configLoaded, merged);
        return merged;
    } catch (configError) {
        eventBus.Emit(EVENT_NAMES.configError, configError);
        throw configError;
    }
}
