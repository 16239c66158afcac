/**
 * Lightweight Neo4j driver wrapper used by the repositories.
 * Provides lifecycle management and a typed GetSession helper.
 */
import neo4j, { type Driver, type Session } from 'neo4j-driver';
import { StorageError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';

export interface Neo4jConfig {
    uri: string; // bolt://host:port or neo4j://host
    username: string; // db user
    password: string; // db password
    database?: string; // optional database name
}

/**
 * Small client holding one driver instance with explicit init/close.
 */
export class Neo4jClient {
    private _driver: Driver | null = null; // underlying driver instance
    private _config: Neo4jConfig; // connection settings

    /**
     * Initialize client with provided configuration (does not connect yet).
     * @param config Neo4jConfig – connection settings
     */
    constructor(config: Neo4jConfig) {
        this._config = config;
    }

    /**
     * Establish a driver connection if not already created.
     * @throws StorageError when the server cannot be reached
     */
    async Init(): Promise<void> {
        if (this._driver) {
            return;
        } // already initialized
        const token = neo4j.auth.basic(this._config.username, this._config.password);
        const driver = neo4j.driver(this._config.uri, token);

        try {
            // Verify connectivity early to fail fast
            await driver.verifyConnectivity();
        } catch (err) {
            await driver.close();
            throw new StorageError(`Unable to connect to Neo4j`, { uri: this._config.uri }, err);
        }
        this._driver = driver;
        log.info(`Connected to ${this._config.uri}`, `Neo4jClient`, this._config.database);
    }

    /**
     * Acquire a session bound to configured database (if provided).
     */
    async GetSession(mode: `READ` | `WRITE` = `WRITE`): Promise<Session> {
        if (!this._driver) {
            throw new StorageError(`Neo4jClient not initialized. Call Init() first.`);
        }
        const isRead = mode === `READ`;
        return this._driver.session({
            database: this._config.database,
            defaultAccessMode: isRead ? neo4j.session.READ : neo4j.session.WRITE,
        });
    }

    /**
     * Close underlying driver and free sockets.
     */
    async Close(): Promise<void> {
        if (this._driver) {
            await this._driver.close();
            this._driver = null;
        }
    }
}
