import Joi from 'joi';
import { LoadConfig } from '../Config.js';
import { DescribeError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { EVENT_NAMES } from '../Domain/index.js';
import { DEFAULT_EQUIPMENT_TYPES } from '../Tagging/TypeCodes.js';
import type { ValidatedConfig } from '../Types/Config.js';

const neo4jSchema = Joi.object({
    uri: Joi.string().required(),
    username: Joi.string().required(),
    password: Joi.string().required(),
    database: Joi.string().optional(),
});

// Validates the merged document. Unknown keys are tolerated so hosts can keep their own settings beside ours.
const configSchema = Joi.object<ValidatedConfig>({
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(`info`),
    storage: Joi.string().valid(`memory`, `neo4j`).default(`memory`),
    neo4j: neo4jSchema.when(`storage`, { is: `neo4j`, then: Joi.required(), otherwise: Joi.optional() }),
    tagging: Joi.object({
        mode: Joi.string().valid(`Custom`, `KKS`).default(`Custom`),
        defaultPattern: Joi.string().trim().min(1).optional(),
        startNumber: Joi.number().integer().default(1),
        increment: Joi.number().integer().min(1).default(1),
    }).default(),
    equipmentTypes: Joi.array()
        .items(
            Joi.object({
                name: Joi.string().trim().min(1).required(),
                code: Joi.string().trim().min(1).required(),
            }),
        )
        .default(() => {
            return DEFAULT_EQUIPMENT_TYPES.map(definition => {
                return { ...definition };
            });
        }),
    identity: Joi.object({
        performedBy: Joi.string().trim().min(1).optional(),
        source: Joi.string().trim().min(1).optional(),
    }).default(),
})
    .unknown(true)
    .empty(null)
    .default();

/**
 * Service responsible for loading and validating application configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: MainEventBus;

    /**
     * Constructs a ConfigService.
     * @param eventBus MainEventBus - Event bus used for emitting `config.loaded` and `config.error`.
     */
    constructor(eventBus: MainEventBus = MAIN_EVENT_BUS) {
        this._eventBus = eventBus;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file.
     * @param path string - Filesystem path to the config file. Example: './config/config.json'
     * @returns Promise<ValidatedConfig> - The validated config object.
     * @throws ValidationError if loading or validation fails.
     * @example
     * const configService = new ConfigService();
     * const config = await configService.Load('./config/config.json');
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        let raw: Record<string, unknown>;

        try {
            raw = await LoadConfig(path, this._eventBus);
        } catch (err) {
            log.error(`Failed to read config: ${DescribeError(err)}`, `ConfigService`, path);
            throw new ValidationError(`Failed to load config from '${path}': ${DescribeError(err)}`, { path });
        }
        try {
            return this.Validate(raw);
        } catch (err) {
            this._eventBus.Emit(EVENT_NAMES.configError, err);
            throw err;
        }
    }

    /**
     * Validates a configuration document and fills in defaults.
     * @param raw unknown - Parsed configuration document
     * @throws ValidationError listing the first schema violation
     * @example
     * new ConfigService().Validate({ storage: 'memory' }).tagging.startNumber; // 1
     */
    public Validate(raw: unknown): ValidatedConfig {
        const { value, error } = configSchema.validate(raw);

        if (error) {
            throw new ValidationError(`Config validation error: ${error.message}`, {
                path: error.details[0]?.path.join(`.`),
            });
        }
        if (!value) {
            // .default() guarantees a value; guard keeps the type honest
            throw new ValidationError(`Config validation error: empty configuration`);
        }
        log.debug(`Configuration validated (storage=${value.storage})`, `ConfigService`);
        return value;
    }
}
