/**
 * Reads configuration files. This is a generic reader, not tied to the application event bus.
 */
import { readFile } from 'fs/promises';
import { ValidationError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any application events.
 * @param configPath string - Path to config file (e.g. './config/config.json')
 * @returns Promise<unknown> - Parsed document, not yet validated
 * @throws ValidationError for an unsupported extension; read and parse errors propagate
 * @example
 * const raw = await ReadConfigFile('./config/config.yaml');
 */
export async function ReadConfigFile(configPath: string): Promise<unknown> {
    const raw = await readFile(configPath, 'utf-8');

    if (configPath.endsWith('.json')) {
        return JSON.parse(raw);
    }
    if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
        // Lazy-load yaml parser only if needed
        const yaml = await import('js-yaml');
        return yaml.load(raw);
    }
    throw new ValidationError('Unsupported config file format. Use .json or .yaml', { configPath });
}

/** Narrows a parsed document to a plain object. */
export function IsRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
