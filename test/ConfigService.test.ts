import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { ConfigService } from '../src/Services/ConfigService.js';
import { ApplyEnvOverrides, CONFIG_ENV } from '../src/Config.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { ValidationError } from '../src/Common/Errors.js';

describe('ConfigService', () => {
    let directory: string;
    let eventBus: MainEventBus;
    let service: ConfigService;

    beforeEach(async () => {
        directory = await mkdtemp(path.join(tmpdir(), 'tag-registry-config-'));
        eventBus = new MainEventBus();
        service = new ConfigService(eventBus);
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        await rm(directory, { recursive: true, force: true });
    });

    async function WriteConfig(name: string, content: string): Promise<string> {
        const file = path.join(directory, name);
        await writeFile(file, content, 'utf-8');
        return file;
    }

    it('should fill in defaults for an empty document', () => {
        const config = service.Validate({});

        expect(config.logLevel).toBe('info');
        expect(config.storage).toBe('memory');
        expect(config.tagging).toEqual({ mode: 'Custom', startNumber: 1, increment: 1 });
        expect(config.equipmentTypes).toHaveLength(8);
        expect(config.equipmentTypes[3]).toEqual({ name: 'Heat Exchanger', code: 'HX' });
        expect(config.identity).toEqual({});
    });

    it('should require a neo4j block for neo4j storage', () => {
        expect(() => service.Validate({ storage: 'neo4j' })).toThrow(ValidationError);
    });

    it('should reject an increment below one', () => {
        expect(() => service.Validate({ tagging: { increment: 0 } })).toThrow(ValidationError);
    });

    it('should keep unknown host keys', () => {
        expect(() => service.Validate({ hostSetting: true })).not.toThrow();
    });

    it('should load JSON and apply environment overrides', async () => {
        vi.stubEnv(CONFIG_ENV.neo4jUri, 'bolt://env-host:7687');
        vi.stubEnv(CONFIG_ENV.logLevel, 'debug');
        const loaded = vi.fn();
        eventBus.On('config.loaded', loaded);

        const file = await WriteConfig(
            'config.json',
            JSON.stringify({ storage: 'neo4j', neo4j: { uri: 'bolt://file-host:7687', username: 'neo4j', password: 'test-secret' } }),
        );
        const config = await service.Load(file);

        expect(config.neo4j).toEqual({ uri: 'bolt://env-host:7687', username: 'neo4j', password: 'test-secret' });
        expect(config.logLevel).toBe('debug');
        expect(loaded).toHaveBeenCalledTimes(1);
    });

    it('should load YAML', async () => {
        const file = await WriteConfig('config.yaml', 'tagging:\n  mode: KKS\nequipmentTypes:\n  - name: Pump\n    code: PMP\n');
        const config = await service.Load(file);

        expect(config.tagging.mode).toBe('KKS');
        expect(config.tagging.startNumber).toBe(1);
        expect(config.equipmentTypes).toEqual([{ name: 'Pump', code: 'PMP' }]);
    });

    it('should report unreadable and unsupported files', async () => {
        const errors = vi.fn();
        eventBus.On('config.error', errors);

        await expect(service.Load(path.join(directory, 'missing.json'))).rejects.toBeInstanceOf(ValidationError);
        await expect(service.Load(await WriteConfig('config.txt', 'storage=memory'))).rejects.toThrow(/Unsupported config file format/);
        expect(errors).toHaveBeenCalledTimes(2);
    });

    it('should report schema violations from files', async () => {
        const errors = vi.fn();
        eventBus.On('config.error', errors);
        const file = await WriteConfig('config.json', JSON.stringify({ storage: 'sqlite' }));

        await expect(service.Load(file)).rejects.toThrow(/Config validation error/);
        expect(errors).toHaveBeenCalledTimes(1);
    });
});

describe('ApplyEnvOverrides', () => {
    it('should merge neo4j settings without dropping file values', () => {
        const merged = ApplyEnvOverrides(
            { storage: 'memory', neo4j: { uri: 'bolt://a', username: 'u', password: 'p' } },
            { NEO4J_PASSWORD: 'test-secret', TAG_REGISTRY_STORAGE: 'neo4j' },
        );

        expect(merged).toEqual({ storage: 'neo4j', neo4j: { uri: 'bolt://a', username: 'u', password: 'test-secret' } });
    });

    it('should leave the document alone without overrides', () => {
        expect(ApplyEnvOverrides({ storage: 'memory' }, {})).toEqual({ storage: 'memory' });
    });
});
