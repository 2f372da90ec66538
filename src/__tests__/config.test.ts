import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getApiKey, resolveConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let tmpDir: string;

    const writeConfigFile = (content: unknown): void => {
        fs.writeFileSync(path.join(tmpDir, 'impact.config.json'), JSON.stringify(content));
    };

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'impact-config-test-'));
        vi.stubEnv('IMPACT_LOG_LEVEL', '');
        vi.stubEnv('OPENALEX_EMAIL', '');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should use defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: tmpDir });
        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should let CLI flags override the config file', async () => {
        writeConfigFile({ requestDelayMs: 500, concurrency: 2 });

        const config = await resolveConfig({ concurrency: 3, snapshotFile: undefined }, { searchFrom: tmpDir });

        expect(config.requestDelayMs).toBe(500);
        expect(config.concurrency).toBe(3);
        expect(config.snapshotFile).toBe(DEFAULT_CONFIG.snapshotFile);
    });

    it('should let environment variables override the config file', async () => {
        writeConfigFile({ logLevel: 'debug' });
        vi.stubEnv('IMPACT_LOG_LEVEL', 'warn');
        vi.stubEnv('OPENALEX_EMAIL', 'someone@example.org');

        const config = await resolveConfig({}, { searchFrom: tmpDir });

        expect(config.logLevel).toBe('warn');
        expect(config.openalexEmail).toBe('someone@example.org');
    });

    it('should reject unknown keys in the config file', async () => {
        writeConfigFile({ maxPapers: 150 });
        await expect(resolveConfig({}, { searchFrom: tmpDir })).rejects.toThrow(ConfigurationError);
    });

    it('should reject out-of-range values', async () => {
        await expect(resolveConfig({ concurrency: 0 }, { searchFrom: tmpDir })).rejects.toThrow(
            'Invalid configuration: concurrency: Number must be greater than 0'
        );
    });

    it('should cap citing works per publication at one OpenAlex page', async () => {
        await expect(resolveConfig({ citationsPerPublication: 201 }, { searchFrom: tmpDir })).rejects.toThrow(
            'Invalid configuration: citationsPerPublication: Number must be less than or equal to 200'
        );

        const config = await resolveConfig({ citationsPerPublication: 200 }, { searchFrom: tmpDir });
        expect(config.citationsPerPublication).toBe(200);
    });
});

describe('getApiKey', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('should read the variable and treat empty as unset', () => {
        vi.stubEnv('S2_API_KEY', 'test-key');
        expect(getApiKey('S2_API_KEY')).toBe('test-key');

        vi.stubEnv('S2_API_KEY', '');
        expect(getApiKey('S2_API_KEY')).toBeUndefined();
    });
});
