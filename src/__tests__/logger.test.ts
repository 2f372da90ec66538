import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getLogger, initLogger } from '../utils/logger.js';
import { loadTrackedPublications } from '../publications/loader.js';

describe('Logger', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'impact-logger-test-'));
    });

    afterEach(() => {
        vi.restoreAllMocks();
        initLogger({ level: 'silent' });
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should reconfigure the instance handed out before initLogger', () => {
        const early = getLogger();
        const configured = initLogger({ level: 'warn', jsonLogs: true });

        expect(configured).toBe(early);
        expect(early.level).toBe('warn');
        expect(early.isLevelEnabled('info')).toBe(false);
        expect(early.isLevelEnabled('warn')).toBe(true);
    });

    it('should apply a later initLogger to modules loaded earlier', () => {
        initLogger({ level: 'debug', jsonLogs: true });
        const info = vi.spyOn(getLogger(), 'info').mockImplementation(() => undefined);

        const file = path.join(tmpDir, 'publications.json');
        fs.writeFileSync(file, JSON.stringify({ publications: [{ doi: '10.1/A' }] }));
        loadTrackedPublications(file);

        expect(info).toHaveBeenCalledWith({ filePath: file, count: 1 }, 'Loaded publications');
    });
});
