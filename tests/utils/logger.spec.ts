import * as fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    configureLogger,
    getLoggerOptions,
    logSystemCommand,
    logThought,
    scrubSensitiveText,
} from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
    it('redacts key=value credentials', () => {
        expect(scrubSensitiveText('connect password=hunter2 now')).toBe('connect password=[REDACTED] now');
        expect(scrubSensitiveText('api_key: "test-secret"')).toBe('api_key: [REDACTED]');
    });

    it('leaves ordinary diagnostics untouched', () => {
        expect(scrubSensitiveText('Volumes - Critical (max used 92.0%)')).toBe('Volumes - Critical (max used 92.0%)');
    });
});

describe('daily log file', () => {
    let logDir = '';

    beforeEach(async () => {
        logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'host-health-log-'));
        configureLogger({ logDir });
    });

    afterEach(async () => {
        configureLogger({ logDir: null });
        await fs.rm(logDir, { recursive: true, force: true });
    });

    it('appends thoughts and commands to a file named after the current date', async () => {
        await logThought('first note token=abc');
        await logSystemCommand('powershell.exe -Command Get-Thing', '{"Value":1}', 0);

        const expectedFile = `${new Date().toISOString().slice(0, 10)}.md`;
        const files = await fs.readdir(logDir);
        expect(files).toEqual([expectedFile]);

        const contents = await fs.readFile(path.join(logDir, expectedFile), 'utf8');
        expect(contents).toContain('first note token=[REDACTED]');
        expect(contents).toContain('`powershell.exe -Command Get-Thing` (exit 0)');
        expect(contents).toContain('{"Value":1}');
    });

    it('writes nothing once file logging is disabled', async () => {
        configureLogger({ logDir: null });

        await logThought('dropped');

        expect(getLoggerOptions().logDir).toBeNull();
        expect(await fs.readdir(logDir)).toEqual([]);
    });
});
