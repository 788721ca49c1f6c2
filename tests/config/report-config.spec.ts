import path from 'node:path';
import { describe, it, expect } from 'vitest';
import {
    DEFAULT_PROBE_TIMEOUT_MS,
    defaultReportFileName,
    formatFileStamp,
    reportOutputPath,
    resolveReportConfig,
} from '../../src/config/report-config.js';

const home = path.resolve('/home/tester');

describe('resolveReportConfig', () => {
    it('defaults to an HTML report under the home directory', () => {
        const config = resolveReportConfig({}, home);

        expect(config).toEqual({
            format: 'html',
            outputPath: null,
            outputDir: path.join(home, 'HostHealthReports'),
            logDir: path.join(home, 'HostHealthReports', 'logs'),
            probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
        });
    });

    it('switches to JSON and resolves an explicit output path', () => {
        const config = resolveReportConfig({ json: true, outputPath: 'out/report.json' }, home);

        expect(config.format).toBe('json');
        expect(config.outputPath).toBe(path.resolve('out/report.json'));
    });

    it('keeps the stdout target as-is', () => {
        expect(resolveReportConfig({ outputPath: '-' }, home).outputPath).toBe('-');
    });
});

describe('report file naming', () => {
    const generatedAt = new Date(2026, 9, 18, 7, 5, 9);

    it('stamps the file with local date and time', () => {
        expect(formatFileStamp(generatedAt)).toBe('20261018-070509');
        expect(defaultReportFileName('json', generatedAt)).toBe('host-health-20261018-070509.json');
    });

    it('places the default file in the output directory', () => {
        const config = resolveReportConfig({}, home);

        expect(reportOutputPath(config, generatedAt)).toBe(
            path.join(home, 'HostHealthReports', 'host-health-20261018-070509.html'),
        );
    });

    it('prefers an explicit output path', () => {
        const config = resolveReportConfig({ outputPath: 'custom.html' }, home);

        expect(reportOutputPath(config, generatedAt)).toBe(path.resolve('custom.html'));
    });
});
