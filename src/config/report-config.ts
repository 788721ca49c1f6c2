import os from 'node:os';
import path from 'node:path';

export type ReportFormat = 'html' | 'json';

/** Directory under the user's home that receives reports and logs by default. */
export const DEFAULT_REPORT_DIRNAME = 'HostHealthReports';
export const DEFAULT_PROBE_TIMEOUT_MS = 30_000;

/** Options the CLI collects; everything is optional. */
export interface ReportCliOptions {
    json?: boolean;
    /** Explicit output file, or `-` for stdout. */
    outputPath?: string;
}

export interface ReportConfig {
    format: ReportFormat;
    /** Explicit output target; `null` means "default file in {@link outputDir}". */
    outputPath: string | null;
    outputDir: string;
    logDir: string;
    probeTimeoutMs: number;
}

export const STDOUT_TARGET = '-';

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

/** `yyyyMMdd-HHmmss` in local time. */
export function formatFileStamp(date: Date): string {
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

export function defaultReportFileName(format: ReportFormat, generatedAt: Date): string {
    return `host-health-${formatFileStamp(generatedAt)}.${format}`;
}

export function resolveReportConfig(options: ReportCliOptions = {}, homeDir: string = os.homedir()): ReportConfig {
    const outputDir = path.join(homeDir, DEFAULT_REPORT_DIRNAME);
    const explicit = options.outputPath?.trim();

    return {
        format: options.json ? 'json' : 'html',
        outputPath: !explicit ? null : explicit === STDOUT_TARGET ? STDOUT_TARGET : path.resolve(explicit),
        outputDir,
        logDir: path.join(outputDir, 'logs'),
        probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
    };
}

/** Final destination of a report generated at `generatedAt`. */
export function reportOutputPath(config: ReportConfig, generatedAt: Date): string {
    return config.outputPath ?? path.join(config.outputDir, defaultReportFileName(config.format, generatedAt));
}
