import type { ProbeError } from '../types/host-health.js';

/** Base error carrying a stable category string for report payloads. */
export class HostHealthError extends Error {
    readonly category: string;

    constructor(message: string, category: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'HostHealthError';
        this.category = category;
    }
}

export type PowerShellErrorCategory = 'PowerShellExecutionError' | 'PowerShellOutputError';

/** Raised when a PowerShell query exits non-zero or prints unusable output. */
export class PowerShellError extends HostHealthError {
    readonly exitCode: number | null;

    constructor(
        message: string,
        category: PowerShellErrorCategory,
        exitCode: number | null = null,
        options?: { cause?: unknown },
    ) {
        super(message, category, options);
        this.name = 'PowerShellError';
        this.exitCode = exitCode;
    }
}

/** First line of an error message; stack frames and paths are dropped. */
export function safeError(err: unknown): string {
    const raw = err instanceof Error ? err.message : String(err);
    const firstLine = raw.split('\n')[0]?.trim();
    return firstLine ? firstLine : 'unknown error';
}

export function errorCategory(err: unknown): string {
    if (err instanceof HostHealthError) {
        return err.category;
    }
    if (err instanceof Error) {
        return err.name || 'Error';
    }
    return 'UnknownError';
}

/** Convert any thrown value into the structured probe error marker. */
export function toProbeError(probeName: string, err: unknown): ProbeError {
    const category = errorCategory(err);
    return {
        Error: true,
        Message: safeError(err),
        Category: category,
        FullyQualifiedId: `${probeName}Probe,${category}`,
    };
}

export function isProbeError(value: unknown): value is ProbeError {
    return (
        typeof value === 'object' &&
        value !== null &&
        'Error' in value &&
        value.Error === true
    );
}
