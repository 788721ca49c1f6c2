import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { z } from 'zod';
import { PowerShellError } from '../utils/errors.js';
import { logSystemCommand } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_TIMEOUT_MS = 120_000;
const MAX_LOGGED_OUTPUT_LENGTH = 4_000;
const POWERSHELL_EXECUTABLE = 'powershell.exe';
const BASE_ARGS = ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command'];

export interface ExecResult {
    stdout: string;
    stderr: string;
}

export type ExecFileFn = (
    file: string,
    args: string[],
    options: { timeout: number; windowsHide: boolean; maxBuffer: number },
) => Promise<ExecResult>;

export interface PowerShellRunnerOptions {
    executable?: string;
    timeoutMs?: number;
    exec?: ExecFileFn;
}

interface ExecError extends Error {
    code?: number | string;
    stdout?: string;
    stderr?: string;
}

const defaultExec: ExecFileFn = async (file, args, options) => {
    const { stdout, stderr } = await execFileAsync(file, args, { ...options, encoding: 'utf8' });
    return { stdout, stderr };
};

function resolveTimeout(timeoutMs?: number): number {
    if (timeoutMs === undefined || !Number.isFinite(timeoutMs)) {
        return DEFAULT_TIMEOUT_MS;
    }

    const parsed = Math.floor(timeoutMs);
    if (parsed < 1) {
        return DEFAULT_TIMEOUT_MS;
    }
    return Math.min(MAX_TIMEOUT_MS, parsed);
}

function truncateOutput(output: string): string {
    if (output.length <= MAX_LOGGED_OUTPUT_LENGTH) {
        return output;
    }

    return `${output.slice(0, MAX_LOGGED_OUTPUT_LENGTH)}\n...[truncated]`;
}

function firstScriptLine(script: string): string {
    const line = script.trim().split('\n')[0] ?? '';
    return line.length > 120 ? `${line.slice(0, 120)}...` : line;
}

/**
 * Runs read-only PowerShell queries and decodes their JSON output.
 *
 * Every script is piped through `ConvertTo-Json -Compress`, so callers only
 * describe the objects they want and a zod schema for their shape.
 */
export class PowerShellRunner {
    readonly #executable: string;
    readonly #timeoutMs: number;
    readonly #exec: ExecFileFn;

    constructor(options: PowerShellRunnerOptions = {}) {
        this.#executable = options.executable ?? POWERSHELL_EXECUTABLE;
        this.#timeoutMs = resolveTimeout(options.timeoutMs);
        this.#exec = options.exec ?? defaultExec;
    }

    /** Run a script and return its raw stdout. Throws {@link PowerShellError} on failure. */
    async run(script: string, timeoutMs?: number): Promise<string> {
        const timeout = timeoutMs === undefined ? this.#timeoutMs : resolveTimeout(timeoutMs);
        const preview = `${this.#executable} -Command ${firstScriptLine(script)}`;

        try {
            const { stdout, stderr } = await this.#exec(this.#executable, [...BASE_ARGS, script], {
                timeout,
                windowsHide: true,
                maxBuffer: 4 * 1024 * 1024,
            });
            await logSystemCommand(preview, truncateOutput(`${stdout}${stderr}`.trim()) || '(no output)', 0);
            return stdout;
        } catch (error: unknown) {
            const err: ExecError = error instanceof Error ? error : new Error(String(error));
            const exitCode = typeof err.code === 'number' ? err.code : null;
            const detail = `${err.stderr ?? ''}`.trim() || err.message;
            await logSystemCommand(preview, truncateOutput(detail) || '(no output)', exitCode ?? 1);
            throw new PowerShellError(
                `PowerShell query failed: ${detail}`,
                'PowerShellExecutionError',
                exitCode,
                { cause: error },
            );
        }
    }

    /**
     * Run a script, serialize its pipeline output as JSON and validate it.
     * Empty output (an empty pipeline) decodes as `null` before validation.
     */
    async runJson<T>(script: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, timeoutMs?: number): Promise<T> {
        const stdout = await this.run(`${script.trim()} | ConvertTo-Json -Compress -Depth 4`, timeoutMs);
        const text = stdout.trim();

        let parsed: unknown = null;
        if (text.length > 0) {
            try {
                parsed = JSON.parse(text);
            } catch (err) {
                throw new PowerShellError(
                    'PowerShell output is not valid JSON.',
                    'PowerShellOutputError',
                    null,
                    { cause: err },
                );
            }
        }

        const result = schema.safeParse(parsed);
        if (!result.success) {
            const issue = result.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
            throw new PowerShellError(
                `Unexpected PowerShell output shape${where}: ${issue?.message ?? 'invalid value'}`,
                'PowerShellOutputError',
            );
        }
        return result.data;
    }
}
