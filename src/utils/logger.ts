import * as fs from 'node:fs/promises';
import path from 'node:path';

export interface LoggerOptions {
    /** Directory for the daily markdown log. `null` disables file logging. */
    logDir: string | null;
}

const SENSITIVE_ASSIGNMENT_PATTERN =
    /\b(password|passwd|pwd|secret|token|api[_-]?key|credential)s?\b(\s*[:=]\s*)("[^"]*"|'[^']*'|\S+)/gi;

let options: LoggerOptions = { logDir: null };

export function configureLogger(next: Partial<LoggerOptions>): void {
    options = { ...options, ...next };
}

export function getLoggerOptions(): Readonly<LoggerOptions> {
    return options;
}

/** Mask `key=value` style credentials before anything reaches disk. */
export function scrubSensitiveText(text: string): string {
    return text.replace(SENSITIVE_ASSIGNMENT_PATTERN, (_match, key: string, sep: string) => `${key}${sep}[REDACTED]`);
}

function currentDateIso(): string {
    return new Date().toISOString().slice(0, 10);
}

async function appendEntry(entry: string): Promise<void> {
    const { logDir } = options;
    if (!logDir) {
        return;
    }

    try {
        await fs.mkdir(logDir, { recursive: true });
        await fs.appendFile(path.join(logDir, `${currentDateIso()}.md`), entry, 'utf8');
    } catch (err) {
        // Log failures never abort a run.
        const message = err instanceof Error ? err.message : String(err);
        process.emitWarning(`[HostHealth] Failed to write log entry: ${message}`);
    }
}

/** Record a free-form diagnostic note in today's log. */
export async function logThought(thought: string): Promise<void> {
    const timestamp = new Date().toISOString();
    await appendEntry(`- **${timestamp}** ${scrubSensitiveText(thought)}\n`);
}

/** Record an external command, its (scrubbed) output and exit code. */
export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
    const timestamp = new Date().toISOString();
    const entry = [
        `### ${timestamp} \`${scrubSensitiveText(command)}\` (exit ${exitCode})`,
        '```',
        scrubSensitiveText(output),
        '```',
        '',
    ].join('\n');
    await appendEntry(`${entry}\n`);
}
