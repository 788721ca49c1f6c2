import * as fs from 'node:fs/promises';
import path from 'node:path';
import type { Report, Section, Severity } from '../types/host-health.js';
import type { HostInstrumentation } from '../services/host-instrumentation.js';
import { WindowsInstrumentation } from '../services/host-instrumentation.js';
import { PowerShellRunner } from '../services/powershell.js';
import { collectHostHealthReport, reportWorstSeverity } from './report.js';
import { severityLabel } from './severity.js';
import { renderHtmlReport } from '../render/html-report.js';
import { renderJsonReport } from '../render/json-report.js';
import {
  STDOUT_TARGET,
  reportOutputPath,
  resolveReportConfig,
  type ReportCliOptions,
  type ReportConfig,
} from '../config/report-config.js';
import { configureLogger, logThought } from '../utils/logger.js';
import { safeError } from '../utils/errors.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: host-health [options]

Collects system, CPU, memory, volume and physical disk health for this machine
and writes a report.

Options:
  --json                  Write the machine-readable JSON report instead of HTML
  --output, -o <path>     Report file to write ("-" prints to stdout)
  --help, -h              Show this help message

Default output: ~/HostHealthReports/host-health-<yyyyMMdd-HHmmss>.<html|json>

Exit codes:
  0  every section is Normal
  1  the report could not be written, or invalid arguments
  2  at least one section is Warning, none Critical
  3  at least one section is Critical

Examples:
  host-health
  host-health --json --output C:\\Reports\\health.json
  host-health --json -o -
`.trim();

export type HostHealthExitCode = 0 | 1 | 2 | 3;

const EXIT_CODES: Record<Severity, HostHealthExitCode> = {
  info: 0,
  warn: 2,
  error: 3,
};

const SEVERITY_ICONS: Record<Severity, string> = {
  info: '✓',
  warn: '⚠',
  error: '✗',
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function exitCodeForSeverity(severity: Severity): HostHealthExitCode {
  return EXIT_CODES[severity];
}

/** Parse `--json`, `--output <path>` / `-o <path>` / `--output=<path>`. */
export function parseCliArgs(argv: string[]): ReportCliOptions {
  const options: ReportCliOptions = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';

    if (arg === '--json') {
      options.json = true;
      continue;
    }

    if (arg === '--output' || arg === '-o') {
      const value = argv[i + 1];
      if (value === undefined || (value.startsWith('-') && value !== STDOUT_TARGET)) {
        throw new CliUsageError(`Option '${arg}' requires a path.`);
      }
      options.outputPath = value;
      i += 1;
      continue;
    }

    if (arg.startsWith('--output=')) {
      const value = arg.slice('--output='.length);
      if (!value) {
        throw new CliUsageError(`Option '--output' requires a path.`);
      }
      options.outputPath = value;
      continue;
    }

    throw new CliUsageError(`Unknown argument: '${arg}'`);
  }

  return options;
}

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

function formatSectionLine(section: Section): string {
  return `  ${SEVERITY_ICONS[section.Severity]} [${section.Severity.toUpperCase().padEnd(5)}] ${section.Title}`;
}

function printSummary(report: Report, target: string): void {
  const worst = reportWorstSeverity(report);

  console.log('\nHost Health Report');
  console.log('══════════════════════════════════════');
  for (const section of report.Sections) {
    console.log(formatSectionLine(section));
  }
  console.log('──────────────────────────────────────');
  console.log(`Overall: ${severityLabel(worst)}`);
  console.log(`Report written to ${target}`);
  console.log('');
}

export function renderReport(report: Report, config: Pick<ReportConfig, 'format'>): string {
  return config.format === 'json' ? renderJsonReport(report) : renderHtmlReport(report);
}

export interface HostHealthCliDeps {
  /** Instrumentation override; defaults to the Windows CIM implementation. */
  host?: HostInstrumentation;
  now?: () => Date;
  homeDir?: string;
}

/**
 * Run the full pipeline once: collect, render, write, summarize.
 * Sets and returns the process exit code.
 */
export async function runHostHealthCli(argv: string[], deps: HostHealthCliDeps = {}): Promise<HostHealthExitCode> {
  let config: ReportConfig;
  try {
    config = resolveReportConfig(parseCliArgs(argv), deps.homeDir);
  } catch (error) {
    console.error(`[HostHealth] ${safeError(error)}`);
    console.error(`Run 'host-health --help' to see available options.`);
    process.exitCode = 1;
    return 1;
  }

  configureLogger({ logDir: config.logDir });

  const host = deps.host ?? new WindowsInstrumentation(new PowerShellRunner({ timeoutMs: config.probeTimeoutMs }));
  const report = await collectHostHealthReport(host, { now: deps.now });
  const rendered = renderReport(report, config);
  const exitCode = exitCodeForSeverity(reportWorstSeverity(report));

  if (config.outputPath === STDOUT_TARGET) {
    process.stdout.write(rendered);
    process.exitCode = exitCode;
    return exitCode;
  }

  const target = reportOutputPath(config, new Date(report.GeneratedAt));
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, rendered, 'utf8');
  } catch (error) {
    const message = safeError(error);
    await logThought(`[CLI] Failed to write report to ${target}: ${message}`);
    console.error(`[HostHealth] Failed to write report to ${target}: ${message}`);
    process.exitCode = 1;
    return 1;
  }

  await logThought(`[CLI] Report written to ${target}.`);
  printSummary(report, target);
  process.exitCode = exitCode;
  return exitCode;
}
