import type {
    PhysicalDiskInfo,
    PhysicalDiskPayload,
    PhysicalDisksEmpty,
    PhysicalDisksUnavailable,
    Report,
    Section,
    Severity,
    VolumeRecord,
    VolumeRecordMap,
} from '../types/host-health.js';
import { isProbeError } from '../utils/errors.js';

const SEVERITY_CLASS: Record<Severity, string> = {
    info: 'sev-info',
    warn: 'sev-warn',
    error: 'sev-error',
};

const STYLES = `
body { font-family: Segoe UI, Arial, sans-serif; margin: 24px; color: #1f2328; }
h1 { font-size: 22px; margin-bottom: 4px; }
.generated { color: #57606a; margin-top: 0; }
section { border-radius: 6px; padding: 12px 16px; margin: 16px 0; border: 1px solid #d0d7de; }
section h2 { font-size: 17px; margin: 0 0 8px 0; }
.sev-info { background: #f6f8fa; }
.sev-warn { background: #fff4d6; border-color: #d4a72c; }
.sev-error { background: #ffe3e3; border-color: #cf222e; }
table { border-collapse: collapse; }
th, td { text-align: left; padding: 3px 12px 3px 0; vertical-align: top; }
th { font-weight: 600; }
`.trim();

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/** Display text for a value: arrays comma-joined, objects compacted inline. */
export function formatValue(value: unknown): string {
    if (value === null || value === undefined) {
        return 'n/a';
    }
    if (Array.isArray(value)) {
        return value.map((item) => formatValue(item)).join(', ');
    }
    if (typeof value === 'object') {
        const entries: Array<[string, unknown]> = Object.entries(value);
        return entries.map(([key, inner]) => `${key}=${formatValue(inner)}`).join('; ');
    }
    return String(value);
}

function keyValueTable(data: object): string {
    const entries: Array<[string, unknown]> = Object.entries(data);
    const rows = entries.map(
        ([key, value]) => `<tr><th>${escapeHtml(key)}</th><td>${escapeHtml(formatValue(value))}</td></tr>`,
    );
    return `<table>${rows.join('')}</table>`;
}

function entityTable<T extends object>(idHeader: string, columns: ReadonlyArray<keyof T & string>, rows: Record<string, T>): string {
    const head = [idHeader, ...columns].map((c) => `<th>${escapeHtml(c)}</th>`).join('');
    const body = Object.entries(rows).map(([id, record]) => {
        const cells = columns.map((column) => `<td>${escapeHtml(formatValue(record[column]))}</td>`).join('');
        return `<tr><td>${escapeHtml(id)}</td>${cells}</tr>`;
    });
    return `<table><thead><tr>${head}</tr></thead><tbody>${body.join('')}</tbody></table>`;
}

function renderVolumes(records: VolumeRecordMap): string {
    if (Object.keys(records).length === 0) {
        return '<p>No fixed volumes were reported.</p>';
    }
    return entityTable<VolumeRecord>('Volume', ['TotalGB', 'UsedGB', 'FreeGB', 'UsedPct', 'FreePct', 'Status'], records);
}

function isDiskMarker(payload: PhysicalDiskPayload): payload is PhysicalDisksUnavailable | PhysicalDisksEmpty {
    return ('Unavailable' in payload && payload.Unavailable === true) || ('NoDevices' in payload && payload.NoDevices === true);
}

function renderPhysicalDisks(payload: PhysicalDiskPayload): string {
    if (isDiskMarker(payload)) {
        return keyValueTable(payload);
    }
    const disks: Record<string, PhysicalDiskInfo> = payload;
    return entityTable<PhysicalDiskInfo>('Disk', ['HealthStatus', 'OperationalStatus', 'MediaType', 'SizeGB'], disks);
}

function renderSectionBody(section: Section): string {
    switch (section.kind) {
        case 'system':
        case 'cpu':
        case 'memory':
            return keyValueTable(section.Data);
        case 'volumes': {
            const data = section.Data;
            return isProbeError(data) ? keyValueTable(data) : renderVolumes(data);
        }
        case 'physical-disks': {
            const data = section.Data;
            return isProbeError(data) ? keyValueTable(data) : renderPhysicalDisks(data);
        }
    }
}

function renderSection(section: Section): string {
    return [
        `<section class="${SEVERITY_CLASS[section.Severity]}">`,
        `<h2>${escapeHtml(section.Title)}</h2>`,
        renderSectionBody(section),
        '</section>',
    ].join('\n');
}

/** Self-contained HTML document with one shaded block per section. */
export function renderHtmlReport(report: Report): string {
    return [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<head>',
        '<meta charset="utf-8">',
        '<title>Host Health Report</title>',
        `<style>\n${STYLES}\n</style>`,
        '</head>',
        '<body>',
        '<h1>Host Health Report</h1>',
        `<p class="generated">Generated at ${escapeHtml(report.GeneratedAt)}</p>`,
        ...report.Sections.map(renderSection),
        '</body>',
        '</html>',
        '',
    ].join('\n');
}
