import { describe, it, expect } from 'vitest';
import { renderJsonReport, toSerializableReport } from '../../src/render/json-report.js';
import { escapeHtml, formatValue, renderHtmlReport } from '../../src/render/html-report.js';
import {
    cpuSection,
    memorySection,
    physicalDisksSection,
    systemSection,
    volumesSection,
} from '../../src/core/sections.js';
import type { Report } from '../../src/types/host-health.js';

function buildReport(): Report {
    return {
        GeneratedAt: '2026-10-18T10:45:30.000Z',
        Sections: [
            systemSection({
                ComputerName: 'WS-<TEST>',
                UserName: 'tester',
                OSVersion: 'Microsoft Windows 11 Pro 10.0.22631',
                IsAdmin: true,
                Uptime: '2d 2h 15m',
                Timestamp: '2026-10-18T10:45:30.000Z',
            }),
            cpuSection({ Name: 'Test CPU', Cores: 2, LoadPct: 20, PerCore: [10, 30], Source: 'formatted-counters' }),
            memorySection({ TotalGB: 32, UsedGB: 27.3, FreeGB: 4.7, UsedPct: 85.31 }),
            volumesSection({
                'C:': { TotalGB: 200, UsedGB: 184, FreeGB: 16, UsedPct: 92 },
                'D:': { TotalGB: 500, UsedGB: 200, FreeGB: 300, UsedPct: 40 },
            }),
            physicalDisksSection({
                Error: true,
                Message: 'Access denied',
                Category: 'PowerShellExecutionError',
                FullyQualifiedId: 'PhysicalDisksProbe,PowerShellExecutionError',
            }),
        ],
    };
}

describe('renderJsonReport', () => {
    it('emits exactly GeneratedAt and Sections at the top level', () => {
        const parsed: Record<string, unknown> = JSON.parse(renderJsonReport(buildReport()));

        expect(Object.keys(parsed)).toEqual(['GeneratedAt', 'Sections']);
    });

    it('serializes sections as Title, Data and Severity without the domain tag', () => {
        const serialized = toSerializableReport(buildReport());

        expect(serialized.Sections).toHaveLength(5);
        expect(Object.keys(serialized.Sections[0] ?? {})).toEqual(['Title', 'Data', 'Severity']);
        expect(serialized.Sections[2]).toEqual({
            Title: 'Memory - Warning (warn 80% / crit 90%, used 85.3%)',
            Data: { TotalGB: 32, UsedGB: 27.3, FreeGB: 4.7, UsedPct: 85.31, FreePct: 14.69, Status: 'Warning' },
            Severity: 'warn',
        });
        expect(serialized.Sections[4]?.Data).toMatchObject({ Error: true, Message: 'Access denied' });
    });
});

describe('formatValue', () => {
    it('joins arrays and compacts nested objects', () => {
        expect(formatValue([10, 30])).toBe('10, 30');
        expect(formatValue({ a: 1, b: [2, 3] })).toBe('a=1; b=2, 3');
        expect(formatValue(null)).toBe('n/a');
        expect(formatValue(true)).toBe('true');
    });
});

describe('escapeHtml', () => {
    it('escapes markup characters', () => {
        expect(escapeHtml(`<a href="x">Tom's & Co</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom&#39;s &amp; Co&lt;/a&gt;');
    });
});

describe('renderHtmlReport', () => {
    const html = renderHtmlReport(buildReport());

    it('renders one shaded block per section', () => {
        expect(html.match(/<section class="sev-/g)).toHaveLength(5);
        expect(html).toContain('<section class="sev-warn">\n<h2>Memory - Warning (warn 80% / crit 90%, used 85.3%)</h2>');
        expect(html).toContain(
            '<section class="sev-error">\n<h2>Volumes - Critical (warn 85% / crit 90%, max used 92.0%, min free 8.0%)</h2>',
        );
    });

    it('lists per-core load as comma-separated text', () => {
        expect(html).toContain('<tr><th>PerCore</th><td>10, 30</td></tr>');
    });

    it('tabulates volumes with one row per drive', () => {
        expect(html).toContain('<tr><td>C:</td><td>200</td><td>184</td><td>16</td><td>92</td><td>8</td><td>Critical</td></tr>');
    });

    it('renders a probe error payload as a key/value listing', () => {
        expect(html).toContain('<tr><th>Message</th><td>Access denied</td></tr>');
    });

    it('escapes data values', () => {
        expect(html).toContain('<tr><th>ComputerName</th><td>WS-&lt;TEST&gt;</td></tr>');
    });
});
