import type { Report, Section, SectionKind, Severity } from '../types/host-health.js';
import type { HostInstrumentation } from '../services/host-instrumentation.js';
import { runProbe } from '../probes/run-probe.js';
import { probeSystem } from '../probes/system.js';
import { probeCpu } from '../probes/cpu.js';
import { probeMemory } from '../probes/memory.js';
import { probeVolumes } from '../probes/volumes.js';
import { probePhysicalDisks } from '../probes/physical-disks.js';
import { cpuSection, memorySection, physicalDisksSection, systemSection, volumesSection } from './sections.js';
import { worstSeverity } from './severity.js';
import { logThought } from '../utils/logger.js';

export interface CollectReportOptions {
    /** Clock used for `GeneratedAt` and uptime. */
    now?: () => Date;
}

export type SectionOf<K extends SectionKind> = Extract<Section, { kind: K }>;

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const inner of Object.values(value)) {
            deepFreeze(inner);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Run every probe once, in order, and assemble the report.
 *
 * Sections are always System, CPU, Memory, Volumes, Physical Disks. A probe
 * fault becomes a degraded section; this function does not reject for it.
 * The returned report is frozen down to every section payload.
 */
export async function collectHostHealthReport(
    host: HostInstrumentation,
    options: CollectReportOptions = {},
): Promise<Report> {
    const clock = options.now ?? (() => new Date());
    const generatedAt = clock();

    await logThought('[Report] Collecting host health metrics.');

    const system = systemSection(await runProbe('System', () => probeSystem(host, generatedAt)));
    const cpu = cpuSection(await runProbe('CPU', () => probeCpu(host)));
    const memory = memorySection(await runProbe('Memory', () => probeMemory(host)));
    const volumes = volumesSection(await runProbe('Volumes', () => probeVolumes(host)));
    const physicalDisks = physicalDisksSection(await runProbe('PhysicalDisks', () => probePhysicalDisks(host)));

    const sections: Section[] = [system, cpu, memory, volumes, physicalDisks];
    const report: Report = deepFreeze({
        GeneratedAt: generatedAt.toISOString(),
        Sections: sections,
    });

    await logThought(`[Report] Collected ${sections.length} sections, worst severity '${reportWorstSeverity(report)}'.`);
    return report;
}

export function reportWorstSeverity(report: Report): Severity {
    return worstSeverity(report.Sections.map((section) => section.Severity));
}

export function findSection<K extends SectionKind>(report: Report, kind: K): SectionOf<K> | undefined {
    return report.Sections.find((section): section is SectionOf<K> => section.kind === kind);
}
