import type {
    CpuInfo,
    CpuSection,
    MemoryInfo,
    MemorySection,
    PhysicalDiskPayload,
    PhysicalDisksSection,
    ProbeResult,
    Severity,
    SeverityThresholds,
    SystemInfo,
    SystemSection,
    VolumeAggregate,
    VolumeRecordMap,
    VolumeUsageMap,
    VolumesSection,
} from '../types/host-health.js';
import { isProbeError } from '../utils/errors.js';
import { roundTo } from '../probes/units.js';
import {
    MEMORY_THRESHOLDS,
    MISSING_DATA_SEVERITY,
    VOLUME_THRESHOLDS,
    classifyWith,
    maxSeverity,
    severityLabel,
} from './severity.js';

export const SECTION_TITLES = {
    system: 'System',
    cpu: 'CPU',
    memory: 'Memory',
    volumes: 'Volumes',
    physicalDisks: 'Physical Disks',
} as const;

function formatPercent(value: number | null | undefined): string {
    return typeof value === 'number' && Number.isFinite(value) ? `${value.toFixed(1)}%` : 'n/a';
}

function thresholdText(thresholds: SeverityThresholds): string {
    return `warn ${thresholds.warn}% / crit ${thresholds.error}%`;
}

function freePercent(usedPct: number): number {
    return roundTo(100 - usedPct, 2);
}

// ── Informational sections ──────────────────────────────────────────────────

export function systemSection(result: ProbeResult<SystemInfo>): SystemSection {
    return {
        kind: 'system',
        Title: SECTION_TITLES.system,
        Data: result,
        Severity: isProbeError(result) ? MISSING_DATA_SEVERITY : 'info',
    };
}

export function cpuSection(result: ProbeResult<CpuInfo>): CpuSection {
    return {
        kind: 'cpu',
        Title: SECTION_TITLES.cpu,
        Data: result,
        Severity: isProbeError(result) ? MISSING_DATA_SEVERITY : 'info',
    };
}

// ── Threshold-classified sections ───────────────────────────────────────────

export function memorySection(result: ProbeResult<MemoryInfo>): MemorySection {
    const thresholds = MEMORY_THRESHOLDS;

    if (isProbeError(result)) {
        return {
            kind: 'memory',
            Title: `${SECTION_TITLES.memory} - ${severityLabel(MISSING_DATA_SEVERITY)} (${thresholdText(thresholds)}, used n/a)`,
            Data: result,
            Severity: MISSING_DATA_SEVERITY,
        };
    }

    const severity = classifyWith(result.UsedPct, thresholds);
    const status = severityLabel(severity);
    return {
        kind: 'memory',
        Title: `${SECTION_TITLES.memory} - ${status} (${thresholdText(thresholds)}, used ${formatPercent(result.UsedPct)})`,
        Data: { ...result, FreePct: freePercent(result.UsedPct), Status: status },
        Severity: severity,
    };
}

/**
 * Classify each volume and attach `FreePct`, `Severity` and `Status`.
 * A record without `UsedPct` is classified as missing data.
 */
export function classifyVolumes(volumes: VolumeUsageMap): VolumeRecordMap {
    const records: VolumeRecordMap = {};
    for (const [id, volume] of Object.entries(volumes)) {
        const usedPct = volume.UsedPct;
        const severity = classifyWith(usedPct, VOLUME_THRESHOLDS);
        records[id] = {
            ...volume,
            FreePct: typeof usedPct === 'number' && Number.isFinite(usedPct) ? freePercent(usedPct) : null,
            Severity: severity,
            Status: severityLabel(severity),
        };
    }
    return records;
}

/**
 * Worst severity, highest used percent and lowest free percent across volumes.
 * A malformed record (no `UsedPct`) raises the worst severity to at least
 * `warn` but never lowers an `error`.
 */
export function aggregateVolumes(records: VolumeRecordMap): VolumeAggregate {
    let worst: Severity = 'info';
    let maxUsed: number | null = null;
    let minFree: number | null = null;

    for (const record of Object.values(records)) {
        const usedPct = record.UsedPct;
        if (typeof usedPct !== 'number' || !Number.isFinite(usedPct) || record.FreePct === null) {
            worst = maxSeverity(worst, MISSING_DATA_SEVERITY);
            continue;
        }

        worst = maxSeverity(worst, record.Severity);
        maxUsed = maxUsed === null ? usedPct : Math.max(maxUsed, usedPct);
        minFree = minFree === null ? record.FreePct : Math.min(minFree, record.FreePct);
    }

    return { worst, maxUsed, minFree };
}

export function volumesSection(result: ProbeResult<VolumeUsageMap>): VolumesSection {
    const thresholds = thresholdText(VOLUME_THRESHOLDS);

    if (isProbeError(result)) {
        return {
            kind: 'volumes',
            Title: `${SECTION_TITLES.volumes} - ${severityLabel(MISSING_DATA_SEVERITY)} (${thresholds}, max used n/a, min free n/a)`,
            Data: result,
            Severity: MISSING_DATA_SEVERITY,
        };
    }

    const records = classifyVolumes(result);
    const { worst, maxUsed, minFree } = aggregateVolumes(records);
    return {
        kind: 'volumes',
        Title:
            `${SECTION_TITLES.volumes} - ${severityLabel(worst)} ` +
            `(${thresholds}, max used ${formatPercent(maxUsed)}, min free ${formatPercent(minFree)})`,
        Data: records,
        Severity: worst,
    };
}

// ── Physical disks ──────────────────────────────────────────────────────────

/** Only a probe fault raises severity; unavailable/no-device markers stay `info`. */
export function physicalDisksSection(result: ProbeResult<PhysicalDiskPayload>): PhysicalDisksSection {
    return {
        kind: 'physical-disks',
        Title: SECTION_TITLES.physicalDisks,
        Data: result,
        Severity: isProbeError(result) ? MISSING_DATA_SEVERITY : 'info',
    };
}
