// ── Host Health Types ────────────────────────────────────────────────────────

/**
 * Severity of a report section or of a single entity inside it.
 *
 * - `info`  — Within normal bounds, or informational only.
 * - `warn`  — Above the warning threshold, or the data could not be collected.
 * - `error` — Above the critical threshold.
 */
export type Severity = 'info' | 'warn' | 'error';

/** Human-readable rendering of a {@link Severity}. */
export type SeverityLabel = 'Normal' | 'Warning' | 'Critical';

/** Warning and critical percentage thresholds for one metric domain. */
export interface SeverityThresholds {
    warn: number;
    error: number;
}

/** Structured marker a probe returns instead of data when it faults. */
export interface ProbeError {
    Error: true;
    Message: string;
    Category: string;
    FullyQualifiedId: string;
}

export type ProbeResult<T> = T | ProbeError;

// ── Probe payloads ──────────────────────────────────────────────────────────

export interface SystemInfo {
    ComputerName: string;
    UserName: string;
    OSVersion: string;
    IsAdmin: boolean;
    /** `{days}d {hours}h {minutes}m` */
    Uptime: string;
    Timestamp: string;
}

export type CpuLoadSource = 'formatted-counters' | 'live-sample' | 'legacy-load' | 'none';

export interface CpuInfo {
    Name: string;
    Cores: number;
    LoadPct: number | null;
    PerCore: number[];
    Source: CpuLoadSource;
}

export interface MemoryInfo {
    TotalGB: number;
    UsedGB: number;
    FreeGB: number;
    UsedPct: number;
}

/** Memory payload after the aggregator attached derived fields. */
export interface MemoryData extends MemoryInfo {
    FreePct: number;
    Status: SeverityLabel;
}

export interface VolumeUsage {
    TotalGB: number;
    UsedGB: number;
    FreeGB: number;
    /** Absent when the probe could not compute it for this volume. */
    UsedPct?: number;
}

/** Volume usage keyed by drive letter (`C:`, `D:`, ...). */
export type VolumeUsageMap = Record<string, VolumeUsage>;

export interface VolumeRecord extends VolumeUsage {
    FreePct: number | null;
    Severity: Severity;
    Status: SeverityLabel;
}

export type VolumeRecordMap = Record<string, VolumeRecord>;

export interface PhysicalDiskInfo {
    HealthStatus: string;
    OperationalStatus: string;
    MediaType: string;
    SizeGB: number;
}

/** Physical disk enumeration is not installed on this host. */
export interface PhysicalDisksUnavailable {
    Unavailable: true;
    Message: string;
}

/** Enumeration ran but found no physical devices. */
export interface PhysicalDisksEmpty {
    NoDevices: true;
    Message: string;
}

export type PhysicalDiskPayload =
    | Record<string, PhysicalDiskInfo>
    | PhysicalDisksUnavailable
    | PhysicalDisksEmpty;

// ── Sections & report ───────────────────────────────────────────────────────

interface SectionBase<K extends string, D> {
    /** Domain tag; renderers dispatch on it instead of inspecting Data. */
    kind: K;
    Title: string;
    Data: D;
    Severity: Severity;
}

export type SystemSection = SectionBase<'system', ProbeResult<SystemInfo>>;
export type CpuSection = SectionBase<'cpu', ProbeResult<CpuInfo>>;
export type MemorySection = SectionBase<'memory', ProbeResult<MemoryData>>;
export type VolumesSection = SectionBase<'volumes', ProbeResult<VolumeRecordMap>>;
export type PhysicalDisksSection = SectionBase<'physical-disks', ProbeResult<PhysicalDiskPayload>>;

export type Section =
    | SystemSection
    | CpuSection
    | MemorySection
    | VolumesSection
    | PhysicalDisksSection;

export type SectionKind = Section['kind'];

export interface Report {
    GeneratedAt: string;
    Sections: readonly Section[];
}

/** Cross-volume rollup feeding the Volumes section title. */
export interface VolumeAggregate {
    worst: Severity;
    maxUsed: number | null;
    minFree: number | null;
}
