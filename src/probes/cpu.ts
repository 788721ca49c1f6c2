import type { CpuInfo, CpuLoadSource } from '../types/host-health.js';
import type { HostInstrumentation, ProcessorPackage } from '../services/host-instrumentation.js';
import { safeError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { roundTo } from './units.js';

/** Fixed length of the live per-processor counter sample. */
export const LIVE_SAMPLE_SECONDS = 1;

export interface CpuLoadSample {
    perCore: number[];
    overall: number | null;
}

/** One tier of the CPU load fallback chain. `null` means "no usable data". */
export interface CpuLoadStrategy {
    readonly name: Exclude<CpuLoadSource, 'none'>;
    sample(): Promise<CpuLoadSample | null>;
}

export interface ResolvedCpuLoad extends CpuLoadSample {
    source: CpuLoadSource;
}

interface InstanceValue {
    instance: string;
    value: number | null | undefined;
}

function isTotalInstance(instance: string): boolean {
    return instance.toLowerCase().includes('_total');
}

/** Numeric index path of a counter instance: `"3"` → [3], `"1,7"` → [1, 7]. */
function instanceIndex(instance: string): number[] {
    return (instance.match(/\d+/g) ?? []).map(Number);
}

function compareIndex(a: number[], b: number[]): number {
    if (a.length === 0 || b.length === 0) {
        return b.length - a.length;
    }
    for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
        const diff = (a[i] ?? 0) - (b[i] ?? 0);
        if (diff !== 0) {
            return diff;
        }
    }
    return a.length - b.length;
}

function clampPercent(value: number): number {
    return Math.min(100, Math.max(0, value));
}

export function meanLoad(perCore: readonly number[]): number | null {
    if (perCore.length === 0) {
        return null;
    }
    const sum = perCore.reduce((acc, value) => acc + value, 0);
    return Math.round(sum / perCore.length);
}

/**
 * Per-core load from counter instances: the `_Total` pseudo-core is dropped,
 * the rest sorted by numeric core index. Returns `null` when nothing is left.
 *
 * `overall` is the rounded mean of the clamped raw values; `perCore` keeps
 * two decimals for display.
 */
export function perCoreFromInstances(instances: readonly InstanceValue[]): CpuLoadSample | null {
    const raw = instances
        .filter((entry) => !isTotalInstance(entry.instance))
        .filter((entry): entry is { instance: string; value: number } =>
            typeof entry.value === 'number' && Number.isFinite(entry.value),
        )
        .map((entry) => ({ index: instanceIndex(entry.instance), value: clampPercent(entry.value) }))
        .sort((a, b) => compareIndex(a.index, b.index))
        .map((entry) => entry.value);

    if (raw.length === 0) {
        return null;
    }
    return { perCore: raw.map((value) => roundTo(value, 2)), overall: meanLoad(raw) };
}

// ── Strategies ──────────────────────────────────────────────────────────────

export function formattedCounterStrategy(host: HostInstrumentation): CpuLoadStrategy {
    return {
        name: 'formatted-counters',
        async sample() {
            const counters = await host.getFormattedProcessorCounters();
            return perCoreFromInstances(
                counters.map((counter) => ({ instance: counter.Name, value: counter.PercentProcessorTime })),
            );
        },
    };
}

export function liveSampleStrategy(host: HostInstrumentation, sampleSeconds = LIVE_SAMPLE_SECONDS): CpuLoadStrategy {
    return {
        name: 'live-sample',
        async sample() {
            const samples = await host.sampleProcessorCounters(sampleSeconds);
            return perCoreFromInstances(
                samples.map((entry) => ({ instance: entry.InstanceName, value: entry.CookedValue })),
            );
        },
    };
}

export function legacyLoadStrategy(processors: readonly ProcessorPackage[]): CpuLoadStrategy {
    return {
        name: 'legacy-load',
        async sample() {
            const load = processors.find((p) => typeof p.LoadPercentage === 'number')?.LoadPercentage;
            if (typeof load !== 'number' || !Number.isFinite(load)) {
                return null;
            }
            return { perCore: [], overall: Math.round(clampPercent(load)) };
        },
    };
}

/**
 * Walk the strategies in order and keep the first usable sample.
 * A throwing strategy counts as "no data"; later strategies are not invoked
 * once one succeeds.
 */
export async function resolveCpuLoad(strategies: readonly CpuLoadStrategy[]): Promise<ResolvedCpuLoad> {
    for (const strategy of strategies) {
        let sample: CpuLoadSample | null;
        try {
            sample = await strategy.sample();
        } catch (err) {
            await logThought(`[Probe:CPU] ${strategy.name} unavailable: ${safeError(err)}`);
            continue;
        }

        if (sample && (sample.perCore.length > 0 || sample.overall !== null)) {
            return {
                perCore: sample.perCore,
                overall: sample.overall ?? meanLoad(sample.perCore),
                source: strategy.name,
            };
        }
    }

    return { perCore: [], overall: null, source: 'none' };
}

export function defaultCpuLoadStrategies(
    host: HostInstrumentation,
    processors: readonly ProcessorPackage[],
): CpuLoadStrategy[] {
    return [formattedCounterStrategy(host), liveSampleStrategy(host), legacyLoadStrategy(processors)];
}

export async function probeCpu(
    host: HostInstrumentation,
    buildStrategies: (processors: readonly ProcessorPackage[]) => CpuLoadStrategy[] = (processors) =>
        defaultCpuLoadStrategies(host, processors),
): Promise<CpuInfo> {
    let processors: readonly ProcessorPackage[] = [];
    try {
        processors = await host.getProcessors();
    } catch (err) {
        // Only the legacy tier and Name/Cores depend on the package query.
        await logThought(`[Probe:CPU] Processor query failed: ${safeError(err)}`);
    }
    const load = await resolveCpuLoad(buildStrategies(processors));

    return {
        Name: processors[0]?.Name?.trim() || 'Unknown',
        Cores: processors.reduce((total, p) => total + (p.NumberOfCores ?? 0), 0),
        LoadPct: load.overall,
        PerCore: load.perCore,
        Source: load.source,
    };
}
