import type { MemoryInfo } from '../types/host-health.js';
import type { HostInstrumentation } from '../services/host-instrumentation.js';
import { kibToGiB, percentOf } from './units.js';

export async function probeMemory(host: HostInstrumentation): Promise<MemoryInfo> {
    const os = await host.getOperatingSystemMemory();
    const totalKiB = os.TotalVisibleMemorySize ?? 0;
    const freeKiB = Math.min(os.FreePhysicalMemory ?? 0, totalKiB);
    const usedKiB = totalKiB - freeKiB;

    return {
        TotalGB: kibToGiB(totalKiB),
        UsedGB: kibToGiB(usedKiB),
        FreeGB: kibToGiB(freeKiB),
        UsedPct: percentOf(usedKiB, totalKiB),
    };
}
