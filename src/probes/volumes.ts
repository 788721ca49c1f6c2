import type { VolumeUsageMap } from '../types/host-health.js';
import type { HostInstrumentation } from '../services/host-instrumentation.js';
import { bytesToGiB, percentOf } from './units.js';

/** Usage of every fixed local volume, keyed by drive letter. */
export async function probeVolumes(host: HostInstrumentation): Promise<VolumeUsageMap> {
    const disks = await host.getFixedVolumes();
    const volumes: VolumeUsageMap = {};

    for (const disk of disks) {
        const size = disk.Size ?? 0;
        const free = Math.min(disk.FreeSpace ?? 0, size);
        const used = size - free;

        volumes[disk.DeviceID] = {
            TotalGB: bytesToGiB(size),
            UsedGB: bytesToGiB(used),
            FreeGB: bytesToGiB(free),
            UsedPct: percentOf(used, size),
        };
    }

    return volumes;
}
