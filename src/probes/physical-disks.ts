import type { PhysicalDiskInfo, PhysicalDiskPayload } from '../types/host-health.js';
import type { HostInstrumentation } from '../services/host-instrumentation.js';
import { bytesToGiB } from './units.js';

export const PHYSICAL_DISKS_UNAVAILABLE_MESSAGE = 'Physical disk enumeration is not available on this host.';
export const NO_PHYSICAL_DISKS_MESSAGE = 'No physical disks were reported.';

function textOrUnknown(value: string | null | undefined): string {
    const trimmed = value?.trim();
    return trimmed ? trimmed : 'Unknown';
}

function uniqueKey(name: string, taken: Record<string, PhysicalDiskInfo>): string {
    if (!(name in taken)) {
        return name;
    }
    let suffix = 2;
    while (`${name} (${suffix})` in taken) {
        suffix += 1;
    }
    return `${name} (${suffix})`;
}

/**
 * Health of each physical storage device keyed by friendly name.
 * A missing enumeration capability and an empty device list are reported as
 * markers, not errors.
 */
export async function probePhysicalDisks(host: HostInstrumentation): Promise<PhysicalDiskPayload> {
    const disks = await host.getPhysicalDisks();
    if (disks === null) {
        return { Unavailable: true, Message: PHYSICAL_DISKS_UNAVAILABLE_MESSAGE };
    }
    if (disks.length === 0) {
        return { NoDevices: true, Message: NO_PHYSICAL_DISKS_MESSAGE };
    }

    const byName: Record<string, PhysicalDiskInfo> = {};
    for (const disk of disks) {
        const key = uniqueKey(textOrUnknown(disk.FriendlyName), byName);
        byName[key] = {
            HealthStatus: textOrUnknown(disk.HealthStatus),
            OperationalStatus: textOrUnknown(disk.OperationalStatus),
            MediaType: textOrUnknown(disk.MediaType),
            SizeGB: bytesToGiB(disk.Size ?? 0),
        };
    }
    return byName;
}
