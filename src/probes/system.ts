import type { SystemInfo } from '../types/host-health.js';
import type { HostInstrumentation } from '../services/host-instrumentation.js';

const MS_PER_MINUTE = 60_000;

/** `{days}d {hours}h {minutes}m`; hours and minutes are remainders. */
export function formatUptime(elapsedMs: number): string {
    const totalMinutes = Math.max(0, Math.floor(elapsedMs / MS_PER_MINUTE));
    const days = Math.floor(totalMinutes / (24 * 60));
    const hours = Math.floor(totalMinutes / 60) % 24;
    const minutes = totalMinutes % 60;
    return `${days}d ${hours}h ${minutes}m`;
}

export async function probeSystem(host: HostInstrumentation, now: Date): Promise<SystemInfo> {
    const identity = await host.getSystemIdentity();
    const bootTime = new Date(identity.LastBootUpTime);
    if (Number.isNaN(bootTime.getTime())) {
        throw new Error(`Unrecognized last boot time '${identity.LastBootUpTime}'.`);
    }

    return {
        ComputerName: identity.ComputerName,
        UserName: identity.UserName,
        OSVersion: `${identity.Caption} ${identity.Version}`.trim(),
        IsAdmin: identity.IsAdmin,
        Uptime: formatUptime(now.getTime() - bootTime.getTime()),
        Timestamp: now.toISOString(),
    };
}
