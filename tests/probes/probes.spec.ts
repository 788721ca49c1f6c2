import { describe, it, expect } from 'vitest';
import { formatUptime, probeSystem } from '../../src/probes/system.js';
import { probeMemory } from '../../src/probes/memory.js';
import { probeVolumes } from '../../src/probes/volumes.js';
import {
    NO_PHYSICAL_DISKS_MESSAGE,
    PHYSICAL_DISKS_UNAVAILABLE_MESSAGE,
    probePhysicalDisks,
} from '../../src/probes/physical-disks.js';
import { runProbe } from '../../src/probes/run-probe.js';
import { roundTo } from '../../src/probes/units.js';
import { PowerShellError } from '../../src/utils/errors.js';
import { GIB, KIB_PER_GIB, buildFakeHost } from '../harness/fake-host.js';

describe('formatUptime', () => {
    it('uses remainder hours and minutes, truncating partial units', () => {
        const elapsed = ((2 * 24 + 5) * 60 + 7) * 60_000 + 59_000;
        expect(formatUptime(elapsed)).toBe('2d 5h 7m');
    });

    it('clamps negative durations to zero', () => {
        expect(formatUptime(-5_000)).toBe('0d 0h 0m');
    });
});

describe('probeSystem', () => {
    it('reports identity, OS version and uptime relative to now', async () => {
        const host = buildFakeHost();
        const now = new Date('2026-10-18T10:45:30.000Z');

        const info = await probeSystem(host, now);

        expect(info).toEqual({
            ComputerName: 'WS-TEST-01',
            UserName: 'tester',
            OSVersion: 'Microsoft Windows 11 Pro 10.0.22631',
            IsAdmin: false,
            Uptime: '2d 2h 15m',
            Timestamp: '2026-10-18T10:45:30.000Z',
        });
    });

    it('rejects an unparsable boot time', async () => {
        const host = buildFakeHost();
        host.getSystemIdentity.mockResolvedValueOnce({
            ComputerName: 'WS-TEST-01',
            UserName: 'tester',
            Caption: 'Windows',
            Version: '10.0',
            IsAdmin: true,
            LastBootUpTime: 'not-a-date',
        });

        await expect(probeSystem(host, new Date())).rejects.toThrow("Unrecognized last boot time 'not-a-date'.");
    });
});

describe('probeMemory', () => {
    it('converts KiB counters to GiB and computes the used percentage', async () => {
        const host = buildFakeHost({
            memory: { TotalVisibleMemorySize: 32 * KIB_PER_GIB, FreePhysicalMemory: 4.7 * KIB_PER_GIB },
        });

        const memory = await probeMemory(host);

        expect(memory).toEqual({ TotalGB: 32, UsedGB: 27.3, FreeGB: 4.7, UsedPct: 85.31 });
    });

    it('keeps used + free equal to total within rounding', async () => {
        const host = buildFakeHost({
            memory: { TotalVisibleMemorySize: 16_658_432, FreePhysicalMemory: 3_912_344 },
        });

        const memory = await probeMemory(host);

        expect(Math.abs(memory.UsedGB + memory.FreeGB - memory.TotalGB)).toBeLessThanOrEqual(0.01);
    });

    it('reports 0% used when total memory is zero', async () => {
        const host = buildFakeHost({ memory: { TotalVisibleMemorySize: 0, FreePhysicalMemory: null } });

        expect(await probeMemory(host)).toEqual({ TotalGB: 0, UsedGB: 0, FreeGB: 0, UsedPct: 0 });
    });
});

describe('probeVolumes', () => {
    it('keys volumes by drive letter with GiB sizes and used percent', async () => {
        const host = buildFakeHost({
            volumes: [
                { DeviceID: 'C:', Size: 200 * GIB, FreeSpace: 16 * GIB },
                { DeviceID: 'D:', Size: 500 * GIB, FreeSpace: 300 * GIB },
            ],
        });

        const volumes = await probeVolumes(host);

        expect(volumes).toEqual({
            'C:': { TotalGB: 200, UsedGB: 184, FreeGB: 16, UsedPct: 92 },
            'D:': { TotalGB: 500, UsedGB: 200, FreeGB: 300, UsedPct: 40 },
        });
    });

    it('treats missing size and free space as zero', async () => {
        const host = buildFakeHost({ volumes: [{ DeviceID: 'E:', Size: null, FreeSpace: undefined }] });

        expect(await probeVolumes(host)).toEqual({
            'E:': { TotalGB: 0, UsedGB: 0, FreeGB: 0, UsedPct: 0 },
        });
    });

    it('returns an empty map when there are no fixed volumes', async () => {
        expect(await probeVolumes(buildFakeHost({ volumes: [] }))).toEqual({});
    });
});

describe('probePhysicalDisks', () => {
    it('returns an unavailable marker when enumeration is not installed', async () => {
        const host = buildFakeHost({ physicalDisks: null });

        expect(await probePhysicalDisks(host)).toEqual({
            Unavailable: true,
            Message: PHYSICAL_DISKS_UNAVAILABLE_MESSAGE,
        });
    });

    it('returns a no-devices marker for an empty enumeration', async () => {
        const host = buildFakeHost({ physicalDisks: [] });

        expect(await probePhysicalDisks(host)).toEqual({ NoDevices: true, Message: NO_PHYSICAL_DISKS_MESSAGE });
    });

    it('keys devices by friendly name and disambiguates duplicates', async () => {
        const disk = {
            FriendlyName: 'Test HDD',
            HealthStatus: 'Warning',
            OperationalStatus: 'Predictive Failure',
            MediaType: 'HDD',
            Size: 1024 * GIB,
        };
        const host = buildFakeHost({
            physicalDisks: [disk, { ...disk, HealthStatus: 'Healthy', OperationalStatus: 'OK', MediaType: null }],
        });

        expect(await probePhysicalDisks(host)).toEqual({
            'Test HDD': { HealthStatus: 'Warning', OperationalStatus: 'Predictive Failure', MediaType: 'HDD', SizeGB: 1024 },
            'Test HDD (2)': { HealthStatus: 'Healthy', OperationalStatus: 'OK', MediaType: 'Unknown', SizeGB: 1024 },
        });
    });
});

describe('runProbe', () => {
    it('passes probe data through untouched', async () => {
        expect(await runProbe('Memory', async () => ({ UsedPct: 10 }))).toEqual({ UsedPct: 10 });
    });

    it('converts a fault into a structured error payload', async () => {
        const result = await runProbe('PhysicalDisks', async () => {
            throw new PowerShellError('PowerShell query failed: Access denied\n   at line 3', 'PowerShellExecutionError', 5);
        });

        expect(result).toEqual({
            Error: true,
            Message: 'PowerShell query failed: Access denied',
            Category: 'PowerShellExecutionError',
            FullyQualifiedId: 'PhysicalDisksProbe,PowerShellExecutionError',
        });
    });

    it('uses the error name as the category for plain errors', async () => {
        const result = await runProbe('CPU', async () => {
            throw new TypeError('bad value');
        });

        expect(result).toMatchObject({ Error: true, Category: 'TypeError', FullyQualifiedId: 'CPUProbe,TypeError' });
    });
});

describe('roundTo', () => {
    it('rounds half away from zero', () => {
        expect(roundTo(85.3125, 2)).toBe(85.31);
        expect(roundTo(1.005, 2)).toBe(1.01);
        expect(roundTo(2.5, 0)).toBe(3);
    });
});
