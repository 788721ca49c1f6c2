import { z } from 'zod';
import { PowerShellRunner } from './powershell.js';

// ── Raw instrumentation records ─────────────────────────────────────────────

const nullableNumber = z.number().nullable().optional();
const nullableString = z.string().nullable().optional();

/** PowerShell emits a bare object for one result and nothing for none. */
function listOf<T extends z.ZodTypeAny>(item: T) {
    return z.preprocess(
        (value) => (value === null || value === undefined ? [] : Array.isArray(value) ? value : [value]),
        z.array(item),
    );
}

export const systemIdentitySchema = z.object({
    ComputerName: z.string(),
    UserName: z.string(),
    Caption: z.string(),
    Version: z.string(),
    IsAdmin: z.boolean(),
    LastBootUpTime: z.string(),
});

export const processorSchema = z.object({
    Name: nullableString,
    NumberOfCores: nullableNumber,
    LoadPercentage: nullableNumber,
});

export const formattedProcessorCounterSchema = z.object({
    Name: z.string(),
    PercentProcessorTime: nullableNumber,
});

export const processorCounterSampleSchema = z.object({
    InstanceName: z.string(),
    CookedValue: nullableNumber,
});

export const operatingSystemMemorySchema = z.object({
    TotalVisibleMemorySize: nullableNumber,
    FreePhysicalMemory: nullableNumber,
});

export const logicalDiskSchema = z.object({
    DeviceID: z.string(),
    Size: nullableNumber,
    FreeSpace: nullableNumber,
});

export const physicalDiskSchema = z.object({
    FriendlyName: nullableString,
    HealthStatus: nullableString,
    OperationalStatus: nullableString,
    MediaType: nullableString,
    Size: nullableNumber,
});

const physicalDiskEnumerationSchema = z.object({
    Available: z.boolean(),
    Disks: listOf(physicalDiskSchema),
});

export type SystemIdentity = z.infer<typeof systemIdentitySchema>;
export type ProcessorPackage = z.infer<typeof processorSchema>;
export type FormattedProcessorCounter = z.infer<typeof formattedProcessorCounterSchema>;
export type ProcessorCounterSample = z.infer<typeof processorCounterSampleSchema>;
export type OperatingSystemMemory = z.infer<typeof operatingSystemMemorySchema>;
export type LogicalDisk = z.infer<typeof logicalDiskSchema>;
export type PhysicalDisk = z.infer<typeof physicalDiskSchema>;

/**
 * Read-only view of the host's native instrumentation.
 *
 * Probes depend on this interface only; tests substitute an in-memory fake.
 */
export interface HostInstrumentation {
    getSystemIdentity(): Promise<SystemIdentity>;
    getProcessors(): Promise<ProcessorPackage[]>;
    getFormattedProcessorCounters(): Promise<FormattedProcessorCounter[]>;
    /** One live sample of per-processor busy time, blocking for `sampleSeconds`. */
    sampleProcessorCounters(sampleSeconds: number): Promise<ProcessorCounterSample[]>;
    getOperatingSystemMemory(): Promise<OperatingSystemMemory>;
    /** Fixed local volumes only (removable, network and optical drives excluded). */
    getFixedVolumes(): Promise<LogicalDisk[]>;
    /** `null` when physical disk enumeration is not installed on this host. */
    getPhysicalDisks(): Promise<PhysicalDisk[] | null>;
}

// ── Windows implementation ──────────────────────────────────────────────────

const SYSTEM_IDENTITY_SCRIPT = `
$os = Get-CimInstance -ClassName Win32_OperatingSystem -ErrorAction Stop
$principal = New-Object Security.Principal.WindowsPrincipal([Security.Principal.WindowsIdentity]::GetCurrent())
[pscustomobject]@{
    ComputerName   = [string]$env:COMPUTERNAME
    UserName       = [string]$env:USERNAME
    Caption        = [string]$os.Caption
    Version        = [string]$os.Version
    IsAdmin        = $principal.IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)
    LastBootUpTime = $os.LastBootUpTime.ToUniversalTime().ToString('o')
}`;

const PROCESSORS_SCRIPT =
    'Get-CimInstance -ClassName Win32_Processor -ErrorAction Stop | Select-Object Name, NumberOfCores, LoadPercentage';

const FORMATTED_COUNTERS_SCRIPT =
    'Get-CimInstance -ClassName Win32_PerfFormattedData_PerfOS_Processor -ErrorAction Stop | ' +
    'Select-Object Name, @{ n = "PercentProcessorTime"; e = { [double]$_.PercentProcessorTime } }';

const MEMORY_SCRIPT =
    'Get-CimInstance -ClassName Win32_OperatingSystem -ErrorAction Stop | ' +
    'Select-Object @{ n = "TotalVisibleMemorySize"; e = { [double]$_.TotalVisibleMemorySize } }, ' +
    '@{ n = "FreePhysicalMemory"; e = { [double]$_.FreePhysicalMemory } }';

const FIXED_VOLUMES_SCRIPT =
    "Get-CimInstance -ClassName Win32_LogicalDisk -Filter 'DriveType=3' -ErrorAction Stop | " +
    'Select-Object DeviceID, @{ n = "Size"; e = { [double]$_.Size } }, @{ n = "FreeSpace"; e = { [double]$_.FreeSpace } }';

const PHYSICAL_DISKS_SCRIPT = `
if (-not (Get-Command -Name Get-PhysicalDisk -ErrorAction SilentlyContinue)) {
    [pscustomobject]@{ Available = $false; Disks = @() }
} else {
    $disks = @(Get-PhysicalDisk -ErrorAction Stop | ForEach-Object {
        [pscustomobject]@{
            FriendlyName      = [string]$_.FriendlyName
            HealthStatus      = [string]$_.HealthStatus
            OperationalStatus = (@($_.OperationalStatus) | ForEach-Object { [string]$_ }) -join ', '
            MediaType         = [string]$_.MediaType
            Size              = [double]$_.Size
        }
    })
    [pscustomobject]@{ Available = $true; Disks = $disks }
}`;

function counterSampleScript(sampleSeconds: number): string {
    return (
        "(Get-Counter -Counter '\\Processor(*)\\% Processor Time' " +
        `-SampleInterval ${sampleSeconds} -MaxSamples 1 -ErrorAction Stop).CounterSamples | ` +
        'Select-Object InstanceName, CookedValue'
    );
}

/** {@link HostInstrumentation} backed by CIM classes and performance counters. */
export class WindowsInstrumentation implements HostInstrumentation {
    readonly #shell: PowerShellRunner;

    constructor(shell: PowerShellRunner = new PowerShellRunner()) {
        this.#shell = shell;
    }

    getSystemIdentity(): Promise<SystemIdentity> {
        return this.#shell.runJson(SYSTEM_IDENTITY_SCRIPT, systemIdentitySchema);
    }

    getProcessors(): Promise<ProcessorPackage[]> {
        return this.#shell.runJson(PROCESSORS_SCRIPT, listOf(processorSchema));
    }

    getFormattedProcessorCounters(): Promise<FormattedProcessorCounter[]> {
        return this.#shell.runJson(FORMATTED_COUNTERS_SCRIPT, listOf(formattedProcessorCounterSchema));
    }

    sampleProcessorCounters(sampleSeconds: number): Promise<ProcessorCounterSample[]> {
        return this.#shell.runJson(counterSampleScript(sampleSeconds), listOf(processorCounterSampleSchema));
    }

    getOperatingSystemMemory(): Promise<OperatingSystemMemory> {
        return this.#shell.runJson(MEMORY_SCRIPT, operatingSystemMemorySchema);
    }

    getFixedVolumes(): Promise<LogicalDisk[]> {
        return this.#shell.runJson(FIXED_VOLUMES_SCRIPT, listOf(logicalDiskSchema));
    }

    async getPhysicalDisks(): Promise<PhysicalDisk[] | null> {
        const result = await this.#shell.runJson(PHYSICAL_DISKS_SCRIPT, physicalDiskEnumerationSchema);
        return result.Available ? result.Disks : null;
    }
}
