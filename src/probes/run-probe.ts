import type { ProbeResult } from '../types/host-health.js';
import { safeError, toProbeError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

/**
 * Invoke a probe and convert any fault into a {@link ProbeError} payload.
 * Never rejects.
 */
export async function runProbe<T>(name: string, probe: () => Promise<T>): Promise<ProbeResult<T>> {
    try {
        return await probe();
    } catch (err) {
        await logThought(`[Probe:${name}] failed: ${safeError(err)}`);
        return toProbeError(name, err);
    }
}
