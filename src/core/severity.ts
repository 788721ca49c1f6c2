import type { Severity, SeverityLabel, SeverityThresholds } from '../types/host-health.js';

export const MEMORY_THRESHOLDS: Readonly<SeverityThresholds> = Object.freeze({ warn: 80, error: 90 });
export const VOLUME_THRESHOLDS: Readonly<SeverityThresholds> = Object.freeze({ warn: 85, error: 90 });

/** Severity assigned when a percentage could not be collected. */
export const MISSING_DATA_SEVERITY: Severity = 'warn';

const SEVERITY_RANK: Record<Severity, number> = {
    info: 0,
    warn: 1,
    error: 2,
};

const SEVERITY_LABELS: Record<Severity, SeverityLabel> = {
    info: 'Normal',
    warn: 'Warning',
    error: 'Critical',
};

/** A value equal to a threshold falls into the higher tier. */
export function classify(percent: number, warnThreshold: number, errorThreshold: number): Severity {
    if (percent >= errorThreshold) {
        return 'error';
    }
    if (percent >= warnThreshold) {
        return 'warn';
    }
    return 'info';
}

/** Classify against a domain's thresholds; a missing value yields {@link MISSING_DATA_SEVERITY}. */
export function classifyWith(percent: number | null | undefined, thresholds: SeverityThresholds): Severity {
    if (typeof percent !== 'number' || !Number.isFinite(percent)) {
        return MISSING_DATA_SEVERITY;
    }
    return classify(percent, thresholds.warn, thresholds.error);
}

export function severityLabel(severity: Severity): SeverityLabel {
    return SEVERITY_LABELS[severity];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
    return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

/** error > warn > info; an empty list is `info`. */
export function worstSeverity(severities: Iterable<Severity>): Severity {
    let worst: Severity = 'info';
    for (const severity of severities) {
        worst = maxSeverity(worst, severity);
    }
    return worst;
}
