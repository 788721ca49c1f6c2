const BYTES_PER_GIB = 1024 ** 3;
const KIB_PER_GIB = 1024 ** 2;

/** Round half away from zero to a fixed number of decimals. */
export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    const scaled = Math.abs(value) * factor;
    return (Math.sign(value) * Math.round(scaled + Number.EPSILON * scaled)) / factor;
}

export function bytesToGiB(bytes: number): number {
    return roundTo(bytes / BYTES_PER_GIB, 2);
}

export function kibToGiB(kib: number): number {
    return roundTo(kib / KIB_PER_GIB, 2);
}

/** `part / total` as a percentage with two decimals; 0 when `total` is 0. */
export function percentOf(part: number, total: number): number {
    if (total <= 0) {
        return 0;
    }
    return roundTo((part / total) * 100, 2);
}
