
export interface MeanResult {
    mean: number | null;
    count: number; // non-null contributions
    total: number; // rows seen, nulls included
}

/**
 * Groups rows by key and averages their values, skipping nulls.
 * Keys keep first-seen order.
 */
export function averageBy<T, K>(
    rows: Iterable<T>,
    keyOf: (row: T) => K,
    valueOf: (row: T) => number | null
): Map<K, MeanResult> {
    const acc = new Map<K, { sum: number; count: number; total: number }>();
    for (const row of rows) {
        const key = keyOf(row);
        let slot = acc.get(key);
        if (!slot) {
            slot = { sum: 0, count: 0, total: 0 };
            acc.set(key, slot);
        }
        slot.total++;
        const value = valueOf(row);
        if (value === null || !Number.isFinite(value)) continue;
        slot.sum += value;
        slot.count++;
    }

    const result = new Map<K, MeanResult>();
    for (const [key, { sum, count, total }] of acc) {
        result.set(key, { mean: count > 0 ? sum / count : null, count, total });
    }
    return result;
}

/**
 * Sorted distinct values.
 */
export const distinctSorted = (values: Iterable<number>): number[] =>
    [...new Set(values)].sort((a, b) => a - b);
