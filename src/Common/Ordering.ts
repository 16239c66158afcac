/**
 * Deterministic ordering helpers. Comparison is ordinal (code unit order), independent of locale.
 */

export const CompareOrdinal = (a: string, b: string): number => {
    return a < b ? -1 : a > b ? 1 : 0;
};

/**
 * Returns a sorted copy keyed by a string projection. Stable for equal keys.
 * @example
 * SortByKey(equipment, eq => eq.tag);
 */
export function SortByKey<T>(items: readonly T[], key: (item: T) => string): T[] {
    return items.slice().sort((a, b) => {
        return CompareOrdinal(key(a), key(b));
    });
}

/**
 * Groups items by a string key and returns the groups ordered by key.
 * Items keep their input order inside a group.
 */
export function GroupSorted<T>(items: readonly T[], key: (item: T) => string): Array<[string, T[]]> {
    const groups = new Map<string, T[]>();

    for (const item of items) {
        const groupKey = key(item);
        const bucket = groups.get(groupKey);

        if (bucket) {
            bucket.push(item);
        } else {
            groups.set(groupKey, [item]);
        }
    }
    return Array.from(groups.entries()).sort(([a], [b]) => {
        return CompareOrdinal(a, b);
    });
}

/** Distinct non-empty values, ordinal order. */
export function DistinctSorted(values: Iterable<string | undefined>): string[] {
    const distinct = new Set<string>();

    for (const value of values) {
        if (value) {
            distinct.add(value);
        }
    }
    return Array.from(distinct).sort(CompareOrdinal);
}
