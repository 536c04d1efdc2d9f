export type SortKey = string | number;

/**
 * Builds a comparator over a derived key. Descending flips the comparison
 * itself, so with Array.prototype.sort (stable) equal keys keep their input
 * order in both directions.
 */
export function compareBy<T>(key: (item: T) => SortKey, descending = false): (a: T, b: T) => number {
    return (a, b) => {
        const left = key(a);
        const right = key(b);
        const order = left < right ? -1 : left > right ? 1 : 0;
        return descending ? -order : order;
    };
}

export function average(values: number[]): number {
    if (values.length === 0) {
        return 0;
    }
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}
