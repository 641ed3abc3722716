export type Interval = {
    min: number;
    max: number;
};

/**
 * @returns the distance between the start and end of i. note this value may be negative
 */
export function size(i: Interval) {
    return i.max - i.min;
}

/**
 * @return the interval where a and b overlap, or undefined if there is no such interval
 */
export function intersection(a: Interval, b: Interval): Interval | undefined {
    const result = { min: Math.max(a.min, b.min), max: Math.min(a.max, b.max) };
    if (size(result) > 0) return result;

    return undefined;
}
