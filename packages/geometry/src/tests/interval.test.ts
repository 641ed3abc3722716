import { describe, expect, it } from 'vitest';
import { type Interval, intersection, size } from '../interval';

function I(a: number, b: number): Interval {
    return { min: a, max: b };
}

describe('basic interval math', () => {
    it('size is the signed distance between min and max', () => {
        expect(size(I(1, 3))).toBe(2);
        expect(size(I(11, -3))).toBe(-14);
    });
    it('intersection is undefined when the intervals only touch', () => {
        expect(intersection(I(0, 5), I(3, 9))).toEqual(I(3, 5));
        expect(intersection(I(0, 5), I(5, 9))).toBeUndefined();
    });
});
