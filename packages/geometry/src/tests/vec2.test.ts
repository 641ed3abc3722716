import { describe, expect, test } from 'vitest';
import { Vec2 } from '../vec2';

describe('vec2', () => {
    test('sub', () => {
        expect(Vec2.sub([2, 3], [4, 5])).toStrictEqual([-2, -2]);
    });

    test('min and max are component-wise', () => {
        expect(Vec2.min([1, 9], [4, 2])).toStrictEqual([1, 2]);
        expect(Vec2.max([1, 9], [4, 2])).toStrictEqual([4, 9]);
    });
});
