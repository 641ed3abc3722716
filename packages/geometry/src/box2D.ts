import { Vec2, type vec2 } from './vec2';

export type box2D = {
    readonly minCorner: vec2;
    readonly maxCorner: vec2;
};

const create = (minCorner: vec2, maxCorner: vec2): box2D => ({ minCorner, maxCorner });

const size = (b: box2D): vec2 => Vec2.sub(b.maxCorner, b.minCorner);

/**
 * the tightest box around the given points, or undefined when there are none
 */
const fromPoints = (points: ReadonlyArray<vec2>): box2D | undefined => {
    if (points.length === 0) {
        return undefined;
    }
    let lo = points[0];
    let hi = points[0];
    for (const p of points) {
        lo = Vec2.min(lo, p);
        hi = Vec2.max(hi, p);
    }
    return create(lo, hi);
};

export const Box2D = { create, size, fromPoints };
