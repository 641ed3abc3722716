// vectors are plain readonly tuples; the operations live in the Vec2 object below,
// so a literal like [1, 2] can be passed anywhere a vec2 is expected
export type vec2 = readonly [number, number];

const sub = (a: vec2, b: vec2): vec2 => [a[0] - b[0], a[1] - b[1]];
const min = (a: vec2, b: vec2): vec2 => [Math.min(a[0], b[0]), Math.min(a[1], b[1])];
const max = (a: vec2, b: vec2): vec2 => [Math.max(a[0], b[0]), Math.max(a[1], b[1])];
const exactlyEqual = (a: vec2, b: vec2) => a[0] === b[0] && a[1] === b[1];

export const Vec2 = { sub, min, max, exactlyEqual };
