import { InvalidArgumentError } from '@regionlink/core';
import { ImagePlane } from '@regionlink/geometry';
import { describe, expect, it } from 'vitest';
import { createRegionRequest, fullImageRequest, type RegionRequest, validateRegionRequest } from './region-request';
import { SyntheticImageSource } from './test/synthetic-source';

const source = new SyntheticImageSource({ width: 40, height: 30 }, undefined, 'memory://slide');

describe('building requests', () => {
    it('places the rectangle on the default channel of the given z and t', () => {
        const request = createRegionRequest(source, { downsample: 2, x: 1, y: 2, width: 3, height: 4, z: 1, t: 0 });
        expect(request).toEqual({
            path: 'memory://slide',
            downsample: 2,
            x: 1,
            y: 2,
            width: 3,
            height: 4,
            plane: ImagePlane.at(1, 0),
        });
    });

    it('covers the whole image on the default plane', () => {
        const request = fullImageRequest(source, 4);
        expect(request).toMatchObject({ x: 0, y: 0, width: 40, height: 30, downsample: 4 });
        expect(request.plane).toBe(ImagePlane.DEFAULT);
    });
});

describe('validateRegionRequest', () => {
    const base: RegionRequest = fullImageRequest(source, 1);

    it('accepts a rectangle reaching past the image', () => {
        expect(() => validateRegionRequest({ ...base, x: 35, width: 10 })).not.toThrow();
    });

    it.each([
        ['zero width', { width: 0 }],
        ['zero height', { height: 0 }],
        ['negative x', { x: -1 }],
        ['fractional y', { y: 0.5 }],
        ['zero downsample', { downsample: 0 }],
        ['infinite downsample', { downsample: Number.POSITIVE_INFINITY }],
    ])('rejects %s', (_name, change) => {
        expect(() => validateRegionRequest({ ...base, ...change })).toThrow(InvalidArgumentError);
    });
});
