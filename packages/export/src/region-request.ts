import { InvalidArgumentError, logger } from '@regionlink/core';
import { ImagePlane } from '@regionlink/geometry';
import type { ImageSource } from './types';

/**
 * A rectangle of one image, in level-0 pixel coordinates, to be read at a downsample.
 * The plane's channel only matters to single-plane exports; -1 selects every channel.
 */
export type RegionRequest = {
    readonly path: string;
    readonly downsample: number;
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
    readonly plane: ImagePlane;
};

export type RegionRequestInit = {
    downsample: number;
    x: number;
    y: number;
    width: number;
    height: number;
    z?: number | undefined;
    t?: number | undefined;
};

/**
 * @throws InvalidArgumentError if z or t is not a valid plane coordinate
 */
export function createRegionRequest(source: ImageSource, init: RegionRequestInit): RegionRequest {
    const { downsample, x, y, width, height } = init;
    return {
        path: source.path,
        downsample,
        x,
        y,
        width,
        height,
        plane: ImagePlane.at(init.z ?? 0, init.t ?? 0),
    };
}

/** the whole image, on the default plane */
export function fullImageRequest(source: ImageSource, downsample: number): RegionRequest {
    const { width, height } = source.metadata;
    return createRegionRequest(source, { downsample, x: 0, y: 0, width, height });
}

function fail(message: string): never {
    logger.error(message);
    throw new InvalidArgumentError(message);
}

/**
 * @throws InvalidArgumentError for a zero-area rectangle, negative or fractional coordinates,
 * or a downsample that is not positive
 */
export function validateRegionRequest(request: RegionRequest): void {
    const { downsample, x, y, width, height } = request;
    if (!(Number.isFinite(downsample) && downsample > 0)) {
        fail(`invalid downsample [${downsample}]: must be a positive number`);
    }
    for (const [name, value] of Object.entries({ x, y, width, height })) {
        if (!Number.isInteger(value) || value < 0) {
            fail(`invalid region ${name} [${value}]: must be a non-negative integer`);
        }
    }
    if (width === 0 || height === 0) {
        fail(`region ${width}x${height} has no area`);
    }
}
