import { ImageIOError, logger } from '@regionlink/core';
import { allocatePixels, type PixelRaster, type PixelType } from './types';

export function createRaster(pixelType: PixelType, width: number, height: number, channels: number): PixelRaster {
    return { width, height, channels, pixelType, data: allocatePixels(pixelType, width * height * channels) };
}

/**
 * @throws ImageIOError if the raster does not have the expected shape, or its data does not fill it
 */
export function checkRasterShape(raster: PixelRaster, width: number, height: number, channels: number): void {
    const expected = width * height * channels;
    if (
        raster.width !== width ||
        raster.height !== height ||
        raster.channels !== channels ||
        raster.data.length !== expected
    ) {
        const message =
            `image source returned a ${raster.width}x${raster.height}x${raster.channels} raster ` +
            `holding ${raster.data.length} samples; expected ${width}x${height}x${channels}`;
        logger.error(message);
        throw new ImageIOError(message);
    }
}

/**
 * @returns the smallest and largest finite sample, or [0, 0] if there is none
 */
export function sampleRange(data: ArrayLike<number>): [number, number] {
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (let i = 0; i < data.length; i++) {
        const v = data[i];
        if (Number.isFinite(v)) {
            min = Math.min(min, v);
            max = Math.max(max, v);
        }
    }
    return min > max ? [0, 0] : [min, max];
}

/**
 * Samples as 8-bit values: uint8 is unchanged, uint16 is scaled by 1/257 and float32 is stretched
 * linearly from its finite [min, max] to [0, 255]. Non-finite floats become 0.
 */
export function toEightBit(raster: PixelRaster): Uint8Array {
    const { data } = raster;
    switch (raster.pixelType) {
        case 'uint8':
            return data instanceof Uint8Array ? data : Uint8Array.from(data);
        case 'uint16':
            return Uint8Array.from(data, (v) => Math.round(v / 257));
        case 'float32': {
            const [min, max] = sampleRange(data);
            const scale = max > min ? 255 / (max - min) : 0;
            return Uint8Array.from(data, (v) => (Number.isFinite(v) ? Math.round((v - min) * scale) : 0));
        }
    }
}
