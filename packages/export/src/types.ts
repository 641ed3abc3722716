import type { ImagePlane } from '@regionlink/geometry';

export type PixelType = 'uint8' | 'uint16' | 'float32';

export type PixelData = Uint8Array | Uint16Array | Float32Array;

/**
 * A decoded rectangle of pixels. Samples are interleaved: for each pixel in row-major order,
 * all channel values are contiguous, so `data.length === width * height * channels`.
 */
export type PixelRaster = {
    width: number;
    height: number;
    channels: number;
    pixelType: PixelType;
    data: PixelData;
};

export type PixelSize = {
    width: number;
    height: number;
    unit: string;
};

export type ImageMetadata = {
    /** level-0 extent, in pixels */
    width: number;
    height: number;
    sizeC: number;
    sizeZ: number;
    sizeT: number;
    pixelType: PixelType;
    /** downsample factor of every stored resolution level, finest first */
    downsamples: ReadonlyArray<number>;
    pixelSize?: PixelSize | undefined;
    channelNames?: ReadonlyArray<string> | undefined;
};

/**
 * Anything that can hand out pixels of a (possibly very large) multi-dimensional image.
 */
export interface ImageSource {
    /** identifies the image; carried into every RegionRequest built for it */
    readonly path: string;
    readonly metadata: ImageMetadata;
    /**
     * Read the level-0 rectangle (x, y, width, height) of one plane, resampled by `downsample`.
     * The result is `outputSize(width, downsample)` by `outputSize(height, downsample)` pixels;
     * anything outside the image is zero.
     * A plane with channel -1 selects every channel; any other channel gives a single-channel raster.
     */
    readPixels(
        plane: ImagePlane,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
    ): Promise<PixelRaster>;
}

/** the number of output pixels a level-0 extent covers at a downsample */
export function outputSize(extent: number, downsample: number): number {
    return Math.max(1, Math.round(extent / downsample));
}

export function bytesPerSample(pixelType: PixelType): number {
    switch (pixelType) {
        case 'uint8':
            return 1;
        case 'uint16':
            return 2;
        case 'float32':
            return 4;
    }
}

export function allocatePixels(pixelType: PixelType, length: number): PixelData {
    switch (pixelType) {
        case 'uint8':
            return new Uint8Array(length);
        case 'uint16':
            return new Uint16Array(length);
        case 'float32':
            return new Float32Array(length);
    }
}
