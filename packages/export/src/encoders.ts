import { UnsupportedFormatError, logger } from '@regionlink/core';
import sharp from 'sharp';
import type { StandardCodec } from './formats';
import { toEightBit } from './raster';
import type { PixelRaster } from './types';

export type TiffCompression = 'none' | 'lzw' | 'deflate';

export type EncoderOptions = {
    /** JPEG, WebP and AVIF quality, 1 to 100 */
    quality: number;
    tiffCompression: TiffCompression;
};

type SharpChannels = 1 | 2 | 3 | 4;

function sharpChannels(channels: number): SharpChannels {
    switch (channels) {
        case 1:
        case 2:
        case 3:
        case 4:
            return channels;
        default: {
            const message = `cannot encode ${channels} channels with a standard image codec; at most 4 are supported`;
            logger.error(message);
            throw new UnsupportedFormatError(message);
        }
    }
}

function withCodec(image: sharp.Sharp, codec: StandardCodec, options: EncoderOptions): sharp.Sharp {
    const { quality, tiffCompression } = options;
    switch (codec) {
        case 'png':
            return image.png();
        case 'jpeg':
            return image.jpeg({ quality });
        case 'tiff':
            return image.tiff({ compression: tiffCompression });
        case 'webp':
            return image.webp({ quality });
        case 'gif':
            return image.gif();
        case 'avif':
            return image.avif({ quality });
    }
}

/**
 * Encode one raster with a single-image codec. Samples are reduced to 8 bits first.
 * One channel is written as greyscale, two as greyscale with alpha, three as RGB and four as RGBA.
 * @throws UnsupportedFormatError for more than four channels
 */
export async function encodeStandard(
    raster: PixelRaster,
    codec: StandardCodec,
    options: EncoderOptions,
): Promise<Uint8Array> {
    const { width, height } = raster;
    const channels = sharpChannels(raster.channels);
    const samples = toEightBit(raster);
    const image = sharp(Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength), {
        raw: { width, height, channels },
    });
    return withCodec(image, codec, options).toBuffer();
}
