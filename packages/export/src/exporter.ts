import {
    ImageIOError,
    InvalidArgumentError,
    base64Encode,
    createLogger,
    summarizeIssues,
} from '@regionlink/core';
import { ImagePlane } from '@regionlink/geometry';
import { ZodError, z } from 'zod';
import { encodeStandard, type EncoderOptions } from './encoders';
import { resolveFormat } from './formats';
import { encodeHyperstack } from './imagej-tiff';
import { checkRasterShape } from './raster';
import { fullImageRequest, type RegionRequest, validateRegionRequest } from './region-request';
import { type ImageSource, outputSize, type PixelRaster, type PixelSize } from './types';

const log = createLogger('export');

const ExportOptionsSchema = z.object({
    quality: z.number().int().min(1).max(100).default(90),
    tiffCompression: z.enum(['none', 'lzw', 'deflate']).default('lzw'),
});

export type ExportOptions = Readonly<EncoderOptions>;

/** the format name that selects the ImageJ hyperstack encoding */
export const HYPERSTACK_FORMAT = 'imagej tiff';

function parseOptions(options: Partial<ExportOptions>): ExportOptions {
    try {
        return Object.freeze(ExportOptionsSchema.parse(options));
    } catch (e) {
        if (e instanceof ZodError) {
            const message = `invalid export options: ${summarizeIssues(e)}`;
            log.error(message);
            throw new InvalidArgumentError(message, { cause: e });
        }
        throw e;
    }
}

/**
 * Reads rectangles of an ImageSource and encodes them as image files.
 *
 * Standard formats (png, jpeg, tiff, webp, gif, avif) receive the single plane named by the request.
 * The ImageJ hyperstack format ("imagej tiff" or "imagej tif") receives every channel, z-slice and timepoint
 * of the rectangle, one page each. Pixel reads happen one after another; nothing is cached between calls.
 */
export class RegionImageExporter {
    readonly options: ExportOptions;

    /**
     * @throws InvalidArgumentError if an option is out of range
     */
    constructor(options: Partial<ExportOptions> = {}) {
        this.options = parseOptions(options);
    }

    /**
     * @param region a request, or a downsample to export the whole image on the default plane at
     * @param format the name of the encoding; matched case-insensitively
     * @throws UnsupportedFormatError if the format is unknown, or the pixels cannot be written in it
     * @throws InvalidArgumentError if the request has no area, or names a plane the image does not have
     * @throws ImageIOError if the pixels cannot be read
     */
    async exportRegion(source: ImageSource, region: RegionRequest | number, format: string): Promise<Uint8Array> {
        const resolved = resolveFormat(format);
        const request = typeof region === 'number' ? fullImageRequest(source, region) : region;
        validateRegionRequest(request);
        log.debug(
            `exporting ${request.width}x${request.height} at (${request.x}, ${request.y}) of [${source.path}] ` +
                `at downsample ${request.downsample} as ${format}`,
        );
        if (resolved.kind === 'hyperstack') {
            return this.#exportHyperstack(source, request);
        }
        checkPlane(source, request.plane);
        const raster = await readRegion(source, request, request.plane);
        return encodeStandard(raster, resolved.codec, this.options);
    }

    async exportRegionBase64(source: ImageSource, region: RegionRequest | number, format: string): Promise<string> {
        return base64Encode(await this.exportRegion(source, region, format));
    }

    /** exportRegion with the format fixed to the ImageJ hyperstack */
    async getTiffStack(source: ImageSource, region: RegionRequest | number): Promise<Uint8Array> {
        return this.exportRegion(source, region, HYPERSTACK_FORMAT);
    }

    async getTiffStackBase64(source: ImageSource, region: RegionRequest | number): Promise<string> {
        return base64Encode(await this.getTiffStack(source, region));
    }

    async #exportHyperstack(source: ImageSource, request: RegionRequest): Promise<Uint8Array> {
        const { sizeC, sizeZ, sizeT, pixelSize, channelNames } = source.metadata;
        // pages are labelled by channel name only when every channel has one
        const names = channelNames?.length === sizeC ? channelNames : undefined;
        const pages: PixelRaster[] = [];
        const labels: string[] = [];
        for (let t = 0; t < sizeT; t++) {
            for (let z = 0; z < sizeZ; z++) {
                for (let c = 0; c < sizeC; c++) {
                    pages.push(await readRegion(source, request, ImagePlane.of(c, z, t)));
                    labels.push(names?.[c] ?? '');
                }
            }
        }
        return encodeHyperstack(
            pages,
            { channels: sizeC, slices: sizeZ, frames: sizeT },
            {
                pixelSize: pixelSize && scalePixelSize(pixelSize, request.downsample),
                labels: names && labels,
            },
        );
    }
}

function scalePixelSize(pixelSize: PixelSize, downsample: number): PixelSize {
    return { ...pixelSize, width: pixelSize.width * downsample, height: pixelSize.height * downsample };
}

function checkPlane(source: ImageSource, plane: ImagePlane) {
    const { sizeC, sizeZ, sizeT } = source.metadata;
    if (plane.c >= sizeC || plane.z >= sizeZ || plane.t >= sizeT) {
        const message =
            `${plane} is outside [${source.path}], ` +
            `which has ${sizeC} channels, ${sizeZ} slices and ${sizeT} timepoints`;
        log.error(message);
        throw new InvalidArgumentError(message);
    }
}

async function readRegion(source: ImageSource, request: RegionRequest, plane: ImagePlane): Promise<PixelRaster> {
    const { downsample, x, y, width, height } = request;
    let raster: PixelRaster;
    try {
        raster = await source.readPixels(plane, downsample, x, y, width, height);
    } catch (e) {
        if (e instanceof ImageIOError) {
            throw e;
        }
        const message = `could not read ${plane} of [${source.path}]: ${e instanceof Error ? e.message : String(e)}`;
        log.error(message);
        throw new ImageIOError(message, { cause: e });
    }
    const channels = plane.hasChannel ? 1 : source.metadata.sizeC;
    checkRasterShape(raster, outputSize(width, downsample), outputSize(height, downsample), channels);
    return raster;
}
