import { createLogger } from '@regionlink/core';
import type { ImagePlane } from '@regionlink/geometry';
import {
    createRaster,
    type ImageMetadata,
    type ImageSource,
    outputSize,
    type PixelRaster,
} from '@regionlink/export';
import { OmeZarrIndexError } from './errors';
import {
    type LoadedOmeZarr,
    loadOmeZarr,
    loadOmeZarrFromUrl,
    type OmeZarrArray,
    type OmeZarrStore,
    pickLevel,
    readBlock,
} from './zarr/loading';
import type { OmeZarrMetadata } from './zarr/types';

const log = createLogger('omezarr');

/**
 * An ImageSource over the first multiscale of an OME-Zarr image.
 *
 * Each read picks the coarsest level that still resolves the requested downsample, reads the covering block
 * of that level once, and resamples it to the output size by nearest neighbour. Pixels outside the image are zero.
 */
export class OmeZarrImageSource implements ImageSource {
    readonly path: string;
    readonly metadata: ImageMetadata;
    readonly zarr: OmeZarrMetadata;
    readonly #arrays: ReadonlyMap<string, OmeZarrArray>;

    private constructor(path: string, { metadata, arrays }: LoadedOmeZarr) {
        this.path = path;
        this.zarr = metadata;
        this.#arrays = arrays;
        this.metadata = {
            width: metadata.sizeOf('x'),
            height: metadata.sizeOf('y'),
            sizeC: metadata.sizeOf('c'),
            sizeZ: metadata.sizeOf('z'),
            sizeT: metadata.sizeOf('t'),
            pixelType: metadata.pixelType,
            downsamples: metadata.levels.map((level) => level.downsample),
            pixelSize: metadata.pixelSize,
            channelNames: metadata.channelNames,
        };
    }

    /**
     * @param path names the image in requests, logs and errors
     * @throws OmeZarrDataError if the store does not hold a readable OME-Zarr image
     */
    static async open(store: OmeZarrStore, path: string): Promise<OmeZarrImageSource> {
        return new OmeZarrImageSource(path, await loadOmeZarr(store, path));
    }

    static async fromUrl(url: string): Promise<OmeZarrImageSource> {
        return new OmeZarrImageSource(url, await loadOmeZarrFromUrl(url));
    }

    /**
     * @throws OmeZarrIndexError if the plane is outside the image
     */
    async readPixels(
        plane: ImagePlane,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
    ): Promise<PixelRaster> {
        const { sizeC, sizeZ, sizeT, pixelType } = this.metadata;
        if (plane.c >= sizeC || plane.z >= sizeZ || plane.t >= sizeT) {
            const message = `${plane} is outside [${this.path}]`;
            log.error(message);
            throw new OmeZarrIndexError(message);
        }
        const level = pickLevel(this.zarr.levels, downsample);
        const array = this.#arrays.get(level.path);
        if (!array) {
            const message = `no array for level [${level.path}] of [${this.path}]`;
            log.error(message);
            throw new OmeZarrIndexError(message);
        }
        const channels = plane.hasChannel ? 1 : sizeC;
        const raster = createRaster(pixelType, outputSize(width, downsample), outputSize(height, downsample), channels);
        // output pixel centres, in level pixels
        const scaleX = width / raster.width / level.downsample;
        const scaleY = height / raster.height / level.downsample;
        const columns = Array.from({ length: raster.width }, (_, ox) =>
            Math.floor(x / level.downsample + (ox + 0.5) * scaleX),
        );
        const rows = Array.from({ length: raster.height }, (_, oy) =>
            Math.floor(y / level.downsample + (oy + 0.5) * scaleY),
        );
        log.debug(`reading ${plane} of [${this.path}] from level [${level.path}] at downsample ${level.downsample}`);
        const block = await readBlock(this.zarr, array, {
            c: plane.hasChannel ? plane.c : null,
            z: plane.z,
            t: plane.t,
            x: { min: columns[0], max: columns[columns.length - 1] + 1 },
            y: { min: rows[0], max: rows[rows.length - 1] + 1 },
        });
        if (!block) {
            return raster;
        }
        const { data, stride } = block;
        rows.forEach((ly, oy) => {
            if (ly < block.y.min || ly >= block.y.max) {
                return;
            }
            columns.forEach((lx, ox) => {
                if (lx < block.x.min || lx >= block.x.max) {
                    return;
                }
                const source = (ly - block.y.min) * stride.y + (lx - block.x.min) * stride.x;
                const target = (oy * raster.width + ox) * channels;
                for (let c = 0; c < channels; c++) {
                    raster.data[target + c] = data[source + c * stride.c];
                }
            });
        });
        return raster;
    }
}
