import { logger } from '@regionlink/core';
import { type Interval, intersection } from '@regionlink/geometry';
import * as zarr from 'zarrita';
import { OmeZarrDataError, OmeZarrIndexError } from '../errors';
import { type OmeZarrArrayMetadata, type OmeZarrLevel, OmeZarrMetadata, parseOmeZarrAttrs } from './types';

/** a remote store read over HTTP, or an in-memory store keyed by absolute path */
export type OmeZarrStore = zarr.FetchStore | Map<string, Uint8Array>;

export type OmeZarrArray = zarr.Array<zarr.DataType, OmeZarrStore>;

export type LoadedOmeZarr = {
    metadata: OmeZarrMetadata;
    /** the array of every level, by dataset path */
    arrays: ReadonlyMap<string, OmeZarrArray>;
};

/**
 * Open the OME-Zarr image at the root of a store: its group attributes and the arrays of its first multiscale.
 * Both Zarr v2 and v3 layouts are read.
 * @param url names the image in logs and errors
 * @throws OmeZarrDataError if the group or an array cannot be opened, or the metadata is not valid OME-Zarr
 */
export async function loadOmeZarr(store: OmeZarrStore, url: string): Promise<LoadedOmeZarr> {
    const root = zarr.root(store);
    let group: zarr.Group<OmeZarrStore>;
    try {
        group = await zarr.open(root, { kind: 'group' });
    } catch (e) {
        const message = `could not open OME-Zarr group [${url}]: ${e instanceof Error ? e.message : String(e)}`;
        logger.error(message);
        throw new OmeZarrDataError(message, { cause: e });
    }
    const attrs = parseOmeZarrAttrs(group.attrs, url);
    const arrays = new Map<string, OmeZarrArray>();
    const arrayMetadata: OmeZarrArrayMetadata[] = [];
    for (const { path } of attrs.multiscales[0].datasets) {
        let array: OmeZarrArray;
        try {
            array = await zarr.open(root.resolve(path), { kind: 'array' });
        } catch (e) {
            const message = `could not open array [${path}] of [${url}]: ${e instanceof Error ? e.message : String(e)}`;
            logger.error(message);
            throw new OmeZarrDataError(message, { cause: e });
        }
        arrays.set(path, array);
        arrayMetadata.push({ path, shape: array.shape, dataType: array.dtype });
    }
    return { metadata: new OmeZarrMetadata(url, attrs, arrayMetadata), arrays };
}

/**
 * @param url a url which resolves to an OME-Zarr image
 */
export async function loadOmeZarrFromUrl(url: string): Promise<LoadedOmeZarr> {
    return loadOmeZarr(new zarr.FetchStore(url), url);
}

/**
 * the coarsest level that still has at least the resolution asked for: the largest level downsample
 * not above the requested one (within rounding), or the finest level when every level is coarser
 */
export function pickLevel(levels: ReadonlyArray<OmeZarrLevel>, downsample: number): OmeZarrLevel {
    const [finest, ...rest] = levels;
    if (!finest) {
        const message = 'invalid OME-Zarr image: no levels';
        logger.error(message);
        throw new OmeZarrDataError(message);
    }
    return rest.reduce((best, level) => (level.downsample <= downsample * (1 + 1e-9) ? level : best), finest);
}

/** a block of samples read from one level, addressed through its strides */
export type SampleBlock = {
    /** level pixel ranges the block covers */
    x: Interval;
    y: Interval;
    data: Uint8Array | Uint16Array | Float32Array;
    /** strides of the channel (0 when a single channel was read), y and x dimensions */
    stride: { c: number; y: number; x: number };
};

export type BlockRequest = {
    /** a channel index, or null for all of them */
    c: number | null;
    z: number;
    t: number;
    x: Interval;
    y: Interval;
};

/**
 * Read the samples of one (z, t) of a level over a rectangle of level pixels, clamped to the level.
 * @returns undefined when the rectangle does not overlap the level
 * @throws OmeZarrIndexError if the request asks for z, t or c beyond an axis the image lacks
 */
export async function readBlock(
    metadata: OmeZarrMetadata,
    array: OmeZarrArray,
    request: BlockRequest,
): Promise<SampleBlock | undefined> {
    const shape = array.shape;
    const x = intersection(request.x, { min: 0, max: shape[metadata.indexOfDimension('x')] });
    const y = intersection(request.y, { min: 0, max: shape[metadata.indexOfDimension('y')] });
    if (!x || !y) {
        return undefined;
    }
    const selection = metadata.axes.map((axis) => {
        switch (axis.name) {
            case 'x':
                return zarr.slice(x.min, x.max);
            case 'y':
                return zarr.slice(y.min, y.max);
            case 'c':
                return request.c;
            case 'z':
                return request.z;
            case 't':
                return request.t;
            default:
                return 0;
        }
    });
    for (const dim of ['c', 'z', 't'] as const) {
        const value = request[dim];
        if (metadata.indexOfDimension(dim) < 0 && value !== null && value !== 0) {
            const message = `invalid ${dim} [${value}]: [${metadata.url}] has no ${dim} axis`;
            logger.error(message);
            throw new OmeZarrIndexError(message);
        }
    }
    const result = await zarr.get(array, selection);
    if (typeof result !== 'object') {
        const message = `reading [${metadata.url}] gave a single value instead of a block`;
        logger.error(message);
        throw new OmeZarrDataError(message);
    }
    const { data } = result;
    if (!(data instanceof Uint8Array || data instanceof Uint16Array || data instanceof Float32Array)) {
        const message = `reading [${metadata.url}] gave samples of an unsupported type`;
        logger.error(message);
        throw new OmeZarrDataError(message);
    }
    // dimensions selected by an index are dropped from the result; the rest keep their order
    const kept = metadata.axes.map((axis, i) => ({ name: axis.name, selected: selection[i] })).filter(
        ({ selected }) => selected === null || typeof selected === 'object',
    );
    const strideOf = (name: string) => {
        const index = kept.findIndex((k) => k.name === name);
        return index < 0 ? 0 : result.stride[index];
    };
    return { x, y, data, stride: { c: strideOf('c'), y: strideOf('y'), x: strideOf('x') } };
}
