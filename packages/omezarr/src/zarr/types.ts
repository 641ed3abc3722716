import { logger, summarizeIssues } from '@regionlink/core';
import type { PixelSize, PixelType } from '@regionlink/export';
import { z } from 'zod';
import { OmeZarrDataError } from '../errors';

// Documentation for OME-Zarr datasets (from which these types are built)
// can be found here:
// - top-level metadata: https://ngff.openmicroscopy.org/latest/#multiscale-md
// - array metadata: v2: https://zarr-specs.readthedocs.io/en/latest/v2/v2.0.html#arrays
//                   v3: https://zarr-specs.readthedocs.io/en/latest/v3/core/v3.0.html#array-metadata

export type ZarrDimension = 't' | 'c' | 'z' | 'y' | 'x';

export type OmeZarrAxis = {
    name: string;
    type?: string | undefined;
    unit?: string | undefined;
};

export const OmeZarrAxisSchema: z.ZodType<OmeZarrAxis> = z.object({
    name: z.string().toLowerCase(),
    type: z.string().optional(),
    unit: z.string().optional(),
});

export type OmeZarrCoordinateTranslation = {
    translation: number[];
    type: 'translation';
};

// due to a difference in types between ZodObject and ZodType,
// currently this schema cannot be associated directly with
// OmeZarrCoordinateTranslation using z.ZodType<T>
export const OmeZarrCoordinateTranslationSchema = z.object({
    translation: z.number().array().min(2).max(5),
    type: z.literal('translation'),
});

export type OmeZarrCoordinateScale = {
    scale: number[];
    type: 'scale';
};

export const OmeZarrCoordinateScaleSchema = z.object({
    scale: z.number().array().min(2).max(5),
    type: z.literal('scale'),
});

export type OmeZarrCoordinateTransform = OmeZarrCoordinateTranslation | OmeZarrCoordinateScale;

export const OmeZarrCoordinateTransformSchema: z.ZodType<OmeZarrCoordinateTransform> = z.discriminatedUnion('type', [
    OmeZarrCoordinateTranslationSchema,
    OmeZarrCoordinateScaleSchema,
]);

export type OmeZarrDataset = {
    coordinateTransformations: OmeZarrCoordinateTransform[];
    path: string;
};

export const OmeZarrDatasetSchema: z.ZodType<OmeZarrDataset> = z.object({
    coordinateTransformations: OmeZarrCoordinateTransformSchema.array().nonempty(),
    path: z.string(),
});

export type OmeZarrMultiscale = {
    axes: OmeZarrAxis[];
    datasets: OmeZarrDataset[];
    name?: string | undefined;
    version?: string | undefined;
};

export const OmeZarrMultiscaleSchema: z.ZodType<OmeZarrMultiscale> = z.object({
    name: z.string().optional(),
    version: z.string().optional(),
    axes: OmeZarrAxisSchema.array().min(2),
    datasets: OmeZarrDatasetSchema.array().nonempty(),
});

export type OmeZarrOmeroChannel = {
    active?: boolean | undefined;
    color?: string | undefined;
    label?: string | undefined;
};

export const OmeZarrOmeroChannelSchema: z.ZodType<OmeZarrOmeroChannel> = z.object({
    active: z.boolean().optional(),
    color: z.string().optional(),
    label: z.string().optional(),
});

export type OmeZarrOmero = {
    channels: OmeZarrOmeroChannel[];
};

export const OmeZarrOmeroSchema: z.ZodType<OmeZarrOmero> = z.object({
    channels: OmeZarrOmeroChannelSchema.array(),
});

export type OmeZarrAttrs = {
    multiscales: OmeZarrMultiscale[];
    // transitional field, expected to go away in a later version
    omero?: OmeZarrOmero | undefined;
};

export const OmeZarrAttrsSchema: z.ZodType<OmeZarrAttrs> = z.object({
    multiscales: OmeZarrMultiscaleSchema.array().nonempty(),
    omero: OmeZarrOmeroSchema.optional(),
});

function fail(message: string, cause?: unknown): never {
    logger.error(message);
    throw new OmeZarrDataError(message, { cause });
}

// OME-Zarr 0.5 moves everything under an "ome" member of the group attributes
const OmeZarrV05AttrsSchema = z.object({ ome: OmeZarrAttrsSchema });

/**
 * @returns the OME-Zarr attributes of a group, in either the 0.4 or the 0.5 layout
 * @throws OmeZarrDataError if the attributes are in neither
 */
export function parseOmeZarrAttrs(attrs: unknown, url: string): OmeZarrAttrs {
    const nested = OmeZarrV05AttrsSchema.safeParse(attrs);
    if (nested.success) {
        return nested.data.ome;
    }
    const flat = OmeZarrAttrsSchema.safeParse(attrs);
    if (!flat.success) {
        fail(`could not load OME-Zarr attributes of [${url}]: ${summarizeIssues(flat.error)}`, flat.error);
    }
    return flat.data;
}

// For details on Zarr Array Metadata format, see: https://zarr-specs.readthedocs.io/en/latest/v2/v2.0.html
export type OmeZarrArrayMetadata = {
    path: string;
    shape: number[];
    dataType: string;
};

/** one level of the resolution pyramid */
export type OmeZarrLevel = {
    path: string;
    shape: ReadonlyArray<number>;
    /** level-0 pixels per pixel of this level, along x */
    downsample: number;
};

function toPixelType(dataType: string): PixelType | undefined {
    switch (dataType) {
        case 'uint8':
        case 'uint16':
        case 'float32':
            return dataType;
        default:
            return undefined;
    }
}

/**
 * The metadata of one OME-Zarr image: the first multiscale of the group, and the shape of every level.
 */
export class OmeZarrMetadata {
    #url: string;
    #attrs: OmeZarrAttrs;
    #arrays: ReadonlyArray<OmeZarrArrayMetadata>;
    readonly pixelType: PixelType;

    /**
     * @throws OmeZarrDataError if a dataset has no array, the arrays disagree with the axes,
     * or the level-0 samples are not uint8, uint16 or float32
     */
    constructor(url: string, attrs: OmeZarrAttrs, arrays: ReadonlyArray<OmeZarrArrayMetadata>) {
        this.#url = url;
        this.#attrs = attrs;
        this.#arrays = arrays;
        for (const dim of ['x', 'y'] as const) {
            if (this.indexOfDimension(dim) < 0) {
                fail(`invalid OME-Zarr image [${url}]: no ${dim} axis`);
            }
        }
        for (const dataset of this.multiscale.datasets) {
            const array = this.#arrayFor(dataset.path);
            if (array.shape.length !== this.axes.length) {
                fail(
                    `invalid dataset: array [${dataset.path}] has ${array.shape.length} dimensions ` +
                        `but there are ${this.axes.length} axes`,
                );
            }
        }
        const { dataType } = this.#finest().array;
        const pixelType = toPixelType(dataType);
        if (!pixelType) {
            fail(`unsupported OME-Zarr data type [${dataType}]: expected uint8, uint16 or float32`);
        }
        this.pixelType = pixelType;
    }

    #arrayFor(path: string): OmeZarrArrayMetadata {
        const array = this.#arrays.find((a) => a.path === path);
        if (!array) {
            fail(`invalid dataset: array missing for dataset [${path}]`);
        }
        return array;
    }

    get url(): string {
        return this.#url;
    }

    get multiscale(): OmeZarrMultiscale {
        return this.#attrs.multiscales[0];
    }

    get axes(): ReadonlyArray<OmeZarrAxis> {
        return this.multiscale.axes;
    }

    indexOfDimension(dim: ZarrDimension): number {
        return this.axes.findIndex((axis) => axis.name === dim);
    }

    // the dataset with the widest array is level 0, whatever order the datasets are listed in
    #finest(): { dataset: OmeZarrDataset; array: OmeZarrArrayMetadata } {
        const xIndex = this.indexOfDimension('x');
        return this.multiscale.datasets
            .map((dataset) => ({ dataset, array: this.#arrayFor(dataset.path) }))
            .reduce((best, cur) => (cur.array.shape[xIndex] > best.array.shape[xIndex] ? cur : best));
    }

    /**
     * @returns the level-0 size of a dimension; 1 for a dimension the image does not have
     */
    sizeOf(dim: ZarrDimension): number {
        const index = this.indexOfDimension(dim);
        return index < 0 ? 1 : this.#finest().array.shape[index];
    }

    /** every level, finest first */
    get levels(): OmeZarrLevel[] {
        const xIndex = this.indexOfDimension('x');
        const baseWidth = this.sizeOf('x');
        return this.multiscale.datasets
            .map((dataset) => {
                const { shape } = this.#arrayFor(dataset.path);
                return { path: dataset.path, shape, downsample: baseWidth / shape[xIndex] };
            })
            .sort((a, b) => a.downsample - b.downsample);
    }

    /**
     * the level-0 pixel size, from the scale transformation of the level-0 dataset;
     * undefined when there is none, or the x axis has no unit
     */
    get pixelSize(): PixelSize | undefined {
        const scale = this.#finest().dataset.coordinateTransformations.find((t) => t.type === 'scale');
        const xIndex = this.indexOfDimension('x');
        const yIndex = this.indexOfDimension('y');
        const unit = this.axes[xIndex].unit;
        if (!scale || scale.type !== 'scale' || unit === undefined) {
            return undefined;
        }
        return { width: scale.scale[xIndex], height: scale.scale[yIndex], unit };
    }

    /** channel labels from the omero block, where every channel has one */
    get channelNames(): string[] | undefined {
        const labels = this.#attrs.omero?.channels.map((channel) => channel.label);
        if (!labels || labels.length !== this.sizeOf('c')) {
            return undefined;
        }
        const named = labels.filter((label): label is string => label !== undefined);
        return named.length === labels.length ? named : undefined;
    }
}
