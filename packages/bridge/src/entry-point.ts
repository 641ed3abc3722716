import { InvalidArgumentError, base64Encode, configure, createLogger } from '@regionlink/core';
import {
    RegionImageExporter,
    createRegionRequest,
    fullImageRequest,
    type ExportOptions,
    type ImageSource,
    type RegionRequest,
} from '@regionlink/export';
import {
    GeoJsonCodec,
    createCodecConfig,
    getMeasurementNames,
    getMeasurements,
    getObjectIds,
    type CodecConfig,
    type RegionObject,
} from '@regionlink/geojson';
import type { ROI } from '@regionlink/geometry';

const log = createLogger('bridge');

export type EntryPointOptions = {
    codec?: Partial<CodecConfig>;
    export?: Partial<ExportOptions>;
};

type Region = RegionRequest | number;

/**
 * The flat surface an out-of-process caller talks to: GeoJSON conversion of region objects, and encoded
 * pixel regions of an image as bytes or Base64 text.
 *
 * Image methods take the region the way a positional caller has it: a downsample alone for the whole image,
 * a downsample and rectangle (on z = t = 0), a downsample, rectangle, z and t, or a prepared RegionRequest.
 */
export class RegionLinkEntryPoint {
    readonly codec: GeoJsonCodec;
    readonly exporter: RegionImageExporter;

    /**
     * @throws InvalidArgumentError if a codec or export option is out of range
     */
    constructor(options: EntryPointOptions = {}) {
        this.codec = new GeoJsonCodec(createCodecConfig(options.codec));
        this.exporter = new RegionImageExporter(options.export);
    }

    /**
     * apply the environment's runtime settings (log level, dispatch lanes), then build an entry point;
     * lanes given in the codec options win over the environment
     */
    static fromEnvironment(
        env: Record<string, string | undefined> = process.env,
        options: EntryPointOptions = {},
    ): RegionLinkEntryPoint {
        const runtime = configure(env);
        return new RegionLinkEntryPoint({
            ...options,
            codec: { lanes: runtime.dispatchLanes, ...options.codec },
        });
    }

    // -- GeoJSON

    objectToGeoJson(object: RegionObject): string {
        return this.codec.objectToGeoJson(object);
    }

    roiToGeoJson(roi: ROI): string {
        return this.codec.roiToGeoJson(roi);
    }

    toFeatureCollection(objects: ReadonlyArray<RegionObject>): string {
        return this.codec.toFeatureCollection(objects);
    }

    toFeatureCollections(objects: ReadonlyArray<RegionObject>, chunkSize: number): string[] {
        return this.codec.toFeatureCollections(objects, chunkSize);
    }

    toGeoJsonFeatureList(objects: ReadonlyArray<RegionObject>): string[] {
        return this.codec.toGeoJsonFeatureList(objects);
    }

    toObjects(json: string): RegionObject[] {
        return this.codec.toObjects(json);
    }

    toObject(json: string): RegionObject {
        return this.codec.toObject(json);
    }

    toRois(json: string): ROI[] {
        return this.codec.toRois(json);
    }

    toRoi(json: string): ROI {
        return this.codec.toRoi(json);
    }

    getObjectIds(objects: ReadonlyArray<RegionObject>): string[] {
        return getObjectIds(objects);
    }

    getMeasurementNames(objects: ReadonlyArray<RegionObject>): string[] {
        return getMeasurementNames(objects);
    }

    getMeasurements(objects: ReadonlyArray<RegionObject>, name: string): Array<number | undefined> {
        return getMeasurements(objects, name);
    }

    // -- images

    getImageBytes(source: ImageSource, region: Region, format: string): Promise<Uint8Array>;
    getImageBytes(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
        format: string,
    ): Promise<Uint8Array>;
    getImageBytes(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
        z: number,
        t: number,
        format: string,
    ): Promise<Uint8Array>;
    async getImageBytes(source: ImageSource, region: Region, ...rest: Array<number | string>): Promise<Uint8Array> {
        const { format, coordinates } = splitFormat(rest);
        return this.exporter.exportRegion(source, toRequest(source, region, coordinates), format);
    }

    getImageBase64(source: ImageSource, region: Region, format: string): Promise<string>;
    getImageBase64(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
        format: string,
    ): Promise<string>;
    getImageBase64(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
        z: number,
        t: number,
        format: string,
    ): Promise<string>;
    async getImageBase64(source: ImageSource, region: Region, ...rest: Array<number | string>): Promise<string> {
        const { format, coordinates } = splitFormat(rest);
        return this.exporter.exportRegionBase64(source, toRequest(source, region, coordinates), format);
    }

    getTiffStack(source: ImageSource, region: Region): Promise<Uint8Array>;
    getTiffStack(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
    ): Promise<Uint8Array>;
    getTiffStack(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
        z: number,
        t: number,
    ): Promise<Uint8Array>;
    async getTiffStack(source: ImageSource, region: Region, ...coordinates: number[]): Promise<Uint8Array> {
        return this.exporter.getTiffStack(source, toRequest(source, region, coordinates));
    }

    getTiffStackBase64(source: ImageSource, region: Region): Promise<string>;
    getTiffStackBase64(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
    ): Promise<string>;
    getTiffStackBase64(
        source: ImageSource,
        downsample: number,
        x: number,
        y: number,
        width: number,
        height: number,
        z: number,
        t: number,
    ): Promise<string>;
    async getTiffStackBase64(source: ImageSource, region: Region, ...coordinates: number[]): Promise<string> {
        return this.exporter.getTiffStackBase64(source, toRequest(source, region, coordinates));
    }

    base64Encode(bytes: Uint8Array): string {
        return base64Encode(bytes);
    }
}

function fail(message: string): never {
    log.error(message);
    throw new InvalidArgumentError(message);
}

function splitFormat(rest: Array<number | string>): { format: string; coordinates: number[] } {
    const format = rest[rest.length - 1];
    if (typeof format !== 'string') {
        fail('expected the image format as the last argument');
    }
    const coordinates: number[] = [];
    for (const value of rest.slice(0, -1)) {
        if (typeof value !== 'number') {
            fail(`expected a number for a region coordinate, got [${value}]`);
        }
        coordinates.push(value);
    }
    return { format, coordinates };
}

function toRequest(source: ImageSource, region: Region, coordinates: number[]): RegionRequest {
    if (typeof region !== 'number') {
        if (coordinates.length > 0) {
            fail('a region request takes no further coordinates');
        }
        return region;
    }
    switch (coordinates.length) {
        case 0:
            return fullImageRequest(source, region);
        case 4:
        case 6: {
            const [x, y, width, height, z, t] = coordinates;
            return createRegionRequest(source, { downsample: region, x, y, width, height, z, t });
        }
        default:
            return fail(`expected 0, 4 or 6 region coordinates after the downsample, got ${coordinates.length}`);
    }
}
