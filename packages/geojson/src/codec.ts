import {
    DecodeError,
    createLogger,
    dispatchFlatMap,
    dispatchMap,
    partition,
    summarizeIssues,
} from '@regionlink/core';
import { ImagePlane, type ROI } from '@regionlink/geometry';
import mapValues from 'lodash/mapValues';
import type { CodecConfig } from './codec-config';
import { type EncodedGeometry, geometryToRoi, roiToGeometry } from './geometry';
import { decodePlane, encodePlane, type PlaneJson } from './plane-codec';
import { type Classification, type Measurements, RegionObject, type RGB } from './region-object';
import { isJsonObject, type JsonObject, stripNulls } from './sanitize';
import {
    FeatureSchema,
    GEOMETRY_TYPES,
    GeometrySchema,
    type FeatureInput,
    type NonFiniteText,
    type ObjectType,
} from './schemas';

const log = createLogger('geojson');

export type EncodedProperties = {
    objectType: ObjectType;
    name?: string;
    classification?: { name: string; color?: number[] };
    isLocked?: true;
    measurements?: Record<string, number | NonFiniteText>;
};

export type EncodedFeature = {
    type: 'Feature';
    id: string;
    geometry: EncodedGeometry;
    properties: EncodedProperties;
    plane?: PlaneJson;
};

export type EncodedFeatureCollection = {
    type: 'FeatureCollection';
    features: EncodedFeature[];
};

/**
 * Converts region objects and shapes to and from GeoJSON text.
 *
 * Every instance is bound to one immutable CodecConfig; there is no process-wide codec.
 * Bulk operations (decoding arrays, encoding chunked collections and per-feature lists) may take the
 * concurrent dispatch path above the thresholds in the config; their output order always matches the input.
 */
export class GeoJsonCodec {
    readonly config: CodecConfig;

    constructor(config: CodecConfig) {
        this.config = config;
    }

    // -- encoding

    toFeature(object: RegionObject): EncodedFeature {
        const feature: EncodedFeature = {
            type: 'Feature',
            id: object.id,
            geometry: roiToGeometry(object.roi),
            properties: encodeProperties(object),
        };
        if (this.config.planeAdapter) {
            feature.plane = encodePlane(object.plane);
        }
        return feature;
    }

    objectToGeoJson(object: RegionObject): string {
        return this.#stringify(this.toFeature(object));
    }

    /**
     * a bare geometry, without classification or measurements; the plane travels inside the geometry
     */
    roiToGeoJson(roi: ROI): string {
        const geometry = roiToGeometry(roi);
        if (this.config.planeAdapter) {
            geometry.plane = encodePlane(roi.plane);
        }
        return this.#stringify(geometry);
    }

    /**
     * one FeatureCollection holding every object. For large collections the text may become too long to move
     * in one piece; prefer toFeatureCollections in that case
     */
    toFeatureCollection(objects: ReadonlyArray<RegionObject>): string {
        const collection: EncodedFeatureCollection = {
            type: 'FeatureCollection',
            features: objects.map((o) => this.toFeature(o)),
        };
        return this.#stringify(collection);
    }

    /**
     * split the objects into groups of at most chunkSize and write each group as its own FeatureCollection.
     * Concatenating the features of the results, in order, gives back the input order.
     * @throws InvalidArgumentError if chunkSize is not a positive integer
     */
    toFeatureCollections(objects: ReadonlyArray<RegionObject>, chunkSize: number): string[] {
        const chunks = partition(objects, chunkSize);
        return dispatchMap(chunks, (chunk) => this.toFeatureCollection(chunk), {
            threshold: this.config.chunkEncodeThreshold,
            lanes: this.config.lanes,
        });
    }

    /**
     * one Feature text per object, in input order
     */
    toGeoJsonFeatureList(objects: ReadonlyArray<RegionObject>): string[] {
        return dispatchMap(objects, (o) => this.objectToGeoJson(o), {
            threshold: this.config.featureListThreshold,
            lanes: this.config.lanes,
        });
    }

    // -- decoding

    /**
     * Decode region objects from GeoJSON text or an already parsed tree. Accepted shapes:
     * - an array: every element is decoded and the results concatenated in order
     * - an object with a "features" member: its features are decoded
     * - an empty object: nothing
     * - any other object: one Feature, or one bare geometry
     *
     * Any other JSON value gives an empty list. A parsed tree passed in has its null members removed in place.
     * @throws DecodeError if the text is not JSON, or an object is neither a valid Feature nor a valid geometry
     */
    toObjects(input: string | unknown): RegionObject[] {
        return this.#decodeElement(typeof input === 'string' ? parseJson(input) : input);
    }

    /**
     * @throws DecodeError unless the text holds exactly one object
     */
    toObject(input: string | unknown): RegionObject {
        return single(this.toObjects(input), 'region object');
    }

    /**
     * Decode bare shapes, with the same accepted shapes as toObjects. Features contribute their geometry.
     */
    toRois(input: string | unknown): ROI[] {
        return this.#decodeRoiElement(typeof input === 'string' ? parseJson(input) : input);
    }

    /**
     * @throws DecodeError unless the text holds exactly one shape
     */
    toRoi(input: string | unknown): ROI {
        return single(this.toRois(input), 'shape');
    }

    #decodeElement(element: unknown): RegionObject[] {
        if (Array.isArray(element)) {
            return dispatchFlatMap(element, (e) => this.#decodeElement(e), this.#decodeDispatch());
        }
        if (!isJsonObject(element)) {
            log.debug(`ignoring JSON value of type [${element === null ? 'null' : typeof element}]`);
            return [];
        }
        if (Object.keys(element).length === 0) {
            return [];
        }
        if ('features' in element) {
            return this.#decodeElement(element.features);
        }
        return [this.#decodeObject(element)];
    }

    #decodeRoiElement(element: unknown): ROI[] {
        if (Array.isArray(element)) {
            return dispatchFlatMap(element, (e) => this.#decodeRoiElement(e), this.#decodeDispatch());
        }
        if (!isJsonObject(element) || Object.keys(element).length === 0) {
            return [];
        }
        if ('features' in element) {
            return this.#decodeRoiElement(element.features);
        }
        return [this.#decodeObject(element).roi];
    }

    #decodeDispatch() {
        return { threshold: this.config.decodeThreshold, lanes: this.config.lanes };
    }

    #decodeObject(jsonObject: JsonObject): RegionObject {
        if (this.config.nullTolerant) {
            stripNulls(jsonObject);
        }
        if (typeof jsonObject.type === 'string' && GEOMETRY_TYPES.has(jsonObject.type)) {
            return new RegionObject({ roi: this.#decodeGeometry(jsonObject) });
        }
        const parsed = FeatureSchema.safeParse(jsonObject);
        if (!parsed.success) {
            const message = `invalid GeoJSON feature: ${summarizeIssues(parsed.error)}`;
            log.error(message);
            throw new DecodeError(message, { cause: parsed.error });
        }
        const feature = parsed.data;
        const plane = this.#planeOf(feature.plane ?? feature.geometry.plane);
        return new RegionObject({
            id: feature.id === undefined ? undefined : String(feature.id),
            roi: geometryToRoi(feature.geometry, plane),
            ...decodeProperties(feature.properties),
        });
    }

    #decodeGeometry(jsonObject: JsonObject): ROI {
        const parsed = GeometrySchema.safeParse(jsonObject);
        if (!parsed.success) {
            const message = `invalid GeoJSON geometry: ${summarizeIssues(parsed.error)}`;
            log.error(message);
            throw new DecodeError(message, { cause: parsed.error });
        }
        return geometryToRoi(parsed.data, this.#planeOf(parsed.data.plane));
    }

    #planeOf(value: unknown): ImagePlane {
        return this.config.planeAdapter ? decodePlane(value) : ImagePlane.DEFAULT;
    }

    #stringify(value: unknown): string {
        return JSON.stringify(value, null, this.config.prettyPrint ? 2 : undefined);
    }
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (e) {
        const message = `could not parse GeoJSON: ${e instanceof Error ? e.message : String(e)}`;
        log.error(message);
        throw new DecodeError(message, { cause: e });
    }
}

function single<T>(items: T[], what: string): T {
    if (items.length !== 1) {
        const message = `expected exactly one ${what}, found ${items.length}`;
        log.error(message);
        throw new DecodeError(message);
    }
    return items[0];
}

function encodeProperties(object: RegionObject): EncodedProperties {
    const properties: EncodedProperties = { objectType: object.objectType };
    if (object.name !== undefined) {
        properties.name = object.name;
    }
    if (object.classification) {
        const { name, color } = object.classification;
        properties.classification = color ? { name, color: [...color] } : { name };
    }
    if (object.locked) {
        properties.isLocked = true;
    }
    if (Object.keys(object.measurements).length > 0) {
        properties.measurements = mapValues(object.measurements, encodeMeasurement);
    }
    return properties;
}

function encodeMeasurement(value: number): number | NonFiniteText {
    if (Number.isFinite(value)) {
        return value;
    }
    return Number.isNaN(value) ? 'NaN' : value > 0 ? 'Infinity' : '-Infinity';
}

function unpackRGB(packed: number): RGB {
    return [(packed >> 16) & 0xff, (packed >> 8) & 0xff, packed & 0xff];
}

function decodeProperties(properties: FeatureInput['properties']) {
    if (!properties) {
        return {};
    }
    const { objectType, name, classification, isLocked, measurements } = properties;
    let decodedClassification: Classification | undefined;
    if (classification) {
        const { color, colorRGB } = classification;
        const rgb = color ?? (colorRGB === undefined ? undefined : unpackRGB(colorRGB));
        decodedClassification = rgb ? { name: classification.name, color: rgb } : { name: classification.name };
    }
    let decodedMeasurements: Measurements | undefined;
    if (Array.isArray(measurements)) {
        const entries: Record<string, number> = {};
        for (const { name: key, value } of measurements) {
            if (value !== null) {
                entries[key] = value;
            }
        }
        decodedMeasurements = entries;
    } else {
        decodedMeasurements = measurements;
    }
    return {
        objectType,
        name,
        classification: decodedClassification,
        measurements: decodedMeasurements,
        locked: isLocked,
    };
}
