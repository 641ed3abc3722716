export { GeoJsonCodec, type EncodedFeature, type EncodedFeatureCollection, type EncodedProperties } from './codec';
export { createCodecConfig, DEFAULT_CODEC_CONFIG, type CodecConfig } from './codec-config';
export { roiToGeometry, geometryToRoi, type EncodedGeometry } from './geometry';
export { encodePlane, decodePlane, type PlaneJson } from './plane-codec';
export { stripNulls, isJsonObject, type JsonObject } from './sanitize';
export {
    RegionObject,
    type RegionObjectInit,
    type Classification,
    type Measurements,
    type RGB,
} from './region-object';
export { getObjectIds, getMeasurementNames, getMeasurements } from './objects';
export {
    GeometrySchema,
    FeatureSchema,
    PropertiesSchema,
    ObjectTypeSchema,
    type GeometryJson,
    type GeometryType,
    type ObjectType,
    type FeatureInput,
} from './schemas';
