export { OmeZarrImageSource } from './image-source';
export { OmeZarrDataError, OmeZarrIndexError } from './errors';
export {
    type ZarrDimension,
    type OmeZarrAxis,
    type OmeZarrCoordinateTranslation,
    type OmeZarrCoordinateScale,
    type OmeZarrCoordinateTransform,
    type OmeZarrDataset,
    type OmeZarrMultiscale,
    type OmeZarrOmeroChannel,
    type OmeZarrOmero,
    type OmeZarrAttrs,
    type OmeZarrArrayMetadata,
    type OmeZarrLevel,
    OmeZarrAxisSchema,
    OmeZarrCoordinateTransformSchema,
    OmeZarrDatasetSchema,
    OmeZarrMultiscaleSchema,
    OmeZarrOmeroSchema,
    OmeZarrAttrsSchema,
    OmeZarrMetadata,
    parseOmeZarrAttrs,
} from './zarr/types';
export {
    loadOmeZarr,
    loadOmeZarrFromUrl,
    pickLevel,
    readBlock,
    type OmeZarrStore,
    type OmeZarrArray,
    type LoadedOmeZarr,
    type BlockRequest,
    type SampleBlock,
} from './zarr/loading';
