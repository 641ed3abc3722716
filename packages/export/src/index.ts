export {
    type ImageSource,
    type ImageMetadata,
    type PixelRaster,
    type PixelData,
    type PixelType,
    type PixelSize,
    outputSize,
    bytesPerSample,
    allocatePixels,
} from './types';
export {
    type RegionRequest,
    type RegionRequestInit,
    createRegionRequest,
    fullImageRequest,
    validateRegionRequest,
} from './region-request';
export { type ExportFormat, type StandardCodec, resolveFormat, supportedFormats } from './formats';
export { createRaster, checkRasterShape, sampleRange, toEightBit } from './raster';
export { encodeStandard, type EncoderOptions, type TiffCompression } from './encoders';
export { encodeHyperstack, type HyperstackLayout, type HyperstackOptions } from './imagej-tiff';
export { RegionImageExporter, HYPERSTACK_FORMAT, type ExportOptions } from './exporter';
