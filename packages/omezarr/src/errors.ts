import { ImageIOError, InvalidArgumentError } from '@regionlink/core';

/** the store holds something that is not a readable OME-Zarr image */
export class OmeZarrDataError extends ImageIOError {}

/** a plane, level or axis the image does not have */
export class OmeZarrIndexError extends InvalidArgumentError {}
