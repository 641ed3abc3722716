import { UnsupportedFormatError, logger } from '@regionlink/core';

export type StandardCodec = 'png' | 'jpeg' | 'tiff' | 'webp' | 'gif' | 'avif';

export type ExportFormat = { kind: 'hyperstack' } | { kind: 'standard'; codec: StandardCodec };

const HYPERSTACK: ExportFormat = { kind: 'hyperstack' };

const standard = (codec: StandardCodec): ExportFormat => ({ kind: 'standard', codec });

// keys are lower case; lookups lower-case and trim the requested name first
const FORMATS: ReadonlyMap<string, ExportFormat> = new Map([
    ['imagej tiff', HYPERSTACK],
    ['imagej tif', HYPERSTACK],
    ['png', standard('png')],
    ['jpg', standard('jpeg')],
    ['jpeg', standard('jpeg')],
    ['tif', standard('tiff')],
    ['tiff', standard('tiff')],
    ['webp', standard('webp')],
    ['gif', standard('gif')],
    ['avif', standard('avif')],
]);

export function supportedFormats(): string[] {
    return [...FORMATS.keys()];
}

/**
 * @throws UnsupportedFormatError if no encoder is registered under the name
 */
export function resolveFormat(name: string): ExportFormat {
    const format = FORMATS.get(name.trim().toLowerCase());
    if (!format) {
        const message = `unsupported export format [${name}]; expected one of: ${supportedFormats().join(', ')}`;
        logger.error(message);
        throw new UnsupportedFormatError(message);
    }
    return format;
}
