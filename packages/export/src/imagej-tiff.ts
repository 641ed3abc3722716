/**
 * @module imagej-tiff
 * Writer for uncompressed, little-endian, multi-page TIFF files in the layout ImageJ reads as a hyperstack:
 * one single-channel page per (c, z, t) plane, channel varying fastest, then z, then t.
 * The dimensions travel in the ImageDescription of the first page; page labels, when given, in the
 * IJMetadataByteCounts and IJMetadata tags.
 *
 * @see https://www.itu.int/itudoc/itu-t/com16/tiff-fx/docs/tiff6.pdf (TIFF 6.0)
 */

import { InvalidArgumentError, UnsupportedFormatError, logger } from '@regionlink/core';
import { sampleRange } from './raster';
import { bytesPerSample, type PixelRaster, type PixelSize, type PixelType } from './types';

export type HyperstackLayout = {
    channels: number;
    slices: number;
    frames: number;
};

export type HyperstackOptions = {
    /** size of one output pixel; written as the X/Y resolution and the unit */
    pixelSize?: PixelSize | undefined;
    /** one label per page, shown by ImageJ as the slice label */
    labels?: ReadonlyArray<string> | undefined;
};

// ImageJ version the description claims to be written by
const IMAGEJ_VERSION = '1.54f';

const TYPE_BYTE = 1;
const TYPE_ASCII = 2;
const TYPE_SHORT = 3;
const TYPE_LONG = 4;
const TYPE_RATIONAL = 5;

const TAG = {
    NewSubfileType: 254,
    ImageWidth: 256,
    ImageLength: 257,
    BitsPerSample: 258,
    Compression: 259,
    PhotometricInterpretation: 262,
    ImageDescription: 270,
    StripOffsets: 273,
    SamplesPerPixel: 277,
    RowsPerStrip: 278,
    StripByteCounts: 279,
    XResolution: 282,
    YResolution: 283,
    PlanarConfiguration: 284,
    ResolutionUnit: 296,
    SampleFormat: 339,
    IJMetadataByteCounts: 50838,
    IJMetadata: 50839,
} as const;

// ImageJ's metadata magic ("IJIJ") and label block type ("labl"), read as 32-bit integers in the file's byte order
const IJ_MAGIC = 0x494a494a;
const IJ_LABELS = 0x6c61626c;

const SAMPLE_FORMAT_UINT = 1;
const SAMPLE_FORMAT_FLOAT = 3;
const RESOLUTION_SCALE = 1_000_000;
const UINT32_MAX = 0xffffffff;

type IfdEntry = {
    tag: number;
    type: number;
    count: number;
    /** inline value for SHORT and LONG entries, an offset for anything larger than four bytes */
    value: number;
};

const align = (offset: number, to: number) => Math.ceil(offset / to) * to;

function fail(message: string): never {
    logger.error(message);
    throw new InvalidArgumentError(message);
}

function checkPages(pages: ReadonlyArray<PixelRaster>, layout: HyperstackLayout): PixelRaster {
    const { channels, slices, frames } = layout;
    for (const [name, size] of Object.entries(layout)) {
        if (!Number.isInteger(size) || size < 1) {
            fail(`invalid hyperstack ${name} [${size}]: must be a positive integer`);
        }
    }
    if (pages.length !== channels * slices * frames) {
        const expected = channels * slices * frames;
        fail(`a ${channels}x${slices}x${frames} hyperstack needs ${expected} pages, got ${pages.length}`);
    }
    const [first] = pages;
    for (const page of pages) {
        if (page.channels !== 1) {
            fail(`hyperstack pages hold one channel each, got a page with ${page.channels}`);
        }
        if (page.width !== first.width || page.height !== first.height || page.pixelType !== first.pixelType) {
            fail('hyperstack pages must share their size and pixel type');
        }
    }
    return first;
}

type LabelBlock = { bytes: Uint8Array; counts: number[] };

// the header, then every label as UTF-16 in the file's byte order
function labelBlock(labels: ReadonlyArray<string>): LabelBlock {
    const headerBytes = 4 + 8;
    const encoded = labels.map((label) => {
        const chars = new Uint8Array(2 * label.length);
        const view = new DataView(chars.buffer);
        for (let i = 0; i < label.length; i++) {
            view.setUint16(2 * i, label.charCodeAt(i), true);
        }
        return chars;
    });
    const bytes = new Uint8Array(encoded.reduce((size, chars) => size + chars.length, headerBytes));
    const view = new DataView(bytes.buffer);
    view.setUint32(0, IJ_MAGIC, true);
    view.setUint32(4, IJ_LABELS, true);
    view.setUint32(8, labels.length, true);
    let offset = headerBytes;
    for (const chars of encoded) {
        bytes.set(chars, offset);
        offset += chars.length;
    }
    return { bytes, counts: [headerBytes, ...encoded.map((chars) => chars.length)] };
}

// ImageJ spells micrometres "micron" and keeps descriptions ASCII
function imageJUnit(unit: string): string {
    return unit === 'µm' || unit === 'um' || unit === 'micrometer' ? 'micron' : unit.replace(/[^\x20-\x7e]/g, '');
}

function description(pages: ReadonlyArray<PixelRaster>, layout: HyperstackLayout, options: HyperstackOptions): string {
    const { channels, slices, frames } = layout;
    const lines = [`ImageJ=${IMAGEJ_VERSION}`, `images=${pages.length}`];
    if (channels > 1) lines.push(`channels=${channels}`);
    if (slices > 1) lines.push(`slices=${slices}`);
    if (frames > 1) lines.push(`frames=${frames}`);
    if (pages.length > 1) lines.push('hyperstack=true');
    if (channels > 1) lines.push('mode=composite');
    if (options.pixelSize) lines.push(`unit=${imageJUnit(options.pixelSize.unit)}`);
    if (pages[0].pixelType !== 'uint8') {
        let min = Number.POSITIVE_INFINITY;
        let max = Number.NEGATIVE_INFINITY;
        for (const page of pages) {
            const [lo, hi] = sampleRange(page.data);
            min = Math.min(min, lo);
            max = Math.max(max, hi);
        }
        lines.push(`min=${min}`, `max=${max}`);
    }
    return `${lines.join('\n')}\n`;
}

function resolutionUnit(unit: string): number {
    switch (unit) {
        case 'inch':
            return 2;
        case 'cm':
            return 3;
        default:
            return 1;
    }
}

function writeSamples(view: DataView, offset: number, pixelType: PixelType, data: ArrayLike<number>) {
    for (let i = 0; i < data.length; i++) {
        switch (pixelType) {
            case 'uint8':
                view.setUint8(offset + i, data[i]);
                break;
            case 'uint16':
                view.setUint16(offset + 2 * i, data[i], true);
                break;
            case 'float32':
                view.setFloat32(offset + 4 * i, data[i], true);
                break;
        }
    }
}

function writeIfd(view: DataView, offset: number, entries: IfdEntry[], next: number) {
    view.setUint16(offset, entries.length, true);
    let pos = offset + 2;
    for (const { tag, type, count, value } of entries) {
        view.setUint16(pos, tag, true);
        view.setUint16(pos + 2, type, true);
        view.setUint32(pos + 4, count, true);
        if (type === TYPE_SHORT) {
            view.setUint16(pos + 8, value, true);
        } else {
            view.setUint32(pos + 8, value, true);
        }
        pos += 12;
    }
    view.setUint32(pos, next, true);
}

// numerator of the rational resolution, over a denominator of RESOLUTION_SCALE
const pixelsPerUnit = (size: number) => Math.min(UINT32_MAX, Math.round(RESOLUTION_SCALE / size));

const ifdSize = (entryCount: number) => 2 + 12 * entryCount + 4;

/**
 * Write the pages as one ImageJ hyperstack TIFF. Pages must be single-channel, share one size and pixel type,
 * and be ordered with the channel varying fastest, then z, then t.
 * @throws InvalidArgumentError if the pages do not match the layout
 * @throws UnsupportedFormatError if the file would not fit the 4 GiB classic TIFF limit
 */
export function encodeHyperstack(
    pages: ReadonlyArray<PixelRaster>,
    layout: HyperstackLayout,
    options: HyperstackOptions = {},
): Uint8Array {
    const { width, height, pixelType } = checkPages(pages, layout);
    const { pixelSize, labels } = options;
    if (labels && labels.length !== pages.length) {
        fail(`expected one label per page (${pages.length}), got ${labels.length}`);
    }
    const block = labels && labelBlock(labels);
    const sampleBytes = bytesPerSample(pixelType);
    const pageBytes = width * height * sampleBytes;
    const text = new TextEncoder().encode(`${description(pages, layout, options)}\0`);

    // header, description, resolution rationals, label byte counts and labels, pixel data, then the chain of IFDs
    const descriptionOffset = 8;
    let offset = align(descriptionOffset + text.length, 2);
    const resolutionOffset = offset;
    if (pixelSize) {
        offset += 16;
    }
    const countsOffset = offset;
    const labelsOffset = countsOffset + (block ? 4 * block.counts.length : 0);
    if (block) {
        offset = align(labelsOffset + block.bytes.length, 2);
    }
    const dataOffset = align(offset, 8);
    const ifdOffset = align(dataOffset + pages.length * pageBytes, 2);

    const ifds = pages.map((_page, index) => {
        const entries: IfdEntry[] = [
            { tag: TAG.NewSubfileType, type: TYPE_LONG, count: 1, value: 0 },
            { tag: TAG.ImageWidth, type: TYPE_LONG, count: 1, value: width },
            { tag: TAG.ImageLength, type: TYPE_LONG, count: 1, value: height },
            { tag: TAG.BitsPerSample, type: TYPE_SHORT, count: 1, value: 8 * sampleBytes },
            { tag: TAG.Compression, type: TYPE_SHORT, count: 1, value: 1 },
            { tag: TAG.PhotometricInterpretation, type: TYPE_SHORT, count: 1, value: 1 },
        ];
        if (index === 0) {
            entries.push({ tag: TAG.ImageDescription, type: TYPE_ASCII, count: text.length, value: descriptionOffset });
        }
        entries.push(
            { tag: TAG.StripOffsets, type: TYPE_LONG, count: 1, value: dataOffset + index * pageBytes },
            { tag: TAG.SamplesPerPixel, type: TYPE_SHORT, count: 1, value: 1 },
            { tag: TAG.RowsPerStrip, type: TYPE_LONG, count: 1, value: height },
            { tag: TAG.StripByteCounts, type: TYPE_LONG, count: 1, value: pageBytes },
        );
        if (pixelSize) {
            entries.push(
                { tag: TAG.XResolution, type: TYPE_RATIONAL, count: 1, value: resolutionOffset },
                { tag: TAG.YResolution, type: TYPE_RATIONAL, count: 1, value: resolutionOffset + 8 },
            );
        }
        entries.push({ tag: TAG.PlanarConfiguration, type: TYPE_SHORT, count: 1, value: 1 });
        if (pixelSize) {
            const unit = resolutionUnit(pixelSize.unit);
            entries.push({ tag: TAG.ResolutionUnit, type: TYPE_SHORT, count: 1, value: unit });
        }
        entries.push({
            tag: TAG.SampleFormat,
            type: TYPE_SHORT,
            count: 1,
            value: pixelType === 'float32' ? SAMPLE_FORMAT_FLOAT : SAMPLE_FORMAT_UINT,
        });
        if (block && index === 0) {
            entries.push(
                { tag: TAG.IJMetadataByteCounts, type: TYPE_LONG, count: block.counts.length, value: countsOffset },
                { tag: TAG.IJMetadata, type: TYPE_BYTE, count: block.bytes.length, value: labelsOffset },
            );
        }
        return entries;
    });

    const totalSize = ifds.reduce((size, entries) => size + ifdSize(entries.length), ifdOffset);
    if (totalSize > UINT32_MAX) {
        const message = `hyperstack of ${totalSize} bytes exceeds the classic TIFF size limit`;
        logger.error(message);
        throw new UnsupportedFormatError(message);
    }

    const bytes = new Uint8Array(totalSize);
    const view = new DataView(bytes.buffer);
    bytes[0] = 0x49; // I
    bytes[1] = 0x49; // I
    view.setUint16(2, 42, true);
    view.setUint32(4, ifdOffset, true);
    bytes.set(text, descriptionOffset);
    if (pixelSize) {
        view.setUint32(resolutionOffset, pixelsPerUnit(pixelSize.width), true);
        view.setUint32(resolutionOffset + 4, RESOLUTION_SCALE, true);
        view.setUint32(resolutionOffset + 8, pixelsPerUnit(pixelSize.height), true);
        view.setUint32(resolutionOffset + 12, RESOLUTION_SCALE, true);
    }
    if (block) {
        block.counts.forEach((count, i) => view.setUint32(countsOffset + 4 * i, count, true));
        bytes.set(block.bytes, labelsOffset);
    }
    pages.forEach((page, index) => {
        writeSamples(view, dataOffset + index * pageBytes, pixelType, page.data);
    });

    let position = ifdOffset;
    ifds.forEach((entries, index) => {
        const next = index === ifds.length - 1 ? 0 : position + ifdSize(entries.length);
        writeIfd(view, position, entries, next);
        position = next;
    });
    logger.debug(`wrote ${pages.length} page hyperstack of ${width}x${height} ${pixelType}, ${totalSize} bytes`);
    return bytes;
}
