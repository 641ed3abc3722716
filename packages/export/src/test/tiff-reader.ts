import { fromArrayBuffer } from 'geotiff';
import { toArrayBuffer } from './synthetic-source';

export type TiffEntry = { type: number; count: number; value: number };

/** the raw entries of the first IFD of a little-endian TIFF, keyed by tag */
export function firstIfdEntries(bytes: Uint8Array): Map<number, TiffEntry> {
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const ifd = view.getUint32(4, true);
    const entries = new Map<number, TiffEntry>();
    const count = view.getUint16(ifd, true);
    for (let i = 0; i < count; i++) {
        const pos = ifd + 2 + 12 * i;
        const type = view.getUint16(pos + 2, true);
        entries.set(view.getUint16(pos, true), {
            type,
            count: view.getUint32(pos + 4, true),
            value: type === 3 ? view.getUint16(pos + 8, true) : view.getUint32(pos + 8, true),
        });
    }
    return entries;
}

export function readDescription(bytes: Uint8Array): string | undefined {
    const entry = firstIfdEntries(bytes).get(270);
    if (!entry) {
        return undefined;
    }
    // drop the terminating NUL
    return new TextDecoder().decode(bytes.subarray(entry.value, entry.value + entry.count - 1));
}

export function readRational(bytes: Uint8Array, tag: number): [number, number] | undefined {
    const entry = firstIfdEntries(bytes).get(tag);
    if (!entry) {
        return undefined;
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return [view.getUint32(entry.value, true), view.getUint32(entry.value + 4, true)];
}

/** the page labels stored in the ImageJ metadata tags, or undefined if there are none */
export function readLabels(bytes: Uint8Array): string[] | undefined {
    const entries = firstIfdEntries(bytes);
    const counts = entries.get(50838);
    const metadata = entries.get(50839);
    if (!counts || !metadata) {
        return undefined;
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const decoder = new TextDecoder('utf-16le');
    const labels: string[] = [];
    // the first count covers the magic, block type and label count
    let offset = metadata.value + view.getUint32(counts.value, true);
    for (let i = 1; i < counts.count; i++) {
        const size = view.getUint32(counts.value + 4 * i, true);
        labels.push(decoder.decode(bytes.subarray(offset, offset + size)));
        offset += size;
    }
    return labels;
}

export type TiffPage = { width: number; height: number; samples: number[] };

/** every page of a TIFF, decoded by an independent reader; only the first sample of each pixel is kept */
export async function readPages(bytes: Uint8Array): Promise<TiffPage[]> {
    const tiff = await fromArrayBuffer(toArrayBuffer(bytes));
    const pages: TiffPage[] = [];
    const count = await tiff.getImageCount();
    for (let i = 0; i < count; i++) {
        const image = await tiff.getImage(i);
        const rasters = await image.readRasters();
        const band = rasters[0];
        pages.push({
            width: image.getWidth(),
            height: image.getHeight(),
            samples: typeof band === 'number' ? [band] : Array.from(band),
        });
    }
    return pages;
}
