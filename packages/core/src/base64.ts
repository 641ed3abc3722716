/**
 * standard alphabet, padded, with no line breaks
 */
export function base64Encode(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}
