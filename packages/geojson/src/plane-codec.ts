import { DecodeError, InvalidArgumentError, logger, summarizeIssues } from '@regionlink/core';
import { ImagePlane } from '@regionlink/geometry';
import { z } from 'zod';
import { isJsonObject } from './sanitize';

export type PlaneJson = {
    c: number;
    z: number;
    t: number;
};

// unknown members are dropped rather than rejected
const PlaneFieldsSchema = z.object({
    c: z.number().int().optional(),
    z: z.number().int().optional(),
    t: z.number().int().optional(),
});

export function encodePlane(plane: ImagePlane): PlaneJson {
    return { c: plane.c, z: plane.z, t: plane.t };
}

/**
 * Read a plane from either a bare `{c, z, t}` object or one wrapped as `{plane: {c, z, t}}`.
 * Missing fields take the default plane's value, so `{z: 3}` is (c=-1, z=3, t=0).
 * @throws DecodeError if a field is not an integer, or the coordinates do not form a valid plane
 */
export function decodePlane(value: unknown): ImagePlane {
    if (value === undefined || value === null) {
        return ImagePlane.DEFAULT;
    }
    const unwrapped = isJsonObject(value) && isJsonObject(value.plane) ? value.plane : value;
    const parsed = PlaneFieldsSchema.safeParse(unwrapped);
    if (!parsed.success) {
        const message = `invalid plane: ${summarizeIssues(parsed.error)}`;
        logger.error(message);
        throw new DecodeError(message, { cause: parsed.error });
    }
    const fallback = ImagePlane.DEFAULT;
    const fields = parsed.data;
    try {
        return ImagePlane.of(fields.c ?? fallback.c, fields.z ?? fallback.z, fields.t ?? fallback.t);
    } catch (e) {
        if (e instanceof InvalidArgumentError) {
            throw new DecodeError(e.message, { cause: e });
        }
        throw e;
    }
}
