import { InvalidArgumentError, logger } from '@regionlink/core';

/** the channel index of a plane that selects every channel at once */
export const NO_CHANNEL = -1;

/**
 * One (channel, z, t) coordinate of a multi-dimensional image: a single 2D slice of it.
 * Planes are immutable values; compare them with `equals`.
 */
export class ImagePlane {
    static readonly DEFAULT: ImagePlane = new ImagePlane(NO_CHANNEL, 0, 0);

    readonly c: number;
    readonly z: number;
    readonly t: number;

    private constructor(c: number, z: number, t: number) {
        this.c = c;
        this.z = z;
        this.t = t;
    }

    /**
     * @throws InvalidArgumentError unless c >= -1 and z, t >= 0, all integers
     */
    static of(c: number, z: number, t: number): ImagePlane {
        const valid =
            Number.isInteger(c) && Number.isInteger(z) && Number.isInteger(t) && c >= NO_CHANNEL && z >= 0 && t >= 0;
        if (!valid) {
            const message = `invalid image plane: c=${c}, z=${z}, t=${t}`;
            logger.error(message);
            throw new InvalidArgumentError(message);
        }
        if (c === NO_CHANNEL && z === 0 && t === 0) {
            return ImagePlane.DEFAULT;
        }
        return new ImagePlane(c, z, t);
    }

    /** a plane spanning every channel */
    static at(z: number, t: number): ImagePlane {
        return ImagePlane.of(NO_CHANNEL, z, t);
    }

    get hasChannel(): boolean {
        return this.c !== NO_CHANNEL;
    }

    equals(other: ImagePlane): boolean {
        return this.c === other.c && this.z === other.z && this.t === other.t;
    }

    toString(): string {
        return `ImagePlane(c=${this.c}, z=${this.z}, t=${this.t})`;
    }
}
