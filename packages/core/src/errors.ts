export class RegionLinkError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** text that is not JSON, or JSON that does not describe a feature or geometry */
export class DecodeError extends RegionLinkError {}

export class InvalidArgumentError extends RegionLinkError {}

export class UnsupportedFormatError extends RegionLinkError {}

/** the backing pixel storage could not be read */
export class ImageIOError extends RegionLinkError {}
