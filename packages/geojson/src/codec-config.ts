import { InvalidArgumentError, logger, summarizeIssues } from '@regionlink/core';
import { z, ZodError } from 'zod';

const CodecConfigSchema = z.object({
    /** strip null members from decoded objects before validating them */
    nullTolerant: z.boolean().default(true),
    /** read and write the (c, z, t) plane of every shape */
    planeAdapter: z.boolean().default(true),
    prettyPrint: z.boolean().default(false),
    /** arrays of at least this many elements are decoded on the concurrent path */
    decodeThreshold: z.number().int().nonnegative().default(10),
    /** at least this many chunks are encoded on the concurrent path */
    chunkEncodeThreshold: z.number().int().nonnegative().default(4),
    /** at least this many objects are written to per-feature text on the concurrent path */
    featureListThreshold: z.number().int().nonnegative().default(100),
    lanes: z.number().int().positive().default(4),
});

export type CodecConfig = Readonly<z.infer<typeof CodecConfigSchema>>;

/**
 * build an immutable codec configuration; anything not overridden takes its default
 * @throws InvalidArgumentError if an override is out of range
 */
export function createCodecConfig(overrides: Partial<CodecConfig> = {}): CodecConfig {
    try {
        return Object.freeze(CodecConfigSchema.parse(overrides));
    } catch (e) {
        if (e instanceof ZodError) {
            const message = `invalid codec configuration: ${summarizeIssues(e)}`;
            logger.error(message);
            throw new InvalidArgumentError(message, { cause: e });
        }
        throw e;
    }
}

export const DEFAULT_CODEC_CONFIG: CodecConfig = createCodecConfig();
