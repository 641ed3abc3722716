import chunk from 'lodash/chunk';
import { InvalidArgumentError } from './errors';
import { logger } from './logger';

/**
 * split items into consecutive groups of at most `chunkSize` elements, keeping their order.
 * Only the last group may be shorter.
 * @throws InvalidArgumentError if chunkSize is not a positive integer
 */
export function partition<T>(items: readonly T[], chunkSize: number): T[][] {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        const message = `invalid chunk size [${chunkSize}]: must be a positive integer`;
        logger.error(message);
        throw new InvalidArgumentError(message);
    }
    return chunk(items, chunkSize);
}
