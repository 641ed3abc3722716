import { InvalidArgumentError } from './errors';
import { logger } from './logger';

export type ExecutionStrategy = 'sequential' | 'concurrent';

export type DispatchOptions = {
    /** collections at least this large take the concurrent path */
    threshold: number;
    /** how many lanes share the work on the concurrent path; this changes the evaluation order, not the speed */
    lanes: number;
};

export function selectExecution(collectionSize: number, threshold: number): ExecutionStrategy {
    return collectionSize >= threshold ? 'concurrent' : 'sequential';
}

/**
 * Map every item through `transform`, returning results in input order.
 *
 * On the concurrent path items are scattered round-robin across `lanes` (item i goes to lane i % lanes),
 * and the lanes are drained one after another, so items complete out of input order. Each result is written
 * to the slot of the item it came from, and the slots are gathered once every lane is drained; the caller only
 * ever observes the input order.
 *
 * Both paths run synchronously on the calling thread. The lane count only decides the order in which `transform`
 * is called; it gives no throughput over the sequential path.
 */
export function dispatchMap<T, R>(
    items: readonly T[],
    transform: (item: T, index: number) => R,
    options: DispatchOptions,
): R[] {
    const { threshold, lanes } = options;
    if (selectExecution(items.length, threshold) === 'sequential') {
        return items.map(transform);
    }
    if (!Number.isInteger(lanes) || lanes <= 0) {
        const message = `invalid lane count [${lanes}]: must be a positive integer`;
        logger.error(message);
        throw new InvalidArgumentError(message);
    }
    logger.debug(`dispatching ${items.length} items across ${lanes} lanes`);
    const scattered: number[][] = Array.from({ length: Math.min(lanes, items.length) }, () => []);
    items.forEach((_item, index) => {
        scattered[index % scattered.length].push(index);
    });

    const slots = new Array<R>(items.length);
    for (const lane of scattered) {
        for (const index of lane) {
            slots[index] = transform(items[index], index);
        }
    }
    return slots;
}

/**
 * like dispatchMap, for transforms that produce several results per item; the groups are concatenated in input order
 */
export function dispatchFlatMap<T, R>(
    items: readonly T[],
    transform: (item: T, index: number) => readonly R[],
    options: DispatchOptions,
): R[] {
    return dispatchMap(items, transform, options).flat();
}
