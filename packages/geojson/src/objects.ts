import uniq from 'lodash/uniq';
import type { RegionObject } from './region-object';

export function getObjectIds(objects: ReadonlyArray<RegionObject>): string[] {
    return objects.map((o) => o.id);
}

/**
 * every measurement name used by any of the objects, each once, in the order first seen
 */
export function getMeasurementNames(objects: ReadonlyArray<RegionObject>): string[] {
    return uniq(objects.flatMap((o) => Object.keys(o.measurements)));
}

/**
 * one value per object, in order; undefined where an object has no measurement of that name
 */
export function getMeasurements(objects: ReadonlyArray<RegionObject>, name: string): Array<number | undefined> {
    return objects.map((o) => o.getMeasurement(name));
}
