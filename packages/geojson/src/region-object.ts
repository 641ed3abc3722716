import { randomUUID } from 'node:crypto';
import type { ImagePlane, ROI } from '@regionlink/geometry';
import type { ObjectType } from './schemas';

export type RGB = readonly [number, number, number];

export type Classification = {
    readonly name: string;
    readonly color?: RGB | undefined;
};

export type Measurements = Readonly<Record<string, number>>;

export type RegionObjectInit = {
    id?: string | undefined;
    roi: ROI;
    objectType?: ObjectType | undefined;
    name?: string | undefined;
    classification?: Classification | undefined;
    measurements?: Measurements | undefined;
    locked?: boolean | undefined;
};

/**
 * A classified, measured region with a stable identifier: one node of the host's object hierarchy,
 * seen as a flat unit. Parent/child links are not carried.
 */
export class RegionObject {
    readonly id: string;
    readonly roi: ROI;
    readonly objectType: ObjectType;
    readonly name: string | undefined;
    readonly classification: Classification | undefined;
    readonly measurements: Measurements;
    readonly locked: boolean;

    constructor(init: RegionObjectInit) {
        this.id = init.id ?? randomUUID();
        this.roi = init.roi;
        this.objectType = init.objectType ?? 'annotation';
        this.name = init.name;
        this.classification = init.classification;
        this.measurements = Object.freeze({ ...init.measurements });
        this.locked = init.locked ?? false;
    }

    get plane(): ImagePlane {
        return this.roi.plane;
    }

    /**
     * @returns the named measurement, or undefined if this object does not have it
     */
    getMeasurement(name: string): number | undefined {
        return Object.hasOwn(this.measurements, name) ? this.measurements[name] : undefined;
    }
}
