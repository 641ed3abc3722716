import { ImagePlane } from './image-plane';
import type { vec2 } from './vec2';

// Rings are stored open: the closing vertex that GeoJSON repeats is never kept here.
export type Ring = ReadonlyArray<vec2>;

export type PolygonRings = {
    readonly exterior: Ring;
    readonly holes: ReadonlyArray<Ring>;
};

type OnPlane = { readonly plane: ImagePlane };

export type RectangleROI = OnPlane & {
    readonly kind: 'rectangle';
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
};

/** an axis-aligned ellipse, described by its bounding rectangle */
export type EllipseROI = OnPlane & {
    readonly kind: 'ellipse';
    readonly x: number;
    readonly y: number;
    readonly width: number;
    readonly height: number;
};

export type PolygonROI = OnPlane & PolygonRings & { readonly kind: 'polygon' };

export type MultiPolygonROI = OnPlane & {
    readonly kind: 'multipolygon';
    readonly polygons: ReadonlyArray<PolygonRings>;
};

export type LineROI = OnPlane & {
    readonly kind: 'line';
    readonly start: vec2;
    readonly end: vec2;
};

export type PolylineROI = OnPlane & {
    readonly kind: 'polyline';
    readonly vertices: ReadonlyArray<vec2>;
};

export type PointsROI = OnPlane & {
    readonly kind: 'points';
    readonly points: ReadonlyArray<vec2>;
};

export type ROI = RectangleROI | EllipseROI | PolygonROI | MultiPolygonROI | LineROI | PolylineROI | PointsROI;

export type ROIKind = ROI['kind'];

const rectangle = (x: number, y: number, width: number, height: number, plane = ImagePlane.DEFAULT): RectangleROI => ({
    kind: 'rectangle',
    plane,
    x,
    y,
    width,
    height,
});

const ellipse = (x: number, y: number, width: number, height: number, plane = ImagePlane.DEFAULT): EllipseROI => ({
    kind: 'ellipse',
    plane,
    x,
    y,
    width,
    height,
});

const polygon = (exterior: Ring, holes: ReadonlyArray<Ring> = [], plane = ImagePlane.DEFAULT): PolygonROI => ({
    kind: 'polygon',
    plane,
    exterior,
    holes,
});

const multipolygon = (polygons: ReadonlyArray<PolygonRings>, plane = ImagePlane.DEFAULT): MultiPolygonROI => ({
    kind: 'multipolygon',
    plane,
    polygons,
});

const line = (start: vec2, end: vec2, plane = ImagePlane.DEFAULT): LineROI => ({ kind: 'line', plane, start, end });

const polyline = (vertices: ReadonlyArray<vec2>, plane = ImagePlane.DEFAULT): PolylineROI => ({
    kind: 'polyline',
    plane,
    vertices,
});

const points = (pts: ReadonlyArray<vec2>, plane = ImagePlane.DEFAULT): PointsROI => ({
    kind: 'points',
    plane,
    points: pts,
});

/**
 * the vertices an ellipse is approximated by when it has to be written as a polygon.
 * vertex k sits at angle 2πk/n, so the extreme vertices land exactly on the bounding rectangle
 * when n is a multiple of 4
 */
function ellipseVertices(roi: EllipseROI, n = 64): vec2[] {
    const rx = roi.width / 2;
    const ry = roi.height / 2;
    const cx = roi.x + rx;
    const cy = roi.y + ry;
    return Array.from({ length: n }, (_, k) => {
        const theta = (2 * Math.PI * k) / n;
        return [cx + rx * Math.cos(theta), cy + ry * Math.sin(theta)] as const;
    });
}

export const Roi = {
    rectangle,
    ellipse,
    polygon,
    multipolygon,
    line,
    polyline,
    points,
    ellipseVertices,
};
