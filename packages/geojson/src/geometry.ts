import {
    Box2D,
    type EllipseROI,
    type ImagePlane,
    type PolygonRings,
    type RectangleROI,
    type ROI,
    Roi,
    type Ring,
    Vec2,
    type vec2,
} from '@regionlink/geometry';
import type { PlaneJson } from './plane-codec';
import type { AreaShape, GeometryJson, Position, ShapeHint } from './schemas';

type CoordinatesByType = {
    Point: number[];
    MultiPoint: number[][];
    LineString: number[][];
    Polygon: number[][][];
    MultiPolygon: number[][][][];
};

export type EncodedGeometry = {
    [K in keyof CoordinatesByType]: {
        type: K;
        coordinates: CoordinatesByType[K];
        shape?: ShapeHint;
        plane?: PlaneJson;
    };
}[keyof CoordinatesByType];

const position = (v: vec2): number[] => [v[0], v[1]];

function closedRing(ring: Ring): number[][] {
    const coords = ring.map(position);
    if (ring.length > 0 && !Vec2.exactlyEqual(ring[0], ring[ring.length - 1])) {
        coords.push(position(ring[0]));
    }
    return coords;
}

const polygonCoordinates = ({ exterior, holes }: PolygonRings) => [closedRing(exterior), ...holes.map(closedRing)];

const shapeHint = ({ kind, x, y, width, height }: RectangleROI | EllipseROI): ShapeHint => ({
    type: kind,
    x,
    y,
    width,
    height,
});

/**
 * the GeoJSON geometry a shape is written as. Rectangles and ellipses become polygons tagged with a "shape" member
 * that keeps their exact bounds; points are always a MultiPoint. The plane is not included.
 */
export function roiToGeometry(roi: ROI): EncodedGeometry {
    switch (roi.kind) {
        case 'rectangle': {
            const { x, y, width, height } = roi;
            const corners: vec2[] = [
                [x, y],
                [x + width, y],
                [x + width, y + height],
                [x, y + height],
            ];
            return { type: 'Polygon', coordinates: [closedRing(corners)], shape: shapeHint(roi) };
        }
        case 'ellipse':
            return { type: 'Polygon', coordinates: [closedRing(Roi.ellipseVertices(roi))], shape: shapeHint(roi) };
        case 'polygon':
            return { type: 'Polygon', coordinates: polygonCoordinates(roi) };
        case 'multipolygon':
            return { type: 'MultiPolygon', coordinates: roi.polygons.map(polygonCoordinates) };
        case 'line':
            return { type: 'LineString', coordinates: [position(roi.start), position(roi.end)] };
        case 'polyline':
            return { type: 'LineString', coordinates: roi.vertices.map(position) };
        case 'points':
            return { type: 'MultiPoint', coordinates: roi.points.map(position) };
    }
}

// any third (altitude) ordinate is dropped
const toVec2 = (p: Position): vec2 => [p[0], p[1]];

function openRing(ring: ReadonlyArray<Position>): vec2[] {
    const vertices = ring.map(toVec2);
    if (vertices.length > 1 && Vec2.exactlyEqual(vertices[0], vertices[vertices.length - 1])) {
        vertices.pop();
    }
    return vertices;
}

function toPolygonRings(rings: ReadonlyArray<ReadonlyArray<Position>>): PolygonRings {
    const [exterior, ...holes] = rings;
    return { exterior: openRing(exterior ?? []), holes: holes.map(openRing) };
}

function areaRoi(shape: AreaShape, x: number, y: number, width: number, height: number, plane: ImagePlane): ROI {
    return shape === 'rectangle' ? Roi.rectangle(x, y, width, height, plane) : Roi.ellipse(x, y, width, height, plane);
}

/**
 * the shape a parsed GeoJSON geometry describes, placed on the given plane.
 * A two-position LineString is a line; a longer one is a polyline.
 */
export function geometryToRoi(geometry: GeometryJson, plane: ImagePlane): ROI {
    switch (geometry.type) {
        case 'Point':
            return Roi.points([toVec2(geometry.coordinates)], plane);
        case 'MultiPoint':
            return Roi.points(geometry.coordinates.map(toVec2), plane);
        case 'LineString': {
            const vertices = geometry.coordinates.map(toVec2);
            return vertices.length === 2 ? Roi.line(vertices[0], vertices[1], plane) : Roi.polyline(vertices, plane);
        }
        case 'Polygon': {
            const rings = toPolygonRings(geometry.coordinates);
            if (typeof geometry.shape === 'object') {
                const { type, x, y, width, height } = geometry.shape;
                return areaRoi(type, x, y, width, height, plane);
            }
            const bounds = Box2D.fromPoints(rings.exterior);
            if (geometry.shape && bounds) {
                const [width, height] = Box2D.size(bounds);
                const [x, y] = bounds.minCorner;
                return areaRoi(geometry.shape, x, y, width, height, plane);
            }
            return Roi.polygon(rings.exterior, rings.holes, plane);
        }
        case 'MultiPolygon':
            return Roi.multipolygon(geometry.coordinates.map(toPolygonRings), plane);
    }
}
