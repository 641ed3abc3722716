export { Vec2, type vec2 } from './vec2';
export { Box2D, type box2D } from './box2D';
export { type Interval, size, intersection } from './interval';
export { ImagePlane, NO_CHANNEL } from './image-plane';
export {
    Roi,
    type ROI,
    type ROIKind,
    type Ring,
    type PolygonRings,
    type RectangleROI,
    type EllipseROI,
    type PolygonROI,
    type MultiPolygonROI,
    type LineROI,
    type PolylineROI,
    type PointsROI,
} from './roi';
