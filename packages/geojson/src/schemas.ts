import { z } from 'zod';

// Documentation for the exchange format these schemas follow:
// - GeoJSON: https://datatracker.ietf.org/doc/html/rfc7946
// Members beyond RFC 7946 ("plane", "shape", the feature properties) are foreign members
// that this package reads and writes.

export const PositionSchema = z.tuple([z.number(), z.number()]).rest(z.number());

export type Position = z.infer<typeof PositionSchema>;

export const AreaShapeSchema = z.enum(['rectangle', 'ellipse']);

export type AreaShape = z.infer<typeof AreaShapeSchema>;

// "shape" records which area ROI a polygon was written from, with its exact bounding rectangle.
// A bare tag (the older form) is restored from the ring bounds instead.
export const ShapeHintSchema = z.union([
    AreaShapeSchema,
    z.object({
        type: AreaShapeSchema,
        x: z.number(),
        y: z.number(),
        width: z.number().nonnegative(),
        height: z.number().nonnegative(),
    }),
]);

export type ShapeHint = z.infer<typeof ShapeHintSchema>;

const geometryMembers = {
    plane: z.unknown().optional(),
    shape: ShapeHintSchema.optional(),
};

const RingSchema = PositionSchema.array().nonempty();

const PolygonCoordinatesSchema = RingSchema.array().nonempty();

export const PointGeometrySchema = z.object({
    type: z.literal('Point'),
    coordinates: PositionSchema,
    ...geometryMembers,
});

export const MultiPointGeometrySchema = z.object({
    type: z.literal('MultiPoint'),
    coordinates: PositionSchema.array(),
    ...geometryMembers,
});

export const LineStringGeometrySchema = z.object({
    type: z.literal('LineString'),
    coordinates: PositionSchema.array().min(2),
    ...geometryMembers,
});

export const PolygonGeometrySchema = z.object({
    type: z.literal('Polygon'),
    coordinates: PolygonCoordinatesSchema,
    ...geometryMembers,
});

export const MultiPolygonGeometrySchema = z.object({
    type: z.literal('MultiPolygon'),
    coordinates: PolygonCoordinatesSchema.array(),
    ...geometryMembers,
});

// discriminatedUnion needs the ZodObjects themselves, so these schemas are not
// annotated as z.ZodType<T> the way a plain object schema would be
export const GeometrySchema = z.discriminatedUnion('type', [
    PointGeometrySchema,
    MultiPointGeometrySchema,
    LineStringGeometrySchema,
    PolygonGeometrySchema,
    MultiPolygonGeometrySchema,
]);

export type GeometryJson = z.infer<typeof GeometrySchema>;

export type GeometryType = GeometryJson['type'];

export const GEOMETRY_TYPES: ReadonlySet<string> = new Set<GeometryType>([
    'Point',
    'MultiPoint',
    'LineString',
    'Polygon',
    'MultiPolygon',
]);

export const ObjectTypeSchema = z.enum(['annotation', 'detection', 'cell', 'tile', 'tma-core']);

export type ObjectType = z.infer<typeof ObjectTypeSchema>;

export const ColorSchema = z.tuple([z.number().int(), z.number().int(), z.number().int()]);

export const ClassificationSchema = z.object({
    name: z.string(),
    color: ColorSchema.optional(),
    // older producers pack the colour into one integer
    colorRGB: z.number().int().optional(),
});

// JSON has no NaN or infinities, so they travel as these strings
export const NonFiniteSchema = z.enum(['NaN', 'Infinity', '-Infinity']);

export type NonFiniteText = z.infer<typeof NonFiniteSchema>;

export const MeasurementValueSchema = z.union([z.number(), NonFiniteSchema.transform((text) => Number(text))]);

// measurements are either a name -> value object, or the older list of {name, value} entries
// (array members are not null-stripped, so list values may still be null)
export const MeasurementsSchema = z.union([
    z.record(z.string(), MeasurementValueSchema),
    z.object({ name: z.string(), value: MeasurementValueSchema.nullable() }).array(),
]);

export const PropertiesSchema = z.object({
    objectType: ObjectTypeSchema.optional(),
    name: z.string().optional(),
    classification: ClassificationSchema.optional(),
    isLocked: z.boolean().optional(),
    measurements: MeasurementsSchema.optional(),
});

export const FeatureSchema = z.object({
    type: z.literal('Feature').optional(),
    id: z.union([z.string(), z.number()]).optional(),
    geometry: GeometrySchema,
    properties: PropertiesSchema.optional(),
    plane: z.unknown().optional(),
});

export type FeatureInput = z.infer<typeof FeatureSchema>;
