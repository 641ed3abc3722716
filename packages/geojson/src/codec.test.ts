import { DecodeError, InvalidArgumentError } from '@regionlink/core';
import { ImagePlane, Roi } from '@regionlink/geometry';
import { describe, expect, it } from 'vitest';
import { GeoJsonCodec } from './codec';
import { createCodecConfig } from './codec-config';
import { RegionObject } from './region-object';

const codec = new GeoJsonCodec(createCodecConfig());

function sampleObjects(): RegionObject[] {
    return [
        new RegionObject({
            id: 'rect',
            roi: Roi.rectangle(10, 20, 30, 40, ImagePlane.of(0, 1, 0)),
            classification: { name: 'Tumor', color: [200, 0, 0] },
            measurements: { Area: 1200, 'Mean intensity': 0.25 },
        }),
        new RegionObject({
            id: 'ellipse',
            roi: Roi.ellipse(10, 20, 40, 20),
            objectType: 'detection',
            classification: { name: 'Stroma' },
        }),
        new RegionObject({
            id: 'holey',
            name: 'with a hole',
            roi: Roi.polygon(
                [
                    [0, 0],
                    [100, 0],
                    [100, 100],
                    [0, 100],
                ],
                [
                    [
                        [40, 40],
                        [60, 40],
                        [60, 60],
                    ],
                ],
                ImagePlane.of(-1, 2, 3),
            ),
            locked: true,
        }),
        new RegionObject({
            id: 'islands',
            roi: Roi.multipolygon([
                { exterior: [[0, 0], [5, 0], [5, 5]], holes: [] },
                { exterior: [[9, 9], [12, 9], [12, 12]], holes: [] },
            ]),
            objectType: 'cell',
        }),
        new RegionObject({ id: 'path', roi: Roi.polyline([[0, 0], [3, 4], [6, 0]]), measurements: { Length: 10 } }),
        new RegionObject({ id: 'ruler', roi: Roi.line([1, 1], [4, 5]) }),
        new RegionObject({ id: 'dots', roi: Roi.points([[1, 2], [3, 4]], ImagePlane.of(2, 0, 1)), objectType: 'tile' }),
    ];
}

function manyObjects(n: number): RegionObject[] {
    return Array.from(
        { length: n },
        (_, i) =>
            new RegionObject({
                id: `object-${i}`,
                roi: Roi.rectangle(i, i, 1, 1, ImagePlane.of(-1, i % 3, 0)),
                measurements: { index: i },
            }),
    );
}

describe('encoding', () => {
    it('writes one feature with its plane, classification and measurements', () => {
        const object = new RegionObject({
            id: 'obj-1',
            roi: Roi.line([0, 0], [3, 4]),
            classification: { name: 'Tumor', color: [200, 0, 0] },
            measurements: { Area: 12.5 },
        });
        expect(codec.objectToGeoJson(object)).toBe(
            '{"type":"Feature","id":"obj-1","geometry":{"type":"LineString","coordinates":[[0,0],[3,4]]},' +
                '"properties":{"objectType":"annotation","classification":{"name":"Tumor","color":[200,0,0]},' +
                '"measurements":{"Area":12.5}},"plane":{"c":-1,"z":0,"t":0}}',
        );
    });

    it('writes bare geometries with the plane inside', () => {
        expect(codec.roiToGeoJson(Roi.points([[1, 2]], ImagePlane.of(0, 2, 1)))).toBe(
            '{"type":"MultiPoint","coordinates":[[1,2]],"plane":{"c":0,"z":2,"t":1}}',
        );
    });

    it('leaves out the plane when the plane adapter is off', () => {
        const planeless = new GeoJsonCodec(createCodecConfig({ planeAdapter: false }));
        const object = new RegionObject({ id: 'p', roi: Roi.points([[1, 2]], ImagePlane.of(0, 2, 1)) });
        expect(planeless.objectToGeoJson(object)).toBe(
            '{"type":"Feature","id":"p","geometry":{"type":"MultiPoint","coordinates":[[1,2]]},' +
                '"properties":{"objectType":"annotation"}}',
        );
        expect(planeless.roiToGeoJson(object.roi)).toBe('{"type":"MultiPoint","coordinates":[[1,2]]}');
    });

    it('indents when pretty printing', () => {
        const pretty = new GeoJsonCodec(createCodecConfig({ prettyPrint: true }));
        expect(pretty.toFeatureCollection([])).toBe('{\n  "type": "FeatureCollection",\n  "features": []\n}');
    });

    it('writes an empty collection as a valid, empty FeatureCollection', () => {
        expect(codec.toFeatureCollection([])).toBe('{"type":"FeatureCollection","features":[]}');
    });

    it('writes one feature text per object', () => {
        const objects = sampleObjects();
        const texts = codec.toGeoJsonFeatureList(objects);
        expect(texts).toHaveLength(objects.length);
        expect(texts[4]).toBe(codec.objectToGeoJson(objects[4]));
    });
});

describe('round trip', () => {
    it('gives back the same objects, in order, from a FeatureCollection', () => {
        const objects = sampleObjects();
        const decoded = codec.toObjects(codec.toFeatureCollection(objects));
        expect(decoded).toEqual(objects);
        expect(decoded.map((o) => o.plane.toString())).toEqual(objects.map((o) => o.plane.toString()));
    });

    it('gives back the same shapes from bare geometries', () => {
        const rois = sampleObjects().map((o) => o.roi);
        const text = `[${rois.map((roi) => codec.roiToGeoJson(roi)).join(',')}]`;
        expect(codec.toRois(text)).toEqual(rois);
    });

    it('keeps fractional rectangles and ellipses exact', () => {
        const objects = [
            new RegionObject({ id: 'r', roi: Roi.rectangle(0.1, 0.7, 0.2, 0.1) }),
            new RegionObject({ id: 'e', roi: Roi.ellipse(10.3, 20.7, 33.3, 17.1, ImagePlane.of(0, 1, 0)) }),
        ];
        expect(codec.toObjects(codec.toFeatureCollection(objects))).toEqual(objects);
        expect(codec.toRois(`[${objects.map((o) => codec.roiToGeoJson(o.roi)).join(',')}]`)).toEqual(
            objects.map((o) => o.roi),
        );
    });

    it('keeps NaN and infinite measurements', () => {
        const object = new RegionObject({
            id: 'm',
            roi: Roi.points([[1, 1]]),
            measurements: { a: Number.NaN, b: 1, c: Number.POSITIVE_INFINITY, d: Number.NEGATIVE_INFINITY },
        });
        const text = codec.objectToGeoJson(object);
        expect(text).toContain('"measurements":{"a":"NaN","b":1,"c":"Infinity","d":"-Infinity"}');
        const decoded = codec.toObject(text);
        expect(decoded.measurements).toEqual({ a: Number.NaN, b: 1, c: Number.POSITIVE_INFINITY, d: -Infinity });
        expect(Number.isNaN(decoded.getMeasurement('a'))).toBe(true);
    });

    it('puts everything on the default plane when the plane adapter is off', () => {
        const planeless = new GeoJsonCodec(createCodecConfig({ planeAdapter: false }));
        const decoded = planeless.toObjects(codec.toFeatureCollection(sampleObjects()));
        expect(decoded.every((o) => o.plane === ImagePlane.DEFAULT)).toBe(true);
    });
});

describe('chunked collections', () => {
    it('splits into ceil(n/k) collections whose features keep the input order', () => {
        const objects = manyObjects(10);
        const texts = codec.toFeatureCollections(objects, 3);
        expect(texts).toHaveLength(4);
        expect(texts.map((t) => codec.toObjects(t).length)).toEqual([3, 3, 3, 1]);
        expect(texts.flatMap((t) => codec.toObjects(t))).toEqual(objects);
    });

    it('rejects a chunk size of zero', () => {
        expect(() => codec.toFeatureCollections(manyObjects(3), 0)).toThrow(InvalidArgumentError);
    });
});

describe('order under concurrency', () => {
    const sequential = new GeoJsonCodec(
        createCodecConfig({ decodeThreshold: 1000, chunkEncodeThreshold: 1000, featureListThreshold: 1000 }),
    );
    const concurrent = new GeoJsonCodec(
        createCodecConfig({ decodeThreshold: 1, chunkEncodeThreshold: 1, featureListThreshold: 1, lanes: 3 }),
    );
    const objects = manyObjects(25);

    it('decodes arrays identically on both paths', () => {
        const text = JSON.stringify(objects.map((o) => sequential.toFeature(o)));
        const a = sequential.toObjects(text);
        const b = concurrent.toObjects(text);
        expect(a).toEqual(objects);
        expect(b).toEqual(a);
    });

    it('encodes chunked collections identically on both paths', () => {
        expect(concurrent.toFeatureCollections(objects, 4)).toEqual(sequential.toFeatureCollections(objects, 4));
    });

    it('encodes feature lists identically on both paths', () => {
        expect(concurrent.toGeoJsonFeatureList(objects)).toEqual(sequential.toGeoJsonFeatureList(objects));
    });
});

describe('lenient decoding', () => {
    const feature = (extra: string) =>
        `{"type":"Feature","id":"f","geometry":{"type":"Point","coordinates":[1,2]}${extra}}`;

    it('decodes an explicitly null classification as no classification', () => {
        const [object] = codec.toObjects(feature(',"properties":{"classification":null,"measurements":{"a":null}}'));
        expect(object.classification).toBeUndefined();
        expect(object.measurements).toEqual({});
    });

    it('rejects explicit nulls when null tolerance is off', () => {
        const strict = new GeoJsonCodec(createCodecConfig({ nullTolerant: false }));
        expect(() => strict.toObjects(feature(',"properties":{"classification":null}'))).toThrow(DecodeError);
    });

    it('uses the default plane when there is none', () => {
        expect(codec.toObject(feature('')).plane).toBe(ImagePlane.DEFAULT);
    });

    it('fills missing plane fields from the default plane', () => {
        expect(codec.toObject(feature(',"plane":{"z":3}')).plane).toEqual(ImagePlane.of(-1, 3, 0));
    });

    it('falls back to a plane stored in the geometry', () => {
        const text = '{"type":"Feature","geometry":{"type":"Point","coordinates":[1,2],"plane":{"c":1,"z":0,"t":2}}}';
        expect(codec.toObject(text).plane).toEqual(ImagePlane.of(1, 0, 2));
    });

    it('decodes empty objects and other JSON values to nothing', () => {
        expect(codec.toObjects('{}')).toEqual([]);
        expect(codec.toObjects('42')).toEqual([]);
        expect(codec.toObjects('null')).toEqual([]);
        expect(codec.toObjects('"text"')).toEqual([]);
        expect(codec.toObjects('{"type":"FeatureCollection","features":null}')).toEqual([]);
    });

    it('flattens nested arrays in order and skips the values it cannot use', () => {
        const first = feature(',"properties":{"name":"first"}');
        const second = feature(',"properties":{"name":"second"}');
        const text = `[${first},[${second}],{},5]`;
        expect(codec.toObjects(text).map((o) => o.name)).toEqual(['first', 'second']);
    });

    it('decodes a bare geometry as an annotation with a fresh identifier', () => {
        const [object] = codec.toObjects('{"type":"LineString","coordinates":[[0,0],[2,2]]}');
        expect(object.roi).toEqual(Roi.line([0, 0], [2, 2]));
        expect(object.objectType).toBe('annotation');
        expect(object.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    });

    it('reads legacy measurement lists, packed colours and numeric ids', () => {
        const text =
            '{"type":"Feature","id":17,"geometry":{"type":"Point","coordinates":[0,0]},"properties":{' +
            '"classification":{"name":"Immune","colorRGB":16744448},' +
            '"measurements":[{"name":"A","value":1},{"name":"B","value":null}]}}';
        const object = codec.toObject(text);
        expect(object.id).toBe('17');
        expect(object.classification).toEqual({ name: 'Immune', color: [255, 128, 0] });
        expect(object.measurements).toEqual({ A: 1 });
    });

    it('reads non-finite values in legacy measurement lists', () => {
        const text =
            '{"type":"Feature","geometry":{"type":"Point","coordinates":[0,0]},"properties":{' +
            '"measurements":[{"name":"A","value":"NaN"},{"name":"B","value":"-Infinity"}]}}';
        const { measurements } = codec.toObject(text);
        expect(measurements).toEqual({ A: Number.NaN, B: Number.NEGATIVE_INFINITY });
    });

    it('rejects measurement strings that are not numbers', () => {
        expect(() => codec.toObject(feature(',"properties":{"measurements":{"a":"lots"}}'))).toThrow(DecodeError);
    });

    it('strips nulls from a parsed tree in place', () => {
        const tree = JSON.parse(feature(',"properties":{"classification":null}'));
        codec.toObjects(tree);
        expect(tree.properties).toEqual({});
    });
});

describe('decode failures', () => {
    it('rejects text that is not JSON', () => {
        expect(() => codec.toObjects('{"type": "Feature",')).toThrow(DecodeError);
    });

    it('rejects unknown geometry types', () => {
        expect(() =>
            codec.toObjects('{"type":"Feature","geometry":{"type":"Circle","coordinates":[0,0]}}'),
        ).toThrow(DecodeError);
    });

    it('rejects a feature whose geometry is null', () => {
        expect(() => codec.toObjects('{"type":"Feature","geometry":null}')).toThrow(DecodeError);
    });

    it('expects exactly one object from toObject', () => {
        const text = codec.toFeatureCollection(manyObjects(2));
        expect(() => codec.toObject(text)).toThrow(DecodeError);
        expect(() => codec.toRoi('[]')).toThrow(DecodeError);
    });
});
