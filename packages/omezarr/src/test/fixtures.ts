import * as zarr from 'zarrita';

export type FixtureLayout = 'v0.4' | 'v0.5';

const axes = [
    { name: 'c', type: 'channel' },
    { name: 'z', type: 'space', unit: 'micrometer' },
    { name: 'y', type: 'space', unit: 'micrometer' },
    { name: 'x', type: 'space', unit: 'micrometer' },
];

const multiscale = {
    name: 'fixture',
    axes,
    datasets: [
        { path: '0', coordinateTransformations: [{ type: 'scale', scale: [1, 1, 0.5, 0.5] }] },
        { path: '1', coordinateTransformations: [{ type: 'scale', scale: [1, 1, 1, 1] }] },
    ],
};

const omero = { channels: [{ label: 'DAPI' }, { label: 'FITC' }, { label: 'TRITC' }] };

/** level-0 samples of every plane except (c=0, z=0), which holds the gradient x + 10y */
export const levelZeroValue = (c: number, z: number) => 10 * (c + 1) + z;

export const levelOneValue = (c: number, z: number) => 100 + levelZeroValue(c, z);

/**
 * An in-memory OME-Zarr image: 3 channels, 2 z-slices, 20x20 pixels at level 0 and 10x10 at level 1,
 * with a 0.5 micrometre pixel size.
 */
export async function createFixtureStore(layout: FixtureLayout = 'v0.4'): Promise<Map<string, Uint8Array>> {
    const store = new Map<string, Uint8Array>();
    const root = zarr.root(store);
    const attributes =
        layout === 'v0.4'
            ? { multiscales: [multiscale], omero }
            : { ome: { version: '0.5', multiscales: [multiscale], omero } };
    await zarr.create(root, { attributes });
    const levels = [
        { path: '0', size: 20, value: levelZeroValue },
        { path: '1', size: 10, value: levelOneValue },
    ];
    for (const { path, size, value } of levels) {
        const array = await zarr.create(root.resolve(path), {
            shape: [3, 2, size, size],
            chunk_shape: [1, 1, 8, 8],
            data_type: 'uint8',
        });
        for (let c = 0; c < 3; c++) {
            for (let z = 0; z < 2; z++) {
                await zarr.set(array, [c, z, null, null], value(c, z));
            }
        }
        if (path === '0') {
            const gradient = Uint8Array.from({ length: size * size }, (_, i) => (i % size) + 10 * Math.floor(i / size));
            await zarr.set(array, [0, 0, null, null], { data: gradient, shape: [size, size], stride: [size, 1] });
        }
    }
    return store;
}
