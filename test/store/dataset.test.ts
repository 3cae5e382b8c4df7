import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { openDataset } from '../../src/store/dataset.js';
import { DatasetError } from '../../src/errors.js';
import { buildFgb, polygon, square, tempDir, type TempDir } from '../helpers/fgb-builder.js';

const features = [
  { geometry: polygon(square(4.9, 52.3, 0.001)), properties: { id: 'a' } },
  { geometry: polygon(square(4.91, 52.31, 0.001)), properties: { id: 'b' } },
];

describe('openDataset', () => {
  let tmp: TempDir;

  beforeAll(async () => {
    tmp = await tempDir();
  });

  afterAll(async () => {
    await tmp.cleanup();
  });

  it('should read the header and the whole index', async () => {
    const path = await tmp.write('ok.fgb', buildFgb(features, { geometryType: 3 }));
    const dataset = await openDataset(path);

    expect(dataset.path).toBe(path);
    expect(dataset.header.featuresCount).toBe(2);
    expect(dataset.indexBytes).toHaveLength(dataset.header.indexSize);
    expect(dataset.indexBytes).toHaveLength(3 * 40);
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset.header)).toBe(true);
  });

  it('should accept multipolygon and mixed datasets', async () => {
    const multi = await tmp.write('multi.fgb', buildFgb(features, { geometryType: 6 }));
    const mixed = await tmp.write('mixed.fgb', buildFgb(features, { geometryType: 0 }));
    await expect(openDataset(multi)).resolves.toBeDefined();
    await expect(openDataset(mixed)).resolves.toBeDefined();
  });

  it('should fail on a missing file', async () => {
    const path = `${tmp.dir}/missing.fgb`;
    const err = await openDataset(path).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DatasetError);
    expect(err).toMatchObject({ path, message: `Cannot read dataset: ${path}` });
  });

  it('should fail on a file that is not FlatGeobuf', async () => {
    const path = await tmp.write('not.fgb', new Uint8Array(64).fill(7));
    await expect(openDataset(path)).rejects.toThrow(
      `Not a FlatGeobuf dataset (Invalid FlatGeobuf magic bytes): ${path}`,
    );
  });

  it('should fail without a spatial index', async () => {
    const path = await tmp.write('noindex.fgb', buildFgb(features, { indexNodeSize: 0 }));
    await expect(openDataset(path)).rejects.toThrow(`Dataset has no spatial index: ${path}`);
  });

  it('should fail on non-polygon geometry', async () => {
    const path = await tmp.write('points.fgb', buildFgb(features, { geometryType: 1 }));
    await expect(openDataset(path)).rejects.toThrow(`Dataset geometry type 1 is not polygonal: ${path}`);
  });

  it('should fail when the file ends inside the index', async () => {
    const bytes = buildFgb(features);
    const headerEnd = 12 + new DataView(bytes.buffer).getUint32(8, true);
    const path = await tmp.write('cut.fgb', bytes.subarray(0, headerEnd + 40));
    await expect(openDataset(path)).rejects.toThrow(`Spatial index is truncated: ${path}`);
  });
});
