import { describe, it, expect } from 'vitest';
import { decodeBuildings } from '../../src/fgb/feature.js';
import { parseHeader } from '../../src/fgb/header.js';
import { buildFgb, polygon, square, type BuildFgbOptions, type TestFeature } from '../helpers/fgb-builder.js';

/** Build a file and return its header and feature section. */
function featureSection(features: TestFeature[], options?: BuildFgbOptions) {
  const bytes = buildFgb(features, options);
  const header = parseHeader(bytes);
  return { header, bytes: bytes.subarray(header.featuresOffset) };
}

const outer = square(4.0, 52.0, 0.01);
const hole: Array<[number, number]> = [[4.002, 52.002], [4.002, 52.004], [4.004, 52.004], [4.004, 52.002], [4.002, 52.002]];

describe('decodeBuildings', () => {
  it('should decode a polygon with a hole and all attributes', () => {
    const { header, bytes } = featureSection([
      {
        geometry: polygon(outer, hole),
        properties: { id: 'b-1', name: 'Town hall', height: 12.5, class: 'civic', num_floors: 3 },
      },
    ]);

    const [building] = decodeBuildings(bytes, header);
    expect(building.id).toBe('b-1');
    expect(building.name).toBe('Town hall');
    expect(building.height).toBe(12.5);
    expect(building.class).toBe('civic');
    expect(building.subtype).toBeNull();
    expect(building.numFloors).toBe(3);
    expect([...building.geometry.ends]).toEqual([5, 10]);
    expect([...building.geometry.parts]).toEqual([0]);
    expect(building.geometry.xy.slice(10, 12)).toEqual(new Float64Array([4.002, 52.002]));
  });

  it('should compute the bbox from the coordinates', () => {
    const { header, bytes } = featureSection([{ geometry: polygon(outer) }]);
    const [building] = decodeBuildings(bytes, header);
    expect(building.bbox).toEqual({ minX: 4.0, minY: 52.0, maxX: 4.0 + 0.01, maxY: 52.0 + 0.01 });
  });

  it('should default ends to a single ring', () => {
    const { header, bytes } = featureSection([{ geometry: polygon(outer) }]);
    const [building] = decodeBuildings(bytes, header);
    expect([...building.geometry.ends]).toEqual([5]);
  });

  it('should flatten multipolygon parts and record where each polygon starts', () => {
    const { header, bytes } = featureSection([
      {
        geometry: {
          type: 'MultiPolygon',
          polygons: [[square(0, 0, 1), square(0.2, 0.2, 0.1)], [square(5, 5, 1)]],
        },
      },
    ]);

    const [building] = decodeBuildings(bytes, header);
    expect([...building.geometry.ends]).toEqual([5, 10, 15]);
    expect([...building.geometry.parts]).toEqual([0, 2]);
    expect(building.geometry.xy).toHaveLength(30);
    expect(building.bbox).toEqual({ minX: 0, minY: 0, maxX: 6, maxY: 6 });
  });

  it('should use the header geometry type when features carry none', () => {
    const { header, bytes } = featureSection([{ geometry: polygon(outer) }], { geometryType: 3 });
    expect(decodeBuildings(bytes, header)).toHaveLength(1);
  });

  it('should skip non-polygon features', () => {
    const { header, bytes } = featureSection([
      { geometry: { type: 'Point', coordinates: [4.5, 52.5] }, properties: { id: 'p' } },
      { geometry: polygon(outer), properties: { id: 'b' } },
    ]);
    expect(decodeBuildings(bytes, header).map((b) => b.id)).toEqual(['b']);
  });

  it('should render integer ids as strings', () => {
    const { header, bytes } = featureSection(
      [{ geometry: polygon(outer), properties: { id: 42 } }],
      { columns: [{ name: 'id', type: 5 }] },
    );
    expect(decodeBuildings(bytes, header)[0].id).toBe('42');
  });

  it('should stop at a feature that runs past the end', () => {
    const { header, bytes } = featureSection([
      { geometry: polygon(outer), properties: { id: 'a' } },
      { geometry: polygon(outer), properties: { id: 'b' } },
    ]);
    const truncated = bytes.subarray(0, bytes.length - 10);
    expect(decodeBuildings(truncated, header).map((b) => b.id)).toEqual(['a']);
  });

  it('should stop at a zero size prefix', () => {
    const { header, bytes } = featureSection([{ geometry: polygon(outer), properties: { id: 'a' } }]);
    const padded = new Uint8Array(bytes.length + 8);
    padded.set(bytes);
    expect(decodeBuildings(padded, header)).toHaveLength(1);
  });
});
