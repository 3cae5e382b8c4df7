import { describe, it, expect } from 'vitest';
import {
  cleanRing,
  ensureWinding,
  quantizePolygons,
  signedArea,
  transformToTile,
} from '../../src/geometry/transform.js';

describe('transformToTile', () => {
  it('should scale mercator coordinates into the tile extent', () => {
    const out = transformToTile(new Float64Array([0.25, 0.25, 0.5, 0.5]), { z: 1, x: 0, y: 0 }, 4096);
    expect([...out]).toEqual([2048, 2048, 4096, 4096]);
  });

  it('should offset by the tile column and row', () => {
    const out = transformToTile(new Float64Array([0.75, 0.75]), { z: 1, x: 1, y: 1 }, 4096);
    expect([...out]).toEqual([2048, 2048]);
  });

  it('should round to the nearest integer', () => {
    const out = transformToTile(new Float64Array([0.1 / 4096, 0.6 / 4096]), { z: 0, x: 0, y: 0 }, 4096);
    expect([...out]).toEqual([0, 1]);
  });
});

describe('signedArea', () => {
  it('should be positive for a clockwise ring in Y-down space', () => {
    expect(signedArea([0, 0, 10, 0, 10, 10, 0, 10, 0, 0])).toBe(200);
  });

  it('should flip sign for the reversed ring', () => {
    expect(signedArea([0, 0, 0, 10, 10, 10, 10, 0, 0, 0])).toBe(-200);
  });
});

describe('cleanRing', () => {
  it('should drop consecutive duplicates and close the ring', () => {
    const ring = cleanRing(Int32Array.from([0, 0, 0, 0, 10, 0, 10, 10, 10, 10, 0, 10]));
    expect(ring).toEqual(Int32Array.from([0, 0, 10, 0, 10, 10, 0, 10, 0, 0]));
  });

  it('should reject rings with fewer than three distinct vertices', () => {
    expect(cleanRing(Int32Array.from([0, 0, 5, 5, 5, 5, 0, 0]))).toBeNull();
  });

  it('should reject rings with zero area', () => {
    expect(cleanRing(Int32Array.from([0, 0, 10, 0, 20, 0, 0, 0]))).toBeNull();
  });
});

describe('ensureWinding', () => {
  it('should reverse an exterior that runs counter-clockwise', () => {
    const ring = Int32Array.from([0, 0, 0, 10, 10, 10, 10, 0, 0, 0]);
    ensureWinding(ring, true);
    expect([...ring]).toEqual([0, 0, 10, 0, 10, 10, 0, 10, 0, 0]);
  });

  it('should leave a correctly wound hole alone', () => {
    const ring = Int32Array.from([0, 0, 0, 10, 10, 10, 10, 0, 0, 0]);
    ensureWinding(ring, false);
    expect([...ring]).toEqual([0, 0, 0, 10, 10, 10, 10, 0, 0, 0]);
  });
});

describe('quantizePolygons', () => {
  const tile = { z: 0, x: 0, y: 0 };
  const exterior = new Float64Array([0.25, 0.25, 0.75, 0.25, 0.75, 0.75, 0.25, 0.75, 0.25, 0.25]);
  const sameWayHole = new Float64Array([0.4, 0.4, 0.6, 0.4, 0.6, 0.6, 0.4, 0.6, 0.4, 0.4]);

  it('should wind exteriors positive and holes negative', () => {
    const [rings] = quantizePolygons([[exterior, sameWayHole]], tile, 4096);

    expect([...rings[0]]).toEqual([1024, 1024, 3072, 1024, 3072, 3072, 1024, 3072, 1024, 1024]);
    expect(signedArea(rings[0])).toBeGreaterThan(0);
    expect(signedArea(rings[1])).toBeLessThan(0);
  });

  it('should drop a hole that collapses to a point', () => {
    const speck = new Float64Array([0.5, 0.5, 0.5000001, 0.5, 0.5000001, 0.5000001, 0.5, 0.5]);
    const [rings] = quantizePolygons([[exterior, speck]], tile, 4096);
    expect(rings).toHaveLength(1);
  });

  it('should drop the polygon when its exterior collapses', () => {
    const sliver = new Float64Array([0.5, 0.5, 0.6, 0.5, 0.6, 0.5000001, 0.5, 0.5]);
    expect(quantizePolygons([[sliver, sameWayHole]], tile, 4096)).toEqual([]);
  });
});
