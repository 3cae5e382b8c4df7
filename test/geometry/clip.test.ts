import { describe, it, expect } from 'vitest';
import { clipPolygons, clipRing } from '../../src/geometry/clip.js';
import type { BBox } from '../../src/types.js';

const unitSquare = () => new Float64Array([0, 0, 1, 0, 1, 1, 0, 1, 0, 0]);
const rightHalf: BBox = { minX: 0.5, minY: -1, maxX: 2, maxY: 2 };

describe('clipRing', () => {
  it('should cut a ring along one slab border', () => {
    expect(clipRing(unitSquare(), rightHalf)).toEqual(
      new Float64Array([0.5, 0, 1, 0, 1, 1, 0.5, 1, 0.5, 0]),
    );
  });

  it('should cut a corner on both axes', () => {
    const ring = clipRing(unitSquare(), { minX: 0.5, minY: 0.5, maxX: 2, maxY: 2 });
    expect(ring).toEqual(new Float64Array([1, 0.5, 1, 1, 0.5, 1, 0.5, 0.5, 1, 0.5]));
  });

  it('should close an open ring', () => {
    const ring = clipRing(new Float64Array([0, 0, 1, 0, 1, 1, 0, 1]), { minX: -1, minY: -1, maxX: 2, maxY: 2 });
    expect(ring).toEqual(unitSquare());
  });

  it('should return null when nothing is left', () => {
    expect(clipRing(unitSquare(), { minX: 2, minY: 2, maxX: 3, maxY: 3 })).toBeNull();
    expect(clipRing(new Float64Array([0, 0, 1, 1]), rightHalf)).toBeNull();
  });

  it('should keep the diagonal cut of a triangle', () => {
    // Right triangle (0,0) (2,0) (0,2); x <= 1 keeps a quadrilateral.
    const ring = clipRing(new Float64Array([0, 0, 2, 0, 0, 2, 0, 0]), { minX: -1, minY: -1, maxX: 1, maxY: 3 });
    expect(ring).toEqual(new Float64Array([0, 0, 1, 0, 1, 1, 0, 2, 0, 0]));
  });
});

describe('clipPolygons', () => {
  it('should return polygons fully inside untouched', () => {
    const rings = [unitSquare()];
    const [clipped] = clipPolygons([rings], { minX: -1, minY: -1, maxX: 2, maxY: 2 });
    expect(clipped).toBe(rings);
  });

  it('should drop polygons fully outside', () => {
    expect(clipPolygons([[unitSquare()]], { minX: 1.5, minY: 0, maxX: 2, maxY: 1 })).toEqual([]);
  });

  it('should drop a hole that is clipped away but keep its exterior', () => {
    const hole = new Float64Array([0.1, 0.1, 0.1, 0.2, 0.2, 0.2, 0.2, 0.1, 0.1, 0.1]);
    const result = clipPolygons([[unitSquare(), hole]], rightHalf);

    expect(result).toHaveLength(1);
    expect(result[0]).toHaveLength(1);
  });

  it('should keep a hole that survives the clip', () => {
    const hole = new Float64Array([0.6, 0.1, 0.6, 0.2, 0.7, 0.2, 0.7, 0.1, 0.6, 0.1]);
    const result = clipPolygons([[unitSquare(), hole]], rightHalf);
    expect(result[0]).toHaveLength(2);
    expect(result[0][1]).toEqual(hole);
  });

  it('should clip each polygon of a multipolygon on its own', () => {
    const far = new Float64Array([5, 5, 6, 5, 6, 6, 5, 6, 5, 5]);
    const result = clipPolygons([[unitSquare()], [far]], rightHalf);
    expect(result).toHaveLength(1);
    expect(result[0][0][0]).toBe(0.5);
  });

  it('should skip polygons without rings', () => {
    expect(clipPolygons([[]], rightHalf)).toEqual([]);
  });
});
