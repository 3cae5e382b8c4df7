import { describe, it, expect } from 'vitest';
import { computeLevelBounds, mergeRanges, queryIndex, type IndexLayout } from '../../src/fgb/index.js';
import { parseHeader } from '../../src/fgb/header.js';
import { decodeBuildings } from '../../src/fgb/feature.js';
import { FgbFormatError } from '../../src/errors.js';
import { buildFgb, polygon, square } from '../helpers/fgb-builder.js';

// 40 half-degree squares along the equator, one per degree of longitude.
const bytes = buildFgb(
  Array.from({ length: 40 }, (_, i) => ({
    geometry: polygon(square(i, 0, 0.5)),
    properties: { id: `f-${i}` },
  })),
  { indexNodeSize: 4 },
);
const header = parseHeader(bytes);
const indexBytes = bytes.subarray(header.indexOffset, header.indexOffset + header.indexSize);
const layout: IndexLayout = {
  featuresCount: header.featuresCount,
  nodeSize: header.indexNodeSize,
  featuresOffset: header.featuresOffset,
};

/** Start of each feature's size prefix, relative to the feature section. */
function featureOffsets(): number[] {
  const view = new DataView(bytes.buffer);
  const offsets: number[] = [];
  let pos = header.featuresOffset;
  while (pos < bytes.length) {
    offsets.push(pos - header.featuresOffset);
    pos += 4 + view.getUint32(pos, true);
  }
  return offsets;
}

function idsIn(ranges: Array<{ offset: number; length: number }>): Array<string | null> {
  return ranges.flatMap((r) =>
    decodeBuildings(bytes.subarray(r.offset, r.offset + r.length), header).map((b) => b.id),
  );
}

describe('queryIndex', () => {
  it('should return one merged range for neighbouring matches', () => {
    const ranges = queryIndex(indexBytes, layout, { minX: 10.2, minY: 0, maxX: 12.1, maxY: 0.1 });
    const offsets = featureOffsets();

    expect(ranges).toEqual([
      { offset: header.featuresOffset + offsets[10], length: offsets[13] - offsets[10] },
    ]);
    expect(idsIn(ranges)).toEqual(['f-10', 'f-11', 'f-12']);
  });

  it('should treat touching edges as intersecting', () => {
    const ranges = queryIndex(indexBytes, layout, { minX: 10.5, minY: 0.5, maxX: 10.7, maxY: 1 });
    expect(idsIn(ranges)).toEqual(['f-10']);
  });

  it('should return nothing when no leaf intersects', () => {
    expect(queryIndex(indexBytes, layout, { minX: 10.6, minY: 0, maxX: 10.9, maxY: 1 })).toEqual([]);
    expect(queryIndex(indexBytes, layout, { minX: 0, minY: 10, maxX: 40, maxY: 11 })).toEqual([]);
  });

  it('should read a fixed window for the last feature', () => {
    const ranges = queryIndex(indexBytes, layout, { minX: 39.1, minY: 0.1, maxX: 39.2, maxY: 0.2 });
    expect(ranges).toEqual([
      { offset: header.featuresOffset + featureOffsets()[39], length: 1024 * 1024 },
    ]);
  });

  it('should return every feature for a world query', () => {
    const ranges = queryIndex(indexBytes, layout, { minX: -180, minY: -90, maxX: 180, maxY: 90 });
    expect(ranges).toHaveLength(1);
    expect(idsIn(ranges)).toHaveLength(40);
  });

  it('should return nothing for an empty layout', () => {
    const world = { minX: -180, minY: -90, maxX: 180, maxY: 90 };
    expect(queryIndex(new Uint8Array(0), { ...layout, featuresCount: 0 }, world)).toEqual([]);
  });

  it('should throw on a truncated index', () => {
    expect(() => queryIndex(indexBytes.subarray(0, 400), layout, { minX: 0, minY: 0, maxX: 1, maxY: 1 }))
      .toThrow(FgbFormatError);
  });

  it('should throw when a node points outside its child level', () => {
    const corrupt = indexBytes.slice();
    new DataView(corrupt.buffer).setUint32(32, 999, true);
    expect(() => queryIndex(corrupt, layout, { minX: 0, minY: 0, maxX: 1, maxY: 1 }))
      .toThrow('points outside its child level');
  });
});

describe('computeLevelBounds', () => {
  it('should list levels leaves first with the root at node 0', () => {
    expect(computeLevelBounds(3221, 16)).toEqual([
      { start: 216, end: 3437 },
      { start: 14, end: 216 },
      { start: 1, end: 14 },
      { start: 0, end: 1 },
    ]);
  });

  it('should handle a single feature', () => {
    expect(computeLevelBounds(1, 16)).toEqual([{ start: 0, end: 1 }]);
  });
});

describe('mergeRanges', () => {
  it('should merge ranges within the gap', () => {
    const ranges = [
      { offset: 0, length: 10 },
      { offset: 15, length: 5 },
      { offset: 100, length: 10 },
    ];
    expect(mergeRanges(ranges, 5)).toEqual([
      { offset: 0, length: 20 },
      { offset: 100, length: 10 },
    ]);
    expect(mergeRanges(ranges, 4)).toHaveLength(3);
  });

  it('should absorb contained ranges', () => {
    expect(mergeRanges([{ offset: 0, length: 100 }, { offset: 10, length: 5 }], 0)).toEqual([
      { offset: 0, length: 100 },
    ]);
  });

  it('should not mutate its input', () => {
    const ranges = [{ offset: 0, length: 10 }, { offset: 10, length: 10 }];
    mergeRanges(ranges, 0);
    expect(ranges[0]).toEqual({ offset: 0, length: 10 });
  });
});
