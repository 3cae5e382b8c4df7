/** @module fgb/index
 *
 * Packed Hilbert R-tree search.
 *
 * The FlatGeobuf v3 index is a static R-tree stored root-first: the root
 * occupies node 0, each lower level follows, and the leaves (one per
 * feature, in file order) come last. Every node is 40 bytes: a float64
 * bbox `[minX, minY, maxX, maxY]` and a uint64 offset. For a leaf the
 * offset is the feature's byte position relative to the feature section;
 * for an internal node it is the index of its first child.
 *
 * A search walks the tree top-down, keeps leaves whose bbox intersects the
 * query, turns them into byte ranges and merges neighbouring ranges so the
 * store issues few reads. A merged range may take in features that did not
 * match, so decoded features must be filtered again by the caller.
 */

import type { BBox } from '../types.js';
import { NODE_ITEM_BYTE_SIZE } from './header.js';
import { FgbFormatError } from '../errors.js';

/** Read size for the last feature, whose length the index cannot give. */
const LAST_FEATURE_READ_SIZE = 1024 * 1024;

/** Ranges closer than this are merged into one read. */
export const DEFAULT_MERGE_GAP = 512;

/** A contiguous byte range of the file. */
export interface ByteRange {
  /** Absolute offset from the start of the file. */
  offset: number;
  length: number;
}

/** Index geometry shared by every search on one file. */
export interface IndexLayout {
  featuresCount: number;
  nodeSize: number;
  /** Absolute offset of the feature section. */
  featuresOffset: number;
}

/**
 * Find the file ranges holding features whose index bbox intersects `bbox`.
 *
 * Intersection is inclusive on every edge, matching
 * `node.minX <= bbox.maxX && node.maxX >= bbox.minX && ...`.
 *
 * @param indexBytes - The packed R-tree section of the file.
 * @returns Ranges sorted by offset and merged within `mergeGap` bytes;
 *   empty when nothing intersects.
 * @throws {FgbFormatError} If `indexBytes` is shorter than the layout
 *   requires.
 */
export function queryIndex(
  indexBytes: Uint8Array,
  layout: IndexLayout,
  bbox: BBox,
  mergeGap: number = DEFAULT_MERGE_GAP,
): ByteRange[] {
  const { featuresCount, nodeSize, featuresOffset } = layout;
  if (featuresCount === 0 || nodeSize === 0) return [];

  const levels = computeLevelBounds(featuresCount, nodeSize);
  const totalNodes = levels[0].end;
  if (indexBytes.length < totalNodes * NODE_ITEM_BYTE_SIZE) {
    throw new FgbFormatError(
      `Spatial index truncated: ${indexBytes.length} bytes for ${totalNodes} nodes`,
    );
  }

  const view = new DataView(indexBytes.buffer, indexBytes.byteOffset, indexBytes.byteLength);
  const leafEnd = levels[0].end;
  const matches: number[] = [];

  // Explicit stack of (node, level) pairs, root level last in `levels`.
  const rootLevel = levels.length - 1;
  const stack: Array<[number, number]> = [];
  for (let i = levels[rootLevel].start; i < levels[rootLevel].end; i++) {
    stack.push([i, rootLevel]);
  }

  let entry = stack.pop();
  while (entry !== undefined) {
    const [node, level] = entry;
    const pos = node * NODE_ITEM_BYTE_SIZE;

    const intersects =
      view.getFloat64(pos, true) <= bbox.maxX &&
      view.getFloat64(pos + 8, true) <= bbox.maxY &&
      view.getFloat64(pos + 16, true) >= bbox.minX &&
      view.getFloat64(pos + 24, true) >= bbox.minY;

    if (intersects) {
      if (level === 0) {
        matches.push(node);
      } else {
        const firstChild = readUint64(view, pos + 32);
        const childLevel = levels[level - 1];
        if (firstChild < childLevel.start || firstChild >= childLevel.end) {
          throw new FgbFormatError(`Index node ${node} points outside its child level`);
        }
        const childEnd = Math.min(firstChild + nodeSize, levels[level - 1].end);
        for (let i = firstChild; i < childEnd; i++) {
          stack.push([i, level - 1]);
        }
      }
    }

    entry = stack.pop();
  }

  if (matches.length === 0) return [];
  matches.sort((a, b) => a - b);

  // Features are stored in leaf order, so a feature ends where the next
  // leaf's feature begins.
  const ranges: ByteRange[] = matches.map((node) => {
    const start = readUint64(view, node * NODE_ITEM_BYTE_SIZE + 32);
    const length = node + 1 < leafEnd
      ? readUint64(view, (node + 1) * NODE_ITEM_BYTE_SIZE + 32) - start
      : LAST_FEATURE_READ_SIZE;
    return { offset: featuresOffset + start, length };
  });

  return mergeRanges(ranges, mergeGap);
}

// ─── Internals ──────────────────────────────────────────────────────────────

interface LevelBounds {
  start: number;
  end: number;
}

/**
 * Node-index range of every tree level, leaves first.
 *
 * For 3221 features and node size 16:
 * ```
 *   levels[3] (root): [0, 1)
 *   levels[2]:        [1, 14)
 *   levels[1]:        [14, 216)
 *   levels[0] leaves: [216, 3437)
 * ```
 */
export function computeLevelBounds(featuresCount: number, nodeSize: number): LevelBounds[] {
  if (nodeSize < 2) throw new FgbFormatError(`Invalid index node size ${nodeSize}`);

  const counts: number[] = [featuresCount];
  let n = featuresCount;
  while (n > 1) {
    n = Math.ceil(n / nodeSize);
    counts.push(n);
  }

  const levels: LevelBounds[] = new Array<LevelBounds>(counts.length);
  let offset = 0;
  for (let i = counts.length - 1; i >= 0; i--) {
    levels[i] = { start: offset, end: offset + counts[i] };
    offset += counts[i];
  }
  return levels;
}

function readUint64(view: DataView, offset: number): number {
  const lo = view.getUint32(offset, true);
  const hi = view.getUint32(offset + 4, true);
  return hi * 0x100000000 + lo;
}

/**
 * Merge ranges that overlap or lie within `gap` bytes of each other.
 *
 * @param ranges - Ranges sorted by offset.
 */
export function mergeRanges(ranges: readonly ByteRange[], gap: number = DEFAULT_MERGE_GAP): ByteRange[] {
  const merged: ByteRange[] = [];

  for (const range of ranges) {
    const prev = merged[merged.length - 1];
    if (prev !== undefined && range.offset <= prev.offset + prev.length + gap) {
      const end = Math.max(prev.offset + prev.length, range.offset + range.length);
      prev.length = end - prev.offset;
    } else {
      merged.push({ offset: range.offset, length: range.length });
    }
  }

  return merged;
}
