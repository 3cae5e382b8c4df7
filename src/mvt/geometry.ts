/**
 * @module mvt/geometry
 *
 * MVT 2.1 polygon command encoding.
 *
 * | Command   | ID | Parameters           |
 * |-----------|----|----------------------|
 * | MoveTo    |  1 | `count` x (dX, dY)   |
 * | LineTo    |  2 | `count` x (dX, dY)   |
 * | ClosePath |  7 | *(none)*             |
 *
 * A command integer is `(id & 0x7) | (count << 3)`. Parameters are zigzag
 * encoded deltas from a cursor that starts at (0, 0) and carries over from
 * ring to ring and polygon to polygon within a feature.
 *
 * @see {@link https://github.com/mapbox/vector-tile-spec/blob/master/2.1/vector_tile.proto | MVT 2.1 Spec}
 */

import type { TileRings } from '../geometry/transform.js';

const CMD_MOVE_TO = 1;
const CMD_LINE_TO = 2;
const CMD_CLOSE_PATH = 7;

/**
 * @example
 * ```ts
 * zigzag(0);  // 0
 * zigzag(-1); // 1
 * zigzag(1);  // 2
 * ```
 */
export function zigzag(n: number): number {
  return (n << 1) ^ (n >> 31);
}

export function commandInt(id: number, count: number): number {
  return (id & 0x7) | (count << 3);
}

/**
 * Encode quantized polygons as one MVT geometry.
 *
 * Every ring must be closed (last vertex equal to the first). The closing
 * vertex is not written; `ClosePath` stands in for it.
 *
 * @example
 * ```ts
 * // The 10×10 square (0,0) (10,0) (10,10) (0,10) (0,0)
 * encodePolygonGeometry([[Int32Array.of(0, 0, 10, 0, 10, 10, 0, 10, 0, 0)]]);
 * // => [9, 0, 0, 26, 20, 0, 0, 20, 19, 0, 15]
 * ```
 */
export function encodePolygonGeometry(polygons: readonly TileRings[]): number[] {
  const cmds: number[] = [];
  let cx = 0, cy = 0;

  for (const rings of polygons) {
    for (const ring of rings) {
      const pairs = ring.length / 2;
      // Three distinct vertices plus the closing one.
      if (pairs < 4) continue;

      cmds.push(commandInt(CMD_MOVE_TO, 1));
      cmds.push(zigzag(ring[0] - cx), zigzag(ring[1] - cy));
      cx = ring[0];
      cy = ring[1];

      cmds.push(commandInt(CMD_LINE_TO, pairs - 2));
      for (let i = 2; i < ring.length - 2; i += 2) {
        cmds.push(zigzag(ring[i] - cx), zigzag(ring[i + 1] - cy));
        cx = ring[i];
        cy = ring[i + 1];
      }

      cmds.push(commandInt(CMD_CLOSE_PATH, 1));
    }
  }

  return cmds;
}
