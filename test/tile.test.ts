import { describe, it, expect, vi } from 'vitest';
import Pbf from 'pbf';
import { VectorTile } from '@mapbox/vector-tile';
import { emptyTile, encodeTile } from '../src/tile.js';
import { TileBoundsCache } from '../src/tiles.js';
import { makeBuilding, readRawLayers, tileSquare } from './helpers/buildings.js';

const tile = { z: 14, x: 8424, y: 5405 };

function decodeRings(bytes: Uint8Array, index = 0): number[][][] {
  const layer = new VectorTile(new Pbf(bytes)).layers.buildings;
  return layer
    .feature(index)
    .loadGeometry()
    .map((ring) => ring.map((p) => [p.x, p.y]));
}

// ─── emptyTile ──────────────────────────────────────────────────────────────

describe('emptyTile', () => {
  it('should hold one empty buildings layer', () => {
    expect(readRawLayers(emptyTile())).toEqual([{ name: 'buildings', version: 2, extent: 4096, features: 0 }]);
  });

  it('should take the layer name and extent from options', () => {
    expect(readRawLayers(emptyTile({ layerName: 'footprints', extent: 512 }))).toEqual([
      { name: 'footprints', version: 2, extent: 512, features: 0 },
    ]);
  });
});

// ─── encodeTile ─────────────────────────────────────────────────────────────

describe('encodeTile', () => {
  it('should match the empty tile when there are no buildings', () => {
    expect(encodeTile([], tile)).toEqual(emptyTile());
  });

  it('should place a building at its tile coordinates', () => {
    const bytes = encodeTile([makeBuilding([tileSquare(tile, 0.25, 0.75)], { id: 'b-1', height: 9.5 })], tile);
    const f = new VectorTile(new Pbf(bytes)).layers.buildings.feature(0);

    expect(f.properties).toEqual({ id: 'b-1', height: 9.5 });
    expect(decodeRings(bytes)).toEqual([
      [
        [1024, 1024],
        [3072, 1024],
        [3072, 3072],
        [1024, 3072],
        [1024, 1024],
      ],
    ]);
  });

  it('should clip a building that crosses the tile edge to the buffer', () => {
    const bytes = encodeTile([makeBuilding([tileSquare(tile, -0.5, 0.5)])], tile);
    const [ring] = decodeRings(bytes);
    const xs = ring.map(([x]) => x);
    const ys = ring.map(([, y]) => y);

    expect(Math.min(...xs)).toBe(-64);
    expect(Math.min(...ys)).toBe(-64);
    expect(Math.max(...xs)).toBe(2048);
    expect(Math.max(...ys)).toBe(2048);
  });

  it('should use a smaller buffer when asked', () => {
    const bytes = encodeTile([makeBuilding([tileSquare(tile, -0.5, 0.5)])], tile, { buffer: 0 });
    const xs = decodeRings(bytes)[0].map(([x]) => x);
    expect(Math.min(...xs)).toBe(0);
  });

  it('should give the same bytes with or without a bounds cache', () => {
    const buildings = [
      makeBuilding([tileSquare(tile, 0.1, 0.4)], { id: 'a', class: 'house' }),
      makeBuilding([tileSquare(tile, 0.6, 1.2)], { id: 'b', name: 'Depot' }),
    ];
    const plain = encodeTile(buildings, tile);

    expect(encodeTile(buildings, tile)).toEqual(plain);
    expect(encodeTile(buildings, tile, { boundsCache: new TileBoundsCache() })).toEqual(plain);
  });

  it('should pass dropped buildings to the callback', () => {
    const onDropped = vi.fn();
    const building = makeBuilding([tileSquare(tile, 0.25, 0.75)]);
    building.geometry = {
      get xy(): Float64Array {
        throw new Error('corrupt geometry');
      },
      ends: Uint32Array.of(5),
      parts: Uint32Array.of(0),
    };

    const bytes = encodeTile([building], tile, { onDropped });
    expect(readRawLayers(bytes)[0].features).toBe(0);
    expect(onDropped).toHaveBeenCalledWith(building, new Error('corrupt geometry'));
  });
});
