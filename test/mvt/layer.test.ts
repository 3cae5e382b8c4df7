import { describe, it, expect, vi } from 'vitest';
import { buildBuildingsLayer, toNumberValue } from '../../src/mvt/layer.js';
import { tileClipBounds } from '../../src/tiles.js';
import type { Building, PolygonGeometry } from '../../src/types.js';
import { makeBuilding, tileSquare } from '../helpers/buildings.js';

const tile = { z: 14, x: 8424, y: 5405 };
const clip = tileClipBounds(tile.z, tile.x, tile.y, 64, 4096);
const settings = { name: 'buildings', extent: 4096 };

const inside = (attributes: Partial<Building> = {}) => makeBuilding([tileSquare(tile, 0.25, 0.75)], attributes);

function brokenBuilding(): Building {
  const geometry: PolygonGeometry = {
    get xy(): Float64Array {
      throw new Error('corrupt geometry');
    },
    ends: Uint32Array.of(5),
    parts: Uint32Array.of(0),
  };
  return { ...inside({ id: 'broken' }), geometry };
}

// ─── Geometry ───────────────────────────────────────────────────────────────

describe('buildBuildingsLayer geometry', () => {
  it('should encode a building inside the tile', () => {
    const layer = buildBuildingsLayer([inside()], tile, clip, settings);

    expect(layer.name).toBe('buildings');
    expect(layer.extent).toBe(4096);
    expect(layer.features).toHaveLength(1);
    expect(layer.features[0].type).toBe(3);
    expect(layer.features[0].geometry).toEqual([9, 2048, 2048, 26, 4096, 0, 0, 4096, 4095, 0, 15]);
  });

  it('should fix the winding of a ring drawn the other way', () => {
    const ring = tileSquare(tile, 0.25, 0.75).reverse();
    const layer = buildBuildingsLayer([makeBuilding([ring])], tile, clip, settings);
    // (1024,1024) (1024,3072) (3072,3072) (3072,1024) reversed to run clockwise.
    expect(layer.features[0].geometry).toEqual([9, 2048, 2048, 26, 4096, 0, 0, 4096, 4095, 0, 15]);
  });

  it('should leave out buildings clipped away entirely', () => {
    const east = { ...tile, x: tile.x + 2 };
    const layer = buildBuildingsLayer([makeBuilding([tileSquare(east, 0.25, 0.75)])], tile, clip, settings);

    expect(layer.features).toEqual([]);
    expect(layer.keys).toEqual([]);
    expect(layer.values).toEqual([]);
  });

  it('should report and skip a building whose geometry cannot be read', () => {
    const onDropped = vi.fn();
    const broken = brokenBuilding();
    const layer = buildBuildingsLayer([broken, inside({ id: 'ok' })], tile, clip, { ...settings, onDropped });

    expect(layer.features).toHaveLength(1);
    expect(layer.values).toEqual([{ type: 'string', value: 'ok' }]);
    expect(onDropped).toHaveBeenCalledTimes(1);
    expect(onDropped.mock.calls[0][0]).toBe(broken);
    expect(onDropped.mock.calls[0][1]).toBeInstanceOf(Error);
  });

  it('should produce equal layers for equal input', () => {
    const buildings = [inside({ id: 'a', height: 4 }), inside({ id: 'b', class: 'shed' })];
    expect(buildBuildingsLayer(buildings, tile, clip, settings)).toEqual(
      buildBuildingsLayer(buildings, tile, clip, settings),
    );
  });
});

// ─── Tags ───────────────────────────────────────────────────────────────────

describe('buildBuildingsLayer tags', () => {
  it('should write attributes in order and share keys and values', () => {
    const layer = buildBuildingsLayer(
      [
        inside({ id: 'b-1', height: 12, class: 'house' }),
        inside({ id: 'b-2', name: 'Mill', height: 12, class: 'house' }),
      ],
      tile,
      clip,
      settings,
    );

    expect(layer.keys).toEqual(['id', 'height', 'class', 'name']);
    expect(layer.values).toEqual([
      { type: 'string', value: 'b-1' },
      { type: 'uint', value: 12 },
      { type: 'string', value: 'house' },
      { type: 'string', value: 'b-2' },
      { type: 'string', value: 'Mill' },
    ]);
    expect(layer.features[0].tags).toEqual([0, 0, 1, 1, 2, 2]);
    expect(layer.features[1].tags).toEqual([0, 3, 3, 4, 1, 1, 2, 2]);
  });

  it('should keep a string and a number with the same text apart', () => {
    const layer = buildBuildingsLayer([inside({ id: '12', height: 12 })], tile, clip, settings);

    expect(layer.values).toEqual([
      { type: 'string', value: '12' },
      { type: 'uint', value: 12 },
    ]);
    expect(layer.features[0].tags).toEqual([0, 0, 1, 1]);
  });

  it('should not write subtype or floor count', () => {
    const layer = buildBuildingsLayer([inside({ subtype: 'residential', numFloors: 3 })], tile, clip, settings);

    expect(layer.features[0].tags).toEqual([]);
    expect(layer.keys).toEqual([]);
  });
});

describe('toNumberValue', () => {
  it('should pick the value type from the number', () => {
    expect(toNumberValue(0)).toEqual({ type: 'uint', value: 0 });
    expect(toNumberValue(12)).toEqual({ type: 'uint', value: 12 });
    expect(toNumberValue(-3)).toEqual({ type: 'int', value: -3 });
    expect(toNumberValue(12.5)).toEqual({ type: 'double', value: 12.5 });
    expect(toNumberValue(-0.5)).toEqual({ type: 'double', value: -0.5 });
  });
});
