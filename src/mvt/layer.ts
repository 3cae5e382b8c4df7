/**
 * @module mvt/layer
 *
 * Builds the `buildings` layer of a tile from decoded buildings.
 *
 * Per building:
 *
 * 1. **Project** WGS84 to mercator [0, 1] ({@link projectGeometry}).
 * 2. **Clip** to the buffered tile rectangle ({@link clipPolygons}).
 * 3. **Quantize** to `[0, extent]`, dedupe vertices, drop degenerate rings
 *    and fix winding ({@link quantizePolygons}).
 * 4. **Encode** polygon commands ({@link encodePolygonGeometry}).
 * 5. **Tag** `id`, `name`, `height` and `class`, skipping nulls.
 *
 * Keys and values are deduplicated across the layer. Output depends only
 * on the input order and values, so equal input gives equal bytes.
 */

import type { BBox, Building, MvtFeature, MvtLayer, MvtValue, TileAddress } from '../types.js';
import { MvtGeomType } from '../types.js';
import { projectGeometry } from '../geometry/project.js';
import { splitPolygons } from '../geometry/rings.js';
import { clipPolygons } from '../geometry/clip.js';
import { quantizePolygons } from '../geometry/transform.js';
import { encodePolygonGeometry } from './geometry.js';

export interface LayerSettings {
  name: string;
  extent: number;
  /**
   * Called for a building whose geometry could not be encoded. The
   * building is left out of the layer either way.
   */
  onDropped?: (building: Building, err: unknown) => void;
}

/** Attributes written to each feature, in this order. */
const ATTRIBUTES = ['id', 'name', 'height', 'class'] as const;

type Attribute = (typeof ATTRIBUTES)[number];

/**
 * @param clipBounds - Buffered tile rectangle in mercator space, from
 *   {@link tileClipBounds}.
 */
export function buildBuildingsLayer(
  buildings: readonly Building[],
  tile: TileAddress,
  clipBounds: BBox,
  settings: LayerSettings,
): MvtLayer {
  const tags = new TagBuilder();
  const features: MvtFeature[] = [];

  for (const building of buildings) {
    let geometry: number[];
    try {
      geometry = encodeBuilding(building, tile, clipBounds, settings.extent);
    } catch (err) {
      settings.onDropped?.(building, err);
      continue;
    }
    if (geometry.length === 0) continue;

    features.push({
      type: MvtGeomType.POLYGON,
      geometry,
      tags: tags.build(building),
    });
  }

  return {
    name: settings.name,
    extent: settings.extent,
    features,
    keys: tags.keys,
    values: tags.values,
  };
}

/** Command integers for one building; empty when nothing is left after clipping. */
function encodeBuilding(building: Building, tile: TileAddress, clipBounds: BBox, extent: number): number[] {
  const projected = projectGeometry(building.geometry);
  const clipped = clipPolygons(splitPolygons(projected), clipBounds);
  if (clipped.length === 0) return [];

  const quantized = quantizePolygons(clipped, tile, extent);
  if (quantized.length === 0) return [];

  return encodePolygonGeometry(quantized);
}

// ─── Tags ───────────────────────────────────────────────────────────────────

class TagBuilder {
  readonly keys: string[] = [];
  readonly values: MvtValue[] = [];
  private readonly keyIndex = new Map<string, number>();
  private readonly valueIndex = new Map<string, number>();

  /** Interleaved `[keyIdx, valIdx, ...]` for the non-null attributes. */
  build(building: Building): number[] {
    const tags: number[] = [];
    for (const key of ATTRIBUTES) {
      const value = attributeValue(building, key);
      if (value === null) continue;
      tags.push(this.keyFor(key), this.valueFor(value));
    }
    return tags;
  }

  private keyFor(key: string): number {
    let idx = this.keyIndex.get(key);
    if (idx === undefined) {
      idx = this.keys.length;
      this.keys.push(key);
      this.keyIndex.set(key, idx);
    }
    return idx;
  }

  private valueFor(value: MvtValue): number {
    const id = `${value.type}:${value.value}`;
    let idx = this.valueIndex.get(id);
    if (idx === undefined) {
      idx = this.values.length;
      this.values.push(value);
      this.valueIndex.set(id, idx);
    }
    return idx;
  }
}

function attributeValue(building: Building, key: Attribute): MvtValue | null {
  switch (key) {
    case 'id':
      return building.id === null ? null : { type: 'string', value: building.id };
    case 'name':
      return building.name === null ? null : { type: 'string', value: building.name };
    case 'class':
      return building.class === null ? null : { type: 'string', value: building.class };
    case 'height':
      return building.height === null ? null : toNumberValue(building.height);
  }
}

/**
 * Non-negative integers become `uint`, negative integers `int` and
 * everything else `double`.
 */
export function toNumberValue(value: number): MvtValue {
  if (Number.isInteger(value)) {
    return value >= 0 ? { type: 'uint', value } : { type: 'int', value };
  }
  return { type: 'double', value };
}
