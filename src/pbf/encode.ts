/**
 * @module pbf/encode
 *
 * MVT 2.1 protobuf serialization on top of the `pbf` writer. Only the
 * fields below that buildings use are written: no feature `id`, no
 * `bool_value`.
 *
 * ```protobuf
 * message Tile {
 *   repeated Layer layers = 3;
 *
 *   message Layer {
 *     required uint32 version  = 15; // always 2
 *     required string name     = 1;
 *     repeated Feature features = 2;
 *     repeated string keys     = 3;
 *     repeated Value  values   = 4;
 *     optional uint32 extent   = 5;
 *   }
 *
 *   message Feature {
 *     optional uint64   id       = 1;
 *     repeated uint32   tags     = 2 [packed = true];
 *     optional GeomType type     = 3;
 *     repeated uint32   geometry = 4 [packed = true];
 *   }
 *
 *   message Value {
 *     optional string string_value = 1;
 *     optional double double_value = 3;
 *     optional uint64 uint_value   = 5;
 *     optional sint64 sint_value   = 6;
 *     optional bool   bool_value   = 7;
 *   }
 * }
 * ```
 *
 * @see {@link https://github.com/mapbox/vector-tile-spec/blob/master/2.1/vector_tile.proto | MVT 2.1 Proto}
 */

import Pbf from 'pbf';
import type { MvtFeature, MvtLayer, MvtValue } from '../types.js';

/**
 * Serialize layers into one tile, in the given order.
 *
 * @returns The tile bytes; empty for an empty `layers` array.
 */
export function encodePbf(layers: readonly MvtLayer[]): Uint8Array {
  const pbf = new Pbf();
  for (const layer of layers) {
    pbf.writeMessage(3, writeLayer, layer);
  }
  return pbf.finish();
}

function writeLayer(layer: MvtLayer, pbf: Pbf): void {
  pbf.writeVarintField(15, 2);
  pbf.writeStringField(1, layer.name);
  pbf.writeVarintField(5, layer.extent);

  for (const key of layer.keys) {
    pbf.writeStringField(3, key);
  }
  for (const value of layer.values) {
    pbf.writeMessage(4, writeValue, value);
  }
  for (const feature of layer.features) {
    pbf.writeMessage(2, writeFeature, feature);
  }
}

function writeFeature(feature: MvtFeature, pbf: Pbf): void {
  if (feature.tags.length > 0) pbf.writePackedVarint(2, feature.tags);
  pbf.writeVarintField(3, feature.type);
  pbf.writePackedVarint(4, feature.geometry);
}

function writeValue(value: MvtValue, pbf: Pbf): void {
  switch (value.type) {
    case 'string':
      pbf.writeStringField(1, value.value);
      break;
    case 'double':
      pbf.writeDoubleField(3, value.value);
      break;
    case 'uint':
      pbf.writeVarintField(5, value.value);
      break;
    case 'int':
      pbf.writeSVarintField(6, value.value);
      break;
  }
}
