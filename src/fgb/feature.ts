/** @module fgb/feature
 *
 * Building decoder.
 *
 * Features in the feature section are stored back to back, each behind a
 * `uint32` size prefix. A merged byte range from the index therefore holds
 * a run of whole features, possibly followed by the start of one more that
 * the range does not cover.
 *
 * **Feature table** (`feature.fbs`):
 * |  #  | Field      | Type                                    |
 * | --- | ---------- | --------------------------------------- |
 * |  0  | geometry   | Geometry table                          |
 * |  1  | properties | ubyte vector (custom binary encoding)   |
 *
 * **Geometry table**:
 * |  #  | Field | Type              |
 * | --- | ----- | ----------------- |
 * |  0  | ends  | uint32 vector     |
 * |  1  | xy    | double vector     |
 * |  6  | type  | ubyte (GeomType)  |
 * |  7  | parts | Geometry vector   |
 *
 * A Polygon keeps its rings in `xy`/`ends`. A MultiPolygon keeps one
 * Polygon geometry per entry of `parts`.
 */

import { FlatBufferReader } from './flatbuffers.js';
import type { Building, BBox, FgbHeader, PolygonGeometry, PropertyValue, ColumnMeta } from '../types.js';
import { ColumnType, GeomType } from '../types.js';

const textDecoder = new TextDecoder();

/**
 * Decode every complete feature in `bytes` into a {@link Building}.
 *
 * Features that are not polygons or multipolygons, or that carry no
 * coordinates, are skipped. Decoding stops at a zero size prefix or at a
 * feature that runs past the end of the buffer.
 *
 * @param bytes - One or more length-prefixed feature FlatBuffers.
 * @param header - Supplies the default geometry type and the column schema.
 * @throws {FgbFormatError} If a feature's FlatBuffer is malformed.
 */
export function decodeBuildings(bytes: Uint8Array, header: FgbHeader): Building[] {
  const buildings: Building[] = [];
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 0;

  while (offset + 4 <= bytes.length) {
    const featureSize = view.getUint32(offset, true);
    if (featureSize === 0) break;

    offset += 4;
    if (offset + featureSize > bytes.length) break;

    const building = decodeBuilding(bytes.subarray(offset, offset + featureSize), header);
    if (building) buildings.push(building);

    offset += featureSize;
  }

  return buildings;
}

function decodeBuilding(bytes: Uint8Array, header: FgbHeader): Building | null {
  const fb = new FlatBufferReader(bytes);
  const root = fb.rootTableOffset();

  const geomOff = fb.fieldOffset(root, 0);
  if (!geomOff) return null;

  const geometry = decodeGeometry(fb, fb.indirect(geomOff), header.geometryType);
  if (!geometry) return null;

  const propsOff = fb.fieldOffset(root, 1);
  const props = propsOff
    ? decodeProperties(fb, fb.indirect(propsOff), header.columns)
    : new Map<string, PropertyValue>();

  return {
    id: stringProp(props, 'id'),
    name: stringProp(props, 'name'),
    height: numberProp(props, 'height'),
    class: stringProp(props, 'class'),
    subtype: stringProp(props, 'subtype'),
    numFloors: numberProp(props, 'num_floors'),
    bbox: computeBBox(geometry.xy),
    geometry,
  };
}

// ─── Geometry ───────────────────────────────────────────────────────────────

function decodeGeometry(
  fb: FlatBufferReader,
  tablePos: number,
  headerType: GeomType,
): PolygonGeometry | null {
  const typeOff = fb.fieldOffset(tablePos, 6);
  const type: GeomType = typeOff ? fb.readUint8(typeOff) : headerType;

  if (type === GeomType.Polygon) {
    return decodeRings(fb, tablePos);
  }
  if (type !== GeomType.MultiPolygon) return null;

  const partsOff = fb.fieldOffset(tablePos, 7);
  if (!partsOff) {
    // Some writers flatten a single-part multipolygon into xy/ends.
    return decodeRings(fb, tablePos);
  }

  const vec = fb.indirect(partsOff);
  const count = fb.vectorLen(vec);
  const start = fb.vectorStart(vec);

  const polygons: PolygonGeometry[] = [];
  for (let i = 0; i < count; i++) {
    const polygon = decodeRings(fb, fb.indirect(start + i * 4));
    if (polygon) polygons.push(polygon);
  }

  return polygons.length > 0 ? concatPolygons(polygons) : null;
}

/** Read `xy` and `ends` of a single polygon. */
function decodeRings(fb: FlatBufferReader, tablePos: number): PolygonGeometry | null {
  const xyOff = fb.fieldOffset(tablePos, 1);
  if (!xyOff) return null;

  const xyVec = fb.indirect(xyOff);
  const xyLen = fb.vectorLen(xyVec);
  if (xyLen < 2) return null;
  const xy = fb.readFloat64Array(fb.vectorStart(xyVec), xyLen - (xyLen % 2));

  let ends: Uint32Array | null = null;
  const endsOff = fb.fieldOffset(tablePos, 0);
  if (endsOff) {
    const endsVec = fb.indirect(endsOff);
    const endsLen = fb.vectorLen(endsVec);
    if (endsLen > 0) ends = fb.readUint32Array(fb.vectorStart(endsVec), endsLen);
  }

  return {
    xy,
    ends: ends ?? Uint32Array.of(xy.length / 2),
    parts: Uint32Array.of(0),
  };
}

function concatPolygons(polygons: readonly PolygonGeometry[]): PolygonGeometry {
  let xyLength = 0;
  let ringCount = 0;
  for (const p of polygons) {
    xyLength += p.xy.length;
    ringCount += p.ends.length;
  }

  const xy = new Float64Array(xyLength);
  const ends = new Uint32Array(ringCount);
  const parts = new Uint32Array(polygons.length);

  let xyPos = 0;
  let ringPos = 0;
  polygons.forEach((p, i) => {
    const pairBase = xyPos / 2;
    xy.set(p.xy, xyPos);
    parts[i] = ringPos;
    for (let r = 0; r < p.ends.length; r++) {
      ends[ringPos++] = p.ends[r] + pairBase;
    }
    xyPos += p.xy.length;
  });

  return { xy, ends, parts };
}

function computeBBox(xy: Float64Array): BBox {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (let i = 0; i < xy.length; i += 2) {
    const x = xy[i];
    const y = xy[i + 1];
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  return { minX, minY, maxX, maxY };
}

// ─── Properties ─────────────────────────────────────────────────────────────

function stringProp(props: Map<string, PropertyValue>, name: string): string | null {
  const value = props.get(name);
  if (typeof value === 'string') return value;
  // Integer ids are rendered as strings.
  if (typeof value === 'number' && name === 'id') return String(value);
  return null;
}

function numberProp(props: Map<string, PropertyValue>, name: string): number | null {
  const value = props.get(name);
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Decode FGB's property encoding: a run of `[uint16 column][value]` pairs,
 * the value laid out according to the column type.
 *
 * | Column type              | Encoding                       |
 * | ------------------------ | ------------------------------ |
 * | Bool / Byte / UByte      | 1 byte                         |
 * | Short / UShort           | 2 bytes                        |
 * | Int / UInt / Float       | 4 bytes                        |
 * | Long / ULong / Double    | 8 bytes                        |
 * | String / Json / DateTime | `uint32` length + UTF-8 bytes  |
 * | Binary                   | `uint32` length + raw bytes    |
 *
 * A truncated value ends decoding; the pairs read so far are kept.
 */
function decodeProperties(
  fb: FlatBufferReader,
  vecOffset: number,
  columns: readonly ColumnMeta[],
): Map<string, PropertyValue> {
  const props = new Map<string, PropertyValue>();

  const len = fb.vectorLen(vecOffset);
  if (len === 0) return props;

  const bytes = fb.readBytes(fb.vectorStart(vecOffset), len);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  let offset = 0;
  while (offset + 2 <= len) {
    const colIdx = view.getUint16(offset, true);
    offset += 2;

    const col = columns[colIdx];
    if (col === undefined) break;

    const read = readPropertyValue(view, bytes, offset, col.type);
    if (read === null) break;

    props.set(col.name, read.value);
    offset += read.bytesRead;
  }

  return props;
}

const FIXED_WIDTH: Partial<Record<ColumnType, number>> = {
  [ColumnType.Bool]: 1,
  [ColumnType.Byte]: 1,
  [ColumnType.UByte]: 1,
  [ColumnType.Short]: 2,
  [ColumnType.UShort]: 2,
  [ColumnType.Int]: 4,
  [ColumnType.UInt]: 4,
  [ColumnType.Float]: 4,
  [ColumnType.Long]: 8,
  [ColumnType.ULong]: 8,
  [ColumnType.Double]: 8,
};

function readPropertyValue(
  view: DataView,
  bytes: Uint8Array,
  offset: number,
  type: ColumnType,
): { value: PropertyValue; bytesRead: number } | null {
  const width = FIXED_WIDTH[type];
  if (width !== undefined && offset + width > bytes.length) return null;

  switch (type) {
    case ColumnType.Bool:
      return { value: view.getUint8(offset) !== 0, bytesRead: 1 };
    case ColumnType.Byte:
      return { value: view.getInt8(offset), bytesRead: 1 };
    case ColumnType.UByte:
      return { value: view.getUint8(offset), bytesRead: 1 };
    case ColumnType.Short:
      return { value: view.getInt16(offset, true), bytesRead: 2 };
    case ColumnType.UShort:
      return { value: view.getUint16(offset, true), bytesRead: 2 };
    case ColumnType.Int:
      return { value: view.getInt32(offset, true), bytesRead: 4 };
    case ColumnType.UInt:
      return { value: view.getUint32(offset, true), bytesRead: 4 };
    case ColumnType.Float:
      return { value: view.getFloat32(offset, true), bytesRead: 4 };
    case ColumnType.Long:
      return { value: view.getInt32(offset + 4, true) * 0x100000000 + view.getUint32(offset, true), bytesRead: 8 };
    case ColumnType.ULong:
      return { value: view.getUint32(offset + 4, true) * 0x100000000 + view.getUint32(offset, true), bytesRead: 8 };
    case ColumnType.Double:
      return { value: view.getFloat64(offset, true), bytesRead: 8 };

    case ColumnType.String:
    case ColumnType.Json:
    case ColumnType.DateTime:
    case ColumnType.Binary: {
      if (offset + 4 > bytes.length) return null;
      const size = view.getUint32(offset, true);
      if (offset + 4 + size > bytes.length) return null;
      const raw = bytes.subarray(offset + 4, offset + 4 + size);
      const value = type === ColumnType.Binary ? raw.slice() : textDecoder.decode(raw);
      return { value, bytesRead: 4 + size };
    }

    default:
      return null;
  }
}
