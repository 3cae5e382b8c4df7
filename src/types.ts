/**
 * @module types
 *
 * Shared type definitions for footprint-tiles.
 *
 * The data structures here flow between the stages of tile generation and
 * the viewport stats path:
 *
 * - **Geometry enums**: FlatGeobuf and MVT geometry type constants
 * - **BBox**: axis-aligned bounding box used for every spatial test
 * - **Building**: a decoded footprint with its fixed attribute set
 * - **FgbHeader**: parsed dataset header with schema and index metadata
 * - **MvtFeature / MvtLayer**: intermediate MVT representation before PBF encoding
 * - **ViewBounds / ViewState / AggregateStats**: viewport register and stats values
 *
 * Coordinate arrays use the flat interleaved layout `[x0, y0, x1, y1, ...]`.
 */

// ─── Geometry Types ─────────────────────────────────────────────────────────

/**
 * FlatGeobuf geometry type constants.
 *
 * Only the polygon variants are decoded into buildings; the remaining
 * members exist so that header and feature bytes can be classified.
 */
export const enum GeomType {
  Unknown = 0,
  Point = 1,
  LineString = 2,
  Polygon = 3,
  MultiPoint = 4,
  MultiLineString = 5,
  MultiPolygon = 6,
}

/**
 * MVT geometry type constants per the Mapbox Vector Tile 2.1 specification.
 * Buildings are only ever written as polygons.
 *
 * @see {@link https://github.com/mapbox/vector-tile-spec/blob/master/2.1/vector_tile.proto | MVT 2.1 Spec}
 */
export const enum MvtGeomType {
  POLYGON = 3,
}

// ─── Bounding Box ───────────────────────────────────────────────────────────

/**
 * Axis-aligned bounding box.
 *
 * Used for WGS84 extents (longitude/latitude) and for mercator [0, 1] clip
 * bounds.
 */
export interface BBox {
  /** Minimum X (western longitude or left edge). */
  minX: number;
  /** Minimum Y (southern latitude or top edge in mercator space). */
  minY: number;
  /** Maximum X (eastern longitude or right edge). */
  maxX: number;
  /** Maximum Y (northern latitude or bottom edge in mercator space). */
  maxY: number;
}

/** A slippy-map tile address. */
export interface TileAddress {
  z: number;
  x: number;
  y: number;
}

// ─── Buildings ──────────────────────────────────────────────────────────────

/**
 * Polygon or multipolygon geometry in flat form.
 *
 * `ends` holds the cumulative coordinate-pair count at the end of each ring.
 * `parts` holds, for every polygon, the index into `ends` of its exterior
 * ring; rings between two consecutive `parts` entries are that polygon's
 * holes. A plain polygon has `parts = [0]`.
 *
 * @example
 * A polygon with a 5-point exterior and a 4-point hole, followed by a
 * second 5-point polygon:
 * ```
 * ends  = [5, 9, 14]
 * parts = [0, 2]
 * ```
 */
export interface PolygonGeometry {
  xy: Float64Array;
  ends: Uint32Array;
  parts: Uint32Array;
}

/**
 * A building footprint as read from the dataset.
 *
 * Nullable attributes mirror the nullable columns of the source table.
 */
export interface Building {
  id: string | null;
  name: string | null;
  height: number | null;
  class: string | null;
  subtype: string | null;
  numFloors: number | null;
  /** WGS84 bounds of the full geometry. */
  bbox: BBox;
  /** WGS84 geometry (longitude, latitude). */
  geometry: PolygonGeometry;
}

/**
 * A property value decoded from an FGB feature.
 *
 * Numeric column types become `number`, string/json/datetime `string`,
 * bool `boolean` and binary `Uint8Array`.
 */
export type PropertyValue = string | number | boolean | Uint8Array | null;

// ─── FGB Column Schema ──────────────────────────────────────────────────────

/**
 * FlatGeobuf column (property) type constants.
 *
 * @see {@link https://flatgeobuf.org/ | FlatGeobuf Specification}
 */
export const enum ColumnType {
  Byte = 0,
  UByte = 1,
  Bool = 2,
  Short = 3,
  UShort = 4,
  Int = 5,
  UInt = 6,
  Long = 7,
  ULong = 8,
  Float = 9,
  Double = 10,
  String = 11,
  Json = 12,
  DateTime = 13,
  Binary = 14,
}

/** Schema metadata for a single FGB column. */
export interface ColumnMeta {
  name: string;
  type: ColumnType;
  nullable: boolean;
}

// ─── FGB Header ─────────────────────────────────────────────────────────────

/**
 * Parsed FlatGeobuf file header.
 *
 * Carries the schema, dataset extent and the byte offsets needed to locate
 * the spatial index and the feature section.
 */
export interface FgbHeader {
  /** Geometry type shared by all features, or `Unknown` for mixed files. */
  geometryType: GeomType;
  columns: ColumnMeta[];
  featuresCount: number;
  /** Hilbert R-tree node fan-out (0 = no spatial index). */
  indexNodeSize: number;
  /** Dataset extent in WGS84, or `null` if absent from the header. */
  bbox: BBox | null;
  /** Byte offset of the packed Hilbert R-tree. */
  indexOffset: number;
  /** Byte size of the packed Hilbert R-tree. */
  indexSize: number;
  /** Byte offset of the first length-prefixed feature. */
  featuresOffset: number;
  /** Magic + size prefix + header FlatBuffer, in bytes. */
  headerSize: number;
}

// ─── MVT Types ──────────────────────────────────────────────────────────────

/**
 * A tagged MVT property value.
 *
 * Float and double collapse into `double`; integers become `uint` when
 * non-negative and `int` (zigzag sint64) otherwise.
 */
export type MvtValue =
  | { type: 'string'; value: string }
  | { type: 'double'; value: number }
  | { type: 'int'; value: number }
  | { type: 'uint'; value: number };

/**
 * A single feature within an MVT layer, ready for PBF encoding. Features
 * carry no numeric id; the building id travels as the `id` attribute.
 */
export interface MvtFeature {
  type: MvtGeomType;
  /** Command-encoded geometry integers. */
  geometry: number[];
  /** Interleaved `[keyIdx, valIdx, ...]` pairs. */
  tags: number[];
}

/**
 * A complete MVT layer with layer-wide deduplicated keys and values.
 */
export interface MvtLayer {
  name: string;
  extent: number;
  features: MvtFeature[];
  keys: string[];
  values: MvtValue[];
}

// ─── Viewport ───────────────────────────────────────────────────────────────

/** Geographic bounds of a map viewport as reported by the map page. */
export interface ViewBounds {
  north: number;
  south: number;
  east: number;
  west: number;
}

/**
 * The single most recent viewport.
 *
 * Instances are frozen; the register replaces the whole object on write.
 */
export interface ViewState {
  readonly bounds: Readonly<ViewBounds>;
  /** Map zoom, or `null` when the client did not report one. */
  readonly zoom: number | null;
  /** Wall-clock time of the write, in milliseconds since the epoch. */
  readonly updatedAt: number;
}

/** Building count and summed EPSG:3857 footprint area (m²) for a region. */
export interface AggregateStats {
  count: number;
  area: number;
}
