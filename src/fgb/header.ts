/** @module fgb/header
 *
 * FlatGeobuf header parser.
 *
 * File layout:
 * ```
 * [8 bytes magic] [uint32 header size] [header FlatBuffer] [packed R-tree] [features...]
 * ```
 *
 * Header table fields read here (from `header.fbs`):
 * |  #  | Field           | Type             | Default |
 * | --- | --------------- | ---------------- | ------- |
 * |  1  | envelope        | double[]         |         |
 * |  2  | geometry_type   | ubyte            | 0       |
 * |  7  | columns         | Column[]         |         |
 * |  8  | features_count  | ulong            | 0       |
 * |  9  | index_node_size | ushort           | 16      |
 *
 * FlatBuffers writers omit fields equal to their default, so an absent
 * `index_node_size` means 16, not "no index". Only an explicit 0 disables
 * the index.
 */

import { FlatBufferReader } from './flatbuffers.js';
import { FgbFormatError } from '../errors.js';
import type { FgbHeader, ColumnMeta, BBox } from '../types.js';
import { ColumnType, GeomType } from '../types.js';

/** `"fgb"`, major version 3, `"fgb"`, patch byte. */
const MAGIC_BYTES = new Uint8Array([0x66, 0x67, 0x62, 0x03, 0x66, 0x67, 0x62, 0x00]);

const HEADER_MAGIC_SIZE = 8;

/** Packed R-tree node: 4 × float64 bbox + uint64 offset. */
export const NODE_ITEM_BYTE_SIZE = 40;

const DEFAULT_INDEX_NODE_SIZE = 16;

/**
 * Bytes needed from the start of a file to learn the full header size via
 * {@link headerByteSize}.
 */
export const INITIAL_HEADER_READ_SIZE = HEADER_MAGIC_SIZE + 4;

/**
 * Whether `bytes` starts with the FlatGeobuf v3 signature.
 *
 * The trailing patch byte is not compared.
 */
export function verifyMagic(bytes: Uint8Array): boolean {
  if (bytes.length < HEADER_MAGIC_SIZE) return false;
  for (let i = 0; i < HEADER_MAGIC_SIZE - 1; i++) {
    if (bytes[i] !== MAGIC_BYTES[i]) return false;
  }
  return true;
}

/**
 * Total length of the magic, the size prefix and the header FlatBuffer.
 *
 * @param bytes - At least {@link INITIAL_HEADER_READ_SIZE} bytes from the
 *   start of the file.
 * @throws {FgbFormatError} On a short read or a bad signature.
 */
export function headerByteSize(bytes: Uint8Array): number {
  if (bytes.length < INITIAL_HEADER_READ_SIZE) {
    throw new FgbFormatError('Not enough bytes to read FlatGeobuf header size');
  }
  if (!verifyMagic(bytes)) {
    throw new FgbFormatError('Invalid FlatGeobuf magic bytes');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset + HEADER_MAGIC_SIZE, 4);
  return INITIAL_HEADER_READ_SIZE + view.getUint32(0, true);
}

/**
 * Parse the header and derive the index and feature offsets.
 *
 * @param bytes - File bytes from offset 0, covering at least the header.
 * @throws {FgbFormatError} If the signature is wrong or the header is
 *   truncated.
 */
export function parseHeader(bytes: Uint8Array): FgbHeader {
  const headerSize = headerByteSize(bytes);
  if (bytes.length < headerSize) {
    throw new FgbFormatError(`Truncated FlatGeobuf header: need ${headerSize} bytes, have ${bytes.length}`);
  }

  const fb = new FlatBufferReader(bytes.subarray(INITIAL_HEADER_READ_SIZE, headerSize));
  const root = fb.rootTableOffset();

  const geomTypeOff = fb.fieldOffset(root, 2);
  const geometryType: GeomType = geomTypeOff ? fb.readUint8(geomTypeOff) : GeomType.Unknown;

  const countOff = fb.fieldOffset(root, 8);
  const featuresCount = countOff ? fb.readUint64AsNumber(countOff) : 0;

  const nodeSizeOff = fb.fieldOffset(root, 9);
  const indexNodeSize = nodeSizeOff ? fb.readUint16(nodeSizeOff) : DEFAULT_INDEX_NODE_SIZE;

  const indexOffset = headerSize;
  const indexSize = calcIndexSize(featuresCount, indexNodeSize);

  return {
    geometryType,
    columns: parseColumns(fb, root),
    featuresCount,
    indexNodeSize,
    bbox: parseEnvelope(fb, root),
    indexOffset,
    indexSize,
    featuresOffset: indexOffset + indexSize,
    headerSize,
  };
}

// ─── Fields ─────────────────────────────────────────────────────────────────

function parseEnvelope(fb: FlatBufferReader, root: number): BBox | null {
  const envOff = fb.fieldOffset(root, 1);
  if (!envOff) return null;
  const vec = fb.indirect(envOff);
  if (fb.vectorLen(vec) < 4) return null;
  const start = fb.vectorStart(vec);
  return {
    minX: fb.readFloat64(start),
    minY: fb.readFloat64(start + 8),
    maxX: fb.readFloat64(start + 16),
    maxY: fb.readFloat64(start + 24),
  };
}

/**
 * Column table fields: `0` name, `1` type, `14` nullable (default true).
 */
function parseColumns(fb: FlatBufferReader, root: number): ColumnMeta[] {
  const colsOff = fb.fieldOffset(root, 7);
  if (!colsOff) return [];

  const vec = fb.indirect(colsOff);
  const len = fb.vectorLen(vec);
  const start = fb.vectorStart(vec);
  const columns: ColumnMeta[] = [];

  for (let i = 0; i < len; i++) {
    const table = fb.indirect(start + i * 4);
    const nameOff = fb.fieldOffset(table, 0);
    const typeOff = fb.fieldOffset(table, 1);
    const nullOff = fb.fieldOffset(table, 14);
    columns.push({
      name: nameOff ? fb.readString(fb.indirect(nameOff)) : '',
      type: typeOff ? fb.readUint8(typeOff) : ColumnType.Byte,
      nullable: nullOff ? fb.readUint8(nullOff) !== 0 : true,
    });
  }

  return columns;
}

// ─── Index size ─────────────────────────────────────────────────────────────

/**
 * Byte size of a packed Hilbert R-tree: one node per feature plus every
 * parent level up to a single root, 40 bytes each.
 *
 * @returns `0` when there are no features or no index.
 * @throws {FgbFormatError} For a node size of 1, which never converges.
 */
export function calcIndexSize(featuresCount: number, nodeSize: number): number {
  if (featuresCount === 0 || nodeSize === 0) return 0;
  if (nodeSize < 2) throw new FgbFormatError(`Invalid index node size ${nodeSize}`);

  let n = featuresCount;
  let totalNodes = n;
  while (n > 1) {
    n = Math.ceil(n / nodeSize);
    totalNodes += n;
  }
  return totalNodes * NODE_ITEM_BYTE_SIZE;
}
