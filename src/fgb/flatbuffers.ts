/** @module fgb/flatbuffers
 *
 * Minimal read-only FlatBuffers access.
 *
 * A table starts with a signed 32-bit offset back to its vtable, then its
 * inline field data. The vtable is a run of uint16 values:
 * `[vtable_size, table_size, field0_offset, field1_offset, ...]`, where an
 * offset of 0 marks an absent field. Strings, vectors and sub-tables are
 * reached through uint32 forward offsets.
 *
 * Only what the FlatGeobuf header and feature tables need is implemented.
 * Any read that would leave the buffer raises {@link FgbFormatError}.
 */

import { FgbFormatError } from '../errors.js';

const textDecoder = new TextDecoder();

/**
 * Little-endian FlatBuffer reader over one `Uint8Array`.
 *
 * All offsets are relative to the start of `bytes`.
 */
export class FlatBufferReader {
  readonly bytes: Uint8Array;
  private readonly view: DataView;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  // ─── Scalars ──────────────────────────────────────────────────────────

  readUint8(offset: number): number {
    this.check(offset, 1);
    return this.view.getUint8(offset);
  }

  readUint16(offset: number): number {
    this.check(offset, 2);
    return this.view.getUint16(offset, true);
  }

  readInt32(offset: number): number {
    this.check(offset, 4);
    return this.view.getInt32(offset, true);
  }

  readUint32(offset: number): number {
    this.check(offset, 4);
    return this.view.getUint32(offset, true);
  }

  readFloat64(offset: number): number {
    this.check(offset, 8);
    return this.view.getFloat64(offset, true);
  }

  /**
   * Read a uint64 as a `number`, exact up to `Number.MAX_SAFE_INTEGER`.
   */
  readUint64AsNumber(offset: number): number {
    this.check(offset, 8);
    const lo = this.view.getUint32(offset, true);
    const hi = this.view.getUint32(offset + 4, true);
    return hi * 0x100000000 + lo;
  }

  /** Read a length-prefixed UTF-8 string. */
  readString(offset: number): string {
    const len = this.readUint32(offset);
    return textDecoder.decode(this.readBytes(offset + 4, len));
  }

  // ─── Tables ───────────────────────────────────────────────────────────

  /** Offset of the root table, read from the first four bytes. */
  rootTableOffset(): number {
    return this.readUint32(0);
  }

  /**
   * Absolute offset of a table field's data, or `0` when the field is
   * absent from this table.
   */
  fieldOffset(tablePos: number, fieldIndex: number): number {
    const vtable = tablePos - this.readInt32(tablePos);
    const vtableSize = this.readUint16(vtable);
    const slot = 4 + fieldIndex * 2;
    if (slot >= vtableSize) return 0;
    const fieldOff = this.readUint16(vtable + slot);
    return fieldOff === 0 ? 0 : tablePos + fieldOff;
  }

  /** Follow a uint32 forward offset stored at `pos`. */
  indirect(pos: number): number {
    return pos + this.readUint32(pos);
  }

  vectorLen(vectorOffset: number): number {
    return this.readUint32(vectorOffset);
  }

  vectorStart(vectorOffset: number): number {
    return vectorOffset + 4;
  }

  // ─── Arrays ───────────────────────────────────────────────────────────

  /**
   * Copy `count` float64 values into a new array.
   *
   * Always copies so callers may keep the result after the source buffer
   * is released.
   */
  readFloat64Array(offset: number, count: number): Float64Array {
    this.check(offset, count * 8);
    const out = new Float64Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = this.view.getFloat64(offset + i * 8, true);
    }
    return out;
  }

  /** Copy `count` uint32 values into a new array. */
  readUint32Array(offset: number, count: number): Uint32Array {
    this.check(offset, count * 4);
    const out = new Uint32Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = this.view.getUint32(offset + i * 4, true);
    }
    return out;
  }

  /** A zero-copy view of `length` bytes. */
  readBytes(offset: number, length: number): Uint8Array {
    this.check(offset, length);
    return this.bytes.subarray(offset, offset + length);
  }

  private check(offset: number, length: number): void {
    if (offset < 0 || offset + length > this.bytes.length) {
      throw new FgbFormatError(
        `FlatBuffer read of ${length} bytes at ${offset} exceeds buffer of ${this.bytes.length}`,
      );
    }
  }
}
