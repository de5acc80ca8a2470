/**
 * Binary reader used by generated `decode` functions
 */

import { DecodeError } from './errors';
import { WireType } from './wire';

/** Nested message depth accepted before decoding fails */
export const RECURSION_LIMIT = 100;

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export class Reader {
  pos = 0;
  readonly end: number;
  /** Current message nesting depth */
  depth = 0;
  private readonly view: DataView;

  constructor(readonly buf: Uint8Array) {
    this.end = buf.length;
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  private need(count: number): void {
    if (this.pos + count > this.end) {
      throw new DecodeError('Unexpected end of input', this.pos);
    }
  }

  private byte(): number {
    if (this.pos >= this.end) {
      throw new DecodeError('Truncated varint', this.pos);
    }
    return this.buf[this.pos++];
  }

  /**
   * Read a varint of up to ten bytes as two unsigned 32-bit halves
   */
  private varint(): [number, number] {
    const start = this.pos;
    let lo = 0;
    let hi = 0;
    let b: number;

    for (let shift = 0; shift < 28; shift += 7) {
      b = this.byte();
      lo |= (b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return [lo >>> 0, 0];
      }
    }

    b = this.byte();
    lo |= (b & 0x0f) << 28;
    hi = (b & 0x7f) >> 4;
    if ((b & 0x80) === 0) {
      return [lo >>> 0, hi >>> 0];
    }

    for (let shift = 3; shift <= 31; shift += 7) {
      b = this.byte();
      if (shift === 31 && b > 1 && (b & 0x80) === 0) {
        throw new DecodeError('Varint overflows 64 bits', start);
      }
      hi |= (b & 0x7f) << shift;
      if ((b & 0x80) === 0) {
        return [lo >>> 0, hi >>> 0];
      }
    }

    throw new DecodeError('Varint is longer than 10 bytes', start);
  }

  private varintBigInt(): bigint {
    const [lo, hi] = this.varint();
    return (BigInt(hi) << BigInt(32)) | BigInt(lo);
  }

  /**
   * Read a field tag. Field number 0 and the unused wire types 6 and 7 are
   * rejected.
   */
  tag(): number {
    const start = this.pos;
    const [tag, hi] = this.varint();
    if (hi !== 0) {
      throw new DecodeError('Tag does not fit in 32 bits', start);
    }
    if (tag >>> 3 === 0) {
      throw new DecodeError('Invalid field number 0', start);
    }
    if ((tag & 7) > WireType.Bit32) {
      throw new DecodeError(`Invalid wire type ${tag & 7}`, start);
    }
    return tag;
  }

  uint32(): number {
    return this.varint()[0];
  }

  int32(): number {
    return this.varint()[0] | 0;
  }

  sint32(): number {
    const value = this.varint()[0];
    return (value >>> 1) ^ -(value & 1);
  }

  bool(): boolean {
    const [lo, hi] = this.varint();
    return lo !== 0 || hi !== 0;
  }

  int64(): bigint {
    return BigInt.asIntN(64, this.varintBigInt());
  }

  uint64(): bigint {
    return this.varintBigInt();
  }

  sint64(): bigint {
    const value = this.varintBigInt();
    return BigInt.asIntN(64, (value >> BigInt(1)) ^ -(value & BigInt(1)));
  }

  fixed32(): number {
    this.need(4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  sfixed32(): number {
    this.need(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  float(): number {
    this.need(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  fixed64(): bigint {
    this.need(8);
    const value = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return value;
  }

  sfixed64(): bigint {
    this.need(8);
    const value = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return value;
  }

  double(): number {
    this.need(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Read a length prefix and check the section fits in the input
   */
  fieldLength(): number {
    const start = this.pos;
    const [length, hi] = this.varint();
    if (hi !== 0 || this.pos + length > this.end) {
      throw new DecodeError('Length-delimited field exceeds the input', start);
    }
    return length;
  }

  /** Length-prefixed bytes, copied out of the input */
  bytes(): Uint8Array {
    const length = this.fieldLength();
    const value = this.buf.slice(this.pos, this.pos + length);
    this.pos += length;
    return value;
  }

  string(): string {
    const length = this.fieldLength();
    const start = this.pos;
    this.pos += length;
    try {
      return decoder.decode(this.buf.subarray(start, start + length));
    } catch {
      throw new DecodeError('Invalid UTF-8 in string field', start);
    }
  }

  /**
   * Decode a length-delimited nested message, enforcing the depth limit
   */
  message<T>(decode: (reader: Reader, length: number) => T): T {
    const length = this.fieldLength();
    if (this.depth >= RECURSION_LIMIT) {
      throw new DecodeError(`Message nesting exceeds ${RECURSION_LIMIT} levels`, this.pos);
    }
    this.depth++;
    const value = decode(this, length);
    this.depth--;
    return value;
  }

  /**
   * Read every element of a packed repeated field
   */
  packed<T>(read: () => T): T[] {
    const length = this.fieldLength();
    const end = this.pos + length;
    const values: T[] = [];
    while (this.pos < end) {
      values.push(read());
    }
    if (this.pos !== end) {
      throw new DecodeError('Packed field element crosses the field boundary', this.pos);
    }
    return values;
  }

  /**
   * Skip the value of a field whose tag was just read. Groups are skipped up
   * to their matching end tag.
   */
  skip(wireType: number, fieldNumber: number): void {
    switch (wireType) {
      case WireType.Varint:
        this.varint();
        break;
      case WireType.Bit64:
        this.need(8);
        this.pos += 8;
        break;
      case WireType.LengthDelimited:
        this.pos += this.fieldLength();
        break;
      case WireType.Bit32:
        this.need(4);
        this.pos += 4;
        break;
      case WireType.StartGroup:
        this.skipGroup(fieldNumber);
        break;
      case WireType.EndGroup:
        throw new DecodeError(`Unexpected end-group tag for field ${fieldNumber}`, this.pos);
      default:
        throw new DecodeError(`Invalid wire type ${wireType}`, this.pos);
    }
  }

  private skipGroup(fieldNumber: number): void {
    if (this.depth >= RECURSION_LIMIT) {
      throw new DecodeError(`Message nesting exceeds ${RECURSION_LIMIT} levels`, this.pos);
    }
    this.depth++;
    for (;;) {
      if (this.pos >= this.end) {
        throw new DecodeError(`Unterminated group for field ${fieldNumber}`, this.pos);
      }
      const tag = this.tag();
      const wireType = tag & 7;
      if (wireType === WireType.EndGroup) {
        if (tag >>> 3 !== fieldNumber) {
          throw new DecodeError(`Mismatched end-group tag for field ${fieldNumber}`, this.pos);
        }
        break;
      }
      this.skip(wireType, tag >>> 3);
    }
    this.depth--;
  }

  /** Copy of the input between two offsets */
  raw(start: number, end: number): Uint8Array {
    return this.buf.slice(start, end);
  }
}
