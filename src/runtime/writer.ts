/**
 * Binary writer used by generated `encode` functions
 */

const encoder = new TextEncoder();

function varintSize(value: number): number {
  let size = 1;
  while (value > 127) {
    value >>>= 7;
    size++;
  }
  return size;
}

export class Writer {
  private buf: Uint8Array;
  private view: DataView;
  private pos = 0;
  // Start offsets of open length-delimited sections
  private forks: number[] = [];

  constructor(initialCapacity = 64) {
    this.buf = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buf.buffer);
  }

  get length(): number {
    return this.pos;
  }

  private ensure(extra: number): void {
    if (this.pos + extra <= this.buf.length) {
      return;
    }
    let capacity = this.buf.length * 2;
    while (capacity < this.pos + extra) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }

  private varint32(value: number): void {
    this.ensure(5);
    while (value > 127) {
      this.buf[this.pos++] = (value & 0x7f) | 0x80;
      value >>>= 7;
    }
    this.buf[this.pos++] = value;
  }

  private varint64(lo: number, hi: number): void {
    this.ensure(10);
    while (hi > 0 || lo > 127) {
      this.buf[this.pos++] = (lo & 0x7f) | 0x80;
      lo = ((lo >>> 7) | (hi << 25)) >>> 0;
      hi >>>= 7;
    }
    this.buf[this.pos++] = lo;
  }

  private varintBigInt(value: bigint): void {
    const unsigned = BigInt.asUintN(64, value);
    this.varint64(Number(unsigned & BigInt(0xffffffff)), Number(unsigned >> BigInt(32)));
  }

  uint32(value: number): this {
    this.varint32(value >>> 0);
    return this;
  }

  /** Negative values take ten bytes: they are sign-extended to 64 bits */
  int32(value: number): this {
    if (value >= 0) {
      this.varint32(value);
    } else {
      this.varint64(value >>> 0, 0xffffffff);
    }
    return this;
  }

  sint32(value: number): this {
    this.varint32(((value << 1) ^ (value >> 31)) >>> 0);
    return this;
  }

  bool(value: boolean): this {
    this.varint32(value ? 1 : 0);
    return this;
  }

  int64(value: bigint): this {
    this.varintBigInt(value);
    return this;
  }

  uint64(value: bigint): this {
    this.varintBigInt(value);
    return this;
  }

  sint64(value: bigint): this {
    const signed = BigInt.asIntN(64, value);
    this.varintBigInt((signed << BigInt(1)) ^ (signed >> BigInt(63)));
    return this;
  }

  fixed32(value: number): this {
    this.ensure(4);
    this.view.setUint32(this.pos, value >>> 0, true);
    this.pos += 4;
    return this;
  }

  sfixed32(value: number): this {
    this.ensure(4);
    this.view.setInt32(this.pos, value | 0, true);
    this.pos += 4;
    return this;
  }

  float(value: number): this {
    this.ensure(4);
    this.view.setFloat32(this.pos, value, true);
    this.pos += 4;
    return this;
  }

  fixed64(value: bigint): this {
    this.ensure(8);
    this.view.setBigUint64(this.pos, BigInt.asUintN(64, value), true);
    this.pos += 8;
    return this;
  }

  sfixed64(value: bigint): this {
    this.ensure(8);
    this.view.setBigInt64(this.pos, BigInt.asIntN(64, value), true);
    this.pos += 8;
    return this;
  }

  double(value: number): this {
    this.ensure(8);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
    return this;
  }

  string(value: string): this {
    return this.bytes(encoder.encode(value));
  }

  /** Length-prefixed bytes */
  bytes(value: Uint8Array): this {
    this.varint32(value.length);
    return this.raw(value);
  }

  /** Bytes written verbatim, without a length prefix */
  raw(value: Uint8Array): this {
    this.ensure(value.length);
    this.buf.set(value, this.pos);
    this.pos += value.length;
    return this;
  }

  /**
   * Open a length-delimited section; `ldelim` closes it and inserts the
   * length in front of what was written since
   */
  fork(): this {
    this.forks.push(this.pos);
    return this;
  }

  ldelim(): this {
    const start = this.forks.pop();
    if (start === undefined) {
      throw new Error('ldelim() called without a matching fork()');
    }
    const length = this.pos - start;
    const prefix = varintSize(length);
    this.ensure(prefix);
    this.buf.copyWithin(start + prefix, start, this.pos);
    // The prefix fills the gap just opened; no further growth may happen here
    let value = length;
    let at = start;
    while (value > 127) {
      this.buf[at++] = (value & 0x7f) | 0x80;
      value >>>= 7;
    }
    this.buf[at] = value;
    this.pos += prefix;
    return this;
  }

  finish(): Uint8Array {
    if (this.forks.length > 0) {
      throw new Error(`${this.forks.length} fork() call(s) were never closed with ldelim()`);
    }
    return this.buf.slice(0, this.pos);
  }
}
