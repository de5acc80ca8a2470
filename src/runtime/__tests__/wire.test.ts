/**
 * Tests for the binary writer and reader
 */

import { DecodeError } from '../errors';
import { Reader, RECURSION_LIMIT } from '../reader';
import { makeTag, tagFieldNumber, tagWireType, WireType } from '../wire';
import { Writer } from '../writer';

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join(' ');
}

describe('wire tags', () => {
  it('should combine field number and wire type', () => {
    expect(makeTag(1, WireType.Varint)).toBe(8);
    expect(makeTag(2, WireType.LengthDelimited)).toBe(18);
    expect(tagFieldNumber(18)).toBe(2);
    expect(tagWireType(18)).toBe(WireType.LengthDelimited);
  });

  it('should keep tags of the largest field number unsigned', () => {
    const tag = makeTag(536870911, WireType.Bit32);
    expect(tag).toBe(4294967293);
    expect(tagFieldNumber(tag)).toBe(536870911);
  });
});

describe('Writer', () => {
  it('should write varints', () => {
    expect(hex(new Writer().uint32(8).int32(150).finish())).toBe('08 96 01');
  });

  it('should sign-extend negative int32 to ten bytes', () => {
    expect(hex(new Writer().int32(-1).finish())).toBe('ff ff ff ff ff ff ff ff ff 01');
  });

  it('should zigzag encode sint32 and sint64', () => {
    expect(hex(new Writer().sint32(-1).sint32(1).sint32(-2).finish())).toBe('01 02 03');
    expect(hex(new Writer().sint64(BigInt(-1)).sint64(BigInt(2)).finish())).toBe('01 04');
  });

  it('should write fixed-width values little endian', () => {
    expect(hex(new Writer().fixed32(1).finish())).toBe('01 00 00 00');
    expect(hex(new Writer().sfixed64(BigInt(-2)).finish())).toBe('fe ff ff ff ff ff ff ff');
    expect(hex(new Writer().double(1).finish())).toBe('00 00 00 00 00 00 f0 3f');
  });

  it('should length-prefix strings as UTF-8', () => {
    expect(hex(new Writer().string('hi').finish())).toBe('02 68 69');
    expect(hex(new Writer().string('é').finish())).toBe('02 c3 a9');
  });

  it('should insert the length of forked sections', () => {
    const bytes = new Writer().uint32(10).fork().uint32(8).int32(1).ldelim().finish();
    expect(hex(bytes)).toBe('0a 02 08 01');
  });

  it('should handle sections longer than 127 bytes', () => {
    const writer = new Writer(4).uint32(10).fork();
    writer.raw(new Uint8Array(200));
    const bytes = writer.ldelim().finish();
    expect(bytes.length).toBe(203);
    expect(hex(bytes.subarray(0, 3))).toBe('0a c8 01');
  });

  it('should keep a short section intact when its prefix lands at the buffer edge', () => {
    const writer = new Writer().raw(new Uint8Array(60));
    writer.fork().raw(new Uint8Array([0x08, 0x07])).ldelim();
    const bytes = writer.finish();
    expect(bytes.length).toBe(63);
    expect(hex(bytes.subarray(60))).toBe('02 08 07');
  });

  it('should keep nested sections intact across buffer growth', () => {
    const writer = new Writer(8).uint32(10).fork().uint32(18).fork();
    writer.raw(new Uint8Array([1, 2, 3, 4, 5, 6]));
    const bytes = writer.ldelim().ldelim().finish();
    expect(hex(bytes)).toBe('0a 08 12 06 01 02 03 04 05 06');
  });

  it('should reject unbalanced forks', () => {
    expect(() => new Writer().ldelim()).toThrow('ldelim() called without a matching fork()');
    expect(() => new Writer().fork().finish()).toThrow('1 fork() call(s) were never closed with ldelim()');
  });
});

describe('Reader', () => {
  it('should read back what the writer wrote', () => {
    const bytes = new Writer()
      .int32(-5)
      .uint32(300)
      .sint32(-70)
      .int64(BigInt(-1))
      .uint64(BigInt('18446744073709551615'))
      .bool(true)
      .float(1.5)
      .fixed64(BigInt(7))
      .string('wire')
      .bytes(new Uint8Array([1, 2, 3]))
      .finish();
    const reader = new Reader(bytes);

    expect(reader.int32()).toBe(-5);
    expect(reader.uint32()).toBe(300);
    expect(reader.sint32()).toBe(-70);
    expect(reader.int64()).toBe(BigInt(-1));
    expect(reader.uint64()).toBe(BigInt('18446744073709551615'));
    expect(reader.bool()).toBe(true);
    expect(reader.float()).toBe(1.5);
    expect(reader.fixed64()).toBe(BigInt(7));
    expect(reader.string()).toBe('wire');
    expect(Array.from(reader.bytes())).toEqual([1, 2, 3]);
    expect(reader.pos).toBe(reader.end);
  });

  it('should fail on truncated input', () => {
    expect(() => new Reader(new Uint8Array([0x80])).uint32()).toThrow(DecodeError);
    expect(() => new Reader(new Uint8Array([0x01, 0x02])).fixed32()).toThrow('Unexpected end of input');
  });

  it('should fail on varints longer than ten bytes', () => {
    const bytes = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01]);
    expect(() => new Reader(bytes).uint64()).toThrow('Varint is longer than 10 bytes');
  });

  it('should reject a ten-byte varint that overflows 64 bits', () => {
    const bytes = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x02]);
    expect(() => new Reader(bytes).uint64()).toThrow('Varint overflows 64 bits');
  });

  it('should reject tags wider than 32 bits instead of truncating them', () => {
    // would read as tag 8 (field 1, varint) if the high bits were dropped
    const reader = new Reader(new Uint8Array([0x88, 0x80, 0x80, 0x80, 0x10]));
    expect(() => reader.tag()).toThrow('Tag does not fit in 32 bits');
  });

  it('should reject field number 0 and unused wire types', () => {
    expect(() => new Reader(new Uint8Array([0x00])).tag()).toThrow('Invalid field number 0');
    expect(() => new Reader(new Uint8Array([0x0f])).tag()).toThrow('Invalid wire type 7');
  });

  it('should reject lengths beyond the input', () => {
    expect(() => new Reader(new Uint8Array([0x05, 0x61])).string()).toThrow(
      'Length-delimited field exceeds the input'
    );
  });

  it('should reject invalid UTF-8', () => {
    expect(() => new Reader(new Uint8Array([0x01, 0xff])).string()).toThrow('Invalid UTF-8 in string field');
  });

  it('should skip every wire type, groups included', () => {
    // varint, fixed64, length-delimited, fixed32, group 5 containing a varint field
    const bytes = new Uint8Array([
      0x08, 0x01,
      0x11, 1, 2, 3, 4, 5, 6, 7, 8,
      0x1a, 0x01, 0x61,
      0x25, 1, 2, 3, 4,
      0x2b, 0x08, 0x01, 0x2c
    ]);
    const reader = new Reader(bytes);
    while (reader.pos < reader.end) {
      const tag = reader.tag();
      reader.skip(tag & 7, tag >>> 3);
    }
    expect(reader.pos).toBe(bytes.length);
  });

  it('should reject a group closed by another field number', () => {
    const reader = new Reader(new Uint8Array([0x2b, 0x34]));
    const tag = reader.tag();
    expect(() => reader.skip(tag & 7, tag >>> 3)).toThrow('Mismatched end-group tag for field 5');
  });

  it('should read packed elements up to the field boundary', () => {
    const bytes = new Writer().fork().int32(1).int32(2).int32(300).ldelim().finish();
    const reader = new Reader(bytes);
    expect(reader.packed(() => reader.int32())).toEqual([1, 2, 300]);
    expect(reader.pos).toBe(5);
  });

  describe('message nesting', () => {
    const nest = (levels: number): Uint8Array => {
      let inner = new Uint8Array(0);
      for (let i = 0; i < levels; i++) {
        inner = new Writer().uint32(10).bytes(inner).finish();
      }
      return inner;
    };
    const decode = (reader: Reader, length: number): number => {
      const end = reader.pos + length;
      let depth = 0;
      while (reader.pos < end) {
        reader.tag();
        depth = Math.max(depth, reader.message(decode) + 1);
      }
      return depth;
    };

    it('should accept the maximum depth', () => {
      const bytes = nest(RECURSION_LIMIT);
      expect(decode(new Reader(bytes), bytes.length)).toBe(RECURSION_LIMIT);
    });

    it('should reject deeper nesting', () => {
      const bytes = nest(RECURSION_LIMIT + 1);
      expect(() => decode(new Reader(bytes), bytes.length)).toThrow(`Message nesting exceeds ${RECURSION_LIMIT} levels`);
    });
  });
});
