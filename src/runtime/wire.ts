/**
 * Wire format primitives shared by the writer, the reader and the compiler
 */

export enum WireType {
  Varint = 0,
  Bit64 = 1,
  LengthDelimited = 2,
  StartGroup = 3,
  EndGroup = 4,
  Bit32 = 5
}

/**
 * Combine a field number and wire type into a tag. Unsigned, so field
 * numbers at the top of the range stay positive.
 */
export function makeTag(fieldNumber: number, wireType: WireType): number {
  return (fieldNumber * 8 + wireType) >>> 0;
}

export function tagFieldNumber(tag: number): number {
  return tag >>> 3;
}

export function tagWireType(tag: number): number {
  return tag & 7;
}
