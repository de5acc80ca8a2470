/**
 * Shape of the codec object generated for every message
 */

import { DecodeError } from './errors';
import { Reader } from './reader';
import { Writer } from './writer';

export interface MessageCodec<T> {
  /** A message with every field at its default, overridden by `init` */
  create(init?: Partial<T>): T;
  /** Append the message to `writer` (a new one by default) and return it */
  encode(message: T, writer?: Writer): Writer;
  /**
   * Decode from bytes, or from a reader positioned at the message's first
   * field when `length` is given. Throws DecodeError on malformed input.
   */
  decode(input: Uint8Array | Reader, length?: number): T;
  toBinary(message: T): Uint8Array;
  fromBinary(bytes: Uint8Array): T;
}

/** Message type carried by a codec */
export type MessageOf<C> = C extends MessageCodec<infer T> ? T : never;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

/**
 * Decode without throwing on malformed input. Errors other than DecodeError
 * still propagate.
 */
export function tryDecode<T>(codec: MessageCodec<T>, bytes: Uint8Array): DecodeResult<T> {
  try {
    return { ok: true, value: codec.fromBinary(bytes) };
  } catch (error) {
    if (error instanceof DecodeError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Check the reader stopped exactly at the end of the message being decoded
 */
export function checkEnd(reader: Reader, end: number): void {
  if (reader.pos !== end) {
    throw new DecodeError('Field crosses the end of its enclosing message', reader.pos);
  }
}
