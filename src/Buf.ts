import type { Decode, DecodeEndian } from './decode/Decode';
import type { Endian } from './helpers';
import { Reader } from './Reader';

/**
 * A consumable byte buffer, for decoding code that is generic over
 * where its bytes come from. Implementations may throw on underflow.
 */
export interface Buf {
  /** Bytes left to consume. */
  readonly remaining: number;

  /** The unread bytes, without consuming them. */
  chunk(): Uint8Array;

  /** Consume `cnt` bytes. */
  advance(cnt: number): void;

  /** Consume `len` bytes and return them. Throws if fewer remain. */
  copyToBytes(len: number): Uint8Array;
}

/** Fill `target` from `buf`. Throws EndOfInput if `buf` is too short. */
export function copyToSlice(buf: Buf, target: Uint8Array): void {
  target.set(buf.copyToBytes(target.length));
}

/** Consume one single-byte value from `buf`. Throws EndOfInput on underflow. */
export function getDecoded<T>(buf: Buf, decoder: Decode<T>): T {
  return decoder.decode(new Reader(buf.copyToBytes(decoder.size))).unwrap();
}

/** Consume one multi-byte value from `buf` in the given byte order. Throws EndOfInput on underflow. */
export function getDecodedEndian<T>(buf: Buf, decoder: DecodeEndian<T>, endian: Endian = 'be'): T {
  const reader = new Reader(buf.copyToBytes(decoder.size));
  switch (endian) {
    case 'le':
      return decoder.decodeLe(reader).unwrap();
    case 'ne':
      return decoder.decodeNe(reader).unwrap();
    default:
      return decoder.decodeBe(reader).unwrap();
  }
}
