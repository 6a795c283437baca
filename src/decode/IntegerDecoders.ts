import { Result } from '../Result';
import {
  NATIVE_LITTLE_ENDIAN,
  byteToInt8,
  bytesToUint16,
  bytesToInt16,
  bytesToUint32,
  bytesToInt32,
  bytesToBigUint64,
  bytesToBigInt64,
  bytesToBigUint128,
  bytesToBigInt128,
} from '../helpers';
import type { Decode, DecodeEndian, ReaderLike } from './Decode';

/** Single-byte decoder. Reads one byte and maps it to a value. */
export class ByteDecoder implements Decode<number> {
  readonly size = 1;
  private readonly _fromByte: (byte: number) => number;

  constructor(fromByte: (byte: number) => number) {
    this._fromByte = fromByte;
  }

  decode(source: ReaderLike): Result<number> {
    return Result.map(source.asReader().readByte(), this._fromByte);
  }
}

/**
 * Fixed-width integer decoder. Reads `size` bytes as one array and
 * reassembles them in the requested byte order.
 */
export class FixedWidthDecoder<T extends number | bigint> implements DecodeEndian<T> {
  readonly size: number;
  private readonly _assemble: (bytes: Uint8Array, littleEndian: boolean) => T;

  constructor(size: number, assemble: (bytes: Uint8Array, littleEndian: boolean) => T) {
    this.size = size;
    this._assemble = assemble;
  }

  decodeLe(source: ReaderLike): Result<T> {
    return this.decodeWith(source, true);
  }

  decodeBe(source: ReaderLike): Result<T> {
    return this.decodeWith(source, false);
  }

  decodeNe(source: ReaderLike): Result<T> {
    return this.decodeWith(source, NATIVE_LITTLE_ENDIAN);
  }

  private decodeWith(source: ReaderLike, littleEndian: boolean): Result<T> {
    return Result.map(source.asReader().readArray(this.size), bytes => this._assemble(bytes, littleEndian));
  }
}

export const U8 = new ByteDecoder(byte => byte);
export const I8 = new ByteDecoder(byteToInt8);

export const U16 = new FixedWidthDecoder<number>(2, bytesToUint16);
export const U32 = new FixedWidthDecoder<number>(4, bytesToUint32);
export const U64 = new FixedWidthDecoder<bigint>(8, bytesToBigUint64);
export const U128 = new FixedWidthDecoder<bigint>(16, bytesToBigUint128);

export const I16 = new FixedWidthDecoder<number>(2, bytesToInt16);
export const I32 = new FixedWidthDecoder<number>(4, bytesToInt32);
export const I64 = new FixedWidthDecoder<bigint>(8, bytesToBigInt64);
export const I128 = new FixedWidthDecoder<bigint>(16, bytesToBigInt128);
