import type { Reader } from '../Reader';
import type { Result } from '../Result';

/** Anything that can lend out a mutable Reader: a Reader itself, or a wrapper around one. */
export interface ReaderLike {
  asReader(): Reader;
}

/**
 * A type with a single-byte representation.
 * @template T The decoded TypeScript value.
 */
export interface Decode<T> {
  /** Number of bytes one value occupies. */
  readonly size: number;

  /** Consume exactly `size` bytes, or fail without consuming any. */
  decode(source: ReaderLike): Result<T>;
}

/**
 * A multi-byte type whose representation depends on byte order.
 * @template T The decoded TypeScript value.
 */
export interface DecodeEndian<T> {
  readonly size: number;

  /** Decode in little-endian byte order. */
  decodeLe(source: ReaderLike): Result<T>;

  /** Decode in big-endian byte order. */
  decodeBe(source: ReaderLike): Result<T>;

  /** Decode in the executing platform's byte order. */
  decodeNe(source: ReaderLike): Result<T>;
}
