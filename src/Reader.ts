import { EMPTY_BYTES, toBytes, type BytesLike } from './bytes';
import { EndOfInput } from './EndOfInput';
import { Result } from './Result';
import { byteToInt8, isValidLength } from './helpers';
import { U16, U32, U64, U128, I16, I32, I64, I128 } from './decode/IntegerDecoders';
import type { ReaderLike } from './decode/Decode';
import { ReaderMayPanic } from './ReaderMayPanic';

/**
 * Forward-only cursor over an immutable byte source.
 *
 * Every read either succeeds completely, advancing by exactly the amount
 * requested, or returns `Result.Err(EndOfInput)` and leaves the position
 * where it was. Nothing here throws on short input.
 */
export class Reader implements ReaderLike {
  private _index: number;
  private readonly _inner: Uint8Array;

  /** Adopt `bytes` as the source. Typed arrays and ArrayBuffers are not copied. */
  constructor(bytes: BytesLike) {
    this._index = 0;
    this._inner = toBytes(bytes);
  }

  static from(bytes: BytesLike): Reader {
    return new Reader(bytes);
  }

  /** Bytes not yet read. */
  get remaining(): number {
    return Math.max(this._inner.length - this._index, 0);
  }

  /** Bytes read so far. */
  get consumed(): number {
    return this._index;
  }

  /** True if at least `len` bytes are unread. */
  hasRemaining(len: number): boolean {
    return this.remaining >= len;
  }

  asReader(): Reader {
    return this;
  }

  /**
   * Skip `amt` bytes. Skipping past the end stops at the end; skip never fails.
   */
  skip(amt: number): void {
    this.increment(amt);
  }

  /** True if another byte remains and it equals `val`. Does not advance. */
  peek(val: number): boolean {
    if (!this.hasRemaining(1)) return false;
    return this._inner[this._index] === val;
  }

  /** View of every unread byte. Does not advance. */
  chunk(): Uint8Array {
    return this._inner.subarray(this._index);
  }

  /**
   * Return the rest of the unread data and move to the end.
   *
   * When nothing is left the shared {@link EMPTY_BYTES} is returned
   * rather than a view that would keep the source alive.
   */
  readToEnd(): Uint8Array {
    if (this._index === this._inner.length) {
      return EMPTY_BYTES;
    }
    const rest = this._inner.subarray(this._index);
    this._index = this._inner.length;
    return rest;
  }

  /**
   * Return a Reader over the next `len` bytes and advance this one past them.
   * A zero-length sub-reader is refused with EndOfInput.
   */
  subreader(len: number): Result<Reader> {
    if (len === 0) return new Result.Err(new EndOfInput());
    return Result.map(this.readBytes(len), bytes => new Reader(bytes));
  }

  /** Read a single byte. Identical to {@link readU8}. */
  readByte(): Result<number> {
    if (!this.hasRemaining(1)) return new Result.Err(new EndOfInput());
    const byte = this._inner[this._index];
    this.increment(1);
    return new Result.Ok(byte);
  }

  /**
   * Return the next `len` bytes and advance.
   * The result shares storage with the source and may outlive this Reader.
   */
  readBytes(len: number): Result<Uint8Array> {
    if (!isValidLength(len) || !this.hasRemaining(len)) return new Result.Err(new EndOfInput());
    const start = this._index;
    this.increment(len);
    return new Result.Ok(this._inner.subarray(start, start + len));
  }

  /**
   * Return the next `len` bytes as a borrowed view and advance.
   * The view is always exactly `len` long. Treat it as read-only and
   * copy it before the source can be reused.
   */
  readSlice(len: number): Result<Uint8Array> {
    return this.readBytes(len);
  }

  /** Copy the next `len` bytes into a new array and advance. */
  readArray(len: number): Result<Uint8Array> {
    return Result.map(this.readSlice(len), slice => slice.slice());
  }

  /**
   * Copy as many unread bytes as fit into `target`, advancing by that many.
   * Returns the count copied; 0 once the source is exhausted.
   */
  readInto(target: Uint8Array): number {
    const amt = Math.min(this.remaining, target.length);
    if (amt === 0) return 0;
    target.set(this._inner.subarray(this._index, this._index + amt));
    this.increment(amt);
    return amt;
  }

  /**
   * Wrap this Reader in a {@link ReaderMayPanic}.
   * The no-throw guarantee does not hold for the wrapper's extra methods.
   */
  mayPanic(): ReaderMayPanic {
    return new ReaderMayPanic(this);
  }

  // Integer readers. All big-endian.

  /** Read a `u8`. Identical to {@link readByte}. */
  readU8(): Result<number> {
    return this.readByte();
  }

  readI8(): Result<number> {
    return Result.map(this.readU8(), byteToInt8);
  }

  readU16(): Result<number> {
    return U16.decodeBe(this);
  }

  readU32(): Result<number> {
    return U32.decodeBe(this);
  }

  readU64(): Result<bigint> {
    return U64.decodeBe(this);
  }

  readU128(): Result<bigint> {
    return U128.decodeBe(this);
  }

  readI16(): Result<number> {
    return I16.decodeBe(this);
  }

  readI32(): Result<number> {
    return I32.decodeBe(this);
  }

  readI64(): Result<bigint> {
    return I64.decodeBe(this);
  }

  readI128(): Result<bigint> {
    return I128.decodeBe(this);
  }

  private increment(amt: number): void {
    if (!(amt > 0)) return;
    this._index = Math.min(this._index + amt, this._inner.length);
  }
}
