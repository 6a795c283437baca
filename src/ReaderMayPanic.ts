import type { Buf } from './Buf';
import type { ReaderLike } from './decode/Decode';
import type { Reader } from './Reader';

/**
 * A use of a {@link Reader} that may throw, exposing the {@link Buf}
 * interface in return.
 *
 * Position and bounds are the wrapped Reader's; the wrapper keeps no state
 * of its own. Only {@link copyToBytes} can throw: it throws the
 * EndOfInput that the plain Reader would have returned. Check
 * {@link hasRemaining} first where that matters.
 */
export class ReaderMayPanic implements Buf, ReaderLike {
  private readonly _reader: Reader;

  constructor(reader: Reader) {
    this._reader = reader;
  }

  /** The wrapped Reader. */
  get reader(): Reader {
    return this._reader;
  }

  get remaining(): number {
    return this._reader.remaining;
  }

  get consumed(): number {
    return this._reader.consumed;
  }

  hasRemaining(len: number): boolean {
    return this._reader.hasRemaining(len);
  }

  asReader(): Reader {
    return this._reader;
  }

  chunk(): Uint8Array {
    return this._reader.chunk();
  }

  /** Advance by `cnt`, stopping at the end like {@link Reader.skip}. */
  advance(cnt: number): void {
    this._reader.skip(cnt);
  }

  copyToBytes(len: number): Uint8Array {
    return this._reader.readBytes(len).unwrap();
  }
}
