import { Readable, type ReadableOptions } from 'stream';
import type { Reader } from '../Reader';

export interface ReaderStreamOptions extends ReadableOptions {
  /** Largest chunk pushed per read. Defaults to 16384. */
  chunkSize?: number;
}

/**
 * Node Readable over the unread bytes of a {@link Reader}.
 * Pulls with {@link Reader.readInto} and ends once it copies nothing.
 */
export class ReaderStream extends Readable {
  private readonly _reader: Reader;
  private readonly _chunkSize: number;

  constructor(reader: Reader, options?: ReaderStreamOptions) {
    const { chunkSize, ...readableOptions }: ReaderStreamOptions = options ?? {};
    super(readableOptions);
    this._reader = reader;
    this._chunkSize = chunkSize ?? 16384;
    if (!Number.isSafeInteger(this._chunkSize) || this._chunkSize <= 0) {
      throw new RangeError(`ReaderStream: chunkSize must be a positive integer, got ${this._chunkSize}`);
    }
  }

  _read(size: number): void {
    const target = new Uint8Array(Math.max(1, Math.min(size, this._chunkSize)));
    const copied = this._reader.readInto(target);
    this.push(copied === 0 ? null : target.subarray(0, copied));
  }
}
