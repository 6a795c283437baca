import type { BytesLike } from '../bytes';
import { Reader } from '../Reader';
import { Result } from '../Result';
import { LayoutBuilder, type LayoutNode } from './LayoutBuilder';
import type { LayoutDecoder } from './LayoutDecoder';
import { LayoutError } from './LayoutError';

/**
 * High-level decoder that wraps a layout definition.
 * Decodes byte buffers or hex strings into plain values.
 */
export class LayoutCodec {
  private readonly _decoder: LayoutDecoder;

  constructor(layout: LayoutNode) {
    this._decoder = LayoutBuilder.build(layout);
  }

  /** Decode a whole buffer. */
  decode(data: BytesLike): Result<unknown> {
    return this._decoder.decode(new Reader(data));
  }

  /**
   * Decode from the reader's position. On failure the reader does not move,
   * even if part of the layout had already decoded.
   */
  decodeFrom(reader: Reader): Result<unknown> {
    const trial = new Reader(reader.chunk());
    const result = this._decoder.decode(trial);
    if (result instanceof Result.Ok) reader.skip(trial.consumed);
    return result;
  }

  /** Decode a hex string. Whitespace is ignored. */
  decodeFromHex(hex: string): Result<unknown> {
    return this.decode(hexToBytes(hex));
  }

  /** Decode a whole buffer, throwing EndOfInput on truncated input. */
  decodeOrThrow(data: BytesLike): unknown {
    return this.decode(data).unwrap();
  }

  /** Access the underlying built decoder. */
  get decoder(): LayoutDecoder {
    return this._decoder;
  }
}

/** Parse a hex string into bytes. Throws LayoutError on malformed input. */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new LayoutError(`Invalid hex string of length ${clean.length}`);
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
