/**
 * Anything a Reader can adopt as its byte source.
 * Typed arrays, DataViews and ArrayBuffers are wrapped without copying;
 * a plain number array is copied once.
 */
export type BytesLike = Uint8Array | ArrayBufferLike | ArrayBufferView | readonly number[];

/** Shared zero-length source. Never retains another buffer's storage. */
export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);

function isNumberArray(bytes: ArrayBufferLike | readonly number[]): bytes is readonly number[] {
  return Array.isArray(bytes);
}

/** Convert a BytesLike to a Uint8Array, sharing storage wherever possible. */
export function toBytes(bytes: BytesLike): Uint8Array {
  if (bytes instanceof Uint8Array) return bytes;
  if (ArrayBuffer.isView(bytes)) {
    return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }
  if (isNumberArray(bytes)) return Uint8Array.from(bytes);
  return new Uint8Array(bytes);
}

/** Format bytes as a lowercase hex string. */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}
