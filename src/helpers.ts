/** Byte order used when reassembling a multi-byte integer. */
export type Endian = 'be' | 'le' | 'ne';

/** True when the executing platform stores integers least-significant byte first. */
export const NATIVE_LITTLE_ENDIAN: boolean = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

/** Resolve 'ne' to the platform's byte order. */
export function isLittleEndian(endian: Endian): boolean {
  if (endian === 'ne') return NATIVE_LITTLE_ENDIAN;
  return endian === 'le';
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Reinterpret an unsigned byte (0..255) as a two's-complement i8. */
export function byteToInt8(byte: number): number {
  return (byte << 24) >> 24;
}

/** Assemble 2 bytes into an unsigned 16-bit integer. */
export function bytesToUint16(bytes: Uint8Array, littleEndian: boolean): number {
  return viewOf(bytes).getUint16(0, littleEndian);
}

/** Assemble 2 bytes into a signed 16-bit integer. */
export function bytesToInt16(bytes: Uint8Array, littleEndian: boolean): number {
  return viewOf(bytes).getInt16(0, littleEndian);
}

/** Assemble 4 bytes into an unsigned 32-bit integer. */
export function bytesToUint32(bytes: Uint8Array, littleEndian: boolean): number {
  return viewOf(bytes).getUint32(0, littleEndian);
}

/** Assemble 4 bytes into a signed 32-bit integer. */
export function bytesToInt32(bytes: Uint8Array, littleEndian: boolean): number {
  return viewOf(bytes).getInt32(0, littleEndian);
}

/** Assemble 8 bytes into an unsigned 64-bit integer. */
export function bytesToBigUint64(bytes: Uint8Array, littleEndian: boolean): bigint {
  return viewOf(bytes).getBigUint64(0, littleEndian);
}

/** Assemble 8 bytes into a signed 64-bit integer. */
export function bytesToBigInt64(bytes: Uint8Array, littleEndian: boolean): bigint {
  return viewOf(bytes).getBigInt64(0, littleEndian);
}

/**
 * Assemble 16 bytes into an unsigned 128-bit integer.
 * There is no 128-bit DataView accessor, so the two 64-bit halves are joined.
 */
export function bytesToBigUint128(bytes: Uint8Array, littleEndian: boolean): bigint {
  const view = viewOf(bytes);
  const first = view.getBigUint64(0, littleEndian);
  const second = view.getBigUint64(8, littleEndian);
  return littleEndian ? (second << 64n) | first : (first << 64n) | second;
}

/** Assemble 16 bytes into a signed 128-bit integer. */
export function bytesToBigInt128(bytes: Uint8Array, littleEndian: boolean): bigint {
  return BigInt.asIntN(128, bytesToBigUint128(bytes, littleEndian));
}

/**
 * Whether `len` is a length a read could ever satisfy:
 * a non-negative safe integer.
 */
export function isValidLength(len: number): boolean {
  return Number.isSafeInteger(len) && len >= 0;
}
