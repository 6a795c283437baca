export { Reader } from './Reader';
export { ReaderMayPanic } from './ReaderMayPanic';
export type { Buf } from './Buf';
export { copyToSlice, getDecoded, getDecodedEndian } from './Buf';
export { EndOfInput, isEndOfInput } from './EndOfInput';
export { Result } from './Result';
export { EMPTY_BYTES, toBytes, toHex } from './bytes';
export type { BytesLike } from './bytes';
export { NATIVE_LITTLE_ENDIAN } from './helpers';
export type { Endian } from './helpers';
export type { Decode, DecodeEndian, ReaderLike } from './decode/Decode';
export {
  ByteDecoder,
  FixedWidthDecoder,
  U8,
  I8,
  U16,
  U32,
  U64,
  U128,
  I16,
  I32,
  I64,
  I128,
} from './decode/IntegerDecoders';
export { ReaderStream } from './io/ReaderStream';
export type { ReaderStreamOptions } from './io/ReaderStream';
export { LayoutBuilder } from './layout/LayoutBuilder';
export type { LayoutNode, ByteType, MultiByteType } from './layout/LayoutBuilder';
export { LayoutCodec, hexToBytes } from './layout/LayoutCodec';
export type { LayoutDecoder, LayoutScope } from './layout/LayoutDecoder';
export { LayoutError } from './layout/LayoutError';
