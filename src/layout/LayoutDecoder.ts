import { EndOfInput } from '../EndOfInput';
import type { Reader } from '../Reader';
import { Result } from '../Result';
import type { Decode, DecodeEndian } from '../decode/Decode';
import type { Endian } from '../helpers';

/** Values of the integer fields decoded so far in the enclosing struct. */
export type LayoutScope = ReadonlyMap<string, number | bigint>;

const EMPTY_SCOPE: LayoutScope = new Map();

/**
 * Decodes one layout node from a Reader.
 * Returns the first EndOfInput met, unchanged.
 */
export interface LayoutDecoder<T = unknown> {
  /** Fewest bytes a successful decode consumes. */
  readonly minSize: number;

  decode(reader: Reader, scope?: LayoutScope): Result<T>;
}

/** A length fixed in the layout, or the value of an earlier integer field. */
export type LengthSource = { kind: 'fixed'; value: number } | { kind: 'field'; name: string };

/**
 * Resolve a length against the scope.
 * Returns undefined for a value no read could satisfy (negative, or beyond safe integers).
 */
function resolveLength(source: LengthSource, scope: LayoutScope): number | undefined {
  if (source.kind === 'fixed') return source.value;
  const value = scope.get(source.name);
  if (value === undefined) return undefined;
  if (typeof value === 'bigint') {
    if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) return undefined;
    return Number(value);
  }
  return value >= 0 ? value : undefined;
}

function endOfInput(): Result.Err<EndOfInput> {
  return new Result.Err(new EndOfInput());
}

/** Single-byte integer field. */
export class ByteFieldDecoder implements LayoutDecoder<number> {
  readonly minSize = 1;
  private readonly _decoder: Decode<number>;

  constructor(decoder: Decode<number>) {
    this._decoder = decoder;
  }

  decode(reader: Reader): Result<number> {
    return this._decoder.decode(reader);
  }
}

/** Multi-byte integer field in a fixed byte order. */
export class IntegerFieldDecoder<T extends number | bigint> implements LayoutDecoder<T> {
  readonly minSize: number;
  private readonly _decoder: DecodeEndian<T>;
  private readonly _endian: Endian;

  constructor(decoder: DecodeEndian<T>, endian: Endian) {
    this._decoder = decoder;
    this._endian = endian;
    this.minSize = decoder.size;
  }

  decode(reader: Reader): Result<T> {
    switch (this._endian) {
      case 'le':
        return this._decoder.decodeLe(reader);
      case 'ne':
        return this._decoder.decodeNe(reader);
      default:
        return this._decoder.decodeBe(reader);
    }
  }
}

/** Raw bytes, returned as a view over the source. */
export class BytesFieldDecoder implements LayoutDecoder<Uint8Array> {
  readonly minSize: number;
  private readonly _length: LengthSource;

  constructor(length: LengthSource) {
    this._length = length;
    this.minSize = length.kind === 'fixed' ? length.value : 0;
  }

  decode(reader: Reader, scope: LayoutScope = EMPTY_SCOPE): Result<Uint8Array> {
    const len = resolveLength(this._length, scope);
    if (len === undefined) return endOfInput();
    return reader.readBytes(len);
  }
}

/** Padding. Must be present in full; decodes to nothing. */
export class SkipFieldDecoder implements LayoutDecoder<undefined> {
  readonly minSize: number;
  private readonly _length: number;

  constructor(length: number) {
    this._length = length;
    this.minSize = length;
  }

  decode(reader: Reader): Result<undefined> {
    return Result.map(reader.readSlice(this._length), () => undefined);
  }
}

/** Everything left in the reader. */
export class RestFieldDecoder implements LayoutDecoder<Uint8Array> {
  readonly minSize = 0;

  decode(reader: Reader): Result<Uint8Array> {
    return new Result.Ok(reader.readToEnd());
  }
}

export interface StructField {
  name: string;
  decoder: LayoutDecoder;
  /** Left out of the decoded value (padding). */
  hidden?: boolean;
}

/** Named fields decoded in order. Integer fields become the scope of later lengths. */
export class StructDecoder implements LayoutDecoder<Record<string, unknown>> {
  readonly minSize: number;
  private readonly _fields: StructField[];

  constructor(fields: StructField[]) {
    this._fields = fields;
    this.minSize = fields.reduce((sum, field) => sum + field.decoder.minSize, 0);
  }

  decode(reader: Reader): Result<Record<string, unknown>> {
    const value: Record<string, unknown> = {};
    const scope = new Map<string, number | bigint>();
    for (const field of this._fields) {
      const result = field.decoder.decode(reader, scope);
      if (result instanceof Result.Err) return result;
      const fieldValue = result.ok;
      if (typeof fieldValue === 'number' || typeof fieldValue === 'bigint') {
        scope.set(field.name, fieldValue);
      }
      // Own data property, so a field named "__proto__" does not reach the prototype setter.
      if (!field.hidden) {
        Object.defineProperty(value, field.name, { value: fieldValue, enumerable: true, writable: true, configurable: true });
      }
    }
    return new Result.Ok(value);
  }
}

/** `count` items decoded back to back. */
export class ArrayDecoder implements LayoutDecoder<unknown[]> {
  readonly minSize: number;
  private readonly _count: LengthSource;
  private readonly _item: LayoutDecoder;

  constructor(count: LengthSource, item: LayoutDecoder) {
    this._count = count;
    this._item = item;
    this.minSize = count.kind === 'fixed' ? count.value * item.minSize : 0;
  }

  decode(reader: Reader, scope: LayoutScope = EMPTY_SCOPE): Result<unknown[]> {
    const count = resolveLength(this._count, scope);
    if (count === undefined) return endOfInput();
    // Items consume at least minSize each, so a count the input cannot hold fails up front.
    if (!reader.hasRemaining(count * this._item.minSize)) return endOfInput();
    const items: unknown[] = [];
    for (let i = 0; i < count; i++) {
      const result = this._item.decode(reader, scope);
      if (result instanceof Result.Err) return result;
      items.push(result.ok);
    }
    return new Result.Ok(items);
  }
}

/**
 * A layout decoded from a sub-reader of `length` bytes.
 * The parent moves past all `length` bytes whatever the inner layout consumes.
 */
export class SubDecoder implements LayoutDecoder {
  readonly minSize: number;
  private readonly _length: LengthSource;
  private readonly _inner: LayoutDecoder;

  constructor(length: LengthSource, inner: LayoutDecoder) {
    this._length = length;
    this._inner = inner;
    this.minSize = length.kind === 'fixed' ? length.value : 1;
  }

  decode(reader: Reader, scope: LayoutScope = EMPTY_SCOPE): Result<unknown> {
    const len = resolveLength(this._length, scope);
    if (len === undefined) return endOfInput();
    const sub = reader.subreader(len);
    if (sub instanceof Result.Err) return sub;
    return this._inner.decode(sub.ok, scope);
  }
}
