import type { Endian } from '../helpers';
import { U8, I8, U16, U32, U64, U128, I16, I32, I64, I128 } from '../decode/IntegerDecoders';
import type { DecodeEndian } from '../decode/Decode';
import {
  ArrayDecoder,
  ByteFieldDecoder,
  BytesFieldDecoder,
  IntegerFieldDecoder,
  RestFieldDecoder,
  SkipFieldDecoder,
  StructDecoder,
  SubDecoder,
  type LayoutDecoder,
  type LengthSource,
  type StructField,
} from './LayoutDecoder';
import { LayoutError } from './LayoutError';

export type ByteType = 'u8' | 'i8';
export type MultiByteType = 'u16' | 'u32' | 'u64' | 'u128' | 'i16' | 'i32' | 'i64' | 'i128';

/**
 * JSON-serializable description of a binary record.
 *
 * Lengths and counts given as a string name an earlier integer field
 * of the enclosing struct.
 *
 * Array items must consume at least one byte whatever the input, so an item
 * that may be empty (`rest`, or `bytes` whose length names a field) is rejected.
 */
export type LayoutNode =
  | { type: ByteType }
  | { type: MultiByteType; endian?: Endian }
  | { type: 'bytes'; length: number | string }
  | { type: 'skip'; length: number }
  | { type: 'rest' }
  | { type: 'struct'; fields: Array<{ name: string; layout: LayoutNode }> }
  | { type: 'array'; count: number | string; item: LayoutNode }
  | { type: 'sub'; length: number | string; layout: LayoutNode };

const MULTI_BYTE_DECODERS: Record<MultiByteType, DecodeEndian<number> | DecodeEndian<bigint>> = {
  u16: U16,
  u32: U32,
  u64: U64,
  u128: U128,
  i16: I16,
  i32: I32,
  i64: I64,
  i128: I128,
};

const MULTI_BYTE_TYPES: readonly string[] = Object.keys(MULTI_BYTE_DECODERS);

function isMultiByteType(type: string): type is MultiByteType {
  return MULTI_BYTE_TYPES.includes(type);
}

function isEndian(value: unknown): value is Endian {
  return value === 'be' || value === 'le' || value === 'ne';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Names of the integer fields a length may refer to. */
type IntegerFields = ReadonlySet<string>;

const NO_FIELDS: IntegerFields = new Set();

/**
 * Builds LayoutDecoders from layout definitions.
 */
export class LayoutBuilder {
  /**
   * Check that an untyped value (for example parsed JSON) is a LayoutNode.
   * Throws LayoutError naming the first offending path.
   */
  static parse(value: unknown, path: string = '$'): LayoutNode {
    if (!isRecord(value) || typeof value.type !== 'string') {
      throw new LayoutError(`${path}: expected an object with a string "type"`);
    }
    const type = value.type;

    if (type === 'u8' || type === 'i8') return { type };
    if (isMultiByteType(type)) {
      const endian = value.endian;
      if (endian === undefined) return { type };
      if (!isEndian(endian)) {
        throw new LayoutError(`${path}.endian: expected "be", "le" or "ne"`);
      }
      return { type, endian };
    }

    switch (type) {
      case 'bytes':
        return { type, length: parseLength(value.length, `${path}.length`) };
      case 'skip': {
        const length = parseLength(value.length, `${path}.length`);
        if (typeof length !== 'number') {
          throw new LayoutError(`${path}.length: skip length must be a number`);
        }
        return { type, length };
      }
      case 'rest':
        return { type };
      case 'struct': {
        const rawFields = value.fields;
        if (!Array.isArray(rawFields)) {
          throw new LayoutError(`${path}.fields: expected an array`);
        }
        const fields = rawFields.map((field: unknown, i: number) => {
          const fieldPath = `${path}.fields[${i}]`;
          if (!isRecord(field) || typeof field.name !== 'string') {
            throw new LayoutError(`${fieldPath}: expected an object with a string "name"`);
          }
          return { name: field.name, layout: LayoutBuilder.parse(field.layout, `${fieldPath}.layout`) };
        });
        return { type, fields };
      }
      case 'array':
        return {
          type,
          count: parseLength(value.count, `${path}.count`),
          item: LayoutBuilder.parse(value.item, `${path}.item`),
        };
      case 'sub':
        return {
          type,
          length: parseLength(value.length, `${path}.length`),
          layout: LayoutBuilder.parse(value.layout, `${path}.layout`),
        };
      default:
        throw new LayoutError(`${path}: unknown layout type "${type}"`);
    }
  }

  /** Build a decoder from a layout node. */
  static build(node: LayoutNode): LayoutDecoder {
    return buildNode(node, NO_FIELDS, '$');
  }

  /** Build decoders for a record of named layouts. */
  static buildAll(layouts: Record<string, LayoutNode>): Record<string, LayoutDecoder> {
    const result: Record<string, LayoutDecoder> = {};
    for (const [name, node] of Object.entries(layouts)) {
      result[name] = buildNode(node, NO_FIELDS, name);
    }
    return result;
  }
}

function parseLength(value: unknown, path: string): number | string {
  if (typeof value === 'string' || typeof value === 'number') return value;
  throw new LayoutError(`${path}: expected a number or a field name`);
}

function buildNode(node: LayoutNode, fields: IntegerFields, path: string): LayoutDecoder {
  switch (node.type) {
    case 'u8':
      return new ByteFieldDecoder(U8);
    case 'i8':
      return new ByteFieldDecoder(I8);
    case 'u16':
    case 'u32':
    case 'u64':
    case 'u128':
    case 'i16':
    case 'i32':
    case 'i64':
    case 'i128':
      return buildInteger(MULTI_BYTE_DECODERS[node.type], node.endian ?? 'be');
    case 'bytes':
      return new BytesFieldDecoder(lengthSource(node.length, fields, `${path}.length`));
    case 'skip':
      return new SkipFieldDecoder(fixedLength(node.length, `${path}.length`));
    case 'rest':
      return new RestFieldDecoder();
    case 'struct':
      return buildStruct(node.fields, path);
    case 'array': {
      const item = buildNode(node.item, fields, `${path}.item`);
      if (item.minSize === 0) {
        throw new LayoutError(`${path}.item: array items must consume at least one byte`);
      }
      return new ArrayDecoder(lengthSource(node.count, fields, `${path}.count`), item);
    }
    case 'sub':
      return new SubDecoder(
        lengthSource(node.length, fields, `${path}.length`),
        buildNode(node.layout, fields, `${path}.layout`),
      );
    default: {
      const unknownNode: never = node;
      throw new LayoutError(`${path}: unknown layout node ${JSON.stringify(unknownNode)}`);
    }
  }
}

function buildInteger(decoder: DecodeEndian<number> | DecodeEndian<bigint>, endian: Endian): LayoutDecoder {
  return new IntegerFieldDecoder<number | bigint>(decoder, endian);
}

function buildStruct(nodeFields: Array<{ name: string; layout: LayoutNode }>, path: string): StructDecoder {
  const integerFields = new Set<string>();
  const seen = new Set<string>();
  const fields: StructField[] = [];

  nodeFields.forEach(({ name, layout }, i) => {
    const fieldPath = `${path}.fields[${i}]`;
    if (seen.has(name)) {
      throw new LayoutError(`${fieldPath}: duplicate field name "${name}"`);
    }
    seen.add(name);
    fields.push({
      name,
      decoder: buildNode(layout, integerFields, `${fieldPath}.layout`),
      hidden: layout.type === 'skip',
    });
    if (layout.type === 'u8' || layout.type === 'i8' || isMultiByteType(layout.type)) {
      integerFields.add(name);
    }
  });

  return new StructDecoder(fields);
}

function fixedLength(value: number, path: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LayoutError(`${path}: length must be a non-negative integer, got ${value}`);
  }
  return value;
}

function lengthSource(value: number | string, fields: IntegerFields, path: string): LengthSource {
  if (typeof value === 'number') {
    return { kind: 'fixed', value: fixedLength(value, path) };
  }
  if (!fields.has(value)) {
    throw new LayoutError(`${path}: "${value}" is not an earlier integer field`);
  }
  return { kind: 'field', name: value };
}
