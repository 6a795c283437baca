#!/usr/bin/env npx tsx
/**
 * CLI tool to decode a hex fixture with a layout definition.
 *
 * Usage:
 *   npx tsx cli/decode-layout.ts [layout.json] [data.hex]
 *
 * Defaults to schemas/sample-record.layout.json and
 * tests/fixtures/sample-record.hex if no arguments are given.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LayoutBuilder } from '../src/layout/LayoutBuilder';
import { LayoutCodec, hexToBytes } from '../src/layout/LayoutCodec';
import { Reader } from '../src/Reader';
import { Result } from '../src/Result';
import { toHex } from '../src/bytes';

/** Strip whitespace and a trailing 'h' suffix from a hex fixture file. */
function loadHexFixture(filePath: string): string {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return raw.replace(/\s+/g, '').replace(/h$/i, '');
}

/** Pretty-print a decoded value, showing byte arrays as hex. */
function formatValue(value: unknown, indent: number = 0): string {
  const pad = '  '.repeat(indent);
  if (value instanceof Uint8Array) {
    return `${pad}[${value.length} bytes] ${toHex(value)}`;
  }
  if (typeof value === 'bigint') {
    return `${pad}${value.toString()}`;
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return `${pad}(empty array)`;
    return value.map((item, i) => `${pad}[${i}]:\n${formatValue(item, indent + 1)}`).join('\n');
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value)
      .map(([k, v]: [string, unknown]) => {
        if (v instanceof Uint8Array || typeof v === 'bigint' || typeof v !== 'object' || v === null) {
          return `${pad}${k}: ${formatValue(v).trimStart()}`;
        }
        return `${pad}${k}:\n${formatValue(v, indent + 1)}`;
      })
      .join('\n');
  }
  return `${pad}${JSON.stringify(value)}`;
}

function main(): void {
  const layoutPath = process.argv[2]
    || path.join(__dirname, '..', 'schemas', 'sample-record.layout.json');
  const dataPath = process.argv[3]
    || path.join(__dirname, '..', 'tests', 'fixtures', 'sample-record.hex');

  for (const filePath of [layoutPath, dataPath]) {
    if (!fs.existsSync(filePath)) {
      console.error(`Error: file not found: ${filePath}`);
      process.exit(1);
    }
  }

  let codec: LayoutCodec;
  let bytes: Uint8Array;
  try {
    const json: unknown = JSON.parse(fs.readFileSync(layoutPath, 'utf-8'));
    codec = new LayoutCodec(LayoutBuilder.parse(json));
    bytes = hexToBytes(loadHexFixture(dataPath));
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }

  console.log(`=== Layout Decoder ===`);
  console.log(`Layout: ${layoutPath}`);
  console.log(`Data: ${dataPath} (${bytes.length} bytes)\n`);

  // Decode in place so a failure reports how far the layout got.
  const reader = new Reader(bytes);
  const result = codec.decoder.decode(reader);
  if (result instanceof Result.Err) {
    console.error(`Error: ${result.err.message} at byte ${reader.consumed}`);
    process.exit(1);
  }

  console.log(formatValue(result.ok));
  if (reader.remaining > 0) {
    console.log(`\n${reader.remaining} trailing byte(s) not decoded`);
  }
}

main();
