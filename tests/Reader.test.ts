import { Reader } from '../src/Reader';
import { Result } from '../src/Result';
import { EndOfInput } from '../src/EndOfInput';
import { EMPTY_BYTES } from '../src/bytes';

const SIXTEEN = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16];

function expectEndOfInput(result: Result<unknown>): void {
  expect(result).toBeInstanceOf(Result.Err);
  if (result instanceof Result.Err) {
    expect(result.err).toBeInstanceOf(EndOfInput);
  }
}

describe('Reader', () => {
  describe('construction', () => {
    it('starts at position 0 with every byte remaining', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3]));
      expect(reader.consumed).toBe(0);
      expect(reader.remaining).toBe(3);
    });

    it('adopts a Uint8Array without copying', () => {
      const source = new Uint8Array([1, 2, 3, 4]);
      const reader = Reader.from(source);
      const bytes = reader.readBytes(2).unwrap();
      expect(bytes.buffer).toBe(source.buffer);
    });

    it('wraps an ArrayBuffer', () => {
      const buffer = new Uint8Array([9, 8, 7]).buffer;
      const reader = new Reader(buffer);
      expect(reader.readByte().unwrap()).toBe(9);
      expect(reader.remaining).toBe(2);
    });

    it('respects the offset of a DataView', () => {
      const backing = new Uint8Array([0, 0, 0xaa, 0xbb, 0]);
      const reader = new Reader(new DataView(backing.buffer, 2, 2));
      expect(reader.remaining).toBe(2);
      expect(reader.readU16().unwrap()).toBe(0xaabb);
    });

    it('copies a plain number array', () => {
      const reader = new Reader([0x10, 0x20]);
      expect(reader.readU16().unwrap()).toBe(0x1020);
    });
  });

  describe('16-byte scenario', () => {
    it('reads bytes, slice, array and byte in sequence', () => {
      const reader = new Reader(new Uint8Array(SIXTEEN));

      expect(Array.from(reader.readBytes(5).unwrap())).toEqual([1, 2, 3, 4, 5]);
      expect(Array.from(reader.readSlice(5).unwrap())).toEqual([6, 7, 8, 9, 10]);
      expect(Array.from(reader.readArray(5).unwrap())).toEqual([11, 12, 13, 14, 15]);
      expect(reader.readByte().unwrap()).toBe(16);

      expect(reader.consumed).toBe(16);
      expect(reader.remaining).toBe(0);
      expect(reader.hasRemaining(1)).toBe(false);
    });

    it('reads the whole source with each primitive', () => {
      expect(Array.from(new Reader(new Uint8Array(SIXTEEN)).readBytes(16).unwrap())).toEqual(SIXTEEN);
      expect(Array.from(new Reader(new Uint8Array(SIXTEEN)).readSlice(16).unwrap())).toEqual(SIXTEEN);
      expect(Array.from(new Reader(new Uint8Array(SIXTEEN)).readArray(16).unwrap())).toEqual(SIXTEEN);
    });

    it('keeps remaining + consumed equal to the source length', () => {
      const reader = new Reader(new Uint8Array(SIXTEEN));
      reader.readBytes(3);
      expect(reader.remaining + reader.consumed).toBe(16);
      reader.skip(4);
      expect(reader.remaining + reader.consumed).toBe(16);
      reader.readBytes(100);
      expect(reader.remaining + reader.consumed).toBe(16);
      reader.readU32();
      expect(reader.remaining + reader.consumed).toBe(16);
      reader.skip(1000);
      expect(reader.remaining + reader.consumed).toBe(16);
    });
  });

  describe('empty reader', () => {
    it('fails readByte with EndOfInput', () => {
      const reader = new Reader(new Uint8Array(0));
      expectEndOfInput(reader.readByte());
    });

    it('peek returns false', () => {
      const reader = new Reader(new Uint8Array(0));
      expect(reader.peek(0)).toBe(false);
      expect(reader.peek(255)).toBe(false);
    });

    it('skip stays at the source length', () => {
      const reader = new Reader(new Uint8Array(0));
      reader.skip(100);
      expect(reader.consumed).toBe(0);
      expect(reader.remaining).toBe(0);
    });
  });

  describe('failed reads', () => {
    it('do not move the position', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3]));
      reader.readByte();

      expectEndOfInput(reader.readBytes(3));
      expectEndOfInput(reader.readSlice(3));
      expectEndOfInput(reader.readArray(3));
      expectEndOfInput(reader.subreader(3));
      expectEndOfInput(reader.readU32());
      expect(reader.consumed).toBe(1);

      expect(Array.from(reader.readBytes(2).unwrap())).toEqual([2, 3]);
    });

    it('reject negative and fractional lengths', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3]));
      expectEndOfInput(reader.readBytes(-1));
      expectEndOfInput(reader.readSlice(1.5));
      expectEndOfInput(reader.readArray(Number.NaN));
      expect(reader.consumed).toBe(0);
    });

    it('allow zero-length reads', () => {
      const reader = new Reader(new Uint8Array([1]));
      expect(reader.readBytes(0).unwrap().length).toBe(0);
      expect(reader.consumed).toBe(0);
    });
  });

  describe('skip', () => {
    it('advances by the given amount', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3, 4]));
      reader.skip(2);
      expect(reader.consumed).toBe(2);
      expect(reader.readByte().unwrap()).toBe(3);
    });

    it('stops at the end instead of failing', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3, 4]));
      reader.skip(1);
      reader.skip(10);
      expect(reader.consumed).toBe(4);
    });

    it('ignores negative amounts', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3, 4]));
      reader.skip(2);
      reader.skip(-1);
      expect(reader.consumed).toBe(2);
    });
  });

  describe('peek', () => {
    it('compares the byte at the current position without advancing', () => {
      const reader = new Reader(new Uint8Array([0x7f, 0x80]));
      expect(reader.peek(0x7f)).toBe(true);
      expect(reader.peek(0x80)).toBe(false);
      expect(reader.consumed).toBe(0);

      reader.skip(1);
      expect(reader.peek(0x80)).toBe(true);
    });

    it('returns false on the last byte mismatch and at the end', () => {
      const reader = new Reader(new Uint8Array([5]));
      expect(reader.peek(6)).toBe(false);
      reader.skip(1);
      expect(reader.peek(5)).toBe(false);
    });
  });

  describe('readBytes / readSlice / readArray', () => {
    it('readBytes shares storage with the source', () => {
      const source = new Uint8Array([1, 2, 3]);
      const bytes = new Reader(source).readBytes(2).unwrap();
      source[0] = 99;
      expect(bytes[0]).toBe(99);
    });

    it('readArray returns an independent copy', () => {
      const source = new Uint8Array([1, 2, 3]);
      const array = new Reader(source).readArray(2).unwrap();
      source[0] = 99;
      expect(Array.from(array)).toEqual([1, 2]);
    });

    it('readSlice returns exactly len bytes', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3, 4, 5]));
      reader.skip(1);
      const slice = reader.readSlice(3).unwrap();
      expect(slice.length).toBe(3);
      expect(Array.from(slice)).toEqual([2, 3, 4]);
    });
  });

  describe('subreader', () => {
    it('returns a reader over the next len bytes and advances the parent', () => {
      const parent = new Reader(new Uint8Array([1, 2, 3, 4, 5]));
      parent.skip(1);
      const child = parent.subreader(3).unwrap();

      expect(parent.consumed).toBe(4);
      expect(child.consumed).toBe(0);
      expect(child.remaining).toBe(3);
      expect(Array.from(child.readToEnd())).toEqual([2, 3, 4]);
      expect(parent.readByte().unwrap()).toBe(5);
    });

    it('refuses a zero-length sub-reader even when bytes remain', () => {
      const parent = new Reader(new Uint8Array([1, 2]));
      expectEndOfInput(parent.subreader(0));
      expect(parent.consumed).toBe(0);
    });

    it('keeps its own position', () => {
      const parent = new Reader(new Uint8Array([1, 2, 3, 4]));
      const child = parent.subreader(2).unwrap();
      child.readByte();
      expect(child.consumed).toBe(1);
      expect(parent.consumed).toBe(2);
      expectEndOfInput(child.readBytes(2));
    });
  });

  describe('readToEnd', () => {
    it('returns everything left and moves to the end', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3]));
      reader.skip(1);
      expect(Array.from(reader.readToEnd())).toEqual([2, 3]);
      expect(reader.remaining).toBe(0);
      expect(reader.consumed).toBe(3);
    });

    it('returns the shared empty instance when already at the end', () => {
      const reader = new Reader(new Uint8Array([1, 2]));
      reader.skip(2);
      const rest = reader.readToEnd();
      expect(rest).toBe(EMPTY_BYTES);
      expect(rest.length).toBe(0);
      expect(rest.buffer.byteLength).toBe(0);
    });
  });

  describe('readInto', () => {
    it('copies min(remaining, target length) and returns the count', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3, 4, 5]));
      const target = new Uint8Array(3);

      expect(reader.readInto(target)).toBe(3);
      expect(Array.from(target)).toEqual([1, 2, 3]);

      expect(reader.readInto(target)).toBe(2);
      expect(Array.from(target)).toEqual([4, 5, 3]);

      expect(reader.readInto(target)).toBe(0);
      expect(reader.consumed).toBe(5);
    });

    it('returns 0 for an empty target', () => {
      const reader = new Reader(new Uint8Array([1]));
      expect(reader.readInto(new Uint8Array(0))).toBe(0);
      expect(reader.consumed).toBe(0);
    });
  });

  describe('integer readers', () => {
    it('reads big-endian unsigned integers', () => {
      const reader = new Reader(new Uint8Array([
        0xff,
        0x01, 0x02,
        0x01, 0x02, 0x03, 0x04,
        0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08,
      ]));
      expect(reader.readU8().unwrap()).toBe(255);
      expect(reader.readU16().unwrap()).toBe(0x0102);
      expect(reader.readU32().unwrap()).toBe(0x01020304);
      expect(reader.readU64().unwrap()).toBe(0x0102030405060708n);
      expect(reader.remaining).toBe(0);
    });

    it('reads big-endian signed integers', () => {
      const reader = new Reader(new Uint8Array([
        0xff,
        0xff, 0xfe,
        0x80, 0x00, 0x00, 0x00,
        0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfd,
      ]));
      expect(reader.readI8().unwrap()).toBe(-1);
      expect(reader.readI16().unwrap()).toBe(-2);
      expect(reader.readI32().unwrap()).toBe(-2147483648);
      expect(reader.readI64().unwrap()).toBe(-3n);
    });

    it('reads 128-bit integers', () => {
      const bytes = new Uint8Array(16).fill(0xff);
      expect(new Reader(bytes).readU128().unwrap()).toBe((1n << 128n) - 1n);
      expect(new Reader(bytes).readI128().unwrap()).toBe(-1n);

      const one = new Uint8Array(16);
      one[15] = 1;
      expect(new Reader(one).readU128().unwrap()).toBe(1n);
    });

    it('fails without consuming a partial width', () => {
      const reader = new Reader(new Uint8Array([1, 2, 3]));
      expectEndOfInput(reader.readU32());
      expectEndOfInput(reader.readI64());
      expect(reader.consumed).toBe(0);
      expect(reader.readU16().unwrap()).toBe(0x0102);
    });
  });
});
