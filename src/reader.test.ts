import { describe, it, expect } from 'vitest';
import { Reader } from './reader';
import { Writer } from './writer';
import { BufferUnderflowError, DecodeError } from './errors';
import { MaxInt64, MaxUint64, MinInt64 } from './types';

describe('Reader', () => {
  it('reads a varint', () => {
    const reader = new Reader(new Uint8Array([0xac, 0x02]));
    expect(reader.readVarint()).toBe(300);
    expect(reader.hasMore).toBe(false);
  });

  it('rejects a varint wider than 32 bits', () => {
    const reader = new Reader(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x1f]));
    expect(() => reader.readVarint()).toThrow('Varint overflow: value exceeds 32 bits');
  });

  it('reads the largest varint64', () => {
    const writer = new Writer();
    writer.writeVarint64(MaxUint64);
    expect(new Reader(writer.bytes()).readVarint64()).toBe(MaxUint64);
  });

  it('rejects a varint64 whose tenth byte is above 1', () => {
    const data = new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x02]);
    expect(() => new Reader(data).readVarint64()).toThrow(
      'Varint64 overflow: 10th byte must be 0 or 1'
    );
  });

  it('roundtrips signed 64-bit extremes', () => {
    const writer = new Writer();
    writer.writeSVarint64(MinInt64);
    writer.writeSVarint64(MaxInt64);
    const reader = new Reader(writer.bytes());
    expect(reader.readSVarint64()).toBe(MinInt64);
    expect(reader.readSVarint64()).toBe(MaxInt64);
  });

  describe('bool', () => {
    it('reads 0 and 1', () => {
      const reader = new Reader(new Uint8Array([0, 1]));
      expect(reader.readBool()).toBe(false);
      expect(reader.readBool()).toBe(true);
    });

    it('rejects other bytes', () => {
      const reader = new Reader(new Uint8Array([2]));
      expect(() => reader.readBool()).toThrow(DecodeError);
      expect(() => new Reader(new Uint8Array([2])).readBool()).toThrow('Invalid boolean byte: 2');
    });
  });

  describe('string', () => {
    it('reads length-prefixed UTF-8', () => {
      const reader = new Reader(new Uint8Array([2, 0xc3, 0xa9]));
      expect(reader.readString()).toBe('é');
    });

    it('rejects invalid UTF-8', () => {
      const reader = new Reader(new Uint8Array([1, 0xff]));
      expect(() => reader.readString()).toThrow('Invalid UTF-8 in string');
    });
  });

  describe('underflow', () => {
    it('reports needed and available bytes', () => {
      const reader = new Reader(new Uint8Array([5, 1, 2]));
      expect(() => reader.readLengthPrefixedBytes()).toThrow(
        'Buffer underflow: needed 5 bytes, only 2 available'
      );
    });

    it('throws BufferUnderflowError on an empty buffer', () => {
      expect(() => new Reader(new Uint8Array()).readByte()).toThrow(BufferUnderflowError);
    });

    it('checks float64 width', () => {
      expect(() => new Reader(new Uint8Array(7)).readFloat64()).toThrow(BufferUnderflowError);
    });
  });

  it('reads through a subarray view', () => {
    const backing = new Uint8Array([9, 9, 0, 0, 0, 0, 0, 0, 0xf0, 0x3f]);
    const reader = new Reader(backing.subarray(2));
    expect(reader.readFloat64()).toBe(1);
    expect(reader.position).toBe(8);
    expect(reader.remaining).toBe(0);
  });
});
