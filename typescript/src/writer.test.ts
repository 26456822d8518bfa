import { describe, it, expect } from 'vitest';
import { Writer } from './writer';
import { Reader } from './reader';
import { DecodeError, EncodeError, TruncationError } from './errors';

describe('Writer', () => {
  describe('int32', () => {
    it('encodes 1 little-endian', () => {
      const writer = new Writer();
      writer.writeInt32(1);
      expect(writer.bytes()).toEqual(new Uint8Array([1, 0, 0, 0]));
    });

    it('encodes -1', () => {
      const writer = new Writer();
      writer.writeInt32(-1);
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xff, 0xff, 0xff]));
    });

    it('rejects values outside int32 range', () => {
      const writer = new Writer();
      expect(() => writer.writeInt32(0x80000000)).toThrow(EncodeError);
      expect(() => writer.writeInt32(1.5)).toThrow(EncodeError);
    });
  });

  describe('int64', () => {
    it('encodes 300n', () => {
      const writer = new Writer();
      writer.writeInt64(300n);
      expect(writer.bytes()).toEqual(new Uint8Array([0x2c, 0x01, 0, 0, 0, 0, 0, 0]));
    });

    it('rejects values outside int64 range', () => {
      const writer = new Writer();
      expect(() => writer.writeInt64(1n << 63n)).toThrow(EncodeError);
    });
  });

  describe('float64', () => {
    it('encodes 1.0', () => {
      const writer = new Writer();
      writer.writeFloat64(1.0);
      expect(writer.bytes()).toEqual(new Uint8Array([0, 0, 0, 0, 0, 0, 0xf0, 0x3f]));
    });
  });

  describe('string', () => {
    it('encodes "hi" with an int32 byte length', () => {
      const writer = new Writer();
      writer.writeString('hi');
      expect(writer.bytes()).toEqual(new Uint8Array([2, 0, 0, 0, 0x68, 0x69]));
    });

    it('counts UTF-8 bytes, not characters', () => {
      const writer = new Writer();
      writer.writeString('é');
      expect(writer.bytes()).toEqual(new Uint8Array([2, 0, 0, 0, 0xc3, 0xa9]));
    });
  });

  describe('buffer management', () => {
    it('grows past its initial capacity', () => {
      const writer = new Writer(4);
      for (let i = 0; i < 10; i++) {
        writer.writeInt32(i);
      }
      expect(writer.position).toBe(40);
      expect(writer.capacity).toBeGreaterThanOrEqual(40);
    });

    it('toBytes returns a copy', () => {
      const writer = new Writer();
      writer.writeByte(7);
      const copy = writer.toBytes();
      writer.reset();
      writer.writeByte(9);
      expect(copy).toEqual(new Uint8Array([7]));
      expect(writer.bytes()).toEqual(new Uint8Array([9]));
    });
  });
});

describe('Reader', () => {
  it('reads back fixed-width values', () => {
    const writer = new Writer();
    writer.writeByte(0xab);
    writer.writeBool(true);
    writer.writeInt32(-42);
    writer.writeInt64(-9223372036854775808n);
    writer.writeFloat64(2.5);
    writer.writeString('hello');
    writer.writeLengthPrefixedBytes(new Uint8Array([1, 2, 3]));

    const reader = new Reader(writer.bytes());
    expect(reader.readByte()).toBe(0xab);
    expect(reader.readBool()).toBe(true);
    expect(reader.readInt32()).toBe(-42);
    expect(reader.readInt64()).toBe(-9223372036854775808n);
    expect(reader.readFloat64()).toBe(2.5);
    expect(reader.readString()).toBe('hello');
    expect(reader.readLengthPrefixedBytes()).toEqual(new Uint8Array([1, 2, 3]));
    expect(reader.hasMore).toBe(false);
  });

  it('treats any non-zero byte as true', () => {
    expect(new Reader(new Uint8Array([2])).readBool()).toBe(true);
  });

  it('reads from a view with a non-zero offset', () => {
    const backing = new Uint8Array([0xff, 5, 0, 0, 0]);
    const reader = new Reader(backing.subarray(1));
    expect(reader.readInt32()).toBe(5);
  });

  it('throws TruncationError when reading past the end', () => {
    const reader = new Reader(new Uint8Array([1, 2]));
    expect(() => reader.readInt32()).toThrow(TruncationError);
    expect(() => reader.readInt32()).toThrow('Buffer truncated: needed 4 bytes, only 2 available');
  });

  it('throws TruncationError for a string longer than the buffer', () => {
    const reader = new Reader(new Uint8Array([10, 0, 0, 0, 0x61]));
    expect(() => reader.readString()).toThrow(TruncationError);
  });

  it('rejects negative lengths', () => {
    const reader = new Reader(new Uint8Array([0xff, 0xff, 0xff, 0xff]));
    expect(() => reader.readLength()).toThrow(DecodeError);
    expect(() => new Reader(new Uint8Array([0xff, 0xff, 0xff, 0xff])).readLength()).toThrow(
      'Negative length: -1'
    );
  });

  it('tracks position and remaining', () => {
    const reader = new Reader(new Uint8Array([1, 2, 3]));
    reader.readByte();
    expect(reader.position).toBe(1);
    expect(reader.remaining).toBe(2);
  });
});
