/**
 * End-to-end tests through the public entry point.
 *
 * These tests drive whole pipelines: JSON records in, envelopes through every
 * transform combination, records and field maps out.
 */

import { describe, it, expect } from 'vitest';
import {
  BinarySerializer,
  CompressionLevel,
  decode,
  encode,
  FramingError,
  Guid,
  JsonRecordReader,
  TransformError,
  Values,
  VERSION,
  asBigInt,
  asBytes,
  asDate,
  asGuid,
  defineProjection,
  fieldMap,
  fieldMapToNative,
  type SerializationOptions,
} from '../../../typescript/src';

const pipelines: [string, SerializationOptions][] = [
  ['raw', { compressionLevel: CompressionLevel.None }],
  ['gzip', {}],
  ['aes', { compressionLevel: CompressionLevel.None, encrypt: true, encryptionKey: 'test-secret' }],
  ['gzip + aes', { compressionLevel: CompressionLevel.SmallestSize, encrypt: true, encryptionKey: 'test-secret' }],
];

class Upload {
  id = Guid.empty;
  size = 0n;
  at = new Date(0);
  body = new Uint8Array();
}

const uploads = defineProjection(() => new Upload())
  .member('id', asGuid)
  .member('size', asBigInt)
  .member('at', asDate)
  .member('body', asBytes);

describe('pipeline', () => {
  it('exposes a version', () => {
    expect(VERSION).toBe('0.1.0');
  });

  describe.each(pipelines)('%s', (_name, options) => {
    it('round-trips JSON records', () => {
      const reader = new JsonRecordReader(
        '[{"name":"Ann","age":30,"tags":["x","y"]},{"name":"Bo","age":41,"tags":[],"meta":{"vip":true}}]'
      );
      for (const record of reader) {
        expect(decode(encode(record, options), options)).toEqual(record);
      }
    });

    it('round-trips typed records through a projection', () => {
      const serializer = new BinarySerializer();
      const upload = new Upload();
      upload.id = Guid.parse('00112233-4455-6677-8899-aabbccddeeff');
      upload.size = 5000000000n;
      upload.at = new Date(Date.UTC(2023, 5, 30, 23, 59, 59, 999));
      upload.body = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);

      const copy = serializer.deserialize(serializer.serialize(upload, options), uploads, options);
      expect(copy.id.toString()).toBe('00112233-4455-6677-8899-aabbccddeeff');
      expect(copy.size).toBe(5000000000n);
      expect(copy.at.toISOString()).toBe('2023-06-30T23:59:59.999Z');
      expect(copy.body).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
    });
  });

  it('converts decoded fields back to plain values', () => {
    const options = { compressionLevel: CompressionLevel.Fastest };
    const fields = decode(
      encode(
        fieldMap({
          name: Values.string('Ann'),
          age: Values.int32(30),
          tags: Values.array([Values.string('x'), Values.string('y')]),
        }),
        options
      ),
      options
    );
    expect(fieldMapToNative(fields)).toEqual({ name: 'Ann', age: 30, tags: ['x', 'y'] });
  });

  it('shrinks repetitive data when compressing', () => {
    const data = fieldMap({ text: Values.string('abc'.repeat(1000)) });
    const plain = encode(data, { compressionLevel: CompressionLevel.None });
    const packed = encode(data, { compressionLevel: CompressionLevel.Optimal });
    expect(packed.length).toBeLessThan(plain.length / 10);
  });

  it('never produces the same ciphertext twice', () => {
    const data = fieldMap({ a: Values.int32(1) });
    const options = { encrypt: true, encryptionKey: 'test-secret' };
    expect(encode(data, options)).not.toEqual(encode(data, options));
  });

  it('rejects a buffer whose magic number was overwritten', () => {
    const options = { compressionLevel: CompressionLevel.None };
    const bytes = encode(fieldMap({ a: Values.int32(1) }), options);
    bytes.set([0, 0, 0, 0], 0);
    expect(() => decode(bytes, options)).toThrow(FramingError);
  });

  it('rejects a buffer decoded with a different key', () => {
    const bytes = encode(fieldMap({ a: Values.int32(1) }), {
      encrypt: true,
      encryptionKey: 'test-secret',
    });
    expect(() => decode(bytes, { encrypt: true, encryptionKey: 'other-secret' })).toThrow(
      TransformError
    );
  });
});
