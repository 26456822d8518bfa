import { describe, it, expect } from 'vitest';
import { defaultRegistry, kindForTag, tagFor } from './registry';
import { UnknownTagError } from './errors';
import { Tag, Values } from './types';

describe('TagRegistry', () => {
  it('assigns the fixed tag of each kind', () => {
    expect(tagFor(Values.null())).toBe(0x00);
    expect(tagFor(Values.string(''))).toBe(0x01);
    expect(tagFor(Values.int32(0))).toBe(0x02);
    expect(tagFor(Values.int64(0n))).toBe(0x03);
    expect(tagFor(Values.double(0))).toBe(0x04);
    expect(tagFor(Values.bool(false))).toBe(0x05);
    expect(tagFor(Values.timestamp(0n))).toBe(0x06);
    expect(tagFor(Values.bytes(new Uint8Array()))).toBe(0x08);
    expect(tagFor(Values.array([]))).toBe(0x09);
    expect(tagFor(Values.object({}))).toBe(0x0a);
    expect(tagFor(Values.opaque('Foo', '{}'))).toBe(0xff);
  });

  it('resolves tags back to kinds', () => {
    expect(kindForTag(Tag.Guid)).toBe('guid');
    expect(kindForTag(Tag.Opaque)).toBe('opaque');
  });

  it('rejects unregistered tags', () => {
    expect(() => kindForTag(0x0b)).toThrow(UnknownTagError);
    expect(() => kindForTag(0x0b)).toThrow('Unknown tag: 0x0b');
  });

  it('names kinds for schemas', () => {
    expect(defaultRegistry.typeNameFor('int32')).toBe('int');
    expect(defaultRegistry.typeNameFor('int64')).toBe('long');
    expect(defaultRegistry.typeNameFor('timestamp')).toBe('datetime');
    expect(defaultRegistry.typeNameFor('opaque')).toBe('object');
  });
});
