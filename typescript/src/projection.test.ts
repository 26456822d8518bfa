import { describe, it, expect } from 'vitest';
import {
  asArray,
  asBigInt,
  asBoolean,
  asBytes,
  asDate,
  asGuid,
  asNative,
  asNumber,
  asRecord,
  asString,
  defineProjection,
  fallbackText,
  fromFieldMap,
  toFieldMap,
  toNative,
  toValue,
  typeNameOf,
} from './projection';
import { Guid } from './guid';
import { fieldMap, msToTicks, Values } from './types';

class Point {
  constructor(
    public x: number,
    public y: number
  ) {}
}

class Address {
  city = '';
  zip = 0;
}

class Person {
  name = '';
  age = 0;
  tags: string[] = [];
  born = new Date(0);
  address = new Address();
}

const addresses = defineProjection(() => new Address())
  .member('city', asString)
  .member('zip', asNumber);

const people = defineProjection(() => new Person())
  .member('name', asString)
  .member('age', asNumber)
  .member('tags', asArray(asString))
  .member('born', asDate)
  .member('address', asRecord(addresses));

describe('toValue', () => {
  it('maps numbers to int32 or double', () => {
    expect(toValue(30)).toEqual(Values.int32(30));
    expect(toValue(2147483648)).toEqual(Values.double(2147483648));
    expect(toValue(0.5)).toEqual(Values.double(0.5));
    expect(toValue(-0)).toEqual(Values.double(-0));
  });

  it('maps bigints to int64', () => {
    expect(toValue(5n)).toEqual(Values.int64(5n));
    expect(toValue(1n << 64n)).toEqual(Values.opaque('bigint', '18446744073709551616'));
  });

  it('maps registered object kinds', () => {
    const guid = Guid.create();
    expect(toValue(new Date(1))).toEqual(Values.timestamp(msToTicks(1)));
    expect(toValue(guid)).toEqual(Values.guid(guid));
    expect(toValue(Buffer.from([1]))).toEqual(Values.bytes(Buffer.from([1])));
    expect(toValue(undefined)).toEqual(Values.null());
  });

  it('maps arrays and plain objects recursively', () => {
    expect(toValue({ a: [1, 'x'] })).toEqual(
      Values.object({ a: Values.array([Values.int32(1), Values.string('x')]) })
    );
  });

  it('wraps unregistered kinds as opaque', () => {
    expect(toValue(new Point(1, 2))).toEqual(Values.opaque('Point', '{"x":1,"y":2}'));
    expect(toValue(new Int16Array([1, -1]))).toEqual(Values.opaque('Int16Array', '{"0":1,"1":-1}'));
    expect(toValue(new Map([['k', 1]]))).toEqual(Values.opaque('Map', '{}'));
  });
});

describe('opaque helpers', () => {
  it('names runtime types', () => {
    expect(typeNameOf(new Point(0, 0))).toBe('Point');
    expect(typeNameOf(Object.create(null))).toBe('Object');
    expect(typeNameOf(Symbol('s'))).toBe('symbol');
  });

  it('renders nested bigints as strings', () => {
    expect(fallbackText({ n: 1n })).toBe('{"n":"1"}');
  });

  it('falls back to the string form of cyclic values', () => {
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    expect(fallbackText(cyclic)).toBe('"[object Object]"');
  });

  it('falls back to the string form of values JSON drops', () => {
    expect(fallbackText(() => 1)).toBe('"() => 1"');
    expect(fallbackText(Symbol('s'))).toBe('"Symbol(s)"');
    expect(fallbackText({ toJSON: () => undefined })).toBe('"[object Object]"');
  });
});

describe('toNative', () => {
  it('restores JavaScript values', () => {
    expect(toNative(Values.timestamp(msToTicks(1000)))).toEqual(new Date(1000));
    expect(toNative(Values.object({ a: Values.array([Values.int64(2n)]) }))).toEqual({ a: [2n] });
    expect(toNative(Values.opaque('Point', '{"x":1}'))).toEqual({ x: 1 });
  });
});

describe('toFieldMap', () => {
  it('projects own enumerable members one level deep', () => {
    const fields = toFieldMap({ name: 'Ann', at: new Point(1, 2) });
    expect(Array.from(fields.keys())).toEqual(['name', 'at']);
    expect(fields.get('at')).toEqual(Values.opaque('Point', '{"x":1,"y":2}'));
  });

  it('returns a field map unchanged', () => {
    const fields = fieldMap({ a: Values.null() });
    expect(toFieldMap(fields)).toBe(fields);
  });
});

describe('Projection', () => {
  it('lists member names in order', () => {
    expect(people.memberNames).toEqual(['name', 'age', 'tags', 'born', 'address']);
  });

  it('round-trips a record through a field map', () => {
    const person = new Person();
    person.name = 'Ann';
    person.age = 30;
    person.tags = ['x', 'y'];
    person.born = new Date(Date.UTC(1994, 4, 1));
    person.address.city = 'Oslo';
    person.address.zip = 150;

    const fields = people.toFieldMap(person);
    expect(fields.get('age')).toEqual(Values.int32(30));
    expect(fields.get('address')).toEqual(Values.opaque('Address', '{"city":"Oslo","zip":150}'));

    const copy = fromFieldMap(fields, people);
    expect(copy).toBeInstanceOf(Person);
    expect(copy).toEqual(person);
  });

  it('leaves absent members at their initial value', () => {
    const copy = people.fromFieldMap(fieldMap({ name: Values.string('Bo') }));
    expect(copy.name).toBe('Bo');
    expect(copy.age).toBe(0);
  });

  it('skips members that cannot be converted', () => {
    const copy = people.fromFieldMap(
      fieldMap({ name: Values.string('Cy'), age: Values.string('old'), tags: Values.int32(1) })
    );
    expect(copy.name).toBe('Cy');
    expect(copy.age).toBe(0);
    expect(copy.tags).toEqual([]);
  });

  it('reads nested records from object values', () => {
    const copy = people.fromFieldMap(
      fieldMap({ address: Values.object({ city: Values.string('Rome'), zip: Values.int32(100) }) })
    );
    expect(copy.address).toBeInstanceOf(Address);
    expect(copy.address.city).toBe('Rome');
    expect(copy.address.zip).toBe(100);
  });

  it('propagates errors that are not conversion failures', () => {
    const failing = defineProjection(() => new Address()).member('city', () => {
      throw new Error('boom');
    });
    expect(() => failing.fromFieldMap(fieldMap({ city: Values.null() }))).toThrow('boom');
  });
});

describe('converters', () => {
  it('asString', () => {
    expect(asString(Values.int32(3))).toBe('3');
    expect(asString(Values.timestamp(msToTicks(0)))).toBe('1970-01-01T00:00:00.000Z');
    expect(() => asString(Values.null())).toThrow(TypeError);
  });

  it('asNumber', () => {
    expect(asNumber(Values.int64(7n))).toBe(7);
    expect(asNumber(Values.string(' 2.5 '))).toBe(2.5);
    expect(() => asNumber(Values.string(' '))).toThrow(TypeError);
    expect(() => asNumber(Values.int64(1n << 60n))).toThrow(RangeError);
  });

  it('asBigInt', () => {
    expect(asBigInt(Values.int32(4))).toBe(4n);
    expect(asBigInt(Values.string('12'))).toBe(12n);
    expect(() => asBigInt(Values.double(1.5))).toThrow(RangeError);
    expect(() => asBigInt(Values.string('x'))).toThrow(SyntaxError);
  });

  it('asBoolean', () => {
    expect(asBoolean(Values.string('TRUE'))).toBe(true);
    expect(asBoolean(Values.int64(0n))).toBe(false);
    expect(() => asBoolean(Values.string('yes'))).toThrow(TypeError);
  });

  it('asDate', () => {
    expect(asDate(Values.string('2020-01-01T00:00:00Z'))).toEqual(new Date(Date.UTC(2020, 0, 1)));
    expect(() => asDate(Values.string('soon'))).toThrow(TypeError);
  });

  it('asGuid', () => {
    const text = '00112233-4455-6677-8899-aabbccddeeff';
    expect(asGuid(Values.string(text)).toString()).toBe(text);
    expect(() => asGuid(Values.int32(1))).toThrow(TypeError);
  });

  it('asBytes', () => {
    expect(asBytes(Values.bytes(new Uint8Array([9])))).toEqual(new Uint8Array([9]));
    expect(() => asBytes(Values.string('x'))).toThrow(TypeError);
  });

  it('asNative', () => {
    expect(asNative(Values.array([Values.bool(true)]))).toEqual([true]);
  });
});
