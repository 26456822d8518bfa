/**
 * Conversion between JavaScript values and the Value union, and between
 * records and field maps.
 */

import { Guid } from "./guid";
import { fromJsonText } from "./json";
import {
  type FieldMap,
  isInt32,
  isInt64,
  msToTicks,
  type OpaqueValue,
  ticksToMs,
  type Value,
} from "./types";

/**
 * Converts a member value into the type a record expects. Throws a TypeError,
 * RangeError or SyntaxError when the value cannot be converted.
 */
export type MemberConverter<V> = (value: Value) => V;

function isPlainObject(native: object): boolean {
  const proto: unknown = Object.getPrototypeOf(native);
  return proto === null || proto === Object.prototype;
}

function isByteArray(native: object): native is Uint8Array {
  return native instanceof Uint8Array && (native.constructor === Uint8Array || Buffer.isBuffer(native));
}

/**
 * Returns the runtime type name used for opaque values: the constructor name
 * for objects, `typeof` otherwise.
 */
export function typeNameOf(native: unknown): string {
  if (typeof native === "object" && native !== null) {
    const proto: unknown = Object.getPrototypeOf(native);
    if (
      typeof proto === "object" &&
      proto !== null &&
      "constructor" in proto &&
      typeof proto.constructor === "function" &&
      proto.constructor.name
    ) {
      return proto.constructor.name;
    }
    return "Object";
  }
  return typeof native;
}

/**
 * Renders the JSON fallback text of a value. Nested bigints are written as
 * strings; values JSON cannot represent (functions, symbols, cycles, a
 * `toJSON` returning undefined) fall back to their string form.
 */
export function fallbackText(native: unknown): string {
  if (typeof native === "bigint") {
    return native.toString();
  }
  try {
    const text: string | undefined = JSON.stringify(native, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
    return text ?? JSON.stringify(String(native));
  } catch (err) {
    // Cyclic structures; anything else is unexpected.
    if (!(err instanceof TypeError)) {
      throw err;
    }
    return JSON.stringify(String(native));
  }
}

/**
 * Wraps a value of an unregistered kind.
 */
export function opaqueOf(native: unknown): OpaqueValue {
  return { kind: "opaque", typeName: typeNameOf(native), text: fallbackText(native) };
}

/**
 * Converts a JavaScript value into a Value.
 *
 * Kinds are matched exactly: integral numbers in int32 range are int32 and
 * every other number is a double; `Date`, `Guid`, `Uint8Array`/`Buffer`,
 * arrays and plain objects map to their own kinds. Everything else (class
 * instances, `Map`, `Set`, other typed arrays, bigints beyond 64 bits, ...)
 * becomes an opaque value.
 */
export function toValue(native: unknown): Value {
  if (native === null || native === undefined) {
    return { kind: "null" };
  }

  switch (typeof native) {
    case "string":
      return { kind: "string", value: native };
    case "boolean":
      return { kind: "bool", value: native };
    case "number":
      return isInt32(native) && !Object.is(native, -0)
        ? { kind: "int32", value: native }
        : { kind: "double", value: native };
    case "bigint":
      return isInt64(native) ? { kind: "int64", value: native } : opaqueOf(native);
    case "object":
      return objectToValue(native);
    default:
      return opaqueOf(native);
  }
}

function objectToValue(native: object): Value {
  if (native instanceof Date) {
    const ms = native.getTime();
    return Number.isNaN(ms) ? opaqueOf(native) : { kind: "timestamp", ticks: msToTicks(ms) };
  }
  if (native instanceof Guid) {
    return { kind: "guid", value: native };
  }
  if (isByteArray(native)) {
    return { kind: "bytes", value: native };
  }
  if (Array.isArray(native)) {
    return { kind: "array", items: native.map((item: unknown) => toValue(item)) };
  }
  if (isPlainObject(native)) {
    return { kind: "object", fields: projectMembers(native) };
  }
  return opaqueOf(native);
}

/**
 * Converts a Value back into a JavaScript value. Opaque values are parsed
 * from their fallback text.
 */
export function toNative(value: Value): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "string":
    case "int32":
    case "int64":
    case "double":
    case "bool":
    case "guid":
    case "bytes":
      return value.value;
    case "timestamp":
      return new Date(ticksToMs(value.ticks));
    case "array":
      return value.items.map((item) => toNative(item));
    case "object":
      return fieldMapToNative(value.fields);
    case "opaque":
      return toNative(fromJsonText(value.text));
  }
}

/**
 * Converts a field map into a plain object.
 */
export function fieldMapToNative(fields: FieldMap): Record<string, unknown> {
  return Object.fromEntries(Array.from(fields, ([key, value]) => [key, toNative(value)]));
}

function projectMembers(record: object): FieldMap {
  const fields: FieldMap = new Map();
  for (const [name, member] of Object.entries(record)) {
    fields.set(name, toValue(member));
  }
  return fields;
}

/**
 * Builds the field map of a record from its own enumerable members, one level
 * deep. A Map is taken to be a field map already and is returned unchanged.
 */
export function toFieldMap(record: FieldMap | object): FieldMap {
  if (record instanceof Map) {
    return record;
  }
  return projectMembers(record);
}

interface Member<T> {
  name: string;
  read(record: T): unknown;
  assign(record: T, value: Value): void;
}

function isConversionFailure(err: unknown): boolean {
  return err instanceof TypeError || err instanceof RangeError || err instanceof SyntaxError;
}

/**
 * Projection is an explicit mapping between a record type and a field map.
 *
 * @example
 * ```typescript
 * class User {
 *   name = "";
 *   age = 0;
 * }
 *
 * const users = defineProjection(() => new User())
 *   .member("name", asString)
 *   .member("age", asNumber);
 *
 * const fields = users.toFieldMap(user);
 * const copy = users.fromFieldMap(fields);
 * ```
 */
export class Projection<T extends object> {
  private readonly members: Member<T>[] = [];
  private readonly create: () => T;

  constructor(create: () => T) {
    this.create = create;
  }

  /**
   * Declares a member and the converter used to assign it.
   */
  member<K extends keyof T & string>(name: K, convert: MemberConverter<T[K]>): this {
    this.members.push({
      name,
      read: (record) => record[name],
      assign: (record, value) => {
        record[name] = convert(value);
      },
    });
    return this;
  }

  /**
   * Returns the declared member names in declaration order.
   */
  get memberNames(): string[] {
    return this.members.map((m) => m.name);
  }

  /**
   * Builds a field map from the declared members of a record.
   */
  toFieldMap(record: T): FieldMap {
    const fields: FieldMap = new Map();
    for (const member of this.members) {
      fields.set(member.name, toValue(member.read(record)));
    }
    return fields;
  }

  /**
   * Creates a record and assigns each declared member found in `fields`.
   * Members whose value cannot be converted keep their initial value.
   */
  fromFieldMap(fields: FieldMap): T {
    const record = this.create();
    for (const member of this.members) {
      const value = fields.get(member.name);
      if (value === undefined) {
        continue;
      }
      try {
        member.assign(record, value);
      } catch (err) {
        if (!isConversionFailure(err)) {
          throw err;
        }
      }
    }
    return record;
  }
}

/**
 * Starts a projection for records made by `create`.
 */
export function defineProjection<T extends object>(create: () => T): Projection<T> {
  return new Projection(create);
}

/**
 * Projects a field map onto a record.
 */
export function fromFieldMap<T extends object>(fields: FieldMap, projection: Projection<T>): T {
  return projection.fromFieldMap(fields);
}

function conversionError(value: Value, target: string): TypeError {
  return new TypeError(`Cannot convert ${value.kind} to ${target}`);
}

export const asString: MemberConverter<string> = (value) => {
  switch (value.kind) {
    case "string":
      return value.value;
    case "int32":
    case "int64":
    case "double":
    case "bool":
      return String(value.value);
    case "guid":
      return value.value.toString();
    case "timestamp":
      return new Date(ticksToMs(value.ticks)).toISOString();
    default:
      throw conversionError(value, "string");
  }
};

export const asNumber: MemberConverter<number> = (value) => {
  switch (value.kind) {
    case "int32":
    case "double":
      return value.value;
    case "int64":
      if (value.value > BigInt(Number.MAX_SAFE_INTEGER) || value.value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new RangeError(`int64 ${value.value} exceeds the safe integer range`);
      }
      return Number(value.value);
    case "bool":
      return value.value ? 1 : 0;
    case "string": {
      const n = Number(value.value);
      if (value.value.trim() === "" || Number.isNaN(n)) {
        throw conversionError(value, "number");
      }
      return n;
    }
    default:
      throw conversionError(value, "number");
  }
};

export const asBigInt: MemberConverter<bigint> = (value) => {
  switch (value.kind) {
    case "int64":
      return value.value;
    case "int32":
      return BigInt(value.value);
    case "double":
      // BigInt() throws RangeError for non-integral numbers
      return BigInt(value.value);
    case "string":
      return BigInt(value.value);
    default:
      throw conversionError(value, "bigint");
  }
};

export const asBoolean: MemberConverter<boolean> = (value) => {
  switch (value.kind) {
    case "bool":
      return value.value;
    case "int32":
    case "double":
      return value.value !== 0;
    case "int64":
      return value.value !== 0n;
    case "string": {
      const text = value.value.trim().toLowerCase();
      if (text === "true") return true;
      if (text === "false") return false;
      throw conversionError(value, "boolean");
    }
    default:
      throw conversionError(value, "boolean");
  }
};

export const asDate: MemberConverter<Date> = (value) => {
  switch (value.kind) {
    case "timestamp":
      return new Date(ticksToMs(value.ticks));
    case "string": {
      const date = new Date(value.value);
      if (Number.isNaN(date.getTime())) {
        throw conversionError(value, "Date");
      }
      return date;
    }
    default:
      throw conversionError(value, "Date");
  }
};

export const asGuid: MemberConverter<Guid> = (value) => {
  switch (value.kind) {
    case "guid":
      return value.value;
    case "string":
      return Guid.parse(value.value);
    default:
      throw conversionError(value, "Guid");
  }
};

export const asBytes: MemberConverter<Uint8Array> = (value) => {
  if (value.kind !== "bytes") {
    throw conversionError(value, "Uint8Array");
  }
  return value.value;
};

export const asNative: MemberConverter<unknown> = (value) => toNative(value);

/**
 * Converts an array value element by element.
 */
export function asArray<V>(element: MemberConverter<V>): MemberConverter<V[]> {
  return (value) => {
    if (value.kind !== "array") {
      throw conversionError(value, "array");
    }
    return value.items.map((item) => element(item));
  };
}

/**
 * Converts an object value through a nested projection. Opaque values are
 * read from their fallback text, so class-typed members survive a
 * `toFieldMap`/`fromFieldMap` round trip without an envelope in between.
 */
export function asRecord<V extends object>(projection: Projection<V>): MemberConverter<V> {
  return (value) => {
    const resolved = value.kind === "opaque" ? fromJsonText(value.text) : value;
    if (resolved.kind !== "object") {
      throw conversionError(value, "record");
    }
    return projection.fromFieldMap(resolved.fields);
  };
}
