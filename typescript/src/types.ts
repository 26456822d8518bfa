import type { Guid } from "./guid";

/**
 * Tag bytes written before every value in the data block.
 */
export enum Tag {
  Null = 0x00,
  String = 0x01,
  Int32 = 0x02,
  Int64 = 0x03,
  Double = 0x04,
  Bool = 0x05,
  Timestamp = 0x06,
  Guid = 0x07,
  Bytes = 0x08,
  Array = 0x09,
  Object = 0x0a,
  /** Value of an unregistered kind, carried as type name + JSON text */
  Opaque = 0xff,
}

/**
 * Field name to value mapping. Keys are unique and keep insertion order.
 */
export type FieldMap = Map<string, Value>;

export interface NullValue {
  kind: "null";
}

export interface StringValue {
  kind: "string";
  value: string;
}

export interface Int32Value {
  kind: "int32";
  value: number;
}

export interface Int64Value {
  kind: "int64";
  value: bigint;
}

export interface DoubleValue {
  kind: "double";
  value: number;
}

export interface BoolValue {
  kind: "bool";
  value: boolean;
}

/**
 * Point in time as 100-nanosecond ticks since 0001-01-01T00:00:00Z.
 */
export interface TimestampValue {
  kind: "timestamp";
  ticks: bigint;
}

export interface GuidValue {
  kind: "guid";
  value: Guid;
}

export interface BytesValue {
  kind: "bytes";
  value: Uint8Array;
}

export interface ArrayValue {
  kind: "array";
  items: Value[];
}

export interface ObjectValue {
  kind: "object";
  fields: FieldMap;
}

/**
 * Value whose runtime kind has no registered tag.
 */
export interface OpaqueValue {
  kind: "opaque";
  typeName: string;
  /** JSON fallback encoding */
  text: string;
}

export type Value =
  | NullValue
  | StringValue
  | Int32Value
  | Int64Value
  | DoubleValue
  | BoolValue
  | TimestampValue
  | GuidValue
  | BytesValue
  | ArrayValue
  | ObjectValue
  | OpaqueValue;

export type ValueKind = Value["kind"];

/**
 * Signed integer bounds.
 */
export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * Ticks between 0001-01-01 and the Unix epoch.
 */
export const UNIX_EPOCH_TICKS = 621355968000000000n;
export const TICKS_PER_MILLISECOND = 10000n;

export function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= MinInt32 && n <= MaxInt32;
}

export function isInt64(n: bigint): boolean {
  return n >= MinInt64 && n <= MaxInt64;
}

/**
 * Converts milliseconds since the Unix epoch to ticks.
 */
export function msToTicks(ms: number): bigint {
  return BigInt(Math.trunc(ms)) * TICKS_PER_MILLISECOND + UNIX_EPOCH_TICKS;
}

/**
 * Converts ticks to milliseconds since the Unix epoch. Sub-millisecond
 * precision is truncated toward negative infinity.
 */
export function ticksToMs(ticks: bigint): number {
  const offset = ticks - UNIX_EPOCH_TICKS;
  let ms = offset / TICKS_PER_MILLISECOND;
  if (offset % TICKS_PER_MILLISECOND < 0n) {
    ms -= 1n;
  }
  return Number(ms);
}

/**
 * Value constructors.
 *
 * @example
 * ```typescript
 * const fields: FieldMap = new Map([
 *   ["name", Values.string("Ann")],
 *   ["tags", Values.array([Values.string("x")])],
 * ]);
 * ```
 */
export const Values = {
  null(): NullValue {
    return { kind: "null" };
  },
  string(value: string): StringValue {
    return { kind: "string", value };
  },
  int32(value: number): Int32Value {
    return { kind: "int32", value };
  },
  int64(value: bigint): Int64Value {
    return { kind: "int64", value };
  },
  double(value: number): DoubleValue {
    return { kind: "double", value };
  },
  bool(value: boolean): BoolValue {
    return { kind: "bool", value };
  },
  timestamp(at: Date | bigint): TimestampValue {
    return { kind: "timestamp", ticks: typeof at === "bigint" ? at : msToTicks(at.getTime()) };
  },
  guid(value: Guid): GuidValue {
    return { kind: "guid", value };
  },
  bytes(value: Uint8Array): BytesValue {
    return { kind: "bytes", value };
  },
  array(items: Value[]): ArrayValue {
    return { kind: "array", items };
  },
  object(fields: FieldMap | Record<string, Value>): ObjectValue {
    return {
      kind: "object",
      fields: fields instanceof Map ? fields : new Map(Object.entries(fields)),
    };
  },
  opaque(typeName: string, text: string): OpaqueValue {
    return { kind: "opaque", typeName, text };
  },
} as const;

/**
 * Builds a field map from a record of values.
 */
export function fieldMap(fields: Record<string, Value>): FieldMap {
  return new Map(Object.entries(fields));
}
