/**
 * JSON ingestion.
 *
 * Converts JSON text into the same value model the envelope codec uses, either
 * as single values (opaque fallback text) or as a sequence of records read
 * from a top-level JSON array.
 */

import { DecodeError } from "./errors";
import { type FieldMap, isInt32, type Value } from "./types";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder();

/**
 * Options for JsonRecordReader configuration.
 */
export interface JsonRecordReaderOptions {
  /** Maximum number of records to yield. Default: unlimited */
  maxRecords?: number;
}

/**
 * Result of reading a bounded number of records.
 */
export interface PartialRecords {
  items: FieldMap[];
  count: number;
  hasMore: boolean;
}

/**
 * Converts a parsed JSON value into a Value.
 *
 * Integers in int32 range become int32, other safe integers int64, and every
 * other number a double. Object key order is kept.
 */
export function fromJson(json: unknown): Value {
  if (json === null || json === undefined) {
    return { kind: "null" };
  }
  switch (typeof json) {
    case "string":
      return { kind: "string", value: json };
    case "boolean":
      return { kind: "bool", value: json };
    case "number":
      if (isInt32(json)) {
        return { kind: "int32", value: json };
      }
      if (Number.isSafeInteger(json)) {
        return { kind: "int64", value: BigInt(json) };
      }
      return { kind: "double", value: json };
    case "object":
      if (Array.isArray(json)) {
        return { kind: "array", items: json.map((item: unknown) => fromJson(item)) };
      }
      return { kind: "object", fields: fromJsonObject(json) };
    default:
      return { kind: "string", value: String(json) };
  }
}

/**
 * Parses opaque fallback text into a Value. Text that is not JSON is kept as
 * a string value.
 */
export function fromJsonText(text: string): Value {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { kind: "string", value: text };
  }
  return fromJson(parsed);
}

function fromJsonObject(json: object): FieldMap {
  const fields: FieldMap = new Map();
  for (const [key, value] of Object.entries(json)) {
    fields.set(key, fromJson(value));
  }
  return fields;
}

/**
 * JsonRecordReader reads a JSON array of objects and yields each element as a
 * field map.
 *
 * @example
 * ```typescript
 * const reader = new JsonRecordReader('[{"id": 1}, {"id": 2}]');
 *
 * for (const record of reader.records()) {
 *   record.get("id"); // { kind: "int32", value: 1 }, then 2
 * }
 * ```
 */
export class JsonRecordReader implements Iterable<FieldMap> {
  private readonly elements: unknown[];
  private maxRecords: number;

  /**
   * @throws DecodeError if the source is not JSON or not a JSON array
   */
  constructor(source: string | Uint8Array, options: JsonRecordReaderOptions = {}) {
    const text = typeof source === "string" ? source : textDecoder.decode(source);

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new DecodeError("Invalid JSON input", { cause: err });
    }
    if (!Array.isArray(parsed)) {
      throw new DecodeError("JSON input must be an array of objects");
    }

    this.elements = parsed;
    this.maxRecords = options.maxRecords ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Returns the number of elements in the array.
   */
  count(): number {
    return this.elements.length;
  }

  /**
   * Sets the maximum number of records to yield.
   */
  setMaxRecords(max: number): void {
    this.maxRecords = max;
  }

  /**
   * Yields each element as a field map.
   * @throws DecodeError when an element is not a JSON object
   */
  *records(): IterableIterator<FieldMap> {
    const limit = Math.min(this.maxRecords, this.elements.length);
    for (let i = 0; i < limit; i++) {
      yield this.recordAt(i);
    }
  }

  [Symbol.iterator](): IterableIterator<FieldMap> {
    return this.records();
  }

  /**
   * Reads at most `maxItems` records.
   */
  take(maxItems: number): PartialRecords {
    const items: FieldMap[] = [];
    const limit = Math.min(maxItems, this.elements.length);
    for (let i = 0; i < limit; i++) {
      items.push(this.recordAt(i));
    }
    return { items, count: items.length, hasMore: this.elements.length > items.length };
  }

  private recordAt(index: number): FieldMap {
    const element = this.elements[index];
    if (element === null || typeof element !== "object" || Array.isArray(element)) {
      throw new DecodeError(`Element ${index} is not a JSON object`);
    }
    return fromJsonObject(element);
  }
}
