import { UnknownTagError } from "./errors";
import { Tag, type Value, type ValueKind } from "./types";

/**
 * Schema names of leaf types. `"object"` doubles as the catch-all for values
 * whose kind has no more precise name.
 */
export type ScalarTypeName =
  | "null"
  | "string"
  | "int"
  | "long"
  | "double"
  | "bool"
  | "datetime"
  | "guid"
  | "bytes"
  | "object";

export const scalarTypeNames: readonly ScalarTypeName[] = [
  "null",
  "string",
  "int",
  "long",
  "double",
  "bool",
  "datetime",
  "guid",
  "bytes",
  "object",
];

/**
 * Registration information for a kind.
 */
interface KindRegistration {
  kind: ValueKind;
  tag: Tag;
  typeName: ScalarTypeName;
}

const registrations: readonly KindRegistration[] = [
  { kind: "null", tag: Tag.Null, typeName: "null" },
  { kind: "string", tag: Tag.String, typeName: "string" },
  { kind: "int32", tag: Tag.Int32, typeName: "int" },
  { kind: "int64", tag: Tag.Int64, typeName: "long" },
  { kind: "double", tag: Tag.Double, typeName: "double" },
  { kind: "bool", tag: Tag.Bool, typeName: "bool" },
  { kind: "timestamp", tag: Tag.Timestamp, typeName: "datetime" },
  { kind: "guid", tag: Tag.Guid, typeName: "guid" },
  { kind: "bytes", tag: Tag.Bytes, typeName: "bytes" },
  { kind: "array", tag: Tag.Array, typeName: "object" },
  { kind: "object", tag: Tag.Object, typeName: "object" },
  { kind: "opaque", tag: Tag.Opaque, typeName: "object" },
];

/**
 * TagRegistry maps value kinds to their tag bytes and schema names.
 *
 * The table is closed: a kind outside it cannot exist in the Value union, and
 * natively-typed values of any other runtime kind are turned into opaque
 * values before they reach the registry.
 */
export class TagRegistry {
  private byKind: Map<ValueKind, KindRegistration> = new Map();
  private byTag: Map<number, KindRegistration> = new Map();

  constructor(entries: readonly KindRegistration[] = registrations) {
    for (const entry of entries) {
      this.byKind.set(entry.kind, entry);
      this.byTag.set(entry.tag, entry);
    }
  }

  /**
   * Gets the tag for a value. Only opaque values take the opaque tag.
   */
  tagFor(value: Value): Tag {
    return this.byKind.get(value.kind)?.tag ?? Tag.Opaque;
  }

  /**
   * Resolves a tag byte read from the wire.
   * @throws UnknownTagError if the byte is not a registered tag
   */
  kindForTag(tag: number): ValueKind {
    const reg = this.byTag.get(tag);
    if (!reg) {
      throw new UnknownTagError(tag);
    }
    return reg.kind;
  }

  /**
   * Gets the schema name for a kind.
   */
  typeNameFor(kind: ValueKind): ScalarTypeName {
    return this.byKind.get(kind)?.typeName ?? "object";
  }
}

/**
 * Global default registry instance.
 */
export const defaultRegistry = new TagRegistry();

/**
 * Gets the tag for a value using the default registry.
 */
export function tagFor(value: Value): Tag {
  return defaultRegistry.tagFor(value);
}

/**
 * Resolves a tag byte using the default registry.
 */
export function kindForTag(tag: number): ValueKind {
  return defaultRegistry.kindForTag(tag);
}
