/**
 * Envelope layout.
 *
 * ```text
 * [magic: 4 = "TUSK"][version: 1][flags: 1][timestamp: int64 ticks]
 * [schema: int32 length + UTF-8 JSON]   (only when flags.hasSchema)
 * [data: int32 count + (int32 keyLen + key + tagged value)*]
 * ```
 *
 * A tagged value is one tag byte followed by the payload for that tag. Arrays
 * and objects recurse; opaque values carry their runtime type name and a JSON
 * fallback text.
 */

import { DecodeError, EncodeError, FramingError } from "./errors";
import { Guid } from "./guid";
import { fromJsonText } from "./json";
import { Reader } from "./reader";
import { defaultRegistry, type TagRegistry } from "./registry";
import { formatSchema, parseSchema, type TypeDescriptor } from "./schema";
import type { FieldMap, Value } from "./types";
import { Writer } from "./writer";

export const MAGIC = new Uint8Array([0x54, 0x55, 0x53, 0x4b]);
export const FORMAT_VERSION = 1;

/** Magic number, version, flags and timestamp. */
export const HEADER_SIZE = 14;

/** Default limit on array/object nesting. */
export const DEFAULT_MAX_DEPTH = 64;

/**
 * Flag bits of the header. Compression and encryption bits are informational:
 * decoding never reads them to choose its pipeline.
 */
export const FLAG_HAS_SCHEMA = 0x01;
export const FLAG_COMPRESSED = 0x02;
export const FLAG_ENCRYPTED = 0x04;

export interface HeaderFlags {
  hasSchema: boolean;
  wasCompressed: boolean;
  wasEncrypted: boolean;
}

export interface EnvelopeHeader {
  version: number;
  flags: HeaderFlags;
  /** Creation time in ticks */
  timestamp: bigint;
}

export interface Envelope {
  header: EnvelopeHeader;
  schema?: TypeDescriptor;
  data: FieldMap;
}

/**
 * Input to writeEnvelope. The hasSchema flag is derived from `schema`.
 */
export interface EnvelopeInit {
  compressed: boolean;
  encrypted: boolean;
  timestamp: bigint;
  schema?: TypeDescriptor;
  data: FieldMap;
}

export interface EnvelopeCodecOptions {
  maxDepth?: number;
  registry?: TagRegistry;
}

export function encodeFlags(flags: HeaderFlags): number {
  let bits = 0;
  if (flags.hasSchema) bits |= FLAG_HAS_SCHEMA;
  if (flags.wasCompressed) bits |= FLAG_COMPRESSED;
  if (flags.wasEncrypted) bits |= FLAG_ENCRYPTED;
  return bits;
}

export function decodeFlags(bits: number): HeaderFlags {
  return {
    hasSchema: (bits & FLAG_HAS_SCHEMA) !== 0,
    wasCompressed: (bits & FLAG_COMPRESSED) !== 0,
    wasEncrypted: (bits & FLAG_ENCRYPTED) !== 0,
  };
}

/**
 * Returns true if the buffer starts with the envelope magic number.
 */
export function hasMagic(data: Uint8Array): boolean {
  return data.length >= MAGIC.length && MAGIC.every((b, i) => data[i] === b);
}

function hexBytes(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * EnvelopeCodec owns the recursive tagged-value algorithm.
 */
export class EnvelopeCodec {
  private readonly maxDepth: number;
  private readonly registry: TagRegistry;

  constructor(options: EnvelopeCodecOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.registry = options.registry ?? defaultRegistry;
  }

  /**
   * Writes a complete envelope.
   */
  write(writer: Writer, init: EnvelopeInit): void {
    writer.writeBytes(MAGIC);
    writer.writeByte(FORMAT_VERSION);
    writer.writeByte(
      encodeFlags({
        hasSchema: init.schema !== undefined,
        wasCompressed: init.compressed,
        wasEncrypted: init.encrypted,
      })
    );
    writer.writeInt64(init.timestamp);

    if (init.schema !== undefined) {
      writer.writeString(formatSchema(init.schema));
    }

    this.writeFields(writer, init.data, 0);
  }

  /**
   * Reads a complete envelope.
   * @throws FramingError on a bad magic number or version
   * @throws TruncationError if the buffer ends mid-structure
   */
  read(reader: Reader): Envelope {
    const header = this.readHeader(reader);
    const schema = header.flags.hasSchema ? parseSchema(reader.readString()) : undefined;
    const data = this.readFields(reader, 0);
    return schema === undefined ? { header, data } : { header, schema, data };
  }

  /**
   * Reads and checks the fixed header.
   */
  readHeader(reader: Reader): EnvelopeHeader {
    const magic = reader.readBytes(MAGIC.length);
    if (!hasMagic(magic)) {
      throw new FramingError("magic", hexBytes(MAGIC), hexBytes(magic));
    }

    const version = reader.readByte();
    if (version !== FORMAT_VERSION) {
      throw new FramingError("version", String(FORMAT_VERSION), String(version));
    }

    const flags = decodeFlags(reader.readByte());
    const timestamp = reader.readInt64();
    return { version, flags, timestamp };
  }

  /**
   * Writes an int32 count followed by each key and tagged value.
   */
  writeFields(writer: Writer, fields: FieldMap, depth: number): void {
    writer.writeInt32(fields.size);
    for (const [key, value] of fields) {
      writer.writeString(key);
      this.writeValue(writer, value, depth);
    }
  }

  /**
   * Writes a tag byte and its payload.
   */
  writeValue(writer: Writer, value: Value, depth: number): void {
    writer.writeByte(this.registry.tagFor(value));

    switch (value.kind) {
      case "null":
        break;
      case "string":
        writer.writeString(value.value);
        break;
      case "int32":
        writer.writeInt32(value.value);
        break;
      case "int64":
        writer.writeInt64(value.value);
        break;
      case "double":
        writer.writeFloat64(value.value);
        break;
      case "bool":
        writer.writeBool(value.value);
        break;
      case "timestamp":
        writer.writeInt64(value.ticks);
        break;
      case "guid":
        writer.writeBytes(value.value.toBytes());
        break;
      case "bytes":
        writer.writeLengthPrefixedBytes(value.value);
        break;
      case "array":
        this.checkWriteDepth(depth + 1);
        writer.writeInt32(value.items.length);
        for (const item of value.items) {
          this.writeValue(writer, item, depth + 1);
        }
        break;
      case "object":
        this.checkWriteDepth(depth + 1);
        this.writeFields(writer, value.fields, depth + 1);
        break;
      case "opaque":
        writer.writeString(value.typeName);
        writer.writeString(value.text);
        break;
    }
  }

  /**
   * Reads an int32 count followed by each key and tagged value.
   */
  readFields(reader: Reader, depth: number): FieldMap {
    const count = reader.readLength();
    const fields: FieldMap = new Map();
    for (let i = 0; i < count; i++) {
      const key = reader.readString();
      fields.set(key, this.readValue(reader, depth));
    }
    return fields;
  }

  /**
   * Reads a tag byte and its payload.
   * @throws UnknownTagError if the tag byte is not registered
   */
  readValue(reader: Reader, depth: number): Value {
    const tag = reader.readByte();
    const kind = this.registry.kindForTag(tag);

    switch (kind) {
      case "null":
        return { kind };
      case "string":
        return { kind, value: reader.readString() };
      case "int32":
        return { kind, value: reader.readInt32() };
      case "int64":
        return { kind, value: reader.readInt64() };
      case "double":
        return { kind, value: reader.readFloat64() };
      case "bool":
        return { kind, value: reader.readBool() };
      case "timestamp":
        return { kind, ticks: reader.readInt64() };
      case "guid":
        return { kind, value: Guid.fromBytes(reader.readBytes(Guid.BYTE_LENGTH)) };
      case "bytes":
        return { kind, value: reader.readLengthPrefixedBytes() };
      case "array": {
        this.checkReadDepth(depth + 1);
        const count = reader.readLength();
        const items: Value[] = [];
        for (let i = 0; i < count; i++) {
          items.push(this.readValue(reader, depth + 1));
        }
        return { kind, items };
      }
      case "object":
        this.checkReadDepth(depth + 1);
        return { kind, fields: this.readFields(reader, depth + 1) };
      case "opaque":
        // The type name only says what the value was; the text carries it.
        reader.readString();
        return fromJsonText(reader.readString());
    }
  }

  private checkWriteDepth(depth: number): void {
    if (depth > this.maxDepth) {
      throw new EncodeError(`Nesting exceeds maximum depth of ${this.maxDepth}`);
    }
  }

  private checkReadDepth(depth: number): void {
    if (depth > this.maxDepth) {
      throw new DecodeError(`Nesting exceeds maximum depth of ${this.maxDepth}`);
    }
  }
}

/**
 * Writes an envelope with a default codec.
 */
export function writeEnvelope(writer: Writer, init: EnvelopeInit): void {
  new EnvelopeCodec().write(writer, init);
}

/**
 * Reads an envelope with a default codec.
 */
export function readEnvelope(data: Uint8Array): Envelope {
  return new EnvelopeCodec().read(new Reader(data));
}
