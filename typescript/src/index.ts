/**
 * tessera - self-describing binary serialization for TypeScript
 *
 * Encodes dynamically-typed field maps into a tagged binary envelope with an
 * optional embedded schema, optional gzip compression and optional
 * password-based encryption.
 *
 * @example
 * ```typescript
 * import { encode, decode, CompressionLevel } from 'tessera';
 *
 * const bytes = encode(
 *   new Map([["name", { kind: "string", value: "Ann" }]]),
 *   { compressionLevel: CompressionLevel.None }
 * );
 * const fields = decode(bytes, { compressionLevel: CompressionLevel.None });
 * ```
 */

// Value model
export {
  Tag,
  Values,
  fieldMap,
  isInt32,
  isInt64,
  msToTicks,
  ticksToMs,
  MinInt32,
  MaxInt32,
  MinInt64,
  MaxInt64,
  UNIX_EPOCH_TICKS,
  TICKS_PER_MILLISECOND,
} from "./types";
export type {
  Value,
  ValueKind,
  FieldMap,
  NullValue,
  StringValue,
  Int32Value,
  Int64Value,
  DoubleValue,
  BoolValue,
  TimestampValue,
  GuidValue,
  BytesValue,
  ArrayValue,
  ObjectValue,
  OpaqueValue,
} from "./types";
export { Guid } from "./guid";

// Errors
export {
  TesseraError,
  EncodeError,
  DecodeError,
  FramingError,
  TruncationError,
  UnknownTagError,
  SchemaFormatError,
  SchemaValidationError,
  TransformError,
  InvalidOptionsError,
} from "./errors";
export type { SchemaViolation, TransformStage, OptionsIssue } from "./errors";

// Writer
import { Writer } from "./writer";
export { Writer };

// Reader
import { Reader } from "./reader";
export { Reader };

// Registry
export { TagRegistry, defaultRegistry, tagFor, kindForTag, scalarTypeNames } from "./registry";
export type { ScalarTypeName } from "./registry";

// Schema
export {
  inferSchema,
  inferFieldsSchema,
  matchesTypeName,
  validateSchema,
  formatSchema,
  parseSchema,
  typeDescriptorSchema,
  isContainerDescriptor,
} from "./schema";
export type { TypeDescriptor, ArrayDescriptor, ObjectDescriptor } from "./schema";

// Envelope
export {
  EnvelopeCodec,
  writeEnvelope,
  readEnvelope,
  encodeFlags,
  decodeFlags,
  hasMagic,
  MAGIC,
  FORMAT_VERSION,
  HEADER_SIZE,
  DEFAULT_MAX_DEPTH,
  FLAG_HAS_SCHEMA,
  FLAG_COMPRESSED,
  FLAG_ENCRYPTED,
} from "./envelope";
export type {
  Envelope,
  EnvelopeHeader,
  EnvelopeInit,
  EnvelopeCodecOptions,
  HeaderFlags,
} from "./envelope";

// Transforms
export {
  CompressionLevel,
  compress,
  decompress,
  encrypt,
  decrypt,
  deriveKey,
  isCompressed,
} from "./transform";

// Options
export { serializationOptionsSchema, resolveOptions, compressionEnabled } from "./options";
export type { SerializationOptions, ResolvedSerializationOptions } from "./options";

// Projection
export {
  Projection,
  defineProjection,
  fromFieldMap,
  toFieldMap,
  toValue,
  toNative,
  fieldMapToNative,
  asString,
  asNumber,
  asBigInt,
  asBoolean,
  asDate,
  asGuid,
  asBytes,
  asNative,
  asArray,
  asRecord,
} from "./projection";
export type { MemberConverter } from "./projection";

// JSON ingestion
export { JsonRecordReader, fromJson, fromJsonText } from "./json";
export type { JsonRecordReaderOptions, PartialRecords } from "./json";

// Pooling
export { WriterPool } from "./pool";
export type { WriterPoolOptions } from "./pool";

// Logging
export { PinoLogger, NullLogger, createLogger, createNullLogger, logLevelNames } from "./logger";
export type { Logger, LoggerOptions, LogLevelName, LogMeta } from "./logger";

// Serializer
import { BinarySerializer } from "./serializer";
import type { SerializationOptions } from "./options";
import type { FieldMap } from "./types";
export { BinarySerializer, systemClock } from "./serializer";
export type { BinarySerializerConfig, Clock } from "./serializer";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

const defaultSerializer = new BinarySerializer();

/**
 * Encodes a field map with the default serializer.
 */
export function encode(fields: FieldMap, options?: SerializationOptions): Uint8Array {
  return defaultSerializer.encode(fields, options);
}

/**
 * Decodes a buffer with the default serializer.
 */
export function decode(data: Uint8Array, options?: SerializationOptions): FieldMap {
  return defaultSerializer.decode(data, options);
}
