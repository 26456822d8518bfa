import { type Envelope, EnvelopeCodec, hasMagic } from "./envelope";
import { TransformError } from "./errors";
import { createNullLogger, type Logger } from "./logger";
import {
  compressionEnabled,
  type ResolvedSerializationOptions,
  resolveOptions,
  type SerializationOptions,
} from "./options";
import { WriterPool } from "./pool";
import { type Projection, toFieldMap } from "./projection";
import { Reader } from "./reader";
import { defaultRegistry, type TagRegistry } from "./registry";
import { inferFieldsSchema, validateSchema } from "./schema";
import { compress, decompress, decrypt, encrypt, isCompressed } from "./transform";
import { type FieldMap, msToTicks } from "./types";

/**
 * Source of the envelope creation time.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  nowMs(): number;
}

export const systemClock: Clock = {
  nowMs: () => Date.now(),
};

export interface BinarySerializerConfig {
  /** Default: a logger that discards everything */
  logger?: Logger;
  /** Default: the system clock */
  clock?: Clock;
  /** Default: a pool with default settings, private to this serializer */
  pool?: WriterPool;
  /** Default: 64 */
  maxDepth?: number;
  registry?: TagRegistry;
}

/**
 * BinarySerializer turns field maps and records into envelopes and back.
 *
 * The options given to decode must match those used to encode: decoding runs
 * the inverse pipeline the options describe and ignores the header flags.
 *
 * @example
 * ```typescript
 * const serializer = new BinarySerializer({ logger: createLogger({ level: "info" }) });
 *
 * const bytes = serializer.serialize({ name: "Ann", age: 30 });
 * const fields = serializer.decode(bytes);
 * fields.get("age"); // { kind: "int32", value: 30 }
 * ```
 */
export class BinarySerializer {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly pool: WriterPool;
  private readonly codec: EnvelopeCodec;
  private readonly registry: TagRegistry;

  constructor(config: BinarySerializerConfig = {}) {
    this.logger = (config.logger ?? createNullLogger()).child({ component: "serializer" });
    this.clock = config.clock ?? systemClock;
    this.pool = config.pool ?? new WriterPool();
    this.registry = config.registry ?? defaultRegistry;
    this.codec = new EnvelopeCodec({ maxDepth: config.maxDepth, registry: this.registry });
  }

  /**
   * Encodes a field map into an envelope and applies the configured transforms.
   *
   * @throws InvalidOptionsError if the options are invalid
   * @throws EncodeError if a value cannot be written
   * @throws TransformError if compression or encryption fails
   */
  encode(fields: FieldMap, options?: SerializationOptions): Uint8Array {
    return this.run("encode", () => {
      const opts = resolveOptions(options);
      const schema = opts.includeSchema ? inferFieldsSchema(fields, this.registry) : undefined;

      const envelope = this.pool.use((writer) => {
        this.codec.write(writer, {
          compressed: compressionEnabled(opts),
          encrypted: opts.encrypt,
          timestamp: msToTicks(this.clock.nowMs()),
          schema,
          data: fields,
        });
        return writer.toBytes();
      });

      let bytes = compress(envelope, opts.compressionLevel);
      if (opts.encryptionKey !== undefined && opts.encrypt) {
        bytes = encrypt(bytes, opts.encryptionKey);
      }

      this.logger.debug("encoded envelope", {
        fields: fields.size,
        envelopeBytes: envelope.length,
        bytes: bytes.length,
      });
      return bytes;
    });
  }

  /**
   * Undoes the transforms, reads the envelope and, when enabled and a schema
   * is embedded, validates the data against it.
   *
   * @throws InvalidOptionsError if the options are invalid
   * @throws TransformError if decryption or decompression fails, or the options
   * do not match the transforms applied to the buffer
   * @throws DecodeError if the envelope is malformed
   * @throws SchemaValidationError if the data does not match its schema
   */
  decode(bytes: Uint8Array, options?: SerializationOptions): FieldMap {
    return this.run("decode", () => {
      const opts = resolveOptions(options);
      const envelope = this.readEnvelope(bytes, opts);
      if (opts.validateSchema && envelope.schema !== undefined) {
        validateSchema(envelope.data, envelope.schema, this.registry);
      }
      this.logger.debug("decoded envelope", { bytes: bytes.length, fields: envelope.data.size });
      return envelope.data;
    });
  }

  /**
   * Decodes a buffer without validating it, returning header, schema and data.
   */
  inspect(bytes: Uint8Array, options?: SerializationOptions): Envelope {
    return this.run("inspect", () => {
      const envelope = this.readEnvelope(bytes, resolveOptions(options));
      this.logger.debug("inspected envelope", {
        bytes: bytes.length,
        version: envelope.header.version,
        hasSchema: envelope.header.flags.hasSchema,
      });
      return envelope;
    });
  }

  /**
   * Projects a record to a field map and encodes it. Without a projection the
   * record's own enumerable members are used.
   */
  serialize<T extends object>(
    record: T | FieldMap,
    options?: SerializationOptions,
    projection?: Projection<T>
  ): Uint8Array {
    const fields =
      projection !== undefined && !(record instanceof Map)
        ? projection.toFieldMap(record)
        : toFieldMap(record);
    return this.encode(fields, options);
  }

  /**
   * Decodes a buffer and projects the field map onto a new record.
   */
  deserialize<T extends object>(
    bytes: Uint8Array,
    projection: Projection<T>,
    options?: SerializationOptions
  ): T {
    return projection.fromFieldMap(this.decode(bytes, options));
  }

  private readEnvelope(bytes: Uint8Array, opts: ResolvedSerializationOptions): Envelope {
    let plain = bytes;
    if (opts.encryptionKey !== undefined && opts.encrypt) {
      plain = decrypt(plain, opts.encryptionKey);
    }
    if (compressionEnabled(opts)) {
      plain = decompress(plain);
    }

    if (!hasMagic(plain)) {
      if (opts.encrypt) {
        throw new TransformError(
          "encryption",
          "Decrypted buffer is not an envelope; the buffer was encoded with other options"
        );
      }
      if (isCompressed(plain)) {
        throw new TransformError(
          "compression",
          "Buffer is gzip-compressed; decode it with a compression level other than none"
        );
      }
    }

    return this.codec.read(new Reader(plain));
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.logger.error(`${operation} failed`, { err });
      throw err;
    }
  }
}
