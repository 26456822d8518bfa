import { EncodeError } from "./errors";
import { isInt32, isInt64 } from "./types";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Writer encodes envelope data into a growable little-endian buffer.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the allocated capacity.
   */
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Returns a view of the encoded bytes. The view is invalidated by further
   * writes and by reset().
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Returns a copy of the encoded bytes.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a boolean as a single byte.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes a 32-bit signed integer.
   * @throws EncodeError if the value is not an integer in int32 range
   */
  writeInt32(value: number): void {
    if (!isInt32(value)) {
      throw new EncodeError(`Value ${value} is not a 32-bit signed integer`);
    }
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit signed integer.
   * @throws EncodeError if the value is outside the int64 range
   */
  writeInt64(value: bigint): void {
    if (!isInt64(value)) {
      throw new EncodeError(`Value ${value} is outside the 64-bit signed integer range`);
    }
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes an int32 length followed by the UTF-8 bytes of the string.
   */
  writeString(value: string): void {
    const bytes = textEncoder.encode(value);
    this.writeInt32(bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Writes an int32 length followed by the bytes.
   */
  writeLengthPrefixedBytes(data: Uint8Array): void {
    this.writeInt32(data.length);
    this.writeBytes(data);
  }
}
