import { DecodeError, TruncationError } from "./errors";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder();

/**
 * Reader decodes envelope data from a little-endian buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new TruncationError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes. The result is a view into the source buffer.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads a boolean. Any non-zero byte is true.
   */
  readBool(): boolean {
    return this.readByte() !== 0;
  }

  /**
   * Reads a 32-bit signed integer.
   */
  readInt32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit signed integer.
   */
  readInt64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads an int32 length or element count.
   * @throws DecodeError if the value is negative
   */
  readLength(): number {
    const length = this.readInt32();
    if (length < 0) {
      throw new DecodeError(`Negative length: ${length}`);
    }
    return length;
  }

  /**
   * Reads an int32-length-prefixed UTF-8 string.
   */
  readString(): string {
    const length = this.readLength();
    return textDecoder.decode(this.readBytes(length));
  }

  /**
   * Reads int32-length-prefixed bytes. The result is a copy.
   */
  readLengthPrefixedBytes(): Uint8Array {
    const length = this.readLength();
    return this.readBytes(length).slice();
  }
}
