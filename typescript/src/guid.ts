import { randomUUID } from "node:crypto";

const GUID_PATTERN = /^\{?([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})\}?$/i;

function hex(bytes: Uint8Array, indices: readonly number[]): string {
  return indices.map((i) => bytes[i].toString(16).padStart(2, "0")).join("");
}

function unhex(text: string): number[] {
  const out: number[] = [];
  for (let i = 0; i < text.length; i += 2) {
    out.push(parseInt(text.slice(i, i + 2), 16));
  }
  return out;
}

/**
 * 128-bit identifier.
 *
 * Bytes are kept in wire order: the first three groups of the textual form are
 * stored little-endian, the last two as written, so that
 * `Guid.parse("00112233-4455-6677-8899-aabbccddeeff").toBytes()` is
 * `33 22 11 00 55 44 77 66 88 99 aa bb cc dd ee ff`.
 */
export class Guid {
  static readonly BYTE_LENGTH = 16;

  private readonly data: Uint8Array;

  private constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * The all-zero identifier.
   */
  static readonly empty = new Guid(new Uint8Array(Guid.BYTE_LENGTH));

  /**
   * Creates a Guid from its 16 wire bytes. The input is copied.
   * @throws RangeError if the input is not exactly 16 bytes
   */
  static fromBytes(bytes: Uint8Array): Guid {
    if (bytes.length !== Guid.BYTE_LENGTH) {
      throw new RangeError(`Guid requires ${Guid.BYTE_LENGTH} bytes, got ${bytes.length}`);
    }
    return new Guid(Uint8Array.from(bytes));
  }

  /**
   * Parses the hyphenated textual form, with or without braces.
   * @throws TypeError if the text is not a Guid
   */
  static parse(text: string): Guid {
    const match = GUID_PATTERN.exec(text.trim());
    if (!match) {
      throw new TypeError(`Invalid Guid: ${text}`);
    }
    const [, a, b, c, d, e] = match;
    const bytes = [
      ...unhex(a).reverse(),
      ...unhex(b).reverse(),
      ...unhex(c).reverse(),
      ...unhex(d),
      ...unhex(e),
    ];
    return new Guid(Uint8Array.from(bytes));
  }

  /**
   * Creates a random (version 4) Guid.
   */
  static create(): Guid {
    return Guid.parse(randomUUID());
  }

  static isGuid(value: unknown): value is Guid {
    return value instanceof Guid;
  }

  /**
   * Returns a copy of the 16 wire bytes.
   */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.data);
  }

  equals(other: Guid): boolean {
    return this.data.every((b, i) => b === other.data[i]);
  }

  toString(): string {
    return [
      hex(this.data, [3, 2, 1, 0]),
      hex(this.data, [5, 4]),
      hex(this.data, [7, 6]),
      hex(this.data, [8, 9]),
      hex(this.data, [10, 11, 12, 13, 14, 15]),
    ].join("-");
  }

  toJSON(): string {
    return this.toString();
  }
}
