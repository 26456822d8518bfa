/**
 * Base error class for Tessera errors.
 */
export class TesseraError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TesseraError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends TesseraError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends TesseraError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when an envelope has the wrong magic number or an unsupported version.
 */
export class FramingError extends DecodeError {
  readonly expected: string;
  readonly actual: string;

  constructor(what: "magic" | "version", expected: string, actual: string) {
    super(`Invalid envelope ${what}: expected ${expected}, got ${actual}`);
    this.name = "FramingError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when the buffer ends in the middle of a structure.
 */
export class TruncationError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(`Buffer truncated: needed ${needed} bytes, only ${available} available`);
    this.name = "TruncationError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when a tag byte is not registered.
 */
export class UnknownTagError extends DecodeError {
  readonly tag: number;

  constructor(tag: number) {
    super(`Unknown tag: 0x${tag.toString(16).padStart(2, "0")}`);
    this.name = "UnknownTagError";
    this.tag = tag;
  }
}

/**
 * Error thrown when the schema block is not a valid type descriptor.
 */
export class SchemaFormatError extends DecodeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SchemaFormatError";
  }
}

export type SchemaViolation = "missing" | "type";

/**
 * Error thrown when decoded data does not agree with its embedded schema.
 */
export class SchemaValidationError extends TesseraError {
  readonly field: string;
  readonly reason: SchemaViolation;

  constructor(field: string, reason: SchemaViolation, detail?: string) {
    super(
      reason === "missing"
        ? `Schema validation failed: missing required field '${field}'`
        : `Schema validation failed: field '${field}' has invalid type${detail ? `: ${detail}` : ""}`
    );
    this.name = "SchemaValidationError";
    this.field = field;
    this.reason = reason;
  }
}

export type TransformStage = "compression" | "encryption";

/**
 * Error thrown when compression or encryption fails in either direction.
 */
export class TransformError extends TesseraError {
  readonly stage: TransformStage;

  constructor(stage: TransformStage, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransformError";
    this.stage = stage;
  }
}

/**
 * A single problem found while validating serialization options.
 */
export interface OptionsIssue {
  path: string;
  message: string;
}

/**
 * Error thrown when serialization options fail validation.
 */
export class InvalidOptionsError extends TesseraError {
  readonly issues: readonly OptionsIssue[];

  constructor(issues: readonly OptionsIssue[]) {
    super(
      `Invalid serialization options: ${issues
        .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join("; ")}`
    );
    this.name = "InvalidOptionsError";
    this.issues = issues;
  }
}
