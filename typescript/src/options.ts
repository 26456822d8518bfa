import { z } from "zod";
import { InvalidOptionsError } from "./errors";
import { CompressionLevel } from "./transform";

/**
 * Per-call serialization options. The same values used to encode a buffer
 * must be supplied to decode it; the header flags are never consulted.
 */
export const serializationOptionsSchema = z
  .object({
    /** Embed the inferred schema. Default: true */
    includeSchema: z.boolean().default(true),
    /** Check decoded data against its embedded schema. Default: true */
    validateSchema: z.boolean().default(true),
    /** Default: optimal */
    compressionLevel: z.nativeEnum(CompressionLevel).default(CompressionLevel.Optimal),
    /** Default: false */
    encrypt: z.boolean().default(false),
    /** Password for key derivation; required when `encrypt` is set */
    encryptionKey: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.encrypt && options.encryptionKey === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["encryptionKey"],
        message: "encryptionKey is required when encrypt is true",
      });
    }
  });

export type SerializationOptions = z.input<typeof serializationOptionsSchema>;
export type ResolvedSerializationOptions = z.output<typeof serializationOptionsSchema>;

/**
 * Applies defaults and validates options.
 * @throws InvalidOptionsError if any option is invalid
 */
export function resolveOptions(options: SerializationOptions = {}): ResolvedSerializationOptions {
  const result = serializationOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Returns true if the options apply a compression stage.
 */
export function compressionEnabled(options: ResolvedSerializationOptions): boolean {
  return options.compressionLevel !== CompressionLevel.None;
}
