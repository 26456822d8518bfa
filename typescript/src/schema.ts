import { z } from "zod";
import { SchemaFormatError, SchemaValidationError } from "./errors";
import { defaultRegistry, type ScalarTypeName, type TagRegistry } from "./registry";
import type { FieldMap, Value } from "./types";

export type { ScalarTypeName } from "./registry";

export interface ArrayDescriptor {
  type: "array";
  elementType: TypeDescriptor;
}

export interface ObjectDescriptor {
  type: "object";
  properties: Record<string, TypeDescriptor>;
}

/**
 * Structural type of a value tree, as embedded in the schema block.
 */
export type TypeDescriptor = ScalarTypeName | ArrayDescriptor | ObjectDescriptor;

const scalarTypeNameSchema = z.enum([
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
]);

function isRecord(json: unknown): json is Record<string, unknown> {
  return typeof json === "object" && json !== null && !Array.isArray(json);
}

/**
 * Property maps are validated as Maps and rebuilt with `Object.fromEntries`,
 * which keeps every name (including `__proto__`) as an own property.
 */
const propertyMapSchema: z.ZodType<Record<string, TypeDescriptor>, z.ZodTypeDef, unknown> =
  z.lazy(() =>
    z
      .preprocess(
        (json) => (isRecord(json) ? new Map(Object.entries(json)) : json),
        z.map(z.string(), typeDescriptorSchema)
      )
      .transform((properties) => Object.fromEntries(properties))
  );

export const typeDescriptorSchema: z.ZodType<TypeDescriptor, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    scalarTypeNameSchema,
    z.object({ type: z.literal("array"), elementType: typeDescriptorSchema }),
    z.object({ type: z.literal("object"), properties: propertyMapSchema }),
  ])
);

export function isContainerDescriptor(
  descriptor: TypeDescriptor
): descriptor is ArrayDescriptor | ObjectDescriptor {
  return typeof descriptor !== "string";
}

/**
 * Infers the descriptor of a value. Arrays are assumed homogeneous: the element
 * type comes from the first element, or is `"object"` when the array is empty.
 */
export function inferSchema(value: Value, registry: TagRegistry = defaultRegistry): TypeDescriptor {
  switch (value.kind) {
    case "array":
      return {
        type: "array",
        elementType: value.items.length > 0 ? inferSchema(value.items[0], registry) : "object",
      };
    case "object":
      return inferFieldsSchema(value.fields, registry);
    default:
      return registry.typeNameFor(value.kind);
  }
}

/**
 * Infers the top-level object descriptor of a field map.
 */
export function inferFieldsSchema(
  fields: FieldMap,
  registry: TagRegistry = defaultRegistry
): ObjectDescriptor {
  const properties = Object.fromEntries(
    Array.from(fields, ([name, value]): [string, TypeDescriptor] => [name, inferSchema(value, registry)])
  );
  return { type: "object", properties };
}

/**
 * Checks a value against a scalar type name. Null matches only `"null"`;
 * `"object"` matches every other value.
 */
export function matchesTypeName(
  value: Value,
  typeName: ScalarTypeName,
  registry: TagRegistry = defaultRegistry
): boolean {
  if (value.kind === "null") {
    return typeName === "null";
  }
  if (typeName === "object") {
    return true;
  }
  return registry.typeNameFor(value.kind) === typeName;
}

/**
 * Validates decoded data against a top-level object descriptor.
 *
 * Every declared property must be present. Properties with a scalar descriptor
 * must match it exactly; properties with an array or object descriptor are
 * accepted whatever their value, and are not checked recursively.
 *
 * @throws SchemaValidationError naming the first offending field
 */
export function validateSchema(
  data: FieldMap,
  schema: TypeDescriptor,
  registry: TagRegistry = defaultRegistry
): void {
  if (typeof schema === "string" || schema.type !== "object") {
    return;
  }

  for (const [name, descriptor] of Object.entries(schema.properties)) {
    const value = data.get(name);
    if (value === undefined) {
      throw new SchemaValidationError(name, "missing");
    }
    if (isContainerDescriptor(descriptor)) {
      continue;
    }
    if (!matchesTypeName(value, descriptor, registry)) {
      const actual = value.kind === "null" ? "null" : registry.typeNameFor(value.kind);
      throw new SchemaValidationError(name, "type", `expected ${descriptor}, got ${actual}`);
    }
  }
}

/**
 * Renders a descriptor as schema block text.
 */
export function formatSchema(schema: TypeDescriptor): string {
  return JSON.stringify(schema);
}

/**
 * Parses schema block text. A bare property map without the object wrapper is
 * accepted and wrapped.
 *
 * @throws SchemaFormatError if the text is not JSON or not a descriptor
 */
export function parseSchema(text: string): TypeDescriptor {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new SchemaFormatError("Schema block is not valid JSON", { cause: err });
  }

  const descriptor = typeDescriptorSchema.safeParse(json);
  if (descriptor.success) {
    return descriptor.data;
  }

  const properties = propertyMapSchema.safeParse(json);
  if (properties.success) {
    return { type: "object", properties: properties.data };
  }

  throw new SchemaFormatError(
    `Schema block is not a type descriptor: ${descriptor.error.issues[0]?.message ?? "unknown shape"}`,
    { cause: descriptor.error }
  );
}
