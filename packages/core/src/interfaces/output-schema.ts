import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

/**
 * A named record type a final answer must conform to. The zod object is
 * strict: unknown keys fail validation instead of being stripped.
 */
export interface OutputSchema<T extends z.ZodRawShape = z.ZodRawShape> {
  readonly name: string;
  readonly description?: string;
  readonly schema: z.ZodObject<T, "strict">;
}

export type StructuredData<T extends z.ZodRawShape> = z.infer<z.ZodObject<T, "strict">>;

const OUTPUT_SCHEMA_NAME = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * @example
 * const PackAdvice = defineOutputSchema("PackAdvice", {
 *   umbrella: z.boolean(),
 *   rationale: z.string(),
 * });
 */
export function defineOutputSchema<T extends z.ZodRawShape>(
  name: string,
  shape: T,
  description?: string
): OutputSchema<T> {
  if (!OUTPUT_SCHEMA_NAME.test(name)) {
    throw new Error(
      `Invalid output schema name '${name}': use 1-64 letters, digits, '_' or '-'.`
    );
  }
  return Object.freeze({
    name,
    schema: z.object(shape).strict(),
    ...(description !== undefined ? { description } : {}),
  });
}

/**
 * JSON Schema (draft-07) for the backend's schema enforcement. Inlines
 * every definition and drops the `$schema` marker.
 */
export function toJsonSchema<T extends z.ZodRawShape>(
  output: OutputSchema<T>
): Record<string, unknown> {
  const generated = zodToJsonSchema(output.schema, {
    $refStrategy: "none",
    target: "jsonSchema7",
  });
  return Object.fromEntries(
    Object.entries(generated).filter(([key]) => key !== "$schema")
  );
}
