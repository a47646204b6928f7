import { z } from "zod";
import { TypeGuard, type TObject } from "@sinclair/typebox";

export const ToolSpecSchema = z.object({
  name: z.string().regex(/^[a-zA-Z][a-zA-Z0-9_-]*$/),
  description: z.string().min(1),
  // TypeBox object schema; serialized as plain JSON Schema on the wire
  parameters: z.custom<TObject>(
    (value) => TypeGuard.IsObject(value),
    "parameters must be a TypeBox object schema"
  ),
});
export type ToolSpec = z.infer<typeof ToolSpecSchema>;

export const ToolInvocationSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  arguments: z.record(z.unknown()),
});
export type ToolInvocation = z.infer<typeof ToolInvocationSchema>;

export const ToolResultSchema = z.object({
  invocationId: z.string().min(1),
  name: z.string(),
  output: z.unknown(),
  error: z.string().optional(),
});
export type ToolResult = z.infer<typeof ToolResultSchema>;

/** Caller-supplied implementation of a tool. Receives already-validated arguments. */
export type ToolHandler = (args: Record<string, unknown>) => unknown;

export type ToolRegistry = ReadonlyMap<string, ToolHandler>;

/**
 * defineTool() validates a tool spec at definition time.
 *
 * @example
 * const getWeather = defineTool({
 *   name: "get_weather",
 *   description: "Get current weather by city.",
 *   parameters: Type.Object({ city: Type.String() }, { additionalProperties: false }),
 * });
 */
export function defineTool(spec: ToolSpec): ToolSpec {
  return Object.freeze(ToolSpecSchema.parse(spec));
}

/** Plain JSON Schema for a tool's parameters, without TypeBox's symbol keys. */
export function toolParametersJson(spec: ToolSpec): Record<string, unknown> {
  return Object.fromEntries(Object.entries(spec.parameters));
}
