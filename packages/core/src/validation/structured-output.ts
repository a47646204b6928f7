import type { z } from "zod";
import type { OutputSchema, StructuredData } from "../interfaces/output-schema.js";
import type { ExchangeError } from "../interfaces/exchange.js";
import { decodeJson } from "./json.js";

export type StructuredCheck<T> =
  | { ok: true; data: T }
  | { ok: false; error: ExchangeError };

/**
 * Decodes a response body and checks it against the output schema.
 * Missing, extra and mistyped fields are all rejected.
 */
export function parseStructured<T extends z.ZodRawShape>(
  raw: string,
  output: OutputSchema<T>
): StructuredCheck<StructuredData<T>> {
  const decoded = decodeJson(raw);
  if (!decoded.ok) {
    return {
      ok: false,
      error: {
        kind: "JsonDecodeError",
        message: `Response body is not valid JSON: ${decoded.reason}`,
        payload: raw,
      },
    };
  }

  const result = output.schema.safeParse(decoded.value);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    return {
      ok: false,
      error: {
        kind: "SchemaMismatch",
        message: `Response does not match ${output.name}: ${issues}`,
        payload: decoded.value,
      },
    };
  }
  return { ok: true, data: result.data };
}
