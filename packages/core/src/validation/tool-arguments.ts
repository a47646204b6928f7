import { Value } from "@sinclair/typebox/value";
import type { ToolSpec } from "../interfaces/tool.js";
import type { RawToolCall } from "../interfaces/backend.js";
import type { ExchangeError } from "../interfaces/exchange.js";
import { decodeJson, isRecord } from "./json.js";

export type ArgumentCheck =
  | { ok: true; arguments: Record<string, unknown> }
  | { ok: false; error: ExchangeError };

/**
 * Brings tool arguments into one shape. Backends hand them over either
 * JSON-encoded or already decoded; an empty string means "no arguments".
 */
export function normalizeArguments(raw: RawToolCall["arguments"]): ArgumentCheck {
  if (typeof raw !== "string") {
    return { ok: true, arguments: raw };
  }
  if (raw.trim() === "") {
    return { ok: true, arguments: {} };
  }

  const decoded = decodeJson(raw);
  if (!decoded.ok) {
    return {
      ok: false,
      error: {
        kind: "JsonDecodeError",
        message: `Tool arguments are not valid JSON: ${decoded.reason}`,
        payload: raw,
      },
    };
  }
  if (!isRecord(decoded.value)) {
    return {
      ok: false,
      error: {
        kind: "SchemaMismatch",
        message: "Tool arguments must be a JSON object.",
        payload: decoded.value,
      },
    };
  }
  return { ok: true, arguments: decoded.value };
}

/** Checks arguments against the tool's parameter schema. No coercion. */
export function validateArguments(
  spec: ToolSpec,
  args: Record<string, unknown>
): ExchangeError | undefined {
  const issues = [...Value.Errors(spec.parameters, args)];
  if (issues.length === 0) {
    return undefined;
  }
  const detail = issues
    .map((issue) => `${issue.path === "" ? "/" : issue.path}: ${issue.message}`)
    .join("; ");
  return {
    kind: "SchemaMismatch",
    message: `Arguments for tool '${spec.name}' do not match its parameter schema: ${detail}`,
    payload: args,
  };
}
