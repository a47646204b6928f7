import { z } from "zod";
import type { History } from "./turn.js";
import type { ToolInvocation, ToolSpec } from "./tool.js";

export const ExchangeErrorKindSchema = z.enum([
  "TransportError",
  "JsonDecodeError",
  "SchemaMismatch",
]);
export type ExchangeErrorKind = z.infer<typeof ExchangeErrorKindSchema>;

export interface ExchangeError {
  readonly kind: ExchangeErrorKind;
  readonly message: string;
  /** The offending body or object, for caller-driven reprompts. */
  readonly payload?: unknown;
}

// Everything needed to resume an exchange. Never shared between exchanges.
export interface ExchangeContext {
  readonly history: History;
  readonly tools: readonly ToolSpec[];
  /** Continuation handle from backends with incremental transport. */
  readonly responseId?: string;
  /** Number of leading history turns the backend holds under `responseId`. */
  readonly acknowledged: number;
  readonly pending?: ToolInvocation;
}

export interface ExchangeFailure {
  readonly type: "error";
  readonly error: ExchangeError;
}

export type ExchangeResult<T = Record<string, unknown>> =
  | { readonly type: "answer"; readonly text: string; readonly context: ExchangeContext }
  | { readonly type: "tool_call"; readonly invocation: ToolInvocation; readonly context: ExchangeContext }
  | { readonly type: "structured"; readonly data: T; readonly context: ExchangeContext }
  | ExchangeFailure;

export function failure(
  kind: ExchangeErrorKind,
  message: string,
  payload?: unknown
): ExchangeFailure {
  return {
    type: "error",
    error: payload !== undefined ? { kind, message, payload } : { kind, message },
  };
}
