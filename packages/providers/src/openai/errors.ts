import OpenAI from "openai";
import type { BackendReply } from "@structured-exchange/core";

type ErrorReply = Extract<BackendReply, { type: "error" }>;

/**
 * Maps anything the SDK throws to the error arm of BackendReply.
 * `retryable` is advisory only; retry policy belongs to the caller.
 */
export function normalizeError(error: unknown): ErrorReply {
  if (error instanceof OpenAI.APIUserAbortError) {
    return {
      type: "error",
      code: "aborted",
      message: error.message,
      retryable: false,
    };
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const retryable = status === undefined || status === 429 || (status >= 500 && status < 600);
    return {
      type: "error",
      code: status !== undefined ? String(status) : "connection",
      message: error.message,
      retryable,
    };
  }
  return {
    type: "error",
    code: "unknown",
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}
