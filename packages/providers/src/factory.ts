import type { ExchangeBackend } from "@structured-exchange/core";
import { ChatCompletionsBackend } from "./openai/chat-completions-backend.js";
import { ResponsesBackend } from "./openai/responses-backend.js";

export type BackendConfig =
  | {
      api: "chat";
      apiKey: string;
      model: string;
      baseURL?: string | undefined;
      schemaMode?: "weak" | "strict" | undefined;
    }
  | {
      api: "responses";
      apiKey: string;
      model: string;
      baseURL?: string | undefined;
    };

/**
 * createBackend() instantiates the ExchangeBackend for one calling
 * convention of the hosted API.
 *
 * @example
 * const backend = createBackend({
 *   api: "responses",
 *   apiKey: process.env.OPENAI_API_KEY ?? "",
 *   model: "gpt-4o-mini",
 * });
 */
export function createBackend(config: BackendConfig): ExchangeBackend {
  switch (config.api) {
    case "chat":
      return new ChatCompletionsBackend({
        apiKey: config.apiKey,
        model: config.model,
        baseURL: config.baseURL,
        schemaMode: config.schemaMode,
      });

    case "responses":
      return new ResponsesBackend({
        apiKey: config.apiKey,
        model: config.model,
        baseURL: config.baseURL,
      });

    default: {
      // TypeScript exhaustiveness check
      const _exhaustive: never = config;
      throw new Error(`Unknown api: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
