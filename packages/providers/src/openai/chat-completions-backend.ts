import OpenAI from "openai";
import {
  contentToText,
  toolParametersJson,
  type BackendCapabilities,
  type BackendReply,
  type BackendRequest,
  type ConversationTurn,
  type ExchangeBackend,
  type OutputRequest,
  type ToolSpec,
} from "@structured-exchange/core";
import { normalizeError } from "./errors.js";

export interface ChatCompletionsBackendConfig {
  apiKey: string;
  model: string;
  baseURL?: string | undefined;
  /**
   * "weak" is JSON mode: valid JSON, not necessarily your schema.
   * "strict" sends the schema as `json_schema` with `strict: true`.
   */
  schemaMode?: "weak" | "strict" | undefined;
}

/**
 * Chat-style multi-turn endpoint. The endpoint keeps no state, so every
 * call replays the full history, tool calls and tool results included.
 */
export class ChatCompletionsBackend implements ExchangeBackend {
  readonly backendId = "openai-chat";
  readonly capabilities: BackendCapabilities;

  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: ChatCompletionsBackendConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    });
    this.model = config.model;
    this.capabilities = {
      transport: "replay",
      schemaMode: config.schemaMode ?? "weak",
    };
  }

  async send(request: BackendRequest): Promise<BackendReply> {
    try {
      const convertedTools = request.tools ? this.convertTools(request.tools) : undefined;
      const responseFormat = request.output ? this.responseFormat(request.output) : undefined;
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: this.convertTurns(request.context.turns),
          ...(convertedTools !== undefined
            ? { tools: convertedTools, tool_choice: "auto" as const, parallel_tool_calls: false }
            : {}),
          ...(responseFormat !== undefined ? { response_format: responseFormat } : {}),
        },
        request.signal !== undefined ? { signal: request.signal } : undefined
      );

      return this.normalizeResponse(response);
    } catch (error) {
      return normalizeError(error);
    }
  }

  private convertTurns(
    turns: readonly ConversationTurn[]
  ): OpenAI.ChatCompletionMessageParam[] {
    const result: OpenAI.ChatCompletionMessageParam[] = [];

    for (const turn of turns) {
      const content = contentToText(turn.content);
      if (turn.role === "system") {
        result.push({ role: "system", content });
      } else if (turn.role === "user") {
        result.push({ role: "user", content });
      } else if (turn.role === "assistant") {
        if (turn.invocations && turn.invocations.length > 0) {
          result.push({
            role: "assistant",
            content: content === "" ? null : content,
            tool_calls: turn.invocations.map((invocation) => ({
              id: invocation.id,
              type: "function" as const,
              function: {
                name: invocation.name,
                arguments: JSON.stringify(invocation.arguments),
              },
            })),
          });
        } else {
          result.push({ role: "assistant", content });
        }
      } else if (turn.role === "tool") {
        result.push({
          role: "tool",
          tool_call_id: turn.toolCallId ?? "",
          content,
        });
      }
    }

    return result;
  }

  private convertTools(tools: readonly ToolSpec[]): OpenAI.ChatCompletionTool[] {
    return tools.map((tool) => ({
      type: "function" as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: toolParametersJson(tool),
      },
    }));
  }

  private responseFormat(
    output: OutputRequest
  ): OpenAI.ChatCompletionCreateParams["response_format"] {
    switch (output.mode) {
      case "strict":
        return {
          type: "json_schema",
          json_schema: {
            name: output.name,
            ...(output.description !== undefined ? { description: output.description } : {}),
            schema: output.jsonSchema,
            strict: true,
          },
        };
      case "weak":
        return { type: "json_object" };
      case "none":
        return undefined;
    }
  }

  private normalizeResponse(response: OpenAI.ChatCompletion): BackendReply {
    const choice = response.choices[0];
    if (!choice) {
      return {
        type: "error",
        code: "no_choice",
        message: "No completion choice returned",
        retryable: false,
      };
    }

    // a refusal replaces content when the model declines
    const text = choice.message.content ?? choice.message.refusal ?? "";
    const toolCalls = choice.message.tool_calls ?? [];
    if (toolCalls.length > 0) {
      return {
        type: "tool_calls",
        calls: toolCalls.map((tc) => ({
          id: tc.id,
          name: tc.function.name,
          arguments: tc.function.arguments,
        })),
        ...(text !== "" ? { text } : {}),
      };
    }

    return { type: "text", text };
  }
}
