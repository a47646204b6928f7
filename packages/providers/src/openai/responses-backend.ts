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
  type RawToolCall,
  type ToolSpec,
} from "@structured-exchange/core";
import { normalizeError } from "./errors.js";

export interface ResponsesBackendConfig {
  apiKey: string;
  model: string;
  baseURL?: string | undefined;
}

/**
 * Structured "responses" endpoint. Conversation state lives server-side, so
 * a continuation sends only the new items plus `previous_response_id`, and
 * output is held to the JSON schema with `strict: true`.
 */
export class ResponsesBackend implements ExchangeBackend {
  readonly backendId = "openai-responses";
  readonly capabilities: BackendCapabilities = {
    transport: "incremental",
    schemaMode: "strict",
  };

  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: ResponsesBackendConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    });
    this.model = config.model;
  }

  async send(request: BackendRequest): Promise<BackendReply> {
    try {
      const previous = request.context.previousResponseId;
      const convertedTools = request.tools ? this.convertTools(request.tools) : undefined;
      const format = request.output ? this.textFormat(request.output) : undefined;
      const response = await this.client.responses.create(
        {
          model: this.model,
          input: this.convertTurns(request.context.turns),
          ...(previous !== undefined ? { previous_response_id: previous } : {}),
          ...(convertedTools !== undefined
            ? { tools: convertedTools, tool_choice: "auto" as const, parallel_tool_calls: false }
            : {}),
          ...(format !== undefined ? { text: { format } } : {}),
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
  ): OpenAI.Responses.ResponseInputItem[] {
    const result: OpenAI.Responses.ResponseInputItem[] = [];

    for (const turn of turns) {
      const content = contentToText(turn.content);
      if (turn.role === "tool") {
        result.push({
          type: "function_call_output",
          call_id: turn.toolCallId ?? "",
          output: content,
        });
        continue;
      }

      if (content !== "") {
        result.push({ role: turn.role, content });
      }
      // Only replayed when the server-side chain is unavailable.
      for (const invocation of turn.invocations ?? []) {
        result.push({
          type: "function_call",
          call_id: invocation.id,
          name: invocation.name,
          arguments: JSON.stringify(invocation.arguments),
        });
      }
    }

    return result;
  }

  private convertTools(tools: readonly ToolSpec[]): OpenAI.Responses.FunctionTool[] {
    return tools.map((tool) => ({
      type: "function" as const,
      name: tool.name,
      description: tool.description,
      parameters: toolParametersJson(tool),
      strict: false,
    }));
  }

  private textFormat(
    output: OutputRequest
  ): OpenAI.Responses.ResponseFormatTextConfig | undefined {
    switch (output.mode) {
      case "strict":
        return {
          type: "json_schema",
          name: output.name,
          ...(output.description !== undefined ? { description: output.description } : {}),
          schema: output.jsonSchema,
          strict: true,
        };
      case "weak":
        return { type: "json_object" };
      case "none":
        return undefined;
    }
  }

  private normalizeResponse(response: OpenAI.Responses.Response): BackendReply {
    if (response.error) {
      return {
        type: "error",
        code: response.error.code,
        message: response.error.message,
        retryable: false,
      };
    }

    const calls: RawToolCall[] = [];
    let text = "";

    for (const item of response.output) {
      if (item.type === "function_call") {
        calls.push({
          // call_id correlates the result; older payloads only carry id
          id: item.call_id || (item.id ?? ""),
          name: item.name,
          arguments: item.arguments,
        });
      } else if (item.type === "message") {
        for (const part of item.content) {
          if (part.type === "output_text") {
            text += part.text;
          } else if (part.type === "refusal") {
            text += part.refusal;
          }
        }
      }
    }

    if (calls.length > 0) {
      return {
        type: "tool_calls",
        calls,
        ...(text !== "" ? { text } : {}),
        responseId: response.id,
      };
    }
    return { type: "text", text, responseId: response.id };
  }
}
