import type { z } from "zod";
import {
  BackendReplySchema,
  type BackendContext,
  type BackendReply,
  type ExchangeBackend,
  type OutputRequest,
  type SchemaMode,
} from "../interfaces/backend.js";
import {
  failure,
  type ExchangeContext,
  type ExchangeFailure,
  type ExchangeResult,
} from "../interfaces/exchange.js";
import {
  toJsonSchema,
  type OutputSchema,
  type StructuredData,
} from "../interfaces/output-schema.js";
import type { ToolInvocation, ToolResult, ToolSpec } from "../interfaces/tool.js";
import type { ConversationTurn, History } from "../interfaces/turn.js";
import { appendTurns, assistantTurn, toolTurn } from "../conversation/history.js";
import { strategyFor, type ContextStrategy } from "../context/strategies.js";
import { normalizeArguments, validateArguments } from "../validation/tool-arguments.js";
import { parseStructured } from "../validation/structured-output.js";
import type { ExchangePhase } from "./exchange-state.js";

export interface NormalizerOptions {
  backend: ExchangeBackend;
  /** Overrides the strategy the backend's transport capability selects. */
  strategy?: ContextStrategy | undefined;
  /** Called on each phase an exchange step passes through */
  onPhaseChange?: ((phase: ExchangePhase) => void) | undefined;
  /** Forwarded to the backend; an abandoned request surfaces as TransportError */
  signal?: AbortSignal | undefined;
  /**
   * Asks for weaker output enforcement than the backend offers. Never
   * raises it above `backend.capabilities.schemaMode`.
   */
  schemaMode?: SchemaMode | undefined;
}

const SCHEMA_MODE_RANK: Record<SchemaMode, number> = { none: 0, weak: 1, strict: 2 };

/**
 * StructuredExchangeNormalizer turns one backend round trip into exactly
 * one ExchangeResult: a validated tool call, a free-text answer, a
 * schema-conforming object, or a typed error.
 *
 * It keeps no per-exchange state. Everything needed to continue is in the
 * returned `context`, so one instance can serve concurrent exchanges.
 * Nothing is retried.
 */
export class StructuredExchangeNormalizer {
  private readonly backend: ExchangeBackend;
  private readonly strategy: ContextStrategy;
  private readonly options: NormalizerOptions;

  constructor(options: NormalizerOptions) {
    this.backend = options.backend;
    this.strategy = options.strategy ?? strategyFor(options.backend.capabilities.transport);
    this.options = options;
  }

  async submit<T extends z.ZodRawShape = z.ZodRawShape>(
    history: History,
    tools: readonly ToolSpec[] = [],
    outputSchema?: OutputSchema<T>
  ): Promise<ExchangeResult<StructuredData<T>>> {
    if (history.length === 0) {
      return this.fail(failure("SchemaMismatch", "History must contain at least one turn."));
    }

    const names = new Set<string>();
    for (const tool of tools) {
      if (names.has(tool.name)) {
        return this.fail(
          failure("SchemaMismatch", `Tool '${tool.name}' is registered more than once.`)
        );
      }
      names.add(tool.name);
    }

    const context: ExchangeContext = {
      history: Object.freeze([...history]),
      tools,
      acknowledged: 0,
    };
    return this.exchange(context, this.strategy.initial(context.history), outputSchema);
  }

  async resume<T extends z.ZodRawShape = z.ZodRawShape>(
    priorContext: ExchangeContext,
    toolResult: ToolResult,
    nextTurn: ConversationTurn,
    outputSchema?: OutputSchema<T>
  ): Promise<ExchangeResult<StructuredData<T>>> {
    const pending = priorContext.pending;
    if (pending === undefined) {
      return this.fail(
        failure("SchemaMismatch", "No tool invocation is awaiting a result in this context.")
      );
    }
    if (toolResult.invocationId !== pending.id) {
      return this.fail(
        failure(
          "SchemaMismatch",
          `Tool result for '${toolResult.invocationId}' does not match pending invocation '${pending.id}'.`,
          toolResult
        )
      );
    }

    this.options.onPhaseChange?.("tool_executed");

    const context: ExchangeContext = {
      history: appendTurns(priorContext.history, toolTurn(toolResult), nextTurn),
      tools: priorContext.tools,
      acknowledged: priorContext.acknowledged,
      ...(priorContext.responseId !== undefined ? { responseId: priorContext.responseId } : {}),
    };
    return this.exchange(context, this.strategy.continuation(context), outputSchema);
  }

  private async exchange<T extends z.ZodRawShape>(
    context: ExchangeContext,
    sent: BackendContext,
    outputSchema: OutputSchema<T> | undefined
  ): Promise<ExchangeResult<StructuredData<T>>> {
    this.options.onPhaseChange?.("awaiting_model");

    let raw: unknown;
    try {
      raw = await this.backend.send({
        context: sent,
        ...(context.tools.length > 0 ? { tools: context.tools } : {}),
        ...(outputSchema !== undefined ? { output: this.outputRequest(outputSchema) } : {}),
        ...(this.options.signal !== undefined ? { signal: this.options.signal } : {}),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return this.fail(
        failure("TransportError", `${this.backend.backendId} request failed: ${message}`, err)
      );
    }

    const checked = BackendReplySchema.safeParse(raw);
    if (!checked.success) {
      const issues = checked.error.issues
        .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
        .join("; ");
      return this.fail(
        failure("TransportError", `${this.backend.backendId} returned a malformed reply: ${issues}`, raw)
      );
    }
    const reply = checked.data;

    if (reply.type === "error") {
      return this.fail(
        failure(
          "TransportError",
          `${this.backend.backendId} request failed (${reply.code}): ${reply.message}`,
          reply
        )
      );
    }

    if (reply.type === "tool_calls") {
      return this.toolCall(context, reply);
    }

    const advanced = this.advance(context, assistantTurn(reply.text), reply.responseId);

    if (outputSchema === undefined) {
      this.options.onPhaseChange?.("answered");
      return { type: "answer", text: reply.text, context: advanced };
    }

    const parsed = parseStructured(reply.text, outputSchema);
    if (!parsed.ok) {
      return this.fail({ type: "error", error: parsed.error });
    }
    this.options.onPhaseChange?.("answered");
    return { type: "structured", data: parsed.data, context: advanced };
  }

  /** Resolves the first requested call; one tool runs per exchange step. */
  private toolCall(
    context: ExchangeContext,
    reply: Extract<BackendReply, { type: "tool_calls" }>
  ): ExchangeResult<never> {
    const [call] = reply.calls;
    if (call === undefined) {
      return this.fail(failure("SchemaMismatch", "Backend reported a tool call without any calls."));
    }

    if (call.id === "") {
      return this.fail(
        failure("SchemaMismatch", `Tool call '${call.name}' carries no invocation id.`, call)
      );
    }

    const spec = context.tools.find((tool) => tool.name === call.name);
    if (spec === undefined) {
      return this.fail(
        failure("SchemaMismatch", `Backend requested unregistered tool '${call.name}'.`, call)
      );
    }

    const normalized = normalizeArguments(call.arguments);
    if (!normalized.ok) {
      return this.fail({ type: "error", error: normalized.error });
    }

    const mismatch = validateArguments(spec, normalized.arguments);
    if (mismatch !== undefined) {
      return this.fail({ type: "error", error: mismatch });
    }

    const invocation: ToolInvocation = {
      id: call.id,
      name: call.name,
      arguments: normalized.arguments,
    };
    const advanced = this.advance(
      context,
      assistantTurn(reply.text ?? "", [invocation]),
      reply.responseId
    );

    this.options.onPhaseChange?.("tool_requested");
    return {
      type: "tool_call",
      invocation,
      context: { ...advanced, pending: invocation },
    };
  }

  private advance(
    context: ExchangeContext,
    turn: ConversationTurn,
    responseId: string | undefined
  ): ExchangeContext {
    const history = appendTurns(context.history, turn);
    if (responseId === undefined) {
      return { history, tools: context.tools, acknowledged: 0 };
    }
    // The backend now holds everything up to and including its own reply.
    return { history, tools: context.tools, responseId, acknowledged: history.length };
  }

  private outputRequest<T extends z.ZodRawShape>(output: OutputSchema<T>): OutputRequest {
    return {
      name: output.name,
      ...(output.description !== undefined ? { description: output.description } : {}),
      jsonSchema: toJsonSchema(output),
      mode: this.schemaMode(),
    };
  }

  private schemaMode(): SchemaMode {
    const offered = this.backend.capabilities.schemaMode;
    const requested = this.options.schemaMode;
    if (requested === undefined || SCHEMA_MODE_RANK[requested] >= SCHEMA_MODE_RANK[offered]) {
      return offered;
    }
    return requested;
  }

  private fail(result: ExchangeFailure): ExchangeFailure {
    this.options.onPhaseChange?.("failed");
    return result;
  }
}
