import type { z } from "zod";
import type { ExchangeResult } from "../interfaces/exchange.js";
import type { OutputSchema, StructuredData } from "../interfaces/output-schema.js";
import type {
  ToolInvocation,
  ToolRegistry,
  ToolResult,
  ToolSpec,
} from "../interfaces/tool.js";
import type { ConversationTurn, History } from "../interfaces/turn.js";
import { ToolDispatcher } from "../dispatch/tool-dispatcher.js";
import type { StructuredExchangeNormalizer } from "../exchange/normalizer.js";
import { ExchangeState, type ExchangePhase } from "../exchange/exchange-state.js";

const DEFAULT_MAX_TOOL_ROUNDS = 4;

export interface RunExchangeOptions<T extends z.ZodRawShape> {
  normalizer: StructuredExchangeNormalizer;
  tools: readonly ToolSpec[];
  handlers: ToolRegistry;
  /** Builds the turn sent alongside each tool result */
  followUp: (invocation: ToolInvocation, result: ToolResult, round: number) => ConversationTurn;
  outputSchema?: OutputSchema<T> | undefined;
  /** Only enforce `outputSchema` once a tool result has gone back to the model */
  deferOutputSchema?: boolean | undefined;
  /** Tool round trips allowed before the runner hands the pending call back */
  maxToolRounds?: number | undefined;
  onPhaseChange?: ((phase: ExchangePhase) => void) | undefined;
  onToolResult?: ((result: ToolResult) => void) | undefined;
}

export interface ExchangeOutcome<T> {
  result: ExchangeResult<T>;
  phase: ExchangePhase;
  toolResults: ToolResult[];
}

/**
 * Drives one multi-step exchange:
 * submit → (dispatch tool → resume)* → answer | structured | error.
 *
 * When `maxToolRounds` is exhausted the last `tool_call` result is returned
 * unresolved, with the phase left at `tool_requested`.
 */
export async function runExchange<T extends z.ZodRawShape = z.ZodRawShape>(
  history: History,
  options: RunExchangeOptions<T>
): Promise<ExchangeOutcome<StructuredData<T>>> {
  const state = new ExchangeState(options.onPhaseChange);
  const dispatcher = new ToolDispatcher();
  const maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
  const toolResults: ToolResult[] = [];

  let result = await options.normalizer.submit(
    history,
    options.tools,
    options.deferOutputSchema ? undefined : options.outputSchema
  );

  let round = 0;
  while (result.type === "tool_call") {
    state.transition("tool_requested");
    if (round >= maxToolRounds) {
      return { result, phase: state.phase, toolResults };
    }

    const toolResult = await dispatcher.dispatch(result.invocation, options.handlers);
    toolResults.push(toolResult);
    options.onToolResult?.(toolResult);
    state.transition("tool_executed");

    state.transition("awaiting_model");
    result = await options.normalizer.resume(
      result.context,
      toolResult,
      options.followUp(result.invocation, toolResult, round),
      options.outputSchema
    );
    round++;
  }

  state.transition(result.type === "error" ? "failed" : "answered");
  return { result, phase: state.phase, toolResults };
}
