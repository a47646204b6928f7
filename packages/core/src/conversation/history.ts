import {
  ConversationTurnSchema,
  type ConversationTurn,
  type ConversationTurnInput,
  type History,
  type TurnContent,
} from "../interfaces/turn.js";
import type { ToolInvocation, ToolResult } from "../interfaces/tool.js";

// Freezes nested content, invocations and their arguments along with the turn.
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Validates and freezes a turn. Throws on an invalid turn. */
export function createTurn(input: ConversationTurnInput): ConversationTurn {
  return deepFreeze(ConversationTurnSchema.parse(input));
}

export function userTurn(content: string): ConversationTurn {
  return createTurn({ role: "user", content });
}

export function systemTurn(content: string): ConversationTurn {
  return createTurn({ role: "system", content });
}

export function assistantTurn(
  content: string,
  invocations?: readonly ToolInvocation[]
): ConversationTurn {
  return createTurn({
    role: "assistant",
    content,
    ...(invocations !== undefined && invocations.length > 0
      ? { invocations: [...invocations] }
      : {}),
  });
}

/**
 * A tool turn carries the originating invocation id. A failed tool is
 * reported to the model as `{ "error": "..." }`.
 */
export function toolTurn(result: ToolResult): ConversationTurn {
  const body = result.error !== undefined ? { error: result.error } : result.output;
  return createTurn({
    role: "tool",
    content: JSON.stringify(body) ?? "null",
    toolCallId: result.invocationId,
    toolName: result.name,
  });
}

// Histories only grow by copy; earlier snapshots stay valid.
export function appendTurns(
  history: History,
  ...turns: ConversationTurn[]
): History {
  return Object.freeze([...history, ...turns]);
}

export function contentToText(content: TurnContent): string {
  return typeof content === "string" ? content : JSON.stringify(content);
}
