// ── Interfaces ────────────────────────────────────────────────────────────────

// turn
export { RoleSchema, TurnContentSchema, ConversationTurnSchema } from "./interfaces/turn.js";
export type {
  Role,
  TurnContent,
  ConversationTurn,
  ConversationTurnInput,
  History,
} from "./interfaces/turn.js";

// tool
export {
  ToolSpecSchema,
  ToolInvocationSchema,
  defineTool,
  toolParametersJson,
} from "./interfaces/tool.js";
export type {
  ToolSpec,
  ToolInvocation,
  ToolResult,
  ToolHandler,
  ToolRegistry,
} from "./interfaces/tool.js";

// output-schema
export { defineOutputSchema, toJsonSchema } from "./interfaces/output-schema.js";
export type { OutputSchema, StructuredData } from "./interfaces/output-schema.js";

// backend
export { RawToolCallSchema, BackendReplySchema } from "./interfaces/backend.js";
export type {
  TransportMode,
  SchemaMode,
  BackendCapabilities,
  BackendContext,
  OutputRequest,
  BackendRequest,
  RawToolCall,
  BackendReply,
  ExchangeBackend,
} from "./interfaces/backend.js";

// exchange
export { failure } from "./interfaces/exchange.js";
export type {
  ExchangeErrorKind,
  ExchangeError,
  ExchangeContext,
  ExchangeFailure,
  ExchangeResult,
} from "./interfaces/exchange.js";

// ── Conversation ──────────────────────────────────────────────────────────────

export {
  createTurn,
  userTurn,
  systemTurn,
  assistantTurn,
  toolTurn,
  appendTurns,
  contentToText,
} from "./conversation/history.js";

// ── Validation ────────────────────────────────────────────────────────────────

export { decodeJson, isRecord } from "./validation/json.js";
export type { Decoded } from "./validation/json.js";
export { normalizeArguments, validateArguments } from "./validation/tool-arguments.js";
export type { ArgumentCheck } from "./validation/tool-arguments.js";
export { parseStructured } from "./validation/structured-output.js";
export type { StructuredCheck } from "./validation/structured-output.js";

// ── Context strategies ────────────────────────────────────────────────────────

export {
  FullHistoryStrategy,
  IncrementalStrategy,
  strategyFor,
} from "./context/strategies.js";
export type { ContextStrategy } from "./context/strategies.js";

// ── Exchange ──────────────────────────────────────────────────────────────────

export { StructuredExchangeNormalizer } from "./exchange/normalizer.js";
export type { NormalizerOptions } from "./exchange/normalizer.js";

export { ExchangeState, isTerminal } from "./exchange/exchange-state.js";
export type { ExchangePhase } from "./exchange/exchange-state.js";

// ── Dispatch ──────────────────────────────────────────────────────────────────

export { ToolDispatcher } from "./dispatch/tool-dispatcher.js";

// ── Runtime ───────────────────────────────────────────────────────────────────

export { runExchange } from "./runtime/exchange-runner.js";
export type { RunExchangeOptions, ExchangeOutcome } from "./runtime/exchange-runner.js";
