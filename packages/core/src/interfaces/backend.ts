import { z } from "zod";
import type { ConversationTurn } from "./turn.js";
import type { ToolSpec } from "./tool.js";

// replay: the whole history goes out on every call.
// incremental: only turns the backend has not seen, chained by a response id.
export const TransportModeSchema = z.enum(["replay", "incremental"]);
export type TransportMode = z.infer<typeof TransportModeSchema>;

// weak guarantees syntactically valid JSON, strict guarantees the declared schema
export const SchemaModeSchema = z.enum(["none", "weak", "strict"]);
export type SchemaMode = z.infer<typeof SchemaModeSchema>;

export interface BackendCapabilities {
  readonly transport: TransportMode;
  /** Strongest output enforcement the backend offers. */
  readonly schemaMode: SchemaMode;
}

export interface BackendContext {
  readonly turns: readonly ConversationTurn[];
  readonly previousResponseId?: string;
}

export interface OutputRequest {
  readonly name: string;
  readonly description?: string;
  readonly jsonSchema: Record<string, unknown>;
  readonly mode: SchemaMode;
}

export interface BackendRequest {
  readonly context: BackendContext;
  readonly tools?: readonly ToolSpec[];
  readonly output?: OutputRequest;
  readonly signal?: AbortSignal;
}

export const RawToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  // some wire formats carry a JSON-encoded string, others a decoded object
  arguments: z.union([z.string(), z.record(z.unknown())]),
});
export type RawToolCall = z.infer<typeof RawToolCallSchema>;

// The normalizer receives exactly one reply type per call
export const BackendReplySchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("tool_calls"),
    calls: z.array(RawToolCallSchema).min(1),
    // assistant text sent alongside the calls, if any
    text: z.string().optional(),
    responseId: z.string().optional(),
  }),
  z.object({
    type: z.literal("text"),
    text: z.string(),
    responseId: z.string().optional(),
  }),
  z.object({
    type: z.literal("error"),
    code: z.string(),
    message: z.string(),
    retryable: z.boolean(),
  }),
]);
export type BackendReply = z.infer<typeof BackendReplySchema>;

export interface ExchangeBackend {
  readonly backendId: string;
  readonly capabilities: BackendCapabilities;

  send(request: BackendRequest): Promise<BackendReply>;
}
