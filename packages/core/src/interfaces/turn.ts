import { z } from "zod";
import { ToolInvocationSchema } from "./tool.js";

export const RoleSchema = z.enum(["user", "assistant", "tool", "system"]);
export type Role = z.infer<typeof RoleSchema>;

export const TurnContentSchema = z.union([
  z.string(),
  z.record(z.unknown()),
  z.array(z.unknown()),
]);
export type TurnContent = z.infer<typeof TurnContentSchema>;

export const ConversationTurnSchema = z
  .object({
    role: RoleSchema,
    content: TurnContentSchema,
    toolCallId: z.string().min(1).optional(),  // for role=tool turns
    toolName: z.string().optional(),
    invocations: z.array(ToolInvocationSchema).optional(),  // tool calls an assistant turn made
  })
  .refine((turn) => turn.role !== "tool" || turn.toolCallId !== undefined, {
    message: "tool turns must carry a toolCallId",
    path: ["toolCallId"],
  });
export type ConversationTurn = Readonly<z.infer<typeof ConversationTurnSchema>>;
export type ConversationTurnInput = z.input<typeof ConversationTurnSchema>;

export type History = readonly ConversationTurn[];
