import type { ToolInvocation, ToolRegistry, ToolResult } from "../interfaces/tool.js";

/**
 * ToolDispatcher runs the caller's implementation of a requested tool.
 *
 * - Arguments arrive already validated against the tool's parameter schema.
 * - Handlers may be synchronous or return a promise.
 * - A tool missing from the registry, or a handler that throws, produces a
 *   ToolResult with `error` set rather than propagating, so the model can
 *   be told what went wrong.
 * - Every result carries the invocation id it answers.
 */
export class ToolDispatcher {
  async dispatch(
    invocation: ToolInvocation,
    registry: ToolRegistry
  ): Promise<ToolResult> {
    const handler = registry.get(invocation.name);
    if (!handler) {
      return {
        invocationId: invocation.id,
        name: invocation.name,
        output: null,
        error: `Tool '${invocation.name}' has no registered handler.`,
      };
    }

    try {
      const output: unknown = await handler(invocation.arguments);
      return {
        invocationId: invocation.id,
        name: invocation.name,
        output,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        invocationId: invocation.id,
        name: invocation.name,
        output: null,
        error: message,
      };
    }
  }
}
