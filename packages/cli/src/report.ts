import type { ExchangeResult } from "@structured-exchange/core";

export interface Report {
  stream: "stdout" | "stderr";
  text: string;
  exitCode: number;
}

/** Renders a terminal exchange result for the console. */
export function formatResult<T>(result: ExchangeResult<T>): Report {
  switch (result.type) {
    case "structured":
      return { stream: "stdout", text: JSON.stringify(result.data, null, 2), exitCode: 0 };
    case "answer":
      return { stream: "stdout", text: result.text, exitCode: 0 };
    case "tool_call":
      return {
        stream: "stderr",
        text: `Exchange stopped with tool '${result.invocation.name}' still pending (${result.invocation.id}).`,
        exitCode: 1,
      };
    case "error":
      return {
        stream: "stderr",
        text: `${result.error.kind}: ${result.error.message}`,
        exitCode: 1,
      };
  }
}
