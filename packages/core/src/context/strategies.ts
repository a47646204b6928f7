import type { BackendContext, TransportMode } from "../interfaces/backend.js";
import type { ExchangeContext } from "../interfaces/exchange.js";
import type { History } from "../interfaces/turn.js";

/**
 * Decides how much of an exchange goes out on each backend call. Both
 * strategies honour the same submit/resume contract; the backend's
 * transport capability picks one.
 */
export interface ContextStrategy {
  readonly transport: TransportMode;
  initial(history: History): BackendContext;
  continuation(context: ExchangeContext): BackendContext;
}

/** Chat-style backends keep no state: replay everything, every time. */
export class FullHistoryStrategy implements ContextStrategy {
  readonly transport = "replay" as const;

  initial(history: History): BackendContext {
    return { turns: history };
  }

  continuation(context: ExchangeContext): BackendContext {
    return { turns: context.history };
  }
}

/**
 * Stateful backends already hold the acknowledged prefix, so only the
 * delta (tool result + new turn) is sent, chained by `previousResponseId`.
 * Without a continuation handle this degrades to a full replay.
 */
export class IncrementalStrategy implements ContextStrategy {
  readonly transport = "incremental" as const;

  initial(history: History): BackendContext {
    return { turns: history };
  }

  continuation(context: ExchangeContext): BackendContext {
    if (context.responseId === undefined) {
      return { turns: context.history };
    }
    return {
      turns: context.history.slice(context.acknowledged),
      previousResponseId: context.responseId,
    };
  }
}

export function strategyFor(transport: TransportMode): ContextStrategy {
  switch (transport) {
    case "replay":
      return new FullHistoryStrategy();
    case "incremental":
      return new IncrementalStrategy();
    default: {
      const _exhaustive: never = transport;
      throw new Error(`Unknown transport: ${String(_exhaustive)}`);
    }
  }
}
