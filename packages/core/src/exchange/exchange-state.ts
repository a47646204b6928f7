export type ExchangePhase =
  | "awaiting_model"
  | "tool_requested"
  | "tool_executed"
  | "answered"
  | "failed";

const TRANSITIONS: Record<ExchangePhase, readonly ExchangePhase[]> = {
  awaiting_model: ["tool_requested", "answered", "failed"],
  tool_requested: ["tool_executed", "failed"],
  tool_executed: ["awaiting_model", "failed"],
  answered: [],
  failed: [],
};

export function isTerminal(phase: ExchangePhase): boolean {
  return TRANSITIONS[phase].length === 0;
}

// One instance per exchange. Turns within an exchange are strictly sequential.
export class ExchangeState {
  private _phase: ExchangePhase = "awaiting_model";
  private readonly _trail: ExchangePhase[] = ["awaiting_model"];

  constructor(
    private readonly onPhaseChange?: ((phase: ExchangePhase) => void) | undefined
  ) {}

  get phase(): ExchangePhase {
    return this._phase;
  }

  get trail(): readonly ExchangePhase[] {
    return [...this._trail];
  }

  transition(next: ExchangePhase): void {
    if (!TRANSITIONS[this._phase].includes(next)) {
      throw new Error(`Illegal exchange transition: ${this._phase} -> ${next}`);
    }
    this._phase = next;
    this._trail.push(next);
    this.onPhaseChange?.(next);
  }
}
