/**
 * Agent loop states and per-run bookkeeping
 *
 * IDLE → RECEIVING_INPUT → CALLING_LLM → PROCESSING_RESPONSE
 *   ├─ no tool use → COMPLETED
 *   └─ EXECUTING_TOOLS → CHECKING_CONTEXT → CALLING_LLM (next turn)
 * ERROR is reachable from any state.
 */

export const LoopState = {
  IDLE: "idle",
  RECEIVING_INPUT: "receiving_input",
  CALLING_LLM: "calling_llm",
  PROCESSING_RESPONSE: "processing_response",
  EXECUTING_TOOLS: "executing_tools",
  CHECKING_CONTEXT: "checking_context",
  COMPLETED: "completed",
  ERROR: "error",
} as const;

export type LoopState = (typeof LoopState)[keyof typeof LoopState];

export const TerminationReason = {
  END_TURN: "end_turn",
  MAX_TURNS: "max_turns",
  USER_INTERRUPT: "user_interrupt",
  ERROR: "error",
} as const;

export type TerminationReason = (typeof TerminationReason)[keyof typeof TerminationReason];

export interface LoopContextSnapshot {
  state: LoopState;
  terminationReason: TerminationReason | null;
  currentTurn: number;
  maxTurns: number;
  totalLlmCalls: number;
  totalToolCalls: number;
  durationMs: number;
  lastError: string | null;
}

const DEFAULT_MAX_TURNS = 20;

/**
 * Mutable record of one run() call; reset at the start of every run
 */
export class LoopContext {
  state: LoopState = LoopState.IDLE;
  terminationReason: TerminationReason | null = null;
  currentTurn = 0;
  maxTurns: number;
  totalLlmCalls = 0;
  totalToolCalls = 0;
  startTime: number | null = null;
  endTime: number | null = null;
  lastError: unknown = null;
  stateHistory: LoopState[] = [];

  constructor(maxTurns = DEFAULT_MAX_TURNS) {
    this.maxTurns = maxTurns;
  }

  reset(maxTurns = this.maxTurns): void {
    this.state = LoopState.IDLE;
    this.terminationReason = null;
    this.currentTurn = 0;
    this.maxTurns = maxTurns;
    this.totalLlmCalls = 0;
    this.totalToolCalls = 0;
    this.startTime = null;
    this.endTime = null;
    this.lastError = null;
    this.stateHistory = [];
  }

  /** Enter a state; returns the state that was left. */
  recordState(state: LoopState): LoopState {
    const previous = this.state;
    this.state = state;
    this.stateHistory.push(state);
    return previous;
  }

  get isRunning(): boolean {
    return this.state !== LoopState.IDLE && !this.isFinished;
  }

  get isFinished(): boolean {
    return this.state === LoopState.COMPLETED || this.state === LoopState.ERROR;
  }

  get durationMs(): number {
    if (this.startTime === null) return 0;
    return (this.endTime ?? Date.now()) - this.startTime;
  }

  toJSON(): LoopContextSnapshot {
    return {
      state: this.state,
      terminationReason: this.terminationReason,
      currentTurn: this.currentTurn,
      maxTurns: this.maxTurns,
      totalLlmCalls: this.totalLlmCalls,
      totalToolCalls: this.totalToolCalls,
      durationMs: this.durationMs,
      lastError: this.lastError === null ? null : describeLastError(this.lastError),
    };
  }
}

function describeLastError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
