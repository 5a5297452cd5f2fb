/**
 * Agent main loop
 *
 * One run() call drives the state machine until the model stops asking for tools:
 *
 * IDLE → RECEIVING_INPUT → CALLING_LLM → PROCESSING_RESPONSE
 *   ├─ no tool use → COMPLETED (END_TURN, the only normal exit)
 *   └─ EXECUTING_TOOLS → CHECKING_CONTEXT → CALLING_LLM (next turn)
 *
 * - Tool calls of one turn run sequentially in request order; all their
 *   results go back in a single user message
 * - max turns without END_TURN → MAX_TURNS, returned as a fixed message
 * - AbortSignal → USER_INTERRUPT, returned as a fixed message; a running tool is
 *   abandoned and unanswered tool uses are closed first so the transcript stays valid
 * - Anything else → ERROR state, recorded on the context, rethrown
 * - Provider errors are never retried here
 */

import { abortable, throwIfAborted } from "./abort.js";
import type { EventBus } from "./agent-events.js";
import type { ContextManager } from "./context/compaction.js";
import { describeError, isInterruptError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { LoopContext, LoopState, TerminationReason } from "./loop-state.js";
import { toolResultPart, type Message, type ToolResultPart, type ToolUsePart } from "./message.js";
import type { ChatResponse, LLMProvider } from "./provider/types.js";
import { closePendingToolUses } from "./session-tool-result-guard.js";
import { Session } from "./session.js";
import type { ToolExecutor } from "./tool-executor.js";
import type { ToolResult } from "./tools/types.js";

export const INTERRUPTED_MESSAGE =
  "Interrupted by user. The conversation has been preserved; send a new message to continue.";
export const MAX_TURNS_MESSAGE = "Max turns reached. Please continue with a new message.";
export const OUTPUT_TRUNCATED_MARKER = "\n... (output truncated)";

const DEFAULT_MAX_TURNS = 20;
const DEFAULT_MAX_TOKENS = 16384;
const DEFAULT_MAX_OUTPUT_LENGTH = 10_000;
const OUTPUT_PREVIEW_CHARS = 200;

// ============== Type definitions ==============

export interface AgentLoopOptions {
  provider: LLMProvider;
  executor: ToolExecutor;
  contextManager?: ContextManager;
  events?: EventBus;
  session?: Session;
  systemPrompt?: string;
  maxTurns?: number;
  maxTokens?: number;
  maxOutputLength?: number;
  enableAutoCompaction?: boolean;
  logger?: Logger;
}

export interface RunOptions {
  /** Aborting ends the run with USER_INTERRUPT */
  signal?: AbortSignal;
}

/**
 * Tool result text as the model sees it
 *
 * Success → output. Failure → "Error: <error>\n<output>", or just the output
 * when the failure carries no error (a denial).
 */
export function formatToolResult(result: ToolResult, maxOutputLength: number): string {
  let text = result.success || result.error === undefined ? result.output : `Error: ${result.error}\n${result.output}`.trim();
  if (text.length > maxOutputLength) {
    text = text.slice(0, maxOutputLength) + OUTPUT_TRUNCATED_MARKER;
  }
  return text;
}

// ============== AgentLoop ==============

export class AgentLoop {
  readonly session: Session;
  readonly context: LoopContext;
  readonly systemPrompt: string;
  readonly maxTurns: number;
  private readonly provider: LLMProvider;
  private readonly executor: ToolExecutor;
  private readonly contextManager: ContextManager | undefined;
  private readonly events: EventBus | undefined;
  private readonly maxTokens: number;
  private readonly maxOutputLength: number;
  private readonly enableAutoCompaction: boolean;
  private readonly logger: Logger;

  constructor(opts: AgentLoopOptions) {
    this.provider = opts.provider;
    this.executor = opts.executor;
    this.contextManager = opts.contextManager;
    this.events = opts.events;
    this.session = opts.session ?? new Session();
    this.systemPrompt = opts.systemPrompt ?? "";
    this.maxTurns = opts.maxTurns ?? DEFAULT_MAX_TURNS;
    this.maxTokens = opts.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxOutputLength = opts.maxOutputLength ?? DEFAULT_MAX_OUTPUT_LENGTH;
    this.enableAutoCompaction = opts.enableAutoCompaction ?? true;
    this.logger = opts.logger ?? createLogger("loop");
    this.context = new LoopContext(this.maxTurns);
  }

  async run(userMessage: string, opts: RunOptions = {}): Promise<string> {
    const { signal } = opts;
    const ctx = this.context;
    ctx.reset(this.maxTurns);
    ctx.startTime = Date.now();
    this.events?.publish({ type: "loop_started", sessionId: this.session.id, userMessage });

    // Results of the turn in progress, kept for transcript repair on interrupt
    let turnResults: ToolResultPart[] = [];

    try {
      this.transition(LoopState.RECEIVING_INPUT);
      this.recordMessage(this.session.appendUserMessage(userMessage));

      while (ctx.currentTurn < ctx.maxTurns) {
        throwIfAborted(signal);
        ctx.currentTurn += 1;
        this.events?.publish({ type: "turn_started", turn: ctx.currentTurn, maxTurns: ctx.maxTurns });

        this.transition(LoopState.CALLING_LLM);
        const response = await this.callLlm(signal);

        this.transition(LoopState.PROCESSING_RESPONSE);
        // Appended once; the final answer stays in the transcript for the next run
        const toolUses =
          response.content.length > 0
            ? this.recordMessage(this.session.appendAssistantMessage(response.content)).toolUses()
            : [];

        if (toolUses.length === 0) {
          this.events?.publish({ type: "turn_completed", turn: ctx.currentTurn, toolCalls: 0 });
          ctx.terminationReason = TerminationReason.END_TURN;
          this.transition(LoopState.COMPLETED);
          return response.content
            .map((block) => (block.type === "text" ? block.text : ""))
            .filter(Boolean)
            .join("\n");
        }

        this.transition(LoopState.EXECUTING_TOOLS);
        turnResults = [];
        for (const use of toolUses) {
          throwIfAborted(signal);
          turnResults.push(await this.executeTool(use, signal));
        }
        this.recordMessage(this.session.appendToolResults(turnResults));
        turnResults = [];
        this.events?.publish({ type: "turn_completed", turn: ctx.currentTurn, toolCalls: toolUses.length });

        this.transition(LoopState.CHECKING_CONTEXT);
        if (this.enableAutoCompaction && this.contextManager?.shouldCompact(this.session)) {
          await this.contextManager.compact(this.session, signal);
        }
      }

      this.logger.debug(`Max turns (${ctx.maxTurns}) reached`);
      ctx.terminationReason = TerminationReason.MAX_TURNS;
      this.transition(LoopState.COMPLETED);
      return MAX_TURNS_MESSAGE;
    } catch (err) {
      const synthesized = closePendingToolUses(this.session, turnResults);
      if (synthesized > 0) {
        this.logger.debug(`Closed ${synthesized} unanswered tool use(s)`);
      }

      if (isInterruptError(err)) {
        ctx.terminationReason = TerminationReason.USER_INTERRUPT;
        this.transition(LoopState.COMPLETED);
        return INTERRUPTED_MESSAGE;
      }

      this.logger.debug(`Run failed: ${describeError(err)}`);
      ctx.terminationReason = TerminationReason.ERROR;
      ctx.lastError = err;
      this.transition(LoopState.ERROR);
      throw err;
    } finally {
      ctx.endTime = Date.now();
      this.events?.publish({
        type: "loop_completed",
        sessionId: this.session.id,
        terminationReason: ctx.terminationReason,
        totalTurns: ctx.currentTurn,
        totalToolCalls: ctx.totalToolCalls,
        durationMs: ctx.durationMs,
      });
    }
  }

  /**
   * Start a new conversation: empty session with a new id, fresh loop context
   */
  reset(): void {
    this.session.clear();
    this.context.reset(this.maxTurns);
  }

  // ============== Steps ==============

  private async callLlm(signal?: AbortSignal): Promise<ChatResponse> {
    const messages = this.session.toWire();
    const tools = this.executor.getToolDefinitions();
    this.events?.publish({ type: "llm_request", messageCount: messages.length, toolCount: tools.length });

    this.context.totalLlmCalls += 1;
    const startedAt = Date.now();
    const response = await abortable(
      this.provider.chat({ messages, system: this.systemPrompt, tools, maxTokens: this.maxTokens, signal }),
      signal,
    );

    this.events?.publish({
      type: "llm_response",
      stopReason: response.stopReason,
      toolUseCount: response.content.filter((block) => block.type === "tool_use").length,
      inputTokens: response.usage.inputTokens,
      outputTokens: response.usage.outputTokens,
      durationMs: Date.now() - startedAt,
    });
    return response;
  }

  private async executeTool(use: ToolUsePart, signal?: AbortSignal): Promise<ToolResultPart> {
    this.events?.publish({ type: "tool_execution_started", toolUseId: use.id, toolName: use.name, input: use.input });
    const startedAt = Date.now();

    // The tool sees the signal too, so it can stop its own work (bash kills its process group)
    const result = await abortable(this.executor.execute(use.name, use.input, { abortSignal: signal }), signal);
    this.context.totalToolCalls += 1;
    const content = formatToolResult(result, this.maxOutputLength);

    this.events?.publish({
      type: "tool_execution_completed",
      toolUseId: use.id,
      toolName: use.name,
      success: result.success,
      durationMs: Date.now() - startedAt,
      outputPreview: content.slice(0, OUTPUT_PREVIEW_CHARS),
    });
    return toolResultPart(use.id, content, !result.success);
  }

  private transition(to: LoopState): void {
    const from = this.context.recordState(to);
    this.events?.publish({ type: "state_changed", from, to });
  }

  private recordMessage(message: Message): Message {
    this.events?.publish({ type: "message_added", role: message.role, partCount: message.parts.length });
    return message;
  }
}
