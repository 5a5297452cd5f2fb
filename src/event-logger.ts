/**
 * Event logger: prints agent events to stderr
 *
 * Normal mode shows the run/turn/tool/compaction skeleton. Verbose mode adds
 * state transitions, LLM requests and every remaining event by name.
 */

import type { EventBus, PublishedEvent } from "./agent-events.js";
import { color } from "./colors.js";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Render one event as zero or more lines
 */
export function formatEvent(event: PublishedEvent, verbose = false): string[] {
  switch (event.type) {
    case "loop_started":
      return [RULE, `[LOOP START] ${preview(event.userMessage, 80)}`];
    case "loop_completed":
      return [
        `[LOOP END] ${event.terminationReason ?? "unknown"}`,
        `  Duration: ${Math.round(event.durationMs)}ms | Turns: ${event.totalTurns} | Tools: ${event.totalToolCalls}`,
        RULE,
      ];
    case "turn_started":
      return [THIN_RULE, `[TURN ${event.turn}/${event.maxTurns}]`];
    case "turn_completed":
      return event.toolCalls > 0 ? [`  Turn ${event.turn} completed: ${event.toolCalls} tool(s)`] : [];
    case "tool_execution_started":
      return [`  ▶ ${event.toolName}`];
    case "tool_execution_completed":
      return [`  ${event.success ? "✓" : "✗"} ${event.toolName} (${Math.round(event.durationMs)}ms)`];
    case "llm_response":
      return [`  LLM: ${event.inputTokens}→${event.outputTokens} tokens (${Math.round(event.durationMs)}ms)`];
    case "context_compaction":
      return [
        `  [COMPACT] ${event.tokensBefore.toLocaleString("en-US")}→${event.tokensAfter.toLocaleString("en-US")} tokens (-${event.messagesBefore - event.messagesAfter} msgs)`,
      ];
    case "state_changed":
      return verbose ? [`[STATE] ${event.from} → ${event.to}`] : [];
    case "llm_request":
      return verbose ? [`  LLM request: ${event.messageCount} messages, ${event.toolCount} tools`] : [];
    default:
      return verbose ? [`  [EVENT] ${event.type}`] : [];
  }
}

export class EventLogger {
  private unsubscribe: (() => void) | null = null;
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;

  constructor(opts?: { verbose?: boolean; write?: (line: string) => void }) {
    this.verbose = opts?.verbose ?? false;
    this.write = opts?.write ?? ((line) => console.error(color(line, "dim")));
  }

  attach(bus: EventBus): void {
    this.detach();
    this.unsubscribe = bus.subscribeAll((event) => {
      for (const line of formatEvent(event, this.verbose)) {
        this.write(line);
      }
    });
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  get attached(): boolean {
    return this.unsubscribe !== null;
  }
}
