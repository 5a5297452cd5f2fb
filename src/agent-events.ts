/**
 * Agent event types and the event bus
 *
 * Events are a discriminated union on `type`. The loop, executor and context
 * manager publish; observers (event logger, CLI spinner, tests) subscribe.
 * Nothing in the loop depends on who is listening.
 *
 * Handler isolation:
 * - publish() iterates over a snapshot, so handlers may unsubscribe while running
 * - a throwing handler is logged and skipped; later handlers still run
 */

import type { LoopState, TerminationReason } from "./loop-state.js";
import type { Role } from "./message.js";
import { describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

// ============== Event types (discriminated union) ==============

export type AgentEvent =
  // Run lifecycle
  | { type: "loop_started"; sessionId: string; userMessage: string }
  | {
      type: "loop_completed";
      sessionId: string;
      terminationReason: TerminationReason | null;
      totalTurns: number;
      totalToolCalls: number;
      durationMs: number;
    }

  // Turn
  | { type: "turn_started"; turn: number; maxTurns: number }
  | { type: "turn_completed"; turn: number; toolCalls: number }

  // State machine
  | { type: "state_changed"; from: LoopState; to: LoopState }

  // Provider
  | { type: "llm_request"; messageCount: number; toolCount: number }
  | {
      type: "llm_response";
      stopReason: string;
      toolUseCount: number;
      inputTokens: number;
      outputTokens: number;
      durationMs: number;
    }

  // Tools
  | { type: "tool_execution_started"; toolUseId: string; toolName: string; input: Record<string, unknown> }
  | {
      type: "tool_execution_completed";
      toolUseId: string;
      toolName: string;
      success: boolean;
      durationMs: number;
      outputPreview: string;
    }
  | { type: "tool_approval_requested"; toolName: string; description: string }
  | { type: "tool_approval_result"; toolName: string; approved: boolean }

  // Session and context
  | { type: "message_added"; role: Role; partCount: number }
  | {
      type: "context_compaction";
      messagesBefore: number;
      messagesAfter: number;
      tokensBefore: number;
      tokensAfter: number;
    };

export type AgentEventType = AgentEvent["type"];

/** Event as delivered to handlers: stamped with the publish time (epoch ms). */
export type PublishedEvent<T extends AgentEventType = AgentEventType> = Extract<AgentEvent, { type: T }> & {
  timestamp: number;
};

export type EventHandler<T extends AgentEventType = AgentEventType> = (event: PublishedEvent<T>) => void;

// ============== Event bus ==============

export class EventBus {
  private readonly handlers = new Map<AgentEventType, Set<EventHandler<AgentEventType>>>();
  private readonly globalHandlers = new Set<EventHandler>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts?: { logger?: Logger; now?: () => number }) {
    this.logger = opts?.logger ?? createLogger("events");
    this.now = opts?.now ?? Date.now;
  }

  publish(event: AgentEvent): void {
    const stamped: PublishedEvent = { ...event, timestamp: this.now() };
    const typed = this.handlers.get(event.type);
    const targets = [...(typed ?? []), ...this.globalHandlers];
    for (const handler of targets) {
      try {
        handler(stamped);
      } catch (err) {
        this.logger.warn(`handler for "${event.type}" failed: ${describeError(err)}`);
      }
    }
  }

  subscribe<T extends AgentEventType>(type: T, handler: EventHandler<T>): () => void {
    const set = this.handlers.get(type) ?? new Set<EventHandler<AgentEventType>>();
    this.handlers.set(type, set);
    const registered: EventHandler<AgentEventType> = (event) => {
      if (isEventOfType(event, type)) handler(event);
    };
    set.add(registered);
    return () => {
      set.delete(registered);
    };
  }

  subscribeAll(handler: EventHandler): () => void {
    this.globalHandlers.add(handler);
    return () => {
      this.globalHandlers.delete(handler);
    };
  }

  handlerCount(type?: AgentEventType): number {
    if (type) return this.handlers.get(type)?.size ?? 0;
    let total = this.globalHandlers.size;
    for (const set of this.handlers.values()) total += set.size;
    return total;
  }

  clear(): void {
    this.handlers.clear();
    this.globalHandlers.clear();
  }
}

function isEventOfType<T extends AgentEventType>(event: PublishedEvent, type: T): event is PublishedEvent<T> {
  return event.type === type;
}
