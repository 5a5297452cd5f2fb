/**
 * LLM provider contract
 *
 * One request/response call per turn. Implementations throw RateLimitError or
 * ProviderError on failure and never retry.
 */

import type { WireBlock, WireMessage } from "../message.js";
import type { ToolDefinition } from "../tools/types.js";

export interface ChatRequest {
  messages: WireMessage[];
  system: string;
  tools: ToolDefinition[];
  maxTokens: number;
  signal?: AbortSignal;
}

export interface ChatUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResponse {
  content: WireBlock[];
  /** "end_turn" | "tool_use" | "max_tokens" | provider-specific */
  stopReason: string;
  usage: ChatUsage;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  chat(request: ChatRequest): Promise<ChatResponse>;
}
