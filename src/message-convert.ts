/**
 * Message format conversion: wire messages ⇄ pi-ai messages
 *
 * pi-ai uses three roles: "user" / "assistant" / "toolResult"
 * Wire format: role is only "user" / "assistant"; tool_result is embedded in user message content
 */

import type {
  Api,
  AssistantMessage as PiAssistantMessage,
  Message as PiMessage,
  Model,
  TextContent as PiTextContent,
  ToolCall as PiToolCall,
} from "@mariozechner/pi-ai";
import type { WireBlock, WireMessage } from "./message.js";

const EMPTY_USAGE = {
  input: 0,
  output: 0,
  cacheRead: 0,
  cacheWrite: 0,
  totalTokens: 0,
  cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
};

/**
 * Convert wire messages to pi-ai Message[]
 *
 * Conversion rules:
 * - user + string content → PiUserMessage
 * - user + blocks with tool_result → one PiToolResultMessage per result, named after its tool_use
 * - user + blocks with text → PiUserMessage
 * - assistant → PiAssistantMessage (tool_use → ToolCall)
 */
export function convertMessagesToPi(messages: readonly WireMessage[], model: Model<Api>): PiMessage[] {
  const result: PiMessage[] = [];
  const toolNames = new Map<string, string>();
  const timestamp = Date.now();

  for (const msg of messages) {
    if (msg.role === "user") {
      if (typeof msg.content === "string") {
        result.push({ role: "user", content: msg.content, timestamp });
        continue;
      }

      const textParts: PiTextContent[] = [];
      for (const block of msg.content) {
        if (block.type === "text" && block.text) {
          textParts.push({ type: "text", text: block.text });
        } else if (block.type === "tool_result") {
          result.push({
            role: "toolResult",
            toolCallId: block.tool_use_id,
            toolName: toolNames.get(block.tool_use_id) ?? "",
            content: [{ type: "text", text: block.content }],
            isError: block.is_error === true,
            timestamp,
          });
        }
      }
      if (textParts.length > 0) {
        result.push({ role: "user", content: textParts, timestamp });
      }
      continue;
    }

    // assistant
    const blocks: WireBlock[] =
      typeof msg.content === "string" ? [{ type: "text", text: msg.content }] : msg.content;
    const piContent: (PiTextContent | PiToolCall)[] = [];
    for (const block of blocks) {
      if (block.type === "text" && block.text) {
        piContent.push({ type: "text", text: block.text });
      } else if (block.type === "tool_use") {
        toolNames.set(block.id, block.name);
        piContent.push({ type: "toolCall", id: block.id, name: block.name, arguments: block.input });
      }
    }
    result.push({
      role: "assistant",
      content: piContent,
      api: model.api,
      provider: model.provider,
      model: model.id,
      usage: EMPTY_USAGE,
      stopReason: piContent.some((c) => c.type === "toolCall") ? "toolUse" : "stop",
      timestamp,
    });
  }

  return result;
}

/**
 * Convert a pi-ai assistant reply to wire blocks
 *
 * Thinking blocks are dropped: they are not replayed to the provider.
 */
export function convertPiAssistantToWire(message: PiAssistantMessage): WireBlock[] {
  const blocks: WireBlock[] = [];
  for (const item of message.content) {
    if (item.type === "text") {
      if (item.text) blocks.push({ type: "text", text: item.text });
    } else if (item.type === "toolCall") {
      blocks.push({ type: "tool_use", id: item.id, name: item.name, input: { ...item.arguments } });
    }
  }
  return blocks;
}

const STOP_REASONS: Record<string, string> = {
  stop: "end_turn",
  toolUse: "tool_use",
  length: "max_tokens",
};

export function mapStopReason(stopReason: string): string {
  return STOP_REASONS[stopReason] ?? stopReason;
}
