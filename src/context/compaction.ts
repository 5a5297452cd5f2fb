/**
 * Context manager: token estimate, compaction trigger, and LLM summarization
 *
 * Compaction replaces everything before the preserved tail with a single
 * synthetic user message holding a summary:
 *
 *   [older ... | recent (preserveCount)]  →  [summary message, recent ...]
 *
 * The split never separates a tool_use from its tool_result: when the first
 * preserved message carries tool results, the assistant message before it is
 * preserved too.
 */

import type { EventBus } from "../agent-events.js";
import { describeError, isInterruptError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { Message, WireMessage } from "../message.js";
import type { LLMProvider } from "../provider/types.js";
import type { Session } from "../session.js";
import { DEFAULT_CHARS_PER_TOKEN, estimateTokens } from "./tokens.js";

export const SUMMARY_PREFIX = "[Previous conversation summary]\n\n";
export const SUMMARY_SYSTEM_PROMPT = "You are a helpful assistant that creates concise summaries.";
export const DEFAULT_SUMMARY_MAX_TOKENS = 8192;

const TOOL_INPUT_PREVIEW_CHARS = 100;
const TOOL_RESULT_PREVIEW_CHARS = 200;

const SUMMARIZATION_PROMPT = `You have been assisting the user but the conversation is getting long.
Create a concise summary that preserves essential information for continuing the work.

Include in your summary:

1. **Task Overview**
   - User's main request and goals
   - Any constraints or requirements

2. **Work Completed**
   - Files read, created, or modified (with exact paths)
   - Commands executed successfully
   - Key findings or outputs

3. **Important Context**
   - Variable names, function names, class names mentioned
   - Technical decisions made
   - Errors encountered and how they were resolved
   - User preferences or style requirements

4. **Current State**
   - What needs to be done next
   - Any blockers or open questions

Keep the summary concise (under 1000 words) but preserve ALL critical details.
Focus on facts, not process. Include specific names (files, variables, etc.).
Wrap your entire summary in <summary></summary> tags.`;

export interface ContextManagerSettings {
  contextLimit: number;
  compactThreshold: number;
  preserveRecentMessages: number;
  charsPerToken: number;
  summaryMaxTokens: number;
}

export const DEFAULT_CONTEXT_SETTINGS: ContextManagerSettings = {
  contextLimit: 100_000,
  compactThreshold: 0.75,
  preserveRecentMessages: 3,
  charsPerToken: DEFAULT_CHARS_PER_TOKEN,
  summaryMaxTokens: DEFAULT_SUMMARY_MAX_TOKENS,
};

export interface ContextUsage {
  currentTokens: number;
  maxTokens: number;
  /** 0-100, one decimal */
  percentage: number;
  messages: number;
}

export interface CompactionResult {
  compacted: boolean;
  messagesBefore: number;
  messagesAfter: number;
  tokensBefore: number;
  tokensAfter: number;
  summary?: string;
}

// ============== File operations ==============

type FileOps = {
  read: Set<string>;
  modified: Set<string>;
};

function extractFileOps(messages: readonly Message[]): FileOps {
  const ops: FileOps = { read: new Set(), modified: new Set() };
  for (const message of messages) {
    if (message.role !== "assistant") continue;
    for (const use of message.toolUses()) {
      const path = use.input.file_path;
      if (typeof path !== "string" || !path) continue;
      if (use.name === "read") ops.read.add(path);
      else if (use.name === "write" || use.name === "edit") ops.modified.add(path);
    }
  }
  return ops;
}

export function formatFileOperations(ops: FileOps): string {
  const readOnly = [...ops.read].filter((file) => !ops.modified.has(file)).sort();
  const modified = [...ops.modified].sort();
  const sections: string[] = [];
  if (readOnly.length > 0) {
    sections.push(`<read-files>\n${readOnly.join("\n")}\n</read-files>`);
  }
  if (modified.length > 0) {
    sections.push(`<modified-files>\n${modified.join("\n")}\n</modified-files>`);
  }
  return sections.length === 0 ? "" : `\n\n${sections.join("\n\n")}`;
}

// ============== Summary prompt ==============

/**
 * Render one message as human-readable text, dropping tool metadata
 */
export function cleanMessageText(message: Message): string {
  const lines: string[] = [];
  for (const part of message.parts) {
    switch (part.partType) {
      case "text":
        lines.push(part.text);
        break;
      case "tool_use":
        lines.push(
          `[Used tool: ${part.name} with ${JSON.stringify(part.input).slice(0, TOOL_INPUT_PREVIEW_CHARS)}...]`,
        );
        break;
      case "tool_result":
        lines.push(`[Tool result: ${part.content.slice(0, TOOL_RESULT_PREVIEW_CHARS)}...]`);
        break;
    }
  }
  return lines.join("\n");
}

export function serializeConversation(messages: readonly Message[]): string {
  const blocks: string[] = [];
  for (const message of messages) {
    const text = cleanMessageText(message);
    if (!text) continue;
    blocks.push(`${message.role === "user" ? "[User]" : "[Assistant]"}: ${text}`);
  }
  return blocks.join("\n\n");
}

export function buildSummaryPrompt(messages: readonly Message[]): string {
  return `<conversation>\n${serializeConversation(messages)}\n</conversation>\n\n${SUMMARIZATION_PROMPT}`;
}

export function extractSummary(text: string): string {
  const match = /<summary>([\s\S]*?)<\/summary>/.exec(text);
  return (match?.[1] ?? text).trim();
}

// ============== Context manager ==============

export interface ContextManagerDeps {
  events?: EventBus;
  logger?: Logger;
}

export class ContextManager {
  readonly settings: ContextManagerSettings;
  private readonly provider: LLMProvider;
  private readonly events: EventBus | undefined;
  private readonly logger: Logger;

  constructor(provider: LLMProvider, settings: Partial<ContextManagerSettings> = {}, deps: ContextManagerDeps = {}) {
    this.provider = provider;
    this.settings = { ...DEFAULT_CONTEXT_SETTINGS, ...settings };
    this.events = deps.events;
    this.logger = deps.logger ?? createLogger("context");
  }

  estimateTokens(session: Session): number {
    return estimateTokens(session.toWire(), this.settings.charsPerToken);
  }

  shouldCompact(session: Session): boolean {
    if (session.length < this.settings.preserveRecentMessages + 2) return false;
    return this.estimateTokens(session) >= this.settings.contextLimit * this.settings.compactThreshold;
  }

  usageInfo(session: Session): ContextUsage {
    const currentTokens = this.estimateTokens(session);
    const maxTokens = this.settings.contextLimit;
    return {
      currentTokens,
      maxTokens,
      percentage: maxTokens > 0 ? Math.round((currentTokens / maxTokens) * 1000) / 10 : 0,
      messages: session.length,
    };
  }

  /**
   * Number of trailing messages to keep verbatim
   */
  findSafeSplitPoint(messages: readonly Message[]): number {
    let preserveCount = Math.min(this.settings.preserveRecentMessages, messages.length);
    const firstPreserved = messages[messages.length - preserveCount];
    if (preserveCount > 0 && firstPreserved?.hasToolResults()) {
      preserveCount += 1;
    }
    return Math.min(preserveCount, messages.length);
  }

  async compact(session: Session, signal?: AbortSignal): Promise<CompactionResult> {
    const messages = session.messages;
    const tokensBefore = this.estimateTokens(session);
    const preserveCount = this.findSafeSplitPoint(messages);
    const older = messages.slice(0, messages.length - preserveCount);

    if (older.length === 0) {
      return {
        compacted: false,
        messagesBefore: messages.length,
        messagesAfter: messages.length,
        tokensBefore,
        tokensAfter: tokensBefore,
      };
    }

    const recent = messages.slice(messages.length - preserveCount);
    this.logger.debug(`Summarizing ${older.length} older messages, keeping ${recent.length}`);

    const summary = (await this.generateSummary(older, signal)) + formatFileOperations(extractFileOps(older));
    const rebuilt: WireMessage[] = [
      { role: "user", content: `${SUMMARY_PREFIX}${summary}` },
      ...recent.map((message) => message.toWire()),
    ];
    session.replaceMessages(rebuilt);

    const result: CompactionResult = {
      compacted: true,
      messagesBefore: messages.length,
      messagesAfter: session.length,
      tokensBefore,
      tokensAfter: this.estimateTokens(session),
      summary,
    };
    this.events?.publish({
      type: "context_compaction",
      messagesBefore: result.messagesBefore,
      messagesAfter: result.messagesAfter,
      tokensBefore: result.tokensBefore,
      tokensAfter: result.tokensAfter,
    });
    return result;
  }

  private async generateSummary(messages: readonly Message[], signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.provider.chat({
        messages: [{ role: "user", content: buildSummaryPrompt(messages) }],
        system: SUMMARY_SYSTEM_PROMPT,
        tools: [],
        maxTokens: this.settings.summaryMaxTokens,
        signal,
      });
      const text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      return extractSummary(text);
    } catch (err) {
      if (isInterruptError(err)) throw err;
      this.logger.warn(`Summary generation failed: ${describeError(err)}`);
      return `Previous conversation covered multiple topics. (Error: ${describeError(err)})`;
    }
  }
}
