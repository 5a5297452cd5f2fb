/**
 * Session Tool Result Guard
 *
 * Every tool_use in an assistant message must be answered by a tool_result in
 * the following user message, or the provider rejects the next request. A run
 * that stops between the two (interrupt, provider failure mid-turn) would leave
 * the transcript unpaired; closePendingToolUses() repairs it.
 *
 * Core logic: find pending ids on the last message → keep the results already
 * collected → synthesize error results for the rest → append one user message.
 */

import { toolResultPart, type ToolResultPart } from "./message.js";
import type { Session } from "./session.js";

export const MISSING_TOOL_RESULT_TEXT = "Tool execution was interrupted before a result was recorded.";

/**
 * Tool use ids on the last message that have no result yet
 */
export function getPendingToolUseIds(session: Session): string[] {
  const last = session.lastMessage;
  if (!last || last.role !== "assistant") return [];
  return last.toolUses().map((use) => use.id);
}

export function makeMissingToolResult(toolUseId: string): ToolResultPart {
  return toolResultPart(toolUseId, MISSING_TOOL_RESULT_TEXT, true);
}

/**
 * Append the turn's results, padding unanswered tool uses with synthetic errors
 *
 * Results are emitted in tool_use order. Returns the number of synthesized
 * results; 0 with nothing appended when the transcript is already paired.
 */
export function closePendingToolUses(session: Session, collected: readonly ToolResultPart[] = []): number {
  const pendingIds = getPendingToolUseIds(session);
  if (pendingIds.length === 0) return 0;

  const byId = new Map(collected.map((result) => [result.toolUseId, result]));
  let synthesized = 0;
  const results = pendingIds.map((id) => {
    const existing = byId.get(id);
    if (existing) return existing;
    synthesized += 1;
    return makeMissingToolResult(id);
  });

  session.appendToolResults(results);
  return synthesized;
}
