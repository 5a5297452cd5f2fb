import { describe, expect, it } from "vitest";
import { toolResultPart } from "./message.js";
import { Session } from "./session.js";
import {
  closePendingToolUses,
  getPendingToolUseIds,
  MISSING_TOOL_RESULT_TEXT,
} from "./session-tool-result-guard.js";

function sessionWithToolUses(...ids: string[]): Session {
  const session = new Session();
  session.appendUserMessage("go");
  session.appendAssistantMessage(ids.map((id) => ({ type: "tool_use", id, name: "bash", input: { command: "ls" } })));
  return session;
}

describe("session tool result guard", () => {
  it("finds tool uses on the last assistant message", () => {
    expect(getPendingToolUseIds(sessionWithToolUses("a", "b"))).toEqual(["a", "b"]);
  });

  it("reports nothing when the last message is from the user", () => {
    const session = new Session();
    session.appendUserMessage("hello");
    expect(getPendingToolUseIds(session)).toEqual([]);
    expect(closePendingToolUses(session)).toBe(0);
    expect(session.length).toBe(1);
  });

  it("keeps collected results and synthesizes the rest in tool use order", () => {
    const session = sessionWithToolUses("a", "b", "c");
    const synthesized = closePendingToolUses(session, [toolResultPart("a", "done")]);

    expect(synthesized).toBe(2);
    expect(session.lastMessage?.toolResults()).toEqual([
      toolResultPart("a", "done"),
      toolResultPart("b", MISSING_TOOL_RESULT_TEXT, true),
      toolResultPart("c", MISSING_TOOL_RESULT_TEXT, true),
    ]);
  });

  it("is a no-op once the transcript is paired", () => {
    const session = sessionWithToolUses("a");
    closePendingToolUses(session);
    expect(closePendingToolUses(session)).toBe(0);
    expect(session.length).toBe(3);
  });
});
