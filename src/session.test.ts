import { describe, expect, it } from "vitest";
import { MessageFormatError } from "./errors.js";
import { textPart, toolResultPart, toolUsePart } from "./message.js";
import { Session } from "./session.js";

describe("Session", () => {
  it("appends user, assistant and tool result messages in order", () => {
    const session = new Session("s-1");
    session.appendUserMessage("read the file");
    session.appendAssistantMessage([
      { type: "text", text: "Reading." },
      { type: "tool_use", id: "tu_1", name: "read", input: { file_path: "a.txt" } },
    ]);
    session.appendToolResults([toolResultPart("tu_1", "contents")]);

    expect(session.length).toBe(3);
    expect(session.toWire()).toEqual([
      { role: "user", content: "read the file" },
      {
        role: "assistant",
        content: [
          { type: "text", text: "Reading." },
          { type: "tool_use", id: "tu_1", name: "read", input: { file_path: "a.txt" } },
        ],
      },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "tu_1", content: "contents" }] },
    ]);
  });

  it("puts all results of a turn into one message", () => {
    const session = new Session();
    session.appendToolResults([toolResultPart("a", "1"), toolResultPart("b", "2"), toolResultPart("c", "3")]);
    expect(session.length).toBe(1);
    expect(session.lastMessage?.toolResults().map((result) => result.toolUseId)).toEqual(["a", "b", "c"]);
  });

  it("replaces the whole list and keeps its id", () => {
    const session = new Session("keep-me");
    session.appendUserMessage("one");
    session.appendUserMessage("two");
    session.replaceMessages([{ role: "user", content: "summary" }]);
    expect(session.id).toBe("keep-me");
    expect(session.toWire()).toEqual([{ role: "user", content: "summary" }]);
  });

  it("clear() empties the list and issues a new id", () => {
    const session = new Session("old-id");
    session.appendUserMessage("hello");
    session.clear();
    expect(session.length).toBe(0);
    expect(session.id).not.toBe("old-id");
  });

  it("round-trips through its dict", () => {
    const session = new Session("s-2");
    session.appendUserMessage([textPart("look"), textPart("twice")]);
    session.appendAssistantMessage([{ type: "tool_use", id: "tu_1", name: "glob", input: { pattern: "*" } }]);
    session.appendToolResults([toolResultPart("tu_1", "a.ts", false)]);

    const restored = Session.fromDict(session.toDict());
    expect(restored.id).toBe("s-2");
    expect(restored.messages).toEqual(session.messages);
  });

  it("keeps tool use parts typed after parsing the assistant response", () => {
    const session = new Session();
    const message = session.appendAssistantMessage([{ type: "tool_use", id: "tu_1", name: "bash", input: { command: "ls" } }]);
    expect(message.toolUses()).toEqual([toolUsePart("tu_1", "bash", { command: "ls" })]);
  });

  it("rejects malformed dicts", () => {
    expect(() => Session.fromDict({ id: 5, messages: [] })).toThrow(MessageFormatError);
    expect(() => Session.fromDict(null)).toThrow(MessageFormatError);
  });
});
