import { describe, expect, it } from "vitest";
import { MessageFormatError } from "./errors.js";
import {
  Message,
  partFromDict,
  partFromWire,
  partToDict,
  partToWire,
  registerPartDecoder,
  textPart,
  toolResultPart,
  toolUsePart,
} from "./message.js";

describe("message parts", () => {
  const parts = [
    textPart("hello"),
    toolUsePart("tu_1", "read", { file_path: "src/a.ts" }),
    toolResultPart("tu_1", "file contents"),
    toolResultPart("tu_2", "boom", true),
  ];

  it("rebuilds every part variant from its wire block", () => {
    for (const part of parts) {
      expect(partFromWire(partToWire(part))).toEqual(part);
    }
  });

  it("rebuilds every part variant from its dict", () => {
    for (const part of parts) {
      expect(partFromDict(partToDict(part))).toEqual(part);
    }
  });

  it("only writes is_error on the wire for failed results", () => {
    expect(partToWire(toolResultPart("tu_1", "ok"))).toEqual({
      type: "tool_result",
      tool_use_id: "tu_1",
      content: "ok",
    });
    expect(partToWire(toolResultPart("tu_1", "bad", true))).toEqual({
      type: "tool_result",
      tool_use_id: "tu_1",
      content: "bad",
      is_error: true,
    });
  });

  it("uses snake_case keys in the persistence dict", () => {
    expect(partToDict(toolUsePart("tu_1", "bash", { command: "ls" }))).toEqual({
      part_type: "tool_use",
      tool_id: "tu_1",
      tool_name: "bash",
      tool_input: { command: "ls" },
    });
  });
});

describe("partFromWire", () => {
  it("degrades unknown blocks to text holding their JSON form", () => {
    expect(partFromWire({ type: "image", source: "x" })).toEqual(textPart('{"type":"image","source":"x"}'));
  });

  it("degrades non-object blocks to text", () => {
    expect(partFromWire(42)).toEqual(textPart("42"));
    expect(partFromWire("plain")).toEqual(textPart("plain"));
  });

  it("accepts tool_use without input", () => {
    expect(partFromWire({ type: "tool_use", id: "tu_9", name: "todo_read" })).toEqual(
      toolUsePart("tu_9", "todo_read", {}),
    );
  });

  it("joins tool_result content given as text blocks", () => {
    const block = {
      type: "tool_result",
      tool_use_id: "tu_1",
      content: [
        { type: "text", text: "line one" },
        { type: "text", text: "line two" },
      ],
    };
    expect(partFromWire(block)).toEqual(toolResultPart("tu_1", "line one\nline two"));
  });

  it("reads SDK-style objects with the same fields", () => {
    class SdkTextBlock {
      readonly type = "text";
      constructor(readonly text: string) {}
    }
    expect(partFromWire(new SdkTextBlock("from sdk"))).toEqual(textPart("from sdk"));
  });
});

describe("partFromDict", () => {
  it("rejects unknown part types", () => {
    expect(() => partFromDict({ part_type: "audio" })).toThrow(new MessageFormatError("Unknown part_type: audio"));
  });

  it("rejects missing fields", () => {
    expect(() => partFromDict({ part_type: "text" })).toThrow(MessageFormatError);
  });

  it("uses registered decoders for extra discriminators", () => {
    registerPartDecoder("legacy_text", (data) => textPart(String(data.body)));
    expect(partFromDict({ part_type: "legacy_text", body: "old" })).toEqual(textPart("old"));
  });
});

describe("Message", () => {
  it("sends a single text part as string content", () => {
    expect(new Message("user", [textPart("hi")]).toWire()).toEqual({ role: "user", content: "hi" });
  });

  it("sends mixed content as a block list", () => {
    const message = new Message("assistant", [textPart("Let me look."), toolUsePart("tu_1", "glob", { pattern: "*.ts" })]);
    expect(message.toWire()).toEqual({
      role: "assistant",
      content: [
        { type: "text", text: "Let me look." },
        { type: "tool_use", id: "tu_1", name: "glob", input: { pattern: "*.ts" } },
      ],
    });
  });

  it("round-trips through its dict", () => {
    const message = new Message("assistant", [textPart("a"), toolUsePart("tu_1", "read", { file_path: "x" })]);
    expect(Message.fromDict(message.toDict())).toEqual(message);
  });

  it("round-trips through the wire format", () => {
    const message = new Message("user", [toolResultPart("tu_1", "out"), toolResultPart("tu_2", "err", true)]);
    expect(Message.fromWire(message.toWire())).toEqual(message);
  });

  it("exposes text, tool uses and tool results", () => {
    const message = new Message("assistant", [
      textPart("first"),
      toolUsePart("tu_1", "read", {}),
      textPart("second"),
    ]);
    expect(message.text()).toBe("first\nsecond");
    expect(message.toolUses().map((use) => use.id)).toEqual(["tu_1"]);
    expect(message.hasToolResults()).toBe(false);
  });

  it("rejects an invalid role", () => {
    expect(() => Message.fromDict({ role: "system", parts: [] })).toThrow("Invalid message role: system");
  });
});
