/**
 * Message model
 *
 * Three representations of the same content:
 * - MessagePart: typed in-memory union, discriminated by `partType`
 * - Wire blocks: provider request/response schema (`type` discriminator, snake_case)
 * - Persistence dict: nested plain objects with a `part_type` discriminator
 *
 * Decoding from the wire is lenient: a block that cannot be parsed becomes a
 * TextPart holding its string form, so one bad block never aborts a turn.
 * Decoding from a persistence dict is strict and throws MessageFormatError.
 */

import { MessageFormatError } from "./errors.js";

// ============== Parts ==============

export type TextPart = {
  readonly partType: "text";
  readonly text: string;
};

export type ToolUsePart = {
  readonly partType: "tool_use";
  readonly id: string;
  readonly name: string;
  readonly input: Record<string, unknown>;
};

export type ToolResultPart = {
  readonly partType: "tool_result";
  readonly toolUseId: string;
  readonly content: string;
  readonly isError: boolean;
};

export type MessagePart = TextPart | ToolUsePart | ToolResultPart;

export type PartType = MessagePart["partType"];

export type Role = "user" | "assistant";

export function textPart(text: string): TextPart {
  return { partType: "text", text };
}

export function toolUsePart(id: string, name: string, input: Record<string, unknown>): ToolUsePart {
  return { partType: "tool_use", id, name, input };
}

export function toolResultPart(toolUseId: string, content: string, isError = false): ToolResultPart {
  return { partType: "tool_result", toolUseId, content, isError };
}

// ============== Wire format ==============

export type WireTextBlock = { type: "text"; text: string };
export type WireToolUseBlock = {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
};
export type WireToolResultBlock = {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
};
export type WireBlock = WireTextBlock | WireToolUseBlock | WireToolResultBlock;

export type WireMessage = {
  role: Role;
  content: string | WireBlock[];
};

export function partToWire(part: MessagePart): WireBlock {
  switch (part.partType) {
    case "text":
      return { type: "text", text: part.text };
    case "tool_use":
      return { type: "tool_use", id: part.id, name: part.name, input: { ...part.input } };
    case "tool_result":
      return part.isError
        ? { type: "tool_result", tool_use_id: part.toolUseId, content: part.content, is_error: true }
        : { type: "tool_result", tool_use_id: part.toolUseId, content: part.content };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Tool result content may arrive as a string or as a list of text blocks
 */
function resultContentToString(content: unknown): string | undefined {
  if (typeof content === "string") return content;
  if (content === undefined || content === null) return "";
  if (Array.isArray(content)) {
    const texts: string[] = [];
    for (const item of content) {
      const text = isRecord(item) && item.type === "text" ? item.text : undefined;
      if (typeof text !== "string") return undefined;
      texts.push(text);
    }
    return texts.join("\n");
  }
  return undefined;
}

/**
 * Convert one wire block (plain object or SDK object) into a MessagePart
 */
export function partFromWire(block: unknown): MessagePart {
  if (!isRecord(block)) {
    return textPart(stringify(block));
  }
  const { type, text, id, name, input } = block;
  if (type === "text" && typeof text === "string") {
    return textPart(text);
  }
  if (type === "tool_use" && typeof id === "string" && typeof name === "string") {
    if (input === undefined || input === null) return toolUsePart(id, name, {});
    if (isRecord(input)) return toolUsePart(id, name, input);
  }
  const toolUseId = block.tool_use_id;
  if (type === "tool_result" && typeof toolUseId === "string") {
    const content = resultContentToString(block.content);
    if (content !== undefined) {
      return toolResultPart(toolUseId, content, block.is_error === true);
    }
  }
  return textPart(stringify(block));
}

// ============== Persistence dict ==============

export type TextPartDict = { part_type: "text"; text: string };
export type ToolUsePartDict = {
  part_type: "tool_use";
  tool_id: string;
  tool_name: string;
  tool_input: Record<string, unknown>;
};
export type ToolResultPartDict = {
  part_type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error: boolean;
};
export type MessagePartDict = TextPartDict | ToolUsePartDict | ToolResultPartDict;

export function partToDict(part: MessagePart): MessagePartDict {
  switch (part.partType) {
    case "text":
      return { part_type: "text", text: part.text };
    case "tool_use":
      return { part_type: "tool_use", tool_id: part.id, tool_name: part.name, tool_input: { ...part.input } };
    case "tool_result":
      return {
        part_type: "tool_result",
        tool_use_id: part.toolUseId,
        content: part.content,
        is_error: part.isError,
      };
  }
}

export type PartDecoder = (data: Record<string, unknown>) => MessagePart;

function requireString(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  if (typeof value !== "string") {
    throw new MessageFormatError(`${String(data.part_type)} part: "${key}" must be a string`);
  }
  return value;
}

const partDecoders = new Map<string, PartDecoder>([
  ["text", (data) => textPart(requireString(data, "text"))],
  [
    "tool_use",
    (data) => {
      const input = data.tool_input ?? {};
      if (!isRecord(input)) {
        throw new MessageFormatError('tool_use part: "tool_input" must be an object');
      }
      return toolUsePart(requireString(data, "tool_id"), requireString(data, "tool_name"), input);
    },
  ],
  [
    "tool_result",
    (data) =>
      toolResultPart(requireString(data, "tool_use_id"), requireString(data, "content"), data.is_error === true),
  ],
]);

/**
 * Register a decoder for a `part_type` discriminator
 *
 * Lets stored sessions written with other discriminators (older names,
 * extensions) load without touching the built-in decoders.
 */
export function registerPartDecoder(partType: string, decoder: PartDecoder): void {
  partDecoders.set(partType, decoder);
}

export function partFromDict(data: unknown): MessagePart {
  if (!isRecord(data)) {
    throw new MessageFormatError("message part must be an object");
  }
  const partType = data.part_type;
  if (typeof partType !== "string") {
    throw new MessageFormatError('message part is missing "part_type"');
  }
  const decoder = partDecoders.get(partType);
  if (!decoder) {
    throw new MessageFormatError(`Unknown part_type: ${partType}`);
  }
  return decoder(data);
}

// ============== Message ==============

export type MessageDict = {
  role: Role;
  parts: MessagePartDict[];
};

function parseRole(value: unknown): Role {
  if (value === "user" || value === "assistant") return value;
  throw new MessageFormatError(`Invalid message role: ${String(value)}`);
}

export class Message {
  readonly role: Role;
  private readonly _parts: MessagePart[];

  constructor(role: Role, parts: readonly MessagePart[] = []) {
    this.role = role;
    this._parts = [...parts];
  }

  get parts(): readonly MessagePart[] {
    return this._parts;
  }

  /** Used while a message is being assembled; never on messages already in a session. */
  addPart(part: MessagePart): void {
    this._parts.push(part);
  }

  text(): string {
    return this._parts
      .filter((part): part is TextPart => part.partType === "text")
      .map((part) => part.text)
      .join("\n");
  }

  toolUses(): ToolUsePart[] {
    return this._parts.filter((part): part is ToolUsePart => part.partType === "tool_use");
  }

  toolResults(): ToolResultPart[] {
    return this._parts.filter((part): part is ToolResultPart => part.partType === "tool_result");
  }

  hasToolResults(): boolean {
    return this._parts.some((part) => part.partType === "tool_result");
  }

  toWire(): WireMessage {
    const [only] = this._parts;
    if (this._parts.length === 1 && only.partType === "text") {
      return { role: this.role, content: only.text };
    }
    return { role: this.role, content: this._parts.map(partToWire) };
  }

  toDict(): MessageDict {
    return { role: this.role, parts: this._parts.map(partToDict) };
  }

  static fromDict(data: unknown): Message {
    if (!isRecord(data)) {
      throw new MessageFormatError("message must be an object");
    }
    const parts = data.parts;
    if (!Array.isArray(parts)) {
      throw new MessageFormatError('message "parts" must be an array');
    }
    return new Message(parseRole(data.role), parts.map(partFromDict));
  }

  static fromWire(wire: WireMessage): Message {
    const role = parseRole(wire.role);
    if (typeof wire.content === "string") {
      return new Message(role, [textPart(wire.content)]);
    }
    return new Message(role, wire.content.map(partFromWire));
  }
}
