/**
 * Session: the ordered message list of one conversation
 *
 * Grows only by append. The sole ways to drop history are replaceMessages()
 * (whole-list replacement, used by compaction, keeps the id) and clear()
 * (empties the list and issues a new id).
 */

import { randomUUID } from "node:crypto";
import { MessageFormatError } from "./errors.js";
import {
  Message,
  partFromWire,
  textPart,
  type MessageDict,
  type MessagePart,
  type ToolResultPart,
  type WireMessage,
} from "./message.js";

export type SessionDict = {
  id: string;
  messages: MessageDict[];
};

export class Session {
  private _id: string;
  private _messages: Message[] = [];

  constructor(id: string = randomUUID()) {
    this._id = id;
  }

  get id(): string {
    return this._id;
  }

  get messages(): readonly Message[] {
    return this._messages;
  }

  get length(): number {
    return this._messages.length;
  }

  get lastMessage(): Message | undefined {
    return this._messages[this._messages.length - 1];
  }

  appendUserMessage(content: string | readonly MessagePart[]): Message {
    const parts = typeof content === "string" ? [textPart(content)] : content;
    return this.append(new Message("user", parts));
  }

  /**
   * Append the assistant's raw response blocks
   *
   * Blocks are parsed leniently: anything unrecognised becomes a text part.
   */
  appendAssistantMessage(content: readonly unknown[]): Message {
    return this.append(new Message("assistant", content.map(partFromWire)));
  }

  /**
   * Append every tool result of one turn as a single user message
   */
  appendToolResults(results: readonly ToolResultPart[]): Message {
    return this.append(new Message("user", results));
  }

  replaceMessages(wire: readonly WireMessage[]): void {
    this._messages = wire.map((message) => Message.fromWire(message));
  }

  clear(): void {
    this._messages = [];
    this._id = randomUUID();
  }

  toWire(): WireMessage[] {
    return this._messages.map((message) => message.toWire());
  }

  toDict(): SessionDict {
    return { id: this._id, messages: this._messages.map((message) => message.toDict()) };
  }

  static fromDict(data: unknown): Session {
    if (typeof data !== "object" || data === null) {
      throw new MessageFormatError("session must be an object");
    }
    const id = "id" in data ? data.id : undefined;
    const messages = "messages" in data ? data.messages : undefined;
    if (typeof id !== "string" || !Array.isArray(messages)) {
      throw new MessageFormatError('session requires a string "id" and a "messages" array');
    }
    const session = new Session(id);
    session._messages = messages.map((message) => Message.fromDict(message));
    return session;
  }

  private append(message: Message): Message {
    this._messages.push(message);
    return message;
  }
}
