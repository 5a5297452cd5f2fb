/**
 * Token estimation
 *
 * Character count of the JSON-serialized wire messages divided by a
 * configurable ratio. An approximation, not a tokenizer.
 */

import type { WireMessage } from "../message.js";

export const DEFAULT_CHARS_PER_TOKEN = 4;

export function estimateTokens(
  messages: readonly WireMessage[],
  charsPerToken: number = DEFAULT_CHARS_PER_TOKEN,
): number {
  if (messages.length === 0) return 0;
  return Math.floor(JSON.stringify(messages).length / charsPerToken);
}

export function estimateTextTokens(text: string, charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): number {
  return Math.floor(text.length / charsPerToken);
}
