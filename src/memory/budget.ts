import type { ConversationTurn, MemoryEntry } from "./types.js";

// Rough English average; good enough to keep prompts under model limits.
const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function turnTokens(turn: ConversationTurn): number {
  return estimateTokens(turn.content);
}

export function entryTokens(entry: MemoryEntry): number {
  return estimateTokens(entry.text);
}

/** Longest prefix of `text` that costs at most `tokens`. */
export function clipToTokens(text: string, tokens: number): string {
  if (tokens <= 0) return "";
  if (estimateTokens(text) <= tokens) return text;
  return text.slice(0, tokens * CHARS_PER_TOKEN);
}
