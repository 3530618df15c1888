import type { ConversationTurn } from "./types.js";

/**
 * Per-conversation ring of recent turns. Lives only as long as the process.
 */
export class SessionMemory {
  private readonly sessions = new Map<string, ConversationTurn[]>();

  constructor(private readonly capacity: number) {}

  append(conversationId: string, turn: ConversationTurn): void {
    const turns = this.sessions.get(conversationId) ?? [];
    turns.push(turn);
    turns.sort((a, b) => a.timestamp - b.timestamp);
    if (turns.length > this.capacity) {
      turns.splice(0, turns.length - this.capacity);
    }
    this.sessions.set(conversationId, turns);
  }

  /** Oldest first; `limit` keeps the most recent ones. */
  recent(conversationId: string, limit?: number): ConversationTurn[] {
    const turns = this.sessions.get(conversationId) ?? [];
    if (limit === undefined || limit >= turns.length) return [...turns];
    return turns.slice(turns.length - limit);
  }

  size(conversationId: string): number {
    return this.sessions.get(conversationId)?.length ?? 0;
  }

  clear(conversationId: string): void {
    this.sessions.delete(conversationId);
  }

  conversations(): string[] {
    return [...this.sessions.keys()];
  }
}
