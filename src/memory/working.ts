import type { MemoryEntry } from "./types.js";

/** Scratch notes the assistant keeps for one conversation, replaced by key. */
export class WorkingMemory {
  private readonly notes = new Map<string, Map<string, MemoryEntry>>();

  set(conversationId: string, key: string, text: string, now = Date.now()): MemoryEntry {
    const entry: MemoryEntry = {
      layer: "working",
      key,
      text,
      timestamp: now,
      personal: false,
    };
    const bucket = this.notes.get(conversationId) ?? new Map<string, MemoryEntry>();
    bucket.set(key, entry);
    this.notes.set(conversationId, bucket);
    return entry;
  }

  list(conversationId: string): MemoryEntry[] {
    const bucket = this.notes.get(conversationId);
    if (!bucket) return [];
    return [...bucket.values()].sort((a, b) => b.timestamp - a.timestamp);
  }

  delete(conversationId: string, key: string): boolean {
    return this.notes.get(conversationId)?.delete(key) ?? false;
  }

  clear(conversationId: string): void {
    this.notes.delete(conversationId);
  }
}
