import type { RAGResult } from "../rag/types.js";

export type MemoryLayer = "session" | "working" | "long-term" | "profile";

export type ConversationKind = "direct" | "multi-party";

export type TurnRole = "user" | "assistant" | "tool";

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: number;
  /** Set on tool turns: the tool that produced the content. */
  readonly name?: string;
}

export interface MemoryEntry {
  readonly layer: MemoryLayer;
  /** Category, section, or note key, depending on the layer. */
  readonly key: string;
  readonly text: string;
  readonly timestamp: number;
  readonly sourceChannel?: string;
  /** Personal entries never leave direct conversations. */
  readonly personal: boolean;
}

export interface ScoredEntry {
  readonly entry: MemoryEntry;
  readonly score: number;
}

export const LONG_TERM_CATEGORIES = ["Preferences", "Decisions", "Projects", "Notes"] as const;
export type LongTermCategory = (typeof LONG_TERM_CATEGORIES)[number];

export const PROFILE_DOCUMENTS = ["user", "soul", "tools"] as const;
export type ProfileDocument = (typeof PROFILE_DOCUMENTS)[number];

export type WriteMode = "append" | "replace";

export interface MemoryWrites {
  session: { conversationId: string; turn: ConversationTurn };
  working: { conversationId: string; key: string; text: string };
  "long-term":
    | {
        target: "curated";
        category: LongTermCategory;
        text: string;
        mode?: WriteMode;
        sourceChannel?: string;
        timestamp?: number;
      }
    | { target: "daily"; text: string; timestamp?: number };
  profile: { document: ProfileDocument; section: string; text: string; mode?: WriteMode };
}

export interface MemoryFilters {
  session: { conversationId: string; limit?: number };
  working: { conversationId: string };
  "long-term": { category?: LongTermCategory; query?: string; includeDaily?: boolean };
  profile: { document?: ProfileDocument };
}

export interface MemoryReads {
  session: ConversationTurn[];
  working: MemoryEntry[];
  "long-term": MemoryEntry[];
  profile: MemoryEntry[];
}

export interface RecallOptions {
  readonly conversationId: string;
  readonly conversationKind: ConversationKind;
}

export interface DroppedCounts {
  working: number;
  longTerm: number;
  profile: number;
  retrieved: number;
}

export interface MemoryContext {
  readonly turns: ConversationTurn[];
  readonly working: MemoryEntry[];
  readonly longTerm: ScoredEntry[];
  readonly profile: ScoredEntry[];
  /** Filled by the context assembler; recall alone leaves it empty. */
  readonly retrieved: RAGResult[];
  readonly budget: number;
  readonly used: number;
  /** Layers whose read failed and contributed nothing. */
  readonly degraded: MemoryLayer[];
  readonly dropped: DroppedCounts;
}
