import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ContextAssembler, mergeContext, ragTokens } from "../../src/context/assembler.js";
import { MemoryStore } from "../../src/memory/store.js";
import type { MemoryContext, ScoredEntry } from "../../src/memory/types.js";
import { StorageDB } from "../../src/storage/db.js";
import { VectorStore } from "../../src/rag/vector-store.js";
import { RetrievalIndex } from "../../src/rag/retrieval-index.js";
import type { RAGResult } from "../../src/rag/types.js";
import type { InboundTurn } from "../../src/transport/types.js";
import { FakeEmbedder } from "../helpers/fakes.js";
import { silentLogger } from "../helpers/logger.js";

function scored(text: string, score: number, key = "Notes"): ScoredEntry {
  return { entry: { layer: "long-term", key, text, timestamp: 0, personal: true }, score };
}

function rag(content: string, score: number, author: string | null = null): RAGResult {
  return { content, channel: "general", author, timestamp: 0, score };
}

function recalled(parts: Partial<MemoryContext>): MemoryContext {
  return {
    turns: [],
    working: [],
    longTerm: [],
    profile: [],
    retrieved: [],
    budget: 0,
    used: 0,
    degraded: [],
    dropped: { working: 0, longTerm: 0, profile: 0, retrieved: 0 },
    ...parts,
  };
}

describe("mergeContext", () => {
  it("counts the author prefix in retrieved cost", () => {
    expect(ragTokens(rag("a".repeat(16), 1, "sam"))).toBe(6);
    expect(ragTokens(rag("a".repeat(16), 1))).toBe(4);
  });

  it("splits the shared budget by relevance and lets long-term reclaim leftovers", () => {
    const merged = mergeContext(
      recalled({
        turns: [{ role: "user", content: "t".repeat(40), timestamp: 1 }],
        longTerm: [scored("l".repeat(40), 1), scored("m".repeat(8), 1)],
        profile: [scored("p".repeat(8), 0.1, "soul:Core Traits")],
      }),
      [rag("r".repeat(16), 1, "sam"), rag("s".repeat(36), 1)],
      30,
      0.25,
    );
    expect(merged.longTerm).toHaveLength(2);
    expect(merged.retrieved.map((r) => r.content)).toEqual(["r".repeat(16)]);
    expect(merged.profile).toHaveLength(1);
    expect(merged.used).toBe(30);
    expect(merged.dropped).toEqual({ working: 0, longTerm: 0, profile: 0, retrieved: 1 });
  });

  it("holds the session floor back from retrieved history", () => {
    const merged = mergeContext(
      recalled({
        turns: [{ role: "user", content: "t".repeat(8), timestamp: 1 }],
        profile: [scored("p".repeat(120), 0.1, "soul:Core Traits")],
      }),
      [rag("a".repeat(200), 0.9), rag("b".repeat(40), 0.8), rag("c".repeat(4), 0.7)],
      100,
      0.4,
    );
    // 40 reserved, 60 shared: 50 + 10 fill it, the 1-token tail does not fit
    expect(merged.retrieved.map((r) => r.content[0])).toEqual(["a", "b"]);
    expect(merged.profile).toHaveLength(1);
    expect(merged.used).toBe(2 + 60 + 30);
    expect(merged.used).toBeLessThanOrEqual(merged.budget);
  });
});

describe("ContextAssembler", () => {
  let dir: string;
  let storage: StorageDB;
  let memory: MemoryStore;
  let embedder: FakeEmbedder;
  let retrieval: RetrievalIndex;

  const turn = (text: string): InboundTurn => ({
    text,
    sessionId: "s1",
    channelId: "general",
    participantId: "u1",
    conversationKind: "direct",
  });

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), "cairn-assemble-"));
    storage = new StorageDB(":memory:");
    memory = new MemoryStore({
      dir,
      sessionTurns: 50,
      recentTurns: 10,
      dailyLogDays: 3,
      longTermBudget: 1000,
      profileBudget: 1000,
      logger: silentLogger(),
    });
    embedder = new FakeEmbedder();
    retrieval = new RetrievalIndex(
      new VectorStore(storage, 200),
      embedder,
      { messagesPerChannel: 200, minMessageLength: 10, embedTimeoutMs: 1000, embedMaxAttempts: 1 },
      silentLogger(),
    );
    await retrieval.index("general", [
      { id: "1", text: "deploy pipeline broke yesterday", timestamp: 1 },
      { id: "2", text: "lunch menu options for friday", timestamp: 2 },
      { id: "3", text: "pipeline deploy fixed today", timestamp: 3 },
    ]);
    embedder.calls = [];
  });

  afterEach(() => {
    storage.close();
    rmSync(dir, { recursive: true, force: true });
  });

  function assembler(timeoutMs = 1000, store: MemoryStore = memory): ContextAssembler {
    return new ContextAssembler({
      memory: store,
      retrieval,
      logger: silentLogger(),
      options: { budgetTokens: 4000, sessionFloor: 0.4, timeoutMs, ragTopK: 2 },
    });
  }

  it("retrieves history for turns that ask about the past", async () => {
    await memory.write("session", { conversationId: "s1", turn: { role: "user", content: "hi", timestamp: 1 } });
    const result = await assembler().assemble(turn("what did we discuss about the deploy pipeline yesterday"));

    expect(result.retrievalRequested).toBe(true);
    expect(result.partial).toBe(false);
    expect(result.memory.retrieved.map((r) => r.content)).toEqual([
      "pipeline deploy fixed today",
      "deploy pipeline broke yesterday",
    ]);
    expect(result.memory.turns.map((t) => t.content)).toEqual(["hi"]);
    expect(result.memory.used).toBeLessThanOrEqual(4000);
  });

  it("skips the embedding call for everyday turns", async () => {
    const result = await assembler().assemble(turn("hello there"));
    expect(result.retrievalRequested).toBe(false);
    expect(result.memory.retrieved).toEqual([]);
    expect(embedder.calls).toEqual([]);
  });

  it("falls back to session turns when recall times out", async () => {
    class StalledMemory extends MemoryStore {
      override recall(): Promise<MemoryContext> {
        return new Promise<MemoryContext>(() => undefined);
      }
    }
    const stalled = new StalledMemory({
      dir,
      sessionTurns: 50,
      recentTurns: 10,
      dailyLogDays: 3,
      longTermBudget: 1000,
      profileBudget: 1000,
      logger: silentLogger(),
    });
    await stalled.write("session", { conversationId: "s1", turn: { role: "user", content: "earlier", timestamp: 1 } });

    const result = await assembler(20, stalled).assemble(turn("search the deploy notes"));
    expect(result.partial).toBe(true);
    expect(result.memory.turns.map((t) => t.content)).toEqual(["earlier"]);
    expect(result.memory.longTerm).toEqual([]);
    expect(result.memory.retrieved.length).toBeGreaterThan(0);
  });
});
