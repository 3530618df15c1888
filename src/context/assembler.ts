import type { Logger } from "../logging/logger.js";
import { entryTokens, estimateTokens, turnTokens } from "../memory/budget.js";
import type { MemoryStore } from "../memory/store.js";
import type { MemoryContext, ScoredEntry } from "../memory/types.js";
import type { RetrievalIndex } from "../rag/retrieval-index.js";
import type { RAGResult } from "../rag/types.js";
import type { InboundTurn } from "../transport/types.js";
import { withTimeout } from "../utils/timeout.js";
import { needsRetrieval } from "./classifier.js";

export interface AssemblerOptions {
  readonly budgetTokens: number;
  /** Share of the budget held for session turns and working notes. */
  readonly sessionFloor: number;
  readonly timeoutMs: number;
  readonly ragTopK: number;
}

interface AssemblerDeps {
  memory: MemoryStore;
  retrieval?: RetrievalIndex;
  logger: Logger;
  options: AssemblerOptions;
}

export interface AssembledContext {
  readonly memory: MemoryContext;
  readonly retrievalRequested: boolean;
  /** True when a source timed out and its contribution is missing. */
  readonly partial: boolean;
}

export function ragTokens(result: RAGResult): number {
  const author = result.author ? `${result.author}: ` : "";
  return estimateTokens(`${author}${result.content}`);
}

function fill<T>(items: readonly T[], cost: (item: T) => number, limit: number): { kept: T[]; used: number } {
  const kept: T[] = [];
  let used = 0;
  for (const item of items) {
    const c = cost(item);
    if (used + c <= limit) {
      kept.push(item);
      used += c;
    }
  }
  return { kept, used };
}

const sumScores = (scores: readonly number[]): number => scores.reduce((a, b) => a + Math.max(0, b), 0);

/**
 * Puts recalled memory and retrieved history under one budget. Session turns
 * and working notes come first; long-term and retrieved history split what
 * remains above the session floor by their summed relevance; profile excerpts
 * get whatever is left.
 */
export function mergeContext(
  recalled: MemoryContext,
  retrieved: readonly RAGResult[],
  budget: number,
  sessionFloor: number,
): MemoryContext {
  const sessionCost =
    recalled.turns.reduce((s, t) => s + turnTokens(t), 0) +
    recalled.working.reduce((s, e) => s + entryTokens(e), 0);
  const reserved = Math.max(sessionCost, Math.floor(budget * sessionFloor));
  const shared = Math.max(0, budget - reserved);

  const ltWeight = sumScores(recalled.longTerm.map((s) => s.score));
  const ragWeight = sumScores(retrieved.map((r) => r.score));
  const total = ltWeight + ragWeight;
  const ltShare = total === 0 ? Math.floor(shared / 2) : Math.floor((shared * ltWeight) / total);

  let longTerm = fill(recalled.longTerm, (s: ScoredEntry) => entryTokens(s.entry), ltShare);
  const rag = fill(retrieved, ragTokens, shared - longTerm.used);
  // Retrieved history may leave room that long-term can still use.
  if (longTerm.kept.length < recalled.longTerm.length) {
    longTerm = fill(recalled.longTerm, (s: ScoredEntry) => entryTokens(s.entry), shared - rag.used);
  }

  const remaining = budget - sessionCost - longTerm.used - rag.used;
  const profile = fill(recalled.profile, (s: ScoredEntry) => entryTokens(s.entry), Math.max(0, remaining));

  return {
    ...recalled,
    longTerm: longTerm.kept,
    retrieved: rag.kept,
    profile: profile.kept,
    budget,
    used: sessionCost + longTerm.used + rag.used + profile.used,
    dropped: {
      ...recalled.dropped,
      longTerm: recalled.dropped.longTerm + recalled.longTerm.length - longTerm.kept.length,
      profile: recalled.dropped.profile + recalled.profile.length - profile.kept.length,
      retrieved: retrieved.length - rag.kept.length,
    },
  };
}

export class ContextAssembler {
  private readonly memory: MemoryStore;
  private readonly retrieval: RetrievalIndex | undefined;
  private readonly logger: Logger;
  private readonly options: AssemblerOptions;

  constructor(deps: AssemblerDeps) {
    this.memory = deps.memory;
    this.retrieval = deps.retrieval;
    this.logger = deps.logger.child({ component: "context" });
    this.options = deps.options;
  }

  async assemble(turn: InboundTurn, signal?: AbortSignal): Promise<AssembledContext> {
    const { budgetTokens, timeoutMs, ragTopK, sessionFloor } = this.options;
    const retrievalRequested = this.retrieval !== undefined && needsRetrieval(turn.text);
    let partial = false;

    const recallTask = withTimeout(
      this.memory.recall(turn.text, budgetTokens, {
        conversationId: turn.sessionId,
        conversationKind: turn.conversationKind,
      }),
      timeoutMs,
      "memory recall",
      signal,
    ).catch((err: unknown) => {
      partial = true;
      this.logger.warn({ err, sessionId: turn.sessionId }, "Recall unavailable, using session turns only");
      return this.memory.sessionContext(turn.sessionId, budgetTokens);
    });

    const searchTask: Promise<RAGResult[]> =
      retrievalRequested && this.retrieval
        ? withTimeout(
            this.retrieval.search(turn.text, ragTopK, signal ? { signal } : undefined),
            timeoutMs,
            "history search",
            signal,
          ).catch((err: unknown) => {
            partial = true;
            this.logger.warn({ err }, "History search unavailable");
            return [];
          })
        : Promise.resolve([]);

    const [recalled, retrieved] = await Promise.all([recallTask, searchTask]);
    const memory = mergeContext(recalled, retrieved, budgetTokens, sessionFloor);

    this.logger.debug(
      {
        sessionId: turn.sessionId,
        used: memory.used,
        budget: memory.budget,
        turns: memory.turns.length,
        longTerm: memory.longTerm.length,
        retrieved: memory.retrieved.length,
        profile: memory.profile.length,
      },
      "Context assembled",
    );
    return { memory, retrievalRequested, partial };
  }
}
