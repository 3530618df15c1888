import { clipToTokens, entryTokens, turnTokens } from "./budget.js";
import type {
  ConversationTurn,
  MemoryContext,
  MemoryEntry,
  MemoryLayer,
  ScoredEntry,
} from "./types.js";

export interface RecallInputs {
  readonly turns: readonly ConversationTurn[];
  readonly working: readonly MemoryEntry[];
  readonly longTerm: readonly ScoredEntry[];
  readonly profile: readonly ScoredEntry[];
  readonly degraded?: readonly MemoryLayer[];
}

export interface RecallLimits {
  readonly budget: number;
  /** Most recent turns kept regardless of budget pressure. */
  readonly recentTurns: number;
  readonly longTermBudget: number;
  readonly profileBudget: number;
}

/**
 * Shortens the oldest turns until the set fits `budget`. Every turn stays in
 * the result; a turn may end up with empty content.
 */
export function fitTurns(turns: readonly ConversationTurn[], budget: number): ConversationTurn[] {
  let overflow = turns.reduce((sum, t) => sum + turnTokens(t), 0) - budget;
  if (overflow <= 0) return [...turns];

  return turns.map((turn) => {
    if (overflow <= 0) return turn;
    const cost = turnTokens(turn);
    const keep = Math.max(0, cost - overflow);
    const content = clipToTokens(turn.content, keep);
    overflow -= cost - turnTokens({ ...turn, content });
    return { ...turn, content };
  });
}

function take<T>(
  items: readonly T[],
  cost: (item: T) => number,
  limit: number,
): { kept: T[]; used: number; dropped: number } {
  const kept: T[] = [];
  let used = 0;
  for (const item of items) {
    const c = cost(item);
    if (used + c <= limit) {
      kept.push(item);
      used += c;
    }
  }
  return { kept, used, dropped: items.length - kept.length };
}

/**
 * Merges memory layers in priority order (session, working notes, long-term,
 * profile). Each layer only gets what the layers above it left over, so the
 * lowest-priority tail is the first to go.
 */
export function mergeRecall(inputs: RecallInputs, limits: RecallLimits): MemoryContext {
  const budget = Math.max(0, limits.budget);
  const recent = inputs.turns.slice(-limits.recentTurns);
  const turns = fitTurns(recent, budget);
  let used = turns.reduce((sum, t) => sum + turnTokens(t), 0);

  const working = take(inputs.working, entryTokens, budget - used);
  used += working.used;

  const longTerm = take(
    inputs.longTerm,
    (s) => entryTokens(s.entry),
    Math.min(limits.longTermBudget, budget - used),
  );
  used += longTerm.used;

  const profile = take(
    inputs.profile,
    (s) => entryTokens(s.entry),
    Math.min(limits.profileBudget, budget - used),
  );
  used += profile.used;

  return {
    turns,
    working: working.kept,
    longTerm: longTerm.kept,
    profile: profile.kept,
    retrieved: [],
    budget,
    used,
    degraded: [...(inputs.degraded ?? [])],
    dropped: {
      working: working.dropped,
      longTerm: longTerm.dropped,
      profile: profile.dropped,
      retrieved: 0,
    },
  };
}
