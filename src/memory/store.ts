import type { Logger } from "../logging/logger.js";
import { LongTermMemory } from "./long-term.js";
import { ProfileStore } from "./profile.js";
import { mergeRecall } from "./recall.js";
import { SessionMemory } from "./session.js";
import { WorkingMemory } from "./working.js";
import type {
  MemoryContext,
  MemoryFilters,
  MemoryLayer,
  MemoryReads,
  MemoryWrites,
  RecallOptions,
  ScoredEntry,
} from "./types.js";

export interface MemoryStoreOptions {
  readonly dir: string;
  readonly sessionTurns: number;
  readonly recentTurns: number;
  readonly dailyLogDays: number;
  readonly longTermBudget: number;
  readonly profileBudget: number;
  readonly logger: Logger;
}

type Writers = { [L in MemoryLayer]: (entry: MemoryWrites[L]) => Promise<void> };
type Readers = { [L in MemoryLayer]: (filter: MemoryFilters[L]) => Promise<MemoryReads[L]> };

/**
 * One front for the four memory layers. Each layer keeps its own lifetime;
 * this class routes writes and reads and merges them for recall.
 */
export class MemoryStore {
  readonly session: SessionMemory;
  readonly working: WorkingMemory;
  readonly longTerm: LongTermMemory;
  readonly profile: ProfileStore;
  private readonly logger: Logger;

  private readonly writers: Writers = {
    session: async (e) => {
      this.session.append(e.conversationId, e.turn);
    },
    working: async (e) => {
      this.working.set(e.conversationId, e.key, e.text);
    },
    "long-term": async (e) => {
      if (e.target === "daily") {
        await this.longTerm.appendDaily(e.text, e.timestamp);
      } else if (e.mode === "replace") {
        await this.longTerm.replaceSection(e.category, e.text, e.timestamp);
      } else {
        await this.longTerm.append(e.category, e.text, {
          ...(e.sourceChannel ? { sourceChannel: e.sourceChannel } : {}),
          ...(e.timestamp !== undefined ? { timestamp: e.timestamp } : {}),
        });
      }
    },
    profile: async (e) => {
      await this.profile.update(e.document, e.section, e.text, e.mode);
    },
  };

  private readonly readers: Readers = {
    session: async (f) => this.session.recent(f.conversationId, f.limit),
    working: async (f) => this.working.list(f.conversationId),
    "long-term": async (f) => {
      if (f.query) {
        const scored = await this.longTerm.search(f.query, {
          includeDaily: f.includeDaily ?? false,
          dailyDays: this.opts.dailyLogDays,
        });
        return scored
          .map((s) => s.entry)
          .filter((e) => !f.category || e.key === f.category);
      }
      const entries = await this.longTerm.entries(f.category);
      if (f.includeDaily) entries.push(...(await this.longTerm.dailyEntries(this.opts.dailyLogDays)));
      return entries;
    },
    profile: async (f) => this.profile.sections(f.document),
  };

  constructor(private readonly opts: MemoryStoreOptions) {
    this.logger = opts.logger.child({ component: "memory" });
    this.session = new SessionMemory(opts.sessionTurns);
    this.working = new WorkingMemory();
    this.longTerm = new LongTermMemory(opts.dir, opts.logger);
    this.profile = new ProfileStore(opts.dir, opts.logger);
  }

  get recentTurns(): number {
    return this.opts.recentTurns;
  }

  /** Persistence failures propagate as `PersistenceError`. */
  async write<L extends MemoryLayer>(layer: L, entry: MemoryWrites[L]): Promise<void> {
    await this.writers[layer](entry);
  }

  async read<L extends MemoryLayer>(layer: L, filter: MemoryFilters[L]): Promise<MemoryReads[L]> {
    return this.readers[layer](filter);
  }

  async recall(query: string, budget: number, opts: RecallOptions): Promise<MemoryContext> {
    const degraded: MemoryLayer[] = [];
    const direct = opts.conversationKind === "direct";

    const guard = async <T>(layer: MemoryLayer, fn: () => Promise<T>, empty: T): Promise<T> => {
      try {
        return await fn();
      } catch (err) {
        degraded.push(layer);
        this.logger.warn({ err, layer }, "Memory layer read failed, continuing without it");
        return empty;
      }
    };

    const none: ScoredEntry[] = [];
    const [turns, working, longTerm, profile] = await Promise.all([
      guard("session", async () => this.session.recent(opts.conversationId, this.opts.recentTurns), []),
      guard("working", async () => this.working.list(opts.conversationId), []),
      direct
        ? guard(
            "long-term",
            () => this.longTerm.search(query, { includeDaily: true, dailyDays: this.opts.dailyLogDays }),
            none,
          )
        : Promise.resolve(none),
      guard("profile", () => this.profile.search(query, { includePersonal: direct }), none),
    ]);

    return mergeRecall(
      { turns, working, longTerm, profile, degraded },
      {
        budget,
        recentTurns: this.opts.recentTurns,
        longTermBudget: this.opts.longTermBudget,
        profileBudget: this.opts.profileBudget,
      },
    );
  }

  /** Session turns only; used when a full recall cannot finish in time. */
  sessionContext(conversationId: string, budget: number): MemoryContext {
    return mergeRecall(
      { turns: this.session.recent(conversationId, this.opts.recentTurns), working: [], longTerm: [], profile: [] },
      { budget, recentTurns: this.opts.recentTurns, longTermBudget: 0, profileBudget: 0 },
    );
  }

  clearConversation(conversationId: string): void {
    this.session.clear(conversationId);
    this.working.clear(conversationId);
  }
}
