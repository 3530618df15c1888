import { createHash } from "node:crypto";
import type { Logger } from "../logging/logger.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { retry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import type { UpsertRecord, VectorStore } from "./vector-store.js";
import type {
  ChannelStats,
  EmbeddingProvider,
  IndexableMessage,
  IndexReport,
  RAGResult,
} from "./types.js";

export interface RetrievalIndexOptions {
  readonly messagesPerChannel: number;
  readonly minMessageLength: number;
  readonly embedTimeoutMs: number;
  readonly embedMaxAttempts?: number;
}

// A bare mention, channel link or URL carries nothing worth embedding.
const REFERENCE_ONLY = /^(?:\s*<[^>]+>\s*)+$/;

export function isIndexable(text: string, minLength: number): boolean {
  const trimmed = text.trim();
  if (trimmed.length < minLength) return false;
  return !REFERENCE_ONLY.test(trimmed);
}

function contentHash(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

export class RetrievalIndex {
  private readonly logger: Logger;
  private readonly writers = new KeyedMutex();

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
    private readonly opts: RetrievalIndexOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "retrieval-index" });
  }

  /**
   * Embeds new or changed messages of `channel`. Only the newest
   * `messagesPerChannel` of the batch are considered. Embedding failures
   * propagate so the caller can try again on its next cycle.
   */
  async index(
    channel: string,
    messages: readonly IndexableMessage[],
    signal?: AbortSignal,
  ): Promise<IndexReport> {
    return this.writers.run(channel, async () => {
      const window = [...messages]
        .sort((a, b) => b.timestamp - a.timestamp)
        .slice(0, this.opts.messagesPerChannel);
      const eligible = window.filter((m) => isIndexable(m.text, this.opts.minMessageLength));
      const skipped = messages.length - eligible.length;

      const known = this.store.hashes(
        channel,
        eligible.map((m) => m.id),
      );
      const pending = eligible
        .map((m) => ({ message: m, hash: contentHash(m.text) }))
        .filter(({ message, hash }) => known.get(message.id) !== hash);

      if (pending.length === 0) {
        return { channel, indexed: 0, unchanged: eligible.length, skipped, evicted: 0 };
      }

      const vectors = await this.embed(pending.map((p) => p.message.text), signal);
      const records: UpsertRecord[] = [];
      pending.forEach(({ message, hash }, i) => {
        const embedding = vectors[i];
        if (!embedding) return;
        records.push({
          channel,
          messageId: message.id,
          content: message.text,
          author: message.author ?? null,
          embedding,
          contentHash: hash,
          timestamp: message.timestamp,
        });
      });

      const evicted = this.store.upsert(records);
      const report: IndexReport = {
        channel,
        indexed: records.length,
        unchanged: eligible.length - pending.length,
        skipped,
        evicted,
      };
      this.logger.info(report, "Channel indexed");
      return report;
    });
  }

  /**
   * Similarity search over one channel, or all of them. An embedding failure
   * yields no results instead of an error.
   */
  async search(
    query: string,
    topK: number,
    opts?: { channel?: string; signal?: AbortSignal },
  ): Promise<RAGResult[]> {
    if (!query.trim() || topK <= 0) return [];
    let vector: number[] | undefined;
    try {
      [vector] = await this.embed([query], opts?.signal);
    } catch (err) {
      this.logger.warn({ err }, "Query embedding failed, continuing without retrieved history");
      return [];
    }
    if (!vector) return [];
    return this.store.search(vector, topK, opts?.channel);
  }

  stats(): ChannelStats[] {
    return this.store.stats();
  }

  private embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return retry(
      () => withTimeout(this.embedder.embed(texts, signal), this.opts.embedTimeoutMs, "embedding", signal),
      { maxAttempts: this.opts.embedMaxAttempts ?? 3, ...(signal ? { signal } : {}) },
    );
  }
}
