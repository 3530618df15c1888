import { createHash } from "node:crypto";
import OpenAI from "openai";
import type { Logger } from "../logging/logger.js";
import type { StorageDB } from "../storage/db.js";
import { TransientError } from "../utils/errors.js";
import type { EmbeddingProvider } from "./types.js";

const MAX_INPUT_CHARS = 8000;

export interface OpenAIEmbeddingOptions {
  readonly model: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly client?: Pick<OpenAI, "embeddings">;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly client: Pick<OpenAI, "embeddings">;

  constructor(opts: OpenAIEmbeddingOptions) {
    this.model = opts.model;
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: opts.apiKey,
        ...(opts.baseUrl ? { baseURL: opts.baseUrl } : {}),
        maxRetries: 0,
      });
  }

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create(
        { model: this.model, input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)) },
        signal ? { signal } : undefined,
      );
      return response.data
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);
    } catch (err) {
      if (err instanceof OpenAI.APIError && err.status !== undefined && err.status < 500 && err.status !== 429) {
        throw err;
      }
      throw new TransientError("Embedding request failed", err);
    }
  }
}

interface CacheRow {
  hash: string;
  embedding: string;
}

/**
 * Wraps a provider with a SQLite cache keyed by model and content hash, so
 * unchanged text is never embedded twice.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly logger: Logger;

  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly storage: StorageDB,
    logger: Logger,
  ) {
    this.model = inner.model;
    this.logger = logger.child({ component: "embedding-cache" });
  }

  private hashOf(text: string): string {
    return createHash("sha256").update(`${this.model}\n${text}`).digest("hex");
  }

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    const db = this.storage.raw();
    const hashes = texts.map((t) => this.hashOf(t));
    const lookup = db.prepare<[string], CacheRow>(
      "SELECT hash, embedding FROM embedding_cache WHERE hash = ?",
    );

    const found = new Map<string, number[]>();
    for (const hash of new Set(hashes)) {
      const row = lookup.get(hash);
      if (row) found.set(hash, parseVector(row.embedding));
    }

    const missing = [...new Set(texts.filter((_, i) => !found.has(hashes[i] ?? "")))];
    if (missing.length > 0) {
      const vectors = await this.inner.embed(missing, signal);
      const insert = db.prepare(
        "INSERT OR REPLACE INTO embedding_cache (hash, model, embedding, created_at) VALUES (?, ?, ?, ?)",
      );
      const now = Date.now();
      db.transaction(() => {
        missing.forEach((text, i) => {
          const vector = vectors[i];
          if (!vector) return;
          const hash = this.hashOf(text);
          found.set(hash, vector);
          insert.run(hash, this.model, JSON.stringify(vector), now);
        });
      })();
      this.logger.debug({ embedded: missing.length, cached: texts.length - missing.length }, "Embeddings resolved");
    }

    return hashes.map((hash) => {
      const vector = found.get(hash);
      if (!vector) throw new TransientError("Embedding provider returned fewer vectors than requested");
      return vector;
    });
  }
}

export function parseVector(raw: string): number[] {
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value)) return [];
  return value.filter((n): n is number => typeof n === "number");
}
