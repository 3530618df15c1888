import type Database from "better-sqlite3";
import type { StorageDB } from "../storage/db.js";
import { parseVector } from "./embeddings.js";
import { cosineSimilarity } from "./similarity.js";
import type { ChannelStats, RAGResult, VectorRecord } from "./types.js";

interface VectorRow {
  channel_id: string;
  message_id: string;
  content: string;
  author: string | null;
  embedding: string;
  content_hash: string;
  timestamp: number;
}

export interface UpsertRecord {
  readonly channel: string;
  readonly messageId: string;
  readonly content: string;
  readonly author: string | null;
  readonly embedding: readonly number[];
  readonly contentHash: string;
  readonly timestamp: number;
}

export function recordId(channel: string, messageId: string): string {
  return `${channel}:${messageId}`;
}

function toRecord(row: VectorRow): VectorRecord {
  return {
    id: recordId(row.channel_id, row.message_id),
    channel: row.channel_id,
    messageId: row.message_id,
    embedding: parseVector(row.embedding),
    content: row.content,
    author: row.author,
    timestamp: row.timestamp,
  };
}

/** Vector records keyed by (channel, message id), capped per channel. */
export class VectorStore {
  private readonly db: Database.Database;

  constructor(
    storage: StorageDB,
    private readonly capacityPerChannel: number,
  ) {
    this.db = storage.raw();
  }

  /** Content hashes of already-indexed messages, keyed by message id. */
  hashes(channel: string, messageIds: readonly string[]): Map<string, string> {
    const stmt = this.db.prepare<[string, string], { content_hash: string }>(
      "SELECT content_hash FROM vector_records WHERE channel_id = ? AND message_id = ?",
    );
    const result = new Map<string, string>();
    for (const id of messageIds) {
      const row = stmt.get(channel, id);
      if (row) result.set(id, row.content_hash);
    }
    return result;
  }

  /**
   * Inserts or updates records, then evicts the oldest of each touched channel
   * beyond capacity. Returns how many records were evicted.
   */
  upsert(records: readonly UpsertRecord[]): number {
    const insert = this.db.prepare(`
      INSERT INTO vector_records
        (channel_id, message_id, content, author, embedding, content_hash, timestamp, indexed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(channel_id, message_id) DO UPDATE SET
        content = excluded.content,
        author = excluded.author,
        embedding = excluded.embedding,
        content_hash = excluded.content_hash,
        timestamp = excluded.timestamp,
        indexed_at = excluded.indexed_at
    `);

    const now = Date.now();
    return this.db.transaction(() => {
      const channels = new Set<string>();
      for (const r of records) {
        insert.run(
          r.channel,
          r.messageId,
          r.content,
          r.author,
          JSON.stringify(r.embedding),
          r.contentHash,
          r.timestamp,
          now,
        );
        channels.add(r.channel);
      }
      let evicted = 0;
      for (const channel of channels) evicted += this.evict(channel);
      return evicted;
    })();
  }

  private evict(channel: string): number {
    const result = this.db
      .prepare(`
        DELETE FROM vector_records
        WHERE channel_id = ? AND message_id IN (
          SELECT message_id FROM vector_records
          WHERE channel_id = ?
          ORDER BY timestamp DESC, message_id DESC
          LIMIT -1 OFFSET ?
        )
      `)
      .run(channel, channel, this.capacityPerChannel);
    return result.changes;
  }

  list(channel: string): VectorRecord[] {
    return this.db
      .prepare<[string], VectorRow>(
        "SELECT * FROM vector_records WHERE channel_id = ? ORDER BY timestamp ASC, message_id ASC",
      )
      .all(channel)
      .map(toRecord);
  }

  count(channel: string): number {
    const row = this.db
      .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM vector_records WHERE channel_id = ?")
      .get(channel);
    return row?.n ?? 0;
  }

  stats(): ChannelStats[] {
    return this.db
      .prepare<[], { channel: string; count: number; newest: number | null }>(`
        SELECT channel_id AS channel, COUNT(*) AS count, MAX(timestamp) AS newest
        FROM vector_records GROUP BY channel_id ORDER BY channel_id
      `)
      .all();
  }

  /**
   * Top `topK` by cosine similarity; equal scores go to the newer message.
   * Without `channel` every channel is searched.
   */
  search(query: readonly number[], topK: number, channel?: string): RAGResult[] {
    const rows = channel
      ? this.db.prepare<[string], VectorRow>("SELECT * FROM vector_records WHERE channel_id = ?").all(channel)
      : this.db.prepare<[], VectorRow>("SELECT * FROM vector_records").all();

    return rows
      .map((row) => ({
        content: row.content,
        channel: row.channel_id,
        author: row.author,
        timestamp: row.timestamp,
        score: cosineSimilarity(query, parseVector(row.embedding)),
      }))
      .sort((a, b) => b.score - a.score || b.timestamp - a.timestamp)
      .slice(0, Math.max(0, topK));
  }
}
