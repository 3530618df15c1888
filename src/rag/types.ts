export interface IndexableMessage {
  /** Transport-assigned id, unique within the channel. */
  readonly id: string;
  readonly text: string;
  readonly author?: string;
  readonly timestamp: number;
}

export interface VectorRecord {
  readonly id: string;
  readonly channel: string;
  readonly messageId: string;
  readonly embedding: number[];
  readonly content: string;
  readonly author: string | null;
  readonly timestamp: number;
}

export interface RAGResult {
  readonly content: string;
  readonly channel: string;
  readonly author: string | null;
  readonly timestamp: number;
  readonly score: number;
}

export interface IndexReport {
  readonly channel: string;
  readonly indexed: number;
  readonly unchanged: number;
  readonly skipped: number;
  readonly evicted: number;
}

export interface ChannelStats {
  readonly channel: string;
  readonly count: number;
  readonly newest: number | null;
}

export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
}
