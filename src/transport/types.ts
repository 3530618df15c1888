import type { ConversationKind } from "../memory/types.js";
import type { IndexableMessage } from "../rag/types.js";

/** One incoming message, as handed over by a chat transport. */
export interface InboundTurn {
  readonly text: string;
  /** Session key; one per direct conversation or per channel thread. */
  readonly sessionId: string;
  readonly channelId: string;
  readonly participantId: string;
  readonly conversationKind: ConversationKind;
  readonly timestamp?: number;
}

export interface OutboundSink {
  deliver(channelId: string, text: string): Promise<void>;
}

export interface HistorySource {
  listChannels(): Promise<string[]>;
  fetchHistory(channelId: string, limit: number): Promise<IndexableMessage[]>;
}
