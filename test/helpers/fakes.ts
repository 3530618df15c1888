import type { ChatRequest, ChatResponse, LlmClient } from "../../src/agent/llm.js";
import type { EmbeddingProvider } from "../../src/rag/types.js";
import type { OutboundSink } from "../../src/transport/types.js";
import { TransientError } from "../../src/utils/errors.js";

const DIMENSIONS = 16;

/** Hashed bag of words: texts sharing words point the same way. */
export function bagOfWords(text: string): number[] {
  const vector = new Array<number>(DIMENSIONS).fill(0);
  for (const word of text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean)) {
    let h = 0;
    for (const ch of word) h = (h * 31 + ch.charCodeAt(0)) % DIMENSIONS;
    vector[h] = (vector[h] ?? 0) + 1;
  }
  return vector;
}

export class FakeEmbedder implements EmbeddingProvider {
  readonly model = "fake-embedding";
  calls: string[][] = [];
  failing = false;

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.failing) throw new TransientError("embedding service unavailable");
    return texts.map(bagOfWords);
  }

  get embeddedTexts(): number {
    return this.calls.reduce((n, batch) => n + batch.length, 0);
  }
}

type Script = (request: ChatRequest, call: number) => ChatResponse | Promise<ChatResponse>;

/** LLM stand-in driven by a script; records every request. */
export class ScriptedLlm implements LlmClient {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly script: Script) {}

  static replies(...responses: ChatResponse[]): ScriptedLlm {
    return new ScriptedLlm((_request, call) => {
      const response = responses[Math.min(call, responses.length - 1)];
      if (!response) throw new Error("no scripted response");
      return response;
    });
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const call = this.requests.length;
    this.requests.push({ ...request, messages: [...request.messages] });
    return this.script(request, call);
  }
}

export class RecordingSink implements OutboundSink {
  readonly delivered: Array<{ channelId: string; text: string }> = [];
  failNext = 0;

  async deliver(channelId: string, text: string): Promise<void> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error("delivery failed");
    }
    this.delivered.push({ channelId, text });
  }
}
