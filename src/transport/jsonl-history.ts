import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { IndexableMessage } from "../rag/types.js";
import type { HistorySource } from "./types.js";

const exportedMessageSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  channel: z.string().min(1),
  text: z.string(),
  author: z.string().optional(),
  /** ms since epoch, or an ISO string. */
  timestamp: z.union([z.number(), z.string().datetime({ offset: true }).transform((s) => Date.parse(s))]),
});

export type ExportedMessage = z.infer<typeof exportedMessageSchema>;

export function parseExport(content: string): { messages: ExportedMessage[]; invalidLines: number[] } {
  const messages: ExportedMessage[] = [];
  const invalidLines: number[] = [];
  content.split(/\r?\n/).forEach((line, i) => {
    if (!line.trim()) return;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      invalidLines.push(i + 1);
      return;
    }
    const parsed = exportedMessageSchema.safeParse(raw);
    if (parsed.success) messages.push(parsed.data);
    else invalidLines.push(i + 1);
  });
  return { messages, invalidLines };
}

/**
 * History read from a JSON Lines export: one
 * `{"id","channel","text","author","timestamp"}` object per line.
 */
export class JsonlHistorySource implements HistorySource {
  constructor(private readonly path: string) {}

  private async load(): Promise<ExportedMessage[]> {
    return parseExport(await readFile(this.path, "utf-8")).messages;
  }

  async listChannels(): Promise<string[]> {
    const channels = new Set((await this.load()).map((m) => m.channel));
    return [...channels].sort();
  }

  async fetchHistory(channelId: string, limit: number): Promise<IndexableMessage[]> {
    return (await this.load())
      .filter((m) => m.channel === channelId)
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, limit)
      .map((m) => ({
        id: m.id,
        text: m.text,
        timestamp: m.timestamp,
        ...(m.author ? { author: m.author } : {}),
      }));
  }
}
