import { z } from "zod";
import type { RetrievalIndex } from "../../rag/retrieval-index.js";
import { defineTool, ok, type ToolDefinition } from "../types.js";

export function historyTools(index: RetrievalIndex, defaultTopK: number): ToolDefinition[] {
  const search = defineTool({
    name: "search_history",
    idempotent: true,
    description: "Search indexed message history by meaning. Optionally limit to one channel.",
    parameters: z.object({
      query: z.string().min(1),
      channel: z.string().optional().describe("Channel id to search; all channels when omitted"),
      top_k: z.number().int().min(1).max(20).optional(),
    }),
    async execute(args, ctx) {
      const results = await index.search(args.query, args.top_k ?? defaultTopK, {
        ...(args.channel ? { channel: args.channel } : {}),
        ...(ctx.signal ? { signal: ctx.signal } : {}),
      });
      return ok(
        results.map((r) => ({
          channel: r.channel,
          author: r.author,
          timestamp: new Date(r.timestamp).toISOString(),
          score: Math.round(r.score * 1000) / 1000,
          content: r.content,
        })),
      );
    },
  });

  return [search];
}
