import type { ChatMessage } from "../agent/llm.js";
import type { MemoryContext, ScoredEntry } from "../memory/types.js";
import type { RAGResult } from "../rag/types.js";
import type { ToolSchema } from "../tools/types.js";
import type { InboundTurn } from "../transport/types.js";

export interface PromptSections {
  intro: string;
  guidelines: string | null;
  profile: string | null;
  memories: string | null;
  notes: string | null;
  history: string | null;
  capabilities: string | null;
}

const INTRO =
  "You are a helpful assistant with durable memory and access to past conversation history. " +
  "Use the context below when it is relevant, call tools when an action is needed, and say so " +
  "plainly when you do not know something.";

function bullets(header: string, lines: string[]): string | null {
  return lines.length > 0 ? [header, ...lines].join("\n") : null;
}

function sectionName(key: string): string {
  const at = key.indexOf(":");
  return at === -1 ? key : key.slice(at + 1);
}

function profileLines(entries: readonly ScoredEntry[], document: string): string[] {
  return entries
    .filter((s) => s.entry.key.startsWith(`${document}:`))
    .map((s) => `### ${sectionName(s.entry.key)}\n${s.entry.text}`);
}

function formatRetrieved(result: RAGResult): string {
  const when = new Date(result.timestamp).toISOString().slice(0, 16).replace("T", " ");
  const who = result.author ?? "unknown";
  return `- [${when}] ${who} in #${result.channel}: ${result.content}`;
}

/** Each section is null when there is nothing to say. */
export function buildSections(memory: MemoryContext, tools: readonly ToolSchema[], turn: InboundTurn): PromptSections {
  const where =
    turn.conversationKind === "direct"
      ? "This is a private conversation."
      : "This is a group conversation; keep personal details about anyone out of replies.";

  return {
    intro: `${INTRO}\n${where}`,
    guidelines: bullets("## Guidelines", profileLines(memory.profile, "soul")),
    profile: bullets("## About the user", [
      ...profileLines(memory.profile, "user"),
      ...profileLines(memory.profile, "tools"),
    ]),
    memories: bullets(
      "## Relevant memories",
      memory.longTerm.map((s) => `- (${s.entry.key}) ${s.entry.text}`),
    ),
    notes: bullets(
      "## Working notes",
      memory.working.map((e) => `- ${e.key}: ${e.text}`),
    ),
    history: bullets("## Related messages from history", memory.retrieved.map(formatRetrieved)),
    capabilities: bullets(
      "## Available tools",
      tools.map((t) => `- ${t.name}: ${t.description}`),
    ),
  };
}

export function renderSystemPrompt(
  memory: MemoryContext,
  tools: readonly ToolSchema[],
  turn: InboundTurn,
  now = Date.now(),
): string {
  const s = buildSections(memory, tools, turn);
  const parts = [s.intro, s.guidelines, s.profile, s.memories, s.notes, s.history, s.capabilities].filter(
    (p): p is string => p !== null,
  );
  parts.push(`Current time (UTC): ${new Date(now).toISOString()}`);
  return parts.join("\n\n");
}

/** Recent session turns as chat messages. Tool turns stay out; their results live in the loop. */
export function historyMessages(memory: MemoryContext): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const turn of memory.turns) {
    if (!turn.content) continue;
    if (turn.role === "user") messages.push({ role: "user", content: turn.content });
    else if (turn.role === "assistant") messages.push({ role: "assistant", content: turn.content });
  }
  return messages;
}
