import type { AssembledContext, ContextAssembler } from "../context/assembler.js";
import { historyMessages, renderSystemPrompt } from "../context/prompt.js";
import type { Logger } from "../logging/logger.js";
import type { MemoryStore } from "../memory/store.js";
import type { ConversationTurn } from "../memory/types.js";
import type { ToolExecutor } from "../tools/executor.js";
import type { ToolRegistry } from "../tools/registry.js";
import { renderResult, type ToolCall, type ToolContext, type ToolOutcome } from "../tools/types.js";
import type { InboundTurn } from "../transport/types.js";
import { TimeoutError } from "../utils/errors.js";
import { retry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import type { ChatMessage, ChatResponse, LlmClient } from "./llm.js";

export type AgentState = "assembling" | "reasoning" | "tool-pending" | "executing" | "done" | "aborted";

export type AbortReason = "max-rounds" | "deadline" | "llm-failure";

export interface ToolRound {
  readonly round: number;
  readonly calls: readonly ToolCall[];
  /** In completion order. */
  readonly outcomes: readonly ToolOutcome[];
}

export interface AgentOutcome {
  readonly status: "done" | "aborted";
  readonly reason?: AbortReason;
  readonly text: string;
  /** Tool round-trips taken. */
  readonly rounds: number;
  readonly toolRounds: readonly ToolRound[];
  /** Turns produced by this request, tool turns included. */
  readonly transcript: readonly ConversationTurn[];
  readonly states: readonly AgentState[];
  readonly context: {
    readonly used: number;
    readonly budget: number;
    readonly partial: boolean;
    readonly retrievalRequested: boolean;
  };
}

export interface AgentOptions {
  readonly maxRounds: number;
  readonly deadlineMs: number;
  readonly llmTimeoutMs: number;
  readonly llmMaxAttempts: number;
  readonly llmRetryBaseDelayMs?: number;
}

interface AgentDeps {
  assembler: ContextAssembler;
  memory: MemoryStore;
  registry: ToolRegistry;
  executor: ToolExecutor;
  llm: LlmClient;
  logger: Logger;
  options: AgentOptions;
  now?: () => number;
}

const STOP_NOTES: Record<AbortReason, string> = {
  "max-rounds": "reached the limit of tool rounds for one request",
  deadline: "ran out of time for this request",
  "llm-failure": "the language model could not be reached",
};

/**
 * Drives one inbound turn through
 * assembling → reasoning → (tool-pending → executing → reasoning)* → done | aborted.
 * The round cap and the overall deadline bound every run.
 */
export class AgentCore {
  private readonly assembler: ContextAssembler;
  private readonly memory: MemoryStore;
  private readonly registry: ToolRegistry;
  private readonly executor: ToolExecutor;
  private readonly llm: LlmClient;
  private readonly logger: Logger;
  private readonly options: AgentOptions;
  private readonly now: () => number;

  constructor(deps: AgentDeps) {
    this.assembler = deps.assembler;
    this.memory = deps.memory;
    this.registry = deps.registry;
    this.executor = deps.executor;
    this.llm = deps.llm;
    this.logger = deps.logger.child({ component: "agent" });
    this.options = deps.options;
    this.now = deps.now ?? Date.now;
  }

  async handle(turn: InboundTurn): Promise<AgentOutcome> {
    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort(new TimeoutError("request", this.options.deadlineMs));
    }, this.options.deadlineMs);
    timer.unref();

    try {
      return await this.run(turn, deadline.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(turn: InboundTurn, signal: AbortSignal): Promise<AgentOutcome> {
    const log = this.logger.child({ sessionId: turn.sessionId, channelId: turn.channelId });
    const states: AgentState[] = [];
    const transcript: ConversationTurn[] = [];
    const toolRounds: ToolRound[] = [];
    const enter = (state: AgentState): void => {
      states.push(state);
      log.debug({ state, round: toolRounds.length }, "Agent state");
    };

    enter("assembling");
    const assembled = await this.assembler.assemble(turn, signal);

    const userTurn: ConversationTurn = { role: "user", content: turn.text, timestamp: turn.timestamp ?? this.now() };
    transcript.push(userTurn);
    await this.memory.write("session", { conversationId: turn.sessionId, turn: userTurn });

    const tools = this.registry.toolSchemas();
    const system = renderSystemPrompt(assembled.memory, tools, turn, this.now());
    const messages: ChatMessage[] = [...historyMessages(assembled.memory), { role: "user", content: turn.text }];
    const toolContext: ToolContext = {
      conversationId: turn.sessionId,
      channelId: turn.channelId,
      participantId: turn.participantId,
      conversationKind: turn.conversationKind,
      logger: log,
      signal,
    };

    const finish = async (
      status: "done" | "aborted",
      text: string,
      reason?: AbortReason,
    ): Promise<AgentOutcome> => {
      enter(status);
      const reply: ConversationTurn = { role: "assistant", content: text, timestamp: this.now() };
      transcript.push(reply);
      await this.memory.write("session", { conversationId: turn.sessionId, turn: reply });
      log.info({ status, reason, rounds: toolRounds.length, used: assembled.memory.used }, "Turn finished");
      return {
        status,
        ...(reason ? { reason } : {}),
        text,
        rounds: toolRounds.length,
        toolRounds,
        transcript,
        states,
        context: summarize(assembled),
      };
    };

    let partialText = "";
    for (;;) {
      if (signal.aborted) {
        return finish("aborted", bestEffort(partialText, toolRounds, "deadline"), "deadline");
      }

      enter("reasoning");
      let response: ChatResponse;
      try {
        response = await this.reason({ system, messages, tools }, signal);
      } catch (err) {
        const reason: AbortReason = signal.aborted ? "deadline" : "llm-failure";
        log.warn({ err, reason }, "Reasoning step failed");
        return finish("aborted", bestEffort(partialText, toolRounds, reason), reason);
      }

      if (response.kind === "text") {
        return finish("done", response.text);
      }

      if (response.text) partialText = response.text;
      if (toolRounds.length >= this.options.maxRounds) {
        log.warn({ maxRounds: this.options.maxRounds }, "Tool round limit reached");
        return finish("aborted", bestEffort(partialText, toolRounds, "max-rounds"), "max-rounds");
      }

      enter("tool-pending");
      const round = toolRounds.length + 1;
      messages.push({ role: "assistant", content: response.text, toolCalls: response.calls });

      enter("executing");
      const outcomes = await this.executor.executeRound(response.calls, toolContext);
      for (const outcome of outcomes) {
        const content = renderResult(outcome.result);
        messages.push({ role: "tool", toolCallId: outcome.call.id, name: outcome.call.name, content });
        transcript.push({ role: "tool", name: outcome.call.name, content, timestamp: this.now() });
      }
      toolRounds.push({ round, calls: response.calls, outcomes });
    }
  }

  private reason(
    request: { system: string; messages: readonly ChatMessage[]; tools: ReturnType<ToolRegistry["toolSchemas"]> },
    signal: AbortSignal,
  ): Promise<ChatResponse> {
    return retry(
      () => withTimeout(this.llm.chat(request, signal), this.options.llmTimeoutMs, "language model", signal),
      {
        maxAttempts: this.options.llmMaxAttempts,
        baseDelayMs: this.options.llmRetryBaseDelayMs ?? 500,
        signal,
      },
    );
  }
}

function summarize(assembled: AssembledContext): AgentOutcome["context"] {
  return {
    used: assembled.memory.used,
    budget: assembled.memory.budget,
    partial: assembled.partial,
    retrievalRequested: assembled.retrievalRequested,
  };
}

function bestEffort(partialText: string, rounds: readonly ToolRound[], reason: AbortReason): string {
  const actions = rounds
    .flatMap((r) => r.outcomes)
    .map((o) => `${o.call.name} (${o.result.success ? "ok" : `failed: ${o.result.error}`})`);

  const body =
    partialText ||
    (actions.length > 0 ? `Actions taken so far: ${actions.join(", ")}.` : "I could not finish this request.");
  return `${body}\n\n(Stopped early: ${STOP_NOTES[reason]}.)`;
}
