import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { createTaskRunner } from "../../src/scheduler/actions.js";
import type { ScheduledTask, TaskAction } from "../../src/scheduler/types.js";
import type { AgentOutcome } from "../../src/agent/core.js";
import type { InboundTurn } from "../../src/transport/types.js";
import { ToolRegistry } from "../../src/tools/registry.js";
import { ToolExecutor } from "../../src/tools/executor.js";
import { defineTool, fail, ok } from "../../src/tools/types.js";
import { TransientError } from "../../src/utils/errors.js";
import { RecordingSink } from "../helpers/fakes.js";
import { silentLogger } from "../helpers/logger.js";

function task(action: TaskAction): ScheduledTask {
  return {
    id: "t1",
    kind: "reminder",
    triggerAt: 1,
    cron: null,
    timezone: null,
    payload: { channelId: "general", userId: "u1", conversationKind: "direct", action },
    status: "active",
    nextFireAt: 1,
    lastFiredAt: null,
    attempts: 0,
    lastError: null,
    createdBy: "u2",
    createdAt: 0,
  };
}

describe("createTaskRunner", () => {
  let sink: RecordingSink;
  let executor: ToolExecutor;
  let pings: Array<Record<string, unknown>>;

  beforeEach(() => {
    sink = new RecordingSink();
    pings = [];
    const registry = new ToolRegistry();
    registry.register(
      defineTool({
        name: "ping",
        description: "Ping a host.",
        parameters: z.object({ host: z.string() }),
        async execute(args) {
          pings.push(args);
          return args.host === "down" ? fail("host unreachable") : ok("pong");
        },
      }),
    );
    executor = new ToolExecutor({ registry, logger: silentLogger(), timeoutMs: 1000, maxAttempts: 1 });
  });

  it("delivers message actions as is", async () => {
    const run = createTaskRunner({ sink, executor, logger: silentLogger() });
    await run(task({ type: "message", text: "Stand-up in 5" }));
    expect(sink.delivered).toEqual([{ channelId: "general", text: "Stand-up in 5" }]);
  });

  it("propagates delivery failures", async () => {
    const run = createTaskRunner({ sink, executor, logger: silentLogger() });
    sink.failNext = 1;
    await expect(run(task({ type: "message", text: "hi" }))).rejects.toThrow("delivery failed");
  });

  it("answers prompt actions through the agent", async () => {
    const seen: InboundTurn[] = [];
    const agent = {
      async handle(turn: InboundTurn): Promise<AgentOutcome> {
        seen.push(turn);
        return {
          status: "done",
          text: "Here is your summary.",
          rounds: 0,
          toolRounds: [],
          transcript: [],
          states: ["assembling", "reasoning", "done"],
          context: { used: 0, budget: 100, partial: false, retrievalRequested: true },
        };
      },
    };
    const run = createTaskRunner({ sink, executor, logger: silentLogger(), agent });
    await run(task({ type: "prompt", text: "summarize the week" }));

    expect(seen).toEqual([
      {
        text: "summarize the week",
        sessionId: "task:t1",
        channelId: "general",
        participantId: "u1",
        conversationKind: "direct",
      },
    ]);
    expect(sink.delivered).toEqual([{ channelId: "general", text: "Here is your summary." }]);
  });

  it("refuses prompt actions without an agent", async () => {
    const run = createTaskRunner({ sink, executor, logger: silentLogger() });
    await expect(run(task({ type: "prompt", text: "hello" }))).rejects.toThrow("Prompt tasks need an agent");
  });

  it("invokes tool actions and turns failures into retryable errors", async () => {
    const run = createTaskRunner({ sink, executor, logger: silentLogger() });
    await run(task({ type: "tool", tool: "ping", args: { host: "example" } }));
    expect(pings).toEqual([{ host: "example" }]);

    const failure = run(task({ type: "tool", tool: "ping", args: { host: "down" } }));
    await expect(failure).rejects.toBeInstanceOf(TransientError);
    await expect(failure).rejects.toThrow("Tool ping failed: host unreachable");
  });
});
