import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseConfig } from "../../src/config/schema.js";
import { ToolAuditLog } from "../../src/tools/audit.js";
import { createEngine, type EngineContext } from "../../src/engine/lifecycle.js";
import type { InboundTurn } from "../../src/transport/types.js";
import { FakeEmbedder, RecordingSink, ScriptedLlm } from "../helpers/fakes.js";
import { silentLogger } from "../helpers/logger.js";

const turn: InboundTurn = {
  text: "remind me to stretch in 10 minutes",
  sessionId: "s1",
  channelId: "general",
  participantId: "u1",
  conversationKind: "direct",
};

describe("Integration: engine", () => {
  let dir: string;
  let sink: RecordingSink;
  let embedder: FakeEmbedder;
  let engine: EngineContext;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), "cairn-engine-"));
    sink = new RecordingSink();
    embedder = new FakeEmbedder();
    const llm = new ScriptedLlm((request, call) =>
      call === 0
        ? {
            kind: "tool_calls",
            calls: [{ id: "r1", name: "set_reminder", arguments: { message: "stretch", minutes: 10 } }],
            text: "",
          }
        : { kind: "text", text: `Done: ${request.messages.at(-1)?.content ?? ""}` },
    );
    engine = await createEngine({
      config: parseConfig({ memory: { dir: join(dir, "memory") }, llm: { apiKey: "test-secret" } }),
      stateDir: dir,
      databasePath: ":memory:",
      logger: silentLogger(),
      llm,
      embedder,
      sink,
    });
  });

  afterEach(async () => {
    await engine.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  it("registers memory, scheduler and history tools", () => {
    expect(engine.registry.list().map((t) => t.name)).toEqual(
      expect.arrayContaining(["remember", "set_reminder", "schedule_recurring_message", "search_history"]),
    );
  });

  it("turns a request into a scheduled reminder that fires once", async () => {
    const outcome = await engine.agent.handle(turn);
    expect(outcome.status).toBe("done");
    expect(outcome.rounds).toBe(1);

    const [task] = engine.tasks.list({ status: "active" });
    expect(task?.payload.action).toEqual({ type: "message", text: "Reminder for u1: stretch" });
    expect(new ToolAuditLog(engine.storage).recent().map((e) => [e.tool, e.success])).toEqual([["set_reminder", true]]);

    // Nothing is due yet.
    expect((await engine.scheduler.tick()).fired).toEqual([]);
    expect(sink.delivered).toEqual([]);
  });

  it("fires a due reminder through the sink", async () => {
    const task = engine.tasks.create({
      kind: "reminder",
      triggerAt: Date.now() - 1000,
      payload: {
        channelId: "general",
        conversationKind: "direct",
        action: { type: "message", text: "stand-up now" },
      },
    });

    expect((await engine.scheduler.tick()).fired).toEqual([task.id]);
    expect((await engine.scheduler.tick()).fired).toEqual([]);
    expect(sink.delivered).toEqual([{ channelId: "general", text: "stand-up now" }]);
    expect(engine.tasks.get(task.id)?.status).toBe("completed");
  });

  it("writes the profile documents on start", () => {
    expect(existsSync(engine.memory.profile.pathOf("soul"))).toBe(true);
  });
});
