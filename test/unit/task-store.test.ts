import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { StorageDB } from "../../src/storage/db.js";
import { TaskStore } from "../../src/scheduler/store.js";
import type { TaskPayload } from "../../src/scheduler/types.js";

const payload: TaskPayload = {
  channelId: "general",
  userId: "u1",
  conversationKind: "direct",
  action: { type: "message", text: "Stand-up in 5" },
};

describe("TaskStore", () => {
  let storage: StorageDB;
  let store: TaskStore;
  const created = Date.UTC(2026, 0, 5, 8, 0);

  beforeEach(() => {
    storage = new StorageDB(":memory:");
    store = new TaskStore(storage);
  });

  afterEach(() => {
    storage.close();
  });

  it("creates a reminder due at its trigger time", () => {
    const task = store.create({ kind: "reminder", triggerAt: created + 60_000, payload, createdBy: "u1" }, created);
    expect(task.status).toBe("active");
    expect(task.nextFireAt).toBe(created + 60_000);
    expect(task.payload).toEqual(payload);
    expect(store.get(task.id)).toEqual(task);
  });

  it("creates a recurring task due at the next cron instant", () => {
    const task = store.create({ kind: "recurring-message", cron: "0 9 * * *", timezone: "UTC", payload }, created);
    expect(task.nextFireAt).toBe(Date.UTC(2026, 0, 5, 9, 0));
    expect(task.timezone).toBe("UTC");
    expect(task.triggerAt).toBeNull();
  });

  it("rejects malformed payloads", () => {
    expect(() =>
      store.create(
        { kind: "reminder", triggerAt: created, payload: { ...payload, channelId: "" } },
        created,
      ),
    ).toThrow();
  });

  it("lists due tasks in firing order", () => {
    const later = store.create({ kind: "reminder", triggerAt: created + 120_000, payload }, created);
    const sooner = store.create({ kind: "reminder", triggerAt: created + 60_000, payload }, created);
    store.create({ kind: "reminder", triggerAt: created + 600_000, payload }, created);
    expect(store.listDue(created + 300_000).map((t) => t.id)).toEqual([sooner.id, later.id]);
  });

  it("fails a stored task whose payload no longer validates and keeps listing the rest", () => {
    const good = store.create({ kind: "reminder", triggerAt: created + 120_000, payload }, created);
    storage
      .raw()
      .prepare(
        `INSERT INTO scheduled_tasks (id, kind, trigger_at, payload, status, next_fire_at, attempts, created_at)
         VALUES ('broken', 'reminder', ?, ?, 'active', ?, 0, ?)`,
      )
      .run(created + 60_000, JSON.stringify({ channelId: "general" }), created + 60_000, created);

    expect(store.listDue(created + 300_000).map((t) => t.id)).toEqual([good.id]);
    const row = storage
      .raw()
      .prepare<[string], { status: string; next_fire_at: number | null; last_error: string | null }>(
        "SELECT status, next_fire_at, last_error FROM scheduled_tasks WHERE id = ?",
      )
      .get("broken");
    expect(row).toEqual({ status: "failed", next_fire_at: null, last_error: "Invalid payload: action: Required" });
    expect(store.get("broken")).toBeUndefined();
  });

  it("fails a stored task whose payload is not JSON", () => {
    storage
      .raw()
      .prepare(
        `INSERT INTO scheduled_tasks (id, kind, trigger_at, payload, status, next_fire_at, attempts, created_at)
         VALUES ('garbled', 'reminder', ?, '{oops', 'active', ?, 0, ?)`,
      )
      .run(created + 60_000, created + 60_000, created);

    expect(store.list()).toEqual([]);
    expect(store.list({ status: "failed" })).toEqual([]);
    const row = storage
      .raw()
      .prepare<[string], { status: string }>("SELECT status FROM scheduled_tasks WHERE id = ?")
      .get("garbled");
    expect(row).toEqual({ status: "failed" });
  });

  it("filters lists by status and channel", () => {
    const a = store.create({ kind: "reminder", triggerAt: created + 1, payload }, created);
    store.create({ kind: "reminder", triggerAt: created + 2, payload: { ...payload, channelId: "random" } }, created);
    store.cancel(a.id);
    expect(store.list({ status: "active" }).map((t) => t.payload.channelId)).toEqual(["random"]);
    expect(store.list({ channelId: "general" }).map((t) => t.status)).toEqual(["cancelled"]);
    expect(store.list()).toHaveLength(2);
  });

  it("cancels only active tasks", () => {
    const task = store.create({ kind: "reminder", triggerAt: created + 1, payload }, created);
    expect(store.cancel(task.id)).toBe(true);
    expect(store.cancel(task.id)).toBe(false);
    expect(store.cancel("missing")).toBe(false);
    expect(store.get(task.id)?.nextFireAt).toBeNull();
  });

  it("grants a claim on an instant only once", () => {
    const task = store.create({ kind: "reminder", triggerAt: created + 1, payload }, created);
    expect(store.claim(task.id, created + 1, created + 5)).toBe(true);
    expect(store.claim(task.id, created + 1, created + 6)).toBe(false);
    expect(store.firing(task.id, created + 1)?.status).toBe("claimed");
  });

  it("completes a reminder once its firing is recorded", () => {
    const task = store.create({ kind: "reminder", triggerAt: created + 1, payload }, created);
    store.claim(task.id, created + 1);
    const done = store.recordFiring(task, created + 1, created + 10);
    expect(done.status).toBe("completed");
    expect(done.nextFireAt).toBeNull();
    expect(done.lastFiredAt).toBe(created + 10);
    expect(store.firing(task.id, created + 1)?.status).toBe("delivered");
  });

  it("advances a recurring task past the recorded instant", () => {
    const task = store.create({ kind: "recurring-message", cron: "0 9 * * *", timezone: "UTC", payload }, created);
    const instant = Date.UTC(2026, 0, 5, 9, 0);
    // three days late: fire once, then move to the next instant after now
    const recorded = store.recordFiring(task, instant, Date.UTC(2026, 0, 8, 10, 0));
    expect(recorded.status).toBe("active");
    expect(recorded.nextFireAt).toBe(Date.UTC(2026, 0, 9, 9, 0));
  });

  it("releases a failed claim and fails the task after max attempts", () => {
    const task = store.create({ kind: "reminder", triggerAt: created + 1, payload }, created);
    store.claim(task.id, created + 1);
    const once = store.releaseClaim(task, created + 1, "sink down", 2);
    expect(once.status).toBe("active");
    expect(once.attempts).toBe(1);
    expect(once.lastError).toBe("sink down");
    expect(store.firing(task.id, created + 1)).toBeUndefined();

    store.claim(task.id, created + 1);
    const twice = store.releaseClaim(once, created + 1, "sink still down", 2);
    expect(twice.status).toBe("failed");
    expect(store.listDue(created + 100)).toEqual([]);
  });

  it("settles open claims left by a previous process without re-running them", () => {
    const task = store.create({ kind: "reminder", triggerAt: created + 1, payload }, created);
    store.claim(task.id, created + 1);
    expect(store.recoverInterrupted(created + 50)).toBe(1);
    expect(store.firing(task.id, created + 1)?.status).toBe("interrupted");
    const settled = store.get(task.id);
    expect(settled?.status).toBe("completed");
    expect(settled?.lastFiredAt).toBeNull();
    expect(settled?.lastError).toBe("interrupted before the firing was recorded");
    expect(store.recoverInterrupted(created + 60)).toBe(0);
  });

  it("keeps a task cancelled while it was running", () => {
    const task = store.create({ kind: "recurring-message", cron: "0 9 * * *", timezone: "UTC", payload }, created);
    const instant = Date.UTC(2026, 0, 5, 9, 0);
    store.claim(task.id, instant);
    store.cancel(task.id);
    const recorded = store.recordFiring(task, instant, instant + 1000);
    expect(recorded.status).toBe("cancelled");
    expect(recorded.nextFireAt).toBeNull();
  });
});
