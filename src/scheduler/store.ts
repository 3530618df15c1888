import { randomUUID } from "node:crypto";
import type Database from "better-sqlite3";
import type { StorageDB } from "../storage/db.js";
import { PersistenceError, errorMessage } from "../utils/errors.js";
import { nextCronFire } from "./cron.js";
import {
  taskPayloadSchema,
  type CreateTaskParams,
  type TaskPayload,
  type ScheduledTask,
  type TaskKind,
  type TaskStatus,
} from "./types.js";

interface TaskRow {
  id: string;
  kind: TaskKind;
  trigger_at: number | null;
  cron: string | null;
  timezone: string | null;
  payload: string;
  status: TaskStatus;
  next_fire_at: number | null;
  last_fired_at: number | null;
  attempts: number;
  last_error: string | null;
  created_by: string | null;
  created_at: number;
}

interface FiringRow {
  task_id: string;
  trigger_instant: number;
  status: "claimed" | "delivered" | "interrupted";
}

/**
 * Durable task ledger. A firing is claimed in `task_firings` before the task
 * runs and settled only after it ran, so one trigger instant is never
 * delivered twice.
 */
export class TaskStore {
  private readonly db: Database.Database;

  constructor(storage: StorageDB) {
    this.db = storage.raw();
  }

  private persist<T>(target: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new PersistenceError(target, err);
    }
  }

  // A row whose payload no longer validates is failed in place so it cannot block the rest.
  private decode(rows: TaskRow[]): ScheduledTask[] {
    const tasks: ScheduledTask[] = [];
    for (const row of rows) {
      const payload = decodePayload(row.payload);
      if (payload.ok) {
        tasks.push(toTask(row, payload.value));
        continue;
      }
      this.persist(`task ${row.id}`, () =>
        this.db
          .prepare("UPDATE scheduled_tasks SET status = 'failed', next_fire_at = NULL, last_error = ? WHERE id = ?")
          .run(`Invalid payload: ${payload.error}`, row.id),
      );
    }
    return tasks;
  }

  create(params: CreateTaskParams, now = Date.now()): ScheduledTask {
    const id = randomUUID();
    const payload = taskPayloadSchema.parse(params.payload);
    const cron = params.kind === "recurring-message" ? params.cron : null;
    const timezone = params.kind === "recurring-message" ? (params.timezone ?? null) : null;
    const triggerAt = params.kind === "reminder" ? params.triggerAt : null;
    const nextFireAt = cron !== null ? nextCronFire(cron, now, timezone) : triggerAt;
    if (nextFireAt === null) {
      throw new Error(`Schedule "${cron ?? ""}" never fires`);
    }

    this.persist(`task ${id}`, () =>
      this.db
        .prepare(
          `INSERT INTO scheduled_tasks
           (id, kind, trigger_at, cron, timezone, payload, status, next_fire_at, attempts, created_by, created_at)
           VALUES (?, ?, ?, ?, ?, ?, 'active', ?, 0, ?, ?)`,
        )
        .run(id, params.kind, triggerAt, cron, timezone, JSON.stringify(payload), nextFireAt, params.createdBy ?? null, now),
    );

    const task = this.get(id);
    if (!task) throw new PersistenceError(`task ${id}`);
    return task;
  }

  get(id: string): ScheduledTask | undefined {
    const row = this.db.prepare<[string], TaskRow>("SELECT * FROM scheduled_tasks WHERE id = ?").get(id);
    return row ? this.decode([row])[0] : undefined;
  }

  list(opts?: { status?: TaskStatus; channelId?: string }): ScheduledTask[] {
    const rows = opts?.status
      ? this.db
          .prepare<[string], TaskRow>("SELECT * FROM scheduled_tasks WHERE status = ? ORDER BY next_fire_at ASC")
          .all(opts.status)
      : this.db.prepare<[], TaskRow>("SELECT * FROM scheduled_tasks ORDER BY created_at ASC").all();
    const tasks = this.decode(rows);
    return opts?.channelId ? tasks.filter((t) => t.payload.channelId === opts.channelId) : tasks;
  }

  listDue(now: number, limit = 50): ScheduledTask[] {
    const rows = this.db
      .prepare<[number, number], TaskRow>(
        `SELECT * FROM scheduled_tasks
         WHERE status = 'active' AND next_fire_at IS NOT NULL AND next_fire_at <= ?
         ORDER BY next_fire_at ASC LIMIT ?`,
      )
      .all(now, limit);
    return this.decode(rows);
  }

  cancel(id: string): boolean {
    const result = this.persist(`task ${id}`, () =>
      this.db
        .prepare("UPDATE scheduled_tasks SET status = 'cancelled', next_fire_at = NULL WHERE id = ? AND status = 'active'")
        .run(id),
    );
    return result.changes > 0;
  }

  /** True when this caller now owns the firing of `instant`. */
  claim(taskId: string, instant: number, now = Date.now()): boolean {
    const result = this.persist(`firing ${taskId}@${instant}`, () =>
      this.db
        .prepare(
          `INSERT OR IGNORE INTO task_firings (task_id, trigger_instant, status, claimed_at)
           VALUES (?, ?, 'claimed', ?)`,
        )
        .run(taskId, instant, now),
    );
    return result.changes === 1;
  }

  firing(taskId: string, instant: number): FiringRow | undefined {
    return this.db
      .prepare<[string, number], FiringRow>(
        "SELECT task_id, trigger_instant, status FROM task_firings WHERE task_id = ? AND trigger_instant = ?",
      )
      .get(taskId, instant);
  }

  /** Marks the firing delivered and moves the task past `instant`. */
  recordFiring(task: ScheduledTask, instant: number, now = Date.now()): ScheduledTask {
    this.settle(task, instant, now, "delivered", null);
    return this.get(task.id) ?? task;
  }

  /**
   * Drops a claim whose run failed so a later tick can try again. After
   * `maxAttempts` failures the task is marked failed.
   */
  releaseClaim(task: ScheduledTask, instant: number, error: string, maxAttempts: number): ScheduledTask {
    this.persist(`firing ${task.id}@${instant}`, () =>
      this.db.transaction(() => {
        this.db
          .prepare("DELETE FROM task_firings WHERE task_id = ? AND trigger_instant = ? AND status = 'claimed'")
          .run(task.id, instant);
        const attempts = task.attempts + 1;
        const status: TaskStatus = attempts >= maxAttempts ? "failed" : "active";
        this.db
          .prepare("UPDATE scheduled_tasks SET attempts = ?, last_error = ?, status = ? WHERE id = ?")
          .run(attempts, error, status, task.id);
      })(),
    );
    return this.get(task.id) ?? task;
  }

  /**
   * Settles a firing whose claim outlived its run (process exit, or a failed
   * record). The task advances without running again.
   */
  settleInterrupted(task: ScheduledTask, instant: number, now = Date.now()): ScheduledTask {
    this.settle(task, instant, now, "interrupted", "interrupted before the firing was recorded");
    return this.get(task.id) ?? task;
  }

  /** Settles every claim left open by a previous process. */
  recoverInterrupted(now = Date.now()): number {
    const open = this.db
      .prepare<[], FiringRow>("SELECT task_id, trigger_instant, status FROM task_firings WHERE status = 'claimed'")
      .all();
    let recovered = 0;
    for (const firing of open) {
      const task = this.get(firing.task_id);
      if (!task) continue;
      this.settleInterrupted(task, firing.trigger_instant, now);
      recovered++;
    }
    return recovered;
  }

  private settle(
    task: ScheduledTask,
    instant: number,
    now: number,
    firingStatus: "delivered" | "interrupted",
    lastError: string | null,
  ): void {
    const current = this.get(task.id) ?? task;
    const next =
      task.kind === "recurring-message" && task.cron !== null
        ? nextCronFire(task.cron, Math.max(now, instant), task.timezone)
        : null;
    const status: TaskStatus = current.status === "active" && next === null ? "completed" : current.status;

    this.persist(`firing ${task.id}@${instant}`, () =>
      this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT INTO task_firings (task_id, trigger_instant, status, claimed_at, settled_at)
             VALUES (?, ?, ?, ?, ?)
             ON CONFLICT(task_id, trigger_instant) DO UPDATE SET status = excluded.status, settled_at = excluded.settled_at`,
          )
          .run(task.id, instant, firingStatus, now, now);
        this.db
          .prepare(
            `UPDATE scheduled_tasks
             SET last_fired_at = ?, next_fire_at = ?, status = ?, attempts = 0, last_error = ?
             WHERE id = ?`,
          )
          .run(firingStatus === "delivered" ? now : current.lastFiredAt, current.status === "active" ? next : null, status, lastError, task.id);
      })(),
    );
  }
}

type Decoded = { ok: true; value: TaskPayload } | { ok: false; error: string };

function decodePayload(raw: string): Decoded {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
  const result = taskPayloadSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    return { ok: false, error: issue ? `${issue.path.join(".") || "payload"}: ${issue.message}` : "unknown" };
  }
  return { ok: true, value: result.data };
}

function toTask(row: TaskRow, payload: TaskPayload): ScheduledTask {
  return {
    id: row.id,
    kind: row.kind,
    triggerAt: row.trigger_at,
    cron: row.cron,
    timezone: row.timezone,
    payload,
    status: row.status,
    nextFireAt: row.next_fire_at,
    lastFiredAt: row.last_fired_at,
    attempts: row.attempts,
    lastError: row.last_error,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}
