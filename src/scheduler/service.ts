import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../utils/errors.js";
import type { TaskStore } from "./store.js";
import type { TaskRunner, TickReport } from "./types.js";

interface SchedulerDeps {
  store: TaskStore;
  runner: TaskRunner;
  logger: Logger;
  tickIntervalMs: number;
  maxAttempts: number;
  now?: () => number;
}

/**
 * Background tick loop over the task ledger, independent of request
 * handling. Ticks never overlap.
 */
export class SchedulerService {
  private readonly store: TaskStore;
  private readonly runner: TaskRunner;
  private readonly logger: Logger;
  private readonly tickIntervalMs: number;
  private readonly maxAttempts: number;
  private readonly now: () => number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking: Promise<TickReport> | null = null;

  constructor(deps: SchedulerDeps) {
    this.store = deps.store;
    this.runner = deps.runner;
    this.logger = deps.logger.child({ component: "scheduler" });
    this.tickIntervalMs = deps.tickIntervalMs;
    this.maxAttempts = deps.maxAttempts;
    this.now = deps.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    const recovered = this.store.recoverInterrupted(this.now());
    if (recovered > 0) {
      this.logger.warn({ recovered }, "Settled firings interrupted by a previous shutdown");
    }

    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        this.logger.error({ err }, "Scheduler tick error");
      });
    }, this.tickIntervalMs);
    this.timer.unref();
    this.logger.info({ tickIntervalMs: this.tickIntervalMs }, "Scheduler started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.logger.info("Scheduler stopped");
  }

  /** Waits for an in-flight tick, if any. */
  async drain(): Promise<void> {
    await this.ticking;
  }

  tick(): Promise<TickReport> {
    if (!this.ticking) {
      this.ticking = this.runTick().finally(() => {
        this.ticking = null;
      });
    }
    return this.ticking;
  }

  private async runTick(): Promise<TickReport> {
    const report: TickReport = { fired: [], settled: [], failed: [] };

    for (const task of this.store.listDue(this.now())) {
      const instant = task.nextFireAt;
      if (instant === null) continue;

      if (!this.store.claim(task.id, instant, this.now())) {
        // Claimed earlier but never recorded: treat as fired.
        this.store.settleInterrupted(task, instant, this.now());
        report.settled.push(task.id);
        this.logger.warn({ taskId: task.id, instant }, "Skipped firing already claimed");
        continue;
      }

      try {
        await this.runner(task);
      } catch (err) {
        const updated = this.store.releaseClaim(task, instant, errorMessage(err), this.maxAttempts);
        report.failed.push(task.id);
        this.logger.warn(
          { err, taskId: task.id, attempts: updated.attempts, status: updated.status },
          "Scheduled task failed",
        );
        continue;
      }

      const recorded = this.store.recordFiring(task, instant, this.now());
      report.fired.push(task.id);
      this.logger.info(
        { taskId: task.id, kind: task.kind, nextFireAt: recorded.nextFireAt },
        "Scheduled task fired",
      );
    }

    return report;
  }
}
