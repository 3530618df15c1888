import { Command, Option } from "clipanion";
import { ensureDir, getDatabasePath, getStateDir } from "../../config/paths.js";
import { TaskStore } from "../../scheduler/store.js";
import { StorageDB } from "../../storage/db.js";

function openTasks(): { db: StorageDB; tasks: TaskStore } {
  const db = new StorageDB(getDatabasePath(ensureDir(getStateDir())));
  return { db, tasks: new TaskStore(db) };
}

function iso(ts: number | null): string {
  return ts === null ? "-" : new Date(ts).toISOString();
}

export class TasksListCommand extends Command {
  static override paths = [["tasks", "list"]];

  static override usage = Command.Usage({
    description: "List scheduled reminders and recurring messages",
    examples: [
      ["List active tasks", "cairn tasks list"],
      ["Include finished tasks", "cairn tasks list --all"],
    ],
  });

  all = Option.Boolean("--all", false, { description: "Include completed, cancelled and failed tasks" });

  async execute(): Promise<void> {
    const { db, tasks } = openTasks();
    try {
      const list = this.all ? tasks.list() : tasks.list({ status: "active" });
      if (list.length === 0) {
        this.context.stdout.write("No scheduled tasks.\n");
        return;
      }

      this.context.stdout.write(`Scheduled tasks (${list.length}):\n`);
      for (const task of list) {
        const action = task.payload.action;
        const what = action.type === "tool" ? `tool ${action.tool}` : action.text;
        this.context.stdout.write(
          `  ${task.id}  [${task.status}] ${task.kind}\n` +
            `    schedule: ${task.cron ?? iso(task.triggerAt)}\n` +
            `    next:     ${iso(task.nextFireAt)}\n` +
            `    channel:  ${task.payload.channelId}\n` +
            `    ${action.type}: ${what}\n`,
        );
      }
    } finally {
      db.close();
    }
  }
}

export class TasksCancelCommand extends Command {
  static override paths = [["tasks", "cancel"]];

  static override usage = Command.Usage({
    description: "Cancel a scheduled task",
    examples: [["Cancel a task", "cairn tasks cancel 3f2b..."]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<void> {
    const { db, tasks } = openTasks();
    try {
      if (tasks.cancel(this.id)) {
        this.context.stdout.write(`Cancelled task: ${this.id}\n`);
      } else {
        this.context.stdout.write(`No active task with id: ${this.id}\n`);
        process.exitCode = 1;
      }
    } finally {
      db.close();
    }
  }
}
