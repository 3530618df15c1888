import { z } from "zod";
import { cronFromSchedule, validateCron } from "../../scheduler/cron.js";
import type { TaskStore } from "../../scheduler/store.js";
import type { ScheduledTask } from "../../scheduler/types.js";
import { errorMessage } from "../../utils/errors.js";
import { defineTool, fail, ok, type ToolDefinition } from "../types.js";

interface SchedulerToolOptions {
  readonly timezone?: string;
  readonly now?: () => number;
}

function describeTask(task: ScheduledTask): Record<string, unknown> {
  const action = task.payload.action;
  return {
    id: task.id,
    kind: task.kind,
    status: task.status,
    channel: task.payload.channelId,
    schedule: task.cron ?? (task.triggerAt !== null ? new Date(task.triggerAt).toISOString() : null),
    next: task.nextFireAt !== null ? new Date(task.nextFireAt).toISOString() : null,
    action: action.type === "tool" ? `tool ${action.tool}` : action.text,
  };
}

export function schedulerTools(tasks: TaskStore, opts: SchedulerToolOptions = {}): ToolDefinition[] {
  const now = opts.now ?? Date.now;

  const setReminder = defineTool({
    name: "set_reminder",
    description: "Remind someone about something after a number of minutes, or at a specific time.",
    parameters: z.object({
      message: z.string().min(1).describe("What to remind about"),
      minutes: z.number().int().min(1).optional().describe("Minutes from now"),
      at: z.string().datetime({ offset: true }).optional().describe("ISO 8601 time to fire at"),
      user_id: z.string().optional().describe("Who to remind; defaults to the requester"),
      channel_id: z.string().optional().describe("Where to deliver; defaults to this conversation"),
    }),
    async execute(args, ctx) {
      if (args.minutes === undefined && args.at === undefined) {
        return fail("Provide either minutes or at.");
      }
      const triggerAt = args.at !== undefined ? Date.parse(args.at) : now() + (args.minutes ?? 0) * 60_000;
      if (triggerAt <= now()) return fail("Reminder time must be in the future.");
      const userId = args.user_id ?? ctx.participantId;
      try {
        const task = tasks.create({
          kind: "reminder",
          triggerAt,
          createdBy: ctx.participantId,
          payload: {
            channelId: args.channel_id ?? ctx.channelId,
            userId,
            conversationKind: ctx.conversationKind,
            action: { type: "message", text: `Reminder for ${userId}: ${args.message}` },
          },
        });
        return ok({ id: task.id, fires_at: new Date(triggerAt).toISOString() });
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  });

  const scheduleRecurring = defineTool({
    name: "schedule_recurring_message",
    description:
      "Post a message on a recurring schedule, given as time and days (mon-fri, daily, weekends, mon,wed) or as a cron expression.",
    parameters: z.object({
      message: z.string().min(1),
      time: z.string().regex(/^\d{1,2}:\d{2}$/).default("09:00").describe("HH:MM, 24-hour"),
      days: z.string().default("mon-fri"),
      cron: z.string().optional().describe("Cron expression; overrides time and days"),
      channel_id: z.string().optional(),
      as_prompt: z.boolean().default(false).describe("Treat the message as a request to answer, not text to post"),
    }),
    async execute(args, ctx) {
      let cron: string;
      try {
        cron = args.cron ?? cronFromSchedule(args.time, args.days);
      } catch (err) {
        return fail(errorMessage(err));
      }
      const invalid = validateCron(cron, opts.timezone);
      if (invalid) return fail(`Invalid schedule "${cron}": ${invalid}`);

      try {
        const task = tasks.create({
          kind: "recurring-message",
          cron,
          ...(opts.timezone ? { timezone: opts.timezone } : {}),
          createdBy: ctx.participantId,
          payload: {
            channelId: args.channel_id ?? ctx.channelId,
            conversationKind: ctx.conversationKind,
            action: { type: args.as_prompt ? "prompt" : "message", text: args.message },
          },
        }, now());
        return ok({ id: task.id, cron, next: task.nextFireAt !== null ? new Date(task.nextFireAt).toISOString() : null });
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  });

  const listTasks = defineTool({
    name: "list_scheduled_tasks",
    idempotent: true,
    description: "List active reminders and recurring messages.",
    parameters: z.object({
      channel_id: z.string().optional().describe("Only tasks delivering to this channel"),
    }),
    async execute(args) {
      const active = tasks.list({
        status: "active",
        ...(args.channel_id ? { channelId: args.channel_id } : {}),
      });
      return ok(active.map(describeTask));
    },
  });

  const cancelTask = defineTool({
    name: "cancel_scheduled_task",
    description: "Cancel a reminder or recurring message by id.",
    parameters: z.object({
      task_id: z.string().min(1),
    }),
    async execute(args) {
      try {
        return tasks.cancel(args.task_id)
          ? ok(`Cancelled ${args.task_id}.`)
          : fail(`No active task with id ${args.task_id}.`);
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  });

  return [setReminder, scheduleRecurring, listTasks, cancelTask];
}
