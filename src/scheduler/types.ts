import { z } from "zod";

export type TaskKind = "reminder" | "recurring-message";
export type TaskStatus = "active" | "completed" | "cancelled" | "failed";

export const taskActionSchema = z.discriminatedUnion("type", [
  /** Deliver the text as is. */
  z.object({ type: z.literal("message"), text: z.string().min(1) }),
  /** Run the text through the agent and deliver its answer. */
  z.object({ type: z.literal("prompt"), text: z.string().min(1) }),
  /** Invoke a registered tool directly. */
  z.object({
    type: z.literal("tool"),
    tool: z.string().min(1),
    args: z.record(z.unknown()).default({}),
  }),
]);

export const taskPayloadSchema = z.object({
  channelId: z.string().min(1),
  userId: z.string().optional(),
  conversationKind: z.enum(["direct", "multi-party"]).default("direct"),
  action: taskActionSchema,
});

export type TaskAction = z.infer<typeof taskActionSchema>;
export type TaskPayload = z.infer<typeof taskPayloadSchema>;

export interface ScheduledTask {
  readonly id: string;
  readonly kind: TaskKind;
  /** One-shot trigger, ms since epoch; reminders only. */
  readonly triggerAt: number | null;
  readonly cron: string | null;
  readonly timezone: string | null;
  readonly payload: TaskPayload;
  readonly status: TaskStatus;
  readonly nextFireAt: number | null;
  readonly lastFiredAt: number | null;
  readonly attempts: number;
  readonly lastError: string | null;
  readonly createdBy: string | null;
  readonly createdAt: number;
}

export type CreateTaskParams =
  | {
      kind: "reminder";
      triggerAt: number;
      payload: TaskPayload;
      createdBy?: string;
    }
  | {
      kind: "recurring-message";
      cron: string;
      timezone?: string;
      payload: TaskPayload;
      createdBy?: string;
    };

export type TaskRunner = (task: ScheduledTask) => Promise<void>;

export interface TickReport {
  readonly fired: string[];
  /** Tasks whose instant had already been claimed; settled without running. */
  readonly settled: string[];
  readonly failed: string[];
}
