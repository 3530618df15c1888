import type { AgentOutcome } from "../agent/core.js";
import type { Logger } from "../logging/logger.js";
import type { ToolExecutor } from "../tools/executor.js";
import type { InboundTurn, OutboundSink } from "../transport/types.js";
import { TransientError } from "../utils/errors.js";
import type { ScheduledTask, TaskRunner } from "./types.js";

interface TaskRunnerDeps {
  sink: OutboundSink;
  executor: ToolExecutor;
  logger: Logger;
  agent?: { handle(turn: InboundTurn): Promise<AgentOutcome> };
}

/** Runs a task's action; throws when it could not be confirmed. */
export function createTaskRunner(deps: TaskRunnerDeps): TaskRunner {
  const logger = deps.logger.child({ component: "task-runner" });

  return async (task: ScheduledTask): Promise<void> => {
    const { payload } = task;
    const action = payload.action;
    const participantId = payload.userId ?? task.createdBy ?? "scheduler";

    switch (action.type) {
      case "message":
        await deps.sink.deliver(payload.channelId, action.text);
        return;

      case "prompt": {
        if (!deps.agent) throw new Error("Prompt tasks need an agent");
        const outcome = await deps.agent.handle({
          text: action.text,
          sessionId: `task:${task.id}`,
          channelId: payload.channelId,
          participantId,
          conversationKind: payload.conversationKind,
        });
        await deps.sink.deliver(payload.channelId, outcome.text);
        logger.debug({ taskId: task.id, status: outcome.status }, "Prompt task answered");
        return;
      }

      case "tool": {
        const outcome = await deps.executor.execute(
          { id: `task-${task.id}`, name: action.tool, arguments: action.args },
          {
            conversationId: `task:${task.id}`,
            channelId: payload.channelId,
            participantId,
            conversationKind: payload.conversationKind,
            logger,
          },
        );
        if (!outcome.result.success) {
          throw new TransientError(`Tool ${action.tool} failed: ${outcome.result.error}`);
        }
        return;
      }
    }
  };
}
