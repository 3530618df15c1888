import { Command, Option } from "clipanion";
import type { AgentOutcome } from "../../agent/core.js";
import { createEngine } from "../../engine/lifecycle.js";
import { ConsoleSink } from "../../transport/console.js";
import type { InboundTurn } from "../../transport/types.js";

export function formatOutcome(outcome: AgentOutcome): string {
  const status =
    outcome.status === "done"
      ? `[done, ${outcome.rounds} tool round(s)]`
      : `[aborted: ${outcome.reason ?? "unknown"}, ${outcome.rounds} tool round(s)]`;
  return `${outcome.text}\n${status}\n`;
}

export class AskCommand extends Command {
  static override paths = [["ask"]];

  static override usage = Command.Usage({
    description: "Send one message to the assistant and print the answer",
    examples: [
      ["Ask a question", "cairn ask what did we decide about pricing"],
      ["Ask as a group conversation", "cairn ask --group --channel team summarize this week"],
    ],
  });

  text = Option.Rest({ required: 1 });
  session = Option.String("--session", "cli", { description: "Conversation id" });
  channel = Option.String("--channel", "cli", { description: "Channel id" });
  user = Option.String("--user", "local-user", { description: "Participant id" });
  group = Option.Boolean("--group", false, { description: "Treat the conversation as multi-party" });
  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const engine = await createEngine({
      ...(this.config ? { configPath: this.config } : {}),
      sink: new ConsoleSink(this.context.stdout),
    });

    const turn: InboundTurn = {
      text: this.text.join(" "),
      sessionId: this.session,
      channelId: this.channel,
      participantId: this.user,
      conversationKind: this.group ? "multi-party" : "direct",
    };

    try {
      const outcome = await engine.agent.handle(turn);
      this.context.stdout.write(formatOutcome(outcome));
      if (outcome.status === "aborted") process.exitCode = 2;
    } finally {
      await engine.stop();
    }
  }
}
