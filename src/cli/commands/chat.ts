import { createInterface } from "node:readline/promises";
import { Command, Option } from "clipanion";
import { createEngine } from "../../engine/lifecycle.js";
import { ConsoleSink } from "../../transport/console.js";
import { formatOutcome } from "./ask.js";

export class ChatCommand extends Command {
  static override paths = [["chat"]];

  static override usage = Command.Usage({
    description: "Interactive conversation; reminders are delivered to this terminal",
    examples: [["Start chatting", "cairn chat"]],
  });

  session = Option.String("--session", "cli", { description: "Conversation id" });
  user = Option.String("--user", "local-user", { description: "Participant id" });
  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const engine = await createEngine({
      ...(this.config ? { configPath: this.config } : {}),
      sink: new ConsoleSink(this.context.stdout),
    });
    engine.start();

    const rl = createInterface({ input: this.context.stdin, output: this.context.stdout });
    this.context.stdout.write("Type a message, or /quit to leave.\n");

    try {
      for await (const line of rl) {
        const text = line.trim();
        if (!text) continue;
        if (text === "/quit" || text === "/exit") break;
        if (text === "/reset") {
          engine.memory.clearConversation(this.session);
          this.context.stdout.write("Conversation cleared.\n");
          continue;
        }

        const outcome = await engine.agent.handle({
          text,
          sessionId: this.session,
          channelId: this.session,
          participantId: this.user,
          conversationKind: "direct",
        });
        this.context.stdout.write(formatOutcome(outcome));
      }
    } finally {
      rl.close();
      await engine.stop();
    }
  }
}
