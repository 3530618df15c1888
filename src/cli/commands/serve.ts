import { Command, Option } from "clipanion";
import { createEngine } from "../../engine/lifecycle.js";
import { ConsoleSink } from "../../transport/console.js";
import { JsonlHistorySource } from "../../transport/jsonl-history.js";

export class ServeCommand extends Command {
  static override paths = [["serve"]];

  static override usage = Command.Usage({
    description: "Run the scheduler and the history indexer until interrupted",
    examples: [
      ["Run the scheduler", "cairn serve"],
      ["Also index an exported history", "cairn serve --history ./export.jsonl"],
    ],
  });

  history = Option.String("--history", { description: "JSON Lines message export to index", required: false });
  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const engine = await createEngine({
      ...(this.config ? { configPath: this.config } : {}),
      ...(this.history ? { history: new JsonlHistorySource(this.history) } : {}),
      sink: new ConsoleSink(this.context.stdout),
    });

    engine.start();
    if (engine.indexing) await engine.indexing.runCycle();

    await new Promise<void>((resolve) => {
      process.once("SIGINT", () => resolve());
      process.once("SIGTERM", () => resolve());
    });
    await engine.stop();
  }
}
