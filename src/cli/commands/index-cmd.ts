import { Command, Option } from "clipanion";
import { createEngine } from "../../engine/lifecycle.js";
import { ConsoleSink } from "../../transport/console.js";
import { JsonlHistorySource } from "../../transport/jsonl-history.js";

export class IndexCommand extends Command {
  static override paths = [["index"]];

  static override usage = Command.Usage({
    description: "Index a JSON Lines message export for history search",
    details: 'Each line holds one message: {"id", "channel", "text", "author", "timestamp"}.',
    examples: [
      ["Index every channel in an export", "cairn index ./export.jsonl"],
      ["Index one channel", "cairn index ./export.jsonl --channel general"],
    ],
  });

  file = Option.String({ name: "file", required: true });
  channel = Option.String("--channel", { description: "Only this channel", required: false });
  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const source = new JsonlHistorySource(this.file);
    const engine = await createEngine({
      ...(this.config ? { configPath: this.config } : {}),
      history: source,
      sink: new ConsoleSink(this.context.stdout),
    });

    try {
      if (!engine.retrieval || !engine.indexing) {
        this.context.stdout.write("Retrieval is disabled in config (rag.enabled).\n");
        process.exitCode = 1;
        return;
      }

      const reports = this.channel
        ? [
            await engine.retrieval.index(
              this.channel,
              await source.fetchHistory(this.channel, engine.config.rag.messagesPerChannel),
            ),
          ]
        : (await engine.indexing.runCycle()).reports;

      for (const r of reports) {
        this.context.stdout.write(
          `${r.channel}: ${r.indexed} indexed, ${r.unchanged} unchanged, ${r.skipped} skipped, ${r.evicted} evicted\n`,
        );
      }
    } finally {
      await engine.stop();
    }
  }
}
