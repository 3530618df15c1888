import { readFile } from "node:fs/promises";
import { Command, Option } from "clipanion";
import * as t from "typanion";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getMemoryDir, getStateDir } from "../../config/paths.js";
import { createLogger } from "../../logging/logger.js";
import { LongTermMemory } from "../../memory/long-term.js";
import { ProfileStore } from "../../memory/profile.js";
import { LONG_TERM_CATEGORIES, PROFILE_DOCUMENTS, type ProfileDocument } from "../../memory/types.js";

function memoryDir(configPath?: string): string {
  const config = loadConfig(configPath);
  return ensureDir(config.memory.dir ?? getMemoryDir(getStateDir()));
}

export class MemoryShowCommand extends Command {
  static override paths = [["memory", "show"]];

  static override usage = Command.Usage({
    description: "Print a memory document",
    examples: [
      ["Show long-term memory", "cairn memory show"],
      ["Show the user profile", "cairn memory show --document user"],
    ],
  });

  document = Option.String("--document,-d", "memory", {
    description: "memory, user, soul or tools",
    validator: t.isEnum<"memory" | ProfileDocument>(["memory", ...PROFILE_DOCUMENTS]),
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const dir = memoryDir(this.config);
    const logger = createLogger({ level: "warn" });
    const path =
      this.document === "memory"
        ? new LongTermMemory(dir, logger).path
        : new ProfileStore(dir, logger).pathOf(this.document);

    try {
      this.context.stdout.write(await readFile(path, "utf-8"));
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Nothing stored yet: ${path}\n`);
        return;
      }
      throw err;
    }
  }
}

export class MemoryRememberCommand extends Command {
  static override paths = [["memory", "remember"]];

  static override usage = Command.Usage({
    description: "Add an entry to long-term memory",
    examples: [["Remember a decision", "cairn memory remember Decisions Ship the beta on Friday"]],
  });

  category = Option.String({ name: "category", required: true, validator: t.isEnum(LONG_TERM_CATEGORIES) });
  text = Option.Rest({ required: 1 });
  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    const memory = new LongTermMemory(memoryDir(this.config), createLogger({ level: "warn" }));
    const entry = await memory.append(this.category, this.text.join(" "));
    this.context.stdout.write(`Saved to ${entry.key}: ${entry.text}\n`);
  }
}
