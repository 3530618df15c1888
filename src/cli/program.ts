import { Cli } from "clipanion";
import { AskCommand } from "./commands/ask.js";
import { ChatCommand } from "./commands/chat.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { IndexCommand } from "./commands/index-cmd.js";
import { MemoryRememberCommand, MemoryShowCommand } from "./commands/memory-cmd.js";
import { ServeCommand } from "./commands/serve.js";
import { TasksCancelCommand, TasksListCommand } from "./commands/tasks-cmd.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Cairn",
    binaryName: "cairn",
    binaryVersion: "0.1.0",
  });

  cli.register(AskCommand);
  cli.register(ChatCommand);
  cli.register(ServeCommand);
  cli.register(IndexCommand);

  // Scheduled tasks
  cli.register(TasksListCommand);
  cli.register(TasksCancelCommand);

  // Memory documents
  cli.register(MemoryShowCommand);
  cli.register(MemoryRememberCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
