import { readFileSync } from "node:fs";
import { Command, Option } from "clipanion";
import { loadConfig, resolveConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { errorMessage } from "../../utils/errors.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (API key redacted)",
    examples: [["Show config", "cairn config show"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const redacted = {
      ...config,
      llm: { ...config.llm, apiKey: config.llm.apiKey ? "***REDACTED***" : undefined },
    };
    this.context.stdout.write(JSON.stringify(redacted, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "cairn config validate"],
      ["Validate specific file", "cairn config validate ./cairn.config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      const config = resolveConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      if (!config.llm.apiKey) {
        this.context.stdout.write("  warning: no API key configured\n");
      }
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
