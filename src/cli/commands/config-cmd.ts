import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { isNotFound, loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { PonderConfig } from "../../config/types.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [["Show config", "ponder config show"]],
  });

  configFile = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let config: PonderConfig;
    try {
      config = loadConfig(this.configFile);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "ponder config validate"],
      ["Validate specific file", "ponder config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfigText(content);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}
