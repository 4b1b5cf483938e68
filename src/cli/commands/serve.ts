import { Command, Option } from "clipanion";
import { startPonder } from "../../gateway/lifecycle.js";
import { printBanner } from "../banner.js";
import { packageVersion } from "../version.js";

export class ServeCommand extends Command {
  static override paths = [["serve"]];

  static override usage = Command.Usage({
    description: "Run idle ticks in the background and serve the snapshot API",
    examples: [
      ["Start with default config", "ponder serve"],
      ["Start with custom config", "ponder serve --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  stateDir = Option.String("--state-dir", { description: "State directory", required: false });

  async execute(): Promise<void> {
    printBanner(packageVersion(), this.context.stdout);

    const ctx = await startPonder({ configPath: this.config, stateDir: this.stateDir, server: true });
    const signal = await new Promise<NodeJS.Signals>((resolve) => {
      process.once("SIGTERM", () => resolve("SIGTERM"));
      process.once("SIGINT", () => resolve("SIGINT"));
    });
    ctx.logger.info({ signal }, "Signal received");
    await ctx.shutdown();
  }
}
