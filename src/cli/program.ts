import { Cli } from "clipanion";
import { ChatCommand } from "./commands/chat.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { DreamsListCommand } from "./commands/dreams.js";
import { ServeCommand } from "./commands/serve.js";
import { StatusCommand } from "./commands/status.js";
import { packageVersion } from "./version.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Ponder",
    binaryName: "ponder",
    binaryVersion: packageVersion(),
  });

  cli.register(ChatCommand);
  cli.register(ServeCommand);

  // Status
  cli.register(StatusCommand);

  // Dream journal
  cli.register(DreamsListCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
