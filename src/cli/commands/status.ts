import { Command, Option } from "clipanion";
import { parseEngineState } from "../../cognition/state.js";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getConfigPath, getStateDir } from "../../config/paths.js";
import type { PonderConfig } from "../../config/types.js";
import { describeSelfState } from "../../self-state/state.js";
import { VaultDB } from "../../vault/db.js";
import { StateVault } from "../../vault/store.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration and the saved cognitive state",
    examples: [["Show status", "ponder status"]],
  });

  configFile = Option.String("--config,-c", { description: "Path to config file", required: false });
  stateDir = Option.String("--state-dir", { description: "State directory", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();
    const stateDir = this.stateDir ?? getStateDir();

    let config: PonderConfig;
    try {
      config = loadConfig(configPath);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(`  Error: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const out = this.context.stdout;
    out.write(`Ponder Status\n`);
    out.write(`-------------\n`);
    out.write(`Config path: ${configPath}\n`);
    out.write(`State dir:   ${stateDir}\n`);
    out.write(`Idle ticks:  ${config.idle.enabled ? config.idle.schedule : "disabled"}\n`);
    out.write(
      `Snapshot API: ${config.server.enabled ? `${config.server.hostname}:${config.server.port}` : "disabled"}\n`,
    );

    const vaultDb = new VaultDB(ensureDir(stateDir));
    try {
      const vault = new StateVault(vaultDb);
      const saved = vault.loadState();
      if (saved === null) {
        out.write(`State:       (none saved yet)\n`);
        return;
      }

      const parsed = parseEngineState(saved);
      out.write(`State:       ${parsed.turns} turns, ${parsed.ticks} idle ticks\n`);
      out.write(`Self:        ${describeSelfState(parsed.selfState)}\n`);
      out.write(`Memories:    ${parsed.stm.items.length} short-term, ${parsed.ltm.entries.filter((e) => !e.retired).length} long-term\n`);
      out.write(`Dreams:      ${vault.countDreams()}\n`);
    } finally {
      vaultDb.close();
    }
  }
}
