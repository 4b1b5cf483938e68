import { Command, Option } from "clipanion";
import { ensureDir, getStateDir } from "../../config/paths.js";
import { VaultDB } from "../../vault/db.js";
import { StateVault } from "../../vault/store.js";

export class DreamsListCommand extends Command {
  static override paths = [["dreams", "list"]];

  static override usage = Command.Usage({
    description: "List recent dreams from the journal",
    examples: [
      ["List the last 10 dreams", "ponder dreams list"],
      ["List the last 3 dreams", "ponder dreams list --limit 3"],
    ],
  });

  limit = Option.String("--limit,-n", "10", { description: "How many dreams to show" });
  stateDir = Option.String("--state-dir", { description: "State directory", required: false });

  async execute(): Promise<void> {
    const limit = Number.parseInt(this.limit, 10);
    if (!Number.isInteger(limit) || limit < 1) {
      this.context.stdout.write(`Invalid limit: ${this.limit}\n`);
      process.exitCode = 1;
      return;
    }

    const vaultDb = new VaultDB(ensureDir(this.stateDir ?? getStateDir()));
    try {
      const dreams = new StateVault(vaultDb).recentDreams(limit);
      if (dreams.length === 0) {
        this.context.stdout.write("No dreams yet.\n");
        return;
      }
      for (const dream of dreams) {
        const when = new Date(dream.timestamp).toISOString();
        this.context.stdout.write(`${when}  [${dream.theme}]  valence ${dream.valence.toFixed(2)}\n`);
        this.context.stdout.write(`  ${dream.text}\n`);
      }
    } finally {
      vaultDb.close();
    }
  }
}
