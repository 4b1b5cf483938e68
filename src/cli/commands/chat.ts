import { Command, Option } from "clipanion";
import { createInterface } from "node:readline/promises";
import { startPonder } from "../../gateway/lifecycle.js";
import { RuleResponder } from "../../responder/rules.js";
import { TracingResponder } from "../../responder/tracing.js";
import { printBanner } from "../banner.js";
import { packageVersion } from "../version.js";

const EXIT_WORDS = new Set(["exit", "quit", "bye"]);

export class ChatCommand extends Command {
  static override paths = [["chat"], Command.Default];

  static override usage = Command.Usage({
    description: "Talk to the engine in an interactive session",
    examples: [
      ["Start chatting", "ponder"],
      ["Show the context each reply is built from", "ponder chat --trace"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  stateDir = Option.String("--state-dir", { description: "State directory", required: false });
  trace = Option.Boolean("--trace", false, { description: "Print the rendered context for each turn" });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    printBanner(packageVersion(), out);

    const ctx = await startPonder({
      configPath: this.config,
      stateDir: this.stateDir,
      logToStderr: true,
      responder: (config) => {
        const rules = new RuleResponder(config.responder.fallbackText);
        return this.trace ? new TracingResponder(rules, out) : rules;
      },
    });
    ctx.engine.bus.on("thought", (e) => out.write(`  (thinking) ${e.text}\n`));
    ctx.engine.bus.on("dream", (e) => out.write(`  (dreamt of ${e.entry.theme})\n`));

    const rl = createInterface({ input: this.context.stdin, output: out, terminal: false });
    try {
      out.write("Type 'exit' to leave.\n");
      for await (const line of rl) {
        const text = line.trim();
        if (text.length === 0) continue;
        if (EXIT_WORDS.has(text.toLowerCase())) break;

        const result = await ctx.engine.handleTurn(text);
        out.write(`ponder> ${result.reply}\n`);
        await ctx.persist();
      }
    } finally {
      rl.close();
      await ctx.shutdown();
    }
  }
}
