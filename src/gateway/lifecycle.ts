import { packageVersion } from "../cli/version.js";
import { CognitiveEngine } from "../cognition/engine.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { PonderConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { LexiconAnalyzer } from "../nlp/lexicon.js";
import { RuleResponder } from "../responder/rules.js";
import type { Responder } from "../responder/types.js";
import { IdleScheduler } from "../scheduler/idle.js";
import { VaultDB } from "../vault/db.js";
import { StateVault } from "../vault/store.js";
import { SnapshotServer } from "./snapshot-server.js";

export interface StartOptions {
  readonly configPath?: string;
  readonly stateDir?: string;
  /** Overrides config.server.enabled. */
  readonly server?: boolean;
  /** Overrides config.idle.enabled. */
  readonly idle?: boolean;
  /** Keep stdout free for an interactive session. */
  readonly logToStderr?: boolean;
  readonly responder?: (config: PonderConfig) => Responder;
}

export interface PonderContext {
  readonly config: PonderConfig;
  readonly logger: Logger;
  readonly engine: CognitiveEngine;
  readonly vault: StateVault;
  readonly scheduler: IdleScheduler | null;
  readonly server: SnapshotServer | null;
  /** Writes the engine state and journals to the vault. */
  persist(): Promise<void>;
  shutdown(): Promise<void>;
}

export async function startPonder(opts: StartOptions = {}): Promise<PonderContext> {
  // 1. Config + logging
  const config = loadConfig(opts.configPath);
  const logger = createLogger(config.logging, { stderr: opts.logToStderr });
  logger.info("Starting ponder...");

  // 2. Vault
  const stateDir = ensureDir(opts.stateDir ?? getStateDir());
  const vaultDb = new VaultDB(stateDir);
  const vault = new StateVault(vaultDb);

  // 3. Engine, restored from the last saved state
  const engine = new CognitiveEngine({
    config,
    logger: logger.child({ component: "engine" }),
    analyzer: new LexiconAnalyzer(),
    responder: opts.responder?.(config) ?? new RuleResponder(config.responder.fallbackText),
  });
  const saved = vault.loadState();
  if (saved !== null) {
    await engine.importState(saved);
  }

  const persist = async (): Promise<void> => {
    vault.saveState(await engine.exportState());
  };

  // 4. Idle scheduler
  let scheduler: IdleScheduler | null = null;
  if (opts.idle ?? config.idle.enabled) {
    scheduler = new IdleScheduler(
      engine,
      { schedule: config.idle.schedule, afterTick: persist },
      logger.child({ component: "scheduler" }),
    );
    scheduler.start();
  }

  // 5. Snapshot API
  let server: SnapshotServer | null = null;
  if (opts.server ?? config.server.enabled) {
    server = new SnapshotServer(engine, config.server.port, config.server.hostname, packageVersion());
    await server.start();
    logger.info({ port: config.server.port, hostname: config.server.hostname }, "Snapshot API listening");
  }

  let stopped = false;
  const shutdown = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;
    logger.info("Shutting down...");
    scheduler?.stop();
    await server?.stop();
    engine.abortDream();
    try {
      await persist();
    } catch (err) {
      logger.error({ err }, "Failed to persist state on shutdown");
    }
    vaultDb.close();
    logger.info("Shutdown complete");
  };

  logger.info({ stateDir }, "Ponder started");
  return { config, logger, engine, vault, scheduler, server, persist, shutdown };
}
