import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

type Env = Readonly<Record<string, string | undefined>>;

const VAULT_FILE = "vault.db";

/** Where the vault lives: `PONDER_STATE_DIR`, else `~/.ponder`. */
export function getStateDir(env: Env = process.env): string {
  return env["PONDER_STATE_DIR"] || join(homedir(), ".ponder");
}

/** `PONDER_CONFIG_PATH`, else `ponder.config.json` in the working directory. */
export function getConfigPath(env: Env = process.env): string {
  return env["PONDER_CONFIG_PATH"] || "ponder.config.json";
}

export function getVaultPath(stateDir: string): string {
  return join(stateDir, VAULT_FILE);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
