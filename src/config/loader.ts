import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { PonderConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/** Parses raw config file text: env substitution, JSON, schema validation. */
export function parseConfigText(content: string): PonderConfig {
  const substituted = substituteEnv(content);
  const raw = JSON.parse(substituted) as unknown;
  return parseConfig(raw);
}

export function loadConfig(path?: string): PonderConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
