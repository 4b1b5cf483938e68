import pino from "pino";
import { parseConfig } from "../../src/config/schema.js";
import type { ContextPayload } from "../../src/cognition/types.js";
import type { PonderConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { MemoryItem } from "../../src/memory/types.js";

/** Real pino logger that writes nothing. Spy on it where logs matter. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeConfig(overrides: Record<string, unknown> = {}): PonderConfig {
  return parseConfig(overrides);
}

/** Deterministic ids: id-1, id-2, ... */
export function counterIds(prefix = "id"): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

/** Clock that only moves when told to. */
export function manualClock(start = 1_700_000_000_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

export function makeItem(overrides: Partial<MemoryItem> & { id: string }): MemoryItem {
  return {
    timestamp: 1_000,
    speaker: "user",
    text: `text for ${overrides.id}`,
    tags: [],
    importance: 0.5,
    ...overrides,
  };
}

export function makePayload(overrides: Partial<ContextPayload> = {}): ContextPayload {
  return {
    input: "hello there",
    recent: [],
    recalled: [],
    selfState: { mood: "neutral", valence: 0, energy: 0.8, confidence: 0.5 },
    dominantDrive: null,
    drives: {},
    intents: [],
    valueFlags: { aligned: true, violated: [], note: "aligned" },
    traits: [],
    goals: [],
    associations: [],
    lastDream: null,
    ...overrides,
  };
}
