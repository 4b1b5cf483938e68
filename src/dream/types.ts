import type { LongTermEntry, MemoryItem } from "../memory/types.js";

export type DreamPhase = "idle" | "dreaming" | "integrating";

export interface DreamTheme {
  readonly name: string;
  /** Emotional colour the theme lends a dream, in [-1, 1]. */
  readonly valence: number;
}

/** A synthesised memory. Provenance lists the LTM entries it came from. */
export interface DreamEntry extends MemoryItem {
  readonly speaker: "agent";
  readonly theme: string;
  readonly valence: number;
  readonly provenance: readonly string[];
}

export interface DreamRequest {
  readonly theme: DreamTheme;
  readonly sources: readonly LongTermEntry[];
  readonly focus: readonly string[];
}

/** Optional external narrative generator. */
export interface DreamSynthesizer {
  synthesize(request: DreamRequest, signal: AbortSignal): Promise<string>;
}

export interface DreamTrigger {
  readonly forced: boolean;
  readonly intentRaised: boolean;
  readonly energy: number;
  /** Time since the last conversational turn. */
  readonly idleMs: number;
}

export type DreamOutcome =
  | { readonly status: "ready"; readonly entry: DreamEntry; readonly sources: readonly LongTermEntry[] }
  | { readonly status: "skipped"; readonly reason: "insufficient_memories"; readonly available: number }
  | { readonly status: "aborted" };
