import { randomUUID } from "node:crypto";
import type { DreamConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { normalizeTags, type LongTermEntry } from "../memory/types.js";
import { clampSigned, clampUnit } from "../utils/math.js";
import { pick, type RandomSource } from "../utils/random.js";
import { withTimeout } from "../utils/timeout.js";
import { DREAM_THEMES, templateNarrative } from "./synthesis.js";
import type {
  DreamEntry,
  DreamOutcome,
  DreamPhase,
  DreamRequest,
  DreamSynthesizer,
  DreamTheme,
  DreamTrigger,
} from "./types.js";

export const DREAM_TAG = "dream";

export interface DreamModuleDeps {
  readonly config: DreamConfig;
  /** Dream entries never enter LTM below this importance. */
  readonly promotionThreshold: number;
  readonly random: RandomSource;
  readonly logger?: Logger;
  readonly clock?: () => number;
  readonly ids?: () => string;
  readonly synthesizer?: DreamSynthesizer;
  readonly themes?: readonly DreamTheme[];
}

/**
 * Weighted draw without replacement. Weight is importance scaled by
 * overlap with the focus tags; an all-zero pool falls back to uniform.
 */
export function sampleEntries(
  entries: readonly LongTermEntry[],
  count: number,
  focus: readonly string[],
  random: RandomSource,
): LongTermEntry[] {
  const focusSet = new Set(focus);
  const pool = entries.map((entry) => ({
    entry,
    weight: entry.importance * (1 + entry.tags.filter((t) => focusSet.has(t)).length),
  }));

  const picked: LongTermEntry[] = [];
  while (picked.length < count && pool.length > 0) {
    const total = pool.reduce((sum, p) => sum + p.weight, 0);
    let index: number;
    if (total <= 0) {
      index = Math.min(pool.length - 1, Math.floor(random.next() * pool.length));
    } else {
      let r = random.next() * total;
      index = pool.findIndex((p) => (r -= p.weight) < 0);
      if (index === -1) index = pool.length - 1;
    }
    const [chosen] = pool.splice(index, 1);
    if (chosen) picked.push(chosen.entry);
  }
  return picked;
}

/**
 * Idle → Dreaming → Integrating → Idle. The module only produces a
 * candidate entry; the caller integrates it and then calls complete().
 * An abort before integration discards the candidate.
 */
export class DreamModule {
  private currentPhase: DreamPhase = "idle";
  private controller: AbortController | null = null;
  private readonly clock: () => number;
  private readonly ids: () => string;
  private readonly themes: readonly DreamTheme[];

  constructor(private readonly deps: DreamModuleDeps) {
    this.clock = deps.clock ?? Date.now;
    this.ids = deps.ids ?? randomUUID;
    this.themes = deps.themes ?? DREAM_THEMES;
  }

  get phase(): DreamPhase {
    return this.currentPhase;
  }

  shouldDream(trigger: DreamTrigger): boolean {
    if (trigger.forced) return true;
    if (!trigger.intentRaised) return false;
    return (
      trigger.energy < this.deps.config.lowEnergyThreshold ||
      trigger.idleMs >= this.deps.config.idleDurationMs
    );
  }

  async dream(entries: readonly LongTermEntry[], focus: readonly string[]): Promise<DreamOutcome> {
    if (this.currentPhase !== "idle") {
      throw new Error(`Dream already in progress (phase: ${this.currentPhase})`);
    }

    const { sampleSize } = this.deps.config;
    if (entries.length < sampleSize) {
      this.deps.logger?.info(
        { available: entries.length, needed: sampleSize },
        "Not enough long-term memories to dream",
      );
      return { status: "skipped", reason: "insufficient_memories", available: entries.length };
    }

    const controller = new AbortController();
    this.controller = controller;
    this.currentPhase = "dreaming";
    try {
      const sources = sampleEntries(entries, sampleSize, focus, this.deps.random);
      const theme = pick(this.themes, this.deps.random) ?? { name: "drifting", valence: 0 };
      const request: DreamRequest = { theme, sources, focus };
      const text = await this.narrate(request, controller.signal);

      if (controller.signal.aborted) {
        this.deps.logger?.info({ theme: theme.name }, "Dream aborted before integration");
        this.currentPhase = "idle";
        return { status: "aborted" };
      }

      this.currentPhase = "integrating";
      return { status: "ready", entry: this.buildEntry(request, text), sources };
    } catch (err) {
      this.currentPhase = "idle";
      throw err;
    } finally {
      this.controller = null;
    }
  }

  /** Marks integration done. */
  complete(): void {
    this.currentPhase = "idle";
  }

  /** Cancels an in-flight dream; a no-op once integration has begun. */
  abort(): boolean {
    if (this.currentPhase !== "dreaming" || !this.controller) return false;
    this.controller.abort();
    return true;
  }

  private async narrate(request: DreamRequest, signal: AbortSignal): Promise<string> {
    const { synthesizer, logger } = this.deps;
    if (!synthesizer) return templateNarrative(request);
    try {
      return await withTimeout(
        (sig) => synthesizer.synthesize(request, sig),
        this.deps.config.synthTimeoutMs,
        "dream synthesizer",
        signal,
      );
    } catch (err) {
      if (!signal.aborted) logger?.warn({ err }, "Dream synthesizer failed, using template");
      return templateNarrative(request);
    }
  }

  private buildEntry(request: DreamRequest, text: string): DreamEntry {
    const { sources, theme } = request;
    const meanValence = sources.reduce((sum, s) => sum + (s.valence ?? 0), 0) / sources.length;
    const meanImportance = sources.reduce((sum, s) => sum + s.importance, 0) / sources.length;

    const entry: DreamEntry = {
      id: this.ids(),
      timestamp: this.clock(),
      speaker: "agent",
      text,
      tags: Object.freeze(normalizeTags([...sources.flatMap((s) => s.tags), DREAM_TAG])),
      importance: clampUnit(Math.max(this.deps.promotionThreshold, meanImportance)),
      valence: clampSigned((meanValence + theme.valence) / 2),
      theme: theme.name,
      provenance: Object.freeze(sources.map((s) => s.id)),
    };
    return Object.freeze(entry);
  }
}
