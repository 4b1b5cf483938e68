import { randomUUID } from "node:crypto";
import type { Logger } from "../logging/logger.js";
import {
  OUTCOMES,
  type ExperienceRecord,
  type ExperienceState,
  type Outcome,
  type OutcomeSignals,
  type Trend,
} from "./types.js";

export interface ExperienceEngineDeps {
  readonly logger?: Logger;
  readonly clock?: () => number;
  readonly ids?: () => string;
}

function emptyCounts(): Record<Outcome, number> {
  return { success: 0, failure: 0, friction: 0, joy: 0, neutral: 0 };
}

/**
 * Classifies a finished turn. Deterministic, rule order matters:
 * a failed responder always counts as failure.
 */
export function inferOutcome(signals: OutcomeSignals): Outcome {
  if (signals.responderFailed) return "failure";
  if (signals.hint) return signals.hint;
  if (signals.filterAction === "reject") return "friction";
  if (signals.sentiment >= 0.5) return "joy";
  if (signals.sentiment <= -0.5) return "friction";
  if (signals.sentiment >= 0.15) return "success";
  return "neutral";
}

/** Append-only log of turn outcomes. */
export class ExperienceEngine {
  private records: ExperienceRecord[] = [];
  private readonly logger?: Logger;
  private readonly clock: () => number;
  private readonly ids: () => string;

  constructor(deps: ExperienceEngineDeps = {}) {
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.ids = deps.ids ?? randomUUID;
  }

  record(
    interactionId: string,
    outcome: Outcome,
    evidence: string,
    tags: readonly string[] = [],
  ): ExperienceRecord {
    const record: ExperienceRecord = Object.freeze({
      id: this.ids(),
      interactionId,
      outcome,
      evidence,
      tags: Object.freeze([...tags]),
      timestamp: this.clock(),
    });
    this.records.push(record);
    this.logger?.debug({ interactionId, outcome }, "Experience recorded");
    return record;
  }

  /** Outcome frequencies over the last `window` records. */
  recentTrend(window: number): Trend {
    const recent = window > 0 ? this.records.slice(-window) : [];
    const counts = emptyCounts();
    for (const r of recent) counts[r.outcome]++;

    const frequencies = emptyCounts();
    let dominant: Outcome | null = null;
    for (const outcome of OUTCOMES) {
      frequencies[outcome] = recent.length > 0 ? counts[outcome] / recent.length : 0;
      if (counts[outcome] > 0 && (dominant === null || counts[outcome] > counts[dominant])) {
        dominant = outcome;
      }
    }

    return { window: recent.length, counts, frequencies, dominant };
  }

  get(id: string): ExperienceRecord | undefined {
    return this.records.find((r) => r.id === id);
  }

  all(): readonly ExperienceRecord[] {
    return Object.freeze([...this.records]);
  }

  get size(): number {
    return this.records.length;
  }

  exportState(): ExperienceState {
    return { records: [...this.records] };
  }

  importState(state: ExperienceState): void {
    this.records = state.records.map((r) => Object.freeze({ ...r, tags: Object.freeze([...r.tags]) }));
  }
}
