import type { TraitsConfig } from "../config/types.js";
import type { ExperienceRecord, Trend } from "../experience/types.js";
import type { Logger } from "../logging/logger.js";
import { clamp } from "../utils/math.js";
import type { Trait, TraitChange, TraitState } from "./types.js";

export interface TrendAlertOptions {
  readonly frictionAlertThreshold: number;
}

/**
 * Bounded personality weights. Every shift is clamped twice: the delta
 * to ±maxDelta, the resulting weight to the trait's [min, max].
 */
/** Record ids remembered for the apply-once check; older ids are never replayed. */
const PROCESSED_WINDOW = 1_000;

export class TraitEngine {
  private readonly traits = new Map<string, Trait>();
  private processed = new Set<string>();

  constructor(
    private readonly config: TraitsConfig,
    private readonly logger?: Logger,
  ) {
    for (const def of config.definitions) {
      if (this.traits.has(def.name)) throw new Error(`Duplicate trait: ${def.name}`);
      this.traits.set(def.name, Object.freeze({ ...def, weight: clamp(def.weight, def.min, def.max) }));
    }
  }

  /**
   * Shifts a trait by a bounded delta. Unknown traits are created at the
   * lower bound. `bounds` narrows the trait's own range for this call.
   */
  reinforce(name: string, delta: number, bounds?: readonly [number, number]): TraitChange {
    const trait = this.traits.get(name) ?? this.create(name, bounds);
    const step = clamp(delta, -this.config.maxDelta, this.config.maxDelta);
    const lo = bounds ? Math.max(trait.min, bounds[0]) : trait.min;
    const hi = bounds ? Math.min(trait.max, bounds[1]) : trait.max;
    const weight = clamp(trait.weight + step, lo, Math.max(lo, hi));

    this.traits.set(name, Object.freeze({ ...trait, weight }));
    return { name, from: trait.weight, to: weight };
  }

  /**
   * Applies the outcome's delta vector and any tag deltas, once per
   * record id. A replayed record changes nothing.
   */
  applyExperience(record: ExperienceRecord): TraitChange[] {
    if (this.processed.has(record.id)) {
      this.logger?.debug({ recordId: record.id }, "Experience already applied, skipping");
      return [];
    }
    this.processed.add(record.id);
    if (this.processed.size > PROCESSED_WINDOW) {
      const [oldest] = this.processed;
      if (oldest !== undefined) this.processed.delete(oldest);
    }

    const deltas = new Map<string, number>();
    const add = (vector: Readonly<Record<string, number>>): void => {
      for (const [name, delta] of Object.entries(vector)) {
        deltas.set(name, (deltas.get(name) ?? 0) + delta);
      }
    };
    add(this.config.outcomeDeltas[record.outcome]);
    for (const tag of record.tags) {
      const vector = this.config.tagDeltas[tag];
      if (vector) add(vector);
    }

    const changes: TraitChange[] = [];
    for (const [name, delta] of deltas) {
      if (delta !== 0) changes.push(this.reinforce(name, delta));
    }
    return changes;
  }

  /** Raises caution when friction dominates the recent window. */
  applyTrend(trend: Trend, opts: TrendAlertOptions): TraitChange | null {
    if (trend.window === 0 || trend.frequencies.friction < opts.frictionAlertThreshold) return null;
    this.logger?.info(
      { friction: trend.frequencies.friction, window: trend.window },
      "Friction trend alert",
    );
    return this.reinforce("caution", this.config.frictionAlertDelta);
  }

  /** Top k by weight, ties by name. */
  topTraits(k: number): Trait[] {
    return [...this.traits.values()]
      .sort((a, b) => b.weight - a.weight || a.name.localeCompare(b.name))
      .slice(0, Math.max(0, k));
  }

  get(name: string): Trait | undefined {
    return this.traits.get(name);
  }

  hasProcessed(recordId: string): boolean {
    return this.processed.has(recordId);
  }

  describeIdentity(k = 3): string {
    const top = this.topTraits(k).map((t) => t.name);
    if (top.length === 0) return "I haven't settled into any traits yet.";
    return `I believe I am: ${top.join(", ")}.`;
  }

  exportState(): TraitState {
    return {
      traits: [...this.traits.values()].sort((a, b) => a.name.localeCompare(b.name)),
      processed: [...this.processed],
    };
  }

  importState(state: TraitState): void {
    this.traits.clear();
    for (const trait of state.traits) {
      this.traits.set(trait.name, Object.freeze({ ...trait, weight: clamp(trait.weight, trait.min, trait.max) }));
    }
    this.processed = new Set(state.processed.slice(-PROCESSED_WINDOW));
  }

  private create(name: string, bounds?: readonly [number, number]): Trait {
    const [min, max] = bounds ?? [0, 1];
    const trait = Object.freeze({ name, weight: min, min, max });
    this.logger?.debug({ name }, "Trait created on first reinforcement");
    return trait;
  }
}
