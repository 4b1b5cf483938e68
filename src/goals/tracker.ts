import { randomUUID } from "node:crypto";
import type { GoalsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { Goal, GoalState, GoalStatus } from "./types.js";

export interface GoalTrackerDeps {
  readonly config: GoalsConfig;
  readonly logger?: Logger;
  readonly clock?: () => number;
  readonly ids?: () => string;
}

const WORD_SPLIT = /[^\p{L}\p{N}']+/u;

function words(text: string): string[] {
  return text.toLowerCase().split(WORD_SPLIT).filter((w) => w.length > 0);
}

function contentWords(description: string): string[] {
  return [...new Set(words(description).filter((w) => w.length >= 4))];
}

/**
 * Long-running intentions.
 *
 * State machine:
 *   active → fulfilled | abandoned
 *   fulfilled (terminal)
 *   abandoned (terminal)
 */
export class GoalTracker {
  private goals: Goal[] = [];
  private readonly clock: () => number;
  private readonly ids: () => string;

  constructor(private readonly deps: GoalTrackerDeps) {
    this.clock = deps.clock ?? Date.now;
    this.ids = deps.ids ?? randomUUID;
  }

  /**
   * Adds an active goal. Past `maxActive`, the oldest active goal is
   * abandoned to make room.
   */
  add(description: string, motivation = "unspecified"): Goal {
    const text = description.trim();
    if (text.length === 0) throw new Error("Goal description must not be empty");

    const now = this.clock();
    const goal: Goal = Object.freeze({
      id: this.ids(),
      description: text,
      motivation,
      status: "active",
      createdAt: now,
      updatedAt: now,
    });
    this.goals.push(goal);
    this.deps.logger?.debug({ goalId: goal.id, description: text }, "Goal added");

    const active = this.active();
    const overflow = active.length - this.deps.config.maxActive;
    for (const stale of active.slice(0, Math.max(0, overflow))) {
      this.transition(stale.id, "abandoned");
    }
    return goal;
  }

  fulfill(id: string): Goal | null {
    return this.transition(id, "fulfilled");
  }

  abandon(id: string): Goal | null {
    return this.transition(id, "abandoned");
  }

  /**
   * Fulfils every active goal the input names, when it also carries a
   * completion cue. Returns the goals that changed.
   */
  progress(input: string): Goal[] {
    const tokens = words(input);
    const joined = ` ${tokens.join(" ")} `;
    const cue = this.deps.config.completionCues.find((c) => {
      const phrase = words(c);
      return phrase.length > 0 && joined.includes(` ${phrase.join(" ")} `);
    });
    if (!cue) return [];

    const present = new Set(tokens);
    const fulfilled: Goal[] = [];
    for (const goal of this.active()) {
      const keys = contentWords(goal.description);
      if (keys.length === 0) continue;
      const hits = keys.filter((k) => present.has(k)).length;
      if (hits / keys.length < this.deps.config.progressOverlap) continue;
      const next = this.fulfill(goal.id);
      if (next) {
        this.deps.logger?.info({ goalId: goal.id, cue }, "Goal fulfilled");
        fulfilled.push(next);
      }
    }
    return fulfilled;
  }

  get(id: string): Goal | undefined {
    return this.goals.find((g) => g.id === id);
  }

  /** Active goals, oldest first. */
  active(): Goal[] {
    return this.goals.filter((g) => g.status === "active");
  }

  all(): readonly Goal[] {
    return Object.freeze([...this.goals]);
  }

  /** Content words of the active goals, used to focus dreams. */
  keywords(): string[] {
    const keys = new Set<string>();
    for (const goal of this.active()) {
      for (const word of contentWords(goal.description)) keys.add(word);
    }
    return [...keys];
  }

  summary(): string {
    const active = this.active();
    if (active.length === 0) return "I have no active long-term goals right now.";
    const lines = active.map(
      (g) => `- ${g.description} (since ${new Date(g.createdAt).toISOString().slice(0, 10)})`,
    );
    return ["My current long-term goals:", ...lines].join("\n");
  }

  exportState(): GoalState {
    return { goals: [...this.goals] };
  }

  importState(state: GoalState): void {
    this.goals = state.goals.map((g) => Object.freeze({ ...g }));
  }

  private transition(id: string, status: GoalStatus): Goal | null {
    const index = this.goals.findIndex((g) => g.id === id);
    const goal = this.goals[index];
    if (!goal) return null;
    if (goal.status !== "active") {
      this.deps.logger?.warn({ goalId: id, from: goal.status, to: status }, "Invalid goal status transition");
      return null;
    }

    const next: Goal = Object.freeze({ ...goal, status, updatedAt: this.clock() });
    this.goals[index] = next;
    return next;
  }
}
