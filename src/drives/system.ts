import type { DrivesConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { clampUnit } from "../utils/math.js";
import type { Drive, DriveContext, DriveState, DriveTarget, Intent } from "./types.js";

/**
 * Default targets for the built-in drives. Curiosity chases novelty,
 * boredom builds while idle, connection is met by warm turns, safety
 * reacts to hostility and value conflicts. Dreams quench curiosity and
 * boredom and leave the others alone.
 */
export const DEFAULT_TARGETS: Readonly<Record<string, DriveTarget>> = {
  curiosity: (ctx) => {
    if (ctx.dreamed) return 0;
    return (ctx.novelTags ?? 0) > 0 ? 1 : 0.2;
  },
  boredom: (ctx) => {
    if (ctx.dreamed) return 0;
    if (ctx.idle) return 1;
    return (ctx.novelTags ?? 0) > 0 ? 0 : 0.5;
  },
  connection: (ctx) => {
    if (ctx.dreamed) return undefined;
    if (ctx.idle) return 1;
    return (ctx.sentiment ?? 0) >= 0.15 ? 0 : 0.3;
  },
  safety: (ctx) => {
    if (ctx.dreamed) return undefined;
    const threatened = (ctx.valueViolations ?? 0) > 0 || (ctx.sentiment ?? 0) <= -0.5;
    return threatened ? 1 : 0;
  },
};

export class DriveSystem {
  private readonly drives = new Map<string, Drive>();
  private readonly priority: readonly string[];
  private readonly targets: Readonly<Record<string, DriveTarget>>;

  constructor(
    config: DrivesConfig,
    private readonly logger?: Logger,
    targets: Readonly<Record<string, DriveTarget>> = DEFAULT_TARGETS,
  ) {
    for (const def of config.definitions) {
      if (this.drives.has(def.name)) throw new Error(`Duplicate drive: ${def.name}`);
      this.drives.set(def.name, Object.freeze({ ...def, level: clampUnit(def.level) }));
    }
    this.priority = config.priority;
    this.targets = targets;
  }

  /** Moves every drive toward its target at its rise or decay rate. */
  tick(context: DriveContext): Intent[] {
    for (const drive of this.drives.values()) {
      const target = this.targets[drive.name]?.(context, drive.level);
      if (target === undefined) continue;

      const goal = clampUnit(target);
      const rate = goal > drive.level ? drive.riseRate : drive.decayRate;
      const level = clampUnit(drive.level + rate * (goal - drive.level));
      this.drives.set(drive.name, Object.freeze({ ...drive, level }));
    }

    const intents = this.intents();
    if (intents.length > 0) {
      this.logger?.debug({ intents, idle: context.idle }, "Drive intents raised");
    }
    return intents;
  }

  /** Highest level wins; ties go to the earlier name in the priority list. */
  dominant(): Drive | null {
    let best: Drive | null = null;
    for (const drive of this.ordered()) {
      if (!best || drive.level > best.level) best = drive;
    }
    return best;
  }

  /** Intents of drives at or above their threshold, in priority order. */
  intents(): Intent[] {
    const intents: Intent[] = [];
    for (const drive of this.ordered()) {
      if (drive.intent && drive.threshold !== undefined && drive.level >= drive.threshold) {
        if (!intents.includes(drive.intent)) intents.push(drive.intent);
      }
    }
    return intents;
  }

  hasIntent(intent: Intent): boolean {
    return this.intents().includes(intent);
  }

  get(name: string): Drive | undefined {
    return this.drives.get(name);
  }

  levels(): Record<string, number> {
    const levels: Record<string, number> = {};
    for (const drive of this.ordered()) levels[drive.name] = drive.level;
    return levels;
  }

  exportState(): DriveState {
    return { levels: this.levels() };
  }

  importState(state: DriveState): void {
    for (const [name, level] of Object.entries(state.levels)) {
      const drive = this.drives.get(name);
      if (drive) this.drives.set(name, Object.freeze({ ...drive, level: clampUnit(level) }));
    }
  }

  /** Drives sorted by priority; names missing from the list follow alphabetically. */
  private ordered(): Drive[] {
    const rank = (name: string): number => {
      const i = this.priority.indexOf(name);
      return i === -1 ? this.priority.length : i;
    };
    return [...this.drives.values()].sort(
      (a, b) => rank(a.name) - rank(b.name) || a.name.localeCompare(b.name),
    );
  }
}
