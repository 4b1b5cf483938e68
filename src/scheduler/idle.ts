import { Cron } from "croner";
import type { IdleTickResult } from "../cognition/types.js";
import type { Logger } from "../logging/logger.js";

/** The slice of the engine the scheduler drives. */
export interface IdleTarget {
  idleTick(): Promise<IdleTickResult>;
}

export interface IdleSchedulerOptions {
  readonly schedule: string;
  /** Called after each tick has been applied, e.g. to persist state. */
  readonly afterTick?: (result: IdleTickResult) => Promise<void> | void;
}

/**
 * Fires idle ticks on a cron pattern. Overlapping runs are skipped by
 * croner's protect mode; the engine queue serialises against turns.
 */
export class IdleScheduler {
  private job: Cron | null = null;

  constructor(
    private readonly target: IdleTarget,
    private readonly opts: IdleSchedulerOptions,
    private readonly logger: Logger,
  ) {}

  start(): void {
    if (this.job) return;
    this.job = new Cron(this.opts.schedule, { protect: true }, () => this.tick());
    this.logger.info({ schedule: this.opts.schedule, next: this.job.nextRun()?.toISOString() }, "Idle scheduler started");
  }

  stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    this.logger.info("Idle scheduler stopped");
  }

  isRunning(): boolean {
    return this.job !== null;
  }

  /** Runs one tick now. Errors are logged, never thrown into croner. */
  async tick(): Promise<IdleTickResult | null> {
    try {
      const result = await this.target.idleTick();
      this.logger.debug(
        { tick: result.tick, intents: result.intents, dreamed: result.dream !== null },
        "Idle tick",
      );
      await this.opts.afterTick?.(result);
      return result;
    } catch (err) {
      this.logger.error({ err }, "Idle tick failed");
      return null;
    }
  }
}
