export type Intent = "dream" | "reflect" | "explore" | "reach_out";

export interface Drive {
  readonly name: string;
  readonly level: number;
  readonly riseRate: number;
  readonly decayRate: number;
  readonly threshold?: number;
  readonly intent?: Intent;
}

/** Signals gathered by the orchestrator for one drive tick. */
export interface DriveContext {
  readonly idle: boolean;
  /** Tags not seen before this turn. */
  readonly novelTags?: number;
  readonly sentiment?: number;
  readonly dreamed?: boolean;
  readonly valueViolations?: number;
}

/** Where a drive wants to be, given the context; undefined holds it. */
export type DriveTarget = (context: DriveContext, current: number) => number | undefined;

export interface DriveState {
  readonly levels: Readonly<Record<string, number>>;
}
