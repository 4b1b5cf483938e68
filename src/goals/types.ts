export type GoalStatus = "active" | "fulfilled" | "abandoned";

export interface Goal {
  readonly id: string;
  readonly description: string;
  readonly motivation: string;
  readonly status: GoalStatus;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface GoalState {
  readonly goals: readonly Goal[];
}
