export const OUTCOMES = ["success", "failure", "friction", "joy", "neutral"] as const;

export type Outcome = (typeof OUTCOMES)[number];

export interface ExperienceRecord {
  readonly id: string;
  readonly interactionId: string;
  readonly outcome: Outcome;
  readonly evidence: string;
  readonly tags: readonly string[];
  readonly timestamp: number;
}

export interface Trend {
  /** Records actually inspected (at most the requested window). */
  readonly window: number;
  readonly counts: Readonly<Record<Outcome, number>>;
  readonly frequencies: Readonly<Record<Outcome, number>>;
  readonly dominant: Outcome | null;
}

export interface OutcomeSignals {
  readonly responderFailed: boolean;
  readonly hint?: Outcome;
  readonly filterAction?: "pass" | "reshape" | "reject";
  readonly sentiment: number;
}

export interface ExperienceState {
  readonly records: readonly ExperienceRecord[];
}
