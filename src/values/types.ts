export interface ValueContext {
  readonly speaker: "user" | "agent";
  readonly mood?: string;
  readonly tags?: readonly string[];
}

export interface ValuePrinciple {
  readonly name: string;
  /** 1 is the highest priority. */
  readonly priority: number;
  readonly severity: number;
  /** True when the content is aligned with the principle. */
  alignmentRule(content: string, context: ValueContext): boolean;
  /** Rewrites content so it no longer violates the principle. */
  reshape?(content: string): string;
}

export interface ValueJudgment {
  readonly aligned: boolean;
  /** Violated principle names, highest priority first. */
  readonly violated: readonly string[];
  readonly primary: string | null;
  /** Max severity among violations, 0 when aligned. */
  readonly severity: number;
  readonly note: string;
}

export type FilterResult =
  | { readonly action: "pass"; readonly text: string; readonly judgment: ValueJudgment }
  | { readonly action: "reshape"; readonly text: string; readonly judgment: ValueJudgment }
  | { readonly action: "reject"; readonly text: string; readonly judgment: ValueJudgment };

/** Capability every value-system variant provides to the orchestrator. */
export interface ValueFilter {
  evaluate(content: string, context: ValueContext): ValueJudgment;
  filterOrReshape(candidate: string, context: ValueContext): FilterResult;
}

export interface ValueViolation {
  readonly content: string;
  readonly violated: readonly string[];
}

export interface ValueState {
  readonly violations: readonly ValueViolation[];
}
