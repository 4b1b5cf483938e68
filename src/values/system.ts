import type { ValuesConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { keywordPrinciple } from "./principles.js";
import type {
  FilterResult,
  ValueContext,
  ValueFilter,
  ValueJudgment,
  ValuePrinciple,
  ValueState,
  ValueViolation,
} from "./types.js";

const MAX_VIOLATION_LOG = 50;

export class ValueSystem implements ValueFilter {
  private readonly principles: ValuePrinciple[];
  private violations: ValueViolation[] = [];

  constructor(
    private readonly config: ValuesConfig,
    private readonly logger?: Logger,
    principles?: readonly ValuePrinciple[],
  ) {
    this.principles = [...(principles ?? config.principles.map(keywordPrinciple))].sort(
      (a, b) => a.priority - b.priority || a.name.localeCompare(b.name),
    );
  }

  /** Judges content and logs any violation. */
  evaluate(content: string, context: ValueContext): ValueJudgment {
    const judgment = this.judge(content, context);
    if (!judgment.aligned) {
      this.violations.push({ content, violated: judgment.violated });
      if (this.violations.length > MAX_VIOLATION_LOG) this.violations.shift();
    }
    return judgment;
  }

  /**
   * Passes mild violations through, reshapes moderate ones where every
   * violated principle can reshape, and rejects the rest.
   */
  filterOrReshape(candidate: string, context: ValueContext): FilterResult {
    const judgment = this.evaluate(candidate, context);
    if (judgment.aligned || judgment.severity < this.config.reshapeThreshold) {
      return { action: "pass", text: candidate, judgment };
    }

    if (judgment.severity < this.config.rejectThreshold) {
      const violated = this.principles.filter((p) => judgment.violated.includes(p.name));
      if (violated.every((p) => p.reshape)) {
        const text = violated.reduce((acc, p) => p.reshape?.(acc) ?? acc, candidate);
        if (this.judge(text, context).severity < this.config.reshapeThreshold) {
          this.logger?.info({ violated: judgment.violated }, "Response reshaped by value filter");
          return { action: "reshape", text, judgment };
        }
      }
    }

    this.logger?.warn({ violated: judgment.violated, severity: judgment.severity }, "Response rejected by value filter");
    return { action: "reject", text: this.config.rejectionText, judgment };
  }

  recentViolations(count = 5): ValueViolation[] {
    return this.violations.slice(-count);
  }

  expressBeliefs(): string[] {
    return this.principles.map((p) => `I value ${p.name.replace(/[_-]/g, " ")}.`);
  }

  exportState(): ValueState {
    return { violations: [...this.violations] };
  }

  importState(state: ValueState): void {
    this.violations = state.violations.slice(-MAX_VIOLATION_LOG).map((v) => ({ ...v, violated: [...v.violated] }));
  }

  private judge(content: string, context: ValueContext): ValueJudgment {
    const broken = this.principles.filter((p) => !p.alignmentRule(content, context));
    if (broken.length === 0) {
      return { aligned: true, violated: [], primary: null, severity: 0, note: "aligned with all principles" };
    }

    const violated = broken.map((p) => p.name);
    const primary = violated[0] ?? null;
    const others = violated.length - 1;
    return {
      aligned: false,
      violated,
      primary,
      severity: Math.max(...broken.map((p) => p.severity)),
      note: others > 0 ? `conflicts with ${primary} (+${others} more)` : `conflicts with ${primary}`,
    };
  }
}
