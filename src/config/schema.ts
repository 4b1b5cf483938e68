import { z } from "zod";

const unit = z.number().min(0).max(1);

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const memorySchema = z
  .object({
    stmCapacity: z.number().int().positive().default(10),
    promotionThreshold: unit.default(0.7),
    retirementThreshold: unit.default(0.2),
    decayFactor: z.number().gt(0).max(1).default(0.95),
    decayUnitMs: z.number().positive().default(3_600_000),
    mergeThreshold: unit.default(0.8),
    baseImportance: unit.default(0.4),
    defaultTtlMs: z.number().positive().optional(),
    recallLimit: z.number().int().positive().default(5),
  })
  .refine((m) => m.retirementThreshold <= m.promotionThreshold, {
    message: "retirementThreshold must not exceed promotionThreshold",
    path: ["retirementThreshold"],
  });

const selfStateSchema = z.object({
  initialMood: z
    .enum([
      "neutral",
      "curious",
      "thoughtful",
      "friendly",
      "appreciative",
      "defensive",
      "melancholy",
      "restless",
    ])
    .default("curious"),
  initialEnergy: unit.default(1),
  initialConfidence: unit.default(0.7),
  turnEnergyCost: unit.default(0.05),
  idleEnergyRecovery: unit.default(0.1),
  confidenceGain: unit.default(0.05),
  confidenceLoss: unit.default(0.1),
  valueConflictLoss: unit.default(0.05),
  driveMoodThreshold: unit.default(0.6),
});

const driveSchema = z.object({
  name: z.string().min(1),
  level: z.number(),
  riseRate: z.number(),
  decayRate: z.number(),
  threshold: z.number().optional(),
  intent: z.enum(["dream", "reflect", "explore", "reach_out"]).optional(),
});

const DEFAULT_DRIVES: z.input<typeof driveSchema>[] = [
  { name: "curiosity", level: 0.5, riseRate: 0.15, decayRate: 0.05, threshold: 0.9, intent: "explore" },
  { name: "boredom", level: 0.2, riseRate: 0.1, decayRate: 0.2, threshold: 0.8, intent: "dream" },
  { name: "connection", level: 0.4, riseRate: 0.1, decayRate: 0.05, threshold: 0.85, intent: "reach_out" },
  { name: "safety", level: 0.3, riseRate: 0.2, decayRate: 0.1, threshold: 0.8, intent: "reflect" },
];

const drivesSchema = z.object({
  definitions: z.array(driveSchema).default(DEFAULT_DRIVES),
  priority: z
    .array(z.string())
    .default(["curiosity", "boredom", "connection", "safety"]),
});

const traitSchema = z.object({
  name: z.string().min(1),
  weight: z.number(),
  min: z.number().default(0),
  max: z.number().default(1),
});

const outcomeDeltaSchema = z.record(z.string(), z.number());

const DEFAULT_TRAITS: z.input<typeof traitSchema>[] = [
  { name: "resilience", weight: 0.5 },
  { name: "caution", weight: 0.3 },
  { name: "empathy", weight: 0.5 },
  { name: "curiosity", weight: 0.5 },
  { name: "playfulness", weight: 0.4 },
  { name: "introspection", weight: 0.4 },
];

const traitsSchema = z.object({
  definitions: z.array(traitSchema).default(DEFAULT_TRAITS),
  maxDelta: z.number().positive().default(0.1),
  outcomeDeltas: z
    .object({
      success: outcomeDeltaSchema.default({ resilience: 0.05, curiosity: 0.02 }),
      failure: outcomeDeltaSchema.default({ resilience: -0.03, caution: 0.04 }),
      friction: outcomeDeltaSchema.default({ caution: 0.05, empathy: 0.02 }),
      joy: outcomeDeltaSchema.default({ playfulness: 0.05, empathy: 0.03 }),
      neutral: outcomeDeltaSchema.default({}),
    })
    .default({}),
  tagDeltas: z
    .record(z.string(), outcomeDeltaSchema)
    .default({ dream: { introspection: 0.04 } }),
  frictionAlertDelta: z.number().default(0.05),
});

const principleSchema = z.object({
  name: z.string().min(1),
  priority: z.number().int().min(1),
  severity: unit,
  keywords: z.array(z.string().min(1)).min(1),
});

const DEFAULT_PRINCIPLES: z.input<typeof principleSchema>[] = [
  { name: "harm_avoidance", priority: 1, severity: 0.9, keywords: ["hurt", "attack", "insult", "harm"] },
  { name: "honesty", priority: 2, severity: 0.7, keywords: ["lie", "deceive", "fake", "pretend"] },
  { name: "empathy", priority: 3, severity: 0.5, keywords: ["i don't care", "whatever", "not my problem"] },
  { name: "self-consistency", priority: 4, severity: 0.3, keywords: ["i'm confused", "i contradict myself"] },
];

const valuesSchema = z
  .object({
    principles: z.array(principleSchema).default(DEFAULT_PRINCIPLES),
    reshapeThreshold: unit.default(0.6),
    rejectThreshold: unit.default(0.85),
    rejectionText: z
      .string()
      .min(1)
      .default("I'd rather not say that. Let me think about a better way to respond."),
  })
  .refine((v) => v.reshapeThreshold <= v.rejectThreshold, {
    message: "reshapeThreshold must not exceed rejectThreshold",
    path: ["reshapeThreshold"],
  });

const experienceSchema = z.object({
  trendWindow: z.number().int().positive().default(10),
  frictionAlertThreshold: unit.default(0.3),
});

const dreamSchema = z.object({
  sampleSize: z.number().int().positive().default(3),
  lowEnergyThreshold: unit.default(0.3),
  idleDurationMs: z.number().positive().default(300_000),
  synthTimeoutMs: z.number().int().positive().default(30_000),
});

const idleSchema = z.object({
  enabled: z.boolean().default(true),
  schedule: z.string().min(1).default("*/30 * * * * *"),
  decayEveryTicks: z.number().int().positive().default(5),
});

const responderSchema = z.object({
  timeoutMs: z.number().positive().default(15_000),
  fallbackText: z
    .string()
    .min(1)
    .default("I'm reflecting on that..."),
});

const associationsSchema = z.object({
  /** Recent moods remembered per word. */
  moodWindow: z.number().int().positive().default(10),
  /** Least recently seen words are forgotten past this. */
  maxWords: z.number().int().positive().default(5_000),
  contextLimit: z.number().int().nonnegative().default(3),
});

const serverSchema = z.object({
  enabled: z.boolean().default(false),
  /** 0 lets the OS pick a free port. */
  port: z.number().int().nonnegative().default(19877),
  hostname: z.string().default("127.0.0.1"),
});

export const ponderConfigSchema = z
  .object({
    logging: loggingSchema.default({}),
    memory: memorySchema.default({}),
    selfState: selfStateSchema.default({}),
    drives: drivesSchema.default({}),
    traits: traitsSchema.default({}),
    values: valuesSchema.default({}),
    experience: experienceSchema.default({}),
    dream: dreamSchema.default({}),
    idle: idleSchema.default({}),
    responder: responderSchema.default({}),
    associations: associationsSchema.default({}),
    server: serverSchema.default({}),
    goals: z
      .object({
        maxActive: z.number().int().positive().default(5),
        /** Phrases that mark a goal as reached when the input also names it. */
        completionCues: z
          .array(z.string().min(1))
          .default(["finally", "figured out", "finished", "done with", "achieved", "accomplished", "managed to"]),
        /** Share of a goal's keywords the input must mention. */
        progressOverlap: unit.default(0.5),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    // Invariants that would otherwise surface mid-turn are rejected here.
    const driveNames = new Set<string>();
    config.drives.definitions.forEach((drive, i) => {
      const path = ["drives", "definitions", i];
      if (driveNames.has(drive.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, "name"], message: `Duplicate drive: ${drive.name}` });
      }
      driveNames.add(drive.name);
      for (const key of ["level", "riseRate", "decayRate", "threshold"] as const) {
        const value = drive[key];
        if (value !== undefined && (value < 0 || value > 1)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path, key],
            message: `Drive ${drive.name}: ${key} must be within [0, 1] (got ${value})`,
          });
        }
      }
    });

    const traitNames = new Set<string>();
    config.traits.definitions.forEach((trait, i) => {
      const path = ["traits", "definitions", i];
      if (traitNames.has(trait.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, "name"], message: `Duplicate trait: ${trait.name}` });
      }
      traitNames.add(trait.name);
      if (trait.min > trait.max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, "min"], message: `Trait ${trait.name}: min exceeds max` });
      } else if (trait.weight < trait.min || trait.weight > trait.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, "weight"],
          message: `Trait ${trait.name}: weight ${trait.weight} outside [${trait.min}, ${trait.max}]`,
        });
      }
    });

    const principleNames = new Set<string>();
    config.values.principles.forEach((principle, i) => {
      if (principleNames.has(principle.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["values", "principles", i, "name"],
          message: `Duplicate principle: ${principle.name}`,
        });
      }
      principleNames.add(principle.name);
    });
  });

export function parseConfig(raw: unknown): z.output<typeof ponderConfigSchema> {
  return ponderConfigSchema.parse(raw);
}
