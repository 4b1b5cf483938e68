import { z } from "zod";
import { OUTCOMES } from "../experience/types.js";
import { MOODS } from "../self-state/types.js";
import type { EngineState } from "./types.js";

const memoryItemShape = {
  id: z.string(),
  timestamp: z.number(),
  speaker: z.enum(["user", "agent"]),
  text: z.string(),
  tags: z.array(z.string()),
  importance: z.number().min(0).max(1),
  ttlMs: z.number().positive().optional(),
  valence: z.number().min(-1).max(1).optional(),
  provenance: z.array(z.string()).optional(),
};

const memoryItemSchema = z.object(memoryItemShape);

const longTermEntrySchema = z.object({
  ...memoryItemShape,
  retired: z.boolean(),
  mergedFrom: z.array(z.string()),
  seq: z.number().int().nonnegative(),
  decayedAt: z.number(),
});

const dreamEntrySchema = z.object({
  ...memoryItemShape,
  speaker: z.literal("agent"),
  theme: z.string(),
  valence: z.number().min(-1).max(1),
  provenance: z.array(z.string()),
});

export const engineStateSchema = z.object({
  version: z.literal(1),
  stm: z.object({ items: z.array(memoryItemSchema) }),
  ltm: z.object({
    entries: z.array(longTermEntrySchema),
    aliases: z.array(z.tuple([z.string(), z.string()])),
    nextSeq: z.number().int().nonnegative(),
  }),
  selfState: z.object({
    mood: z.enum(MOODS),
    valence: z.number().min(-1).max(1),
    energy: z.number().min(0).max(1),
    confidence: z.number().min(0).max(1),
  }),
  drives: z.object({ levels: z.record(z.string(), z.number().min(0).max(1)) }),
  traits: z.object({
    traits: z.array(z.object({ name: z.string(), weight: z.number(), min: z.number(), max: z.number() })),
    processed: z.array(z.string()),
  }),
  values: z
    .object({ violations: z.array(z.object({ content: z.string(), violated: z.array(z.string()) })) })
    .default({ violations: [] }),
  experience: z.object({
    records: z.array(
      z.object({
        id: z.string(),
        interactionId: z.string(),
        outcome: z.enum(OUTCOMES),
        evidence: z.string(),
        tags: z.array(z.string()),
        timestamp: z.number(),
      }),
    ),
  }),
  goals: z.object({
    goals: z.array(
      z.object({
        id: z.string(),
        description: z.string(),
        motivation: z.string(),
        status: z.enum(["active", "fulfilled", "abandoned"]),
        createdAt: z.number(),
        updatedAt: z.number(),
      }),
    ),
  }),
  associations: z
    .object({
      words: z.array(
        z.object({
          word: z.string(),
          count: z.number().int().positive(),
          moods: z.array(z.enum(MOODS)),
          lastSeen: z.number(),
        }),
      ),
    })
    .default({ words: [] }),
  dreams: z.array(dreamEntrySchema),
  seenTags: z.array(z.string()),
  pendingViolations: z.number().int().nonnegative().default(0),
  turns: z.number().int().nonnegative(),
  ticks: z.number().int().nonnegative(),
  lastTurnAt: z.number().nullable(),
});

export function parseEngineState(raw: unknown): EngineState {
  return engineStateSchema.parse(raw);
}
