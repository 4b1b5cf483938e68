export type Speaker = "user" | "agent";

export interface MemoryItem {
  readonly id: string;
  readonly timestamp: number;
  readonly speaker: Speaker;
  readonly text: string;
  /** Unique, in the order they were first attached. */
  readonly tags: readonly string[];
  readonly importance: number;
  readonly ttlMs?: number;
  /** Sentiment of the text when it was captured, in [-1, 1]. */
  readonly valence?: number;
  /** Ids of the items this one was synthesised from. */
  readonly provenance?: readonly string[];
}

export interface LongTermEntry extends MemoryItem {
  readonly retired: boolean;
  /** Ids folded into this entry by reconciliation. */
  readonly mergedFrom: readonly string[];
  /** Insertion order, used as the final ranking tie-break. */
  readonly seq: number;
  /** Last time decay was applied (epoch ms). */
  readonly decayedAt: number;
}

/** Anything that accepts items evicted from short-term memory. */
export interface PromotionSink {
  promote(item: MemoryItem): unknown;
}

export interface AppendResult {
  readonly evicted: readonly MemoryItem[];
  readonly promoted: readonly MemoryItem[];
}

export interface DecayResult {
  readonly decayed: number;
  readonly retired: readonly string[];
}

export interface MergeGroup {
  readonly survivorId: string;
  readonly mergedIds: readonly string[];
}

export interface ReconcileResult {
  readonly merged: readonly MergeGroup[];
}

export interface ShortTermState {
  readonly items: readonly MemoryItem[];
}

export interface LongTermState {
  readonly entries: readonly LongTermEntry[];
  readonly aliases: readonly (readonly [string, string])[];
  readonly nextSeq: number;
}

export function normalizeTags(tags: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (tag.length > 0) seen.add(tag);
  }
  return [...seen];
}

/** Frozen copy with its own frozen tag and provenance arrays. */
export function freezeItem(item: MemoryItem): MemoryItem {
  return Object.freeze({
    ...item,
    tags: Object.freeze([...item.tags]),
    ...(item.provenance ? { provenance: Object.freeze([...item.provenance]) } : {}),
  });
}

/** Plain copy of an item, safe to hand outside the engine. */
export function toPlainItem(item: MemoryItem): MemoryItem {
  return {
    id: item.id,
    timestamp: item.timestamp,
    speaker: item.speaker,
    text: item.text,
    tags: [...item.tags],
    importance: item.importance,
    ...(item.ttlMs !== undefined ? { ttlMs: item.ttlMs } : {}),
    ...(item.valence !== undefined ? { valence: item.valence } : {}),
    ...(item.provenance ? { provenance: [...item.provenance] } : {}),
  };
}
