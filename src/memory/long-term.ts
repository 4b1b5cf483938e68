import type { Logger } from "../logging/logger.js";
import type { MemoryConfig } from "../config/types.js";
import { tagSetKey, textSimilarity } from "./similarity.js";
import {
  normalizeTags,
  type DecayResult,
  type LongTermEntry,
  type LongTermState,
  type MemoryItem,
  type MergeGroup,
  type ReconcileResult,
} from "./types.js";

export const RETIRED_TAG = "retired";

type LongTermOptions = Pick<
  MemoryConfig,
  "promotionThreshold" | "retirementThreshold" | "decayFactor" | "decayUnitMs" | "mergeThreshold"
>;

export interface QueryOptions {
  readonly includeRetired?: boolean;
}

export function dayBucket(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

function freezeEntry(entry: LongTermEntry): LongTermEntry {
  return Object.freeze({
    ...entry,
    tags: Object.freeze([...entry.tags]),
    mergedFrom: Object.freeze([...entry.mergedFrom]),
    ...(entry.provenance ? { provenance: Object.freeze([...entry.provenance]) } : {}),
  });
}

/** Ranking used by query and reconciliation: importance, recency, insertion. */
function compareEntries(a: LongTermEntry, b: LongTermEntry): number {
  return b.importance - a.importance || b.timestamp - a.timestamp || a.seq - b.seq;
}

/**
 * Durable store of salient memories, indexed by tag and by UTC day.
 * Entries are frozen snapshots; decay and merges replace them wholesale.
 * Nothing is physically purged: retired entries stay, merged ids resolve
 * to their survivor.
 */
export class LongTermMemory {
  private readonly entriesById = new Map<string, LongTermEntry>();
  private readonly tagIndex = new Map<string, Set<string>>();
  private readonly dayIndex = new Map<string, Set<string>>();
  private readonly aliases = new Map<string, string>();
  private nextSeq = 0;

  constructor(
    private readonly opts: LongTermOptions,
    private readonly logger?: Logger,
  ) {}

  promote(item: MemoryItem, now: number = item.timestamp): LongTermEntry {
    const existing = this.entriesById.get(item.id);
    if (existing) this.unindex(existing);
    // A re-promoted id is live again, not an alias.
    this.aliases.delete(item.id);

    const entry = freezeEntry({
      ...item,
      tags: normalizeTags(item.tags),
      retired: false,
      mergedFrom: existing?.mergedFrom ?? [],
      seq: existing?.seq ?? this.nextSeq++,
      decayedAt: now,
    });
    if (entry.importance < this.opts.promotionThreshold) {
      this.logger?.warn(
        { id: entry.id, importance: entry.importance },
        "Promoted memory below promotion threshold",
      );
    }

    this.entriesById.set(entry.id, entry);
    this.index(entry);
    this.logger?.debug({ id: entry.id, tags: entry.tags }, "Memory promoted to LTM");
    return entry;
  }

  /** Entries matching ANY of the tags, best first. */
  query(tags: Iterable<string>, limit: number, opts?: QueryOptions): LongTermEntry[] {
    const ids = new Set<string>();
    for (const tag of normalizeTags(tags)) {
      for (const id of this.tagIndex.get(tag) ?? []) ids.add(id);
    }

    const matches: LongTermEntry[] = [];
    for (const id of ids) {
      const entry = this.entriesById.get(id);
      if (entry && (opts?.includeRetired || !entry.retired)) matches.push(entry);
    }
    return matches.sort(compareEntries).slice(0, Math.max(0, limit));
  }

  decayPass(now: number): DecayResult {
    const retired: string[] = [];
    let decayed = 0;

    for (const entry of this.entriesById.values()) {
      const elapsed = now - entry.decayedAt;
      if (elapsed <= 0) continue;

      const importance = entry.importance * this.opts.decayFactor ** (elapsed / this.opts.decayUnitMs);
      const retire = !entry.retired && importance < this.opts.retirementThreshold;
      const next = freezeEntry({
        ...entry,
        importance,
        decayedAt: now,
        retired: entry.retired || retire,
        tags: retire ? [...entry.tags, RETIRED_TAG] : entry.tags,
      });
      if (retire) {
        this.unindex(entry);
        this.index(next);
        retired.push(entry.id);
      }
      this.entriesById.set(entry.id, next);
      decayed++;
    }

    if (retired.length > 0) {
      this.logger?.info({ retired: retired.length }, "LTM entries retired");
    }
    return { decayed, retired };
  }

  /**
   * Collapses near-duplicate entries that share an identical tag set.
   * Only groups touched by `candidates` are considered (all groups when
   * omitted). The best-ranked entry of each cluster survives with its
   * text and the max importance; the rest become aliases.
   */
  reconcile(candidates?: Iterable<string>): ReconcileResult {
    const live = [...this.entriesById.values()].filter((e) => !e.retired);
    let keys: Set<string> | null = null;
    if (candidates) {
      keys = new Set<string>();
      for (const id of candidates) {
        const entry = this.get(id);
        if (entry && !entry.retired) keys.add(tagSetKey(entry.tags));
      }
    }

    const groups = new Map<string, LongTermEntry[]>();
    for (const entry of live) {
      const key = tagSetKey(entry.tags);
      if (keys && !keys.has(key)) continue;
      const group = groups.get(key) ?? [];
      group.push(entry);
      groups.set(key, group);
    }

    const merged: MergeGroup[] = [];
    for (const group of groups.values()) {
      if (group.length < 2) continue;
      group.sort(compareEntries);

      const clusters: { survivor: LongTermEntry; members: LongTermEntry[] }[] = [];
      for (const entry of group) {
        const home = clusters.find(
          (c) => textSimilarity(c.survivor.text, entry.text) >= this.opts.mergeThreshold,
        );
        if (home) home.members.push(entry);
        else clusters.push({ survivor: entry, members: [] });
      }

      for (const { survivor, members } of clusters) {
        if (members.length === 0) continue;
        merged.push(this.collapse(survivor, members));
      }
    }

    if (merged.length > 0) {
      this.logger?.info({ groups: merged.length }, "LTM reconciled near-duplicates");
    }
    return { merged };
  }

  /** Follows merge aliases to the surviving id. */
  resolve(id: string): string | undefined {
    let current = id;
    const seen = new Set<string>();
    while (!this.entriesById.has(current)) {
      const next = this.aliases.get(current);
      if (next === undefined || seen.has(next)) return undefined;
      seen.add(current);
      current = next;
    }
    return current;
  }

  get(id: string): LongTermEntry | undefined {
    const resolved = this.resolve(id);
    return resolved === undefined ? undefined : this.entriesById.get(resolved);
  }

  byDay(day: string): LongTermEntry[] {
    const ids = this.dayIndex.get(day) ?? new Set<string>();
    return [...ids]
      .map((id) => this.entriesById.get(id))
      .filter((e): e is LongTermEntry => e !== undefined)
      .sort((a, b) => a.seq - b.seq);
  }

  /** All entries in insertion order, retired included. */
  entries(): LongTermEntry[] {
    return [...this.entriesById.values()].sort((a, b) => a.seq - b.seq);
  }

  liveEntries(): LongTermEntry[] {
    return this.entries().filter((e) => !e.retired);
  }

  get size(): number {
    return this.entriesById.size;
  }

  exportState(): LongTermState {
    return {
      entries: this.entries(),
      aliases: [...this.aliases.entries()],
      nextSeq: this.nextSeq,
    };
  }

  importState(state: LongTermState): void {
    this.entriesById.clear();
    this.tagIndex.clear();
    this.dayIndex.clear();
    this.aliases.clear();
    for (const raw of state.entries) {
      const entry = freezeEntry(raw);
      this.entriesById.set(entry.id, entry);
      this.index(entry);
    }
    for (const [from, to] of state.aliases) this.aliases.set(from, to);
    this.nextSeq = state.nextSeq;
  }

  private collapse(survivor: LongTermEntry, members: readonly LongTermEntry[]): MergeGroup {
    const mergedIds = members.map((m) => m.id);
    const mergedFrom = [
      ...survivor.mergedFrom,
      ...members.flatMap((m) => [m.id, ...m.mergedFrom]),
    ];
    const importance = Math.max(survivor.importance, ...members.map((m) => m.importance));

    for (const member of members) {
      this.unindex(member);
      this.entriesById.delete(member.id);
      this.aliases.set(member.id, survivor.id);
    }
    // Keep alias chains one hop long.
    for (const [from, to] of this.aliases) {
      if (mergedIds.includes(to)) this.aliases.set(from, survivor.id);
    }

    this.entriesById.set(survivor.id, freezeEntry({ ...survivor, importance, mergedFrom }));
    this.logger?.debug({ survivor: survivor.id, merged: mergedIds }, "Merged memories");
    return { survivorId: survivor.id, mergedIds };
  }

  private index(entry: LongTermEntry): void {
    for (const tag of entry.tags) {
      const ids = this.tagIndex.get(tag) ?? new Set<string>();
      ids.add(entry.id);
      this.tagIndex.set(tag, ids);
    }
    const day = dayBucket(entry.timestamp);
    const ids = this.dayIndex.get(day) ?? new Set<string>();
    ids.add(entry.id);
    this.dayIndex.set(day, ids);
  }

  private unindex(entry: LongTermEntry): void {
    for (const tag of entry.tags) {
      this.tagIndex.get(tag)?.delete(entry.id);
    }
    this.dayIndex.get(dayBucket(entry.timestamp))?.delete(entry.id);
  }
}
