import { z } from "zod";
import type { EngineState } from "../cognition/types.js";
import type { DreamEntry } from "../dream/types.js";
import type { ExperienceRecord } from "../experience/types.js";
import { OUTCOMES } from "../experience/types.js";
import type { VaultDB } from "./db.js";

const STATE_KEY = "engine";

const stringList = z.array(z.string());

/** Saved state keeps its own fields; experience records live in the journal. */
const storedStateSchema = z.object({ experience: z.object({}).passthrough() }).passthrough();

interface StateRow {
  value: string;
}

interface ExperienceRow {
  id: string;
  interaction_id: string;
  outcome: string;
  evidence: string;
  tags: string;
  timestamp: number;
}

interface DreamRow {
  id: string;
  theme: string;
  text: string;
  valence: number;
  importance: number;
  tags: string;
  provenance: string;
  timestamp: number;
}

/** Items after the one with `lastId`; everything when it is unknown. */
function after<T extends { readonly id: string }>(items: readonly T[], lastId: string | null): readonly T[] {
  if (lastId === null) return items;
  for (let i = items.length - 1; i >= 0; i--) {
    if (items[i]?.id === lastId) return items.slice(i + 1);
  }
  return items;
}

/**
 * Persists the engine between runs: the latest exported state plus
 * append-only journals of experiences and dreams. The experience log is
 * stored only in its journal and joined back in on load.
 */
export class StateVault {
  private readonly db;
  private lastExperienceId: string | null = null;
  private lastDreamId: string | null = null;

  constructor(vaultDb: VaultDB) {
    this.db = vaultDb.raw();
  }

  // ── Engine state ──

  /**
   * Stores the state and journals the experiences and dreams added since
   * the last save, in one transaction.
   */
  saveState(state: EngineState, now = Date.now()): void {
    const { records } = state.experience;
    const save = this.db.transaction(() => {
      this.db
        .prepare<[string, string, number]>(
          `INSERT INTO engine_state (key, value, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
        )
        .run(STATE_KEY, JSON.stringify({ ...state, experience: { records: [] } }), now);
      for (const record of after(records, this.lastExperienceId)) this.appendExperience(record);
      for (const dream of after(state.dreams, this.lastDreamId)) this.appendDream(dream);
    });
    save();
    this.lastExperienceId = records.at(-1)?.id ?? this.lastExperienceId;
    this.lastDreamId = state.dreams.at(-1)?.id ?? this.lastDreamId;
  }

  /** Saved state with its experience log rejoined; the engine validates it on import. */
  loadState(): unknown {
    const row = this.db
      .prepare<[string], StateRow>("SELECT value FROM engine_state WHERE key = ?")
      .get(STATE_KEY);
    if (!row) return null;
    const stored = storedStateSchema.parse(JSON.parse(row.value));
    const records = this.allExperiences();
    this.lastExperienceId = records.at(-1)?.id ?? null;
    return { ...stored, experience: { ...stored.experience, records } };
  }

  // ── Journals ──

  appendExperience(record: ExperienceRecord): boolean {
    const result = this.db
      .prepare<[string, string, string, string, string, number]>(
        `INSERT OR IGNORE INTO experiences (id, interaction_id, outcome, evidence, tags, timestamp)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        record.id,
        record.interactionId,
        record.outcome,
        record.evidence,
        JSON.stringify(record.tags),
        record.timestamp,
      );
    return result.changes > 0;
  }

  appendDream(entry: DreamEntry): boolean {
    const result = this.db
      .prepare<[string, string, string, number, number, string, string, number]>(
        `INSERT OR IGNORE INTO dreams (id, theme, text, valence, importance, tags, provenance, timestamp)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.id,
        entry.theme,
        entry.text,
        entry.valence,
        entry.importance,
        JSON.stringify(entry.tags),
        JSON.stringify(entry.provenance),
        entry.timestamp,
      );
    return result.changes > 0;
  }

  /** Newest first. */
  recentDreams(limit = 10): DreamEntry[] {
    const rows = this.db
      .prepare<[number], DreamRow>("SELECT * FROM dreams ORDER BY timestamp DESC, rowid DESC LIMIT ?")
      .all(limit);
    return rows.map((r) => this.toDream(r));
  }

  /** Newest first. */
  recentExperiences(limit = 20): ExperienceRecord[] {
    const rows = this.db
      .prepare<[number], ExperienceRow>("SELECT * FROM experiences ORDER BY timestamp DESC, rowid DESC LIMIT ?")
      .all(limit);
    return rows.map((r) => this.toExperience(r));
  }

  /** Oldest first. */
  allExperiences(): ExperienceRecord[] {
    const rows = this.db
      .prepare<[], ExperienceRow>("SELECT * FROM experiences ORDER BY rowid ASC")
      .all();
    return rows.map((r) => this.toExperience(r));
  }

  countDreams(): number {
    const row = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM dreams").get();
    return row?.count ?? 0;
  }

  private toDream(row: DreamRow): DreamEntry {
    return {
      id: row.id,
      timestamp: row.timestamp,
      speaker: "agent",
      text: row.text,
      tags: stringList.parse(JSON.parse(row.tags)),
      importance: row.importance,
      valence: row.valence,
      theme: row.theme,
      provenance: stringList.parse(JSON.parse(row.provenance)),
    };
  }

  private toExperience(row: ExperienceRow): ExperienceRecord {
    return {
      id: row.id,
      interactionId: row.interaction_id,
      outcome: z.enum(OUTCOMES).parse(row.outcome),
      evidence: row.evidence,
      tags: stringList.parse(JSON.parse(row.tags)),
      timestamp: row.timestamp,
    };
  }
}
