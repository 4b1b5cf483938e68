import type { AssociationsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { Mood } from "../self-state/types.js";
import type { AssociationState, WordAssociation, WordProfile } from "./types.js";

/** Most frequent mood; ties go to the one heard first. */
export function prevailingMood(moods: readonly Mood[]): Mood | null {
  const counts = new Map<Mood, number>();
  for (const mood of moods) counts.set(mood, (counts.get(mood) ?? 0) + 1);
  let best: Mood | null = null;
  let bestCount = 0;
  for (const [mood, count] of counts) {
    if (count > bestCount) {
      best = mood;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Learned word → mood associations. Each word heard in a turn is counted
 * once, together with the mood the agent was in when it heard it.
 */
export class WordAssociations {
  private profiles = new Map<string, WordProfile>();

  constructor(
    private readonly config: AssociationsConfig,
    private readonly logger?: Logger,
  ) {}

  get size(): number {
    return this.profiles.size;
  }

  observe(words: readonly string[], mood: Mood, at: number): void {
    for (const word of new Set(words)) {
      const previous = this.profiles.get(word);
      const moods = [...(previous?.moods ?? []), mood].slice(-this.config.moodWindow);
      // re-insert so Map order tracks recency
      this.profiles.delete(word);
      this.profiles.set(word, Object.freeze({ word, count: (previous?.count ?? 0) + 1, moods, lastSeen: at }));
    }

    const overflow = this.profiles.size - this.config.maxWords;
    if (overflow > 0) {
      const forgotten = [...this.profiles.keys()].slice(0, overflow);
      for (const word of forgotten) this.profiles.delete(word);
      this.logger?.debug({ forgotten: forgotten.length }, "Forgot stale word associations");
    }
  }

  get(word: string): WordProfile | undefined {
    return this.profiles.get(word);
  }

  /** Associations for the given words that have been heard before, in input order. */
  associationsFor(words: readonly string[], limit = this.config.contextLimit): WordAssociation[] {
    const found: WordAssociation[] = [];
    for (const word of new Set(words)) {
      if (found.length >= limit) break;
      const profile = this.profiles.get(word);
      const mood = profile ? prevailingMood(profile.moods) : null;
      if (profile && mood) found.push({ word, mood, count: profile.count });
    }
    return found;
  }

  exportState(): AssociationState {
    return { words: [...this.profiles.values()] };
  }

  importState(state: AssociationState): void {
    this.profiles = new Map(
      [...state.words]
        .sort((a, b) => a.lastSeen - b.lastSeen)
        .map((p): [string, WordProfile] => [p.word, Object.freeze({ ...p, moods: [...p.moods] })]),
    );
  }
}
