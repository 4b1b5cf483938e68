/**
 * Source of randomness for sampling and synthesis.
 * Engines take one through their deps so tests can pin outcomes.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** Deterministic mulberry32 generator. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
    },
  };
}

/** Fixed sequence, cycled. Handy for tests. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) throw new Error("sequenceRandom needs at least one value");
  let i = 0;
  return {
    next(): number {
      const value = values[i % values.length] ?? 0;
      i++;
      return value;
    },
  };
}

export function pick<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.min(items.length - 1, Math.floor(random.next() * items.length))];
}
