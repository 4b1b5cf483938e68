/** Lowercased word set, dropping tokens shorter than three characters. */
export function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}']+/u)
      .filter((w) => w.length > 2),
  );
}

/**
 * Jaccard similarity over word sets, in [0, 1].
 * Two texts with no qualifying words compare equal only when identical.
 */
export function textSimilarity(a: string, b: string): number {
  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  if (wordsA.size === 0 && wordsB.size === 0) {
    return a.trim().toLowerCase() === b.trim().toLowerCase() ? 1 : 0;
  }

  let intersection = 0;
  for (const w of wordsA) {
    if (wordsB.has(w)) intersection++;
  }
  const union = wordsA.size + wordsB.size - intersection;
  return intersection / union;
}

/** Canonical key for a tag set: sorted and joined. */
export function tagSetKey(tags: readonly string[]): string {
  return [...new Set(tags)].sort().join("|");
}
