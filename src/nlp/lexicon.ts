import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Lexicon, SentimentAnalyzer, TextAnalysis } from "./types.js";

const lexiconSchema = z.object({
  positive: z.array(z.string()),
  negative: z.array(z.string()),
  negators: z.array(z.string()),
  stopwords: z.array(z.string()),
});

const DEFAULT_LEXICON_URL = new URL("../../data/lexicon.json", import.meta.url);

export function loadLexicon(path: string | URL = DEFAULT_LEXICON_URL): Lexicon {
  return lexiconSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

export interface LexiconAnalyzerOptions {
  readonly maxTags?: number;
  readonly minTagLength?: number;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[’‘]/g, "'")
    .split(/[^\p{L}\p{N}']+/u)
    .map((t) => t.replace(/^'+|'+$/g, ""))
    .filter((t) => t.length > 0);
}

/**
 * Deterministic lexicon scorer. Each hit counts ±1, flipped when the
 * previous token is a negator; the raw sum is squashed into [-1, 1]
 * with x / sqrt(x² + 1). Tags are the distinct content words.
 */
export class LexiconAnalyzer implements SentimentAnalyzer {
  private readonly positive: ReadonlySet<string>;
  private readonly negative: ReadonlySet<string>;
  private readonly negators: ReadonlySet<string>;
  private readonly stopwords: ReadonlySet<string>;
  private readonly maxTags: number;
  private readonly minTagLength: number;

  constructor(lexicon: Lexicon = loadLexicon(), opts?: LexiconAnalyzerOptions) {
    this.positive = new Set(lexicon.positive);
    this.negative = new Set(lexicon.negative);
    this.negators = new Set(lexicon.negators);
    this.stopwords = new Set(lexicon.stopwords);
    this.maxTags = opts?.maxTags ?? 6;
    this.minTagLength = opts?.minTagLength ?? 4;
  }

  analyze(text: string): TextAnalysis {
    const tokens = tokenize(text);
    let raw = 0;
    tokens.forEach((token, i) => {
      const polarity = this.positive.has(token) ? 1 : this.negative.has(token) ? -1 : 0;
      if (polarity === 0) return;
      const previous = tokens[i - 1];
      const negated = previous !== undefined && this.negators.has(previous);
      raw += negated ? -polarity : polarity;
    });

    return { sentiment: raw / Math.sqrt(raw * raw + 1), tags: this.tagsFor(tokens) };
  }

  tags(text: string): string[] {
    return this.tagsFor(tokenize(text));
  }

  private tagsFor(tokens: readonly string[]): string[] {
    const tags: string[] = [];
    for (const token of tokens) {
      if (tags.length >= this.maxTags) break;
      if (token.length < this.minTagLength || this.stopwords.has(token)) continue;
      if (this.positive.has(token) || this.negative.has(token)) continue;
      if (!tags.includes(token)) tags.push(token);
    }
    return tags;
  }
}
