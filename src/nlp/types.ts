import type { Mood } from "../self-state/types.js";

export interface TextAnalysis {
  /** In [-1, 1]. */
  readonly sentiment: number;
  readonly tags: readonly string[];
}

/** Sentiment/NLP collaborator. */
export interface SentimentAnalyzer {
  analyze(text: string): Promise<TextAnalysis> | TextAnalysis;
}

export interface Lexicon {
  readonly positive: readonly string[];
  readonly negative: readonly string[];
  readonly negators: readonly string[];
  readonly stopwords: readonly string[];
}

/** What the engine has learned about one word from the turns it appeared in. */
export interface WordProfile {
  readonly word: string;
  readonly count: number;
  /** Moods at the time the word was heard, oldest first. */
  readonly moods: readonly Mood[];
  readonly lastSeen: number;
}

export interface WordAssociation {
  readonly word: string;
  readonly mood: Mood;
  readonly count: number;
}

export interface AssociationState {
  readonly words: readonly WordProfile[];
}
