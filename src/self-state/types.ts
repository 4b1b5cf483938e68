export const MOODS = [
  "neutral",
  "curious",
  "thoughtful",
  "friendly",
  "appreciative",
  "defensive",
  "melancholy",
  "restless",
] as const;

export type Mood = (typeof MOODS)[number];

export interface SelfState {
  readonly mood: Mood;
  /** Running affective valence, in [-1, 1]. */
  readonly valence: number;
  readonly energy: number;
  readonly confidence: number;
}

export type SentimentBand = "strong_positive" | "mild_positive" | "neutral" | "mild_negative" | "strong_negative";

/** The part of the drive system the mood rule looks at. */
export interface DriveSignal {
  readonly name: string;
  readonly level: number;
}
