import type { DriveSignal, Mood, SentimentBand } from "./types.js";

const POSITIVE_MOODS: ReadonlySet<Mood> = new Set(["friendly", "appreciative"]);
const NEGATIVE_MOODS: ReadonlySet<Mood> = new Set(["defensive", "melancholy"]);

/** Mood a dominant drive pulls toward when the input itself is flat. */
export const DRIVE_MOODS: Readonly<Record<string, Mood>> = {
  curiosity: "curious",
  boredom: "restless",
  connection: "friendly",
  safety: "thoughtful",
};

export function sentimentBand(sentiment: number): SentimentBand {
  if (sentiment >= 0.5) return "strong_positive";
  if (sentiment >= 0.15) return "mild_positive";
  if (sentiment <= -0.5) return "strong_negative";
  if (sentiment <= -0.15) return "mild_negative";
  return "neutral";
}

/**
 * Fixed mood transition: f(old mood, sentiment, dominant drive).
 * `driveMoodThreshold` gates how strong a drive must be to colour a
 * neutral turn.
 */
export function nextMood(
  old: Mood,
  sentiment: number,
  dominant: DriveSignal | null,
  driveMoodThreshold: number,
): Mood {
  switch (sentimentBand(sentiment)) {
    case "strong_positive":
      return "appreciative";
    case "mild_positive":
      return NEGATIVE_MOODS.has(old) ? "neutral" : "friendly";
    case "neutral": {
      if (!dominant || dominant.level < driveMoodThreshold) return old;
      return DRIVE_MOODS[dominant.name] ?? old;
    }
    case "mild_negative":
      return POSITIVE_MOODS.has(old) ? "thoughtful" : "defensive";
    case "strong_negative":
      return NEGATIVE_MOODS.has(old) ? "melancholy" : "defensive";
  }
}

/** Mood that best represents a valence, used when dreams shift the state. */
export function moodForValence(valence: number): Mood {
  if (valence >= 0.5) return "appreciative";
  if (valence >= 0.15) return "friendly";
  if (valence <= -0.5) return "defensive";
  if (valence <= -0.15) return "melancholy";
  return "thoughtful";
}
