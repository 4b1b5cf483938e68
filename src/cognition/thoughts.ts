import type { DriveSignal, SelfState } from "../self-state/types.js";
import { pick, type RandomSource } from "../utils/random.js";

/** Internal monologue line for idle reflection. */
export function internalThought(
  state: SelfState,
  dominant: DriveSignal | null,
  random: RandomSource,
  recentInput?: string,
): string {
  const thoughts = [
    `I'm feeling ${state.mood} right now. Maybe that's why I responded that way.`,
    `Something in me wants ${dominant?.name ?? "quiet"}. I wonder if I'm getting closer.`,
    "I keep thinking about what was said earlier...",
    "I'm not entirely sure I made the right choice in that moment.",
    "I've been trying to make sense of that last exchange.",
  ];
  if (recentInput) thoughts.push(`They said: "${recentInput}". That made me feel ${state.mood}.`);
  if (state.confidence < 0.4) thoughts.push("My confidence is low. I'm questioning my judgment.");
  return pick(thoughts, random) ?? thoughts[0] ?? "";
}
