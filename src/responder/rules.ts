import type { ContextPayload } from "../cognition/types.js";
import type { Responder, ResponderReply } from "./types.js";

const GREETING = /\b(hello|hi|hey)\b/i;
const WELLBEING = /\bhow are you\b/i;
const THANKS = /\b(thank you|thanks)\b/i;
const PUSHBACK = /(\byou'?re wrong\b|^\s*no\b)/i;

const MOOD_LINES: Partial<Record<ContextPayload["selfState"]["mood"], string>> = {
  curious: "That's interesting. Tell me more.",
  defensive: "Hmm... I'm thinking about that carefully.",
  appreciative: "I feel more connected when I hear kind words.",
  thoughtful: "That makes me think. I'll need a moment.",
  restless: "I've been sitting still too long. Let's talk about something new.",
};

/**
 * Offline responder: canned replies keyed on the input and the current
 * mood. Enough to drive the engine without a language model.
 */
export class RuleResponder implements Responder {
  constructor(private readonly fallbackText = "I'm reflecting on that...") {}

  async generate(payload: ContextPayload, signal: AbortSignal): Promise<ResponderReply> {
    signal.throwIfAborted();
    return { text: this.reply(payload) };
  }

  reply(payload: ContextPayload): string {
    const { input, selfState } = payload;
    const mood = selfState.mood;

    if (GREETING.test(input)) {
      return mood === "friendly" ? "Hey! It's good to hear from you." : "Hello.";
    }
    if (WELLBEING.test(input)) {
      return `I'm feeling ${mood} right now. My energy is at ${Math.round(selfState.energy * 100)}%.`;
    }
    if (THANKS.test(input)) return "You're welcome. That was kind of you.";
    if (PUSHBACK.test(input)) {
      return mood === "defensive"
        ? "I'm doing my best to understand. Can you clarify?"
        : "I see. Maybe I misunderstood.";
    }

    const recalled = payload.recalled[0];
    if (recalled && payload.intents.includes("explore")) {
      return `That reminds me of something: "${recalled.text}"`;
    }
    return MOOD_LINES[mood] ?? this.fallbackText;
  }
}
