import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { RuleResponder } from "../../src/responder/rules.js";
import { TracingResponder } from "../../src/responder/tracing.js";
import { makeItem, makePayload } from "../helpers/fixtures.js";

describe("RuleResponder", () => {
  const responder = new RuleResponder();

  it("greets according to mood", () => {
    expect(responder.reply(makePayload({ input: "hi!" }))).toBe("Hello.");
    const friendly = makePayload({ input: "Hey you", selfState: { mood: "friendly", valence: 0.3, energy: 1, confidence: 0.5 } });
    expect(responder.reply(friendly)).toBe("Hey! It's good to hear from you.");
  });

  it("reports how it feels", () => {
    expect(responder.reply(makePayload({ input: "how are you today?" }))).toBe(
      "I'm feeling neutral right now. My energy is at 80%.",
    );
  });

  it("answers thanks and pushback", () => {
    expect(responder.reply(makePayload({ input: "thanks a lot" }))).toBe("You're welcome. That was kind of you.");
    expect(responder.reply(makePayload({ input: "you're wrong" }))).toBe("I see. Maybe I misunderstood.");
    const defensive = makePayload({
      input: "No, that's not it",
      selfState: { mood: "defensive", valence: -0.3, energy: 1, confidence: 0.5 },
    });
    expect(responder.reply(defensive)).toBe("I'm doing my best to understand. Can you clarify?");
  });

  it("brings up a recalled memory when exploring", () => {
    const payload = makePayload({
      input: "jazz again",
      intents: ["explore"],
      recalled: [makeItem({ id: "m1", text: "jazz is improvised" })],
    });
    expect(responder.reply(payload)).toBe('That reminds me of something: "jazz is improvised"');
  });

  it("falls back to a mood line, then to the fallback text", () => {
    const curious = makePayload({ input: "jazz", selfState: { mood: "curious", valence: 0, energy: 1, confidence: 0.5 } });
    expect(responder.reply(curious)).toBe("That's interesting. Tell me more.");
    expect(new RuleResponder("...").reply(makePayload({ input: "jazz" }))).toBe("...");
  });

  it("refuses to answer once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(responder.generate(makePayload(), controller.signal)).rejects.toThrow();
  });
});

describe("TracingResponder", () => {
  it("writes the rendered context before delegating", async () => {
    const chunks: string[] = [];
    const out = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    const tracing = new TracingResponder(new RuleResponder(), out);

    const reply = await tracing.generate(makePayload({ input: "thanks" }), new AbortController().signal);

    expect(reply).toEqual({ text: "You're welcome. That was kind of you." });
    expect(chunks.join("")).toBe(
      "[SELF STATE]\nMood: neutral (valence 0.00)\nEnergy: 80%, confidence: 50%\n\n[DRIVES]\n\n[INPUT]\nthanks\n\n",
    );
  });
});
