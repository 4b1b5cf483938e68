import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LexiconAnalyzer, loadLexicon, tokenize } from "../../src/nlp/lexicon.js";

describe("tokenize", () => {
  it("lowercases, splits on punctuation and normalises quotes", () => {
    expect(tokenize("I DON’T like 'this', okay?")).toEqual(["i", "don't", "like", "this", "okay"]);
  });
});

describe("LexiconAnalyzer", () => {
  const analyzer = new LexiconAnalyzer();

  it("scores positive words", () => {
    // thanks + helping = 2, squashed to 2 / sqrt(5)
    expect(analyzer.analyze("Thanks for helping").sentiment).toBeCloseTo(2 / Math.sqrt(5));
  });

  it("flips polarity after a negator", () => {
    expect(analyzer.analyze("this is not good").sentiment).toBeCloseTo(-1 / Math.sqrt(2));
    expect(analyzer.analyze("I'm not confused").sentiment).toBeCloseTo(1 / Math.sqrt(2));
  });

  it("returns zero for neutral text", () => {
    expect(analyzer.analyze("the table is wooden").sentiment).toBe(0);
  });

  it("tags distinct content words, skipping stopwords and sentiment words", () => {
    expect(analyzer.analyze("I love jazz music, jazz music and piano").tags).toEqual(["jazz", "music", "piano"]);
  });

  it("caps the number of tags", () => {
    const small = new LexiconAnalyzer(loadLexicon(), { maxTags: 2 });
    expect(small.tags("alpha bravo charlie delta")).toEqual(["alpha", "bravo"]);
  });

  it("loads a custom lexicon file", () => {
    const dir = mkdtempSync(join(tmpdir(), "lexicon-"));
    const path = join(dir, "lexicon.json");
    writeFileSync(path, JSON.stringify({ positive: ["sunny"], negative: ["rainy"], negators: [], stopwords: [] }));
    const custom = new LexiconAnalyzer(loadLexicon(path));
    expect(custom.analyze("sunny sunny rainy").sentiment).toBeCloseTo(1 / Math.sqrt(2));
  });

  it("rejects a malformed lexicon", () => {
    const dir = mkdtempSync(join(tmpdir(), "lexicon-"));
    const path = join(dir, "lexicon.json");
    writeFileSync(path, JSON.stringify({ positive: "sunny" }));
    expect(() => loadLexicon(path)).toThrow();
  });
});
