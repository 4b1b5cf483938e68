import { describe, it, expect, vi } from "vitest";
import { dayBucket, LongTermMemory, RETIRED_TAG } from "../../src/memory/long-term.js";
import { textSimilarity } from "../../src/memory/similarity.js";
import { makeConfig, makeItem, silentLogger } from "../helpers/fixtures.js";

function ltmWith(memory: Record<string, unknown> = {}) {
  return new LongTermMemory(makeConfig({ memory }).memory);
}

describe("textSimilarity", () => {
  it("is 1 for the same words regardless of case and punctuation", () => {
    expect(textSimilarity("I love my cats at home", "i LOVE my cats at home!")).toBe(1);
  });

  it("is the Jaccard ratio of words longer than two characters", () => {
    // {love, cats} vs {love, dogs}: 1 shared of 3
    expect(textSimilarity("love cats", "love dogs")).toBeCloseTo(1 / 3);
  });

  it("compares short texts literally", () => {
    expect(textSimilarity("ok", "OK")).toBe(1);
    expect(textSimilarity("ok", "no")).toBe(0);
  });
});

describe("LongTermMemory", () => {
  it("ranks by importance, then recency, then insertion order", () => {
    const ltm = ltmWith();
    ltm.promote(makeItem({ id: "a", importance: 0.8, timestamp: 100, tags: ["x"] }));
    ltm.promote(makeItem({ id: "b", importance: 0.9, timestamp: 50, tags: ["x"] }));
    ltm.promote(makeItem({ id: "c", importance: 0.8, timestamp: 200, tags: ["x"] }));
    ltm.promote(makeItem({ id: "d", importance: 0.8, timestamp: 100, tags: ["y"] }));

    expect(ltm.query(["x", "y"], 10).map((e) => e.id)).toEqual(["b", "c", "a", "d"]);
    expect(ltm.query(["x"], 2).map((e) => e.id)).toEqual(["b", "c"]);
  });

  it("matches any tag, case-insensitively", () => {
    const ltm = ltmWith();
    ltm.promote(makeItem({ id: "a", importance: 0.8, tags: ["music"] }));
    expect(ltm.query(["MUSIC", "none"], 5).map((e) => e.id)).toEqual(["a"]);
  });

  it("overwrites a duplicate id but keeps its insertion order", () => {
    const ltm = ltmWith();
    ltm.promote(makeItem({ id: "a", importance: 0.8, tags: ["x"], text: "first" }));
    ltm.promote(makeItem({ id: "b", importance: 0.8, tags: ["x"] }));
    ltm.promote(makeItem({ id: "a", importance: 0.8, tags: ["z"], text: "second" }));

    expect(ltm.size).toBe(2);
    expect(ltm.entries().map((e) => e.id)).toEqual(["a", "b"]);
    expect(ltm.get("a")?.text).toBe("second");
    expect(ltm.query(["x"], 5).map((e) => e.id)).toEqual(["b"]);
  });

  it("warns when promoting below the promotion threshold", () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");
    const ltm = new LongTermMemory(makeConfig().memory, logger);

    ltm.promote(makeItem({ id: "low", importance: 0.1 }));

    expect(warn).toHaveBeenCalledWith({ id: "low", importance: 0.1 }, "Promoted memory below promotion threshold");
  });

  it("indexes entries by UTC day", () => {
    const ltm = ltmWith();
    const ts = Date.UTC(2024, 2, 5, 23, 30);
    ltm.promote(makeItem({ id: "a", importance: 0.8, timestamp: ts }));
    expect(dayBucket(ts)).toBe("2024-03-05");
    expect(ltm.byDay("2024-03-05").map((e) => e.id)).toEqual(["a"]);
    expect(ltm.byDay("2024-03-06")).toEqual([]);
  });

  it("decays importance exponentially and retires without purging", () => {
    const ltm = ltmWith({ decayFactor: 0.5, decayUnitMs: 1_000, retirementThreshold: 0.2 });
    ltm.promote(makeItem({ id: "a", importance: 0.8, timestamp: 0, tags: ["x"] }));

    const first = ltm.decayPass(1_000);
    expect(first).toEqual({ decayed: 1, retired: [] });
    expect(ltm.get("a")?.importance).toBeCloseTo(0.4);

    const second = ltm.decayPass(3_000);
    expect(second.retired).toEqual(["a"]);
    const entry = ltm.get("a");
    expect(entry?.importance).toBeCloseTo(0.1);
    expect(entry?.retired).toBe(true);
    expect(entry?.tags).toEqual(["x", RETIRED_TAG]);

    expect(ltm.size).toBe(1);
    expect(ltm.query(["x"], 5)).toEqual([]);
    expect(ltm.query(["x"], 5, { includeRetired: true }).map((e) => e.id)).toEqual(["a"]);
  });

  it("does nothing when no time has passed", () => {
    const ltm = ltmWith();
    ltm.promote(makeItem({ id: "a", importance: 0.8, timestamp: 500 }));
    expect(ltm.decayPass(500)).toEqual({ decayed: 0, retired: [] });
  });

  describe("reconcile", () => {
    function withDuplicates() {
      const ltm = ltmWith({ mergeThreshold: 0.8 });
      ltm.promote(makeItem({ id: "a", importance: 0.8, timestamp: 1, tags: ["cats", "pets"], text: "I love my two cats at home" }));
      ltm.promote(makeItem({ id: "b", importance: 0.9, timestamp: 2, tags: ["pets", "cats"], text: "I love my two cats at home!" }));
      ltm.promote(makeItem({ id: "c", importance: 0.8, timestamp: 3, tags: ["cats"], text: "I love my two cats at home" }));
      ltm.promote(makeItem({ id: "d", importance: 0.8, timestamp: 4, tags: ["cats", "pets"], text: "Dogs bark at the mail carrier" }));
      return ltm;
    }

    it("collapses near-duplicates with the same tag set into the best entry", () => {
      const ltm = withDuplicates();

      const result = ltm.reconcile();

      expect(result.merged).toEqual([{ survivorId: "b", mergedIds: ["a"] }]);
      expect(ltm.size).toBe(3);
      const survivor = ltm.get("b");
      expect(survivor?.text).toBe("I love my two cats at home!");
      expect(survivor?.importance).toBe(0.9);
      expect(survivor?.mergedFrom).toEqual(["a"]);
    });

    it("keeps merged ids resolvable", () => {
      const ltm = withDuplicates();
      ltm.reconcile();

      expect(ltm.resolve("a")).toBe("b");
      expect(ltm.get("a")?.id).toBe("b");
      expect(ltm.resolve("nope")).toBeUndefined();
    });

    it("is idempotent", () => {
      const ltm = withDuplicates();
      ltm.reconcile();
      const once = JSON.stringify(ltm.exportState());

      expect(ltm.reconcile().merged).toEqual([]);
      expect(JSON.stringify(ltm.exportState())).toBe(once);
    });

    it("only touches groups of the given candidates", () => {
      const ltm = withDuplicates();
      expect(ltm.reconcile(["c"]).merged).toEqual([]);
      expect(ltm.reconcile(["a"]).merged).toEqual([{ survivorId: "b", mergedIds: ["a"] }]);
    });
  });

  it("restores exported state", () => {
    const source = ltmWith();
    source.promote(makeItem({ id: "a", importance: 0.8, tags: ["x"] }));
    const copy = ltmWith();
    copy.importState(source.exportState());

    expect(copy.query(["x"], 5).map((e) => e.id)).toEqual(["a"]);
    copy.promote(makeItem({ id: "b", importance: 0.8, tags: ["x"] }));
    expect(copy.get("b")?.seq).toBe(1);
  });
});
