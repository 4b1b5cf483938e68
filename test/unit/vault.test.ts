import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { CognitiveEngine } from "../../src/cognition/engine.js";
import { parseEngineState } from "../../src/cognition/state.js";
import type { DreamEntry } from "../../src/dream/types.js";
import type { ExperienceRecord } from "../../src/experience/types.js";
import { LexiconAnalyzer } from "../../src/nlp/lexicon.js";
import { RuleResponder } from "../../src/responder/rules.js";
import { VaultDB } from "../../src/vault/db.js";
import { StateVault } from "../../src/vault/store.js";
import { counterIds, makeConfig, silentLogger } from "../helpers/fixtures.js";

function dream(id: string, timestamp: number): DreamEntry {
  return {
    id,
    timestamp,
    speaker: "agent",
    text: `dream ${id}`,
    tags: ["music", "dream"],
    importance: 0.75,
    valence: 0.25,
    theme: "feeling lost",
    provenance: ["m1", "m2"],
  };
}

function experience(id: string, timestamp: number): ExperienceRecord {
  return { id, interactionId: `turn-${id}`, outcome: "joy", evidence: "pass: ok", tags: ["music"], timestamp };
}

describe("VaultDB", () => {
  let dir: string;
  let db: VaultDB;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ponder-vault-"));
    db = new VaultDB(dir);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("opens with its tables in place", () => {
    expect(db.isOpen()).toBe(true);
    const tables = db
      .raw()
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((row) => row.name);
    expect(tables).toEqual(["dreams", "engine_state", "experiences"]);
  });

  it("closes idempotently", () => {
    db.close();
    db.close();
    expect(db.isOpen()).toBe(false);
  });
});

describe("StateVault", () => {
  let dir: string;
  let db: VaultDB;
  let vault: StateVault;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ponder-vault-"));
    db = new VaultDB(dir);
    vault = new StateVault(db);
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns null before anything is saved", () => {
    expect(vault.loadState()).toBeNull();
  });

  it("saves engine state and journals its history", async () => {
    const engine = new CognitiveEngine({
      config: makeConfig(),
      logger: silentLogger(),
      analyzer: new LexiconAnalyzer(),
      responder: new RuleResponder(),
      clock: () => 5_000,
      ids: counterIds("id"),
    });
    await engine.handleTurn("Thanks for helping");
    const state = await engine.exportState();

    vault.saveState(state, 6_000);
    vault.saveState(state, 7_000);

    expect(vault.loadState()).toEqual(JSON.parse(JSON.stringify(state)));
    expect(vault.recentExperiences()).toEqual([
      {
        id: "id-4",
        interactionId: "id-1",
        outcome: "joy",
        evidence: "pass: You're welcome. That was kind of you.",
        tags: [],
        timestamp: 5_000,
      },
    ]);
  });

  it("journals only what was added since the last save", async () => {
    const engine = new CognitiveEngine({
      config: makeConfig(),
      logger: silentLogger(),
      analyzer: new LexiconAnalyzer(),
      responder: new RuleResponder(),
      clock: () => 5_000,
      ids: counterIds("id"),
    });
    const appended = vi.spyOn(vault, "appendExperience");

    await engine.handleTurn("Thanks for helping");
    vault.saveState(await engine.exportState());
    await engine.handleTurn("the weather today");
    vault.saveState(await engine.exportState());
    const state = await engine.exportState();
    vault.saveState(state);

    expect(appended).toHaveBeenCalledTimes(2);
    const row = db.raw().prepare<[], { value: string }>("SELECT value FROM engine_state").get();
    expect(JSON.parse(row?.value ?? "{}")).toHaveProperty("experience", { records: [] });
    const loaded = parseEngineState(vault.loadState());
    expect(loaded.experience.records).toEqual(state.experience.records);
  });

  it("ignores duplicate journal entries", () => {
    expect(vault.appendDream(dream("d1", 100))).toBe(true);
    expect(vault.appendDream(dream("d1", 100))).toBe(false);
    expect(vault.appendExperience(experience("e1", 100))).toBe(true);
    expect(vault.appendExperience(experience("e1", 100))).toBe(false);
    expect(vault.countDreams()).toBe(1);
  });

  it("lists dreams newest first", () => {
    vault.appendDream(dream("d1", 100));
    vault.appendDream(dream("d2", 300));
    vault.appendDream(dream("d3", 200));

    expect(vault.recentDreams(2).map((d) => d.id)).toEqual(["d2", "d3"]);
    expect(vault.recentDreams()[0]).toEqual(dream("d2", 300));
  });

  it("lists experiences newest first", () => {
    vault.appendExperience(experience("e1", 100));
    vault.appendExperience(experience("e2", 200));
    expect(vault.recentExperiences(5)).toEqual([experience("e2", 200), experience("e1", 100)]);
  });
});
