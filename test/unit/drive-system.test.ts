import { describe, it, expect } from "vitest";
import { DriveSystem } from "../../src/drives/system.js";
import type { DrivesConfig } from "../../src/config/types.js";
import { makeConfig } from "../helpers/fixtures.js";

function drivesConfig(definitions: DrivesConfig["definitions"], priority?: string[]): DrivesConfig {
  const base = makeConfig().drives;
  return { ...base, definitions, priority: priority ?? base.priority };
}

describe("DriveSystem", () => {
  it("starts from the configured levels", () => {
    const drives = new DriveSystem(makeConfig().drives);
    expect(drives.levels()).toEqual({ curiosity: 0.5, boredom: 0.2, connection: 0.4, safety: 0.3 });
  });

  it("rejects duplicate drive names", () => {
    const def = { name: "curiosity", level: 0.5, riseRate: 0.1, decayRate: 0.1 };
    expect(() => new DriveSystem(drivesConfig([def, def]))).toThrow("Duplicate drive: curiosity");
  });

  it("moves levels toward their targets at the rise or decay rate", () => {
    const drives = new DriveSystem(makeConfig().drives);
    drives.tick({ idle: true });

    // curiosity 0.5 → target 0.2, decay 0.05: 0.5 + 0.05 * (0.2 - 0.5)
    expect(drives.get("curiosity")?.level).toBeCloseTo(0.485);
    // boredom 0.2 → target 1, rise 0.1
    expect(drives.get("boredom")?.level).toBeCloseTo(0.28);
    // connection 0.4 → target 1, rise 0.1
    expect(drives.get("connection")?.level).toBeCloseTo(0.46);
    // safety 0.3 → target 0, decay 0.1
    expect(drives.get("safety")?.level).toBeCloseTo(0.27);
  });

  it("raises curiosity on novel tags and drops boredom", () => {
    const drives = new DriveSystem(makeConfig().drives);
    drives.tick({ idle: false, novelTags: 2, sentiment: 0 });

    expect(drives.get("curiosity")?.level).toBeCloseTo(0.575);
    expect(drives.get("boredom")?.level).toBeCloseTo(0.16);
  });

  it("quenches curiosity and boredom after a dream and holds the rest", () => {
    const drives = new DriveSystem(makeConfig().drives);
    drives.tick({ idle: true, dreamed: true });

    expect(drives.get("curiosity")?.level).toBeCloseTo(0.475);
    expect(drives.get("boredom")?.level).toBeCloseTo(0.16);
    expect(drives.get("connection")?.level).toBe(0.4);
    expect(drives.get("safety")?.level).toBe(0.3);
  });

  it("breaks dominance ties by priority order", () => {
    const defs = [
      { name: "safety", level: 0.6, riseRate: 0.1, decayRate: 0.1 },
      { name: "curiosity", level: 0.6, riseRate: 0.1, decayRate: 0.1 },
      { name: "boredom", level: 0.4, riseRate: 0.1, decayRate: 0.1 },
    ];
    expect(new DriveSystem(drivesConfig(defs)).dominant()?.name).toBe("curiosity");
    expect(new DriveSystem(drivesConfig(defs, ["safety", "curiosity"])).dominant()?.name).toBe("safety");
  });

  it("raises an intent once a drive reaches its threshold", () => {
    const drives = new DriveSystem(
      drivesConfig([
        { name: "boredom", level: 0.79, riseRate: 0.5, decayRate: 0.1, threshold: 0.8, intent: "dream" },
        { name: "safety", level: 0.1, riseRate: 0.1, decayRate: 0.1, threshold: 0.8, intent: "reflect" },
      ]),
    );
    expect(drives.intents()).toEqual([]);

    const intents = drives.tick({ idle: true });

    expect(intents).toEqual(["dream"]);
    expect(drives.hasIntent("dream")).toBe(true);
    expect(drives.hasIntent("reflect")).toBe(false);
  });

  it("keeps levels within [0, 1] under any signal", () => {
    const drives = new DriveSystem(makeConfig().drives);
    for (let i = 0; i < 200; i++) {
      drives.tick({ idle: i % 2 === 0, novelTags: i % 3, sentiment: i % 5 === 0 ? -1 : 1, valueViolations: i % 7 });
      for (const level of Object.values(drives.levels())) {
        expect(level).toBeGreaterThanOrEqual(0);
        expect(level).toBeLessThanOrEqual(1);
      }
    }
  });

  it("restores exported levels", () => {
    const drives = new DriveSystem(makeConfig().drives);
    drives.importState({ levels: { boredom: 0.95, unknown: 0.5 } });
    expect(drives.get("boredom")?.level).toBe(0.95);
    expect(drives.get("unknown")).toBeUndefined();
    expect(drives.intents()).toEqual(["dream"]);
  });
});
