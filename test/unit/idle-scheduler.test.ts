import { describe, it, expect, vi, afterEach } from "vitest";
import type { IdleTickResult } from "../../src/cognition/types.js";
import { IdleScheduler, type IdleTarget } from "../../src/scheduler/idle.js";
import { silentLogger } from "../helpers/fixtures.js";

const tickResult: IdleTickResult = { tick: 1, intents: [], dream: null, decayed: false, thought: null };

describe("IdleScheduler", () => {
  let scheduler: IdleScheduler | undefined;

  afterEach(() => {
    scheduler?.stop();
  });

  it("runs a tick and hands the result on", async () => {
    const target: IdleTarget = { idleTick: vi.fn(async () => tickResult) };
    const afterTick = vi.fn();
    scheduler = new IdleScheduler(target, { schedule: "*/30 * * * * *", afterTick }, silentLogger());

    expect(await scheduler.tick()).toEqual(tickResult);
    expect(afterTick).toHaveBeenCalledWith(tickResult);
  });

  it("logs and swallows tick failures", async () => {
    const logger = silentLogger();
    const error = vi.spyOn(logger, "error");
    const target: IdleTarget = {
      idleTick: async () => {
        throw new Error("tick broke");
      },
    };
    scheduler = new IdleScheduler(target, { schedule: "*/30 * * * * *" }, logger);

    expect(await scheduler.tick()).toBeNull();
    expect(error).toHaveBeenCalledWith({ err: expect.any(Error) }, "Idle tick failed");
  });

  it("reports an afterTick failure as a failed tick", async () => {
    const target: IdleTarget = { idleTick: async () => tickResult };
    const afterTick = vi.fn(async () => {
      throw new Error("disk full");
    });
    scheduler = new IdleScheduler(target, { schedule: "*/30 * * * * *", afterTick }, silentLogger());
    expect(await scheduler.tick()).toBeNull();
  });

  it("starts once and stops", () => {
    const target: IdleTarget = { idleTick: async () => tickResult };
    scheduler = new IdleScheduler(target, { schedule: "0 0 * * *" }, silentLogger());

    expect(scheduler.isRunning()).toBe(false);
    scheduler.start();
    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });
});
