import type { Knex } from "knex";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HistoryStore } from "../history";
import { RunCoordinator } from "../pipeline";
import { runScheduledCycleCount, scheduleTimeToCron, startScheduler } from "../scheduler";
import { SourceUnavailable } from "../errors";
import { capturingLogger, FakeSource, item, memoryDb, silentLogger } from "./helpers";

describe("scheduleTimeToCron", () => {
  it("turns a time of day into a daily cron expression", () => {
    expect(scheduleTimeToCron("02:00")).toBe("0 2 * * *");
    expect(scheduleTimeToCron("7:05")).toBe("5 7 * * *");
    expect(scheduleTimeToCron("23:59")).toBe("59 23 * * *");
  });

  it("rejects anything else", () => {
    expect(() => scheduleTimeToCron("24:00")).toThrow(/HH:MM/);
    expect(() => scheduleTimeToCron("2am")).toThrow(/HH:MM/);
  });
});

describe("runScheduledCycleCount", () => {
  let db: Knex;
  let store: HistoryStore;

  beforeEach(async () => {
    db = await memoryDb();
    store = new HistoryStore(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("runs the coordinator as a scheduled trigger", async () => {
    const { log, lines } = capturingLogger();
    const c = new RunCoordinator({ source: new FakeSource([item("A", "2024-01-01", null)]), store, log: silentLogger(), maxOrdersPerRun: 5 });
    await runScheduledCycleCount(c, log);
    expect((await store.listRuns())[0].trigger).toBe("scheduled");
    expect(lines.map(l => l.msg)).toEqual(["[CRON] cycle count done"]);
  });

  it("logs a skip instead of failing while a manual run holds the lock", async () => {
    const { log, lines } = capturingLogger();
    const c = new RunCoordinator({ source: new FakeSource(), store, log: silentLogger(), maxOrdersPerRun: 5 });
    c.context.running = true;
    await expect(runScheduledCycleCount(c, log)).resolves.toBeUndefined();
    expect(lines.map(l => l.msg)).toEqual(["[CRON] skipped: a run is already in progress"]);
    expect(await store.listRuns()).toEqual([]);
  });

  it("logs run failures at error level without throwing", async () => {
    const { log, lines } = capturingLogger();
    const source = new FakeSource([], new SourceUnavailable("timed out"));
    const c = new RunCoordinator({ source, store, log: silentLogger(), maxOrdersPerRun: 5 });
    await runScheduledCycleCount(c, log);
    expect(lines.map(l => [l.level, l.msg])).toEqual([[50, "[CRON] cycle count failed"]]);
  });
});

describe("startScheduler", () => {
  let db: Knex;
  let c: RunCoordinator;

  beforeEach(async () => {
    db = await memoryDb();
    c = new RunCoordinator({ source: new FakeSource(), store: new HistoryStore(db), log: silentLogger(), maxOrdersPerRun: 1 });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("refuses an invalid cron expression", () => {
    expect(() => startScheduler(c, { cronExpr: "not a cron", scheduleTime: "02:00", timezone: undefined }, silentLogger()))
      .toThrow(/Invalid cron/);
  });

  it("schedules the daily run from the configured time", () => {
    const { log, lines } = capturingLogger();
    const task = startScheduler(c, { cronExpr: null, scheduleTime: "02:30", timezone: undefined }, log);
    task.stop();
    expect(lines[0]).toMatchObject({ cron: "30 2 * * *", msg: "[CRON] daily cycle count scheduled" });
  });
});
