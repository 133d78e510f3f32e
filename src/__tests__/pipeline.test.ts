import type { Knex } from "knex";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { OrderDispatcher } from "../dispatch";
import { CycleCountError, InvalidDateData, RunAlreadyInProgress, SourceUnavailable, StoreUnavailable } from "../errors";
import { HistoryStore } from "../history";
import type { Run } from "../types";
import { RunCoordinator } from "../pipeline";
import { FakeSource, item, memoryDb, silentLogger, stubHttp } from "./helpers";

const scenario = [
  item("A", "2024-01-01", null),
  item("B", "2024-01-10", "2024-06-01"),
];

describe("RunCoordinator", () => {
  let db: Knex;
  let store: HistoryStore;

  beforeEach(async () => {
    db = await memoryDb();
    store = new HistoryStore(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  function coordinator(source: FakeSource, extra: Partial<ConstructorParameters<typeof RunCoordinator>[0]> = {}) {
    return new RunCoordinator({ source, store, log: silentLogger(), maxOrdersPerRun: 1, ...extra });
  }

  it("orders the never-counted oldest location and records the run", async () => {
    const c = coordinator(new FakeSource(scenario));
    const res = await c.run({ trigger: "scheduled" });

    expect(res.outcome).toBe("success");
    expect(res.orders.map(o => [o.locationId, o.status, o.runId])).toEqual([["A", "pending", res.runId]]);
    expect(res.locationsRanked).toBe(2);

    const runs = await store.listRuns();
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ id: res.runId, trigger: "scheduled", outcome: "success", ordersCreated: 1, failedStage: null });
    expect(c.context.lastRun?.runId).toBe(res.runId);
    expect(c.context.stage).toBe("idle");
  });

  it("skips a location with an open order on the next run", async () => {
    const c = coordinator(new FakeSource(scenario));
    await c.run();
    const second = await c.run();
    expect(second.orders.map(o => o.locationId)).toEqual(["B"]);

    const third = await c.run();
    expect(third.ordersCreated).toBe(0);
    expect(third.outcome).toBe("success");
    expect([...(await store.getOpenLocationIds())].sort()).toEqual(["A", "B"]);
  });

  it("honours a per-run cap and scope", async () => {
    const source = new FakeSource([
      item("A", "2024-01-01", null, { storageUnit: "G1" }),
      item("B", "2024-01-02", null, { storageUnit: "G2" }),
      item("C", "2024-01-03", null, { storageUnit: "G1" }),
      item("D", "2024-01-04", null, { storageUnit: "Overflow-1" }),
    ]);
    const c = coordinator(source, { excludedStorageUnitPrefixes: ["Overflow"] });
    const res = await c.run({ maxOrders: 5, storageUnits: ["G1", "Overflow-1"] });
    expect(res.orders.map(o => o.locationId)).toEqual(["A", "C"]);
  });

  it("lets exactly one of two concurrent runs proceed", async () => {
    const source = new FakeSource(scenario);
    source.hold();
    const c = coordinator(source);

    const first = c.run();
    await expect(c.run()).rejects.toBeInstanceOf(RunAlreadyInProgress);
    expect(c.context.running).toBe(true);

    source.release();
    const res = await first;
    expect(res.ordersCreated).toBe(1);
    expect(source.calls).toBe(1);
    expect(c.context.running).toBe(false);
    expect(await store.listRuns()).toHaveLength(1);
  });

  it("records a fetch failure, releases the lock and rethrows with the stage", async () => {
    const source = new FakeSource(scenario, new SourceUnavailable("connect ECONNREFUSED"));
    const c = coordinator(source);

    const err = await c.run().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailable);
    expect(err).toMatchObject({ stage: "fetching" });
    expect(c.context.running).toBe(false);

    const [run] = await store.listRuns();
    expect(run).toMatchObject({ outcome: "failure", failedStage: "fetching", error: "connect ECONNREFUSED" });

    source.failWith = null;
    expect((await c.run()).ordersCreated).toBe(1);
  });

  it("fails in ranking on bad dates without writing orders", async () => {
    const c = coordinator(new FakeSource([item("A", "yesterday-ish", null)]));
    const err = await c.run().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidDateData);
    expect(err).toMatchObject({ stage: "ranking" });
    expect(await store.listOrders()).toEqual([]);
  });

  it("leaves no orders behind when storage fails mid-batch", async () => {
    await db.raw(
      "CREATE TRIGGER fail_on_b BEFORE INSERT ON count_orders WHEN NEW.location_id = 'B' " +
        "BEGIN SELECT RAISE(ABORT, 'disk full'); END"
    );
    store = new HistoryStore(db, { batchSize: 1 });
    const c = coordinator(new FakeSource([...scenario, item("C", "2024-07-01", null)]), { maxOrdersPerRun: 3 });

    const err = await c.run().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreUnavailable);
    expect(err).toMatchObject({ stage: "persisting" });

    expect(await store.listOrders()).toEqual([]);
    const [run] = await store.listRuns();
    expect(run).toMatchObject({ outcome: "failure", failedStage: "persisting", ordersCreated: 0 });
  });

  it("wraps unexpected faults", async () => {
    const source = new FakeSource(scenario, new TypeError("cannot read properties of undefined"));
    const err = await coordinator(source).run().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CycleCountError);
    expect(err).toMatchObject({ code: "Internal", stage: "fetching" });
  });

  it("marks a run partial when some orders could not be dispatched", async () => {
    const http = stubHttp(cfg => (String(cfg.data).includes('"id":"B"') ? { status: 400 } : { status: 200, data: {} }));
    const dispatcher = new OrderDispatcher(http, silentLogger(), { priority: 3, retry: { max: 0 } });
    const c = coordinator(new FakeSource(scenario), { dispatcher, maxOrdersPerRun: 2 });

    const res = await c.run();
    expect(res.outcome).toBe("partial");
    expect(res.dispatchFailures).toBe(1);
    expect(res.orders.map(o => [o.locationId, o.status])).toEqual([["A", "dispatched"], ["B", "pending"]]);
    expect((await store.listOrders({ status: "dispatched" })).map(o => o.locationId)).toEqual(["A"]);
    expect((await store.listRuns())[0].outcome).toBe("partial");
  });

  it("publishes a new order under its own name when a later run on the same day reuses a rank", async () => {
    // inventory system that refuses duplicate order names
    const remote = new Map<string, string>();
    const posted = z.object({ name: z.string(), locations: z.array(z.object({ id: z.string() })) });
    const http = stubHttp(cfg => {
      const body = posted.parse(JSON.parse(String(cfg.data)));
      if (remote.has(body.name)) {
        return { status: 422, data: { errors: [{ name: { message: "Order with this name already exists" } }] } };
      }
      remote.set(body.name, body.locations[0].id);
      return { status: 200, data: {} };
    });
    const dispatcher = new OrderDispatcher(http, silentLogger(), { priority: 3, retry: { max: 0 } });
    const source = new FakeSource([
      item("A", "2024-01-01", null),
      item("B", "2024-01-10", null),
      item("C", "2024-07-01", null),
    ]);
    const sameDay = new Date(2024, 9, 2, 9, 0, 0);
    const c = coordinator(source, { dispatcher, maxOrdersPerRun: 2, now: () => sameDay });

    const first = await c.run();
    expect(first.orders.map(o => [o.locationId, o.rank])).toEqual([["A", 1], ["B", 2]]);
    const orderA = first.orders.find(o => o.locationId === "A");
    expect(orderA).toBeDefined();
    if (orderA) await store.updateOrderStatus(orderA.id, "resolved");
    source.items = [item("A", "2024-01-01", "2024-10-02"), item("B", "2024-01-10", null), item("C", "2024-07-01", null)];

    const second = await c.run({ maxOrders: 1 });
    expect(second.outcome).toBe("success");
    expect(second.orders.map(o => [o.locationId, o.rank, o.status])).toEqual([["C", 2, "dispatched"]]);
    expect(second.orders[0].name).not.toBe(first.orders[1].name);
    expect(remote.get(second.orders[0].name)).toBe("C");
    expect(remote.size).toBe(3);
  });

  it("reports a store failure while opening the run as the starting stage", async () => {
    class DownStore extends HistoryStore {
      override async recordRun(_run: Run): Promise<void> {
        throw new StoreUnavailable("history store recordRun failed: SQLITE_CANTOPEN");
      }
    }
    const source = new FakeSource(scenario);
    const c = new RunCoordinator({ source, store: new DownStore(db), log: silentLogger(), maxOrdersPerRun: 1 });

    const err = await c.run().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreUnavailable);
    expect(err).toMatchObject({ stage: "starting" });
    expect(c.context.lastRun?.failedStage).toBe("starting");
    expect(source.calls).toBe(0);
    expect(c.context.running).toBe(false);
  });
});
